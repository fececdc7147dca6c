/**
 * Workflow Event Type Definitions
 *
 * The internal taxonomy every inbound signal is normalized into.
 */

import { EVENT_TYPES } from '../config/constants';
import { EventSourceSystem, Identity } from './lead.types';

export type WorkflowEventType = (typeof EVENT_TYPES)[number];

export type CalcomEventType = Extract<WorkflowEventType, `Calcom${string}`>;

/**
 * WorkflowEvent - One immutable normalized occurrence (append-only log entry)
 */
export interface WorkflowEvent {
  eventId: string;
  eventType: WorkflowEventType;

  /** Null when the identity cannot be resolved at normalization time */
  identity: Identity | null;

  payload: Record<string, unknown>;
  occurredAt: string; // ISO 8601, UTC
  sourceSystem: EventSourceSystem;
}

/**
 * EventAcceptedResult - Tool response for every recorded event
 */
export interface EventAcceptedResult {
  event_id: string;
  event_type: WorkflowEventType;
  accepted: true;
  [echo: string]: unknown;
}
