/**
 * Event Normalizer
 *
 * Maps each source's native vocabulary (telephony call states, booking
 * triggers, voice-agent call outcomes, Notion webhooks, CRM sync results)
 * into the closed internal taxonomy. Every event gets a fresh event id and a
 * UTC timestamp taken at normalization time; native timestamps are kept in
 * the payload only.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';
import { CalcomEventType, WorkflowEvent, WorkflowEventType } from '../types/event.types';
import { CallOutcomeRecord } from '../types/elevenlabs.types';
import { EventSourceSystem, Identity, LeadRecord } from '../types/lead.types';
import { SyncLeadResult } from '../types/zoho.types';
import {
  CalcomEventArgs,
  CloudtalkEventArgs,
  ElevenlabsEventArgs,
  TwilioEventArgs,
} from '../validation/toolArgs.schema';
import { IdentityResolver } from './identity.service';

// ============= MAPPING TABLES =============

const TWILIO_RECEIVED_STATUSES = new Set(['ringing', 'queued', 'initiated']);

const CLOUDTALK_RECEIVED_EVENTS = new Set(['call.started', 'call.ringing']);

const ELEVENLABS_COMPLETED_EVENTS = new Set([
  'call.ended',
  'post_call_transcription',
  'call.analysis_complete',
]);

const CALCOM_TRIGGERS: Record<string, CalcomEventType> = {
  BOOKING_CREATED: 'CalcomBookingCreated',
  BOOKING_RESCHEDULED: 'CalcomBookingRescheduled',
  BOOKING_CANCELLED: 'CalcomBookingCancelled',
  BOOKING_CONFIRMED: 'CalcomBookingConfirmed',
  MEETING_ENDED: 'CalcomMeetingEnded',
  MEETING_STARTED: 'CalcomMeetingStarted',
};

export const mapTwilioStatus = (callStatus: string): WorkflowEventType =>
  TWILIO_RECEIVED_STATUSES.has(callStatus) ? 'CallReceived' : 'CallCompleted';

export const mapCloudtalkEvent = (eventType: string): WorkflowEventType =>
  CLOUDTALK_RECEIVED_EVENTS.has(eventType) ? 'CallReceived' : 'CallCompleted';

export const mapElevenlabsEvent = (eventType: string): WorkflowEventType =>
  ELEVENLABS_COMPLETED_EVENTS.has(eventType) ? 'ElevenLabsCallCompleted' : 'ElevenLabsEvent';

export const mapCalcomTrigger = (triggerEvent: string): CalcomEventType =>
  Object.prototype.hasOwnProperty.call(CALCOM_TRIGGERS, triggerEvent)
    ? CALCOM_TRIGGERS[triggerEvent]
    : 'CalcomEvent';

export const mapSyncStatus = (status: SyncLeadResult['status']): WorkflowEventType =>
  status === 'success' ? 'CrmSyncCompleted' : 'CrmSyncFailed';

/** A Notion webhook either asks to echo a verification challenge or carries an event */
export type NotionOutcome =
  | { kind: 'challenge'; challenge: unknown }
  | { kind: 'event'; event: WorkflowEvent };

// ============= NORMALIZER =============

export class EventNormalizer {
  private log = logger.child({ service: 'event-normalizer' });

  constructor(private readonly identities: IdentityResolver) {}

  leadIngested(identity: Identity, ingestId: string, lead: LeadRecord): WorkflowEvent {
    return this.build('LeadIngested', lead.sourceSystem, identity, (header) => ({
      ...header,
      ingest_id: ingestId,
      lead_ingest: lead,
    }));
  }

  twilio(args: TwilioEventArgs): WorkflowEvent {
    const eventType = mapTwilioStatus(args.call_status);

    return this.build(eventType, 'TWILIO', null, (header) => ({
      ...header,
      call: {
        call_sid: args.call_sid,
        status: args.call_status,
        direction: args.direction.toUpperCase(),
        from: args.from_number,
        to: args.to_number,
        recording_url: args.recording_url ?? null,
        recording_sid: args.recording_sid ?? null,
        duration: args.call_duration ?? null,
      },
      raw: args.raw ?? {},
    }));
  }

  cloudtalk(args: CloudtalkEventArgs): WorkflowEvent {
    const eventType = mapCloudtalkEvent(args.event_type);

    return this.build(eventType, 'CLOUDTALK', null, (header) => ({
      ...header,
      native_event_type: args.event_type,
      call: {
        call_id: args.call_id,
        direction: args.direction.toUpperCase(),
        from: args.from_number,
        to: args.to_number,
        recording_url: args.recording_url ?? null,
      },
      raw: args.raw ?? {},
    }));
  }

  elevenlabs(args: ElevenlabsEventArgs): WorkflowEvent {
    const eventType = mapElevenlabsEvent(args.event_type);

    return this.build(eventType, 'ELEVENLABS', null, (header) => ({
      ...header,
      native_event_type: args.event_type,
      conversation: {
        conversation_id: args.conversation_id ?? null,
        agent_id: args.agent_id ?? null,
        caller_id: args.caller_id ?? null,
        call_duration_secs: args.call_duration_secs ?? null,
        call_successful: args.call_successful ?? null,
        transcript: args.transcript ?? null,
        summary: args.summary ?? null,
      },
      metadata: args.metadata ?? {},
    }));
  }

  /**
   * Booking events carry attendee contact details, so the identity is looked
   * up (never minted) and attached when found.
   */
  async calcom(args: CalcomEventArgs): Promise<WorkflowEvent> {
    const eventType = mapCalcomTrigger(args.trigger_event);
    const identity = await this.identities.lookup(args.attendee_email, args.attendee_phone);

    this.log.debug({ eventType, identityResolved: identity !== null }, 'Cal.com event identity lookup');

    return this.build(eventType, 'CALCOM', identity, (header) => ({
      ...header,
      trigger_event: args.trigger_event,
      booking: {
        booking_id: args.booking_id ?? null,
        title: args.title ?? null,
        start_time: args.start_time ?? null,
        end_time: args.end_time ?? null,
        location: args.location ?? null,
        status: args.status ?? null,
        reschedule_reason: args.reschedule_reason ?? null,
        cancellation_reason: args.cancellation_reason ?? null,
      },
      attendee: {
        name: args.attendee_name ?? null,
        email: args.attendee_email ?? null,
        phone: args.attendee_phone ?? null,
      },
      organizer: {
        name: args.organizer_name ?? null,
        email: args.organizer_email ?? null,
      },
      metadata: args.metadata ?? {},
    }));
  }

  notion(payload: Record<string, unknown>): NotionOutcome {
    if ('challenge' in payload) {
      return { kind: 'challenge', challenge: payload.challenge };
    }

    const subtype = typeof payload.type === 'string' ? payload.type : 'notion.event';
    const nativeId = typeof payload.id === 'string' ? payload.id : null;

    const event = this.build('NotionEvent', 'NOTION', null, (header) => ({
      ...header,
      event_subtype: subtype,
      notion_event_id: nativeId,
      payload,
    }));

    return { kind: 'event', event };
  }

  callOutcome(outcome: CallOutcomeRecord, identity: Identity | null): WorkflowEvent {
    return this.build('ElevenLabsCallCompleted', 'ELEVENLABS', identity, (header) => ({
      ...header,
      call_outcome: outcome,
    }));
  }

  crmSync(result: Omit<SyncLeadResult, 'event_id'>, identity: Identity | null): WorkflowEvent {
    return this.build(mapSyncStatus(result.status), 'ZOHO_CRM', identity, (header) => ({
      ...header,
      sync: result,
    }));
  }

  private build(
    eventType: WorkflowEventType,
    sourceSystem: EventSourceSystem,
    identity: Identity | null,
    body: (header: Record<string, unknown>) => Record<string, unknown>
  ): WorkflowEvent {
    const eventId = uuidv4();
    const occurredAt = new Date().toISOString();

    const header = {
      event_type: eventType,
      event_id: eventId,
      occurred_at: occurredAt,
      ohid: identity,
    };

    return {
      eventId,
      eventType,
      identity,
      payload: body(header),
      occurredAt,
      sourceSystem,
    };
  }
}
