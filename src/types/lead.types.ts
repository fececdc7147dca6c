/**
 * Lead Type Definitions
 *
 * Types for lead records captured by the ingestion path and held by the
 * identity store.
 */

import { CHANNELS, EVENT_ONLY_SOURCES, SOURCE_SYSTEMS } from '../config/constants';

export type SourceSystem = (typeof SOURCE_SYSTEMS)[number];

/** Every tag a workflow event may carry as its source */
export type EventSourceSystem = SourceSystem | (typeof EVENT_ONLY_SOURCES)[number];

export type Channel = (typeof CHANNELS)[number];

/** Opaque identity token (OHID) shared by every record of one real contact */
export type Identity = string;

export interface Person {
  firstName: string;
  lastName: string;
  email?: string;
  phone?: string;
}

export interface LeadDetails {
  budgetRange?: string;
  location?: string;
  propertyType?: string;
  freeText?: string;
}

export interface Consent {
  /** Whether the contact opted in to marketing */
  marketing: boolean;

  /** Where consent was captured (form name, call script, ...) */
  source?: string;

  timestamp: string; // ISO 8601 date string
}

/**
 * LeadRecord - Immutable snapshot of one ingestion
 *
 * Identity is not stored on the record itself; it is resolved by
 * contact lookup and kept alongside the record by the store.
 */
export interface LeadRecord {
  sourceSystem: SourceSystem;
  sourceLeadId: string;
  channel: Channel;
  person: Person;
  leadDetails?: LeadDetails;
  consent: Consent;
  rawPayload: Record<string, unknown>;

  /** When the gateway ingested this lead */
  timestamp: string; // ISO 8601 date string
}

/**
 * StoredLead - A lead record as persisted, with its resolved identity
 */
export interface StoredLead {
  ingestId: string;
  identity: Identity;
  lead: LeadRecord;
  createdAt: string;
}

/**
 * IngestLeadResult - Tool response for a captured lead
 */
export interface IngestLeadResult {
  ohid: Identity;
  ingest_id: string;
  source_system: SourceSystem;
  status: 'ingested';
}
