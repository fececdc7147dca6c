/**
 * Request schemas for the tool API and webhook endpoints.
 *
 * Field names follow the wire format the automation runner and providers
 * send (snake_case), so parsed arguments pass straight to the services.
 */

import { z } from 'zod';
import { CHANNELS, SOURCE_SYSTEMS } from '../config/constants';

const optionalText = z.string().nullish();
const looseObject = z.record(z.unknown());

export const ingestLeadSchema = z.object({
  source_system: z.enum(SOURCE_SYSTEMS),
  source_lead_id: z.string().min(1),
  channel: z.enum(CHANNELS),
  first_name: z.string(),
  last_name: z.string(),
  marketing_consent: z.boolean(),
  email: optionalText,
  phone: optionalText,
  budget_range: optionalText,
  location: optionalText,
  property_type: optionalText,
  free_text: optionalText,
  consent_source: optionalText,
  raw_payload: looseObject.nullish(),
});

export const twilioEventSchema = z.object({
  call_sid: z.string().min(1),
  call_status: z.string().min(1),
  direction: z.string().min(1),
  from_number: z.string(),
  to_number: z.string(),
  recording_url: optionalText,
  recording_sid: optionalText,
  call_duration: z.union([z.string(), z.number()]).nullish(),
  raw: looseObject.nullish(),
});

export const cloudtalkEventSchema = z.object({
  event_type: z.string().min(1),
  call_id: z.union([z.string(), z.number()]).transform(String),
  direction: z.string().min(1),
  from_number: z.string(),
  to_number: z.string(),
  recording_url: optionalText,
  raw: looseObject.nullish(),
});

export const calcomEventSchema = z.object({
  trigger_event: z.string().min(1),
  booking_id: z.union([z.number(), z.string()]).nullish(),
  title: optionalText,
  start_time: optionalText,
  end_time: optionalText,
  attendee_name: optionalText,
  attendee_email: optionalText,
  attendee_phone: optionalText,
  organizer_name: optionalText,
  organizer_email: optionalText,
  location: optionalText,
  status: optionalText,
  reschedule_reason: optionalText,
  cancellation_reason: optionalText,
  metadata: looseObject.nullish(),
});

export const elevenlabsEventSchema = z.object({
  event_type: z.string().min(1),
  agent_id: optionalText,
  conversation_id: optionalText,
  call_duration_secs: z.number().nullish(),
  caller_id: optionalText,
  call_successful: z.boolean().nullish(),
  transcript: optionalText,
  summary: optionalText,
  metadata: looseObject.nullish(),
});

export const notionEventSchema = z.object({
  payload: looseObject,
});

export const lookupOhidSchema = z.object({
  email: optionalText,
  phone: optionalText,
});

export const verifySignatureSchema = z.object({
  body_hex: z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'body_hex must be hex-encoded'),
  signature: z.string(),
  source: z.string().default('cloudtalk'),
});

export const syncLeadSchema = z
  .object({
    zoho_lead_id: z.string().min(1),
    sync_direction: z.enum(['inbound', 'outbound', 'bidirectional']),
    source: optionalText,
    property_db_lead_id: optionalText,
  })
  .refine((args) => args.sync_direction === 'inbound' || Boolean(args.property_db_lead_id), {
    message: 'property_db_lead_id required for outbound/bidirectional sync',
    path: ['property_db_lead_id'],
  });

export const getZohoLeadSchema = z.object({
  lead_id: z.string().min(1),
});

export const upsertZohoLeadSchema = z.object({
  last_name: z.string().min(1),
  email: optionalText,
  phone: optionalText,
  first_name: optionalText,
  company: optionalText,
  lead_source: optionalText,
  source_attribution: optionalText,
});

export type IngestLeadArgs = z.infer<typeof ingestLeadSchema>;
export type TwilioEventArgs = z.infer<typeof twilioEventSchema>;
export type CloudtalkEventArgs = z.infer<typeof cloudtalkEventSchema>;
export type CalcomEventArgs = z.infer<typeof calcomEventSchema>;
export type ElevenlabsEventArgs = z.infer<typeof elevenlabsEventSchema>;
export type LookupOhidArgs = z.infer<typeof lookupOhidSchema>;
export type VerifySignatureArgs = z.infer<typeof verifySignatureSchema>;
export type SyncLeadArgs = z.infer<typeof syncLeadSchema>;
export type GetZohoLeadArgs = z.infer<typeof getZohoLeadSchema>;
export type UpsertZohoLeadArgs = z.infer<typeof upsertZohoLeadSchema>;
