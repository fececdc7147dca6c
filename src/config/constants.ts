/**
 * Application Constants
 *
 * Centralized names, defaults and status codes used throughout the gateway.
 */

export const PORTS = {
  GATEWAY: 8000,
} as const;

export const SERVICE_NAME = 'lead-gateway';
export const SERVICE_VERSION = '1.0.0';

// Lead source systems accepted by ingestion
export const SOURCE_SYSTEMS = [
  'WEB',
  'META',
  'TWILIO',
  'ZOHO_SOCIAL',
  'ZOHO_CRM',
  'ELEVENLABS',
  'CALCOM',
] as const;

// Source tags that only ever appear on workflow events
export const EVENT_ONLY_SOURCES = ['CLOUDTALK', 'NOTION'] as const;

export const CHANNELS = [
  'WEB_FORM',
  'META_LEAD_AD',
  'INBOUND_CALL',
  'OUTBOUND_CALL',
  'SOCIAL',
  'CRM',
  'AI_VOICE_CALL',
  'BOOKING',
] as const;

// Closed internal event taxonomy
export const EVENT_TYPES = [
  'LeadIngested',
  'CallReceived',
  'CallCompleted',
  'ElevenLabsCallCompleted',
  'ElevenLabsEvent',
  'CalcomBookingCreated',
  'CalcomBookingRescheduled',
  'CalcomBookingCancelled',
  'CalcomBookingConfirmed',
  'CalcomMeetingEnded',
  'CalcomMeetingStarted',
  'CalcomEvent',
  'NotionEvent',
  'CrmSyncCompleted',
  'CrmSyncFailed',
] as const;

// Value of human_transfer that marks a failed handoff to a person
export const TRANSFER_FAILURE_SENTINEL = 'failure';

export const PERSONALIZATION_LOOKUP_TIMEOUT_MS = 2500;

export const ELEVENLABS = {
  INITIATION_RESPONSE_TYPE: 'conversation_initiation_client_data',
  DEFAULT_LANGUAGE: 'en',
} as const;

export const ZOHO = {
  API_BASE: 'https://www.zohoapis.com/crm/v2',
  TOKEN_URL: 'https://accounts.zoho.com/oauth/v2/token',
  REFRESH_BUFFER_SECONDS: 300,
  DEFAULT_EXPIRES_IN_SECONDS: 3600,
} as const;

export const ERROR_MESSAGES = {
  INVALID_SIGNATURE: 'Invalid signature',
  INVALID_JSON: 'Invalid JSON',
  MISSING_AUTH_HEADER: 'Missing or invalid Authorization header. Use: Bearer <API_KEY>',
  INVALID_API_KEY: 'Invalid API key',
  CONTACT_REQUIRED: 'At least one of email or phone is required',
  IDENTITY_NOT_FOUND: 'No matching OHID found',
  UNKNOWN_TOOL: 'Unknown tool',
  INGESTION_FAILED: 'Lead could not be persisted',
} as const;

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;
