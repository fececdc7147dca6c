/**
 * Zoho CRM Type Definitions
 */

export type SyncDirection = 'inbound' | 'outbound' | 'bidirectional';

export type SyncStatus = 'success' | 'partial' | 'failed';

/** A Zoho lead as returned by the CRM API (Zoho field names) */
export type ZohoLead = Record<string, unknown>;

export interface ZohoUpsertResult {
  code?: string;
  action?: string;
  status?: string;
  details?: { id?: string; [key: string]: unknown };
  [key: string]: unknown;
}

/** Envelope Zoho wraps every data response in */
export interface ZohoDataResponse<T> {
  data?: T[];
}

export interface ZohoTokenResponse {
  access_token?: string;
  expires_in?: number;
  error?: string;
}

export interface SyncLeadResult {
  zoho_lead_id: string;
  property_db_lead_id: string;
  sync_direction: SyncDirection;
  source: string | null;
  status: SyncStatus;
  inbound_success: boolean | null;
  outbound_success: boolean | null;
  error_message: string | null;
  execution_time_ms: number;
  event_id: string;
}

export interface UpsertZohoLeadRequest {
  lastName: string;
  email?: string;
  phone?: string;
  firstName?: string;
  company?: string;
  leadSource?: string;
  sourceAttribution?: string;
}
