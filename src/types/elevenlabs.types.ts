/**
 * ElevenLabs Type Definitions
 *
 * Types for the voice agent's pre-call (conversation initiation) and
 * post-call webhooks, and for the capabilities those paths depend on.
 */

/**
 * DynamicVariables - Personalization handed to the agent before a call
 *
 * All sixteen values must be strings; the agent rejects absent or
 * non-string variables.
 */
export interface DynamicVariables {
  first_name: string;
  last_name: string;
  lead_status: string;
  qualification_score: string;
  property_type: string;
  source: string;
  previous_contact: string;
  last_interaction: string;
  notes: string;
  ohid: string;
  budget_range: string;
  investment_timeline: string;
  preferred_location: string;
  nationality: string;
  occupation: string;
  phone: string;
}

export interface ConversationInitiationResponse {
  type: 'conversation_initiation_client_data';
  dynamic_variables: DynamicVariables;
  conversation_config_override: {
    agent: { language: string };
  };
}

/**
 * CrmLeadRecord - Lead as returned by a contact lookup
 *
 * CRM-shaped (Zoho field names). Any field may be missing, null, or of an
 * unexpected type; personalization treats it as untrusted.
 */
export type CrmLeadRecord = Record<string, unknown>;

/**
 * ContactLookup - Finds the CRM-shaped lead record for a caller
 */
export interface ContactLookup {
  findByPhone(phone: string): Promise<CrmLeadRecord | null>;
}

export interface ConversationAnalysis {
  call_successful?: string | null;
  call_summary?: string | null;
  transcript_summary?: string | null;
  data_collection?: Record<string, unknown> | null;
  evaluation_criteria_results?: Record<string, unknown> | null;
}

/**
 * PostCallInput - Fields the extractor reads from a post-call payload
 */
export interface PostCallInput {
  conversationId: string;
  callSid?: string | null;
  status?: string | null;
  durationSecs?: number | null;
  phone?: string | null;
  agentId?: string | null;
  humanTransfer?: string | null;
  analysis?: ConversationAnalysis | null;
  collectedData?: Record<string, unknown> | null;
}

/**
 * CallOutcomeRecord - Normalized post-call result handed to the sink
 */
export interface CallOutcomeRecord {
  conversation_id: string;
  call_sid: string | null;
  call_status: string;
  call_summary: string;
  call_timestamp: string;
  qualification_score: number;
  call_duration_secs: number | null;
  human_transfer: string | null;
  phone: string | null;
  agent_id: string | null;
  collected_data: Record<string, unknown> | null;
  transfer_failure: boolean;
}

/**
 * CallOutcomeSink - Persists normalized post-call records
 */
export interface CallOutcomeSink {
  record(outcome: CallOutcomeRecord): Promise<void>;
}

export interface PostCallResponse {
  received: true;
  conversation_id: string;
  correlation_id: string;
  processed_at: string;
  transfer_failure_flagged: boolean;
}
