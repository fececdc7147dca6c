/**
 * Contact lookups and call-outcome sinks
 *
 * Implementations of the capabilities the voice-agent webhooks are built
 * with: where a caller's lead is looked up before a call, and where the
 * outcome goes after it.
 */

import logger from '../config/logger';
import { CallOutcomeRecord, CallOutcomeSink, ContactLookup, CrmLeadRecord } from '../types/elevenlabs.types';
import { StoredLead } from '../types/lead.types';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import { EventNormalizer } from './eventNormalizer.service';
import { EventRecorder } from './eventRecorder.service';
import { IdentityResolver } from './identity.service';
import { IdentityStore } from './identityStore';
import { ZohoCrmClient } from './zohoCrm.service';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Present a stored lead under the CRM's field names, so personalization
 * reads the same shape whichever lookup is configured.
 */
export const toCrmLeadRecord = (stored: StoredLead, lastCall: Record<string, unknown> | null): CrmLeadRecord => {
  const { lead } = stored;

  return {
    First_Name: lead.person.firstName,
    Last_Name: lead.person.lastName,
    Email: lead.person.email,
    Phone: lead.person.phone,
    Lead_Source: lead.sourceSystem,
    Lead_Status: lastCall ? 'Contacted' : 'New',
    Lead_Type: lead.leadDetails?.propertyType,
    Budget_Range: lead.leadDetails?.budgetRange,
    Preferred_Location: lead.leadDetails?.location,
    Description: lead.leadDetails?.freeText,
    DistributionID: stored.identity,
    Modified_Time: stored.createdAt,
    call_summary: lastCall?.call_summary,
    call_timestamp: lastCall?.call_timestamp,
    qualification_score: lastCall?.qualification_score,
  };
};

/**
 * StoreContactLookup - Reads the gateway's own identity store
 *
 * Uses the most recent lead captured for the number, enriched with the
 * last recorded call outcome for its identity.
 */
export class StoreContactLookup implements ContactLookup {
  constructor(private readonly store: IdentityStore) {}

  async findByPhone(phone: string): Promise<CrmLeadRecord | null> {
    const stored = await this.store.findLatestLeadByPhone(phone);
    if (!stored) return null;

    const calls = await this.store.listEvents({ identity: stored.identity, eventType: 'ElevenLabsCallCompleted' });
    let lastCall: Record<string, unknown> | null = null;
    for (const event of calls) {
      if (isRecord(event.payload.call_outcome)) {
        lastCall = event.payload.call_outcome;
      }
    }

    return toCrmLeadRecord(stored, lastCall);
  }
}

/** Looks the caller up in Zoho CRM by phone */
export class ZohoContactLookup implements ContactLookup {
  constructor(private readonly crm: ZohoCrmClient) {}

  async findByPhone(phone: string): Promise<CrmLeadRecord | null> {
    return this.crm.searchLeadByPhone(phone);
  }
}

/**
 * StoreCallOutcomeSink - Records each call outcome as a workflow event,
 * attached to the caller's identity when the phone matches a known lead.
 */
export class StoreCallOutcomeSink implements CallOutcomeSink {
  private log = logger.child({ service: 'call-outcome-sink' });

  constructor(
    private readonly identities: IdentityResolver,
    private readonly normalizer: EventNormalizer,
    private readonly recorder: EventRecorder
  ) {}

  async record(outcome: CallOutcomeRecord): Promise<void> {
    const identity = outcome.phone ? await this.identities.lookup(null, outcome.phone) : null;
    const event = await this.recorder.record(this.normalizer.callOutcome(outcome, identity));

    this.log.info(
      {
        eventId: event.eventId,
        conversationId: outcome.conversation_id,
        identity,
        phone: maskPhoneNumber(outcome.phone),
        qualificationScore: outcome.qualification_score,
      },
      'Call outcome recorded'
    );
  }
}
