/**
 * Lead Ingest Service
 *
 * Operations behind the lead-ingestion tools: capture a lead under its
 * resolved identity, and normalize and record each provider's events.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';
import { ERROR_MESSAGES } from '../config/constants';
import { EventAcceptedResult, WorkflowEvent } from '../types/event.types';
import { IngestLeadResult, LeadDetails, LeadRecord } from '../types/lead.types';
import { errorMessage, IngestionError } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phoneNumber.util';
import {
  CalcomEventArgs,
  CloudtalkEventArgs,
  ElevenlabsEventArgs,
  IngestLeadArgs,
  LookupOhidArgs,
  TwilioEventArgs,
} from '../validation/toolArgs.schema';
import { EventNormalizer } from './eventNormalizer.service';
import { EventRecorder } from './eventRecorder.service';
import { IdentityResolver } from './identity.service';

export type LookupOhidResult =
  | { ohid: string; found: true }
  | { found: false; message: string }
  | { found: false; error: string };

export type NotionEventResult = { challenge: unknown } | EventAcceptedResult;

const orUndefined = (value: string | null | undefined): string | undefined => value ?? undefined;

const buildLeadDetails = (args: IngestLeadArgs): LeadDetails | undefined => {
  if (!args.budget_range && !args.location && !args.property_type && !args.free_text) {
    return undefined;
  }

  return {
    budgetRange: orUndefined(args.budget_range),
    location: orUndefined(args.location),
    propertyType: orUndefined(args.property_type),
    freeText: orUndefined(args.free_text),
  };
};

const accepted = (event: WorkflowEvent, echo: Record<string, unknown> = {}): EventAcceptedResult => ({
  event_id: event.eventId,
  event_type: event.eventType,
  accepted: true,
  ...echo,
});

export class LeadIngestService {
  private log = logger.child({ service: 'lead-ingest' });

  constructor(
    private readonly identities: IdentityResolver,
    private readonly normalizer: EventNormalizer,
    private readonly recorder: EventRecorder
  ) {}

  /**
   * Capture a lead: resolve-or-mint its identity and store the record in one
   * step, then record and publish LeadIngested. Store failures surface as
   * IngestionError so the caller never believes a lost lead was captured.
   */
  async ingestLead(args: IngestLeadArgs): Promise<IngestLeadResult> {
    const now = new Date().toISOString();
    const lead: LeadRecord = {
      sourceSystem: args.source_system,
      sourceLeadId: args.source_lead_id,
      channel: args.channel,
      person: {
        firstName: args.first_name,
        lastName: args.last_name,
        email: orUndefined(args.email),
        phone: orUndefined(args.phone),
      },
      leadDetails: buildLeadDetails(args),
      consent: {
        marketing: args.marketing_consent,
        source: orUndefined(args.consent_source),
        timestamp: now,
      },
      rawPayload: args.raw_payload ?? {},
      timestamp: now,
    };

    const ingestId = uuidv4();

    try {
      const identity = await this.identities.claim(ingestId, lead);
      await this.recorder.record(this.normalizer.leadIngested(identity, ingestId, lead));

      this.log.info(
        { identity, ingestId, sourceSystem: lead.sourceSystem, phone: maskPhoneNumber(lead.person.phone) },
        'Lead ingested'
      );

      return { ohid: identity, ingest_id: ingestId, source_system: lead.sourceSystem, status: 'ingested' };
    } catch (error) {
      this.log.error({ ingestId, sourceSystem: lead.sourceSystem, error: errorMessage(error) }, 'Lead ingestion failed');
      throw new IngestionError(ERROR_MESSAGES.INGESTION_FAILED, error);
    }
  }

  async processTwilioEvent(args: TwilioEventArgs): Promise<EventAcceptedResult> {
    const event = await this.recorder.record(this.normalizer.twilio(args));
    return accepted(event, { call_sid: args.call_sid });
  }

  async processCloudtalkEvent(args: CloudtalkEventArgs): Promise<EventAcceptedResult> {
    const event = await this.recorder.record(this.normalizer.cloudtalk(args));
    return accepted(event);
  }

  async processCalcomEvent(args: CalcomEventArgs): Promise<EventAcceptedResult> {
    const event = await this.recorder.record(await this.normalizer.calcom(args));
    return accepted(event, { booking_id: args.booking_id ?? null, ohid: event.identity });
  }

  async processElevenlabsEvent(args: ElevenlabsEventArgs): Promise<EventAcceptedResult> {
    const event = await this.recorder.record(this.normalizer.elevenlabs(args));
    return accepted(event, { conversation_id: args.conversation_id ?? null });
  }

  /** Verification challenges are echoed without persisting anything */
  async processNotionEvent(payload: Record<string, unknown>): Promise<NotionEventResult> {
    const outcome = this.normalizer.notion(payload);

    if (outcome.kind === 'challenge') {
      this.log.info('Notion verification challenge echoed');
      return { challenge: outcome.challenge };
    }

    const event = await this.recorder.record(outcome.event);
    return accepted(event, { notion_event_id: event.payload.notion_event_id ?? null });
  }

  async lookupOhid(args: LookupOhidArgs): Promise<LookupOhidResult> {
    if (!args.email && !args.phone) {
      return { error: ERROR_MESSAGES.CONTACT_REQUIRED, found: false };
    }

    const identity = await this.identities.lookup(args.email, args.phone);

    if (identity) {
      return { ohid: identity, found: true };
    }
    return { found: false, message: ERROR_MESSAGES.IDENTITY_NOT_FOUND };
  }
}
