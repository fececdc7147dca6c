import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ingestArgs, sequentialMint } from '../test/fixtures';
import { WorkflowEvent } from '../types/event.types';
import { IngestionError } from '../utils/errors';
import { EventNormalizer } from './eventNormalizer.service';
import { EventRecorder } from './eventRecorder.service';
import { IdentityResolver } from './identity.service';
import { InMemoryIdentityStore } from './identityStore';
import { LeadIngestService } from './leadIngest.service';
import { EventPublisher } from './workflowPublisher.service';

class RecordingPublisher implements EventPublisher {
  readonly enabled = true;
  published: WorkflowEvent[] = [];

  async publish(event: WorkflowEvent): Promise<void> {
    this.published.push(event);
  }
}

const buildService = (store: InMemoryIdentityStore, publisher: EventPublisher) => {
  const identities = new IdentityResolver(store, sequentialMint());
  return new LeadIngestService(
    identities,
    new EventNormalizer(identities),
    new EventRecorder(store, publisher)
  );
};

describe('LeadIngestService', () => {
  let store: InMemoryIdentityStore;
  let publisher: RecordingPublisher;
  let service: LeadIngestService;

  beforeEach(() => {
    store = new InMemoryIdentityStore();
    publisher = new RecordingPublisher();
    service = buildService(store, publisher);
  });

  describe('ingestLead', () => {
    it('stores the lead, records LeadIngested and publishes it', async () => {
      const result = await service.ingestLead(
        ingestArgs({ email: 'layla@example.com', phone: '+971501234567', budget_range: 'AED 1M-2M' })
      );

      assert.strictEqual(result.ohid, 'ohid-1');
      assert.strictEqual(result.source_system, 'WEB');
      assert.strictEqual(result.status, 'ingested');

      const stored = await store.findLatestLeadByPhone('+971501234567');
      assert.strictEqual(stored?.ingestId, result.ingest_id);
      assert.deepStrictEqual(stored?.lead.leadDetails, {
        budgetRange: 'AED 1M-2M',
        location: undefined,
        propertyType: undefined,
        freeText: undefined,
      });

      const events = await store.listEvents({ eventType: 'LeadIngested' });
      assert.strictEqual(events.length, 1);
      assert.strictEqual(events[0].identity, 'ohid-1');
      assert.strictEqual(events[0].payload.ingest_id, result.ingest_id);
      assert.notStrictEqual(events[0].eventId, result.ingest_id);
      assert.deepStrictEqual(
        publisher.published.map((event) => event.eventId),
        [events[0].eventId]
      );
    });

    it('omits lead details when none are given', async () => {
      await service.ingestLead(ingestArgs({ phone: '+1555' }));

      const stored = await store.findLatestLeadByPhone('+1555');
      assert.strictEqual(stored?.lead.leadDetails, undefined);
      assert.deepStrictEqual(stored?.lead.rawPayload, {});
    });

    it('resolves the same identity for a later lead sharing the phone', async () => {
      const first = await service.ingestLead(ingestArgs({ email: 'a@example.com', phone: '+1555' }));
      const second = await service.ingestLead(
        ingestArgs({ source_system: 'META', channel: 'META_LEAD_AD', source_lead_id: 'meta-9', phone: '+1555' })
      );

      assert.strictEqual(second.ohid, first.ohid);
      assert.notStrictEqual(second.ingest_id, first.ingest_id);
    });

    it('surfaces a store failure as IngestionError', async () => {
      store.claimIdentity = async () => {
        throw new Error('database is locked');
      };

      await assert.rejects(service.ingestLead(ingestArgs({ email: 'a@example.com' })), (error: unknown) => {
        if (!(error instanceof IngestionError)) return false;
        assert.strictEqual(error.statusCode, 500);
        assert.strictEqual(error.message, 'Lead could not be persisted');
        return true;
      });
      assert.strictEqual(publisher.published.length, 0);
    });
  });

  describe('event tools', () => {
    it('records a Twilio event and echoes the call sid', async () => {
      const result = await service.processTwilioEvent({
        call_sid: 'CA123',
        call_status: 'completed',
        direction: 'inbound',
        from_number: '+1555',
        to_number: '+1666',
      });

      assert.strictEqual(result.event_type, 'CallCompleted');
      assert.strictEqual(result.accepted, true);
      assert.strictEqual(result.call_sid, 'CA123');
      assert.strictEqual((await store.listEvents())[0].eventId, result.event_id);
    });

    it('records a CloudTalk ringing event as CallReceived', async () => {
      const result = await service.processCloudtalkEvent({
        event_type: 'call.ringing',
        call_id: '991',
        direction: 'inbound',
        from_number: '+1555',
        to_number: '+1666',
      });

      assert.strictEqual(result.event_type, 'CallReceived');
    });

    it('echoes the booking id and the attendee identity for Cal.com', async () => {
      const lead = await service.ingestLead(ingestArgs({ email: 'layla@example.com' }));

      const result = await service.processCalcomEvent({
        trigger_event: 'BOOKING_RESCHEDULED',
        booking_id: 314,
        attendee_email: 'layla@example.com',
      });

      assert.strictEqual(result.event_type, 'CalcomBookingRescheduled');
      assert.strictEqual(result.booking_id, 314);
      assert.strictEqual(result.ohid, lead.ohid);
    });

    it('echoes the conversation id for voice agent events', async () => {
      const result = await service.processElevenlabsEvent({ event_type: 'call.ended', conversation_id: 'conv-1' });

      assert.strictEqual(result.event_type, 'ElevenLabsCallCompleted');
      assert.strictEqual(result.conversation_id, 'conv-1');
    });

    it('echoes a Notion challenge without persisting or publishing', async () => {
      const result = await service.processNotionEvent({ challenge: 'verify-me' });

      assert.deepStrictEqual(result, { challenge: 'verify-me' });
      assert.strictEqual((await store.listEvents()).length, 0);
      assert.strictEqual(publisher.published.length, 0);
    });

    it('records a Notion event with its native id', async () => {
      const result = await service.processNotionEvent({ type: 'page.updated', id: 'notion-7' });

      if ('challenge' in result) {
        assert.fail('expected an accepted event');
      }
      assert.strictEqual(result.event_type, 'NotionEvent');
      assert.strictEqual(result.notion_event_id, 'notion-7');
      assert.strictEqual((await store.listEvents({ eventType: 'NotionEvent' })).length, 1);
    });
  });

  describe('lookupOhid', () => {
    it('finds an identity by email or phone', async () => {
      const lead = await service.ingestLead(ingestArgs({ email: 'a@example.com', phone: '+1555' }));

      assert.deepStrictEqual(await service.lookupOhid({ email: 'a@example.com' }), { ohid: lead.ohid, found: true });
      assert.deepStrictEqual(await service.lookupOhid({ phone: '+1555' }), { ohid: lead.ohid, found: true });
    });

    it('reports no match', async () => {
      assert.deepStrictEqual(await service.lookupOhid({ email: 'nobody@example.com' }), {
        found: false,
        message: 'No matching OHID found',
      });
    });

    it('requires at least one contact field', async () => {
      assert.deepStrictEqual(await service.lookupOhid({}), {
        error: 'At least one of email or phone is required',
        found: false,
      });
    });
  });
});
