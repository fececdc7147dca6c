import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { makeLead, sequentialMint } from '../test/fixtures';
import { WorkflowEvent } from '../types/event.types';
import { SqliteIdentityStore } from './database.service';

const event = (overrides: Partial<WorkflowEvent> = {}): WorkflowEvent => ({
  eventId: 'evt-1',
  eventType: 'CallReceived',
  identity: null,
  payload: { event_type: 'CallReceived', call: { call_sid: 'CA1' } },
  occurredAt: '2026-01-01T00:00:00.000Z',
  sourceSystem: 'TWILIO',
  ...overrides,
});

describe('SqliteIdentityStore', () => {
  let store: SqliteIdentityStore;

  beforeEach(() => {
    store = new SqliteIdentityStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('finds an identity by email or by phone', async () => {
    await store.insertLead('ohid-a', 'ingest-1', makeLead({ email: 'a@example.com', phone: '+971501234567' }));

    assert.strictEqual(await store.findIdentityByContact('a@example.com', null), 'ohid-a');
    assert.strictEqual(await store.findIdentityByContact(null, '+971501234567'), 'ohid-a');
    assert.strictEqual(await store.findIdentityByContact('b@example.com', '+10000000000'), null);
  });

  it('returns null when both fields are empty', async () => {
    await store.insertLead('ohid-a', 'ingest-1', makeLead());

    assert.strictEqual(await store.findIdentityByContact('', null), null);
  });

  it('returns the first stored match when several records match', async () => {
    await store.insertLead('ohid-a', 'ingest-1', makeLead({ email: 'a@example.com' }));
    await store.insertLead('ohid-b', 'ingest-2', makeLead({ phone: '+971501234567' }));

    assert.strictEqual(await store.findIdentityByContact('a@example.com', '+971501234567'), 'ohid-a');
  });

  it('claims the existing identity or mints a new one', async () => {
    const mint = sequentialMint();

    const first = await store.claimIdentity('ingest-1', makeLead({ email: 'a@example.com' }), mint);
    const second = await store.claimIdentity('ingest-2', makeLead({ email: 'a@example.com', phone: '+1555' }), mint);
    const third = await store.claimIdentity('ingest-3', makeLead({ phone: '+1555' }), mint);
    const fourth = await store.claimIdentity('ingest-4', makeLead({ email: 'c@example.com' }), mint);

    assert.deepStrictEqual([first, second, third, fourth], ['ohid-1', 'ohid-1', 'ohid-1', 'ohid-2']);
  });

  it('returns the most recent lead for a phone number', async () => {
    await store.insertLead('ohid-a', 'ingest-1', makeLead({ phone: '+1555', firstName: 'Old' }));
    await store.insertLead('ohid-a', 'ingest-2', makeLead({ phone: '+1555', firstName: 'New' }));

    const latest = await store.findLatestLeadByPhone('+1555');

    assert.strictEqual(latest?.ingestId, 'ingest-2');
    assert.strictEqual(latest?.identity, 'ohid-a');
    assert.strictEqual(latest?.lead.person.firstName, 'New');
    assert.strictEqual(await store.findLatestLeadByPhone('+1999'), null);
  });

  it('rejects a duplicate ingest id', async () => {
    await store.insertLead('ohid-a', 'ingest-1', makeLead());

    await assert.rejects(store.insertLead('ohid-b', 'ingest-1', makeLead()));
  });

  it('appends and lists workflow events in order', async () => {
    await store.insertEvent(event());
    await store.insertEvent(event({ eventId: 'evt-2', eventType: 'LeadIngested', identity: 'ohid-a', sourceSystem: 'WEB' }));

    const all = await store.listEvents();
    assert.deepStrictEqual(
      all.map((stored) => stored.eventId),
      ['evt-1', 'evt-2']
    );
    assert.deepStrictEqual(all[0], event());

    const forIdentity = await store.listEvents({ identity: 'ohid-a' });
    assert.deepStrictEqual(
      forIdentity.map((stored) => stored.eventType),
      ['LeadIngested']
    );

    const calls = await store.listEvents({ eventType: 'CallReceived' });
    assert.strictEqual(calls.length, 1);
  });

  it('indexes contact fields only where they are present', () => {
    const dir = mkdtempSync(join(tmpdir(), 'lead-gateway-'));
    const dbPath = join(dir, 'schema.db');

    try {
      new SqliteIdentityStore(dbPath).close();

      const db = new Database(dbPath, { readonly: true });
      const rows: unknown[] = db
        .prepare("SELECT name, sql FROM sqlite_master WHERE type = 'index' AND name IN (?, ?) ORDER BY name")
        .all('idx_lead_context_email', 'idx_lead_context_phone');
      db.close();

      const definitions = rows.map((row) =>
        typeof row === 'object' && row !== null ? String(Reflect.get(row, 'sql')).replace(/\s+/g, ' ') : ''
      );
      assert.strictEqual(definitions.length, 2);
      assert.match(definitions[0], /ON lead_context \(email\) WHERE email IS NOT NULL$/);
      assert.match(definitions[1], /ON lead_context \(phone\) WHERE phone IS NOT NULL$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
