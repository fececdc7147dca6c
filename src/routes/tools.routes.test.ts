import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import axios, { AxiosAdapter } from 'axios';
import request from 'supertest';
import { CHANNELS, SOURCE_SYSTEMS } from '../config/constants';
import { computeSignature } from '../services/signature.service';
import { ingestArgs } from '../test/fixtures';
import { buildTestGateway, TestGateway } from '../test/gateway';

const API_KEY = 'test-secret';
const AUTH = `Bearer ${API_KEY}`;

describe('tool API', () => {
  let gateway: TestGateway;

  const callTool = (name: string, args: object) =>
    request(gateway.app).post(`/api/tools/${name}`).set('Authorization', AUTH).send(args);

  beforeEach(() => {
    gateway = buildTestGateway({ MCP_API_KEY: API_KEY, CLOUDTALK_WEBHOOK_SECRET: 'cloudtalk-secret' });
  });

  describe('authentication', () => {
    it('returns 401 without a bearer header', async () => {
      const res = await request(gateway.app).get('/api/tools');

      assert.strictEqual(res.status, 401);
      assert.deepStrictEqual(res.body, {
        error: 'Missing or invalid Authorization header. Use: Bearer <API_KEY>',
      });
    });

    it('returns 403 for a wrong key', async () => {
      const res = await request(gateway.app).get('/api/tools').set('Authorization', 'Bearer wrong-key');

      assert.strictEqual(res.status, 403);
      assert.deepStrictEqual(res.body, { error: 'Invalid API key' });
    });

    it('leaves the health check open', async () => {
      const res = await request(gateway.app).get('/health');

      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(res.body, { status: 'ok', store: 'memory', workflow_webhook: false });
    });
  });

  describe('GET /api/tools and /api/status', () => {
    it('lists every tool', async () => {
      const res = await request(gateway.app).get('/api/tools').set('Authorization', AUTH);
      const names: unknown[] = res.body.tools.map((tool: { name: string }) => tool.name);

      assert.deepStrictEqual(names, [
        'ingest_lead',
        'process_twilio_event',
        'process_cloudtalk_event',
        'process_calcom_event',
        'process_elevenlabs_event',
        'process_notion_event',
        'lookup_ohid',
        'verify_webhook_signature',
        'sync_lead',
        'get_zoho_lead',
        'upsert_zoho_lead',
      ]);
    });

    it('reports the pipeline configuration', async () => {
      const res = await request(gateway.app).get('/api/status').set('Authorization', AUTH);

      assert.deepStrictEqual(res.body, {
        server: 'lead-gateway',
        version: '1.0.0',
        sources: [...SOURCE_SYSTEMS],
        channels: [...CHANNELS],
        store: 'memory',
        workflow_webhook: false,
        contact_lookup: 'store',
        zoho_configured: false,
      });
    });
  });

  describe('POST /api/tools/:toolName', () => {
    it('returns 404 for an unknown tool', async () => {
      const res = await callTool('delete_everything', {});

      assert.strictEqual(res.status, 404);
      assert.deepStrictEqual(res.body, { error: 'Unknown tool: delete_everything' });
    });

    it('does not resolve inherited property names as tools', async () => {
      const res = await callTool('toString', {});

      assert.strictEqual(res.status, 404);
    });

    it('returns 400 for invalid arguments', async () => {
      const res = await callTool('ingest_lead', { source_system: 'FAX', source_lead_id: 'x' });

      assert.strictEqual(res.status, 400);
      assert.strictEqual(res.body.error, 'Invalid request');
    });

    it('returns 400 for a malformed JSON body', async () => {
      const res = await request(gateway.app)
        .post('/api/tools/ingest_lead')
        .set('Authorization', AUTH)
        .set('Content-Type', 'application/json')
        .send('{"source_system":');

      assert.strictEqual(res.status, 400);
      assert.deepStrictEqual(res.body, { error: 'Invalid JSON' });
    });

    it('ingests a lead and reuses its identity for the same contact', async () => {
      const first = await callTool('ingest_lead', ingestArgs({ phone: '+971501234567' }));
      const second = await callTool(
        'ingest_lead',
        ingestArgs({ source_system: 'META', channel: 'META_LEAD_AD', source_lead_id: 'meta-1', phone: '+971501234567' })
      );

      assert.strictEqual(first.status, 200);
      assert.strictEqual(first.body.ohid, 'ohid-1');
      assert.strictEqual(first.body.source_system, 'WEB');
      assert.strictEqual(first.body.status, 'ingested');
      assert.strictEqual(typeof first.body.ingest_id, 'string');
      assert.strictEqual(second.body.ohid, 'ohid-1');
      assert.notStrictEqual(second.body.ingest_id, first.body.ingest_id);
    });

    it('reports a store failure as a failed ingestion', async () => {
      gateway.store.claimIdentity = async () => {
        throw new Error('disk full');
      };

      const res = await callTool('ingest_lead', ingestArgs());

      assert.strictEqual(res.status, 500);
      assert.deepStrictEqual(res.body, { error: 'Lead could not be persisted', status: 'failed' });
    });

    it('looks up an identity by email or phone', async () => {
      await callTool('ingest_lead', ingestArgs({ email: 'layla@example.com' }));

      const found = await callTool('lookup_ohid', { email: 'layla@example.com' });
      const missing = await callTool('lookup_ohid', { phone: '+971500000000' });
      const empty = await callTool('lookup_ohid', {});

      assert.deepStrictEqual(found.body, { ohid: 'ohid-1', found: true });
      assert.deepStrictEqual(missing.body, { found: false, message: 'No matching OHID found' });
      assert.deepStrictEqual(empty.body, { error: 'At least one of email or phone is required', found: false });
    });

    it('records an ElevenLabs event and echoes the conversation id', async () => {
      const res = await callTool('process_elevenlabs_event', {
        event_type: 'post_call_transcription',
        conversation_id: 'conv-3',
      });

      assert.strictEqual(res.body.event_type, 'ElevenLabsCallCompleted');
      assert.strictEqual(res.body.conversation_id, 'conv-3');
      assert.strictEqual(res.body.accepted, true);
    });

    it('echoes a Notion challenge passed as payload', async () => {
      const res = await callTool('process_notion_event', { payload: { challenge: 'challenge-token' } });

      assert.deepStrictEqual(res.body, { challenge: 'challenge-token' });
    });

    it('verifies a hex-encoded CloudTalk signature', async () => {
      const body = '{"call_id":"1"}';
      const bodyHex = Buffer.from(body).toString('hex');

      const valid = await callTool('verify_webhook_signature', {
        body_hex: bodyHex,
        signature: computeSignature(body, 'cloudtalk-secret'),
        source: 'cloudtalk',
      });
      const foreign = await callTool('verify_webhook_signature', { body_hex: bodyHex, signature: 'x', source: 'stripe' });
      const unconfigured = await callTool('verify_webhook_signature', { body_hex: bodyHex, signature: 'x', source: 'notion' });

      assert.deepStrictEqual(valid.body, { valid: true, source: 'cloudtalk' });
      assert.deepStrictEqual(foreign.body, { valid: false, error: 'Unknown source: stripe' });
      assert.deepStrictEqual(unconfigured.body, { valid: false, source: 'notion' });
    });

    it('verifies a Twilio digest against the auth token', async () => {
      const twilioGateway = buildTestGateway({ MCP_API_KEY: API_KEY, TWILIO_AUTH_TOKEN: 'twilio-secret' });
      const body = '{"event":"call.completed"}';
      const args = { body_hex: Buffer.from(body).toString('hex'), source: 'twilio' };

      const valid = await request(twilioGateway.app)
        .post('/api/tools/verify_webhook_signature')
        .set('Authorization', AUTH)
        .send({ ...args, signature: computeSignature(body, 'twilio-secret') });
      const invalid = await request(twilioGateway.app)
        .post('/api/tools/verify_webhook_signature')
        .set('Authorization', AUTH)
        .send({ ...args, signature: '0'.repeat(64) });
      const unconfigured = await callTool('verify_webhook_signature', { ...args, signature: 'anything' });

      assert.deepStrictEqual(valid.body, { valid: true, source: 'twilio' });
      assert.deepStrictEqual(invalid.body, { valid: false, source: 'twilio' });
      assert.deepStrictEqual(unconfigured.body, { valid: false, source: 'twilio' });
    });

    it('reports a Zoho lead as not found when the CRM is not configured', async () => {
      const res = await callTool('get_zoho_lead', { lead_id: 'z-1' });

      assert.deepStrictEqual(res.body, { found: false, error: 'Lead z-1 not found in Zoho CRM' });
    });
  });

  describe('Zoho tools', () => {
    it('upserts a lead through the CRM client', async () => {
      const adapter: AxiosAdapter = async (config) => ({
        data: { data: [{ code: 'SUCCESS', action: 'insert', details: { id: '5500' } }] },
        status: config.url === '/Leads/upsert' ? 201 : 404,
        statusText: '',
        headers: {},
        config,
      });
      const zoho = buildTestGateway(
        { MCP_API_KEY: API_KEY, ZOHO_ACCESS_TOKEN: 'test-token' },
        { crmClient: axios.create({ adapter }) }
      );

      const res = await request(zoho.app)
        .post('/api/tools/upsert_zoho_lead')
        .set('Authorization', AUTH)
        .send({ last_name: 'Haddad', email: 'layla@example.com', source_attribution: 'META' });

      assert.deepStrictEqual(res.body, {
        success: true,
        zoho_lead_id: '5500',
        action: 'insert',
        source_attribution: 'META',
      });
    });
  });
});
