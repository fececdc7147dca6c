import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CallOutcomeRecord, CallOutcomeSink } from '../types/elevenlabs.types';
import { PostCallExtractor, extractSummary, parseQualificationScore } from './postCall.service';

class RecordingSink implements CallOutcomeSink {
  records: CallOutcomeRecord[] = [];

  async record(outcome: CallOutcomeRecord): Promise<void> {
    this.records.push(outcome);
  }
}

describe('parseQualificationScore', () => {
  it('parses integer strings', () => {
    assert.strictEqual(parseQualificationScore('72'), 72);
    assert.strictEqual(parseQualificationScore(' 15 '), 15);
  });

  it('truncates fractional numbers', () => {
    assert.strictEqual(parseQualificationScore(72.9), 72);
  });

  it('scores malformed values as 0', () => {
    assert.strictEqual(parseQualificationScore('N/A'), 0);
    assert.strictEqual(parseQualificationScore('72.5'), 0);
    assert.strictEqual(parseQualificationScore(null), 0);
    assert.strictEqual(parseQualificationScore(undefined), 0);
    assert.strictEqual(parseQualificationScore({ value: 72 }), 0);
    assert.strictEqual(parseQualificationScore(Number.NaN), 0);
  });
});

describe('extractSummary', () => {
  it('prefers the call summary over the transcript summary', () => {
    assert.strictEqual(extractSummary({ call_summary: 'A', transcript_summary: 'B' }), 'A');
    assert.strictEqual(extractSummary({ call_summary: '', transcript_summary: 'B' }), 'B');
    assert.strictEqual(extractSummary(null), '');
  });
});

describe('PostCallExtractor', () => {
  it('builds the outcome record from the payload', () => {
    const extractor = new PostCallExtractor(null);
    const now = new Date('2026-03-01T12:00:00.000Z');

    const outcome = extractor.extract(
      {
        conversationId: 'conv-1',
        callSid: 'CA123',
        durationSecs: 184,
        phone: '+971501234567',
        agentId: 'agent-1',
        humanTransfer: 'not_needed',
        analysis: {
          call_summary: 'Caller interested in 2BR Dubai Marina',
          data_collection: { qualification_score: '72' },
        },
      },
      now
    );

    assert.deepStrictEqual(outcome, {
      conversation_id: 'conv-1',
      call_sid: 'CA123',
      call_status: 'unknown',
      call_summary: 'Caller interested in 2BR Dubai Marina',
      call_timestamp: '2026-03-01T12:00:00.000Z',
      qualification_score: 72,
      call_duration_secs: 184,
      human_transfer: 'not_needed',
      phone: '+971501234567',
      agent_id: 'agent-1',
      collected_data: null,
      transfer_failure: false,
    });
  });

  it('flags a failed human transfer and passes the record to the sink', async () => {
    const sink = new RecordingSink();
    const extractor = new PostCallExtractor(sink);

    const response = await extractor.process(
      { conversationId: 'conv-2', status: 'done', humanTransfer: 'failure' },
      'corr-1'
    );

    assert.strictEqual(response.received, true);
    assert.strictEqual(response.conversation_id, 'conv-2');
    assert.strictEqual(response.correlation_id, 'corr-1');
    assert.strictEqual(response.transfer_failure_flagged, true);
    assert.strictEqual(sink.records.length, 1);
    assert.strictEqual(sink.records[0].call_status, 'done');
    assert.strictEqual(sink.records[0].transfer_failure, true);
  });

  it('scores a malformed value as 0 and still acknowledges', async () => {
    const sink = new RecordingSink();
    const extractor = new PostCallExtractor(sink);

    await extractor.process(
      { conversationId: 'conv-3', analysis: { data_collection: { qualification_score: 'N/A' } } },
      'corr-2'
    );

    assert.strictEqual(sink.records[0].qualification_score, 0);
  });

  it('acknowledges even when the sink fails', async () => {
    const extractor = new PostCallExtractor({
      record: async () => {
        throw new Error('write failed');
      },
    });

    const response = await extractor.process({ conversationId: 'conv-4' }, 'corr-3');

    assert.strictEqual(response.received, true);
    assert.strictEqual(response.transfer_failure_flagged, false);
  });
});
