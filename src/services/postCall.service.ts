/**
 * Post-call Extractor
 *
 * Pulls the summary, the qualification score and the transfer outcome out
 * of the voice agent's post-call payload and hands the normalized record to
 * the configured sink. The provider does not act on our response, so sink
 * failures are logged and the call is still acknowledged.
 */

import logger, { Logger } from '../config/logger';
import { TRANSFER_FAILURE_SENTINEL } from '../config/constants';
import {
  CallOutcomeRecord,
  CallOutcomeSink,
  ConversationAnalysis,
  PostCallInput,
  PostCallResponse,
} from '../types/elevenlabs.types';
import { errorMessage } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phoneNumber.util';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Parse a collected qualification score. Integers and integer strings are
 * accepted (fractional numbers truncate); anything else scores 0.
 */
export const parseQualificationScore = (raw: unknown): number => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.trunc(raw) : 0;
  }

  if (typeof raw === 'string' && INTEGER_PATTERN.test(raw)) {
    return Number.parseInt(raw, 10);
  }

  return 0;
};

export const extractSummary = (analysis?: ConversationAnalysis | null): string =>
  analysis?.call_summary || analysis?.transcript_summary || '';

export const isTransferFailure = (humanTransfer?: string | null): boolean =>
  humanTransfer === TRANSFER_FAILURE_SENTINEL;

export class PostCallExtractor {
  private log = logger.child({ service: 'post-call' });

  constructor(private readonly sink: CallOutcomeSink | null) {}

  extract(input: PostCallInput, now: Date = new Date()): CallOutcomeRecord {
    return {
      conversation_id: input.conversationId,
      call_sid: input.callSid ?? null,
      call_status: input.status || 'unknown',
      call_summary: extractSummary(input.analysis),
      call_timestamp: now.toISOString(),
      qualification_score: parseQualificationScore(input.analysis?.data_collection?.qualification_score),
      call_duration_secs: input.durationSecs ?? null,
      human_transfer: input.humanTransfer ?? null,
      phone: input.phone ?? null,
      agent_id: input.agentId ?? null,
      collected_data: input.collectedData ?? null,
      transfer_failure: isTransferFailure(input.humanTransfer),
    };
  }

  async process(input: PostCallInput, correlationId: string, log: Logger = this.log): Promise<PostCallResponse> {
    const outcome = this.extract(input);

    if (outcome.transfer_failure) {
      log.warn(
        { correlationId, conversationId: outcome.conversation_id, phone: maskPhoneNumber(outcome.phone) },
        'Human transfer failed; escalation needed'
      );
    }

    if (this.sink) {
      try {
        await this.sink.record(outcome);
      } catch (error) {
        log.error(
          { correlationId, conversationId: outcome.conversation_id, error: errorMessage(error) },
          'Post-call sink failed'
        );
      }
    }

    return {
      received: true,
      conversation_id: outcome.conversation_id,
      correlation_id: correlationId,
      processed_at: new Date().toISOString(),
      transfer_failure_flagged: outcome.transfer_failure,
    };
  }
}
