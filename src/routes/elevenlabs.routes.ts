/**
 * Voice agent webhooks
 *
 * POST /webhooks/elevenlabs/conversation-initiation - pre-call personalization
 * POST /webhooks/elevenlabs/post-call               - post-call outcome
 *
 * Both verify an HMAC-SHA256 signature over the raw body before parsing it,
 * so the body parser here is express.raw, never express.json.
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ELEVENLABS, ERROR_MESSAGES, HTTP_STATUS } from '../config/constants';
import { ConversationInitiationResponse } from '../types/elevenlabs.types';
import { AuthenticationError, ValidationError } from '../utils/errors';
import { firstPresent, maskPhoneNumber } from '../utils/phoneNumber.util';
import { parseArgs } from '../validation/parse';
import { postCallSchema } from '../validation/webhook.schema';
import { PersonalizationResolver } from '../services/personalization.service';
import { PostCallExtractor } from '../services/postCall.service';
import { verifyHmacSignature } from '../services/signature.service';

export interface ElevenlabsRouterOptions {
  secret?: string;
  personalization: PersonalizationResolver;
  postCall: PostCallExtractor;
}

const asText = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

/**
 * Caller number as the provider sends it: `number`, then `caller_id`,
 * `phone_number`, `from`.
 */
export const resolveCallerPhone = (body: Record<string, unknown>): string | undefined =>
  firstPresent(asText(body.number), asText(body.caller_id), asText(body.phone_number), asText(body.from));

export const rawBodyOf = (req: Request): Buffer => (Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0));

/** Parse a raw JSON body into an object; null when it is not one */
export const readJsonObject = (raw: Buffer): Record<string, unknown> | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString('utf8'));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return { ...parsed };
};

/**
 * Parse a raw JSON body into an object, or fail with 400.
 */
export const parseJsonObject = (raw: Buffer): Record<string, unknown> => {
  const parsed = readJsonObject(raw);
  if (!parsed) {
    throw new ValidationError(ERROR_MESSAGES.INVALID_JSON);
  }
  return parsed;
};

export const createElevenlabsRouter = ({ secret, personalization, postCall }: ElevenlabsRouterOptions): Router => {
  const router = express.Router();

  router.use(express.raw({ type: () => true, limit: '2mb' }));

  const verify = (req: Request): Buffer => {
    const raw = rawBodyOf(req);
    const signature = req.get('elevenlabs-signature') ?? req.get('x-elevenlabs-signature');

    if (!verifyHmacSignature(raw, signature, secret, 'elevenlabs')) {
      throw new AuthenticationError(ERROR_MESSAGES.INVALID_SIGNATURE);
    }
    return raw;
  };

  /**
   * Pre-call webhook. The agent waits on this response before speaking, so
   * personalization runs under its own deadline and never fails the request.
   */
  router.post('/conversation-initiation', async (req: Request, res: Response, next: NextFunction) => {
    const correlationId = uuidv4();
    const startedAt = Date.now();
    const log = res.locals.requestLogger.child({ correlationId });

    try {
      const body = parseJsonObject(verify(req));
      const phone = resolveCallerPhone(body);

      log.info(
        { phone: maskPhoneNumber(phone), agentId: body.agent_id, conversationId: body.conversation_id },
        'Conversation initiation received'
      );

      const { variables, outcome } = await personalization.resolve(phone, log);

      const response: ConversationInitiationResponse = {
        type: ELEVENLABS.INITIATION_RESPONSE_TYPE,
        dynamic_variables: variables,
        conversation_config_override: {
          agent: { language: ELEVENLABS.DEFAULT_LANGUAGE },
        },
      };

      log.info({ elapsedMs: Date.now() - startedAt, outcome }, 'Conversation initiation responded');
      res.status(HTTP_STATUS.OK).json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Post-call webhook. Acknowledged once the payload is valid, whatever
   * happens in the sink.
   */
  router.post('/post-call', async (req: Request, res: Response, next: NextFunction) => {
    const correlationId = uuidv4();
    const log = res.locals.requestLogger.child({ correlationId });

    try {
      const payload = parseArgs(postCallSchema, parseJsonObject(verify(req)));

      log.info(
        {
          conversationId: payload.conversation_id,
          status: payload.status,
          duration: payload.call_duration_secs,
          humanTransfer: payload.human_transfer,
          phone: maskPhoneNumber(payload.phone_number),
        },
        'Post-call received'
      );

      const response = await postCall.process(
        {
          conversationId: payload.conversation_id,
          callSid: payload.call_sid,
          status: payload.status,
          durationSecs: payload.call_duration_secs,
          phone: payload.phone_number,
          agentId: payload.agent_id,
          humanTransfer: payload.human_transfer,
          analysis: payload.analysis,
          collectedData: payload.collected_data,
        },
        correlationId,
        log
      );

      res.status(HTTP_STATUS.OK).json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
