/**
 * Provider webhooks
 *
 * POST /webhooks/twilio    - call status callbacks (form-encoded)
 * POST /webhooks/cloudtalk - telephony events
 * POST /webhooks/calcom    - booking lifecycle
 * POST /webhooks/notion    - workspace events and verification challenges
 *
 * Each delivery is authenticated, mapped to the matching tool arguments and
 * recorded through LeadIngestService.
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import { ERROR_MESSAGES, HTTP_STATUS } from '../config/constants';
import { GatewayConfig, WebhookSource } from '../config/env';
import { LeadIngestService } from '../services/leadIngest.service';
import { verifyHmacSignature, verifyTwilioSignature } from '../services/signature.service';
import { AuthenticationError } from '../utils/errors';
import { parseArgs } from '../validation/parse';
import { calcomEventSchema, cloudtalkEventSchema, twilioEventSchema } from '../validation/toolArgs.schema';
import { calcomWebhookSchema } from '../validation/webhook.schema';
import { parseJsonObject, rawBodyOf, readJsonObject } from './elevenlabs.routes';

export interface WebhooksRouterOptions {
  config: Pick<GatewayConfig, 'secrets' | 'publicBaseUrl'>;
  leadIngest: LeadIngestService;
}

const SIGNATURE_HEADERS: Record<Exclude<WebhookSource, 'elevenlabs' | 'twilio'>, string> = {
  cloudtalk: 'x-cloudtalk-signature',
  calcom: 'x-cal-signature-256',
  notion: 'x-notion-signature',
};

const toStringRecord = (value: unknown): Record<string, string> => {
  const result: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) return result;

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
};

export const createWebhooksRouter = ({ config, leadIngest }: WebhooksRouterOptions): Router => {
  const router = express.Router();
  const raw = express.raw({ type: () => true, limit: '2mb' });

  /** Verify the HMAC signature header, then parse the JSON body */
  const signedJson = (req: Request, source: keyof typeof SIGNATURE_HEADERS): Record<string, unknown> => {
    const body = rawBodyOf(req);

    if (!verifyHmacSignature(body, req.get(SIGNATURE_HEADERS[source]), config.secrets[source], source)) {
      throw new AuthenticationError(ERROR_MESSAGES.INVALID_SIGNATURE);
    }
    return parseJsonObject(body);
  };

  router.post(
    '/twilio',
    express.urlencoded({ extended: false }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const params = toStringRecord(req.body);
        const baseUrl = config.publicBaseUrl ?? `${req.protocol}://${req.get('host')}`;

        if (!verifyTwilioSignature(config.secrets.twilio, req.get('x-twilio-signature'), `${baseUrl}${req.originalUrl}`, params)) {
          throw new AuthenticationError(ERROR_MESSAGES.INVALID_SIGNATURE);
        }

        const args = parseArgs(twilioEventSchema, {
          call_sid: params.CallSid,
          call_status: params.CallStatus,
          direction: params.Direction,
          from_number: params.From ?? '',
          to_number: params.To ?? '',
          recording_url: params.RecordingUrl,
          recording_sid: params.RecordingSid,
          call_duration: params.CallDuration,
          raw: params,
        });

        res.status(HTTP_STATUS.OK).json(await leadIngest.processTwilioEvent(args));
      } catch (error) {
        next(error);
      }
    }
  );

  router.post('/cloudtalk', raw, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = signedJson(req, 'cloudtalk');
      const args = parseArgs(cloudtalkEventSchema, { ...body, raw: body });

      res.status(HTTP_STATUS.OK).json(await leadIngest.processCloudtalkEvent(args));
    } catch (error) {
      next(error);
    }
  });

  router.post('/calcom', raw, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { triggerEvent, payload } = parseArgs(calcomWebhookSchema, signedJson(req, 'calcom'));
      const attendee = payload.attendees?.[0];

      const args = parseArgs(calcomEventSchema, {
        trigger_event: triggerEvent,
        booking_id: payload.bookingId ?? payload.uid,
        title: payload.title,
        start_time: payload.startTime,
        end_time: payload.endTime,
        attendee_name: attendee?.name,
        attendee_email: attendee?.email,
        attendee_phone: attendee?.phoneNumber,
        organizer_name: payload.organizer?.name,
        organizer_email: payload.organizer?.email,
        location: payload.location,
        status: payload.status,
        reschedule_reason: payload.rescheduleReason,
        cancellation_reason: payload.cancellationReason,
        metadata: payload.metadata,
      });

      res.status(HTTP_STATUS.OK).json(await leadIngest.processCalcomEvent(args));
    } catch (error) {
      next(error);
    }
  });

  router.post('/notion', raw, async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Notion sends the subscription challenge before the secret exists, unsigned;
      // anything else is authenticated before its JSON is looked at
      const unsigned = readJsonObject(rawBodyOf(req));
      const body = unsigned && 'challenge' in unsigned ? unsigned : signedJson(req, 'notion');

      res.status(HTTP_STATUS.OK).json(await leadIngest.processNotionEvent(body));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
