/**
 * Webhook Signature Verification
 *
 * HMAC-SHA256 over the raw request bytes for the voice agent, CloudTalk,
 * Cal.com and Notion; Twilio's own scheme (HMAC-SHA1 over URL and form
 * params) through the twilio SDK. A source with no secret configured is
 * accepted with a warning so local development works without credentials.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import twilio from 'twilio';
import logger from '../config/logger';
import { WebhookSource } from '../config/env';

const log = logger.child({ service: 'signature' });

const NOTION_SIGNATURE_PREFIX = 'sha256=';

export type SignatureCheck =
  | { valid: boolean; source: string }
  | { valid: false; error: string };

export const computeSignature = (body: Buffer | string, secret: string): string =>
  createHmac('sha256', secret).update(body).digest('hex');

const constantTimeEquals = (a: string, b: string): boolean => {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
};

/** Accepts both bare hex digests and the `sha256=<hex>` form */
export const stripSignaturePrefix = (signature: string): string =>
  signature.startsWith(NOTION_SIGNATURE_PREFIX) ? signature.slice(NOTION_SIGNATURE_PREFIX.length) : signature;

/**
 * Verify an HMAC-SHA256 hex signature over the raw body.
 *
 * No secret: accepted (dev mode). Secret but no signature: rejected.
 */
export const verifyHmacSignature = (
  rawBody: Buffer | string,
  signature: string | null | undefined,
  secret: string | null | undefined,
  source: WebhookSource
): boolean => {
  if (!secret) {
    log.warn({ source }, 'Webhook secret not set; skipping signature verification');
    return true;
  }

  if (!signature) {
    return false;
  }

  return constantTimeEquals(stripSignaturePrefix(signature.trim()), computeSignature(rawBody, secret));
};

/**
 * Verify a signature on behalf of a caller that only has the body as hex
 * (the verify_webhook_signature tool). Twilio here means an HMAC-SHA256 hex
 * digest keyed with the auth token, as relayed by the automation runner.
 * Unlike the webhook routes, a source without a configured secret never
 * validates here.
 */
export const verifyWebhookSignature = (
  bodyHex: string,
  signature: string,
  source: string,
  secrets: Partial<Record<WebhookSource, string>>
): SignatureCheck => {
  if (source !== 'cloudtalk' && source !== 'notion' && source !== 'twilio') {
    return { valid: false, error: `Unknown source: ${source}` };
  }

  const secret = secrets[source];
  if (!secret) {
    log.warn({ source }, 'Signature check requested but no secret is configured');
    return { valid: false, source };
  }

  const body = Buffer.from(bodyHex, 'hex');
  const candidate = source === 'notion' ? stripSignaturePrefix(signature) : signature;

  return { valid: constantTimeEquals(candidate, computeSignature(body, secret)), source };
};

/**
 * Verify the X-Twilio-Signature of a form-encoded webhook against the public
 * URL Twilio called.
 */
export const verifyTwilioSignature = (
  authToken: string | null | undefined,
  signature: string | null | undefined,
  url: string,
  params: Record<string, string>
): boolean => {
  if (!authToken) {
    log.warn({ source: 'twilio' }, 'Twilio auth token not set; skipping signature verification');
    return true;
  }

  if (!signature) {
    return false;
  }

  return twilio.validateRequest(authToken, signature, url, params);
};
