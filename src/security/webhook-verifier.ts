import crypto from 'crypto';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Verify a WhatsApp Cloud API webhook signature.
 * Meta signs the raw body with the app secret (HMAC-SHA256) and sends it as
 * `X-Hub-Signature-256: sha256=<hex>`.
 * With no app secret configured, verification is skipped outside production.
 */
export function verifyWebhookSignature(
  rawBody: string | Buffer,
  signature: string | undefined,
  secret: string = env.whatsapp.appSecret,
): boolean {
  if (!secret) {
    if (!env.isProd) {
      logger.debug('No app secret configured; skipping signature verification');
      return true;
    }
    logger.error('No app secret configured in production; rejecting webhook');
    return false;
  }

  if (!signature || !signature.startsWith(SIGNATURE_PREFIX)) {
    logger.warn('Missing or malformed webhook signature header');
    return false;
  }

  const expected = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
  const received = signature.slice(SIGNATURE_PREFIX.length);

  const isValid = received.length === expected.length
    && crypto.timingSafeEqual(Buffer.from(received), Buffer.from(expected));

  if (!isValid) {
    logger.warn('Webhook signature mismatch');
  }

  return isValid;
}

/** Subscription handshake: echo the challenge only for our verify token */
export function verifySubscription(
  mode: string | undefined,
  token: string | undefined,
  challenge: string | undefined,
  verifyToken: string = env.whatsapp.verifyToken,
): string | undefined {
  if (mode === 'subscribe' && verifyToken && token === verifyToken && challenge) {
    return challenge;
  }
  return undefined;
}
