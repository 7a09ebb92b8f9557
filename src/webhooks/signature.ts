/**
 * Webhook payload signatures: `sha256=<hex HMAC-SHA256(secret, body)>`.
 */

import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_HEADER = 'X-Signalpost-Signature';
export const EVENT_HEADER = 'X-Signalpost-Event';
export const DELIVERY_HEADER = 'X-Signalpost-Delivery';

export function signPayload(secret: string, body: string): string {
  return 'sha256=' + createHmac('sha256', secret).update(body, 'utf8').digest('hex');
}

/** Constant-time check of a received signature against the expected one. */
export function verifySignature(secret: string, body: string, signature: string): boolean {
  const expected = Buffer.from(signPayload(secret, body), 'utf8');
  const received = Buffer.from(signature, 'utf8');
  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
}
