import { createHmac, timingSafeEqual } from 'node:crypto';

export const computeSignature = (payload: Buffer, secret: string): string =>
  createHmac('sha256', secret).update(payload).digest('hex');

/**
 * Verifies a hex HMAC-SHA256 signature over the raw request bytes.
 *
 * With no secret configured verification is skipped and every payload passes.
 */
export function verifyHmacSignature(
  payload: Buffer,
  signature: string | undefined,
  secret: string | undefined,
): boolean {
  if (!secret) return true;
  if (!signature) return false;

  const expected = Buffer.from(computeSignature(payload, secret), 'utf8');
  const received = Buffer.from(signature, 'utf8');
  if (expected.length !== received.length) return false;

  return timingSafeEqual(expected, received);
}
