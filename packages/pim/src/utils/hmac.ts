import { createHmac, timingSafeEqual } from 'node:crypto';

/** Hex HMAC-SHA256 over `${timestamp}.${body}`. */
export function computeHmacSignature(secret: string, timestamp: string, body: string): string {
  return createHmac('sha256', secret).update(`${timestamp}.${body}`).digest('hex');
}

export function verifyHmacSignature(
  secret: string,
  timestamp: string,
  body: string,
  signature: string
): boolean {
  const expected = Buffer.from(computeHmacSignature(secret, timestamp, body), 'hex');
  const received = Buffer.from(signature, 'hex');
  return expected.length === received.length && timingSafeEqual(expected, received);
}
