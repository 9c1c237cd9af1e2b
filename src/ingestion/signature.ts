import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_HEADER = 'x-webhook-signature';
export const DEFAULT_TOLERANCE_SECONDS = 300;

function hmacHex(secret: string, timestamp: number, payload: string): string {
  const rawSecret = secret.startsWith('whsec_') ? secret.slice(6) : secret;
  return createHmac('sha256', rawSecret).update(`${timestamp}.${payload}`).digest('hex');
}

/**
 * Sign a payload the way the provider does.
 * Format: t=<unix_seconds>,v1=<hex_hmac>
 */
export function signPayload(payload: string, secret: string, timestamp?: number): string {
  const ts = timestamp ?? Math.floor(Date.now() / 1000);
  return `t=${ts},v1=${hmacHex(secret, ts, payload)}`;
}

/**
 * Verify a provider signature header against the raw body.
 * Any v1 entry may match, so the provider can roll its secret.
 */
export function verifySignature(
  payload: string,
  signatureHeader: string,
  secret: string,
  opts: { toleranceSeconds?: number; nowSeconds?: number } = {},
): boolean {
  const tolerance = opts.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS;
  const now = opts.nowSeconds ?? Math.floor(Date.now() / 1000);

  let ts = NaN;
  const candidates: string[] = [];
  for (const part of signatureHeader.split(',')) {
    const [key, value] = part.trim().split('=', 2);
    if (!key || !value) continue;
    if (key === 't') ts = Number.parseInt(value, 10);
    else if (key === 'v1') candidates.push(value);
  }

  if (!Number.isFinite(ts) || candidates.length === 0) return false;
  if (Math.abs(now - ts) > tolerance) return false;

  const expected = Buffer.from(hmacHex(secret, ts, payload), 'hex');
  return candidates.some((candidate) => {
    const actual = Buffer.from(candidate, 'hex');
    return actual.length === expected.length && timingSafeEqual(expected, actual);
  });
}
