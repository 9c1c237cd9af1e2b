import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import { signPayload, verifySignature } from '../../ingestion/signature.js';

const SECRET = 'whsec_test-secret';
const PAYLOAD = '{"event_id":"evt_1","event_type":"invoice.payment_failed","payload":{}}';
const NOW = 1_740_830_400;

describe('Webhook signatures', () => {
  it('signs as t=<seconds>,v1=<hmac of "t.payload">', () => {
    const expected = createHmac('sha256', 'test-secret').update(`${NOW}.${PAYLOAD}`).digest('hex');
    expect(signPayload(PAYLOAD, SECRET, NOW)).toBe(`t=${NOW},v1=${expected}`);
  });

  it('accepts its own signature', () => {
    const header = signPayload(PAYLOAD, SECRET, NOW);
    expect(verifySignature(PAYLOAD, header, SECRET, { nowSeconds: NOW })).toBe(true);
  });

  it('rejects a tampered body', () => {
    const header = signPayload(PAYLOAD, SECRET, NOW);
    expect(verifySignature(PAYLOAD.replace('evt_1', 'evt_2'), header, SECRET, { nowSeconds: NOW })).toBe(false);
  });

  it('rejects the wrong secret', () => {
    const header = signPayload(PAYLOAD, 'whsec_other-secret', NOW);
    expect(verifySignature(PAYLOAD, header, SECRET, { nowSeconds: NOW })).toBe(false);
  });

  it('rejects timestamps outside the tolerance window', () => {
    const header = signPayload(PAYLOAD, SECRET, NOW - 301);
    expect(verifySignature(PAYLOAD, header, SECRET, { nowSeconds: NOW })).toBe(false);
    expect(verifySignature(PAYLOAD, header, SECRET, { nowSeconds: NOW, toleranceSeconds: 600 })).toBe(true);
  });

  it('accepts any matching v1 entry during secret rotation', () => {
    const current = signPayload(PAYLOAD, SECRET, NOW).split(',')[1];
    const header = `t=${NOW},v1=${'0'.repeat(64)},${current}`;
    expect(verifySignature(PAYLOAD, header, SECRET, { nowSeconds: NOW })).toBe(true);
  });

  it('rejects malformed headers', () => {
    expect(verifySignature(PAYLOAD, '', SECRET, { nowSeconds: NOW })).toBe(false);
    expect(verifySignature(PAYLOAD, `t=${NOW}`, SECRET, { nowSeconds: NOW })).toBe(false);
    expect(verifySignature(PAYLOAD, 'v1=abcd', SECRET, { nowSeconds: NOW })).toBe(false);
    expect(verifySignature(PAYLOAD, `t=${NOW},v1=zz`, SECRET, { nowSeconds: NOW })).toBe(false);
  });
});
