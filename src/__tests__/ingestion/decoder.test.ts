import { describe, it, expect } from 'vitest';
import { decodeEvent, SUPPORTED_EVENT_TYPES } from '../../ingestion/decoder.js';
import { MalformedPayloadError } from '../../ingestion/errors.js';

const SUBSCRIBER_ID = '00000000-0000-0000-0000-00000000beef';

function body(eventType: string, payload: Record<string, unknown>, eventId = 'evt_1'): string {
  return JSON.stringify({ event_id: eventId, event_type: eventType, payload });
}

function decodeError(raw: string): MalformedPayloadError {
  try {
    decodeEvent(raw);
  } catch (err) {
    if (err instanceof MalformedPayloadError) return err;
    throw err;
  }
  throw new Error('expected decodeEvent to throw');
}

describe('decodeEvent', () => {
  it('supports the five provider event types', () => {
    expect(SUPPORTED_EVENT_TYPES).toEqual([
      'checkout.session.completed',
      'invoice.payment_succeeded',
      'invoice.payment_failed',
      'customer.subscription.deleted',
      'customer.subscription.updated',
    ]);
  });

  it('decodes a checkout keyed by subscriber', () => {
    const decoded = decodeEvent(body('checkout.session.completed', {
      subscriber_id: SUBSCRIBER_ID,
      provider_subscription_id: 'sub_1',
      provider_customer_id: 'cus_1',
      plan_id: 'plan_premium',
      current_period_start: 1_740_830_400,
      current_period_end: 1_743_508_800,
    }));

    expect(decoded).toEqual({
      kind: 'trigger',
      eventId: 'evt_1',
      eventType: 'checkout.session.completed',
      locator: { by: 'subscriber', value: SUBSCRIBER_ID },
      trigger: {
        type: 'checkout_completed',
        subscriberId: SUBSCRIBER_ID,
        providerSubscriptionId: 'sub_1',
        providerCustomerId: 'cus_1',
        planId: 'plan_premium',
        billingPeriod: 'monthly',
        period: {
          start: new Date('2025-03-01T12:00:00Z'),
          end: new Date('2025-04-01T12:00:00Z'),
        },
      },
    });
  });

  it('decodes invoice events keyed by provider subscription', () => {
    const failed = decodeEvent(body('invoice.payment_failed', {
      provider_subscription_id: 'sub_1',
      hosted_invoice_url: 'https://pay.example.com/in_1',
    }));
    expect(failed).toMatchObject({
      locator: { by: 'provider', value: 'sub_1' },
      trigger: { type: 'payment_failed', invoiceUrl: 'https://pay.example.com/in_1' },
    });

    const succeeded = decodeEvent(body('invoice.payment_succeeded', { provider_subscription_id: 'sub_1' }));
    expect(succeeded).toMatchObject({ trigger: { type: 'payment_succeeded', period: undefined } });
  });

  it('needs both period bounds to build a window', () => {
    const decoded = decodeEvent(body('invoice.payment_succeeded', {
      provider_subscription_id: 'sub_1',
      current_period_start: 1_740_830_400,
    }));
    expect(decoded).toMatchObject({ trigger: { type: 'payment_succeeded', period: undefined } });
  });

  it('decodes subscription deletion and updates', () => {
    expect(decodeEvent(body('customer.subscription.deleted', { provider_subscription_id: 'sub_1' })))
      .toMatchObject({ trigger: { type: 'provider_canceled' } });

    expect(decodeEvent(body('customer.subscription.updated', {
      provider_subscription_id: 'sub_1',
      status: 'active',
      cancel_at_period_end: true,
    }))).toMatchObject({
      trigger: { type: 'provider_updated', providerStatus: 'active', cancelAtPeriodEnd: true },
    });
  });

  it('acknowledges unknown event types without decoding the payload', () => {
    expect(decodeEvent(body('customer.created', { anything: true }, 'evt_9'))).toEqual({
      kind: 'ignored',
      eventId: 'evt_9',
      eventType: 'customer.created',
    });
  });

  it('rejects a body that is not JSON', () => {
    expect(decodeError('not json').message).toBe('Body is not valid JSON');
  });

  it('rejects an envelope without an event id', () => {
    const err = decodeError(JSON.stringify({ event_type: 'invoice.payment_failed', payload: {} }));
    expect(err.message).toBe('Invalid event envelope');
    expect(err.issues).toEqual(['event_id: Required']);
  });

  it('lists the invalid payload fields', () => {
    const err = decodeError(body('checkout.session.completed', {
      subscriber_id: 'not-a-uuid',
      provider_subscription_id: 'sub_1',
      provider_customer_id: 'cus_1',
      plan_id: 'plan_premium',
    }));
    expect(err.message).toBe('Invalid checkout.session.completed payload');
    expect(err.issues).toEqual(['subscriber_id: Invalid uuid']);
  });
});
