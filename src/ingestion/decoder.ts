import { z } from 'zod';
import type { Locator } from '../lifecycle/service.js';
import type { BillingWindow, Trigger } from '../lifecycle/triggers.js';
import { MalformedPayloadError } from './errors.js';

// ─── Wire schemas ────────────────────────────────────────────────────

const envelopeSchema = z.object({
  event_id: z.string().min(1).max(255),
  event_type: z.string().min(1).max(100),
  payload: z.record(z.unknown()),
});

const unixSeconds = z.number().int().nonnegative();

const periodFields = {
  current_period_start: unixSeconds.optional(),
  current_period_end: unixSeconds.optional(),
};

const providerRef = {
  provider_subscription_id: z.string().min(1),
};

const checkoutSchema = z.object({
  subscriber_id: z.string().uuid(),
  provider_subscription_id: z.string().min(1),
  provider_customer_id: z.string().min(1),
  plan_id: z.string().min(1),
  billing_period: z.enum(['monthly', 'annual']).default('monthly'),
  ...periodFields,
});

const paymentSucceededSchema = z.object({ ...providerRef, ...periodFields });

const paymentFailedSchema = z.object({
  ...providerRef,
  hosted_invoice_url: z.string().url().optional(),
});

const subscriptionDeletedSchema = z.object(providerRef);

const subscriptionUpdatedSchema = z.object({
  ...providerRef,
  status: z.string().min(1),
  cancel_at_period_end: z.boolean().optional(),
  ...periodFields,
});

// ─── Decoding ────────────────────────────────────────────────────────

export type DecodedEvent =
  | { kind: 'trigger'; eventId: string; eventType: string; locator: Locator; trigger: Trigger }
  | { kind: 'ignored'; eventId: string; eventType: string };

function toWindow(fields: { current_period_start?: number; current_period_end?: number }): BillingWindow | undefined {
  if (fields.current_period_start === undefined || fields.current_period_end === undefined) return undefined;
  return {
    start: new Date(fields.current_period_start * 1000),
    end: new Date(fields.current_period_end * 1000),
  };
}

function parse<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedPayloadError(
      `Invalid ${what}`,
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}

type Mapped = { locator: Locator; trigger: Trigger };

type EventDecoder = (payload: unknown) => Mapped;

const EVENT_DECODERS = new Map<string, EventDecoder>([
  ['checkout.session.completed', (payload) => {
    const p = parse(checkoutSchema, payload, 'checkout.session.completed payload');
    return {
      locator: { by: 'subscriber', value: p.subscriber_id },
      trigger: {
        type: 'checkout_completed',
        subscriberId: p.subscriber_id,
        providerSubscriptionId: p.provider_subscription_id,
        providerCustomerId: p.provider_customer_id,
        planId: p.plan_id,
        billingPeriod: p.billing_period,
        period: toWindow(p),
      },
    };
  }],
  ['invoice.payment_succeeded', (payload) => {
    const p = parse(paymentSucceededSchema, payload, 'invoice.payment_succeeded payload');
    return {
      locator: { by: 'provider', value: p.provider_subscription_id },
      trigger: { type: 'payment_succeeded', period: toWindow(p) },
    };
  }],
  ['invoice.payment_failed', (payload) => {
    const p = parse(paymentFailedSchema, payload, 'invoice.payment_failed payload');
    return {
      locator: { by: 'provider', value: p.provider_subscription_id },
      trigger: { type: 'payment_failed', invoiceUrl: p.hosted_invoice_url },
    };
  }],
  ['customer.subscription.deleted', (payload) => {
    const p = parse(subscriptionDeletedSchema, payload, 'customer.subscription.deleted payload');
    return {
      locator: { by: 'provider', value: p.provider_subscription_id },
      trigger: { type: 'provider_canceled' },
    };
  }],
  ['customer.subscription.updated', (payload) => {
    const p = parse(subscriptionUpdatedSchema, payload, 'customer.subscription.updated payload');
    return {
      locator: { by: 'provider', value: p.provider_subscription_id },
      trigger: {
        type: 'provider_updated',
        providerStatus: p.status,
        cancelAtPeriodEnd: p.cancel_at_period_end,
        period: toWindow(p),
      },
    };
  }],
]);

export const SUPPORTED_EVENT_TYPES = [...EVENT_DECODERS.keys()];

/** Decode a raw request body into a trigger and the record it targets. */
export function decodeEvent(rawBody: string): DecodedEvent {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    throw new MalformedPayloadError('Body is not valid JSON');
  }

  const envelope = parse(envelopeSchema, json, 'event envelope');
  const decoder = EVENT_DECODERS.get(envelope.event_type);
  if (!decoder) {
    return { kind: 'ignored', eventId: envelope.event_id, eventType: envelope.event_type };
  }

  return {
    kind: 'trigger',
    eventId: envelope.event_id,
    eventType: envelope.event_type,
    ...decoder(envelope.payload),
  };
}
