import Stripe from 'stripe';
import { createChildLogger } from '../config/logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitStatus } from './circuit-breaker.js';
import { withTimeout } from './timeout.js';

const log = createChildLogger('payment-provider');

export interface PaymentProvider {
  cancelSubscription(providerSubscriptionId: string, opts: { atPeriodEnd: boolean }): Promise<void>;
  retryInvoice(providerSubscriptionId: string): Promise<void>;
  pauseCollection(providerSubscriptionId: string): Promise<void>;
  resumeCollection(providerSubscriptionId: string): Promise<void>;
  status(): CircuitStatus;
}

/** The slice of the Stripe SDK this module calls. */
export interface StripeBillingApi {
  subscriptions: {
    cancel(id: string): Promise<unknown>;
    update(id: string, params: Stripe.SubscriptionUpdateParams): Promise<unknown>;
  };
  invoices: {
    list(params: Stripe.InvoiceListParams): Promise<{ data: Array<{ id?: string }> }>;
    pay(id: string): Promise<unknown>;
  };
}

export function createStripeClient(secretKey: string): Stripe {
  return new Stripe(secretKey, { apiVersion: '2025-02-24.acacia' });
}

/**
 * Stripe-backed provider callbacks. Every call is bounded by `timeoutMs`
 * and goes through one circuit breaker, so a provider outage fails fast.
 */
export class StripePaymentProvider implements PaymentProvider {
  private readonly breaker: CircuitBreaker;

  constructor(
    private stripe: StripeBillingApi,
    private timeoutMs = 5000,
    breaker?: CircuitBreaker,
  ) {
    this.breaker = breaker ?? new CircuitBreaker('stripe');
  }

  async cancelSubscription(
    providerSubscriptionId: string,
    opts: { atPeriodEnd: boolean },
  ): Promise<void> {
    if (opts.atPeriodEnd) {
      await this.call('subscriptions.update', () =>
        this.stripe.subscriptions.update(providerSubscriptionId, { cancel_at_period_end: true }),
      );
    } else {
      await this.call('subscriptions.cancel', () =>
        this.stripe.subscriptions.cancel(providerSubscriptionId),
      );
    }
    log.info({ providerSubscriptionId, atPeriodEnd: opts.atPeriodEnd }, 'Provider cancellation requested');
  }

  async retryInvoice(providerSubscriptionId: string): Promise<void> {
    const invoices = await this.call('invoices.list', () =>
      this.stripe.invoices.list({ subscription: providerSubscriptionId, status: 'open', limit: 1 }),
    );
    const invoiceId = invoices.data[0]?.id;
    if (!invoiceId) {
      log.info({ providerSubscriptionId }, 'No open invoice to retry');
      return;
    }
    await this.call('invoices.pay', () => this.stripe.invoices.pay(invoiceId));
    log.info({ providerSubscriptionId, invoiceId }, 'Invoice retry requested');
  }

  /** Invoices raised while paused are marked uncollectible. */
  async pauseCollection(providerSubscriptionId: string): Promise<void> {
    await this.call('subscriptions.update', () =>
      this.stripe.subscriptions.update(providerSubscriptionId, {
        pause_collection: { behavior: 'mark_uncollectible' },
      }),
    );
    log.info({ providerSubscriptionId }, 'Provider collection paused');
  }

  async resumeCollection(providerSubscriptionId: string): Promise<void> {
    await this.call('subscriptions.update', () =>
      this.stripe.subscriptions.update(providerSubscriptionId, { pause_collection: '' }),
    );
    log.info({ providerSubscriptionId }, 'Provider collection resumed');
  }

  status(): CircuitStatus {
    return this.breaker.getStatus();
  }

  private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return this.breaker.execute(() => withTimeout(fn(), this.timeoutMs, `stripe ${label}`));
  }
}
