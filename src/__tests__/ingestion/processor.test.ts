import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventIngestionService } from '../../ingestion/processor.js';
import {
  InvalidSignatureError,
  MalformedPayloadError,
  RetryableIngestionError,
} from '../../ingestion/errors.js';
import { signPayload } from '../../ingestion/signature.js';
import {
  createLifecycleHarness,
  createTestSubscription,
  InMemoryEventLog,
  resetUuidCounter,
} from '../helpers.js';

vi.mock('../../config/logger.js', () => ({
  createChildLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const SECRET = 'test-secret-webhooks';

function event(eventId: string, eventType: string, payload: Record<string, unknown>): string {
  return JSON.stringify({ event_id: eventId, event_type: eventType, payload });
}

async function retryReason(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RetryableIngestionError) return err.reason;
    throw err;
  }
  throw new Error('expected a retryable error');
}

describe('EventIngestionService', () => {
  let h: ReturnType<typeof createLifecycleHarness>;
  let eventLog: InMemoryEventLog;
  let ingestion: EventIngestionService;

  beforeEach(() => {
    resetUuidCounter();
    h = createLifecycleHarness();
    eventLog = new InMemoryEventLog();
    ingestion = new EventIngestionService(eventLog, h.lifecycle, { secret: SECRET, maxAttempts: 3 });
  });

  function seedActive() {
    return h.store.seed(createTestSubscription({ providerSubscriptionId: 'sub_1' }));
  }

  function ingestSigned(raw: string) {
    return ingestion.ingest(raw, signPayload(raw, SECRET));
  }

  describe('idempotence', () => {
    it('applies a redelivered event once', async () => {
      const sub = seedActive();
      const raw = event('evt_1', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      const first = await ingestSigned(raw);
      const second = await ingestSigned(raw);

      expect(first).toEqual({
        status: 'applied',
        eventId: 'evt_1',
        subscriptionId: sub.id,
        subscriptionStatus: 'past_due',
      });
      expect(second).toEqual({ status: 'already_processed', eventId: 'evt_1' });
      expect(h.store.get(sub.id)?.version).toBe(2);
      expect(h.notifications.templates()).toEqual(['dunning_notice']);
      expect(eventLog.processed.has('evt_1')).toBe(true);
      expect(eventLog.claims.size).toBe(0);
    });

    it('asks for redelivery while another worker holds the event', async () => {
      seedActive();
      eventLog.claims.add('evt_1');
      const raw = event('evt_1', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      await expect(retryReason(ingestSigned(raw))).resolves.toBe('in_flight');
      expect(h.tokens.calls).toEqual([]);
    });
  });

  describe('signatures', () => {
    it('rejects a missing signature', async () => {
      const raw = event('evt_1', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });
      await expect(ingestion.ingest(raw, undefined)).rejects.toThrow(new InvalidSignatureError('Missing signature header'));
    });

    it('rejects a signature made with another secret', async () => {
      const raw = event('evt_1', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });
      await expect(ingestion.ingest(raw, signPayload(raw, 'another-secret-value'))).rejects.toBeInstanceOf(InvalidSignatureError);
      expect(eventLog.claims.size).toBe(0);
    });

    it('accepts unsigned events when no secret is configured', async () => {
      seedActive();
      const open = new EventIngestionService(eventLog, h.lifecycle, { maxAttempts: 3 });
      const raw = event('evt_1', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      await expect(open.ingest(raw, undefined)).resolves.toMatchObject({ status: 'applied' });
    });
  });

  describe('outcomes', () => {
    it('acknowledges unsupported event types without claiming them', async () => {
      const raw = event('evt_7', 'customer.created', {});
      await expect(ingestSigned(raw)).resolves.toEqual({ status: 'ignored', eventId: 'evt_7' });
      expect(eventLog.processed.size).toBe(0);
    });

    it('surfaces malformed payloads', async () => {
      const raw = event('evt_1', 'invoice.payment_failed', {});
      await expect(ingestSigned(raw)).rejects.toBeInstanceOf(MalformedPayloadError);
    });

    it('marks a rejected event processed so it is not redelivered forever', async () => {
      const sub = h.store.seed(createTestSubscription({ providerSubscriptionId: 'sub_1', status: 'suspended', dunningCount: 3 }));
      const raw = event('evt_2', 'invoice.payment_succeeded', { provider_subscription_id: 'sub_1' });

      await expect(ingestSigned(raw)).resolves.toEqual({
        status: 'rejected',
        eventId: 'evt_2',
        subscriptionId: sub.id,
        subscriptionStatus: 'suspended',
      });
      expect(eventLog.processed.has('evt_2')).toBe(true);
    });

    it('creates the subscription from a first checkout', async () => {
      const raw = event('evt_3', 'checkout.session.completed', {
        subscriber_id: '00000000-0000-0000-0000-00000000beef',
        provider_subscription_id: 'sub_9',
        provider_customer_id: 'cus_9',
        plan_id: 'plan_premium',
      });

      const result = await ingestSigned(raw);
      expect(result).toMatchObject({ status: 'applied', subscriptionStatus: 'active' });
      expect(h.store.rows.size).toBe(1);
    });
  });

  describe('redelivery', () => {
    it('releases the claim for an unknown subscription', async () => {
      const raw = event('evt_4', 'invoice.payment_failed', { provider_subscription_id: 'sub_unknown' });

      await expect(retryReason(ingestSigned(raw))).resolves.toBe('not_found');
      expect(eventLog.claims.size).toBe(0);
      expect(eventLog.processed.size).toBe(0);
    });

    it('releases the claim after repeated conflicts', async () => {
      vi.spyOn(h.lifecycle, 'apply').mockResolvedValueOnce({ kind: 'conflict', attempts: 3 });
      const raw = event('evt_5', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      await expect(retryReason(ingestSigned(raw))).resolves.toBe('conflict');
      expect(eventLog.claims.size).toBe(0);
    });

    it('releases the claim when the store fails', async () => {
      vi.spyOn(h.lifecycle, 'apply').mockRejectedValueOnce(new Error('connection reset'));
      const raw = event('evt_6', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      await expect(retryReason(ingestSigned(raw))).resolves.toBe('store_error');
      expect(eventLog.claims.size).toBe(0);
    });

    it('releases the claim when recording the event fails', async () => {
      seedActive();
      vi.spyOn(eventLog, 'markProcessed').mockRejectedValueOnce(new Error('connection reset'));
      const raw = event('evt_8', 'invoice.payment_failed', { provider_subscription_id: 'sub_1' });

      await expect(retryReason(ingestSigned(raw))).resolves.toBe('store_error');
      expect(eventLog.claims.size).toBe(0);
      expect(eventLog.processed.size).toBe(0);
    });
  });
});
