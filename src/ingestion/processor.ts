import type { EventLog } from '../events/event-log.js';
import type { ApplyOutcome, LifecycleService } from '../lifecycle/service.js';
import type { SubscriptionStatus } from '../models/types.js';
import { createChildLogger } from '../config/logger.js';
import { decodeEvent } from './decoder.js';
import { InvalidSignatureError, RetryableIngestionError } from './errors.js';
import { DEFAULT_TOLERANCE_SECONDS, verifySignature } from './signature.js';

const log = createChildLogger('ingestion');

export type IngestionResult =
  | {
      status: 'applied' | 'noop' | 'rejected';
      eventId: string;
      subscriptionId: string;
      subscriptionStatus: SubscriptionStatus;
    }
  | { status: 'already_processed' | 'ignored'; eventId: string };

export interface IngestionOptions {
  /** Shared secret. Without one, events are accepted unsigned. */
  secret?: string;
  maxAttempts: number;
  toleranceSeconds?: number;
}

/**
 * Provider webhook pipeline: verify, decode, claim, apply, mark processed.
 *
 * An event is marked processed only once its transition and effects are
 * done (or it was rejected, which redelivery would not change). Anything
 * else releases the claim and surfaces a RetryableIngestionError so the
 * provider redelivers.
 */
export class EventIngestionService {
  constructor(
    private eventLog: EventLog,
    private lifecycle: LifecycleService,
    private opts: IngestionOptions,
  ) {}

  async ingest(rawBody: string, signatureHeader: string | undefined): Promise<IngestionResult> {
    this.verify(rawBody, signatureHeader);

    const decoded = decodeEvent(rawBody);
    const { eventId, eventType } = decoded;

    if (decoded.kind === 'ignored') {
      log.info({ eventId, eventType }, 'Unhandled event type acknowledged');
      return { status: 'ignored', eventId };
    }

    const claim = await this.eventLog.tryClaim(eventId, eventType);
    if (claim === 'already_processed') {
      log.info({ eventId, eventType }, 'Duplicate event delivery acknowledged');
      return { status: 'already_processed', eventId };
    }
    if (claim === 'in_flight') {
      throw new RetryableIngestionError(`Event ${eventId} is being processed`, eventId, 'in_flight');
    }

    let outcome: ApplyOutcome;
    try {
      outcome = await this.lifecycle.apply(decoded.locator, decoded.trigger, {
        source: 'webhook',
        maxAttempts: this.opts.maxAttempts,
        eventId,
      });
    } catch (err) {
      log.error({ err, eventId, eventType }, 'Event processing failed');
      await this.release(eventId);
      throw new RetryableIngestionError(`Event ${eventId} failed to apply`, eventId, 'store_error');
    }

    if (outcome.kind === 'not_found') {
      log.warn({ eventId, eventType, locator: decoded.locator }, 'Event for unknown subscription');
      await this.release(eventId);
      throw new RetryableIngestionError(`No subscription for event ${eventId}`, eventId, 'not_found');
    }

    if (outcome.kind === 'conflict') {
      await this.release(eventId);
      throw new RetryableIngestionError(
        `Event ${eventId} conflicted ${outcome.attempts} times`,
        eventId,
        'conflict',
      );
    }

    try {
      await this.eventLog.markProcessed(eventId, eventType);
    } catch (err) {
      log.error({ err, eventId, eventType }, 'Failed to record processed event');
      await this.release(eventId);
      throw new RetryableIngestionError(`Event ${eventId} could not be recorded`, eventId, 'store_error');
    }

    return {
      status: outcome.kind,
      eventId,
      subscriptionId: outcome.subscription.id,
      subscriptionStatus: outcome.subscription.status,
    };
  }

  private verify(rawBody: string, signatureHeader: string | undefined): void {
    if (!this.opts.secret) {
      log.warn('WEBHOOK_SECRET not set, accepting unsigned provider event');
      return;
    }
    if (!signatureHeader) {
      throw new InvalidSignatureError('Missing signature header');
    }
    const valid = verifySignature(rawBody, signatureHeader, this.opts.secret, {
      toleranceSeconds: this.opts.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS,
    });
    if (!valid) throw new InvalidSignatureError();
  }

  private async release(eventId: string): Promise<void> {
    try {
      await this.eventLog.release(eventId);
    } catch (err) {
      // The lease expires on its own; redelivery waits it out
      log.error({ err, eventId }, 'Failed to release event claim');
    }
  }
}
