import { eq, and, or, lte, gt, inArray, asc } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';
import type { Database } from '../config/database.js';
import { subscriptions } from '../models/schema.js';
import type {
  NewSubscription,
  Subscription,
  SubscriptionPatch,
  SubscriptionStatus,
} from '../models/types.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('subscription-store');

// ─── Contract ────────────────────────────────────────────────────────

export interface ExpectedState {
  status: SubscriptionStatus;
  version: number;
}

export type SwapResult =
  | { kind: 'applied'; subscription: Subscription }
  | { kind: 'conflict' };

/** Position of the last row of a page: its ordering timestamp and id. */
export interface PageCursor {
  at: Date;
  id: string;
}

/**
 * Scan conditions used by the policy sweeps. Bounds are inclusive at `to`/`at`.
 * Windows page on `(column, id)`; with `after` set, rows tied with the cursor
 * timestamp and a larger id come next.
 */
export type DueCondition =
  | { kind: 'trial_end_before'; at: Date }
  | { kind: 'dunning_retry_before'; at: Date }
  | { kind: 'pause_resume_before'; at: Date }
  | { kind: 'trial_end_between'; from: Date; to: Date; after?: PageCursor }
  | { kind: 'period_end_canceling_between'; from: Date; to: Date; after?: PageCursor }
  | { kind: 'created_between'; from: Date; to: Date; after?: PageCursor };

export interface SubscriptionStore {
  load(id: string): Promise<Subscription | null>;
  loadBySubscriberId(subscriberId: string): Promise<Subscription | null>;
  loadByProviderSubscriptionId(providerSubscriptionId: string): Promise<Subscription | null>;
  /** Returns null when another writer created the subscriber's record first. */
  create(values: NewSubscription): Promise<Subscription | null>;
  compareAndSwap(id: string, expected: ExpectedState, patch: SubscriptionPatch): Promise<SwapResult>;
  findDue(condition: DueCondition, limit: number): Promise<Subscription[]>;
}

// ─── Postgres implementation ─────────────────────────────────────────

export class DrizzleSubscriptionStore implements SubscriptionStore {
  constructor(private db: Database) {}

  async load(id: string): Promise<Subscription | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.id, id))
      .limit(1);
    return row ?? null;
  }

  async loadBySubscriberId(subscriberId: string): Promise<Subscription | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.subscriberId, subscriberId))
      .limit(1);
    return row ?? null;
  }

  async loadByProviderSubscriptionId(providerSubscriptionId: string): Promise<Subscription | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.providerSubscriptionId, providerSubscriptionId))
      .limit(1);
    return row ?? null;
  }

  async create(values: NewSubscription): Promise<Subscription | null> {
    const [row] = await this.db
      .insert(subscriptions)
      .values({ ...values, version: 1 })
      .onConflictDoNothing()
      .returning();

    if (!row) {
      log.debug({ subscriberId: values.subscriberId }, 'Subscription already exists, create skipped');
      return null;
    }
    return row;
  }

  /**
   * Conditional write on (id, status, version). Zero affected rows means
   * another writer moved the record since it was read.
   */
  async compareAndSwap(
    id: string,
    expected: ExpectedState,
    patch: SubscriptionPatch,
  ): Promise<SwapResult> {
    const [row] = await this.db
      .update(subscriptions)
      .set({
        ...patch,
        version: expected.version + 1,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(subscriptions.id, id),
          eq(subscriptions.status, expected.status),
          eq(subscriptions.version, expected.version),
        ),
      )
      .returning();

    if (!row) {
      log.debug({ subscriptionId: id, expected }, 'Compare-and-swap lost');
      return { kind: 'conflict' };
    }
    return { kind: 'applied', subscription: row };
  }

  async findDue(condition: DueCondition, limit: number): Promise<Subscription[]> {
    const [where, orderColumn] = dueFilter(condition);
    return this.db
      .select()
      .from(subscriptions)
      .where(where)
      .orderBy(asc(orderColumn), asc(subscriptions.id))
      .limit(limit);
  }
}

function windowStart(column: AnyPgColumn, from: Date, after: PageCursor | undefined) {
  if (!after) return gt(column, from);
  return or(gt(column, after.at), and(eq(column, after.at), gt(subscriptions.id, after.id)));
}

function dueFilter(condition: DueCondition) {
  switch (condition.kind) {
    case 'trial_end_before':
      return [
        and(eq(subscriptions.status, 'trialing'), lte(subscriptions.trialEnd, condition.at)),
        subscriptions.trialEnd,
      ] as const;
    case 'dunning_retry_before':
      return [
        and(eq(subscriptions.status, 'past_due'), lte(subscriptions.dunningNextRetryAt, condition.at)),
        subscriptions.dunningNextRetryAt,
      ] as const;
    case 'pause_resume_before':
      return [
        and(eq(subscriptions.status, 'paused'), lte(subscriptions.pauseResumesAt, condition.at)),
        subscriptions.pauseResumesAt,
      ] as const;
    case 'trial_end_between':
      return [
        and(
          eq(subscriptions.status, 'trialing'),
          windowStart(subscriptions.trialEnd, condition.from, condition.after),
          lte(subscriptions.trialEnd, condition.to),
        ),
        subscriptions.trialEnd,
      ] as const;
    case 'period_end_canceling_between':
      return [
        and(
          eq(subscriptions.status, 'active'),
          eq(subscriptions.cancelAtPeriodEnd, true),
          windowStart(subscriptions.currentPeriodEnd, condition.from, condition.after),
          lte(subscriptions.currentPeriodEnd, condition.to),
        ),
        subscriptions.currentPeriodEnd,
      ] as const;
    case 'created_between':
      return [
        and(
          inArray(subscriptions.status, ['active', 'trialing']),
          windowStart(subscriptions.createdAt, condition.from, condition.after),
          lte(subscriptions.createdAt, condition.to),
        ),
        subscriptions.createdAt,
      ] as const;
  }
}
