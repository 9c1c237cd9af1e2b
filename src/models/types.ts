import type { InferSelectModel, InferInsertModel } from 'drizzle-orm';
import type * as schema from './schema.js';

// ─── Select types (reading from DB) ─────────────────────────────────

export type Subscription = InferSelectModel<typeof schema.subscriptions>;
export type Subscriber = InferSelectModel<typeof schema.subscribers>;
export type AccessToken = InferSelectModel<typeof schema.accessTokens>;
export type NotificationEvent = InferSelectModel<typeof schema.notificationEvents>;
export type ProcessedEvent = InferSelectModel<typeof schema.processedEvents>;

// ─── Insert types (writing to DB) ───────────────────────────────────

export type NewSubscription = InferInsertModel<typeof schema.subscriptions>;

// ─── Domain types ───────────────────────────────────────────────────

export type SubscriptionStatus =
  | 'trialing'
  | 'active'
  | 'past_due'
  | 'suspended'
  | 'paused'
  | 'canceled'
  | 'trial_expired';

export type BillingPeriod = 'monthly' | 'annual';

/** Where a trigger came from: the provider webhook, a subscriber action or a sweep. */
export type TriggerSource = 'webhook' | 'subscriber' | 'sweep';

export interface StateTransition {
  from: SubscriptionStatus | null;
  to: SubscriptionStatus;
  trigger: string;
  source: TriggerSource;
  at: string;
}

/**
 * Fields the engine may change. Identity, version and audit columns are
 * managed by the store.
 */
export type SubscriptionPatch = Partial<Omit<
  Subscription,
  'id' | 'subscriberId' | 'version' | 'createdAt' | 'updatedAt'
>>;
