import {
  pgTable,
  text,
  timestamp,
  uuid,
  varchar,
  integer,
  boolean,
  jsonb,
  pgEnum,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import type { StateTransition } from './types.js';

// ─── Enums ───────────────────────────────────────────────────────────

export const subscriptionStatusEnum = pgEnum('subscription_status', [
  'trialing',
  'active',
  'past_due',
  'suspended',
  'paused',
  'canceled',
  'trial_expired',
]);

export const billingPeriodEnum = pgEnum('billing_period', [
  'monthly',
  'annual',
]);

export const notificationStatusEnum = pgEnum('notification_status', [
  'pending',
  'sent',
  'skipped',
]);

// ─── Subscribers ─────────────────────────────────────────────────────
// Owned by the profile service; read here only to address notifications.

export const subscribers = pgTable('subscribers', {
  id: uuid('id').primaryKey().defaultRandom(),
  email: varchar('email', { length: 255 }).notNull(),
  displayName: varchar('display_name', { length: 255 }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

// ─── Subscriptions ───────────────────────────────────────────────────
// Status only ever changes through a compare-and-swap on (status, version).

export const subscriptions = pgTable('subscriptions', {
  id: uuid('id').primaryKey().defaultRandom(),
  subscriberId: uuid('subscriber_id').notNull().references(() => subscribers.id),
  planId: varchar('plan_id', { length: 100 }).notNull(),
  billingPeriod: billingPeriodEnum('billing_period').default('monthly').notNull(),
  status: subscriptionStatusEnum('status').notNull(),

  isTrial: boolean('is_trial').default(false).notNull(),
  trialStart: timestamp('trial_start'),
  trialEnd: timestamp('trial_end'),
  trialConvertedAt: timestamp('trial_converted_at'),

  currentPeriodStart: timestamp('current_period_start'),
  currentPeriodEnd: timestamp('current_period_end'),

  dunningCount: integer('dunning_count').default(0).notNull(),
  dunningNextRetryAt: timestamp('dunning_next_retry_at'),

  pausedAt: timestamp('paused_at'),
  pauseResumesAt: timestamp('pause_resumes_at'),

  cancelAtPeriodEnd: boolean('cancel_at_period_end').default(false).notNull(),
  canceledAt: timestamp('canceled_at'),
  cancellationReason: text('cancellation_reason'),

  providerSubscriptionId: varchar('provider_subscription_id', { length: 255 }),
  providerCustomerId: varchar('provider_customer_id', { length: 255 }),

  version: integer('version').default(1).notNull(),
  stateHistory: jsonb('state_history').$type<StateTransition[]>().default([]).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => [
  uniqueIndex('subscriptions_subscriber_idx').on(table.subscriberId),
  uniqueIndex('subscriptions_provider_sub_idx').on(table.providerSubscriptionId),
  index('subscriptions_status_trial_end_idx').on(table.status, table.trialEnd),
  index('subscriptions_status_retry_idx').on(table.status, table.dunningNextRetryAt),
  index('subscriptions_status_resume_idx').on(table.status, table.pauseResumesAt),
]);

// ─── Idempotency ─────────────────────────────────────────────────────
// A processed_events row is the only signal that an event was handled.
// event_claims holds short leases so concurrent deliveries of one event
// never run side by side.

export const processedEvents = pgTable('processed_events', {
  eventId: varchar('event_id', { length: 255 }).primaryKey(),
  eventType: varchar('event_type', { length: 100 }).notNull(),
  processedAt: timestamp('processed_at').defaultNow().notNull(),
}, (table) => [
  index('processed_events_processed_at_idx').on(table.processedAt),
]);

export const eventClaims = pgTable('event_claims', {
  eventId: varchar('event_id', { length: 255 }).primaryKey(),
  eventType: varchar('event_type', { length: 100 }).notNull(),
  claimedAt: timestamp('claimed_at').defaultNow().notNull(),
});

// ─── Access Tokens ───────────────────────────────────────────────────
// Issued by the auth service; this subsystem only toggles isActive/revokedAt.

export const accessTokens = pgTable('access_tokens', {
  id: uuid('id').primaryKey().defaultRandom(),
  subscriberId: uuid('subscriber_id').notNull().references(() => subscribers.id),
  tokenHash: varchar('token_hash', { length: 255 }).notNull().unique(),
  isActive: boolean('is_active').default(false).notNull(),
  revokedAt: timestamp('revoked_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => [
  index('access_tokens_subscriber_idx').on(table.subscriberId),
]);

// ─── Notification Events ─────────────────────────────────────────────

export const notificationEvents = pgTable('notification_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  subscriberId: uuid('subscriber_id').notNull().references(() => subscribers.id),
  template: varchar('template', { length: 100 }).notNull(),
  dedupKey: varchar('dedup_key', { length: 255 }).notNull(),
  status: notificationStatusEnum('status').default('pending').notNull(),
  sentAt: timestamp('sent_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => [
  uniqueIndex('notification_events_dedup_idx').on(table.subscriberId, table.dedupKey),
]);
