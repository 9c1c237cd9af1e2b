/**
 * Test helpers: mock factories, fixtures, and in-memory stand-ins.
 *
 * Tests run against in-memory stand-ins, with no PostgreSQL or Redis.
 */
import { vi } from 'vitest';
import type { NewSubscription, Subscription, SubscriptionPatch } from '../models/types.js';
import type { DueCondition, ExpectedState, PageCursor, SubscriptionStore, SwapResult } from '../subscriptions/store.js';
import type { ClaimResult, EventLog } from '../events/event-log.js';
import type { AccessTokenService } from '../effects/access-tokens.js';
import type { NotificationService, SendResult } from '../effects/notifications.js';
import type { PaymentProvider } from '../effects/payment-provider.js';
import type { CircuitStatus } from '../effects/circuit-breaker.js';
import type { NotificationTemplate } from '../effects/templates.js';
import type { NotificationContext, TokenAction } from '../effects/types.js';
import { SideEffectDispatcher } from '../effects/dispatcher.js';
import { LifecycleService } from '../lifecycle/service.js';

// ─── Mock Database ────────────────────────────────────────────────

/**
 * Creates a mock Drizzle database with chainable query builder methods.
 *
 * `limit()` and `returning()` resolve the next queued result (or [] when
 * the queue is empty). Chains awaited directly resolve [] without
 * consuming the queue.
 */
export function createMockDb() {
  const queued: unknown[][] = [];
  const next = () => Promise.resolve(queued.shift() ?? []);

  const chain: any = {};
  const methods = [
    'select', 'insert', 'update', 'delete', 'from', 'where', 'set',
    'values', 'orderBy', 'onConflictDoNothing', 'onConflictDoUpdate',
  ];
  for (const method of methods) {
    chain[method] = vi.fn().mockReturnValue(chain);
  }

  chain.limit = vi.fn().mockImplementation(next);
  chain.returning = vi.fn().mockImplementation(next);
  chain.then = (resolve: (v: unknown[]) => unknown, reject: (e: unknown) => unknown) =>
    Promise.resolve([]).then(resolve, reject);
  chain.transaction = vi.fn().mockImplementation((fn: (tx: unknown) => Promise<unknown>) => fn(chain));
  chain.execute = vi.fn().mockResolvedValue([{ '?column?': 1 }]);

  // Helper for tests to configure results, in call order
  chain._queue = (...results: unknown[][]) => {
    queued.push(...results);
  };

  return chain;
}

// ─── UUID Generator ───────────────────────────────────────────────

let uuidCounter = 0;
export function mockUuid(): string {
  uuidCounter++;
  return `00000000-0000-0000-0000-${String(uuidCounter).padStart(12, '0')}`;
}

export function resetUuidCounter() {
  uuidCounter = 0;
}

// ─── Factory Functions ────────────────────────────────────────────

export const TEST_NOW = new Date('2025-03-01T12:00:00Z');

export function createTestSubscription(overrides?: Partial<Subscription>): Subscription {
  const id = mockUuid();
  return {
    id,
    subscriberId: mockUuid(),
    planId: 'plan_premium',
    billingPeriod: 'monthly',
    status: 'active',
    isTrial: false,
    trialStart: null,
    trialEnd: null,
    trialConvertedAt: null,
    currentPeriodStart: new Date('2025-02-15T00:00:00Z'),
    currentPeriodEnd: new Date('2025-03-15T00:00:00Z'),
    dunningCount: 0,
    dunningNextRetryAt: null,
    pausedAt: null,
    pauseResumesAt: null,
    cancelAtPeriodEnd: false,
    canceledAt: null,
    cancellationReason: null,
    providerSubscriptionId: `sub_test_${id.slice(-4)}`,
    providerCustomerId: 'cus_test',
    version: 1,
    stateHistory: [],
    createdAt: new Date('2025-01-01T00:00:00Z'),
    updatedAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

// ─── In-memory Subscription Store ────────────────────────────────

/**
 * Same compare-and-swap contract as the Postgres store. Returned rows are
 * copies, so callers cannot mutate stored state behind the store's back.
 */
export class InMemorySubscriptionStore implements SubscriptionStore {
  readonly rows = new Map<string, Subscription>();
  readonly findDueCalls: Array<{ condition: DueCondition; limit: number }> = [];
  /** Runs once, right before the next compare-and-swap. Simulates a concurrent writer. */
  beforeNextSwap: (() => void) | null = null;

  constructor(private clock: () => Date = () => new Date()) {}

  seed(sub: Subscription): Subscription {
    this.rows.set(sub.id, structuredClone(sub));
    return sub;
  }

  get(id: string): Subscription | undefined {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : undefined;
  }

  /** Writes outside the CAS path, bumping the version like any other writer. */
  forceUpdate(id: string, patch: SubscriptionPatch): void {
    const row = this.rows.get(id);
    if (!row) throw new Error(`No row ${id}`);
    this.rows.set(id, { ...row, ...patch, version: row.version + 1 });
  }

  async load(id: string): Promise<Subscription | null> {
    return this.get(id) ?? null;
  }

  async loadBySubscriberId(subscriberId: string): Promise<Subscription | null> {
    return this.findOne((r) => r.subscriberId === subscriberId);
  }

  async loadByProviderSubscriptionId(providerSubscriptionId: string): Promise<Subscription | null> {
    return this.findOne((r) => r.providerSubscriptionId === providerSubscriptionId);
  }

  async create(values: NewSubscription): Promise<Subscription | null> {
    if ([...this.rows.values()].some((r) => r.subscriberId === values.subscriberId)) return null;

    const now = this.clock();
    const row: Subscription = {
      id: values.id ?? mockUuid(),
      subscriberId: values.subscriberId,
      planId: values.planId,
      billingPeriod: values.billingPeriod ?? 'monthly',
      status: values.status,
      isTrial: values.isTrial ?? false,
      trialStart: values.trialStart ?? null,
      trialEnd: values.trialEnd ?? null,
      trialConvertedAt: values.trialConvertedAt ?? null,
      currentPeriodStart: values.currentPeriodStart ?? null,
      currentPeriodEnd: values.currentPeriodEnd ?? null,
      dunningCount: values.dunningCount ?? 0,
      dunningNextRetryAt: values.dunningNextRetryAt ?? null,
      pausedAt: values.pausedAt ?? null,
      pauseResumesAt: values.pauseResumesAt ?? null,
      cancelAtPeriodEnd: values.cancelAtPeriodEnd ?? false,
      canceledAt: values.canceledAt ?? null,
      cancellationReason: values.cancellationReason ?? null,
      providerSubscriptionId: values.providerSubscriptionId ?? null,
      providerCustomerId: values.providerCustomerId ?? null,
      version: 1,
      stateHistory: values.stateHistory ?? [],
      createdAt: values.createdAt ?? now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return structuredClone(row);
  }

  async compareAndSwap(id: string, expected: ExpectedState, patch: SubscriptionPatch): Promise<SwapResult> {
    const hook = this.beforeNextSwap;
    this.beforeNextSwap = null;
    hook?.();

    const row = this.rows.get(id);
    if (!row || row.status !== expected.status || row.version !== expected.version) {
      return { kind: 'conflict' };
    }
    const next: Subscription = { ...row, ...patch, version: expected.version + 1, updatedAt: this.clock() };
    this.rows.set(id, next);
    return { kind: 'applied', subscription: structuredClone(next) };
  }

  async findDue(condition: DueCondition, limit: number): Promise<Subscription[]> {
    this.findDueCalls.push({ condition, limit });
    const [matches, orderOf] = dueMatcher(condition);
    return [...this.rows.values()]
      .filter(matches)
      .sort((a, b) => (orderOf(a)?.getTime() ?? 0) - (orderOf(b)?.getTime() ?? 0) || a.id.localeCompare(b.id))
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  private findOne(predicate: (row: Subscription) => boolean): Subscription | null {
    const row = [...this.rows.values()].find(predicate);
    return row ? structuredClone(row) : null;
  }
}

type Matcher = readonly [(row: Subscription) => boolean, (row: Subscription) => Date | null];

function before(value: Date | null, at: Date): boolean {
  return value !== null && value <= at;
}

function between(row: Subscription, value: Date | null, window: { from: Date; to: Date; after?: PageCursor }): boolean {
  if (value === null || value > window.to) return false;
  const { after } = window;
  if (!after) return value > window.from;
  return value > after.at || (value.getTime() === after.at.getTime() && row.id > after.id);
}

function dueMatcher(condition: DueCondition): Matcher {
  switch (condition.kind) {
    case 'trial_end_before':
      return [(r) => r.status === 'trialing' && before(r.trialEnd, condition.at), (r) => r.trialEnd];
    case 'dunning_retry_before':
      return [(r) => r.status === 'past_due' && before(r.dunningNextRetryAt, condition.at), (r) => r.dunningNextRetryAt];
    case 'pause_resume_before':
      return [(r) => r.status === 'paused' && before(r.pauseResumesAt, condition.at), (r) => r.pauseResumesAt];
    case 'trial_end_between':
      return [
        (r) => r.status === 'trialing' && between(r, r.trialEnd, condition),
        (r) => r.trialEnd,
      ];
    case 'period_end_canceling_between':
      return [
        (r) => r.status === 'active' && r.cancelAtPeriodEnd
          && between(r, r.currentPeriodEnd, condition),
        (r) => r.currentPeriodEnd,
      ];
    case 'created_between':
      return [
        (r) => (r.status === 'active' || r.status === 'trialing')
          && between(r, r.createdAt, condition),
        (r) => r.createdAt,
      ];
  }
}

// ─── In-memory Event Log ──────────────────────────────────────────

export class InMemoryEventLog implements EventLog {
  readonly processed = new Set<string>();
  readonly claims = new Set<string>();

  async tryClaim(eventId: string): Promise<ClaimResult> {
    if (this.processed.has(eventId)) return 'already_processed';
    if (this.claims.has(eventId)) return 'in_flight';
    this.claims.add(eventId);
    return 'claimed';
  }

  async markProcessed(eventId: string): Promise<void> {
    this.processed.add(eventId);
    this.claims.delete(eventId);
  }

  async release(eventId: string): Promise<void> {
    this.claims.delete(eventId);
  }
}

// ─── Recording Effect Services ────────────────────────────────────

export class RecordingTokenService implements AccessTokenService {
  readonly calls: Array<{ action: TokenAction; subscriberId: string }> = [];
  readonly active = new Map<string, boolean>();

  async activate(subscriberId: string): Promise<void> {
    this.calls.push({ action: 'activate', subscriberId });
    this.active.set(subscriberId, true);
  }

  async suspend(subscriberId: string): Promise<void> {
    this.calls.push({ action: 'suspend', subscriberId });
    this.active.set(subscriberId, false);
  }

  async revoke(subscriberId: string): Promise<void> {
    this.calls.push({ action: 'revoke', subscriberId });
    this.active.set(subscriberId, false);
  }
}

export interface SentNotification {
  template: NotificationTemplate;
  subscriberId: string;
  context: NotificationContext;
  dedupKey: string;
}

/** Dedups on (subscriber, dedupKey) like the email service. */
export class RecordingNotificationService implements NotificationService {
  readonly sent: SentNotification[] = [];
  private readonly keys = new Set<string>();
  failWith: Error | null = null;

  async send(
    template: NotificationTemplate,
    subscriberId: string,
    context: NotificationContext,
    dedupKey: string = template,
  ): Promise<SendResult> {
    if (this.failWith) throw this.failWith;
    const key = `${subscriberId}:${dedupKey}`;
    if (this.keys.has(key)) return 'duplicate';
    this.keys.add(key);
    this.sent.push({ template, subscriberId, context, dedupKey });
    return 'sent';
  }

  templates(): NotificationTemplate[] {
    return this.sent.map((n) => n.template);
  }
}

export class RecordingPaymentProvider implements PaymentProvider {
  readonly calls: Array<{ action: string; providerSubscriptionId: string }> = [];
  failWith: Error | null = null;

  async cancelSubscription(providerSubscriptionId: string, opts: { atPeriodEnd: boolean }): Promise<void> {
    this.record(opts.atPeriodEnd ? 'cancel_at_period_end' : 'cancel_immediately', providerSubscriptionId);
  }

  async retryInvoice(providerSubscriptionId: string): Promise<void> {
    this.record('retry_invoice', providerSubscriptionId);
  }

  async pauseCollection(providerSubscriptionId: string): Promise<void> {
    this.record('pause_collection', providerSubscriptionId);
  }

  async resumeCollection(providerSubscriptionId: string): Promise<void> {
    this.record('resume_collection', providerSubscriptionId);
  }

  status(): CircuitStatus {
    return { name: 'fake', state: 'CLOSED', failureCount: 0, openedAt: null };
  }

  private record(action: string, providerSubscriptionId: string): void {
    if (this.failWith) throw this.failWith;
    this.calls.push({ action, providerSubscriptionId });
  }
}

// ─── Lifecycle Harness ────────────────────────────────────────────

/**
 * Wires the real lifecycle service and dispatcher over in-memory stand-ins.
 * `clock.now` can be moved forward between calls.
 */
export function createLifecycleHarness(start: Date = TEST_NOW) {
  const clock = { now: start };
  const now = () => clock.now;
  const store = new InMemorySubscriptionStore(now);
  const tokens = new RecordingTokenService();
  const notifications = new RecordingNotificationService();
  const provider = new RecordingPaymentProvider();
  const dispatcher = new SideEffectDispatcher(tokens, notifications, provider);
  const lifecycle = new LifecycleService(store, dispatcher, { clock: now });

  return {
    clock,
    store,
    tokens,
    notifications,
    provider,
    dispatcher,
    lifecycle,
    advance(ms: number) {
      clock.now = new Date(clock.now.getTime() + ms);
    },
  };
}
