import type {
  StateTransition,
  Subscription,
  SubscriptionStatus,
  TriggerSource,
} from '../models/types.js';
import type { SubscriptionStore } from '../subscriptions/store.js';
import type { SideEffectDispatcher } from '../effects/dispatcher.js';
import type { DispatchReport, SideEffect } from '../effects/types.js';
import { createChildLogger } from '../config/logger.js';
import { creationFromCheckout, creationFromTrial, transition } from './engine.js';
import type { Creation } from './engine.js';
import { checkInvariants, checkTokenEffects } from './invariants.js';
import type { Trigger } from './triggers.js';

const log = createChildLogger('lifecycle');

const HISTORY_LIMIT = 50;

export type Locator =
  | { by: 'id'; value: string }
  | { by: 'subscriber'; value: string }
  | { by: 'provider'; value: string };

export interface ApplyOptions {
  source: TriggerSource;
  /** Decide-and-apply rounds before giving up on conflicts. Default: 3 */
  maxAttempts?: number;
  eventId?: string;
}

export type ApplyOutcome =
  | {
      kind: 'applied';
      subscription: Subscription;
      from: SubscriptionStatus | null;
      report: DispatchReport;
    }
  | { kind: 'noop'; subscription: Subscription; reason: string }
  | { kind: 'rejected'; subscription: Subscription; reason: string }
  | { kind: 'not_found' }
  | { kind: 'conflict'; attempts: number };

export type TrialOutcome =
  | { kind: 'started'; subscription: Subscription; report: DispatchReport }
  | { kind: 'exists'; subscription: Subscription | null };

export interface LifecycleServiceOptions {
  clock?: () => Date;
}

/**
 * The single apply path for every status change: load, decide, write with
 * compare-and-swap, then dispatch effects. Webhooks, subscriber actions and
 * sweeps all come through here.
 */
export class LifecycleService {
  private readonly clock: () => Date;

  constructor(
    private store: SubscriptionStore,
    private dispatcher: SideEffectDispatcher,
    opts: LifecycleServiceOptions = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
  }

  async apply(locator: Locator, trigger: Trigger, opts: ApplyOptions): Promise<ApplyOutcome> {
    const maxAttempts = opts.maxAttempts ?? 3;
    const logCtx = { locator, trigger: trigger.type, source: opts.source, eventId: opts.eventId };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const now = this.clock();
      const current = await this.locate(locator);

      if (!current) {
        if (trigger.type !== 'checkout_completed') return { kind: 'not_found' };
        const created = await this.createAndDispatch(
          creationFromCheckout(trigger, { now }),
          trigger.type,
          opts.source,
          now,
        );
        if (created) return { kind: 'applied', ...created, from: null };
        // Lost the creation race; reload and decide against the winner's record
        continue;
      }

      const decision = transition(current, trigger, { now });

      if (decision.kind === 'noop') {
        log.debug({ ...logCtx, subscriptionId: current.id, reason: decision.reason }, 'Trigger was a no-op');
        return { kind: 'noop', subscription: current, reason: decision.reason };
      }

      if (decision.kind === 'rejected') {
        log.warn({
          ...logCtx,
          alert: 'state_drift',
          subscriptionId: current.id,
          status: current.status,
          reason: decision.reason,
        }, 'Transition rejected');
        return { kind: 'rejected', subscription: current, reason: decision.reason };
      }

      const entry: StateTransition = {
        from: current.status,
        to: decision.to,
        trigger: trigger.type,
        source: opts.source,
        at: now.toISOString(),
      };

      const result = await this.store.compareAndSwap(
        current.id,
        { status: current.status, version: current.version },
        {
          ...decision.patch,
          status: decision.to,
          stateHistory: [...current.stateHistory, entry].slice(-HISTORY_LIMIT),
        },
      );

      if (result.kind === 'conflict') {
        log.info({ ...logCtx, subscriptionId: current.id, attempt }, 'Concurrent write, retrying against fresh state');
        continue;
      }

      const next = result.subscription;
      this.verify(next, current, decision.effects);

      log.info({
        ...logCtx,
        subscriptionId: next.id,
        from: current.status,
        to: next.status,
        version: next.version,
      }, 'Subscription transition applied');

      const report = await this.dispatcher.dispatch(next, decision.effects);
      return { kind: 'applied', subscription: next, from: current.status, report };
    }

    log.warn({ ...logCtx, attempts: maxAttempts }, 'Gave up after repeated write conflicts');
    return { kind: 'conflict', attempts: maxAttempts };
  }

  /** Starts the free trial for a subscriber who has never had a subscription. */
  async startTrial(subscriberId: string, planId: string): Promise<TrialOutcome> {
    const existing = await this.store.loadBySubscriberId(subscriberId);
    if (existing) return { kind: 'exists', subscription: existing };

    const now = this.clock();
    const created = await this.createAndDispatch(
      creationFromTrial(subscriberId, planId, { now }),
      'trial_started',
      'subscriber',
      now,
    );
    if (!created) {
      return { kind: 'exists', subscription: await this.store.loadBySubscriberId(subscriberId) };
    }
    return { kind: 'started', ...created };
  }

  private async createAndDispatch(
    creation: Creation,
    triggerName: string,
    source: TriggerSource,
    now: Date,
  ): Promise<{ subscription: Subscription; report: DispatchReport } | null> {
    const status = creation.values.status;
    const subscription = await this.store.create({
      ...creation.values,
      stateHistory: [{ from: null, to: status, trigger: triggerName, source, at: now.toISOString() }],
    });
    if (!subscription) return null;

    this.verify(subscription, null, creation.effects);
    log.info(
      { subscriptionId: subscription.id, subscriberId: subscription.subscriberId, status, source },
      'Subscription created',
    );

    const report = await this.dispatcher.dispatch(subscription, creation.effects);
    return { subscription, report };
  }

  private locate(locator: Locator): Promise<Subscription | null> {
    switch (locator.by) {
      case 'id':
        return this.store.load(locator.value);
      case 'subscriber':
        return this.store.loadBySubscriberId(locator.value);
      case 'provider':
        return this.store.loadByProviderSubscriptionId(locator.value);
    }
  }

  private verify(next: Subscription, previous: Subscription | null, effects: readonly SideEffect[]): void {
    const violations = checkInvariants(next, previous);
    const tokenViolation = checkTokenEffects(previous?.status ?? null, next.status, effects);
    if (tokenViolation) violations.push(tokenViolation);

    if (violations.length > 0) {
      log.error({
        alert: 'invariant_violation',
        subscriptionId: next.id,
        status: next.status,
        violations,
      }, 'Subscription invariant violated');
    }
  }
}
