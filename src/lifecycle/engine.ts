import type {
  NewSubscription,
  Subscription,
  SubscriptionPatch,
  SubscriptionStatus,
} from '../models/types.js';
import type { NotificationContext, ProviderAction, SideEffect, TokenAction } from '../effects/types.js';
import type { NotificationTemplate } from '../effects/templates.js';
import type { BillingWindow, Trigger, TriggerType } from './triggers.js';
import { DAY_MS, MAX_DUNNING_ATTEMPTS, nextRetryAt, shouldSuspend } from './dunning.js';

/**
 * Subscription State Machine
 *
 * States:
 *   trialing → active | trial_expired
 *   active → past_due → suspended
 *   active ⇄ paused
 *   active | past_due | suspended | paused → canceled
 *   trial_expired | suspended | canceled → active (new checkout)
 *
 * `transition` is pure: it reads the record and the trigger and returns a
 * decision. Persisting the patch and running the effects is the caller's job.
 */

export const TRIAL_DAYS = 7;
export const DEFAULT_PAUSE_DAYS = 30;
export const MAX_PAUSE_DAYS = 90;

export const ACCESS_STATUSES: readonly SubscriptionStatus[] = ['active', 'trialing'];

export interface TransitionContext {
  now: Date;
}

export type Decision =
  | { kind: 'transition'; to: SubscriptionStatus; patch: SubscriptionPatch; effects: SideEffect[] }
  | { kind: 'noop'; reason: string }
  | { kind: 'rejected'; reason: string };

type Rule<K extends TriggerType> = (
  sub: Subscription,
  trigger: Trigger<K>,
  ctx: TransitionContext,
) => Decision;

type RuleSet = { [K in TriggerType]?: Rule<K> };

// ─── Effect builders ─────────────────────────────────────────────────

function token(action: TokenAction): SideEffect {
  return { kind: 'access_token', action };
}

function provider(action: ProviderAction): SideEffect {
  return { kind: 'provider', action };
}

/**
 * Transition notices are keyed on the version the write will produce, so
 * each applied transition sends at most one notice.
 */
function notice(
  sub: Subscription,
  template: NotificationTemplate,
  context: NotificationContext = {},
): SideEffect {
  return { kind: 'notify', template, dedupKey: `${template}:v${sub.version + 1}`, context };
}

function noop(reason: string): Decision {
  return { kind: 'noop', reason };
}

function rejected(reason: string): Decision {
  return { kind: 'rejected', reason };
}

function periodPatch(period: BillingWindow | undefined): SubscriptionPatch {
  return period ? { currentPeriodStart: period.start, currentPeriodEnd: period.end } : {};
}

function periodDiffers(sub: Subscription, period: BillingWindow | undefined): period is BillingWindow {
  return period !== undefined && (
    sub.currentPeriodStart?.getTime() !== period.start.getTime()
    || sub.currentPeriodEnd?.getTime() !== period.end.getTime()
  );
}

const CLEARED_DUNNING = { dunningCount: 0, dunningNextRetryAt: null } satisfies SubscriptionPatch;
const CLEARED_PAUSE = { pausedAt: null, pauseResumesAt: null } satisfies SubscriptionPatch;

// ─── Shared rules ────────────────────────────────────────────────────

const checkoutCompleted: Rule<'checkout_completed'> = (sub, trigger, ctx) => {
  const converting = sub.status === 'trialing';
  return {
    kind: 'transition',
    to: 'active',
    patch: {
      planId: trigger.planId,
      billingPeriod: trigger.billingPeriod,
      providerSubscriptionId: trigger.providerSubscriptionId,
      providerCustomerId: trigger.providerCustomerId,
      ...periodPatch(trigger.period),
      ...CLEARED_DUNNING,
      ...CLEARED_PAUSE,
      isTrial: false,
      trialConvertedAt: converting ? (sub.trialConvertedAt ?? ctx.now) : sub.trialConvertedAt,
      cancelAtPeriodEnd: false,
      canceledAt: null,
      cancellationReason: null,
    },
    effects: [token('activate'), notice(sub, 'welcome', { planId: trigger.planId })],
  };
};

const providerCanceled: Rule<'provider_canceled'> = (sub, _trigger, ctx) => ({
  kind: 'transition',
  to: 'canceled',
  patch: {
    ...CLEARED_DUNNING,
    ...CLEARED_PAUSE,
    canceledAt: ctx.now,
    cancelAtPeriodEnd: false,
  },
  effects: [token('revoke'), notice(sub, 'subscription_canceled')],
});

/** Provider statuses that agree with each local status. */
const PROVIDER_STATUS_COMPAT: Record<SubscriptionStatus, readonly string[]> = {
  trialing: ['trialing'],
  active: ['active'],
  past_due: ['past_due', 'unpaid'],
  suspended: ['past_due', 'unpaid'],
  paused: ['active', 'paused'],
  canceled: [],
  trial_expired: [],
};

const providerUpdated: Rule<'provider_updated'> = (sub, trigger, ctx) => {
  if (trigger.providerStatus === 'canceled') {
    if (sub.status === 'canceled') return noop('already canceled');
    const cancelRule = TRANSITIONS[sub.status].provider_canceled;
    return cancelRule
      ? cancelRule(sub, { type: 'provider_canceled' }, ctx)
      : rejected(`provider reports canceled while ${sub.status}`);
  }

  if (!PROVIDER_STATUS_COMPAT[sub.status].includes(trigger.providerStatus)) {
    return rejected(`provider reports ${trigger.providerStatus} while ${sub.status}`);
  }

  const periodChanged = periodDiffers(sub, trigger.period);
  const cancelChanged = sub.status === 'active'
    && trigger.cancelAtPeriodEnd !== undefined
    && trigger.cancelAtPeriodEnd !== sub.cancelAtPeriodEnd;

  if (!periodChanged && !cancelChanged) return noop('in sync with provider');

  const patch: SubscriptionPatch = { ...periodPatch(trigger.period) };
  if (cancelChanged) patch.cancelAtPeriodEnd = trigger.cancelAtPeriodEnd;
  return { kind: 'transition', to: sub.status, patch, effects: [] };
};

// ─── Transition table ────────────────────────────────────────────────

export const TRANSITIONS: Record<SubscriptionStatus, RuleSet> = {
  trialing: {
    checkout_completed: checkoutCompleted,
    trial_window_elapsed: (sub, _trigger, ctx) => {
      if (!sub.trialEnd || sub.trialEnd > ctx.now) return noop('trial window not yet elapsed');
      return {
        kind: 'transition',
        to: 'trial_expired',
        patch: { isTrial: false },
        effects: [token('suspend'), notice(sub, 'trial_ended')],
      };
    },
    provider_updated: providerUpdated,
  },

  active: {
    payment_succeeded: (sub, trigger) => {
      if (!periodDiffers(sub, trigger.period)) return noop('period already current');
      return { kind: 'transition', to: 'active', patch: periodPatch(trigger.period), effects: [] };
    },
    payment_failed: (sub, trigger, ctx) => {
      const retryAt = nextRetryAt(1, ctx.now);
      return {
        kind: 'transition',
        to: 'past_due',
        patch: { dunningCount: 1, dunningNextRetryAt: retryAt },
        effects: [
          token('suspend'),
          notice(sub, 'dunning_notice', {
            attempt: 1,
            maxAttempts: MAX_DUNNING_ATTEMPTS,
            nextRetryAt: retryAt.toISOString(),
            invoiceUrl: trigger.invoiceUrl ?? null,
          }),
        ],
      };
    },
    provider_canceled: providerCanceled,
    provider_updated: providerUpdated,
    manual_cancel_requested: (sub, trigger, ctx) => {
      if (trigger.immediate) {
        return {
          kind: 'transition',
          to: 'canceled',
          patch: {
            canceledAt: ctx.now,
            cancelAtPeriodEnd: false,
            cancellationReason: trigger.reason ?? null,
          },
          effects: [
            token('revoke'),
            provider('cancel_immediately'),
            notice(sub, 'subscription_canceled'),
          ],
        };
      }
      if (sub.cancelAtPeriodEnd) return rejected('cancellation already scheduled');
      return {
        kind: 'transition',
        to: 'active',
        patch: { cancelAtPeriodEnd: true, cancellationReason: trigger.reason ?? null },
        effects: [
          provider('cancel_at_period_end'),
          notice(sub, 'cancel_scheduled', {
            periodEnd: sub.currentPeriodEnd ? sub.currentPeriodEnd.toISOString() : null,
          }),
        ],
      };
    },
    manual_pause_requested: (sub, trigger, ctx) => {
      const latest = ctx.now.getTime() + MAX_PAUSE_DAYS * DAY_MS;
      const resumesAt = trigger.resumesAt ?? new Date(ctx.now.getTime() + DEFAULT_PAUSE_DAYS * DAY_MS);
      if (resumesAt <= ctx.now) return rejected('resume date must be in the future');
      if (resumesAt.getTime() > latest) return rejected(`pause cannot exceed ${MAX_PAUSE_DAYS} days`);
      return {
        kind: 'transition',
        to: 'paused',
        patch: { pausedAt: ctx.now, pauseResumesAt: resumesAt },
        effects: [
          token('suspend'),
          provider('pause_collection'),
          notice(sub, 'subscription_paused', { resumesAt: resumesAt.toISOString() }),
        ],
      };
    },
  },

  past_due: {
    dunning_retry_due: (sub, _trigger, ctx) => {
      if (!sub.dunningNextRetryAt || sub.dunningNextRetryAt > ctx.now) {
        return noop('dunning retry not yet due');
      }
      if (shouldSuspend(sub.dunningCount)) {
        return {
          kind: 'transition',
          to: 'suspended',
          patch: { dunningNextRetryAt: null },
          effects: [
            token('suspend'),
            provider('cancel_immediately'),
            notice(sub, 'dunning_final'),
          ],
        };
      }
      const attempt = sub.dunningCount + 1;
      const retryAt = nextRetryAt(attempt, ctx.now);
      return {
        kind: 'transition',
        to: 'past_due',
        patch: { dunningCount: attempt, dunningNextRetryAt: retryAt },
        effects: [
          provider('retry_invoice'),
          notice(sub, 'dunning_notice', {
            attempt,
            maxAttempts: MAX_DUNNING_ATTEMPTS,
            nextRetryAt: retryAt.toISOString(),
            invoiceUrl: null,
          }),
        ],
      };
    },
    payment_succeeded: (_sub, trigger) => ({
      kind: 'transition',
      to: 'active',
      patch: { ...CLEARED_DUNNING, ...periodPatch(trigger.period) },
      effects: [token('activate')],
    }),
    // Dunning only advances on the sweep, so provider retry failures never double count
    payment_failed: () => noop('already in dunning'),
    provider_canceled: providerCanceled,
    provider_updated: providerUpdated,
  },

  suspended: {
    payment_succeeded: () => rejected('payment succeeded while suspended'),
    payment_failed: () => noop('already suspended'),
    provider_canceled: providerCanceled,
    provider_updated: providerUpdated,
    checkout_completed: checkoutCompleted,
  },

  paused: {
    manual_resume_requested: (sub) => resume(sub),
    pause_window_elapsed: (sub, _trigger, ctx) => {
      if (!sub.pauseResumesAt || sub.pauseResumesAt > ctx.now) return noop('pause window not yet elapsed');
      return resume(sub);
    },
    provider_canceled: providerCanceled,
    provider_updated: providerUpdated,
  },

  canceled: {
    checkout_completed: checkoutCompleted,
    payment_succeeded: () => rejected('payment succeeded while canceled'),
    provider_canceled: () => noop('already canceled'),
    provider_updated: providerUpdated,
  },

  trial_expired: {
    checkout_completed: checkoutCompleted,
    provider_updated: providerUpdated,
  },
};

function resume(sub: Subscription): Decision {
  return {
    kind: 'transition',
    to: 'active',
    patch: { ...CLEARED_PAUSE },
    effects: [
      token('activate'),
      provider('resume_collection'),
      notice(sub, 'subscription_resumed'),
    ],
  };
}

// ─── Entry points ────────────────────────────────────────────────────

function applyRule<K extends TriggerType>(
  rules: RuleSet,
  type: K,
  sub: Subscription,
  trigger: Trigger<K>,
  ctx: TransitionContext,
): Decision | null {
  const rule = rules[type];
  return rule ? rule(sub, trigger, ctx) : null;
}

/** Sweep triggers: a record that has moved on since it was found is not drift. */
const TIME_TRIGGERS: readonly TriggerType[] = [
  'trial_window_elapsed',
  'dunning_retry_due',
  'pause_window_elapsed',
];

export function transition(
  sub: Subscription,
  trigger: Trigger,
  ctx: TransitionContext,
): Decision {
  const decision = applyRule(TRANSITIONS[sub.status], trigger.type, sub, trigger, ctx);
  if (decision) return decision;
  if (TIME_TRIGGERS.includes(trigger.type)) {
    return noop(`${trigger.type} no longer applies while ${sub.status}`);
  }
  return rejected(`no transition for ${trigger.type} while ${sub.status}`);
}

export interface Creation {
  values: NewSubscription;
  effects: SideEffect[];
}

/** First checkout for a subscriber with no record yet. */
export function creationFromCheckout(
  trigger: Trigger<'checkout_completed'>,
  ctx: TransitionContext,
): Creation {
  return {
    values: {
      subscriberId: trigger.subscriberId,
      planId: trigger.planId,
      billingPeriod: trigger.billingPeriod,
      status: 'active',
      providerSubscriptionId: trigger.providerSubscriptionId,
      providerCustomerId: trigger.providerCustomerId,
      currentPeriodStart: trigger.period?.start ?? ctx.now,
      currentPeriodEnd: trigger.period?.end ?? null,
      stateHistory: [],
    },
    effects: [
      token('activate'),
      { kind: 'notify', template: 'welcome', dedupKey: 'welcome:v1', context: { planId: trigger.planId } },
    ],
  };
}

export function creationFromTrial(
  subscriberId: string,
  planId: string,
  ctx: TransitionContext,
): Creation {
  const trialEnd = new Date(ctx.now.getTime() + TRIAL_DAYS * DAY_MS);
  return {
    values: {
      subscriberId,
      planId,
      status: 'trialing',
      isTrial: true,
      trialStart: ctx.now,
      trialEnd,
      stateHistory: [],
    },
    effects: [
      token('activate'),
      {
        kind: 'notify',
        template: 'trial_started',
        dedupKey: 'trial_started',
        context: { trialEnd: trialEnd.toISOString() },
      },
    ],
  };
}
