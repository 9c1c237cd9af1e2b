import type { Subscription, SubscriptionStatus } from '../models/types.js';
import type { SideEffect } from '../effects/types.js';
import { ACCESS_STATUSES } from './engine.js';

const DUNNING_STATUSES: readonly SubscriptionStatus[] = ['past_due', 'suspended'];

export function hasAccess(status: SubscriptionStatus): boolean {
  return ACCESS_STATUSES.includes(status);
}

/**
 * Record-level invariants. Returns one message per violated rule; an empty
 * list means the record is consistent.
 */
export function checkInvariants(next: Subscription, previous?: Subscription | null): string[] {
  const violations: string[] = [];

  if (next.dunningCount !== 0 && !DUNNING_STATUSES.includes(next.status)) {
    violations.push(`dunningCount=${next.dunningCount} while ${next.status}`);
  }
  if (next.dunningCount < 0 || next.dunningCount > 3) {
    violations.push(`dunningCount out of range: ${next.dunningCount}`);
  }
  if ((next.pauseResumesAt !== null) !== (next.status === 'paused')) {
    violations.push(`pauseResumesAt inconsistent with ${next.status}`);
  }
  if ((next.pausedAt !== null) !== (next.status === 'paused')) {
    violations.push(`pausedAt inconsistent with ${next.status}`);
  }
  if ((next.canceledAt !== null) !== (next.status === 'canceled')) {
    violations.push(`canceledAt inconsistent with ${next.status}`);
  }
  if (next.isTrial && next.trialEnd === null) {
    violations.push('isTrial without trialEnd');
  }
  if (
    previous?.trialConvertedAt
    && next.trialConvertedAt?.getTime() !== previous.trialConvertedAt.getTime()
  ) {
    violations.push('trialConvertedAt changed after being set');
  }
  if (next.status === 'active' && next.providerCustomerId === null) {
    violations.push('active without providerCustomerId');
  }

  return violations;
}

/** Token state the effects leave behind, or null when none touches the token. */
export function tokenActiveAfter(effects: readonly SideEffect[]): boolean | null {
  let active: boolean | null = null;
  for (const effect of effects) {
    if (effect.kind === 'access_token') active = effect.action === 'activate';
  }
  return active;
}

/**
 * Every move into or out of the access statuses must carry a token effect
 * that lands the token on the right side.
 */
export function checkTokenEffects(
  from: SubscriptionStatus | null,
  to: SubscriptionStatus,
  effects: readonly SideEffect[],
): string | null {
  const expected = hasAccess(to);
  const crossing = from === null || hasAccess(from) !== expected;
  const actual = tokenActiveAfter(effects);

  if (actual !== null && actual !== expected) {
    return `token ${actual ? 'activated' : 'deactivated'} on move to ${to}`;
  }
  if (crossing && actual === null) {
    return `no token effect on move ${from ?? 'new'} → ${to}`;
  }
  return null;
}
