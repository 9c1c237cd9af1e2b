import type { TriggerType } from '../lifecycle/triggers.js';

export type SweepName =
  | 'trial-window'
  | 'dunning-due'
  | 'pause-window'
  | 'trial-ending-soon'
  | 'churn-winback'
  | 'onboarding-drip';

export interface SweepSchedule {
  name: SweepName;
  pattern: string;
  description: string;
  /** State-changing sweeps feed this trigger; notification sweeps have none. */
  trigger: TriggerType | null;
}

/**
 * Sweep Schedule Configuration
 *
 * Each entry is a repeatable BullMQ job. State-changing sweeps go through
 * the lifecycle service; notification sweeps only read and send email.
 */
export const SWEEP_SCHEDULES: readonly SweepSchedule[] = [
  {
    name: 'trial-window',
    // Every 15 minutes
    pattern: '*/15 * * * *',
    description: 'Expire trials past their end date',
    trigger: 'trial_window_elapsed',
  },
  {
    name: 'dunning-due',
    // Every hour at :05
    pattern: '5 * * * *',
    description: 'Advance dunning for due payment retries',
    trigger: 'dunning_retry_due',
  },
  {
    name: 'pause-window',
    // Every 15 minutes
    pattern: '*/15 * * * *',
    description: 'Resume subscriptions whose pause has ended',
    trigger: 'pause_window_elapsed',
  },
  {
    name: 'trial-ending-soon',
    // Every hour at :20
    pattern: '20 * * * *',
    description: 'Warn trials ending within 48 hours',
    trigger: null,
  },
  {
    name: 'churn-winback',
    // Daily at 10:00
    pattern: '0 10 * * *',
    description: 'Offer a pause to subscriptions about to cancel',
    trigger: null,
  },
  {
    name: 'onboarding-drip',
    // Every hour at :40
    pattern: '40 * * * *',
    description: 'Send day 1, 3 and 7 onboarding emails',
    trigger: null,
  },
];

export const SWEEP_NAMES: readonly SweepName[] = SWEEP_SCHEDULES.map((s) => s.name);

export function isSweepName(value: string): value is SweepName {
  return SWEEP_NAMES.some((name) => name === value);
}
