import type { BillingPeriod } from '../models/types.js';

export interface BillingWindow {
  start: Date;
  end: Date;
}

/** Payload carried by each trigger type. */
export interface TriggerMap {
  checkout_completed: {
    subscriberId: string;
    providerSubscriptionId: string;
    providerCustomerId: string;
    planId: string;
    billingPeriod: BillingPeriod;
    period?: BillingWindow;
  };
  payment_succeeded: { period?: BillingWindow };
  payment_failed: { invoiceUrl?: string };
  provider_canceled: {};
  provider_updated: {
    providerStatus: string;
    period?: BillingWindow;
    cancelAtPeriodEnd?: boolean;
  };
  manual_cancel_requested: { immediate: boolean; reason?: string };
  manual_pause_requested: { resumesAt?: Date };
  manual_resume_requested: {};
  trial_window_elapsed: {};
  dunning_retry_due: {};
  pause_window_elapsed: {};
}

export type TriggerType = keyof TriggerMap;

/**
 * Tagged union of triggers. `Trigger<'payment_failed'>` narrows to one
 * member; the bare `Trigger` is the whole union.
 */
export type Trigger<K extends TriggerType = TriggerType> = {
  [P in K]: { type: P } & TriggerMap[P];
}[K];

export const TRIGGER_TYPES: readonly TriggerType[] = [
  'checkout_completed',
  'payment_succeeded',
  'payment_failed',
  'provider_canceled',
  'provider_updated',
  'manual_cancel_requested',
  'manual_pause_requested',
  'manual_resume_requested',
  'trial_window_elapsed',
  'dunning_retry_due',
  'pause_window_elapsed',
];
