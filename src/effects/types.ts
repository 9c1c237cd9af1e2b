import type { NotificationTemplate } from './templates.js';

export type TokenAction = 'activate' | 'suspend' | 'revoke';

export type ProviderAction =
  | 'cancel_immediately'
  | 'cancel_at_period_end'
  | 'retry_invoice'
  | 'pause_collection'
  | 'resume_collection';

export type NotificationContext = Record<string, string | number | boolean | null>;

export type SideEffect =
  | { kind: 'access_token'; action: TokenAction }
  | {
      kind: 'notify';
      template: NotificationTemplate;
      /** Dedup scope per subscriber. Same key, same subscriber: sent once. */
      dedupKey: string;
      context: NotificationContext;
    }
  | { kind: 'provider'; action: ProviderAction };

export interface EffectOutcome {
  effect: SideEffect;
  ok: boolean;
  skipped?: boolean;
  error?: string;
}

export interface DispatchReport {
  subscriptionId: string;
  outcomes: EffectOutcome[];
  failed: number;
}
