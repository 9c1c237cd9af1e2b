import type { Subscription } from '../models/types.js';
import { createChildLogger } from '../config/logger.js';
import type { AccessTokenService } from './access-tokens.js';
import type { NotificationService } from './notifications.js';
import type { PaymentProvider } from './payment-provider.js';
import type { DispatchReport, EffectOutcome, ProviderAction, SideEffect } from './types.js';

const log = createChildLogger('effect-dispatcher');

/**
 * Runs the effects of an applied transition in order.
 *
 * Effects are best effort: the status write has already happened and is
 * never rolled back. Every failure is logged and reported, none is thrown.
 */
export class SideEffectDispatcher {
  constructor(
    private tokens: AccessTokenService,
    private notifications: NotificationService,
    private provider: PaymentProvider | null,
  ) {}

  async dispatch(subscription: Subscription, effects: readonly SideEffect[]): Promise<DispatchReport> {
    const outcomes: EffectOutcome[] = [];

    for (const effect of effects) {
      try {
        const skipped = await this.run(subscription, effect);
        outcomes.push(skipped ? { effect, ok: true, skipped: true } : { effect, ok: true });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        outcomes.push({ effect, ok: false, error: message });

        if (effect.kind === 'provider') {
          log.error({
            alert: 'provider_out_of_sync',
            subscriptionId: subscription.id,
            providerSubscriptionId: subscription.providerSubscriptionId,
            action: effect.action,
            status: subscription.status,
            err: message,
          }, 'Provider callback failed, provider may be out of sync');
        } else {
          log.error({
            subscriptionId: subscription.id,
            effect: effect.kind,
            err: message,
          }, 'Side effect failed');
        }
      }
    }

    const failed = outcomes.filter((o) => !o.ok).length;
    return { subscriptionId: subscription.id, outcomes, failed };
  }

  /** Returns true when the effect was skipped rather than performed. */
  private async run(sub: Subscription, effect: SideEffect): Promise<boolean> {
    switch (effect.kind) {
      case 'access_token':
        await this.tokens[effect.action](sub.subscriberId);
        return false;
      case 'notify': {
        const result = await this.notifications.send(
          effect.template,
          sub.subscriberId,
          effect.context,
          effect.dedupKey,
        );
        return result !== 'sent';
      }
      case 'provider':
        return this.callProvider(sub, effect.action);
    }
  }

  private async callProvider(sub: Subscription, action: ProviderAction): Promise<boolean> {
    const providerSubscriptionId = sub.providerSubscriptionId;
    if (!this.provider || !providerSubscriptionId) {
      log.warn(
        { subscriptionId: sub.id, action, configured: this.provider !== null },
        'Provider callback skipped',
      );
      return true;
    }

    switch (action) {
      case 'cancel_immediately':
        await this.provider.cancelSubscription(providerSubscriptionId, { atPeriodEnd: false });
        break;
      case 'cancel_at_period_end':
        await this.provider.cancelSubscription(providerSubscriptionId, { atPeriodEnd: true });
        break;
      case 'retry_invoice':
        await this.provider.retryInvoice(providerSubscriptionId);
        break;
      case 'pause_collection':
        await this.provider.pauseCollection(providerSubscriptionId);
        break;
      case 'resume_collection':
        await this.provider.resumeCollection(providerSubscriptionId);
        break;
    }
    return false;
  }
}
