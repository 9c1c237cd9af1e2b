import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import type { SubscriptionStore } from '../subscriptions/store.js';
import type { ApplyOutcome, LifecycleService } from '../lifecycle/service.js';
import type { Trigger } from '../lifecycle/triggers.js';
import type { Subscription } from '../models/types.js';
import type { AuthEnv } from '../middleware/auth.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('subscription-api');

const trialSchema = z.object({
  planId: z.string().min(1).max(100),
});

const cancelSchema = z.object({
  immediate: z.boolean().default(false),
  reason: z.string().max(500).optional(),
});

const pauseSchema = z.object({
  // ISO date (2025-03-01) or full timestamp
  resumeAt: z.string().refine((v) => !Number.isNaN(Date.parse(v)), 'Invalid date').optional(),
});

/** Public shape of a subscription; internal bookkeeping stays out. */
export function toSubscriptionView(sub: Subscription) {
  return {
    id: sub.id,
    planId: sub.planId,
    billingPeriod: sub.billingPeriod,
    status: sub.status,
    isTrial: sub.isTrial,
    trialEnd: sub.trialEnd,
    currentPeriodStart: sub.currentPeriodStart,
    currentPeriodEnd: sub.currentPeriodEnd,
    cancelAtPeriodEnd: sub.cancelAtPeriodEnd,
    canceledAt: sub.canceledAt,
    pausedAt: sub.pausedAt,
    pauseResumesAt: sub.pauseResumesAt,
    dunningCount: sub.dunningCount,
    dunningNextRetryAt: sub.dunningNextRetryAt,
  };
}

async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Subscriber self-service.
 *
 *   GET  /api/v1/subscription
 *   POST /api/v1/subscription/trial
 *   POST /api/v1/subscription/cancel
 *   POST /api/v1/subscription/pause
 *   POST /api/v1/subscription/resume
 *
 * Requires the subscriber auth middleware upstream.
 */
export function createSubscriptionRoutes(
  store: SubscriptionStore,
  lifecycle: LifecycleService,
  opts: { maxAttempts: number },
) {
  const app = new Hono<AuthEnv>();

  const respond = (c: Context<AuthEnv>, outcome: ApplyOutcome) => {
    switch (outcome.kind) {
      case 'applied':
      case 'noop':
        return c.json({ subscription: toSubscriptionView(outcome.subscription) }, 200);
      case 'rejected':
        return c.json({ error: 'ineligible', reason: outcome.reason }, 422);
      case 'not_found':
        return c.json({ error: 'No subscription found' }, 404);
      case 'conflict':
        return c.json({ error: 'conflict', message: 'Subscription changed concurrently, try again' }, 409);
    }
  };

  const act = async (c: Context<AuthEnv>, trigger: Trigger) => {
    const { subscriberId } = c.get('auth');
    const outcome = await lifecycle.apply(
      { by: 'subscriber', value: subscriberId },
      trigger,
      { source: 'subscriber', maxAttempts: opts.maxAttempts },
    );
    log.info({ subscriberId, trigger: trigger.type, outcome: outcome.kind }, 'Subscriber action handled');
    return respond(c, outcome);
  };

  app.get('/', async (c) => {
    const { subscriberId } = c.get('auth');
    const sub = await store.loadBySubscriberId(subscriberId);
    if (!sub) return c.json({ error: 'No subscription found' }, 404);
    return c.json({ subscription: toSubscriptionView(sub) });
  });

  app.post('/trial', async (c) => {
    const parsed = trialSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.flatten().fieldErrors }, 400);
    }

    const { subscriberId } = c.get('auth');
    const outcome = await lifecycle.startTrial(subscriberId, parsed.data.planId);
    if (outcome.kind === 'exists') {
      return c.json({ error: 'already_subscribed', message: 'A subscription already exists for this account' }, 409);
    }
    return c.json({ subscription: toSubscriptionView(outcome.subscription) }, 200);
  });

  app.post('/cancel', async (c) => {
    const parsed = cancelSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.flatten().fieldErrors }, 400);
    }
    return act(c, {
      type: 'manual_cancel_requested',
      immediate: parsed.data.immediate,
      reason: parsed.data.reason,
    });
  });

  app.post('/pause', async (c) => {
    const parsed = pauseSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.flatten().fieldErrors }, 400);
    }
    const { resumeAt } = parsed.data;
    return act(c, {
      type: 'manual_pause_requested',
      resumesAt: resumeAt ? new Date(resumeAt) : undefined,
    });
  });

  app.post('/resume', (c) => act(c, { type: 'manual_resume_requested' }));

  return app;
}
