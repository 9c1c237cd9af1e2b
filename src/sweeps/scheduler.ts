import type { Job, Queue, Worker } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';
import { createQueue, createWorker, QUEUE_NAMES } from '../config/queue.js';
import { createChildLogger } from '../config/logger.js';
import type { DueCondition, SubscriptionStore } from '../subscriptions/store.js';
import type { LifecycleService } from '../lifecycle/service.js';
import type { NotificationService } from '../effects/notifications.js';
import type { NotificationTemplate } from '../effects/templates.js';
import type { NotificationContext } from '../effects/types.js';
import type { Subscription } from '../models/types.js';
import type { Trigger } from '../lifecycle/triggers.js';
import { DAY_MS } from '../lifecycle/dunning.js';
import { SWEEP_SCHEDULES } from './definitions.js';
import type { SweepName, SweepSchedule } from './definitions.js';

const log = createChildLogger('sweep-scheduler');

const HOUR_MS = 60 * 60 * 1000;
const TRIAL_WARNING_MS = 48 * HOUR_MS;
const WINBACK_FROM_DAYS = 2;
const WINBACK_TO_DAYS = 4;
const ONBOARDING_DAYS = [1, 3, 7] as const;
// Runs hourly; a two-hour slice still covers one missed run
const ONBOARDING_SLICE_MS = 2 * HOUR_MS;
const MAX_PAGES = 20;

// ─── Job Data Types ──────────────────────────────────────────────────

export interface SweepJobData {
  sweep: SweepName;
  scheduledAt: string;
}

export interface SweepResult {
  name: SweepName;
  scanned: number;
  applied: number;
  noop: number;
  rejected: number;
  conflicts: number;
  notified: number;
  failed: number;
  durationMs: number;
}

export interface SweepSchedulerOptions {
  batchSize: number;
  clock?: () => Date;
}

interface NotificationPlan {
  template: NotificationTemplate;
  dedupKey: string;
  context: NotificationContext;
}

function emptyResult(name: SweepName): SweepResult {
  return { name, scanned: 0, applied: 0, noop: 0, rejected: 0, conflicts: 0, notified: 0, failed: 0, durationMs: 0 };
}

/**
 * Policy Sweep Scheduler
 *
 * Turns elapsed time into lifecycle triggers. State-changing sweeps use the
 * same compare-and-swap apply path as webhooks, so a sweep racing an event
 * loses cleanly and is picked up again on the next iteration. Notification
 * sweeps never write subscription state.
 */
export class PolicySweepScheduler {
  private queue: Queue | null = null;
  private worker: Worker<SweepJobData, SweepResult> | null = null;
  private readonly clock: () => Date;

  constructor(
    private store: SubscriptionStore,
    private lifecycle: LifecycleService,
    private notifications: NotificationService,
    private connection: IORedis | null,
    private opts: SweepSchedulerOptions,
  ) {
    this.clock = opts.clock ?? (() => new Date());
  }

  getSchedules(): readonly SweepSchedule[] {
    return SWEEP_SCHEDULES;
  }

  /**
   * Register repeatable jobs, dropping any left over from older schedules,
   * and start the worker that executes them.
   */
  async start(): Promise<void> {
    if (!this.connection) throw new Error('Sweep scheduler needs a Redis connection to start');
    if (this.queue) return;

    const queue = createQueue(QUEUE_NAMES.POLICY_SWEEPS, this.connection);
    this.queue = queue;

    const existing = await queue.getRepeatableJobs();
    const current = new Set<string>(SWEEP_SCHEDULES.map((s) => s.name));
    for (const job of existing) {
      if (!current.has(job.name)) {
        await queue.removeRepeatableByKey(job.key);
        log.info({ name: job.name }, 'Removed stale repeatable job');
      }
    }

    for (const schedule of SWEEP_SCHEDULES) {
      const data: SweepJobData = { sweep: schedule.name, scheduledAt: new Date().toISOString() };
      await queue.add(schedule.name, data, { repeat: { pattern: schedule.pattern } });
      log.info({ name: schedule.name, cron: schedule.pattern }, `Scheduled: ${schedule.description}`);
    }

    this.worker = createWorker<SweepJobData, SweepResult>(
      QUEUE_NAMES.POLICY_SWEEPS,
      this.connection,
      (job: Job<SweepJobData, SweepResult>) => this.runSweep(job.data.sweep),
    );

    log.info({ totalSchedules: SWEEP_SCHEDULES.length }, 'Policy sweeps started');
  }

  /** Stops taking new iterations and waits for the running one to finish. */
  async stop(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    if (this.queue) {
      await this.queue.close();
      this.queue = null;
    }
    log.info('Policy sweeps stopped');
  }

  /** Runs one iteration of a sweep inline. */
  async runSweep(name: SweepName): Promise<SweepResult> {
    const started = Date.now();
    const now = this.clock();
    const result = emptyResult(name);

    switch (name) {
      case 'trial-window':
        await this.transitionSweep(result, { kind: 'trial_end_before', at: now }, { type: 'trial_window_elapsed' });
        break;
      case 'dunning-due':
        await this.transitionSweep(result, { kind: 'dunning_retry_before', at: now }, { type: 'dunning_retry_due' });
        break;
      case 'pause-window':
        await this.transitionSweep(result, { kind: 'pause_resume_before', at: now }, { type: 'pause_window_elapsed' });
        break;
      case 'trial-ending-soon':
        await this.notificationSweep(
          result,
          { kind: 'trial_end_between', from: now, to: new Date(now.getTime() + TRIAL_WARNING_MS) },
          (sub) => sub.trialEnd,
          (sub) => sub.trialEnd && {
            template: 'trial_ending_soon',
            dedupKey: `trial_ending_soon:${sub.trialEnd.toISOString()}`,
            context: { trialEnd: sub.trialEnd.toISOString() },
          },
        );
        break;
      case 'churn-winback':
        await this.notificationSweep(
          result,
          {
            kind: 'period_end_canceling_between',
            from: new Date(now.getTime() + WINBACK_FROM_DAYS * DAY_MS),
            to: new Date(now.getTime() + WINBACK_TO_DAYS * DAY_MS),
          },
          (sub) => sub.currentPeriodEnd,
          (sub) => sub.currentPeriodEnd && {
            template: 'churn_winback',
            dedupKey: `churn_winback:${sub.currentPeriodEnd.toISOString()}`,
            context: { periodEnd: sub.currentPeriodEnd.toISOString() },
          },
        );
        break;
      case 'onboarding-drip':
        for (const day of ONBOARDING_DAYS) {
          const sliceEnd = now.getTime() - day * DAY_MS;
          await this.notificationSweep(
            result,
            { kind: 'created_between', from: new Date(sliceEnd - ONBOARDING_SLICE_MS), to: new Date(sliceEnd) },
            (sub) => sub.createdAt,
            (sub) => onboardingPlan(sub, day),
          );
        }
        break;
    }

    result.durationMs = Date.now() - started;
    log.info({ ...result }, 'Sweep iteration complete');
    return result;
  }

  // ─── Sweep kinds ───────────────────────────────────────────────────

  private async transitionSweep(result: SweepResult, condition: DueCondition, trigger: Trigger): Promise<void> {
    for (let page = 0; page < MAX_PAGES; page++) {
      const due = await this.store.findDue(condition, this.opts.batchSize);
      result.scanned += due.length;
      const appliedBefore = result.applied;

      for (const sub of due) {
        try {
          const outcome = await this.lifecycle.apply(
            { by: 'id', value: sub.id },
            trigger,
            { source: 'sweep', maxAttempts: 1 },
          );
          switch (outcome.kind) {
            case 'applied': result.applied++; break;
            case 'noop': result.noop++; break;
            case 'rejected': result.rejected++; break;
            case 'conflict': result.conflicts++; break;
            case 'not_found': result.noop++; break;
          }
        } catch (err) {
          result.failed++;
          log.error({ err, sweep: result.name, subscriptionId: sub.id }, 'Sweep failed for subscription');
        }
      }

      // Applied records leave the due set; stop when a page made no progress
      if (due.length < this.opts.batchSize || result.applied === appliedBefore) return;
    }
  }

  /**
   * Pages through the whole window on (ordering column, id), so rows sharing
   * a timestamp across a page boundary are all visited. The cursor only moves
   * forward, so the walk ends at the last row of the window.
   */
  private async notificationSweep(
    result: SweepResult,
    window: Extract<DueCondition, { from: Date; to: Date }>,
    cursorOf: (sub: Subscription) => Date | null,
    plan: (sub: Subscription) => NotificationPlan | null,
  ): Promise<void> {
    let condition = window;
    for (;;) {
      const rows = await this.store.findDue(condition, this.opts.batchSize);
      result.scanned += rows.length;

      for (const sub of rows) {
        const planned = plan(sub);
        if (!planned) continue;
        try {
          const sent = await this.notifications.send(planned.template, sub.subscriberId, planned.context, planned.dedupKey);
          if (sent === 'sent') result.notified++;
        } catch (err) {
          result.failed++;
          log.error({ err, sweep: result.name, subscriptionId: sub.id }, 'Sweep notification failed');
        }
      }

      const last = rows[rows.length - 1];
      const at = last ? cursorOf(last) : null;
      if (rows.length < this.opts.batchSize || !last || !at) return;
      condition = { ...condition, after: { at, id: last.id } };
    }
  }
}

function onboardingPlan(sub: Subscription, day: (typeof ONBOARDING_DAYS)[number]): NotificationPlan {
  const template: NotificationTemplate = `onboarding_day${day}`;
  return { template, dedupKey: template, context: { planId: sub.planId } };
}
