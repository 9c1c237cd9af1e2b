import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { and, eq } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import type { Env } from '../config/env.js';
import { notificationEvents, subscribers } from '../models/schema.js';
import { createChildLogger } from '../config/logger.js';
import { renderTemplate } from './templates.js';
import type { NotificationTemplate } from './templates.js';
import type { NotificationContext } from './types.js';

const log = createChildLogger('notifications');

export type SendResult = 'sent' | 'duplicate' | 'skipped';

export interface NotificationService {
  /** `dedupKey` defaults to the template name. */
  send(
    template: NotificationTemplate,
    subscriberId: string,
    context: NotificationContext,
    dedupKey?: string,
  ): Promise<SendResult>;
}

/**
 * Builds the SMTP transporter, or returns null if SMTP is not configured.
 */
export function createTransporter(env: Env): Transporter | null {
  if (!env.SMTP_HOST || !env.SMTP_PORT) {
    log.warn('SMTP not configured, lifecycle emails are disabled');
    return null;
  }

  const transporter = nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_PORT === 465,
    auth: env.SMTP_USER && env.SMTP_PASS
      ? { user: env.SMTP_USER, pass: env.SMTP_PASS }
      : undefined,
  });

  log.info({ host: env.SMTP_HOST, port: env.SMTP_PORT }, 'SMTP transporter created');
  return transporter;
}

export interface EmailNotificationOptions {
  from: string;
  baseUrl: string;
}

/**
 * Sends lifecycle emails at most once per (subscriber, dedupKey).
 *
 * The dedup row is claimed before sending and removed again if delivery
 * fails, so a failed send can be retried by the next dispatch.
 */
export class EmailNotificationService implements NotificationService {
  constructor(
    private db: Database,
    private transporter: Transporter | null,
    private opts: EmailNotificationOptions,
  ) {}

  async send(
    template: NotificationTemplate,
    subscriberId: string,
    context: NotificationContext,
    dedupKey: string = template,
  ): Promise<SendResult> {
    const [claim] = await this.db
      .insert(notificationEvents)
      .values({ subscriberId, template, dedupKey })
      .onConflictDoNothing()
      .returning({ id: notificationEvents.id });

    if (!claim) {
      log.debug({ subscriberId, template, dedupKey }, 'Notification already sent');
      return 'duplicate';
    }

    const [subscriber] = await this.db
      .select({ email: subscribers.email })
      .from(subscribers)
      .where(eq(subscribers.id, subscriberId))
      .limit(1);

    if (!this.transporter || !subscriber) {
      log.warn(
        { subscriberId, template, hasSubscriber: Boolean(subscriber) },
        'Notification skipped, no transport or recipient',
      );
      await this.db
        .update(notificationEvents)
        .set({ status: 'skipped' })
        .where(eq(notificationEvents.id, claim.id));
      return 'skipped';
    }

    const email = renderTemplate(template, context, this.opts.baseUrl);
    try {
      await this.transporter.sendMail({
        from: this.opts.from,
        to: subscriber.email,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });
    } catch (err) {
      await this.db
        .delete(notificationEvents)
        .where(and(eq(notificationEvents.id, claim.id), eq(notificationEvents.status, 'pending')));
      throw err;
    }

    await this.db
      .update(notificationEvents)
      .set({ status: 'sent', sentAt: new Date() })
      .where(eq(notificationEvents.id, claim.id));

    log.info({ subscriberId, template, dedupKey }, 'Notification sent');
    return 'sent';
  }
}
