import type { NotificationContext } from './types.js';

export type NotificationTemplate =
  | 'welcome'
  | 'trial_started'
  | 'trial_ending_soon'
  | 'trial_ended'
  | 'dunning_notice'
  | 'dunning_final'
  | 'subscription_paused'
  | 'subscription_resumed'
  | 'cancel_scheduled'
  | 'subscription_canceled'
  | 'churn_winback'
  | 'onboarding_day1'
  | 'onboarding_day3'
  | 'onboarding_day7';

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

interface TemplateCopy {
  subject: string;
  heading: string;
  paragraphs: string[];
  cta?: { label: string; path: string };
}

type CopyBuilder = (ctx: NotificationContext) => TemplateCopy;

function str(ctx: NotificationContext, key: string, fallback = ''): string {
  const value = ctx[key];
  return value === null || value === undefined ? fallback : String(value);
}

function formatDate(value: string): string {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString().slice(0, 10);
}

// ─── Copy ──────────────────────────────────────────────────────────

const COPY: Record<NotificationTemplate, CopyBuilder> = {
  welcome: (ctx) => ({
    subject: 'Your subscription is active',
    heading: 'Welcome aboard',
    paragraphs: [`Your ${str(ctx, 'planId', 'subscription')} plan is now active.`],
    cta: { label: 'Open your account', path: '/account' },
  }),
  trial_started: (ctx) => ({
    subject: 'Your free trial has started',
    heading: 'Your trial is live',
    paragraphs: [`You have full access until ${formatDate(str(ctx, 'trialEnd'))}.`],
    cta: { label: 'Get started', path: '/account' },
  }),
  trial_ending_soon: (ctx) => ({
    subject: 'Your free trial ends soon',
    heading: 'Two days left on your trial',
    paragraphs: [
      `Your trial ends on ${formatDate(str(ctx, 'trialEnd'))}.`,
      'Subscribe now to keep your access without interruption.',
    ],
    cta: { label: 'Choose a plan', path: '/billing' },
  }),
  trial_ended: () => ({
    subject: 'Your free trial has ended',
    heading: 'Your trial has ended',
    paragraphs: ['Your access is paused until you choose a plan.'],
    cta: { label: 'Choose a plan', path: '/billing' },
  }),
  dunning_notice: (ctx) => ({
    subject: 'Action needed: payment failed',
    heading: 'We could not process your payment',
    paragraphs: [
      `Attempt ${str(ctx, 'attempt', '1')} of ${str(ctx, 'maxAttempts', '3')} failed.`,
      `We will try again on ${formatDate(str(ctx, 'nextRetryAt'))}. Please update your payment method.`,
    ],
    cta: { label: 'Update payment method', path: '/billing' },
  }),
  dunning_final: () => ({
    subject: 'Your subscription has been suspended',
    heading: 'Subscription suspended',
    paragraphs: [
      'We were unable to collect payment after several attempts.',
      'Your access has been suspended. Subscribe again at any time to restore it.',
    ],
    cta: { label: 'Restore access', path: '/billing' },
  }),
  subscription_paused: (ctx) => ({
    subject: 'Your subscription is paused',
    heading: 'Subscription paused',
    paragraphs: [`Billing is paused. Your subscription resumes on ${formatDate(str(ctx, 'resumesAt'))}.`],
    cta: { label: 'Resume now', path: '/billing' },
  }),
  subscription_resumed: () => ({
    subject: 'Welcome back',
    heading: 'Subscription resumed',
    paragraphs: ['Your subscription is active again and billing has resumed.'],
  }),
  cancel_scheduled: (ctx) => ({
    subject: 'Your cancellation is scheduled',
    heading: 'Cancellation scheduled',
    paragraphs: [`You keep access until ${formatDate(str(ctx, 'periodEnd'))}. You will not be charged again.`],
    cta: { label: 'Keep my subscription', path: '/billing' },
  }),
  subscription_canceled: () => ({
    subject: 'Your subscription has been canceled',
    heading: 'Subscription canceled',
    paragraphs: ['Your subscription has ended. We hope to see you again.'],
  }),
  churn_winback: (ctx) => ({
    subject: 'Before you go: pause instead?',
    heading: 'Need a break instead?',
    paragraphs: [
      `Your subscription ends on ${formatDate(str(ctx, 'periodEnd'))}.`,
      'You can pause for up to 90 days instead and keep your account as it is.',
    ],
    cta: { label: 'Pause my subscription', path: '/billing' },
  }),
  onboarding_day1: () => ({
    subject: 'Getting started',
    heading: 'Make the most of day one',
    paragraphs: ['Set up your profile and preferences to get personalised recommendations.'],
    cta: { label: 'Set up your profile', path: '/account' },
  }),
  onboarding_day3: () => ({
    subject: 'Tips for your first week',
    heading: 'A few things worth trying',
    paragraphs: ['Add your favourites and turn on reminders so you never miss what you care about.'],
    cta: { label: 'Explore', path: '/' },
  }),
  onboarding_day7: () => ({
    subject: 'One week in',
    heading: 'How is it going?',
    paragraphs: ['Reply to this email and tell us what would make your subscription better.'],
  }),
};

// ─── Rendering ─────────────────────────────────────────────────────

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderTemplate(
  template: NotificationTemplate,
  ctx: NotificationContext,
  baseUrl: string,
): RenderedEmail {
  const copy = COPY[template](ctx);
  const ctaUrl = copy.cta ? `${baseUrl}${copy.cta.path}` : null;

  const paragraphsHtml = copy.paragraphs
    .map((p) => `<p style="margin:0 0 12px;color:#4b5563;font-size:14px;line-height:1.5;">${escapeHtml(p)}</p>`)
    .join('\n              ');

  const ctaHtml = copy.cta && ctaUrl
    ? `<a href="${escapeHtml(ctaUrl)}" style="display:inline-block;background-color:#111827;color:#ffffff;padding:12px 32px;border-radius:6px;font-size:14px;font-weight:600;text-decoration:none;">${escapeHtml(copy.cta.label)}</a>`
    : '';

  const html = `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(copy.subject)}</title>
</head>
<body style="margin:0;padding:0;background-color:#f3f4f6;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;">
  <table width="100%" cellpadding="0" cellspacing="0" style="background-color:#f3f4f6;padding:32px 16px;">
    <tr>
      <td align="center">
        <table width="600" cellpadding="0" cellspacing="0" style="background-color:#ffffff;border-radius:8px;overflow:hidden;">
          <tr>
            <td style="padding:24px 32px 0;">
              <h2 style="margin:0 0 16px;color:#111827;font-size:18px;font-weight:600;">${escapeHtml(copy.heading)}</h2>
              ${paragraphsHtml}
            </td>
          </tr>
          <tr>
            <td style="padding:8px 32px 32px;" align="center">
              ${ctaHtml}
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;

  const textLines = [copy.heading, '', ...copy.paragraphs];
  if (copy.cta && ctaUrl) textLines.push('', `${copy.cta.label}: ${ctaUrl}`);

  return { subject: copy.subject, html, text: textLines.join('\n') };
}
