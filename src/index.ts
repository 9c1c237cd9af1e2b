import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { getEnv } from './config/env.js';
import { getDb, closeDb } from './config/database.js';
import { getRedisConnection, closeRedisConnection } from './config/queue.js';
import { createChildLogger } from './config/logger.js';
import { DrizzleSubscriptionStore } from './subscriptions/store.js';
import { DrizzleEventLog } from './events/event-log.js';
import { DrizzleAccessTokenService } from './effects/access-tokens.js';
import { EmailNotificationService, createTransporter } from './effects/notifications.js';
import { StripePaymentProvider, createStripeClient } from './effects/payment-provider.js';
import { SideEffectDispatcher } from './effects/dispatcher.js';
import { LifecycleService } from './lifecycle/service.js';
import { EventIngestionService } from './ingestion/processor.js';
import { PolicySweepScheduler } from './sweeps/scheduler.js';
import { createSubscriberAuth } from './middleware/auth.js';
import type { AuthEnv } from './middleware/auth.js';
import { requireCronKey } from './middleware/cron-key.js';
import { createHealthRoutes } from './api/health.js';
import { createWebhookRoutes } from './api/webhooks.js';
import { createSubscriptionRoutes } from './api/subscriptions.js';
import { createAdminRoutes } from './api/admin.js';

const log = createChildLogger('server');

// ─── Initialize ──────────────────────────────────────────────────────

const env = getEnv();
const db = getDb(env.DATABASE_URL);
const redis = getRedisConnection(env.REDIS_URL);

if (!env.WEBHOOK_SECRET) {
  log.warn('WEBHOOK_SECRET is not set: provider events are accepted WITHOUT signature verification');
}

const provider = env.STRIPE_SECRET_KEY
  ? new StripePaymentProvider(createStripeClient(env.STRIPE_SECRET_KEY), env.PROVIDER_TIMEOUT_MS)
  : null;
if (!provider) {
  log.warn('STRIPE_SECRET_KEY is not set: provider callbacks are skipped');
}

const store = new DrizzleSubscriptionStore(db);
const notifications = new EmailNotificationService(db, createTransporter(env), {
  from: env.SMTP_FROM,
  baseUrl: env.APP_BASE_URL,
});
const dispatcher = new SideEffectDispatcher(new DrizzleAccessTokenService(db), notifications, provider);
const lifecycle = new LifecycleService(store, dispatcher);

const ingestion = new EventIngestionService(
  new DrizzleEventLog(db, env.CLAIM_LEASE_SECONDS),
  lifecycle,
  { secret: env.WEBHOOK_SECRET, maxAttempts: env.CONFLICT_RETRY_LIMIT },
);

const sweeps = new PolicySweepScheduler(store, lifecycle, notifications, redis, {
  batchSize: env.SWEEP_BATCH_SIZE,
});

if (env.ENABLE_SWEEPS === 'true') {
  sweeps.start().catch((err) => {
    log.error({ err }, 'Failed to start policy sweeps, time-based transitions will not run');
  });
} else {
  log.info('Policy sweeps disabled via ENABLE_SWEEPS=false');
}

// ─── App Setup ───────────────────────────────────────────────────────

const app = new Hono();

app.use('*', cors({
  origin: [env.APP_BASE_URL],
  credentials: true,
  allowMethods: ['GET', 'POST', 'OPTIONS'],
  allowHeaders: ['Content-Type', 'Authorization'],
}));
app.use('*', honoLogger());

// Security headers
app.use('*', async (c, next) => {
  await next();
  c.header('X-Frame-Options', 'DENY');
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
});

app.route('/', createHealthRoutes(db, provider));

// Provider webhooks (no session auth, signature verified per event)
app.route('/webhooks', createWebhookRoutes(ingestion));

// Subscriber self-service
const subscriberApi = new Hono<AuthEnv>();
subscriberApi.use('*', createSubscriberAuth(env.JWT_SECRET));
subscriberApi.route('/', createSubscriptionRoutes(store, lifecycle, { maxAttempts: env.CONFLICT_RETRY_LIMIT }));
app.route('/api/v1/subscription', subscriberApi);

// Operator routes
const admin = new Hono();
admin.use('*', requireCronKey(env.CRON_KEY));
admin.route('/', createAdminRoutes(sweeps));
app.route('/admin', admin);

// ─── Error Handler ───────────────────────────────────────────────────

app.onError((err, c) => {
  log.error({ err, path: c.req.path }, 'Unhandled error');
  const isDev = env.NODE_ENV !== 'production';
  return c.json(
    { error: 'Internal server error', ...(isDev ? { message: err.message } : {}) },
    500,
  );
});

// ─── Graceful Shutdown ───────────────────────────────────────────────

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    log.warn({ signal }, 'Shutdown already in progress, ignoring');
    return;
  }
  isShuttingDown = true;

  log.info({ signal }, 'Graceful shutdown initiated');

  // 1. Stop accepting new HTTP connections
  server.close(() => {
    log.info('HTTP server closed');
  });

  // 2. Let the running sweep iteration finish, then stop scheduling
  try {
    await sweeps.stop();
  } catch (err) {
    log.error({ err }, 'Error stopping policy sweeps');
  }

  // 3. Close Redis and database connections
  await closeRedisConnection();
  try {
    await closeDb();
    log.info('Database connections closed');
  } catch (err) {
    log.error({ err }, 'Error during database shutdown');
  }

  log.info('Graceful shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// ─── Start Server ────────────────────────────────────────────────────

const server = serve({ fetch: app.fetch, port: env.PORT }, () => {
  log.info({ port: env.PORT }, `Subscription lifecycle service running on port ${env.PORT}`);
  log.info('Endpoints:');
  log.info('  GET    /health                           → Component health');
  log.info('  POST   /webhooks/provider                → Provider events');
  log.info('  GET    /api/v1/subscription              → Current subscription');
  log.info('  POST   /api/v1/subscription/trial        → Start free trial');
  log.info('  POST   /api/v1/subscription/cancel       → Cancel');
  log.info('  POST   /api/v1/subscription/pause        → Pause');
  log.info('  POST   /api/v1/subscription/resume       → Resume');
  log.info('  GET    /admin/sweeps                     → Sweep schedules');
  log.info('  POST   /admin/sweeps/:name/run           → Run a sweep now');
});

export default app;
