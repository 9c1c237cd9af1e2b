import { Hono } from 'hono';
import { sql } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import { getRedisConnection } from '../config/queue.js';
import { createChildLogger } from '../config/logger.js';
import type { PaymentProvider } from '../effects/payment-provider.js';
import type { CircuitState } from '../effects/circuit-breaker.js';
import { withTimeout } from '../effects/timeout.js';

const log = createChildLogger('health');

type ComponentStatus = 'ok' | 'error';

interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  components: {
    database: ComponentStatus;
    redis: ComponentStatus;
    provider: CircuitState | 'not_configured';
  };
}

const COMPONENT_TIMEOUT_MS = 2000;

async function checkDatabase(db: Database): Promise<ComponentStatus> {
  try {
    await withTimeout(db.execute(sql`SELECT 1`), COMPONENT_TIMEOUT_MS, 'database check');
    return 'ok';
  } catch (err) {
    log.warn({ err }, 'Database health check failed');
    return 'error';
  }
}

async function checkRedis(): Promise<ComponentStatus> {
  try {
    await withTimeout(getRedisConnection().ping(), COMPONENT_TIMEOUT_MS, 'redis check');
    return 'ok';
  } catch (err) {
    log.warn({ err }, 'Redis health check failed');
    return 'error';
  }
}

/**
 * The database carries every status write, so losing it is unhealthy.
 * Redis only drives sweeps and an open provider circuit only delays
 * callbacks; either one degrades.
 */
export function createHealthRoutes(db: Database, provider: PaymentProvider | null) {
  const app = new Hono();

  app.get('/health', async (c) => {
    const [database, redis] = await Promise.all([checkDatabase(db), checkRedis()]);
    const providerState = provider ? provider.status().state : 'not_configured';

    let status: HealthResponse['status'];
    if (database === 'error') {
      status = 'unhealthy';
    } else if (redis === 'error' || providerState === 'OPEN') {
      status = 'degraded';
    } else {
      status = 'ok';
    }

    const response: HealthResponse = {
      status,
      version: '0.1.0',
      components: { database, redis, provider: providerState },
    };

    return c.json(response, status === 'unhealthy' ? 503 : 200);
  });

  // Readiness probe: 200 only when the stores are reachable
  app.get('/ready', async (c) => {
    const [database, redis] = await Promise.all([checkDatabase(db), checkRedis()]);
    if (database === 'ok' && redis === 'ok') {
      return c.json({ ready: true }, 200);
    }
    return c.json({ ready: false, components: { database, redis } }, 503);
  });

  return app;
}
