import { Hono } from 'hono';
import type { PolicySweepScheduler } from '../sweeps/scheduler.js';
import { isSweepName, SWEEP_NAMES } from '../sweeps/definitions.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('admin-api');

/**
 * Operator routes, mounted behind the cron key.
 *
 *   GET  /admin/sweeps            → Sweep schedules
 *   POST /admin/sweeps/:name/run  → Run one sweep iteration now
 */
export function createAdminRoutes(scheduler: PolicySweepScheduler) {
  const app = new Hono();

  app.get('/sweeps', (c) => {
    return c.json({ schedules: scheduler.getSchedules() });
  });

  app.post('/sweeps/:name/run', async (c) => {
    const name = c.req.param('name');
    if (!isSweepName(name)) {
      return c.json({ error: 'Unknown sweep', available: SWEEP_NAMES }, 404);
    }

    log.info({ sweep: name }, 'Manual sweep triggered');
    const result = await scheduler.runSweep(name);
    return c.json({ result });
  });

  return app;
}
