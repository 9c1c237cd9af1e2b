import { createMiddleware } from 'hono/factory';
import { timingSafeEqual } from 'crypto';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('cron-key');

export const CRON_KEY_HEADER = 'x-cron-key';

function keysMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Guards operator routes with a shared key. With no key configured the
 * routes are closed.
 */
export function requireCronKey(cronKey: string | undefined) {
  return createMiddleware(async (c, next) => {
    if (!cronKey) {
      log.warn({ path: c.req.path }, 'CRON_KEY not set, operator routes disabled');
      return c.json({ error: 'Operator API disabled' }, 503);
    }

    const given = c.req.header(CRON_KEY_HEADER);
    if (!given || !keysMatch(given, cronKey)) {
      return c.json({ error: 'Invalid cron key' }, 401);
    }

    await next();
  });
}
