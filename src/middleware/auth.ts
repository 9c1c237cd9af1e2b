import { createMiddleware } from 'hono/factory';
import * as jose from 'jose';
import { z } from 'zod';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('auth');

export type SubscriberAuth = {
  subscriberId: string;
};

export type AuthEnv = { Variables: { auth: SubscriberAuth } };

const subjectSchema = z.string().uuid();

/**
 * Subscriber session authentication.
 *
 * Sessions are HS256 JWTs issued by the auth service:
 *   Authorization: Bearer <jwt>
 *
 * The `sub` claim is the subscriber ID (a UUID).
 */
export function createSubscriberAuth(jwtSecret: string) {
  const key = new TextEncoder().encode(jwtSecret);

  return createMiddleware<AuthEnv>(async (c, next) => {
    const authHeader = c.req.header('Authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json({ error: 'Missing or invalid Authorization header' }, 401);
    }

    let subscriberId: string | undefined;
    try {
      const { payload } = await jose.jwtVerify(authHeader.slice(7), key, { algorithms: ['HS256'] });
      subscriberId = payload.sub;
    } catch (err) {
      log.debug({ err }, 'Session token rejected');
      return c.json({ error: 'Invalid or expired token' }, 401);
    }

    if (!subscriberId) {
      return c.json({ error: 'Token has no subject' }, 401);
    }

    const subject = subjectSchema.safeParse(subscriberId);
    if (!subject.success) {
      log.debug({ subject: subscriberId }, 'Session subject is not a subscriber id');
      return c.json({ error: 'Invalid token subject' }, 401);
    }

    c.set('auth', { subscriberId: subject.data });
    await next();
  });
}
