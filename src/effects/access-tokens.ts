import { and, desc, eq, isNull, ne } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import { accessTokens } from '../models/schema.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('access-tokens');

export interface AccessTokenService {
  activate(subscriberId: string): Promise<void>;
  suspend(subscriberId: string): Promise<void>;
  revoke(subscriberId: string): Promise<void>;
}

/**
 * Flips the subscriber's API tokens. Issuance happens elsewhere; a
 * subscriber with no token yet is logged and left alone.
 */
export class DrizzleAccessTokenService implements AccessTokenService {
  constructor(private db: Database) {}

  /** Reactivates the newest unrevoked token and keeps every other one off. */
  async activate(subscriberId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [latest] = await tx
        .select({ id: accessTokens.id })
        .from(accessTokens)
        .where(and(eq(accessTokens.subscriberId, subscriberId), isNull(accessTokens.revokedAt)))
        .orderBy(desc(accessTokens.createdAt))
        .limit(1);

      if (!latest) {
        log.warn({ subscriberId }, 'No unrevoked access token to activate');
        return;
      }

      await tx
        .update(accessTokens)
        .set({ isActive: false })
        .where(and(eq(accessTokens.subscriberId, subscriberId), ne(accessTokens.id, latest.id)));

      await tx
        .update(accessTokens)
        .set({ isActive: true })
        .where(eq(accessTokens.id, latest.id));
    });
    log.info({ subscriberId }, 'Access token activated');
  }

  async suspend(subscriberId: string): Promise<void> {
    await this.db
      .update(accessTokens)
      .set({ isActive: false })
      .where(eq(accessTokens.subscriberId, subscriberId));
    log.info({ subscriberId }, 'Access tokens suspended');
  }

  async revoke(subscriberId: string): Promise<void> {
    await this.db
      .update(accessTokens)
      .set({ isActive: false, revokedAt: new Date() })
      .where(and(eq(accessTokens.subscriberId, subscriberId), isNull(accessTokens.revokedAt)));
    log.info({ subscriberId }, 'Access tokens revoked');
  }
}
