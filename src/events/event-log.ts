import { eq, lt } from 'drizzle-orm';
import type { Database } from '../config/database.js';
import { eventClaims, processedEvents } from '../models/schema.js';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('event-log');

export type ClaimResult = 'claimed' | 'already_processed' | 'in_flight';

export interface EventLog {
  tryClaim(eventId: string, eventType: string): Promise<ClaimResult>;
  /** Call only after every side effect for the event has been dispatched. */
  markProcessed(eventId: string, eventType: string): Promise<void>;
  release(eventId: string): Promise<void>;
}

/**
 * Idempotency ledger for provider events.
 *
 * A claim is a lease row keyed by event ID. A second claimant only wins if
 * the existing lease is older than `leaseSeconds`, so a worker that crashed
 * mid-event does not block redelivery forever.
 */
export class DrizzleEventLog implements EventLog {
  constructor(
    private db: Database,
    private leaseSeconds = 300,
  ) {}

  async tryClaim(eventId: string, eventType: string): Promise<ClaimResult> {
    if (await this.isProcessed(eventId)) return 'already_processed';

    const now = new Date();
    const staleBefore = new Date(now.getTime() - this.leaseSeconds * 1000);

    const claimed = await this.db
      .insert(eventClaims)
      .values({ eventId, eventType, claimedAt: now })
      .onConflictDoUpdate({
        target: eventClaims.eventId,
        set: { claimedAt: now },
        setWhere: lt(eventClaims.claimedAt, staleBefore),
      })
      .returning({ eventId: eventClaims.eventId });

    if (claimed.length === 0) {
      // Lease held by someone else; it may have finished in the meantime
      if (await this.isProcessed(eventId)) return 'already_processed';
      log.debug({ eventId, eventType }, 'Event claim held by another worker');
      return 'in_flight';
    }

    // Processed between the first check and the claim
    if (await this.isProcessed(eventId)) {
      await this.release(eventId);
      return 'already_processed';
    }

    return 'claimed';
  }

  async markProcessed(eventId: string, eventType: string): Promise<void> {
    await this.db
      .insert(processedEvents)
      .values({ eventId, eventType })
      .onConflictDoNothing();
    await this.release(eventId);
  }

  async release(eventId: string): Promise<void> {
    await this.db.delete(eventClaims).where(eq(eventClaims.eventId, eventId));
  }

  private async isProcessed(eventId: string): Promise<boolean> {
    const [row] = await this.db
      .select({ eventId: processedEvents.eventId })
      .from(processedEvents)
      .where(eq(processedEvents.eventId, eventId))
      .limit(1);
    return row !== undefined;
  }
}
