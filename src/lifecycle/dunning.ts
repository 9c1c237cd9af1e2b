/**
 * Dunning backoff schedule.
 *
 * A failed renewal opens dunning at attempt 1. Each due retry bumps the
 * attempt; once the count reaches MAX_DUNNING_ATTEMPTS the next due retry
 * suspends instead of rescheduling.
 */

export const MAX_DUNNING_ATTEMPTS = 3;

export const DAY_MS = 24 * 60 * 60 * 1000;

const RETRY_DELAY_DAYS = [3, 7, 14] as const;

/** Delay in milliseconds before the retry that follows `attempt`. */
export function nextRetryDelay(attempt: number): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`Dunning attempt must be a positive integer, got ${attempt}`);
  }
  const index = Math.min(attempt, RETRY_DELAY_DAYS.length) - 1;
  return RETRY_DELAY_DAYS[index] * DAY_MS;
}

export function nextRetryAt(attempt: number, now: Date): Date {
  return new Date(now.getTime() + nextRetryDelay(attempt));
}

export function shouldSuspend(dunningCount: number): boolean {
  return dunningCount >= MAX_DUNNING_ATTEMPTS;
}
