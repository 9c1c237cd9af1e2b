import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('circuit-breaker');

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitBreakerOpenError extends Error {
  constructor(public readonly breakerName: string) {
    super(`Circuit breaker "${breakerName}" is open, call rejected`);
    this.name = 'CircuitBreakerOpenError';
  }
}

export interface CircuitBreakerOptions {
  /** Consecutive failures before opening. Default: 5 */
  failureThreshold?: number;
  /** Milliseconds spent OPEN before a trial call is let through. Default: 30000 */
  resetTimeoutMs?: number;
  /** Successful trial calls needed to close again. Default: 2 */
  halfOpenSuccesses?: number;
  /** Clock, replaceable in tests. */
  now?: () => number;
}

export interface CircuitStatus {
  name: string;
  state: CircuitState;
  failureCount: number;
  openedAt: string | null;
}

/**
 * Guards calls to the payment provider. While OPEN, calls fail fast with
 * CircuitBreakerOpenError instead of waiting out the provider timeout.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private halfOpenSuccessCount = 0;
  private openedAt: number | null = null;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenSuccesses: number;
  private readonly now: () => number;

  constructor(readonly name: string, options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
    this.halfOpenSuccesses = options.halfOpenSuccesses ?? 2;
    this.now = options.now ?? Date.now;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.openedAt !== null && this.now() - this.openedAt >= this.resetTimeoutMs) {
        this.moveTo('HALF_OPEN');
      } else {
        throw new CircuitBreakerOpenError(this.name);
      }
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (err) {
      this.recordFailure();
      throw err;
    }
  }

  getStatus(): CircuitStatus {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      openedAt: this.openedAt !== null ? new Date(this.openedAt).toISOString() : null,
    };
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccessCount++;
      if (this.halfOpenSuccessCount >= this.halfOpenSuccesses) this.moveTo('CLOSED');
      return;
    }
    this.failureCount = 0;
  }

  private recordFailure(): void {
    if (this.state === 'HALF_OPEN') {
      this.moveTo('OPEN');
      return;
    }
    this.failureCount++;
    if (this.failureCount >= this.failureThreshold) this.moveTo('OPEN');
  }

  private moveTo(next: CircuitState): void {
    log.info({ breaker: this.name, from: this.state, to: next }, 'Circuit breaker state transition');
    this.state = next;
    this.halfOpenSuccessCount = 0;
    if (next === 'OPEN') {
      this.openedAt = this.now();
    } else if (next === 'CLOSED') {
      this.failureCount = 0;
      this.openedAt = null;
    }
  }
}
