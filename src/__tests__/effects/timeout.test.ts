import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout } from '../../effects/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 100, 'op')).resolves.toBe('done');
  });

  it('passes the original rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'op')).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError once the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise(() => {}), 250, 'provider call');
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('provider call', 250));

    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });
});
