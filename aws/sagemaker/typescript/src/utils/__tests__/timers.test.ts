import { describe, it, expect, afterEach, vi } from 'vitest';
import { sleep } from '../timers.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should reject with the abort reason', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort(new Error('cancelled'));

    await expect(pending).rejects.toThrow('cancelled');
  });

  it('should reject immediately for an aborted signal', async () => {
    await expect(sleep(60000, AbortSignal.abort(new Error('already cancelled')))).rejects.toThrow(
      'already cancelled'
    );
  });
});
