import { describe, it, expect, vi, afterEach } from 'vitest';

import { sleep } from '../delay.js';
import { CancelledError } from '../../errors/index.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(1000).then(done);
    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects immediately for an aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects as soon as the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();

    const pending = sleep(60_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(vi.getTimerCount()).toBe(0);
  });
});
