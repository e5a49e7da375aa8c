import { describe, it, expect, vi } from 'vitest';
import { awaitCondition } from '../wait.js';
import { RemoteError, WaitTimeoutError } from '../errors.js';
import { manualClock } from './helpers/test-context.js';

describe('awaitCondition', () => {
  it('returns the first state that matches the target', async () => {
    const states = ['pending', 'pending', 'completed'];
    const poll = vi.fn(async () => states.shift() ?? 'completed');
    const clock = manualClock();

    const result = await awaitCondition({
      poll,
      isTarget: state => state === 'completed',
      resourceId: 'snap-1',
      target: 'completed',
      intervalMs: 5000,
      timeoutMs: 300000,
      ...clock,
    });

    expect(result).toEqual({ ok: true, value: 'completed' });
    expect(poll).toHaveBeenCalledTimes(3);
    expect(clock.slept).toEqual([5000, 5000]);
  });

  it('times out when the predicate never holds', async () => {
    const clock = manualClock();

    const result = await awaitCondition({
      poll: async () => 'pending',
      isTarget: state => state === 'completed',
      resourceId: 'snap-1',
      target: 'completed',
      intervalMs: 5000,
      timeoutMs: 20000,
      ...clock,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(WaitTimeoutError);
      expect(result.error.message).toBe(
        'Timed out after 20s waiting for snap-1 to become completed (last observed: pending)'
      );
    }
    // polls at 0s through 20s; another interval would pass the budget
    expect(clock.slept).toEqual([5000, 5000, 5000, 5000]);
  });

  it('times out after a single poll when the timeout is below one interval', async () => {
    const poll = vi.fn(async () => 'pending');
    const clock = manualClock();

    const result = await awaitCondition({
      poll,
      isTarget: () => false,
      resourceId: 'vol-1',
      target: 'available',
      intervalMs: 5000,
      timeoutMs: 1000,
      ...clock,
    });

    expect(result.ok).toBe(false);
    expect(poll).toHaveBeenCalledTimes(1);
    expect(clock.slept).toEqual([]);
  });

  it('fails with an error-state RemoteError when the resource reports an error', async () => {
    const result = await awaitCondition({
      poll: async () => 'error',
      isTarget: state => state === 'available',
      isError: state => state === 'error',
      resourceId: 'vol-1',
      target: 'available',
      intervalMs: 5000,
      timeoutMs: 300000,
      ...manualClock(),
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RemoteError);
      expect(result.error).toMatchObject({ kind: 'remote', reason: 'error-state' });
    }
  });

  it('propagates poll failures', async () => {
    const failure = new RemoteError('throttled', 'rejected', 'RequestLimitExceeded');

    await expect(awaitCondition({
      poll: async () => { throw failure; },
      isTarget: () => true,
      resourceId: 'i-1',
      target: 'running',
      intervalMs: 5000,
      timeoutMs: 300000,
      ...manualClock(),
    })).rejects.toBe(failure);
  });
});
