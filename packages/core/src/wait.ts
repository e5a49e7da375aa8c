/**
 * Bounded polling
 *
 * Every mutating call against the resource manager is followed by a wait on
 * its observable effect. `awaitCondition` is the single loop all waiters use:
 * fixed interval, hard timeout, no cancellation.
 */

import { RemoteError, WaitTimeoutError } from './errors.js';
import { err, ok, type Result } from './result.js';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface AwaitConditionOptions<S> {
  poll: () => Promise<S>;
  isTarget: (state: S) => boolean;
  isError?: (state: S) => boolean;
  describe?: (state: S) => string;
  resourceId: string;
  target: string;
  intervalMs: number;
  timeoutMs: number;
  sleep?: Sleep;
  now?: Clock;
}

export async function awaitCondition<S>(
  options: AwaitConditionOptions<S>
): Promise<Result<S, WaitTimeoutError | RemoteError>> {
  const { poll, isTarget, isError, resourceId, target, intervalMs, timeoutMs } = options;
  const describe = options.describe ?? ((state: S) => String(state));
  const pause = options.sleep ?? sleep;
  const now = options.now ?? Date.now;

  const startedAt = now();
  for (;;) {
    const state = await poll();

    if (isError?.(state)) {
      return err(new RemoteError(
        `${resourceId} entered an error state (${describe(state)}) while waiting for ${target}`,
        'error-state'
      ));
    }
    if (isTarget(state)) {
      return ok(state);
    }
    if (now() - startedAt + intervalMs > timeoutMs) {
      return err(new WaitTimeoutError(resourceId, target, timeoutMs, describe(state)));
    }
    await pause(intervalMs);
  }
}
