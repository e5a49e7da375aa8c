import type { BackupRecorder } from '../backup-recorder.js';
import type { Logger } from '../logger.js';
import type { ResourceClient } from '../resource-client.js';
import type { Sleep } from '../wait.js';
import type { Waiter } from '../waiters.js';

/**
 * Fixed pauses covering gaps the resource manager does not expose as state:
 * a released network interface is not reusable right after termination, and
 * a running instance is not yet reachable right after launch.
 */
export interface SettleDelays {
  afterTerminateMs: number;
  afterLaunchMs: number;
}

export const DEFAULT_SETTLE_DELAYS: SettleDelays = {
  afterTerminateMs: 30_000,
  afterLaunchMs: 60_000,
};

export interface RestoreContext {
  client: ResourceClient;
  waiter: Waiter;
  recorder: BackupRecorder;
  logger: Logger;
  settle: SettleDelays;
  sleep: Sleep;
}
