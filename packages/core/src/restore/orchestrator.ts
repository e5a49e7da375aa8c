/**
 * Restore Orchestrator
 *
 * Entry point for both restore workflows. Wires the resource client, the
 * backup store and the logger into one context and exposes the operations
 * a caller needs: capture, restore either way, report.
 */

import { BackupRecorder, type BackupStore } from '../backup-recorder.js';
import type { Logger } from '../logger.js';
import { diffRestore } from '../report.js';
import type { ResourceClient } from '../resource-client.js';
import type { BackupHandle, RestoreReport, RestoreType } from '../types.js';
import { sleep as realSleep, type Clock, type Sleep } from '../wait.js';
import { Waiter, type WaitOptions } from '../waiters.js';
import { DEFAULT_SETTLE_DELAYS, type RestoreContext, type SettleDelays } from './context.js';
import { restoreFullInstance, type FullRestoreResult } from './full-restore.js';
import {
  restoreVolumes,
  rollbackVolumeRestore,
  type RollbackReport,
  type VolumeRestoreLedger,
  type VolumeRestoreResult,
} from './volume-restore.js';

export interface RestoreOrchestratorOptions {
  client: ResourceClient;
  store: BackupStore;
  logger: Logger;
  wait?: Partial<WaitOptions>;
  settle?: Partial<SettleDelays>;
  sleep?: Sleep;
  now?: Clock;
}

export class RestoreOrchestrator {
  private readonly context: RestoreContext;
  private readonly now: Clock;

  constructor(options: RestoreOrchestratorOptions) {
    const pause = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
    this.context = {
      client: options.client,
      waiter: new Waiter(options.client, options.wait, pause, this.now),
      recorder: new BackupRecorder(options.client, options.store, options.logger, this.now),
      logger: options.logger,
      settle: { ...DEFAULT_SETTLE_DELAYS, ...options.settle },
      sleep: pause,
    };
  }

  captureBackup(instanceId: string): Promise<BackupHandle> {
    return this.context.recorder.capture(instanceId);
  }

  restoreFullInstance(instanceId: string, imageId: string): Promise<FullRestoreResult> {
    return restoreFullInstance(this.context, instanceId, imageId);
  }

  restoreVolumes(instanceId: string, imageId: string, devices: readonly string[]): Promise<VolumeRestoreResult> {
    return restoreVolumes(this.context, instanceId, imageId, devices);
  }

  rollbackVolumeRestore(ledger: VolumeRestoreLedger): Promise<RollbackReport> {
    return rollbackVolumeRestore(this.context, ledger);
  }

  /**
   * Diff the backup against the live instance. After a full restore the
   * live instance is the replacement.
   */
  async generateReport(
    backup: BackupHandle,
    restoreType: RestoreType,
    newInstanceId: string | null = null
  ): Promise<RestoreReport> {
    const live = await this.context.client.describeInstance(newInstanceId ?? backup.record.instanceId);
    return diffRestore(backup.record, live, restoreType, newInstanceId, new Date(this.now()).toISOString());
  }
}
