/**
 * Backup Recorder
 *
 * Captures an instance's full description before any mutation and hands it
 * to a BackupStore. The record is the only source of "previous" state for
 * reports and for recovering a terminated instance by hand.
 */

import type { Logger } from './logger.js';
import type { ResourceClient } from './resource-client.js';
import { getNameTag, type BackupHandle, type BackupRecord } from './types.js';
import type { Clock } from './wait.js';

export interface BackupStore {
  /** Persist a record, returning where it was written */
  save(record: BackupRecord): Promise<string>;
  load(location: string): Promise<BackupRecord>;
}

/** Freeze a value and everything reachable from it */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class BackupRecorder {
  constructor(
    private readonly client: ResourceClient,
    private readonly store: BackupStore,
    private readonly logger: Logger,
    private readonly now: Clock = Date.now
  ) {}

  async capture(instanceId: string): Promise<BackupHandle> {
    const instance = await this.client.describeInstance(instanceId);
    const record: BackupRecord = deepFreeze({
      instanceId,
      instanceName: getNameTag(instance.tags),
      instance: structuredClone(instance),
      capturedAt: new Date(this.now()).toISOString(),
    });

    const location = await this.store.save(record);
    this.logger.info('Instance backup saved', { instanceId, location });
    return { record, location };
  }
}
