import type { BackupStore } from '../../backup-recorder.js';
import type { Logger, LogMeta } from '../../logger.js';
import type { BackupRecord } from '../../types.js';

export class MemoryBackupStore implements BackupStore {
  readonly records = new Map<string, BackupRecord>();

  async save(record: BackupRecord): Promise<string> {
    const location = `memory://${record.instanceId}/${this.records.size + 1}`;
    this.records.set(location, record);
    return location;
  }

  async load(location: string): Promise<BackupRecord> {
    const record = this.records.get(location);
    if (!record) {
      throw new Error(`No backup at ${location}`);
    }
    return record;
  }
}

/**
 * Clock whose sleep advances time instead of waiting
 */
export function manualClock(start = 0): { now: () => number; sleep: (ms: number) => Promise<void>; slept: number[] } {
  let current = start;
  const slept: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      slept.push(ms);
      current += ms;
    },
    slept,
  };
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: LogMeta;
}

/**
 * Logger that keeps every entry, children included, in one list
 */
export function recordingLogger(entries: LogEntry[] = []): Logger & { entries: LogEntry[] } {
  const logger = {
    entries,
    debug: (message: string, meta?: LogMeta) => { entries.push({ level: 'debug', message, meta }); },
    info: (message: string, meta?: LogMeta) => { entries.push({ level: 'info', message, meta }); },
    warn: (message: string, meta?: LogMeta) => { entries.push({ level: 'warn', message, meta }); },
    error: (message: string, meta?: LogMeta) => { entries.push({ level: 'error', message, meta }); },
    child: (_meta: LogMeta): Logger => logger,
  };
  return logger;
}
