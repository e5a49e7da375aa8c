/**
 * Restore report
 *
 * Diffs the pre-restore backup against the live instance. Sections with no
 * change are left out, and a report with no change at all has no `changes`.
 */

import type {
  BackupRecord,
  Instance,
  RestoreReport,
  RestoreType,
  StateChange,
  VolumeChange,
} from './types.js';

export function diffRestore(
  backup: BackupRecord,
  live: Instance,
  restoreType: RestoreType,
  newInstanceId: string | null = null,
  generatedAt: string = new Date().toISOString()
): RestoreReport {
  const report: RestoreReport = {
    timestamp: generatedAt,
    restoreType,
    instanceId: backup.instanceId,
    instanceName: backup.instanceName,
    newInstanceId,
  };

  const previousVolumes = new Map(
    backup.instance.blockDeviceMappings.map(mapping => [mapping.deviceName, mapping.volumeId])
  );
  const volumes: Record<string, VolumeChange> = {};
  for (const mapping of live.blockDeviceMappings) {
    const previous = previousVolumes.get(mapping.deviceName) ?? null;
    if (previous !== mapping.volumeId) {
      volumes[mapping.deviceName] = { previous, current: mapping.volumeId };
    }
  }

  let state: StateChange | undefined;
  if (backup.instance.state !== live.state) {
    state = { previous: backup.instance.state, current: live.state };
  }

  if (Object.keys(volumes).length > 0 || state) {
    report.changes = {};
    if (Object.keys(volumes).length > 0) {
      report.changes.volumes = volumes;
    }
    if (state) {
      report.changes.state = state;
    }
  }

  return report;
}

export interface ReportDocument {
  timestamp: string;
  restore_type: RestoreType;
  instance_name: string | null;
  instance_id: string;
  new_instance_id: string | null;
  changes?: {
    volumes?: Record<string, VolumeChange>;
    state?: StateChange;
  };
}

/**
 * Wire form written to the report file
 */
export function toReportDocument(report: RestoreReport): ReportDocument {
  const document: ReportDocument = {
    timestamp: report.timestamp,
    restore_type: report.restoreType,
    instance_name: report.instanceName,
    instance_id: report.instanceId,
    new_instance_id: report.newInstanceId,
  };
  if (report.changes) {
    document.changes = report.changes;
  }
  return document;
}
