/**
 * @ec2-restore/core
 *
 * Restore workflows for EC2 instances, independent of the AWS SDK. Callers
 * supply a ResourceClient, a BackupStore and a Logger.
 */

// Domain model
export type {
  AttachmentState,
  BackupHandle,
  BackupRecord,
  BlockDeviceMapping,
  IamInstanceProfile,
  Image,
  ImageBlockDevice,
  Instance,
  InstanceState,
  LaunchSpec,
  NetworkInterfaceAttachment,
  Placement,
  RestoreReport,
  RestoreType,
  Snapshot,
  SnapshotState,
  StateChange,
  Tag,
  Volume,
  VolumeAttachment,
  VolumeChange,
  VolumeDescriptor,
  VolumeState,
} from './types.js';
export { INSTANCE_STATES, VOLUME_STATES, getNameTag, isInstanceState, isVolumeState } from './types.js';

// Errors
export {
  RestoreError,
  RemoteError,
  PreconditionError,
  WaitTimeoutError,
  UserAbortError,
  IncompleteRestoreError,
  describeError,
  toRestoreFailure,
} from './errors.js';
export type { RemoteErrorReason, RestoreErrorKind, RestoreFailure } from './errors.js';

// Results and waiting
export { ok, err, unwrap } from './result.js';
export type { Result } from './result.js';
export { awaitCondition, sleep } from './wait.js';
export type { AwaitConditionOptions, Clock, Sleep } from './wait.js';
export { Waiter, DEFAULT_WAIT_OPTIONS, isVolumeAttached, isVolumeDetached, isVolumeReleased } from './waiters.js';
export type { WaitOptions, WaitResult } from './waiters.js';

// Logger
export { silentLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

// Collaborators
export type { ResourceClient } from './resource-client.js';
export { BackupRecorder, deepFreeze } from './backup-recorder.js';
export type { BackupStore } from './backup-recorder.js';

// Restore workflows
export { RestoreOrchestrator } from './restore/orchestrator.js';
export type { RestoreOrchestratorOptions } from './restore/orchestrator.js';
export { DEFAULT_SETTLE_DELAYS } from './restore/context.js';
export type { RestoreContext, SettleDelays } from './restore/context.js';
export { restoreFullInstance, buildLaunchSpec, instanceProfileName } from './restore/full-restore.js';
export type { FullRestorePhase, FullRestoreResult } from './restore/full-restore.js';
export { restoreVolumes, rollbackVolumeRestore, createLedger } from './restore/volume-restore.js';
export type {
  DevicePhase,
  DeviceRecord,
  RollbackReport,
  VolumeChangeRow,
  VolumeRestoreLedger,
  VolumeRestoreResult,
} from './restore/volume-restore.js';

// Reports
export { diffRestore, toReportDocument } from './report.js';
export type { ReportDocument } from './report.js';

// Configuration
export { ConfigurationError } from './config/configuration-error.js';
export {
  LOG_LEVELS,
  RestoreConfigSchema,
  parseRestoreConfig,
  resolveEnvVars,
} from './config/restore-config.js';
export type { LogLevel, RestoreConfig, SsmCommandConfig } from './config/restore-config.js';
