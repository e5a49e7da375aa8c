/**
 * Restore Command
 *
 * Interactive restore of one or more EC2 instances from their recent AMIs.
 * Instances are processed one at a time, in the order given. For each one
 * the user picks an image and a restore type:
 *
 * - full: the instance is replaced by a new one launched from the image,
 *   keeping its primary network interface and tags
 * - volume: selected devices are swapped for volumes built from the image's
 *   snapshots, with every attached volume snapshotted first
 *
 * A report is written after each restore, and the configured Systems
 * Manager commands can then be run on the resulting instance.
 */

import { z } from 'zod';
import {
  IncompleteRestoreError,
  RestoreOrchestrator,
  UserAbortError,
  describeError,
  toRestoreFailure,
  type BackupHandle,
  type Logger,
  type ResourceClient,
  type RestoreConfig,
  type RestoreErrorKind,
  type RestoreType,
  type VolumeChangeRow,
} from '@ec2-restore/core';
import { CommandBuilder } from './command-definition.js';
import { BaseOptionsSchema } from './base-options-schema.js';
import { createCommandResults, type BaseResult, type CommandResults } from '../core/command-results.js';
import { loadRestoreConfig } from '../core/config-loader.js';
import { getVersion } from '../core/version.js';
import { printBlock, printError, printInfo, printSuccess, printWarning, setSuppressOutput } from '../core/io/cli-logger.js';
import { FileBackupStore } from '../lib/backup-store.js';
import { createRestoreLogger } from '../lib/logger.js';
import {
  formatImages,
  formatSsmCommands,
  formatSsmResult,
  formatVolumeChanges,
  formatVolumes,
} from '../lib/output-formatter.js';
import {
  ReadlinePrompter,
  confirmStep,
  selectDevices,
  selectImage,
  selectRestoreMode,
  type Prompter,
} from '../lib/prompts.js';
import { createAwsClients } from '../platforms/aws/aws-clients.js';
import { Ec2ResourceClient } from '../platforms/aws/ec2-resource-client.js';
import { SsmCommandRunner, type SsmCommandResult } from '../platforms/aws/ssm-command-runner.js';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

export const RestoreOptionsSchema = BaseOptionsSchema.extend({
  instanceId: z.string().min(1).optional(),
  instanceName: z.string().min(1).optional(),
  instanceIds: z.string().min(1).optional(),
}).superRefine((options, ctx) => {
  const selectors = [options.instanceId, options.instanceName, options.instanceIds].filter(Boolean);
  if (selectors.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Specify exactly one of --instance-id, --instance-name or --instance-ids',
    });
  }
});

export type RestoreOptions = z.output<typeof RestoreOptionsSchema>;

export interface InstanceRestoreResult extends BaseResult {
  restoreType?: RestoreType;
  imageId?: string;
  newInstanceId?: string | null;
  backupLocation?: string;
  reportLocation?: string;
  errorKind?: RestoreErrorKind;
  volumeChanges?: VolumeChangeRow[];
  ssm?: SsmCommandResult[];
}

export interface RestoreDependencies {
  config: RestoreConfig;
  client: Pick<ResourceClient, 'describeInstance' | 'findInstanceByName' | 'listRecentImages' | 'describeVolumes'>;
  orchestrator: Pick<RestoreOrchestrator, 'restoreFullInstance' | 'restoreVolumes' | 'generateReport'>;
  reports: Pick<FileBackupStore, 'writeReport'>;
  ssm: Pick<SsmCommandRunner, 'enabled' | 'commands' | 'run'>;
  prompter: Prompter;
  logger: Logger;
}

// =====================================================================
// COMMAND IMPLEMENTATION
// =====================================================================

export function parseInstanceIds(list: string): string[] {
  return list.split(',').map(id => id.trim()).filter(id => id.length > 0);
}

async function resolveTargets(options: RestoreOptions, deps: RestoreDependencies): Promise<string[]> {
  if (options.instanceIds) {
    return parseInstanceIds(options.instanceIds);
  }
  if (options.instanceId) {
    return [options.instanceId];
  }
  if (options.instanceName) {
    const instance = await deps.client.findInstanceByName(options.instanceName);
    return [instance.instanceId];
  }
  return [];
}

async function runSsmCommands(instanceId: string, deps: RestoreDependencies): Promise<SsmCommandResult[] | undefined> {
  const { ssm, prompter } = deps;
  if (!ssm.enabled) {
    return undefined;
  }
  if (ssm.commands.length === 0) {
    printWarning('No Systems Manager commands configured. Skipping command execution.');
    return [];
  }

  printInfo(`Systems Manager commands for ${instanceId}:`);
  printBlock(formatSsmCommands(ssm.commands));
  if (!(await confirmStep(prompter, 'Do you want to proceed with executing these commands?'))) {
    printWarning('Command execution cancelled by user.');
    return [];
  }

  const results = await ssm.run(instanceId);
  for (const result of results) {
    printBlock(formatSsmResult(result));
  }
  if (results.some(result => !result.success)) {
    printWarning('Not all Systems Manager commands succeeded');
  }
  return results;
}

/**
 * Interactive restore of a single instance. Throws on failure; a declined
 * confirmation or a missing image returns a skipped result.
 */
export async function restoreInstance(instanceId: string, deps: RestoreDependencies): Promise<InstanceRestoreResult> {
  const { config, client, orchestrator, reports, prompter } = deps;
  const logger = deps.logger.child({ instanceId });

  const instance = await client.describeInstance(instanceId);
  const images = await client.listRecentImages(instance, config.restore.max_amis);
  if (images.length === 0) {
    printWarning(`No AMIs found for instance ${instanceId}`);
    return { entity: instanceId, success: false, skipped: true, error: 'No AMIs found' };
  }

  printBlock(formatImages(images));
  const image = await selectImage(prompter, images);
  logger.info('Selected AMI', { imageId: image.imageId });

  const restoreType = await selectRestoreMode(prompter);
  logger.info('Selected restore type', { restoreType });
  const skipped = (): InstanceRestoreResult => {
    printWarning(`Skipping ${instanceId}`);
    return { entity: instanceId, success: false, skipped: true, restoreType, imageId: image.imageId, error: 'Declined' };
  };

  let backup: BackupHandle;
  let newInstanceId: string | null = null;
  let volumeChanges: VolumeChangeRow[] | undefined;

  if (restoreType === 'full') {
    if (!(await confirmStep(prompter, 'This will create a new instance. Continue?'))) {
      return skipped();
    }
    printInfo('Performing full instance restore...');
    const outcome = await orchestrator.restoreFullInstance(instanceId, image.imageId);
    backup = outcome.backup;
    newInstanceId = outcome.newInstanceId;
    printSuccess(`New instance created with ID: ${newInstanceId}`);
    for (const failure of outcome.failedVolumeDeletions) {
      printWarning(`Could not delete old volume ${failure.volumeId}: ${failure.detail}`);
    }
  } else {
    const imageVolumes = await client.describeVolumes(image.imageId, true);
    printBlock(formatVolumes(imageVolumes));
    const devices = await selectDevices(prompter, imageVolumes);
    logger.info('Selected volumes for restore', { devices });

    const currentVolumes = await client.describeVolumes(instanceId, false);
    printInfo('Current volume configuration:');
    printBlock(formatVolumes(currentVolumes));
    if (!(await confirmStep(prompter, 'This will modify the existing instance. Continue?'))) {
      return skipped();
    }

    printInfo('Performing volume restore...');
    const outcome = await orchestrator.restoreVolumes(instanceId, image.imageId, devices);
    backup = outcome.backup;
    volumeChanges = outcome.changes;
    printSuccess('Volume restore completed successfully');
    printInfo('Volume changes:');
    printBlock(formatVolumeChanges(outcome.changes));
  }
  printInfo(`Instance metadata backed up to: ${backup.location}`);

  // Report failures do not fail a completed restore
  let reportLocation: string | undefined;
  try {
    const report = await orchestrator.generateReport(backup, restoreType, newInstanceId);
    reportLocation = await reports.writeReport(report);
    printSuccess(`Restoration report generated: ${reportLocation}`);
  } catch (error) {
    const detail = describeError(error);
    logger.error('Could not generate restore report', { error: detail });
    printWarning(`Could not generate restore report: ${detail}`);
  }

  const ssm = await runSsmCommands(newInstanceId ?? instanceId, deps);

  return {
    entity: instanceId,
    success: true,
    message: newInstanceId
      ? `full restore from ${image.imageId}, replaced by ${newInstanceId}`
      : `volume restore of ${volumeChanges?.map(row => row.device).join(', ') ?? ''} from ${image.imageId}`,
    restoreType,
    imageId: image.imageId,
    newInstanceId,
    backupLocation: backup.location,
    reportLocation,
    volumeChanges,
    ssm,
  };
}

/**
 * Ask whether to go on after a failed instance. Quitting at this prompt
 * counts as no.
 */
async function continueAfterFailure(prompter: Prompter): Promise<boolean> {
  try {
    return await confirmStep(prompter, 'Continue with next instance?');
  } catch (error) {
    if (error instanceof UserAbortError) {
      return false;
    }
    throw error;
  }
}

export async function runRestore(
  options: RestoreOptions,
  deps: RestoreDependencies
): Promise<CommandResults<InstanceRestoreResult>> {
  const startTime = Date.now();
  const { logger } = deps;

  const targets = await resolveTargets(options, deps);
  logger.info(`Processing ${targets.length} instance(s)`, { instances: targets });

  const results: InstanceRestoreResult[] = [];
  for (const [index, instanceId] of targets.entries()) {
    const instanceStart = Date.now();
    printInfo(`Processing instance ${instanceId} (${index + 1}/${targets.length})`);
    try {
      const result = await restoreInstance(instanceId, deps);
      results.push(result);
      logger.info('Instance processed', { instanceId, durationMs: Date.now() - instanceStart, skipped: result.skipped === true });
    } catch (error) {
      const failure = toRestoreFailure(error);
      if (error instanceof UserAbortError) {
        printWarning(failure.detail);
        logger.warn('Restore cancelled by user', { instanceId });
        results.push({ entity: instanceId, success: false, skipped: true, errorKind: failure.kind, error: failure.detail });
        break;
      }

      logger.error('Error processing instance', {
        instanceId,
        kind: failure.kind,
        error: failure.detail,
        durationMs: Date.now() - instanceStart,
      });
      printError(`Error processing instance ${instanceId}: ${failure.detail}`);
      results.push({
        entity: instanceId,
        success: false,
        errorKind: failure.kind,
        error: `${failure.kind}: ${failure.detail}`,
        backupLocation: error instanceof IncompleteRestoreError ? error.backupLocation : undefined,
      });

      if (index < targets.length - 1 && !(await continueAfterFailure(deps.prompter))) {
        break;
      }
    }
  }

  logger.info('Restore run finished', { durationMs: Date.now() - startTime });
  return createCommandResults('restore', results, startTime, getVersion());
}

async function restoreHandler(options: RestoreOptions): Promise<CommandResults<InstanceRestoreResult>> {
  setSuppressOutput(options.quiet);

  const config = loadRestoreConfig(options.config);
  const logger = createRestoreLogger({
    level: config.restore.log_level,
    file: config.restore.log_file,
    verbose: options.verbose,
  });
  logger.info('Starting EC2 instance restore process');

  const { ec2, ssm } = createAwsClients(config.aws);
  const client = new Ec2ResourceClient(ec2);
  const store = new FileBackupStore(config.restore.backup_dir);
  const prompter = new ReadlinePrompter();

  try {
    return await runRestore(options, {
      config,
      client,
      orchestrator: new RestoreOrchestrator({ client, store, logger }),
      reports: store,
      ssm: new SsmCommandRunner(ssm, config.systems_manager, logger),
      prompter,
      logger,
    });
  } finally {
    prompter.close();
  }
}

// =====================================================================
// COMMAND DEFINITION
// =====================================================================

export const restoreCommand = new CommandBuilder()
  .name('restore')
  .description('Restore EC2 instances from AMIs (full replacement or selected volumes)')
  .args({
    args: {
      '--instance-id': { type: 'string', description: 'ID of the instance to restore' },
      '--instance-name': { type: 'string', description: 'Name tag of the instance to restore' },
      '--instance-ids': { type: 'string', description: 'Comma-separated instance IDs, restored in order' },
    },
  })
  .examples(
    'ec2-restore restore --instance-id i-0123456789abcdef0',
    'ec2-restore restore --instance-name web-server --config ./config.yaml',
    'ec2-restore restore --instance-ids i-0123456789abcdef0,i-0fedcba9876543210 -v'
  )
  .schema(RestoreOptionsSchema)
  .handler(restoreHandler)
  .build();
