/**
 * Systems Manager command runner
 *
 * Runs the configured post-restore commands on an instance, one at a time,
 * and stops at the first command that does not succeed.
 */

import {
  GetCommandInvocationCommand,
  SendCommandCommand,
  SSMClient,
  type GetCommandInvocationCommandOutput,
} from '@aws-sdk/client-ssm';
import {
  awaitCondition,
  describeError,
  type Clock,
  type Logger,
  type RestoreConfig,
  type Sleep,
  type SsmCommandConfig,
} from '@ec2-restore/core';

export const TERMINAL_STATUSES = ['Success', 'Failed', 'Cancelled', 'TimedOut'];

export type SsmSettings = RestoreConfig['systems_manager'];

export interface SsmCommandResult {
  name: string;
  commandId: string | null;
  /** Final invocation status, `Sent` when the command was not waited on */
  status: string;
  success: boolean;
  output?: string;
  errorOutput?: string;
  error?: string;
}

export interface SsmRunnerOptions {
  intervalMs?: number;
  sleep?: Sleep;
  now?: Clock;
}

interface InvocationState {
  status: string;
  output?: string;
  errorOutput?: string;
}

export class SsmCommandRunner {
  private readonly intervalMs: number;

  constructor(
    private readonly ssm: SSMClient,
    private readonly settings: SsmSettings,
    private readonly logger: Logger,
    private readonly options: SsmRunnerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 5000;
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  get commands(): SsmCommandConfig[] {
    return this.settings.commands;
  }

  async run(instanceId: string): Promise<SsmCommandResult[]> {
    const results: SsmCommandResult[] = [];
    for (const command of this.settings.commands) {
      const result = await this.runOne(instanceId, command);
      results.push(result);
      if (!result.success) {
        this.logger.warn('Stopping SSM command sequence after failure', { instanceId, name: command.name });
        break;
      }
    }
    return results;
  }

  private buildParameters(command: SsmCommandConfig): Record<string, string[]> {
    const parameters: Record<string, string[]> = {
      commands: [command.command],
      executionTimeout: [String(command.timeout)],
    };
    if (this.settings.output_s3_bucket) {
      parameters.outputS3BucketName = [this.settings.output_s3_bucket];
      if (this.settings.output_s3_prefix) {
        parameters.outputS3KeyPrefix = [this.settings.output_s3_prefix];
      }
    }
    return parameters;
  }

  private async runOne(instanceId: string, command: SsmCommandConfig): Promise<SsmCommandResult> {
    const logger = this.logger.child({ instanceId, ssmCommand: command.name });
    let commandId: string | null = null;

    try {
      const response = await this.ssm.send(new SendCommandCommand({
        InstanceIds: [instanceId],
        DocumentName: this.settings.document_name,
        Parameters: this.buildParameters(command),
        TimeoutSeconds: command.timeout,
      }));
      commandId = response.Command?.CommandId ?? null;
      if (!commandId) {
        return { name: command.name, commandId, status: 'Error', success: false, error: 'SendCommand returned no command id' };
      }
      logger.info('SSM command sent', { commandId });

      if (!command.wait_for_completion) {
        return { name: command.name, commandId, status: 'Sent', success: true };
      }

      const sentId = commandId;
      const outcome = await awaitCondition<InvocationState>({
        poll: () => this.pollInvocation(sentId, instanceId),
        isTarget: state => TERMINAL_STATUSES.includes(state.status),
        describe: state => state.status,
        resourceId: `command ${sentId}`,
        target: 'finished',
        intervalMs: this.intervalMs,
        timeoutMs: command.timeout * 1000,
        sleep: this.options.sleep,
        now: this.options.now,
      });
      if (!outcome.ok) {
        logger.error('SSM command did not finish', { commandId, error: outcome.error.message });
        return { name: command.name, commandId, status: 'TimedOut', success: false, error: outcome.error.message };
      }

      const { status, output, errorOutput } = outcome.value;
      const success = status === 'Success';
      if (success) {
        logger.info('SSM command succeeded', { commandId });
      } else {
        logger.error('SSM command failed', { commandId, status });
      }
      return { name: command.name, commandId, status, success, output, errorOutput };
    } catch (error) {
      logger.error('Error executing SSM command', { commandId, error: describeError(error) });
      return { name: command.name, commandId, status: 'Error', success: false, error: describeError(error) };
    }
  }

  private async pollInvocation(commandId: string, instanceId: string): Promise<InvocationState> {
    let response: GetCommandInvocationCommandOutput;
    try {
      response = await this.ssm.send(new GetCommandInvocationCommand({ CommandId: commandId, InstanceId: instanceId }));
    } catch (error) {
      // The invocation is not visible for a moment after SendCommand
      if (error instanceof Error && error.name === 'InvocationDoesNotExist') {
        return { status: 'Pending' };
      }
      throw error;
    }
    return {
      status: response.Status ?? 'Pending',
      output: response.StandardOutputContent || undefined,
      errorOutput: response.StandardErrorContent || undefined,
    };
  }
}
