/**
 * Command Results Type System - Aggregated results for command execution
 *
 * A command that works through several instances reports one entry per
 * instance plus a summary the loader uses to pick the exit code.
 */

// Minimal interface that all per-entity results satisfy for formatting
export interface BaseResult {
  entity: string; // The instance (or other resource) the result applies to
  success: boolean;
  skipped?: boolean;
  /** One-line outcome shown in the final summary */
  message?: string;
  error?: string;
}

export interface CommandResults<TResult extends BaseResult = BaseResult> {
  command: string;
  timestamp: Date;
  duration: number;
  results: TResult[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
  };
  executionContext: {
    user: string;
    workingDirectory: string;
    cliVersion?: string;
  };
}

/**
 * Tally per-entity results. A skipped entity counts as neither success nor
 * failure.
 */
export function summarizeResults(results: readonly BaseResult[]): CommandResults['summary'] {
  const skipped = results.filter(r => r.skipped).length;
  const succeeded = results.filter(r => !r.skipped && r.success).length;
  return {
    total: results.length,
    succeeded,
    failed: results.length - skipped - succeeded,
    skipped,
  };
}

export function createCommandResults<TResult extends BaseResult>(
  command: string,
  results: TResult[],
  startTime: number,
  cliVersion?: string
): CommandResults<TResult> {
  return {
    command,
    timestamp: new Date(),
    duration: Date.now() - startTime,
    results,
    summary: summarizeResults(results),
    executionContext: {
      user: process.env.USER || 'unknown',
      workingDirectory: process.cwd(),
      cliVersion,
    },
  };
}
