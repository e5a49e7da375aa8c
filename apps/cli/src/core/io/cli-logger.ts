/**
 * Shared output helpers for CLI commands
 *
 * User-facing messages only. Diagnostic logging goes through the winston
 * logger in lib/logger.ts.
 */

import { colors } from './cli-colors.js';

// Global flag to control output suppression (--quiet)
let globalSuppressOutput = false;

/**
 * Set the global output suppression state
 * @param suppress - Whether to suppress output
 * @returns The previous suppression state
 */
export function setSuppressOutput(suppress: boolean): boolean {
  const previous = globalSuppressOutput;
  globalSuppressOutput = suppress;
  return previous;
}

/**
 * Get the current output suppression state
 */
export function getSuppressOutput(): boolean {
  return globalSuppressOutput;
}

// Errors are printed even in quiet mode
export function printError(message: string): void {
  console.error(`${colors.red}❌ ${message}${colors.reset}`);
}

export function printSuccess(message: string): void {
  if (!globalSuppressOutput) {
    console.log(`${colors.green}✅ ${message}${colors.reset}`);
  }
}

export function printWarning(message: string): void {
  if (!globalSuppressOutput) {
    console.log(`${colors.yellow}⚠️  ${message}${colors.reset}`);
  }
}

export function printInfo(message: string): void {
  if (!globalSuppressOutput) {
    console.log(`${colors.cyan}ℹ️  ${message}${colors.reset}`);
  }
}

/**
 * Print a block of text (a table, a summary) as is
 */
export function printBlock(text: string): void {
  if (!globalSuppressOutput) {
    console.log(text);
  }
}
