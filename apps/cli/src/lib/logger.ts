/**
 * Restore logger
 *
 * Winston logger handed to the core workflows. Structured JSON lines go to
 * the configured log file; `--verbose` adds a human-readable console
 * transport.
 */

import winston from 'winston';
import type { LogLevel } from '@ec2-restore/core';

export interface RestoreLoggerOptions {
  level: LogLevel;
  file: string;
  verbose?: boolean;
  /** Extra transports, used by tests */
  transports?: winston.transport[];
}

const WINSTON_LEVELS: Record<LogLevel, string> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
};

export function toWinstonLevel(level: LogLevel): string {
  return WINSTON_LEVELS[level];
}

function createFileFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );
}

function createConsoleFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

export function createRestoreLogger(options: RestoreLoggerOptions): winston.Logger {
  const level = toWinstonLevel(options.level);
  const transports: winston.transport[] = [
    new winston.transports.File({ filename: options.file, level, format: createFileFormat() }),
  ];

  if (options.verbose) {
    transports.push(new winston.transports.Console({ level: 'debug', format: createConsoleFormat() }));
  }
  transports.push(...(options.transports ?? []));

  return winston.createLogger({ level: options.verbose ? 'debug' : level, transports });
}
