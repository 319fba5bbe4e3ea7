/**
 * @bgctl/logger - Winston Transports
 * Coloured operator console + rotating JSON file
 */

import { format, transports } from 'winston';
import type { Logform } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import chalk from 'chalk';

// ============================================================================
// Levels
// ============================================================================

export const OPERATOR_LEVELS = {
  error: 0,
  warn: 1,
  success: 2,
  status: 3,
  info: 4,
  debug: 5,
} as const;

export type OperatorLevel = keyof typeof OPERATOR_LEVELS;

export function isOperatorLevel(value: unknown): value is OperatorLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(OPERATOR_LEVELS, value);
}

const LEVEL_COLORS: Record<OperatorLevel, (text: string) => string> = {
  error: chalk.red.bold,
  warn: chalk.yellow,
  success: chalk.green,
  status: chalk.cyan,
  info: chalk.white,
  debug: chalk.gray,
};

// ============================================================================
// Formats
// ============================================================================

export const jsonFormat: Logform.Format = format.combine(
  format.timestamp(),
  format.json(),
);

/** `2024-05-01 12:00:00 [SUCCESS] message` - meta goes to the file log only */
export function formatConsoleLine(info: Logform.TransformableInfo): string {
  const tag = `[${info.level.toUpperCase()}]`;
  const line = `${String(info.timestamp)} ${tag} ${String(info.message)}`;
  return isOperatorLevel(info.level) ? LEVEL_COLORS[info.level](line) : line;
}

export const consoleFormat: Logform.Format = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.printf(formatConsoleLine),
);

// ============================================================================
// Transport Factories
// ============================================================================

/** `stderr: true` keeps stdout free for machine-readable output */
export function createConsoleTransport(options: { stderr?: boolean } = {}) {
  return new transports.Console({
    format: consoleFormat,
    stderrLevels: options.stderr ? Object.keys(OPERATOR_LEVELS) : ['error'],
  });
}

/** Durable run log with daily rotation (14-day retention) */
export function createFileTransport(logDir: string) {
  return new DailyRotateFile({
    dirname: logDir,
    filename: 'bgctl-%DATE%.log',
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '20m',
    format: jsonFormat,
  });
}
