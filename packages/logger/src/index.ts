/**
 * @bgctl/logger - Operator Logging
 *
 * Every message is timestamped and leveled (ERROR/WARN/SUCCESS/STATUS/INFO)
 * and goes to the terminal and to a rotating JSON log file.
 */

import { createLogger, type Logger } from 'winston';
import { randomBytes } from 'node:crypto';
import {
  OPERATOR_LEVELS,
  createConsoleTransport,
  createFileTransport,
  type OperatorLevel,
} from './transports.js';

export {
  OPERATOR_LEVELS,
  isOperatorLevel,
  formatConsoleLine,
  type OperatorLevel,
} from './transports.js';

// ============================================================================
// Logger contract used by the services
// ============================================================================

export interface LoggerLike {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  success(message: string, meta?: Record<string, unknown>): void;
  status(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface OperatorLoggerOptions {
  level?: OperatorLevel;
  logDir?: string;
  console?: boolean;
  /** Send every console line to stderr */
  stderr?: boolean;
  /** Written on every line of the file log */
  runId?: string;
}

export function generateRunId(): string {
  return randomBytes(4).toString('hex');
}

// ============================================================================
// Winston-backed implementation
// ============================================================================

export class OperatorLogger implements LoggerLike {
  constructor(private readonly winston: Logger) {}

  private log(level: OperatorLevel, message: string, meta?: Record<string, unknown>) {
    this.winston.log(level, message, meta ?? {});
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log('warn', message, meta);
  }

  success(message: string, meta?: Record<string, unknown>) {
    this.log('success', message, meta);
  }

  status(message: string, meta?: Record<string, unknown>) {
    this.log('status', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log('debug', message, meta);
  }
}

export function createOperatorLogger(options: OperatorLoggerOptions = {}): OperatorLogger {
  const logger = createLogger({
    levels: OPERATOR_LEVELS,
    level: options.level ?? 'info',
    defaultMeta: { service: 'bgctl', runId: options.runId ?? generateRunId() },
    transports: [],
  });

  if (options.console !== false) {
    logger.add(createConsoleTransport({ stderr: options.stderr }));
  }
  if (options.logDir) {
    logger.add(createFileTransport(options.logDir));
  }
  // winston warns on a logger without transports
  if (logger.transports.length === 0) {
    logger.silent = true;
  }

  return new OperatorLogger(logger);
}
