/**
 * @bgctl/shared - Error Classes
 * Structured error handling for the blue/green control plane
 *
 * Services throw these; only the CLI dispatcher turns them into exit codes.
 */

import { types } from 'node:util';

export class BlueGreenError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BlueGreenError';
    this.code = code;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BlueGreenError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigMissingError extends BlueGreenError {
  constructor(label: string, filePath: string) {
    super(`${label} '${filePath}' not found. Cannot proceed.`, 'CONFIG_MISSING', { label, filePath });
    this.name = 'ConfigMissingError';
  }
}

export class NotFoundError extends BlueGreenError {
  public readonly key: string;

  constructor(key: string, source: string) {
    super(`Key '${key}' not found in ${source}`, 'NOT_FOUND', { key, source });
    this.name = 'NotFoundError';
    this.key = key;
  }
}

export class PersistError extends BlueGreenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSIST_FAILED', details);
    this.name = 'PersistError';
  }
}

export class InvalidConfigError extends BlueGreenError {
  constructor(key: string, value: string, reason: string) {
    super(`Invalid value '${value}' for ${key}: ${reason}`, 'INVALID_CONFIG', { key, value });
    this.name = 'InvalidConfigError';
  }
}

export class LockTimeoutError extends BlueGreenError {
  constructor(lockPath: string, timeoutMs: number) {
    super(
      `Another switch holds ${lockPath}; gave up after ${timeoutMs}ms`,
      'LOCK_TIMEOUT',
      { lockPath, timeoutMs },
    );
    this.name = 'LockTimeoutError';
  }
}

// ============================================================================
// Input
// ============================================================================

export class ValidationError extends BlueGreenError {
  constructor(message: string, details?: Record<string, unknown>, code: string = 'VALIDATION_ERROR') {
    super(message, code, details);
    this.name = 'ValidationError';
  }
}

export class InvalidPoolError extends ValidationError {
  constructor(pool: string) {
    super(`Invalid pool specified: ${pool}. Must be 'blue' or 'green'.`, { pool }, 'INVALID_POOL');
    this.name = 'InvalidPoolError';
  }
}

// ============================================================================
// Proxy
// ============================================================================

export class ProxyUnreachableError extends BlueGreenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROXY_UNREACHABLE', details);
    this.name = 'ProxyUnreachableError';
  }
}

export class TemplateError extends BlueGreenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TEMPLATE_ERROR', details);
    this.name = 'TemplateError';
  }
}

/**
 * ACTIVE_POOL was written but the proxy reload failed afterwards.
 * The persisted value is kept; `bgctl reload` makes it live.
 */
export class SwitchNotLiveError extends BlueGreenError {
  public readonly pool: string;
  public readonly reloadError: BlueGreenError;

  constructor(pool: string, previousPool: string, reloadError: BlueGreenError) {
    super(
      `ACTIVE_POOL is now '${pool}' but nginx was not reloaded (${reloadError.message}). ` +
        `State updated but not yet live: run 'bgctl reload' to apply it.`,
      'STATE_NOT_LIVE',
      { pool, previousPool, reloadCode: reloadError.code },
    );
    this.name = 'SwitchNotLiveError';
    this.pool = pool;
    this.reloadError = reloadError;
  }
}

// ============================================================================
// Chaos, lifecycle, probes
// ============================================================================

export class ChaosInjectionError extends BlueGreenError {
  constructor(pool: string, port: number, reason: string) {
    super(
      `Failed to trigger chaos on ${pool} (port ${port}): ${reason}. Check if the container is running on port ${port}.`,
      'CHAOS_INJECTION_FAILED',
      { pool, port, reason },
    );
    this.name = 'ChaosInjectionError';
  }
}

export class LifecycleError extends BlueGreenError {
  constructor(action: string, reason: string) {
    super(`docker compose ${action} failed: ${reason}`, 'LIFECYCLE_FAILED', { action });
    this.name = 'LifecycleError';
  }
}

export class ProbeError extends BlueGreenError {
  constructor(url: string, reason: string) {
    super(`Request to ${url} failed: ${reason}`, 'PROBE_FAILED', { url, reason });
    this.name = 'ProbeError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

// fs errors raised in another realm (a vm context, the Jest sandbox) fail `instanceof Error`
const isError = (value: unknown): value is Error => value instanceof Error || types.isNativeError(value);

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return isError(error) && 'code' in error;
}
