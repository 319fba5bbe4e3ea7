/**
 * ConfigStore - the persisted KEY=VALUE deployment record
 *
 * Lookups always re-read the backend. `snapshot()` is the explicit cached
 * read for repeated lookups inside one operation.
 *
 * Format rules:
 * - first line starting with `KEY=` wins
 * - one pair of matching surrounding quotes (" or ') is stripped on read
 * - set() replaces only that first line; other lines and their order stay
 * - a value that starts or ends with a quote is written wrapped in double
 *   quotes, so get() returns it unchanged
 */

import { readFile, writeFile, rename, remove, pathExists } from 'fs-extra';
import {
  BlueGreenError,
  CONFIG_KEYS,
  ConfigMissingError,
  InvalidConfigError,
  NotFoundError,
  POOL_PORT_KEYS,
  PersistError,
  ValidationError,
  errorMessage,
  isErrnoException,
  isPoolName,
  type PoolName,
} from '@bgctl/shared';

// ============================================================================
// Storage backends
// ============================================================================

export interface ConfigBackend {
  read(): Promise<string>;
  write(content: string): Promise<void>;
  exists(): Promise<boolean>;
  describe(): string;
}

export class FileConfigBackend implements ConfigBackend {
  constructor(readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  exists(): Promise<boolean> {
    return pathExists(this.filePath);
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConfigMissingError('Environment file', this.filePath);
      }
      throw new PersistError(`Cannot read ${this.filePath}: ${errorMessage(error)}`, {
        filePath: this.filePath,
      });
    }
  }

  /** Temp file + rename: readers see the old record or the new one, never a partial write. */
  async write(content: string): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(tmpPath, content, 'utf-8');
      // fs-extra move() deletes the target before renaming; plain rename replaces it in one step
      await rename(tmpPath, this.filePath);
    } catch (error) {
      const cleanupError = await remove(tmpPath).then(
        () => undefined,
        (cleanup: unknown) => errorMessage(cleanup),
      );
      throw new PersistError(`Cannot write ${this.filePath}: ${errorMessage(error)}`, {
        filePath: this.filePath,
        cleanupError,
      });
    }
  }
}

export class MemoryConfigBackend implements ConfigBackend {
  public writes = 0;

  constructor(private content: string, private readonly name: string = 'memory') {}

  describe(): string {
    return this.name;
  }

  async exists(): Promise<boolean> {
    return true;
  }

  async read(): Promise<string> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
    this.writes++;
  }
}

// ============================================================================
// Record parsing
// ============================================================================

function stripQuotes(raw: string): string {
  if (raw.length >= 2) {
    const first = raw[0];
    if ((first === '"' || first === "'") && raw[raw.length - 1] === first) {
      return raw.slice(1, -1);
    }
  }
  return raw;
}

function encodeValue(value: string): string {
  return /^["']|["']$/.test(value) ? `"${value}"` : value;
}

function lineKey(line: string): string | null {
  const eq = line.indexOf('=');
  return eq > 0 ? line.slice(0, eq) : null;
}

function lineValue(line: string): string {
  return stripQuotes(line.slice(line.indexOf('=') + 1).replace(/\r$/, ''));
}

function parsePort(key: string, value: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigError(key, value, 'must be a port number between 1 and 65535');
  }
  return port;
}

// ============================================================================
// Snapshot (cached read)
// ============================================================================

export class ConfigSnapshot {
  private readonly entries = new Map<string, string>();

  constructor(content: string, readonly source: string) {
    for (const line of content.split('\n')) {
      const key = lineKey(line);
      if (key !== null && !this.entries.has(key)) {
        this.entries.set(key, lineValue(line));
      }
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): string {
    const value = this.entries.get(key);
    if (value === undefined) {
      throw new NotFoundError(key, this.source);
    }
    return value;
  }

  /** Exactly 'blue' or 'green'; anything else on disk breaks the one-active-pool rule. */
  getPool(key: string = CONFIG_KEYS.activePool): PoolName {
    const value = this.get(key);
    if (!isPoolName(value)) {
      throw new InvalidConfigError(key, value, "must be 'blue' or 'green'");
    }
    return value;
  }

  getPort(key: string): number {
    return parsePort(key, this.get(key));
  }

  portFor(pool: PoolName): number {
    return this.getPort(POOL_PORT_KEYS[pool]);
  }
}

// ============================================================================
// Store
// ============================================================================

export class ConfigStore {
  constructor(private readonly backend: ConfigBackend) {}

  get source(): string {
    return this.backend.describe();
  }

  exists(): Promise<boolean> {
    return this.backend.exists();
  }

  async snapshot(): Promise<ConfigSnapshot> {
    return new ConfigSnapshot(await this.backend.read(), this.backend.describe());
  }

  async get(key: string): Promise<string> {
    return (await this.snapshot()).get(key);
  }

  async getActivePool(): Promise<PoolName> {
    return (await this.snapshot()).getPool(CONFIG_KEYS.activePool);
  }

  async getPort(key: string): Promise<number> {
    return (await this.snapshot()).getPort(key);
  }

  async set(key: string, value: string): Promise<void> {
    if (/[\r\n]/.test(value)) {
      throw new ValidationError(`Value for ${key} must be a single line`, { key });
    }

    const lines = (await this.backend.read()).split('\n');
    const index = lines.findIndex((line) => lineKey(line) === key);
    if (index === -1) {
      throw new NotFoundError(key, this.backend.describe());
    }

    const lineEnding = lines[index].endsWith('\r') ? '\r' : '';
    lines[index] = `${key}=${encodeValue(value)}${lineEnding}`;

    try {
      await this.backend.write(lines.join('\n'));
    } catch (error) {
      if (error instanceof BlueGreenError) throw error;
      throw new PersistError(`Cannot persist ${key} to ${this.backend.describe()}: ${errorMessage(error)}`, {
        key,
      });
    }
  }
}
