/**
 * SwitchLock - one writer of ACTIVE_POOL at a time
 *
 * In-process callers queue on a promise chain. When a lock path is given,
 * a lock file (exclusive create) also keeps other bgctl processes out.
 * The holder rewrites the timestamp every `refreshIntervalMs`, so only a
 * lock whose holder died goes stale. Lock files older than `staleMs` are
 * taken over (an unreadable body by its mtime, since it may still be being
 * written); the holder removes the file only while it still carries its
 * own body.
 */

import { readFile, writeFile, rename, remove, stat } from 'fs-extra';
import type { LoggerLike } from '@bgctl/logger';
import { LockTimeoutError, PersistError, errorMessage, isErrnoException, lockFileSchema } from '@bgctl/shared';

export interface SwitchLockOptions {
  lockPath?: string;
  timeoutMs?: number;
  staleMs?: number;
  retryIntervalMs?: number;
  /** Defaults to a third of `staleMs` */
  refreshIntervalMs?: number;
}

interface HeldLock {
  path: string;
  body: string;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const lockBody = () => JSON.stringify({ pid: process.pid, timestamp: new Date().toISOString() });

/** null for a body that is not JSON; its age then comes from the file's mtime */
function parseBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export class SwitchLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly retryIntervalMs: number;
  private readonly refreshIntervalMs: number;

  constructor(
    private readonly logger: LoggerLike,
    private readonly options: SwitchLockOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.staleMs = options.staleMs ?? 60000;
    this.retryIntervalMs = options.retryIntervalMs ?? 100;
    this.refreshIntervalMs = options.refreshIntervalMs ?? Math.max(10, Math.floor(this.staleMs / 3));
  }

  withLock<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.runExclusive(operation));
    // the chain only orders callers; each caller still sees its own rejection through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    const { lockPath } = this.options;
    if (!lockPath) {
      return operation();
    }

    const held = await this.acquire(lockPath);
    const heartbeat = this.keepFresh(held);
    try {
      return await operation();
    } finally {
      await heartbeat.stop();
      await this.release(held);
    }
  }

  private async acquire(lockPath: string): Promise<HeldLock> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.timeoutMs) {
      const body = lockBody();
      try {
        await writeFile(lockPath, body, { encoding: 'utf-8', flag: 'wx' });
        return { path: lockPath, body };
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw new PersistError(`Cannot create lock file ${lockPath}: ${errorMessage(error)}`, { lockPath });
        }
      }

      const existing = await this.readLock(lockPath);
      if (existing !== null && (await this.isStale(lockPath, existing))) {
        // a holder that refreshed in the meantime keeps its lock
        if ((await this.readLock(lockPath)) === existing) {
          this.logger.warn(`Taking over stale lock file ${lockPath}.`, { lockPath });
          await remove(lockPath);
        }
        continue;
      }

      await sleep(this.retryIntervalMs);
    }

    throw new LockTimeoutError(lockPath, this.timeoutMs);
  }

  /** null when the file is gone */
  private async readLock(lockPath: string): Promise<string | null> {
    try {
      return await readFile(lockPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw new PersistError(`Cannot read lock file ${lockPath}: ${errorMessage(error)}`, { lockPath });
    }
  }

  private async isStale(lockPath: string, raw: string): Promise<boolean> {
    const lock = lockFileSchema.safeParse(parseBody(raw));
    if (lock.success) {
      return Date.now() - Date.parse(lock.data.timestamp) > this.staleMs;
    }

    try {
      const { mtimeMs } = await stat(lockPath);
      return Date.now() - mtimeMs > this.staleMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return false;
      throw new PersistError(`Cannot stat lock file ${lockPath}: ${errorMessage(error)}`, { lockPath });
    }
  }

  private keepFresh(held: HeldLock): { stop(): Promise<void> } {
    let pending: Promise<void> = Promise.resolve();
    const timer = setInterval(() => {
      pending = pending.then(() => this.refresh(held));
    }, this.refreshIntervalMs);

    return {
      stop: async () => {
        clearInterval(timer);
        await pending;
      },
    };
  }

  private async refresh(held: HeldLock): Promise<void> {
    try {
      if ((await this.readLock(held.path)) !== held.body) return;
      const body = lockBody();
      // readers never see a half-written body
      const tmpPath = `${held.path}.${process.pid}.tmp`;
      await writeFile(tmpPath, body, 'utf-8');
      await rename(tmpPath, held.path);
      held.body = body;
    } catch (error) {
      this.logger.warn(`Could not refresh lock file ${held.path}: ${errorMessage(error)}`, { lockPath: held.path });
    }
  }

  /** Failures are logged; they never replace the operation's own outcome */
  private async release(held: HeldLock): Promise<void> {
    try {
      if ((await this.readLock(held.path)) === held.body) {
        await remove(held.path);
        return;
      }
      this.logger.warn(`Lock file ${held.path} is no longer ours; leaving it in place.`, { lockPath: held.path });
    } catch (error) {
      this.logger.warn(`Could not release lock file ${held.path}: ${errorMessage(error)}`, { lockPath: held.path });
    }
  }
}
