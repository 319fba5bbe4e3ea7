/**
 * PoolSwitcher - move live traffic to the requested pool
 *
 * Flow:
 * 1. Validate the pool name (no side effects on failure)
 * 2. Under the switch lock, read ACTIVE_POOL
 * 3. Same pool: warn and return changed=false (no write, no reload)
 * 4. Atomic write of ACTIVE_POOL, then ProxyController.reload()
 *
 * The write and the reload are not one transaction. When the reload fails
 * the new ACTIVE_POOL stays on disk and SwitchNotLiveError is thrown;
 * `retryReload()` brings nginx in line with it.
 */

import type { LoggerLike } from '@bgctl/logger';
import {
  BlueGreenError,
  CONFIG_KEYS,
  ProxyUnreachableError,
  SwitchNotLiveError,
  errorMessage,
  parsePool,
  type ReloadResult,
  type SwitchResult,
} from '@bgctl/shared';
import type { ConfigStore } from './config-store.js';
import type { ProxyController } from './proxy.service.js';
import type { SwitchLock } from './lock.js';

export class PoolSwitcher {
  constructor(
    private readonly config: ConfigStore,
    private readonly proxy: ProxyController,
    private readonly lock: SwitchLock,
    private readonly logger: LoggerLike,
  ) {}

  async switchTo(requested: string): Promise<SwitchResult> {
    const target = parsePool(requested);
    const startTime = Date.now();

    return this.lock.withLock(async () => {
      const current = await this.config.getActivePool();

      if (current === target) {
        this.logger.warn(`Pool is already set to ${target}. Skipping switch.`, { pool: target });
        return { changed: false, from: current, to: target, durationMs: Date.now() - startTime };
      }

      this.logger.info(`Switching ACTIVE_POOL from ${current} to ${target} in ${this.config.source}...`, {
        from: current,
        to: target,
      });
      await this.config.set(CONFIG_KEYS.activePool, target);

      try {
        await this.proxy.reload();
      } catch (error) {
        const reloadError =
          error instanceof BlueGreenError ? error : new ProxyUnreachableError(errorMessage(error));
        throw new SwitchNotLiveError(target, current, reloadError);
      }

      this.logger.success(`Pool switched to ${target} and nginx reloaded successfully.`, {
        from: current,
        to: target,
      });
      return { changed: true, from: current, to: target, durationMs: Date.now() - startTime };
    });
  }

  /** Reload only: re-applies the persisted ACTIVE_POOL after a STATE_NOT_LIVE failure. */
  async retryReload(): Promise<ReloadResult> {
    return this.lock.withLock(async () => {
      const result = await this.proxy.reload();
      this.logger.success(`nginx reloaded; live traffic follows ${result.activePool}.`, { ...result });
      return result;
    });
  }
}
