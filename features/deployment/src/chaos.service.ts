/**
 * ChaosDriver - inject and clear synthetic failures on a pool
 *
 * A failed injection is fatal (ChaosInjectionError): a test run that
 * believes chaos is on when it is not is worthless. A failed heal is only
 * a warning: the pool may never have been in chaos mode.
 */

import type { LoggerLike } from '@bgctl/logger';
import { isSuccessStatus, poolUrl, type ProbeClient, type ProbeResponse } from '@bgctl/runtime';
import {
  CHAOS_START_PATH,
  CHAOS_STOP_PATH,
  CONFIG_KEYS,
  ChaosInjectionError,
  InvalidConfigError,
  LEGACY_HEAL_POOL,
  NotFoundError,
  POOL_HEADER,
  POOL_NAMES,
  POOL_PORT_KEYS,
  ROUTING_PROBE_PATH,
  errorMessage,
  isPoolName,
  otherPool,
  type ChaosResult,
  type HealMode,
  type PoolName,
} from '@bgctl/shared';
import type { ConfigStore, ConfigSnapshot } from './config-store.js';

export interface ChaosDriverOptions {
  host?: string;
  /** When false, any HTTP answer from the chaos endpoint counts as acknowledged */
  requireSuccessStatus?: boolean;
}

export class ChaosDriver {
  private readonly host: string;
  private readonly requireSuccessStatus: boolean;

  constructor(
    private readonly config: ConfigStore,
    private readonly probe: ProbeClient,
    private readonly logger: LoggerLike,
    options: ChaosDriverOptions = {},
  ) {
    this.host = options.host ?? 'localhost';
    this.requireSuccessStatus = options.requireSuccessStatus ?? true;
  }

  /** Defaults to the persisted active pool. */
  async induceChaos(pool?: PoolName): Promise<ChaosResult> {
    const snapshot = await this.config.snapshot();
    const target = pool ?? snapshot.getPool(CONFIG_KEYS.activePool);
    const port = snapshot.portFor(target);

    this.logger.warn(`Attempting to induce chaos on the ${target} pool via port ${port}...`, { pool: target, port });

    let response: ProbeResponse;
    try {
      response = await this.probe.post(poolUrl(this.host, port, CHAOS_START_PATH));
    } catch (error) {
      throw new ChaosInjectionError(target, port, errorMessage(error));
    }

    if (this.requireSuccessStatus && !isSuccessStatus(response.statusCode)) {
      throw new ChaosInjectionError(target, port, `chaos endpoint answered ${response.statusLine}`);
    }

    this.logger.success(
      `Chaos successfully triggered on ${target}. Nginx should now fail over to the ${otherPool(target)} pool.`,
      { pool: target, port, statusCode: response.statusCode },
    );
    return { pool: target, port, action: 'start', ok: true, statusCode: response.statusCode };
  }

  /** Never throws for transport failures; reports them as ok=false. */
  async healChaos(pool?: PoolName, mode: HealMode = 'dynamic'): Promise<ChaosResult> {
    const snapshot = await this.config.snapshot();
    const target = pool ?? (await this.resolveHealTarget(snapshot, mode));
    const port = snapshot.portFor(target);

    this.logger.info(
      `Attempting to stop chaos on the ${target} pool (port ${port}) to allow automatic recovery...`,
      { pool: target, port, mode },
    );

    let response: ProbeResponse;
    try {
      response = await this.probe.post(poolUrl(this.host, port, CHAOS_STOP_PATH));
    } catch (error) {
      return this.healFailed(target, port, errorMessage(error));
    }

    if (this.requireSuccessStatus && !isSuccessStatus(response.statusCode)) {
      return this.healFailed(target, port, `chaos endpoint answered ${response.statusLine}`, response.statusCode);
    }

    this.logger.success(`Chaos stopped on the ${target} pool. Nginx should eventually route traffic back to it.`, {
      pool: target,
      port,
    });
    return { pool: target, port, action: 'stop', ok: true, statusCode: response.statusCode };
  }

  /**
   * Which pool to heal when none is named.
   * - legacy: always blue
   * - dynamic: the active pool when the proxy is serving from the other one;
   *   otherwise the first pool whose direct /version answers 5xx;
   *   otherwise the active pool
   * Ports missing from the record only skip their probe.
   */
  async resolveHealTarget(snapshot: ConfigSnapshot, mode: HealMode): Promise<PoolName> {
    if (mode === 'legacy') {
      this.logger.info(`Legacy heal mode: targeting the ${LEGACY_HEAL_POOL} pool.`);
      return LEGACY_HEAL_POOL;
    }

    const active = snapshot.getPool(CONFIG_KEYS.activePool);

    const proxyPort = this.probePort(snapshot, CONFIG_KEYS.nginxPort);
    const routed = proxyPort === null ? null : await this.observe(poolUrl(this.host, proxyPort, ROUTING_PROBE_PATH));
    const servedBy = routed?.headers[POOL_HEADER];
    if (isPoolName(servedBy) && servedBy !== active) {
      this.logger.info(`Traffic is served by ${servedBy} while ${active} is active; ${active} is failing.`);
      return active;
    }

    for (const pool of POOL_NAMES) {
      const port = this.probePort(snapshot, POOL_PORT_KEYS[pool]);
      if (port === null) continue;
      const direct = await this.observe(poolUrl(this.host, port, ROUTING_PROBE_PATH));
      if (direct && direct.statusCode >= 500) {
        this.logger.info(`The ${pool} pool answers ${direct.statusLine}; it is failing.`);
        return pool;
      }
    }

    return active;
  }

  /** A port the heal heuristic cannot read only skips that probe */
  private probePort(snapshot: ConfigSnapshot, key: string): number | null {
    try {
      return snapshot.getPort(key);
    } catch (error) {
      if (!(error instanceof NotFoundError || error instanceof InvalidConfigError)) throw error;
      this.logger.warn(`${error.message}; not probing it.`, { key });
      return null;
    }
  }

  private async observe(url: string): Promise<ProbeResponse | null> {
    try {
      return await this.probe.get(url);
    } catch (error) {
      this.logger.debug(`Probe of ${url} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private healFailed(pool: PoolName, port: number, reason: string, statusCode?: number): ChaosResult {
    this.logger.warn(
      `Could not stop chaos on the ${pool} pool (port ${port}): ${reason}. It may not have been running or in chaos mode.`,
      { pool, port },
    );
    return { pool, port, action: 'stop', ok: false, statusCode, error: reason };
  }
}
