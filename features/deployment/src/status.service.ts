/**
 * StatusReporter - persisted intent next to observed routing
 *
 * Probe and container-listing failures are folded into the view; partial
 * status beats no status. Only an unreadable or invalid record throws.
 */

import type { LoggerLike } from '@bgctl/logger';
import { poolUrl, type ProbeClient } from '@bgctl/runtime';
import {
  CONFIG_KEYS,
  POOL_HEADER,
  ROUTING_PROBE_PATH,
  errorMessage,
  isPoolName,
  type RoutingObservation,
  type StatusView,
} from '@bgctl/shared';
import type { ConfigStore } from './config-store.js';
import type { DeploymentLifecycle } from './lifecycle.service.js';

export interface StatusReporterOptions {
  host?: string;
}

export class StatusReporter {
  private readonly host: string;

  constructor(
    private readonly config: ConfigStore,
    private readonly probe: ProbeClient,
    private readonly lifecycle: DeploymentLifecycle,
    private readonly logger: LoggerLike,
    options: StatusReporterOptions = {},
  ) {
    this.host = options.host ?? 'localhost';
  }

  async snapshot(): Promise<StatusView> {
    const snapshot = await this.config.snapshot();
    const persistedPool = snapshot.getPool(CONFIG_KEYS.activePool);
    const publicPort = snapshot.getPort(CONFIG_KEYS.nginxPort);

    const [containers, routing] = await Promise.all([this.listContainers(), this.observeRouting(publicPort)]);

    return {
      persistedPool,
      publicPort,
      ...containers,
      routing,
      drift: routing.servedBy !== 'unknown' && routing.servedBy !== persistedPool,
    };
  }

  async observeRouting(publicPort: number): Promise<RoutingObservation> {
    const url = poolUrl(this.host, publicPort, ROUTING_PROBE_PATH);
    try {
      const response = await this.probe.get(url);
      const header = response.headers[POOL_HEADER];
      const observation: RoutingObservation = {
        servedBy: isPoolName(header) ? header : 'unknown',
        statusCode: response.statusCode,
        statusLine: response.statusLine,
      };
      if (header !== undefined && !isPoolName(header)) {
        observation.header = header;
      }
      return observation;
    } catch (error) {
      this.logger.debug(`Routing probe of ${url} failed`, { error: errorMessage(error) });
      return { servedBy: 'unknown', error: errorMessage(error) };
    }
  }

  private async listContainers(): Promise<Pick<StatusView, 'containers' | 'containersError'>> {
    try {
      return { containers: await this.lifecycle.listStatus() };
    } catch (error) {
      return { containers: [], containersError: errorMessage(error) };
    }
  }
}
