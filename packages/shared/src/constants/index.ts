/**
 * @bgctl/shared - Constants
 */

import type { PoolName } from '../types/pool.js';

export { getVersion } from './version.js';

// ============================================================================
// Persisted record keys
// ============================================================================

export const CONFIG_KEYS = {
  activePool: 'ACTIVE_POOL',
  nginxPort: 'NGINX_PORT',
  blueAppPort: 'BLUE_APP_PORT',
  greenAppPort: 'GREEN_APP_PORT',
  appInternalPort: 'APP_INTERNAL_PORT',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

export const POOL_PORT_KEYS: Record<PoolName, ConfigKey> = {
  blue: CONFIG_KEYS.blueAppPort,
  green: CONFIG_KEYS.greenAppPort,
};

// ============================================================================
// HTTP contract with the pools and the proxy
// ============================================================================

/** Response header the application sets to name the pool that served a request */
export const POOL_HEADER = 'x-app-pool';
export const ROUTING_PROBE_PATH = '/version';
export const CHAOS_START_PATH = '/chaos/start?mode=error';
export const CHAOS_STOP_PATH = '/chaos/stop';

export const LEGACY_HEAL_POOL: PoolName = 'blue';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULTS = {
  envFile: 'blue-green.env',
  composeFile: 'docker-compose.yml',
  proxyContainer: 'nginx_proxy',
  proxyTemplate: 'deploy/nginx/nginx.conf.template',
  proxyConfPath: '/etc/nginx/conf.d/default.conf',
  probeHost: 'localhost',
  probeTimeoutMs: 5000,
  lockTimeoutMs: 10000,
  lockStaleMs: 60000,
  logLevel: 'info',
  logDir: 'logs',
} as const;
