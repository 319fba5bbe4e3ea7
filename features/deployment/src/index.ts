/**
 * @bgctl/deployment
 *
 * Pool switching, proxy reload, chaos injection and status, wired from
 * settings. Tests and embedders replace any collaborator through
 * `DeploymentOverrides`.
 */

import type { LoggerLike } from '@bgctl/logger';
import { ProbeClient, getLocalExec, type CommandRunner } from '@bgctl/runtime';
import { DEFAULTS, type Settings } from '@bgctl/shared';
import { ChaosDriver } from './chaos.service.js';
import { ConfigStore, FileConfigBackend, type ConfigBackend } from './config-store.js';
import { DockerComposeLifecycle, type DeploymentLifecycle } from './lifecycle.service.js';
import { SwitchLock } from './lock.js';
import {
  DockerProxyRuntime,
  FileTemplateSource,
  ProxyController,
  type ProxyRuntime,
  type TemplateSource,
} from './proxy.service.js';
import { StatusReporter } from './status.service.js';
import { PoolSwitcher } from './switch.service.js';

export * from './config-store.js';
export * from './template.js';
export * from './proxy.service.js';
export * from './lock.js';
export * from './switch.service.js';
export * from './chaos.service.js';
export * from './lifecycle.service.js';
export * from './status.service.js';
export { verifyDeploymentFiles } from './preflight.js';

export type DeploymentSettings = Pick<
  Settings,
  | 'envFile'
  | 'composeFile'
  | 'proxyContainer'
  | 'proxyTemplate'
  | 'proxyConfPath'
  | 'probeHost'
  | 'probeTimeoutMs'
  | 'lockTimeoutMs'
  | 'chaosLenient'
>;

export interface DeploymentOverrides {
  backend?: ConfigBackend;
  runner?: CommandRunner;
  probe?: ProbeClient;
  templates?: TemplateSource;
  proxyRuntime?: ProxyRuntime;
  lifecycle?: DeploymentLifecycle;
}

export interface DeploymentServices {
  config: ConfigStore;
  proxy: ProxyController;
  switcher: PoolSwitcher;
  chaos: ChaosDriver;
  status: StatusReporter;
  lifecycle: DeploymentLifecycle;
}

export function createDeploymentServices(
  settings: DeploymentSettings,
  logger: LoggerLike,
  overrides: DeploymentOverrides = {},
): DeploymentServices {
  const runner = overrides.runner ?? getLocalExec();
  const probe = overrides.probe ?? new ProbeClient({ timeoutMs: settings.probeTimeoutMs });
  const config = new ConfigStore(overrides.backend ?? new FileConfigBackend(settings.envFile));

  const lifecycle =
    overrides.lifecycle ??
    new DockerComposeLifecycle(runner, { envFile: settings.envFile, composeFile: settings.composeFile });

  const proxy = new ProxyController(
    config,
    overrides.templates ?? new FileTemplateSource(settings.proxyTemplate),
    overrides.proxyRuntime ??
      new DockerProxyRuntime(runner, { container: settings.proxyContainer, confPath: settings.proxyConfPath }),
    logger,
  );

  // the lock file sits next to the record it protects
  const lock = new SwitchLock(logger, {
    lockPath: overrides.backend ? undefined : `${settings.envFile}.lock`,
    timeoutMs: settings.lockTimeoutMs,
    staleMs: DEFAULTS.lockStaleMs,
  });

  return {
    config,
    proxy,
    switcher: new PoolSwitcher(config, proxy, lock, logger),
    chaos: new ChaosDriver(config, probe, logger, {
      host: settings.probeHost,
      requireSuccessStatus: !settings.chaosLenient,
    }),
    status: new StatusReporter(config, probe, lifecycle, logger, { host: settings.probeHost }),
    lifecycle,
  };
}
