/**
 * ProxyController - regenerate the nginx routing config and hot-reload it
 *
 * Flow:
 * 1. Snapshot NGINX_PORT / ACTIVE_POOL / APP_INTERNAL_PORT
 * 2. Render the template (backup pool = the other pool)
 * 3. Push the config into the proxy container, `nginx -t`, `nginx -s reload`
 *
 * `nginx -s reload` lets old workers finish in-flight requests, so no
 * connection is dropped. Reloading unchanged inputs is a no-op for nginx.
 */

import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readFile, writeFile, remove } from 'fs-extra';
import type { LoggerLike } from '@bgctl/logger';
import type { CommandRunner, ExecResult } from '@bgctl/runtime';
import {
  BlueGreenError,
  CONFIG_KEYS,
  NotFoundError,
  ProxyUnreachableError,
  TemplateError,
  errorMessage,
  isErrnoException,
  otherPool,
  type ReloadResult,
} from '@bgctl/shared';
import type { ConfigStore, ConfigSnapshot } from './config-store.js';
import { renderProxyTemplate, type TemplateParams } from './template.js';

// ============================================================================
// Collaborator interfaces
// ============================================================================

export interface TemplateSource {
  load(): Promise<string>;
  describe(): string;
}

/** The running proxy process: accepts a rendered config and reloads gracefully. */
export interface ProxyRuntime {
  apply(config: string): Promise<void>;
  describe(): string;
}

export class FileTemplateSource implements TemplateSource {
  constructor(private readonly templatePath: string) {}

  describe(): string {
    return this.templatePath;
  }

  async load(): Promise<string> {
    try {
      return await readFile(this.templatePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new TemplateError(`Proxy template '${this.templatePath}' not found`);
      }
      throw new TemplateError(`Cannot read proxy template '${this.templatePath}': ${errorMessage(error)}`);
    }
  }
}

// ============================================================================
// Docker-hosted nginx
// ============================================================================

export interface DockerProxyOptions {
  container: string;
  confPath: string;
  timeoutMs?: number;
}

export class DockerProxyRuntime implements ProxyRuntime {
  private readonly timeoutMs: number;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: DockerProxyOptions,
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  describe(): string {
    return `docker:${this.options.container}`;
  }

  async apply(config: string): Promise<void> {
    const { container, confPath } = this.options;

    const running = await this.docker(['inspect', '-f', '{{.State.Running}}', container]);
    if (running.code !== 0 || running.stdout.trim() !== 'true') {
      throw new ProxyUnreachableError(`Proxy container '${container}' is not running`, {
        container,
        stderr: running.stderr.trim(),
      });
    }

    const tmpPath = join(tmpdir(), `bgctl-nginx-${process.pid}-${Date.now()}.conf`);
    await writeFile(tmpPath, config, 'utf-8');
    try {
      const copied = await this.docker(['cp', tmpPath, `${container}:${confPath}`]);
      if (copied.code !== 0) {
        throw new ProxyUnreachableError(`Cannot copy config into '${container}': ${copied.stderr.trim()}`, {
          container,
        });
      }
    } finally {
      await remove(tmpPath);
    }

    // nginx keeps serving the previous config when the test fails: no reload has happened
    const tested = await this.docker(['exec', container, 'nginx', '-t']);
    if (tested.code !== 0) {
      throw new TemplateError(`nginx rejected the generated configuration: ${tested.stderr.trim()}`, {
        container,
      });
    }

    const reloaded = await this.docker(['exec', container, 'nginx', '-s', 'reload']);
    if (reloaded.code !== 0) {
      throw new ProxyUnreachableError(`nginx reload failed in '${container}': ${reloaded.stderr.trim()}`, {
        container,
      });
    }
  }

  private async docker(args: string[]): Promise<ExecResult> {
    try {
      return await this.runner.run('docker', args, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ProxyUnreachableError(`Cannot reach proxy container '${this.options.container}': ${errorMessage(error)}`, {
        container: this.options.container,
      });
    }
  }
}

// ============================================================================
// Controller
// ============================================================================

export class ProxyController {
  constructor(
    private readonly config: ConfigStore,
    private readonly templates: TemplateSource,
    private readonly runtime: ProxyRuntime,
    private readonly logger: LoggerLike,
  ) {}

  async reload(): Promise<ReloadResult> {
    const snapshot = await this.config.snapshot();
    const result = this.readParameters(snapshot);
    const params: TemplateParams = {
      NGINX_PORT: String(result.publicPort),
      ACTIVE_POOL: result.activePool,
      BACKUP_POOL: otherPool(result.activePool),
      APP_INTERNAL_PORT: String(result.internalPort),
    };

    const rendered = renderProxyTemplate(await this.templates.load(), params);

    this.logger.info('Reloading nginx configuration...', {
      activePool: result.activePool,
      runtime: this.runtime.describe(),
    });

    try {
      await this.runtime.apply(rendered);
    } catch (error) {
      if (error instanceof BlueGreenError) throw error;
      throw new ProxyUnreachableError(`Proxy reload failed: ${errorMessage(error)}`, {
        runtime: this.runtime.describe(),
      });
    }

    this.logger.debug('nginx reloaded', { ...result });
    return result;
  }

  private readParameters(snapshot: ConfigSnapshot): ReloadResult {
    try {
      return {
        activePool: snapshot.getPool(CONFIG_KEYS.activePool),
        publicPort: snapshot.getPort(CONFIG_KEYS.nginxPort),
        internalPort: snapshot.getPort(CONFIG_KEYS.appInternalPort),
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new TemplateError(`Missing template parameter: ${error.key} is not set in ${snapshot.source}`, {
          parameter: error.key,
        });
      }
      throw error;
    }
  }
}
