/**
 * ProxyController / DockerProxyRuntime tests
 */

import { readFileSync } from 'node:fs';
import { pathExists } from 'fs-extra';
import { ProxyUnreachableError, TemplateError } from '@bgctl/shared';
import { ConfigStore, MemoryConfigBackend } from '../config-store.js';
import { DockerProxyRuntime, ProxyController } from '../proxy.service.js';
import { FakeProxyRuntime, FakeRunner, RecordingLogger, inlineTemplate } from '../../../../test/support.js';

const RECORD = 'ACTIVE_POOL=green\nNGINX_PORT=8080\nBLUE_APP_PORT=8081\nGREEN_APP_PORT=8082\nAPP_INTERNAL_PORT=3000\n';
const TEMPLATE = 'listen ${NGINX_PORT}; primary ${ACTIVE_POOL}; backup ${BACKUP_POOL}; port ${APP_INTERNAL_PORT}';

describe('ProxyController', () => {
  let runtime: FakeProxyRuntime;
  let logger: RecordingLogger;

  const controller = (record = RECORD) =>
    new ProxyController(new ConfigStore(new MemoryConfigBackend(record)), inlineTemplate(TEMPLATE), runtime, logger);

  beforeEach(() => {
    runtime = new FakeProxyRuntime();
    logger = new RecordingLogger();
  });

  it('renders the active pool as primary and the other as backup', async () => {
    const result = await controller().reload();

    expect(result).toEqual({ activePool: 'green', publicPort: 8080, internalPort: 3000 });
    expect(runtime.applied).toEqual(['listen 8080; primary green; backup blue; port 3000']);
    expect(logger.messages('info')).toEqual(['Reloading nginx configuration...']);
  });

  it('is repeatable with unchanged inputs', async () => {
    const proxy = controller();
    await proxy.reload();
    await proxy.reload();

    expect(runtime.applied).toHaveLength(2);
    expect(runtime.applied[0]).toBe(runtime.applied[1]);
  });

  it('turns a missing parameter into TemplateError without touching the proxy', async () => {
    const attempt = controller('ACTIVE_POOL=blue\nNGINX_PORT=8080\n').reload();

    await expect(attempt).rejects.toThrow(
      new TemplateError('Missing template parameter: APP_INTERNAL_PORT is not set in memory'),
    );
    expect(runtime.applied).toEqual([]);
  });

  it('wraps unexpected runtime failures in ProxyUnreachableError', async () => {
    runtime.failure = new Error('socket hang up');

    const attempt = controller().reload();

    await expect(attempt).rejects.toBeInstanceOf(ProxyUnreachableError);
    await expect(attempt).rejects.toThrow('Proxy reload failed: socket hang up');
  });

  it('passes typed proxy errors through unchanged', async () => {
    const rejected = new TemplateError('nginx rejected the generated configuration');
    runtime.failure = rejected;

    await expect(controller().reload()).rejects.toBe(rejected);
  });
});

describe('DockerProxyRuntime', () => {
  const options = { container: 'nginx_proxy', confPath: '/etc/nginx/conf.d/default.conf' };

  it('checks the container, copies the config, tests it, then reloads', async () => {
    let copied = '';
    let tmpPath = '';
    const runner = new FakeRunner((args) => {
      if (args[0] === 'inspect') return { stdout: 'true\n' };
      if (args[0] === 'cp') {
        tmpPath = args[1];
        copied = readFileSync(tmpPath, 'utf-8');
      }
      return {};
    });

    await new DockerProxyRuntime(runner, options).apply('listen 8080;');

    expect(runner.calls.map((call) => call.args)).toEqual([
      ['inspect', '-f', '{{.State.Running}}', 'nginx_proxy'],
      ['cp', tmpPath, 'nginx_proxy:/etc/nginx/conf.d/default.conf'],
      ['exec', 'nginx_proxy', 'nginx', '-t'],
      ['exec', 'nginx_proxy', 'nginx', '-s', 'reload'],
    ]);
    expect(runner.calls.every((call) => call.file === 'docker')).toBe(true);
    expect(copied).toBe('listen 8080;');
    expect(await pathExists(tmpPath)).toBe(false);
  });

  it('stops when the proxy container is not running', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'false\n' }));

    await expect(new DockerProxyRuntime(runner, options).apply('x')).rejects.toThrow(
      new ProxyUnreachableError("Proxy container 'nginx_proxy' is not running"),
    );
    expect(runner.calls).toHaveLength(1);
  });

  it('reports a config nginx rejects as TemplateError and does not reload', async () => {
    const runner = new FakeRunner((args) => {
      if (args[0] === 'inspect') return { stdout: 'true\n' };
      if (args.includes('-t')) return { code: 1, stderr: 'nginx: [emerg] unknown directive "lsten"\n' };
      return {};
    });

    await expect(new DockerProxyRuntime(runner, options).apply('lsten 8080;')).rejects.toThrow(
      new TemplateError('nginx rejected the generated configuration: nginx: [emerg] unknown directive "lsten"'),
    );
    expect(runner.calls.some((call) => call.args.includes('reload'))).toBe(false);
  });

  it('reports a failed reload as ProxyUnreachableError', async () => {
    const runner = new FakeRunner((args) => {
      if (args[0] === 'inspect') return { stdout: 'true\n' };
      if (args.includes('reload')) return { code: 1, stderr: 'signal process failed' };
      return {};
    });

    await expect(new DockerProxyRuntime(runner, options).apply('listen 8080;')).rejects.toThrow(
      "nginx reload failed in 'nginx_proxy': signal process failed",
    );
  });

  it('reports a missing docker binary as ProxyUnreachableError', async () => {
    const runner = new FakeRunner(() => {
      throw new Error('Cannot run docker: spawn docker ENOENT');
    });

    await expect(new DockerProxyRuntime(runner, options).apply('x')).rejects.toThrow(
      new ProxyUnreachableError("Cannot reach proxy container 'nginx_proxy': Cannot run docker: spawn docker ENOENT"),
    );
  });
});
