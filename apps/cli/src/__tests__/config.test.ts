/**
 * Settings loader tests
 */

import { ValidationError } from '@bgctl/shared';
import { loadLoggingSettings, loadSettings } from '../lib/config.js';

describe('loadSettings', () => {
  it('reads BG_* variables', () => {
    const settings = loadSettings({
      BG_ENV_FILE: '/srv/bg/blue-green.env',
      BG_PROXY_CONTAINER: 'edge',
      BG_PROBE_TIMEOUT_MS: '1500',
      BG_CHAOS_LENIENT: 'TRUE',
    });

    expect(settings).toMatchObject({
      envFile: '/srv/bg/blue-green.env',
      composeFile: 'docker-compose.yml',
      proxyContainer: 'edge',
      probeTimeoutMs: 1500,
      chaosLenient: true,
    });
  });

  it('lets flags override the environment', () => {
    const settings = loadSettings(
      { BG_ENV_FILE: 'from-env.env', BG_COMPOSE_FILE: 'from-env.yml' },
      { envFile: 'from-flag.env' },
    );

    expect(settings.envFile).toBe('from-flag.env');
    expect(settings.composeFile).toBe('from-env.yml');
  });

  it('treats empty variables as unset', () => {
    const settings = loadSettings({ BG_ENV_FILE: '', BG_CHAOS_LENIENT: '' });

    expect(settings.envFile).toBe('blue-green.env');
    expect(settings.chaosLenient).toBe(false);
  });

  it('reads any other flag value as false', () => {
    expect(loadSettings({ BG_CHAOS_LENIENT: '0' }).chaosLenient).toBe(false);
    expect(loadSettings({ BG_CHAOS_LENIENT: 'yes' }).chaosLenient).toBe(true);
  });

  it('rejects invalid values with ValidationError', () => {
    expect(() => loadSettings({ BG_PROBE_TIMEOUT_MS: 'soon' })).toThrow(ValidationError);
    expect(() => loadSettings({ BG_PROBE_TIMEOUT_MS: 'soon' })).toThrow(/^Invalid settings: probeTimeoutMs: /);
  });
});

describe('loadLoggingSettings', () => {
  it('falls back to defaults for unknown levels', () => {
    expect(loadLoggingSettings({ LOG_LEVEL: 'verbose' })).toEqual({ logLevel: 'info', logDir: 'logs' });
    expect(loadLoggingSettings({ LOG_LEVEL: 'debug', LOG_DIR: '/var/log/bgctl' })).toEqual({
      logLevel: 'debug',
      logDir: '/var/log/bgctl',
    });
  });
});
