/**
 * @bgctl/cli - Settings Loader
 *
 * Environment variables, overridden by --env-file / --compose-file.
 */

import {
  ValidationError,
  loggingSettingsSchema,
  settingsSchema,
  type LoggingSettings,
  type Settings,
} from '@bgctl/shared';

export type GlobalFlags = {
  envFile?: string;
  composeFile?: string;
};

/** '1' | 'true' | 'yes' (any case) */
function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

// empty variables count as unset
const fromEnv = (value: string | undefined) => (value === '' ? undefined : value);

export function loadSettings(env: NodeJS.ProcessEnv = process.env, flags: GlobalFlags = {}): Settings {
  const parsed = settingsSchema.safeParse({
    envFile: flags.envFile ?? fromEnv(env.BG_ENV_FILE),
    composeFile: flags.composeFile ?? fromEnv(env.BG_COMPOSE_FILE),
    proxyContainer: fromEnv(env.BG_PROXY_CONTAINER),
    proxyTemplate: fromEnv(env.BG_PROXY_TEMPLATE),
    proxyConfPath: fromEnv(env.BG_PROXY_CONF_PATH),
    probeHost: fromEnv(env.BG_PROBE_HOST),
    probeTimeoutMs: fromEnv(env.BG_PROBE_TIMEOUT_MS),
    lockTimeoutMs: fromEnv(env.BG_LOCK_TIMEOUT_MS),
    chaosLenient: parseFlag(env.BG_CHAOS_LENIENT),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid settings: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export function loadLoggingSettings(env: NodeJS.ProcessEnv = process.env): LoggingSettings {
  return loggingSettingsSchema.parse({
    logLevel: fromEnv(env.LOG_LEVEL),
    logDir: fromEnv(env.LOG_DIR),
  });
}
