/**
 * @bgctl/shared - Settings Zod Schema
 */

import { z } from 'zod';
import { DEFAULTS } from '../constants/index.js';

export const logLevelSchema = z.enum(['error', 'warn', 'success', 'status', 'info', 'debug']);

export const settingsSchema = z.object({
  envFile: z.string().min(1).default(DEFAULTS.envFile),
  composeFile: z.string().min(1).default(DEFAULTS.composeFile),
  proxyContainer: z.string().min(1).default(DEFAULTS.proxyContainer),
  proxyTemplate: z.string().min(1).default(DEFAULTS.proxyTemplate),
  proxyConfPath: z.string().startsWith('/').default(DEFAULTS.proxyConfPath),
  probeHost: z.string().min(1).default(DEFAULTS.probeHost),
  probeTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.probeTimeoutMs),
  lockTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.lockTimeoutMs),
  chaosLenient: z.boolean().default(false),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

/** Logging must come up even when the rest of the settings are invalid */
export const loggingSettingsSchema = z.object({
  logLevel: logLevelSchema.catch(DEFAULTS.logLevel),
  logDir: z.string().min(1).catch(DEFAULTS.logDir),
});

export type LoggingSettings = z.infer<typeof loggingSettingsSchema>;

export const lockFileSchema = z.object({
  pid: z.number().int(),
  timestamp: z.string().datetime(),
});

export type LockFileContent = z.infer<typeof lockFileSchema>;
