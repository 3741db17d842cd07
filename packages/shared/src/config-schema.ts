import { z } from 'zod';
import { DEFAULT_CALL_TIMEOUT_MS } from './constants.js';

/** Sensitive fields that trigger a warning when set via CLI */
export const SENSITIVE_CONFIG_KEYS = ['api.token'] as const;

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export const UserConfigSchema = z.object({
  version: z.literal(1),
  api: z
    .object({
      url: z.string().url().nullable().default(null),
      token: z.string().nullable().default(null),
      project: z.string().nullable().default(null),
      directoryUrl: z.string().url().nullable().default(null),
    })
    .default(() => ({ url: null, token: null, project: null, directoryUrl: null })),
  deviceApi: z
    .object({
      callTimeoutMs: z.number().int().min(1).default(DEFAULT_CALL_TIMEOUT_MS),
    })
    .default(() => ({ callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS })),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

export type LogLevelName = UserConfig['logging']['level'];

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Defaults extracted from schema for conf constructor */
export const USER_CONFIG_DEFAULTS: UserConfig = UserConfigSchema.parse({
  version: 1,
});
