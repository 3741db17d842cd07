import { LOG_LEVEL_MAP } from '@fieldlink/shared/config-schema';
import type { LogLevelName } from '@fieldlink/shared/config-schema';
import type { ConfigStore } from './config-commands.js';
import type { CliEnv } from './env.js';
import { CliError } from './errors.js';

/** Connection-related command-line flags. */
export interface ConnectionFlags {
  url?: string;
  directoryUrl?: string;
  token?: string;
  project?: string;
  logLevel?: string;
}

export interface ConnectionSettings {
  url: string;
  /** Falls back to `url` */
  directoryUrl: string;
  token: string | null;
  project: string | null;
  callTimeoutMs: number;
}

export function isLogLevel(name: string): name is LogLevelName {
  return Object.hasOwn(LOG_LEVEL_MAP, name);
}

/** `--log-level` > FIELDLINK_LOG_LEVEL > `logging.level` */
export function resolveLogLevel(flags: ConnectionFlags, cliEnv: CliEnv, store: ConfigStore): LogLevelName {
  if (flags.logLevel !== undefined) {
    if (!isLogLevel(flags.logLevel)) {
      throw new CliError(
        `Invalid log level '${flags.logLevel}'. Use one of: ${Object.keys(LOG_LEVEL_MAP).join(', ')}`,
        { usage: true },
      );
    }
    return flags.logLevel;
  }
  return cliEnv.FIELDLINK_LOG_LEVEL ?? store.getAll().logging.level;
}

/** Each setting: flag > environment > config file. */
export function resolveConnection(flags: ConnectionFlags, cliEnv: CliEnv, store: ConfigStore): ConnectionSettings {
  const config = store.getAll();
  const url = flags.url ?? cliEnv.FIELDLINK_API_URL ?? config.api.url;
  if (!url) {
    throw new CliError(
      "No fleet service URL. Pass --url, set FIELDLINK_API_URL or run 'fieldlink init'.",
      { usage: true },
    );
  }
  return {
    url,
    directoryUrl: flags.directoryUrl ?? cliEnv.FIELDLINK_DIRECTORY_URL ?? config.api.directoryUrl ?? url,
    token: flags.token ?? cliEnv.FIELDLINK_API_TOKEN ?? config.api.token,
    project: flags.project ?? cliEnv.FIELDLINK_PROJECT ?? config.api.project,
    callTimeoutMs: config.deviceApi.callTimeoutMs,
  };
}
