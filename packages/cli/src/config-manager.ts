import Conf from 'conf';
import { type Schema } from 'conf';
import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { UserConfigSchema, USER_CONFIG_DEFAULTS, type UserConfig } from '@fieldlink/shared/config-schema';
import { findConfigKey, isSensitive, type ConfigStore } from './config-commands.js';
import { fieldlinkHome } from './env.js';
import { logger } from './lib/logger.js';

const CONFIG_JSON_SCHEMA = z.toJSONSchema(UserConfigSchema, {
  target: 'jsonSchema2019-09',
}) as { properties?: Record<string, unknown> };

// conf takes the top-level properties of the generated JSON Schema; their
// shape matches conf's Schema type only at runtime.
const CONF_SCHEMA = (CONFIG_JSON_SCHEMA.properties ?? {}) as unknown as Schema<UserConfig>;

function openConf(home: string): Conf<UserConfig> {
  return new Conf<UserConfig>({
    configName: 'config',
    cwd: home,
    schema: CONF_SCHEMA,
    defaults: USER_CONFIG_DEFAULTS,
    clearInvalidConfig: false,
  });
}

/** Open config.json, moving a file conf refuses to load to config.json.bak. */
function openOrRecover(home: string, file: string): Conf<UserConfig> {
  try {
    return openConf(home);
  } catch (err) {
    if (!fs.existsSync(file)) throw err;
    const backup = `${file}.bak`;
    fs.renameSync(file, backup);
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn(`Could not load ${file} (${reason}); moved it to ${backup}, starting from defaults`);
    return openConf(home);
  }
}

/**
 * config.json in the fieldlink home, stored through conf.
 *
 * Writes are checked against the JSON Schema that zod derives from
 * UserConfigSchema. Keys are dot paths such as `deviceApi.callTimeoutMs`.
 */
export class ConfigManager implements ConfigStore {
  /** True when config.json did not exist before this run */
  readonly isFirstRun: boolean;
  private readonly conf: Conf<UserConfig>;

  constructor(home: string = fieldlinkHome()) {
    const file = path.join(home, 'config.json');
    this.isFirstRun = !fs.existsSync(file);
    this.conf = openOrRecover(home, file);
  }

  get path(): string {
    return this.conf.path;
  }

  get<K extends keyof UserConfig>(section: K): UserConfig[K] {
    return this.conf.get(section);
  }

  getDot(key: string): unknown {
    return this.conf.get(key as keyof UserConfig);
  }

  /** Store a value; storing a secret returns a warning for the user. */
  setDot(key: string, value: unknown): { warning?: string } {
    this.conf.set(key as keyof UserConfig, value as UserConfig[keyof UserConfig]);
    if (!isSensitive(key)) return {};
    const env = findConfigKey(key)?.env;
    return {
      warning: `${key} is stored in plain text in ${this.path}${env ? `; ${env} keeps it out of the file` : ''}`,
    };
  }

  getAll(): UserConfig {
    return this.conf.store;
  }

  /** Put one key, or the whole file, back to its defaults. */
  reset(key?: string): void {
    if (key === undefined) {
      this.conf.clear();
      this.conf.set(USER_CONFIG_DEFAULTS);
      return;
    }
    const entry = findConfigKey(key);
    if (!entry) {
      throw new Error(`Unknown config key: ${key}`);
    }
    this.conf.set(key as keyof UserConfig, entry.read(USER_CONFIG_DEFAULTS) as UserConfig[keyof UserConfig]);
  }

  validate(): { valid: boolean; errors?: string[] } {
    const result = UserConfigSchema.safeParse(this.conf.store);
    if (result.success) return { valid: true };
    return {
      valid: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
}

/** Create the config manager for a run. */
export function initConfigManager(home?: string): ConfigManager {
  return new ConfigManager(home);
}
