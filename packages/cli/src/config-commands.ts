/**
 * `fieldlink config …`: inspect and change config.json.
 *
 * Every key the CLI knows is described in {@link CONFIG_KEYS}: how a value
 * typed on the command line is parsed, what it accepts, and which
 * environment variable overrides it. Secrets are masked in everything
 * except `config get`.
 *
 * @module cli/config-commands
 */
import { execFileSync } from 'node:child_process';
import { z } from 'zod';
import {
  LOG_LEVEL_MAP,
  SENSITIVE_CONFIG_KEYS,
  USER_CONFIG_DEFAULTS,
  type UserConfig,
} from '@fieldlink/shared/config-schema';
import type { CliEnv } from './env.js';
import { CliError } from './errors.js';
import { formatTable } from './output.js';

/** Config operations the CLI commands need; ConfigManager in production. */
export interface ConfigStore {
  getAll(): UserConfig;
  getDot(key: string): unknown;
  setDot(key: string, value: unknown): { warning?: string };
  reset(key?: string): void;
  validate(): { valid: boolean; errors?: string[] };
  readonly path: string;
}

type ConfigValue = string | number | null;

export interface ConfigKey {
  name: string;
  /** What `set` takes, shown by `config` and in parse errors */
  accepts: string;
  /** Environment variable that takes precedence over the stored value */
  env?: keyof CliEnv;
  read(config: UserConfig): ConfigValue;
  /** @throws {CliError} when the value is not accepted */
  parse(raw: string): ConfigValue;
}

const MASK = '********';
const UNSET = '(unset)';
const LOG_LEVELS = Object.keys(LOG_LEVEL_MAP);

function rejected(name: string, accepts: string, raw: string): CliError {
  return new CliError(`${name} takes ${accepts}, got '${raw}'`);
}

function nullableUrl(name: string): (raw: string) => ConfigValue {
  return (raw) => {
    if (raw === '' || raw === 'null') return null;
    if (!z.string().url().safeParse(raw).success) throw rejected(name, 'a URL or null', raw);
    return raw;
  };
}

function nullableText(raw: string): ConfigValue {
  return raw === '' || raw === 'null' ? null : raw;
}

export const CONFIG_KEYS: readonly ConfigKey[] = [
  {
    name: 'api.url',
    accepts: 'a URL or null',
    env: 'FIELDLINK_API_URL',
    read: (c) => c.api.url,
    parse: nullableUrl('api.url'),
  },
  {
    name: 'api.token',
    accepts: 'a token or null',
    env: 'FIELDLINK_API_TOKEN',
    read: (c) => c.api.token,
    parse: nullableText,
  },
  {
    name: 'api.project',
    accepts: 'a project subdomain or null',
    env: 'FIELDLINK_PROJECT',
    read: (c) => c.api.project,
    parse: nullableText,
  },
  {
    name: 'api.directoryUrl',
    accepts: 'a URL or null',
    env: 'FIELDLINK_DIRECTORY_URL',
    read: (c) => c.api.directoryUrl,
    parse: nullableUrl('api.directoryUrl'),
  },
  {
    name: 'deviceApi.callTimeoutMs',
    accepts: 'milliseconds, an integer >= 1',
    read: (c) => c.deviceApi.callTimeoutMs,
    parse: (raw) => {
      const ms = /^\d+$/.test(raw) ? Number(raw) : NaN;
      if (!Number.isSafeInteger(ms) || ms < 1) {
        throw rejected('deviceApi.callTimeoutMs', 'milliseconds, an integer >= 1', raw);
      }
      return ms;
    },
  },
  {
    name: 'logging.level',
    accepts: LOG_LEVELS.join('|'),
    env: 'FIELDLINK_LOG_LEVEL',
    read: (c) => c.logging.level,
    parse: (raw) => {
      if (!LOG_LEVELS.includes(raw)) throw rejected('logging.level', LOG_LEVELS.join('|'), raw);
      return raw;
    },
  },
];

export function findConfigKey(name: string): ConfigKey | undefined {
  return CONFIG_KEYS.find((key) => key.name === name);
}

function requireConfigKey(name: string): ConfigKey {
  const key = findConfigKey(name);
  if (!key) {
    throw new CliError(`Unknown config key: ${name} (known: ${CONFIG_KEYS.map((k) => k.name).join(', ')})`);
  }
  return key;
}

export function isSensitive(name: string): boolean {
  return SENSITIVE_CONFIG_KEYS.some((sensitive) => sensitive === name);
}

/** A value as the overview and confirmations print it. */
function shown(key: ConfigKey, value: ConfigValue | undefined): string {
  if (value === null || value === undefined) return UNSET;
  return isSensitive(key.name) ? MASK : String(value);
}

/** The stored config with secrets replaced by a mask. */
export function maskSecrets(config: UserConfig): UserConfig {
  return {
    ...config,
    api: { ...config.api, token: config.api.token === null ? null : MASK },
  };
}

/** Effective value of every key, with where it comes from. */
export function showConfig(store: ConfigStore, cliEnv: CliEnv = {}): void {
  const config = store.getAll();
  const rows = CONFIG_KEYS.map((key) => {
    const fromEnv = key.env ? cliEnv[key.env] : undefined;
    if (fromEnv !== undefined) {
      return [key.name, shown(key, fromEnv), `$${key.env}`, key.accepts];
    }
    const value = key.read(config);
    const source = value === key.read(USER_CONFIG_DEFAULTS) ? 'default' : 'config';
    return [key.name, shown(key, value), source, key.accepts];
  });
  console.log(`Config file: ${store.path}\n`);
  console.log(formatTable(['Key', 'Value', 'Source', 'Accepts'], rows));
}

/** Print the stored value unmasked, or an empty line when unset. */
export function getConfig(store: ConfigStore, name: string): void {
  const value = requireConfigKey(name).read(store.getAll());
  console.log(value === null ? '' : String(value));
}

export function setConfig(store: ConfigStore, name: string, raw: string): void {
  const key = requireConfigKey(name);
  const value = key.parse(raw);
  const { warning } = store.setDot(name, value);
  if (warning) {
    console.warn(`Warning: ${warning}`);
  }
  console.log(`${name} = ${shown(key, value)}`);
}

export function listConfig(store: ConfigStore): void {
  console.log(JSON.stringify(maskSecrets(store.getAll()), null, 2));
}

export function resetConfig(store: ConfigStore, name?: string): void {
  if (name === undefined) {
    store.reset();
    console.log('Every key reset to its default');
    return;
  }
  const key = requireConfigKey(name);
  store.reset(name);
  console.log(`${name} = ${shown(key, key.read(USER_CONFIG_DEFAULTS))} (default)`);
}

/** @throws {CliError} listing every problem when the stored config is invalid */
export function validateConfig(store: ConfigStore): void {
  const result = store.validate();
  if (!result.valid) {
    const problems = (result.errors ?? []).map((problem) => `  ${problem}`);
    throw new CliError([`${store.path} is invalid:`, ...problems].join('\n'));
  }
  console.log(`${store.path} is valid`);
}

/** Open config.json in $VISUAL or $EDITOR (vi by default), then validate it. */
export function editConfig(store: ConfigStore): void {
  const editor = process.env.VISUAL || process.env.EDITOR || 'vi';
  try {
    execFileSync(editor, [store.path], { stdio: 'inherit' });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Could not run editor '${editor}' (set $EDITOR): ${reason}`);
  }
  validateConfig(store);
}

function usage(line: string): CliError {
  return new CliError(`Usage: fieldlink ${line}`, { usage: true });
}

/**
 * Run a `fieldlink config` subcommand.
 *
 * @param args - Positional arguments after `config`
 * @param cliEnv - Parsed environment, for the overview's source column
 */
export function handleConfigCommand(store: ConfigStore, args: string[], cliEnv: CliEnv = {}): void {
  const [subcommand, key, value, ...extra] = args;
  switch (subcommand) {
    case undefined:
      showConfig(store, cliEnv);
      return;
    case 'get':
      if (key === undefined || value !== undefined) throw usage('config get <key>');
      getConfig(store, key);
      return;
    case 'set':
      if (key === undefined || value === undefined || extra.length > 0) throw usage('config set <key> <value>');
      setConfig(store, key, value);
      return;
    case 'list':
      listConfig(store);
      return;
    case 'reset':
      if (value !== undefined) throw usage('config reset [key]');
      resetConfig(store, key);
      return;
    case 'edit':
      editConfig(store);
      return;
    case 'path':
      console.log(store.path);
      return;
    case 'validate':
      validateConfig(store);
      return;
    default:
      throw new CliError(`Unknown config subcommand: ${subcommand}`, { usage: true });
  }
}
