import { describe, expect, it, vi } from 'vitest';
import type { UserConfig } from '@fieldlink/shared/config-schema';
import type { ConfigStore } from '../config-commands.js';
import { parseEnv } from '../env.js';
import { CliError } from '../errors.js';
import { isLogLevel, resolveConnection, resolveLogLevel } from '../settings.js';

function storeWith(api: Partial<UserConfig['api']> = {}, level: UserConfig['logging']['level'] = 'warn'): ConfigStore {
  const config: UserConfig = {
    version: 1,
    api: { url: null, token: null, project: null, directoryUrl: null, ...api },
    deviceApi: { callTimeoutMs: 2500 },
    logging: { level },
  };
  return {
    getAll: vi.fn(() => config),
    getDot: vi.fn(),
    setDot: vi.fn(() => ({})),
    reset: vi.fn(),
    validate: vi.fn(() => ({ valid: true })),
    path: '/tmp/.fieldlink/config.json',
  };
}

const noEnv = parseEnv({});

describe('isLogLevel', () => {
  it('accepts known level names only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('resolveLogLevel', () => {
  it('prefers the flag over the environment and config', () => {
    const cliEnv = parseEnv({ FIELDLINK_LOG_LEVEL: 'error' });
    expect(resolveLogLevel({ logLevel: 'trace' }, cliEnv, storeWith())).toBe('trace');
  });

  it('uses the environment before the config', () => {
    const cliEnv = parseEnv({ FIELDLINK_LOG_LEVEL: 'error' });
    expect(resolveLogLevel({}, cliEnv, storeWith())).toBe('error');
  });

  it('falls back to the config', () => {
    expect(resolveLogLevel({}, noEnv, storeWith({}, 'debug'))).toBe('debug');
  });

  it('rejects an unknown flag value as a usage error', () => {
    expect(() => resolveLogLevel({ logLevel: 'loud' }, noEnv, storeWith())).toThrow(
      new CliError('Invalid log level \'loud\'. Use one of: fatal, error, warn, info, debug, trace'),
    );
  });
});

describe('resolveConnection', () => {
  it('reads everything from the config file', () => {
    const store = storeWith({
      url: 'https://fleet.test/',
      token: 'test-token',
      project: 'lab',
      directoryUrl: 'https://directory.test/',
    });
    expect(resolveConnection({}, noEnv, store)).toEqual({
      url: 'https://fleet.test/',
      directoryUrl: 'https://directory.test/',
      token: 'test-token',
      project: 'lab',
      callTimeoutMs: 2500,
    });
  });

  it('lets flags override the environment and the environment override the config', () => {
    const cliEnv = parseEnv({
      FIELDLINK_API_URL: 'https://env.test/',
      FIELDLINK_API_TOKEN: 'env-token',
      FIELDLINK_PROJECT: 'env-project',
    });
    const store = storeWith({ url: 'https://config.test/', token: 'config-token', project: 'config-project' });

    const settings = resolveConnection({ url: 'https://flag.test/', project: 'flag-project' }, cliEnv, store);

    expect(settings.url).toBe('https://flag.test/');
    expect(settings.token).toBe('env-token');
    expect(settings.project).toBe('flag-project');
  });

  it('uses the fleet URL for the directory when none is set', () => {
    const settings = resolveConnection({ url: 'https://fleet.test/' }, noEnv, storeWith());
    expect(settings.directoryUrl).toBe('https://fleet.test/');
    expect(settings.token).toBeNull();
  });

  it('fails with a usage error when no URL is configured', () => {
    let caught: unknown;
    try {
      resolveConnection({}, noEnv, storeWith());
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliError);
    expect(caught).toMatchObject({
      message: "No fleet service URL. Pass --url, set FIELDLINK_API_URL or run 'fieldlink init'.",
      options: { usage: true },
    });
  });
});
