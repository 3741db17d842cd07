import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

vi.mock('node:child_process');

import { execFileSync } from 'node:child_process';
import { USER_CONFIG_DEFAULTS, type UserConfig } from '@fieldlink/shared/config-schema';
import {
  editConfig,
  getConfig,
  handleConfigCommand,
  listConfig,
  maskSecrets,
  resetConfig,
  setConfig,
  showConfig,
  validateConfig,
  type ConfigStore,
} from '../config-commands.js';
import { CliError } from '../errors.js';

const CONFIG_PATH = '/home/ops/.fieldlink/config.json';

const STORED: UserConfig = {
  version: 1,
  api: { url: 'https://fleet.test/', token: 'test-token', project: null, directoryUrl: null },
  deviceApi: { callTimeoutMs: 8000 },
  logging: { level: 'info' },
};

function createStore(config: UserConfig = structuredClone(STORED)): ConfigStore {
  return {
    getAll: vi.fn(() => config),
    getDot: vi.fn(),
    setDot: vi.fn(() => ({})),
    reset: vi.fn(),
    validate: vi.fn(() => ({ valid: true })),
    path: CONFIG_PATH,
  };
}

let log: MockInstance<typeof console.log>;

beforeEach(() => {
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

/** Table rows printed by showConfig, split into their columns. */
function overviewRows(): string[][] {
  const table = String(log.mock.calls[1]?.[0]);
  return table
    .split('\n')
    .slice(2)
    .map((line) => line.split(/\s{2,}/));
}

describe('showConfig', () => {
  it('prints every key with its source and what it accepts', () => {
    showConfig(createStore(), { FIELDLINK_PROJECT: 'lab' });

    expect(log.mock.calls[0]?.[0]).toBe(`Config file: ${CONFIG_PATH}\n`);
    expect(overviewRows()).toEqual([
      ['api.url', 'https://fleet.test/', 'config', 'a URL or null'],
      ['api.token', '********', 'config', 'a token or null'],
      ['api.project', 'lab', '$FIELDLINK_PROJECT', 'a project subdomain or null'],
      ['api.directoryUrl', '(unset)', 'default', 'a URL or null'],
      ['deviceApi.callTimeoutMs', '8000', 'config', 'milliseconds, an integer >= 1'],
      ['logging.level', 'info', 'default', 'fatal|error|warn|info|debug|trace'],
    ]);
  });

  it('masks a token that comes from the environment', () => {
    showConfig(createStore(structuredClone(USER_CONFIG_DEFAULTS)), { FIELDLINK_API_TOKEN: 'test-env-token' });

    expect(overviewRows()[1]).toEqual(['api.token', '********', '$FIELDLINK_API_TOKEN', 'a token or null']);
  });
});

describe('getConfig', () => {
  it('prints the stored value unmasked', () => {
    getConfig(createStore(), 'api.token');

    expect(log).toHaveBeenCalledWith('test-token');
  });

  it('prints an empty line for an unset key', () => {
    getConfig(createStore(), 'api.directoryUrl');

    expect(log).toHaveBeenCalledWith('');
  });

  it('names the known keys when the key is unknown', () => {
    expect(() => getConfig(createStore(), 'api.nope')).toThrow(
      new CliError(
        'Unknown config key: api.nope (known: api.url, api.token, api.project, api.directoryUrl, deviceApi.callTimeoutMs, logging.level)',
      ),
    );
  });
});

describe('setConfig', () => {
  it('stores the timeout as an integer', () => {
    const store = createStore();

    setConfig(store, 'deviceApi.callTimeoutMs', '12000');

    expect(store.setDot).toHaveBeenCalledWith('deviceApi.callTimeoutMs', 12000);
    expect(log).toHaveBeenCalledWith('deviceApi.callTimeoutMs = 12000');
  });

  it.each(['0', '2.5', '-1', 'soon'])('rejects a timeout of %s without storing it', (raw) => {
    const store = createStore();

    expect(() => setConfig(store, 'deviceApi.callTimeoutMs', raw)).toThrow(
      new CliError(`deviceApi.callTimeoutMs takes milliseconds, an integer >= 1, got '${raw}'`),
    );
    expect(store.setDot).not.toHaveBeenCalled();
  });

  it('clears a URL with null', () => {
    const store = createStore();

    setConfig(store, 'api.url', 'null');

    expect(store.setDot).toHaveBeenCalledWith('api.url', null);
    expect(log).toHaveBeenCalledWith('api.url = (unset)');
  });

  it('rejects something that is not a URL', () => {
    expect(() => setConfig(createStore(), 'api.url', 'fleet')).toThrow(
      new CliError("api.url takes a URL or null, got 'fleet'"),
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => setConfig(createStore(), 'logging.level', 'loud')).toThrow(
      new CliError("logging.level takes fatal|error|warn|info|debug|trace, got 'loud'"),
    );
  });

  it('passes on the store warning and masks the token in the confirmation', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = createStore();
    vi.mocked(store.setDot).mockReturnValue({ warning: 'api.token is stored in plain text' });

    setConfig(store, 'api.token', 'test-token');

    expect(store.setDot).toHaveBeenCalledWith('api.token', 'test-token');
    expect(warn).toHaveBeenCalledWith('Warning: api.token is stored in plain text');
    expect(log).toHaveBeenCalledWith('api.token = ********');
  });
});

describe('listConfig', () => {
  it('prints the stored config as JSON with the token masked', () => {
    listConfig(createStore());

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      ...STORED,
      api: { ...STORED.api, token: '********' },
    });
  });

  it('leaves an unset token as null', () => {
    expect(maskSecrets(USER_CONFIG_DEFAULTS).api.token).toBeNull();
  });
});

describe('resetConfig', () => {
  it('resets one key and prints its default', () => {
    const store = createStore();

    resetConfig(store, 'deviceApi.callTimeoutMs');

    expect(store.reset).toHaveBeenCalledWith('deviceApi.callTimeoutMs');
    expect(log).toHaveBeenCalledWith(
      `deviceApi.callTimeoutMs = ${USER_CONFIG_DEFAULTS.deviceApi.callTimeoutMs} (default)`,
    );
  });

  it('resets everything', () => {
    const store = createStore();

    resetConfig(store);

    expect(store.reset).toHaveBeenCalledWith();
    expect(log).toHaveBeenCalledWith('Every key reset to its default');
  });

  it('leaves the store alone for an unknown key', () => {
    const store = createStore();

    expect(() => resetConfig(store, 'api.nope')).toThrow(CliError);
    expect(store.reset).not.toHaveBeenCalled();
  });
});

describe('validateConfig', () => {
  it('confirms a valid config', () => {
    validateConfig(createStore());

    expect(log).toHaveBeenCalledWith(`${CONFIG_PATH} is valid`);
  });

  it('lists every problem', () => {
    const store = createStore();
    vi.mocked(store.validate).mockReturnValue({
      valid: false,
      errors: ['api.url: Invalid URL', 'deviceApi.callTimeoutMs: Too small'],
    });

    expect(() => validateConfig(store)).toThrow(
      new CliError(`${CONFIG_PATH} is invalid:\n  api.url: Invalid URL\n  deviceApi.callTimeoutMs: Too small`),
    );
  });
});

describe('editConfig', () => {
  beforeEach(() => {
    vi.stubEnv('VISUAL', '');
    vi.stubEnv('EDITOR', 'nano');
  });

  it('opens the file in $EDITOR and validates it afterwards', () => {
    const store = createStore();

    editConfig(store);

    expect(vi.mocked(execFileSync)).toHaveBeenCalledWith('nano', [CONFIG_PATH], { stdio: 'inherit' });
    expect(store.validate).toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith(`${CONFIG_PATH} is valid`);
  });

  it('prefers $VISUAL', () => {
    vi.stubEnv('VISUAL', 'code --wait');

    editConfig(createStore());

    expect(vi.mocked(execFileSync).mock.calls.at(-1)?.[0]).toBe('code --wait');
  });

  it('reports an editor that cannot be started', () => {
    vi.mocked(execFileSync).mockImplementationOnce(() => {
      throw new Error('spawn nano ENOENT');
    });

    expect(() => editConfig(createStore())).toThrow(
      new CliError("Could not run editor 'nano' (set $EDITOR): spawn nano ENOENT"),
    );
  });
});

describe('handleConfigCommand', () => {
  it('shows the overview without a subcommand', () => {
    handleConfigCommand(createStore(), []);

    expect(log.mock.calls[0]?.[0]).toBe(`Config file: ${CONFIG_PATH}\n`);
  });

  it('prints the path', () => {
    handleConfigCommand(createStore(), ['path']);

    expect(log).toHaveBeenCalledWith(CONFIG_PATH);
  });

  it('routes get', () => {
    handleConfigCommand(createStore(), ['get', 'logging.level']);

    expect(log).toHaveBeenCalledWith('info');
  });

  it('requires a value for set', () => {
    const run = () => handleConfigCommand(createStore(), ['set', 'api.url']);

    expect(run).toThrow(new CliError('Usage: fieldlink config set <key> <value>'));
    try {
      run();
    } catch (err) {
      expect(err instanceof CliError && err.options.usage).toBe(true);
    }
  });

  it('rejects an unknown subcommand', () => {
    expect(() => handleConfigCommand(createStore(), ['bogus'])).toThrow(
      new CliError('Unknown config subcommand: bogus'),
    );
  });
});
