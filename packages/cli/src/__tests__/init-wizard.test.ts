import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Mock @inquirer/prompts before importing init-wizard
vi.mock('@inquirer/prompts', () => ({
  input: vi.fn(),
  password: vi.fn(),
  select: vi.fn(),
  confirm: vi.fn(),
}));

import { input, password, select, confirm } from '@inquirer/prompts';
import { runInitWizard } from '../init-wizard.js';
import type { ConfigStore } from '../config-commands.js';
import { USER_CONFIG_DEFAULTS } from '@fieldlink/shared/config-schema';

function createMockStore(configPath: string): ConfigStore {
  return {
    getAll: vi.fn(() => structuredClone(USER_CONFIG_DEFAULTS)),
    getDot: vi.fn(),
    setDot: vi.fn(() => ({})),
    reset: vi.fn(),
    validate: vi.fn(() => ({ valid: true })),
    path: configPath,
  };
}

/** Answers in prompt order: url, token, project, directory url, log level. */
function answer(url: string, token: string, project: string, directoryUrl: string, level: 'warn' | 'info' | 'debug') {
  vi.mocked(input).mockResolvedValueOnce(url).mockResolvedValueOnce(project).mockResolvedValueOnce(directoryUrl);
  vi.mocked(password).mockResolvedValueOnce(token);
  vi.mocked(select).mockResolvedValueOnce(level);
}

describe('runInitWizard', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fieldlink-init-test-'));
    configPath = path.join(tmpDir, 'config.json');
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('--yes flag (skip prompts)', () => {
    it('resets config to defaults without prompting', async () => {
      const store = createMockStore(configPath);

      await runInitWizard({ yes: true, store });

      expect(store.reset).toHaveBeenCalled();
      expect(input).not.toHaveBeenCalled();
      expect(confirm).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledWith(`Config initialized with defaults at ${configPath}`);
    });
  });

  describe('interactive mode', () => {
    it('aborts when the config exists and the user declines', async () => {
      const store = createMockStore(configPath);
      fs.writeFileSync(configPath, '{}');
      vi.mocked(confirm).mockResolvedValueOnce(false);

      await runInitWizard({ yes: false, store });

      expect(confirm).toHaveBeenCalledWith({
        message: 'Config already exists. Overwrite with new settings?',
        default: false,
      });
      expect(store.reset).not.toHaveBeenCalled();
      expect(input).not.toHaveBeenCalled();
      expect(console.log).toHaveBeenCalledWith('Aborted.');
    });

    it('does not ask about overwriting on first setup', async () => {
      answer('https://fleet.test/', '', '', '', 'info');

      await runInitWizard({ yes: false, store: createMockStore(configPath) });

      expect(confirm).not.toHaveBeenCalled();
    });

    it('saves every answer', async () => {
      const store = createMockStore(configPath);
      answer('https://fleet.test/', 'test-token', 'lab', 'https://directory.test/', 'debug');

      await runInitWizard({ yes: false, store });

      expect(store.reset).toHaveBeenCalled();
      expect(vi.mocked(store.setDot).mock.calls).toEqual([
        ['api.url', 'https://fleet.test/'],
        ['api.token', 'test-token'],
        ['api.project', 'lab'],
        ['api.directoryUrl', 'https://directory.test/'],
        ['logging.level', 'debug'],
      ]);
      expect(console.log).toHaveBeenCalledWith(`\nConfig saved to ${configPath}`);
    });

    it('stores empty answers as null', async () => {
      const store = createMockStore(configPath);
      answer('  ', '', '   ', '', 'info');

      await runInitWizard({ yes: false, store });

      expect(store.setDot).toHaveBeenCalledWith('api.url', null);
      expect(store.setDot).toHaveBeenCalledWith('api.token', null);
      expect(store.setDot).toHaveBeenCalledWith('api.project', null);
      expect(store.setDot).toHaveBeenCalledWith('api.directoryUrl', null);
    });

    it('rejects URLs that do not parse', async () => {
      answer('https://fleet.test/', '', '', '', 'info');

      await runInitWizard({ yes: false, store: createMockStore(configPath) });

      const validate = vi.mocked(input).mock.calls[0]?.[0].validate;
      expect(validate?.('not a url')).toBe('Enter a full URL such as https://fleet.example.com/');
      expect(validate?.('https://fleet.test/')).toBe(true);
      expect(validate?.('')).toBe(true);
    });
  });
});
