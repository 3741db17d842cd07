import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { DeviceApiError } from '@fieldlink/device-api';
import { ApiError, DeviceError, DirectoryClient, IotClient } from '@fieldlink/client';
import { LOG_LEVEL_MAP } from '@fieldlink/shared/config-schema';
import { runCommand, commandHelp, type CommandContext } from './commands.js';
import { handleConfigCommand } from './config-commands.js';
import { initConfigManager } from './config-manager.js';
import { fieldlinkHome, parseEnv, type CliEnv } from './env.js';
import { CliError } from './errors.js';
import { runInitWizard } from './init-wizard.js';
import { initLogger, logger } from './lib/logger.js';
import { resolveConnection, resolveLogLevel } from './settings.js';

// Injected at build time by esbuild define
declare const __CLI_VERSION__: string;

export const VERSION = typeof __CLI_VERSION__ === 'string' ? __CLI_VERSION__ : '0.0.0-dev';

const OPTIONS = {
  url: { type: 'string' },
  'directory-url': { type: 'string' },
  token: { type: 'string' },
  project: { type: 'string' },
  'log-level': { type: 'string', short: 'l' },
  'hostnames-only': { type: 'boolean' },
  kind: { type: 'string' },
  limit: { type: 'string' },
  user: { type: 'string' },
  'proxy-jump': { type: 'string' },
  raw: { type: 'boolean' },
  yes: { type: 'boolean', short: 'y', default: false },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

function helpText(): string {
  return `
Usage: fieldlink [options] <command> [arguments]

Manage fleet devices and talk to their device API

Commands:
${commandHelp()}
  config                 Effective value and source of every key
  config get <key>       Print one stored value
  config set <key> <v>   Store one value (null clears it)
  config list            Stored config as JSON, token masked
  config reset [key]     Back to defaults
  config edit            Open config.json in $VISUAL or $EDITOR
  config path            Print the config file location
  config validate        Check config.json against the schema
  init                   Interactive setup wizard
  init --yes             Accept all defaults

Options:
      --url <url>            Fleet service URL
      --directory-url <url>  User/project directory URL (default: --url)
      --token <token>        API token
      --project <subdomain>  Project to act in
  -l, --log-level <level>    Log level (fatal|error|warn|info|debug|trace)
  -h, --help                 Show this help message
  -v, --version              Show version number

Environment:
  FIELDLINK_API_URL, FIELDLINK_API_TOKEN, FIELDLINK_PROJECT,
  FIELDLINK_DIRECTORY_URL, FIELDLINK_LOG_LEVEL, FIELDLINK_HOME

Config file: ~/.fieldlink/config.json

Examples:
  fieldlink init
  fieldlink list --hostnames-only
  fieldlink map-port sensor-01 22 localhost
  fieldlink api-call 1001 set_rate rate=5
  fieldlink api-call 1001 ping --raw
`;
}

/** One line (plus usage hint) describing why the run failed. */
export function describeError(err: unknown): string {
  if (err instanceof CliError) {
    return err.options.usage ? `${err.message}\nRun 'fieldlink --help' for usage.` : err.message;
  }
  if (err instanceof DeviceApiError || err instanceof DeviceError) {
    return `Error: ${err.message} (${err.code})`;
  }
  if (err instanceof ApiError) {
    return `Error: ${err.message}`;
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

export interface MainOptions {
  env?: CliEnv;
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  try {
    const cliEnv = options.env ?? parseEnv();
    const { values, positionals } = parseArgs({
      args: argv,
      options: OPTIONS,
      allowPositionals: true,
    });

    if (values.help) {
      console.log(helpText());
      return 0;
    }
    if (values.version) {
      console.log(VERSION);
      return 0;
    }

    const [command, ...rest] = positionals;
    if (!command) {
      console.error(helpText());
      return 1;
    }

    const home = fieldlinkHome(cliEnv);
    fs.mkdirSync(home, { recursive: true });
    const store = initConfigManager(home);

    if (command === 'config') {
      handleConfigCommand(store, rest, cliEnv);
      return 0;
    }
    if (command === 'init') {
      await runInitWizard({ yes: values.yes === true, store });
      return 0;
    }

    const flags = {
      url: values.url,
      directoryUrl: values['directory-url'],
      token: values.token,
      project: values.project,
      logLevel: values['log-level'],
    };
    const level = resolveLogLevel(flags, cliEnv, store);
    initLogger({ level: LOG_LEVEL_MAP[level], logDir: path.join(home, 'logs') });
    const settings = resolveConnection(flags, cliEnv, store);
    const trace = LOG_LEVEL_MAP[level] >= LOG_LEVEL_MAP.debug;

    const ctx: CommandContext = {
      fleet: new IotClient({
        url: settings.url,
        token: settings.token,
        project: settings.project,
        logger,
        trace,
        callTimeoutMs: settings.callTimeoutMs,
      }),
      directory: new DirectoryClient({ url: settings.directoryUrl, token: settings.token, logger, trace }),
      logger,
    };
    await runCommand(ctx, command, rest, {
      hostnamesOnly: values['hostnames-only'],
      kind: values.kind,
      limit: values.limit,
      user: values.user,
      proxyJump: values['proxy-jump'],
      raw: values.raw,
    });
    return 0;
  } catch (err) {
    if (err instanceof TypeError && 'code' in err && String(err.code).startsWith('ERR_PARSE_ARGS')) {
      console.error(describeError(new CliError(err.message, { usage: true })));
      return 1;
    }
    logger.debug(err);
    console.error(describeError(err));
    return err instanceof CliError ? err.exitCode : 1;
  }
}
