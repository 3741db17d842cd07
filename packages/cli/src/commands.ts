/**
 * Fleet and device commands of the `fieldlink` tool.
 *
 * Each entry of {@link COMMANDS} names its positional arguments; when the
 * first one is `<device>` it is resolved with `findDevice` before the
 * handler runs.
 *
 * @module cli/commands
 */
import type { DeviceApiSession, Logger } from '@fieldlink/device-api';
import type { Device, DirectoryClient, IotClient } from '@fieldlink/client';
import { CliError } from './errors.js';
import { displayResult, formatTable } from './output.js';

export interface CommandContext {
  fleet: IotClient;
  directory: DirectoryClient;
  logger: Logger;
}

/** Command-specific flags, already parsed. */
export interface CommandFlags {
  hostnamesOnly?: boolean;
  kind?: string;
  limit?: string;
  user?: string;
  proxyJump?: string;
  /** Hand device API payloads back as sent instead of decoding JSON */
  raw?: boolean;
}

interface Invocation {
  ctx: CommandContext;
  /** Resolved `<device>` argument; null for fleet-wide commands */
  device: Device | null;
  /** Positionals after the device */
  args: string[];
  flags: CommandFlags;
}

interface CommandSpec {
  /** Positional arguments, shown in help and usage errors */
  params: string[];
  /** Trailing `key=value` arguments are allowed */
  variadic?: boolean;
  summary: string;
  run(invocation: Invocation): Promise<void>;
}

// === Argument helpers ===

function requireDevice(device: Device | null): Device {
  if (!device) throw new CliError('This command needs a device');
  return device;
}

function arg(args: string[], index: number): string {
  const value = args[index];
  if (value === undefined) throw new CliError('Missing argument', { usage: true });
  return value;
}

function parseIntArg(value: string, name: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CliError(`${name} must be a non-negative integer, got '${value}'`, { usage: true });
  }
  return Number(value);
}

function parseKinds(kind: string | undefined): string[] | undefined {
  if (!kind) return undefined;
  return kind
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k !== '');
}

/** Value of a `key=value` argument: JSON when it parses, the raw string otherwise. */
export function parseArgValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/** `["rate=5", "name=north"]` → `{ rate: 5, name: "north" }` */
export function parseKeyValues(pairs: string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new CliError(`Expected key=value, got '${pair}'`, { usage: true });
    }
    result[pair.slice(0, eq)] = parseArgValue(pair.slice(eq + 1));
  }
  return result;
}

function printValue(value: unknown): void {
  console.log(typeof value === 'string' ? value : JSON.stringify(value, null, 2));
}

// === Shared handlers ===

async function printDevices(devices: Device[], hostnamesOnly: boolean | undefined): Promise<void> {
  if (hostnamesOnly) {
    for (const device of devices) {
      console.log((await device.info()).hostname ?? '');
    }
    return;
  }
  const summaries = await Promise.all(devices.map((d) => d.toSummary()));
  console.log(
    formatTable(
      ['ID', 'Hostname', 'Type', 'Status', 'Last heartbeat'],
      summaries.map((s) => [s.id, s.hostname, s.type, s.status, s.lastHeartbeat]),
    ),
  );
}

async function printEvents(feed: AsyncIterable<unknown>): Promise<void> {
  for await (const event of feed) {
    console.log(JSON.stringify(event));
  }
}

async function withApi(device: Device, fn: (session: DeviceApiSession) => Promise<void>): Promise<void> {
  const session = await device.openApi();
  try {
    await fn(session);
  } finally {
    await session.close();
  }
}

// === Command table ===

export const COMMANDS: Record<string, CommandSpec> = {
  list: {
    params: [],
    summary: 'List all devices (--hostnames-only for names)',
    async run({ ctx, flags }) {
      await printDevices(await ctx.fleet.listDevices(), flags.hostnamesOnly);
    },
  },
  'list-online': {
    params: [],
    summary: 'List connected devices (--hostnames-only for names)',
    async run({ ctx, flags }) {
      await printDevices(await ctx.fleet.listOnlineDevices(), flags.hostnamesOnly);
    },
  },
  'list-events': {
    params: ['device'],
    summary: 'Recent events (--kind a,b --limit n)',
    async run({ device, flags }) {
      const log = await requireDevice(device).getEvents({
        kinds: parseKinds(flags.kind),
        limit: flags.limit === undefined ? undefined : parseIntArg(flags.limit, 'limit'),
      });
      console.log(formatTable(log.headers, log.data));
    },
  },
  'watch-events': {
    params: ['device'],
    summary: 'Print live events of a device as JSON lines (--kind a,b)',
    async run({ device, flags }) {
      await printEvents(await requireDevice(device).watchEvents(parseKinds(flags.kind)));
    },
  },
  'watch-all-events': {
    params: [],
    summary: 'Print live events of every device as JSON lines (--kind a,b)',
    async run({ ctx, flags }) {
      await printEvents(await ctx.fleet.watchDeviceEvents({ kinds: parseKinds(flags.kind) }));
    },
  },
  'mapped-ports': {
    params: ['device'],
    summary: 'Ports tunnelled to the device',
    async run({ device }) {
      displayResult(await requireDevice(device).getMappedPorts());
    },
  },
  'map-port': {
    params: ['device', 'remote-port', 'remote-host'],
    summary: 'Tunnel a device-side port; prints the local port',
    async run({ device, args }) {
      const mapping = await requireDevice(device).mapPort(parseIntArg(arg(args, 0), 'remote-port'), arg(args, 1));
      console.log(mapping.local_port);
    },
  },
  'unmap-port': {
    params: ['device', 'local-port'],
    summary: 'Remove a port mapping',
    async run({ device, args }) {
      await requireDevice(device).unmapPort(parseIntArg(arg(args, 0), 'local-port'));
    },
  },
  'gen-ssh-host-config': {
    params: ['device'],
    summary: 'Map port 22 and print an ssh Host block (--user, --proxy-jump)',
    async run({ ctx, device, flags }) {
      const target = requireDevice(device);
      const mapping = await target.mapPort(22, 'localhost');
      const info = await target.info();
      console.log(
        [
          `Host ${info.hostname ?? `device-${target.id}`}`,
          '  HostName localhost',
          `  Port ${mapping.local_port}`,
          `  User ${flags.user ?? 'pi'}`,
          `  ProxyJump ${flags.proxyJump ?? ctx.fleet.api.baseUrl.hostname}`,
        ].join('\n'),
      );
    },
  },
  'set-type': {
    params: ['device', 'type'],
    summary: 'Set the device type',
    async run({ device, args }) {
      await requireDevice(device).setType(arg(args, 0));
    },
  },
  'set-hostname': {
    params: ['device', 'hostname'],
    summary: 'Set the device hostname',
    async run({ device, args }) {
      await requireDevice(device).setHostname(arg(args, 0));
    },
  },
  'set-project': {
    params: ['device', 'subdomain'],
    summary: 'Move the device to a project',
    async run({ ctx, device, args }) {
      const project = await ctx.directory.getProjectBySubdomain(arg(args, 0));
      await requireDevice(device).setProject(project.project_id);
    },
  },
  'add-admin': {
    params: ['device', 'email'],
    summary: 'Grant a user admin rights on the device',
    async run({ ctx, device, args }) {
      const user = await ctx.directory.getUserByEmail(arg(args, 0));
      await requireDevice(device).addAdmin(user.user_id);
    },
  },
  'remove-admin': {
    params: ['device', 'email'],
    summary: "Revoke a user's admin rights on the device",
    async run({ ctx, device, args }) {
      const user = await ctx.directory.getUserByEmail(arg(args, 0));
      await requireDevice(device).removeAdmin(user.user_id);
    },
  },
  'list-admins': {
    params: ['device'],
    summary: 'Users with admin rights on the device',
    async run({ ctx, device }) {
      const ids = await requireDevice(device).listAdmins();
      displayResult(await Promise.all(ids.map((id) => ctx.directory.getUserById(id))));
    },
  },
  'list-statuses': {
    params: ['device'],
    summary: 'Status files reported by the device',
    async run({ device }) {
      displayResult(await requireDevice(device).listStatuses());
    },
  },
  'get-status': {
    params: ['device', 'name'],
    summary: 'Read one status file',
    async run({ device, args }) {
      displayResult(await requireDevice(device).getStatus(arg(args, 0)));
    },
  },
  'list-configs': {
    params: ['device'],
    summary: 'Configuration files of the device',
    async run({ device }) {
      displayResult(await requireDevice(device).listConfigs());
    },
  },
  'get-config': {
    params: ['device', 'name'],
    summary: 'Read one configuration file',
    async run({ device, args }) {
      displayResult(await requireDevice(device).getConfig(arg(args, 0)));
    },
  },
  'api-calls': {
    params: ['device'],
    summary: 'Device API version, calls and events',
    async run({ device }) {
      await withApi(requireDevice(device), async (session) => {
        console.log(`Version: ${session.version}`);
        console.log(`Calls:   ${session.getCalls().join(', ')}`);
        console.log(`Events:  ${session.getEvents().join(', ')}`);
      });
    },
  },
  'api-call': {
    params: ['device', 'endpoint'],
    variadic: true,
    summary: 'Invoke a device API call with key=value arguments (--raw)',
    async run({ device, args, flags }) {
      const [endpoint = '', ...rest] = args;
      const callArgs = parseKeyValues(rest);
      await withApi(requireDevice(device), async (session) => {
        printValue(await session.call(endpoint, callArgs, { as: flags.raw ? 'raw' : 'json' }));
      });
    },
  },
  'api-event': {
    params: ['device', 'endpoint'],
    variadic: true,
    summary: 'Print a device API event stream until it ends (--raw)',
    async run({ device, args, flags }) {
      const [endpoint = '', ...rest] = args;
      const eventArgs = parseKeyValues(rest);
      await withApi(requireDevice(device), async (session) => {
        const stream = await session.event(endpoint, eventArgs, { as: flags.raw ? 'raw' : 'json' });
        for await (const value of stream) {
          printValue(value);
        }
      });
    },
  },
};

/** `  name <a> <b>   summary` lines for the help text. */
export function commandHelp(): string {
  const rows = Object.entries(COMMANDS).map(([name, command]) => {
    const params = command.params.map((p) => `<${p}>`).join(' ');
    return [`${name} ${params}${command.variadic ? ' [key=value…]' : ''}`.trimEnd(), command.summary];
  });
  const width = Math.max(...rows.map(([usage = '']) => usage.length));
  return rows.map(([usage = '', summary = '']) => `  ${usage.padEnd(width)}  ${summary}`).join('\n');
}

/**
 * Resolve the device argument, check arity and run a command.
 *
 * @throws {CliError} For unknown commands, missing arguments and unknown devices
 */
export async function runCommand(
  ctx: CommandContext,
  name: string,
  positionals: string[],
  flags: CommandFlags = {},
): Promise<void> {
  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    throw new CliError(`Unknown command: ${name}`, { usage: true });
  }
  const expected = command.params.length;
  if (positionals.length < expected || (!command.variadic && positionals.length > expected)) {
    const usage = [name, ...command.params.map((p) => `<${p}>`)].join(' ');
    throw new CliError(`Usage: fieldlink ${usage}${command.variadic ? ' [key=value…]' : ''}`, { usage: true });
  }

  let device: Device | null = null;
  let args = positionals;
  if (command.params[0] === 'device') {
    const [query = '', ...rest] = positionals;
    device = await ctx.fleet.findDevice(query);
    if (!device) throw new CliError('No device found');
    ctx.logger.debug(`Resolved '${query}' to device ${device.id}`);
    args = rest;
  }
  await command.run({ ctx, device, args, flags });
}
