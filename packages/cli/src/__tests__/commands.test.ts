import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { DirectoryClient, EventFeed, IotClient } from '@fieldlink/client';
import {
  createFakeDeviceAgent,
  createFetchStub,
  createMockDeviceEvent,
  createMockDeviceInfo,
  createMockLogger,
  createMockPortMapping,
  jsonResponse,
  ScriptedTransport,
  type FetchRoute,
} from '@fieldlink/test-utils';
import { commandHelp, parseArgValue, parseKeyValues, runCommand, type CommandContext } from '../commands.js';
import { CliError } from '../errors.js';
import { formatRecords, formatTable } from '../output.js';

let ctx: CommandContext;
let log: MockInstance<typeof console.log>;

beforeEach(() => {
  const logger = createMockLogger();
  ctx = {
    fleet: new IotClient({ url: 'https://fleet.test/', token: 'test-token', logger }),
    directory: new DirectoryClient({ url: 'https://directory.test/', token: 'test-token', logger }),
    logger,
  };
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  vi.useRealTimers();
});

function serve(routes: Record<string, FetchRoute>) {
  const stub = createFetchStub({
    'POST /iot/get_device_info': () => jsonResponse(createMockDeviceInfo()),
    ...routes,
  });
  vi.stubGlobal('fetch', stub.fetch);
  return stub;
}

describe('runCommand', () => {
  it('rejects unknown commands', async () => {
    await expect(runCommand(ctx, 'nope', [])).rejects.toThrow(new CliError('Unknown command: nope'));
  });

  it('checks arity before touching the network', async () => {
    const stub = serve({});
    await expect(runCommand(ctx, 'map-port', ['1001', '22'])).rejects.toThrow(
      new CliError('Usage: fieldlink map-port <device> <remote-port> <remote-host>'),
    );
    expect(stub.requests).toHaveLength(0);
  });

  it('rejects extra arguments for fixed-arity commands', async () => {
    await expect(runCommand(ctx, 'list', ['extra'])).rejects.toThrow(new CliError('Usage: fieldlink list'));
  });

  it('reports a device that cannot be resolved', async () => {
    serve({
      'POST /iot/get_device_by_serial': () => jsonResponse(null),
      'POST /iot/get_devices_by_hostname': () => jsonResponse([]),
    });
    await expect(runCommand(ctx, 'list-statuses', ['ghost'])).rejects.toThrow(new CliError('No device found'));
  });

  it('validates numeric arguments', async () => {
    serve({});
    await expect(runCommand(ctx, 'unmap-port', ['1001', 'abc'])).rejects.toThrow(
      new CliError("local-port must be a non-negative integer, got 'abc'"),
    );
  });
});

describe('listing commands', () => {
  const devices = [
    createMockDeviceInfo(),
    createMockDeviceInfo({ device_id: 1002, hostname: 'sensor-02', type: null, connected: false, heartbeat_utc: null }),
  ];

  it('prints a summary table', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date((1_700_000_000 + 65) * 1000));
    serve({ 'POST /iot/list_devices': () => jsonResponse(devices) });

    await runCommand(ctx, 'list', []);

    expect(log).toHaveBeenCalledWith(
      formatTable(
        ['ID', 'Hostname', 'Type', 'Status', 'Last heartbeat'],
        [
          [1001, 'sensor-01', 'gateway', 'Connected', '1m 5s'],
          [1002, 'sensor-02', '', 'Disconnected', 'never'],
        ],
      ),
    );
  });

  it('prints one hostname per line with --hostnames-only', async () => {
    serve({ 'POST /iot/list_devices': () => jsonResponse(devices) });

    await runCommand(ctx, 'list', [], { hostnamesOnly: true });

    expect(log.mock.calls).toEqual([['sensor-01'], ['sensor-02']]);
  });

  it('lists online devices from bare ids', async () => {
    const stub = serve({ 'POST /iot/get_connected_devices': () => jsonResponse([1001]) });

    await runCommand(ctx, 'list-online', [], { hostnamesOnly: true });

    expect(log).toHaveBeenCalledWith('sensor-01');
    expect(stub.requestsTo('/iot/get_device_info')[0]?.url.searchParams.get('device_id')).toBe('1001');
  });
});

describe('device commands', () => {
  it('prints recent events filtered by kind', async () => {
    const events = { headers: ['time', 'event'], data: [[1_700_000_000, 'boot']] };
    const stub = serve({ 'POST /iot/get_device_events': () => jsonResponse(events) });

    await runCommand(ctx, 'list-events', ['1001'], { kind: 'boot, reboot', limit: '5' });

    const [request] = stub.requestsTo('/iot/get_device_events');
    expect(request?.json).toEqual({ limit: 5, events: ['boot', 'reboot'] });
    expect(request?.url.searchParams.get('device_id')).toBe('1001');
    expect(log).toHaveBeenCalledWith(formatTable(events.headers, events.data));
  });

  it('prints the local port of a new mapping', async () => {
    const stub = serve({
      'POST /iot/device_map_port': () => jsonResponse(createMockPortMapping({ local_port: 41022 })),
    });

    await runCommand(ctx, 'map-port', ['1001', '8080', 'localhost']);

    expect(stub.requestsTo('/iot/device_map_port')[0]?.json).toEqual({ remote_port: 8080, remote_host: 'localhost' });
    expect(log).toHaveBeenCalledWith(41022);
  });

  it('generates an ssh host block for port 22', async () => {
    const stub = serve({
      'POST /iot/device_map_port': () => jsonResponse(createMockPortMapping({ local_port: 41022 })),
    });

    await runCommand(ctx, 'gen-ssh-host-config', ['1001']);

    expect(stub.requestsTo('/iot/device_map_port')[0]?.json).toEqual({ remote_port: 22, remote_host: 'localhost' });
    expect(log).toHaveBeenCalledWith(
      'Host sensor-01\n  HostName localhost\n  Port 41022\n  User pi\n  ProxyJump fleet.test',
    );
  });

  it('honours --user and --proxy-jump', async () => {
    serve({ 'POST /iot/device_map_port': () => jsonResponse(createMockPortMapping({ local_port: 41022 })) });

    await runCommand(ctx, 'gen-ssh-host-config', ['1001'], { user: 'admin', proxyJump: 'bastion.test' });

    expect(log).toHaveBeenCalledWith(
      'Host sensor-01\n  HostName localhost\n  Port 41022\n  User admin\n  ProxyJump bastion.test',
    );
  });

  it('moves a device to the project found in the directory', async () => {
    const stub = serve({
      'POST /project/v2/get_project_by_subdomain': () => jsonResponse({ project_id: 3, subdomain: 'lab' }),
      'POST /iot/set_device_project': () => jsonResponse('OK'),
    });

    await runCommand(ctx, 'set-project', ['1001', 'lab']);

    const [lookup] = stub.requestsTo('/project/v2/get_project_by_subdomain');
    expect(lookup?.url.host).toBe('directory.test');
    expect(lookup?.json).toEqual({ subdomain: 'lab' });
    expect(stub.requestsTo('/iot/set_device_project')[0]?.json).toEqual({ project_id: 3 });
  });

  it('adds an admin by email', async () => {
    const stub = serve({
      'POST /user/v2/get_user_by_email': () => jsonResponse({ user_id: 7, email: 'ops@example.test' }),
      'POST /iot/assign_user_to_device': () => jsonResponse('OK'),
    });

    await runCommand(ctx, 'add-admin', ['1001', 'ops@example.test']);

    expect(stub.requestsTo('/iot/assign_user_to_device')[0]?.json).toEqual({ user_id: 7 });
  });

  it('lists admins with their directory records', async () => {
    serve({
      'POST /iot/get_device_users': () => jsonResponse([7]),
      'POST /user/v2/get_user_by_id': () => jsonResponse({ user_id: 7, email: 'ops@example.test' }),
    });

    await runCommand(ctx, 'list-admins', ['1001']);

    expect(log).toHaveBeenCalledWith(formatRecords([{ user_id: 7, email: 'ops@example.test' }]));
  });
});

describe('device API commands', () => {
  it('invokes a call with key=value arguments and closes the session', async () => {
    serve({});
    const agent = createFakeDeviceAgent({ calls: { set_rate: (args) => ({ ok: true, rate: args.rate }) } });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await runCommand(ctx, 'api-call', ['1001', 'set_rate', 'rate=5', 'name=north']);

    expect(agent.sent.at(-1)?.payload).toEqual({ rate: 5, name: 'north' });
    expect(log).toHaveBeenCalledWith(JSON.stringify({ ok: true, rate: 5 }, null, 2));
    expect(agent.closeCount).toBe(1);
  });

  it('prints every event of a stream', async () => {
    serve({});
    const agent = createFakeDeviceAgent({ events: { get_log: () => [{ n: 1 }, { n: 2 }] } });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await runCommand(ctx, 'api-event', ['1001', 'get_log']);

    expect(log.mock.calls).toEqual([['{\n  "n": 1\n}'], ['{\n  "n": 2\n}']]);
  });

  it('prints a plain string reply with --raw', async () => {
    serve({});
    const agent = createFakeDeviceAgent({ calls: { ping: () => 'pong' } });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await runCommand(ctx, 'api-call', ['1001', 'ping'], { raw: true });

    expect(log).toHaveBeenCalledWith('pong');
  });

  it('rejects a plain string reply without --raw', async () => {
    serve({});
    const agent = createFakeDeviceAgent({ calls: { ping: () => 'pong' } });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await expect(runCommand(ctx, 'api-call', ['1001', 'ping'])).rejects.toMatchObject({
      code: 'INVALID_PAYLOAD',
      payload: 'pong',
    });
  });

  it('prints stream frames as sent with --raw', async () => {
    serve({});
    const agent = createFakeDeviceAgent({ events: { get_log: () => ['boot ok', '{"n":1}'] } });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await runCommand(ctx, 'api-event', ['1001', 'get_log'], { raw: true });

    expect(log.mock.calls).toEqual([['boot ok'], ['{"n":1}']]);
  });

  it('lists the advertised calls and events', async () => {
    serve({});
    const agent = createFakeDeviceAgent({
      calls: { set_rate: () => null },
      events: { get_log: () => [] },
    });
    vi.spyOn(ctx.fleet.api, 'openTransport').mockResolvedValue(agent);

    await runCommand(ctx, 'api-calls', ['1001']);

    expect(log.mock.calls).toEqual([['Version: 1.0'], ['Calls:   get_call_info, set_rate'], ['Events:  get_log']]);
  });
});

describe('watch-all-events', () => {
  it('prints events as JSON lines until the feed closes', async () => {
    const transport = new ScriptedTransport();
    const event = createMockDeviceEvent({ event: 'boot' });
    transport.deliver(event);
    transport.disconnect();
    const watch = vi
      .spyOn(ctx.fleet, 'watchDeviceEvents')
      .mockResolvedValue(new EventFeed(transport, ctx.logger));

    await runCommand(ctx, 'watch-all-events', [], { kind: 'boot' });

    expect(watch).toHaveBeenCalledWith({ kinds: ['boot'] });
    expect(log.mock.calls).toEqual([[JSON.stringify(event)]]);
  });
});

describe('argument helpers', () => {
  it('parses values as JSON where possible', () => {
    expect(parseArgValue('5')).toBe(5);
    expect(parseArgValue('true')).toBe(true);
    expect(parseArgValue('north')).toBe('north');
  });

  it('turns key=value pairs into an object', () => {
    expect(parseKeyValues(['rate=5', 'name=north', 'expr=a=b'])).toEqual({ rate: 5, name: 'north', expr: 'a=b' });
  });

  it('rejects pairs without a key', () => {
    expect(() => parseKeyValues(['bad'])).toThrow(new CliError("Expected key=value, got 'bad'"));
    expect(() => parseKeyValues(['=5'])).toThrow(new CliError("Expected key=value, got '=5'"));
  });

  it('lists every command in the help text', () => {
    const help = commandHelp();
    expect(help).toContain('  api-call <device> <endpoint> [key=value…]');
    expect(help.split('\n')).toHaveLength(22);
  });
});
