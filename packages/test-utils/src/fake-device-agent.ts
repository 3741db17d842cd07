import { STATUS_END_OF_STREAM, STATUS_OK, BOOTSTRAP_ENDPOINT } from '@fieldlink/shared/constants';
import type { CallInfo, EndpointKind } from '@fieldlink/shared/device-api-schemas';
import { ScriptedTransport } from './scripted-transport.js';

/** Thrown from a handler to answer with a non-zero status. */
export class AgentFailure extends Error {
  constructor(
    readonly statusCode: number,
    readonly payload: unknown,
  ) {
    super(`Agent failure ${statusCode}`);
    this.name = 'AgentFailure';
  }
}

type Args = Record<string, unknown>;

export interface FakeDeviceAgentOptions {
  version?: string;
  /** Call endpoints: the handler's return value is the response payload. */
  calls?: Record<string, (args: Args) => unknown>;
  /** Event endpoints: each element is one response, followed by the terminal frame. */
  events?: Record<string, (args: Args) => unknown[]>;
}

/** Build the bootstrap payload for a list of endpoints after `get_call_info`. */
export function createCallInfo(
  endpoints: Array<[string, EndpointKind]>,
  version = '1.0',
): CallInfo {
  const all: Array<[string, EndpointKind]> = [[BOOTSTRAP_ENDPOINT, 'call'], ...endpoints];
  return {
    version_string: version,
    endpoints: all.map(([name]) => name),
    endpoint_types: all.map(([, kind]) => kind),
  };
}

/**
 * A {@link ScriptedTransport} that answers like a device agent: it serves
 * the bootstrap payload and replies to every request from the handlers.
 */
export function createFakeDeviceAgent(options: FakeDeviceAgentOptions = {}): ScriptedTransport {
  const calls = options.calls ?? {};
  const events = options.events ?? {};
  const info = createCallInfo(
    [
      ...Object.keys(calls).map((name): [string, EndpointKind] => [name, 'call']),
      ...Object.keys(events).map((name): [string, EndpointKind] => [name, 'event']),
    ],
    options.version,
  );

  return new ScriptedTransport((request, transport) => {
    const name = info.endpoints[request.endpoint_id];
    const id = request.message_id;
    if (name === BOOTSTRAP_ENDPOINT) {
      transport.respond(id, info);
      return;
    }
    try {
      const call = name === undefined ? undefined : calls[name];
      if (call) {
        transport.respond(id, call(request.payload));
        return;
      }
      const event = name === undefined ? undefined : events[name];
      if (event) {
        for (const payload of event(request.payload)) {
          transport.respond(id, payload, STATUS_OK);
        }
        transport.respond(id, null, STATUS_END_OF_STREAM);
        return;
      }
      transport.respond(id, `unknown endpoint id ${request.endpoint_id}`, 1);
    } catch (err) {
      if (err instanceof AgentFailure) {
        transport.respond(id, err.payload, err.statusCode);
        return;
      }
      throw err;
    }
  });
}
