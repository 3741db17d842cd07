/**
 * @fieldlink/device-api: correlation-id multiplexed calls and event
 * streams over a duplex transport to a device agent.
 *
 * @module device-api
 */
export { DeviceApiSession, withSession } from './device-api-session.js';
export { EventStream } from './event-stream.js';
export type { EventStreamHooks } from './event-stream.js';
export { CapabilityTable } from './capability-table.js';
export { PendingExchanges } from './pending-exchanges.js';
export type { PendingExchange } from './pending-exchanges.js';
export { MessageRouter } from './message-router.js';
export type { MessageRouterDeps, RouteOutcome } from './message-router.js';
export { AsyncQueue } from './async-queue.js';
export { DeviceApiError, TransportClosedError, describePayload } from './errors.js';
export type { DeviceApiErrorCode, DeviceApiErrorDetails } from './errors.js';
export { decodePayload, deviceError, unwrapResponse, validatePayload } from './payload.js';
export type {
  CallArgs,
  CallOptions,
  DeviceApiSessionOptions,
  DisconnectHandler,
  DuplexTransport,
  Endpoint,
  EndpointKind,
  EventOptions,
  Logger,
  PayloadMode,
  StreamResult,
  StreamState,
  Unsubscribe,
  Validated,
} from './types.js';
