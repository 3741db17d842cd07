/**
 * Type definitions for the @fieldlink/device-api package.
 *
 * All types used across device-api modules are defined here to avoid
 * circular imports and provide a single source of truth.
 *
 * @module device-api/types
 */
import type { z } from 'zod';
import type { DeviceApiRequest, EndpointKind } from '@fieldlink/shared/device-api-schemas';
import type { DeviceApiError } from './errors.js';

export type { EndpointKind };

/** Logger interface accepted by every device-api class. Defaults to `console`. */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Bidirectional structured-message channel owned by exactly one session.
 *
 * `receive()` resolves the next inbound message in arrival order and
 * rejects with {@link TransportClosedError} once the channel is closed,
 * including any receive that is pending when `close()` is called.
 */
export interface DuplexTransport<TSend = DeviceApiRequest> {
  send(message: TSend): Promise<void>;
  receive(): Promise<unknown>;
  close(): Promise<void>;
}

/** A named remote operation discovered from the device agent. */
export interface Endpoint {
  readonly name: string;
  readonly id: number;
  readonly kind: EndpointKind;
}

/** Keyword arguments sent as the request payload. */
export type CallArgs = Record<string, unknown>;

/**
 * How response payloads are handed back.
 *
 * `json` parses string payloads with `JSON.parse` and passes structured
 * payloads through; `raw` returns the payload exactly as received.
 */
export type PayloadMode = 'json' | 'raw';

export interface CallOptions {
  as?: PayloadMode;
  /** Overrides the session's call timeout for this call. */
  timeoutMs?: number;
}

export interface EventOptions {
  as?: PayloadMode;
}

/** Options that validate the decoded payload and narrow its type. */
export interface Validated<T> {
  schema: z.ZodType<T>;
}

export interface DeviceApiSessionOptions {
  /** Bounded wait for a call response (ms). Default: 5000 */
  callTimeoutMs?: number;
  logger?: Logger;
}

/** Lifecycle of an {@link EventStream}. */
export type StreamState = 'open' | 'streaming' | 'closed' | 'failed';

/** Tagged result of pulling the next element from an event stream. */
export type StreamResult<T> =
  | { kind: 'value'; value: T }
  | { kind: 'end' }
  | { kind: 'error'; error: DeviceApiError };

export type DisconnectHandler = (error: DeviceApiError) => void;
export type Unsubscribe = () => void;
