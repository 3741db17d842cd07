/**
 * Error classes raised by the device API session layer.
 *
 * @module device-api/errors
 */

export type DeviceApiErrorCode =
  | 'INVALID_ENDPOINT'
  | 'TIMEOUT'
  | 'DEVICE_ERROR'
  | 'CONNECTION_CLOSED'
  | 'SESSION_CLOSED'
  | 'BOOTSTRAP_FAILED'
  | 'INVALID_PAYLOAD'
  | 'STREAM_CANCELLED';

export interface DeviceApiErrorDetails {
  endpoint?: string;
  statusCode?: number;
  payload?: unknown;
  cause?: unknown;
}

/**
 * Error raised by a device API session.
 *
 * `DEVICE_ERROR` carries the status code and the payload the agent sent,
 * verbatim, so callers can tell a rejected operation from a broken channel.
 */
export class DeviceApiError extends Error {
  readonly code: DeviceApiErrorCode;
  readonly endpoint?: string;
  readonly statusCode?: number;
  readonly payload?: unknown;

  constructor(message: string, code: DeviceApiErrorCode, details: DeviceApiErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'DeviceApiError';
    this.code = code;
    this.endpoint = details.endpoint;
    this.statusCode = details.statusCode;
    this.payload = details.payload;
  }
}

/** Raised by a {@link DuplexTransport} once its connection is closed. */
export class TransportClosedError extends Error {
  readonly code = 'TRANSPORT_CLOSED';

  constructor(message = 'Transport closed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportClosedError';
  }
}

/** Render a device payload for an error message without losing strings. */
export function describePayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
