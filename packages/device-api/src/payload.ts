/**
 * Response status handling and payload decoding.
 *
 * @module device-api/payload
 */
import type { z } from 'zod';
import { STATUS_OK } from '@fieldlink/shared/constants';
import type { DeviceApiResponse } from '@fieldlink/shared/device-api-schemas';
import { DeviceApiError, describePayload } from './errors.js';
import type { PayloadMode } from './types.js';

/**
 * Build the error for a response with a failure status.
 * The payload is carried verbatim.
 */
export function deviceError(endpoint: string, response: DeviceApiResponse): DeviceApiError {
  return new DeviceApiError(
    `Device rejected '${endpoint}' (status ${response.status_code}): ${describePayload(response.payload)}`,
    'DEVICE_ERROR',
    { endpoint, statusCode: response.status_code, payload: response.payload },
  );
}

/**
 * Return the payload of a successful response, or throw the device error.
 *
 * @throws {DeviceApiError} `DEVICE_ERROR` when the status code is not 0
 */
export function unwrapResponse(endpoint: string, response: DeviceApiResponse): unknown {
  if (response.status_code !== STATUS_OK) {
    throw deviceError(endpoint, response);
  }
  return response.payload;
}

/**
 * Decode a payload according to the caller's mode.
 *
 * @throws {DeviceApiError} `INVALID_PAYLOAD` when a JSON-mode string does not parse
 */
export function decodePayload(endpoint: string, payload: unknown, mode: PayloadMode): unknown {
  if (mode === 'raw' || typeof payload !== 'string') return payload;
  try {
    const parsed: unknown = JSON.parse(payload);
    return parsed;
  } catch (err) {
    throw new DeviceApiError(`Endpoint '${endpoint}' returned a payload that is not valid JSON`, 'INVALID_PAYLOAD', {
      endpoint,
      payload,
      cause: err,
    });
  }
}

/**
 * Validate a decoded payload against a caller-supplied schema.
 *
 * @throws {DeviceApiError} `INVALID_PAYLOAD` when validation fails
 */
export function validatePayload<T>(endpoint: string, value: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new DeviceApiError(
      `Endpoint '${endpoint}' returned an unexpected payload: ${issues.join('; ')}`,
      'INVALID_PAYLOAD',
      { endpoint, payload: value, cause: result.error },
    );
  }
  return result.data;
}
