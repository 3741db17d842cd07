/**
 * Errors raised by the REST client and the device resource layer.
 *
 * @module client/errors
 */
import type { z } from 'zod';

/** Non-2xx response from the REST service. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly path: string,
    readonly body: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export type DeviceErrorCode =
  | 'READ_ONLY'
  | 'UNSUPPORTED'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'INVALID_RESPONSE'
  | 'NOT_CONFIGURED';

/** Local precondition failure in the device and fleet layers. */
export class DeviceError extends Error {
  constructor(
    message: string,
    readonly code: DeviceErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeviceError';
  }
}

/**
 * Parse a REST result against the shape the caller relies on.
 *
 * @throws {DeviceError} `INVALID_RESPONSE` listing the mismatches
 */
export function expectShape<T>(path: string, value: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new DeviceError(`Unexpected response from '${path}': ${issues.join('; ')}`, 'INVALID_RESPONSE', {
      cause: result.error,
    });
  }
  return result.data;
}
