/**
 * Zod schemas for the device API wire protocol.
 *
 * The device API is a JSON message channel to the agent running on a
 * device. Every outgoing request carries a `message_id` that the agent
 * echoes back on each response frame for that request.
 *
 * @module shared/device-api-schemas
 */
import { z } from 'zod';

// === Endpoint kinds ===

export const EndpointKindSchema = z.enum(['call', 'event']);

export type EndpointKind = z.infer<typeof EndpointKindSchema>;

// === Frames ===

export const DeviceApiRequestSchema = z.object({
  endpoint_id: z.number().int().min(0),
  payload: z.record(z.string(), z.unknown()),
  message_id: z.number().int().min(1),
});

export type DeviceApiRequest = z.infer<typeof DeviceApiRequestSchema>;

export const DeviceApiResponseSchema = z.object({
  message_id: z.number().int(),
  status_code: z.number().int(),
  payload: z.unknown(),
});

export type DeviceApiResponse = z.infer<typeof DeviceApiResponseSchema>;

// === Bootstrap ===

/**
 * Payload of the bootstrap `get_call_info` call.
 *
 * `endpoints[i]` is the endpoint with numeric id `i`, and
 * `endpoint_types[i]` is its kind.
 */
export const CallInfoSchema = z
  .object({
    version_string: z.string(),
    endpoints: z.array(z.string().min(1)),
    endpoint_types: z.array(EndpointKindSchema),
  })
  .refine((info) => info.endpoints.length === info.endpoint_types.length, {
    message: 'endpoints and endpoint_types must have the same length',
    path: ['endpoint_types'],
  })
  .refine((info) => new Set(info.endpoints).size === info.endpoints.length, {
    message: 'endpoint names must be unique',
    path: ['endpoints'],
  });

export type CallInfo = z.infer<typeof CallInfoSchema>;
