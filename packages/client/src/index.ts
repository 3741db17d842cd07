/**
 * @module client
 */
export { ApiClient } from './api-client.js';
export type { ApiClientOptions, CallOptions, HttpMethod, Query, QueryValue, RequestOptions } from './api-client.js';
export { Device } from './device.js';
export { DirectoryClient } from './directory-client.js';
export { ApiError, DeviceError, expectShape } from './errors.js';
export type { DeviceErrorCode } from './errors.js';
export { EventFeed } from './event-feed.js';
export type { MessageSource } from './event-feed.js';
export { formatDuration } from './format.js';
export { IotClient } from './iot-client.js';
export type { IotClientOptions } from './iot-client.js';
export type {
  DeviceHost,
  DeviceStatus,
  DeviceSummary,
  EventQuery,
  OverwriteOptions,
  WatchEventsOptions,
} from './types.js';
export { WebSocketTransport } from './websocket-transport.js';
export type { WebSocketTransportOptions } from './websocket-transport.js';
