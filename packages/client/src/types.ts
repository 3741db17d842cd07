/**
 * Types shared by the device and fleet layers.
 *
 * @module client/types
 */
import type { Logger } from '@fieldlink/device-api';
import type { ApiClient } from './api-client.js';
import type { EventFeed } from './event-feed.js';

export interface WatchEventsOptions {
  /** Device ids to watch; omit for every device. */
  devices?: number[];
  /** Event kinds to include; omit for all. */
  kinds?: string[];
}

/** What a {@link Device} needs from the fleet client that created it. */
export interface DeviceHost {
  readonly api: ApiClient;
  readonly logger: Logger;
  /** Call timeout for device API sessions (ms). */
  readonly callTimeoutMs?: number;
  watchDeviceEvents(options?: WatchEventsOptions): Promise<EventFeed>;
}

export type DeviceStatus = 'Connected' | 'Disconnected';

/** Row shown by `fieldlink list`. */
export interface DeviceSummary {
  id: number;
  hostname: string;
  type: string;
  status: DeviceStatus;
  lastHeartbeat: string;
}

export interface OverwriteOptions {
  /** Replace an existing file. Default: false */
  overwrite?: boolean;
}

export interface EventQuery {
  kinds?: string[];
  /** Default: 10 */
  limit?: number;
}
