/**
 * Fleet-level queries: listing, looking up and watching devices.
 *
 * @module client/iot-client
 */
import type { Logger } from '@fieldlink/device-api';
import { ALL_DEVICES, DEVICE_EVENTS_PATH } from '@fieldlink/shared/constants';
import {
  DeviceInfoListSchema,
  DeviceInfoSchema,
  DeviceRefListSchema,
  DeviceRefSchema,
  type DeviceRef,
} from '@fieldlink/shared/device-schemas';
import { ApiClient, type ApiClientOptions } from './api-client.js';
import { Device } from './device.js';
import { ApiError, DeviceError } from './errors.js';
import { EventFeed } from './event-feed.js';
import type { DeviceHost, WatchEventsOptions } from './types.js';

export interface IotClientOptions extends ApiClientOptions {
  /** Call timeout for device API sessions opened through this client (ms). */
  callTimeoutMs?: number;
}

/**
 * Entry point of the SDK. Creates {@link Device} handles and opens live
 * event feeds.
 *
 * @example
 * ```ts
 * const fleet = new IotClient({ url: 'https://fleet.example.com/', token });
 * for (const device of await fleet.listOnlineDevices()) {
 *   console.log(await device.getAttribute('hostname'));
 * }
 * ```
 */
export class IotClient implements DeviceHost {
  readonly api: ApiClient;
  readonly logger: Logger;
  readonly callTimeoutMs?: number;

  constructor(options: IotClientOptions | ApiClient) {
    if (options instanceof ApiClient) {
      this.api = options;
      this.logger = console;
    } else {
      this.api = new ApiClient(options);
      this.logger = options.logger ?? console;
      this.callTimeoutMs = options.callTimeoutMs;
    }
  }

  /** Every device visible to the token, with info preloaded. */
  async listDevices(): Promise<Device[]> {
    const devices = await this.api.call('iot/list_devices', { with_info: true }, { schema: DeviceInfoListSchema });
    return devices.map((info) => new Device(info.device_id, this, info));
  }

  async listOnlineDevices(): Promise<Device[]> {
    return this.devices(await this.api.call('iot/get_connected_devices', {}, { schema: DeviceRefListSchema }));
  }

  /** Devices owned by the user the token belongs to. */
  async getMyDevices(): Promise<Device[]> {
    const devices = await this.api.call('iot/get_my_devices', { with_info: true }, { schema: DeviceInfoListSchema });
    return devices.map((info) => new Device(info.device_id, this, info));
  }

  async getDevicesByProperty(property: string, value: string): Promise<Device[]> {
    return this.devices(
      await this.api.call('iot/get_devices_by_property', { property, value }, { schema: DeviceRefListSchema }),
    );
  }

  /** Devices of another project, identified by its subdomain. */
  async getDevicesByProject(subdomain: string): Promise<Device[]> {
    const refs = await this.api
      .withProject(subdomain)
      .call('iot/list_devices', {}, { schema: DeviceRefListSchema });
    return this.devices(refs);
  }

  async getDevicesByUser(userId: number): Promise<Device[]> {
    return this.devices(await this.api.call('iot/list_devices', { user_id: userId }, { schema: DeviceRefListSchema }));
  }

  /**
   * @throws {DeviceError} `INVALID_RESPONSE` when several devices share the hostname
   */
  async getDeviceByHostname(hostname: string): Promise<Device | null> {
    const refs = await this.api.call('iot/get_devices_by_hostname', { hostname }, { schema: DeviceRefListSchema });
    if (refs.length > 1) {
      throw new DeviceError(`Hostname '${hostname}' matches ${refs.length} devices`, 'INVALID_RESPONSE');
    }
    const [ref] = refs;
    return ref === undefined ? null : this.device(ref);
  }

  async getDeviceBySerial(serial: string): Promise<Device | null> {
    const ref = await this.api.call('iot/get_device_by_serial', { serial }, { schema: DeviceRefSchema.nullable() });
    return ref === null ? null : this.device(ref);
  }

  /** `null` when the service does not know the id. */
  async getDeviceById(deviceId: number): Promise<Device | null> {
    try {
      const info = await this.api.call(
        'iot/get_device_info',
        { device_id: deviceId },
        { schema: DeviceInfoSchema.nullable() },
      );
      return info === null ? null : new Device(info.device_id, this, info);
    } catch (err) {
      if (err instanceof ApiError && err.status === 404) return null;
      throw err;
    }
  }

  /**
   * Resolve a user-supplied device reference: a numeric id first, then a
   * serial number, then a hostname.
   */
  async findDevice(query: string): Promise<Device | null> {
    if (/^\d+$/.test(query)) {
      const byId = await this.getDeviceById(Number(query));
      if (byId) return byId;
    }
    return (await this.getDeviceBySerial(query)) ?? (await this.getDeviceByHostname(query));
  }

  /** Open a live event feed; without `devices` every device is watched. */
  async watchDeviceEvents(options: WatchEventsOptions = {}): Promise<EventFeed> {
    const devices = options.devices && options.devices.length > 0 ? options.devices : [ALL_DEVICES];
    const kinds = options.kinds && options.kinds.length > 0 ? options.kinds.join(',') : undefined;
    const transport = await this.api.openTransport<never>(DEVICE_EVENTS_PATH, {
      device_ids: devices.join(','),
      kind: kinds,
    });
    return new EventFeed(transport, this.logger);
  }

  /** A lazy handle; nothing is fetched until an attribute is read. */
  device(ref: DeviceRef): Device {
    return typeof ref === 'number' ? new Device(ref, this) : new Device(ref.device_id, this, ref);
  }

  private devices(refs: DeviceRef[]): Device[] {
    return refs.map((ref) => this.device(ref));
  }
}
