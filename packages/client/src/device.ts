/**
 * Handle for one device: attributes, properties, configuration and status
 * files, ports, admins, the device file system and the device API.
 *
 * @module client/device
 */
import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DeviceApiSession } from '@fieldlink/device-api';
import type { DeviceApiSessionOptions } from '@fieldlink/device-api';
import { DEFAULT_EVENT_LIMIT, DEVICE_API_PATH } from '@fieldlink/shared/constants';
import {
  DeviceInfoSchema,
  EventLogSchema,
  FileListingSchema,
  IdListSchema,
  PortMappingSchema,
  type DeviceInfo,
  type EventLog,
  type FileEntry,
  type PortMapping,
} from '@fieldlink/shared/device-schemas';
import type { CallOptions, HttpMethod, Query } from './api-client.js';
import { DeviceError, expectShape } from './errors.js';
import type { EventFeed } from './event-feed.js';
import { formatDuration } from './format.js';
import type { DeviceHost, DeviceSummary, EventQuery, OverwriteOptions } from './types.js';

const ACK = 'OK';

type Properties = Record<string, string>;

/**
 * A device in the fleet.
 *
 * Attributes (hostname, type, serial, …) are understood by the service;
 * properties are free-form user key/value annotations. Both are fetched
 * lazily with one `iot/get_device_info` call unless the handle was created
 * with preloaded info, and cached until {@link refresh}.
 *
 * Handles are mutable by default. A read-only handle (see {@link readonly})
 * refuses every write with `DeviceError('READ_ONLY')`.
 */
export class Device {
  private readOnly = false;
  private attributes: DeviceInfo | null = null;
  private properties: Properties | null = null;
  private readonly configs = new Map<string, unknown>();

  constructor(
    readonly id: number,
    private readonly host: DeviceHost,
    info?: DeviceInfo,
  ) {
    if (info) this.adopt(info);
  }

  // === Local state ===

  getKnownField(field: 'id'): number;
  getKnownField(field: 'readOnly'): boolean;
  getKnownField(field: 'id' | 'readOnly'): number | boolean {
    return field === 'id' ? this.id : this.readOnly;
  }

  get isReadOnly(): boolean {
    return this.readOnly;
  }

  /** Allow writes through this handle. */
  mutable(): this {
    this.readOnly = false;
    return this;
  }

  /** Refuse writes through this handle. */
  readonly(): this {
    this.readOnly = true;
    return this;
  }

  /** Drop cached attributes, properties and configs. */
  refresh(): void {
    this.attributes = null;
    this.properties = null;
    this.configs.clear();
  }

  // === Attributes and properties ===

  /** A service-level attribute, or `undefined` when the device has none. */
  async getAttribute(key: string): Promise<unknown> {
    const attributes = await this.info();
    return Object.hasOwn(attributes, key) ? attributes[key] : undefined;
  }

  /** A user property, or `undefined` when unset. */
  async getProperty(key: string): Promise<string | undefined> {
    const properties = await this.loadProperties();
    return Object.hasOwn(properties, key) ? properties[key] : undefined;
  }

  /** All attributes, without properties. */
  async info(): Promise<DeviceInfo> {
    if (!this.attributes) {
      await this.load();
    }
    return { ...this.requireAttributes() };
  }

  /** Attributes merged with properties; properties win on clashes. */
  async toDict(): Promise<Record<string, unknown>> {
    const attributes = await this.info();
    const properties = await this.loadProperties();
    return { ...attributes, ...properties };
  }

  /**
   * @param now - Current time in epoch seconds
   */
  async toSummary(now = Date.now() / 1000): Promise<DeviceSummary> {
    const info = await this.info();
    const heartbeat = info.heartbeat_utc;
    return {
      id: info.device_id,
      hostname: info.hostname ?? '',
      type: info.type ?? '',
      status: info.connected ? 'Connected' : 'Disconnected',
      lastHeartbeat: heartbeat ? formatDuration(now - heartbeat) : 'never',
    };
  }

  /** Set a user property; `null` removes it. */
  async setProperty(key: string, value: string | null): Promise<void> {
    this.assertMutable();
    const result = await this.call('iot/set_device_property', { property: key, value });
    if (result !== ACK) {
      throw new DeviceError(
        `Setting property '${key}' on device ${this.id} was not acknowledged`,
        'INVALID_RESPONSE',
      );
    }
    this.refresh();
  }

  async setHostname(hostname: string): Promise<void> {
    await this.write('iot/set_device_hostname', { hostname });
  }

  async setType(type: string): Promise<void> {
    await this.write('iot/set_device_type', { type });
  }

  async setLocation(lat: number, lon: number): Promise<void> {
    await this.write('iot/update_device_location', { lat, lon });
  }

  async setProject(projectId: number): Promise<void> {
    await this.write('iot/set_device_project', { project_id: projectId });
  }

  /** Serial numbers are assigned by the service and cannot be changed. */
  async setSerial(_serial: string): Promise<never> {
    this.assertMutable();
    throw new DeviceError("Modifying 'serial' is not supported", 'UNSUPPORTED');
  }

  // === Configs and statuses ===

  listConfigs(): Promise<unknown> {
    return this.call('iot/list_device_configs');
  }

  /**
   * A configuration file by name, without the `.json` extension. Cached
   * until a write to the same config or `refresh: true`.
   */
  async getConfig(name: string, options: { refresh?: boolean } = {}): Promise<unknown> {
    if (!options.refresh && this.configs.has(name)) {
      return this.configs.get(name);
    }
    const config = await this.call('iot/get_device_config', { config_name: name });
    this.configs.set(name, config);
    return config;
  }

  createConfig(name: string, config: Record<string, unknown> = {}): Promise<unknown> {
    return this.writeConfig(name, config, 'POST');
  }

  replaceConfig(name: string, config: Record<string, unknown>): Promise<unknown> {
    return this.writeConfig(name, config, 'PUT');
  }

  removeConfig(name: string): Promise<unknown> {
    return this.writeConfig(name, {}, 'DELETE');
  }

  setConfigKey(name: string, key: string, value: unknown): Promise<unknown> {
    return this.writeConfig(name, { [key]: value }, 'PATCH');
  }

  /** Unset a key; the device software falls back to its own default. */
  clearConfigKey(name: string, key: string): Promise<unknown> {
    return this.writeConfig(name, { [key]: null }, 'PATCH');
  }

  listStatuses(): Promise<unknown> {
    return this.call('iot/list_device_statuses');
  }

  getStatus(name: string): Promise<unknown> {
    return this.call('iot/get_device_status', { status_name: name });
  }

  // === Events, ports, admins ===

  /** Recent events as a table. */
  getEvents(query: EventQuery = {}): Promise<EventLog> {
    const params: Record<string, unknown> = { limit: query.limit ?? DEFAULT_EVENT_LIMIT };
    if (query.kinds && query.kinds.length > 0) {
      params.events = query.kinds;
    }
    return this.call('iot/get_device_events', params, { schema: EventLogSchema });
  }

  /** Live events for this device. */
  watchEvents(kinds?: string[]): Promise<EventFeed> {
    return this.host.watchDeviceEvents({ devices: [this.id], kinds });
  }

  getMappedPorts(): Promise<PortMapping[]> {
    return this.call('iot/get_device_port_mappings', {}, { schema: z.array(PortMappingSchema) });
  }

  /** Tunnel a port on the device's side; resolves the mapping with the local port. */
  mapPort(remotePort: number, remoteHost: string): Promise<PortMapping> {
    this.assertMutable();
    return this.call(
      'iot/device_map_port',
      { remote_port: remotePort, remote_host: remoteHost },
      { schema: PortMappingSchema },
    );
  }

  async unmapPort(localPort: number): Promise<void> {
    this.assertMutable();
    await this.call('iot/device_unmap_port', { local_port: localPort });
  }

  async addAdmin(userId: number): Promise<void> {
    this.assertMutable();
    await this.call('iot/assign_user_to_device', { user_id: userId });
  }

  async removeAdmin(userId: number): Promise<void> {
    this.assertMutable();
    await this.call('iot/remove_user_from_device', { user_id: userId });
  }

  /** User ids of the device's admins. */
  listAdmins(): Promise<number[]> {
    return this.call('iot/get_device_users', {}, { schema: IdListSchema });
  }

  /** Bytes transferred, as reported by the service. */
  getBandwidthStats(): Promise<unknown> {
    return this.call('iot/get_device_bandwidth_stats');
  }

  // === File system ===

  /**
   * Read a file. JSON files are parsed, `text/plain` is returned as a
   * string, anything else as bytes.
   */
  async getFileData(path: string): Promise<unknown> {
    const response = await this.host.api.request(this.fsPath(path));
    await this.host.api.checkStatus(response, 'iot/device/fs');
    const type = (response.headers.get('Content-Type') ?? '').split(';')[0]?.trim();
    if (type === 'application/json') {
      const data: unknown = await response.json();
      return data;
    }
    if (type === 'text/plain') {
      return response.text();
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  /** Stream a device file to disk. */
  async downloadFile(path: string, localPath: string, options: OverwriteOptions = {}): Promise<void> {
    if (!options.overwrite && fs.existsSync(localPath)) {
      throw new DeviceError(`File ${localPath} already exists`, 'ALREADY_EXISTS');
    }
    await this.host.api.download(this.fsPath(path), localPath);
  }

  /**
   * Write a device file. Checks with HEAD first: an existing file is
   * replaced with PUT only when `overwrite` is set, a new one is created
   * with POST.
   */
  async putFileData(path: string, data: Uint8Array | string, options: OverwriteOptions = {}): Promise<void> {
    this.assertMutable();
    const fsPath = this.fsPath(path);
    const existing = await this.host.api.request(fsPath, { method: 'HEAD' });
    let method: HttpMethod = 'POST';
    if (existing.status === 200) {
      if (!options.overwrite) {
        throw new DeviceError(`File ${path} already exists on device ${this.id}`, 'ALREADY_EXISTS');
      }
      method = 'PUT';
    }
    const response = await this.host.api.request(fsPath, {
      method,
      body: data,
      headers: { 'Content-Type': 'application/octet-stream' },
    });
    await this.host.api.checkStatus(response, 'iot/device/fs');
  }

  async uploadFile(localPath: string, path: string, options: OverwriteOptions = {}): Promise<void> {
    this.assertMutable();
    const data = await readFile(localPath);
    await this.putFileData(path, data, options);
  }

  /** Directory listing of a device path. */
  async ls(path: string): Promise<FileEntry[]> {
    const response = await this.host.api.request(this.fsPath(path), { query: { dir_only: true } });
    await this.host.api.checkStatus(response, 'iot/device/fs');
    const listing = expectShape('iot/device/fs', await response.json(), FileListingSchema);
    return listing.map(({ index: _index, ...entry }) => entry);
  }

  async rm(path: string): Promise<void> {
    this.assertMutable();
    const response = await this.host.api.request(this.fsPath(path), { method: 'DELETE' });
    await this.host.api.checkStatus(response, 'iot/device/fs');
  }

  // === Device API ===

  /** Open a device API session over the device's socket. */
  async openApi(options: DeviceApiSessionOptions = {}): Promise<DeviceApiSession> {
    const transport = await this.host.api.openTransport(DEVICE_API_PATH, { device_id: this.id });
    return DeviceApiSession.open(transport, {
      logger: this.host.logger,
      callTimeoutMs: this.host.callTimeoutMs,
      ...options,
    });
  }

  // === Internals ===

  /** Device-scoped REST call: `device_id` travels as a query parameter. */
  private call(path: string, params?: Record<string, unknown>, options?: CallOptions): Promise<unknown>;
  private call<T>(
    path: string,
    params: Record<string, unknown> | undefined,
    options: CallOptions & { schema: z.ZodType<T> },
  ): Promise<T>;
  private call<T>(
    path: string,
    params: Record<string, unknown> = {},
    options: CallOptions & { schema?: z.ZodType<T> } = {},
  ): Promise<unknown> {
    const query: Query = { ...options.query, device_id: this.id };
    const { schema } = options;
    if (schema) {
      return this.host.api.call(path, params, { ...options, query, schema });
    }
    return this.host.api.call(path, params, { method: options.method, query });
  }

  private async write(path: string, params: Record<string, unknown>): Promise<void> {
    this.assertMutable();
    await this.call(path, params);
    this.refresh();
  }

  private async writeConfig(
    name: string,
    body: Record<string, unknown>,
    method: HttpMethod,
  ): Promise<unknown> {
    this.assertMutable();
    this.configs.delete(name);
    return this.call('iot/set_device_config', body, { method, query: { config_name: name } });
  }

  private async load(): Promise<void> {
    const info = await this.call('iot/get_device_info', { with_props: true }, { schema: DeviceInfoSchema });
    this.adopt(info);
  }

  private async loadProperties(): Promise<Properties> {
    if (!this.properties) {
      await this.load();
    }
    return this.properties ?? {};
  }

  private adopt(info: DeviceInfo): void {
    const { properties, ...attributes } = info;
    this.attributes = attributes;
    this.properties = properties ?? {};
  }

  private requireAttributes(): DeviceInfo {
    if (!this.attributes) {
      throw new DeviceError(`Device ${this.id} returned no attributes`, 'INVALID_RESPONSE');
    }
    return this.attributes;
  }

  private assertMutable(): void {
    if (this.readOnly) {
      throw new DeviceError(`Device ${this.id} is read only`, 'READ_ONLY');
    }
  }

  private fsPath(path: string): string {
    return `iot/device/fs/${this.id}/${path.replace(/^\/+/, '')}`;
  }
}
