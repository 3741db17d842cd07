/**
 * Zod schemas for the REST payloads the SDK interprets.
 *
 * The service returns more fields than listed here; device and event
 * objects are loose so unknown attributes pass through untouched.
 *
 * @module shared/device-schemas
 */
import { z } from 'zod';

// === Devices ===

export const DeviceInfoSchema = z.looseObject({
  device_id: z.number().int(),
  hostname: z.string().optional(),
  type: z.string().nullable().optional(),
  serial: z.string().nullable().optional(),
  connected: z.boolean().optional(),
  heartbeat_utc: z.number().nullable().optional(),
  properties: z.record(z.string(), z.string()).optional(),
});

export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

export const DeviceInfoListSchema = z.array(DeviceInfoSchema);

/** Endpoints that return bare device or user ids. */
export const IdListSchema = z.array(z.number().int());

/** A device given either by id or by its info object. */
export const DeviceRefSchema = z.union([z.number().int(), DeviceInfoSchema]);

export type DeviceRef = z.infer<typeof DeviceRefSchema>;

export const DeviceRefListSchema = z.array(DeviceRefSchema);

// === Files ===

export const FileEntrySchema = z.looseObject({
  name: z.string().min(1),
  index: z.number().int().optional(),
  size: z.number().optional(),
  is_dir: z.boolean().optional(),
  modified_utc: z.number().optional(),
});

export type FileEntry = Omit<z.infer<typeof FileEntrySchema>, 'index'>;

export const FileListingSchema = z.array(FileEntrySchema).min(1);

// === Ports ===

export const PortMappingSchema = z.looseObject({
  local_port: z.number().int(),
  remote_port: z.number().int().optional(),
  remote_host: z.string().optional(),
});

export type PortMapping = z.infer<typeof PortMappingSchema>;

// === Events ===

/** Tabular event log returned by `iot/get_device_events`. */
export const EventLogSchema = z.object({
  headers: z.array(z.string()),
  data: z.array(z.array(z.unknown())),
});

export type EventLog = z.infer<typeof EventLogSchema>;

export const DeviceEventSchema = z.looseObject({
  event: z.string(),
  msg: z.string().optional(),
  device_id: z.number().int().optional(),
});

export type DeviceEvent = z.infer<typeof DeviceEventSchema>;

// === Directory (users and projects) ===

export const ProjectSchema = z.looseObject({
  project_id: z.number().int(),
  subdomain: z.string().optional(),
  name: z.string().optional(),
});

export type Project = z.infer<typeof ProjectSchema>;

export const UserSchema = z.looseObject({
  user_id: z.number().int(),
  email: z.string().optional(),
  name: z.string().optional(),
});

export type User = z.infer<typeof UserSchema>;
