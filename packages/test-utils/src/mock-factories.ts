import { vi, type Mock } from 'vitest';
import type { Logger } from '@fieldlink/device-api';
import type { DeviceEvent, DeviceInfo, FileEntry, PortMapping } from '@fieldlink/shared/device-schemas';

export function createMockDeviceInfo(overrides: Partial<DeviceInfo> = {}): DeviceInfo {
  return {
    device_id: 1001,
    hostname: 'sensor-01',
    type: 'gateway',
    serial: 'SN-0001',
    connected: true,
    heartbeat_utc: 1_700_000_000,
    properties: { location: 'lab' },
    ...overrides,
  };
}

export function createMockFileEntry(overrides: Partial<FileEntry> = {}): FileEntry {
  return {
    name: 'readme.txt',
    size: 12,
    is_dir: false,
    modified_utc: 1_700_000_000,
    ...overrides,
  };
}

export function createMockPortMapping(overrides: Partial<PortMapping> = {}): PortMapping {
  return { local_port: 22, remote_port: 40022, remote_host: 'tunnel.example.test', ...overrides };
}

export function createMockDeviceEvent(overrides: Partial<DeviceEvent> = {}): DeviceEvent {
  return { event: 'connected', device_id: 1001, ...overrides };
}

/** Logger whose methods are `vi.fn()` spies. */
export function createMockLogger(): Record<keyof Logger, Mock> & Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Build a JSON `Response` the way the REST service sends one. */
export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function textResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, ...init });
}
