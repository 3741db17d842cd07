import { describe, it, expect } from 'vitest';
import {
  DeviceInfoSchema,
  DeviceRefListSchema,
  FileListingSchema,
  EventLogSchema,
} from '../device-schemas.js';

describe('DeviceInfoSchema', () => {
  it('keeps attributes it does not list', () => {
    const info = DeviceInfoSchema.parse({ device_id: 7, hostname: 'sensor-07', firmware: '2.1.0' });
    expect(info).toEqual({ device_id: 7, hostname: 'sensor-07', firmware: '2.1.0' });
  });

  it('requires an integer id', () => {
    expect(DeviceInfoSchema.safeParse({ device_id: 'seven' }).success).toBe(false);
    expect(DeviceInfoSchema.safeParse({ device_id: 7.5 }).success).toBe(false);
  });
});

describe('DeviceRefListSchema', () => {
  it('accepts bare ids and info objects side by side', () => {
    const refs = DeviceRefListSchema.parse([7, { device_id: 8, connected: false }]);
    expect(refs).toEqual([7, { device_id: 8, connected: false }]);
  });

  it('rejects strings', () => {
    expect(DeviceRefListSchema.safeParse(['7']).success).toBe(false);
  });
});

describe('FileListingSchema', () => {
  it('rejects an empty listing', () => {
    expect(FileListingSchema.safeParse([]).success).toBe(false);
  });

  it('rejects entries without a name', () => {
    expect(FileListingSchema.safeParse([{ name: '' }]).success).toBe(false);
  });
});

describe('EventLogSchema', () => {
  it('accepts a header row with data rows', () => {
    const log = { headers: ['time', 'event'], data: [[1_700_000_000, 'boot']] };
    expect(EventLogSchema.parse(log)).toEqual(log);
  });
});
