/**
 * Live device events from the `iot/device_events` socket.
 *
 * @module client/event-feed
 */
import { TransportClosedError } from '@fieldlink/device-api';
import type { Logger } from '@fieldlink/device-api';
import { DeviceEventSchema, type DeviceEvent } from '@fieldlink/shared/device-schemas';

/** The receiving half of a transport. */
export interface MessageSource {
  receive(): Promise<unknown>;
  close(): Promise<void>;
}

function isEmptyFrame(frame: unknown): boolean {
  if (frame === null || frame === undefined || frame === '') return true;
  return typeof frame === 'object' && Object.keys(frame).length === 0;
}

/**
 * Async iterable over device events. Empty keep-alive frames are skipped;
 * iteration ends when the socket closes or {@link close} is called.
 *
 * @example
 * ```ts
 * const feed = await fleet.watchDeviceEvents({ devices: [1001] });
 * for await (const event of feed) {
 *   console.log(event.event, event.msg);
 * }
 * ```
 */
export class EventFeed implements AsyncIterable<DeviceEvent> {
  private closing: Promise<void> | null = null;

  constructor(
    private readonly source: MessageSource,
    private readonly logger: Logger = console,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<DeviceEvent, void, undefined> {
    try {
      while (true) {
        let frame: unknown;
        try {
          frame = await this.source.receive();
        } catch (err) {
          if (err instanceof TransportClosedError) return;
          throw err;
        }
        if (isEmptyFrame(frame)) continue;

        const parsed = DeviceEventSchema.safeParse(frame);
        if (!parsed.success) {
          this.logger.warn('Event feed: skipping frame that is not a device event');
          continue;
        }
        yield parsed.data;
      }
    } finally {
      await this.close();
    }
  }

  /** Close the underlying socket. Safe to call more than once. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.source.close();
    }
    return this.closing;
  }
}
