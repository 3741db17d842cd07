import { AsyncQueue, TransportClosedError } from '@fieldlink/device-api';
import type { DuplexTransport } from '@fieldlink/device-api';
import type { DeviceApiRequest } from '@fieldlink/shared/device-api-schemas';

/** Hook run after each request is recorded; may deliver replies synchronously. */
export type SendHook = (request: DeviceApiRequest, transport: ScriptedTransport) => void;

/**
 * In-process {@link DuplexTransport} driven by the test.
 *
 * Records every request the session sends, lets the test push inbound
 * frames with {@link deliver} or {@link respond}, and can simulate the
 * remote side hanging up with {@link disconnect}.
 */
export class ScriptedTransport implements DuplexTransport {
  readonly sent: DeviceApiRequest[] = [];
  closeCount = 0;
  private readonly inbox = new AsyncQueue<unknown>();
  private readonly sendWaiters: Array<{ count: number; resolve: () => void }> = [];
  private hangup = false;

  constructor(private readonly onSend?: SendHook) {}

  get closed(): boolean {
    return this.hangup;
  }

  async send(message: DeviceApiRequest): Promise<void> {
    if (this.hangup) {
      throw new TransportClosedError();
    }
    this.sent.push(message);
    for (const waiter of [...this.sendWaiters]) {
      if (this.sent.length >= waiter.count) {
        this.sendWaiters.splice(this.sendWaiters.indexOf(waiter), 1);
        waiter.resolve();
      }
    }
    this.onSend?.(message, this);
  }

  receive(): Promise<unknown> {
    return this.inbox.take();
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    this.hangup = true;
    this.inbox.fail(new TransportClosedError());
  }

  /** Queue a raw inbound frame. */
  deliver(message: unknown): void {
    this.inbox.push(message);
  }

  /** Queue a response frame for a correlation id. */
  respond(messageId: number, payload: unknown, statusCode = 0): void {
    this.deliver({ message_id: messageId, status_code: statusCode, payload });
  }

  /** Simulate the remote side closing the connection. */
  disconnect(): void {
    this.hangup = true;
    this.inbox.fail(new TransportClosedError('Remote closed the connection'));
  }

  /** Resolves once at least `count` requests have been sent in total. */
  waitForSent(count: number): Promise<void> {
    if (this.sent.length >= count) return Promise.resolve();
    return new Promise((resolve) => {
      this.sendWaiters.push({ count, resolve });
    });
  }

  /** Most recently sent request. */
  lastSent(): DeviceApiRequest | undefined {
    return this.sent.at(-1);
  }
}
