/**
 * Background task that drains a transport and routes responses to
 * pending exchanges by correlation id.
 *
 * @module device-api/message-router
 */
import { DeviceApiResponseSchema } from '@fieldlink/shared/device-api-schemas';
import { DeviceApiError } from './errors.js';
import type { PendingExchanges } from './pending-exchanges.js';
import type { DuplexTransport, Logger } from './types.js';

/** Outcome of routing one inbound message. */
export type RouteOutcome = 'delivered' | 'discarded' | 'unroutable' | 'rejected';

const CorrelationSchema = DeviceApiResponseSchema.pick({ message_id: true });

/** Dependencies injected into the MessageRouter. */
export interface MessageRouterDeps {
  transport: DuplexTransport;
  exchanges: PendingExchanges;
  logger: Logger;
  /** Reads the session's running flag. */
  isRunning: () => boolean;
  /** Called once when the transport closes while the session is still running. */
  onDisconnect: (error: DeviceApiError) => void;
}

/**
 * Routes inbound frames for one session.
 *
 * Loop per message:
 * 1. Frames that are not responses (no integer `message_id`) are dropped
 * 2. Responses for an id with no pending exchange are logged and dropped
 * 3. A malformed frame for a pending exchange fails that exchange with
 *    `INVALID_PAYLOAD` and removes it
 * 4. Everything else is pushed onto its exchange's queue
 *
 * The loop ends when the running flag is cleared or the transport closes.
 * A close while still running is an unexpected disconnect and is reported
 * through `onDisconnect`; a close after the flag was cleared exits quietly.
 */
export class MessageRouter {
  private loop: Promise<void> | null = null;

  constructor(private readonly deps: MessageRouterDeps) {}

  /** Start the receive loop. Calling it again has no effect. */
  start(): void {
    if (!this.loop) {
      this.loop = this.run();
    }
  }

  /** Settles once the receive loop has exited. */
  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /** Route a single inbound message. */
  route(message: unknown): RouteOutcome {
    const correlated = CorrelationSchema.safeParse(message);
    if (!correlated.success) {
      this.deps.logger.debug('Device API: discarding frame without a valid message id');
      return 'discarded';
    }

    const id = correlated.data.message_id;
    const exchange = this.deps.exchanges.get(id);
    if (!exchange) {
      this.deps.logger.warn(`Device API: got message for unknown message id ${id}, discarding`);
      return 'unroutable';
    }

    const parsed = DeviceApiResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.deps.exchanges.delete(id);
      exchange.queue.fail(
        new DeviceApiError(`Device API: malformed response for message id ${id}`, 'INVALID_PAYLOAD', {
          endpoint: exchange.endpoint,
          payload: message,
          cause: parsed.error,
        }),
      );
      this.deps.logger.warn(`Device API: malformed response for message id ${id}, failing exchange`);
      return 'rejected';
    }

    if (!exchange.queue.push(parsed.data)) {
      this.deps.logger.warn(`Device API: exchange ${id} already failed, discarding response`);
      return 'unroutable';
    }
    return 'delivered';
  }

  private async run(): Promise<void> {
    while (this.deps.isRunning()) {
      let message: unknown;
      try {
        message = await this.deps.transport.receive();
      } catch (err) {
        if (!this.deps.isRunning()) return;
        this.deps.onDisconnect(
          new DeviceApiError('Device API connection closed unexpectedly', 'CONNECTION_CLOSED', {
            cause: err,
          }),
        );
        return;
      }
      this.route(message);
    }
  }
}
