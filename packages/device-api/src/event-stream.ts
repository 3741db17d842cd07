/**
 * Pull-based consumer for one event endpoint request.
 *
 * @module device-api/event-stream
 */
import { STATUS_END_OF_STREAM, STATUS_OK } from '@fieldlink/shared/constants';
import { DeviceApiError } from './errors.js';
import { deviceError } from './payload.js';
import type { PendingExchange } from './pending-exchanges.js';
import type { StreamResult, StreamState } from './types.js';

const END: StreamResult<never> = Object.freeze({ kind: 'end' });

/** Callbacks the session hands to each stream. */
export interface EventStreamHooks<T> {
  /** Remove the stream's pending exchange from the session. */
  release: (id: number) => void;
  /** Turn a successful payload into a value; throwing fails the stream. */
  decode: (payload: unknown) => T;
}

/**
 * Response stream for a single event request, modelled as a state machine.
 *
 * ```
 * open ──first frame──▶ streaming ──end of stream / cancel()──▶ closed
 *   │                       │
 *   └──────device error / disconnect──────────────────────────▶ failed
 * ```
 *
 * `next()` never throws; it resolves a tagged {@link StreamResult} and waits
 * without a timeout. Once `closed` it keeps returning `end`; once `failed`
 * it keeps returning the same error. The pending exchange is released on
 * every transition into `closed` or `failed`.
 *
 * @example
 * ```ts
 * const log = await api.event('get_acquisition_log');
 * for await (const line of log) {
 *   process.stdout.write(String(line));
 * }
 * ```
 */
export class EventStream<T = unknown> implements AsyncIterable<T> {
  private state: StreamState = 'open';
  private error: DeviceApiError | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly exchange: PendingExchange,
    private readonly hooks: EventStreamHooks<T>,
  ) {}

  /** Correlation id of the underlying request. */
  get id(): number {
    return this.exchange.id;
  }

  get endpoint(): string {
    return this.exchange.endpoint;
  }

  get status(): StreamState {
    return this.state;
  }

  /**
   * Pull the next element. Concurrent calls are served one after another.
   */
  next(): Promise<StreamResult<T>> {
    const result = this.tail.then(() => this.advance());
    this.tail = result.catch(() => undefined);
    return result;
  }

  /**
   * Stop consuming. Releases the pending exchange immediately; a `next()`
   * that is waiting resolves `end`. Has no effect once the stream has ended.
   */
  cancel(): void {
    if (this.state === 'closed' || this.state === 'failed') return;
    this.state = 'closed';
    this.hooks.release(this.exchange.id);
    this.exchange.queue.fail(
      new DeviceApiError(`Event stream '${this.endpoint}' was cancelled`, 'STREAM_CANCELLED', {
        endpoint: this.endpoint,
      }),
    );
  }

  /**
   * Iterate values until the stream ends. Errors are thrown; leaving the
   * loop early cancels the stream.
   */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async (): Promise<IteratorResult<T>> => {
        const result = await this.next();
        if (result.kind === 'value') return { done: false, value: result.value };
        if (result.kind === 'end') return { done: true, value: undefined };
        throw result.error;
      },
      return: async (): Promise<IteratorResult<T>> => {
        this.cancel();
        return { done: true, value: undefined };
      },
    };
  }

  private async advance(): Promise<StreamResult<T>> {
    if (this.state === 'closed') return END;
    if (this.state === 'failed' && this.error) return { kind: 'error', error: this.error };

    let response;
    try {
      response = await this.exchange.queue.take();
    } catch (err) {
      if (this.state === 'closed') return END;
      return this.fail(
        err instanceof DeviceApiError
          ? err
          : new DeviceApiError(`Event stream '${this.endpoint}' failed`, 'CONNECTION_CLOSED', {
              endpoint: this.endpoint,
              cause: err,
            }),
      );
    }
    if (this.state === 'closed') return END;

    this.state = 'streaming';
    if (response.status_code === STATUS_END_OF_STREAM) {
      this.state = 'closed';
      this.hooks.release(this.exchange.id);
      return END;
    }
    if (response.status_code !== STATUS_OK) {
      return this.fail(deviceError(this.endpoint, response));
    }

    try {
      return { kind: 'value', value: this.hooks.decode(response.payload) };
    } catch (err) {
      return this.fail(
        err instanceof DeviceApiError
          ? err
          : new DeviceApiError(`Event stream '${this.endpoint}' could not decode a payload`, 'INVALID_PAYLOAD', {
              endpoint: this.endpoint,
              payload: response.payload,
              cause: err,
            }),
      );
    }
  }

  private fail(error: DeviceApiError): StreamResult<T> {
    this.state = 'failed';
    this.error = error;
    this.hooks.release(this.exchange.id);
    return { kind: 'error', error };
  }
}
