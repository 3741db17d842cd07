/**
 * DeviceApiSession: request/response and streaming calls over one
 * duplex transport to a device agent.
 *
 * @module device-api/device-api-session
 */
import { BOOTSTRAP_ENDPOINT, DEFAULT_CALL_TIMEOUT_MS } from '@fieldlink/shared/constants';
import { CallInfoSchema, type DeviceApiRequest } from '@fieldlink/shared/device-api-schemas';
import { CapabilityTable } from './capability-table.js';
import { DeviceApiError } from './errors.js';
import { EventStream } from './event-stream.js';
import { MessageRouter } from './message-router.js';
import { decodePayload, unwrapResponse, validatePayload } from './payload.js';
import { PendingExchanges } from './pending-exchanges.js';
import type {
  CallArgs,
  CallOptions,
  DeviceApiSessionOptions,
  DisconnectHandler,
  DuplexTransport,
  Endpoint,
  EventOptions,
  Logger,
  Unsubscribe,
  Validated,
} from './types.js';

/**
 * Session with a device agent's API.
 *
 * Owns the transport, a {@link MessageRouter} draining it, the
 * {@link CapabilityTable} discovered at open, and the pending exchanges.
 * Open with {@link DeviceApiSession.open}; the constructor is private so a
 * caller never holds a session whose discovery has not completed.
 *
 * @example
 * ```ts
 * const api = await DeviceApiSession.open(transport);
 * try {
 *   const reply = await api.call('ping');
 * } finally {
 *   await api.close();
 * }
 * ```
 */
export class DeviceApiSession {
  private readonly capabilities = new CapabilityTable();
  private readonly exchanges = new PendingExchanges();
  private readonly router: MessageRouter;
  private readonly logger: Logger;
  private readonly callTimeoutMs: number;
  private readonly disconnectHandlers = new Set<DisconnectHandler>();

  private running = true;
  private nextMessageId = 1;
  private sendLock: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;
  private recordedFailure: DeviceApiError | null = null;
  private agentVersion = '';

  private constructor(
    private readonly transport: DuplexTransport,
    options: DeviceApiSessionOptions,
  ) {
    this.logger = options.logger ?? console;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.router = new MessageRouter({
      transport,
      exchanges: this.exchanges,
      logger: this.logger,
      isRunning: () => this.running,
      onDisconnect: (error) => this.handleDisconnect(error),
    });
  }

  /**
   * Start a session: begin routing and discover the agent's endpoints.
   *
   * @throws {DeviceApiError} `BOOTSTRAP_FAILED` with the underlying error as
   *   `cause`; the transport is closed before the error is raised
   */
  static async open(
    transport: DuplexTransport,
    options: DeviceApiSessionOptions = {},
  ): Promise<DeviceApiSession> {
    const session = new DeviceApiSession(transport, options);
    session.router.start();
    try {
      await session.discover();
    } catch (err) {
      await session.close();
      const reason = err instanceof Error ? err.message : String(err);
      throw new DeviceApiError(`Device API bootstrap failed: ${reason}`, 'BOOTSTRAP_FAILED', {
        endpoint: BOOTSTRAP_ENDPOINT,
        cause: err,
      });
    }
    session.logger.debug(
      `Device API: session open, agent ${session.agentVersion}, ${session.capabilities.list().length} endpoints`,
    );
    return session;
  }

  /** Agent version string reported at discovery. */
  get version(): string {
    return this.agentVersion;
  }

  /** False once the session has been closed or lost its connection. */
  get isOpen(): boolean {
    return this.running;
  }

  /** The unexpected disconnect that ended this session, if any. */
  get failure(): DeviceApiError | null {
    return this.recordedFailure;
  }

  /** Names of all request/response endpoints, bootstrap included. */
  getCalls(): string[] {
    return this.capabilities.names('call');
  }

  /** Names of all streaming endpoints. */
  getEvents(): string[] {
    return this.capabilities.names('event');
  }

  endpoints(): Endpoint[] {
    return this.capabilities.list();
  }

  /**
   * Invoke a call endpoint and wait for its single response.
   *
   * @param endpoint - Endpoint name as advertised by the agent
   * @param args - Keyword arguments sent as the request payload
   * @throws {DeviceApiError} `SESSION_CLOSED`, `INVALID_ENDPOINT` (nothing is
   *   sent), `TIMEOUT`, `DEVICE_ERROR`, `CONNECTION_CLOSED` or `INVALID_PAYLOAD`
   */
  call(endpoint: string, args?: CallArgs, options?: CallOptions): Promise<unknown>;
  call<T>(endpoint: string, args: CallArgs | undefined, options: CallOptions & Validated<T>): Promise<T>;
  async call<T>(
    endpoint: string,
    args: CallArgs = {},
    options: CallOptions & Partial<Validated<T>> = {},
  ): Promise<unknown> {
    this.assertOpen();
    const target = this.capabilities.resolve(endpoint, 'call');
    const id = this.nextMessageId++;
    const exchange = this.exchanges.open(id, endpoint);
    const timeoutMs = options.timeoutMs ?? this.callTimeoutMs;

    try {
      await this.send({ endpoint_id: target.id, payload: args, message_id: id }, endpoint);
      const response = await exchange.queue.take(
        timeoutMs,
        () =>
          new DeviceApiError(`Call '${endpoint}' timed out after ${timeoutMs}ms`, 'TIMEOUT', {
            endpoint,
          }),
      );
      const payload = decodePayload(endpoint, unwrapResponse(endpoint, response), options.as ?? 'json');
      return options.schema ? validatePayload(endpoint, payload, options.schema) : payload;
    } finally {
      this.exchanges.delete(id);
    }
  }

  /**
   * Invoke an event endpoint. Exactly one request is sent; the returned
   * stream pulls the responses.
   *
   * @throws {DeviceApiError} `SESSION_CLOSED`, `INVALID_ENDPOINT` (nothing is
   *   sent) or `CONNECTION_CLOSED` when the request cannot be sent
   */
  event(endpoint: string, args?: CallArgs, options?: EventOptions): Promise<EventStream<unknown>>;
  event<T>(
    endpoint: string,
    args: CallArgs | undefined,
    options: EventOptions & Validated<T>,
  ): Promise<EventStream<T>>;
  async event<T>(
    endpoint: string,
    args: CallArgs = {},
    options: EventOptions & Partial<Validated<T>> = {},
  ): Promise<EventStream<unknown>> {
    this.assertOpen();
    const target = this.capabilities.resolve(endpoint, 'event');
    const id = this.nextMessageId++;
    const exchange = this.exchanges.open(id, endpoint);
    const mode = options.as ?? 'json';
    const schema = options.schema;

    const stream = new EventStream<unknown>(exchange, {
      release: (exchangeId) => {
        this.exchanges.delete(exchangeId);
      },
      decode: (payload) => {
        const value = decodePayload(endpoint, payload, mode);
        return schema ? validatePayload(endpoint, value, schema) : value;
      },
    });

    try {
      await this.send({ endpoint_id: target.id, payload: args, message_id: id }, endpoint);
    } catch (err) {
      this.exchanges.delete(id);
      throw err;
    }
    return stream;
  }

  /**
   * Register a listener for an unexpected disconnect.
   *
   * @returns Function that removes the listener
   */
  onDisconnect(handler: DisconnectHandler): Unsubscribe {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  /**
   * Close the session and its transport.
   *
   * Waits for the router to exit, then fails whatever is still pending so
   * no caller or stream is left waiting. Concurrent and repeated calls
   * share the same close.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.running = false;
    try {
      await this.transport.close();
    } catch (err) {
      this.logger.warn('Device API: error while closing transport', err);
    }
    await this.router.done;

    const failed = this.exchanges.failAll(
      new DeviceApiError('Device API session closed', 'CONNECTION_CLOSED'),
    );
    if (failed > 0) {
      this.logger.debug(`Device API: session closed with ${failed} pending exchange(s)`);
    }
  }

  private async discover(): Promise<void> {
    const info = await this.call(BOOTSTRAP_ENDPOINT, {}, { schema: CallInfoSchema });
    this.capabilities.populate(info);
    this.agentVersion = info.version_string;
  }

  private assertOpen(): void {
    if (this.running) return;
    const failure = this.recordedFailure;
    throw new DeviceApiError(
      failure ? `Device API session is closed: ${failure.message}` : 'Device API session is closed',
      'SESSION_CLOSED',
      failure ? { cause: failure } : {},
    );
  }

  /** Write one request; writes are serialized across concurrent callers. */
  private send(request: DeviceApiRequest, endpoint: string): Promise<void> {
    const write = this.sendLock.then(() => this.transport.send(request));
    // The lock only orders writes; failures reach the caller through `write`.
    this.sendLock = write.catch(() => undefined);
    return write.catch((err: unknown) => {
      throw new DeviceApiError(`Could not send request for '${endpoint}'`, 'CONNECTION_CLOSED', {
        endpoint,
        cause: err,
      });
    });
  }

  private handleDisconnect(error: DeviceApiError): void {
    this.running = false;
    this.recordedFailure = error;
    const failed = this.exchanges.failAll(error);
    this.logger.error(`Device API: ${error.message} (${failed} pending exchange(s) failed)`, error.cause);

    for (const handler of this.disconnectHandlers) {
      try {
        handler(error);
      } catch (err) {
        this.logger.warn('Device API: disconnect listener threw', err);
      }
    }
  }
}

/**
 * Open a session, run `fn` with it, and always close it afterwards.
 *
 * @example
 * ```ts
 * const calls = await withSession(transport, async (api) => api.getCalls());
 * ```
 */
export async function withSession<R>(
  transport: DuplexTransport,
  fn: (session: DeviceApiSession) => Promise<R>,
  options: DeviceApiSessionOptions = {},
): Promise<R> {
  const session = await DeviceApiSession.open(transport, options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
