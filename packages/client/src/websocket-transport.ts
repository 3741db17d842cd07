/**
 * DuplexTransport over a WebSocket carrying one JSON document per frame.
 *
 * @module client/websocket-transport
 */
import WebSocket from 'ws';
import { AsyncQueue, TransportClosedError } from '@fieldlink/device-api';
import type { DuplexTransport, Logger } from '@fieldlink/device-api';
import type { DeviceApiRequest } from '@fieldlink/shared/device-api-schemas';

export interface WebSocketTransportOptions {
  /** Sent as `Authorization: Bearer <token>` on the upgrade request. */
  token?: string | null;
  logger?: Logger;
  /** Upgrade handshake timeout (ms). Default: 10000 */
  handshakeTimeoutMs?: number;
}

function frameText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * WebSocket-backed transport. Inbound frames are decoded into an inbox as
 * they arrive; `receive()` drains it and rejects with
 * {@link TransportClosedError} once the socket has closed.
 */
export class WebSocketTransport<TSend = DeviceApiRequest> implements DuplexTransport<TSend> {
  private readonly inbox = new AsyncQueue<unknown>();
  private closing: Promise<void> | null = null;

  private constructor(
    private readonly socket: WebSocket,
    private readonly logger: Logger,
  ) {
    socket.on('message', (data) => this.onMessage(data));
    socket.on('close', (code, reason) => {
      const detail = reason.length > 0 ? `${code}: ${reason.toString('utf8')}` : String(code);
      this.inbox.fail(new TransportClosedError(`WebSocket closed (${detail})`));
    });
    socket.on('error', (err) => {
      this.logger.warn('WebSocket error:', err.message);
    });
  }

  /**
   * Open a socket and resolve once the upgrade has completed.
   *
   * @throws {Error} The handshake error when the upgrade fails
   */
  static connect<TSend = DeviceApiRequest>(
    url: string,
    options: WebSocketTransportOptions = {},
  ): Promise<WebSocketTransport<TSend>> {
    const logger = options.logger ?? console;
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, {
        headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
        handshakeTimeout: options.handshakeTimeoutMs ?? 10_000,
      });
      socket.once('open', () => {
        socket.off('error', reject);
        resolve(new WebSocketTransport<TSend>(socket, logger));
      });
      socket.once('error', reject);
    });
  }

  async send(message: TSend): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new TransportClosedError('WebSocket is not open');
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.send(JSON.stringify(message), (err) => (err ? reject(err) : resolve()));
    });
  }

  receive(): Promise<unknown> {
    return this.inbox.take();
  }

  /** Close the socket. Pending and later `receive()` calls reject. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise<void>((resolve) => {
        this.inbox.fail(new TransportClosedError('WebSocket closed by client'));
        if (this.socket.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        this.socket.once('close', () => resolve());
        this.socket.close();
      });
    }
    return this.closing;
  }

  private onMessage(data: WebSocket.RawData): void {
    const text = frameText(data);
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (err) {
      this.logger.warn('WebSocket: discarding frame that is not JSON:', err instanceof Error ? err.message : err);
      return;
    }
    this.inbox.push(message);
  }
}
