/**
 * Registry of requests awaiting responses, keyed by correlation id.
 *
 * The session opens an exchange before sending and deletes it once the
 * consumer is done; the router only looks exchanges up to push responses.
 * Map operations never span an `await`, so they are atomic with respect to
 * the router running on the same event loop.
 *
 * @module device-api/pending-exchanges
 */
import type { DeviceApiResponse } from '@fieldlink/shared/device-api-schemas';
import { AsyncQueue } from './async-queue.js';

export interface PendingExchange {
  readonly id: number;
  readonly endpoint: string;
  readonly queue: AsyncQueue<DeviceApiResponse>;
}

export class PendingExchanges {
  private readonly exchanges = new Map<number, PendingExchange>();

  get size(): number {
    return this.exchanges.size;
  }

  /**
   * Register a new exchange.
   *
   * @throws {Error} When an exchange with this id is still pending
   */
  open(id: number, endpoint: string): PendingExchange {
    if (this.exchanges.has(id)) {
      throw new Error(`Exchange ${id} is already pending`);
    }
    const exchange: PendingExchange = { id, endpoint, queue: new AsyncQueue<DeviceApiResponse>() };
    this.exchanges.set(id, exchange);
    return exchange;
  }

  get(id: number): PendingExchange | undefined {
    return this.exchanges.get(id);
  }

  has(id: number): boolean {
    return this.exchanges.has(id);
  }

  /** Remove an exchange. Safe to call more than once. */
  delete(id: number): boolean {
    return this.exchanges.delete(id);
  }

  /**
   * Inject a failure into every pending exchange and forget them all.
   *
   * @returns Number of exchanges that were failed
   */
  failAll(error: Error): number {
    const count = this.exchanges.size;
    for (const exchange of this.exchanges.values()) {
      exchange.queue.fail(error);
    }
    this.exchanges.clear();
    return count;
  }
}
