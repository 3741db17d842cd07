/**
 * Name → endpoint table discovered from the device agent.
 *
 * @module device-api/capability-table
 */
import { BOOTSTRAP_ENDPOINT, BOOTSTRAP_ENDPOINT_ID } from '@fieldlink/shared/constants';
import type { CallInfo } from '@fieldlink/shared/device-api-schemas';
import { DeviceApiError } from './errors.js';
import type { Endpoint, EndpointKind } from './types.js';

/**
 * Endpoint table for one session.
 *
 * Starts with only the bootstrap endpoint. {@link populate} fills it once
 * from the agent's call info; after that the table never changes.
 */
export class CapabilityTable {
  private readonly endpoints = new Map<string, Endpoint>([
    [
      BOOTSTRAP_ENDPOINT,
      Object.freeze({ name: BOOTSTRAP_ENDPOINT, id: BOOTSTRAP_ENDPOINT_ID, kind: 'call' as const }),
    ],
  ]);
  private populated = false;

  /** Whether discovery has completed. */
  get isPopulated(): boolean {
    return this.populated;
  }

  /**
   * Fill the table from validated call info. Endpoint ids are list indices.
   *
   * @throws {Error} When called more than once
   */
  populate(info: CallInfo): void {
    if (this.populated) {
      throw new Error('CapabilityTable has already been populated');
    }
    info.endpoints.forEach((name, id) => {
      this.endpoints.set(name, Object.freeze({ name, id, kind: info.endpoint_types[id] }));
    });
    this.populated = true;
  }

  get(name: string): Endpoint | undefined {
    return this.endpoints.get(name);
  }

  /**
   * Look up an endpoint and check its kind.
   *
   * @throws {DeviceApiError} `INVALID_ENDPOINT` for unknown names or a kind mismatch
   */
  resolve(name: string, kind: EndpointKind): Endpoint {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) {
      throw new DeviceApiError(`Invalid endpoint: '${name}' is not exposed by the device`, 'INVALID_ENDPOINT', {
        endpoint: name,
      });
    }
    if (endpoint.kind !== kind) {
      throw new DeviceApiError(
        `Invalid endpoint type: '${name}' is registered as ${endpoint.kind}, not ${kind}`,
        'INVALID_ENDPOINT',
        { endpoint: name },
      );
    }
    return endpoint;
  }

  /** All endpoints, optionally filtered by kind, in id order. */
  list(kind?: EndpointKind): Endpoint[] {
    return [...this.endpoints.values()]
      .filter((endpoint) => kind === undefined || endpoint.kind === kind)
      .sort((a, b) => a.id - b.id);
  }

  names(kind?: EndpointKind): string[] {
    return this.list(kind).map((endpoint) => endpoint.name);
  }
}
