/**
 * Service Discovery Contract
 *
 * The capability a resolver offers to its caller: turn a service name into the
 * set of endpoints currently serving it.
 */

export interface Lookup {
  serviceName: string;
  /** Overrides the resolver's configured port name. */
  portName?: string;
  protocol?: string;
}

export interface ResolvedAddress {
  address: string;
  family: 4 | 6;
}

export interface ResolvedTarget {
  host: string;
  port?: number;
  address?: ResolvedAddress;
}

export interface Resolved {
  serviceName: string;
  addresses: ResolvedTarget[];
}

export interface ServiceDiscovery {
  lookup(query: Lookup | string, resolveTimeoutMs: number): Promise<Resolved>;
}

export function toLookup(query: Lookup | string): Lookup {
  return typeof query === 'string' ? { serviceName: query } : query;
}
