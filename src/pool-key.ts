/**
 * Connection pool keys.
 * Connections are pooled by logical destination (host name + port +
 * protocol), never by resolved address, so reuse does not depend on DNS
 * answers staying the same between calls.
 */
import { formatHostPort, type ResolvedEndpoint } from "./endpoint.js";
import type { SessionProtocol } from "./session-protocol.js";

export interface PoolKey {
  readonly host: string;
  readonly port: number;
  readonly protocol: SessionProtocol;
}

export function createPoolKey(endpoint: ResolvedEndpoint, protocol: SessionProtocol): PoolKey {
  return Object.freeze({ host: endpoint.host.toLowerCase(), port: endpoint.port, protocol });
}

export function poolKeysEqual(a: PoolKey, b: PoolKey): boolean {
  return a.host === b.host && a.port === b.port && a.protocol === b.protocol;
}

/** Stable string form, usable as a Map key: "h2://example.com:443" */
export function poolKeyToString(key: PoolKey): string {
  return `${key.protocol}://${formatHostPort(key.host, key.port)}`;
}
