/**
 * Request destinations.
 */

export interface Endpoint {
  /** Host name or IP literal (IPv6 without brackets) */
  host: string;
  /** Port; unset means "the session protocol's default" */
  port?: number;
  /** Address the resolver picked for `host`, if any. Never used for pooling. */
  ipAddress?: string;
}

export interface ResolvedEndpoint extends Endpoint {
  port: number;
}

/**
 * Turns a logical endpoint into a concrete one (e.g. picks a member of a
 * group, or attaches a resolved address). Lookup policy lives outside the
 * dispatcher.
 */
export interface EndpointResolver {
  resolve(endpoint: Endpoint): Endpoint;
}

export const identityResolver: EndpointResolver = {
  resolve: endpoint => endpoint,
};

export function withDefaultPort(endpoint: Endpoint, port: number): ResolvedEndpoint {
  if (endpoint.port !== undefined) {
    validatePort(endpoint.port);
    return { ...endpoint, port: endpoint.port };
  }
  validatePort(port);
  return { ...endpoint, port };
}

/** Format host and port, bracketing IPv6 literals. */
export function formatHostPort(host: string, port?: number): string {
  const h = host.includes(":") ? `[${host}]` : host;
  return port === undefined ? h : `${h}:${port}`;
}

function validatePort(port: number): void {
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${port}`);
  }
}
