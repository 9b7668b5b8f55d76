/**
 * Session protocols a connection can be negotiated for.
 *
 * "https" and "http" ask the negotiation layer to pick the best protocol
 * (h2 over ALPN, or an upgrade attempt on cleartext); the other four are
 * concrete. A session that finished negotiating always reports a concrete one.
 */

export type SessionProtocol = "https" | "http" | "h1" | "h1c" | "h2" | "h2c";

interface ProtocolTraits {
  tls: boolean;
  multiplex: boolean;
  defaultPort: number;
}

const TRAITS: Record<SessionProtocol, ProtocolTraits> = {
  https: { tls: true, multiplex: false, defaultPort: 443 },
  http: { tls: false, multiplex: false, defaultPort: 80 },
  h1: { tls: true, multiplex: false, defaultPort: 443 },
  h1c: { tls: false, multiplex: false, defaultPort: 80 },
  h2: { tls: true, multiplex: true, defaultPort: 443 },
  h2c: { tls: false, multiplex: true, defaultPort: 80 },
};

export const SESSION_PROTOCOLS: readonly SessionProtocol[] = Object.keys(TRAITS).filter(
  isSessionProtocol,
);

export function isSessionProtocol(value: string): value is SessionProtocol {
  return Object.prototype.hasOwnProperty.call(TRAITS, value);
}

/** Whether the protocol runs over TLS. Decides the `:scheme` of a request. */
export function isTls(protocol: SessionProtocol): boolean {
  return TRAITS[protocol].tls;
}

/** Whether one connection can carry concurrent exchanges (HTTP/2 streams). */
export function isMultiplex(protocol: SessionProtocol): boolean {
  return TRAITS[protocol].multiplex;
}

export function defaultPort(protocol: SessionProtocol): number {
  return TRAITS[protocol].defaultPort;
}

export function schemeOf(protocol: SessionProtocol): "https" | "http" {
  return isTls(protocol) ? "https" : "http";
}
