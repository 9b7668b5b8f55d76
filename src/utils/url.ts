/**
 * URL parsing utility.
 */
import type { Endpoint } from "../endpoint.js";
import type { SessionProtocol } from "../session-protocol.js";

export interface ParsedUrl {
  protocol: Extract<SessionProtocol, "https" | "http">;
  endpoint: Endpoint;
  path: string; // includes query string, e.g. "/v1/items?page=2"
}

/**
 * Parse a URL string into its components.
 * The port stays unset when the URL has none; the dispatcher fills in the
 * protocol's default.
 */
export function parseUrl(url: string): ParsedUrl {
  const parsed = new URL(url);

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new Error(`Unsupported URL scheme: ${parsed.protocol}`);
  }
  const protocol = parsed.protocol === "https:" ? "https" : "http";
  // WHATWG URL keeps IPv6 literals bracketed in hostname
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  const endpoint: Endpoint = parsed.port ? { host, port: parseInt(parsed.port, 10) } : { host };
  const path = parsed.pathname + parsed.search;

  return { protocol, endpoint, path: path || "/" };
}
