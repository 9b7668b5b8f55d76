/**
 * Request normalization.
 * Fills the protocol metadata a request needs before any byte is sent and
 * canonicalizes its path. Normalizing an already normalized request returns
 * the very same instance.
 */
import { formatHostPort, type ResolvedEndpoint } from "./endpoint.js";
import type { HttpRequest } from "./http/request.js";
import { defaultPort, schemeOf, type SessionProtocol } from "./session-protocol.js";
import type { HttpHeaders } from "./utils/headers.js";
import { sanitizePath, validatePath } from "./utils/path.js";
import { USER_AGENT } from "./version.js";

export interface NormalizeOptions {
  /** Client-wide headers; request headers of the same name win */
  defaultHeaders: HttpHeaders;
}

export function normalizeRequest(
  req: HttpRequest,
  endpoint: ResolvedEndpoint,
  protocol: SessionProtocol,
  options: NormalizeOptions,
): HttpRequest {
  const headers = autoFillHeaders(req.headers, endpoint, protocol, options.defaultHeaders);
  const path = sanitizePath(req.path);
  validatePath(path);
  return req.withHeaders(headers).withPath(path);
}

/**
 * Set ":authority", ":scheme", client defaults and "user-agent" where the
 * request has none. The authority omits the port when it is the protocol's
 * default one.
 */
export function autoFillHeaders(
  headers: HttpHeaders,
  endpoint: ResolvedEndpoint,
  protocol: SessionProtocol,
  defaults: HttpHeaders,
): HttpHeaders {
  let result = headers;

  if (result.authority === undefined) {
    const port = endpoint.port === defaultPort(protocol) ? undefined : endpoint.port;
    result = result.set(":authority", formatHostPort(endpoint.host, port));
  }

  if (result.scheme === undefined) {
    result = result.set(":scheme", schemeOf(protocol));
  }

  // Add the client's default headers, if not overridden by the request
  result = result.withDefaults(defaults);

  return result.setIfAbsent("user-agent", USER_AGENT);
}
