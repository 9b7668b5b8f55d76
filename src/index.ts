/**
 * pooled-http-dispatch: sends HTTP requests over pooled, optionally
 * multiplexed connections.
 */

// Main API
export { HttpClient } from "./client.js";
export type { HttpClientConfig, RequestOptions } from "./client.js";
export { ClientOptionsSchema, resolveClientOptions } from "./client-options.js";
export type { ClientOptions, ResolvedClientOptions } from "./client-options.js";
export type { ClientRequestContext } from "./client-request-context.js";

// Request / response
export { HttpRequest } from "./http/request.js";
export type { HttpRequestInit, RequestBody } from "./http/request.js";
export { DecodedHttpResponse } from "./http/response.js";
export type { ResponseHead } from "./http/response.js";
export { InboundTrafficController } from "./http/traffic-controller.js";
export { HttpHeaders } from "./utils/headers.js";
export type { HeaderInput } from "./utils/headers.js";

// Dispatch pipeline (advanced usage)
export { HttpClientDelegate } from "./dispatcher.js";
export { normalizeRequest, autoFillHeaders } from "./request-normalizer.js";
export { sanitizePath } from "./utils/path.js";
export { acquireConnection } from "./connection-acquirer.js";
export type {
  Acquisition,
  AcquireOutcome,
  AcquireContinuation,
  ConnectionSource,
} from "./connection-acquirer.js";
export { invokeSession } from "./session/invoker.js";
export type { InvokeOutcome } from "./session/invoker.js";
export {
  ConnectionLease,
  scheduleRelease,
  selectReleaseTrigger,
} from "./session/release-policy.js";
export type { ReleaseTrigger } from "./session/release-policy.js";
export { negotiatedProtocol } from "./session/session.js";
export type { HttpSession, PooledConnection, SessionState } from "./session/session.js";

// Connection pool
export { ConnectionPool, ConnectionPoolOptionsSchema } from "./connection-pool.js";
export type {
  ConnectionFactory,
  ConnectionPoolOptions,
  KeyedConnectionPool,
} from "./connection-pool.js";
export { createPoolKey, poolKeysEqual, poolKeyToString } from "./pool-key.js";
export type { PoolKey } from "./pool-key.js";

// Destinations and protocols
export { identityResolver, withDefaultPort } from "./endpoint.js";
export type { Endpoint, EndpointResolver, ResolvedEndpoint } from "./endpoint.js";
export {
  SESSION_PROTOCOLS,
  defaultPort,
  isMultiplex,
  isSessionProtocol,
  isTls,
} from "./session-protocol.js";
export type { SessionProtocol } from "./session-protocol.js";
export { parseUrl } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";

// Errors
export { ClosedSessionError } from "./errors.js";
export { USER_AGENT, VERSION } from "./version.js";
