/**
 * Per-request dispatch parameters.
 */
import type { Endpoint } from "./endpoint.js";
import type { SessionProtocol } from "./session-protocol.js";

export interface ClientRequestContext {
  /** Logical destination; resolved and port-defaulted by the dispatcher */
  readonly endpoint: Endpoint;
  readonly sessionProtocol: SessionProtocol;
  /** Aborting abandons the response (see DecodedHttpResponse.abort) */
  readonly signal?: AbortSignal;
}
