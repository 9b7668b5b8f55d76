/**
 * Session contract.
 * A session is the protocol-aware side of one pooled connection, created
 * by the negotiation layer once per connection. The dispatcher only reads
 * its state and hands it exchanges.
 */
import type { SessionProtocol } from "../session-protocol.js";
import type { HttpRequest } from "../http/request.js";
import type { DecodedHttpResponse } from "../http/response.js";
import type { InboundTrafficController } from "../http/traffic-controller.js";
import type { ClientRequestContext } from "../client-request-context.js";

export type SessionState =
  | { kind: "negotiating" }
  | { kind: "ready"; protocol: SessionProtocol }
  | { kind: "closed" };

export interface HttpSession {
  /** Read once per dispatch, right before invocation. */
  readonly state: SessionState;
  readonly inboundTrafficController: InboundTrafficController;
  /**
   * Start the exchange. Returns true when the session took ownership of it
   * (it will write the request, fill `res` and close both). Returns false
   * when it refused, e.g. because the connection went away meanwhile; the
   * caller then still holds the connection.
   */
  invoke(ctx: ClientRequestContext, req: HttpRequest, res: DecodedHttpResponse): boolean;
}

/** A borrowed pool connection together with its session. */
export interface PooledConnection {
  readonly id: string;
  readonly session: HttpSession;
  /** Tear the connection down. A closed connection must not go back to the pool. */
  close(): void;
  /** Register a callback run once the connection closes, whichever side closed it */
  onClose(callback: () => void): void;
}

export function negotiatedProtocol(session: HttpSession): SessionProtocol | null {
  const state = session.state;
  return state.kind === "ready" ? state.protocol : null;
}
