/**
 * Hands one exchange to the session of a borrowed connection.
 */
import type { ClientRequestContext } from "../client-request-context.js";
import { ClosedSessionError, toError } from "../errors.js";
import type { HttpRequest } from "../http/request.js";
import type { DecodedHttpResponse } from "../http/response.js";
import type { SessionProtocol } from "../session-protocol.js";
import type { PooledConnection } from "./session.js";

/**
 * - accepted: the session drives the exchange; pick a release trigger.
 * - declined: the session did not take it; the caller releases now.
 * - destroyed: the connection was closed; it must not be released.
 */
export type InvokeOutcome =
  | { kind: "accepted"; protocol: SessionProtocol }
  | { kind: "declined" }
  | { kind: "destroyed" };

export function invokeSession(
  connection: PooledConnection,
  ctx: ClientRequestContext,
  req: HttpRequest,
  res: DecodedHttpResponse,
): InvokeOutcome {
  const session = connection.session;
  res.init(session.inboundTrafficController);

  const state = session.state;
  if (state.kind !== "ready") {
    // Never negotiated, or torn down: not reusable, so destroy rather than release
    res.close(new ClosedSessionError());
    try {
      connection.close();
    } catch (err) {
      console.warn(`[invoke] failed to close connection ${connection.id}`, err);
    }
    return { kind: "destroyed" };
  }

  let accepted: boolean;
  try {
    accepted = session.invoke(ctx, req, res);
  } catch (err) {
    res.close(toError(err));
    return { kind: "declined" };
  }
  return accepted ? { kind: "accepted", protocol: state.protocol } : { kind: "declined" };
}
