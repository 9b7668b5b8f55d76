/**
 * Error types surfaced through a response.
 */

/**
 * The connection's session was never negotiated or has been torn down.
 * The connection is destroyed rather than returned to the pool.
 */
export class ClosedSessionError extends Error {
  readonly code = "ERR_CLOSED_SESSION";

  constructor(message: string = "session closed") {
    super(message);
    this.name = "ClosedSessionError";
  }
}

/** Wrap non-Error rejection values so every failure carries a stack. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : `Non-error thrown: ${String(value)}`);
}

export function abortError(reason?: unknown): Error {
  if (reason instanceof Error) return reason;
  return new DOMException("Aborted", "AbortError");
}
