/**
 * Connection acquisition.
 * A pool answers synchronously when it has a connection at hand (or knows
 * it cannot get one), and with a promise otherwise. Both shapes funnel into
 * one typed continuation so callers have a single code path.
 */
import { toError } from "./errors.js";
import { poolKeyToString, type PoolKey } from "./pool-key.js";

export type Acquisition<C> =
  | { status: "ready"; connection: C }
  | { status: "failed"; cause: Error }
  | { status: "pending"; promise: Promise<C> };

export type AcquireOutcome<C> = { ok: true; connection: C } | { ok: false; cause: Error };

export type AcquireContinuation<C> = (outcome: AcquireOutcome<C>) => void;

export interface ConnectionSource<C> {
  acquire(key: PoolKey): Acquisition<C>;
}

/**
 * Ask `pool` for a connection and run `continuation` with the outcome.
 * Ready and failed acquisitions continue in the caller's stack; pending ones
 * from the promise callback. A synchronous throw from the pool counts as a
 * failed acquisition. The continuation must not throw.
 */
export function acquireConnection<C>(
  pool: ConnectionSource<C>,
  key: PoolKey,
  continuation: AcquireContinuation<C>,
): void {
  let acquisition: Acquisition<C>;
  try {
    acquisition = pool.acquire(key);
  } catch (err) {
    continuation({ ok: false, cause: toError(err) });
    return;
  }

  switch (acquisition.status) {
    case "ready":
      continuation({ ok: true, connection: acquisition.connection });
      return;
    case "failed":
      continuation({ ok: false, cause: acquisition.cause });
      return;
    case "pending":
      acquisition.promise
        .then(
          connection => continuation({ ok: true, connection }),
          (err: unknown) => continuation({ ok: false, cause: toError(err) }),
        )
        .catch((err: unknown) => {
          console.warn(`[acquire] ${poolKeyToString(key)} continuation threw`, err);
        });
      return;
  }
}
