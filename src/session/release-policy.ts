/**
 * When to give a connection back to the pool.
 *
 * HTTP/2 connections go back as soon as the session accepted the exchange,
 * so concurrent requests can share them. HTTP/1 connections go back once
 * the request is fully written (pipelining) or once the response is done.
 */
import type { HttpRequest } from "../http/request.js";
import type { DecodedHttpResponse } from "../http/response.js";
import type { KeyedConnectionPool } from "../connection-pool.js";
import { poolKeyToString, type PoolKey } from "../pool-key.js";
import { isMultiplex, type SessionProtocol } from "../session-protocol.js";
import type { PooledConnection } from "./session.js";

export type ReleaseTrigger = "immediate" | "after-request-sent" | "after-response-complete";

export function selectReleaseTrigger(
  protocol: SessionProtocol,
  useHttp1Pipelining: boolean,
): ReleaseTrigger {
  if (isMultiplex(protocol)) return "immediate";
  return useHttp1Pipelining ? "after-request-sent" : "after-response-complete";
}

/**
 * One borrow of one connection. Releases at most once, whatever calls it.
 * The pool handle travels with the lease instead of being looked up from
 * the connection.
 */
export class ConnectionLease<C extends PooledConnection = PooledConnection> {
  readonly key: PoolKey;
  readonly connection: C;
  private readonly pool: KeyedConnectionPool<C>;
  private _released = false;

  constructor(pool: KeyedConnectionPool<C>, key: PoolKey, connection: C) {
    this.pool = pool;
    this.key = key;
    this.connection = connection;
  }

  get released(): boolean {
    return this._released;
  }

  /**
   * Return the connection to the pool. Pool errors are logged, never thrown:
   * the exchange's outcome does not depend on pool bookkeeping.
   */
  release(): boolean {
    if (this._released) return false;
    this._released = true;
    try {
      this.pool.release(this.key, this.connection);
    } catch (err) {
      console.warn(
        `[release] failed to return connection ${this.connection.id} to the pool (${poolKeyToString(this.key)})`,
        err,
      );
    }
    return true;
  }
}

/** Arrange for `lease` to be released when `trigger` fires. */
export function scheduleRelease<C extends PooledConnection>(
  trigger: ReleaseTrigger,
  lease: ConnectionLease<C>,
  req: HttpRequest,
  res: DecodedHttpResponse,
): void {
  const release = () => {
    lease.release();
  };

  switch (trigger) {
    case "immediate":
      release();
      return;
    case "after-request-sent":
      req.whenComplete().then(release, release);
      return;
    case "after-response-complete":
      res.whenComplete().then(release, release);
      return;
  }
}
