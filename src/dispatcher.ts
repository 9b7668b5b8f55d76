/**
 * Dispatches one request over a pooled connection.
 *
 * normalizing → awaiting connection → invoking → released | failed
 *
 * The response is created and returned before a connection is requested,
 * and every failure after that point reaches the caller through it:
 * `execute` itself never throws.
 */
import type { ClientRequestContext } from "./client-request-context.js";
import type { ResolvedClientOptions } from "./client-options.js";
import { acquireConnection } from "./connection-acquirer.js";
import type { KeyedConnectionPool } from "./connection-pool.js";
import { identityResolver, withDefaultPort, type EndpointResolver } from "./endpoint.js";
import { toError } from "./errors.js";
import type { HttpRequest } from "./http/request.js";
import { DecodedHttpResponse } from "./http/response.js";
import { createPoolKey, poolKeyToString, type PoolKey } from "./pool-key.js";
import { normalizeRequest } from "./request-normalizer.js";
import { defaultPort } from "./session-protocol.js";
import { invokeSession, type InvokeOutcome } from "./session/invoker.js";
import {
  ConnectionLease,
  scheduleRelease,
  selectReleaseTrigger,
} from "./session/release-policy.js";
import type { PooledConnection } from "./session/session.js";

export class HttpClientDelegate<C extends PooledConnection = PooledConnection> {
  private readonly pool: KeyedConnectionPool<C>;
  private readonly options: ResolvedClientOptions;
  private readonly resolver: EndpointResolver;

  constructor(
    pool: KeyedConnectionPool<C>,
    options: ResolvedClientOptions,
    resolver: EndpointResolver = identityResolver,
  ) {
    this.pool = pool;
    this.options = options;
    this.resolver = resolver;
  }

  execute(ctx: ClientRequestContext, req: HttpRequest): DecodedHttpResponse {
    const res = new DecodedHttpResponse();
    bindAbortSignal(ctx.signal, res);

    let normalized: HttpRequest;
    let poolKey: PoolKey;
    try {
      const protocol = ctx.sessionProtocol;
      const endpoint = withDefaultPort(this.resolver.resolve(ctx.endpoint), defaultPort(protocol));
      normalized = normalizeRequest(req, endpoint, protocol, this.options);
      poolKey = createPoolKey(endpoint, protocol);
    } catch (err) {
      res.close(toError(err));
      return res;
    }

    // Aborted before we even started
    if (!res.isOpen) return res;

    acquireConnection(this.pool, poolKey, outcome => {
      if (!outcome.ok) {
        res.close(outcome.cause);
        return;
      }
      this.invoke(outcome.connection, ctx, normalized, res, poolKey);
    });

    return res;
  }

  private invoke(
    connection: C,
    ctx: ClientRequestContext,
    req: HttpRequest,
    res: DecodedHttpResponse,
    poolKey: PoolKey,
  ): void {
    const lease = new ConnectionLease(this.pool, poolKey, connection);

    if (res.isAbandoned) {
      console.debug(
        `[dispatch] ${poolKeyToString(poolKey)} response abandoned before invocation, returning ${connection.id} unused`,
      );
      lease.release();
      return;
    }

    let outcome: InvokeOutcome;
    try {
      outcome = invokeSession(connection, ctx, req, res);
    } catch (err) {
      res.close(toError(err));
      lease.release();
      return;
    }

    switch (outcome.kind) {
      case "accepted":
        scheduleRelease(
          selectReleaseTrigger(outcome.protocol, this.options.useHttp1Pipelining),
          lease,
          req,
          res,
        );
        return;
      case "declined":
        lease.release();
        return;
      case "destroyed":
        return;
    }
  }
}

function bindAbortSignal(signal: AbortSignal | undefined, res: DecodedHttpResponse): void {
  if (!signal) return;
  if (signal.aborted) {
    res.abort(signal.reason);
    return;
  }
  const onAbort = () => res.abort(signal.reason);
  signal.addEventListener("abort", onAbort, { once: true });
  const cleanup = () => signal.removeEventListener("abort", onAbort);
  res.whenComplete().then(cleanup, cleanup);
}
