/**
 * HTTP client facade.
 * Binds a connection pool, client options and an endpoint resolver to a
 * dispatcher. Requests return their response placeholder immediately.
 */
import type { ClientRequestContext } from "./client-request-context.js";
import { resolveClientOptions, type ClientOptions } from "./client-options.js";
import type { KeyedConnectionPool } from "./connection-pool.js";
import { HttpClientDelegate } from "./dispatcher.js";
import type { EndpointResolver } from "./endpoint.js";
import { toError } from "./errors.js";
import { HttpRequest, type HttpRequestInit } from "./http/request.js";
import { DecodedHttpResponse } from "./http/response.js";
import type { SessionProtocol } from "./session-protocol.js";
import type { PooledConnection } from "./session/session.js";
import { parseUrl } from "./utils/url.js";

export interface HttpClientConfig<C extends PooledConnection = PooledConnection> {
  pool: KeyedConnectionPool<C>;
  options?: ClientOptions;
  resolver?: EndpointResolver;
}

export interface RequestOptions extends Omit<HttpRequestInit, "path"> {
  /**
   * Session protocol to dispatch on. Defaults to the URL scheme ("https" or
   * "http"), which lets the negotiation layer pick h2 or HTTP/1.
   */
  protocol?: SessionProtocol;
  /** AbortSignal to abandon the response */
  signal?: AbortSignal;
}

export class HttpClient<C extends PooledConnection = PooledConnection> {
  private readonly delegate: HttpClientDelegate<C>;

  /** Throws a ZodError when `config.options` is invalid. */
  constructor(config: HttpClientConfig<C>) {
    this.delegate = new HttpClientDelegate(
      config.pool,
      resolveClientOptions(config.options),
      config.resolver,
    );
  }

  /** Dispatch a prepared request. Never throws; failures close the response. */
  execute(ctx: ClientRequestContext, req: HttpRequest): DecodedHttpResponse {
    return this.delegate.execute(ctx, req);
  }

  /**
   * Send a request to `url`.
   * @example
   * ```ts
   * const res = client.request("https://api.example.com/v1/items?page=2", {
   *   headers: { accept: "application/json" },
   * });
   * const { status } = await res.head;
   * ```
   */
  request(url: string, options: RequestOptions = {}): DecodedHttpResponse {
    let ctx: ClientRequestContext;
    let req: HttpRequest;
    try {
      const parsed = parseUrl(url);
      ctx = {
        endpoint: parsed.endpoint,
        sessionProtocol: options.protocol ?? parsed.protocol,
        signal: options.signal,
      };
      req = HttpRequest.of({
        method: options.method,
        path: parsed.path,
        headers: options.headers,
        body: options.body,
      });
    } catch (err) {
      const res = new DecodedHttpResponse();
      res.close(toError(err));
      return res;
    }
    return this.execute(ctx, req);
  }
}
