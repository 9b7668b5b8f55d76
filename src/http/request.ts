/**
 * Outbound request view.
 * A request is immutable: normalization produces new views through
 * `withPath` / `withHeaders`. All views derived from one request share its
 * completion signal, so the session can close whichever view it was given.
 */
import { HttpHeaders, validateMethod, type HeaderInput } from "../utils/headers.js";
import { Deferred } from "../utils/deferred.js";

export type RequestBody = Uint8Array | ReadableStream<Uint8Array>;

export interface HttpRequestInit {
  method?: string;
  path?: string;
  headers?: HeaderInput | HttpHeaders;
  body?: RequestBody | string | null;
}

export class HttpRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: HttpHeaders;
  readonly body: RequestBody | null;
  private readonly sent: Deferred<void>;

  private constructor(
    method: string,
    path: string,
    headers: HttpHeaders,
    body: RequestBody | null,
    sent: Deferred<void>,
  ) {
    this.method = method;
    this.path = path;
    this.headers = headers;
    this.body = body;
    this.sent = sent;
  }

  static of(init: HttpRequestInit = {}): HttpRequest {
    const method = (init.method ?? "GET").toUpperCase();
    validateMethod(method);
    const body = typeof init.body === "string" ? new TextEncoder().encode(init.body) : init.body;
    const sent = new Deferred<void>();
    // Observed by the release policy; a failed send is reported through the response
    sent.promise.catch(() => undefined);
    return new HttpRequest(method, init.path ?? "/", HttpHeaders.of(init.headers), body ?? null, sent);
  }

  withPath(path: string): HttpRequest {
    if (path === this.path) return this;
    return new HttpRequest(this.method, path, this.headers, this.body, this.sent);
  }

  withHeaders(headers: HttpHeaders): HttpRequest {
    if (headers === this.headers) return this;
    return new HttpRequest(this.method, this.path, headers, this.body, this.sent);
  }

  /**
   * Settles once the request has been fully transmitted.
   * Rejects with the write error when transmission failed.
   */
  whenComplete(): Promise<void> {
    return this.sent.promise;
  }

  /** Called by the session when the last byte was written, or with the write error. */
  close(cause?: Error): void {
    if (cause) {
      this.sent.reject(cause);
    } else {
      this.sent.resolve();
    }
  }
}
