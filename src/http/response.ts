/**
 * Response placeholder.
 * Handed to the caller before a connection is even acquired, then filled by
 * the session that ends up carrying the exchange. Reaches its terminal state
 * exactly once: closed normally, or closed with a cause.
 */
import { Deferred } from "../utils/deferred.js";
import { abortError } from "../errors.js";
import type { InboundTrafficController } from "./traffic-controller.js";

export interface ResponseHead {
  status: number;
  headers: Record<string, string>;
}

export class DecodedHttpResponse {
  /** Resolves once the session wrote the response head. */
  readonly head: Promise<ResponseHead>;
  /** Response body; pulled on demand so unread bytes hold back the connection. */
  readonly body: ReadableStream<Uint8Array>;

  private readonly headDeferred = new Deferred<ResponseHead>();
  private readonly completion = new Deferred<void>();
  private trafficController: InboundTrafficController | null = null;

  // Body streaming
  private bodyController: ReadableStreamDefaultController<Uint8Array> | null = null;
  private readonly pending: Uint8Array[] = [];
  private pullRequested = false;
  private bodyStreamClosed = false;
  private closeCause: Error | null = null;
  private closed = false;
  private abandoned = false;

  constructor() {
    this.head = this.headDeferred.promise;
    // Both are observed lazily by callers; keep an early failure from being reported as unhandled
    this.head.catch(() => undefined);
    this.completion.promise.catch(() => undefined);

    this.body = new ReadableStream<Uint8Array>(
      {
        start: controller => {
          this.bodyController = controller;
        },
        pull: () => {
          this.pullRequested = true;
          this.deliver();
        },
        cancel: reason => {
          this.bodyStreamClosed = true;
          this.abort(reason);
        },
      },
      { highWaterMark: 0 },
    );
  }

  /** Whether the caller gave up on this response (abort or body cancel). */
  get isAbandoned(): boolean {
    return this.abandoned;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  get isInitialized(): boolean {
    return this.trafficController !== null;
  }

  /**
   * Bind the connection's backpressure controller.
   * A response is carried by one connection only, so this may happen once.
   */
  init(controller: InboundTrafficController): void {
    if (this.trafficController) {
      throw new Error("Response already initialized");
    }
    this.trafficController = controller;
    // Bytes written before init were not counted; account for them now
    for (const chunk of this.pending) {
      controller.inc(chunk.byteLength);
    }
  }

  writeHead(head: ResponseHead): boolean {
    if (this.closed) return false;
    return this.headDeferred.resolve(head);
  }

  /** Append a body chunk. Returns false once the response is closed. */
  write(chunk: Uint8Array): boolean {
    if (this.closed || this.bodyStreamClosed) return false;
    if (chunk.byteLength === 0) return true;
    this.pending.push(chunk);
    this.trafficController?.inc(chunk.byteLength);
    this.deliver();
    return true;
  }

  /**
   * Move the response to its terminal state.
   * Returns false when it was already closed.
   */
  close(cause?: Error): boolean {
    if (this.closed) return false;
    this.closed = true;
    this.closeCause = cause ?? null;

    if (cause) {
      this.headDeferred.reject(cause);
      this.completion.reject(cause);
    } else {
      if (!this.headDeferred.settled) {
        this.headDeferred.reject(new Error("Response closed without a head"));
      }
      this.completion.resolve();
    }
    this.deliver();
    return true;
  }

  /**
   * Abandon the response. Pending acquisition still completes, but the
   * connection is handed back unused and the response fails with `reason`.
   */
  abort(reason?: unknown): void {
    this.abandoned = true;
    this.discardPending();
    this.close(abortError(reason));
  }

  /**
   * Settles when the exchange ends: resolves on a normal close, rejects with
   * the cause otherwise.
   */
  whenComplete(): Promise<void> {
    return this.completion.promise;
  }

  private deliver(): void {
    const controller = this.bodyController;
    if (!controller || this.bodyStreamClosed) return;

    if (this.pullRequested && this.pending.length > 0) {
      const chunk = this.pending.shift();
      if (chunk) {
        this.pullRequested = false;
        controller.enqueue(chunk);
        this.trafficController?.dec(chunk.byteLength);
      }
      return;
    }

    if (this.closed && this.pending.length === 0) {
      this.bodyStreamClosed = true;
      if (this.closeCause) {
        controller.error(this.closeCause);
      } else {
        controller.close();
      }
    }
  }

  private discardPending(): void {
    let bytes = 0;
    for (const chunk of this.pending) bytes += chunk.byteLength;
    this.pending.length = 0;
    this.trafficController?.dec(bytes);
  }
}
