/**
 * Inbound flow control for a connection.
 * Counts bytes the session has handed to responses but the caller has not
 * read yet. Above the high watermark the session should stop reading from
 * the socket; below the low watermark it may resume.
 */
import { EventEmitter } from "node:events";

export const DEFAULT_HIGH_WATERMARK = 128 * 1024;
export const DEFAULT_LOW_WATERMARK = 64 * 1024;

/** Emits "suspend" when crossing the high watermark and "resume" below the low one. */
export class InboundTrafficController extends EventEmitter {
  private unconsumed = 0;
  private _suspended = false;
  private readonly highWatermark: number;
  private readonly lowWatermark: number;

  constructor(
    highWatermark: number = DEFAULT_HIGH_WATERMARK,
    lowWatermark: number = DEFAULT_LOW_WATERMARK,
  ) {
    super();
    if (lowWatermark > highWatermark) {
      throw new Error(`Low watermark (${lowWatermark}) exceeds high watermark (${highWatermark})`);
    }
    this.highWatermark = highWatermark;
    this.lowWatermark = lowWatermark;
  }

  /** Bytes received but not yet consumed */
  get unconsumedBytes(): number {
    return this.unconsumed;
  }

  get isSuspended(): boolean {
    return this._suspended;
  }

  /** Record bytes handed to a response body. */
  inc(bytes: number): void {
    if (bytes <= 0) return;
    this.unconsumed += bytes;
    if (!this._suspended && this.unconsumed > this.highWatermark) {
      this._suspended = true;
      this.emit("suspend");
    }
  }

  /** Record bytes read by the caller (or dropped with an abandoned body). */
  dec(bytes: number): void {
    if (bytes <= 0) return;
    this.unconsumed = Math.max(0, this.unconsumed - bytes);
    if (this._suspended && this.unconsumed <= this.lowWatermark) {
      this._suspended = false;
      this.emit("resume");
    }
  }
}
