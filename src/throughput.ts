// CHANGE: Pass-through stream that measures throughput per window and aborts slow transfers.
// WHY: A stalled or crawling mirror must be abandoned even when the socket never errors.

import { Transform, TransformCallback } from "stream";
import { SPEED } from "./config.js";
import { SpeedDegradedError } from "./errors.js";

export type Clock = () => number;

export interface ThroughputOptions {
  readonly minBytesPerSecond?: number;
  readonly checkIntervalMs?: number;
  readonly now?: Clock;
  /** Called after every completed window that met the threshold. */
  readonly onWindow?: (sample: ThroughputSample) => void;
}

export interface ThroughputSample {
  readonly bytesPerSecond: number;
  readonly totalBytes: number;
}

/**
 * Counts bytes flowing through and checks the rate once a window has elapsed.
 *
 * The check runs on every chunk and on a timer, so a transfer that stops sending entirely is
 * still caught. A failing check destroys the stream with `SpeedDegradedError`.
 */
export class ThroughputMonitor extends Transform {
  private readonly minBytesPerSecond: number;
  private readonly checkIntervalMs: number;
  private readonly now: Clock;
  private readonly onWindow: ((sample: ThroughputSample) => void) | undefined;
  private readonly timer: NodeJS.Timeout;
  private windowStart: number;
  private windowBytes = 0;
  private total = 0;

  constructor(options: ThroughputOptions = {}) {
    super();
    this.minBytesPerSecond = options.minBytesPerSecond ?? SPEED.MIN_BYTES_PER_SECOND;
    this.checkIntervalMs = options.checkIntervalMs ?? SPEED.CHECK_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.onWindow = options.onWindow;
    this.windowStart = this.now();
    this.timer = setInterval(() => this.check(), this.checkIntervalMs);
    this.timer.unref();
  }

  get totalBytes(): number {
    return this.total;
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.total += chunk.length;
    this.windowBytes += chunk.length;
    if (this.check()) {
      callback(null, chunk);
    }
  }

  override _flush(callback: TransformCallback): void {
    clearInterval(this.timer);
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    clearInterval(this.timer);
    callback(error);
  }

  /**
   * @returns `false` when the stream was destroyed for being too slow.
   */
  private check(): boolean {
    if (this.destroyed) {
      return false;
    }
    const elapsedMs = this.now() - this.windowStart;
    if (elapsedMs < this.checkIntervalMs) {
      return true;
    }
    const bytesPerSecond = this.windowBytes / (elapsedMs / 1000);
    if (bytesPerSecond < this.minBytesPerSecond) {
      this.destroy(new SpeedDegradedError(bytesPerSecond, this.minBytesPerSecond));
      return false;
    }
    this.onWindow?.({ bytesPerSecond, totalBytes: this.total });
    this.windowStart = this.now();
    this.windowBytes = 0;
    return true;
  }
}
