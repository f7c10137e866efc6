// CHANGE: Stream one artifact to disk from the active mirror, failing over on slowness or errors.
// WHY: Mirrors are unreliable; an artifact only counts as downloaded once fully written.

import { once } from "events";
import { pipeline } from "stream/promises";
import fs from "fs-extra";
import { DownloadError, OutputWriteError, SpeedDegradedError, describeError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { MirrorSelector } from "./mirrors.js";
import { ThroughputMonitor, ThroughputOptions } from "./throughput.js";
import { DownloadResult } from "./types.js";
import { StreamOpener, openStream } from "./utils/http.js";

export interface DownloadEngineOptions {
  readonly mirrors: MirrorSelector;
  readonly open?: StreamOpener;
  readonly throughput?: Omit<ThroughputOptions, "onWindow">;
}

/**
 * Build the artifact URL for a plugin version on a mirror.
 *
 * @returns `{base}/{id}/{version}/{id}.hpi`
 */
export function artifactUrl(base: string, pluginId: string, version: string): string {
  const id = encodeURIComponent(pluginId);
  return `${base.replace(/\/+$/, "")}/${id}/${encodeURIComponent(version)}/${id}.hpi`;
}

/**
 * Sequential artifact downloader with mirror failover.
 *
 * Each attempt restarts the artifact from byte 0 and truncates the destination; there is no
 * range-request resume.
 */
export class DownloadEngine {
  private readonly mirrors: MirrorSelector;
  private readonly open: StreamOpener;
  private readonly throughput: Omit<ThroughputOptions, "onWindow">;

  constructor(options: DownloadEngineOptions) {
    this.mirrors = options.mirrors;
    this.open = options.open ?? openStream;
    this.throughput = options.throughput ?? {};
  }

  /**
   * Download `pluginId@version` into `destination`.
   *
   * @throws DownloadError once every mirror has failed for this artifact.
   * @throws OutputWriteError when the destination cannot be written; no mirror switch happens.
   */
  async fetch(pluginId: string, version: string, destination: string): Promise<DownloadResult> {
    this.mirrors.beginAttempt();
    for (;;) {
      const mirror = this.mirrors.currentBase();
      const url = artifactUrl(mirror, pluginId, version);
      try {
        const bytes = await this.streamTo(url, destination);
        info(`Downloaded ${pluginId}@${version} (${bytes} bytes) from ${mirror}`);
        return { id: pluginId, version, url, mirror, bytes, path: destination };
      } catch (cause) {
        if (cause instanceof OutputWriteError) {
          throw cause;
        }
        const reason = cause instanceof SpeedDegradedError ? "speed degraded" : "transfer failed";
        warn(`${pluginId}: ${reason} on ${mirror}: ${describeError(cause)}`);
        if (!this.mirrors.advance()) {
          throw new DownloadError(pluginId, "all mirrors failed", { cause });
        }
        info(`Switching to mirror ${this.mirrors.currentBase()} for ${pluginId}`);
      }
    }
  }

  private async streamTo(url: string, destination: string): Promise<number> {
    const controller = new AbortController();
    try {
      const { stream, contentLength } = await this.open(url, controller.signal);
      const monitor = new ThroughputMonitor({
        ...this.throughput,
        onWindow: sample => debug(`${url}: ${Math.round(sample.bytesPerSecond)} B/s, ${sample.totalBytes} bytes`)
      });
      const output = fs.createWriteStream(destination, { flags: "w" });
      // pipeline() forwards the first error to every other stage, so only the first one says where it began.
      const failure: { stage?: "source" | "output" } = {};
      const mark = (stage: "source" | "output") => () => {
        failure.stage ??= stage;
      };
      stream.once("error", mark("source"));
      monitor.once("error", mark("source"));
      output.once("error", mark("output"));
      try {
        await pipeline(stream, monitor, output);
      } catch (cause) {
        // The next attempt truncates the same path; let this descriptor close first.
        if (!output.closed) {
          await once(output, "close");
        }
        if (failure.stage === "output") {
          throw new OutputWriteError(destination, { cause });
        }
        throw cause;
      }
      const bytes = monitor.totalBytes;
      if (contentLength !== undefined && bytes !== contentLength) {
        throw new Error(`received ${bytes} of ${contentLength} declared bytes`);
      }
      return bytes;
    } finally {
      controller.abort();
    }
  }
}
