// CHANGE: Typed error taxonomy for catalog, lookup and download failures.
// WHY: Each layer surfaces the most specific failure; only the CLI turns it into an exit code.

export type ErrorCode = "CATALOG_FETCH" | "NOT_FOUND" | "DOWNLOAD" | "OUTPUT_WRITE" | "SPEED_DEGRADED";

export class HpiDownloaderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "HpiDownloaderError";
    this.code = code;
  }
}

/**
 * Catalog unreachable or its payload is not a `plugins` mapping.
 */
export class CatalogFetchError extends HpiDownloaderError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super("CATALOG_FETCH", message, options);
    this.name = "CatalogFetchError";
  }
}

export class NotFoundError extends HpiDownloaderError {
  readonly pluginId: string;

  constructor(pluginId: string) {
    super("NOT_FOUND", `Plugin ${pluginId} not found in update center`);
    this.name = "NotFoundError";
    this.pluginId = pluginId;
  }
}

/**
 * Every mirror failed once for the same artifact.
 */
export class DownloadError extends HpiDownloaderError {
  readonly pluginId: string;

  constructor(pluginId: string, reason: string, options?: { readonly cause?: unknown }) {
    super("DOWNLOAD", `Download of ${pluginId} failed: ${reason}`, options);
    this.name = "DownloadError";
    this.pluginId = pluginId;
  }
}

/**
 * The destination file could not be opened or written; switching mirrors cannot help.
 */
export class OutputWriteError extends HpiDownloaderError {
  readonly destination: string;

  constructor(destination: string, options?: { readonly cause?: unknown }) {
    super("OUTPUT_WRITE", `Cannot write ${destination}: ${describeError(options?.cause)}`, options);
    this.name = "OutputWriteError";
    this.destination = destination;
  }
}

/**
 * Raised inside a single streaming attempt; the engine converts it into a mirror switch.
 */
export class SpeedDegradedError extends HpiDownloaderError {
  readonly bytesPerSecond: number;

  constructor(bytesPerSecond: number, threshold: number) {
    super("SPEED_DEGRADED", `Throughput ${Math.round(bytesPerSecond)} B/s below ${threshold} B/s`);
    this.name = "SpeedDegradedError";
    this.bytesPerSecond = bytesPerSecond;
  }
}

export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
