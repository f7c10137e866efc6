#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and export the library surface.
// WHY: Allows importing the downloader without triggering command parsing.

import { isDirectExecution, runCli } from "./cli.js";

if (isDirectExecution(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
export { Catalog, parseCatalogPayload } from "./catalog.js";
export { DownloadEngine, artifactUrl } from "./downloader.js";
export { CatalogFetchError, DownloadError, HpiDownloaderError, NotFoundError, OutputWriteError } from "./errors.js";
export { MirrorSelector } from "./mirrors.js";
export { PluginDownloader } from "./orchestrator.js";
export { resolveDependencies } from "./resolver.js";
export type { DependencyRef, DownloadPlan, DownloadReport, DownloadResult, PluginRecord } from "./types.js";
