// CHANGE: Sequence catalog load, resolution and downloads for a plugin and its dependency closure.
// WHY: The root lands last, so its presence on disk implies its dependencies are there too.

import path from "path";
import fs from "fs-extra";
import pLimit from "p-limit";
import sanitize from "sanitize-filename";
import { Catalog } from "./catalog.js";
import { DownloadEngine } from "./downloader.js";
import { DownloadError, NotFoundError } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { DownloadManifest } from "./manifest.js";
import { resolveDependencies } from "./resolver.js";
import { DownloadPlan, DownloadReport, DownloadResult } from "./types.js";

export interface PluginDownloaderOptions {
  readonly catalog: Catalog;
  readonly engine: Pick<DownloadEngine, "fetch">;
  readonly outputDir: string;
  readonly manifest?: Pick<DownloadManifest, "record">;
}

/**
 * Local file for a plugin; catalog identifiers are not trusted as path segments.
 */
export function artifactPath(outputDir: string, pluginId: string): string {
  return path.join(outputDir, sanitize(`${pluginId}.hpi`));
}

/**
 * Downloads plugins with their required dependencies, once per identifier per instance.
 *
 * Calls are queued one at a time: DownloadedSet and the mirror index are only touched by the
 * call currently running.
 */
export class PluginDownloader {
  private readonly catalog: Catalog;
  private readonly engine: Pick<DownloadEngine, "fetch">;
  private readonly outputDir: string;
  private readonly manifest: Pick<DownloadManifest, "record"> | undefined;
  private readonly downloadedSet = new Set<string>();
  private readonly queue = pLimit(1);
  private outputReady = false;

  constructor(options: PluginDownloaderOptions) {
    this.catalog = options.catalog;
    this.engine = options.engine;
    this.outputDir = options.outputDir;
    this.manifest = options.manifest;
  }

  /**
   * Identifiers materialised so far in this run.
   */
  downloaded(): ReadonlySet<string> {
    return this.downloadedSet;
  }

  /**
   * Load the catalog if needed and compute what a download would fetch.
   *
   * @throws CatalogFetchError | NotFoundError
   */
  async resolve(rootId: string, pinnedVersion?: string): Promise<DownloadPlan> {
    await this.catalog.load();
    const record = this.catalog.get(rootId);
    if (!record) {
      throw new NotFoundError(rootId);
    }
    return {
      root: rootId,
      version: pinnedVersion ?? record.version,
      dependencies: resolveDependencies(this.catalog, rootId)
    };
  }

  /**
   * Download every required dependency of `rootId`, then `rootId` itself.
   *
   * @param rootId - Requested plugin.
   * @param pinnedVersion - Version of the root only; dependencies use the catalog's latest.
   * @throws CatalogFetchError | NotFoundError | DownloadError | OutputWriteError
   */
  downloadWithDependencies(rootId: string, pinnedVersion?: string): Promise<DownloadReport> {
    return this.queue(() => this.run(rootId, pinnedVersion));
  }

  private async run(rootId: string, pinnedVersion: string | undefined): Promise<DownloadReport> {
    const plan = await this.resolve(rootId, pinnedVersion);
    const pending = [...plan.dependencies, rootId].filter(id => !this.downloadedSet.has(id));
    const skipped = [...plan.dependencies, rootId].filter(id => this.downloadedSet.has(id));
    if (pending.length === 0) {
      debug(`${rootId} and its dependencies are already downloaded.`);
      return { ...plan, downloaded: [], skipped };
    }
    const unknown = pending.find(id => id !== rootId && !this.catalog.has(id));
    if (unknown !== undefined) {
      throw new NotFoundError(unknown);
    }
    info(`Downloading ${rootId}@${plan.version} with ${plan.dependencies.length} dependencies (${pending.length} pending).`);

    const downloaded: string[] = [];
    try {
      for (const id of plan.dependencies) {
        if (await this.downloadOne(id)) {
          downloaded.push(id);
        }
      }
      if (await this.downloadOne(rootId, plan.version)) {
        downloaded.push(rootId);
      }
    } catch (cause) {
      if (cause instanceof DownloadError) {
        logError(`${downloaded.length} of ${pending.length} plugins downloaded before ${cause.pluginId} failed.`);
      }
      throw cause;
    }
    return { ...plan, downloaded, skipped };
  }

  /**
   * @returns `false` when the identifier was already downloaded in this run.
   */
  private async downloadOne(pluginId: string, version?: string): Promise<boolean> {
    if (this.downloadedSet.has(pluginId)) {
      return false;
    }
    const resolvedVersion = version ?? this.catalog.get(pluginId)?.version;
    if (resolvedVersion === undefined) {
      throw new NotFoundError(pluginId);
    }
    await this.ensureOutputDir();
    const result: DownloadResult = await this.engine.fetch(
      pluginId,
      resolvedVersion,
      artifactPath(this.outputDir, pluginId)
    );
    this.downloadedSet.add(pluginId);
    await this.manifest?.record(result);
    return true;
  }

  private async ensureOutputDir(): Promise<void> {
    if (!this.outputReady) {
      await fs.ensureDir(this.outputDir);
      this.outputReady = true;
    }
  }
}
