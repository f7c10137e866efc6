// CHANGE: Record every completed artifact in a manifest beside the downloads.
// WHY: Consumers of the output directory need to know which versions landed and from where.

import path from "path";
import fs from "fs-extra";
import { OUTPUT } from "./config.js";
import { describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { DownloadResult, ManifestEntry, ManifestFile } from "./types.js";

const EMPTY_MANIFEST: ManifestFile = {
  entries: {},
  version: OUTPUT.MANIFEST_VERSION,
  updatedAt: ""
};

function isManifestFile(value: unknown): value is ManifestFile {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "entries" in value &&
    typeof value.entries === "object" &&
    value.entries !== null &&
    "version" in value &&
    value.version === OUTPUT.MANIFEST_VERSION
  );
}

/**
 * Manifest persistence with atomic writes. Never consulted to skip downloads.
 */
export class DownloadManifest {
  private manifest: ManifestFile = EMPTY_MANIFEST;

  constructor(readonly filePath: string) {}

  static inDirectory(outputDir: string): DownloadManifest {
    return new DownloadManifest(path.join(outputDir, OUTPUT.MANIFEST_FILE));
  }

  /**
   * Load manifest from disk if present; unreadable or outdated files start over.
   */
  async load(): Promise<void> {
    if (!(await fs.pathExists(this.filePath))) {
      debug("Manifest absent, starting with empty manifest.");
      this.manifest = { ...EMPTY_MANIFEST };
      return;
    }
    try {
      const parsed: unknown = await fs.readJson(this.filePath);
      if (!isManifestFile(parsed)) {
        info("Manifest format mismatch, reinitialising.");
        this.manifest = { ...EMPTY_MANIFEST };
        return;
      }
      this.manifest = parsed;
    } catch (error) {
      info(`Manifest read failed (${describeError(error)}), reinitialising.`);
      this.manifest = { ...EMPTY_MANIFEST };
    }
  }

  get(id: string): ManifestEntry | undefined {
    return this.manifest.entries[id];
  }

  /**
   * Add the completed artifact and persist immediately.
   */
  async record(result: DownloadResult): Promise<void> {
    const entry: ManifestEntry = {
      id: result.id,
      version: result.version,
      bytes: result.bytes,
      url: result.url,
      downloadedAt: new Date().toISOString()
    };
    this.manifest = {
      ...this.manifest,
      entries: {
        ...this.manifest.entries,
        [entry.id]: entry
      }
    };
    await this.save();
  }

  /**
   * Persist manifest atomically by writing to temporary file before rename.
   */
  async save(): Promise<void> {
    const payload: ManifestFile = {
      ...this.manifest,
      updatedAt: new Date().toISOString()
    };
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeJson(tempPath, payload, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    this.manifest = payload;
    debug(`Manifest saved with ${Object.keys(this.manifest.entries).length} entries.`);
  }

  entries(): ReadonlyArray<ManifestEntry> {
    return Object.values(this.manifest.entries);
  }
}
