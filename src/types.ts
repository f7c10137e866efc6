// CHANGE: Define domain models for catalog records, resolution plans and download results.
// WHY: Catalog records are immutable after parsing; every other module reads them through these shapes.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Edge from a plugin to a plugin it requires.
 *
 * Invariant: optional edges are never followed by resolution.
 */
export interface DependencyRef {
  readonly name: string;
  readonly optional: boolean;
}

/**
 * Catalog entry for one plugin.
 *
 * @property id - Unique plugin identifier (catalog key).
 * @property version - Latest version published in the catalog.
 * @property dependencies - Declared dependency edges, in catalog order.
 */
export interface PluginRecord {
  readonly id: string;
  readonly version: string;
  readonly dependencies: readonly DependencyRef[];
}

/**
 * What a download run would fetch: dependencies first, root last.
 */
export interface DownloadPlan {
  readonly root: string;
  readonly version: string;
  readonly dependencies: readonly string[];
}

/**
 * One artifact fully written to disk.
 *
 * @property url - Artifact URL of the mirror that served the completed transfer.
 * @property mirror - Mirror base that served it.
 * @property bytes - Bytes written to the destination file.
 */
export interface DownloadResult {
  readonly id: string;
  readonly version: string;
  readonly url: string;
  readonly mirror: string;
  readonly bytes: number;
  readonly path: string;
}

/**
 * Outcome of `downloadWithDependencies`.
 *
 * @property downloaded - Identifiers fetched by this call, in download order.
 * @property skipped - Identifiers already materialised earlier in the run.
 */
export interface DownloadReport extends DownloadPlan {
  readonly downloaded: readonly string[];
  readonly skipped: readonly string[];
}

/**
 * Manifest entry persisted after each successful artifact.
 */
export interface ManifestEntry {
  readonly id: string;
  readonly version: string;
  readonly bytes: number;
  readonly url: string;
  readonly downloadedAt: string;
}

/**
 * Shape of the manifest file written beside the artifacts.
 */
export interface ManifestFile {
  readonly entries: { readonly [id: string]: ManifestEntry };
  readonly version: number;
  readonly updatedAt: string;
}
