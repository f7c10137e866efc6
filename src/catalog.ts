// CHANGE: Fetch and validate the update-center catalog into an immutable plugin mapping.
// WHY: Resolution and downloads read the catalog many times; it is fetched once per process.

import { SOURCES } from "./config.js";
import { CatalogFetchError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import { DependencyRef, JsonValue, PluginRecord } from "./types.js";
import { getText } from "./utils/http.js";

export type CatalogSource = () => Promise<string>;

function isRecord(value: JsonValue | undefined): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unwrapPayload(text: string, source: string): string {
  const body = text.trim();
  const start = body.indexOf(SOURCES.CATALOG_PREFIX);
  if (start === -1) {
    throw new CatalogFetchError(`Catalog payload from ${source} lacks ${SOURCES.CATALOG_PREFIX} wrapper`);
  }
  const interior = body.slice(start + SOURCES.CATALOG_PREFIX.length);
  return interior.endsWith(SOURCES.CATALOG_SUFFIX)
    ? interior.slice(0, -SOURCES.CATALOG_SUFFIX.length)
    : interior;
}

function toDependency(raw: JsonValue, pluginId: string, source: string): DependencyRef {
  if (!isRecord(raw) || typeof raw.name !== "string") {
    throw new CatalogFetchError(`Malformed dependency of ${pluginId} in ${source}`);
  }
  return {
    name: raw.name,
    optional: raw.optional === true
  };
}

function toRecord(id: string, raw: JsonValue, source: string): PluginRecord {
  if (!isRecord(raw) || typeof raw.version !== "string") {
    throw new CatalogFetchError(`Malformed plugin entry ${id} in ${source}`);
  }
  const rawDependencies = raw.dependencies;
  if (rawDependencies !== undefined && !Array.isArray(rawDependencies)) {
    throw new CatalogFetchError(`Dependencies of ${id} are not a list in ${source}`);
  }
  const dependencies: readonly JsonValue[] = rawDependencies ?? [];
  return Object.freeze({
    id,
    version: raw.version,
    dependencies: Object.freeze(dependencies.map(dep => toDependency(dep, id, source)))
  });
}

/**
 * Extract the `plugins` mapping from a JSONP-wrapped update-center document.
 *
 * @param text - Raw response body.
 * @param source - Origin used in error messages.
 * @throws CatalogFetchError when the wrapper, JSON or `plugins` mapping is invalid.
 */
export function parseCatalogPayload(text: string, source: string): Map<string, PluginRecord> {
  const interior = unwrapPayload(text, source);
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(interior);
  } catch (cause) {
    throw new CatalogFetchError(`Catalog payload from ${source} is not valid JSON`, { cause });
  }
  if (!isRecord(parsed) || !isRecord(parsed.plugins)) {
    throw new CatalogFetchError(`Catalog payload from ${source} has no plugins mapping`);
  }
  const plugins = new Map<string, PluginRecord>();
  for (const [id, raw] of Object.entries(parsed.plugins)) {
    plugins.set(id, toRecord(id, raw, source));
  }
  return plugins;
}

/**
 * Write-once, read-many view over the update-center catalog.
 */
export class Catalog {
  private plugins = new Map<string, PluginRecord>();
  private pending: Promise<void> | undefined;

  constructor(
    private readonly url: string = SOURCES.CATALOG,
    private readonly source: CatalogSource = async () => (await getText(url)).data
  ) {}

  /**
   * Populate the catalog unless already loaded; concurrent callers share one fetch.
   *
   * @throws CatalogFetchError when the source is unreachable or unparseable.
   */
  async load(): Promise<void> {
    if (!this.isEmpty) {
      return;
    }
    this.pending ??= this.fetchOnce().finally(() => {
      this.pending = undefined;
    });
    await this.pending;
  }

  get isEmpty(): boolean {
    return this.plugins.size === 0;
  }

  get size(): number {
    return this.plugins.size;
  }

  has(id: string): boolean {
    return this.plugins.has(id);
  }

  get(id: string): PluginRecord | undefined {
    return this.plugins.get(id);
  }

  /**
   * Declared dependency edges; unknown identifiers have none.
   */
  dependenciesOf(id: string): readonly DependencyRef[] {
    return this.plugins.get(id)?.dependencies ?? [];
  }

  private async fetchOnce(): Promise<void> {
    let text: string;
    try {
      text = await this.source();
    } catch (cause) {
      throw new CatalogFetchError(`Catalog unreachable at ${this.url}: ${describeError(cause)}`, { cause });
    }
    const plugins = parseCatalogPayload(text, this.url);
    if (plugins.size === 0) {
      throw new CatalogFetchError(`Catalog at ${this.url} lists no plugins`);
    }
    this.plugins = plugins;
    info(`Catalog loaded: ${plugins.size} plugins.`);
    debug(`Catalog source: ${this.url}`);
  }
}
