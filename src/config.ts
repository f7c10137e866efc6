// CHANGE: Centralise catalog, mirror and network settings with environment overrides.
// WHY: Download engine and orchestrator read one frozen configuration per process.

import * as dotenv from "dotenv";

dotenv.config();

function parseList(raw: string | undefined, fallback: readonly string[]): readonly string[] {
  if (!raw) {
    return fallback;
  }
  const entries = raw
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
  return entries.length > 0 ? entries : fallback;
}

/**
 * Upstream update-center catalog location and its JSONP wrapper.
 */
export const SOURCES = {
  CATALOG: process.env.HPI_CATALOG_URL ?? "https://updates.jenkins.io/update-center.json",
  CATALOG_PREFIX: "updateCenter.post(",
  CATALOG_SUFFIX: ");"
} as const;

/**
 * Ordered artifact mirrors; the first entry is tried first.
 *
 * Invariant: `BASES` is never empty.
 */
export const MIRRORS = {
  BASES: parseList(process.env.HPI_MIRRORS, [
    "https://updates.jenkins.io/download/plugins",
    "https://get.jenkins.io/plugins",
    "https://archives.jenkins.io/plugins",
    "https://ftp-chi.osuosl.org/pub/jenkins/plugins"
  ])
} as const;

/**
 * Throughput policy for artifact streaming. Fixed defaults, not read from the environment.
 */
export const SPEED = {
  MIN_BYTES_PER_SECOND: 1024,
  CHECK_INTERVAL_MS: 1000
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * `TIMEOUT` bounds connect and socket idle time; the throughput check covers slow-but-alive transfers.
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.HTTP_TIMEOUT ?? "30000", 10)
} as const;

export const OUTPUT = {
  DEFAULT_DIR: "plugins",
  MANIFEST_FILE: "plugins-manifest.json",
  MANIFEST_VERSION: 1
} as const;
