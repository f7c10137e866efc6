// CHANGE: Shared fixtures for catalog-backed tests.
// WHY: Tests build small in-memory catalogs instead of reaching the update center.

import os from "os";
import path from "path";
import fs from "fs-extra";
import { Catalog } from "../src/catalog.js";

export interface FixturePlugin {
  readonly version: string;
  readonly dependencies?: ReadonlyArray<{ readonly name: string; readonly optional?: boolean }>;
}

export function catalogPayload(plugins: Record<string, FixturePlugin>): string {
  return `updateCenter.post(\n${JSON.stringify({ connectionCheckUrl: "https://example.com/", plugins })}\n);`;
}

export async function loadedCatalog(plugins: Record<string, FixturePlugin>): Promise<Catalog> {
  const catalog = new Catalog("https://catalog.example/update-center.json", async () => catalogPayload(plugins));
  await catalog.load();
  return catalog;
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hpi-downloader-"));
}
