// CHANGE: Validate update-center payload parsing and one-shot catalog loading.
// WHY: A malformed or unreachable catalog must abort before any download starts.

import { afterEach, describe, expect, it, vi } from "vitest";
import { Catalog, parseCatalogPayload } from "../src/catalog.js";
import { CatalogFetchError } from "../src/errors.js";
import * as http from "../src/utils/http.js";
import { catalogPayload } from "./helpers.js";

const SOURCE = "https://catalog.example/update-center.json";

describe("parseCatalogPayload", () => {
  it("unwraps the callback and maps plugins to records", () => {
    const plugins = parseCatalogPayload(
      catalogPayload({
        git: { version: "5.2.1", dependencies: [{ name: "scm-api" }, { name: "credentials", optional: true }] },
        "scm-api": { version: "689.v237b" }
      }),
      SOURCE
    );
    expect(plugins.size).toBe(2);
    expect(plugins.get("git")).toEqual({
      id: "git",
      version: "5.2.1",
      dependencies: [
        { name: "scm-api", optional: false },
        { name: "credentials", optional: true }
      ]
    });
    expect(plugins.get("scm-api")?.dependencies).toEqual([]);
  });

  it("rejects a payload without the callback wrapper", () => {
    expect(() => parseCatalogPayload(JSON.stringify({ plugins: {} }), SOURCE)).toThrow(CatalogFetchError);
  });

  it("rejects invalid JSON inside the wrapper", () => {
    expect(() => parseCatalogPayload("updateCenter.post({plugins: );", SOURCE)).toThrow(
      `Catalog payload from ${SOURCE} is not valid JSON`
    );
  });

  it("rejects a document without a plugins mapping", () => {
    expect(() => parseCatalogPayload('updateCenter.post({"core": {}});', SOURCE)).toThrow(
      `Catalog payload from ${SOURCE} has no plugins mapping`
    );
  });

  it("rejects an entry without a version", () => {
    expect(() => parseCatalogPayload('updateCenter.post({"plugins": {"git": {}}});', SOURCE)).toThrow(
      `Malformed plugin entry git in ${SOURCE}`
    );
  });

  it("rejects a dependency without a name", () => {
    const text = 'updateCenter.post({"plugins": {"git": {"version": "1", "dependencies": [{"optional": true}]}}});';
    expect(() => parseCatalogPayload(text, SOURCE)).toThrow(`Malformed dependency of git in ${SOURCE}`);
  });
});

describe("Catalog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches once and serves lookups afterwards", async () => {
    const source = vi.fn().mockResolvedValue(catalogPayload({ A: { version: "1.0", dependencies: [{ name: "B" }] } }));
    const catalog = new Catalog(SOURCE, source);
    expect(catalog.isEmpty).toBe(true);

    await Promise.all([catalog.load(), catalog.load()]);
    await catalog.load();

    expect(source).toHaveBeenCalledTimes(1);
    expect(catalog.size).toBe(1);
    expect(catalog.has("A")).toBe(true);
    expect(catalog.get("A")?.version).toBe("1.0");
    expect(catalog.dependenciesOf("A")).toEqual([{ name: "B", optional: false }]);
  });

  it("wraps an unreachable source in CatalogFetchError and stays empty", async () => {
    const catalog = new Catalog(SOURCE, vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND")));
    await expect(catalog.load()).rejects.toThrow(`Catalog unreachable at ${SOURCE}: getaddrinfo ENOTFOUND`);
    expect(catalog.isEmpty).toBe(true);
  });

  it("retries the fetch after a failed load", async () => {
    const source = vi
      .fn()
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(catalogPayload({ A: { version: "1.0" } }));
    const catalog = new Catalog(SOURCE, source);
    await expect(catalog.load()).rejects.toBeInstanceOf(CatalogFetchError);
    await catalog.load();
    expect(catalog.has("A")).toBe(true);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it("rejects a catalog that lists no plugins", async () => {
    const catalog = new Catalog(SOURCE, async () => catalogPayload({}));
    await expect(catalog.load()).rejects.toThrow(`Catalog at ${SOURCE} lists no plugins`);
  });

  it("reads the configured URL through the HTTP helper by default", async () => {
    const getText = vi.spyOn(http, "getText").mockResolvedValue({
      data: catalogPayload({ A: { version: "1.0" } }),
      status: 200
    });
    const catalog = new Catalog(SOURCE);
    await catalog.load();
    expect(getText).toHaveBeenCalledWith(SOURCE);
    expect(catalog.get("A")?.version).toBe("1.0");
  });
});
