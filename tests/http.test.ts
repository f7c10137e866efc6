// CHANGE: Confirm HTTP helpers issue a single request and expose the declared length.
// WHY: Retries belong to mirror rotation, not to the transport.

import { Readable } from "stream";
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getText, httpClient, openStream, parseContentLength } from "../src/utils/http.js";

const dummyConfig = {
  url: "https://example.com/data",
  headers: {}
} as InternalAxiosRequestConfig;

describe("getText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the raw body", async () => {
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce({
      status: 200,
      statusText: "OK",
      headers: {},
      config: dummyConfig,
      data: "updateCenter.post({});"
    } satisfies AxiosResponse<string>);

    const response = await getText("https://example.com/data");

    expect(response).toEqual({ data: "updateCenter.post({});", status: 200 });
    expect(spy).toHaveBeenCalledWith("https://example.com/data", { responseType: "text" });
  });

  it("does not retry server errors", async () => {
    const serverError = new AxiosError("server error");
    const spy = vi.spyOn(httpClient, "get").mockRejectedValueOnce(serverError);

    await expect(getText("https://example.com/data")).rejects.toBe(serverError);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("openStream", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests a stream and parses content-length", async () => {
    const stream = Readable.from([Buffer.from("abc")]);
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce({
      status: 200,
      statusText: "OK",
      headers: { "Content-Length": "3" },
      config: dummyConfig,
      data: stream
    } satisfies AxiosResponse<Readable>);
    const controller = new AbortController();

    const artifact = await openStream("https://m1.example/git/1.0/git.hpi", controller.signal);

    expect(artifact.stream).toBe(stream);
    expect(artifact.contentLength).toBe(3);
    expect(spy).toHaveBeenCalledWith("https://m1.example/git/1.0/git.hpi", {
      responseType: "stream",
      signal: controller.signal
    });
  });
});

describe("parseContentLength", () => {
  it("accepts decimal byte counts only", () => {
    expect(parseContentLength("1024")).toBe(1024);
    expect(parseContentLength(" 7 ")).toBe(7);
    expect(parseContentLength(undefined)).toBeUndefined();
    expect(parseContentLength("-1")).toBeUndefined();
    expect(parseContentLength("abc")).toBeUndefined();
  });
});
