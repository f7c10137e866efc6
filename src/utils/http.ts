// CHANGE: Provide the catalog text fetch and streaming artifact GET on one axios client.
// WHY: Mirror rotation is the only retry policy, so these helpers issue exactly one request each.

import { Readable } from "stream";
import axios, { AxiosInstance, AxiosResponse } from "axios";
import { NET } from "../config.js";
import { debug } from "../logger.js";

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "hpi-downloader/1.0"
  }
});

/**
 * Open artifact body handed to the download engine.
 *
 * @property stream - Response body, not yet consumed.
 * @property contentLength - Declared `content-length`, when the server sent a valid one.
 * @property status - HTTP status of the response.
 */
export interface ArtifactStream {
  readonly stream: Readable;
  readonly contentLength?: number;
  readonly status: number;
}

export type StreamOpener = (url: string, signal: AbortSignal) => Promise<ArtifactStream>;

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

export function parseContentLength(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  return Number.parseInt(raw.trim(), 10);
}

/**
 * Perform GET request returning the body as raw text.
 *
 * @param url - Target URL.
 * @returns Body text and response status.
 */
export async function getText(url: string): Promise<{ readonly data: string; readonly status: number }> {
  debug(`GET ${url}`);
  const response = await httpClient.get<string>(url, { responseType: "text" });
  return {
    data: response.data,
    status: response.status
  };
}

/**
 * Perform streaming GET; non-2xx statuses reject like connection errors.
 *
 * @param url - Artifact URL.
 * @param signal - Aborts the request and destroys the body.
 */
export async function openStream(url: string, signal: AbortSignal): Promise<ArtifactStream> {
  debug(`GET (stream) ${url}`);
  const response = await httpClient.get<Readable>(url, { responseType: "stream", signal });
  const headers = normaliseHeaders(response.headers);
  return {
    stream: response.data,
    contentLength: parseContentLength(headers["content-length"]),
    status: response.status
  };
}

export { httpClient };
