import fetch from "node-fetch";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { TokenProvider } from "./ports/token.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { isDryRun } from "./cli-context.js";
import { assertFile, UPLOAD_CONTENT_TYPE } from "./files.js";
import { fromHttpStatus, networkOffline, networkTimeout } from "./errors/catalog.js";
import { isCLIError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PUBLISHER_BASE_URL = "https://androidpublisher.googleapis.com/androidpublisher/v3/";
export const PUBLISHER_UPLOAD_BASE_URL =
  "https://androidpublisher.googleapis.com/upload/androidpublisher/v3/";
export const REPORTING_BASE_URL = "https://playdeveloperreporting.googleapis.com/v1beta1/";
export const STORAGE_BASE_URL = "https://storage.googleapis.com/storage/v1/";

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string | Buffer;
  signal?: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** The subset of fetch the client relies on; node-fetch satisfies it. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export type QueryValue = string | number | boolean | undefined | Array<string | number>;
export type Query = Record<string, QueryValue>;

export interface RequestOptions {
  query?: Query;
}

export interface DownloadResult {
  path: string;
  size: number;
}

export interface ApiClientOptions {
  baseUrl: string;
  uploadBaseUrl?: string;
  tokenProvider: TokenProvider;
  fetchImpl?: FetchLike;
  /** Request timeout; unset or 0 means none */
  timeoutMs?: number;
  /** Timeout for uploads and downloads; unset or 0 means none */
  uploadTimeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export interface ApiClient {
  get<T>(path: string, options?: RequestOptions): Promise<T>;
  post<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
  put<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
  patch<T>(path: string, body?: unknown, options?: RequestOptions): Promise<T>;
  delete<T>(path: string, options?: RequestOptions): Promise<T>;
  /** Media upload of a local file to the upload endpoint */
  upload<T>(path: string, filePath: string, options?: RequestOptions): Promise<T>;
  /** GET raw bytes and write them to a local file */
  download(path: string, outputPath: string, options?: RequestOptions): Promise<DownloadResult>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DRY_RUN_BODY_LIMIT = 2048;

export function buildUrl(base: string, path: string, query: Query = {}): string {
  const url = `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) params.append(key, String(item));
    } else {
      params.append(key, String(value));
    }
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

function parseBody<T>(text: string): T {
  return (text ? JSON.parse(text) : {}) as T;
}

function parseErrorPayload(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text.trim();
  }
}

/**
 * Print what a mutating request would have sent.
 */
export function printDryRun(method: string, url: string, body?: string): void {
  console.error(`[DRY RUN] ${method} ${url}`);
  const trimmed = body?.trim();
  if (trimmed) {
    const shown =
      trimmed.length > DRY_RUN_BODY_LIMIT
        ? `${trimmed.slice(0, DRY_RUN_BODY_LIMIT)}... (truncated)`
        : trimmed;
    console.error(`[DRY RUN] Body: ${shown}`);
  }
  console.error("[DRY RUN] No changes were made.");
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createApiClient({
  baseUrl,
  uploadBaseUrl = baseUrl,
  tokenProvider,
  fetchImpl = fetch,
  timeoutMs,
  uploadTimeoutMs,
  userAgent,
  logger = createNoopLogger(),
}: ApiClientOptions): ApiClient {
  async function send(
    method: string,
    url: string,
    body: string | Buffer | undefined,
    contentType: string | undefined,
    timeout: number | undefined
  ): Promise<FetchResponse> {
    const token = await tokenProvider.getAccessToken();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (contentType) headers["Content-Type"] = contentType;
    if (userAgent) headers["User-Agent"] = userAgent;

    const started = Date.now();
    let response: FetchResponse;
    try {
      response = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: timeout ? AbortSignal.timeout(timeout) : undefined,
      });
    } catch (err) {
      if (isCLIError(err)) throw err;
      if (isAbort(err)) throw networkTimeout(timeout);
      throw networkOffline(new URL(url).host, err instanceof Error ? err.message : String(err));
    }

    logger.debug(`${method} ${url}`, {
      status: response.status,
      durationMs: Date.now() - started,
    });

    if (!response.ok) {
      const text = await response.text();
      throw fromHttpStatus(response.status, response.statusText, parseErrorPayload(text));
    }
    return response;
  }

  async function request<T>(
    method: string,
    path: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = buildUrl(baseUrl, path, options.query);
    const payload = body === undefined ? undefined : JSON.stringify(body);

    if (method !== "GET" && isDryRun()) {
      printDryRun(method, url, payload);
      return parseBody<T>("");
    }

    const response = await send(
      method,
      url,
      payload,
      payload === undefined ? undefined : "application/json",
      timeoutMs
    );
    return parseBody<T>(await response.text());
  }

  async function upload<T>(path: string, filePath: string, options: RequestOptions = {}): Promise<T> {
    const size = assertFile(filePath);
    const url = buildUrl(uploadBaseUrl, path, { ...options.query, uploadType: "media" });

    if (isDryRun()) {
      printDryRun("POST", url, `<binary ${size} bytes>`);
      return parseBody<T>("");
    }

    const response = await send(
      "POST",
      url,
      readFileSync(filePath),
      UPLOAD_CONTENT_TYPE,
      uploadTimeoutMs
    );
    return parseBody<T>(await response.text());
  }

  async function download(
    path: string,
    outputPath: string,
    options: RequestOptions = {}
  ): Promise<DownloadResult> {
    const url = buildUrl(baseUrl, path, options.query);
    const response = await send("GET", url, undefined, undefined, uploadTimeoutMs);
    const bytes = Buffer.from(await response.arrayBuffer());

    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, bytes);
    return { path: outputPath, size: bytes.length };
  }

  return {
    get: (path, options) => request("GET", path, undefined, options),
    post: (path, body, options) => request("POST", path, body, options),
    put: (path, body, options) => request("PUT", path, body, options),
    patch: (path, body, options) => request("PATCH", path, body, options),
    delete: (path, options) => request("DELETE", path, undefined, options),
    upload,
    download,
  };
}
