import type { ApiClient, DownloadResult, Query, RequestOptions } from "../api-client.js";

/**
 * In-memory ApiClient for command tests. Routes are keyed by
 * "METHOD path"; a route is either a canned JSON response or a function of
 * the recorded call. Unknown routes reject.
 */

export interface RecordedCall {
  method: "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "UPLOAD" | "DOWNLOAD";
  path: string;
  body?: unknown;
  query?: Query;
  /** Local file for uploads and downloads */
  file?: string;
}

export type Route = unknown | ((call: RecordedCall) => unknown);

export interface FakeApiClient {
  client: ApiClient;
  calls: RecordedCall[];
  /** "METHOD path" of every call, in order */
  keys(): string[];
}

export function createFakeApiClient(routes: Record<string, Route> = {}): FakeApiClient {
  const calls: RecordedCall[] = [];

  async function handle<T>(call: RecordedCall): Promise<T> {
    calls.push(call);
    const key = `${call.method} ${call.path}`;
    if (!(key in routes)) {
      throw new Error(`unexpected request: ${key}`);
    }
    const route = routes[key];
    const value = typeof route === "function" ? await route(call) : route;
    return JSON.parse(JSON.stringify(value ?? {})) as T;
  }

  const withQuery = (options: RequestOptions | undefined) =>
    options?.query ? { query: options.query } : {};

  const client: ApiClient = {
    get: (path, options) => handle({ method: "GET", path, ...withQuery(options) }),
    post: (path, body, options) => handle({ method: "POST", path, body, ...withQuery(options) }),
    put: (path, body, options) => handle({ method: "PUT", path, body, ...withQuery(options) }),
    patch: (path, body, options) => handle({ method: "PATCH", path, body, ...withQuery(options) }),
    delete: (path, options) => handle({ method: "DELETE", path, ...withQuery(options) }),
    upload: (path, file, options) => handle({ method: "UPLOAD", path, file, ...withQuery(options) }),
    download: (path, file, options) =>
      handle<DownloadResult>({ method: "DOWNLOAD", path, file, ...withQuery(options) }),
  };

  return {
    client,
    calls,
    keys: () => calls.map((call) => `${call.method} ${call.path}`),
  };
}
