import { describe, expect, it, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  buildUrl,
  createApiClient,
  PUBLISHER_BASE_URL,
  PUBLISHER_UPLOAD_BASE_URL,
  type FetchLike,
  type FetchResponse,
} from "./api-client.js";
import { resetContext, updateContext } from "./cli-context.js";

const tokenProvider = { getAccessToken: async () => "test-token" };

function jsonResponse(status: number, body: unknown, statusText = "OK"): FetchResponse {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => text,
    arrayBuffer: async () => {
      const bytes = Buffer.from(text);
      const copy = new ArrayBuffer(bytes.length);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
  };
}

describe("createApiClient", () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    resetContext();
    vi.restoreAllMocks();
  });

  it("sends a bearer token and parses JSON", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, { id: "edit-1" }));
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await expect(client.get("applications/com.example.app/edits/edit-1")).resolves.toEqual({
      id: "edit-1",
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(
      "https://androidpublisher.googleapis.com/androidpublisher/v3/applications/com.example.app/edits/edit-1"
    );
    expect(init.method).toBe("GET");
    expect(init.headers.Authorization).toBe("Bearer test-token");
    expect(init.body).toBeUndefined();
    expect(init.signal).toBeUndefined();
  });

  it("sends JSON bodies with a content type", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, {}));
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await client.put("applications/p/edits/e/tracks/beta", { track: "beta", releases: [] });

    const [, init] = fetchImpl.mock.calls[0];
    expect(init.method).toBe("PUT");
    expect(init.body).toBe('{"track":"beta","releases":[]}');
    expect(init.headers["Content-Type"]).toBe("application/json");
  });

  it("treats an empty success body as an empty object", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(204, ""));
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await expect(client.delete("applications/p/edits/e")).resolves.toEqual({});
  });

  it("maps Google error payloads to API errors", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () =>
      jsonResponse(
        404,
        { error: { code: 404, message: "Package not found: com.example.app.", status: "NOT_FOUND" } },
        "Not Found"
      )
    );
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await expect(client.get("applications/com.example.app/reviews")).rejects.toMatchObject({
      code: "API_NOT_FOUND",
      status: 404,
      message: "Package not found: com.example.app.",
      suggestion: "Check that the package name, edit ID, and resource IDs are correct.",
    });
  });

  it("falls back to the status line when the error body is empty", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(503, "", "Service Unavailable"));
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await expect(client.get("x")).rejects.toMatchObject({
      code: "API_SERVER_ERROR",
      message: "503 Service Unavailable",
    });
  });

  it("maps aborted requests to a timeout", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });
    const client = createApiClient({
      baseUrl: PUBLISHER_BASE_URL,
      tokenProvider,
      fetchImpl,
      timeoutMs: 30_000,
    });

    await expect(client.get("x")).rejects.toMatchObject({
      code: "NETWORK_TIMEOUT",
      message: "request timed out after 30s",
    });
    expect(fetchImpl.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it("maps connection failures to offline", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError("getaddrinfo ENOTFOUND");
    });
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

    await expect(client.get("x")).rejects.toMatchObject({
      code: "NETWORK_OFFLINE",
      message: "can't connect to androidpublisher.googleapis.com",
      details: "getaddrinfo ENOTFOUND",
    });
  });

  it("propagates token provider failures unchanged", async () => {
    const failing = {
      getAccessToken: async (): Promise<string> => {
        throw new Error("token refresh failed");
      },
    };
    const fetchImpl = vi.fn<FetchLike>();
    const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider: failing, fetchImpl });

    await expect(client.get("x")).rejects.toThrow("token refresh failed");
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  describe("dry run", () => {
    beforeEach(() => {
      updateContext({ dryRun: true });
    });

    it("prints mutating requests instead of sending them", async () => {
      const fetchImpl = vi.fn<FetchLike>();
      const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

      await expect(client.post("applications/p/edits/e:commit")).resolves.toEqual({});
      await client.patch("applications/p/edits/e/details", { contactEmail: "dev@example.com" });

      expect(fetchImpl).not.toHaveBeenCalled();
      expect(consoleErrorSpy.mock.calls.map((c) => c[0])).toEqual([
        `[DRY RUN] POST ${PUBLISHER_BASE_URL}applications/p/edits/e:commit`,
        "[DRY RUN] No changes were made.",
        `[DRY RUN] PATCH ${PUBLISHER_BASE_URL}applications/p/edits/e/details`,
        '[DRY RUN] Body: {"contactEmail":"dev@example.com"}',
        "[DRY RUN] No changes were made.",
      ]);
    });

    it("truncates long bodies", async () => {
      const client = createApiClient({
        baseUrl: PUBLISHER_BASE_URL,
        tokenProvider,
        fetchImpl: vi.fn<FetchLike>(),
      });

      await client.post("x", "a".repeat(3000));

      const bodyLine = String(consoleErrorSpy.mock.calls[1][0]);
      expect(bodyLine).toBe(`[DRY RUN] Body: "${"a".repeat(2047)}... (truncated)`);
    });

    it("lets GET requests through", async () => {
      const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, { tracks: [] }));
      const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

      await expect(client.get("x")).resolves.toEqual({ tracks: [] });
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "gplay-api-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("uploads raw media to the upload endpoint", async () => {
      const file = join(dir, "app.apk");
      writeFileSync(file, "apk-bytes");
      const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, { versionCode: 42 }));
      const client = createApiClient({
        baseUrl: PUBLISHER_BASE_URL,
        uploadBaseUrl: PUBLISHER_UPLOAD_BASE_URL,
        tokenProvider,
        fetchImpl,
        timeoutMs: 1000,
        uploadTimeoutMs: 600_000,
      });

      await expect(client.upload("applications/p/edits/e/apks", file)).resolves.toEqual({
        versionCode: 42,
      });

      const [url, init] = fetchImpl.mock.calls[0];
      expect(url).toBe(`${PUBLISHER_UPLOAD_BASE_URL}applications/p/edits/e/apks?uploadType=media`);
      expect(init.method).toBe("POST");
      expect(init.headers["Content-Type"]).toBe("application/octet-stream");
      expect(String(init.body)).toBe("apk-bytes");
    });

    it("sends deobfuscation and symbol files as octet-stream", async () => {
      const mapping = join(dir, "mapping.txt");
      const symbols = join(dir, "symbols.zip");
      writeFileSync(mapping, "com.example.A -> a:");
      writeFileSync(symbols, "zip-bytes");
      const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, {}));
      const client = createApiClient({
        baseUrl: PUBLISHER_BASE_URL,
        uploadBaseUrl: PUBLISHER_UPLOAD_BASE_URL,
        tokenProvider,
        fetchImpl,
      });

      await client.upload("applications/p/edits/e/apks/42/deobfuscationFiles/proguard", mapping);
      await client.upload("applications/p/edits/e/apks/42/deobfuscationFiles/nativeCode", symbols);

      expect(fetchImpl.mock.calls.map(([, init]) => init.headers["Content-Type"])).toEqual([
        "application/octet-stream",
        "application/octet-stream",
      ]);
    });

    it("fails before any request when the upload file is missing", async () => {
      const fetchImpl = vi.fn<FetchLike>();
      const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });

      await expect(client.upload("x", join(dir, "missing.aab"))).rejects.toMatchObject({
        code: "FILE_NOT_FOUND",
      });
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it("describes uploads in dry run without reading them", async () => {
      updateContext({ dryRun: true });
      const file = join(dir, "app.aab");
      writeFileSync(file, "12345");
      const client = createApiClient({
        baseUrl: PUBLISHER_BASE_URL,
        uploadBaseUrl: PUBLISHER_UPLOAD_BASE_URL,
        tokenProvider,
        fetchImpl: vi.fn<FetchLike>(),
      });

      await client.upload("applications/p/edits/e/bundles", file);
      expect(consoleErrorSpy.mock.calls[1][0]).toBe("[DRY RUN] Body: <binary 5 bytes>");
    });

    it("downloads bytes into nested directories", async () => {
      const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(200, "zip-bytes"));
      const client = createApiClient({ baseUrl: PUBLISHER_BASE_URL, tokenProvider, fetchImpl });
      const target = join(dir, "out", "app.apk");

      await expect(client.download("x:download", target)).resolves.toEqual({
        path: target,
        size: 9,
      });
      expect(readFileSync(target, "utf-8")).toBe("zip-bytes");
    });
  });
});

describe("buildUrl", () => {
  it("joins paths and encodes query values", () => {
    expect(
      buildUrl("https://example.com/v1/", "/apps/p/errorIssues:search", {
        filter: "errorIssueType = CRASH",
        pageSize: 50,
        skipped: undefined,
        dimensions: ["versionCode", "deviceModel"],
      })
    ).toBe(
      "https://example.com/v1/apps/p/errorIssues:search?filter=errorIssueType+%3D+CRASH&pageSize=50&dimensions=versionCode&dimensions=deviceModel"
    );
  });
});
