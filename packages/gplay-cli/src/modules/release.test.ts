import { describe, it, expect, vi } from "vitest";
import { resolveArtifact, runRelease, parseDurationFlag, waitForVersion } from "./release.js";
import { createFakeApiClient } from "../lib/testing/fake-api-client.js";

const PKG = "com.example.app";
const APP = `applications/${PKG}`;

function releaseRoutes(extra: Record<string, unknown> = {}) {
  return {
    [`POST ${APP}/edits`]: { id: "e1" },
    [`UPLOAD ${APP}/edits/e1/bundles`]: { versionCode: 42, sha256: "abc" },
    [`UPLOAD ${APP}/edits/e1/apks`]: { versionCode: 43 },
    [`PUT ${APP}/edits/e1/tracks/production`]: {},
    [`PUT ${APP}/edits/e1/tracks/internal`]: {},
    [`POST ${APP}/edits/e1:validate`]: {},
    [`POST ${APP}/edits/e1:commit`]: { id: "e1" },
    ...extra,
  };
}

describe("resolveArtifact", () => {
  it("requires exactly one artifact", () => {
    expect(() => resolveArtifact(undefined, " ")).toThrowError("either --bundle or --apk is required");
    expect(() => resolveArtifact("a.aab", "a.apk")).toThrowError(
      "use either --bundle or --apk, not both"
    );
    expect(resolveArtifact(undefined, "app.apk")).toEqual({ kind: "apk", path: "app.apk" });
  });
});

describe("parseDurationFlag", () => {
  it("accepts unit durations only", () => {
    expect(parseDurationFlag("10s", "--poll-interval")).toBe(10_000);
    expect(() => parseDurationFlag("10", "--poll-interval")).toThrowError(
      "--poll-interval must be a duration such as 10s or 5m, got: 10"
    );
  });
});

describe("runRelease", () => {
  it("uploads a bundle and stages it on the track", async () => {
    const fake = createFakeApiClient(releaseRoutes());
    const progress: string[] = [];

    const result = await runRelease(
      fake.client,
      {
        packageName: PKG,
        track: "production",
        artifact: { kind: "bundle", path: "app.aab" },
        status: "completed",
        rollout: 0.1,
        versionName: "4.2.0",
        releaseNotes: [{ language: "en-US", text: "Fixes" }],
      },
      { progress: (m) => progress.push(m) }
    );

    expect(result).toEqual({
      editId: "e1",
      packageName: PKG,
      track: "production",
      versionCode: 42,
      status: "inProgress",
      rolloutFraction: 0.1,
    });
    expect(fake.calls[1].file).toBe("app.aab");
    expect(fake.calls[2].body).toEqual({
      track: "production",
      releases: [
        {
          status: "inProgress",
          versionCodes: ["42"],
          name: "4.2.0",
          releaseNotes: [{ language: "en-US", text: "Fixes" }],
          userFraction: 0.1,
        },
      ],
    });
    expect(progress).toEqual([
      "Creating edit...",
      "Edit created: e1",
      "Uploading bundle: app.aab",
      "Bundle uploaded: version code 42",
      "Configuring track: production",
      "Track configured",
      "Validating edit...",
      "Edit validated",
      "Committing edit...",
      "Edit committed successfully",
    ]);
  });

  it("keeps a full rollout without a fraction", async () => {
    const fake = createFakeApiClient(releaseRoutes());

    const result = await runRelease(
      fake.client,
      {
        packageName: PKG,
        track: "internal",
        artifact: { kind: "apk", path: "app.apk" },
        status: "completed",
        rollout: 1,
        changesNotSentForReview: true,
      },
      { progress: () => {} }
    );

    expect(result).toEqual({
      editId: "e1",
      packageName: PKG,
      track: "internal",
      versionCode: 43,
      status: "completed",
    });
    expect(fake.keys()[1]).toBe(`UPLOAD ${APP}/edits/e1/apks`);
    expect(fake.calls[4].query).toEqual({ changesNotSentForReview: true });
  });

  it("stops at the first failing step", async () => {
    const fake = createFakeApiClient({
      ...releaseRoutes(),
      [`POST ${APP}/edits/e1:validate`]: () => {
        throw new Error("APK specifies a version code that has already been used");
      },
    });

    await expect(
      runRelease(
        fake.client,
        {
          packageName: PKG,
          track: "internal",
          artifact: { kind: "bundle", path: "app.aab" },
          status: "completed",
          rollout: 1,
        },
        { progress: () => {} }
      )
    ).rejects.toMatchObject({
      code: "RELEASE_STEP_FAILED",
      message: "validation failed: APK specifies a version code that has already been used",
    });
    expect(fake.keys()).not.toContain(`POST ${APP}/edits/e1:commit`);
  });

  describe("--wait", () => {
    function waitRoutes(tracks: Array<Array<{ versionCodes: string[]; status: string }>>) {
      const ids = ["e1", "c1", "c2", "c3"];
      let created = 0;
      const routes: Record<string, unknown> = {
        ...releaseRoutes(),
        [`POST ${APP}/edits`]: () => ({ id: ids[created++] }),
      };
      tracks.forEach((releases, i) => {
        routes[`GET ${APP}/edits/c${i + 1}/tracks/internal`] = { track: "internal", releases };
        routes[`DELETE ${APP}/edits/c${i + 1}`] = {};
      });
      return routes;
    }

    it("polls with temporary edits until the version code appears", async () => {
      const fake = createFakeApiClient(
        waitRoutes([
          [{ versionCodes: ["41"], status: "completed" }],
          [{ versionCodes: ["42"], status: "completed" }],
        ])
      );
      const delay = vi.fn(async () => {});
      const progress: string[] = [];

      await runRelease(
        fake.client,
        {
          packageName: PKG,
          track: "internal",
          artifact: { kind: "bundle", path: "app.aab" },
          status: "completed",
          rollout: 1,
          wait: { intervalMs: 10_000, timeoutMs: 600_000 },
        },
        { progress: (m) => progress.push(m), delay }
      );

      expect(delay).toHaveBeenCalledTimes(2);
      expect(delay).toHaveBeenCalledWith(10_000);
      expect(fake.keys().slice(-6)).toEqual([
        `POST ${APP}/edits`,
        `GET ${APP}/edits/c1/tracks/internal`,
        `DELETE ${APP}/edits/c1`,
        `POST ${APP}/edits`,
        `GET ${APP}/edits/c2/tracks/internal`,
        `DELETE ${APP}/edits/c2`,
      ]);
      expect(progress.slice(-3)).toEqual([
        "Waiting for processing to complete (poll interval: 10s)...",
        "Version code 42 not on internal yet",
        "Release is live with status: completed",
      ]);
    });

    it("keeps a found release when the check edit cannot be deleted", async () => {
      const fake = createFakeApiClient({
        [`POST ${APP}/edits`]: { id: "c1" },
        [`GET ${APP}/edits/c1/tracks/internal`]: {
          track: "internal",
          releases: [{ versionCodes: ["42"], status: "completed" }],
        },
        [`DELETE ${APP}/edits/c1`]: () => {
          throw new Error("edit already deleted");
        },
      });
      const progress: string[] = [];

      const release = await waitForVersion(
        fake.client,
        PKG,
        "internal",
        42,
        { intervalMs: 10_000, timeoutMs: 20_000 },
        { progress: (m) => progress.push(m), delay: async () => {} }
      );

      expect(release).toEqual({ versionCodes: ["42"], status: "completed" });
      expect(progress).toEqual([
        "Waiting for processing to complete (poll interval: 10s)...",
        "Warning: failed to delete temporary edit c1: edit already deleted",
        "Release is live with status: completed",
      ]);
    });

    it("times out when the version never shows up", async () => {
      const fake = createFakeApiClient(
        waitRoutes([
          [{ versionCodes: ["41"], status: "completed" }],
          [{ versionCodes: ["41"], status: "completed" }],
        ])
      );

      await expect(
        runRelease(
          fake.client,
          {
            packageName: PKG,
            track: "internal",
            artifact: { kind: "bundle", path: "app.aab" },
            status: "completed",
            rollout: 1,
            wait: { intervalMs: 10_000, timeoutMs: 20_000 },
          },
          { progress: () => {}, delay: async () => {} }
        )
      ).rejects.toMatchObject({
        code: "RELEASE_WAIT_TIMEOUT",
        message: "timed out waiting for version 42 to appear on internal",
      });
    });
  });
});
