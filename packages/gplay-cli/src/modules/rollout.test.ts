import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { updateRollout, registerRolloutCommands } from "./rollout.js";
import { createFakeApiClient } from "../lib/testing/fake-api-client.js";
import { createTestServices } from "../lib/testing/test-services.js";
import { fromHttpStatus } from "../lib/errors/catalog.js";

const PKG = "com.example.app";
const EDIT = `applications/${PKG}/edits/e1`;

function routes(releases: unknown[]) {
  return {
    [`POST applications/${PKG}/edits`]: { id: "e1", expiryTimeSeconds: "1700000000" },
    [`GET ${EDIT}/tracks/production`]: { track: "production", releases },
    [`PUT ${EDIT}/tracks/production`]: { track: "production" },
    [`POST ${EDIT}:validate`]: { id: "e1" },
    [`POST ${EDIT}:commit`]: { id: "e1" },
  };
}

describe("updateRollout", () => {
  it("raises the fraction of the in-progress release", async () => {
    const fake = createFakeApiClient(
      routes([
        { versionCodes: ["41"], status: "completed" },
        { versionCodes: ["42"], status: "inProgress", userFraction: 0.1 },
      ])
    );
    const progress: string[] = [];

    const result = await updateRollout(
      fake.client,
      { packageName: PKG, track: "production", action: "update", rollout: 0.5 },
      (message) => progress.push(message)
    );

    expect(result).toEqual({
      editId: "e1",
      packageName: PKG,
      track: "production",
      status: "inProgress",
      versionCodes: ["42"],
      rolloutFraction: 0.5,
    });
    expect(fake.calls[2].body).toEqual({
      track: "production",
      releases: [{ versionCodes: ["42"], status: "inProgress", userFraction: 0.5 }],
    });
    expect(progress).toEqual([
      "Creating edit...",
      "Getting current track state...",
      "Updating rollout status to: inProgress",
      "Validating edit...",
      "Committing edit...",
      "Rollout updated successfully",
    ]);
    expect(fake.keys()).toEqual([
      `POST applications/${PKG}/edits`,
      `GET ${EDIT}/tracks/production`,
      `PUT ${EDIT}/tracks/production`,
      `POST ${EDIT}:validate`,
      `POST ${EDIT}:commit`,
    ]);
  });

  it("drops the user fraction when completing", async () => {
    const fake = createFakeApiClient(
      routes([{ versionCodes: ["42"], status: "halted", userFraction: 0.2, name: "4.2.0" }])
    );

    const result = await updateRollout(
      fake.client,
      {
        packageName: PKG,
        track: "production",
        action: "complete",
        changesNotSentForReview: true,
      },
      () => {}
    );

    expect(result.status).toBe("completed");
    expect(result.rolloutFraction).toBeUndefined();
    expect(fake.calls[2].body).toEqual({
      track: "production",
      releases: [{ versionCodes: ["42"], status: "completed", name: "4.2.0" }],
    });
    expect(fake.calls[4].query).toEqual({ changesNotSentForReview: true });
  });

  it("keeps the current fraction when halting", async () => {
    const fake = createFakeApiClient(
      routes([{ versionCodes: ["42"], status: "inProgress", userFraction: 0.2 }])
    );

    const result = await updateRollout(
      fake.client,
      { packageName: PKG, track: "production", action: "halt" },
      () => {}
    );

    expect(result).toMatchObject({ status: "halted", rolloutFraction: 0.2 });
    expect(fake.calls[4].query).toEqual({});
  });

  it("fails without an active or halted release", async () => {
    const fake = createFakeApiClient(routes([{ versionCodes: ["40"], status: "completed" }]));

    await expect(
      updateRollout(fake.client, { packageName: PKG, track: "production", action: "resume" }, () => {})
    ).rejects.toMatchObject({
      code: "RELEASE_NOT_FOUND",
      message: "no active or halted release found in production track",
    });
    expect(fake.keys()).toHaveLength(2);
  });

  it("prefixes a failing step with its operation", async () => {
    const fake = createFakeApiClient({
      ...routes([{ versionCodes: ["42"], status: "inProgress", userFraction: 0.1 }]),
      [`PUT ${EDIT}/tracks/production`]: () => {
        throw fromHttpStatus(409, "Conflict", { error: { message: "Edit is stale" } });
      },
    });

    await expect(
      updateRollout(
        fake.client,
        { packageName: PKG, track: "production", action: "update", rollout: 0.3 },
        () => {}
      )
    ).rejects.toMatchObject({
      code: "API_CONFLICT",
      message: "failed to update track: Edit is stale",
    });
    expect(fake.keys()).toHaveLength(3);
  });
});

describe("rollout commands", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function run(args: string[], releases: unknown[] = []) {
    const fake = createFakeApiClient(routes(releases));
    const program = new Command();
    program.exitOverride();
    registerRolloutCommands(program, createTestServices({ publisher: fake.client }));
    return { fake, done: program.parseAsync(["node", "test", "rollout", ...args]) };
  }

  it("prints the result as JSON", async () => {
    const { done } = run(["halt", "--package", PKG], [{ versionCodes: ["42"], status: "inProgress" }]);
    await done;

    expect(consoleLogSpy).toHaveBeenCalledWith(
      JSON.stringify({
        editId: "e1",
        packageName: PKG,
        track: "production",
        status: "halted",
        versionCodes: ["42"],
      })
    );
  });

  it("validates --rollout before calling the API", async () => {
    const { fake, done } = run(["update", "--package", PKG, "--rollout", "1.5"]);
    await done;

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
    const stderr = consoleErrorSpy.mock.calls.map((c) => String(c[0])).join("\n");
    expect(stderr).toContain("--rollout must be between 0.0 and 1.0");
  });

  it("requires --rollout for update", async () => {
    const { fake, done } = run(["update", "--package", PKG]);
    await done;

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
  });

  it("requires a package name", async () => {
    const { done } = run(["complete"]);
    await done;

    const stderr = consoleErrorSpy.mock.calls.map((c) => String(c[0])).join("\n");
    expect(stderr).toContain("--package is required");
  });
});
