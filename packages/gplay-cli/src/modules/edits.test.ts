import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerEditsCommands } from "./edits.js";
import { createFakeApiClient, type Route } from "../lib/testing/fake-api-client.js";
import { createTestServices } from "../lib/testing/test-services.js";

const PKG = "com.example.app";
const APP = `applications/${PKG}`;
const EDIT = `${APP}/edits/e1`;

describe("edits commands", () => {
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

  async function run(args: string[], routes: Record<string, Route> = {}) {
    const fake = createFakeApiClient(routes);
    const program = new Command();
    program.exitOverride();
    registerEditsCommands(program, createTestServices({ publisher: fake.client }));
    await program.parseAsync(["node", "test", "edits", ...args, "--package", PKG]);
    return fake;
  }

  const stderr = () => consoleErrorSpy.mock.calls.map((c) => String(c[0])).join("\n");

  it("creates an edit with an empty body", async () => {
    const fake = await run(["create"], {
      [`POST ${APP}/edits`]: { id: "e1", expiryTimeSeconds: "1700000000" },
    });

    expect(fake.calls[0].body).toEqual({});
    expect(consoleLogSpy).toHaveBeenCalledWith('{"id":"e1","expiryTimeSeconds":"1700000000"}');
  });

  it("validates the given edit", async () => {
    const fake = await run(["validate", "--edit", "e1"], { [`POST ${EDIT}:validate`]: { id: "e1" } });

    expect(fake.keys()).toEqual([`POST ${EDIT}:validate`]);
    expect(consoleLogSpy).toHaveBeenCalledWith('{"id":"e1"}');
  });

  it("commits for review unless told otherwise", async () => {
    const plain = await run(["commit", "--edit", "e1"], { [`POST ${EDIT}:commit`]: { id: "e1" } });
    const quiet = await run(["commit", "--edit", "e1", "--changes-not-sent-for-review"], {
      [`POST ${EDIT}:commit`]: { id: "e1" },
    });

    expect(plain.calls[0].query).toEqual({});
    expect(quiet.calls[0].query).toEqual({ changesNotSentForReview: true });
  });

  it("requires --edit", async () => {
    const fake = await run(["get"]);

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
    expect(stderr()).toContain("--edit is required");
  });

  it("refuses to delete an edit without --confirm", async () => {
    const fake = await run(["delete", "--edit", "e1"]);

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
    expect(stderr()).toContain("--confirm is required to delete an edit");
  });

  it("deletes a confirmed edit", async () => {
    const fake = await run(["delete", "--edit", "e1", "--confirm"], { [`DELETE ${EDIT}`]: {} });

    expect(fake.keys()).toEqual([`DELETE ${EDIT}`]);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      JSON.stringify({ editId: "e1", packageName: PKG, deleted: true })
    );
  });
});
