import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerAppManagementCommands } from "./app-management.js";
import { createFakeApiClient, type Route } from "../lib/testing/fake-api-client.js";
import { createTestServices } from "../lib/testing/test-services.js";

const PKG = "com.example.app";
const APP = `applications/${PKG}`;

describe("app management commands", () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
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
    registerAppManagementCommands(program, createTestServices({ publisher: fake.client }));
    await program.parseAsync(["node", "test", ...args, "--package", PKG]);
    return fake;
  }

  const stderr = () => consoleErrorSpy.mock.calls.map((c) => String(c[0])).join("\n");

  it("creates a device tier config with its query flag", async () => {
    const fake = await run(
      ["devicetiers", "create", "--json", '{"deviceGroups":[]}', "--allow-unknown-devices"],
      { [`POST ${APP}/deviceTierConfigs`]: { deviceTierConfigId: "3" } }
    );

    expect(fake.calls[0]).toMatchObject({
      body: { deviceGroups: [] },
      query: { allowUnknownDevices: true },
    });
  });

  it("refuses to deploy a recovery action without --confirm", async () => {
    const fake = await run(["recovery", "deploy", "--recovery-id", "7"]);

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
    expect(stderr()).toContain("--confirm is required to deploy an app recovery action");
  });

  it("deploys a confirmed recovery action with an empty body", async () => {
    const fake = await run(["recovery", "deploy", "--recovery-id", "7", "--confirm"], {
      [`POST ${APP}/appRecoveries/7:deploy`]: {},
    });

    expect(fake.calls[0].body).toEqual({});
  });

  it("filters recovery actions by version code", async () => {
    const fake = await run(["recovery", "list", "--version-code", "42"], {
      [`GET ${APP}/appRecoveries`]: { recoveryActions: [] },
    });

    expect(fake.calls[0].query).toEqual({ versionCode: 42 });
  });

  it("requires the data safety body", async () => {
    const fake = await run(["datasafety", "update"]);

    expect(fake.calls).toHaveLength(0);
    expect(stderr()).toContain("--json is required");
  });
});
