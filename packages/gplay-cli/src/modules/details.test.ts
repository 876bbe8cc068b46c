import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { detailsBody, registerDetailsCommands } from "./details.js";
import { createFakeApiClient, type Route } from "../lib/testing/fake-api-client.js";
import { createTestServices } from "../lib/testing/test-services.js";

const PKG = "com.example.app";
const EDIT = `applications/${PKG}/edits/e1`;

describe("detailsBody", () => {
  it("keeps only the given fields", () => {
    expect(detailsBody({ contactEmail: "dev@example.com", defaultLanguage: "en-US" })).toEqual({
      contactEmail: "dev@example.com",
      defaultLanguage: "en-US",
    });
  });

  it("prefers --json over the field flags", () => {
    expect(detailsBody({ contactEmail: "dev@example.com", json: '{"contactPhone":"+1 555 0100"}' })).toEqual({
      contactPhone: "+1 555 0100",
    });
  });

  it("needs at least one field", () => {
    expect(() => detailsBody({})).toThrowError(
      "at least one of --contact-email, --contact-phone, --contact-website, --default-language or --json is required"
    );
    expect(() => detailsBody({ json: "[]" })).toThrowError("--json must be an AppDetails JSON object");
  });
});

describe("details commands", () => {
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  async function run(args: string[], routes: Record<string, Route> = {}) {
    const fake = createFakeApiClient(routes);
    const program = new Command();
    program.exitOverride();
    registerDetailsCommands(program, createTestServices({ publisher: fake.client }));
    await program.parseAsync(["node", "test", "details", ...args, "--package", PKG, "--edit", "e1"]);
    return fake;
  }

  it("patches the contact website", async () => {
    const fake = await run(["patch", "--contact-website", "https://example.com"], {
      [`PATCH ${EDIT}/details`]: (call: { body?: unknown }) => call.body,
    });

    expect(fake.calls[0].body).toEqual({ contactWebsite: "https://example.com" });
    expect(consoleLogSpy).toHaveBeenCalledWith('{"contactWebsite":"https://example.com"}');
  });

  it("replaces details with PUT", async () => {
    const fake = await run(["update", "--contact-email", "dev@example.com"], {
      [`PUT ${EDIT}/details`]: {},
    });

    expect(fake.keys()).toEqual([`PUT ${EDIT}/details`]);
  });

  it("sends nothing for an unknown default language", async () => {
    const fake = await run(["update", "--default-language", "xx-XX"]);

    expect(fake.calls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
  });
});
