import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { diffListings, exportListings, importImages, importListings, registerSyncCommands } from "./sync.js";
import { createFakeApiClient } from "../lib/testing/fake-api-client.js";
import { createTestServices } from "../lib/testing/test-services.js";
import { resetContext, updateContext } from "../lib/cli-context.js";

const PKG = "com.example.app";
const EDIT = `applications/${PKG}/edits/e1`;

const text = (title: string, extra: Partial<Record<string, string>> = {}) => ({
  title,
  shortDescription: extra.shortDescription ?? "",
  fullDescription: extra.fullDescription ?? "",
  video: extra.video ?? "",
});

describe("diffListings", () => {
  it("reports locales on one side and changed fields", () => {
    const lines = diffListings(
      [
        { language: "en-US", title: "Notes", shortDescription: "Take notes" },
        { language: "fr-FR", title: "Notes" },
      ],
      new Map([
        ["en-US", text("Notes Pro", { shortDescription: "Take notes fast" })],
        ["de-DE", text("Notizen")],
      ])
    );

    expect(lines).toEqual([
      "- fr-FR (only in remote)",
      "+ de-DE (only in local)",
      '~ en-US: title: "Notes" -> "Notes Pro", short_description changed',
    ]);
  });

  it("is empty when everything matches", () => {
    expect(diffListings([{ language: "en-US", title: "Notes" }], new Map([["en-US", text("Notes")]]))).toEqual(
      []
    );
  });
});

describe("listing files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gplay-sync-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    resetContext();
  });

  it("exports remote listings in fastlane layout", async () => {
    const fake = createFakeApiClient({
      [`GET ${EDIT}/listings`]: {
        listings: [{ language: "en-US", title: "Notes", fullDescription: "All your notes" }],
      },
    });
    const progress: string[] = [];

    const locales = await exportListings(fake.client, PKG, "e1", dir, "fastlane", (m) => progress.push(m));

    expect(locales).toEqual(["en-US"]);
    expect(readFileSync(join(dir, "en-US", "title.txt"), "utf-8")).toBe("Notes");
    expect(readFileSync(join(dir, "en-US", "full_description.txt"), "utf-8")).toBe("All your notes");
    expect(existsSync(join(dir, "en-US", "short_description.txt"))).toBe(false);
    expect(progress).toEqual(["Exported: en-US", `Exported 1 listings to ${dir}`]);
  });

  it("imports locales with text and skips empty ones", async () => {
    mkdirSync(join(dir, "en-US"));
    writeFileSync(join(dir, "en-US", "title.txt"), "Notes\n");
    mkdirSync(join(dir, "fr-FR"));
    const fake = createFakeApiClient({ [`PUT ${EDIT}/listings/en-US`]: {} });

    const locales = await importListings(fake.client, PKG, "e1", dir, "fastlane", () => {});

    expect(locales).toEqual(["en-US"]);
    expect(fake.calls[0].body).toEqual({
      language: "en-US",
      title: "Notes",
      shortDescription: "",
      fullDescription: "",
      video: "",
    });
  });

  it("only reports what it would import under --dry-run", async () => {
    updateContext({ dryRun: true });
    mkdirSync(join(dir, "en-US"));
    writeFileSync(join(dir, "en-US", "title.txt"), "Notes");
    const fake = createFakeApiClient();
    const progress: string[] = [];

    await importListings(fake.client, PKG, "e1", dir, "fastlane", (m) => progress.push(m));

    expect(fake.calls).toHaveLength(0);
    expect(progress).toEqual([
      'Would import: en-US (title: "Notes")',
      "Dry run: would import 1 listings",
    ]);
  });

  it("keeps uploading images after a failure", async () => {
    mkdirSync(join(dir, "en-US", "images", "phoneScreenshots"), { recursive: true });
    writeFileSync(join(dir, "en-US", "images", "icon.png"), "png");
    writeFileSync(join(dir, "en-US", "images", "phoneScreenshots", "1.png"), "png");
    const fake = createFakeApiClient({
      [`UPLOAD ${EDIT}/listings/en-US/icon`]: () => {
        throw new Error("image too small");
      },
      [`UPLOAD ${EDIT}/listings/en-US/phoneScreenshots`]: { image: { id: "i1" } },
    });
    const progress: string[] = [];

    const result = await importImages(fake.client, PKG, "e1", dir, undefined, (m) => progress.push(m));

    expect(result).toEqual({ uploaded: 1, failed: 1 });
    expect(progress).toEqual([
      `Warning: failed to upload ${join(dir, "en-US", "images", "icon.png")}: image too small`,
      "Uploaded: 1.png -> en-US/phoneScreenshots",
      "Uploaded 1 images",
    ]);
  });
});

describe("sync diff-listings", () => {
  let dir: string;
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gplay-diff-"));
    for (const locale of ["en-US", "fr-FR"]) {
      mkdirSync(join(dir, locale));
      writeFileSync(join(dir, locale, "title.txt"), "Notes");
    }
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  async function diff(args: string[], env: NodeJS.ProcessEnv = {}) {
    const publisher = createFakeApiClient({
      [`GET ${EDIT}/listings`]: { listings: [{ language: "en-US", title: "Notes" }] },
    });
    const program = new Command();
    program.exitOverride();
    registerSyncCommands(program, createTestServices({ publisher: publisher.client, env }));
    await program.parseAsync([
      "node",
      "test",
      "sync",
      "diff-listings",
      "--package",
      PKG,
      "--edit",
      "e1",
      "--dir",
      dir,
      ...args,
    ]);
  }

  it("prints diff lines without a requested format", async () => {
    await diff([]);

    expect(consoleLogSpy).toHaveBeenCalledWith("+ fr-FR (only in local)");
  });

  it("prints JSON when GPLAY_DEFAULT_OUTPUT asks for it", async () => {
    await diff([], { GPLAY_DEFAULT_OUTPUT: "json" });

    expect(consoleLogSpy).toHaveBeenCalledWith(
      '{"differences":["+ fr-FR (only in local)"],"identical":false}'
    );
  });

  it("renders a markdown table for --output md", async () => {
    await diff(["--output", "md"]);

    expect(consoleLogSpy).toHaveBeenCalledWith("| value |\n| --- |\n| + fr-FR (only in local) |");
  });
});
