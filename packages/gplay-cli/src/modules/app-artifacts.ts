import { Command } from "commander";
import { join } from "path";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  parseIntFlag,
  printOutput,
  requireJson,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  type CommonOptions,
} from "../lib/command.js";
import { appPath } from "../lib/edits.js";
import { assertFile, formatBytes } from "../lib/files.js";
import { logProgress } from "../lib/spinner.js";

type GeneratedApksListResponse = androidpublisher_v3.Schema$GeneratedApksListResponse;
type Variant = androidpublisher_v3.Schema$Variant;
type SystemApksListResponse = androidpublisher_v3.Schema$SystemApksListResponse;
type InternalAppSharingArtifact = androidpublisher_v3.Schema$InternalAppSharingArtifact;

type ArtifactOptions = CommonOptions & {
  versionCode?: string;
  id?: string;
  variantId?: string;
  out: string;
  file?: string;
  json?: string;
};

export interface DownloadSummary {
  downloaded: true;
  path: string;
  size: number;
}

/** `applications/internalappsharing/<pkg>/artifacts/<kind>` */
export function internalSharingPath(packageName: string, kind: "apk" | "bundle"): string {
  return ["applications", "internalappsharing", packageName, "artifacts", kind]
    .map(encodeURIComponent)
    .join("/");
}

export function registerGeneratedApksCommands(program: Command, services: Services): void {
  const generated = program
    .command("generatedapks")
    .description("List and download APKs Google Play generated from a bundle");

  withCommonOptions(
    generated
      .command("list")
      .description("List generated APKs for a bundle version")
      .option("--version-code <code>", "version code of the app bundle")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const packageName = requirePackage(services, options.package);
      const response = await services.publisher.get<GeneratedApksListResponse>(
        appPath(packageName, "generatedApks", versionCode)
      );
      printOutput(response, options);
    })
  );

  withCommonOptions(
    generated
      .command("download")
      .description("Download one generated APK")
      .option("--version-code <code>", "version code of the app bundle")
      .option("--id <downloadId>", "download ID from generatedapks list")
      .option("--out <dir>", "directory to write the APK to", ".")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const downloadId = requireOption(options.id, "--id");
      const packageName = requirePackage(services, options.package);
      const target = join(options.out, `${packageName}_${versionCode}_${downloadId}.apk`);
      logProgress(`Downloading generated APK to ${target}`);
      const result = await services.publisher.download(
        `${appPath(packageName, "generatedApks", versionCode, "downloads", downloadId)}:download`,
        target,
        { query: { alt: "media" } }
      );
      const summary: DownloadSummary = { downloaded: true, path: result.path, size: result.size };
      printOutput(summary, options);
    })
  );
}

export function registerInternalSharingCommands(program: Command, services: Services): void {
  const sharing = program
    .command("internalsharing")
    .description("Upload artifacts for internal app sharing");

  for (const kind of ["apk", "bundle"] as const) {
    withCommonOptions(
      sharing
        .command(`upload-${kind}`)
        .description(`Upload ${kind === "apk" ? "an APK" : "an app bundle"} and get a sharing link`)
        .option("--file <path>", `path to the ${kind === "apk" ? ".apk" : ".aab"} file`)
    ).action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const file = requireOption(options.file, "--file");
        const packageName = requirePackage(services, options.package);
        const size = assertFile(file);
        logProgress(`Uploading ${kind}: ${file} (${formatBytes(size)})`);
        const artifact = await services.publisher.upload<InternalAppSharingArtifact>(
          internalSharingPath(packageName, kind),
          file
        );
        printOutput(artifact, options);
      })
    );
  }
}

export function registerSystemApksCommands(program: Command, services: Services): void {
  const variants = program
    .command("systemapks")
    .description("Manage system APKs for device manufacturers")
    .command("variants")
    .description("System APK variants of a bundle version");

  const variantsPath = (packageName: string, versionCode: number) =>
    appPath(packageName, "systemApks", versionCode, "variants");

  withCommonOptions(
    variants
      .command("list")
      .description("List system APK variants")
      .option("--version-code <code>", "version code of the app bundle")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<SystemApksListResponse>(variantsPath(packageName, versionCode)),
        options
      );
    })
  );

  withCommonOptions(
    variants
      .command("get")
      .description("Get one system APK variant")
      .option("--version-code <code>", "version code of the app bundle")
      .option("--variant-id <id>", "variant ID")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const variantId = parseIntFlag(options.variantId, "--variant-id");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<Variant>(
          `${variantsPath(packageName, versionCode)}/${variantId}`
        ),
        options
      );
    })
  );

  withCommonOptions(
    variants
      .command("create")
      .description("Create a system APK variant")
      .option("--version-code <code>", "version code of the app bundle")
      .option("--json <json>", "Variant body (deviceSpec, options) or @file")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const body = requireJson(options.json);
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.post<Variant>(variantsPath(packageName, versionCode), body),
        options
      );
    })
  );

  withCommonOptions(
    variants
      .command("download")
      .description("Download a system APK variant")
      .option("--version-code <code>", "version code of the app bundle")
      .option("--variant-id <id>", "variant ID")
      .option("--out <dir>", "directory to write the APK to", ".")
  ).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const versionCode = parseIntFlag(options.versionCode, "--version-code");
      const variantId = parseIntFlag(options.variantId, "--variant-id");
      const packageName = requirePackage(services, options.package);
      const target = join(options.out, `${packageName}_${versionCode}_variant_${variantId}.apk`);
      logProgress(`Downloading system APK to ${target}`);
      const result = await services.publisher.download(
        `${variantsPath(packageName, versionCode)}/${variantId}:download`,
        target,
        { query: { alt: "media" } }
      );
      const summary: DownloadSummary = { downloaded: true, path: result.path, size: result.size };
      printOutput(summary, options);
    })
  );
}
