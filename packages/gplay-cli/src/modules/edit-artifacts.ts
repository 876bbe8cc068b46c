import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  parseIntFlag,
  printOutput,
  requireChoice,
  requireJson,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import { editPath, type Apk, type Bundle } from "../lib/edits.js";
import { missingFlag } from "../lib/errors/catalog.js";
import { assertFile, formatBytes } from "../lib/files.js";
import { collectPages, nextPageToken } from "../lib/pagination.js";
import { logProgress } from "../lib/spinner.js";

type BundlesListResponse = androidpublisher_v3.Schema$BundlesListResponse & {
  nextPageToken?: string | null;
};
type ApksListResponse = androidpublisher_v3.Schema$ApksListResponse;
type ExpansionFile = androidpublisher_v3.Schema$ExpansionFile;

export const DEOBFUSCATION_TYPES = ["proguard", "nativeCode"] as const;
export const EXPANSION_TYPES = ["main", "patch"] as const;

type ArtifactOptions = CommonOptions &
  EditOptions & {
    file?: string;
    json?: string;
    paginate?: boolean;
    apkVersion?: string;
    type?: string;
    referencesVersion?: string;
    fileSize?: string;
  };

function editCommand(parent: Command, name: string, description: string): Command {
  return withEditOption(withCommonOptions(parent.command(name).description(description)));
}

function uploadFile(options: ArtifactOptions, label: string): string {
  const file = requireOption(options.file, "--file");
  const size = assertFile(file);
  logProgress(`Uploading ${label}: ${file} (${formatBytes(size)})`);
  return file;
}

/**
 * Build the expansion file body for update/patch from
 * --references-version and --file-size.
 */
export function expansionBody(options: {
  referencesVersion?: string;
  fileSize?: string;
}): ExpansionFile {
  const body: ExpansionFile = {};
  if (options.referencesVersion !== undefined) {
    body.referencesVersion = parseIntFlag(options.referencesVersion, "--references-version");
  }
  if (options.fileSize !== undefined) {
    body.fileSize = String(parseIntFlag(options.fileSize, "--file-size"));
  }
  if (Object.keys(body).length === 0) {
    throw missingFlag("--references-version or --file-size");
  }
  return body;
}

export function registerBundlesCommands(program: Command, services: Services): void {
  const bundles = program.command("bundles").description("Upload and list app bundles (.aab)");

  editCommand(bundles, "upload", "Upload an app bundle to an edit")
    .option("--file <path>", "path to the .aab file")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        const file = uploadFile(options, "bundle");
        const bundle = await services.publisher.upload<Bundle>(
          editPath(packageName, editId, "bundles"),
          file
        );
        printOutput(bundle, options);
      })
    );

  editCommand(bundles, "list", "List bundles in an edit")
    .option("--paginate", "fetch every page")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        const path = editPath(packageName, editId, "bundles");
        if (!options.paginate) {
          printOutput(await services.publisher.get<BundlesListResponse>(path), options);
          return;
        }
        const all = await collectPages(
          (pageToken) =>
            services.publisher.get<BundlesListResponse>(path, { query: { pageToken } }),
          { items: (page) => page.bundles, nextToken: nextPageToken }
        );
        printOutput({ kind: "androidpublisher#bundlesListResponse", bundles: all }, options);
      })
    );
}

export function registerApksCommands(program: Command, services: Services): void {
  const apks = program.command("apks").description("Upload and list APKs");

  editCommand(apks, "upload", "Upload an APK to an edit")
    .option("--file <path>", "path to the .apk file")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        const file = uploadFile(options, "APK");
        const apk = await services.publisher.upload<Apk>(editPath(packageName, editId, "apks"), file);
        printOutput(apk, options);
      })
    );

  editCommand(apks, "list", "List APKs in an edit").action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<ApksListResponse>(editPath(packageName, editId, "apks")),
        options
      );
    })
  );

  editCommand(apks, "addexternallyhosted", "Register an externally hosted APK (enterprise apps)")
    .option("--json <json>", "ExternallyHostedApk request body or @file")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const body = requireJson(options.json);
        const packageName = requirePackage(services, options.package);
        const result = await services.publisher.post<unknown>(
          editPath(packageName, editId, "apks", "externallyHosted"),
          body
        );
        printOutput(result, options);
      })
    );
}

export function registerDeobfuscationCommands(program: Command, services: Services): void {
  const deobfuscation = program
    .command("deobfuscation")
    .description("Upload ProGuard mappings and native debug symbols");

  editCommand(deobfuscation, "upload", "Upload a deobfuscation file for an APK version")
    .option("--apk-version <code>", "version code the file belongs to")
    .option("--type <type>", "proguard or nativeCode", "proguard")
    .option("--file <path>", "mapping.txt or native symbols zip")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const versionCode = parseIntFlag(options.apkVersion, "--apk-version");
        const type = requireChoice(options.type, "--type", DEOBFUSCATION_TYPES);
        const packageName = requirePackage(services, options.package);
        const file = uploadFile(options, "deobfuscation file");
        const result = await services.publisher.upload<unknown>(
          editPath(packageName, editId, "apks", versionCode, "deobfuscationFiles", type),
          file
        );
        printOutput(result, options);
      })
    );
}

export function registerExpansionCommands(program: Command, services: Services): void {
  const expansion = program
    .command("expansion")
    .description("Manage APK expansion files (OBB)");

  const withTarget = (cmd: Command) =>
    cmd
      .option("--apk-version <code>", "APK version code")
      .option("--type <type>", "main or patch", "main");

  const target = (options: ArtifactOptions) => {
    const editId = requireOption(options.edit, "--edit");
    const versionCode = parseIntFlag(options.apkVersion, "--apk-version");
    const type = requireChoice(options.type, "--type", EXPANSION_TYPES);
    const packageName = requirePackage(services, options.package);
    return editPath(packageName, editId, "apks", versionCode, "expansionFiles", type);
  };

  withTarget(editCommand(expansion, "get", "Get the expansion file of an APK")).action(
    action(async (options: ArtifactOptions) => {
      validateOutputOptions(options);
      printOutput(await services.publisher.get<ExpansionFile>(target(options)), options);
    })
  );

  for (const name of ["update", "patch"] as const) {
    withTarget(
      editCommand(
        expansion,
        name,
        name === "update" ? "Replace the expansion file reference" : "Patch the expansion file reference"
      )
    )
      .option("--references-version <code>", "reuse the expansion file of another APK version")
      .option("--file-size <bytes>", "size of the expansion file")
      .action(
        action(async (options: ArtifactOptions) => {
          validateOutputOptions(options);
          const body = expansionBody(options);
          const path = target(options);
          const result =
            name === "update"
              ? await services.publisher.put<ExpansionFile>(path, body)
              : await services.publisher.patch<ExpansionFile>(path, body);
          printOutput(result, options);
        })
      );
  }

  withTarget(editCommand(expansion, "upload", "Upload a new expansion file"))
    .option("--file <path>", "path to the .obb file")
    .action(
      action(async (options: ArtifactOptions) => {
        validateOutputOptions(options);
        const path = target(options);
        const file = uploadFile(options, "expansion file");
        printOutput(await services.publisher.upload<unknown>(path, file), options);
      })
    );
}
