import { Command } from "commander";
import chalk from "chalk";
import { mkdirSync, writeFileSync } from "fs";
import { basename, join } from "path";
import type { androidpublisher_v3 } from "googleapis";
import type { ApiClient } from "../lib/api-client.js";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import { isDryRun } from "../lib/cli-context.js";
import {
  editPath,
  step,
  withEdit,
  type Listing,
  type ListingsListResponse,
} from "../lib/edits.js";
import { errorMessage } from "../lib/errors/types.js";
import {
  IMAGE_TYPES,
  IMAGES_DIR,
  listLocaleDirs,
  parseMetadataFormat,
  readListingsDir,
  readLocaleImages,
  SCREENSHOT_TYPES,
  truncate,
  writeLocaleListing,
  type ImageType,
  type ListingText,
  type MetadataFormat,
} from "../lib/metadata.js";
import { validateLocale } from "../lib/locales.js";
import { formatOutput, resolveOutputFormat } from "../lib/output/format.js";
import { logProgress } from "../lib/spinner.js";

type ImagesListResponse = androidpublisher_v3.Schema$ImagesListResponse;

type SyncOptions = CommonOptions &
  EditOptions & { dir: string; format?: string; locale?: string };

type Progress = (message: string) => void;

export function toListingText(listing: Listing): ListingText {
  return {
    title: listing.title ?? "",
    shortDescription: listing.shortDescription ?? "",
    fullDescription: listing.fullDescription ?? "",
    video: listing.video ?? "",
  };
}

async function fetchListings(client: ApiClient, packageName: string, editId: string): Promise<Listing[]> {
  const response = await step("failed to list listings", () =>
    client.get<ListingsListResponse>(editPath(packageName, editId, "listings"))
  );
  return response.listings ?? [];
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

export async function exportListings(
  client: ApiClient,
  packageName: string,
  editId: string,
  dir: string,
  format: MetadataFormat,
  progress: Progress = logProgress
): Promise<string[]> {
  const listings = await fetchListings(client, packageName, editId);
  mkdirSync(dir, { recursive: true });
  const exported: string[] = [];
  for (const listing of listings) {
    if (!listing.language) continue;
    writeLocaleListing(dir, listing.language, toListingText(listing), format, listing);
    progress(`Exported: ${listing.language}`);
    exported.push(listing.language);
  }
  progress(`Exported ${exported.length} listings to ${dir}`);
  return exported;
}

/**
 * PUT every local locale that has listing text. Under --dry-run nothing is
 * sent and each locale is reported instead.
 */
export async function importListings(
  client: ApiClient,
  packageName: string,
  editId: string,
  dir: string,
  format: MetadataFormat,
  progress: Progress = logProgress
): Promise<string[]> {
  const dryRun = isDryRun();
  const imported: string[] = [];
  for (const [locale, text] of readListingsDir(dir, format)) {
    if (dryRun) {
      progress(`Would import: ${locale} (title: "${truncate(text.title, 30)}")`);
    } else {
      const body: Listing = { language: locale, ...text };
      await step(`failed to update listing for ${locale}`, () =>
        client.put<Listing>(editPath(packageName, editId, "listings", locale), body)
      );
      progress(`Imported: ${locale}`);
    }
    imported.push(locale);
  }
  progress(
    dryRun
      ? `Dry run: would import ${imported.length} listings`
      : `Imported ${imported.length} listings`
  );
  return imported;
}

/**
 * Describe how local listings differ from the remote ones, one line per
 * locale. Empty when they match.
 */
export function diffListings(remote: Listing[], local: Map<string, ListingText>): string[] {
  const remoteByLocale = new Map<string, ListingText>();
  for (const listing of remote) {
    if (listing.language) remoteByLocale.set(listing.language, toListingText(listing));
  }

  const lines: string[] = [];
  for (const locale of [...remoteByLocale.keys()].sort()) {
    if (!local.has(locale)) lines.push(`- ${locale} (only in remote)`);
  }
  for (const locale of [...local.keys()].sort()) {
    if (!remoteByLocale.has(locale)) lines.push(`+ ${locale} (only in local)`);
  }
  for (const locale of [...local.keys()].sort()) {
    const mine = local.get(locale);
    const theirs = remoteByLocale.get(locale);
    if (!mine || !theirs) continue;

    const changes: string[] = [];
    if (mine.title !== theirs.title) {
      changes.push(`title: "${truncate(theirs.title, 20)}" -> "${truncate(mine.title, 20)}"`);
    }
    if (mine.shortDescription !== theirs.shortDescription) changes.push("short_description changed");
    if (mine.fullDescription !== theirs.fullDescription) changes.push("full_description changed");
    if (mine.video !== theirs.video) {
      changes.push(`video: "${theirs.video}" -> "${mine.video}"`);
    }
    if (changes.length > 0) lines.push(`~ ${locale}: ${changes.join(", ")}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

function isScreenshotType(type: ImageType): boolean {
  return SCREENSHOT_TYPES.some((screenshot) => screenshot === type);
}

/**
 * Write the image metadata (ids, URLs, hashes) of every locale and type to
 * `<dir>/<locale>/images/[<type>/]<type>_meta.json`. Types the API cannot
 * list for a locale are skipped.
 */
export async function exportImages(
  client: ApiClient,
  packageName: string,
  editId: string,
  dir: string,
  locale: string | undefined,
  progress: Progress = logProgress
): Promise<number> {
  const locales = locale
    ? [locale]
    : (await fetchListings(client, packageName, editId)).flatMap((l) => (l.language ? [l.language] : []));

  let exported = 0;
  for (const loc of locales) {
    for (const type of IMAGE_TYPES) {
      let response: ImagesListResponse;
      try {
        response = await client.get<ImagesListResponse>(
          editPath(packageName, editId, "listings", loc, type)
        );
      } catch (err) {
        progress(`Skipped ${loc}/${type}: ${errorMessage(err)}`);
        continue;
      }
      const images = response.images ?? [];
      if (images.length === 0) continue;

      const target = isScreenshotType(type)
        ? join(dir, loc, IMAGES_DIR, type)
        : join(dir, loc, IMAGES_DIR);
      mkdirSync(target, { recursive: true });
      writeFileSync(join(target, `${type}_meta.json`), JSON.stringify(images, null, 2));
      progress(`Exported metadata for ${images.length} ${type} images in ${loc}`);
      exported += images.length;
    }
  }
  progress(`Exported metadata for ${exported} images to ${dir}`);
  progress("Note: image files must be downloaded from the Play Console");
  return exported;
}

/**
 * Upload every image file found under `<dir>/<locale>/images/`. A failed
 * upload is reported and the rest continue.
 */
export async function importImages(
  client: ApiClient,
  packageName: string,
  editId: string,
  dir: string,
  locale: string | undefined,
  progress: Progress = logProgress
): Promise<{ uploaded: number; failed: number }> {
  const dryRun = isDryRun();
  const locales = locale ? [locale] : listLocaleDirs(dir);
  let uploaded = 0;
  let failed = 0;

  for (const loc of locales) {
    for (const [type, files] of readLocaleImages(join(dir, loc))) {
      for (const file of files) {
        if (dryRun) {
          progress(`Would upload: ${file} -> ${loc}/${type}`);
          uploaded++;
          continue;
        }
        try {
          await client.upload<unknown>(editPath(packageName, editId, "listings", loc, type), file);
          progress(`Uploaded: ${basename(file)} -> ${loc}/${type}`);
          uploaded++;
        } catch (err) {
          progress(`Warning: failed to upload ${file}: ${errorMessage(err)}`);
          failed++;
        }
      }
    }
  }
  progress(dryRun ? `Dry run: would upload ${uploaded} images` : `Uploaded ${uploaded} images`);
  return { uploaded, failed };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

function syncCommand(parent: Command, name: string, description: string, editRequired: boolean): Command {
  return withEditOption(withCommonOptions(parent.command(name).description(description)), editRequired)
    .option("--dir <path>", "metadata directory", "./metadata");
}

export function registerSyncCommands(program: Command, services: Services): void {
  const sync = program
    .command("sync")
    .description("Sync store listings and images with a local metadata directory")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Layout:")}
  <dir>/<locale>/title.txt, short_description.txt, full_description.txt, video.txt
  <dir>/<locale>/listing.json           (with --format json)
  <dir>/<locale>/images/<type>/...      (screenshots)

${chalk.bold.cyan("Examples:")}
  gplay sync export-listings --package com.example.app --dir ./metadata
  gplay sync diff-listings --package com.example.app
  gplay --dry-run sync import-listings --package com.example.app --edit <id>
`
    );

  const notifyTemporary = (temporary: boolean) => {
    if (temporary) logProgress("Note: used a temporary edit (deleted automatically)");
  };

  syncCommand(sync, "export-listings", "Write remote listings to the metadata directory", false)
    .option("--format <format>", "fastlane or json", "fastlane")
    .action(
      action(async (options: SyncOptions) => {
        validateOutputOptions(options);
        const format = parseMetadataFormat(options.format);
        const packageName = requirePackage(services, options.package);
        const locales = await withEdit(services.publisher, packageName, options.edit, async (editId, temporary) => {
          const exported = await exportListings(services.publisher, packageName, editId, options.dir, format);
          notifyTemporary(temporary);
          return exported;
        });
        printOutput({ dir: options.dir, locales, total: locales.length }, options);
      })
    );

  syncCommand(sync, "import-listings", "Upload local listings into an edit", true)
    .option("--format <format>", "fastlane or json", "fastlane")
    .action(
      action(async (options: SyncOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const format = parseMetadataFormat(options.format);
        const packageName = requirePackage(services, options.package);
        const locales = await importListings(services.publisher, packageName, editId, options.dir, format);
        printOutput({ editId, locales, total: locales.length, dryRun: isDryRun() }, options);
      })
    );

  syncCommand(sync, "diff-listings", "Compare local listings with the remote ones", false)
    .option("--format <format>", "fastlane or json", "fastlane")
    .action(
      action(async (options: SyncOptions) => {
        validateOutputOptions(options);
        const format = parseMetadataFormat(options.format);
        const packageName = requirePackage(services, options.package);
        const local = readListingsDir(options.dir, format);
        const remote = await withEdit(services.publisher, packageName, options.edit, async (editId, temporary) => {
          const listings = await fetchListings(services.publisher, packageName, editId);
          notifyTemporary(temporary);
          return listings;
        });
        const lines = diffListings(remote, local);
        if (options.output?.trim() || services.env.GPLAY_DEFAULT_OUTPUT?.trim()) {
          const format = resolveOutputFormat(options.output, services.env);
          const report = { differences: lines, identical: lines.length === 0 };
          console.log(formatOutput(report, format, options.pretty ?? false));
          return;
        }
        console.log(lines.length > 0 ? lines.join("\n") : "No differences found");
      })
    );

  syncCommand(sync, "export-images", "Write image metadata to the metadata directory", false)
    .option("--locale <code>", "only this locale")
    .action(
      action(async (options: SyncOptions) => {
        validateOutputOptions(options);
        const locale = options.locale !== undefined ? validateLocale(options.locale) : undefined;
        const packageName = requirePackage(services, options.package);
        const exported = await withEdit(services.publisher, packageName, options.edit, async (editId, temporary) => {
          const count = await exportImages(services.publisher, packageName, editId, options.dir, locale);
          notifyTemporary(temporary);
          return count;
        });
        printOutput({ dir: options.dir, images: exported }, options);
      })
    );

  syncCommand(sync, "import-images", "Upload local images into an edit", true)
    .option("--locale <code>", "only this locale")
    .action(
      action(async (options: SyncOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const locale = options.locale !== undefined ? validateLocale(options.locale) : undefined;
        const packageName = requirePackage(services, options.package);
        const result = await importImages(services.publisher, packageName, editId, options.dir, locale);
        printOutput({ editId, ...result, dryRun: isDryRun() }, options);
        if (result.failed > 0) {
          process.exitCode = 1;
        }
      })
    );
}
