import JSZip from "jszip";
import { existsSync, readFileSync, statSync } from "fs";
import { basename, join } from "path";
import { formatBytes } from "./files.js";
import { errorMessage } from "./errors/types.js";
import {
  IMAGES_DIR,
  listImageFiles,
  listLocaleDirs,
  readLocaleListing,
  SCREENSHOT_TYPES,
  type ListingText,
  type MetadataFormat,
} from "./metadata.js";

export const LIMITS = {
  title: 30,
  shortDescription: 80,
  fullDescription: 4000,
  minScreenshots: 2,
  maxScreenshots: 8,
} as const;

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
  warnings?: string[];
  details?: Record<string, unknown>;
}

class ResultBuilder {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];
  readonly details: Record<string, unknown> = {};

  error(message: string): void {
    this.errors.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  build(): ValidationResult {
    const result: ValidationResult = { valid: this.errors.length === 0 };
    if (this.errors.length > 0) result.errors = this.errors;
    if (this.warnings.length > 0) result.warnings = this.warnings;
    if (Object.keys(this.details).length > 0) result.details = this.details;
    return result;
  }
}

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

const REQUIRED_BUNDLE_ENTRIES = ["BundleConfig.pb", "base/"];

/**
 * Check that a file looks like an Android App Bundle: a zip archive with
 * BundleConfig.pb and a base module.
 */
export async function validateBundle(filePath: string): Promise<ValidationResult> {
  const result = new ResultBuilder();

  if (!existsSync(filePath) || statSync(filePath).isDirectory()) {
    result.error(`File not found: ${filePath}`);
    return result.build();
  }

  const size = statSync(filePath).size;
  result.details.fileName = basename(filePath);
  result.details.fileSize = size;
  result.details.fileSizeHuman = formatBytes(size);

  if (!filePath.toLowerCase().endsWith(".aab")) {
    result.warn("File does not have .aab extension");
  }

  let entries: string[];
  try {
    const zip = await JSZip.loadAsync(readFileSync(filePath));
    entries = Object.keys(zip.files);
  } catch (err) {
    result.error(`Not a valid ZIP archive: ${errorMessage(err)}`);
    return result.build();
  }

  for (const required of REQUIRED_BUNDLE_ENTRIES) {
    if (!entries.some((name) => name.startsWith(required))) {
      result.error(`Missing required component: ${required}`);
    }
  }
  result.details.fileCount = entries.length;

  return result.build();
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

interface FieldCheck {
  present: boolean;
  length: number;
  maxLength: number;
  valid: boolean;
}

/** Length in Unicode code points, the way Play Console counts characters. */
export function charLength(value: string): number {
  return Array.from(value).length;
}

function checkField(value: string, maxLength: number): FieldCheck {
  const length = charLength(value);
  return { present: value !== "", length, maxLength, valid: length <= maxLength };
}

function localesFor(dir: string, locale: string | undefined): string[] {
  const only = locale?.trim();
  return only ? [only] : listLocaleDirs(dir);
}

/**
 * Validate store listing text under `<dir>/<locale>/`.
 */
export function validateListings(
  dir: string,
  format: MetadataFormat,
  locale?: string
): ValidationResult {
  const result = new ResultBuilder();
  let locales: string[];
  try {
    locales = localesFor(dir, locale);
  } catch (err) {
    result.error(`Cannot read directory: ${errorMessage(err)}`);
    return result.build();
  }

  const perLocale: Record<string, unknown> = {};
  for (const loc of locales) {
    let listing: ListingText | undefined;
    try {
      listing = readLocaleListing(join(dir, loc), format);
    } catch (err) {
      result.error(`[${loc}] ${errorMessage(err)}`);
      continue;
    }
    if (!listing) {
      result.warn(`[${loc}] no listing files found`);
      continue;
    }

    const title = checkField(listing.title, LIMITS.title);
    const shortDescription = checkField(listing.shortDescription, LIMITS.shortDescription);
    const fullDescription = checkField(listing.fullDescription, LIMITS.fullDescription);

    if (!title.present) result.error(`[${loc}] Title is empty`);
    if (!title.valid) {
      result.error(`[${loc}] Title too long: ${title.length}/${LIMITS.title} characters`);
    }
    if (!shortDescription.present) result.warn(`[${loc}] Short description is empty`);
    if (!shortDescription.valid) {
      result.error(
        `[${loc}] Short description too long: ${shortDescription.length}/${LIMITS.shortDescription} characters`
      );
    }
    if (!fullDescription.present) result.warn(`[${loc}] Full description is empty`);
    if (!fullDescription.valid) {
      result.error(
        `[${loc}] Full description too long: ${fullDescription.length}/${LIMITS.fullDescription} characters`
      );
    }

    perLocale[loc] = { title, shortDescription, fullDescription };
  }

  result.details.locales = perLocale;
  result.details.localeCount = locales.length;
  return result.build();
}

// ---------------------------------------------------------------------------
// Screenshots
// ---------------------------------------------------------------------------

/**
 * Count screenshots in `<dir>/<locale>/images/<type>/` for each screenshot
 * type: fewer than the minimum warns, more than the maximum fails.
 */
export function validateScreenshots(dir: string, locale?: string): ValidationResult {
  const result = new ResultBuilder();
  let locales: string[];
  try {
    locales = localesFor(dir, locale);
  } catch (err) {
    result.error(`Cannot read directory: ${errorMessage(err)}`);
    return result.build();
  }

  const perLocale: Record<string, Record<string, unknown>> = {};
  for (const loc of locales) {
    const counts: Record<string, unknown> = {};
    for (const type of SCREENSHOT_TYPES) {
      const typeDir = join(dir, loc, IMAGES_DIR, type);
      if (!existsSync(typeDir)) continue;

      const count = listImageFiles(typeDir).length;
      const valid = count <= LIMITS.maxScreenshots;
      if (count > 0 && count < LIMITS.minScreenshots) {
        result.warn(
          `[${loc}] ${type} has ${count} screenshots (minimum recommended: ${LIMITS.minScreenshots})`
        );
      }
      if (!valid) {
        result.error(
          `[${loc}] ${type} has ${count} screenshots (maximum: ${LIMITS.maxScreenshots})`
        );
      }
      counts[type] = { count, maxCount: LIMITS.maxScreenshots, valid };
    }
    perLocale[loc] = counts;
  }

  result.details.locales = perLocale;
  return result.build();
}
