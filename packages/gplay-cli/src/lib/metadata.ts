import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "fs";
import { extname, join } from "path";
import { z } from "zod";
import { invalidFlag, invalidJson } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import { readTextArg } from "./json-arg.js";

// ---------------------------------------------------------------------------
// Release notes
// ---------------------------------------------------------------------------

export interface LocalizedText {
  language: string;
  text: string;
}

const ReleaseNotesSchema = z.array(
  z.object({
    language: z.string().optional(),
    text: z.string().optional(),
  })
);

function parseReleaseNotesJson(raw: string): LocalizedText[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw invalidJson("--release-notes", errorMessage(err));
  }

  const result = ReleaseNotesSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidFlag(
      'invalid release notes JSON: expected [{"language": "en-US", "text": "..."}]'
    );
  }

  const notes: LocalizedText[] = [];
  result.data.forEach((note, index) => {
    const language = note.language?.trim();
    const text = note.text?.trim();
    if (!language) {
      throw invalidFlag(`release note at index ${index} is missing language`);
    }
    if (!text) {
      throw invalidFlag(`release note at index ${index} is missing text`);
    }
    notes.push({ language, text });
  });

  if (notes.length === 0) {
    throw invalidFlag("release notes JSON array is empty");
  }
  return notes;
}

/**
 * Parse --release-notes: plain text (en-US), a JSON array of
 * {language, text}, or @file holding either form.
 */
export function parseReleaseNotes(input: string): LocalizedText[] {
  const trimmed = readTextArg(input.trim()).trim();
  if (trimmed === "") {
    throw invalidFlag("release notes input is empty");
  }
  if (trimmed.startsWith("[")) {
    return parseReleaseNotesJson(trimmed);
  }
  return [{ language: "en-US", text: trimmed }];
}

// ---------------------------------------------------------------------------
// Listing directories
// ---------------------------------------------------------------------------

export type MetadataFormat = "fastlane" | "json";

export const METADATA_FORMATS: MetadataFormat[] = ["fastlane", "json"];

export interface ListingText {
  title: string;
  shortDescription: string;
  fullDescription: string;
  video: string;
}

export const LISTING_FILES = {
  title: "title.txt",
  shortDescription: "short_description.txt",
  fullDescription: "full_description.txt",
  video: "video.txt",
} as const satisfies Record<keyof ListingText, string>;

const LISTING_KEYS: Array<keyof ListingText> = [
  "title",
  "shortDescription",
  "fullDescription",
  "video",
];

export const LISTING_JSON_FILE = "listing.json";
export const IMAGES_DIR = "images";

const ListingJsonSchema = z
  .object({
    title: z.string().optional(),
    shortDescription: z.string().optional(),
    fullDescription: z.string().optional(),
    video: z.string().optional(),
  })
  .passthrough();

export function parseMetadataFormat(value: string | undefined): MetadataFormat {
  const format = (value ?? "fastlane").trim();
  if (format === "fastlane" || format === "json") {
    return format;
  }
  throw invalidFlag(`--format must be fastlane or json, got: ${format}`, METADATA_FORMATS);
}

function readTrimmed(path: string): string {
  return existsSync(path) ? readFileSync(path, "utf-8").trim() : "";
}

export function hasListingText(listing: ListingText): boolean {
  return (
    listing.title !== "" ||
    listing.shortDescription !== "" ||
    listing.fullDescription !== "" ||
    listing.video !== ""
  );
}

/**
 * Read one locale directory. Returns undefined when the locale has no
 * listing files at all.
 */
export function readLocaleListing(localeDir: string, format: MetadataFormat): ListingText | undefined {
  if (format === "json") {
    const path = join(localeDir, LISTING_JSON_FILE);
    if (!existsSync(path)) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw invalidJson(path, errorMessage(err));
    }
    const result = ListingJsonSchema.safeParse(parsed);
    if (!result.success) {
      throw invalidJson(path, "expected an object with title, shortDescription, fullDescription");
    }
    return {
      title: result.data.title ?? "",
      shortDescription: result.data.shortDescription ?? "",
      fullDescription: result.data.fullDescription ?? "",
      video: result.data.video ?? "",
    };
  }

  const listing: ListingText = {
    title: readTrimmed(join(localeDir, LISTING_FILES.title)),
    shortDescription: readTrimmed(join(localeDir, LISTING_FILES.shortDescription)),
    fullDescription: readTrimmed(join(localeDir, LISTING_FILES.fullDescription)),
    video: readTrimmed(join(localeDir, LISTING_FILES.video)),
  };
  return hasListingText(listing) ? listing : undefined;
}

/** Locale subdirectories of a metadata directory, sorted. */
export function listLocaleDirs(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw invalidFlag(`metadata directory not found: ${dir}`);
  }
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Read every locale with listing text from `<dir>/<locale>/`.
 */
export function readListingsDir(dir: string, format: MetadataFormat): Map<string, ListingText> {
  const listings = new Map<string, ListingText>();
  for (const locale of listLocaleDirs(dir)) {
    const listing = readLocaleListing(join(dir, locale), format);
    if (listing) {
      listings.set(locale, listing);
    }
  }
  return listings;
}

/**
 * Write one locale. Fastlane files are only written for non-empty fields.
 */
export function writeLocaleListing(
  dir: string,
  locale: string,
  listing: ListingText,
  format: MetadataFormat,
  raw: unknown = listing
): void {
  const localeDir = join(dir, locale);
  mkdirSync(localeDir, { recursive: true });

  if (format === "json") {
    writeFileSync(join(localeDir, LISTING_JSON_FILE), JSON.stringify(raw, null, 2));
    return;
  }

  for (const key of LISTING_KEYS) {
    if (listing[key] !== "") {
      writeFileSync(join(localeDir, LISTING_FILES[key]), listing[key]);
    }
  }
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

export const IMAGE_TYPES = [
  "featureGraphic",
  "icon",
  "phoneScreenshots",
  "promoGraphic",
  "sevenInchScreenshots",
  "tenInchScreenshots",
  "tvBanner",
  "tvScreenshots",
  "wearScreenshots",
] as const;

export type ImageType = (typeof IMAGE_TYPES)[number];

export const SCREENSHOT_TYPES = [
  "phoneScreenshots",
  "sevenInchScreenshots",
  "tenInchScreenshots",
  "tvScreenshots",
  "wearScreenshots",
] as const satisfies readonly ImageType[];

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);

export function isImageFile(name: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(name).toLowerCase());
}

export function isImageType(value: string): value is ImageType {
  return IMAGE_TYPES.some((type) => type === value);
}

/** Sorted image files directly inside a directory; empty when it is missing. */
export function listImageFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isImageFile(entry.name))
    .map((entry) => join(dir, entry.name))
    .sort();
}

/**
 * Image files for one locale, by type. Screenshot types live in
 * `images/<type>/`; single images such as the icon are `images/<type>.<ext>`.
 */
export function readLocaleImages(localeDir: string): Map<ImageType, string[]> {
  const imagesDir = join(localeDir, IMAGES_DIR);
  const result = new Map<ImageType, string[]>();
  for (const type of IMAGE_TYPES) {
    const nested = listImageFiles(join(imagesDir, type));
    const single = listImageFiles(imagesDir).filter((file) => {
      const name = file.slice(imagesDir.length + 1);
      return name.slice(0, name.length - extname(name).length) === type;
    });
    const files = [...nested, ...single];
    if (files.length > 0) {
      result.set(type, files);
    }
  }
  return result;
}

/**
 * Shorten for display, keeping the result within `max` characters.
 */
export function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  if (chars.length <= max) return value;
  return `${chars.slice(0, max - 3).join("")}...`;
}
