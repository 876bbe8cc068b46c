import { readFileSync } from "fs";
import { invalidFlag } from "./errors/catalog.js";

/**
 * Store listing locales accepted by Google Play, and checks for the
 * common ways they get mistyped.
 */

let cached: string[] | undefined;

export function supportedLocales(): string[] {
  cached ??= JSON.parse(
    readFileSync(new URL("../../data/locales.json", import.meta.url), "utf-8")
  ) as string[];
  return cached;
}

/** Returns an error message for an unknown locale, undefined when valid. */
export function checkLocale(code: string): string | undefined {
  const locale = code.trim();
  if (!locale) {
    return "locale code is empty";
  }
  const known = supportedLocales();
  if (known.includes(locale)) {
    return undefined;
  }

  const hyphenated = locale.replaceAll("_", "-");
  const match = known.find((candidate) => candidate.toLowerCase() === hyphenated.toLowerCase());
  if (match) {
    const hint = locale.includes("_") ? "Use hyphens, not underscores" : "Check capitalization";
    return `invalid locale "${locale}": did you mean "${match}"? ${hint}`;
  }
  return `invalid locale "${locale}": not a supported Google Play locale`;
}

export function validateLocale(code: string, flag = "--locale"): string {
  const problem = checkLocale(code);
  if (problem) {
    throw invalidFlag(`${flag}: ${problem}`);
  }
  return code.trim();
}

const YOUTUBE_URL = /^(https?:\/\/)?(www\.)?(youtube\.com\/watch\?v=|youtu\.be\/)[\w-]+/;

/** An empty value clears the promo video and is allowed. */
export function validateVideoUrl(url: string): void {
  if (url !== "" && !YOUTUBE_URL.test(url)) {
    throw invalidFlag(
      `invalid YouTube URL: ${url} (expected youtube.com/watch?v=... or youtu.be/...)`
    );
  }
}
