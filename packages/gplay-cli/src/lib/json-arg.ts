import { readFileSync } from "fs";
import { assertFile } from "./files.js";
import { fileNotReadable, invalidJson } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

/**
 * Read a flag value that is either literal text or `@path` to a file.
 */
export function readTextArg(value: string): string {
  if (!value.startsWith("@")) {
    return value;
  }
  const path = value.slice(1).trim();
  assertFile(path);
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    throw fileNotReadable(path, errorMessage(err));
  }
}

/**
 * Parse a JSON flag (`--json '{...}'` or `--json @body.json`).
 */
export function readJsonArg(value: string, flag = "--json"): unknown {
  const source = value.startsWith("@") ? value.slice(1).trim() : flag;
  const text = readTextArg(value);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw invalidJson(source, errorMessage(err));
  }
}

/** "a, b,,c" -> ["a", "b", "c"] */
export function parseCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
}
