import chalk from "chalk";
import CliTable3 from "cli-table3";
import { invalidFlag } from "../errors/catalog.js";

export type OutputFormat = "json" | "table" | "markdown";

export const OUTPUT_FORMATS: OutputFormat[] = ["json", "table", "markdown"];

export interface OutputOptions {
  output?: string;
  pretty?: boolean;
}

export interface Rows {
  columns: string[];
  rows: string[][];
}

let warnedInvalidDefault = false;

function normalizeFormat(value: string): OutputFormat | undefined {
  switch (value.trim().toLowerCase()) {
    case "json":
      return "json";
    case "table":
      return "table";
    case "markdown":
    case "md":
      return "markdown";
    default:
      return undefined;
  }
}

/**
 * Format from --output, else GPLAY_DEFAULT_OUTPUT, else json.
 */
export function resolveOutputFormat(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): OutputFormat {
  if (flag !== undefined && flag.trim() !== "") {
    const format = normalizeFormat(flag);
    if (!format) {
      throw invalidFlag(`unsupported format: ${flag}`, OUTPUT_FORMATS);
    }
    return format;
  }

  const fromEnv = env.GPLAY_DEFAULT_OUTPUT;
  if (fromEnv && fromEnv.trim() !== "") {
    const format = normalizeFormat(fromEnv);
    if (format) return format;
    if (!warnedInvalidDefault) {
      warnedInvalidDefault = true;
      console.error(
        `Warning: invalid GPLAY_DEFAULT_OUTPUT "${fromEnv}" (expected json, table or markdown), using json`
      );
    }
  }
  return "json";
}

/** Reset the one-time warning (for testing). */
export function resetOutputWarnings(): void {
  warnedInvalidDefault = false;
}

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

function arrayRows(items: unknown[]): Rows {
  if (items.length > 0 && items.every(isRecord)) {
    const columns: string[] = [];
    for (const item of items) {
      for (const key of Object.keys(item)) {
        if (!columns.includes(key)) columns.push(key);
      }
    }
    return {
      columns,
      rows: items.map((item) => columns.map((col) => cell(item[col]))),
    };
  }
  return { columns: ["value"], rows: items.map((item) => [cell(item)]) };
}

/**
 * Reduce an API response to table rows. A list response such as
 * `{tracks: [...]}` is unwrapped when it has exactly one array field.
 */
export function toRows(data: unknown): Rows {
  if (Array.isArray(data)) {
    return arrayRows(data);
  }

  if (isRecord(data)) {
    const arrays = Object.entries(data).filter(([, value]) => Array.isArray(value));
    if (arrays.length === 1) {
      const [, items] = arrays[0];
      if (Array.isArray(items)) return arrayRows(items);
    }
    return {
      columns: ["key", "value"],
      rows: Object.entries(data).map(([key, value]) => [key, cell(value)]),
    };
  }

  return { columns: ["value"], rows: [[cell(data)]] };
}

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

export function renderTable({ columns, rows }: Rows): string {
  const table = new CliTable3({
    head: columns.map((c) => chalk.cyan(c)),
    style: { head: [], border: [] },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

function escapeMarkdown(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderMarkdown({ columns, rows }: Rows): string {
  const line = (cells: string[]) => `| ${cells.map(escapeMarkdown).join(" | ")} |`;
  return [line(columns), `| ${columns.map(() => "---").join(" | ")} |`, ...rows.map(line)].join(
    "\n"
  );
}

/**
 * Serialize command output in the requested format.
 */
export function formatOutput(data: unknown, format: OutputFormat, pretty = false): string {
  if (pretty && format !== "json") {
    throw invalidFlag("--pretty is only valid with JSON output");
  }

  switch (format) {
    case "json":
      return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    case "table":
      return renderTable(toRows(data));
    case "markdown":
      return renderMarkdown(toRows(data));
  }
}

/**
 * Reject bad --output / --pretty combinations before a command does any work.
 */
export function validateOutputOptions(options: OutputOptions): void {
  const format = resolveOutputFormat(options.output);
  if (options.pretty && format !== "json") {
    throw invalidFlag("--pretty is only valid with JSON output");
  }
}

/**
 * Print command output to stdout using --output / --pretty.
 */
export function printOutput(data: unknown, options: OutputOptions = {}): void {
  const format = resolveOutputFormat(options.output);
  console.log(formatOutput(data, format, options.pretty ?? false));
}
