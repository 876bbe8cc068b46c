import chalk from "chalk";
import { CLIError, errorMessage, isCLIError, ReportedError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import { isDebugMode } from "../cli-context.js";

const MAX_WIDTH = 100;

/**
 * Greedy word wrap; paragraphs split on newlines are wrapped separately.
 */
export function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    let line = "";
    for (const word of paragraph.split(" ")) {
      if (line && `${line} ${word}`.length > width) {
        lines.push(line);
        line = word;
      } else {
        line = line ? `${line} ${word}` : word;
      }
    }
    lines.push(line);
  }
  return lines;
}

function causes(error: CLIError): string[] {
  const chain: string[] = [];
  let cause: unknown = error.cause;
  while (cause !== undefined && chain.length < 5) {
    chain.push(errorMessage(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return chain;
}

/**
 * Lines of the human-readable error block, unstyled when chalk has no
 * colour support.
 */
export function formatError(error: CLIError, columns: number, debug = false): string[] {
  const width = Math.min(columns, MAX_WIDTH);
  const out: string[] = [];

  const [first, ...rest] = wrap(error.message, width - 4);
  out.push(`${chalk.red("✗")} ${chalk.red.bold(first)}`);
  out.push(...rest.map((line) => `  ${chalk.red(line)}`));

  if (error.details) {
    out.push("", ...error.details.split("\n").map((line) => `  ${chalk.dim(line)}`));
  }

  if (error.suggestion) {
    const [hint, ...more] = wrap(error.suggestion, width - 6);
    out.push("", `  ${chalk.yellow("→")} ${hint}`, ...more.map((line) => `    ${line}`));
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
  if (examples.length === 1) {
    out.push("", `  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    out.push("", `  ${chalk.dim("Examples:")}`, ...examples.slice(0, 3).map((ex) => `    ${chalk.cyan(`$ ${ex}`)}`));
  }

  if (error.docs) {
    out.push("", `  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  if (debug) {
    const status = error.status === undefined ? "" : ` (HTTP ${error.status})`;
    out.push("", `  ${chalk.dim(`code: ${error.code}${status}`)}`);
    out.push(...causes(error).map((message) => `  ${chalk.dim(`caused by: ${message}`)}`));
  }

  return out;
}

/** The error as one JSON object, without empty fields. */
export function errorToJson(error: CLIError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    error: true,
    code: error.code,
    message: error.message,
    status: error.status,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    docs: error.docs,
    details: error.details,
  };
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

/**
 * Print an error to stderr in the current output mode. A ReportedError has
 * already been shown by its command.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  if (error instanceof ReportedError) return;

  if ((mode ?? getOutputMode()) === "json") {
    console.error(JSON.stringify(errorToJson(error), null, 2));
    return;
  }
  for (const line of formatError(error, process.stderr.columns || 80, isDebugMode())) {
    console.error(line);
  }
}

export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : new CLIError("UNKNOWN_ERROR", errorMessage(error), { cause: error }), mode);
}

export { CLIError, isCLIError };
