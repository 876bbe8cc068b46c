/**
 * Error output mode detection.
 */

export type OutputMode = "static" | "json";

/**
 * Detect how errors should be rendered.
 *
 * - `static`: human-readable text on stderr
 * - `json`: a single JSON object on stderr, for scripts and CI
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): OutputMode {
  const idx = argv.indexOf("--error-format");
  if (idx !== -1 && argv[idx + 1] === "json") {
    return "json";
  }
  if (argv.includes("--error-format=json")) {
    return "json";
  }

  if (env.GPLAY_ERROR_FORMAT?.trim().toLowerCase() === "json") {
    return "json";
  }

  return "static";
}
