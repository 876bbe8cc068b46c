/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Suppress spinners and progress lines */
  quiet: boolean;
  /** Log HTTP traffic and resolution steps to stderr */
  debug: boolean;
  /** Intercept mutating API calls instead of sending them */
  dryRun: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  quiet: false,
  debug: false,
  dryRun: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Lenient boolean parsing for environment variables.
 * Returns undefined when the value is blank or unrecognised.
 */
export function parseBoolean(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (["1", "t", "true", "yes", "y", "on"].includes(normalized)) return true;
  if (["0", "f", "false", "no", "n", "off"].includes(normalized)) return false;
  return undefined;
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--quiet") || argv.includes("-q") || parseBoolean(env.GPLAY_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--debug") || parseBoolean(env.GPLAY_DEBUG)) {
    currentContext.debug = true;
  }

  if (argv.includes("--dry-run") || parseBoolean(env.GPLAY_DRY_RUN)) {
    currentContext.dryRun = true;
  }

  if (argv.includes("--no-input") || env.CI || parseBoolean(env.GPLAY_NO_INPUT)) {
    currentContext.noInput = true;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

export function isDebugMode(): boolean {
  return currentContext.debug;
}

export function isDryRun(): boolean {
  return currentContext.dryRun;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Override individual fields (tests and commands that enable debug from config).
 */
export function updateContext(patch: Partial<CLIContext>): void {
  currentContext = { ...currentContext, ...patch };
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
