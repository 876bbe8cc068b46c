/**
 * Progress feedback on stderr. stdout carries command output only, so
 * `gplay ... | jq` never sees a spinner frame.
 */

import ora from "ora";
import { isQuietMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
}

const silent: Spinner = {
  start: () => silent,
  stop: () => silent,
  succeed: () => silent,
  fail: () => silent,
};

/**
 * An ora spinner on an interactive stderr; otherwise one that does nothing,
 * since non-interactive runs report progress through logProgress lines.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || !process.stderr.isTTY) {
    return silent;
  }

  const spinner = ora({ text, stream: process.stderr });
  const handle: Spinner = {
    start(next) {
      spinner.start(next);
      return handle;
    },
    stop() {
      spinner.stop();
      return handle;
    },
    succeed(next) {
      spinner.succeed(next);
      return handle;
    },
    fail(next) {
      spinner.fail(next);
      return handle;
    },
  };
  return handle;
}

/** One progress line on stderr, dropped under --quiet. */
export function logProgress(message: string): void {
  if (!isQuietMode()) {
    console.error(message);
  }
}
