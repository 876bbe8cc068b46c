import type { Command } from "commander";
import type { Services } from "./services.js";
import { resolvePackageName } from "./config.js";
import { confirmRequired, invalidFlag, missingFlag } from "./errors/catalog.js";
import { readJsonArg } from "./json-arg.js";
import { renderUnknownError } from "./errors/renderer.js";
import { printOutput, validateOutputOptions, type OutputOptions } from "./output/format.js";

/**
 * Shared flags and helpers for API commands.
 */

export interface PackageOptions {
  package?: string;
}

export interface EditOptions extends PackageOptions {
  edit?: string;
}

export type CommonOptions = OutputOptions & PackageOptions;

export function withOutputOptions(cmd: Command): Command {
  return cmd
    .option("--output <format>", "output format: json, table, markdown")
    .option("--pretty", "pretty-print JSON output");
}

export function withPackageOption(cmd: Command): Command {
  return cmd.option("--package <name>", "app package name (or GPLAY_PACKAGE_NAME)");
}

/** --package plus --output/--pretty, the set most commands take */
export function withCommonOptions(cmd: Command): Command {
  return withOutputOptions(withPackageOption(cmd));
}

export function withEditOption(cmd: Command, required = true): Command {
  return cmd.option(
    "--edit <id>",
    required ? "edit ID" : "edit ID (a temporary edit is used when omitted)"
  );
}

export function requirePackage(services: Services, flag: string | undefined): string {
  const name = resolvePackageName(flag, services.config().config, services.env);
  if (!name) {
    throw missingFlag("--package");
  }
  return name;
}

export function requireOption(value: string | undefined, flag: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw missingFlag(flag);
  }
  return trimmed;
}

export function requireConfirm(confirm: boolean | undefined, action: string): void {
  if (!confirm) {
    throw confirmRequired(action);
  }
}

export function requireChoice<T extends string>(
  value: string | undefined,
  flag: string,
  choices: readonly T[]
): T {
  const raw = requireOption(value, flag);
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw invalidFlag(`${flag} must be one of: ${choices.join(", ")}`, [...choices]);
  }
  return match;
}

/** Required JSON body flag, literal or `@file` */
export function requireJson(value: string | undefined, flag = "--json"): unknown {
  return readJsonArg(requireOption(value, flag), flag);
}

/** Parse a positive integer flag such as --version-code. */
export function parseIntFlag(value: string | undefined, flag: string): number {
  const raw = requireOption(value, flag);
  if (!/^\d+$/.test(raw)) {
    throw invalidFlag(`${flag} must be a positive integer, got: ${raw}`);
  }
  return Number(raw);
}

/**
 * Parse a fraction flag such as --rollout. Values must lie in (0, 1].
 */
export function parseFraction(value: string, flag = "--rollout"): number {
  const fraction = Number(value);
  if (value.trim() === "" || !Number.isFinite(fraction) || fraction <= 0 || fraction > 1) {
    throw invalidFlag(`${flag} must be between 0.0 and 1.0`);
  }
  return fraction;
}

/**
 * Wrap a command action: failures are rendered to stderr and set exit code 1.
 */
export function action<A extends unknown[]>(
  fn: (...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      renderUnknownError(error);
      process.exitCode = 1;
    }
  };
}

export { printOutput, validateOutputOptions };
