import { Command } from "commander";
import chalk from "chalk";
import {
  action,
  printOutput,
  requireOption,
  validateOutputOptions,
  withOutputOptions,
} from "../lib/command.js";
import { ReportedError } from "../lib/errors/types.js";
import { parseMetadataFormat } from "../lib/metadata.js";
import type { OutputOptions } from "../lib/output/format.js";
import {
  validateBundle,
  validateListings,
  validateScreenshots,
  type ValidationResult,
} from "../lib/validation.js";
import { validateLocale } from "../lib/locales.js";

type ValidateOptions = OutputOptions & {
  file?: string;
  dir: string;
  locale?: string;
  format?: string;
};

function report(result: ValidationResult, options: OutputOptions): void {
  printOutput(result, options);
  if (!result.valid) {
    throw new ReportedError("validation failed");
  }
}

function localeFilter(value: string | undefined): string | undefined {
  return value === undefined ? undefined : validateLocale(value);
}

/**
 * Offline checks run before anything is uploaded. No credentials needed.
 */
export function registerValidateCommands(program: Command): void {
  const validate = program
    .command("validate")
    .description("Check bundles and metadata locally before uploading")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  gplay validate bundle --file app-release.aab
  gplay validate listing --dir ./metadata --locale en-US
  gplay validate screenshots --dir ./metadata
`
    );

  withOutputOptions(
    validate
      .command("bundle")
      .description("Check that a file is a well-formed Android App Bundle")
      .option("--file <path>", "path to the .aab file")
  ).action(
    action(async (options: ValidateOptions) => {
      validateOutputOptions(options);
      const file = requireOption(options.file, "--file");
      report(await validateBundle(file), options);
    })
  );

  withOutputOptions(
    validate
      .command("listing")
      .description("Check listing text lengths against Play Store limits")
      .option("--dir <path>", "metadata directory", "./metadata")
      .option("--locale <code>", "only check this locale")
      .option("--format <format>", "metadata layout: fastlane or json", "fastlane")
  ).action(
    action(async (options: ValidateOptions) => {
      validateOutputOptions(options);
      const format = parseMetadataFormat(options.format);
      report(validateListings(options.dir, format, localeFilter(options.locale)), options);
    })
  );

  withOutputOptions(
    validate
      .command("screenshots")
      .description("Check screenshot counts per device type")
      .option("--dir <path>", "metadata directory", "./metadata")
      .option("--locale <code>", "only check this locale")
  ).action(
    action(async (options: ValidateOptions) => {
      validateOutputOptions(options);
      report(validateScreenshots(options.dir, localeFilter(options.locale)), options);
    })
  );
}
