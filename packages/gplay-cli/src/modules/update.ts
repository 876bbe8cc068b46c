/**
 * Update and version commands.
 */

import { Command } from "commander";
import chalk from "chalk";
import { createSpinner } from "../lib/spinner.js";
import { action } from "../lib/command.js";
import type { FetchLike } from "../lib/api-client.js";
import { networkOffline } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import {
  checkForUpdate,
  getCurrentVersion,
  VersionCheckStore,
  type InstallMethod,
  type UpdateInfo,
} from "../lib/version-check.js";

/**
 * Dependencies for the update command.
 * All have defaults for production use.
 */
export interface UpdateDeps {
  store?: VersionCheckStore;
  fetchImpl?: FetchLike;
  currentVersion?: string;
}

function formatInstallMethod(method: InstallMethod): string {
  switch (method) {
    case "npm":
      return "npm (global)";
    case "homebrew":
      return "Homebrew";
    default:
      return "Unknown";
  }
}

function printUpdate(info: UpdateInfo, checkOnly: boolean): void {
  console.log();
  console.log(
    `  ${chalk.gray("Current version:")} ${info.updateAvailable ? chalk.yellow(info.currentVersion) : chalk.green(info.currentVersion)}`
  );
  console.log(`  ${chalk.gray("Latest version:")}  ${chalk.green(info.latestVersion)}`);
  console.log();

  if (info.updateAvailable && !checkOnly) {
    console.log(`  ${chalk.gray("Install method:")}  ${chalk.cyan(formatInstallMethod(info.installMethod))}`);
    console.log();
    console.log(chalk.bold("To update, run:"));
    console.log();
    console.log(`  ${chalk.cyan(info.updateCommand)}`);
    console.log();
  }
}

export function registerUpdateCommand(program: Command, deps: UpdateDeps = {}): void {
  program
    .command("update")
    .description("Check for CLI updates and show upgrade instructions")
    .option("--check", "only report whether an update is available")
    .option("--json", "print the result as JSON")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it does:")}
  ${chalk.yellow("•")} Checks the npm registry for the latest version
  ${chalk.yellow("•")} Detects your installation method (npm or Homebrew)
  ${chalk.yellow("•")} Shows the matching update command

${chalk.bold.cyan("Examples:")}
  gplay update          ${chalk.gray("Check for updates and show upgrade instructions")}
  gplay update --check  ${chalk.gray("Only check if an update is available")}
  gplay update --json   ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(
      action(async (options: { check?: boolean; json?: boolean }) => {
        const spinner = createSpinner("Checking for updates...").start();

        let info: UpdateInfo;
        try {
          info = await checkForUpdate({
            store: deps.store ?? new VersionCheckStore(),
            fetchImpl: deps.fetchImpl,
            currentVersion: deps.currentVersion,
            force: true,
          });
        } catch (error) {
          spinner.fail("Failed to check for updates");
          throw networkOffline("registry.npmjs.org", errorMessage(error));
        }

        if (options.json) {
          spinner.stop();
          console.log(JSON.stringify(info));
          return;
        }

        if (info.updateAvailable) {
          spinner.succeed("Update available!");
        } else {
          spinner.succeed("You're up to date!");
        }
        printUpdate(info, options.check ?? false);
      })
    );
}

export function registerVersionCommand(program: Command, version: string = getCurrentVersion()): void {
  program
    .command("version")
    .description("Print the gplay version")
    .action(() => {
      console.log(version);
    });
}
