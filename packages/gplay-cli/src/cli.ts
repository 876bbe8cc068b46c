import { Command } from "commander";
import chalk from "chalk";
import type { Services } from "./lib/services.js";
import { unknownCommandMessage } from "./lib/suggest.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerEditsCommands } from "./modules/edits.js";
import { registerTracksCommands } from "./modules/tracks.js";
import {
  registerApksCommands,
  registerBundlesCommands,
  registerDeobfuscationCommands,
  registerExpansionCommands,
} from "./modules/edit-artifacts.js";
import {
  registerGeneratedApksCommands,
  registerInternalSharingCommands,
  registerSystemApksCommands,
} from "./modules/app-artifacts.js";
import { registerImagesCommands, registerListingsCommands } from "./modules/listings.js";
import { registerDetailsCommands } from "./modules/details.js";
import { registerAvailabilityCommands, registerTestersCommands } from "./modules/testers.js";
import { registerReviewsCommands } from "./modules/reviews.js";
import { registerReleaseCommand } from "./modules/release.js";
import { registerPromoteCommand } from "./modules/promote.js";
import { registerRolloutCommands } from "./modules/rollout.js";
import { registerValidateCommands } from "./modules/validate.js";
import { registerSyncCommands } from "./modules/sync.js";
import { registerMonetizationCommands } from "./modules/monetization.js";
import { registerPurchasesCommands } from "./modules/purchases.js";
import { registerAppManagementCommands } from "./modules/app-management.js";
import { registerVitalsCommands } from "./modules/vitals.js";
import { registerReportsCommands } from "./modules/reports.js";
import { registerUpdateCommand, registerVersionCommand } from "./modules/update.js";
import { registerCompletionCommands } from "./modules/completion.js";

export const PROGRAM_NAME = "gplay";

/**
 * The full command tree.
 */
export function buildProgram(services: Services, version: string): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description("Command-line client for the Google Play Android Publisher API")
    .version(version)
    .option("-q, --quiet", "suppress spinners and progress output")
    .option("--debug", "log HTTP requests and resolution steps to stderr")
    .option("--dry-run", "print mutating API calls instead of sending them")
    .option("--no-input", "never prompt; fail when input is missing")
    .option("--error-format <format>", "error output: text or json")
    .showSuggestionAfterError(false)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Getting started:")}
  gplay auth login --service-account key.json   ${chalk.gray("Register a service account")}
  gplay tracks list --package com.example.app    ${chalk.gray("List release tracks")}
  gplay release --package com.example.app --track internal --bundle app.aab
`
    );

  registerAuthCommands(program, services);
  registerConfigCommands(program, services);

  registerEditsCommands(program, services);
  registerTracksCommands(program, services);
  registerBundlesCommands(program, services);
  registerApksCommands(program, services);
  registerDeobfuscationCommands(program, services);
  registerExpansionCommands(program, services);
  registerGeneratedApksCommands(program, services);
  registerInternalSharingCommands(program, services);
  registerSystemApksCommands(program, services);

  registerListingsCommands(program, services);
  registerImagesCommands(program, services);
  registerDetailsCommands(program, services);
  registerTestersCommands(program, services);
  registerAvailabilityCommands(program, services);
  registerReviewsCommands(program, services);

  registerReleaseCommand(program, services);
  registerPromoteCommand(program, services);
  registerRolloutCommands(program, services);
  registerValidateCommands(program);
  registerSyncCommands(program, services);

  registerMonetizationCommands(program, services);
  registerPurchasesCommands(program, services);
  registerAppManagementCommands(program, services);
  registerVitalsCommands(program, services);
  registerReportsCommands(program, services);

  registerUpdateCommand(program);
  registerVersionCommand(program, version);
  registerCompletionCommands(program);

  program.on("command:*", (operands: string[]) => {
    const names = program.commands.map((cmd) => cmd.name());
    for (const line of unknownCommandMessage(operands[0] ?? "", names, PROGRAM_NAME)) {
      console.error(line);
    }
    process.exitCode = 1;
  });

  return program;
}
