import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import { editPath } from "../lib/edits.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { parseCsv, readJsonArg } from "../lib/json-arg.js";

type Testers = androidpublisher_v3.Schema$Testers;
type TrackCountryAvailability = androidpublisher_v3.Schema$TrackCountryAvailability;

type TesterOptions = CommonOptions &
  EditOptions & { track?: string; googleGroups?: string; json?: string };

export function testersBody(options: { googleGroups?: string; json?: string }): Testers {
  if (options.json !== undefined) {
    const parsed = readJsonArg(options.json);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw invalidFlag("--json must be a Testers JSON object");
    }
    return parsed;
  }
  if (options.googleGroups === undefined) {
    throw invalidFlag("--google-groups or --json is required");
  }
  return { googleGroups: parseCsv(options.googleGroups) };
}

function trackCommand(parent: Command, name: string, description: string): Command {
  return withEditOption(
    withCommonOptions(
      parent.command(name).description(description).option("--track <track>", "track name")
    )
  );
}

export function registerTestersCommands(program: Command, services: Services): void {
  const testers = program
    .command("testers")
    .description("Manage tester Google Groups for testing tracks");

  trackCommand(testers, "get", "Get the testers of a track").action(
    action(async (options: TesterOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const track = requireOption(options.track, "--track");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<Testers>(editPath(packageName, editId, "testers", track)),
        options
      );
    })
  );

  for (const name of ["update", "patch"] as const) {
    trackCommand(testers, name, name === "update" ? "Replace the testers of a track" : "Patch the testers of a track")
      .option("--google-groups <emails>", "comma-separated Google Group addresses")
      .option("--json <json>", "Testers JSON or @file (replaces --google-groups)")
      .action(
        action(async (options: TesterOptions) => {
          validateOutputOptions(options);
          const editId = requireOption(options.edit, "--edit");
          const track = requireOption(options.track, "--track");
          const body = testersBody(options);
          const packageName = requirePackage(services, options.package);
          const path = editPath(packageName, editId, "testers", track);
          const result =
            name === "update"
              ? await services.publisher.put<Testers>(path, body)
              : await services.publisher.patch<Testers>(path, body);
          printOutput(result, options);
        })
      );
  }
}

export function registerAvailabilityCommands(program: Command, services: Services): void {
  const availability = program
    .command("availability")
    .description("Country availability of tracks");

  trackCommand(availability, "get", "Get the countries a track is available in").action(
    action(async (options: TesterOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const track = requireOption(options.track, "--track");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<TrackCountryAvailability>(
          editPath(packageName, editId, "countryAvailability", track)
        ),
        options
      );
    })
  );
}
