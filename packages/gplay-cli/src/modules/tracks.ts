import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import { z } from "zod";
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
import { editPath, type Track, type TrackRelease } from "../lib/edits.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { readJsonArg } from "../lib/json-arg.js";

type TracksListResponse = androidpublisher_v3.Schema$TracksListResponse;

type TrackOptions = CommonOptions & EditOptions & { track?: string; releases?: string };

const ReleaseSchema = z.object({
  name: z.string().optional(),
  status: z.string().optional(),
  versionCodes: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
  userFraction: z.number().optional(),
  inAppUpdatePriority: z.number().int().optional(),
  releaseNotes: z.array(z.object({ language: z.string(), text: z.string() })).optional(),
  countryTargeting: z
    .object({
      countries: z.array(z.string()).optional(),
      includeRestOfWorld: z.boolean().optional(),
    })
    .optional(),
});

const TrackBodySchema = z
  .object({ releases: z.array(ReleaseSchema) })
  .transform((track) => track.releases);

/**
 * Parse --releases: a JSON array of releases, or an object with a
 * `releases` array (the shape `tracks get` prints).
 */
export function parseReleases(value: string): TrackRelease[] {
  const parsed = readJsonArg(value, "--releases");
  const result = Array.isArray(parsed)
    ? z.array(ReleaseSchema).safeParse(parsed)
    : TrackBodySchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw invalidFlag(`--releases must be a JSON array of releases${where}`);
  }
  return result.data;
}

export function registerTracksCommands(program: Command, services: Services): void {
  const tracks = program.command("tracks").description("Inspect and edit release tracks");

  withEditOption(withCommonOptions(tracks.command("list").description("List tracks in an edit"))).action(
    action(async (options: TrackOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      const response = await services.publisher.get<TracksListResponse>(
        editPath(packageName, editId, "tracks")
      );
      printOutput(response, options);
    })
  );

  withEditOption(
    withCommonOptions(
      tracks.command("get").description("Get one track").option("--track <track>", "track name")
    )
  ).action(
    action(async (options: TrackOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const track = requireOption(options.track, "--track");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<Track>(editPath(packageName, editId, "tracks", track)),
        options
      );
    })
  );

  for (const [name, method] of [
    ["update", "put"],
    ["patch", "patch"],
  ] as const) {
    withEditOption(
      withCommonOptions(
        tracks
          .command(name)
          .description(name === "update" ? "Replace the releases of a track" : "Patch a track")
          .option("--track <track>", "track name")
          .option("--releases <json>", "releases JSON array or @file")
      )
    ).action(
      action(async (options: TrackOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const track = requireOption(options.track, "--track");
        const releases = parseReleases(requireOption(options.releases, "--releases"));
        const packageName = requirePackage(services, options.package);
        const path = editPath(packageName, editId, "tracks", track);
        const body: Track = { track, releases };
        const result =
          method === "put"
            ? await services.publisher.put<Track>(path, body)
            : await services.publisher.patch<Track>(path, body);
        printOutput(result, options);
      })
    );
  }
}
