import { Command } from "commander";
import type { ApiClient } from "../lib/api-client.js";
import type { Services } from "../lib/services.js";
import {
  action,
  parseFraction,
  printOutput,
  requireChoice,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  type CommonOptions,
} from "../lib/command.js";
import {
  applyRollout,
  commitQuery,
  createEdit,
  editPath,
  RELEASE_STATUSES,
  stagedFraction,
  step,
  type AppEdit,
  type ReleaseStatus,
  type Track,
  type TrackRelease,
} from "../lib/edits.js";
import { noActiveRelease } from "../lib/errors/catalog.js";
import { parseReleaseNotes, type LocalizedText } from "../lib/metadata.js";
import { logProgress } from "../lib/spinner.js";

export interface PromoteRequest {
  packageName: string;
  fromTrack: string;
  toTrack: string;
  status: ReleaseStatus;
  rollout: number;
  /** Replaces the notes copied from the source release */
  releaseNotes?: LocalizedText[];
  changesNotSentForReview?: boolean;
}

export interface PromoteResult {
  editId: string;
  packageName: string;
  fromTrack: string;
  toTrack: string;
  versionCodes: string[];
  status: string;
  rolloutFraction?: number;
}

/**
 * Copy the active release of one track onto another in a single edit.
 */
export async function runPromote(
  client: ApiClient,
  request: PromoteRequest,
  progress: (message: string) => void = logProgress
): Promise<PromoteResult> {
  const { packageName, fromTrack, toTrack } = request;

  progress("Creating edit...");
  const editId = await step("failed to create edit", () => createEdit(client, packageName));
  progress(`Edit created: ${editId}`);

  progress(`Getting source track: ${fromTrack}`);
  const source = await step("failed to get source track", () =>
    client.get<Track>(editPath(packageName, editId, "tracks", fromTrack))
  );
  const active = (source.releases ?? []).find(
    (release) => release.status === "completed" || release.status === "inProgress"
  );
  if (!active) {
    throw noActiveRelease(fromTrack, "active");
  }
  const versionCodes = active.versionCodes ?? [];
  progress(`Found release with version codes: ${versionCodes.join(", ")}`);

  progress(`Configuring destination track: ${toTrack}`);
  const base: TrackRelease = { status: request.status, versionCodes };
  if (active.name) base.name = active.name;
  const notes = request.releaseNotes ?? active.releaseNotes;
  if (notes) base.releaseNotes = notes;
  const release = applyRollout(base, request.rollout);

  await step("failed to update destination track", () =>
    client.put<Track>(editPath(packageName, editId, "tracks", toTrack), {
      track: toTrack,
      releases: [release],
    })
  );
  progress("Destination track configured");

  progress("Validating edit...");
  await step("validation failed", () =>
    client.post<AppEdit>(`${editPath(packageName, editId)}:validate`)
  );
  progress("Edit validated");

  progress("Committing edit...");
  const committed = await step("commit failed", () =>
    client.post<AppEdit>(`${editPath(packageName, editId)}:commit`, undefined, {
      query: commitQuery(request.changesNotSentForReview),
    })
  );
  progress("Edit committed successfully");

  const result: PromoteResult = {
    editId: committed.id ?? editId,
    packageName,
    fromTrack,
    toTrack,
    versionCodes,
    status: release.status ?? request.status,
  };
  const fraction = stagedFraction(release);
  if (fraction !== undefined) {
    result.rolloutFraction = fraction;
  }
  return result;
}

interface PromoteOptions extends CommonOptions {
  from?: string;
  to?: string;
  rollout: string;
  status: string;
  releaseNotes?: string;
  changesNotSentForReview?: boolean;
}

export function registerPromoteCommand(program: Command, services: Services): void {
  withCommonOptions(
    program
      .command("promote")
      .description("Promote the active release from one track to another")
      .option("--from <track>", "source track (e.g. internal, beta)")
      .option("--to <track>", "destination track (e.g. beta, production)")
      .option("--rollout <fraction>", "staged rollout fraction, 0.0-1.0", "1.0")
      .option("--status <status>", "release status on the destination", "completed")
      .option("--release-notes <notes>", "override the copied release notes (text, JSON or @file)")
      .option("--changes-not-sent-for-review", "commit without sending changes for review")
  )
    .addHelpText(
      "after",
      `
Examples:
  gplay promote --package com.example.app --from internal --to beta
  gplay promote --package com.example.app --from beta --to production --rollout 0.1
`
    )
    .action(
      action(async (options: PromoteOptions) => {
        validateOutputOptions(options);
        const fromTrack = requireOption(options.from, "--from");
        const toTrack = requireOption(options.to, "--to");
        const rollout = parseFraction(options.rollout);
        const status = requireChoice(options.status, "--status", RELEASE_STATUSES);
        const releaseNotes =
          options.releaseNotes !== undefined ? parseReleaseNotes(options.releaseNotes) : undefined;

        const packageName = requirePackage(services, options.package);
        const result = await runPromote(services.publisher, {
          packageName,
          fromTrack,
          toTrack,
          status,
          rollout,
          releaseNotes,
          changesNotSentForReview: options.changesNotSentForReview,
        });
        printOutput(result, options);
      })
    );
}
