import { Command } from "commander";
import chalk from "chalk";
import type { ApiClient } from "../lib/api-client.js";
import type { Services } from "../lib/services.js";
import {
  action,
  parseFraction,
  printOutput,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  type CommonOptions,
} from "../lib/command.js";
import {
  commitQuery,
  createEdit,
  editPath,
  stagedFraction,
  step,
  type AppEdit,
  type Track,
  type TrackRelease,
} from "../lib/edits.js";
import { noActiveRelease } from "../lib/errors/catalog.js";
import { logProgress } from "../lib/spinner.js";

export type RolloutAction = "halt" | "resume" | "update" | "complete";

const TARGET_STATUS: Record<RolloutAction, "halted" | "inProgress" | "completed"> = {
  halt: "halted",
  resume: "inProgress",
  update: "inProgress",
  complete: "completed",
};

export interface RolloutRequest {
  packageName: string;
  track: string;
  action: RolloutAction;
  /** New fraction in (0, 1]; required for update, optional for resume */
  rollout?: number;
  changesNotSentForReview?: boolean;
}

export interface RolloutResult {
  editId: string;
  packageName: string;
  track: string;
  status: string;
  versionCodes: string[];
  rolloutFraction?: number;
}

/**
 * Change the staged rollout on a track: create an edit, rewrite the active
 * (inProgress or halted) release, validate and commit. A failed step stops
 * the sequence; the edit is left for Google Play to expire.
 */
export async function updateRollout(
  client: ApiClient,
  request: RolloutRequest,
  progress: (message: string) => void = logProgress
): Promise<RolloutResult> {
  const { packageName, track } = request;
  const status = TARGET_STATUS[request.action];

  progress("Creating edit...");
  const editId = await step("failed to create edit", () => createEdit(client, packageName));

  progress("Getting current track state...");
  const current = await step("failed to get track", () =>
    client.get<Track>(editPath(packageName, editId, "tracks", track))
  );

  const active = (current.releases ?? []).find(
    (release) => release.status === "inProgress" || release.status === "halted"
  );
  if (!active) {
    throw noActiveRelease(track, "active or halted");
  }

  progress(`Updating rollout status to: ${status}`);
  const target: TrackRelease = { ...active, status };
  const fraction = request.rollout;
  if (fraction !== undefined && fraction > 0 && fraction < 1) {
    target.userFraction = fraction;
  } else if (status === "completed") {
    delete target.userFraction;
  }

  await step("failed to update track", () =>
    client.put<Track>(editPath(packageName, editId, "tracks", track), {
      track,
      releases: [target],
    })
  );

  progress("Validating edit...");
  await step("validation failed", () =>
    client.post<AppEdit>(`${editPath(packageName, editId)}:validate`)
  );

  progress("Committing edit...");
  const committed = await step("commit failed", () =>
    client.post<AppEdit>(`${editPath(packageName, editId)}:commit`, undefined, {
      query: commitQuery(request.changesNotSentForReview),
    })
  );
  progress("Rollout updated successfully");

  const result: RolloutResult = {
    editId: committed.id ?? editId,
    packageName,
    track,
    status,
    versionCodes: target.versionCodes ?? [],
  };
  const applied = stagedFraction(target);
  if (applied !== undefined) {
    result.rolloutFraction = applied;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

interface RolloutOptions extends CommonOptions {
  track: string;
  rollout?: string;
  changesNotSentForReview?: boolean;
}

const DESCRIPTIONS: Record<RolloutAction, string> = {
  halt: "Halt a staged rollout; users who already updated keep the release",
  resume: "Resume a halted rollout, optionally at a new fraction",
  update: "Change the rollout fraction of a staged rollout",
  complete: "Complete a staged rollout to 100% of users",
};

export function registerRolloutCommands(program: Command, services: Services): void {
  const rollout = program
    .command("rollout")
    .description("Manage staged rollouts")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  gplay rollout update --package com.example.app --rollout 0.2
  gplay rollout halt --package com.example.app --track production
  gplay rollout resume --package com.example.app --rollout 0.5
  gplay rollout complete --package com.example.app
`
    );

  for (const name of ["halt", "resume", "update", "complete"] as const) {
    const cmd = withCommonOptions(
      rollout
        .command(name)
        .description(DESCRIPTIONS[name])
        .option("--track <track>", "track name", "production")
        .option("--changes-not-sent-for-review", "commit without sending changes for review")
    );
    if (name === "update") {
      cmd.option("--rollout <fraction>", "new rollout fraction, 0.0-1.0 (required)");
    } else if (name === "resume") {
      cmd.option("--rollout <fraction>", "new rollout fraction (keeps the current one when omitted)");
    }

    cmd.action(
      action(async (options: RolloutOptions) => {
        validateOutputOptions(options);
        let fraction: number | undefined;
        if (name === "update") {
          fraction = parseFraction(options.rollout ?? "");
        } else if (name === "resume" && options.rollout !== undefined) {
          fraction = parseFraction(options.rollout);
        }

        const packageName = requirePackage(services, options.package);
        const result = await updateRollout(services.publisher, {
          packageName,
          track: options.track,
          action: name,
          rollout: fraction,
          changesNotSentForReview: options.changesNotSentForReview,
        });
        printOutput(result, options);
      })
    );
  }
}
