import { Command } from "commander";
import chalk from "chalk";
import type { ApiClient } from "../lib/api-client.js";
import type { Services } from "../lib/services.js";
import type { DelayFn } from "../lib/ports/timer.js";
import {
  action,
  parseFraction,
  printOutput,
  requireChoice,
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
  type Apk,
  type Bundle,
  type ReleaseStatus,
  type Track,
  type TrackRelease,
  withEdit,
} from "../lib/edits.js";
import { formatDuration, parseDuration } from "../lib/config.js";
import { invalidFlag, waitTimedOut } from "../lib/errors/catalog.js";
import { CLIError, errorMessage } from "../lib/errors/types.js";
import { isDryRun } from "../lib/cli-context.js";
import { parseReleaseNotes, type LocalizedText } from "../lib/metadata.js";
import { poll } from "../lib/polling.js";
import { logProgress } from "../lib/spinner.js";
import { realDelay } from "../lib/adapters/real-timers.js";

export interface ReleaseArtifact {
  kind: "bundle" | "apk";
  path: string;
}

export interface ReleaseRequest {
  packageName: string;
  track: string;
  artifact: ReleaseArtifact;
  status: ReleaseStatus;
  rollout: number;
  versionName?: string;
  releaseNotes?: LocalizedText[];
  changesNotSentForReview?: boolean;
  wait?: { intervalMs: number; timeoutMs: number };
}

export interface ReleaseResult {
  editId: string;
  packageName: string;
  track: string;
  versionCode: number;
  status: string;
  rolloutFraction?: number;
}

export interface WorkflowDeps {
  progress?: (message: string) => void;
  delay?: DelayFn;
}

/**
 * Pick the single artifact from --bundle / --apk.
 */
export function resolveArtifact(bundle: string | undefined, apk: string | undefined): ReleaseArtifact {
  const bundlePath = bundle?.trim();
  const apkPath = apk?.trim();
  if (!bundlePath && !apkPath) {
    throw invalidFlag("either --bundle or --apk is required");
  }
  if (bundlePath && apkPath) {
    throw invalidFlag("use either --bundle or --apk, not both");
  }
  return bundlePath ? { kind: "bundle", path: bundlePath } : { kind: "apk", path: apkPath ?? "" };
}

function requireVersionCode(value: number | null | undefined, kind: string): number {
  if (typeof value === "number") return value;
  if (isDryRun()) return 0;
  throw new CLIError("UNKNOWN_ERROR", `${kind} upload response did not include a version code`);
}

/**
 * Upload an artifact and put it on a track in one edit: create, upload,
 * update track, validate, commit. With `wait`, poll the track afterwards
 * until the version code shows up.
 */
export async function runRelease(
  client: ApiClient,
  request: ReleaseRequest,
  { progress = logProgress, delay = realDelay }: WorkflowDeps = {}
): Promise<ReleaseResult> {
  const { packageName, track, artifact } = request;

  progress("Creating edit...");
  const editId = await step("failed to create edit", () => createEdit(client, packageName));
  progress(`Edit created: ${editId}`);

  let versionCode: number;
  if (artifact.kind === "bundle") {
    progress(`Uploading bundle: ${artifact.path}`);
    const bundle = await step("failed to upload bundle", () =>
      client.upload<Bundle>(editPath(packageName, editId, "bundles"), artifact.path)
    );
    versionCode = requireVersionCode(bundle.versionCode, "bundle");
    progress(`Bundle uploaded: version code ${versionCode}`);
  } else {
    progress(`Uploading APK: ${artifact.path}`);
    const apk = await step("failed to upload APK", () =>
      client.upload<Apk>(editPath(packageName, editId, "apks"), artifact.path)
    );
    versionCode = requireVersionCode(apk.versionCode, "APK");
    progress(`APK uploaded: version code ${versionCode}`);
  }

  progress(`Configuring track: ${track}`);
  const base: TrackRelease = { status: request.status, versionCodes: [String(versionCode)] };
  if (request.versionName) base.name = request.versionName;
  if (request.releaseNotes) base.releaseNotes = request.releaseNotes;
  const release = applyRollout(base, request.rollout);

  await step("failed to update track", () =>
    client.put<Track>(editPath(packageName, editId, "tracks", track), {
      track,
      releases: [release],
    })
  );
  progress("Track configured");

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

  if (request.wait) {
    await waitForVersion(client, packageName, track, versionCode, request.wait, { progress, delay });
  }

  const result: ReleaseResult = {
    editId: committed.id ?? editId,
    packageName,
    track,
    versionCode,
    status: release.status ?? request.status,
  };
  const fraction = stagedFraction(release);
  if (fraction !== undefined) {
    result.rolloutFraction = fraction;
  }
  return result;
}

/**
 * Poll the track through short-lived edits until a release carries the
 * version code. Failed checks are reported and retried on the next tick.
 */
export async function waitForVersion(
  client: ApiClient,
  packageName: string,
  track: string,
  versionCode: number,
  { intervalMs, timeoutMs }: { intervalMs: number; timeoutMs: number },
  { progress = logProgress, delay = realDelay }: WorkflowDeps = {}
): Promise<TrackRelease> {
  progress(`Waiting for processing to complete (poll interval: ${formatDuration(intervalMs)})...`);
  const wanted = String(versionCode);

  const found = await poll<TrackRelease | undefined>({
    fetchStatus: async () => {
      const current = await withEdit(
        client,
        packageName,
        undefined,
        (checkEdit) => client.get<Track>(editPath(packageName, checkEdit, "tracks", track)),
        {
          onCleanupError: (checkEdit, err) =>
            progress(`Warning: failed to delete temporary edit ${checkEdit}: ${errorMessage(err)}`),
        }
      );
      return (current.releases ?? []).find((release) =>
        (release.versionCodes ?? []).includes(wanted)
      );
    },
    isComplete: (release) => release !== undefined,
    onProgress: () => progress(`Version code ${versionCode} not on ${track} yet`),
    onError: (err) => progress(`Warning: failed to check status: ${errorMessage(err)}`),
    timeoutError: () => waitTimedOut(wanted, track),
    intervalMs,
    timeoutMs,
    delay,
  });

  if (!found) {
    throw waitTimedOut(wanted, track);
  }
  progress(`Release is live with status: ${found.status ?? "unknown"}`);
  return found;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

interface ReleaseOptions extends CommonOptions {
  track: string;
  bundle?: string;
  apk?: string;
  releaseNotes?: string;
  rollout: string;
  status: string;
  versionName?: string;
  changesNotSentForReview?: boolean;
  wait?: boolean;
  pollInterval: string;
  waitTimeout: string;
}

export function parseDurationFlag(value: string, flag: string): number {
  const ms = parseDuration(value);
  if (ms === undefined || ms <= 0) {
    throw invalidFlag(`${flag} must be a duration such as 10s or 5m, got: ${value}`);
  }
  return ms;
}

export function registerReleaseCommand(program: Command, services: Services): void {
  withCommonOptions(
    program
      .command("release")
      .description("Upload a bundle or APK and release it to a track in one edit")
      .option("--track <track>", "target track (production, beta, alpha, internal)", "internal")
      .option("--bundle <path>", "path to an .aab bundle")
      .option("--apk <path>", "path to an .apk (use --bundle or --apk, not both)")
      .option(
        "--release-notes <notes>",
        'plain text, JSON [{"language":"en-US","text":"..."}] or @file'
      )
      .option("--rollout <fraction>", "staged rollout fraction, 0.0-1.0", "1.0")
      .option("--status <status>", "release status: draft, inProgress, halted, completed", "completed")
      .option("--version-name <name>", "release name shown in the Play Console")
      .option("--changes-not-sent-for-review", "commit without sending changes for review")
      .option("--wait", "wait until the release is visible on the track")
      .option("--poll-interval <duration>", "polling interval with --wait", "10s")
      .option("--wait-timeout <duration>", "give up waiting after this long", "10m")
  )
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Steps:")}
  ${chalk.yellow("1.")} Create an edit
  ${chalk.yellow("2.")} Upload the bundle or APK
  ${chalk.yellow("3.")} Put the version code on the track with notes and rollout
  ${chalk.yellow("4.")} Validate and commit the edit

${chalk.bold.cyan("Examples:")}
  gplay release --package com.example.app --bundle app.aab
  gplay release --package com.example.app --track production --bundle app.aab \\
    --release-notes @notes.json --rollout 0.1
`
    )
    .action(
      action(async (options: ReleaseOptions) => {
        validateOutputOptions(options);
        const artifact = resolveArtifact(options.bundle, options.apk);
        const rollout = parseFraction(options.rollout);
        const status = requireChoice(options.status, "--status", RELEASE_STATUSES);
        const releaseNotes =
          options.releaseNotes !== undefined ? parseReleaseNotes(options.releaseNotes) : undefined;
        const wait = options.wait
          ? {
              intervalMs: parseDurationFlag(options.pollInterval, "--poll-interval"),
              timeoutMs: parseDurationFlag(options.waitTimeout, "--wait-timeout"),
            }
          : undefined;

        const packageName = requirePackage(services, options.package);
        const result = await runRelease(
          services.publisher,
          {
            packageName,
            track: options.track,
            artifact,
            status,
            rollout,
            versionName: options.versionName?.trim() || undefined,
            releaseNotes,
            changesNotSentForReview: options.changesNotSentForReview,
            wait,
          },
          { delay: services.delay }
        );
        printOutput(result, options);
      })
    );
}
