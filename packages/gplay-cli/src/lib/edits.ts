import type { androidpublisher_v3 } from "googleapis";
import type { ApiClient } from "./api-client.js";
import { isDryRun } from "./cli-context.js";
import { CLIError, errorMessage, isCLIError } from "./errors/types.js";

export type AppEdit = androidpublisher_v3.Schema$AppEdit;
export type Track = androidpublisher_v3.Schema$Track;
export type TrackRelease = androidpublisher_v3.Schema$TrackRelease;
export type Bundle = androidpublisher_v3.Schema$Bundle;
export type Apk = androidpublisher_v3.Schema$Apk;
export type Listing = androidpublisher_v3.Schema$Listing;
export type ListingsListResponse = androidpublisher_v3.Schema$ListingsListResponse;

/** Edit id used for requests made under --dry-run, where no edit is created. */
export const DRY_RUN_EDIT_ID = "dry-run";

export type ReleaseStatus = "draft" | "inProgress" | "halted" | "completed";

export const RELEASE_STATUSES: ReleaseStatus[] = ["draft", "inProgress", "halted", "completed"];

/** `applications/<pkg>/<segments...>` with each segment URL-encoded */
export function appPath(packageName: string, ...segments: Array<string | number>): string {
  return ["applications", packageName, ...segments]
    .map((segment) => encodeURIComponent(String(segment)))
    .join("/");
}

/** `applications/<pkg>/edits/<edit>/<segments...>` */
export function editPath(
  packageName: string,
  editId: string,
  ...segments: Array<string | number>
): string {
  return appPath(packageName, "edits", editId, ...segments);
}

/**
 * Run one step of a multi-request workflow; failures are prefixed with the
 * operation name ("failed to get track: ...").
 */
export async function step<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isCLIError(err)) {
      throw err.withOperation(operation);
    }
    throw new CLIError("RELEASE_STEP_FAILED", `${operation}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function createEdit(client: ApiClient, packageName: string): Promise<string> {
  const edit = await client.post<AppEdit>(appPath(packageName, "edits"), {});
  if (edit.id) return edit.id;
  if (isDryRun()) return DRY_RUN_EDIT_ID;
  throw new CLIError("UNKNOWN_ERROR", "edit response did not include an id");
}

export async function deleteEdit(
  client: ApiClient,
  packageName: string,
  editId: string
): Promise<void> {
  await client.delete(editPath(packageName, editId));
}

export interface TemporaryEditOptions {
  /** Report a failed cleanup; defaults to a warning on stderr */
  onCleanupError?: (editId: string, error: unknown) => void;
}

/**
 * Run `fn` under the given edit, or under a fresh edit that is deleted
 * afterwards. The second argument tells whether the edit is temporary.
 */
export async function withEdit<T>(
  client: ApiClient,
  packageName: string,
  editId: string | undefined,
  fn: (editId: string, temporary: boolean) => Promise<T>,
  { onCleanupError }: TemporaryEditOptions = {}
): Promise<T> {
  const given = editId?.trim();
  if (given) {
    return fn(given, false);
  }

  const created = await step("failed to create edit", () => createEdit(client, packageName));
  try {
    return await fn(created, true);
  } finally {
    try {
      await deleteEdit(client, packageName, created);
    } catch (err) {
      if (onCleanupError) {
        onCleanupError(created, err);
      } else {
        console.error(`Warning: failed to delete temporary edit ${created}: ${errorMessage(err)}`);
      }
    }
  }
}

export function commitQuery(changesNotSentForReview: boolean | undefined): {
  changesNotSentForReview?: boolean;
} {
  return changesNotSentForReview ? { changesNotSentForReview: true } : {};
}

/**
 * Apply a rollout fraction to a release. Below 1 the release becomes a
 * staged rollout: `completed` is turned into `inProgress` with the fraction.
 * Draft and halted releases keep no fraction.
 */
export function applyRollout(release: TrackRelease, rollout: number): TrackRelease {
  const next: TrackRelease = { ...release };
  if (rollout < 1 && (next.status === "inProgress" || next.status === "completed")) {
    next.status = "inProgress";
    next.userFraction = rollout;
  }
  return next;
}

/** The fraction to report for a release, when it is a staged rollout. */
export function stagedFraction(release: TrackRelease): number | undefined {
  const fraction = release.userFraction;
  return typeof fraction === "number" && fraction > 0 && fraction < 1 ? fraction : undefined;
}
