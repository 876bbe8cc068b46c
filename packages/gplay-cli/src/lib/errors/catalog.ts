import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function noCredentials(): CLIError {
  return new CLIError("AUTH_NO_CREDENTIALS", "no credentials found", {
    suggestion:
      "Run `gplay auth login` or set GPLAY_SERVICE_ACCOUNT_JSON / GPLAY_OAUTH_TOKEN_PATH.",
    examples: [
      "gplay auth login --service-account ./play-key.json",
      "GPLAY_SERVICE_ACCOUNT_JSON=./play-key.json gplay tracks list --package com.example.app",
    ],
  });
}

export function profileNotFound(name: string): CLIError {
  return new CLIError("AUTH_PROFILE_NOT_FOUND", `profile not found: ${name}`, {
    suggestion:
      "Run `gplay auth login --profile <name>` or set GPLAY_PROFILE to an existing profile.",
  });
}

export function invalidProfile(reason: string, suggestion: string): CLIError {
  return new CLIError("AUTH_INVALID_PROFILE", reason, { suggestion });
}

export function strictAuthConflict(): CLIError {
  return new CLIError(
    "AUTH_STRICT_CONFLICT",
    "strict auth: profile selected but environment credentials also present",
    { suggestion: "Unset environment credentials or set GPLAY_STRICT_AUTH=false." }
  );
}

export function oauthEnvIncomplete(): CLIError {
  return new CLIError(
    "AUTH_ENV_INCOMPLETE",
    "oauth env vars incomplete: missing GPLAY_OAUTH_CLIENT_ID or GPLAY_OAUTH_CLIENT_SECRET",
    { suggestion: "Set both env vars or use `gplay auth login` to create a profile." }
  );
}

export function keyUnreadable(path: string, reason: string): CLIError {
  return new CLIError("AUTH_KEY_UNREADABLE", `failed to read service account file: ${reason}`, {
    suggestion: `Check that ${path} exists and is readable (configured via profile key_path or GPLAY_SERVICE_ACCOUNT_JSON).`,
  });
}

export function tokenUnreadable(path: string, reason: string): CLIError {
  return new CLIError("AUTH_TOKEN_UNREADABLE", `failed to read OAuth token file: ${reason}`, {
    suggestion: `Check that ${path} exists, or run \`gplay auth login\` again.`,
  });
}

export function loginFailed(reason: string): CLIError {
  return new CLIError("AUTH_LOGIN_FAILED", reason, {
    suggestion: "Retry `gplay auth login`, or use --service-account for headless setups.",
  });
}

// ============================================================================
// Config Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new CLIError("CONFIG_INVALID", `failed to load config ${path}`, {
    suggestion:
      "Check that your config file is valid JSON and readable. Use `gplay auth init` to recreate it.",
    details,
  });
}

export function configExists(path: string): CLIError {
  return new CLIError("CONFIG_EXISTS", `config already exists: ${path}`, {
    suggestion: "Use --force to overwrite it.",
  });
}

// ============================================================================
// File Errors
// ============================================================================

export function fileNotFound(path: string): CLIError {
  return new CLIError("FILE_NOT_FOUND", `file not found: ${path}`, {
    suggestion: "Check the file path exists and try again",
  });
}

export function fileNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("FILE_NOT_READABLE", `can't read "${path}"`, {
    suggestion: "Check file permissions or if another app has it open",
    details: reason,
  });
}

export function fileIsDirectory(path: string): CLIError {
  return new CLIError("FILE_IS_DIRECTORY", `"${path}" is a directory, not a file`, {
    suggestion: "Provide a path to a specific file",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingFlag(flag: string, command?: string): CLIError {
  return new CLIError("VALIDATION_MISSING_FLAG", `${flag} is required`, {
    examples: command ? [`gplay ${command} --help`] : undefined,
  });
}

export function invalidFlag(message: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_FLAG", message, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function invalidJson(source: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_JSON", `invalid JSON in ${source}: ${reason}`, {
    suggestion: "Pass inline JSON or @path/to/file.json",
  });
}

export function confirmRequired(action: string): CLIError {
  return new CLIError("VALIDATION_CONFIRM_REQUIRED", `--confirm is required to ${action}`);
}

// ============================================================================
// Release Workflow Errors
// ============================================================================

export function noActiveRelease(track: string, kind: "active" | "active or halted"): CLIError {
  return new CLIError("RELEASE_NOT_FOUND", `no ${kind} release found in ${track} track`, {
    suggestion: `Check the releases with: gplay tracks get --track ${track}`,
  });
}

export function waitTimedOut(versionCode: string, track: string): CLIError {
  return new CLIError(
    "RELEASE_WAIT_TIMEOUT",
    `timed out waiting for version ${versionCode} to appear on ${track}`,
    { suggestion: "Increase --wait-timeout or check the Play Console for processing errors." }
  );
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(host: string, reason?: string): CLIError {
  return new CLIError("NETWORK_OFFLINE", `can't connect to ${host}`, {
    suggestion: "Check your internet connection and try again",
    details: reason,
  });
}

export function networkTimeout(timeoutMs?: number): CLIError {
  const after = timeoutMs ? ` after ${Math.round(timeoutMs / 1000)}s` : "";
  return new CLIError("NETWORK_TIMEOUT", `request timed out${after}`, {
    suggestion: "Raise GPLAY_TIMEOUT (or GPLAY_UPLOAD_TIMEOUT for uploads) and try again.",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}

// ============================================================================
// HTTP Status Code Mapping
// ============================================================================

const HTTP_HINTS: Record<number, string> = {
  400: "Check request parameters and file type. Use --help to verify flags.",
  401: "Check that the service account or OAuth token is valid and has access to the Play Console.",
  403: "Check that the account has the required Play Console permission (for uploads, Release Manager is typically required).",
  404: "Check that the package name, edit ID, and resource IDs are correct.",
  409: "Another edit may be open for this app. Delete it or retry later.",
  429: "Rate limit reached. Wait a moment and try again.",
};

/**
 * Convert an HTTP error response from a Google API to a CLIError.
 */
export function fromHttpStatus(status: number, statusText: string, payload?: unknown): CLIError {
  const message = extractErrorMessage(payload) ?? `${status} ${statusText}`.trim();
  const suggestion = HTTP_HINTS[status];

  switch (status) {
    case 400:
      return new CLIError("API_BAD_REQUEST", message, { suggestion, status });
    case 401:
      return new CLIError("API_UNAUTHORIZED", message, { suggestion, status });
    case 403:
      return new CLIError("API_FORBIDDEN", message, { suggestion, status });
    case 404:
      return new CLIError("API_NOT_FOUND", message, { suggestion, status });
    case 409:
      return new CLIError("API_CONFLICT", message, { suggestion, status });
    case 429:
      return new CLIError("API_RATE_LIMITED", message, { suggestion, status });
    default:
      if (status >= 500) {
        return new CLIError("API_SERVER_ERROR", message, {
          suggestion: "Google Play returned a server error. Try again in a few minutes.",
          status,
        });
      }
      return new CLIError("UNKNOWN_ERROR", `request failed (${status} ${statusText}): ${message}`, {
        status,
      });
  }
}

/**
 * Extract error message from a Google API error payload:
 * `{ "error": { "code": 404, "message": "...", "status": "NOT_FOUND" } }`
 */
export function extractErrorMessage(payload: unknown): string | undefined {
  if (payload === undefined || payload === null || payload === "") return undefined;
  if (typeof payload === "string") return payload;
  if (typeof payload !== "object") return undefined;

  if ("error" in payload) {
    const inner = payload.error;
    if (typeof inner === "string") {
      if ("error_description" in payload && typeof payload.error_description === "string") {
        return payload.error_description;
      }
      return inner;
    }
    if (inner && typeof inner === "object" && "message" in inner && typeof inner.message === "string") {
      return inner.message;
    }
  }
  if ("message" in payload && typeof payload.message === "string") {
    return payload.message;
  }
  return JSON.stringify(payload);
}
