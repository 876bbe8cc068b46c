/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors
  | "AUTH_NO_CREDENTIALS"
  | "AUTH_PROFILE_NOT_FOUND"
  | "AUTH_INVALID_PROFILE"
  | "AUTH_STRICT_CONFLICT"
  | "AUTH_ENV_INCOMPLETE"
  | "AUTH_KEY_UNREADABLE"
  | "AUTH_TOKEN_UNREADABLE"
  | "AUTH_LOGIN_FAILED"
  // Config errors
  | "CONFIG_INVALID"
  | "CONFIG_EXISTS"
  // File errors
  | "FILE_NOT_FOUND"
  | "FILE_NOT_READABLE"
  | "FILE_IS_DIRECTORY"
  // Validation errors
  | "VALIDATION_MISSING_FLAG"
  | "VALIDATION_INVALID_FLAG"
  | "VALIDATION_INVALID_JSON"
  | "VALIDATION_CONFIRM_REQUIRED"
  // Release workflow errors
  | "RELEASE_NOT_FOUND"
  | "RELEASE_STEP_FAILED"
  | "RELEASE_WAIT_TIMEOUT"
  // API errors
  | "API_BAD_REQUEST"
  | "API_UNAUTHORIZED"
  | "API_FORBIDDEN"
  | "API_NOT_FOUND"
  | "API_CONFLICT"
  | "API_RATE_LIMITED"
  | "API_SERVER_ERROR"
  // Network errors
  | "NETWORK_OFFLINE"
  | "NETWORK_TIMEOUT"
  // Local validation reported a failing result that was already printed
  | "VALIDATION_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  docs?: string;
  details?: string;
  status?: number;
  cause?: unknown;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly docs?: string;
  readonly details?: string;
  /** HTTP status when the error came from an API response */
  readonly status?: number;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.docs = options?.docs;
    this.details = options?.details;
    this.status = options?.status;
  }

  /**
   * Copy of this error with the message prefixed by an operation name,
   * e.g. "failed to get track: Track not found".
   */
  withOperation(operation: string): CLIError {
    return new CLIError(this.code, `${operation}: ${this.message}`, {
      suggestion: this.suggestion,
      example: this.example,
      examples: this.examples,
      docs: this.docs,
      details: this.details,
      status: this.status,
      cause: this,
    });
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Signals that the command already printed its output and only the exit
 * status remains to be set.
 */
export class ReportedError extends CLIError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ReportedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
