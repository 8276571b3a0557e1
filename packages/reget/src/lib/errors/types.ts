/**
 * Error codes for every failure the engine and CLI can report.
 * Transport errors are always classified into one of these before
 * they reach an observer.
 */
export type ErrorCode =
  // Transfer outcomes
  | "INVALID_SOURCE"
  | "CANCELLED"
  | "RESUMABLE"
  | "UNRECOVERABLE"
  | "STORAGE_FINALIZE_FAILED"
  // CLI / setup
  | "NOTHING_TO_RESUME"
  | "CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error carrying a taxonomy code plus optional guidance for the user.
 */
export class DownloadError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "DownloadError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a DownloadError.
 */
export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}

/** Narrow an unknown thrown value to a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
