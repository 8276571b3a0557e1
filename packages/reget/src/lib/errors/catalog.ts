import { DownloadError } from "./types.js";

/**
 * Factory functions for DownloadErrors, so every code is raised with the
 * same wording wherever it originates.
 */

// ============================================================================
// Transfer Errors
// ============================================================================

export function invalidSource(url: string, reason?: string): DownloadError {
  return new DownloadError("INVALID_SOURCE", `"${url}" is not a valid download URL`, {
    suggestion: "Use an absolute http:// or https:// address",
    example: "reget start https://example.com/file.bin",
    details: reason,
  });
}

export function cancelled(): DownloadError {
  return new DownloadError("CANCELLED", "Download cancelled");
}

export function resumable(details?: string): DownloadError {
  return new DownloadError("RESUMABLE", "Download interrupted", {
    suggestion: "Run the command below to continue where it stopped",
    example: "reget start",
    details,
  });
}

export function unrecoverable(message: string, cause?: unknown): DownloadError {
  return new DownloadError("UNRECOVERABLE", message, {
    suggestion: "Start the download again; it cannot be resumed",
    cause,
  });
}

export function finalizeFailed(destination: string, reason?: string): DownloadError {
  return new DownloadError("STORAGE_FINALIZE_FAILED", `Couldn't move the download to "${destination}"`, {
    suggestion: "Check that the download directory is writable",
    details: reason,
  });
}

// ============================================================================
// CLI Errors
// ============================================================================

export function nothingToResume(): DownloadError {
  return new DownloadError("NOTHING_TO_RESUME", "There is no interrupted download to resume", {
    suggestion: "Pass a URL to start a new download",
    example: "reget start https://example.com/file.bin",
  });
}

export function invalidConfig(path: string, issues: string[]): DownloadError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new DownloadError("CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): DownloadError {
  const message = error instanceof Error ? error.message : String(error);
  return new DownloadError("UNKNOWN_ERROR", message, { cause: error });
}

// ============================================================================
// HTTP Status Mapping
// ============================================================================

/**
 * Convert an HTTP error response into a message for an unrecoverable failure.
 */
/** Statuses worth retrying later: the partial payload stays valid */
export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export function fromHttpStatus(status: number, statusText: string): DownloadError {
  const label = statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`;

  switch (status) {
    case 401:
    case 403:
      return new DownloadError("UNRECOVERABLE", `${label}: access denied`, {
        suggestion: "The server refused the request; credentials are not supported",
      });
    case 404:
    case 410:
      return new DownloadError("UNRECOVERABLE", `${label}: file not found`, {
        suggestion: "Check the URL is correct",
      });
    case 408:
      return new DownloadError("RESUMABLE", `${label}: request timed out`, {
        suggestion: "Check your connection and run the download again",
        example: "reget start",
      });
    case 429:
      return new DownloadError("RESUMABLE", `${label}: too many requests`, {
        suggestion: "Wait a moment before resuming",
        example: "reget start",
      });
    default:
      if (isTransientStatus(status)) {
        return new DownloadError("RESUMABLE", `${label}: server error`, {
          suggestion: "This is usually temporary. Try again in a few minutes",
          example: "reget start",
        });
      }
      return new DownloadError("UNRECOVERABLE", label);
  }
}
