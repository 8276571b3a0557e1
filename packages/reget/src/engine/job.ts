import type { ErrorCode } from "../lib/errors/types.js";
import type { ResumeToken } from "../lib/ports/transport.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type JobState =
  | "idle"
  | "active"
  | "paused"
  | "interrupted"
  | "completed"
  | "failed";

/** Classified failure shown to observers; never a raw transport error */
export interface JobError {
  code: ErrorCode;
  message: string;
}

export interface DownloadJob {
  state: JobState;
  sourceUrl?: string;
  resumeToken?: ResumeToken;
  downloadedBytes: number;
  /** -1 until the server reports a length */
  totalBytes: number;
  /** Fraction in [0, 1] */
  progress: number;
  /** True while a token for the partial payload is held */
  resumable: boolean;
  /** Set while the payload is being moved into place */
  finalizing: boolean;
  /** Where the completed payload was stored */
  savedPath?: string;
  error?: JobError;
}

/** Durable mirror of the parts of a job needed to resume after restart */
export interface PersistedRecord {
  sourceUrl: string;
  resumeToken?: ResumeToken;
  downloadedBytes: number;
  totalBytes: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const UNKNOWN_TOTAL = -1;

export function createIdleJob(): DownloadJob {
  return {
    state: "idle",
    downloadedBytes: 0,
    totalBytes: UNKNOWN_TOTAL,
    progress: 0,
    resumable: false,
    finalizing: false,
  };
}

/**
 * Progress fraction for a byte count, clamped to [0, 1].
 * Undefined while the total is unknown (zero or negative), so callers keep
 * the progress they already show instead of dividing by a placeholder.
 */
export function fractionOf(bytesReceived: number, bytesExpected: number): number | undefined {
  if (bytesExpected <= 0) return undefined;
  return Math.min(1, Math.max(0, bytesReceived / bytesExpected));
}

/** True when a job is moving bytes (or about to) */
export function isDownloading(job: DownloadJob): boolean {
  return job.state === "active";
}
