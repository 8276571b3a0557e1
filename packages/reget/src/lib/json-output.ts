/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

/** `reget status` */
export interface StatusResultJson {
  state: string;
  status: string;
  resumable: boolean;
  sourceUrl?: string;
  downloadedBytes: number;
  /** -1 when the server never reported a length */
  totalBytes: number;
  progress: number;
  savedPath?: string;
}

/** One line of `reget start --json`, emitted on every status change */
export interface ProgressEventJson {
  type: "status" | "done";
  timestamp: string;
  data: {
    state: string;
    status: string;
    progress: number;
    downloadedBytes: number;
    totalBytes: number;
    savedPath?: string;
  };
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (for streaming progress).
 */
export function outputNdjson(event: ProgressEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
