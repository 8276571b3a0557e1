/**
 * Spinner that follows a download's status, respecting quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import type { DownloadStatus } from "../engine/publisher.js";

export interface ProgressSpinner {
  /** Reflect a status; terminal states stop the spinner with a symbol */
  update(status: DownloadStatus): void;
  stop(): void;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements ProgressSpinner {
  update(_status: DownloadStatus): void {}

  stop(): void {}
}

/**
 * Wrapper around ora.
 */
class OraSpinner implements ProgressSpinner {
  private readonly ora: Ora;

  constructor(text?: string) {
    this.ora = ora(text);
  }

  update(status: DownloadStatus): void {
    switch (status.state) {
      case "active":
        if (this.ora.isSpinning) {
          this.ora.text = status.status;
        } else {
          this.ora.start(status.status);
        }
        return;
      case "completed":
        this.ora.succeed(status.savedPath ? `${status.status}: ${status.savedPath}` : status.status);
        return;
      case "paused":
        this.ora.warn(status.status);
        return;
      // failures are rendered as errors by the command
      case "failed":
      case "interrupted":
      case "idle":
        this.ora.stop();
        return;
    }
  }

  stop(): void {
    this.ora.stop();
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export function createSpinner(text?: string): ProgressSpinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
