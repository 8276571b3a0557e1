import { errorMessage } from "../lib/errors/types.js";
import type { Logger } from "../lib/logger.js";
import type { Scheduler, TimerService } from "../lib/ports/timer.js";
import { isDownloading, type DownloadJob, type JobError, type JobState } from "./job.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the presentation layer sees */
export interface DownloadStatus {
  state: JobState;
  /** Fraction in [0, 1] */
  progress: number;
  status: string;
  isDownloading: boolean;
  downloadedBytes: number;
  totalBytes: number;
  resumable: boolean;
  sourceUrl?: string;
  savedPath?: string;
  error?: JobError;
}

export type StatusListener = (status: DownloadStatus) => void;

export interface ProgressPublisherOptions {
  scheduler: Scheduler;
  timers: TimerService;
  /** Minimum gap between progress-only publications; 0 disables throttling */
  intervalMs: number;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const BYTES_PER_MB = 1_048_576;

export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(2);
}

/**
 * Human-readable status line for a job.
 */
export function formatStatus(job: DownloadJob): string {
  switch (job.state) {
    case "idle":
      return "Idle";
    case "active": {
      if (job.finalizing) return "Finalizing...";
      if (job.totalBytes > 0) {
        const percent = (clampFraction(job.progress) * 100).toFixed(1);
        return `Downloading... ${percent}% (${formatMegabytes(job.downloadedBytes)} MB of ${formatMegabytes(job.totalBytes)} MB)`;
      }
      if (job.downloadedBytes > 0) {
        return `Downloading... ${formatMegabytes(job.downloadedBytes)} MB`;
      }
      return "Starting download...";
    }
    case "paused":
      return "Paused";
    case "interrupted":
      return job.resumable ? "Interrupted (resumable)" : "Paused (not resumable)";
    case "completed":
      return "Download complete";
    case "failed":
      if (job.error?.code === "INVALID_SOURCE") return "Invalid URL";
      return job.error ? `Error: ${job.error.message}` : "Error";
  }
}

function clampFraction(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function toStatus(job: DownloadJob): DownloadStatus {
  return {
    state: job.state,
    progress: clampFraction(job.progress),
    status: formatStatus(job),
    isDownloading: isDownloading(job),
    downloadedBytes: job.downloadedBytes,
    totalBytes: job.totalBytes,
    resumable: job.resumable,
    ...(job.sourceUrl !== undefined && { sourceUrl: job.sourceUrl }),
    ...(job.savedPath !== undefined && { savedPath: job.savedPath }),
    ...(job.error !== undefined && { error: { ...job.error } }),
  };
}

// ---------------------------------------------------------------------------
// Publisher
// ---------------------------------------------------------------------------

/**
 * Turns job mutations into a throttled stream of status snapshots.
 *
 * Delivery always happens on the scheduler, never on the stack that
 * mutated the job, so a slow observer cannot stall the transport's event
 * delivery. State transitions are delivered in order and immediately;
 * progress-only updates are coalesced to one per interval, latest wins.
 */
export class ProgressPublisher {
  private readonly listeners = new Set<StatusListener>();
  private latest: DownloadStatus;
  private pending: DownloadStatus | undefined;
  private throttle: NodeJS.Timeout | undefined;

  constructor(
    initial: DownloadJob,
    private readonly options: ProgressPublisherOptions
  ) {
    this.latest = toStatus(initial);
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Most recent status, including changes not yet delivered */
  snapshot(): DownloadStatus {
    return this.latest;
  }

  publish(job: DownloadJob, { immediate }: { immediate: boolean }): void {
    const status = toStatus(job);
    this.latest = status;

    if (immediate || this.options.intervalMs <= 0) {
      this.pending = undefined;
      this.stopThrottle();
      this.deliver(status);
      return;
    }

    if (this.throttle) {
      this.pending = status;
      return;
    }

    this.deliver(status);
    this.startThrottle();
  }

  dispose(): void {
    this.pending = undefined;
    this.stopThrottle();
  }

  private startThrottle(): void {
    this.throttle = this.options.timers.setTimeout(() => {
      this.throttle = undefined;
      const next = this.pending;
      if (!next) return;
      this.pending = undefined;
      this.deliver(next);
      this.startThrottle();
    }, this.options.intervalMs);
  }

  private stopThrottle(): void {
    if (this.throttle) {
      this.options.timers.clearTimeout(this.throttle);
      this.throttle = undefined;
    }
  }

  /** Listeners subscribed after a publish do not receive it */
  private deliver(status: DownloadStatus): void {
    const listeners = [...this.listeners];
    this.options.scheduler.schedule(() => {
      for (const listener of listeners) {
        if (!this.listeners.has(listener)) continue;
        try {
          listener(status);
        } catch (error) {
          this.options.logger.warn("Status listener threw", {
            error: errorMessage(error),
          });
        }
      }
    });
  }
}
