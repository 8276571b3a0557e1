import { errorMessage } from "../lib/errors/types.js";
import type { Logger } from "../lib/logger.js";
import type { TimerService } from "../lib/ports/timer.js";
import type { ResumeToken, TransferIdentity, TransferTransport } from "../lib/ports/transport.js";
import type { CompletionHandler } from "./completion.js";
import { createIdleJob, fractionOf, type DownloadJob, type PersistedRecord } from "./job.js";
import type { ProgressPublisher } from "./publisher.js";
import { TransferSession, type SessionOutcome } from "./session.js";
import type { PersistentStateStore } from "./state-store.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Automatic restarts after an interruption or failure; 0 leaves it to the user */
  attempts: number;
  /** Base delay, doubled after every attempt */
  delayMs: number;
}

export interface ResumeCoordinatorOptions {
  transport: TransferTransport;
  stateStore: PersistentStateStore;
  completion: CompletionHandler;
  publisher: ProgressPublisher;
  timers: TimerService;
  retry: RetryPolicy;
  logger: Logger;
}

/**
 * Job to present after a restart. Only a record holding a token is worth
 * offering as "resume"; anything else starts idle.
 */
export function restoreJob(record: PersistedRecord | undefined): DownloadJob {
  if (!record?.resumeToken) return createIdleJob();
  return {
    ...createIdleJob(),
    state: "interrupted",
    sourceUrl: record.sourceUrl,
    resumeToken: record.resumeToken,
    downloadedBytes: record.downloadedBytes,
    totalBytes: record.totalBytes,
    progress: fractionOf(record.downloadedBytes, record.totalBytes) ?? 0,
    resumable: true,
  };
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/**
 * Connects a process to whatever job an earlier process left behind, and
 * decides which URL and token a start actually uses.
 */
export class ResumeCoordinator {
  readonly session: TransferSession;

  private readonly transport: TransferTransport;
  private readonly timers: TimerService;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  private retryTimer: NodeJS.Timeout | undefined;
  private retryCount = 0;

  constructor(options: ResumeCoordinatorOptions) {
    this.transport = options.transport;
    this.timers = options.timers;
    this.retry = options.retry;
    this.logger = options.logger.child({ component: "coordinator" });

    const record = options.stateStore.load();
    const job = restoreJob(record);
    if (record && !record.resumeToken) {
      // a record without a token cannot be continued; forget it
      options.stateStore.clear();
    }

    this.session = new TransferSession({
      transport: options.transport,
      stateStore: options.stateStore,
      completion: options.completion,
      publisher: options.publisher,
      logger: options.logger,
      job,
      onOutcome: (outcome) => this.handleOutcome(outcome),
    });

    options.publisher.publish(job, { immediate: true });
    if (job.resumable) {
      this.logger.debug("Restored interrupted download", {
        url: job.sourceUrl,
        offset: job.downloadedBytes,
      });
    }
  }

  get job(): DownloadJob {
    return this.session.job;
  }

  /** True while an automatic restart is waiting on its timer */
  get retryPending(): boolean {
    return this.retryTimer !== undefined;
  }

  /**
   * Start or resume. A stored token always wins: the interrupted download is
   * finished before a new URL is accepted. Returns the live identity, or
   * undefined when the previous transfer is still being finalized.
   */
  start(url?: string): TransferIdentity | undefined {
    if (this.session.job.state === "active") {
      this.logger.debug("Start ignored, already downloading");
      return this.session.activeIdentity;
    }
    this.resetRetry();
    return this.issue(url);
  }

  async pause(): Promise<ResumeToken | undefined> {
    this.resetRetry();
    return this.session.pause();
  }

  async cancel(): Promise<void> {
    this.resetRetry();
    await this.session.cancel();
  }

  /**
   * Re-attach to transfers that kept running while nobody listened. The
   * newest becomes current, older ones are cancelled without a token.
   * `onReady` runs exactly once, whatever happens.
   */
  async reconnect(onReady: () => void): Promise<void> {
    try {
      const live = await this.transport.liveTransfers();
      const newest = live[live.length - 1];

      if (newest === undefined) {
        this.logger.debug("No live transfers to reconnect");
        return;
      }

      if (newest !== this.session.activeIdentity) {
        this.resetRetry();
        this.session.bind(newest);
      }

      for (const stale of live.slice(0, -1)) {
        try {
          await this.transport.cancel(stale, false);
        } catch (error) {
          this.logger.warn("Failed to cancel stale transfer", { identity: stale, error: errorMessage(error) });
        }
      }
      this.logger.debug("Reconnected", { identity: newest, stale: live.length - 1 });
    } catch (error) {
      this.logger.warn("Couldn't enumerate live transfers", { error: errorMessage(error) });
    } finally {
      onReady();
    }
  }

  /** Pause a live transfer so its token reaches the store, and stop retrying */
  async shutdown(): Promise<void> {
    this.resetRetry();
    if (this.session.job.state === "active") {
      await this.session.pause();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private issue(url?: string): TransferIdentity {
    const { sourceUrl, resumeToken } = this.session.job;

    if (resumeToken && sourceUrl !== undefined) {
      if (url !== undefined && url.trim() !== sourceUrl) {
        this.logger.info("Finishing the interrupted download first", { requested: url, resuming: sourceUrl });
      }
      return this.session.start(sourceUrl, resumeToken);
    }

    // an empty source is rejected by the session as INVALID_SOURCE
    return this.session.start(url ?? sourceUrl ?? "");
  }

  private handleOutcome(outcome: SessionOutcome): void {
    if (outcome === "completed") {
      this.retryCount = 0;
      return;
    }
    if (this.retryCount >= this.retry.attempts) return;

    const delay = this.retry.delayMs * Math.pow(2, this.retryCount);
    this.retryCount++;
    this.logger.warn("Scheduling automatic retry", {
      outcome,
      retryCount: this.retryCount,
      maxRetries: this.retry.attempts,
      retryDelayMs: delay,
    });

    this.clearRetryTimer();
    this.retryTimer = this.timers.setTimeout(() => {
      this.retryTimer = undefined;
      const state = this.session.job.state;
      if (state !== "interrupted" && state !== "failed") return;
      try {
        this.issue();
      } catch (error) {
        this.logger.error("Automatic retry failed", { error: errorMessage(error) });
      }
    }, delay);
  }

  private resetRetry(): void {
    this.retryCount = 0;
    this.clearRetryTimer();
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      this.timers.clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }
}
