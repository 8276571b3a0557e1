import { invalidSource, unrecoverable } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import type { Logger } from "../lib/logger.js";
import type {
  ResumeToken,
  TransferEventListener,
  TransferFailure,
  TransferIdentity,
  TransferTransport,
} from "../lib/ports/transport.js";
import type { CompletionHandler } from "./completion.js";
import { createIdleJob, fractionOf, type DownloadJob } from "./job.js";
import type { ProgressPublisher } from "./publisher.js";
import type { PersistentStateStore } from "./state-store.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Terminal result of one transfer, reported after the job was updated */
export type SessionOutcome = "completed" | "interrupted" | "failed";

export interface TransferSessionOptions {
  transport: TransferTransport;
  stateStore: PersistentStateStore;
  completion: CompletionHandler;
  publisher: ProgressPublisher;
  logger: Logger;
  /** Job to start from, e.g. one restored from the persisted record */
  job?: DownloadJob;
  onOutcome?: (outcome: SessionOutcome) => void;
}

/**
 * Parse a download source; only absolute http(s) URLs are accepted.
 */
export function parseSource(url: string): URL | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return undefined;
  }
  return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed : undefined;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

/**
 * Owns at most one live transfer and folds its events into the job.
 *
 * Every command clears or replaces `current` before awaiting the transport,
 * so late events from the outgoing transfer fail the identity check and are
 * dropped. `epoch` changes on every command; async continuations compare it
 * to find out whether a newer command superseded them.
 */
export class TransferSession implements TransferEventListener {
  private state: DownloadJob;
  private current: TransferIdentity | undefined;
  private epoch = 0;

  private readonly transport: TransferTransport;
  private readonly stateStore: PersistentStateStore;
  private readonly completion: CompletionHandler;
  private readonly publisher: ProgressPublisher;
  private readonly logger: Logger;
  private readonly onOutcome?: (outcome: SessionOutcome) => void;

  constructor(options: TransferSessionOptions) {
    this.transport = options.transport;
    this.stateStore = options.stateStore;
    this.completion = options.completion;
    this.publisher = options.publisher;
    this.logger = options.logger.child({ component: "session" });
    this.onOutcome = options.onOutcome;
    this.state = options.job ?? createIdleJob();

    this.transport.bind(this);
  }

  get job(): DownloadJob {
    return this.state;
  }

  get activeIdentity(): TransferIdentity | undefined {
    return this.current;
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /**
   * Issue a transfer for `url`, continuing from `resumeToken` when given.
   * Throws INVALID_SOURCE (after flagging the job) if `url` is unusable.
   */
  start(url: string, resumeToken?: ResumeToken): TransferIdentity {
    const source = parseSource(url);
    if (!source) {
      const error = invalidSource(url);
      this.update({ ...this.state, state: "failed", finalizing: false, error: { code: error.code, message: error.message } });
      this.logger.warn("Rejected download source", { url });
      throw error;
    }

    this.epoch++;
    this.dropLiveTransfer();

    let identity: TransferIdentity | undefined;

    if (resumeToken) {
      try {
        identity = this.transport.issueResumedTransfer(resumeToken);
      } catch (error) {
        this.logger.warn("Resume token rejected, starting over", { error: errorMessage(error) });
        // settles on its own; discard failures are logged
        void this.discardQuietly(resumeToken);
      }
    }

    const resumed = identity !== undefined;

    if (identity === undefined) {
      try {
        identity = this.transport.issueNewTransfer(source);
      } catch (error) {
        const failure = unrecoverable(errorMessage(error), error);
        this.update({ ...this.state, state: "failed", error: { code: failure.code, message: failure.message } });
        throw failure;
      }
      // A full download invalidates whatever partial state was kept
      this.stateStore.clear();
    }

    this.current = identity;
    const base = resumed ? this.state : createIdleJob();
    this.update({
      ...base,
      state: "active",
      sourceUrl: source.href,
      resumeToken: resumed ? resumeToken : undefined,
      resumable: false,
      finalizing: false,
      savedPath: undefined,
      error: undefined,
    });

    this.logger.debug(resumed ? "Resumed transfer" : "Started transfer", {
      identity,
      url: source.href,
      offset: this.state.downloadedBytes,
    });
    return identity;
  }

  /**
   * Stop the live transfer, keeping what was received when the transport can
   * describe it with a token. Returns that token (also persisted).
   */
  async pause(): Promise<ResumeToken | undefined> {
    const identity = this.current;
    if (this.state.state !== "active" || identity === undefined) {
      return undefined;
    }

    const epoch = ++this.epoch;
    this.current = undefined;

    let token: ResumeToken | undefined;
    try {
      token = await this.transport.cancel(identity, true);
    } catch (error) {
      this.logger.warn("Transport failed to produce a resume token", { identity, error: errorMessage(error) });
    }

    if (epoch !== this.epoch) {
      // cancelled (or restarted) while we waited: the partial payload is unwanted
      if (token) await this.discardQuietly(token);
      return undefined;
    }

    const sourceUrl = this.state.sourceUrl;
    if (!token || sourceUrl === undefined) {
      this.stateStore.clear();
      this.update({ ...createIdleJob(), state: "interrupted", sourceUrl });
      this.logger.warn("Paused without a resume token; the next start begins from zero", { identity });
      return undefined;
    }

    this.update({ ...this.state, state: "paused", resumeToken: token, resumable: true });
    this.persist();
    this.logger.debug("Paused transfer", { identity, offset: this.state.downloadedBytes });
    return token;
  }

  /**
   * Tear everything down: live transfer, resume token, partial payload and
   * persisted record. Always ends in a zeroed idle job.
   */
  async cancel(): Promise<void> {
    this.epoch++;
    const identity = this.current;
    const token = this.state.resumeToken;

    this.current = undefined;
    this.stateStore.clear();
    this.update(createIdleJob());

    try {
      if (identity !== undefined) {
        await this.transport.cancel(identity, false);
      } else if (token) {
        await this.transport.discard(token);
      }
    } catch (error) {
      this.logger.warn("Failed to tear down transfer", { identity, error: errorMessage(error) });
    }
    this.logger.debug("Cancelled", { identity });
  }

  /** Adopt a transfer that kept running without us (see ResumeCoordinator.reconnect) */
  bind(identity: TransferIdentity): void {
    this.epoch++;
    this.current = identity;
    this.update({ ...this.state, state: "active", resumable: false, finalizing: false, error: undefined });
    this.logger.debug("Bound live transfer", { identity });
  }

  /** Persist the current job as a resumable record (when it has a token) */
  persist(): void {
    const { sourceUrl, resumeToken } = this.state;
    if (sourceUrl === undefined || !resumeToken) return;
    this.stateStore.save({
      sourceUrl,
      resumeToken,
      downloadedBytes: this.state.downloadedBytes,
      totalBytes: this.state.totalBytes,
    });
  }

  // -------------------------------------------------------------------------
  // Transport events
  // -------------------------------------------------------------------------

  onProgress(identity: TransferIdentity, bytesReceived: number, bytesExpected: number): void {
    if (!this.owns(identity, "progress")) return;

    const previous = this.state;
    const fraction = fractionOf(bytesReceived, bytesExpected);
    let progress = previous.progress;
    if (fraction !== undefined) {
      // only a transport restarting from zero may move progress backwards
      progress = bytesReceived >= previous.downloadedBytes ? Math.max(progress, fraction) : fraction;
    }

    this.update(
      {
        ...previous,
        downloadedBytes: bytesReceived,
        totalBytes: bytesExpected > 0 ? bytesExpected : previous.totalBytes,
        progress,
      },
      false
    );
  }

  onFailure(identity: TransferIdentity, failure: TransferFailure): void {
    if (!this.owns(identity, "failure")) return;
    this.current = undefined;
    this.epoch++;

    if (failure.kind === "cancelled") {
      this.logger.debug("Transfer cancelled by transport", { identity });
      this.stateStore.clear();
      this.update(createIdleJob());
      return;
    }

    if (failure.resumeToken) {
      this.update({
        ...this.state,
        state: "interrupted",
        resumeToken: failure.resumeToken,
        resumable: true,
        error: undefined,
      });
      this.persist();
      this.logger.warn("Transfer interrupted, resumable", {
        identity,
        offset: this.state.downloadedBytes,
        error: failure.message,
      });
      this.onOutcome?.("interrupted");
      return;
    }

    const error = unrecoverable(failure.message, failure.cause);
    this.stateStore.clear();
    this.update({
      ...this.state,
      state: "failed",
      resumeToken: undefined,
      resumable: false,
      error: { code: error.code, message: error.message },
    });
    this.logger.error("Transfer failed", { identity, error: failure.message });
    this.onOutcome?.("failed");
  }

  async onComplete(identity: TransferIdentity, location: string): Promise<void> {
    if (!this.owns(identity, "completion")) return;
    this.current = undefined;
    const epoch = ++this.epoch;

    this.update({ ...this.state, finalizing: true });
    const savedPath = await this.completion.finalize(location, this.state.sourceUrl ?? "");

    if (epoch !== this.epoch) {
      this.logger.debug("Completion superseded by a newer command", { identity });
      return;
    }

    const total = this.state.totalBytes > 0 ? this.state.totalBytes : this.state.downloadedBytes;
    this.stateStore.clear();
    this.update({
      ...this.state,
      state: "completed",
      finalizing: false,
      progress: 1,
      downloadedBytes: total,
      totalBytes: total,
      resumeToken: undefined,
      resumable: false,
      savedPath,
      error: undefined,
    });
    this.logger.debug("Transfer complete", { identity, savedPath });
    this.onOutcome?.("completed");
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private owns(identity: TransferIdentity, event: string): boolean {
    if (identity === this.current) return true;
    this.logger.debug("Dropped stale event", { event, identity, current: this.current });
    return false;
  }

  private update(next: DownloadJob, immediate = true): void {
    this.state = next;
    this.publisher.publish(next, { immediate });
  }

  /** A second start while a transfer is live replaces it */
  private dropLiveTransfer(): void {
    const previous = this.current;
    if (previous === undefined) return;
    this.current = undefined;
    this.transport.cancel(previous, false).catch((error: unknown) => {
      this.logger.warn("Failed to cancel replaced transfer", { identity: previous, error: errorMessage(error) });
    });
  }

  private async discardQuietly(token: ResumeToken): Promise<void> {
    try {
      await this.transport.discard(token);
    } catch (error) {
      this.logger.warn("Failed to discard partial payload", { error: errorMessage(error) });
    }
  }
}
