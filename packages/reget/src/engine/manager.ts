import {
  ConfKeyValueStore,
  HttpRangeTransport,
  immediateScheduler,
  nodeFileSystem,
  realTimerService,
} from "../lib/adapters/index.js";
import type { ResolvedConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import type {
  FileSystem,
  KeyValueStore,
  ResumeToken,
  Scheduler,
  TimerService,
  TransferIdentity,
  TransferTransport,
} from "../lib/ports/index.js";
import { CompletionHandler } from "./completion.js";
import { ResumeCoordinator, type RetryPolicy } from "./coordinator.js";
import { createIdleJob } from "./job.js";
import { ProgressPublisher, type DownloadStatus, type StatusListener } from "./publisher.js";
import { PersistentStateStore } from "./state-store.js";

export interface DownloadManagerOptions {
  transport: TransferTransport;
  store: KeyValueStore;
  fileSystem: FileSystem;
  scheduler: Scheduler;
  timers: TimerService;
  downloadDir: string;
  progressIntervalMs: number;
  retry: RetryPolicy;
  logger: Logger;
}

/**
 * The one download a process drives. Construct once; construction loads
 * whatever an earlier process left behind.
 */
export class DownloadManager {
  private readonly publisher: ProgressPublisher;
  private readonly coordinator: ResumeCoordinator;
  private readonly logger: Logger;

  constructor(options: DownloadManagerOptions) {
    this.logger = options.logger.child({ component: "manager" });
    this.publisher = new ProgressPublisher(createIdleJob(), {
      scheduler: options.scheduler,
      timers: options.timers,
      intervalMs: options.progressIntervalMs,
      logger: options.logger.child({ component: "publisher" }),
    });
    this.coordinator = new ResumeCoordinator({
      transport: options.transport,
      stateStore: new PersistentStateStore(options.store),
      completion: new CompletionHandler(
        options.fileSystem,
        options.downloadDir,
        options.logger.child({ component: "completion" })
      ),
      publisher: this.publisher,
      timers: options.timers,
      retry: options.retry,
      logger: options.logger,
    });
  }

  /** Start a download, or resume the interrupted one (which takes precedence) */
  start(url?: string): TransferIdentity | undefined {
    return this.coordinator.start(url);
  }

  pause(): Promise<ResumeToken | undefined> {
    return this.coordinator.pause();
  }

  cancel(): Promise<void> {
    return this.coordinator.cancel();
  }

  reconnect(onReady: () => void): Promise<void> {
    return this.coordinator.reconnect(onReady);
  }

  status(): DownloadStatus {
    return this.publisher.snapshot();
  }

  /** An interrupted or failed transfer will be restarted automatically */
  retryPending(): boolean {
    return this.coordinator.retryPending;
  }

  subscribe(listener: StatusListener): () => void {
    return this.publisher.subscribe(listener);
  }

  async shutdown(): Promise<void> {
    await this.coordinator.shutdown();
    this.publisher.dispose();
    this.logger.debug("Shut down", { state: this.status().state });
  }
}

/**
 * Wire a manager to the real network, disk and state file.
 */
export function createDownloadManager(config: ResolvedConfig, logger: Logger): DownloadManager {
  return new DownloadManager({
    transport: new HttpRangeTransport({
      tempDir: config.tempDir,
      userAgent: config.userAgent,
      logger,
    }),
    store: new ConfKeyValueStore({ cwd: config.stateDir }),
    fileSystem: nodeFileSystem,
    scheduler: immediateScheduler,
    timers: realTimerService,
    downloadDir: config.downloadDir,
    progressIntervalMs: config.progressIntervalMs,
    retry: { attempts: config.retryAttempts, delayMs: config.retryDelayMs },
    logger,
  });
}
