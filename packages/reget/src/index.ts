export { DownloadManager, createDownloadManager, type DownloadManagerOptions } from "./engine/manager.js";
export { ResumeCoordinator, restoreJob, type RetryPolicy } from "./engine/coordinator.js";
export { TransferSession, parseSource, type SessionOutcome } from "./engine/session.js";
export { PersistentStateStore, STATE_KEYS } from "./engine/state-store.js";
export { ProgressPublisher, formatStatus, type DownloadStatus, type StatusListener } from "./engine/publisher.js";
export { CompletionHandler, destinationName, DEFAULT_FILENAME } from "./engine/completion.js";
export type { DownloadJob, JobState, JobError, PersistedRecord } from "./engine/job.js";
export { HttpRangeTransport, type HttpTransportOptions } from "./lib/adapters/http-transport.js";
export { ConfKeyValueStore } from "./lib/adapters/conf-store.js";
export { DownloadError, isDownloadError, type ErrorCode } from "./lib/errors/types.js";
export { createLogger, createNoopLogger, type Logger } from "./lib/logger.js";
export { loadConfig, type ResolvedConfig } from "./lib/config.js";
export type * from "./lib/ports/index.js";
