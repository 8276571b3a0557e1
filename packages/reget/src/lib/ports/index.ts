export type {
  ResumeToken,
  TransferIdentity,
  TransferFailure,
  TransferEventListener,
  TransferTransport,
} from "./transport.js";
export type { KeyValueStore } from "./key-value-store.js";
export type { FileSystem } from "./file-system.js";
export type { TimerService, Scheduler } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
