export { realTimerService, immediateScheduler } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { nodeFileSystem } from "./node-file-system.js";
export { ConfKeyValueStore } from "./conf-store.js";
export { HttpRangeTransport } from "./http-transport.js";
