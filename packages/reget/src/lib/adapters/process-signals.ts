import type { SignalHandler } from "../ports/signal-handler.js";

/**
 * Create a signal handler for process shutdown signals.
 * The process exits once every callback has settled; a second signal while
 * shutting down is ignored.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async (signal: NodeJS.Signals) => {
    if (isHandling) return;
    isHandling = true;
    const results = await Promise.allSettled(handlers.map((h) => h(signal)));
    const failed = results.some((r) => r.status === "rejected");
    // 130 is the conventional exit status after Ctrl+C
    process.exit(failed ? 1 : signal === "SIGINT" ? 130 : 0);
  };

  const listener = (signal: NodeJS.Signals) => {
    void handleSignal(signal);
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", listener);
        process.on("SIGINT", listener);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", listener);
      process.off("SIGINT", listener);
    },
  };
}
