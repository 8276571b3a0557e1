/**
 * Abstraction for process signal handling.
 * Allows testing pause-on-exit logic without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for SIGTERM / SIGINT; the process exits after all callbacks settle */
  onShutdown(callback: (signal: NodeJS.Signals) => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
