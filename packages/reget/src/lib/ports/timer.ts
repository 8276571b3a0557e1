/**
 * Abstraction for timer operations.
 * Allows injecting fake timers for testing.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/**
 * Hands work to another turn of the event loop.
 * Progress publication runs here so observers never execute on the
 * stack that delivered a network event.
 */
export interface Scheduler {
  schedule(fn: () => void): void;
}
