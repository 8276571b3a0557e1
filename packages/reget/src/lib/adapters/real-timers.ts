import type { Scheduler, TimerService } from "../ports/timer.js";

/**
 * Real timer service using global setTimeout/clearTimeout.
 */
export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Runs scheduled work on the next turn of the event loop, after pending I/O.
 */
export const immediateScheduler: Scheduler = {
  schedule: (fn) => {
    setImmediate(fn);
  },
};
