/**
 * Timer abstraction for the mapping timeout
 *
 * @module state/Scheduler
 */

export interface Cancellable {
  cancel(): void;
}

export interface Scheduler {
  schedule(delayMs: number, callback: () => void): Cancellable;
}

/**
 * Scheduler on the Node.js event loop
 */
export const timerScheduler: Scheduler = {
  schedule(delayMs, callback) {
    const handle = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(handle),
    };
  },
};
