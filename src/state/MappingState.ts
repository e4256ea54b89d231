/**
 * MappingState - keys buffered while a mapping is being resolved, plus the
 * timer that gives up waiting for the next one
 *
 * @module state/MappingState
 */

import type { KeyStroke } from '../keys/KeyStroke';
import type { Cancellable, Scheduler } from './Scheduler';

export class MappingState {
  private buffered: KeyStroke[] = [];
  private timer: Cancellable | null = null;
  private readonly scheduler: Scheduler;

  constructor(scheduler: Scheduler) {
    this.scheduler = scheduler;
  }

  get keys(): readonly KeyStroke[] {
    return this.buffered;
  }

  get isTimerArmed(): boolean {
    return this.timer !== null;
  }

  addKey(key: KeyStroke): void {
    this.buffered.push(key);
  }

  /**
   * Take the buffered keys, leaving the buffer empty
   */
  detachKeys(): KeyStroke[] {
    const keys = this.buffered;
    this.buffered = [];
    return keys;
  }

  clearKeys(): void {
    this.buffered = [];
  }

  /**
   * Arm the timer, replacing one already armed
   */
  startMappingTimer(delayMs: number, onTimeout: () => void): void {
    this.stopMappingTimer();
    this.timer = this.scheduler.schedule(delayMs, () => {
      this.timer = null;
      onTimeout();
    });
  }

  stopMappingTimer(): void {
    if (this.timer !== null) {
      this.timer.cancel();
      this.timer = null;
    }
  }

  reset(): void {
    this.clearKeys();
    this.stopMappingTimer();
  }
}
