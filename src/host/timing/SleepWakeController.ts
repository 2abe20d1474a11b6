/**
 * Sleep/Wake Controller
 *
 * Holds at most one coarse wake-up on the host wake timers. The wake timer
 * fires on its own context; the fire is handed to the method queue before
 * anything else happens.
 */

import type { MethodQueue } from '../clock/MethodQueue';
import type { WakeTimerHandle, WakeTimerHost } from '../clock/WakeTimers';

export interface SleepWakeControllerOptions {
  wakeTimers: WakeTimerHost;
  queue: MethodQueue;
  /** Runs on the method queue when the armed wake-up fires */
  onWake: () => void;
}

export class SleepWakeController {
  private handle: WakeTimerHandle | null = null;
  private tornDown = false;
  private wakeCount = 0;

  private readonly wakeTimers: WakeTimerHost;
  private readonly queue: MethodQueue;
  private readonly onWake: () => void;

  constructor(options: SleepWakeControllerOptions) {
    this.wakeTimers = options.wakeTimers;
    this.queue = options.queue;
    this.onWake = options.onWake;
  }

  /**
   * Arm a wake-up at `deadline`, or move the armed one earlier
   */
  arm(deadline: number): void {
    if (this.tornDown) return;

    if (!this.handle) {
      // The wake timer holds only this closure, never the controller's state
      const handle = this.wakeTimers.schedule(deadline, () => {
        this.queue.dispatch(() => this.didFire(handle));
      });
      this.handle = handle;
    } else if (deadline < this.handle.fireDate) {
      this.handle.reschedule(deadline);
    }
  }

  private didFire(handle: WakeTimerHandle): void {
    // Cancelled or replaced while the fire was queued
    if (this.tornDown || this.handle !== handle) return;
    this.handle = null;
    this.wakeCount++;
    this.onWake();
  }

  get armedDeadline(): number | null {
    return this.handle ? this.handle.fireDate : null;
  }

  get isArmed(): boolean {
    return this.handle !== null;
  }

  get wakeUps(): number {
    return this.wakeCount;
  }

  cancel(): void {
    this.handle?.cancel();
    this.handle = null;
  }

  /**
   * Cancel and ignore every later fire; safe to call repeatedly
   */
  teardown(): void {
    this.cancel();
    this.tornDown = true;
  }
}
