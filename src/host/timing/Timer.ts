import type { TimerId } from '../../shared/types';

/**
 * One scheduled guest callback
 */
export class Timer {
  constructor(
    public readonly id: TimerId,
    /** Absolute due time on the host clock (ms) */
    public targetTime: number,
    /** Reschedule interval (ms), 0 means every frame */
    public readonly interval: number,
    public readonly repeats: boolean
  ) {}

  /**
   * Returns true if the guest callback should be invoked at `now`
   */
  shouldFire(now: number): boolean {
    return this.targetTime <= now;
  }

  /**
   * Next target counts from the firing tick, not from the missed target.
   * The guest timers do fine grained calculation of expired intervals.
   */
  reschedule(now: number): void {
    this.targetTime = now + this.interval;
  }
}
