/**
 * Timer Registry
 *
 * Owns every live Timer, keyed by id. Registering an existing id replaces
 * the old entry; cancelling an unknown id is a no-op.
 */

import { SHORT_INTERVAL_THRESHOLD_MS } from '../../shared/constants';
import type { TimerId } from '../../shared/types';
import { Timer } from './Timer';

/**
 * Point-in-time partition of the registry
 */
export interface TimerSnapshot {
  /** Timers with `targetTime <= now`, in registration order */
  due: Timer[];
  /** Earliest target among the timers not yet due, or null */
  nextDeadline: number | null;
}

export class TimerRegistry {
  private timers = new Map<TimerId, Timer>();

  /**
   * Register a timer due `delay - schedulingOverhead` ms after `now`
   *
   * Returns null for zero-delay one-shots, which are never stored: the
   * caller dispatches them immediately.
   */
  register(
    id: TimerId,
    delay: number,
    schedulingOverhead: number,
    repeats: boolean,
    now: number
  ): Timer | null {
    if (delay === 0 && !repeats) {
      return null;
    }

    const targetTime = now + Math.max(delay - schedulingOverhead, 0);
    // Make sure short intervals run each frame; the first target is kept as is
    const interval = delay < SHORT_INTERVAL_THRESHOLD_MS ? 0 : delay;

    const timer = new Timer(id, targetTime, interval, repeats);
    this.timers.set(id, timer);
    return timer;
  }

  /**
   * Returns whether a timer was removed
   */
  cancel(id: TimerId): boolean {
    return this.timers.delete(id);
  }

  snapshot(now: number): TimerSnapshot {
    const due: Timer[] = [];
    let nextDeadline: number | null = null;
    for (const timer of this.timers.values()) {
      if (timer.shouldFire(now)) {
        due.push(timer);
      } else if (nextDeadline === null || timer.targetTime < nextDeadline) {
        nextDeadline = timer.targetTime;
      }
    }
    return { due, nextDeadline };
  }

  get(id: TimerId): Timer | undefined {
    return this.timers.get(id);
  }

  has(id: TimerId): boolean {
    return this.timers.has(id);
  }

  values(): IterableIterator<Timer> {
    return this.timers.values();
  }

  get size(): number {
    return this.timers.size;
  }

  /**
   * Drop every timer without notifying anyone
   */
  clear(): void {
    this.timers.clear();
  }
}
