/**
 * Virtual Host
 *
 * Deterministic in-process host: a clock that only moves when told to,
 * wake timers that fire as the clock passes them, and an inline method
 * queue. Used by the simulator and by tests.
 */

import type { Clock } from './clock/Clock';
import type { MethodQueue } from './clock/MethodQueue';
import { inlineQueue } from './clock/MethodQueue';
import type { WakeTimerHandle, WakeTimerHost } from './clock/WakeTimers';

interface VirtualWake {
  fireDate: number;
  callback: () => void;
  active: boolean;
}

export class VirtualHost implements Clock {
  readonly queue: MethodQueue = inlineQueue;
  readonly wakeTimers: WakeTimerHost;

  private current: number;
  private wakes: VirtualWake[] = [];
  private deferred: Array<() => void> = [];
  private scheduledCount = 0;

  constructor(startTime = 0) {
    this.current = startTime;
    this.wakeTimers = {
      schedule: (deadline, callback) => this.scheduleWake(deadline, callback),
    };
  }

  now(): number {
    return this.current;
  }

  /**
   * Bridge flush scheduler: flushes wait until `drain()` instead of running
   * inside the call that enqueued them
   */
  readonly scheduleFlush = (flush: () => void): void => {
    this.deferred.push(flush);
  };

  /**
   * Run deferred flushes, including any queued while draining
   */
  drain(): void {
    for (;;) {
      const task = this.deferred.shift();
      if (!task) return;
      task();
    }
  }

  /**
   * Move the clock forward to `time`, firing every wake-up on the way at
   * its own fire date. Moving backwards is ignored.
   */
  advanceTo(time: number): void {
    for (;;) {
      const next = this.nextWake();
      if (!next || next.fireDate > time) break;
      next.active = false;
      this.current = Math.max(this.current, next.fireDate);
      next.callback();
      this.drain();
    }
    this.current = Math.max(this.current, time);
    this.wakes = this.wakes.filter((wake) => wake.active);
  }

  /**
   * Fire date of the earliest armed wake-up, or null
   */
  get nextWakeAt(): number | null {
    return this.nextWake()?.fireDate ?? null;
  }

  /**
   * Wake-ups armed and not yet fired or cancelled
   */
  get pendingWakeCount(): number {
    return this.wakes.filter((wake) => wake.active).length;
  }

  /**
   * Wake-ups ever scheduled, including cancelled ones
   */
  get scheduledWakeCount(): number {
    return this.scheduledCount;
  }

  private nextWake(): VirtualWake | undefined {
    let earliest: VirtualWake | undefined;
    for (const wake of this.wakes) {
      if (wake.active && (!earliest || wake.fireDate < earliest.fireDate)) {
        earliest = wake;
      }
    }
    return earliest;
  }

  private scheduleWake(deadline: number, callback: () => void): WakeTimerHandle {
    const wake: VirtualWake = { fireDate: deadline, callback, active: true };
    this.wakes.push(wake);
    this.scheduledCount++;
    return {
      get fireDate() {
        return wake.fireDate;
      },
      reschedule(next: number) {
        if (wake.active) wake.fireDate = next;
      },
      cancel() {
        wake.active = false;
      },
    };
  }
}
