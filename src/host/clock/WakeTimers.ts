/**
 * Wake Timers
 *
 * Coarse wall-clock timer facility used to resume frame driving after a
 * sleep. Callbacks fire on the host's own timer context, never on the
 * method queue; consumers must marshal them.
 */

import type { Clock } from './Clock';

/**
 * Opaque handle to one scheduled wake-up
 */
export interface WakeTimerHandle {
  /** Absolute fire time on the host clock (ms) */
  readonly fireDate: number;
  /** Move the fire time; the same callback fires once at the new time */
  reschedule(deadline: number): void;
  cancel(): void;
}

export interface WakeTimerHost {
  schedule(deadline: number, callback: () => void): WakeTimerHandle;
}

/**
 * Longest delay Node's setTimeout accepts (ms); larger values fire after 1ms
 */
export const MAX_TIMEOUT_DELAY_MS = 2 ** 31 - 1;

/**
 * Wake timers on Node's setTimeout
 * Deadlines beyond the setTimeout range are waited out in chunks; the
 * callback only runs once the real deadline is reached.
 */
export function createNodeWakeTimers(clock: Clock): WakeTimerHost {
  return {
    schedule(deadline, callback) {
      let handle: ReturnType<typeof setTimeout> | null = null;
      let fireDate = deadline;

      const arm = () => {
        const remaining = Math.max(0, fireDate - clock.now());
        const clamped = remaining > MAX_TIMEOUT_DELAY_MS;
        handle = setTimeout(
          () => {
            if (clamped) {
              arm();
              return;
            }
            handle = null;
            callback();
          },
          clamped ? MAX_TIMEOUT_DELAY_MS : remaining
        );
      };
      arm();

      return {
        get fireDate() {
          return fireDate;
        },
        reschedule(next: number) {
          if (handle === null) return;
          clearTimeout(handle);
          fireDate = next;
          arm();
        },
        cancel() {
          if (handle !== null) {
            clearTimeout(handle);
            handle = null;
          }
        },
      };
    },
  };
}
