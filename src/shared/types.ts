/**
 * Shared Types
 *
 * Contract between the host timing module and the guest timers runtime.
 * Both sides only agree on these shapes; neither imports the other.
 */

/**
 * Timer identity, allocated by the guest and unique among live timers
 */
export type TimerId = number;

/**
 * Logger accepted by every component
 * Defaults to `console`
 */
export interface Logger {
  // Reason: Logger methods accept arbitrary console arguments
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * One display refresh as delivered by the frame driver
 */
export interface FrameUpdate {
  /** Frame start on the host clock (ms) */
  timestamp: number;
  /** Time since the previous delivered frame (ms), 0 for the first one */
  deltaTime: number;
}

/**
 * Host → Guest: methods the guest exposes as the `JSTimers` callable module
 */
export interface JSTimersModule {
  callTimers(timerIds: TimerId[]): void;
  callIdleCallbacks(frameStartMs: number): void;
}

/**
 * Guest → Host: methods the host timing module exposes
 */
export interface NativeTimingModule {
  /**
   * @param schedulingTimestamp guest clock reading taken when the timer was
   * requested, used to subtract the cross-boundary call latency
   */
  createTimer(id: TimerId, durationMs: number, schedulingTimestamp: number, repeats: boolean): void;
  deleteTimer(id: TimerId): void;
  setSendIdleEvents(enabled: boolean): void;
}

/**
 * Name under which the guest timers module is registered on the bridge
 */
export const JS_TIMERS_MODULE = 'JSTimers';
