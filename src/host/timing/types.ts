/**
 * Timing Types and Interfaces
 */

import type { Logger, TimerId } from '../../shared/types';
import type { Clock } from '../clock/Clock';
import type { MethodQueue } from '../clock/MethodQueue';
import type { WakeTimerHost } from '../clock/WakeTimers';

/**
 * Outbound channel the timing module needs from the bridge
 */
export interface TimingBridge {
  enqueueJSCall(module: string, method: string, args: unknown[]): void;
  immediatelyCallTimer(id: TimerId): void;
}

/**
 * Lifecycle signal the timing module listens to
 */
export interface TimingLifecycle {
  on(event: 'willTerminate', listener: () => void): () => void;
}

/**
 * Timing configuration options
 */
export interface TimingOptions {
  /**
   * Host clock
   * @default systemClock
   */
  clock?: Clock;

  /**
   * Coarse wake-up facility used while sleeping
   * @default Node setTimeout
   */
  wakeTimers?: WakeTimerHost;

  /**
   * Designated execution context; wake-ups are marshalled onto it
   * @default serial microtask queue
   */
  queue?: MethodQueue;

  /**
   * Frame duration used for idle budget (ms)
   * @default 1000 / 60
   */
  frameDurationMs?: number;

  /**
   * Minimum time left in the frame to send idle callbacks (ms)
   * @default 1
   */
  idleCallbackFrameDeadlineMs?: number;

  /**
   * Deadlines further away than this put ticking to sleep (ms)
   * @default 1000
   */
  minimumSleepIntervalMs?: number;

  /**
   * Enable debug mode
   * @default false
   */
  debug?: boolean;

  /**
   * Custom logger
   */
  logger?: Logger;
}

/**
 * Resolved numeric configuration
 */
export interface TimingConfig {
  frameDurationMs: number;
  idleCallbackFrameDeadlineMs: number;
  minimumSleepIntervalMs: number;
}

/**
 * - `active`: driven every frame
 * - `sleeping`: not driven, one wake-up armed
 * - `idle`: not driven, nothing armed
 */
export type TimingState = 'active' | 'sleeping' | 'idle';

export interface TimingStats {
  state: TimingState;
  timers: number;
  sendIdleEvents: boolean;
  armedWakeDeadline: number | null;
  ticks: number;
  wakeUps: number;
}
