/**
 * Timing - host side of the guest timer API
 *
 * Keeps the registry of pending guest timers and is driven once per frame
 * by the display link while a timer is imminent. When the nearest deadline
 * is far away it stops frame driving and arms a single coarse wake-up.
 *
 * @example
 * ```typescript
 * const timing = new Timing({ queue });
 * timing.attach(bridge, lifecycle);
 * displayLink.registerObserver(timing);
 * // guest side
 * timing.createTimer(1, 100, Date.now(), false);
 * ```
 */

import {
  FRAME_DURATION_MS,
  IDLE_CALLBACK_FRAME_DEADLINE_MS,
  MINIMUM_SLEEP_INTERVAL_MS,
} from '../../shared/constants';
import { InvariantError } from '../../shared/errors';
import { resolveLogger } from '../../shared/logger';
import type { FrameUpdate, Logger, NativeTimingModule, TimerId } from '../../shared/types';
import { JS_TIMERS_MODULE } from '../../shared/types';
import type { Clock } from '../clock/Clock';
import { systemClock } from '../clock/Clock';
import { createSerialQueue } from '../clock/MethodQueue';
import { createNodeWakeTimers } from '../clock/WakeTimers';
import type { FrameUpdateObserver } from '../frame/types';
import { IdleCallbackNotifier } from './IdleCallbackNotifier';
import { SleepWakeController } from './SleepWakeController';
import type { Timer } from './Timer';
import { TimerRegistry } from './TimerRegistry';
import type {
  TimingBridge,
  TimingConfig,
  TimingLifecycle,
  TimingOptions,
  TimingState,
  TimingStats,
} from './types';

export class Timing implements FrameUpdateObserver, NativeTimingModule {
  pauseCallback: (() => void) | null = null;

  private _paused = true;
  private sendIdleEvents = false;
  private registry = new TimerRegistry();
  private bridge: TimingBridge | null = null;
  private attached = false;
  private invalidated = false;
  private unsubscribeLifecycle: (() => void) | null = null;
  private tickCount = 0;

  private readonly clock: Clock;
  private readonly config: TimingConfig;
  private readonly sleepWake: SleepWakeController;
  private readonly idleNotifier: IdleCallbackNotifier;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: TimingOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.debug = options.debug ?? false;
    this.logger = resolveLogger(options.logger);
    this.config = {
      frameDurationMs: options.frameDurationMs ?? FRAME_DURATION_MS,
      idleCallbackFrameDeadlineMs:
        options.idleCallbackFrameDeadlineMs ?? IDLE_CALLBACK_FRAME_DEADLINE_MS,
      minimumSleepIntervalMs: options.minimumSleepIntervalMs ?? MINIMUM_SLEEP_INTERVAL_MS,
    };

    this.sleepWake = new SleepWakeController({
      wakeTimers: options.wakeTimers ?? createNodeWakeTimers(this.clock),
      queue: options.queue ?? createSerialQueue(this.logger),
      onWake: () => this.timerDidFire(),
    });
    this.idleNotifier = new IdleCallbackNotifier(this.config);
  }

  /**
   * Connect to the outbound bridge; must happen exactly once
   */
  attach(bridge: TimingBridge, lifecycle?: TimingLifecycle): void {
    if (this.attached) {
      throw new InvariantError('Timing should never be initialized twice');
    }
    this.attached = true;
    this.bridge = bridge;
    this.unsubscribeLifecycle = lifecycle?.on('willTerminate', () => this.didTerminate()) ?? null;
  }

  get paused(): boolean {
    return this._paused;
  }

  get state(): TimingState {
    if (!this._paused) return 'active';
    return this.sleepWake.isArmed ? 'sleeping' : 'idle';
  }

  get hasPendingTimers(): boolean {
    return this.sendIdleEvents || this.registry.size > 0;
  }

  get isInvalidated(): boolean {
    return this.invalidated;
  }

  /**
   * Read-only view of a pending timer
   */
  getTimer(id: TimerId): Readonly<Timer> | undefined {
    return this.registry.get(id);
  }

  // ============================================================================
  // Inbound (guest → host)
  // ============================================================================

  /**
   * There is a small difference between the time the guest asks for a timer
   * and the time the request makes it here. The guest passes its clock
   * reading along and the difference is subtracted from the duration.
   */
  createTimer(id: TimerId, durationMs: number, schedulingTimestamp: number, repeats: boolean): void {
    const bridge = this.bridge;
    if (this.invalidated || !bridge) return;

    const duration = Number.isFinite(durationMs) ? Math.max(durationMs, 0) : 0;
    const now = this.clock.now();
    const schedulingOverhead = Math.max(now - schedulingTimestamp, 0);

    const timer = this.registry.register(id, duration, schedulingOverhead, repeats, now);
    if (!timer) {
      // Super fast one-off timers are called right away rather than waiting a frame
      bridge.immediatelyCallTimer(id);
      return;
    }

    if (this._paused) {
      if (timer.targetTime - now > this.config.minimumSleepIntervalMs) {
        this.sleepWake.arm(timer.targetTime);
      } else {
        this.startTimers();
      }
    }
  }

  deleteTimer(id: TimerId): void {
    if (this.invalidated) return;
    this.registry.cancel(id);
    if (this._paused && !this.hasPendingTimers) {
      this.sleepWake.cancel();
    }
  }

  setSendIdleEvents(enabled: boolean): void {
    if (this.invalidated) return;
    this.sendIdleEvents = enabled;
    if (enabled) {
      this.startTimers();
    }
  }

  // ============================================================================
  // Frame driving
  // ============================================================================

  didUpdateFrame(update: FrameUpdate | null): void {
    const bridge = this.bridge;
    if (this.invalidated || !bridge) return;
    this.tickCount++;

    // Compare all the timers to the same base time
    const now = this.clock.now();
    const { due, nextDeadline } = this.registry.snapshot(now);
    let nextScheduledTarget = nextDeadline;

    // Array.prototype.sort is stable: equal targets keep registration order
    due.sort((a, b) => a.targetTime - b.targetTime);
    if (due.length > 0) {
      bridge.enqueueJSCall(JS_TIMERS_MODULE, 'callTimers', [due.map((timer) => timer.id)]);
    }

    for (const timer of due) {
      if (timer.repeats) {
        timer.reschedule(now);
        if (nextScheduledTarget === null || timer.targetTime < nextScheduledTarget) {
          nextScheduledTarget = timer.targetTime;
        }
      } else {
        this.registry.cancel(timer.id);
      }
    }

    if (this.sendIdleEvents) {
      this.idleNotifier.notify(bridge, update, this.clock.now());
    }

    // Only go quiet on a frame that called nothing, so a timer scheduled in
    // response to one that just fired does not bounce the display link
    if (!this.sendIdleEvents && due.length === 0) {
      if (this.registry.size === 0) {
        this.sleepWake.cancel();
        this.stopTimers();
      } else if (
        nextScheduledTarget !== null &&
        nextScheduledTarget - now > this.config.minimumSleepIntervalMs
      ) {
        this.sleepWake.arm(nextScheduledTarget);
        this.stopTimers();
      }
    }
  }

  private timerDidFire(): void {
    if (this.invalidated || !this._paused) return;
    if (this.debug) {
      this.logger.log('[tickbridge:timing] Woke up with', this.registry.size, 'timer(s)');
    }
    this.startTimers();
    // Dispatch a frame right away instead of waiting for the display link
    this.didUpdateFrame(null);
  }

  startTimers(): void {
    if (this.invalidated || !this._paused) return;
    this._paused = false;
    if (this.debug) this.logger.log('[tickbridge:timing] Started');
    this.pauseCallback?.();
  }

  stopTimers(): void {
    if (this._paused) return;
    this._paused = true;
    if (this.debug) {
      this.logger.log(
        `[tickbridge:timing] Stopped (${this.state}, ${this.registry.size} timer(s) pending)`
      );
    }
    this.pauseCallback?.();
  }

  private didTerminate(): void {
    this.sleepWake.cancel();
    this.stopTimers();
  }

  /**
   * Tear down; every later call, frame and wake-up is ignored
   */
  invalidate(): void {
    if (this.invalidated) return;
    this.stopTimers();
    this.invalidated = true;
    this.sleepWake.teardown();
    this.registry.clear();
    this.unsubscribeLifecycle?.();
    this.unsubscribeLifecycle = null;
    this.bridge = null;
    if (this.debug) this.logger.log('[tickbridge:timing] Invalidated');
  }

  getStats(): TimingStats {
    return {
      state: this.state,
      timers: this.registry.size,
      sendIdleEvents: this.sendIdleEvents,
      armedWakeDeadline: this.sleepWake.armedDeadline,
      ticks: this.tickCount,
      wakeUps: this.sleepWake.wakeUps,
    };
  }
}
