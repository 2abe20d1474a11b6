/**
 * tickbridge Runtime
 *
 * Wires the host timing module to a guest timers runtime: one bridge, one
 * display link, one lifecycle and one method queue per instance.
 *
 * @example
 * ```typescript
 * const runtime = new Runtime({ debug: true });
 * const { setTimeout, requestAnimationFrame } = runtime.timers.createGlobals();
 * setTimeout(() => console.log('later'), 250);
 * // When done:
 * runtime.destroy();
 * ```
 */

import { JSTimers } from '../guest/JSTimers';
import { resolveLogger } from '../shared/logger';
import type { Logger } from '../shared/types';
import { JS_TIMERS_MODULE } from '../shared/types';
import { BatchedBridge } from './bridge/BatchedBridge';
import type { Clock } from './clock/Clock';
import { systemClock } from './clock/Clock';
import type { MethodQueue } from './clock/MethodQueue';
import { createSerialQueue } from './clock/MethodQueue';
import type { WakeTimerHost } from './clock/WakeTimers';
import { createNodeWakeTimers } from './clock/WakeTimers';
import { createIntervalFrameSource, DisplayLink } from './frame/DisplayLink';
import type { FrameSource } from './frame/types';
import { AppLifecycle } from './lifecycle/AppLifecycle';
import { Timing } from './timing/Timing';
import type { TimingOptions, TimingStats } from './timing/types';

export interface RuntimeOptions {
  /**
   * Host clock, shared by host and guest
   * @default systemClock
   */
  clock?: Clock;

  /**
   * Designated execution context
   * @default serial microtask queue
   */
  queue?: MethodQueue;

  /**
   * Coarse wake-up facility
   * @default Node setTimeout
   */
  wakeTimers?: WakeTimerHost;

  /**
   * Display refresh source; `null` means frames are driven with `step()`
   * @default setInterval at the frame duration
   */
  frameSource?: FrameSource | null;

  /**
   * Bridge flush scheduler
   * @default queueMicrotask
   */
  scheduleFlush?: (flush: () => void) => void;

  /**
   * Timing thresholds
   */
  timing?: Pick<
    TimingOptions,
    'frameDurationMs' | 'idleCallbackFrameDeadlineMs' | 'minimumSleepIntervalMs'
  >;

  /**
   * Called for failed bridge deliveries and throwing guest callbacks
   */
  onError?: (error: Error) => void;

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

export interface RuntimeStats {
  timing: TimingStats;
  bridge: { pending: number; delivered: number; failed: number };
  guest: { timeouts: number; intervals: number; animationFrames: number; idleCallbacks: number };
  frames: number;
}

// Global runtime counter for debugging
let runtimeIdCounter = 0;

export class Runtime {
  readonly id: string;
  readonly bridge: BatchedBridge;
  readonly displayLink: DisplayLink;
  readonly lifecycle: AppLifecycle;
  readonly timing: Timing;
  readonly timers: JSTimers;

  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly debug: boolean;
  private destroyed = false;

  constructor(options: RuntimeOptions = {}) {
    this.id = `runtime_${++runtimeIdCounter}`;
    this.clock = options.clock ?? systemClock;
    this.debug = options.debug ?? false;
    this.logger = resolveLogger(options.logger);

    const queue = options.queue ?? createSerialQueue(this.logger);
    const frameSource =
      options.frameSource === undefined
        ? createIntervalFrameSource(this.clock, options.timing?.frameDurationMs)
        : options.frameSource;

    this.lifecycle = new AppLifecycle(this.logger, this.debug);
    this.bridge = new BatchedBridge({
      scheduleFlush: options.scheduleFlush,
      onError: options.onError,
      debug: this.debug,
      logger: this.logger,
    });
    this.displayLink = new DisplayLink({
      queue,
      frameSource: frameSource ?? undefined,
      debug: this.debug,
      logger: this.logger,
    });
    this.timing = new Timing({
      ...options.timing,
      clock: this.clock,
      queue,
      wakeTimers: options.wakeTimers ?? createNodeWakeTimers(this.clock),
      debug: this.debug,
      logger: this.logger,
    });
    this.timers = new JSTimers({
      native: this.timing,
      now: () => this.clock.now(),
      frameDurationMs: options.timing?.frameDurationMs,
      onError: options.onError,
      debug: this.debug,
      logger: this.logger,
    });

    this.bridge.registerCallableModule(JS_TIMERS_MODULE, this.timers);
    this.timing.attach(this.bridge, this.lifecycle);
    this.displayLink.registerObserver(this.timing);

    if (this.debug) {
      this.logger.log(`[tickbridge:${this.id}] Created`);
    }
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Deliver one display frame (hosts without a frame source)
   */
  step(timestamp: number = this.clock.now()): void {
    if (this.destroyed) return;
    this.displayLink.step(timestamp);
  }

  /**
   * Signal application termination: ticking stops and the wake-up is released
   */
  terminate(): void {
    if (this.destroyed) return;
    this.lifecycle.emit('willTerminate');
  }

  /**
   * Tear down all components; safe to call repeatedly
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.timing.invalidate();
    this.displayLink.invalidate();
    this.bridge.invalidate();
    this.lifecycle.removeAllListeners();

    if (this.debug) {
      this.logger.log(`[tickbridge:${this.id}] Destroyed`);
    }
  }

  getStats(): RuntimeStats {
    return {
      timing: this.timing.getStats(),
      bridge: this.bridge.getStats(),
      guest: this.timers.getStats(),
      frames: this.displayLink.frames,
    };
  }
}
