/**
 * Display Link
 *
 * Host per-frame update signal. Delivers frames to registered observers on
 * the method queue and keeps its frame source running only while at least
 * one observer is unpaused.
 */

import { FRAME_DURATION_MS } from '../../shared/constants';
import { toError } from '../../shared/errors';
import { resolveLogger } from '../../shared/logger';
import type { Logger } from '../../shared/types';
import type { Clock } from '../clock/Clock';
import type { MethodQueue } from '../clock/MethodQueue';
import type { FrameSource, FrameUpdateObserver } from './types';

export interface DisplayLinkOptions {
  queue: MethodQueue;
  /** Omit to drive frames manually through `step()` */
  frameSource?: FrameSource;
  debug?: boolean;
  logger?: Logger;
}

export class DisplayLink {
  private observers = new Set<FrameUpdateObserver>();
  private stopSource: (() => void) | null = null;
  private lastTimestamp: number | null = null;
  private invalidated = false;
  private frameCount = 0;

  private readonly queue: MethodQueue;
  private readonly frameSource?: FrameSource;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: DisplayLinkOptions) {
    this.queue = options.queue;
    this.frameSource = options.frameSource;
    this.debug = options.debug ?? false;
    this.logger = resolveLogger(options.logger);
  }

  registerObserver(observer: FrameUpdateObserver): void {
    if (this.invalidated) return;
    this.observers.add(observer);
    observer.pauseCallback = () => this.updateRunning();
    this.updateRunning();
  }

  unregisterObserver(observer: FrameUpdateObserver): void {
    if (!this.observers.delete(observer)) return;
    observer.pauseCallback = null;
    this.updateRunning();
  }

  /**
   * Whether any observer currently wants frames
   */
  get isRunning(): boolean {
    for (const observer of this.observers) {
      if (!observer.paused) return true;
    }
    return false;
  }

  get frames(): number {
    return this.frameCount;
  }

  /**
   * Deliver one frame to every unpaused observer
   * Called by the frame source, or directly by hosts that own their frame loop.
   */
  step(timestamp: number): void {
    this.queue.dispatch(() => {
      if (this.invalidated) return;

      const deltaTime = this.lastTimestamp === null ? 0 : timestamp - this.lastTimestamp;
      this.lastTimestamp = timestamp;
      this.frameCount++;

      for (const observer of Array.from(this.observers)) {
        if (observer.paused) continue;
        try {
          observer.didUpdateFrame({ timestamp, deltaTime });
        } catch (e) {
          this.logger.error('[tickbridge:display-link] Frame observer failed:', toError(e));
        }
      }
      this.updateRunning();
    });
  }

  private updateRunning(): void {
    if (this.invalidated) return;
    const running = this.isRunning;

    if (running && !this.stopSource && this.frameSource) {
      this.stopSource = this.frameSource.start((timestamp) => this.step(timestamp));
      if (this.debug) this.logger.log('[tickbridge:display-link] Resumed');
    } else if (!running) {
      this.lastTimestamp = null;
      if (this.stopSource) {
        this.stopSource();
        this.stopSource = null;
        if (this.debug) this.logger.log('[tickbridge:display-link] Paused');
      }
    }
  }

  invalidate(): void {
    if (this.invalidated) return;
    this.invalidated = true;
    for (const observer of this.observers) {
      observer.pauseCallback = null;
    }
    this.observers.clear();
    this.stopSource?.();
    this.stopSource = null;
  }
}

/**
 * Frame source on Node's setInterval, ticking at `frameDurationMs`
 */
export function createIntervalFrameSource(
  clock: Clock,
  frameDurationMs: number = FRAME_DURATION_MS
): FrameSource {
  return {
    start(onFrame) {
      const handle = setInterval(() => onFrame(clock.now()), frameDurationMs);
      return () => clearInterval(handle);
    },
  };
}
