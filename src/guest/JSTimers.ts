/**
 * Guest Timers
 *
 * Script-side half of the timer protocol. Keeps the callbacks, allocates
 * ids and asks the host to schedule them; the host answers with
 * `callTimers` / `callIdleCallbacks` through the bridge.
 */

import { ANIMATION_FRAME_DURATION_MS, FRAME_DURATION_MS } from '../shared/constants';
import { toError } from '../shared/errors';
import { resolveLogger } from '../shared/logger';
import type { JSTimersModule, Logger, NativeTimingModule, TimerId } from '../shared/types';

export interface JSTimersOptions {
  /** Host timing module */
  native: NativeTimingModule;
  /**
   * Guest clock, passed to the host as the scheduling timestamp
   * @default Date.now
   */
  now?: () => number;
  /**
   * Frame duration used to compute idle time remaining (ms)
   * @default 1000 / 60
   */
  frameDurationMs?: number;
  debug?: boolean;
  logger?: Logger;
  /** Called with every error thrown by a guest callback */
  onError?: (error: Error) => void;
}

export interface IdleDeadline {
  readonly didTimeout: boolean;
  timeRemaining(): number;
}

export interface IdleRequestOptions {
  /** Run the callback after this many ms even if no idle frame came */
  timeout?: number;
}

export type IdleRequestCallback = (deadline: IdleDeadline) => void;

/** Metadata for one host-scheduled timer */
type TimerEntry =
  | { kind: 'setTimeout' | 'setInterval'; callback: () => void }
  | { kind: 'requestAnimationFrame'; callback: (frameTime: number) => void }
  | { kind: 'idleTimeout'; idleId: number };

interface IdleEntry {
  callback: IdleRequestCallback;
  timeoutId: TimerId | null;
}

/**
 * Timer functions as injected into a guest global scope
 */
export interface TimerGlobals {
  setTimeout: (fn: () => void, delay?: number) => TimerId;
  clearTimeout: (id?: TimerId | null) => void;
  setInterval: (fn: () => void, delay?: number) => TimerId;
  clearInterval: (id?: TimerId | null) => void;
  requestAnimationFrame: (fn: (frameTime: number) => void) => TimerId;
  cancelAnimationFrame: (id?: TimerId | null) => void;
  requestIdleCallback: (fn: IdleRequestCallback, options?: IdleRequestOptions) => number;
  cancelIdleCallback: (id?: number | null) => void;
}

export class JSTimers implements JSTimersModule {
  private timers = new Map<TimerId, TimerEntry>();
  private idleCallbacks = new Map<number, IdleEntry>();
  private idCounter = 0;
  private sendingIdleEvents = false;

  private readonly native: NativeTimingModule;
  private readonly now: () => number;
  private readonly frameDurationMs: number;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly onError?: (error: Error) => void;

  constructor(options: JSTimersOptions) {
    this.native = options.native;
    this.now = options.now ?? Date.now;
    this.frameDurationMs = options.frameDurationMs ?? FRAME_DURATION_MS;
    this.debug = options.debug ?? false;
    this.logger = resolveLogger(options.logger);
    this.onError = options.onError;
  }

  setTimeout(fn: () => void, delay = 0): TimerId {
    return this.schedule({ kind: 'setTimeout', callback: fn }, delay, false);
  }

  clearTimeout(id?: TimerId | null): void {
    this.clear(id);
  }

  setInterval(fn: () => void, delay = 0): TimerId {
    return this.schedule({ kind: 'setInterval', callback: fn }, delay, true);
  }

  clearInterval(id?: TimerId | null): void {
    this.clear(id);
  }

  requestAnimationFrame(fn: (frameTime: number) => void): TimerId {
    return this.schedule(
      { kind: 'requestAnimationFrame', callback: fn },
      ANIMATION_FRAME_DURATION_MS,
      false
    );
  }

  cancelAnimationFrame(id?: TimerId | null): void {
    this.clear(id);
  }

  requestIdleCallback(fn: IdleRequestCallback, options: IdleRequestOptions = {}): number {
    const id = ++this.idCounter;
    let timeoutId: TimerId | null = null;
    if (options.timeout !== undefined && options.timeout > 0) {
      timeoutId = this.schedule({ kind: 'idleTimeout', idleId: id }, options.timeout, false);
    }
    this.idleCallbacks.set(id, { callback: fn, timeoutId });
    this.updateIdleEvents();
    return id;
  }

  cancelIdleCallback(id?: number | null): void {
    if (id === undefined || id === null) return;
    const entry = this.idleCallbacks.get(id);
    if (!entry) return;
    this.idleCallbacks.delete(id);
    if (entry.timeoutId !== null) {
      this.clear(entry.timeoutId);
    }
    this.updateIdleEvents();
  }

  // ============================================================================
  // Host → Guest
  // ============================================================================

  callTimers(timerIds: TimerId[]): void {
    for (const id of timerIds) {
      const entry = this.timers.get(id);
      // Cleared after the host picked it up
      if (!entry) continue;
      if (entry.kind !== 'setInterval') {
        this.timers.delete(id);
      }

      switch (entry.kind) {
        case 'setTimeout':
        case 'setInterval':
          this.executeCallback(entry.callback, entry.kind);
          break;
        case 'requestAnimationFrame': {
          const frameTime = this.now();
          this.executeCallback(() => entry.callback(frameTime), entry.kind);
          break;
        }
        case 'idleTimeout':
          this.callTimedOutIdleCallback(entry.idleId);
          break;
      }
    }
  }

  callIdleCallbacks(frameStartMs: number): void {
    if (this.idleCallbacks.size === 0) return;

    // Callbacks requested from inside an idle callback wait for the next frame
    const entries = Array.from(this.idleCallbacks.values());
    this.idleCallbacks.clear();

    const deadline: IdleDeadline = {
      didTimeout: false,
      timeRemaining: () => Math.max(0, this.frameDurationMs - (this.now() - frameStartMs)),
    };

    for (const entry of entries) {
      if (entry.timeoutId !== null) {
        this.clear(entry.timeoutId);
      }
      this.executeCallback(() => entry.callback(deadline), 'requestIdleCallback');
    }
    this.updateIdleEvents();
  }

  // ============================================================================
  // Management
  // ============================================================================

  /**
   * Timer functions for injection into a guest scope
   */
  createGlobals(): TimerGlobals {
    return {
      setTimeout: (fn, delay) => this.setTimeout(fn, delay),
      clearTimeout: (id) => this.clearTimeout(id),
      setInterval: (fn, delay) => this.setInterval(fn, delay),
      clearInterval: (id) => this.clearInterval(id),
      requestAnimationFrame: (fn) => this.requestAnimationFrame(fn),
      cancelAnimationFrame: (id) => this.cancelAnimationFrame(id),
      requestIdleCallback: (fn, options) => this.requestIdleCallback(fn, options),
      cancelIdleCallback: (id) => this.cancelIdleCallback(id),
    };
  }

  /**
   * Clear all pending timers and idle callbacks
   */
  clearAll(): void {
    for (const id of this.timers.keys()) {
      this.native.deleteTimer(id);
    }
    this.timers.clear();
    this.idleCallbacks.clear();
    this.updateIdleEvents();

    if (this.debug) {
      this.logger.log('[tickbridge:guest] Cleared all timers');
    }
  }

  getStats(): {
    timeouts: number;
    intervals: number;
    animationFrames: number;
    idleCallbacks: number;
  } {
    let timeouts = 0;
    let intervals = 0;
    let animationFrames = 0;
    for (const entry of this.timers.values()) {
      if (entry.kind === 'setTimeout') timeouts++;
      else if (entry.kind === 'setInterval') intervals++;
      else if (entry.kind === 'requestAnimationFrame') animationFrames++;
    }
    return { timeouts, intervals, animationFrames, idleCallbacks: this.idleCallbacks.size };
  }

  private schedule(entry: TimerEntry, delay: number, repeats: boolean): TimerId {
    const id = ++this.idCounter;
    const duration = Number.isFinite(delay) && delay > 0 ? delay : 0;
    this.timers.set(id, entry);
    this.native.createTimer(id, duration, this.now(), repeats);
    return id;
  }

  private clear(id?: TimerId | null): void {
    if (id === undefined || id === null) return;
    if (this.timers.delete(id)) {
      this.native.deleteTimer(id);
    }
  }

  private callTimedOutIdleCallback(idleId: number): void {
    const entry = this.idleCallbacks.get(idleId);
    if (!entry) return;
    this.idleCallbacks.delete(idleId);
    this.executeCallback(
      () => entry.callback({ didTimeout: true, timeRemaining: () => 0 }),
      'requestIdleCallback'
    );
    this.updateIdleEvents();
  }

  private updateIdleEvents(): void {
    const wanted = this.idleCallbacks.size > 0;
    if (wanted !== this.sendingIdleEvents) {
      this.sendingIdleEvents = wanted;
      this.native.setSendIdleEvents(wanted);
    }
  }

  /**
   * Execute a callback with error handling
   */
  private executeCallback(callback: () => void, source: string): void {
    try {
      callback();
    } catch (e) {
      const error = toError(e);
      this.logger.error(`[tickbridge:guest] ${source} callback error:`, error);
      this.onError?.(error);
    }
  }
}
