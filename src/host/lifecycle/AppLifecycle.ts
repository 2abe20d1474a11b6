/**
 * Application lifecycle signals
 * Manages listeners with memory leak detection
 */

import type { Logger } from '../../shared/types';

export interface AppLifecycleEvents {
  /** The host application is about to exit */
  willTerminate: () => void;
}

type Listener = () => void;

export class AppLifecycle {
  private listeners: Map<keyof AppLifecycleEvents, Set<Listener>> = new Map();
  private maxListeners = 10;
  private warnedEvents = new Set<keyof AppLifecycleEvents>();

  constructor(
    private logger: Pick<Logger, 'warn' | 'error'>,
    private debug = false
  ) {}

  /**
   * Emit event to all registered listeners
   */
  emit(event: keyof AppLifecycleEvents): void {
    const listeners = this.listeners.get(event);
    if (!listeners) return;
    // Snapshot: listeners may unsubscribe while handling the event
    for (const listener of Array.from(listeners)) {
      try {
        listener();
      } catch (error) {
        this.logger.error(`[tickbridge:lifecycle] ${event} listener error:`, error);
      }
    }
  }

  /**
   * Register event listener
   * Returns unsubscribe function
   */
  on(event: keyof AppLifecycleEvents, listener: AppLifecycleEvents[typeof event]): () => void {
    let listeners = this.listeners.get(event);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(event, listeners);
    }
    listeners.add(listener);

    if (this.debug && listeners.size > this.maxListeners && !this.warnedEvents.has(event)) {
      this.logger.warn(
        `[tickbridge:lifecycle] Possible listener leak detected. ` +
          `${listeners.size} listeners added for event "${event}".`
      );
      this.warnedEvents.add(event);
    }

    return () => {
      this.listeners.get(event)?.delete(listener);
    };
  }

  listenerCount(event: keyof AppLifecycleEvents): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  setMaxListeners(n: number): void {
    this.maxListeners = n;
  }

  removeAllListeners(): void {
    this.listeners.clear();
    this.warnedEvents.clear();
  }
}
