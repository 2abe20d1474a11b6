/**
 * Batched Bridge - Host → Guest call channel
 *
 * - Calls are queued and delivered together in one flush
 * - Delivery order is enqueue order
 * - A failed delivery is reported, never retried
 */

import { BridgeError, toError } from '../../shared/errors';
import { resolveLogger } from '../../shared/logger';
import type { Logger, TimerId } from '../../shared/types';
import { JS_TIMERS_MODULE } from '../../shared/types';

/**
 * Bridge configuration options
 */
export interface BatchedBridgeOptions {
  /**
   * Schedules a flush of the pending batch
   * @default queueMicrotask
   */
  scheduleFlush?: (flush: () => void) => void;

  /**
   * Called for every call that could not be delivered
   */
  onError?: (error: Error) => void;

  /**
   * Debug mode
   */
  debug?: boolean;

  /**
   * Custom logger
   */
  logger?: Logger;
}

interface PendingCall {
  module: string;
  method: string;
  args: unknown[];
}

export class BatchedBridge {
  private modules = new Map<string, object>();
  private queue: PendingCall[] = [];
  private flushScheduled = false;
  private invalidated = false;
  private deliveredCount = 0;
  private failedCount = 0;

  private readonly scheduleFlush: (flush: () => void) => void;
  private readonly onError?: (error: Error) => void;
  private readonly debug: boolean;
  private readonly logger: Logger;

  constructor(options: BatchedBridgeOptions = {}) {
    this.scheduleFlush = options.scheduleFlush ?? ((flush) => queueMicrotask(flush));
    this.onError = options.onError;
    this.debug = options.debug ?? false;
    this.logger = resolveLogger(options.logger);
  }

  /**
   * Expose a guest object under `name` as a call target
   */
  registerCallableModule(name: string, module: object): void {
    this.modules.set(name, module);
  }

  /**
   * Queue a call; it is delivered on the next flush
   */
  enqueueJSCall(module: string, method: string, args: unknown[]): void {
    if (this.invalidated) return;
    this.queue.push({ module, method, args });
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      this.scheduleFlush(() => this.flush());
    }
  }

  /**
   * Zero-delay one-shot timers skip the frame wait
   */
  immediatelyCallTimer(id: TimerId): void {
    this.enqueueJSCall(JS_TIMERS_MODULE, 'callTimers', [[id]]);
  }

  /**
   * Deliver every pending call in order
   */
  flush(): void {
    this.flushScheduled = false;
    if (this.queue.length === 0) return;

    const batch = this.queue;
    this.queue = [];

    if (this.debug) {
      this.logger.log(`[tickbridge:bridge] Flushing ${batch.length} call(s)`);
    }

    for (const call of batch) {
      // Stop delivering if a receiver tore the bridge down mid-batch
      if (this.invalidated) return;
      this.deliver(call);
    }
  }

  private deliver(call: PendingCall): void {
    const target = this.modules.get(call.module);
    if (!target) {
      this.fail(
        new BridgeError(`Module "${call.module}" is not registered`, call.module, call.method)
      );
      return;
    }
    const fn: unknown = Reflect.get(target, call.method);
    if (typeof fn !== 'function') {
      this.fail(
        new BridgeError(
          `Method "${call.module}.${call.method}" does not exist`,
          call.module,
          call.method
        )
      );
      return;
    }
    try {
      Reflect.apply(fn, target, call.args);
      this.deliveredCount++;
    } catch (e) {
      const cause = toError(e);
      const error = new BridgeError(
        `${call.module}.${call.method} threw: ${cause.message}`,
        call.module,
        call.method
      );
      error.cause = cause;
      this.fail(error);
    }
  }

  private fail(error: BridgeError): void {
    this.failedCount++;
    this.logger.error('[tickbridge:bridge] Call failed:', error);
    this.onError?.(error);
  }

  /**
   * Drop pending calls; later enqueues are ignored
   */
  invalidate(): void {
    this.invalidated = true;
    this.queue = [];
    this.modules.clear();
  }

  get isInvalidated(): boolean {
    return this.invalidated;
  }

  getStats(): { pending: number; delivered: number; failed: number } {
    return {
      pending: this.queue.length,
      delivered: this.deliveredCount,
      failed: this.failedCount,
    };
  }
}
