/**
 * Method Queue
 *
 * The single execution context every registry mutation and dispatch runs
 * on. Work arriving from other contexts (wake timers, frame sources) is
 * handed over through `dispatch`.
 */

import { toError } from '../../shared/errors';
import type { Logger } from '../../shared/types';

export interface MethodQueue {
  dispatch(task: () => void): void;
}

/**
 * FIFO queue drained in one microtask
 * A throwing task is logged and does not stop the tasks behind it.
 */
export function createSerialQueue(logger: Pick<Logger, 'error'>): MethodQueue {
  const tasks: Array<() => void> = [];
  let scheduled = false;

  const drain = () => {
    scheduled = false;
    while (tasks.length > 0) {
      const task = tasks.shift();
      if (!task) break;
      try {
        task();
      } catch (e) {
        logger.error('[tickbridge:queue] Task failed:', toError(e));
      }
    }
  };

  return {
    dispatch(task) {
      tasks.push(task);
      if (!scheduled) {
        scheduled = true;
        queueMicrotask(drain);
      }
    },
  };
}

/**
 * Runs tasks inline, for hosts already on the designated context
 */
export const inlineQueue: MethodQueue = {
  dispatch: (task) => task(),
};
