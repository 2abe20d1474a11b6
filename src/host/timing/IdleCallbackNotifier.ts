import { JS_TIMERS_MODULE } from '../../shared/types';
import type { FrameUpdate } from '../../shared/types';
import type { TimingBridge, TimingConfig } from './types';

/**
 * Sends `callIdleCallbacks` when a frame finished with time to spare.
 * At most one call per frame; synthetic frames never qualify.
 */
export class IdleCallbackNotifier {
  constructor(
    private readonly config: Pick<TimingConfig, 'frameDurationMs' | 'idleCallbackFrameDeadlineMs'>
  ) {}

  notify(bridge: TimingBridge, update: FrameUpdate | null, now: number): boolean {
    if (!update) return false;

    const frameElapsed = now - update.timestamp;
    if (this.config.frameDurationMs - frameElapsed < this.config.idleCallbackFrameDeadlineMs) {
      return false;
    }

    const absoluteFrameStartMs = now - frameElapsed;
    bridge.enqueueJSCall(JS_TIMERS_MODULE, 'callIdleCallbacks', [absoluteFrameStartMs]);
    return true;
  }
}
