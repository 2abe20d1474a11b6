import type { FrameUpdate } from '../../shared/types';

/**
 * Something driven once per display refresh
 *
 * The display link only delivers frames while `paused` is false, and
 * re-reads `paused` whenever the observer calls `pauseCallback`.
 */
export interface FrameUpdateObserver {
  readonly paused: boolean;
  pauseCallback: (() => void) | null;
  /** `update` is null for a synthetic frame not produced by the display */
  didUpdateFrame(update: FrameUpdate | null): void;
}

/**
 * Source of display refreshes
 * `start` begins delivering frame timestamps and returns a stop function.
 */
export interface FrameSource {
  start(onFrame: (timestamp: number) => void): () => void;
}
