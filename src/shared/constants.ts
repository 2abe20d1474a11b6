/**
 * Timing constants
 *
 * Host and guest must agree on these: the guest computes idle deadlines from
 * the same frame duration the host uses to decide whether to send them.
 */

/** Duration of one frame at 60 fps (ms) */
export const FRAME_DURATION_MS = 1000 / 60;

/** Minimum time left in a frame to send idle callbacks (ms) */
export const IDLE_CALLBACK_FRAME_DEADLINE_MS = 1;

/** Deadlines further away than this put the frame driver to sleep (ms) */
export const MINIMUM_SLEEP_INTERVAL_MS = 1000;

/** Repeat intervals below this run every frame (ms) */
export const SHORT_INTERVAL_THRESHOLD_MS = 18;

/** Duration requested for requestAnimationFrame (ms) */
export const ANIMATION_FRAME_DURATION_MS = 1;
