/**
 * Host clock
 */

export interface Clock {
  /** Current time in ms, monotonic and epoch aligned */
  now(): number;
}

/**
 * Monotonic clock aligned to the Unix epoch, so guest `Date.now()` readings
 * and host readings can be compared when computing scheduling overhead.
 */
export const systemClock: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};
