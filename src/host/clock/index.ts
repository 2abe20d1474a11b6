export type { Clock } from './Clock';
export { systemClock } from './Clock';
export type { MethodQueue } from './MethodQueue';
export { createSerialQueue, inlineQueue } from './MethodQueue';
export type { WakeTimerHandle, WakeTimerHost } from './WakeTimers';
export { createNodeWakeTimers, MAX_TIMEOUT_DELAY_MS } from './WakeTimers';
