/**
 * Host-side runtime
 * Responsible for timer scheduling, frame driving and the outbound bridge
 */

export type { BatchedBridgeOptions } from './bridge';
export { BatchedBridge } from './bridge';
export type { Clock, MethodQueue, WakeTimerHandle, WakeTimerHost } from './clock';
export {
  createNodeWakeTimers,
  createSerialQueue,
  inlineQueue,
  MAX_TIMEOUT_DELAY_MS,
  systemClock,
} from './clock';
export type { DisplayLinkOptions, FrameSource, FrameUpdateObserver } from './frame';
export { createIntervalFrameSource, DisplayLink } from './frame';
export type { AppLifecycleEvents } from './lifecycle/AppLifecycle';
export { AppLifecycle } from './lifecycle/AppLifecycle';
export type { RuntimeOptions, RuntimeStats } from './Runtime';
export { Runtime } from './Runtime';
export * from './timing';
export { VirtualHost } from './virtual';
