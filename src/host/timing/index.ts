/**
 * Timing Module Exports
 */

export { IdleCallbackNotifier } from './IdleCallbackNotifier';
export type { SleepWakeControllerOptions } from './SleepWakeController';
export { SleepWakeController } from './SleepWakeController';
export { Timer } from './Timer';
export type { TimerSnapshot } from './TimerRegistry';
export { TimerRegistry } from './TimerRegistry';
export { Timing } from './Timing';
export type {
  TimingBridge,
  TimingConfig,
  TimingLifecycle,
  TimingOptions,
  TimingState,
  TimingStats,
} from './types';
