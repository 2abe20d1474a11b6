/**
 * Shared module - types, constants and errors used by both host and guest
 */

export * from './constants';
export { BridgeError, InvariantError, ScenarioError, toError } from './errors';
export type {
  FrameUpdate,
  JSTimersModule,
  Logger,
  NativeTimingModule,
  TimerId,
} from './types';
export { JS_TIMERS_MODULE } from './types';
export { resolveLogger, silentLogger } from './logger';
