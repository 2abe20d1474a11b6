/**
 * Guest runtime - timer globals for the script side
 */

export type {
  IdleDeadline,
  IdleRequestCallback,
  IdleRequestOptions,
  JSTimersOptions,
  TimerGlobals,
} from './JSTimers';
export { JSTimers } from './JSTimers';
