/**
 * tickbridge
 *
 * Bridges a guest script runtime's timers to a host frame clock
 */

export * from './guest';
export * from './host';
export * from './shared';
