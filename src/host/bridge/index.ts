/**
 * Host bridge - outbound call channel
 */

export type { BatchedBridgeOptions } from './BatchedBridge';
export { BatchedBridge } from './BatchedBridge';
