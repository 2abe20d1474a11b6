export type { DisplayLinkOptions } from './DisplayLink';
export { createIntervalFrameSource, DisplayLink } from './DisplayLink';
export type { FrameSource, FrameUpdateObserver } from './types';
