export * from './shared/ui';
export { AnimationClockProvider, useAnimationClock } from './context/AnimationClockContext';
export { default as logger } from './utils/logger';
export type { LogLevel } from './utils/logger';
