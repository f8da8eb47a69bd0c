export { AnimatedCrossFade, isSecondChildBase } from './AnimatedCrossFade';
export type { AnimatedCrossFadeProps, CrossFadeState } from './AnimatedCrossFade';
