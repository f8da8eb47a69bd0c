export { AnimatedSize } from './AnimatedSize';
export type { AnimatedSizeProps } from './AnimatedSize';
