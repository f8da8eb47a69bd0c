export { ExpandIcon } from './ExpandIcon';
export type { ExpandIconProps } from './ExpandIcon';
