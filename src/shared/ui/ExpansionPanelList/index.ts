export { ExpansionPanelList, headerMargin, validateExpansionPanelList } from './ExpansionPanelList';
export type { ExpansionPanelListProps } from './ExpansionPanelList';
export { createExpansionPanel, validateExpansionPanel } from './types';
export type {
    ExpansionPanel,
    ExpansionPanelInit,
    ExpansionPanelHeaderBuilder,
    ExpansionPanelCallback,
    PanelHeaderContext,
} from './types';
export { layoutPanelItems, countPanelGaps } from './panelLayout';
export type { PanelListItem, PanelExpansion } from './panelLayout';
