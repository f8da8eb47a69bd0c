/**
 * Panel list layout
 *
 * Pure slot assignment for ExpansionPanelList. Each panel i owns three key
 * slots so keys never collide and stay stable as panels open and close:
 *   2i - 1  gap before the panel
 *   2i      the panel's slice
 *   2i + 1  gap after the panel
 *
 * A gap opens before an expanded panel whose predecessor is collapsed, and
 * after every expanded panel except the last. Runs of collapsed panels stay
 * merged; runs of expanded panels are already separated by their trailing gaps.
 */

export type PanelListItem =
    | { kind: 'gap'; key: number }
    | { kind: 'slice'; key: number; panelIndex: number };

export interface PanelExpansion {
    readonly isExpanded: boolean;
}

export function layoutPanelItems(panels: readonly PanelExpansion[]): PanelListItem[] {
    const items: PanelListItem[] = [];
    const isExpanded = (index: number): boolean => panels[index].isExpanded;

    for (let i = 0; i < panels.length; i += 1) {
        if (isExpanded(i) && i !== 0 && !isExpanded(i - 1)) {
            items.push({ kind: 'gap', key: i * 2 - 1 });
        }

        items.push({ kind: 'slice', key: i * 2, panelIndex: i });

        if (isExpanded(i) && i !== panels.length - 1) {
            items.push({ kind: 'gap', key: i * 2 + 1 });
        }
    }

    return items;
}

/** Number of gaps layoutPanelItems produces for these panels */
export function countPanelGaps(panels: readonly PanelExpansion[]): number {
    return layoutPanelItems(panels).filter(item => item.kind === 'gap').length;
}
