/**
 * ExpansionPanelList
 * 
 * A list of panels, each a header row with a trailing expand/collapse toggle
 * and a body that cross-fades in below the header when expanded.
 * 
 * The list is stateless: it renders the panels it is given and reports toggle
 * presses through expansionCallback(panelIndex, requestedState). The owner
 * stores expansion and passes rebuilt panels back in.
 * 
 * Collapsed neighbours share one card with dividers between them; an expanded
 * panel is pulled out into its own card by animated gaps (see panelLayout).
 * The header margin, toggle rotation, body cross-fade and gaps all use the
 * same duration and curve so they move together.
 * 
 * @example
 * const [open, setOpen] = useState<boolean[]>([false, false]);
 * <ExpansionPanelList
 *   panels={sections.map((s, i) => createExpansionPanel({
 *     headerBuilder: () => <span>{s.title}</span>,
 *     body: <s.Body />,
 *     isExpanded: open[i],
 *   }))}
 *   expansionCallback={(index, isExpanded) =>
 *     setOpen(prev => prev.map((v, i) => (i === index ? isExpanded : v)))}
 * />
 */

import React from 'react';
import { motion } from 'framer-motion';
import { AnimatedCrossFade } from '../AnimatedCrossFade';
import { ExpandIcon } from '../ExpandIcon';
import { MergeableSurface, type SurfaceItem } from '../MergeableSurface';
import {
    Curves,
    DURATION,
    PANEL_HEADER_COLLAPSED_HEIGHT,
    PANEL_HEADER_EXPANDED_HEIGHT,
    useCurveTransition,
} from '../animations';
import { ContractError, assertDuration } from '../errors';
import { layoutPanelItems } from './panelLayout';
import { validateExpansionPanel, type ExpansionPanel, type ExpansionPanelCallback } from './types';
import logger from '../../../utils/logger';

// ===========================
// Types
// ===========================

export interface ExpansionPanelListProps {
    /** Panels in display order */
    panels: readonly ExpansionPanel[];
    /** Called when a toggle is pressed, with the panel index and requested state */
    expansionCallback?: ExpansionPanelCallback;
    /** Expansion animation duration in seconds */
    animationDuration?: number;
    /** Additional CSS classes for the surface */
    className?: string;
}

const PANEL_CURVE = Curves.fastOutSlowIn;

// Vertical margin added above and below the header box when expanded
const EXPANDED_HEADER_MARGIN = (PANEL_HEADER_EXPANDED_HEIGHT - PANEL_HEADER_COLLAPSED_HEIGHT) / 2;

export function headerMargin(isExpanded: boolean): number {
    return isExpanded ? EXPANDED_HEADER_MARGIN : 0;
}

/**
 * Check list input before anything is built. Throws ContractError.
 */
export function validateExpansionPanelList(panels: unknown, animationDuration: unknown): void {
    if (!Array.isArray(panels)) {
        throw new ContractError({
            code: 'MISSING_PANELS',
            message: 'ExpansionPanelList: panels must be an array',
        });
    }
    assertDuration(animationDuration, 'ExpansionPanelList');
    panels.forEach((panel: unknown, index) => validateExpansionPanel(panel, index));
}

// ===========================
// Slice
// ===========================

interface PanelSliceProps {
    panel: ExpansionPanel;
    index: number;
    animationDuration: number;
    expansionCallback?: ExpansionPanelCallback;
}

function PanelSlice({ panel, index, animationDuration, expansionCallback }: PanelSliceProps) {
    const transition = useCurveTransition(animationDuration, PANEL_CURVE);
    const margin = headerMargin(panel.isExpanded);

    const handlePressed = (isExpanded: boolean) => {
        if (!expansionCallback) return;
        logger.debug(`[ExpansionPanelList] Toggle requested for panel ${index}`, { isExpanded });
        expansionCallback(index, isExpanded);
    };

    return (
        <div className="flex flex-col" data-panel-index={index} data-expanded={panel.isExpanded}>
            {/* Header */}
            <div className="flex items-center">
                <motion.div
                    className="flex-1 min-w-0"
                    initial={false}
                    animate={{ marginTop: margin, marginBottom: margin }}
                    transition={transition}
                >
                    <div className="flex items-center" style={{ height: PANEL_HEADER_COLLAPSED_HEIGHT }}>
                        {panel.headerBuilder({ index, animationDuration }, panel.isExpanded)}
                    </div>
                </motion.div>
                <div className="mr-2">
                    <ExpandIcon
                        isExpanded={panel.isExpanded}
                        onPressed={handlePressed}
                        duration={animationDuration}
                        curve={PANEL_CURVE}
                    />
                </div>
            </div>

            {/* Body */}
            <AnimatedCrossFade
                firstChild={<div style={{ height: 0 }} />}
                secondChild={panel.body}
                crossFadeState={panel.isExpanded ? 'showSecond' : 'showFirst'}
                duration={animationDuration}
                curve={PANEL_CURVE}
            />
        </div>
    );
}

// ===========================
// Component
// ===========================

export function ExpansionPanelList({
    panels,
    expansionCallback,
    animationDuration = DURATION.normal,
    className,
}: ExpansionPanelListProps): React.JSX.Element {
    validateExpansionPanelList(panels, animationDuration);

    const items: SurfaceItem[] = layoutPanelItems(panels).map<SurfaceItem>((item) => {
        if (item.kind === 'gap') return item;
        return {
            kind: 'slice',
            key: item.key,
            child: (
                <PanelSlice
                    panel={panels[item.panelIndex]}
                    index={item.panelIndex}
                    animationDuration={animationDuration}
                    expansionCallback={expansionCallback}
                />
            ),
        };
    });

    return (
        <MergeableSurface
            items={items}
            hasDividers
            duration={animationDuration}
            curve={PANEL_CURVE}
            className={className}
        />
    );
}

export default ExpansionPanelList;
