/**
 * MergeableSurface Primitive
 * 
 * A vertical run of slices and gaps. Slices with no gap between them merge
 * into one continuous card (rounded only on the outside corners, optional
 * dividers between neighbours); a gap splits the run into separate cards.
 * 
 * Gaps animate their height in and out, so inserting or removing one pulls
 * cards apart or together instead of jumping. Keys must stay stable across
 * renders for that to work.
 * 
 * @example
 * <MergeableSurface
 *   hasDividers
 *   items={[
 *     { kind: 'slice', key: 0, child: <Row /> },
 *     { kind: 'gap', key: 1 },
 *     { kind: 'slice', key: 2, child: <Row /> },
 *   ]}
 * />
 */

import React, { ReactNode } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import { Curves, DURATION, MATERIAL_GAP_SIZE, useCurveTransition, type Curve } from '../animations';

// ===========================
// Types
// ===========================

export type SurfaceItemKey = string | number;

export interface SurfaceSlice {
    kind: 'slice';
    key: SurfaceItemKey;
    child: ReactNode;
}

export interface SurfaceGap {
    kind: 'gap';
    key: SurfaceItemKey;
}

export type SurfaceItem = SurfaceSlice | SurfaceGap;

export interface SurfaceEdges {
    /** First slice of its card: rounded top corners */
    isGroupStart: boolean;
    /** Last slice of its card: rounded bottom corners */
    isGroupEnd: boolean;
    /** Directly follows another slice: divider on top */
    followsSlice: boolean;
}

export interface MergeableSurfaceProps {
    items: readonly SurfaceItem[];
    /** Draw a divider between adjacent slices */
    hasDividers?: boolean;
    /** Gap height in px */
    gapSize?: number;
    /** Gap open/close duration in seconds */
    duration?: number;
    /** Gap open/close easing */
    curve?: Curve;
    /** Additional CSS classes for the surface */
    className?: string;
}

// ===========================
// Layout
// ===========================

/**
 * Where the slice at `index` sits within its card. Gaps and the ends of the
 * list close a card.
 */
export function surfaceEdges(items: readonly SurfaceItem[], index: number): SurfaceEdges {
    const previous = items[index - 1];
    const next = items[index + 1];
    return {
        isGroupStart: previous === undefined || previous.kind === 'gap',
        isGroupEnd: next === undefined || next.kind === 'gap',
        followsSlice: previous?.kind === 'slice',
    };
}

function sliceClasses(edges: SurfaceEdges, hasDividers: boolean): string {
    return [
        'bg-theme-secondary overflow-hidden',
        edges.isGroupStart ? 'rounded-t-xl' : '',
        edges.isGroupEnd ? 'rounded-b-xl shadow-sm' : '',
        hasDividers && edges.followsSlice ? 'border-t border-theme-light' : '',
    ].filter(Boolean).join(' ');
}

// ===========================
// Component
// ===========================

export function MergeableSurface({
    items,
    hasDividers = false,
    gapSize = MATERIAL_GAP_SIZE,
    duration = DURATION.normal,
    curve = Curves.fastOutSlowIn,
    className = '',
}: MergeableSurfaceProps): React.JSX.Element {
    const transition = useCurveTransition(duration, curve);

    return (
        <div className={`flex flex-col ${className}`} role="list">
            <AnimatePresence initial={false}>
                {items.map((item, index) => {
                    if (item.kind === 'gap') {
                        return (
                            <motion.div
                                key={item.key}
                                data-kind="gap"
                                data-key={item.key}
                                aria-hidden
                                initial={{ height: 0 }}
                                animate={{ height: gapSize }}
                                exit={{ height: 0 }}
                                transition={transition}
                            />
                        );
                    }

                    return (
                        <div
                            key={item.key}
                            role="listitem"
                            data-kind="slice"
                            data-key={item.key}
                            className={sliceClasses(surfaceEdges(items, index), hasDividers)}
                        >
                            {item.child}
                        </div>
                    );
                })}
            </AnimatePresence>
        </div>
    );
}

export default MergeableSurface;
