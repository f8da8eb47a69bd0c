/**
 * AnimatedCrossFade Primitive
 * 
 * Cross-fades between two children while the container resizes to whichever
 * child is taking over. The fade is staggered: the first child fades out over
 * the first 60% of the run and the second fades in over the last 60%, so both
 * are partly visible in the middle and the area never flashes empty.
 * 
 * LAYERING:
 * Only one child sits in layout flow (the base layer); the other is overlaid
 * at the same origin with absolute positioning so it cannot affect the size.
 * - Completed, or running toward the second child: second is base, first on top
 * - Dismissed, or running back toward the first child: first is base, second on top
 * The base is always the child being revealed, so AnimatedSize converges on
 * its height.
 * 
 * A transition only starts when `crossFadeState` changes between renders.
 * Flipping it mid-flight turns the animation around from its current value.
 * 
 * @example
 * <AnimatedCrossFade
 *   firstChild={<div style={{ height: 0 }} />}
 *   secondChild={<PanelBody />}
 *   crossFadeState={isOpen ? 'showSecond' : 'showFirst'}
 *   duration={0.2}
 *   curve={Curves.fastOutSlowIn}
 * />
 */

import React, { useLayoutEffect, useMemo, useRef, ReactNode } from 'react';
import { AnimatedSize } from '../AnimatedSize';
import {
    Curves,
    createCrossFadeCurves,
    useAnimationController,
    type AnimationStatus,
    type Curve,
} from '../animations';
import logger from '../../../utils/logger';

// ===========================
// Types
// ===========================

/** Which child the cross-fade is heading for */
export type CrossFadeState = 'showFirst' | 'showSecond';

export interface AnimatedCrossFadeProps {
    /** Child shown in the 'showFirst' state */
    firstChild: ReactNode;
    /** Child shown in the 'showSecond' state */
    secondChild: ReactNode;
    /** Target state; changing it starts the transition */
    crossFadeState: CrossFadeState;
    /** Duration in seconds, shared by the fade and the resize */
    duration: number;
    /** Base easing for the fade and the resize */
    curve?: Curve;
    /** Additional CSS classes for the clipping container */
    className?: string;
}

/**
 * Whether the second child is the in-flow base layer for a controller status.
 */
export function isSecondChildBase(status: AnimationStatus): boolean {
    return status === 'completed' || status === 'forward';
}

// ===========================
// Layer
// ===========================

const OVERLAY_STYLE: React.CSSProperties = {
    position: 'absolute',
    top: 0,
    left: 0,
    right: 0,
};

interface CrossFadeLayerProps {
    opacity: number;
    overlay: boolean;
    children: ReactNode;
}

function CrossFadeLayer({ opacity, overlay, children }: CrossFadeLayerProps) {
    return (
        <div
            data-layer={overlay ? 'overlay' : 'base'}
            aria-hidden={opacity === 0 ? true : undefined}
            style={overlay ? { ...OVERLAY_STYLE, opacity } : { opacity }}
        >
            {children}
        </div>
    );
}

// ===========================
// Component
// ===========================

export function AnimatedCrossFade({
    firstChild,
    secondChild,
    crossFadeState,
    duration,
    curve = Curves.linear,
    className,
}: AnimatedCrossFadeProps): React.JSX.Element {
    const controller = useAnimationController({
        duration,
        initialValue: crossFadeState === 'showSecond' ? 1 : 0,
        owner: 'AnimatedCrossFade',
    });
    const previousState = useRef<CrossFadeState>(crossFadeState);

    // Run only on a real state change; same state twice is a no-op
    useLayoutEffect(() => {
        if (previousState.current === crossFadeState) return;
        previousState.current = crossFadeState;
        logger.debug(`[AnimatedCrossFade] Heading to ${crossFadeState}`, { from: controller.value });

        if (crossFadeState === 'showSecond') {
            controller.forward();
        } else {
            controller.reverse();
        }
    }, [crossFadeState, controller]);

    const curves = useMemo(() => createCrossFadeCurves(curve), [curve]);
    const progress = controller.value;

    const first = (
        <CrossFadeLayer key="first" opacity={curves.first(progress)} overlay={isSecondChildBase(controller.status)}>
            {firstChild}
        </CrossFadeLayer>
    );
    const second = (
        <CrossFadeLayer key="second" opacity={curves.second(progress)} overlay={!isSecondChildBase(controller.status)}>
            {secondChild}
        </CrossFadeLayer>
    );

    return (
        <AnimatedSize duration={duration} curve={curve} className={className}>
            <div className="relative" data-status={controller.status}>
                {isSecondChildBase(controller.status) ? [second, first] : [first, second]}
            </div>
        </AnimatedSize>
    );
}

export default AnimatedCrossFade;
