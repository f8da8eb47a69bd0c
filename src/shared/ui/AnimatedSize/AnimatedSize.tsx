/**
 * AnimatedSize Primitive
 * 
 * Clips its content and animates its own height to match the content's
 * measured height. Content stays anchored to the top edge, so a shrinking
 * container hides the bottom first.
 * 
 * Only in-flow content counts toward the measured height; absolutely
 * positioned children overflow and are clipped.
 * 
 * @example
 * <AnimatedSize duration={0.2} curve={Curves.fastOutSlowIn}>
 *   {isOpen ? <Details /> : <Summary />}
 * </AnimatedSize>
 */

import React, { useLayoutEffect, useRef, useState, ReactNode } from 'react';
import { motion } from 'framer-motion';
import { Curves, useCurveTransition, type Curve } from '../animations';

export interface AnimatedSizeProps {
    /** Resize duration in seconds */
    duration: number;
    /** Easing for the resize */
    curve?: Curve;
    children: ReactNode;
    /** Additional CSS classes for the clipping container */
    className?: string;
}

export function AnimatedSize({
    duration,
    curve = Curves.linear,
    children,
    className = '',
}: AnimatedSizeProps): React.JSX.Element {
    const contentRef = useRef<HTMLDivElement>(null);
    const [height, setHeight] = useState<number | null>(null);
    const transition = useCurveTransition(duration, curve);

    // Track content height - useLayoutEffect so the first paint already has it
    useLayoutEffect(() => {
        const el = contentRef.current;
        if (!el) return;

        setHeight(el.getBoundingClientRect().height);

        const observer = new ResizeObserver((entries) => {
            const next = entries[0]?.contentRect.height;
            if (next !== undefined) setHeight(next);
        });

        observer.observe(el);
        return () => observer.disconnect();
    }, []);

    return (
        <motion.div
            className={`relative overflow-hidden ${className}`}
            initial={false}
            animate={height === null ? undefined : { height }}
            transition={transition}
            data-measured-height={height ?? undefined}
        >
            <div ref={contentRef} className="relative">
                {children}
            </div>
        </motion.div>
    );
}

export default AnimatedSize;
