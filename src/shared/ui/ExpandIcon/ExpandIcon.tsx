/**
 * ExpandIcon Primitive
 * 
 * Chevron toggle for expandable content. The chevron turns 180° when expanded,
 * animated with the same duration and curve as the content it controls.
 * 
 * onPressed receives the state being requested (the opposite of `isExpanded`).
 * The icon never tracks expansion itself; the owner passes the new value back in.
 * 
 * @example
 * <ExpandIcon isExpanded={open} onPressed={setOpen} />
 */

import React from 'react';
import { motion } from 'framer-motion';
import { ChevronDown } from 'lucide-react';
import { Curves, DURATION, useCurveTransition, type Curve } from '../animations';

export interface ExpandIconProps {
    /** Whether the controlled content is expanded */
    isExpanded: boolean;
    /** Called with the requested expanded state */
    onPressed?: (isExpanded: boolean) => void;
    /** Rotation duration in seconds */
    duration?: number;
    /** Rotation easing */
    curve?: Curve;
    /** Icon size in px */
    size?: number;
    /** Additional CSS classes for the button */
    className?: string;
}

export function ExpandIcon({
    isExpanded,
    onPressed,
    duration = DURATION.normal,
    curve = Curves.fastOutSlowIn,
    size = 24,
    className = '',
}: ExpandIconProps): React.JSX.Element {
    const transition = useCurveTransition(duration, curve);

    return (
        <button
            type="button"
            aria-expanded={isExpanded}
            aria-label={isExpanded ? 'Collapse' : 'Expand'}
            onClick={() => onPressed?.(!isExpanded)}
            className={`
                p-4 rounded-full
                text-theme-secondary hover:text-theme-primary
                transition-colors
                focus:outline-none focus-visible:ring-2 focus-visible:ring-accent
                ${className}
            `}
        >
            <motion.span
                className="flex items-center justify-center"
                initial={false}
                animate={{ rotate: isExpanded ? 180 : 0 }}
                transition={transition}
            >
                <ChevronDown size={size} />
            </motion.span>
        </button>
    );
}

export default ExpandIcon;
