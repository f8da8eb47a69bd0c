/**
 * framer-motion transitions for the panel primitives.
 *
 * Header margins, icon rotation, gaps and AnimatedSize all animate through
 * framer-motion, while the cross-fade runs on an AnimationController. Building
 * their transitions here from the same duration, curve and time dilation keeps
 * both clocks in lockstep.
 */

import { useMemo } from 'react';
import type { Transition } from 'framer-motion';
import type { Curve } from './curves';
import { useAnimationClock } from '../../../context/AnimationClockContext';

export function curveTransition(duration: number, curve: Curve, timeDilation = 1): Transition {
    return {
        duration: duration * timeDilation,
        ease: curve,
    };
}

/** curveTransition scaled by the surrounding AnimationClockProvider */
export function useCurveTransition(duration: number, curve: Curve): Transition {
    const { timeDilation } = useAnimationClock();
    return useMemo(() => curveTransition(duration, curve, timeDilation), [duration, curve, timeDilation]);
}
