/**
 * useAnimationController - Component-scoped animation clock
 *
 * Creates one AnimationController per mounted component, re-renders the
 * component on every value/status change, and disposes the controller when
 * the component unmounts. Ticker, duration and time-dilation changes are
 * applied to the live controller without restarting it, so the controller
 * returned by a render is never disposed by the effects of that same render.
 *
 * If the controller is released while the component stays on screen
 * (StrictMode's simulated remount) a replacement is created from the released
 * one's value and keeps heading the same way.
 *
 * Usage:
 *   const controller = useAnimationController({ duration: 0.2, initialValue: 0 });
 *   useLayoutEffect(() => controller.forward(), [controller]);
 *   <div style={{ opacity: controller.value }} />
 */

import { useEffect, useLayoutEffect, useRef, useState } from 'react';
import { AnimationController } from './AnimationController';
import { useAnimationClock } from '../../../context/AnimationClockContext';
import logger from '../../../utils/logger';

interface UseAnimationControllerOptions {
    /** Full-run duration in seconds */
    duration: number;
    /** Value the controller starts from on mount */
    initialValue?: number;
    /** Tag used in log output */
    owner?: string;
}

export function useAnimationController({
    duration,
    initialValue = 0,
    owner = 'useAnimationController',
}: UseAnimationControllerOptions): AnimationController {
    const { ticker, timeDilation } = useAnimationClock();
    const [, forceUpdate] = useState(0);
    const controllerRef = useRef<AnimationController | null>(null);

    if (controllerRef.current === null) {
        controllerRef.current = new AnimationController({ duration, ticker, timeDilation, value: initialValue });
    }
    const controller = controllerRef.current;

    useLayoutEffect(() => {
        let active = controllerRef.current;

        if (active === null || active.isDisposed) {
            const previous = active;
            active = new AnimationController({
                duration: previous?.duration ?? duration,
                timeDilation: previous?.timeDilation ?? timeDilation,
                value: previous?.value ?? initialValue,
                ticker: previous?.ticker ?? ticker,
            });
            if (previous?.status === 'forward') active.forward();
            if (previous?.status === 'reverse') active.reverse();
            controllerRef.current = active;
            forceUpdate(n => n + 1);
        }

        const current = active;
        const removeListener = current.addListener(() => forceUpdate(n => n + 1));
        logger.debug(`[${owner}] Animation clock acquired`);

        return () => {
            removeListener();
            current.dispose();
            logger.debug(`[${owner}] Animation clock released`);
        };
        // Creation inputs are read once; later changes are synced below
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, []);

    // Layout effect: must land before the caller's own layout effects start a run
    useLayoutEffect(() => {
        if (!controller.isDisposed) controller.ticker = ticker;
    }, [controller, ticker]);

    // Keep timing in sync without restarting a running animation
    useEffect(() => {
        if (!controller.isDisposed) controller.duration = duration;
    }, [controller, duration]);

    useEffect(() => {
        if (!controller.isDisposed) controller.timeDilation = timeDilation;
    }, [controller, timeDilation]);

    return controller;
}

export default useAnimationController;
