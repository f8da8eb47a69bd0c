/**
 * AnimationClockContext
 *
 * Supplies the frame ticker and the time-dilation factor to every animated
 * primitive below it. Both are configuration: a debug harness can slow all
 * panel animations down (timeDilation = 5) and tests can swap in a manual
 * ticker without touching module-level state.
 *
 * Outside a provider the framer-motion frame loop at real time is used.
 */

import React, { createContext, useContext, useMemo, ReactNode } from 'react';
import { frameLoopTicker, type Ticker } from '../shared/ui/animations/ticker';
import { assertTimeDilation } from '../shared/ui/errors';

interface AnimationClockContextType {
    /** Frame source for AnimationController instances */
    ticker: Ticker;
    /** Multiplier applied to every animation duration (1 = real time) */
    timeDilation: number;
}

const DEFAULT_CLOCK: AnimationClockContextType = {
    ticker: frameLoopTicker,
    timeDilation: 1,
};

const AnimationClockContext = createContext<AnimationClockContextType | null>(null);

interface AnimationClockProviderProps {
    ticker?: Ticker;
    timeDilation?: number;
    children: ReactNode;
}

export function AnimationClockProvider({
    ticker = frameLoopTicker,
    timeDilation = 1,
    children,
}: AnimationClockProviderProps): React.JSX.Element {
    assertTimeDilation(timeDilation, 'AnimationClockProvider');

    const value = useMemo(() => ({ ticker, timeDilation }), [ticker, timeDilation]);

    return (
        <AnimationClockContext.Provider value={value}>
            {children}
        </AnimationClockContext.Provider>
    );
}

export function useAnimationClock(): AnimationClockContextType {
    const context = useContext(AnimationClockContext);
    return context ?? DEFAULT_CLOCK;
}
