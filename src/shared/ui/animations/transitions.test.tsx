/**
 * framer-motion transitions - Tests
 */

import type { ReactNode } from 'react';
import { describe, it, expect } from 'vitest';
import { renderHook } from '@testing-library/react';
import { curveTransition, useCurveTransition } from './transitions';
import { Curves } from './curves';
import { createManualTicker } from './ticker';
import { AnimationClockProvider } from '../../../context/AnimationClockContext';

describe('curveTransition', () => {
    it('carries the duration and curve', () => {
        expect(curveTransition(0.2, Curves.linear)).toEqual({ duration: 0.2, ease: Curves.linear });
    });

    it('scales the duration by the time dilation', () => {
        expect(curveTransition(0.2, Curves.fastOutSlowIn, 5)).toEqual({ duration: 1, ease: Curves.fastOutSlowIn });
    });
});

describe('useCurveTransition', () => {
    it('uses real time outside a provider', () => {
        const { result } = renderHook(() => useCurveTransition(0.3, Curves.linear));
        expect(result.current).toEqual({ duration: 0.3, ease: Curves.linear });
    });

    it('applies the provider time dilation', () => {
        const ticker = createManualTicker();
        const wrapper = ({ children }: { children: ReactNode }) => (
            <AnimationClockProvider ticker={ticker} timeDilation={2}>{children}</AnimationClockProvider>
        );

        const { result } = renderHook(() => useCurveTransition(0.25, Curves.linear), { wrapper });

        expect(result.current).toEqual({ duration: 0.5, ease: Curves.linear });
    });
});
