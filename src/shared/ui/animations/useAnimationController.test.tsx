/**
 * useAnimationController - Unit Tests
 */

import { StrictMode, type ReactNode } from 'react';
import { describe, it, expect } from 'vitest';
import { render, renderHook, act } from '@testing-library/react';
import { useAnimationController } from './useAnimationController';
import type { AnimationController } from './AnimationController';
import { createManualTicker, type ManualTicker } from './ticker';
import { AnimationClockProvider } from '../../../context/AnimationClockContext';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const createWrapper = (ticker: ManualTicker, timeDilation = 1) =>
    function Wrapper({ children }: { children: ReactNode }) {
        return (
            <AnimationClockProvider ticker={ticker} timeDilation={timeDilation}>
                {children}
            </AnimationClockProvider>
        );
    };

interface ControllerHostProps {
    ticker: ManualTicker;
    onRender: (controller: AnimationController) => void;
}

function ControllerReader({ onRender }: Pick<ControllerHostProps, 'onRender'>) {
    onRender(useAnimationController({ duration: 0.2 }));
    return null;
}

/** Lets a test swap the provider's ticker between renders */
function ControllerHost({ ticker, onRender }: ControllerHostProps) {
    return (
        <AnimationClockProvider ticker={ticker}>
            <ControllerReader onRender={onRender} />
        </AnimationClockProvider>
    );
}

/** Remembers the controller handed out by the most recent render */
function createCapture() {
    let latest: AnimationController | null = null;
    return {
        get latest(): AnimationController | null {
            return latest;
        },
        onRender: (controller: AnimationController) => {
            latest = controller;
        },
    };
}

// ============================================================================
// TESTS
// ============================================================================

describe('useAnimationController', () => {
    it('returns the same controller across renders', () => {
        const ticker = createManualTicker();
        const { result, rerender } = renderHook(
            () => useAnimationController({ duration: 0.2 }),
            { wrapper: createWrapper(ticker) },
        );
        const first = result.current;

        rerender();

        expect(result.current).toBe(first);
    });

    it('starts from the initial value', () => {
        const ticker = createManualTicker();
        const { result } = renderHook(
            () => useAnimationController({ duration: 0.2, initialValue: 1 }),
            { wrapper: createWrapper(ticker) },
        );

        expect(result.current.value).toBe(1);
        expect(result.current.status).toBe('completed');
    });

    it('re-renders on every frame', () => {
        const ticker = createManualTicker();
        const seen: number[] = [];
        const { result } = renderHook(
            () => {
                const controller = useAnimationController({ duration: 0.2 });
                seen.push(controller.value);
                return controller;
            },
            { wrapper: createWrapper(ticker) },
        );

        act(() => result.current.forward());
        act(() => ticker.advance(50));
        act(() => ticker.advance(50));

        expect(seen.slice(-2)).toEqual([0.25, 0.5]);
    });

    it('releases the clock on unmount, even mid-animation', () => {
        const ticker = createManualTicker();
        const { result, unmount } = renderHook(
            () => useAnimationController({ duration: 0.2 }),
            { wrapper: createWrapper(ticker) },
        );
        const controller = result.current;

        act(() => controller.forward());
        expect(ticker.subscriberCount).toBe(1);

        unmount();

        expect(ticker.subscriberCount).toBe(0);
        expect(controller.isDisposed).toBe(true);
    });

    it('leaks nothing over repeated mount/unmount cycles', () => {
        const ticker = createManualTicker();

        for (let i = 0; i < 5; i++) {
            const { result, unmount } = renderHook(
                () => useAnimationController({ duration: 0.2 }),
                { wrapper: createWrapper(ticker) },
            );
            act(() => result.current.forward());
            act(() => ticker.advance(16));
            unmount();
        }

        expect(ticker.subscriberCount).toBe(0);
    });

    it('applies a new duration without restarting', () => {
        const ticker = createManualTicker();
        const { result, rerender } = renderHook(
            ({ duration }: { duration: number }) => useAnimationController({ duration }),
            { wrapper: createWrapper(ticker), initialProps: { duration: 0.2 } },
        );

        act(() => result.current.forward());
        act(() => ticker.advance(50));
        rerender({ duration: 0.4 });

        expect(result.current.value).toBe(0.25);
        expect(result.current.status).toBe('forward');

        act(() => ticker.advance(100));
        expect(result.current.value).toBe(0.5);
    });

    it('uses the time dilation from the provider', () => {
        const ticker = createManualTicker();
        const { result } = renderHook(
            () => useAnimationController({ duration: 0.2 }),
            { wrapper: createWrapper(ticker, 2) },
        );

        act(() => result.current.forward());
        act(() => ticker.advance(100));

        expect(result.current.value).toBe(0.25);
    });

    describe('clock changes while mounted', () => {
        it('moves a running animation to a new ticker from the provider', () => {
            const first = createManualTicker();
            const second = createManualTicker();
            const capture = createCapture();
            const { rerender } = render(<ControllerHost ticker={first} onRender={capture.onRender} />);
            const controller = capture.latest;

            act(() => controller?.forward());
            act(() => first.advance(50));
            rerender(<ControllerHost ticker={second} onRender={capture.onRender} />);

            expect(capture.latest).toBe(controller);
            expect(controller?.isDisposed).toBe(false);
            expect(first.subscriberCount).toBe(0);
            expect(second.subscriberCount).toBe(1);
            expect(controller?.value).toBe(0.25);

            act(() => second.advanceFrames(3, 50));

            expect(controller?.value).toBe(1);
            expect(controller?.status).toBe('completed');
            expect(second.subscriberCount).toBe(0);
        });

        it('returns a live controller after a ticker swap', () => {
            const first = createManualTicker();
            const second = createManualTicker();
            const capture = createCapture();
            const { rerender } = render(<ControllerHost ticker={first} onRender={capture.onRender} />);

            rerender(<ControllerHost ticker={second} onRender={capture.onRender} />);

            expect(capture.latest?.isDisposed).toBe(false);
            act(() => capture.latest?.forward());
            expect(first.subscriberCount).toBe(0);
            expect(second.subscriberCount).toBe(1);
        });

        it('survives StrictMode remounting effects', () => {
            const ticker = createManualTicker();
            const capture = createCapture();
            const { unmount } = render(
                <StrictMode>
                    <ControllerHost ticker={ticker} onRender={capture.onRender} />
                </StrictMode>
            );

            expect(capture.latest?.isDisposed).toBe(false);

            act(() => capture.latest?.forward());
            expect(ticker.subscriberCount).toBe(1);

            act(() => ticker.advanceFrames(4, 50));
            expect(capture.latest?.status).toBe('completed');
            expect(ticker.subscriberCount).toBe(0);

            unmount();
            expect(capture.latest?.isDisposed).toBe(true);
        });
    });
});
