/**
 * Ticker - Frame clock abstraction
 *
 * AnimationController never schedules frames itself; it asks a Ticker for
 * per-frame callbacks. The default ticker rides framer-motion's frame loop so
 * controller-driven values update in the same batch as motion components.
 */

import { frame, cancelFrame } from 'framer-motion';

/** Called once per frame with the milliseconds elapsed since the previous frame */
export type FrameCallback = (deltaMs: number) => void;

export interface Ticker {
    /** Start receiving frames. Returns the function that stops them. */
    subscribe: (onFrame: FrameCallback) => () => void;
}

export const frameLoopTicker: Ticker = {
    subscribe(onFrame) {
        const process = ({ delta }: { delta: number }): void => onFrame(delta);
        frame.update(process, true);
        return () => cancelFrame(process);
    },
};

// ===========================
// Manual ticker
// ===========================

export interface ManualTicker extends Ticker {
    /** Deliver one frame of `deltaMs` to every current subscriber */
    advance: (deltaMs: number) => void;
    /** Deliver `count` frames of `deltaMs` each */
    advanceFrames: (count: number, deltaMs: number) => void;
    /** Number of live subscriptions */
    readonly subscriberCount: number;
}

/**
 * Ticker that only moves when told to. Used by tests and by hosts that drive
 * animation from their own scheduler.
 */
export function createManualTicker(): ManualTicker {
    const subscribers = new Set<{ onFrame: FrameCallback }>();

    const advance = (deltaMs: number): void => {
        // Snapshot: a subscriber may unsubscribe itself when its animation completes
        for (const subscriber of [...subscribers]) {
            if (subscribers.has(subscriber)) subscriber.onFrame(deltaMs);
        }
    };

    return {
        subscribe(onFrame) {
            const subscriber = { onFrame };
            subscribers.add(subscriber);
            return () => {
                subscribers.delete(subscriber);
            };
        },
        advance,
        advanceFrames(count, deltaMs) {
            for (let i = 0; i < count; i++) advance(deltaMs);
        },
        get subscriberCount() {
            return subscribers.size;
        },
    };
}
