/**
 * AnimationController
 *
 * A reversible clock over [0, 1]. forward() runs the value toward 1 and
 * reverse() toward 0, each starting from wherever the value currently is, so
 * flipping direction mid-flight turns the animation around instead of
 * restarting it.
 *
 * The controller only holds a ticker subscription while it is animating.
 * dispose() releases it and refuses further use.
 *
 * @example
 * const controller = new AnimationController({ duration: 0.2, ticker: frameLoopTicker });
 * const stop = controller.addListener(() => render(controller.value));
 * controller.forward();
 */

import { ContractError, assertDuration, assertTimeDilation } from '../errors';
import type { Ticker } from './ticker';

export type AnimationStatus =
    | 'dismissed' // at 0, idle
    | 'forward' // heading to 1
    | 'reverse' // heading to 0
    | 'completed'; // at 1, idle

export type AnimationDirection = 'forward' | 'reverse';

export interface AnimationControllerOptions {
    /** Length of a full 0 → 1 run in seconds */
    duration: number;
    ticker: Ticker;
    /** Slow-motion factor; 1 = real time */
    timeDilation?: number;
    /** Starting value, clamped to [0, 1] */
    value?: number;
}

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));

export class AnimationController {
    private _value: number;
    private _duration: number;
    private _timeDilation: number;
    private _direction: AnimationDirection = 'forward';
    private _ticker: Ticker;
    private readonly listeners = new Set<() => void>();
    private unsubscribeTicker: (() => void) | null = null;
    private disposed = false;

    constructor({ duration, ticker, timeDilation = 1, value = 0 }: AnimationControllerOptions) {
        assertDuration(duration, 'AnimationController');
        assertTimeDilation(timeDilation, 'AnimationController');
        this._duration = duration;
        this._timeDilation = timeDilation;
        this._ticker = ticker;
        this._value = clamp01(value);
    }

    get value(): number {
        return this._value;
    }

    get direction(): AnimationDirection {
        return this._direction;
    }

    get status(): AnimationStatus {
        if (this.isAnimating) return this.direction;
        if (this._value === 1) return 'completed';
        if (this._value === 0) return 'dismissed';
        // Stopped part-way: report the direction it was last heading
        return this.direction;
    }

    get isAnimating(): boolean {
        return this.unsubscribeTicker !== null;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    get duration(): number {
        return this._duration;
    }

    /** Takes effect from the next frame; a running animation keeps its position. */
    set duration(duration: number) {
        assertDuration(duration, 'AnimationController');
        this._duration = duration;
    }

    get timeDilation(): number {
        return this._timeDilation;
    }

    set timeDilation(factor: number) {
        assertTimeDilation(factor, 'AnimationController');
        this._timeDilation = factor;
    }

    get ticker(): Ticker {
        return this._ticker;
    }

    /** A running animation moves its frame subscription over and keeps going. */
    set ticker(ticker: Ticker) {
        if (ticker === this._ticker) return;
        this._ticker = ticker;
        if (this.unsubscribeTicker) {
            this.unsubscribeTicker();
            this.unsubscribeTicker = ticker.subscribe(this.tick);
        }
    }

    /**
     * Subscribe to value and status changes. Returns the unsubscribe function.
     */
    addListener(listener: () => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    forward(): void {
        this.animate('forward');
    }

    reverse(): void {
        this.animate('reverse');
    }

    /** Halt at the current value. */
    stop(): void {
        if (!this.unsubscribeTicker) return;
        this.unsubscribeTicker();
        this.unsubscribeTicker = null;
        this.notify();
    }

    dispose(): void {
        if (this.disposed) return;
        if (this.unsubscribeTicker) {
            this.unsubscribeTicker();
            this.unsubscribeTicker = null;
        }
        this.listeners.clear();
        this.disposed = true;
    }

    private animate(direction: AnimationDirection): void {
        if (this.disposed) {
            throw new ContractError({
                code: 'CONTROLLER_DISPOSED',
                message: `AnimationController.${direction}() called after dispose()`,
            });
        }

        this._direction = direction;
        const target = direction === 'forward' ? 1 : 0;

        if (this._value === target || this._duration === 0) {
            if (this.unsubscribeTicker) {
                this.unsubscribeTicker();
                this.unsubscribeTicker = null;
            }
            this._value = target;
            this.notify();
            return;
        }

        if (!this.unsubscribeTicker) {
            this.unsubscribeTicker = this._ticker.subscribe(this.tick);
        }
        this.notify();
    }

    private tick = (deltaMs: number): void => {
        const target = this._direction === 'forward' ? 1 : 0;
        const durationMs = this._duration * 1000 * this._timeDilation;
        const step = durationMs === 0 ? 1 : deltaMs / durationMs;

        this._value = this._direction === 'forward'
            ? Math.min(1, this._value + step)
            : Math.max(0, this._value - step);

        if (this._value === target && this.unsubscribeTicker) {
            this.unsubscribeTicker();
            this.unsubscribeTicker = null;
        }
        this.notify();
    };

    private notify(): void {
        for (const listener of [...this.listeners]) {
            listener();
        }
    }
}
