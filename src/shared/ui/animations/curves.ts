/**
 * Easing Curves
 *
 * Thin layer over framer-motion's easing utilities so the cross-fade can
 * restrict a curve to part of the controller's range and play it backwards.
 *
 * @example
 * const fadeOut = intervalCurve(0, 0.6, Curves.fastOutSlowIn);
 * fadeOut(0.3); // eased progress through the first 60% of the animation
 */

import { cubicBezier, interpolate, reverseEasing } from 'framer-motion';
import { CROSS_FADE_FIRST_INTERVAL, CROSS_FADE_SECOND_INTERVAL, EASING } from './constants';

/** Maps normalized progress in [0, 1] to eased progress. */
export type Curve = (t: number) => number;

export function cubicBezierCurve(x1: number, y1: number, x2: number, y2: number): Curve {
    return cubicBezier(x1, y1, x2, y2);
}

export const Curves = {
    linear: (t: number): number => t,
    easeOut: cubicBezierCurve(...EASING.easeOut),
    easeIn: cubicBezierCurve(...EASING.easeIn),
    fastOutSlowIn: cubicBezierCurve(...EASING.fastOutSlowIn),
} as const satisfies Record<string, Curve>;

/**
 * Restrict a curve to [begin, end]: 0 before begin, 1 after end,
 * and the curve stretched over the window in between.
 */
export function intervalCurve(begin: number, end: number, curve: Curve = Curves.linear): Curve {
    if (!(begin >= 0 && end <= 1 && begin <= end)) {
        throw new RangeError(`Invalid curve interval [${begin}, ${end}]`);
    }
    return interpolate([begin, end], [0, 1], { ease: curve, clamp: true });
}

/** The curve rotated 180°: `1 - curve(1 - t)`. */
export function flippedCurve(curve: Curve): Curve {
    return reverseEasing(curve);
}

export interface CrossFadeCurves {
    /** Opacity of the first child for a given controller value */
    first: Curve;
    /** Opacity of the second child for a given controller value */
    second: Curve;
}

/**
 * Build the staggered opacity curves: the first child fades out over
 * [0, 0.6], the second fades in over [0.4, 1] with the flipped curve.
 */
export function createCrossFadeCurves(curve: Curve): CrossFadeCurves {
    const fadeOut = intervalCurve(CROSS_FADE_FIRST_INTERVAL[0], CROSS_FADE_FIRST_INTERVAL[1], curve);
    const fadeIn = intervalCurve(CROSS_FADE_SECOND_INTERVAL[0], CROSS_FADE_SECOND_INTERVAL[1], flippedCurve(curve));
    return {
        first: (t) => 1 - fadeOut(t),
        second: fadeIn,
    };
}

export function crossFadeOpacities(progress: number, curve: Curve): { first: number; second: number } {
    const curves = createCrossFadeCurves(curve);
    return { first: curves.first(progress), second: curves.second(progress) };
}
