/**
 * Animation Utilities - Barrel Export
 * 
 * Clock, curves and timing shared by the panel primitives.
 * 
 * @example
 * import { AnimationController, Curves, DURATION } from '../animations';
 */

// Constants
export {
    DURATION,
    EASING,
    PANEL_HEADER_COLLAPSED_HEIGHT,
    PANEL_HEADER_EXPANDED_HEIGHT,
    MATERIAL_GAP_SIZE,
    CROSS_FADE_FIRST_INTERVAL,
    CROSS_FADE_SECOND_INTERVAL,
} from './constants';

// Curves
export {
    Curves,
    cubicBezierCurve,
    intervalCurve,
    flippedCurve,
    createCrossFadeCurves,
    crossFadeOpacities,
} from './curves';
export type { Curve, CrossFadeCurves } from './curves';

// Clock
export { AnimationController } from './AnimationController';
export type { AnimationStatus, AnimationDirection, AnimationControllerOptions } from './AnimationController';
export { frameLoopTicker, createManualTicker } from './ticker';
export type { Ticker, ManualTicker, FrameCallback } from './ticker';
export { useAnimationController } from './useAnimationController';

// framer-motion transitions
export { curveTransition, useCurveTransition } from './transitions';
