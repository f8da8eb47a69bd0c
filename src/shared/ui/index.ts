/**
 * Expansion Panels - UI Primitives
 * 
 * Central export for the panel list and the primitives it is built from.
 * 
 * @example
 * import { ExpansionPanelList, createExpansionPanel, AnimatedCrossFade } from './shared/ui';
 */

// ===========================
// Animation
// ===========================

export {
    DURATION,
    EASING,
    PANEL_HEADER_COLLAPSED_HEIGHT,
    PANEL_HEADER_EXPANDED_HEIGHT,
    MATERIAL_GAP_SIZE,
    Curves,
    cubicBezierCurve,
    intervalCurve,
    flippedCurve,
    createCrossFadeCurves,
    crossFadeOpacities,
    AnimationController,
    frameLoopTicker,
    createManualTicker,
    useAnimationController,
    curveTransition,
    useCurveTransition,
} from './animations';
export type {
    Curve,
    CrossFadeCurves,
    AnimationStatus,
    AnimationDirection,
    AnimationControllerOptions,
    Ticker,
    ManualTicker,
    FrameCallback,
} from './animations';

// ===========================
// Compound Components
// ===========================

// ExpansionPanelList - Stateless list of expandable panels
export {
    ExpansionPanelList,
    createExpansionPanel,
    validateExpansionPanel,
    validateExpansionPanelList,
    layoutPanelItems,
    countPanelGaps,
    headerMargin,
} from './ExpansionPanelList';
export type {
    ExpansionPanelListProps,
    ExpansionPanel,
    ExpansionPanelInit,
    ExpansionPanelHeaderBuilder,
    ExpansionPanelCallback,
    PanelHeaderContext,
    PanelListItem,
    PanelExpansion,
} from './ExpansionPanelList';

// MergeableSurface - Slices merged into cards, split by animated gaps
export { MergeableSurface, surfaceEdges } from './MergeableSurface';
export type {
    MergeableSurfaceProps,
    SurfaceItem,
    SurfaceSlice,
    SurfaceGap,
    SurfaceItemKey,
    SurfaceEdges,
} from './MergeableSurface';

// ===========================
// Simple Components
// ===========================

// AnimatedCrossFade - Staggered fade between two children with resize
export { AnimatedCrossFade, isSecondChildBase } from './AnimatedCrossFade';
export type { AnimatedCrossFadeProps, CrossFadeState } from './AnimatedCrossFade';

// AnimatedSize - Clip and animate height to content
export { AnimatedSize } from './AnimatedSize';
export type { AnimatedSizeProps } from './AnimatedSize';

// ExpandIcon - Rotating chevron toggle
export { ExpandIcon } from './ExpandIcon';
export type { ExpandIconProps } from './ExpandIcon';

// ===========================
// Errors
// ===========================

export { ContractError, assertDuration, assertTimeDilation } from './errors';
export type { ContractErrorCode, ContractErrorDetails } from './errors';
