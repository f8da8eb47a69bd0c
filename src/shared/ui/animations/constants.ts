/**
 * Animation Constants
 * 
 * Centralized timing, easing and metric values for the panel primitives.
 */

// Duration presets (in seconds)
export const DURATION = {
    instant: 0.1,
    fast: 0.15,
    normal: 0.2,
    medium: 0.3,
    slow: 0.4,
} as const;

// Easing presets (cubic-bezier control points)
export const EASING = {
    // Standard easing
    easeOut: [0.0, 0.0, 0.2, 1],
    easeIn: [0.4, 0.0, 1, 1],

    // Material "fast out, slow in" - used for every expand/collapse
    fastOutSlowIn: [0.4, 0.0, 0.2, 1],
} as const;

// Header box height and the height the header area grows to when expanded (px)
export const PANEL_HEADER_COLLAPSED_HEIGHT = 48;
export const PANEL_HEADER_EXPANDED_HEIGHT = 64;

// Space between two panel groups of the mergeable surface (px)
export const MATERIAL_GAP_SIZE = 16;

// Cross-fade sub-intervals of the controller's [0, 1] range.
// The two windows overlap between 0.4 and 0.6 so neither child leaves a hole.
export const CROSS_FADE_FIRST_INTERVAL = [0.0, 0.6] as const;
export const CROSS_FADE_SECOND_INTERVAL = [0.4, 1.0] as const;
