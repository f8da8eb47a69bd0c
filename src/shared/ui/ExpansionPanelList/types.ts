/**
 * Expansion panel model
 *
 * A panel is an immutable description: header builder, body and whether it
 * is expanded. The list never changes panels; the owner rebuilds them with a
 * new isExpanded after expansionCallback fires.
 */

import type { ReactNode } from 'react';
import { ContractError } from '../errors';

/** Passed to every header builder */
export interface PanelHeaderContext {
    /** Position of the panel in the list */
    index: number;
    /** Expansion animation duration in seconds */
    animationDuration: number;
}

export type ExpansionPanelHeaderBuilder = (context: PanelHeaderContext, isExpanded: boolean) => ReactNode;

/** Receives the panel index and the expanded state being requested */
export type ExpansionPanelCallback = (panelIndex: number, isExpanded: boolean) => void;

export interface ExpansionPanel {
    readonly headerBuilder: ExpansionPanelHeaderBuilder;
    /** Shown below the header only while expanded */
    readonly body: NonNullable<ReactNode>;
    readonly isExpanded: boolean;
}

export interface ExpansionPanelInit {
    headerBuilder: ExpansionPanelHeaderBuilder;
    body: NonNullable<ReactNode>;
    /** Defaults to false */
    isExpanded?: boolean;
}

/**
 * Check one panel. Panels built by hand (or arriving from untyped code) go
 * through the same checks as createExpansionPanel.
 */
export function validateExpansionPanel(panel: unknown, panelIndex?: number): asserts panel is ExpansionPanel {
    const where = panelIndex === undefined ? 'ExpansionPanel' : `ExpansionPanel #${panelIndex}`;

    if (typeof panel !== 'object' || panel === null) {
        throw new ContractError({
            code: 'MISSING_HEADER_BUILDER',
            message: `${where}: expected a panel object`,
            panelIndex,
        });
    }
    if (!('headerBuilder' in panel) || typeof panel.headerBuilder !== 'function') {
        throw new ContractError({
            code: 'MISSING_HEADER_BUILDER',
            message: `${where}: headerBuilder is required`,
            panelIndex,
        });
    }
    if (!('body' in panel) || panel.body === null || panel.body === undefined) {
        throw new ContractError({
            code: 'MISSING_BODY',
            message: `${where}: body is required`,
            panelIndex,
        });
    }
    if (!('isExpanded' in panel) || typeof panel.isExpanded !== 'boolean') {
        throw new ContractError({
            code: 'INVALID_EXPANDED_FLAG',
            message: `${where}: isExpanded must be a boolean`,
            panelIndex,
        });
    }
}

/**
 * Build a frozen panel. Throws ContractError when headerBuilder or body is missing.
 */
export function createExpansionPanel({ headerBuilder, body, isExpanded = false }: ExpansionPanelInit): ExpansionPanel {
    const panel = { headerBuilder, body, isExpanded };
    validateExpansionPanel(panel);
    return Object.freeze(panel);
}
