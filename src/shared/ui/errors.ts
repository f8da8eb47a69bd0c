/**
 * UI Contract Errors
 * Raised when a component or controller is built from input it cannot accept.
 * These are programming errors: they are thrown eagerly and never recovered.
 */

export type ContractErrorCode =
    | 'MISSING_PANELS'
    | 'MISSING_HEADER_BUILDER'
    | 'MISSING_BODY'
    | 'INVALID_EXPANDED_FLAG'
    | 'INVALID_DURATION'
    | 'INVALID_TIME_DILATION'
    | 'CONTROLLER_DISPOSED';

export interface ContractErrorDetails {
    code: ContractErrorCode;
    message: string;
    panelIndex?: number; // Set when a single panel is at fault
}

export class ContractError extends Error {
    code: ContractErrorCode;
    panelIndex?: number;

    constructor(details: ContractErrorDetails) {
        super(details.message);
        this.name = 'ContractError';
        this.code = details.code;
        this.panelIndex = details.panelIndex;
    }

    /**
     * Check if error is a specific type
     */
    is(code: ContractErrorCode): boolean {
        return this.code === code;
    }
}

/**
 * Validate an animation duration expressed in seconds.
 */
export function assertDuration(duration: unknown, owner: string): asserts duration is number {
    if (typeof duration !== 'number' || !Number.isFinite(duration) || duration < 0) {
        throw new ContractError({
            code: 'INVALID_DURATION',
            message: `${owner}: duration must be a finite, non-negative number of seconds (got ${String(duration)})`,
        });
    }
}

/**
 * Validate a time-dilation factor (1 = real time, 5 = five times slower).
 */
export function assertTimeDilation(factor: unknown, owner: string): asserts factor is number {
    if (typeof factor !== 'number' || !Number.isFinite(factor) || factor <= 0) {
        throw new ContractError({
            code: 'INVALID_TIME_DILATION',
            message: `${owner}: time dilation must be a finite, positive number (got ${String(factor)})`,
        });
    }
}
