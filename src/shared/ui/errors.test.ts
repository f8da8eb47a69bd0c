/**
 * UI Contract Errors - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ContractError, assertDuration, assertTimeDilation } from './errors';

describe('ContractError', () => {
    it('carries its code and panel index', () => {
        const error = new ContractError({ code: 'MISSING_BODY', message: 'no body', panelIndex: 2 });

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ContractError');
        expect(error.message).toBe('no body');
        expect(error.code).toBe('MISSING_BODY');
        expect(error.panelIndex).toBe(2);
    });

    it('matches on code', () => {
        const error = new ContractError({ code: 'INVALID_DURATION', message: 'bad' });

        expect(error.is('INVALID_DURATION')).toBe(true);
        expect(error.is('MISSING_PANELS')).toBe(false);
        expect(error.panelIndex).toBeUndefined();
    });
});

describe('assertDuration', () => {
    it('accepts zero and positive durations', () => {
        expect(() => assertDuration(0, 'Test')).not.toThrow();
        expect(() => assertDuration(0.2, 'Test')).not.toThrow();
    });

    it.each([-1, Number.NaN, Number.POSITIVE_INFINITY, '0.2', undefined])('rejects %s', (value) => {
        expect(() => assertDuration(value, 'Test')).toThrow(ContractError);
    });

    it('names the owner and the rejected value', () => {
        expect(() => assertDuration(-1, 'ExpansionPanelList')).toThrow(
            'ExpansionPanelList: duration must be a finite, non-negative number of seconds (got -1)'
        );
    });
});

describe('assertTimeDilation', () => {
    it('accepts positive factors', () => {
        expect(() => assertTimeDilation(1, 'Test')).not.toThrow();
        expect(() => assertTimeDilation(5, 'Test')).not.toThrow();
        expect(() => assertTimeDilation(0.5, 'Test')).not.toThrow();
    });

    it.each([0, -2, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (value) => {
        let code: string | undefined;
        try {
            assertTimeDilation(value, 'Test');
        } catch (error) {
            if (error instanceof ContractError) code = error.code;
        }
        expect(code).toBe('INVALID_TIME_DILATION');
    });
});
