import { describe, it, expect } from 'vitest';
import {
    SCALAR_CODECS, formatDecimal, formatInteger, isNumericKind, parseScalar,
} from '../../src/params/codecs.js';

// ============================================================================
// formatDecimal
// ============================================================================

describe('formatDecimal', () => {
    it('leaves plain notation alone', () => {
        expect(formatDecimal(3.25)).toBe('3.25');
        expect(formatDecimal(-12)).toBe('-12');
        expect(formatDecimal(0)).toBe('0');
    });

    it('expands small exponents', () => {
        expect(formatDecimal(1.5e-7)).toBe('0.00000015');
        expect(formatDecimal(-2.5e-7)).toBe('-0.00000025');
    });

    it('expands large exponents', () => {
        expect(formatDecimal(2e21)).toBe('2000000000000000000000');
        expect(formatDecimal(1.25e22)).toBe('12500000000000000000000');
    });

    it('parses back to the same number', () => {
        for (const n of [1.5e-7, 2e21, 0.1, 123456.789, -4.2e-10]) {
            expect(Number(formatDecimal(n))).toBe(n);
        }
    });

    it('keeps non-finite values', () => {
        expect(formatDecimal(Infinity)).toBe('Infinity');
        expect(formatDecimal(NaN)).toBe('NaN');
    });

    it('keeps the sign of negative zero', () => {
        expect(formatDecimal(-0)).toBe('-0');
        expect(formatInteger(-0)).toBe('-0');
        expect(formatInteger(0)).toBe('0');
        expect(formatInteger(-42)).toBe('-42');
    });
});

// ============================================================================
// Scalar codecs
// ============================================================================

describe('SCALAR_CODECS', () => {
    it('int rejects non-integers with the first issue', () => {
        expect(parseScalar(SCALAR_CODECS.int, '42')).toEqual({ ok: true, value: 42 });
        expect(parseScalar(SCALAR_CODECS.int, '4.2')).toEqual({ ok: false, message: 'Expected an integer' });
        expect(parseScalar(SCALAR_CODECS.int, '')).toEqual({ ok: false, message: 'Expected an integer' });
    });

    it('int rejects unsafe integers', () => {
        expect(parseScalar(SCALAR_CODECS.int, '9007199254740993'))
            .toEqual({ ok: false, message: 'Integer out of the safe range' });
    });

    it('int32 checks its range', () => {
        expect(parseScalar(SCALAR_CODECS.int32, '-2147483648')).toEqual({ ok: true, value: -2147483648 });
        expect(parseScalar(SCALAR_CODECS.int32, '2147483648'))
            .toEqual({ ok: false, message: 'Expected a 32-bit integer' });
    });

    it('int64 reads bigints', () => {
        expect(parseScalar(SCALAR_CODECS.int64, '9007199254740993'))
            .toEqual({ ok: true, value: 9007199254740993n });
        expect(parseScalar(SCALAR_CODECS.int64, '9223372036854775808'))
            .toEqual({ ok: false, message: 'Expected a 64-bit integer' });
        expect(SCALAR_CODECS.int64.format(-5n)).toBe('-5');
    });

    it('float accepts decimal text only', () => {
        expect(parseScalar(SCALAR_CODECS.float, '1.5')).toEqual({ ok: true, value: 1.5 });
        expect(parseScalar(SCALAR_CODECS.float, '.5')).toEqual({ ok: true, value: 0.5 });
        expect(parseScalar(SCALAR_CODECS.float, '2e3')).toEqual({ ok: true, value: 2000 });
        expect(parseScalar(SCALAR_CODECS.float, '0x10'))
            .toEqual({ ok: false, message: 'Expected a decimal number' });
        expect(parseScalar(SCALAR_CODECS.float, ''))
            .toEqual({ ok: false, message: 'Expected a decimal number' });
    });

    it('bool accepts checkbox and literal forms', () => {
        expect(parseScalar(SCALAR_CODECS.bool, 'on')).toEqual({ ok: true, value: true });
        expect(parseScalar(SCALAR_CODECS.bool, 'true')).toEqual({ ok: true, value: true });
        expect(parseScalar(SCALAR_CODECS.bool, 'off')).toEqual({ ok: true, value: false });
        expect(parseScalar(SCALAR_CODECS.bool, 'false')).toEqual({ ok: true, value: false });
        expect(parseScalar(SCALAR_CODECS.bool, 'yes'))
            .toEqual({ ok: false, message: "Expected 'on', 'off', 'true' or 'false'" });
    });

    it('string is the identity', () => {
        expect(parseScalar(SCALAR_CODECS.string, '')).toEqual({ ok: true, value: '' });
        expect(SCALAR_CODECS.string.format('a b')).toBe('a b');
    });

    it('only numbers treat blanks as absent', () => {
        expect(isNumericKind('float')).toBe(true);
        expect(isNumericKind('int64')).toBe(true);
        expect(isNumericKind('string')).toBe(false);
        expect(isNumericKind('bool')).toBe(false);
    });
});
