import { describe, it, expect } from 'vitest';
import { int, string, regexp } from '../../src/params/leaves.js';
import { product, opt } from '../../src/params/composite.js';
import { suffix } from '../../src/params/suffix.js';
import {
    parseQueryString, reconstruct, reconstructOrThrow, removePrefixedParams,
} from '../../src/wire/reconstruct.js';
import { MissingParameterError, UnexpectedParameterError } from '../../src/params/errors.js';
import { type Pattern } from '../../src/params/patterns.js';

describe('reconstruct', () => {
    it('decodes an empty request for an optional type', () => {
        expect(reconstruct(opt(int('a')))).toEqual({ ok: true, value: undefined });
    });

    it('ignores leftover keys by default', () => {
        expect(reconstruct(int('a'), { params: [['a', '1'], ['b', '2']] })).toEqual({ ok: true, value: 1 });
    });

    it('reports leftover keys in strict mode', () => {
        const result = reconstruct(int('a'), { params: [['a', '1'], ['b', '2'], ['c', '3']] }, { strict: true });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(UnexpectedParameterError);
            expect(result.error.message).toBe("Unexpected parameter(s): 'b', 'c'");
        }
    });

    it('reports leftover uploads in strict mode', () => {
        const result = reconstruct(int('a'), { params: [['a', '1']], files: [['f', {}]] }, { strict: true });
        expect(result.ok ? undefined : result.error.key).toBe('f');
    });

    it('ignores path segments for types without a suffix', () => {
        expect(reconstruct(int('a'), { params: [['a', '1']], suffix: ['x'] })).toEqual({ ok: true, value: 1 });
    });

    it('does not mutate its input', () => {
        const params: [string, string][] = [['s', 'yo'], ['i', '380']];
        const segments = ['1', '2'];
        reconstruct(product(int('i'), string('s')), { params });
        reconstruct(suffix(product(int('a'), int('b'))), { suffix: segments });
        expect(params).toEqual([['s', 'yo'], ['i', '380']]);
        expect(segments).toEqual(['1', '2']);
    });

    it('propagates errors that are not decode errors', () => {
        const broken: Pattern = {
            source: 'x',
            matches: () => {
                throw new TypeError('engine failure');
            },
            rewrite: input => input,
        };
        expect(() => reconstruct(regexp(broken, '', 'r'), { params: [['r', 'x']] })).toThrow('engine failure');
    });

    it('rejects malformed options', () => {
        expect(() => reconstruct(int('a'), {}, JSON.parse('{"strict":"yes"}'))).toThrow(TypeError);
    });
});

describe('reconstructOrThrow', () => {
    it('returns the value', () => {
        expect(reconstructOrThrow(int('a'), { params: [['a', '7']] })).toBe(7);
    });

    it('throws the decode error', () => {
        expect(() => reconstructOrThrow(int('a'))).toThrow(MissingParameterError);
    });
});

describe('parseQueryString', () => {
    it('keeps order and repeated keys', () => {
        expect(parseQueryString('?i=4&i=22&q=a+b')).toEqual([['i', '4'], ['i', '22'], ['q', 'a b']]);
    });

    it('decodes percent escapes', () => {
        expect(parseQueryString('q=a%26b&e=')).toEqual([['q', 'a&b'], ['e', '']]);
    });

    it('is empty for an empty query', () => {
        expect(parseQueryString('')).toEqual([]);
    });
});

describe('removePrefixedParams', () => {
    it('drops pairs whose key starts with the prefix', () => {
        const pairs: [string, string][] = [['form.a', '1'], ['b', '2'], ['form.c', '3'], ['formx', '4']];
        expect(removePrefixedParams('form.', pairs)).toEqual([['b', '2'], ['formx', '4']]);
    });
});
