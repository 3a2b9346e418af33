import { describe, it, expect } from 'vitest';
import { int, string, float } from '../../src/params/leaves.js';
import { product, set, opt, list, sum, inj1 } from '../../src/params/composite.js';
import { suffix, suffixProd } from '../../src/params/suffix.js';
import { construct, constructQueryString, encodeParams, makeUri } from '../../src/wire/construct.js';
import { parseQueryString, reconstruct } from '../../src/wire/reconstruct.js';

describe('construct', () => {
    it('returns no suffix for query-only types', () => {
        expect(construct(int('i'), 1).suffix).toBeUndefined();
    });

    it('returns an empty suffix for suffix types without segments', () => {
        expect(construct(suffix(product(int('a'), opt(int('b')))), [1, undefined]).suffix).toEqual(['1', '']);
    });

    it('types a literal value from the parameter type', () => {
        const post = product(int('i'), opt(string('s')));
        expect(construct(post, [380, undefined]).params).toEqual([['i', '380']]);
        expect(makeUri('/post', post, [1, 'yo'])).toBe('/post?i=1&s=yo');
    });

    it('is deterministic', () => {
        const type = product(list('l', sum(int('a'), string('b'))), set(float, 'f'));
        const value = [[inj1(1), inj1(2)], [0.5, 1e-7]] as const;
        expect(construct(type, value)).toEqual(construct(type, value));
    });
});

describe('encodeParams', () => {
    it('form-encodes pairs in order', () => {
        expect(encodeParams([['q', 'a b'], ['i', '4']])).toBe('q=a+b&i=4');
    });

    it('escapes reserved characters', () => {
        expect(encodeParams([['q', 'a&b=c']])).toBe('q=a%26b%3Dc');
    });

    it('is empty for no pairs', () => {
        expect(encodeParams([])).toBe('');
    });
});

describe('constructQueryString', () => {
    it('encodes repeated keys', () => {
        expect(constructQueryString(set(int, 'i'), [4, 22, 111])).toBe('i=4&i=22&i=111');
    });

    it('round-trips through parseQueryString', () => {
        const type = product(string('q'), list('l', int('n')));
        const value = ['café & more', [3, 1]] as const;
        const query = constructQueryString(type, value);
        expect(reconstruct(type, { params: parseQueryString(query) })).toEqual({ ok: true, value: ['café & more', [3, 1]] });
    });
});

describe('makeUri', () => {
    it('appends encoded suffix segments to the path', () => {
        const post = suffix(product(int('year'), string('slug')));
        expect(makeUri('/blog', post, [2024, 'hello world'])).toBe('/blog/2024/hello%20world');
    });

    it('does not double a trailing slash', () => {
        expect(makeUri('/blog/', suffix(int('y')), 5)).toBe('/blog/5');
    });

    it('escapes slashes inside a segment', () => {
        expect(makeUri('/f', suffix(string('name')), 'a/b')).toBe('/f/a%2Fb');
    });

    it('adds the query string when there are pairs', () => {
        expect(makeUri('/search', product(string('q'), int('page')), ['a&b', 2])).toBe('/search?q=a%26b&page=2');
        expect(makeUri('/search', opt(string('q')), undefined)).toBe('/search');
    });

    it('combines segments and pairs', () => {
        expect(makeUri('/item', suffixProd(int('id'), string('lang')), [7, 'en'])).toBe('/item/7?lang=en');
    });
});
