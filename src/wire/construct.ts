/**
 * construct — Typed Value → Wire Pairs
 *
 * Walks a parameter type together with a value of the matching shape and
 * emits the flat, ordered key/value pairs (plus the URL suffix segments
 * of suffix-bearing types) that {@link reconstruct} reads back.
 *
 * Output is deterministic: the same type and value always produce the
 * same pairs in the same order (left before right, list elements by
 * index, set items in value order, sum discriminators after their side).
 *
 * @example
 * ```typescript
 * const rows = list('l', product(int('a'), string('b')));
 * construct(rows, [[1, 'x'], [2, 'y']]).params;
 * // [['l.0.a', '1'], ['l.0.b', 'x'], ['l.1.a', '2'], ['l.1.b', 'y']]
 *
 * makeUri('/blog', suffix(product(int('year'), string('slug'))), [2024, 'hello world']);
 * // "/blog/2024/hello%20world"
 * ```
 *
 * @module
 */
import { type EncodeSink, type Pair, type ParamType } from '../params/ParamType.js';
import { NameGenerator } from '../params/NameGenerator.js';

/** Wire form of one value */
export interface Construction {
    /** URL suffix segments, `undefined` for types without a suffix */
    readonly suffix: string[] | undefined;
    /** Query/body pairs, in emission order */
    readonly params: Pair[];
}

/**
 * Encode `value` for `type`.
 *
 * Types ending in a bare all-suffix leaf (`'end'`) only make sense inside
 * `suffix()` and are rejected by the signature.
 */
export function construct<T, V extends T>(type: ParamType<T, 'none' | 'with', unknown>, value: V): Construction {
    const sink: EncodeSink = { params: [], segments: [] };
    type.encode(value, sink, NameGenerator.root());
    return {
        suffix: type.suffix === 'with' ? sink.segments : undefined,
        params: sink.params,
    };
}

/**
 * `application/x-www-form-urlencoded` text of pairs, in order.
 *
 * @example
 * ```typescript
 * encodeParams([['q', 'a b'], ['i', '4']]);   // "q=a+b&i=4"
 * ```
 */
export function encodeParams(pairs: Iterable<Pair>): string {
    const search = new URLSearchParams();
    for (const [key, value] of pairs) search.append(key, value);
    return search.toString();
}

/** Query string of `value` for a type without a suffix. */
export function constructQueryString<T, V extends T>(type: ParamType<T, 'none', unknown>, value: V): string {
    return encodeParams(construct(type, value).params);
}

/**
 * Link to a service at `path` called with `value`: suffix segments are
 * appended to the path, each percent-encoded, and the pairs form the query.
 */
export function makeUri<T, V extends T>(path: string, type: ParamType<T, 'none' | 'with', unknown>, value: V): string {
    const { suffix, params } = construct(type, value);
    const base = suffix === undefined
        ? path
        : [path.replace(/\/+$/, ''), ...suffix.map(segment => encodeURIComponent(segment))].join('/');
    const query = encodeParams(params);
    return query === '' ? base : `${base}?${query}`;
}
