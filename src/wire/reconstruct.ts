/**
 * reconstruct — Wire Pairs → Typed Value
 *
 * Inverse of {@link construct}. Reads an unordered, possibly repeating
 * multi-map of query/body pairs, the uploaded files and the URL suffix
 * segments, and rebuilds a value of the type's shape.
 *
 * Every node *takes* the keys it reads, so sibling subtrees never see
 * each other's keys. What is left over is ignored, unless `strict` is set.
 * Decoding never mutates its inputs: the bags are private working copies.
 *
 * Failures come back as a {@link Result}; only {@link DecodeError}s are
 * converted. Anything else thrown during decoding (a bug in a custom
 * codec's caller, for instance) propagates unchanged.
 *
 * @example
 * ```typescript
 * const result = reconstruct(product(int('page'), opt(string('q'))), {
 *     params: parseQueryString('?page=2'),
 * });
 * // { ok: true, value: [2, undefined] }
 * ```
 *
 * @module
 */
import { type DecodeContext, type Pair, type ParamType, type SuffixMark } from '../params/ParamType.js';
import { NameGenerator } from '../params/NameGenerator.js';
import {
    UnexpectedParameterError, UnexpectedSegmentsError, isDecodeError, type DecodeError,
} from '../params/errors.js';
import { fail, succeed, type Result } from '../result.js';
import { ParamBag, SegmentCursor } from './ParamBag.js';
import { mergeDecodeConfig, type DecodeConfig } from './DecodeConfig.js';

/** Everything a request carries that parameters can be read from */
export interface RequestInput {
    /** Query or form-body pairs; keys may repeat */
    readonly params?: Iterable<Pair>;
    /** Uploaded files, by field name; metadata is validated on decode */
    readonly files?: Iterable<Pair<unknown>>;
    /** URL path segments after the service's path */
    readonly suffix?: readonly string[];
}

/**
 * Decode `input` against `type`.
 *
 * @param options - Overrides of {@link DEFAULT_DECODE_CONFIG}
 * @throws TypeError if `options` is malformed
 */
export function reconstruct<T>(
    type: ParamType<T, SuffixMark, unknown>,
    input: RequestInput = {},
    options?: Partial<DecodeConfig>,
): Result<T, DecodeError> {
    const config = mergeDecodeConfig(options);
    const ctx: DecodeContext = {
        params: new ParamBag(input.params),
        files: new ParamBag(input.files),
        segments: new SegmentCursor(input.suffix),
        config,
    };

    try {
        const value = type.decode(ctx, NameGenerator.root());

        if (type.suffix !== 'none' && !config.allowTrailingSegments) {
            const trailing = ctx.segments.remaining();
            if (trailing.length > 0) return fail(new UnexpectedSegmentsError(trailing));
        }

        if (config.strict) {
            const leftover = [...ctx.params.keys(), ...ctx.files.keys()];
            if (leftover.length > 0) return fail(new UnexpectedParameterError(leftover));
        }

        return succeed(value);
    } catch (err) {
        if (isDecodeError(err)) return fail(err);
        throw err;
    }
}

/**
 * Same as {@link reconstruct}, throwing the {@link DecodeError} on failure.
 */
export function reconstructOrThrow<T>(
    type: ParamType<T, SuffixMark, unknown>,
    input: RequestInput = {},
    options?: Partial<DecodeConfig>,
): T {
    const result = reconstruct(type, input, options);
    if (!result.ok) throw result.error;
    return result.value;
}

/**
 * Pairs of a query string, in order. A leading `?` is ignored and
 * `+` reads as a space.
 *
 * @example
 * ```typescript
 * parseQueryString('?i=4&i=22&q=a+b');   // [['i', '4'], ['i', '22'], ['q', 'a b']]
 * ```
 */
export function parseQueryString(query: string): Pair[] {
    return Array.from(new URLSearchParams(query));
}

/** Every pair whose key does not start with `prefix`. */
export function removePrefixedParams<V>(prefix: string, pairs: Iterable<Pair<V>>): Pair<V>[] {
    return Array.from(pairs).filter(([key]) => !key.startsWith(prefix));
}
