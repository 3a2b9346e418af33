/**
 * Suffix Parameters — Values Carried in the URL Path
 *
 * A service registered at `/blog` may read `/blog/2024/hello` as typed
 * parameters: the segments after its path are a separate, ordered
 * channel, never mixed with query or body keys.
 *
 * - `suffix(inner)` reads `inner` positionally, one segment per leaf.
 * - `suffixProd(part, rest)` reads `part` from the path and `rest` from keys.
 * - `allSuffix*` swallow every remaining segment; they must come last.
 *
 * The type tracks where the suffix stands (`'end'` for the all-suffix
 * leaves, `'with'` for a complete description), so composing two
 * suffix-bearing trees does not type-check. The same contract is also
 * checked at run time for callers that erase the types.
 *
 * @example
 * ```typescript
 * const post = suffix(product(int('year'), string('slug')));
 * construct(post, [2024, 'hello']);
 * // { suffix: ['2024', 'hello'], params: [] }
 * ```
 *
 * @module
 */
import {
    ParamType, type DecodeContext, type EncodeSink, type ParamShape, type SuffixMark,
} from './ParamType.js';
import { type NameGenerator } from './NameGenerator.js';
import { leafName, type ParamName } from './ParamNames.js';
import { InvalidParamShapeError, InvalidParameterValueError } from './errors.js';
import { checkName } from './leaves.js';
import { type StringCodec } from './codecs.js';
import { toPattern, type Pattern, type PatternInput } from './patterns.js';

const PATH_SEPARATOR = '/';

function assertPositional(type: ParamType<unknown, SuffixMark, unknown>, combinator: string): void {
    if (type.suffix === 'with') {
        throw new InvalidParamShapeError(`${combinator}() cannot contain another suffix description`);
    }
    if (!type.supportsPositional()) {
        throw new InvalidParamShapeError(`${combinator}() only accepts scalars, custom types, options and products of them`);
    }
}

// ============================================================================
// suffix / suffixProd
// ============================================================================

export class SuffixParam<T, N> extends ParamType<T, 'with', N> {
    readonly kind = 'suffix' as const;
    readonly suffix = 'with' as const;

    constructor(readonly inner: ParamType<T, 'none' | 'end', N>) {
        super();
        assertPositional(inner, 'suffix');
    }

    encode(value: T, sink: EncodeSink, names: NameGenerator): void {
        this.inner.encodePositional(value, sink.segments, names.left());
    }

    decode(ctx: DecodeContext, names: NameGenerator): T {
        return this.inner.decodePositional(ctx, names.left());
    }

    paramNames(names: NameGenerator): N {
        return this.inner.paramNames(names.left());
    }

    surfaceNames(): readonly string[] {
        return this.inner.surfaceNames();
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.inner.describe()] };
    }
}

export class SuffixProductParam<S, R, NS, NR> extends ParamType<readonly [S, R], 'with', readonly [NS, NR]> {
    readonly kind = 'suffixProd' as const;
    readonly suffix = 'with' as const;

    constructor(readonly part: ParamType<S, 'none' | 'end', NS>, readonly rest: ParamType<R, 'none', NR>) {
        super();
        assertPositional(part, 'suffixProd');
        if (rest.suffix !== 'none') {
            throw new InvalidParamShapeError('suffixProd() regular parameters cannot read the URL suffix');
        }
        const claimed = new Set(part.surfaceNames());
        const clash = rest.surfaceNames().find(name => claimed.has(name));
        if (clash !== undefined) {
            throw new InvalidParamShapeError(`suffixProd() operands both claim the parameter name '${clash}'`);
        }
    }

    encode(value: readonly [S, R], sink: EncodeSink, names: NameGenerator): void {
        this.part.encodePositional(value[0], sink.segments, names.left());
        this.rest.encode(value[1], sink, names.right());
    }

    decode(ctx: DecodeContext, names: NameGenerator): readonly [S, R] {
        const s = this.part.decodePositional(ctx, names.left());
        const r = this.rest.decode(ctx, names.right());
        return [s, r];
    }

    paramNames(names: NameGenerator): readonly [NS, NR] {
        return [this.part.paramNames(names.left()), this.rest.paramNames(names.right())];
    }

    surfaceNames(): readonly string[] {
        return [...this.part.surfaceNames(), ...this.rest.surfaceNames()];
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.part.describe(), this.rest.describe()] };
    }

    isOpenEnded(): boolean {
        return this.rest.isOpenEnded();
    }
}

// ============================================================================
// All-suffix leaves
// ============================================================================

/**
 * Base of the leaves consuming every remaining segment. Used as the last
 * component of a suffix, or alone: encoding and decoding are positional
 * either way.
 */
export abstract class AllSuffixLeaf<T> extends ParamType<T, 'end', ParamName<'one', T>> {
    readonly suffix = 'end' as const;
    readonly name: string;

    protected constructor(name: string) {
        super();
        this.name = checkName(name);
    }

    /** Segments written for `value`. */
    protected abstract toSegments(value: T): string[];

    /** Value read from every remaining segment. */
    protected abstract fromSegments(segments: string[], key: string): T;

    encode(value: T, sink: EncodeSink): void {
        sink.segments.push(...this.toSegments(value));
    }

    decode(ctx: DecodeContext, names: NameGenerator): T {
        return this.fromSegments(ctx.segments.rest(), names.key(this.name));
    }

    paramNames(names: NameGenerator): ParamName<'one', T> {
        return leafName(names.key(this.name), 'one');
    }

    surfaceNames(): readonly string[] {
        return [this.name];
    }

    supportsPositional(): boolean {
        return true;
    }

    encodePositional(value: T, segments: string[]): void {
        segments.push(...this.toSegments(value));
    }

    decodePositional(ctx: DecodeContext, names: NameGenerator): T {
        return this.decode(ctx, names);
    }
}

/** Remaining segments as a list. */
export class AllSuffixParam extends AllSuffixLeaf<readonly string[]> {
    readonly kind = 'allSuffix' as const;

    constructor(name: string) {
        super(name);
    }

    protected toSegments(value: readonly string[]): string[] {
        return [...value];
    }

    protected fromSegments(segments: string[]): readonly string[] {
        return segments;
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name };
    }
}

/** Remaining segments joined with `/`. The empty string means no segment. */
export class AllSuffixStringParam extends AllSuffixLeaf<string> {
    readonly kind = 'allSuffixString' as const;

    constructor(name: string) {
        super(name);
    }

    protected toSegments(value: string): string[] {
        return value === '' ? [] : value.split(PATH_SEPARATOR);
    }

    protected fromSegments(segments: string[]): string {
        return segments.join(PATH_SEPARATOR);
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name };
    }
}

/** Remaining segments joined with `/`, converted with a custom codec. */
export class AllSuffixUserParam<T> extends AllSuffixLeaf<T> {
    readonly kind = 'allSuffixUser' as const;

    constructor(name: string, readonly codec: StringCodec<T>) {
        super(name);
    }

    protected toSegments(value: T): string[] {
        const text = this.codec.format(value);
        return text === '' ? [] : text.split(PATH_SEPARATOR);
    }

    protected fromSegments(segments: string[], key: string): T {
        const raw = segments.join(PATH_SEPARATOR);
        try {
            return this.codec.parse(raw);
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            throw new InvalidParameterValueError(key, raw, detail, 'codec', err);
        }
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name };
    }
}

/**
 * Remaining segments joined with `/`, validated against a pattern and
 * rewritten with a template. Encoding rewrites a matching value too.
 */
export class AllSuffixRegexpParam extends AllSuffixLeaf<string> {
    readonly kind = 'allSuffixRegexp' as const;

    constructor(readonly pattern: Pattern, readonly template: string, name: string) {
        super(name);
    }

    protected toSegments(value: string): string[] {
        const text = this.pattern.matches(value) ? this.pattern.rewrite(value, this.template) : value;
        return text === '' ? [] : text.split(PATH_SEPARATOR);
    }

    protected fromSegments(segments: string[], key: string): string {
        const raw = segments.join(PATH_SEPARATOR);
        if (!this.pattern.matches(raw)) {
            throw new InvalidParameterValueError(key, raw, `does not match /${this.pattern.source}/`, 'regexp-mismatch');
        }
        return this.pattern.rewrite(raw, this.template);
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name, detail: `${this.pattern.source} => ${this.template}` };
    }
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Read `inner` from the URL path, one segment per leaf.
 *
 * @example
 * ```typescript
 * suffix(product(int('i'), string('s')));   // /380/yo → [380, 'yo']
 * ```
 */
export function suffix<T, N>(inner: ParamType<T, 'none' | 'end', N>): SuffixParam<T, N> {
    return new SuffixParam(inner);
}

/** Read `part` from the URL path and `rest` from query/body keys. */
export function suffixProd<S, NS, R, NR>(
    part: ParamType<S, 'none' | 'end', NS>,
    rest: ParamType<R, 'none', NR>,
): SuffixProductParam<S, R, NS, NR> {
    return new SuffixProductParam(part, rest);
}

/** Every remaining path segment. */
export function allSuffix(name: string): AllSuffixParam {
    return new AllSuffixParam(name);
}

/** Every remaining path segment, joined with `/`. */
export function allSuffixString(name: string): AllSuffixStringParam {
    return new AllSuffixStringParam(name);
}

/** Every remaining path segment, joined with `/` and converted with `codec`. */
export function allSuffixUser<T>(name: string, codec: StringCodec<T>): AllSuffixUserParam<T> {
    return new AllSuffixUserParam(name, codec);
}

/** Every remaining path segment, joined with `/`, matched against `pattern` and rewritten by `template`. */
export function allSuffixRegexp(pattern: PatternInput, template: string, name: string): AllSuffixRegexpParam {
    return new AllSuffixRegexpParam(toPattern(pattern), template, name);
}

/** Whether values of `type` are (partly) carried in the URL path. */
export function containsSuffix(type: ParamType<unknown, SuffixMark, unknown>): boolean {
    return type.suffix !== 'none';
}
