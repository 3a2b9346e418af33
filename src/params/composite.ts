/**
 * Composite Parameters — Products, Sums, Options, Sets, Lists
 *
 * Combinators that assemble leaves into the full shape of a service's
 * parameters. Local contracts are checked when the combinator is called,
 * so a malformed description fails at service-definition time with
 * {@link InvalidParamShapeError}, never on a request:
 *
 * - `product` operands must not claim overlapping names, and only the
 *   right operand may consume the end of the URL suffix;
 * - `sum`, `opt`, `set` and `list` never wrap suffix parameters;
 * - `opt` only wraps a leaf ("exactly one" shape);
 * - `opt`, `set` and bare `list` elements are never checkboxes, whose
 *   `false` is sent as nothing;
 * - `any` cannot sit under a list, set, sum or option, nor on both
 *   sides of a product.
 *
 * @example
 * ```typescript
 * const search = product(string('q'), product(opt(int('page')), set(string, 'tag')));
 * // value: readonly [string, readonly [number | undefined, readonly string[]]]
 *
 * const rows = list('rows', product(int('qty'), string('sku')));
 * // value: readonly (readonly [number, string])[]
 * // keys:  rows.0.qty, rows.0.sku, rows.1.qty, ...
 * ```
 *
 * @module
 */
import {
    ParamType, type DecodeContext, type EncodeSink, type Pair, type ParamShape, type SuffixMark,
} from './ParamType.js';
import { LIST_SEPARATOR, type NameGenerator } from './NameGenerator.js';
import { leafName, type ListNames, type ParamName, type SumNames } from './ParamNames.js';
import { AmbiguousSumError, InvalidParamShapeError } from './errors.js';
import { checkName, type LeafParam, type RepeatableLeaf } from './leaves.js';

// ============================================================================
// Shape checks
// ============================================================================

function overlaps(a: string, b: string): boolean {
    return a === b
        || a.startsWith(b + LIST_SEPARATOR)
        || b.startsWith(a + LIST_SEPARATOR);
}

function assertDisjoint(left: readonly string[], right: readonly string[]): void {
    for (const a of left) {
        const clash = right.find(b => overlaps(a, b));
        if (clash !== undefined) {
            throw new InvalidParamShapeError(`Product operands both claim the parameter name '${a === clash ? a : `${a}' / '${clash}`}'`);
        }
    }
}

function assertNoSuffix(type: ParamType<unknown, SuffixMark, unknown>, combinator: string): void {
    if (type.suffix !== 'none') {
        throw new InvalidParamShapeError(`${combinator}() cannot contain URL suffix parameters`);
    }
}

function assertClosed(type: ParamType<unknown, SuffixMark, unknown>, combinator: string): void {
    if (type.isOpenEnded()) {
        throw new InvalidParamShapeError(`${combinator}() cannot contain any`);
    }
}

// ============================================================================
// Product
// ============================================================================

export class ProductParam<A, B, S extends SuffixMark, NA, NB> extends ParamType<readonly [A, B], S, readonly [NA, NB]> {
    readonly kind = 'product' as const;
    readonly suffix: S;

    constructor(readonly left: ParamType<A, 'none', NA>, readonly right: ParamType<B, S, NB>) {
        super();
        if (left.suffix !== 'none') {
            throw new InvalidParamShapeError('Only the right operand of a product may read the URL suffix');
        }
        if (right.suffix === 'with') {
            throw new InvalidParamShapeError('A product cannot contain a complete suffix description; use suffixProd() or wrap the product in suffix()');
        }
        if (left.isOpenEnded() && right.isOpenEnded()) {
            throw new InvalidParamShapeError('A product cannot contain any on both sides');
        }
        assertDisjoint(left.surfaceNames(), right.surfaceNames());
        this.suffix = right.suffix;
    }

    encode(value: readonly [A, B], sink: EncodeSink, names: NameGenerator): void {
        this.left.encode(value[0], sink, names.left());
        this.right.encode(value[1], sink, names.right());
    }

    decode(ctx: DecodeContext, names: NameGenerator): readonly [A, B] {
        // an open-ended left operand only gets what the right one leaves
        if (this.left.isOpenEnded()) {
            const b = this.right.decode(ctx, names.right());
            const a = this.left.decode(ctx, names.left());
            return [a, b];
        }
        const a = this.left.decode(ctx, names.left());
        const b = this.right.decode(ctx, names.right());
        return [a, b];
    }

    paramNames(names: NameGenerator): readonly [NA, NB] {
        return [this.left.paramNames(names.left()), this.right.paramNames(names.right())];
    }

    surfaceNames(): readonly string[] {
        return [...this.left.surfaceNames(), ...this.right.surfaceNames()];
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.left.describe(), this.right.describe()] };
    }

    isOpenEnded(): boolean {
        return this.left.isOpenEnded() || this.right.isOpenEnded();
    }

    supportsPositional(): boolean {
        return this.left.supportsPositional() && this.right.supportsPositional();
    }

    encodePositional(value: readonly [A, B], segments: string[], names: NameGenerator): void {
        this.left.encodePositional(value[0], segments, names.left());
        this.right.encodePositional(value[1], segments, names.right());
    }

    decodePositional(ctx: DecodeContext, names: NameGenerator): readonly [A, B] {
        const a = this.left.decodePositional(ctx, names.left());
        const b = this.right.decodePositional(ctx, names.right());
        return [a, b];
    }
}

// ============================================================================
// Binary sum
// ============================================================================

export interface Inj1<A> {
    readonly inj: 1;
    readonly value: A;
}

export interface Inj2<B> {
    readonly inj: 2;
    readonly value: B;
}

/** Either a value of the first alternative or of the second one */
export type BinSum<A, B> = Inj1<A> | Inj2<B>;

/** First alternative of a {@link BinSum}. */
export function inj1<A>(value: A): Inj1<A> {
    return { inj: 1, value };
}

/** Second alternative of a {@link BinSum}. */
export function inj2<B>(value: B): Inj2<B> {
    return { inj: 2, value };
}

const INJ1 = '1';
const INJ2 = '2';

/**
 * One of two alternatives. The chosen side is recorded under a synthesized
 * discriminator key (`__sum.<code>`); decoding reads only that side.
 */
export class SumParam<A, B, NA, NB> extends ParamType<BinSum<A, B>, 'none', SumNames<NA, NB>> {
    readonly kind = 'sum' as const;
    readonly suffix = 'none' as const;

    constructor(readonly left: ParamType<A, 'none', NA>, readonly right: ParamType<B, 'none', NB>) {
        super();
        for (const side of [left, right]) {
            assertNoSuffix(side, 'sum');
            assertClosed(side, 'sum');
        }
    }

    encode(value: BinSum<A, B>, sink: EncodeSink, names: NameGenerator): void {
        if (value.inj === 1) {
            this.left.encode(value.value, sink, names.left());
            sink.params.push([names.discriminator(), INJ1]);
        } else {
            this.right.encode(value.value, sink, names.left());
            sink.params.push([names.discriminator(), INJ2]);
        }
    }

    decode(ctx: DecodeContext, names: NameGenerator): BinSum<A, B> {
        const key = names.discriminator();
        const raw = ctx.params.take(key);
        if (raw === INJ1) return inj1(this.left.decode(ctx, names.left()));
        if (raw === INJ2) return inj2(this.right.decode(ctx, names.left()));
        throw new AmbiguousSumError(key, raw);
    }

    paramNames(names: NameGenerator): SumNames<NA, NB> {
        return {
            discriminator: names.discriminator(),
            inj1: this.left.paramNames(names.left()),
            inj2: this.right.paramNames(names.left()),
        };
    }

    surfaceNames(): readonly string[] {
        return Array.from(new Set([...this.left.surfaceNames(), ...this.right.surfaceNames()]));
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.left.describe(), this.right.describe()] };
    }
}

// ============================================================================
// Option
// ============================================================================

/**
 * Zero or one occurrence of a leaf. The leaf is absent when none of its
 * own keys was sent, and decodes to `undefined`; a present but malformed
 * or incomplete value is still an error.
 */
export class OptionParam<T> extends ParamType<T | undefined, 'none', ParamName<'opt', T>> {
    readonly kind = 'option' as const;
    readonly suffix = 'none' as const;

    constructor(readonly inner: LeafParam<T>) {
        super();
        if (inner.isCheckbox()) {
            throw new InvalidParamShapeError(`opt() cannot wrap the checkbox '${inner.name}': an unchecked box is already false`);
        }
    }

    encode(value: T | undefined, sink: EncodeSink, names: NameGenerator): void {
        if (value !== undefined) this.inner.encode(value, sink, names);
    }

    decode(ctx: DecodeContext, names: NameGenerator): T | undefined {
        const keys = this.inner.ownKeys(names);
        if (!keys.some(key => ctx.params.has(key) || ctx.files.has(key))) return undefined;
        if (ctx.config.emptyOptionalAsNone && this.inner.blankIsAbsent() && keys.every(key => ctx.params.peek(key) === '')) {
            for (const key of keys) ctx.params.take(key);
            return undefined;
        }
        // partly sent is not absent: the inner error stands
        return this.inner.decode(ctx, names);
    }

    paramNames(names: NameGenerator): ParamName<'opt', T> {
        return leafName(names.key(this.inner.name), 'opt');
    }

    surfaceNames(): readonly string[] {
        return this.inner.surfaceNames();
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.inner.describe()] };
    }

    supportsPositional(): boolean {
        return this.inner.supportsPositional();
    }

    /**
     * An absent optional segment is written as an empty segment, so an
     * empty string inside `opt(string(..))` reads back as `undefined`.
     */
    encodePositional(value: T | undefined, segments: string[], names: NameGenerator): void {
        if (value === undefined) segments.push('');
        else this.inner.encodePositional(value, segments, names);
    }

    decodePositional(ctx: DecodeContext, names: NameGenerator): T | undefined {
        const next = ctx.segments.peek();
        if (next === undefined) return undefined;
        if (next === '') {
            ctx.segments.next();
            return undefined;
        }
        return this.inner.decodePositional(ctx, names);
    }
}

// ============================================================================
// Set
// ============================================================================

/**
 * Any number of values under the same key (`i=4&i=22&i=111`).
 * Decoded values keep the order in which the keys appear in the request.
 */
export class SetParam<T> extends ParamType<readonly T[], 'none', ParamName<'set', T>> {
    readonly kind = 'set' as const;
    readonly suffix = 'none' as const;
    readonly element: RepeatableLeaf<T>;

    constructor(make: (name: string) => RepeatableLeaf<T>, name: string) {
        super();
        this.element = make(name);
        if (this.element.isCheckbox()) {
            throw new InvalidParamShapeError(`set() cannot repeat the checkbox '${name}': unchecked boxes are not sent`);
        }
    }

    encode(value: readonly T[], sink: EncodeSink, names: NameGenerator): void {
        for (const item of value) this.element.encode(item, sink, names);
    }

    decode(ctx: DecodeContext, names: NameGenerator): readonly T[] {
        return this.element.takeAll(ctx, names.key(this.element.name));
    }

    paramNames(names: NameGenerator): ParamName<'set', T> {
        return leafName(names.key(this.element.name), 'set');
    }

    surfaceNames(): readonly string[] {
        return this.element.surfaceNames();
    }

    describe(): ParamShape {
        return { kind: this.kind, children: [this.element.describe()] };
    }
}

// ============================================================================
// List
// ============================================================================

// At most nine digits: indices stay exact as numbers.
const ELEMENT_INDEX = /^(0|[1-9]\d{0,8})\./;

/**
 * A sequence of groups. Element `i` writes its keys under `<name>.<i>.`,
 * which keeps the fields of one element together however the request
 * orders them. Elements are decoded by ascending index; gaps are skipped,
 * so an element that sends no key at all (every option absent, every
 * checkbox of a product unchecked) is not read back.
 */
export class ListParam<T, N> extends ParamType<readonly T[], 'none', ListNames<N>> {
    readonly kind = 'list' as const;
    readonly suffix = 'none' as const;
    readonly name: string;

    constructor(name: string, readonly inner: ParamType<T, 'none', N>) {
        super();
        this.name = checkName(name);
        assertNoSuffix(inner, 'list');
        assertClosed(inner, 'list');
        if (inner.isCheckbox()) {
            throw new InvalidParamShapeError('list() cannot hold a bare checkbox: unchecked boxes are not sent');
        }
    }

    encode(value: readonly T[], sink: EncodeSink, names: NameGenerator): void {
        value.forEach((element, index) => {
            this.inner.encode(element, sink, names.element(this.name, index));
        });
    }

    decode(ctx: DecodeContext, names: NameGenerator): readonly T[] {
        const prefix = names.listPrefix(this.name);
        const indices = new Set<number>();
        for (const key of [...ctx.params.keys(), ...ctx.files.keys()]) {
            if (!key.startsWith(prefix)) continue;
            const match = ELEMENT_INDEX.exec(key.slice(prefix.length));
            if (match) indices.add(Number(match[1]));
        }
        return Array.from(indices)
            .sort((a, b) => a - b)
            .map(index => this.inner.decode(ctx, names.element(this.name, index)));
    }

    paramNames(names: NameGenerator): ListNames<N> {
        const { name, inner } = this;
        return {
            prefix: names.listPrefix(name),
            it<E, R>(fn: (elementNames: N, element: E) => R[], elements: readonly E[], init: readonly R[]): R[] {
                const out: R[] = [];
                elements.forEach((element, index) => {
                    out.push(...fn(inner.paramNames(names.element(name, index)), element));
                });
                out.push(...init);
                return out;
            },
        };
    }

    surfaceNames(): readonly string[] {
        return [this.name];
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name, children: [this.inner.describe()] };
    }
}

// ============================================================================
// Any
// ============================================================================

/**
 * Every key left in the request once the other parameters took theirs,
 * verbatim and in request order. In a product it may stand on either side.
 */
export class AnyParam extends ParamType<readonly Pair[], 'none', undefined> {
    readonly kind = 'any' as const;
    readonly suffix = 'none' as const;

    encode(value: readonly Pair[], sink: EncodeSink): void {
        for (const pair of value) sink.params.push(pair);
    }

    decode(ctx: DecodeContext): readonly Pair[] {
        return ctx.params.takeRemaining();
    }

    paramNames(): undefined {
        return undefined;
    }

    surfaceNames(): readonly string[] {
        return [];
    }

    describe(): ParamShape {
        return { kind: this.kind };
    }

    isOpenEnded(): boolean {
        return true;
    }
}

// ============================================================================
// Prefix
// ============================================================================

/** Every key of `inner`, with `prefix` prepended. */
export class PrefixParam<T, S extends SuffixMark, N> extends ParamType<T, S, N> {
    readonly kind = 'prefix' as const;
    readonly suffix: S;

    constructor(readonly prefix: string, readonly inner: ParamType<T, S, N>) {
        super();
        this.suffix = inner.suffix;
    }

    encode(value: T, sink: EncodeSink, names: NameGenerator): void {
        this.inner.encode(value, sink, names.withPrefix(this.prefix));
    }

    decode(ctx: DecodeContext, names: NameGenerator): T {
        return this.inner.decode(ctx, names.withPrefix(this.prefix));
    }

    paramNames(names: NameGenerator): N {
        return this.inner.paramNames(names.withPrefix(this.prefix));
    }

    surfaceNames(): readonly string[] {
        return this.inner.surfaceNames().map(name => this.prefix + name);
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.prefix, children: [this.inner.describe()] };
    }

    isOpenEnded(): boolean {
        return this.inner.isOpenEnded();
    }

    isCheckbox(): boolean {
        return this.inner.isCheckbox();
    }

    supportsPositional(): boolean {
        return this.inner.supportsPositional();
    }

    encodePositional(value: T, segments: string[], names: NameGenerator): void {
        this.inner.encodePositional(value, segments, names.withPrefix(this.prefix));
    }

    decodePositional(ctx: DecodeContext, names: NameGenerator): T {
        return this.inner.decodePositional(ctx, names.withPrefix(this.prefix));
    }
}

// ============================================================================
// Combinators
// ============================================================================

/** Both parameters: the handler receives the pair `[a, b]`. */
export function product<A, NA, B, SB extends 'none' | 'end', NB>(
    left: ParamType<A, 'none', NA>,
    right: ParamType<B, SB, NB>,
): ProductParam<A, B, SB, NA, NB> {
    return new ProductParam(left, right);
}

/** Alias of {@link product}. */
export const prod = product;

/** Either parameter: the handler receives a {@link BinSum}. */
export function sum<A, NA, B, NB>(
    left: ParamType<A, 'none', NA>,
    right: ParamType<B, 'none', NB>,
): SumParam<A, B, NA, NB> {
    return new SumParam(left, right);
}

/** An optional leaf: the handler receives `undefined` when it is absent. */
export function opt<T>(leaf: LeafParam<T>): OptionParam<T> {
    return new OptionParam(leaf);
}

/**
 * Any number of parameters labeled `name`.
 *
 * @example
 * ```typescript
 * set(int, 'i');   // matches i=4&i=22&i=111 → [4, 22, 111]
 * ```
 */
export function set<T>(make: (name: string) => RepeatableLeaf<T>, name: string): SetParam<T> {
    return new SetParam(make, name);
}

/** A list of groups labeled `name`. */
export function list<T, N>(name: string, inner: ParamType<T, 'none', N>): ListParam<T, N> {
    return new ListParam(name, inner);
}

/** Every parameter of the request, as raw pairs. */
export const any: AnyParam = new AnyParam();

/** `inner` with `prefix` prepended to all of its keys. */
export function addPrefix<T, S extends SuffixMark, N>(prefix: string, inner: ParamType<T, S, N>): PrefixParam<T, S, N> {
    return new PrefixParam(prefix, inner);
}
