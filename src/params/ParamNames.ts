/**
 * ParamNames — Typed Field Names for Form Builders
 *
 * Form helpers must emit exactly the keys the decoder will look for.
 * {@link makeParamNames} walks a parameter type and returns a structure
 * mirroring it, where every leaf is a {@link ParamName} tagged with the
 * leaf's value type and multiplicity. A widget typed against
 * `ParamName<'one', number>` can therefore only be wired to an `int`-like
 * field declared exactly once.
 *
 * | Parameter type            | Names                                   |
 * |---------------------------|-----------------------------------------|
 * | `int('a')`                | `ParamName<'one', number>`              |
 * | `opt(int('a'))`           | `ParamName<'opt', number>`              |
 * | `set(int, 'a')`           | `ParamName<'set', number>`              |
 * | `product(a, b)`           | `[names of a, names of b]`              |
 * | `sum(a, b)`               | {@link SumNames}                        |
 * | `list('l', a)`            | {@link ListNames}                       |
 * | `unit`, `any`             | `undefined`                             |
 *
 * @example
 * ```typescript
 * const params = list('rows', product(int('qty'), string('sku')));
 * const names = makeParamNames(params);
 *
 * const fields = names.it(
 *     ([qty, sku], row) => [`${stringOfParamName(qty)}=${row.qty}`, `${stringOfParamName(sku)}=${row.sku}`],
 *     [{ qty: 1, sku: 'A' }, { qty: 2, sku: 'B' }],
 *     [],
 * );
 * // ["rows.0.qty=1", "rows.0.sku=A", "rows.1.qty=2", "rows.1.sku=B"]
 * ```
 *
 * @module
 */
import { NameGenerator } from './NameGenerator.js';
import { type ParamType, type SuffixMark } from './ParamType.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How many values a leaf expects under its key:
 * - `one` — exactly one
 * - `opt` — zero or one
 * - `set` — any number
 */
export type Multiplicity = 'one' | 'opt' | 'set';

/**
 * Name of one leaf parameter.
 *
 * @typeParam M - Multiplicity of the leaf
 * @typeParam T - Value type of the leaf
 */
export interface ParamName<M extends Multiplicity, T> {
    /** Full wire key */
    readonly name: string;
    readonly multiplicity: M;
    /** Type-level witness of `T`. Never set at run time. */
    readonly _value?: T;
}

/** Names of a binary sum: both sides, plus the hidden discriminator key. */
export interface SumNames<NA, NB> {
    readonly discriminator: string;
    readonly inj1: NA;
    readonly inj2: NB;
}

/**
 * Iterator producing the names of each list element.
 *
 * `it(fn, elements, init)` calls `fn` with the names of element `i` and the
 * element itself, concatenating the results in order, followed by `init`.
 */
export interface ListNames<N> {
    /** Common key prefix of the list, e.g. `"rows."` */
    readonly prefix: string;
    it<E, R>(fn: (names: N, element: E) => R[], elements: readonly E[], init: readonly R[]): R[];
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Names of every field of a parameter type, mirroring its structure.
 *
 * @param prefix - Optional prefix prepended to every key
 */
export function makeParamNames<T, S extends SuffixMark, N>(type: ParamType<T, S, N>, prefix = ''): N {
    return type.paramNames(NameGenerator.root(prefix));
}

/** Wire key of a leaf name. */
export function stringOfParamName(name: ParamName<Multiplicity, unknown>): string {
    return name.name;
}

/** @internal */
export function leafName<M extends Multiplicity, T>(name: string, multiplicity: M): ParamName<M, T> {
    return { name, multiplicity };
}
