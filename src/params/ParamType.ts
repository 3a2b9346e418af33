/**
 * ParamType — Typed Description of a Service's Parameters
 *
 * A `ParamType<T, S, N>` is an immutable tree built from combinators
 * (`int('id')`, `product(a, b)`, `list('rows', ...)`...). It is declared
 * once, next to the service, and shared read-only by every request.
 *
 * - `T` — the value the handler receives (`number`, `[number, string]`, ...)
 * - `S` — where the URL suffix stands: `'none'` (query/body keys only),
 *   `'end'` (consumes the rest of the path, must come last) or
 *   `'with'` (a complete suffix-bearing description)
 * - `N` — the structural mirror of names given to form builders
 *   (see {@link makeParamNames})
 *
 * Each concrete node implements encoding, decoding and name listing for
 * its own shape, so the value type flows through the tree without casts.
 * The set of nodes is closed: see {@link ParamKind}.
 *
 * @module
 */
import { type NameGenerator } from './NameGenerator.js';
import { InvalidParamShapeError } from './errors.js';
import { type ParamBag, type SegmentCursor } from '../wire/ParamBag.js';
import { type DecodeConfig } from '../wire/DecodeConfig.js';

// ============================================================================
// Types
// ============================================================================

/** Where a parameter type stands with respect to the URL suffix */
export type SuffixMark = 'none' | 'end' | 'with';

/** Discriminant of every node a parameter tree can contain */
export type ParamKind =
    | 'unit'
    | 'scalar'
    | 'file'
    | 'user'
    | 'regexp'
    | 'coordinates'
    | 'product'
    | 'sum'
    | 'option'
    | 'set'
    | 'list'
    | 'any'
    | 'prefix'
    | 'suffix'
    | 'suffixProd'
    | 'allSuffix'
    | 'allSuffixString'
    | 'allSuffixUser'
    | 'allSuffixRegexp';

/**
 * Plain, value-independent description of a parameter tree.
 * Input of the structural fingerprint.
 */
export interface ParamShape {
    readonly kind: ParamKind;
    readonly name?: string;
    readonly detail?: string;
    readonly children?: readonly ParamShape[];
}

/** A wire key/value pair */
export type Pair<V = string> = readonly [key: string, value: V];

/** Mutable output of one encode walk */
export interface EncodeSink {
    readonly params: Pair[];
    readonly segments: string[];
}

/** Private working state of one decode walk */
export interface DecodeContext {
    readonly params: ParamBag<string>;
    readonly files: ParamBag<unknown>;
    readonly segments: SegmentCursor;
    readonly config: DecodeConfig;
}

// ============================================================================
// Base class
// ============================================================================

export abstract class ParamType<T, S extends SuffixMark = 'none', N = unknown> {
    abstract readonly kind: ParamKind;
    abstract readonly suffix: S;

    /** Type-level witness of `T` and `N`. Never set at run time. */
    declare readonly _witness?: { readonly value: T; readonly names: N };

    /** Emit the key/value pairs (and suffix segments) of `value`. */
    abstract encode(value: T, sink: EncodeSink, names: NameGenerator): void;

    /** Rebuild a value, consuming the keys this node owns from `ctx`. */
    abstract decode(ctx: DecodeContext, names: NameGenerator): T;

    /** Structural mirror of the keys this node reads. */
    abstract paramNames(names: NameGenerator): N;

    /**
     * Author-supplied names this node claims at the top of its scope,
     * used to reject products whose operands would collide.
     * @internal
     */
    abstract surfaceNames(): readonly string[];

    /** Plain structural description, see {@link ParamShape}. */
    abstract describe(): ParamShape;

    /**
     * Whether this node can be read positionally from URL suffix segments.
     * @internal
     */
    supportsPositional(): boolean {
        return false;
    }

    /**
     * Whether a value of this node may be sent as no key at all (an
     * unchecked checkbox). Such nodes cannot be made optional, repeated
     * or used as bare list elements.
     * @internal
     */
    isCheckbox(): boolean {
        return false;
    }

    /**
     * Whether this node swallows every key left in the request (`any`).
     * Such nodes may not appear under a list, set, sum or option.
     * @internal
     */
    isOpenEnded(): boolean {
        return false;
    }

    /** @internal */
    encodePositional(_value: T, _segments: string[], _names: NameGenerator): void {
        throw this.notPositional();
    }

    /** @internal */
    decodePositional(_ctx: DecodeContext, _names: NameGenerator): T {
        throw this.notPositional();
    }

    protected notPositional(): InvalidParamShapeError {
        return new InvalidParamShapeError(`'${this.kind}' parameters cannot be read from a URL suffix`);
    }
}

/** Any parameter type, whatever its value, suffix and name types. */
export type AnyParamType = ParamType<unknown, SuffixMark, unknown>;

/** Value type carried by a parameter type. */
export type ParamValue<P> = P extends ParamType<infer T, SuffixMark, unknown> ? T : never;
