/**
 * Fingerprint — Structural Hash of a Parameter Type
 *
 * Several services may share a path and differ only by their parameters
 * (`/search?q=` versus `/search?id=`). The registry tells them apart by a
 * fingerprint computed from the shape of their parameter types: node
 * kinds, names, scalar kinds and pattern sources. Values never take part.
 *
 * Two structurally equal types always get the same fingerprint, in any
 * process. Different shapes get different fingerprints up to hash
 * collisions (48-bit digest prefix).
 *
 * @module
 */
import { createHash } from 'node:crypto';
import { type ParamShape, type ParamType, type SuffixMark } from './ParamType.js';

// ============================================================================
// Serialization
// ============================================================================

interface CanonicalShape {
    readonly children?: readonly CanonicalShape[];
    readonly detail?: string;
    readonly kind: string;
    readonly name?: string;
}

/** Same shape with keys inserted in sorted order and absent fields dropped. */
function sortKeys(shape: ParamShape): CanonicalShape {
    return {
        ...(shape.children !== undefined ? { children: shape.children.map(sortKeys) } : {}),
        ...(shape.detail !== undefined ? { detail: shape.detail } : {}),
        kind: shape.kind,
        ...(shape.name !== undefined ? { name: shape.name } : {}),
    };
}

/**
 * Deterministic JSON of a shape: the same tree always serializes to the
 * same string regardless of how its descriptor was assembled.
 * @internal
 */
export function canonicalize(shape: ParamShape): string {
    return JSON.stringify(sortKeys(shape));
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Plain, value-independent descriptor of a parameter type.
 *
 * @example
 * ```typescript
 * describeParamType(product(int('i'), opt(string('s'))));
 * // { kind: 'product', children: [
 * //     { kind: 'scalar', name: 'i', detail: 'int' },
 * //     { kind: 'option', children: [{ kind: 'scalar', name: 's', detail: 'string' }] },
 * // ] }
 * ```
 */
export function describeParamType(type: ParamType<unknown, SuffixMark, unknown>): ParamShape {
    return type.describe();
}

/**
 * Fingerprint of a parameter type: a non-negative safe integer derived
 * from the SHA-256 of its canonical descriptor.
 */
export function anonymise(type: ParamType<unknown, SuffixMark, unknown>): number {
    const digest = createHash('sha256').update(canonicalize(type.describe())).digest();
    return digest.readUIntBE(0, 6);
}
