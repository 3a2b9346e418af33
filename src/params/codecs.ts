/**
 * Scalar Codecs — String ⇄ Value Conversions
 *
 * Query strings and form bodies only carry strings. Each scalar kind pairs
 * a Zod schema (string → value, with validation) and a formatter
 * (value → canonical string). Formatting is chosen so that
 * `parse(format(v))` gives back `v` exactly.
 *
 * @module
 */
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

/** Primitive kinds available as named scalars */
export type ScalarKind = 'int' | 'int32' | 'int64' | 'float' | 'string' | 'bool';

/** Value type of each scalar kind */
export interface ScalarValues {
    int: number;
    int32: number;
    int64: bigint;
    float: number;
    string: string;
    bool: boolean;
}

/**
 * User-supplied conversion for custom parameter types.
 * `parse` may throw; the error becomes an `INVALID_PARAMETER_VALUE` failure.
 *
 * @example
 * ```typescript
 * const isoDate: StringCodec<Date> = {
 *     parse: raw => {
 *         const d = new Date(raw);
 *         if (Number.isNaN(d.getTime())) throw new Error('not a date');
 *         return d;
 *     },
 *     format: d => d.toISOString(),
 * };
 * ```
 */
export interface StringCodec<T> {
    parse(raw: string): T;
    format(value: T): string;
}

/** Built-in codec: a Zod schema from string and a canonical formatter */
export interface ScalarCodec<T> {
    readonly schema: z.ZodType<T, z.ZodTypeDef, string>;
    format(value: T): string;
}

// ============================================================================
// Number formatting
// ============================================================================

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** Integer text; keeps the sign of `-0`. */
export function formatInteger(value: number): string {
    return Object.is(value, -0) ? '-0' : String(value);
}

/**
 * Format a number in plain decimal notation, never exponent notation.
 *
 * Expands the shortest round-trip representation JavaScript produces,
 * so the result parses back to the identical double.
 *
 * @example
 * ```typescript
 * formatDecimal(1.5e-7);  // "0.00000015"
 * formatDecimal(2e21);    // "2000000000000000000000"
 * formatDecimal(3.25);    // "3.25"
 * formatDecimal(-0);      // "-0"
 * ```
 */
export function formatDecimal(value: number): string {
    if (Object.is(value, -0)) return '-0';
    const text = String(value);
    if (!Number.isFinite(value)) return text;
    const match = EXPONENT_FORM.exec(text);
    if (!match) return text;

    const sign = match[1] ?? '';
    const fraction = match[3] ?? '';
    const digits = (match[2] ?? '') + fraction;
    const exponent = Number(match[4]);

    if (exponent < 0) {
        return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
    }
    return `${sign}${digits}${'0'.repeat(exponent - fraction.length)}`;
}

// ============================================================================
// Schemas
// ============================================================================

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^(?:[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?|NaN|[+-]?Infinity)$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const integerText = z.string().regex(INTEGER_TEXT, 'Expected an integer');

const intSchema = integerText
    .transform(Number)
    .refine(Number.isSafeInteger, 'Integer out of the safe range');

const int32Schema = integerText
    .transform(Number)
    .refine(n => n >= INT32_MIN && n <= INT32_MAX, 'Expected a 32-bit integer');

const int64Schema = integerText
    .transform(text => BigInt(text))
    .refine(n => n >= INT64_MIN && n <= INT64_MAX, 'Expected a 64-bit integer');

const floatSchema = z.string()
    .regex(DECIMAL_TEXT, 'Expected a decimal number')
    .transform(Number);

const boolSchema = z.string().transform((text, ctx) => {
    if (text === 'on' || text === 'true') return true;
    if (text === 'off' || text === 'false') return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected 'on', 'off', 'true' or 'false'" });
    return z.NEVER;
});

// ============================================================================
// Codecs
// ============================================================================

/** Codec of every scalar kind */
export const SCALAR_CODECS: { readonly [K in ScalarKind]: ScalarCodec<ScalarValues[K]> } = {
    int: { schema: intSchema, format: formatInteger },
    int32: { schema: int32Schema, format: formatInteger },
    int64: { schema: int64Schema, format: value => value.toString() },
    float: { schema: floatSchema, format: formatDecimal },
    string: { schema: z.string(), format: value => value },
    bool: { schema: boolSchema, format: value => (value ? 'true' : 'false') },
};

/** Whether an empty submitted value means "not filled in" for this kind */
export function isNumericKind(kind: ScalarKind): boolean {
    return kind === 'int' || kind === 'int32' || kind === 'int64' || kind === 'float';
}

/**
 * Parse with a built-in codec, returning the first issue message on failure.
 * @internal
 */
export function parseScalar<T>(codec: ScalarCodec<T>, raw: string): { ok: true; value: T } | { ok: false; message: string } {
    const parsed = codec.schema.safeParse(raw);
    if (parsed.success) return { ok: true, value: parsed.data };
    return { ok: false, message: parsed.error.issues[0]?.message ?? 'Invalid value' };
}
