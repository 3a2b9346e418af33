/**
 * DecodeConfig — Request Decoding Options
 *
 * Controls how lenient {@link reconstruct} is with what browsers and
 * clients actually send. All fields have defaults, see
 * {@link DEFAULT_DECODE_CONFIG}; partial overrides are validated and merged
 * by {@link mergeDecodeConfig}.
 *
 * @module
 */
import { z } from 'zod';

// ── Config ───────────────────────────────────────────────

export interface DecodeConfig {
    /** Fail with `UNEXPECTED_PARAMETER` when keys are left unclaimed */
    readonly strict: boolean;
    /**
     * Decode `x=` as absent for an optional numeric parameter, instead of
     * failing to parse the empty string. HTML forms submit empty fields.
     */
    readonly emptyOptionalAsNone: boolean;
    /** Tolerate URL suffix segments left over once the suffix parameters were read */
    readonly allowTrailingSegments: boolean;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_DECODE_CONFIG: DecodeConfig = {
    strict: false,
    emptyOptionalAsNone: true,
    allowTrailingSegments: false,
};

// ── Validation & Merge ───────────────────────────────────

const DecodeConfigOverrides = z.object({
    strict: z.boolean(),
    emptyOptionalAsNone: z.boolean(),
    allowTrailingSegments: z.boolean(),
}).partial().strict();

/**
 * Merge partial options with the defaults.
 *
 * @throws TypeError if an option has the wrong type or is unknown
 *
 * @example
 * ```typescript
 * mergeDecodeConfig({ strict: true });
 * // { strict: true, emptyOptionalAsNone: true, allowTrailingSegments: false }
 * ```
 */
export function mergeDecodeConfig(partial: Partial<DecodeConfig> = {}): DecodeConfig {
    const parsed = DecodeConfigOverrides.safeParse(partial);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new TypeError(`Invalid decode options: ${issues}`, { cause: parsed.error });
    }
    return {
        strict: parsed.data.strict ?? DEFAULT_DECODE_CONFIG.strict,
        emptyOptionalAsNone: parsed.data.emptyOptionalAsNone ?? DEFAULT_DECODE_CONFIG.emptyOptionalAsNone,
        allowTrailingSegments: parsed.data.allowTrailingSegments ?? DEFAULT_DECODE_CONFIG.allowTrailingSegments,
    };
}
