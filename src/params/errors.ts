/**
 * Parameter Errors — Construction and Decode Failures
 *
 * Two families:
 *
 * - {@link InvalidParamShapeError} is thrown synchronously by the combinators
 *   when a parameter type is assembled incorrectly (two suffixes, overlapping
 *   product names, `opt()` around a boolean...). It surfaces at
 *   service-definition time, never per request.
 * - {@link ParamDecodeError} subclasses describe why an incoming request could
 *   not be turned into a typed value. Each carries a literal `code` so callers
 *   can `switch` exhaustively over {@link DecodeError}.
 *
 * @example
 * ```typescript
 * const result = reconstruct(int('page'), { params: [['page', 'two']] });
 * if (!result.ok && result.error.code === 'INVALID_PARAMETER_VALUE') {
 *     console.log(result.error.key, result.error.raw); // "page" "two"
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';

// ============================================================================
// Construction
// ============================================================================

/**
 * Thrown when combinators are composed in a way the wire format cannot
 * represent unambiguously.
 */
export class InvalidParamShapeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidParamShapeError';
    }
}

// ============================================================================
// Decode
// ============================================================================

/** Literal codes of every decode failure */
export type DecodeErrorCode =
    | 'MISSING_PARAMETER'
    | 'INVALID_PARAMETER_VALUE'
    | 'AMBIGUOUS_SUM'
    | 'FILE_FIELD'
    | 'UNEXPECTED_PARAMETER'
    | 'UNEXPECTED_SEGMENTS';

/**
 * Base class of all per-request decode failures.
 *
 * `key` is the full wire key (list and prefix segments included) of the
 * parameter that failed.
 */
export abstract class ParamDecodeError extends Error {
    abstract readonly code: DecodeErrorCode;
    readonly key: string;

    protected constructor(key: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.key = key;
    }
}

/** A required key is absent from the request. */
export class MissingParameterError extends ParamDecodeError {
    readonly code = 'MISSING_PARAMETER' as const;

    constructor(key: string) {
        super(key, `Missing parameter '${key}'`);
        this.name = 'MissingParameterError';
    }
}

/** Why a present value was rejected */
export type InvalidValueReason = 'codec' | 'regexp-mismatch';

/**
 * A key is present but its value does not parse with the declared codec,
 * or does not match the declared pattern.
 */
export class InvalidParameterValueError extends ParamDecodeError {
    readonly code = 'INVALID_PARAMETER_VALUE' as const;
    readonly raw: string;
    readonly reason: InvalidValueReason;

    constructor(key: string, raw: string, detail: string, reason: InvalidValueReason = 'codec', cause?: unknown) {
        super(key, `Invalid value for '${key}': ${detail}`, cause === undefined ? undefined : { cause });
        this.name = 'InvalidParameterValueError';
        this.raw = raw;
        this.reason = reason;
    }
}

/** The discriminator of a binary sum is absent or holds neither side. */
export class AmbiguousSumError extends ParamDecodeError {
    readonly code = 'AMBIGUOUS_SUM' as const;
    readonly raw: string | undefined;

    constructor(key: string, raw: string | undefined) {
        super(
            key,
            raw === undefined
                ? `Missing sum discriminator '${key}'`
                : `Unrecognized sum discriminator '${key}=${raw}'`,
        );
        this.name = 'AmbiguousSumError';
        this.raw = raw;
    }
}

/** Why an upload field was rejected */
export type FileFieldReason = 'missing' | 'malformed';

/**
 * An upload field is absent, or its metadata does not have the
 * {@link FileInfo} shape. For malformed metadata `cause` is the `ZodError`.
 */
export class FileFieldError extends ParamDecodeError {
    readonly code = 'FILE_FIELD' as const;
    readonly reason: FileFieldReason;

    constructor(key: string, reason: 'missing');
    constructor(key: string, reason: 'malformed', zodError: ZodError);
    constructor(key: string, reason: FileFieldReason, zodError?: ZodError) {
        const detail = zodError === undefined
            ? ''
            : ':\n' + zodError.issues
                .map(issue => `  • ${issue.path.length > 0 ? `'${issue.path.join('.')}'` : '(root)'}: ${issue.message}`)
                .join('\n');
        super(
            key,
            reason === 'missing' ? `Missing file field '${key}'` : `Malformed upload in '${key}'${detail}`,
            zodError === undefined ? undefined : { cause: zodError },
        );
        this.name = 'FileFieldError';
        this.reason = reason;
    }
}

/** Strict mode only: keys nothing in the parameter type claimed. */
export class UnexpectedParameterError extends ParamDecodeError {
    readonly code = 'UNEXPECTED_PARAMETER' as const;
    readonly keys: readonly string[];

    constructor(keys: readonly string[]) {
        super(keys[0] ?? '', `Unexpected parameter(s): ${keys.map(k => `'${k}'`).join(', ')}`);
        this.name = 'UnexpectedParameterError';
        this.keys = keys;
    }
}

/** URL suffix segments left over once the suffix parameters were read. */
export class UnexpectedSegmentsError extends ParamDecodeError {
    readonly code = 'UNEXPECTED_SEGMENTS' as const;
    readonly segments: readonly string[];

    constructor(segments: readonly string[]) {
        super('', `Unexpected suffix segment(s): /${segments.join('/')}`);
        this.name = 'UnexpectedSegmentsError';
        this.segments = segments;
    }
}

/**
 * Closed union of decode failures.
 *
 * ```typescript
 * switch (error.code) {
 *     case 'MISSING_PARAMETER':       // MissingParameterError
 *     case 'INVALID_PARAMETER_VALUE': // InvalidParameterValueError
 *     case 'AMBIGUOUS_SUM':           // AmbiguousSumError
 *     case 'FILE_FIELD':              // FileFieldError
 *     case 'UNEXPECTED_PARAMETER':    // UnexpectedParameterError
 *     case 'UNEXPECTED_SEGMENTS':     // UnexpectedSegmentsError
 * }
 * ```
 */
export type DecodeError =
    | MissingParameterError
    | InvalidParameterValueError
    | AmbiguousSumError
    | FileFieldError
    | UnexpectedParameterError
    | UnexpectedSegmentsError;

/** Narrow an unknown thrown value to a {@link DecodeError}. */
export function isDecodeError(err: unknown): err is DecodeError {
    return err instanceof MissingParameterError
        || err instanceof InvalidParameterValueError
        || err instanceof AmbiguousSumError
        || err instanceof FileFieldError
        || err instanceof UnexpectedParameterError
        || err instanceof UnexpectedSegmentsError;
}

/**
 * One-line rendering of a decode error, e.g. for a 400 response body.
 *
 * @example
 * ```typescript
 * formatDecodeError(new MissingParameterError('page'));
 * // "[MISSING_PARAMETER] page: Missing parameter 'page'"
 * ```
 */
export function formatDecodeError(error: DecodeError): string {
    const firstLine = error.message.split('\n')[0] ?? error.message;
    return error.key.length > 0
        ? `[${error.code}] ${error.key}: ${firstLine}`
        : `[${error.code}] ${firstLine}`;
}
