/**
 * Leaf Parameters — Scalars, Files, Custom Types, Patterns
 *
 * A leaf reads a single named field. All leaves share the same contract:
 * absent key → `MISSING_PARAMETER`, present but unparsable value →
 * `INVALID_PARAMETER_VALUE`. Two leaves deviate on purpose:
 *
 * - `bool` follows checkbox semantics: `name=on` when true, nothing when
 *   false. An absent key decodes to `false`, never to a missing parameter.
 * - `file` reads the uploaded-file map, not the query/body pairs, and is
 *   never emitted when constructing a link.
 *
 * @example
 * ```typescript
 * int('page');                              // number
 * int64('id');                              // bigint
 * userType('day', isoDateCodec);            // Date
 * regexp('\\[(.*)\\]', '($1)', 'tag');      // "[hello]" → "(hello)"
 * ```
 *
 * @module
 */
import { z } from 'zod';
import { ParamType, type DecodeContext, type EncodeSink, type ParamShape } from './ParamType.js';
import { type NameGenerator, RESERVED_NAME_PREFIX } from './NameGenerator.js';
import { leafName, type ParamName } from './ParamNames.js';
import {
    FileFieldError, InvalidParamShapeError, InvalidParameterValueError, MissingParameterError,
} from './errors.js';
import {
    SCALAR_CODECS, isNumericKind, parseScalar,
    type ScalarKind, type ScalarValues, type StringCodec,
} from './codecs.js';
import { FileInfoSchema, type FileInfo } from './files.js';
import { toPattern, type Pattern, type PatternInput } from './patterns.js';

// ============================================================================
// Name validation
// ============================================================================

const FieldNameSchema = z.string()
    .min(1, 'Parameter names must not be empty')
    .refine(name => !name.startsWith(RESERVED_NAME_PREFIX), `Parameter names starting with '${RESERVED_NAME_PREFIX}' are reserved`);

/**
 * Validate an author-supplied field name.
 * @throws InvalidParamShapeError
 * @internal
 */
export function checkName(name: string): string {
    const parsed = FieldNameSchema.safeParse(name);
    if (!parsed.success) {
        throw new InvalidParamShapeError(`${parsed.error.issues[0]?.message ?? 'Invalid parameter name'}: '${name}'`);
    }
    return parsed.data;
}

// ============================================================================
// Leaf bases
// ============================================================================

/**
 * A parameter read from one named field ("exactly one" shape).
 * Only leaves can be made optional with `opt()`.
 */
export abstract class LeafParam<T> extends ParamType<T, 'none', ParamName<'one', T>> {
    readonly suffix = 'none' as const;
    readonly name: string;

    protected constructor(name: string) {
        super();
        this.name = checkName(name);
    }

    /** Full keys whose absence means the whole leaf is absent. */
    ownKeys(names: NameGenerator): string[] {
        return [names.key(this.name)];
    }

    /** Whether an empty submitted value means "not filled in". */
    blankIsAbsent(): boolean {
        return false;
    }

    paramNames(names: NameGenerator): ParamName<'one', T> {
        return leafName(names.key(this.name), 'one');
    }

    surfaceNames(): readonly string[] {
        return [this.name];
    }
}

/** A leaf that `set()` can repeat under the same key. */
export abstract class RepeatableLeaf<T> extends LeafParam<T> {
    /** Read the single value stored under `key`. */
    abstract takeOne(ctx: DecodeContext, key: string): T;

    /** Read every value stored under `key`, in request order. */
    abstract takeAll(ctx: DecodeContext, key: string): T[];

    /** Wire text of `value`, or `undefined` when nothing is emitted. */
    abstract format(value: T): string | undefined;

    encode(value: T, sink: EncodeSink, names: NameGenerator): void {
        const text = this.format(value);
        if (text !== undefined) sink.params.push([names.key(this.name), text]);
    }

    decode(ctx: DecodeContext, names: NameGenerator): T {
        return this.takeOne(ctx, names.key(this.name));
    }
}

/** A repeatable leaf whose value is a string in the query/body pairs. */
export abstract class StringLeaf<T> extends RepeatableLeaf<T> {
    protected abstract parseRaw(raw: string, key: string): T;

    /** Text used for this value inside a URL suffix. */
    formatPositional(value: T): string {
        return this.format(value) ?? '';
    }

    takeOne(ctx: DecodeContext, key: string): T {
        const raw = ctx.params.take(key);
        if (raw === undefined) throw new MissingParameterError(key);
        return this.parseRaw(raw, key);
    }

    takeAll(ctx: DecodeContext, key: string): T[] {
        return ctx.params.takeAll(key).map(raw => this.parseRaw(raw, key));
    }

    supportsPositional(): boolean {
        return true;
    }

    encodePositional(value: T, segments: string[]): void {
        segments.push(this.formatPositional(value));
    }

    decodePositional(ctx: DecodeContext, names: NameGenerator): T {
        const key = names.key(this.name);
        const raw = ctx.segments.next();
        if (raw === undefined) throw new MissingParameterError(key);
        return this.parseRaw(raw, key);
    }
}

// ============================================================================
// Concrete leaves
// ============================================================================

export class ScalarParam<K extends ScalarKind> extends StringLeaf<ScalarValues[K]> {
    readonly kind = 'scalar' as const;

    constructor(readonly scalar: K, name: string) {
        super(name);
    }

    blankIsAbsent(): boolean {
        return isNumericKind(this.scalar);
    }

    format(value: ScalarValues[K]): string {
        return SCALAR_CODECS[this.scalar].format(value);
    }

    protected parseRaw(raw: string, key: string): ScalarValues[K] {
        const parsed = parseScalar(SCALAR_CODECS[this.scalar], raw);
        if (!parsed.ok) throw new InvalidParameterValueError(key, raw, parsed.message);
        return parsed.value;
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name, detail: this.scalar };
    }
}

/** Checkbox-style boolean: present means true. */
export class BoolParam extends StringLeaf<boolean> {
    readonly kind = 'scalar' as const;

    constructor(name: string) {
        super(name);
    }

    isCheckbox(): boolean {
        return true;
    }

    format(value: boolean): string | undefined {
        return value ? 'on' : undefined;
    }

    formatPositional(value: boolean): string {
        return SCALAR_CODECS.bool.format(value);
    }

    takeOne(ctx: DecodeContext, key: string): boolean {
        const raw = ctx.params.take(key);
        return raw === undefined ? false : this.parseRaw(raw, key);
    }

    protected parseRaw(raw: string, key: string): boolean {
        const parsed = parseScalar(SCALAR_CODECS.bool, raw);
        if (!parsed.ok) throw new InvalidParameterValueError(key, raw, parsed.message);
        return parsed.value;
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name, detail: 'bool' };
    }
}

export class UserTypeParam<T> extends StringLeaf<T> {
    readonly kind = 'user' as const;

    constructor(name: string, readonly codec: StringCodec<T>) {
        super(name);
    }

    format(value: T): string {
        return this.codec.format(value);
    }

    protected parseRaw(raw: string, key: string): T {
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

/** A string validated against a pattern, then rewritten with a template. */
export class RegexpParam extends StringLeaf<string> {
    readonly kind = 'regexp' as const;

    constructor(readonly pattern: Pattern, readonly template: string, name: string) {
        super(name);
    }

    format(value: string): string {
        return value;
    }

    protected parseRaw(raw: string, key: string): string {
        if (!this.pattern.matches(raw)) {
            throw new InvalidParameterValueError(key, raw, `does not match /${this.pattern.source}/`, 'regexp-mismatch');
        }
        return this.pattern.rewrite(raw, this.template);
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name, detail: `${this.pattern.source} => ${this.template}` };
    }
}

export class FileParam extends RepeatableLeaf<FileInfo> {
    readonly kind = 'file' as const;

    constructor(name: string) {
        super(name);
    }

    /** Uploads cannot travel in a link or a query string. */
    format(): undefined {
        return undefined;
    }

    takeOne(ctx: DecodeContext, key: string): FileInfo {
        const upload = ctx.files.take(key);
        if (upload === undefined) throw new FileFieldError(key, 'missing');
        return this.validate(upload, key);
    }

    takeAll(ctx: DecodeContext, key: string): FileInfo[] {
        return ctx.files.takeAll(key).map(upload => this.validate(upload, key));
    }

    private validate(upload: unknown, key: string): FileInfo {
        const parsed = FileInfoSchema.safeParse(upload);
        if (!parsed.success) throw new FileFieldError(key, 'malformed', parsed.error);
        return parsed.data;
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name };
    }
}

/** No parameters at all. */
export class UnitParam extends ParamType<undefined, 'none', undefined> {
    readonly kind = 'unit' as const;
    readonly suffix = 'none' as const;

    encode(): void {}

    decode(): undefined {
        return undefined;
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

    supportsPositional(): boolean {
        return true;
    }

    encodePositional(): void {}

    decodePositional(): undefined {
        return undefined;
    }
}

// ============================================================================
// Combinators
// ============================================================================

/** A safe integer labeled `name`. */
export function int(name: string): ScalarParam<'int'> {
    return new ScalarParam('int', name);
}

/** A 32-bit signed integer labeled `name`. */
export function int32(name: string): ScalarParam<'int32'> {
    return new ScalarParam('int32', name);
}

/** A 64-bit signed integer labeled `name`, as a `bigint`. */
export function int64(name: string): ScalarParam<'int64'> {
    return new ScalarParam('int64', name);
}

/** A floating point number labeled `name`. */
export function float(name: string): ScalarParam<'float'> {
    return new ScalarParam('float', name);
}

/** A string labeled `name`. */
export function string(name: string): ScalarParam<'string'> {
    return new ScalarParam('string', name);
}

/** A checkbox labeled `name`. */
export function bool(name: string): BoolParam {
    return new BoolParam(name);
}

/** An uploaded file labeled `name`. */
export function file(name: string): FileParam {
    return new FileParam(name);
}

/** A value of your own type, converted with `codec`. */
export function userType<T>(name: string, codec: StringCodec<T>): UserTypeParam<T> {
    return new UserTypeParam(name, codec);
}

/**
 * A string labeled `name` that must match `pattern` (at its start);
 * the handler receives it rewritten by `template`.
 */
export function regexp(pattern: PatternInput, template: string, name: string): RegexpParam {
    return new RegexpParam(toPattern(pattern), template, name);
}

/** No parameters. */
export const unit: UnitParam = new UnitParam();
