/**
 * Coordinates — Clicks on an `<input type="image">`
 *
 * Browsers submit an image input named `pos` as `pos.x=12&pos.y=30`, plus
 * `pos=<value>` when the input carries a `value` attribute. The valued
 * variants require that companion key and decode it with their own codec.
 *
 * @module
 */
import { type DecodeContext, type EncodeSink, type ParamShape } from './ParamType.js';
import { type NameGenerator } from './NameGenerator.js';
import { LeafParam } from './leaves.js';
import { InvalidParameterValueError, MissingParameterError } from './errors.js';
import { SCALAR_CODECS, parseScalar, type ScalarKind, type ScalarValues, type StringCodec } from './codecs.js';

/** Point of an image input where the user clicked */
export interface Coordinates {
    readonly abscissa: number;
    readonly ordinate: number;
}

/** Coordinates together with the image input's value */
export interface ValuedCoordinates<V> {
    readonly value: V;
    readonly coordinates: Coordinates;
}

const X_SUFFIX = '.x';
const Y_SUFFIX = '.y';

function readAxis(ctx: DecodeContext, key: string): number {
    const raw = ctx.params.take(key);
    if (raw === undefined) throw new MissingParameterError(key);
    const parsed = parseScalar(SCALAR_CODECS.int, raw);
    if (!parsed.ok) throw new InvalidParameterValueError(key, raw, parsed.message);
    return parsed.value;
}

function readCoordinates(ctx: DecodeContext, key: string): Coordinates {
    return {
        abscissa: readAxis(ctx, key + X_SUFFIX),
        ordinate: readAxis(ctx, key + Y_SUFFIX),
    };
}

function writeCoordinates(point: Coordinates, sink: EncodeSink, key: string): void {
    sink.params.push([key + X_SUFFIX, SCALAR_CODECS.int.format(point.abscissa)]);
    sink.params.push([key + Y_SUFFIX, SCALAR_CODECS.int.format(point.ordinate)]);
}

export class CoordinatesParam extends LeafParam<Coordinates> {
    readonly kind = 'coordinates' as const;

    constructor(name: string) {
        super(name);
    }

    ownKeys(names: NameGenerator): string[] {
        const key = names.key(this.name);
        return [key + X_SUFFIX, key + Y_SUFFIX];
    }

    encode(value: Coordinates, sink: EncodeSink, names: NameGenerator): void {
        writeCoordinates(value, sink, names.key(this.name));
    }

    decode(ctx: DecodeContext, names: NameGenerator): Coordinates {
        const key = names.key(this.name);
        const point = readCoordinates(ctx, key);
        // a valueless image input may still carry an empty `name=`
        ctx.params.take(key);
        return point;
    }

    describe(): ParamShape {
        return { kind: this.kind, name: this.name };
    }
}

/** How the companion value of valued coordinates is read and written */
type CompanionCodec<V> =
    | { readonly kind: 'scalar'; readonly scalar: ScalarKind; parse(raw: string): { ok: true; value: V } | { ok: false; message: string }; format(value: V): string }
    | { readonly kind: 'user'; readonly codec: StringCodec<V> };

export class ValuedCoordinatesParam<V> extends LeafParam<ValuedCoordinates<V>> {
    readonly kind = 'coordinates' as const;

    constructor(name: string, private readonly companion: CompanionCodec<V>) {
        super(name);
    }

    ownKeys(names: NameGenerator): string[] {
        const key = names.key(this.name);
        return [key + X_SUFFIX, key + Y_SUFFIX, key];
    }

    encode(value: ValuedCoordinates<V>, sink: EncodeSink, names: NameGenerator): void {
        const key = names.key(this.name);
        writeCoordinates(value.coordinates, sink, key);
        sink.params.push([key, this.formatValue(value.value)]);
    }

    decode(ctx: DecodeContext, names: NameGenerator): ValuedCoordinates<V> {
        const key = names.key(this.name);
        const coordinates = readCoordinates(ctx, key);
        const raw = ctx.params.take(key);
        if (raw === undefined) throw new MissingParameterError(key);
        return { value: this.parseValue(raw, key), coordinates };
    }

    describe(): ParamShape {
        return {
            kind: this.kind,
            name: this.name,
            detail: this.companion.kind === 'scalar' ? this.companion.scalar : 'user',
        };
    }

    private formatValue(value: V): string {
        return this.companion.kind === 'scalar'
            ? this.companion.format(value)
            : this.companion.codec.format(value);
    }

    private parseValue(raw: string, key: string): V {
        if (this.companion.kind === 'scalar') {
            const parsed = this.companion.parse(raw);
            if (!parsed.ok) throw new InvalidParameterValueError(key, raw, parsed.message);
            return parsed.value;
        }
        try {
            return this.companion.codec.parse(raw);
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            throw new InvalidParameterValueError(key, raw, detail, 'codec', err);
        }
    }
}

function scalarCompanion<K extends ScalarKind>(scalar: K): CompanionCodec<ScalarValues[K]> {
    const codec = SCALAR_CODECS[scalar];
    return {
        kind: 'scalar',
        scalar,
        parse: raw => parseScalar(codec, raw),
        format: value => codec.format(value),
    };
}

// ============================================================================
// Combinators
// ============================================================================

/** Click coordinates of an image input labeled `name`. */
export function coordinates(name: string): CoordinatesParam {
    return new CoordinatesParam(name);
}

/** Click coordinates plus the image input's string value. */
export function stringCoordinates(name: string): ValuedCoordinatesParam<string> {
    return new ValuedCoordinatesParam(name, scalarCompanion('string'));
}

/** Click coordinates plus the image input's integer value. */
export function intCoordinates(name: string): ValuedCoordinatesParam<number> {
    return new ValuedCoordinatesParam(name, scalarCompanion('int'));
}

/** Click coordinates plus the image input's 32-bit integer value. */
export function int32Coordinates(name: string): ValuedCoordinatesParam<number> {
    return new ValuedCoordinatesParam(name, scalarCompanion('int32'));
}

/** Click coordinates plus the image input's 64-bit integer value. */
export function int64Coordinates(name: string): ValuedCoordinatesParam<bigint> {
    return new ValuedCoordinatesParam(name, scalarCompanion('int64'));
}

/** Click coordinates plus the image input's float value. */
export function floatCoordinates(name: string): ValuedCoordinatesParam<number> {
    return new ValuedCoordinatesParam(name, scalarCompanion('float'));
}

/** Click coordinates plus the image input's value, of your own type. */
export function userTypeCoordinates<V>(name: string, codec: StringCodec<V>): ValuedCoordinatesParam<V> {
    return new ValuedCoordinatesParam(name, { kind: 'user', codec });
}
