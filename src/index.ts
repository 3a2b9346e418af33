/**
 * @module
 * @description
 * Combinators describing the parameters of a web service.
 */
// ── Parameter Types ──────────────────────────────────────
/** @category Parameter Types */
export {
    ParamType,
    type SuffixMark, type ParamKind, type ParamShape, type Pair,
    type EncodeSink, type DecodeContext, type AnyParamType, type ParamValue,
} from './params/ParamType.js';
/** @category Parameter Types */
export {
    int, int32, int64, float, string, bool, file, userType, regexp, unit,
    LeafParam, RepeatableLeaf, StringLeaf,
    ScalarParam, BoolParam, UserTypeParam, RegexpParam, FileParam, UnitParam,
} from './params/leaves.js';
/** @category Parameter Types */
export {
    coordinates, stringCoordinates, intCoordinates, int32Coordinates,
    int64Coordinates, floatCoordinates, userTypeCoordinates,
    CoordinatesParam, ValuedCoordinatesParam,
    type Coordinates, type ValuedCoordinates,
} from './params/coordinates.js';
/** @category Parameter Types */
export {
    product, prod, sum, opt, set, list, any, addPrefix, inj1, inj2,
    ProductParam, SumParam, OptionParam, SetParam, ListParam, AnyParam, PrefixParam,
    type BinSum, type Inj1, type Inj2,
} from './params/composite.js';
/** @category Parameter Types */
export {
    suffix, suffixProd, allSuffix, allSuffixString, allSuffixUser, allSuffixRegexp, containsSuffix,
    SuffixParam, SuffixProductParam, AllSuffixLeaf,
    AllSuffixParam, AllSuffixStringParam, AllSuffixUserParam, AllSuffixRegexpParam,
} from './params/suffix.js';
/** @category Parameter Types */
export {
    SCALAR_CODECS, formatDecimal, formatInteger,
    type ScalarKind, type ScalarValues, type StringCodec, type ScalarCodec,
} from './params/codecs.js';
/** @category Parameter Types */
export { regExpEngine, toPattern, type Pattern, type PatternEngine, type PatternInput } from './params/patterns.js';
/** @category Parameter Types */
export { FileInfoSchema, type FileInfo } from './params/files.js';

// ── Names ────────────────────────────────────────────────
/** @category Names */
export {
    makeParamNames, stringOfParamName,
    type Multiplicity, type ParamName, type SumNames, type ListNames,
} from './params/ParamNames.js';
/** @category Names */
export { NameGenerator, SUM_DISCRIMINATOR, LIST_SEPARATOR } from './params/NameGenerator.js';
/** @category Names */
export { anonymise, describeParamType } from './params/fingerprint.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    InvalidParamShapeError, ParamDecodeError,
    MissingParameterError, InvalidParameterValueError, AmbiguousSumError,
    FileFieldError, UnexpectedParameterError, UnexpectedSegmentsError,
    isDecodeError, formatDecodeError,
    type DecodeError, type DecodeErrorCode, type InvalidValueReason, type FileFieldReason,
} from './params/errors.js';
/** @category Errors */
export { succeed, fail, type Result, type Success, type Failure } from './result.js';

// ── Wire ─────────────────────────────────────────────────
/** @category Wire */
export { construct, constructQueryString, encodeParams, makeUri, type Construction } from './wire/construct.js';
/** @category Wire */
export {
    reconstruct, reconstructOrThrow, parseQueryString, removePrefixedParams,
    type RequestInput,
} from './wire/reconstruct.js';
/** @category Wire */
export { DEFAULT_DECODE_CONFIG, mergeDecodeConfig, type DecodeConfig } from './wire/DecodeConfig.js';

// ── Services ─────────────────────────────────────────────
/** @category Services */
export {
    defineService, Service,
    type ServiceConfig, type GetServiceConfig, type ServiceHandler,
    type ServiceFingerprint, type DispatchTarget, type RoutedRequest,
} from './service/defineService.js';
/** @category Services */
export {
    ServiceRegistry, ServiceNotFoundError,
    type ServiceRequest, type ServiceRegistryOptions, type DispatchError,
} from './service/ServiceRegistry.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createDebugObserver,
    type DebugEvent, type DebugObserverFn,
    type RouteEvent, type DecodeEvent, type ExecuteEvent, type ErrorEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export {
    SpanStatusCode,
    type ParamTracer, type ParamSpan, type ParamAttributeValue,
} from './observability/Tracing.js';
