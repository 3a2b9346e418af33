/**
 * ServiceRegistry — Service Registration & Dispatch
 *
 * The single place where services are registered and where incoming
 * requests are routed to the right handler.
 *
 * Several services may share a path as long as their parameter types
 * differ: they are told apart by the pair of GET/POST fingerprints.
 * On dispatch, candidates are tried in registration order and the first
 * whose parameters decode is called.
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry<AppContext>({ debug: createDebugObserver() });
 * registry.registerAll(byQuery, byId, article);
 *
 * const result = await registry.dispatch(ctx, {
 *     path: '/blog/2024/hello',
 *     query: parseQueryString('?lang=en'),
 * });
 * if (!result.ok) return badRequest(result.error);
 * ```
 *
 * @module
 */
import { type Pair } from '../params/ParamType.js';
import { formatDecodeError, type DecodeError } from '../params/errors.js';
import { mergeDecodeConfig, type DecodeConfig } from '../wire/DecodeConfig.js';
import { fail, succeed, type Result } from '../result.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { SpanStatusCode, type ParamSpan, type ParamTracer } from '../observability/Tracing.js';
import { splitPath, type DispatchTarget } from './defineService.js';

// ============================================================================
// Types
// ============================================================================

/** An incoming request, as handed over by the HTTP layer */
export interface ServiceRequest {
    /** Percent-encoded path, without the query string */
    readonly path: string;
    readonly query?: Iterable<Pair>;
    readonly body?: Iterable<Pair>;
    readonly files?: Iterable<Pair<unknown>>;
}

export interface ServiceRegistryOptions {
    /** Receives dispatch events, see {@link createDebugObserver} */
    readonly debug?: DebugObserverFn;
    /** Opens one span per dispatch */
    readonly tracer?: ParamTracer;
    /** Decode options applied to every service */
    readonly decode?: Partial<DecodeConfig>;
}

/** No registered service answers on the request path. */
export class ServiceNotFoundError extends Error {
    readonly code = 'SERVICE_NOT_FOUND' as const;

    constructor(readonly path: string) {
        super(`No service registered for '${path}'`);
        this.name = 'ServiceNotFoundError';
    }
}

export type DispatchError = DecodeError | ServiceNotFoundError;

// ============================================================================
// ServiceRegistry
// ============================================================================

/**
 * @typeParam TContext - Application context passed to every handler
 * @typeParam TResult - What handlers return
 */
export class ServiceRegistry<TContext = void, TResult = unknown> {
    private readonly _services: DispatchTarget<TContext, TResult>[] = [];
    private readonly _keys = new Set<string>();
    private readonly _debug?: DebugObserverFn;
    private readonly _tracer?: ParamTracer;
    private readonly _decode: DecodeConfig;

    /** @throws TypeError if `options.decode` is malformed */
    constructor(options: ServiceRegistryOptions = {}) {
        this._debug = options.debug;
        this._tracer = options.tracer;
        this._decode = mergeDecodeConfig(options.decode);
    }

    /**
     * Register a service.
     *
     * @throws Error if a service with the same path and parameter shapes is already registered
     */
    register(service: DispatchTarget<TContext, TResult>): void {
        const key = `${service.path}#${service.fingerprint.get}:${service.fingerprint.post}`;
        if (this._keys.has(key)) {
            throw new Error(`A service with the same parameters is already registered on "${service.path}".`);
        }
        this._keys.add(key);
        this._services.push(service);
    }

    registerAll(...services: DispatchTarget<TContext, TResult>[]): void {
        for (const service of services) {
            this.register(service);
        }
    }

    /** Whether a service answers exactly on `path` (suffix segments excluded). */
    has(path: string): boolean {
        const segments = splitPath(path);
        return this._services.some(service => sameSegments(service.segments, segments));
    }

    get size(): number {
        return this._services.length;
    }

    /**
     * Route a request and run the handler of the first matching service.
     *
     * Returns the handler's result, or the first decode error when no
     * candidate's parameters decode. Handler exceptions propagate.
     */
    async dispatch(context: TContext, request: ServiceRequest): Promise<Result<TResult, DispatchError>> {
        const start = Date.now();
        const span = this._tracer?.startSpan('service.dispatch', {
            attributes: { 'service.path': request.path },
        });

        try {
            const segments = decodePath(request.path);
            if (segments === undefined) {
                this._debug?.({ type: 'error', path: request.path, error: 'Malformed percent-encoding in path', step: 'route', timestamp: Date.now() });
                span?.setStatus({ code: SpanStatusCode.UNSET, message: 'malformed path' });
                return fail(new ServiceNotFoundError(request.path));
            }

            const candidates = this._services.flatMap(service => {
                const suffix = matchPath(service, segments);
                return suffix === null ? [] : [{ service, suffix }];
            });
            span?.setAttribute('service.candidates', candidates.length);

            if (candidates.length === 0) {
                this._debug?.({ type: 'error', path: request.path, error: 'No matching service', step: 'route', timestamp: Date.now() });
                span?.setStatus({ code: SpanStatusCode.UNSET, message: 'no matching service' });
                return fail(new ServiceNotFoundError(request.path));
            }
            this._debug?.({ type: 'route', path: request.path, candidates: candidates.length, timestamp: Date.now() });

            const query = Array.from(request.query ?? []);
            const body = Array.from(request.body ?? []);
            const files = Array.from(request.files ?? []);
            let firstError: DecodeError | undefined;

            for (const { service, suffix } of candidates) {
                const decodeStart = Date.now();
                const bound = service.bind(context, { query, body, files, suffix }, this._decode);
                const label = `${service.fingerprint.get}:${service.fingerprint.post}`;

                if (!bound.ok) {
                    this._debug?.({
                        type: 'decode', path: request.path, service: label, valid: false,
                        error: formatDecodeError(bound.error), durationMs: Date.now() - decodeStart, timestamp: Date.now(),
                    });
                    span?.addEvent?.('service.decode_failed', {
                        'service.fingerprint': label,
                        'error.code': bound.error.code,
                    });
                    firstError ??= bound.error;
                    continue;
                }
                this._debug?.({
                    type: 'decode', path: request.path, service: label, valid: true,
                    durationMs: Date.now() - decodeStart, timestamp: Date.now(),
                });

                const value = await this.execute(bound.value, request.path, span);
                const durationMs = Date.now() - start;
                span?.setAttribute('service.duration_ms', durationMs);
                span?.setStatus({ code: SpanStatusCode.OK });
                this._debug?.({ type: 'execute', path: request.path, service: label, durationMs, timestamp: Date.now() });
                return succeed(value);
            }

            const error = firstError ?? new ServiceNotFoundError(request.path);
            span?.setAttribute('service.decode_error', error.code);
            span?.setStatus({ code: SpanStatusCode.UNSET, message: error.message });
            return fail(error);
        } finally {
            span?.end();
        }
    }

    private async execute(run: () => TResult | Promise<TResult>, path: string, span: ParamSpan | undefined): Promise<TResult> {
        try {
            return await run();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            span?.setStatus({ code: SpanStatusCode.ERROR, message });
            span?.recordException(err instanceof Error ? err : new Error(message));
            this._debug?.({ type: 'error', path, error: message, step: 'execute', timestamp: Date.now() });
            throw err;
        }
    }
}

// ============================================================================
// Path matching
// ============================================================================

/** Request path split and percent-decoded; empty segments after the first are kept. */
function decodePath(path: string): string[] | undefined {
    const trimmed = path.startsWith('/') ? path.slice(1) : path;
    if (trimmed === '') return [];
    const segments: string[] = [];
    for (const raw of trimmed.split('/')) {
        try {
            segments.push(decodeURIComponent(raw));
        } catch (err) {
            if (err instanceof URIError) return undefined;
            throw err;
        }
    }
    return segments;
}

function sameSegments(a: readonly string[], b: readonly string[]): boolean {
    return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

/**
 * Suffix segments left once `service`'s path is matched, `undefined` for
 * services without a suffix, `null` when the path does not match.
 */
function matchPath(service: DispatchTarget<unknown, unknown>, segments: readonly string[]): readonly string[] | undefined | null {
    const head = segments.slice(0, service.segments.length);
    if (!sameSegments(head, service.segments)) return null;
    const rest = segments.slice(service.segments.length);

    if (service.readsSuffix) return rest;
    // a trailing slash is tolerated
    if (rest.length === 0 || (rest.length === 1 && rest[0] === '')) return undefined;
    return null;
}
