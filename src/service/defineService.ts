/**
 * defineService — Typed Service Declarations
 *
 * A service is a path, the parameter types it reads from the query
 * (GET, possibly with a URL suffix) and from the body (POST), and a
 * handler receiving the decoded values. The same declaration builds
 * links to the service, so links and handlers cannot drift apart.
 *
 * @example
 * ```typescript
 * const article = defineService({
 *     path: '/blog',
 *     get: suffix(product(int('year'), string('slug'))),
 *     handler: (ctx: AppContext, [year, slug]) => ctx.articles.find(year, slug),
 * });
 *
 * article.uri([2024, 'hello']);   // "/blog/2024/hello"
 * ```
 *
 * @module
 */
import { type Pair, type ParamType } from '../params/ParamType.js';
import { type DecodeError } from '../params/errors.js';
import { unit } from '../params/leaves.js';
import { anonymise } from '../params/fingerprint.js';
import { makeUri } from '../wire/construct.js';
import { reconstruct } from '../wire/reconstruct.js';
import { type DecodeConfig } from '../wire/DecodeConfig.js';
import { succeed, type Result } from '../result.js';

// ============================================================================
// Types
// ============================================================================

export type ServiceHandler<TContext, G, P, R> = (context: TContext, get: G, post: P) => R | Promise<R>;

/** Declaration of a service reading GET and POST parameters */
export interface ServiceConfig<TContext, G, P, R> {
    /** Path the service answers on, e.g. `/blog` */
    readonly path: string;
    /** Query parameters, possibly with a URL suffix */
    readonly get: ParamType<G, 'none' | 'with', unknown>;
    /** Body parameters and uploads */
    readonly post: ParamType<P, 'none', unknown>;
    readonly handler: ServiceHandler<TContext, G, P, R>;
}

/** Declaration of a service reading only GET parameters */
export interface GetServiceConfig<TContext, G, R> {
    readonly path: string;
    readonly get: ParamType<G, 'none' | 'with', unknown>;
    readonly post?: undefined;
    readonly handler: (context: TContext, get: G) => R | Promise<R>;
}

/** Structural hashes of a service's parameter types */
export interface ServiceFingerprint {
    readonly get: number;
    readonly post: number;
}

/** A request, once routed: the pairs and the suffix segments after the service path */
export interface RoutedRequest {
    readonly query: readonly Pair[];
    readonly body: readonly Pair[];
    readonly files: readonly Pair<unknown>[];
    /** `undefined` for services without a suffix */
    readonly suffix: readonly string[] | undefined;
}

/**
 * What the registry needs from a service, with the parameter
 * types erased: decoding yields a ready-to-run handler call.
 */
export interface DispatchTarget<TContext, R> {
    readonly path: string;
    /** Path split into its non-empty segments */
    readonly segments: readonly string[];
    readonly readsSuffix: boolean;
    readonly fingerprint: ServiceFingerprint;
    bind(context: TContext, request: RoutedRequest, options?: Partial<DecodeConfig>): Result<() => R | Promise<R>, DecodeError>;
}

// ============================================================================
// Service
// ============================================================================

/** Non-empty segments of a path. */
export function splitPath(path: string): string[] {
    return path.split('/').filter(segment => segment !== '');
}

export class Service<TContext, G, P, R> implements DispatchTarget<TContext, R> {
    readonly path: string;
    readonly segments: readonly string[];
    readonly readsSuffix: boolean;
    readonly fingerprint: ServiceFingerprint;

    constructor(
        path: string,
        readonly get: ParamType<G, 'none' | 'with', unknown>,
        readonly post: ParamType<P, 'none', unknown>,
        private readonly handler: ServiceHandler<TContext, G, P, R>,
    ) {
        this.segments = splitPath(path);
        this.path = '/' + this.segments.join('/');
        this.readsSuffix = get.suffix === 'with';
        this.fingerprint = { get: anonymise(get), post: anonymise(post) };
    }

    /** Link to this service called with `value`. */
    uri(value: G): string {
        return makeUri(this.path, this.get, value);
    }

    bind(context: TContext, request: RoutedRequest, options?: Partial<DecodeConfig>): Result<() => R | Promise<R>, DecodeError> {
        const get = reconstruct(this.get, { params: request.query, suffix: request.suffix }, options);
        if (!get.ok) return get;
        const post = reconstruct(this.post, { params: request.body, files: request.files }, options);
        if (!post.ok) return post;
        return succeed(() => this.handler(context, get.value, post.value));
    }
}

// ============================================================================
// Factory
// ============================================================================

/** Declare a service reading only GET parameters. */
export function defineService<TContext, G, R>(config: GetServiceConfig<TContext, G, R>): Service<TContext, G, undefined, R>;
/** Declare a service reading GET and POST parameters. */
export function defineService<TContext, G, P, R>(config: ServiceConfig<TContext, G, P, R>): Service<TContext, G, P, R>;
export function defineService<TContext, G, P, R>(
    config: GetServiceConfig<TContext, G, R> | ServiceConfig<TContext, G, P, R>,
): Service<TContext, G, undefined, R> | Service<TContext, G, P, R> {
    if (config.post === undefined) {
        const handler = config.handler;
        return new Service<TContext, G, undefined, R>(config.path, config.get, unit, (context, get) => handler(context, get));
    }
    return new Service(config.path, config.get, config.post, config.handler);
}
