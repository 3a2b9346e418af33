/**
 * ServiceRegistry.test.ts — Registration, Routing & Dispatch
 *
 * Categories:
 * 1. Registration — duplicates, has(), size
 * 2. Routing — shared paths, suffixes, trailing slash, not found
 * 3. POST — body pairs and uploads
 * 4. Decode options — strict mode through the registry
 * 5. Debug events — sequence per dispatch
 * 6. Tracing — one span per dispatch, status codes
 */
import { describe, it, expect } from 'vitest';
import { int, string, file, unit } from '../../src/params/leaves.js';
import { product, opt } from '../../src/params/composite.js';
import { suffix } from '../../src/params/suffix.js';
import { MissingParameterError, UnexpectedParameterError, UnexpectedSegmentsError } from '../../src/params/errors.js';
import { defineService } from '../../src/service/defineService.js';
import { ServiceNotFoundError, ServiceRegistry, type ServiceRegistryOptions } from '../../src/service/ServiceRegistry.js';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';
import type { ParamAttributeValue, ParamSpan, ParamTracer } from '../../src/observability/Tracing.js';

// ============================================================================
// Fixtures
// ============================================================================

interface AppContext {
    readonly user: string;
}

const ctx: AppContext = { user: 'ada' };

const search = defineService({
    path: '/search',
    get: product(string('q'), opt(int('page'))),
    handler: (c: AppContext, [q, page]) => `${c.user} searched ${q} p${page ?? 1}`,
});

const byId = defineService({
    path: '/item',
    get: int('id'),
    handler: (_c: AppContext, id) => `item #${id}`,
});

const byName = defineService({
    path: '/item',
    get: string('name'),
    handler: (_c: AppContext, name) => `item ${name}`,
});

const article = defineService({
    path: '/blog',
    get: suffix(product(int('year'), string('slug'))),
    handler: (_c: AppContext, [year, slug]) => `${year}/${slug}`,
});

const upload = defineService({
    path: '/upload',
    get: unit,
    post: product(string('title'), file('doc')),
    handler: (_c: AppContext, _get, [title, doc]) => `${title}: ${doc.originalBasename} (${doc.filesize} bytes)`,
});

function createRegistry(options: ServiceRegistryOptions = {}): ServiceRegistry<AppContext, string> {
    const registry = new ServiceRegistry<AppContext, string>(options);
    registry.registerAll(search, byId, byName, article, upload);
    return registry;
}

interface MockSpanData {
    name: string;
    attributes: Map<string, ParamAttributeValue>;
    events: Array<{ name: string; attributes?: Record<string, ParamAttributeValue> }>;
    status: { code: number; message?: string } | null;
    exceptions: Array<Error | string>;
    ended: boolean;
}

function createMockTracer(): { tracer: ParamTracer; spans: MockSpanData[] } {
    const spans: MockSpanData[] = [];

    const tracer: ParamTracer = {
        startSpan(name, options) {
            const data: MockSpanData = {
                name,
                attributes: new Map(Object.entries(options?.attributes ?? {})),
                events: [],
                status: null,
                exceptions: [],
                ended: false,
            };

            const span: ParamSpan = {
                setAttribute(key, value) { data.attributes.set(key, value); },
                setStatus(status) { data.status = status; },
                addEvent(eventName, attrs) { data.events.push({ name: eventName, attributes: attrs }); },
                end() { data.ended = true; spans.push(data); },
                recordException(exc) { data.exceptions.push(exc); },
            };

            return span;
        },
    };

    return { tracer, spans };
}

// ============================================================================
// 1. Registration
// ============================================================================

describe('registration', () => {
    it('counts registered services', () => {
        expect(createRegistry().size).toBe(5);
    });

    it('rejects a second service with the same path and parameters', () => {
        const registry = createRegistry();
        const twin = defineService({ path: '/item/', get: int('id'), handler: () => 'twin' });
        expect(() => registry.register(twin)).toThrow('A service with the same parameters is already registered on "/item".');
    });

    it('accepts the same parameters on another path', () => {
        const registry = createRegistry();
        registry.register(defineService({ path: '/other', get: int('id'), handler: () => 'other' }));
        expect(registry.size).toBe(6);
    });

    it('knows which paths are served', () => {
        const registry = createRegistry();
        expect(registry.has('/item')).toBe(true);
        expect(registry.has('item/')).toBe(true);
        expect(registry.has('/item/x')).toBe(false);
        expect(registry.has('/nowhere')).toBe(false);
    });

    it('validates decode options up front', () => {
        expect(() => new ServiceRegistry({ decode: JSON.parse('{"strict":1}') })).toThrow(TypeError);
    });
});

// ============================================================================
// 2. Routing
// ============================================================================

describe('routing', () => {
    it('passes the context and decoded values to the handler', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/search', query: [['q', 'tea'], ['page', '3']] });
        expect(result).toEqual({ ok: true, value: 'ada searched tea p3' });
    });

    it('tries services sharing a path in registration order', async () => {
        const registry = createRegistry();
        expect(await registry.dispatch(ctx, { path: '/item', query: [['id', '12']] }))
            .toEqual({ ok: true, value: 'item #12' });
        expect(await registry.dispatch(ctx, { path: '/item', query: [['name', 'lamp']] }))
            .toEqual({ ok: true, value: 'item lamp' });
    });

    it('returns the first decode error when no candidate decodes', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/item' });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(MissingParameterError);
            expect(result.error.message).toBe("Missing parameter 'id'");
        }
    });

    it('decodes percent-encoded suffix segments', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/blog/2024/hello%20world' });
        expect(result).toEqual({ ok: true, value: '2024/hello world' });
    });

    it('builds links that route back to the same service', async () => {
        const link = article.uri([2024, 'a/b c']);
        expect(link).toBe('/blog/2024/a%2Fb%20c');
        expect(await createRegistry().dispatch(ctx, { path: link })).toEqual({ ok: true, value: '2024/a/b c' });
    });

    it('rejects extra suffix segments', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/blog/2024/x/extra' });
        expect(result.ok ? undefined : result.error).toBeInstanceOf(UnexpectedSegmentsError);
    });

    it('tolerates a trailing slash on services without a suffix', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/search/', query: [['q', 'tea']] });
        expect(result).toEqual({ ok: true, value: 'ada searched tea p1' });
    });

    it('does not route extra segments to services without a suffix', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/search/x', query: [['q', 'tea']] });
        expect(result.ok ? undefined : result.error).toBeInstanceOf(ServiceNotFoundError);
    });

    it('reports unknown paths', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/nowhere' });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe('SERVICE_NOT_FOUND');
            expect(result.error.message).toBe("No service registered for '/nowhere'");
        }
    });

    it('treats malformed percent-encoding as not found', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/blog/%E0%A4%A' });
        expect(result.ok ? undefined : result.error).toBeInstanceOf(ServiceNotFoundError);
    });

    it('propagates handler exceptions', async () => {
        const registry = new ServiceRegistry<AppContext, string>();
        registry.register(defineService({
            path: '/boom',
            get: unit,
            handler: (): string => { throw new Error('handler failed'); },
        }));
        await expect(registry.dispatch(ctx, { path: '/boom' })).rejects.toThrow('handler failed');
    });

    it('awaits async handlers', async () => {
        const registry = new ServiceRegistry<AppContext, string>();
        registry.register(defineService({ path: '/later', get: unit, handler: async (c: AppContext) => `hi ${c.user}` }));
        expect(await registry.dispatch(ctx, { path: '/later' })).toEqual({ ok: true, value: 'hi ada' });
    });
});

// ============================================================================
// 3. POST
// ============================================================================

describe('POST parameters', () => {
    const doc = { tmpFilename: '/tmp/upload-1', filesize: 12, rawOriginalBasename: 'C:\\notes.txt', originalBasename: 'notes.txt' };

    it('decodes body pairs and uploads', async () => {
        const result = await createRegistry().dispatch(ctx, {
            path: '/upload',
            body: [['title', 'Notes']],
            files: [['doc', doc]],
        });
        expect(result).toEqual({ ok: true, value: 'Notes: notes.txt (12 bytes)' });
    });

    it('does not read body parameters from the query', async () => {
        const result = await createRegistry().dispatch(ctx, {
            path: '/upload',
            query: [['title', 'Notes']],
            files: [['doc', doc]],
        });
        expect(result.ok ? undefined : result.error.key).toBe('title');
    });

    it('rejects malformed upload metadata', async () => {
        const result = await createRegistry().dispatch(ctx, {
            path: '/upload',
            body: [['title', 'Notes']],
            files: [['doc', { tmpFilename: '' }]],
        });
        expect(result.ok ? undefined : result.error.code).toBe('FILE_FIELD');
    });
});

// ============================================================================
// 4. Decode options
// ============================================================================

describe('decode options', () => {
    it('ignores unknown keys by default', async () => {
        const result = await createRegistry().dispatch(ctx, { path: '/item', query: [['id', '1'], ['utm', 'x']] });
        expect(result).toEqual({ ok: true, value: 'item #1' });
    });

    it('applies strict mode to every service', async () => {
        const result = await createRegistry({ decode: { strict: true } })
            .dispatch(ctx, { path: '/item', query: [['id', '1'], ['utm', 'x']] });
        expect(result.ok ? undefined : result.error).toBeInstanceOf(UnexpectedParameterError);
    });
});

// ============================================================================
// 5. Debug events
// ============================================================================

describe('debug events', () => {
    it('emits route, decode and execute events in order', async () => {
        const events: DebugEvent[] = [];
        const registry = createRegistry({ debug: createDebugObserver(event => events.push(event)) });

        await registry.dispatch(ctx, { path: '/item', query: [['name', 'lamp']] });

        expect(events.map(event => event.type)).toEqual(['route', 'decode', 'decode', 'execute']);
        expect(events[0]).toMatchObject({ type: 'route', path: '/item', candidates: 2 });
        expect(events[1]).toMatchObject({ type: 'decode', valid: false, error: "[MISSING_PARAMETER] id: Missing parameter 'id'" });
        expect(events[2]).toMatchObject({ type: 'decode', valid: true });
        expect(events[3]).toMatchObject({ type: 'execute', path: '/item' });
    });

    it('labels decode events with the candidate fingerprints', async () => {
        const events: DebugEvent[] = [];
        const registry = createRegistry({ debug: createDebugObserver(event => events.push(event)) });

        await registry.dispatch(ctx, { path: '/item', query: [['id', '1']] });

        expect(events[1]).toMatchObject({ service: `${byId.fingerprint.get}:${byId.fingerprint.post}` });
    });

    it('emits a route error for unknown paths', async () => {
        const events: DebugEvent[] = [];
        const registry = createRegistry({ debug: createDebugObserver(event => events.push(event)) });

        await registry.dispatch(ctx, { path: '/nowhere' });

        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({ type: 'error', step: 'route', error: 'No matching service' });
    });

    it('emits an execute error when the handler throws', async () => {
        const events: DebugEvent[] = [];
        const registry = new ServiceRegistry<void, string>({ debug: createDebugObserver(event => events.push(event)) });
        registry.register(defineService({ path: '/boom', get: unit, handler: (): string => { throw new Error('kaput'); } }));

        await expect(registry.dispatch(undefined, { path: '/boom' })).rejects.toThrow('kaput');

        expect(events.map(event => event.type)).toEqual(['route', 'decode', 'error']);
        expect(events[2]).toMatchObject({ step: 'execute', error: 'kaput' });
    });
});

// ============================================================================
// 6. Tracing
// ============================================================================

describe('tracing', () => {
    it('opens and ends one span per dispatch', async () => {
        const { tracer, spans } = createMockTracer();
        const registry = createRegistry({ tracer });

        await registry.dispatch(ctx, { path: '/item', query: [['id', '1']] });
        await registry.dispatch(ctx, { path: '/nowhere' });

        expect(spans).toHaveLength(2);
        expect(spans.every(span => span.ended && span.name === 'service.dispatch')).toBe(true);
    });

    it('marks a handled request OK', async () => {
        const { tracer, spans } = createMockTracer();
        await createRegistry({ tracer }).dispatch(ctx, { path: '/item', query: [['name', 'lamp']] });

        const span = spans[0];
        expect(span?.status?.code).toBe(1);
        expect(span?.attributes.get('service.path')).toBe('/item');
        expect(span?.attributes.get('service.candidates')).toBe(2);
        expect(typeof span?.attributes.get('service.duration_ms')).toBe('number');
        expect(span?.events).toEqual([{
            name: 'service.decode_failed',
            attributes: {
                'service.fingerprint': `${byId.fingerprint.get}:${byId.fingerprint.post}`,
                'error.code': 'MISSING_PARAMETER',
            },
        }]);
    });

    it('leaves decode failures UNSET with the error code', async () => {
        const { tracer, spans } = createMockTracer();
        await createRegistry({ tracer }).dispatch(ctx, { path: '/search' });

        expect(spans[0]?.status).toEqual({ code: 0, message: "Missing parameter 'q'" });
        expect(spans[0]?.attributes.get('service.decode_error')).toBe('MISSING_PARAMETER');
    });

    it('marks handler exceptions as ERROR', async () => {
        const { tracer, spans } = createMockTracer();
        const registry = new ServiceRegistry<void, string>({ tracer });
        registry.register(defineService({ path: '/boom', get: unit, handler: (): string => { throw new Error('kaput'); } }));

        await expect(registry.dispatch(undefined, { path: '/boom' })).rejects.toThrow('kaput');

        expect(spans[0]?.status).toEqual({ code: 2, message: 'kaput' });
        expect(spans[0]?.exceptions).toHaveLength(1);
        expect(spans[0]?.ended).toBe(true);
    });
});
