/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so an OTel tracer can be passed to the
 * {@link ServiceRegistry} directly, without an adapter and without an
 * `@opentelemetry/*` dependency.
 *
 * The registry opens one span per dispatch:
 *
 * | Attribute                 | Value                                   |
 * |---------------------------|-----------------------------------------|
 * | `service.path`            | Request path                            |
 * | `service.candidates`      | Services whose path matches             |
 * | `service.decode_error`    | Code of the decode failure, if any      |
 * | `service.duration_ms`     | Total dispatch duration                 |
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const registry = new ServiceRegistry<AppContext>({
 *     tracer: trace.getTracer('service-params'),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0) — request parameters did not decode (client mistake)
 * - `OK` (1) — the handler ran
 * - `ERROR` (2) — the handler threw
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type ParamAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subtype of OTel's `Span`. */
export interface ParamSpan {
    setAttribute(key: string, value: ParamAttributeValue): void;

    setStatus(status: { code: number; message?: string }): void;

    /** Optional: not every tracer implementation supports events. Receives one `service.decode_failed` per rejected candidate. */
    addEvent?(name: string, attributes?: Record<string, ParamAttributeValue>): void;

    /** Called exactly once, in a `finally` block. */
    end(): void;

    recordException(exception: Error | string): void;
}

/** Structural subtype of OTel's `Tracer`. */
export interface ParamTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, ParamAttributeValue>;
    }): ParamSpan;
}
