/**
 * DebugObserver — Opt-In Dispatch Events
 *
 * Structured, typed events emitted by the {@link ServiceRegistry} at each
 * step of a dispatch. Nothing is emitted unless an observer is passed in.
 * The encode/decode core never logs.
 *
 * @example
 * ```typescript
 * // Default: compact console.debug output
 * const registry = new ServiceRegistry({ debug: createDebugObserver() });
 *
 * // Custom handler
 * const registry = new ServiceRegistry({
 *     debug: createDebugObserver((event) => metrics.increment(event.type)),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** A request path matched at least one registered service. */
export interface RouteEvent {
    readonly type: 'route';
    readonly path: string;
    /** Number of services tried, in registration order */
    readonly candidates: number;
    readonly timestamp: number;
}

/** GET and POST parameters of one candidate were decoded (or not). */
export interface DecodeEvent {
    readonly type: 'decode';
    readonly path: string;
    /** Fingerprints of the candidate, `get:post` */
    readonly service: string;
    readonly valid: boolean;
    /** One-line decode error when `valid` is false */
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** A handler ran to completion. */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly path: string;
    readonly service: string;
    /** Total milliseconds from route to handler result */
    readonly durationMs: number;
    readonly timestamp: number;
}

/** A handler, or routing itself, threw. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly path: string;
    readonly error: string;
    readonly step: 'route' | 'execute';
    readonly timestamp: number;
}

/**
 * Union of all debug events.
 *
 * ```typescript
 * switch (event.type) {
 *     case 'route':   // RouteEvent
 *     case 'decode':  // DecodeEvent
 *     case 'execute': // ExecuteEvent
 *     case 'error':   // ErrorEvent
 * }
 * ```
 */
export type DebugEvent =
    | RouteEvent
    | DecodeEvent
    | ExecuteEvent
    | ErrorEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * Without a handler, events are written to `console.debug`:
 *
 * ```
 * [service-params] route     /search (2 candidates)
 * [service-params] decode    /search ✗ [MISSING_PARAMETER] q: Missing parameter 'q' 0.1ms
 * [service-params] decode    /search ✓ 0.1ms
 * [service-params] execute   /search ✓ 1.4ms
 * ```
 *
 * @param handler - Custom event handler, returned as-is
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[service-params]';

        switch (event.type) {
            case 'route':
                console.debug(`${prefix} route     ${event.path} (${event.candidates} candidate${event.candidates === 1 ? '' : 's'})`);
                break;

            case 'decode': {
                const status = event.valid ? '✓' : `✗ ${event.error ?? ''}`;
                console.debug(`${prefix} decode    ${event.path} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'execute':
                console.debug(`${prefix} execute   ${event.path} ✓ ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.path} [${event.step}] ${event.error}`);
                break;
        }
    };
}
