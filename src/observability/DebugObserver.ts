/**
 * DebugObserver — Opt-In Tracing for Schema Builds and Validation
 *
 * Typed debug events emitted at each stage: adapting a source, inlining
 * references, synthesizing a model, validating input. Nothing is emitted
 * unless an observer is attached.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, createToolkit } from 'toolshape';
 *
 * // Default: compact console.debug output
 * const toolkit = createToolkit({}, { debug: createDebugObserver() });
 *
 * // Custom handler (e.g. forward to your logger)
 * const toolkit = createToolkit({}, {
 *     debug: createDebugObserver((event) => logger.debug(event)),
 * });
 * ```
 *
 * @module
 */
import { type TypeSourceKind } from '../adapter/TypeSource.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after a source has been turned into a tree */
export interface AdaptEvent {
    readonly type: 'adapt';
    readonly source: TypeSourceKind;
    readonly model: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after references have been inlined and the schema serialized */
export interface CanonicalizeEvent {
    readonly type: 'canonicalize';
    readonly model: string;
    /** Number of top-level properties in the emitted schema */
    readonly properties: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after a live model has been built */
export interface SynthesizeEvent {
    readonly type: 'synthesize';
    readonly model: string;
    readonly fields: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after input validation (pass or fail) */
export interface ValidateEvent {
    readonly type: 'validate';
    readonly model: string;
    readonly valid: boolean;
    readonly errorCount: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted when a stage throws. Validation failures are reported by
 * {@link ValidateEvent}, not here.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly model: string;
    readonly step: 'adapt' | 'canonicalize' | 'synthesize' | 'execute';
    readonly error: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types. Switch on `event.type` to narrow.
 */
export type DebugEvent =
    | AdaptEvent
    | CanonicalizeEvent
    | SynthesizeEvent
    | ValidateEvent
    | ErrorEvent;

/** Observer function that receives debug events */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * With a handler, events go to the handler. Without one, they are
 * printed with `console.debug`:
 *
 * ```
 * [toolshape] adapt     get_weather (function) 0.4ms
 * [toolshape] validate  get_weather ✗ 2 errors 0.1ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[toolshape]';

        switch (event.type) {
            case 'adapt':
                console.debug(`${prefix} adapt     ${event.model} (${event.source}) ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'canonicalize':
                console.debug(`${prefix} schema    ${event.model} ${event.properties} properties ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'synthesize':
                console.debug(`${prefix} model     ${event.model} ${event.fields} fields ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'validate': {
                const status = event.valid
                    ? '✓'
                    : `✗ ${event.errorCount} error${event.errorCount === 1 ? '' : 's'}`;
                console.debug(`${prefix} validate  ${event.model} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} ERROR     ${event.model} [${event.step}] ${event.error}`);
                break;
        }
    };
}

/** Milliseconds elapsed since `start` (a `performance.now()` reading) */
export function elapsed(start: number): number {
    return performance.now() - start;
}
