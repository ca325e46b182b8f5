/**
 * Error Taxonomy
 *
 * Two failure families with different audiences:
 *
 * - {@link SchemaBuildError}: the *developer* handed the library a shape it
 *   cannot express (unsupported annotation, dangling `$ref`, true cycle).
 *   Thrown at construction time and never swallowed.
 * - {@link ValidationFailure}: the *caller* (usually a language model)
 *   supplied input that does not match a synthesized model. Carries the
 *   engine-neutral error records so it can be turned into a feedback
 *   envelope.
 *
 * @example
 * ```typescript
 * try {
 *     weather.call({ city: 42 });
 * } catch (e) {
 *     if (e instanceof ValidationFailure) {
 *         console.log(e.modelName); // "get_weather"
 *         console.log(e.records);   // [{ kind: 'invalid_type', ... }]
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ValidationErrorRecord } from './engine/ValidationEngine.js';

// ── Schema construction ──────────────────────────────────

/** Machine-readable reason attached to every {@link SchemaBuildError} */
export type SchemaBuildErrorCode =
    | 'UNSUPPORTED_ANNOTATION'
    | 'UNRESOLVED_REFERENCE'
    | 'CYCLE'
    | 'EMPTY_SEQUENCE'
    | 'INVALID_SOURCE'
    | 'UNSUPPORTED_CONSTRAINT';

/**
 * A source could not be turned into a schema.
 *
 * `path` locates the offending node inside the source, outermost first
 * (field names, `items`, `anyOf[1]`, definition pointers).
 */
export class SchemaBuildError extends Error {
    readonly code: SchemaBuildErrorCode;
    readonly path: readonly string[];

    constructor(code: SchemaBuildErrorCode, message: string, path: readonly string[] = [], options?: ErrorOptions) {
        const where = path.length > 0 ? ` (at ${path.join('.')})` : '';
        super(`${message}${where}`, options);
        this.name = 'SchemaBuildError';
        this.code = code;
        this.path = path;
    }
}

// ── Input validation ─────────────────────────────────────

/**
 * Input rejected by a synthesized model.
 *
 * `records` keeps the engine's check order. `cause` holds the engine's
 * own error object (a `ZodError` for the default engine) when there is one.
 */
export class ValidationFailure extends Error {
    readonly modelName: string;
    readonly records: readonly ValidationErrorRecord[];

    constructor(modelName: string, records: readonly ValidationErrorRecord[], cause?: unknown) {
        const lines = records
            .map(record => {
                const path = record.locationPath.length > 0
                    ? `'${record.locationPath.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${record.message}`;
            })
            .join('\n');

        super(`[${modelName}] Validation failed:\n${lines}`, { cause });
        this.name = 'ValidationFailure';
        this.modelName = modelName;
        this.records = records;
    }
}
