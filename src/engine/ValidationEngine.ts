/**
 * ValidationEngine — The Narrow Seam to the Validation Library
 *
 * The model synthesizer never talks to a validation library directly.
 * It hands the engine an engine-neutral {@link ModelSpec} and gets back a
 * {@link ValidatingModel}. Failures come back as ordered
 * {@link ValidationErrorRecord}s, which is all the error translator reads.
 *
 * The default engine is Zod (`ZodEngine.ts`).
 *
 * @module
 */
import { type SchemaNode, type JsonObject } from '../ist/types.js';
import { type CanonicalSchema } from '../schema/CanonicalSerializer.js';
import { type Result } from '../result.js';

// ── Error records ────────────────────────────────────────

/**
 * One validation failure as reported by the engine.
 *
 * Any extra keys an engine attaches are kept and passed through to the
 * feedback envelope untouched.
 */
export interface ValidationErrorRecord {
    /** Error category, e.g. `missing`, `invalid_type`, `too_small` */
    readonly kind: string;
    /** Field names and array indices from the root to the failing value */
    readonly locationPath: readonly (string | number)[];
    readonly message: string;
    /** The value that failed (for `missing`: the enclosing object) */
    readonly offendingInput: unknown;
    /** Check-specific details, e.g. `{ expected: 'number', received: 'string' }` */
    readonly context?: Readonly<Record<string, unknown>>;
    readonly [extra: string]: unknown;
}

// ── Model description ────────────────────────────────────

/** One field of a model, in declaration order */
export interface FieldSpec {
    readonly name: string;
    /** Inlined node: no `reference` nodes anywhere below it */
    readonly node: SchemaNode;
    readonly required: boolean;
}

export interface ModelSpec {
    readonly name: string;
    readonly description?: string;
    readonly fields: readonly FieldSpec[];
}

// ── Live model ───────────────────────────────────────────

/**
 * A validating model produced by an engine.
 *
 * @typeParam T - Shape of a successfully validated value
 */
export interface ValidatingModel<T = Record<string, unknown>> {
    readonly name: string;
    readonly description: string | undefined;

    /** Validate without throwing */
    validate(input: unknown): Result<T, readonly ValidationErrorRecord[]>;

    /**
     * Validate and return the value with defaults applied.
     * @throws {ValidationFailure} when the input does not match
     */
    parse(input: unknown): T;

    /** The engine's own JSON schema for this model, before normalization */
    jsonSchema(): JsonObject;

    /** The engine's JSON schema re-normalized into the canonical dialect */
    schema(): CanonicalSchema;
}

/**
 * Builds live models from engine-neutral descriptions.
 */
export interface ValidationEngine {
    /**
     * @throws {SchemaBuildError} when a node cannot be expressed by the engine
     */
    defineModel(spec: ModelSpec): ValidatingModel;

    validate(model: ValidatingModel, input: unknown): Result<Record<string, unknown>, readonly ValidationErrorRecord[]>;
}
