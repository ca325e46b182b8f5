/**
 * ZodEngine — Default Validation Engine
 *
 * Builds {@link ZodModel}s from model descriptions. Validation goes
 * through `safeParse`; failures come back as ordered error records.
 * A model's native schema is produced by `zod-to-json-schema` and, for
 * `schema()`, read back through the SchemaDocument adapter so that it
 * lands in the canonical dialect.
 *
 * @example
 * ```typescript
 * const engine = new ZodEngine({ forbidExtraFields: true });
 * const model = engine.defineModel({
 *     name: 'Point',
 *     fields: [
 *         { name: 'x', node: primitiveNode('number'), required: true },
 *         { name: 'y', node: primitiveNode('number'), required: true },
 *     ],
 * });
 * model.validate({ x: 1, y: 'two' }); // { ok: false, error: [...] }
 * ```
 *
 * @module
 */
import { type z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { SchemaBuildError, ValidationFailure } from '../errors.js';
import { type JsonObject } from '../ist/types.js';
import { isJsonObject, toJsonValue } from '../ist/json.js';
import { adaptDocument } from '../adapter/DocumentAdapter.js';
import { canonicalize, type CanonicalSchema } from '../schema/CanonicalSerializer.js';
import { succeed, fail, type Result } from '../result.js';
import { type DebugObserverFn, elapsed } from '../observability/DebugObserver.js';
import { compileModel, type CompileOptions } from './ZodCompiler.js';
import { toErrorRecords } from './ZodIssueMapper.js';
import {
    type ModelSpec,
    type ValidatingModel,
    type ValidationEngine,
    type ValidationErrorRecord,
} from './ValidationEngine.js';

// ── Engine ───────────────────────────────────────────────

export interface ZodEngineOptions extends CompileOptions {
    /** Receives a `validate` event for every validation */
    readonly debug?: DebugObserverFn;
}

export class ZodEngine implements ValidationEngine {
    constructor(private readonly _options: ZodEngineOptions = {}) {}

    defineModel(spec: ModelSpec): ZodModel {
        return new ZodModel(spec, compileModel(spec, this._options), this._options.debug);
    }

    validate(model: ValidatingModel, input: unknown): Result<Record<string, unknown>, readonly ValidationErrorRecord[]> {
        return model.validate(input);
    }
}

// ── Model ────────────────────────────────────────────────

type CheckOutcome =
    | { readonly ok: true; readonly data: Record<string, unknown> }
    | { readonly ok: false; readonly errors: readonly ValidationErrorRecord[]; readonly cause: z.ZodError };

export class ZodModel implements ValidatingModel {
    readonly name: string;
    readonly description: string | undefined;
    /** The compiled Zod schema, for callers that want to compose it */
    readonly zodSchema: z.AnyZodObject;

    private readonly _debug: DebugObserverFn | undefined;
    private _jsonSchema: JsonObject | undefined;
    private _schema: CanonicalSchema | undefined;

    constructor(spec: ModelSpec, zodSchema: z.AnyZodObject, debug?: DebugObserverFn) {
        this.name = spec.name;
        this.description = spec.description;
        this.zodSchema = zodSchema;
        this._debug = debug;
    }

    validate(input: unknown): Result<Record<string, unknown>, readonly ValidationErrorRecord[]> {
        const checked = this.check(input);
        return checked.ok ? succeed(checked.data) : fail(checked.errors);
    }

    parse(input: unknown): Record<string, unknown> {
        const checked = this.check(input);
        if (checked.ok) return checked.data;
        throw new ValidationFailure(this.name, checked.errors, checked.cause);
    }

    /** One `safeParse`, reported to the debug observer */
    private check(input: unknown): CheckOutcome {
        const start = this._debug ? performance.now() : 0;
        const result = this.zodSchema.safeParse(input);
        const outcome: CheckOutcome = result.success
            ? { ok: true, data: result.data }
            : { ok: false, errors: toErrorRecords(result.error.issues, input), cause: result.error };

        this._debug?.({
            type: 'validate',
            model: this.name,
            valid: outcome.ok,
            errorCount: outcome.ok ? 0 : outcome.errors.length,
            durationMs: elapsed(start),
            timestamp: Date.now(),
        });
        return outcome;
    }

    jsonSchema(): JsonObject {
        if (this._jsonSchema === undefined) {
            const document = toJsonValue(zodToJsonSchema(this.zodSchema, {
                name: definitionKey(this.name),
                definitionPath: '$defs',
                $refStrategy: 'root',
                target: 'jsonSchema7',
            }));
            if (!isJsonObject(document)) {
                throw new SchemaBuildError('INVALID_SOURCE', `zod-to-json-schema returned no object for ${this.name}`);
            }
            this._jsonSchema = document;
        }
        return this._jsonSchema;
    }

    schema(): CanonicalSchema {
        this._schema ??= canonicalize(adaptDocument({ kind: 'document', document: this.jsonSchema(), name: this.name }));
        return this._schema;
    }
}

/** `$defs` key for a model name; pointer syntax characters are replaced */
function definitionKey(name: string): string {
    return name.replace(/[~/%#]/g, '_');
}
