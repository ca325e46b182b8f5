/**
 * ToolFunction — A Callable That Validates Its Own Arguments
 *
 * Pairs a function signature with its handler. The signature becomes a
 * model; every call validates the arguments against it first and hands
 * the handler the validated object, defaults applied.
 *
 * @example
 * ```typescript
 * const getWeather = wrapCallable({
 *     name: 'get_weather',
 *     doc: `Get the current weather for a city.
 *           @param city - City name`,
 *     parameters: [
 *         { name: 'city', type: z.string() },
 *         { name: 'unit', default: 'celsius', kind: 'keyword' },
 *     ],
 *     handler: ({ city, unit }) => `${city}: 21 ${unit}`,
 * });
 *
 * getWeather.definition('anthropic');           // tool definition for the provider
 * getWeather.call({ city: 'Lisbon' });           // "Lisbon: 21 celsius"
 * getWeather.safeCall({});                       // { ok: false, error: <feedback envelope> }
 * ```
 *
 * @module
 */
import { ValidationFailure } from '../errors.js';
import { type JsonObject, type SchemaNode } from '../ist/types.js';
import { adaptFunction, type FunctionSignatureSource } from '../adapter/FunctionAdapter.js';
import { type AdaptOptions } from '../adapter/AdaptOptions.js';
import { canonicalize, type CanonicalSchema } from '../schema/CanonicalSerializer.js';
import { toToolDefinition, type ProviderFormat } from '../schema/ProviderFormats.js';
import { synthesize } from '../model/ModelSynthesizer.js';
import { type ValidatingModel, type ValidationEngine, type ValidationErrorRecord } from '../engine/ValidationEngine.js';
import { feedbackFromError, type FeedbackEnvelope, type TranslateOptions } from '../feedback/ErrorTranslator.js';
import { succeed, fail, type Result } from '../result.js';

// ── Types ────────────────────────────────────────────────

/** Validated arguments handed to a tool handler */
export type ToolArgs = Record<string, unknown>;

export interface ToolDescriptor<TResult> extends Omit<FunctionSignatureSource, 'kind'> {
    readonly handler: (args: ToolArgs) => TResult;
}

export interface WrapOptions extends AdaptOptions, TranslateOptions {
    /** Engine for the argument model; defaults to Zod */
    readonly engine?: ValidationEngine;
}

// ── Public API ───────────────────────────────────────────

/**
 * Wrap a handler and its signature.
 *
 * @throws {SchemaBuildError} when the signature cannot be expressed
 */
export function wrapCallable<TResult>(descriptor: ToolDescriptor<TResult>, options: WrapOptions = {}): ToolFunction<TResult> {
    return new ToolFunction(descriptor, options);
}

export class ToolFunction<TResult = unknown> {
    readonly name: string;
    readonly description: string | undefined;
    readonly model: ValidatingModel;
    /** The signature's tree, before inlining */
    readonly tree: SchemaNode;

    private readonly _handler: (args: ToolArgs) => TResult;
    private readonly _translate: TranslateOptions;
    private _schema: CanonicalSchema | undefined;

    constructor(descriptor: ToolDescriptor<TResult>, options: WrapOptions = {}) {
        const { handler, ...signature } = descriptor;
        this.tree = adaptFunction({ kind: 'function', ...signature }, options);
        this.model = synthesize(this.tree, options.engine);
        this.name = this.model.name;
        this.description = this.model.description;
        this._handler = handler;
        this._translate = options.messageToAssistant !== undefined
            ? { messageToAssistant: options.messageToAssistant }
            : {};
    }

    /** Canonical schema of the arguments */
    schema(): CanonicalSchema {
        this._schema ??= canonicalize(this.tree);
        return this._schema;
    }

    definition(format: ProviderFormat = 'canonical'): JsonObject {
        return toToolDefinition(this.schema(), format);
    }

    /** Validate arguments without calling the handler */
    validate(args: unknown): Result<ToolArgs, readonly ValidationErrorRecord[]> {
        return this.model.validate(args);
    }

    /**
     * Validate, then run the handler.
     *
     * @throws {ValidationFailure} when the arguments do not match
     */
    call(args: unknown): TResult {
        return this.invoke(this.model.parse(args));
    }

    /** Run the handler on arguments that already passed {@link validate} */
    invoke(args: ToolArgs): TResult {
        return this._handler(args);
    }

    /**
     * Parse a JSON argument string, then {@link call}.
     *
     * @throws {ValidationFailure} on malformed JSON (kind `json_invalid`)
     *     or arguments that do not match
     */
    callJson(text: string): TResult {
        return this.call(parseArguments(this.name, text));
    }

    /**
     * {@link call} with validation failures returned as a feedback
     * envelope. Errors thrown by the handler propagate.
     */
    safeCall(args: unknown): Result<TResult, FeedbackEnvelope> {
        const validated = this.model.validate(args);
        if (!validated.ok) {
            return fail(feedbackFromError(new ValidationFailure(this.name, validated.error), this._translate));
        }
        return succeed(this.invoke(validated.value));
    }

    /** Envelope for a failure raised by this tool */
    feedback(error: ValidationFailure): FeedbackEnvelope {
        return feedbackFromError(error, this._translate);
    }
}

/**
 * Parse tool-call arguments sent as JSON text.
 *
 * @throws {ValidationFailure} with a single `json_invalid` record at the root
 */
export function parseArguments(modelName: string, text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ValidationFailure(modelName, [{
            kind: 'json_invalid',
            locationPath: [],
            message: `Invalid JSON: ${reason}`,
            offendingInput: text,
        }], e);
    }
}
