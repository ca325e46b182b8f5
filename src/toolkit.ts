/**
 * createToolkit — One Entry Point With Shared Settings
 *
 * Wires configuration, the debug observer, the identifier allocator and
 * the validation engine once, so every call below uses the same ones.
 *
 * @example
 * ```typescript
 * import { createToolkit, loadConfig } from 'toolshape';
 *
 * const toolkit = createToolkit(loadConfig());
 *
 * const Order = { kind: 'class', name: 'Order', schema: z.object({ id: z.string() }) } as const;
 * toolkit.canonicalize(Order);          // canonical schema
 * toolkit.definition(Order, 'openai');  // provider tool definition
 * toolkit.model(Order).validate({});    // { ok: false, error: [...] }
 * ```
 *
 * @module
 */
import { type SchemaNode, type JsonObject } from './ist/types.js';
import { adapt as adaptSource, type TypeSource } from './adapter/TypeSource.js';
import { type AdaptOptions } from './adapter/AdaptOptions.js';
import { canonicalize as canonicalizeTree, type CanonicalSchema } from './schema/CanonicalSerializer.js';
import { toToolDefinition, type ProviderFormat } from './schema/ProviderFormats.js';
import { synthesize } from './model/ModelSynthesizer.js';
import { ZodEngine } from './engine/ZodEngine.js';
import { type ValidatingModel, type ValidationEngine, type ValidationErrorRecord } from './engine/ValidationEngine.js';
import { IdentifierAllocator } from './naming/IdentifierAllocator.js';
import { translate, type FeedbackEnvelope } from './feedback/ErrorTranslator.js';
import { ValidationFailure } from './errors.js';
import { wrapCallable, type ToolDescriptor, type ToolFunction } from './tool/ToolFunction.js';
import { ToolDispatch } from './tool/ToolDispatch.js';
import { mergeConfig, type PartialConfig, type ToolkitConfig } from './config/ToolkitConfig.js';
import { createDebugObserver, elapsed, type DebugObserverFn, type ErrorEvent } from './observability/DebugObserver.js';

// ── Types ────────────────────────────────────────────────

export interface ToolkitOptions {
    /** Receives debug events; overrides `config.debug` */
    readonly debug?: DebugObserverFn;
    /** Shared namespace for anonymous model names; a private one otherwise */
    readonly allocator?: IdentifierAllocator;
    /** Replaces the Zod engine built from `config.models` */
    readonly engine?: ValidationEngine;
}

export interface Toolkit {
    readonly config: ToolkitConfig;
    readonly allocator: IdentifierAllocator;
    readonly engine: ValidationEngine;

    /** Source → tree */
    adapt(source: TypeSource): SchemaNode;
    /** Source → canonical schema */
    canonicalize(source: TypeSource): CanonicalSchema;
    /** Source → live model */
    model(source: TypeSource): ValidatingModel;
    /** Source → provider tool definition (`config.output.format` by default) */
    definition(source: TypeSource, format?: ProviderFormat): JsonObject;
    wrap<TResult>(descriptor: ToolDescriptor<TResult>): ToolFunction<TResult>;
    dispatcher(...tools: ToolFunction[]): ToolDispatch;
    /** Feedback envelope with the configured message */
    feedback(failure: ValidationFailure | readonly ValidationErrorRecord[]): FeedbackEnvelope;
}

// ── Factory ──────────────────────────────────────────────

export function createToolkit(config: PartialConfig = {}, options: ToolkitOptions = {}): Toolkit {
    const settings = mergeConfig(config);
    const debug = options.debug ?? (settings.debug ? createDebugObserver() : undefined);
    const allocator = options.allocator ?? new IdentifierAllocator();
    const engine = options.engine ?? new ZodEngine({
        forbidExtraFields: settings.models.forbidExtraFields,
        ...(debug !== undefined ? { debug } : {}),
    });
    const adaptOptions: AdaptOptions = { allocator, samples: settings.samples };
    const translateOptions = { messageToAssistant: settings.messageToAssistant };

    /** Run `step`, reporting a thrown error before rethrowing it */
    function traced<T>(model: string, step: ErrorEvent['step'], run: () => T): T {
        try {
            return run();
        } catch (err) {
            debug?.({
                type: 'error',
                model,
                step,
                error: err instanceof Error ? err.message : String(err),
                timestamp: Date.now(),
            });
            throw err;
        }
    }

    function adapt(source: TypeSource): SchemaNode {
        const start = debug ? performance.now() : 0;
        const tree = traced(sourceLabel(source), 'adapt', () => adaptSource(source, adaptOptions));
        debug?.({
            type: 'adapt',
            source: source.kind,
            model: tree.name ?? sourceLabel(source),
            durationMs: elapsed(start),
            timestamp: Date.now(),
        });
        return tree;
    }

    function canonicalize(source: TypeSource): CanonicalSchema {
        const tree = adapt(source);
        const label = tree.name ?? sourceLabel(source);
        const start = debug ? performance.now() : 0;
        const schema = traced(label, 'canonicalize', () => canonicalizeTree(tree));
        debug?.({
            type: 'canonicalize',
            model: label,
            properties: Object.keys(schema.properties).length,
            durationMs: elapsed(start),
            timestamp: Date.now(),
        });
        return schema;
    }

    function model(source: TypeSource): ValidatingModel {
        const tree = adapt(source);
        const label = tree.name ?? sourceLabel(source);
        const start = debug ? performance.now() : 0;
        const built = traced(label, 'synthesize', () => synthesize(tree, engine, { allocator }));
        debug?.({
            type: 'synthesize',
            model: built.name,
            fields: tree.kind === 'object' ? tree.fields.length : 0,
            durationMs: elapsed(start),
            timestamp: Date.now(),
        });
        return built;
    }

    return {
        config: settings,
        allocator,
        engine,
        adapt,
        canonicalize,
        model,

        definition(source, format = settings.output.format) {
            return toToolDefinition(canonicalize(source), format);
        },

        wrap<TResult>(descriptor: ToolDescriptor<TResult>): ToolFunction<TResult> {
            return wrapCallable(descriptor, { ...adaptOptions, ...translateOptions, engine });
        },

        dispatcher(...tools) {
            const dispatch = new ToolDispatch(...tools);
            if (debug) dispatch.enableDebug(debug);
            return dispatch;
        },

        feedback(failure) {
            const records = failure instanceof ValidationFailure ? failure.records : failure;
            return translate(records, translateOptions);
        },
    };
}

function sourceLabel(source: TypeSource): string {
    return source.name ?? `(${source.kind})`;
}
