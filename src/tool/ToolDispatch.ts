/**
 * ToolDispatch — Name-Keyed Registry and Call Routing
 *
 * Holds wrapped tools by name, lists their definitions for a provider,
 * and routes incoming tool calls. Argument validation failures come back
 * as feedback envelopes; anything the handler itself throws propagates.
 *
 * @example
 * ```typescript
 * const dispatch = new ToolDispatch(getWeather, getTime);
 *
 * dispatch.definitions('openai');   // send to the provider
 *
 * const reply = await dispatch.dispatch('get_weather', { city: 'Lisbon' });
 * if (reply.success) use(reply.result);
 * else sendBack(reply);             // feedback envelope for the model
 * ```
 *
 * @module
 */
import { ValidationFailure } from '../errors.js';
import { type JsonObject } from '../ist/types.js';
import { type ProviderFormat } from '../schema/ProviderFormats.js';
import { type FeedbackEnvelope } from '../feedback/ErrorTranslator.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { parseArguments, type ToolFunction } from './ToolFunction.js';

// ── Types ────────────────────────────────────────────────

export interface DispatchSuccess<TResult = unknown> {
    readonly success: true;
    readonly result: TResult;
}

export type DispatchOutcome<TResult = unknown> = DispatchSuccess<TResult> | FeedbackEnvelope;

// ============================================================================
// ToolDispatch
// ============================================================================

export class ToolDispatch {
    private readonly _tools = new Map<string, ToolFunction>();
    private _debug: DebugObserverFn | undefined;

    constructor(...tools: ToolFunction[]) {
        this.registerAll(...tools);
    }

    /**
     * Register a tool under its name.
     * @throws If a tool with the same name is already registered
     */
    register(tool: ToolFunction): void {
        if (this._tools.has(tool.name)) {
            throw new Error(`Tool "${tool.name}" is already registered.`);
        }
        this._tools.set(tool.name, tool);
    }

    registerAll(...tools: ToolFunction[]): void {
        for (const tool of tools) {
            this.register(tool);
        }
    }

    has(name: string): boolean {
        return this._tools.has(name);
    }

    /**
     * @throws If no tool is registered under `name`
     */
    get(name: string): ToolFunction {
        const tool = this._tools.get(name);
        if (tool === undefined) {
            throw new Error(`Tool "${name}" not found in dispatcher. Available: ${this.names().join(', ') || '(none)'}`);
        }
        return tool;
    }

    /**
     * Unregister and return a tool.
     * @throws If no tool is registered under `name`
     */
    remove(name: string): ToolFunction {
        const tool = this.get(name);
        this._tools.delete(name);
        return tool;
    }

    clear(): void {
        this._tools.clear();
    }

    get size(): number {
        return this._tools.size;
    }

    /** Registered names, in registration order */
    names(): string[] {
        return [...this._tools.keys()];
    }

    /** Tool definitions for `format`, in registration order */
    definitions(format: ProviderFormat = 'canonical'): JsonObject[] {
        return [...this._tools.values()].map(tool => tool.definition(format));
    }

    /**
     * A new dispatcher holding the tools of both.
     * @throws If both hold a tool with the same name
     */
    merge(other: ToolDispatch): ToolDispatch {
        const merged = new ToolDispatch(...this._tools.values(), ...other._tools.values());
        const debug = this._debug ?? other._debug;
        if (debug) merged.enableDebug(debug);
        return merged;
    }

    /**
     * Report handler failures to `observer` as `error` events.
     */
    enableDebug(observer: DebugObserverFn): void {
        this._debug = observer;
    }

    /**
     * Route a call. `args` may be an object or its JSON text.
     *
     * @throws If no tool is registered under `name`
     * @throws Whatever the handler throws, a {@link ValidationFailure} included
     */
    async dispatch(name: string, args: unknown): Promise<DispatchOutcome> {
        const tool = this.get(name);

        let input = args;
        if (typeof args === 'string') {
            try {
                input = parseArguments(tool.name, args);
            } catch (err) {
                if (err instanceof ValidationFailure) return tool.feedback(err);
                throw err;
            }
        }

        const validated = tool.validate(input);
        if (!validated.ok) {
            return tool.feedback(new ValidationFailure(tool.name, validated.error));
        }

        try {
            const result: unknown = await tool.invoke(validated.value);
            return { success: true, result };
        } catch (err) {
            this._debug?.({
                type: 'error',
                model: tool.name,
                step: 'execute',
                error: err instanceof Error ? err.message : String(err),
                timestamp: Date.now(),
            });
            throw err;
        }
    }
}
