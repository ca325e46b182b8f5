/**
 * FunctionAdapter — Callable Signatures → IST
 *
 * A signature is described explicitly, since TypeScript erases parameter
 * types at runtime: each parameter carries a Zod type, a default, or both.
 *
 * - positional parameters come first, then keyword parameters, each group
 *   in declaration order
 * - `variadic` parameters are not part of the model
 * - a default makes the parameter optional; with no type, the default's
 *   value decides the type
 * - the doc comment supplies the model description and any parameter
 *   description not given explicitly
 *
 * @example
 * ```typescript
 * adaptFunction({
 *     kind: 'function',
 *     name: 'get_weather',
 *     doc: `Get the current weather.
 *           @param city - City name`,
 *     parameters: [
 *         { name: 'city', type: z.string() },
 *         { name: 'unit', default: 'celsius', kind: 'keyword' },
 *     ],
 * });
 * ```
 *
 * @module
 */
import { type ZodTypeAny } from 'zod';
import { SchemaBuildError } from '../errors.js';
import { type FieldNode, type SchemaNode } from '../ist/types.js';
import { field, objectNode, withMeta } from '../ist/nodes.js';
import { toJsonValue } from '../ist/json.js';
import { ZodReader } from './ClassDefAdapter.js';
import { inferFromValue } from './SampleAdapter.js';
import { parseDocComment } from './DocComment.js';
import { type AdaptOptions, anonymousName } from './AdaptOptions.js';

// ── Source ───────────────────────────────────────────────

export type ParameterKind = 'positional' | 'keyword' | 'variadic';

export interface ParameterDescriptor {
    readonly name: string;
    /** Type annotation */
    readonly type?: ZodTypeAny;
    /** Default value; `undefined` means "no default" */
    readonly default?: unknown;
    readonly description?: string;
    /** @defaultValue `'positional'` */
    readonly kind?: ParameterKind;
}

export interface FunctionSignatureSource {
    readonly kind: 'function';
    /** Omitted for anonymous functions: a `function_N` name is allocated */
    readonly name?: string;
    readonly description?: string;
    /** Doc comment text (`/** ... *\/` block or bare) */
    readonly doc?: string;
    readonly parameters: readonly ParameterDescriptor[];
}

// ── Public API ───────────────────────────────────────────

/**
 * Adapt a function signature.
 *
 * @throws {SchemaBuildError} `UNSUPPORTED_ANNOTATION` when a parameter has
 *     neither a type nor a default
 */
export function adaptFunction(source: FunctionSignatureSource, options: AdaptOptions = {}): SchemaNode {
    const docs = parseDocComment(source.doc ?? '');
    const name = source.name || anonymousName(options, 'function');
    const reader = new ZodReader();

    const fields: FieldNode[] = orderParameters(source.parameters).map(param => {
        const path = [param.name];
        const hasDefault = param.default !== undefined;

        let node: SchemaNode;
        let optional = hasDefault;
        if (param.type !== undefined) {
            const read = reader.read(param.type, path);
            node = read.node;
            optional ||= read.optional;
        } else if (hasDefault) {
            node = inferFromValue(param.default, name, path);
        } else {
            throw new SchemaBuildError(
                'UNSUPPORTED_ANNOTATION',
                `Parameter "${param.name}" of ${name} has neither a type annotation nor a default`,
                path,
            );
        }

        node = withMeta(node, {
            description: param.description ?? node.description ?? docs.params.get(param.name),
            default: hasDefault ? toJsonValue(param.default, [...path, 'default']) : undefined,
        });
        return field(param.name, node, !optional);
    });

    return objectNode(fields, { name, description: source.description ?? docs.summary });
}

/** Positional, then keyword; variadic parameters dropped */
export function orderParameters(parameters: readonly ParameterDescriptor[]): ParameterDescriptor[] {
    const positional = parameters.filter(p => (p.kind ?? 'positional') === 'positional');
    const keyword = parameters.filter(p => p.kind === 'keyword');
    return [...positional, ...keyword];
}
