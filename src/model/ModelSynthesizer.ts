/**
 * ModelSynthesizer — IST → Live Validating Model
 *
 * Inlines a tree, checks that its root is an object, and hands the
 * engine an ordered field list. Whatever the engine, the resulting
 * model's `schema()` equals `canonicalize(tree)` byte for byte.
 *
 * @example
 * ```typescript
 * const tree = adapt({ kind: 'sample', name: 'City', data: { name: 'Lisbon', population: 545000 } });
 * const model = synthesize(tree);
 * model.validate({ name: 'Porto' });
 * // → { ok: false, error: [{ kind: 'missing', locationPath: ['population'], ... }] }
 * ```
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import { type SchemaNode } from '../ist/types.js';
import { inline } from '../schema/SchemaInliner.js';
import { ZodEngine } from '../engine/ZodEngine.js';
import { type IdentifierAllocator } from '../naming/IdentifierAllocator.js';
import { type ModelSpec, type ValidatingModel, type ValidationEngine } from '../engine/ValidationEngine.js';

export interface SynthesizeOptions {
    /** Names models whose root carries none */
    readonly allocator?: IdentifierAllocator;
}

/**
 * Describe `tree` as engine-neutral model fields.
 *
 * @throws {SchemaBuildError} when the inlined root is not an object, or a cycle is found
 */
export function toModelSpec(tree: SchemaNode, options: SynthesizeOptions = {}): ModelSpec {
    const root = inline(tree);
    if (root.kind !== 'object') {
        throw new SchemaBuildError('INVALID_SOURCE', 'Only object schemas can become models');
    }
    const name = root.name ?? options.allocator?.next('Model') ?? 'Model';
    return {
        name,
        ...(root.description !== undefined ? { description: root.description } : {}),
        fields: root.fields.map(f => ({ name: f.name, node: f.node, required: f.required })),
    };
}

/**
 * Build a live model for `tree`.
 *
 * @param engine - Defaults to a {@link ZodEngine} with default options
 * @throws {SchemaBuildError} when the tree cannot be expressed by the engine
 */
export function synthesize(
    tree: SchemaNode,
    engine: ValidationEngine = new ZodEngine(),
    options: SynthesizeOptions = {},
): ValidatingModel {
    return engine.defineModel(toModelSpec(tree, options));
}
