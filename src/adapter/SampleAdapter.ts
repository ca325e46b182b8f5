/**
 * SampleAdapter — Representative Data → IST
 *
 * Infers a model from one example value per field:
 *
 * ```text
 * { name: 'John', age: 30, is_student: true, tags: ['a'] }
 *   → name: string, age: integer, is_student: boolean, tags: string[]
 * ```
 *
 * A Zod schema in place of a value is read as a type annotation, so
 * `{ city: z.string(), unit: 'celsius' }` mixes both styles.
 *
 * @module
 */
import { z } from 'zod';
import { SchemaBuildError } from '../errors.js';
import { type FieldNode, type NodeMeta, type SchemaNode } from '../ist/types.js';
import { arrayNode, field, objectNode, primitiveNode, withMeta } from '../ist/nodes.js';
import { describeType, isPlainObject } from '../ist/json.js';
import { ZodReader } from './ClassDefAdapter.js';
import { type AdaptOptions, type SamplePolicy, DEFAULT_SAMPLE_POLICY } from './AdaptOptions.js';

// ── Source ───────────────────────────────────────────────

export interface DataSampleSource {
    readonly kind: 'sample';
    readonly name: string;
    readonly description?: string;
    readonly data: Readonly<Record<string, unknown>>;
}

// ── Public API ───────────────────────────────────────────

/**
 * Adapt a data sample.
 *
 * @throws {SchemaBuildError} `EMPTY_SEQUENCE` for an empty array under the
 *     `error` policy, `UNSUPPORTED_ANNOTATION` for values with no JSON type
 */
export function adaptSample(source: DataSampleSource, options: AdaptOptions = {}): SchemaNode {
    if (!isPlainObject(source.data)) {
        throw new SchemaBuildError('INVALID_SOURCE', `A data sample must be a plain object, got ${describeType(source.data)}`);
    }
    const inference = new SampleInference({ ...DEFAULT_SAMPLE_POLICY, ...options.samples });
    return inference.object(source.data, source.name, { name: source.name, description: source.description }, []);
}

/**
 * Infer the node for a single value with the default policy.
 * Used for function parameters that only carry a default.
 */
export function inferFromValue(value: unknown, modelName: string, path: readonly string[]): SchemaNode {
    return new SampleInference(DEFAULT_SAMPLE_POLICY).value(value, modelName, path);
}

// ── Inference ────────────────────────────────────────────

class SampleInference {
    private readonly _zod = new ZodReader();

    constructor(private readonly _policy: SamplePolicy) {}

    object(data: Readonly<Record<string, unknown>>, modelName: string, meta: NodeMeta, path: readonly string[]): SchemaNode {
        const fields: FieldNode[] = Object.entries(data).map(([key, value]) =>
            this.field(key, value, modelName, [...path, key]),
        );
        return objectNode(fields, meta);
    }

    value(value: unknown, modelName: string, path: readonly string[]): SchemaNode {
        if (value instanceof z.ZodType) {
            return this._zod.read(value, path).node;
        }
        if (value === null) return primitiveNode('any');
        if (typeof value === 'boolean') return primitiveNode('boolean');
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) {
                throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', `${value} has no JSON type`, path);
            }
            return primitiveNode(Number.isInteger(value) ? 'integer' : 'number');
        }
        if (typeof value === 'string') return primitiveNode('string');

        if (Array.isArray(value)) {
            const items: readonly unknown[] = value;
            return arrayNode(this.items(items, modelName, path));
        }
        if (isPlainObject(value)) {
            const nestedName = `${modelName}_${capitalize(path.at(-1) ?? 'Item')}`;
            return this.object(value, nestedName, { name: nestedName }, path);
        }

        throw new SchemaBuildError(
            'UNSUPPORTED_ANNOTATION',
            `Cannot infer a schema type from a value of type ${describeType(value)}`,
            path,
        );
    }

    private field(key: string, value: unknown, modelName: string, path: readonly string[]): FieldNode {
        if (value instanceof z.ZodType) {
            const { node, optional } = this._zod.read(value, path);
            return field(key, node, !optional);
        }

        if (typeof value === 'string' && this._policy.stringsAsDescriptions) {
            return field(key, primitiveNode('string', { description: value }), true);
        }

        const node = this.value(value, modelName, path);
        if (this._policy.valuesAsDefaults && isScalar(value)) {
            return field(key, withMeta(node, { default: value }), false);
        }
        return field(key, node, true);
    }

    /** Item type from the first element */
    private items(items: readonly unknown[], modelName: string, path: readonly string[]): SchemaNode {
        if (items.length === 0) {
            if (this._policy.emptyArrays === 'error') {
                throw new SchemaBuildError('EMPTY_SEQUENCE', 'Cannot infer an item type from an empty array', path);
            }
            return primitiveNode('any');
        }
        const [first] = items;
        if (isPlainObject(first)) {
            const itemName = `${modelName}_Item`;
            return this.object(first, itemName, { name: itemName }, [...path, '0']);
        }
        return this.value(first, modelName, [...path, '0']);
    }
}

// ── Helpers ──────────────────────────────────────────────

function isScalar(value: unknown): value is string | number | boolean | null {
    return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1);
}
