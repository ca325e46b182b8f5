/**
 * ClassDefAdapter — Zod Type Definitions → IST
 *
 * Walks a Zod schema and rebuilds it as an Intermediate Schema Tree.
 * Field order is the order of the object shape. `.describe()` text is the
 * node description, `.optional()` and `.default()` make a field
 * non-required, `.nullable()` is a union with `null`.
 *
 * `z.lazy()` is the only way a Zod schema can refer to itself, so every
 * lazy instance becomes one shared definition behind a reference node.
 * A lazy that reaches itself is reported as a cycle by the inliner.
 *
 * @example
 * ```typescript
 * adaptClassDef({
 *     kind: 'class',
 *     name: 'Order',
 *     schema: z.object({
 *         id: z.string().uuid(),
 *         quantity: z.number().int().min(1),
 *         note: z.string().optional(),
 *     }),
 * });
 * ```
 *
 * @module
 */
import { z, type ZodTypeAny } from 'zod';
import { SchemaBuildError } from '../errors.js';
import { type EnumValue, type NodeMeta, type SchemaNode, type FieldNode } from '../ist/types.js';
import {
    arrayNode,
    enumNode,
    field,
    objectNode,
    primitiveNode,
    referenceNode,
    unionOf,
    withMeta,
    type MutableConstraints,
} from '../ist/nodes.js';
import { toJsonValue } from '../ist/json.js';

// ── Source ───────────────────────────────────────────────

export interface ClassDefSource {
    readonly kind: 'class';
    /** Model name (the root title) */
    readonly name: string;
    /** Overrides the schema's own `.describe()` text */
    readonly description?: string;
    /** Usually a `z.object()`; a `z.lazy()` around one also works */
    readonly schema: ZodTypeAny;
}

// ── Public API ───────────────────────────────────────────

/**
 * Adapt a Zod type definition.
 *
 * @throws {SchemaBuildError} for Zod types and checks with no schema
 *     equivalent: dates, maps, tuples, `.transform()` and `z.preprocess()`.
 *     Refinements pass through as their inner type
 */
export function adaptClassDef(source: ClassDefSource): SchemaNode {
    const reader = new ZodReader();
    const { node } = reader.read(source.schema, []);
    return withMeta(node, { name: source.name, description: source.description });
}

// ── Reader ───────────────────────────────────────────────

/** A read node plus whether the enclosing object may omit it */
export interface ZodRead {
    readonly node: SchemaNode;
    readonly optional: boolean;
}

/**
 * Stateful walker: holds the lazy-definition table for one tree.
 */
export class ZodReader {
    private readonly _lazyRefs = new Map<z.ZodLazy<ZodTypeAny>, string>();
    private readonly _definitions = new Map<z.ZodLazy<ZodTypeAny>, SchemaNode>();

    read(schema: ZodTypeAny, path: readonly string[]): ZodRead {
        const description = schema.description || undefined;

        // ── Wrappers ──
        if (schema instanceof z.ZodOptional) {
            const inner = this.read(asZod(schema._def.innerType, path), path);
            return { node: describe(inner.node, description), optional: true };
        }
        if (schema instanceof z.ZodDefault) {
            const inner = this.read(asZod(schema._def.innerType, path), path);
            const value = toJsonValue(schema._def.defaultValue(), [...path, 'default']);
            return { node: withMeta(inner.node, { description, default: value }), optional: true };
        }
        if (schema instanceof z.ZodNullable) {
            const inner = this.read(asZod(schema._def.innerType, path), path);
            const node = unionOf([inner.node, primitiveNode('null')], {
                description: description ?? inner.node.description,
                default: inner.node.default,
            });
            return { node, optional: inner.optional };
        }
        if (schema instanceof z.ZodEffects) {
            if (schema._def.effect.type !== 'refinement') {
                throw new SchemaBuildError(
                    'UNSUPPORTED_ANNOTATION',
                    `A ${schema._def.effect.type} changes the value after validation and has no schema equivalent`,
                    path,
                );
            }
            const inner = this.read(asZod(schema._def.schema, path), path);
            return { node: describe(inner.node, description), optional: inner.optional };
        }
        if (schema instanceof z.ZodBranded) {
            const inner = this.read(asZod(schema._def.type, path), path);
            return { node: describe(inner.node, description), optional: inner.optional };
        }
        if (schema instanceof z.ZodReadonly || schema instanceof z.ZodCatch) {
            const inner = this.read(asZod(schema._def.innerType, path), path);
            return { node: describe(inner.node, description), optional: inner.optional };
        }
        if (schema instanceof z.ZodLazy) {
            return { node: this.lazy(schema, { description }, path), optional: false };
        }

        return { node: this.readType(schema, { description }, path), optional: false };
    }

    private readType(schema: ZodTypeAny, meta: NodeMeta, path: readonly string[]): SchemaNode {
        if (schema instanceof z.ZodObject) {
            return objectNode(this.fields(schema, path), meta);
        }
        if (schema instanceof z.ZodString) {
            return primitiveNode('string', { ...meta, constraints: stringConstraints(schema, path) });
        }
        if (schema instanceof z.ZodNumber) {
            const { integer, constraints } = numberConstraints(schema, path);
            return primitiveNode(integer ? 'integer' : 'number', { ...meta, constraints });
        }
        if (schema instanceof z.ZodBoolean) return primitiveNode('boolean', meta);
        if (schema instanceof z.ZodNull) return primitiveNode('null', meta);
        if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) return primitiveNode('any', meta);

        if (schema instanceof z.ZodArray) {
            const items = this.read(asZod(schema._def.type, path), [...path, 'items']).node;
            return arrayNode(items, { ...meta, constraints: arrayConstraints(schema) });
        }

        if (schema instanceof z.ZodEnum) {
            const options: readonly unknown[] = schema._def.values;
            return enumNode(options.map(v => enumValue(v, path)), meta);
        }
        if (schema instanceof z.ZodNativeEnum) {
            return enumNode(nativeEnumValues(schema._def.values, path), meta);
        }
        if (schema instanceof z.ZodLiteral) {
            return enumNode([enumValue(schema._def.value, path)], meta);
        }

        if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
            const options: readonly unknown[] = schema._def.options;
            const members = options.map((option, i) => this.read(asZod(option, path), [...path, `anyOf[${i}]`]).node);
            return unionOf(members, meta);
        }

        throw new SchemaBuildError(
            'UNSUPPORTED_ANNOTATION',
            `${schema.constructor.name} has no schema equivalent`,
            path,
        );
    }

    private fields(schema: z.AnyZodObject, path: readonly string[]): FieldNode[] {
        const shape: Readonly<Record<string, unknown>> = schema.shape;
        return Object.entries(shape).map(([name, value]) => {
            const { node, optional } = this.read(asZod(value, [...path, name]), [...path, name]);
            return field(name, node, !optional);
        });
    }

    private lazy(schema: z.ZodLazy<ZodTypeAny>, meta: NodeMeta, path: readonly string[]): SchemaNode {
        let ref = this._lazyRefs.get(schema);
        if (ref === undefined) {
            ref = `#/lazy/${this._lazyRefs.size + 1}`;
            this._lazyRefs.set(schema, ref);
        }
        return referenceNode(ref, () => this.definition(schema, path), meta);
    }

    private definition(schema: z.ZodLazy<ZodTypeAny>, path: readonly string[]): SchemaNode {
        let node = this._definitions.get(schema);
        if (node === undefined) {
            node = this.read(asZod(schema._def.getter(), path), path).node;
            this._definitions.set(schema, node);
        }
        return node;
    }
}

// ── Checks → Constraints ─────────────────────────────────

const STRING_FORMATS: Readonly<Record<string, string>> = {
    email: 'email',
    url: 'uri',
    uuid: 'uuid',
    datetime: 'date-time',
    date: 'date',
    time: 'time',
    duration: 'duration',
};

function stringConstraints(schema: z.ZodString, path: readonly string[]): MutableConstraints {
    const out: MutableConstraints = {};
    const setOnce = (key: 'pattern' | 'format', value: string): void => {
        if (out[key] !== undefined) {
            throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `A string can carry only one ${key}`, path);
        }
        out[key] = value;
    };

    for (const check of schema._def.checks) {
        switch (check.kind) {
            case 'min': out.minLength = check.value; break;
            case 'max': out.maxLength = check.value; break;
            case 'length': out.minLength = check.value; out.maxLength = check.value; break;
            case 'regex': setOnce('pattern', check.regex.source); break;
            case 'ip':
                if (check.version === undefined) {
                    throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', 'ip() needs an explicit version', path);
                }
                setOnce('format', check.version === 'v4' ? 'ipv4' : 'ipv6');
                break;
            case 'trim':
            case 'toLowerCase':
            case 'toUpperCase':
                break;
            default: {
                const format = STRING_FORMATS[check.kind];
                if (format === undefined) {
                    throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `String check "${check.kind}" has no schema equivalent`, path);
                }
                setOnce('format', format);
            }
        }
    }
    return out;
}

function numberConstraints(schema: z.ZodNumber, path: readonly string[]): { integer: boolean; constraints: MutableConstraints } {
    const constraints: MutableConstraints = {};
    let integer = false;

    for (const check of schema._def.checks) {
        switch (check.kind) {
            case 'int': integer = true; break;
            case 'min':
                if (check.inclusive) constraints.minimum = check.value;
                else constraints.exclusiveMinimum = check.value;
                break;
            case 'max':
                if (check.inclusive) constraints.maximum = check.value;
                else constraints.exclusiveMaximum = check.value;
                break;
            case 'multipleOf': constraints.multipleOf = check.value; break;
            case 'finite': break;
            default:
                throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', 'Unsupported number check', path);
        }
    }
    return { integer, constraints };
}

function arrayConstraints(schema: z.ZodArray<ZodTypeAny>): MutableConstraints {
    const def = schema._def;
    const out: MutableConstraints = {};
    const min = def.exactLength?.value ?? def.minLength?.value;
    const max = def.exactLength?.value ?? def.maxLength?.value;
    if (min !== undefined) out.minItems = min;
    if (max !== undefined) out.maxItems = max;
    return out;
}

// ── Helpers ──────────────────────────────────────────────

function asZod(value: unknown, path: readonly string[]): ZodTypeAny {
    if (value instanceof z.ZodType) return value;
    throw new SchemaBuildError('INVALID_SOURCE', 'Expected a Zod schema', path);
}

function describe(node: SchemaNode, description: string | undefined): SchemaNode {
    return description === undefined ? node : withMeta(node, { description });
}

function enumValue(value: unknown, path: readonly string[]): EnumValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', `Literal ${String(value)} has no schema equivalent`, path);
}

/** Values of a TypeScript `enum`, skipping the reverse mappings of numeric members */
function nativeEnumValues(values: Readonly<Record<string, string | number>>, path: readonly string[]): EnumValue[] {
    return Object.values(values)
        .filter(v => typeof v !== 'string' || typeof values[v] !== 'number')
        .map(v => enumValue(v, path));
}
