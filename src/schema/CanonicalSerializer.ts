/**
 * CanonicalSerializer — IST → Canonical JSON Schema
 *
 * Emits the minimal, reference-free dialect sent to language models.
 * Key order inside every node is fixed, so equal trees stringify to equal
 * bytes:
 *
 * ```text
 * type, description, format, enum, properties, required, items, anyOf,
 * pattern, minLength, maxLength, minimum, exclusiveMinimum, maximum,
 * exclusiveMaximum, multipleOf, minItems, maxItems, default, title
 * ```
 *
 * `title` appears only on the root. Objects always carry `properties`;
 * `required` is left out when empty.
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import { type EnumValue, type JsonObject, type JsonValue, type SchemaNode } from '../ist/types.js';
import { NUMERIC_CONSTRAINTS } from '../ist/nodes.js';
import { isJsonObject, toJsonValue } from '../ist/json.js';
import { inline } from './SchemaInliner.js';

// ── Types ────────────────────────────────────────────────

/** JSON type names used in the canonical dialect */
export type CanonicalType = 'object' | 'array' | 'string' | 'integer' | 'number' | 'boolean' | 'null';

/** A property (or item, or union member) schema in the canonical dialect */
export interface CanonicalNode {
    readonly type?: CanonicalType | readonly CanonicalType[];
    readonly description?: string;
    readonly format?: string;
    readonly enum?: readonly EnumValue[];
    readonly properties?: Readonly<Record<string, CanonicalNode>>;
    readonly required?: readonly string[];
    readonly items?: CanonicalNode;
    readonly anyOf?: readonly CanonicalNode[];
    readonly pattern?: string;
    readonly minLength?: number;
    readonly maxLength?: number;
    readonly minimum?: number;
    readonly exclusiveMinimum?: number;
    readonly maximum?: number;
    readonly exclusiveMaximum?: number;
    readonly multipleOf?: number;
    readonly minItems?: number;
    readonly maxItems?: number;
    readonly default?: JsonValue;
}

/** The root: always an object, optionally titled */
export interface CanonicalSchema extends CanonicalNode {
    readonly type: 'object';
    readonly properties: Readonly<Record<string, CanonicalNode>>;
    readonly title?: string;
}

// ── Public API ───────────────────────────────────────────

/**
 * Serialize an inlined tree.
 *
 * @throws {SchemaBuildError} when the root is not an object or a
 *     reference node is still present
 */
export function serialize(tree: SchemaNode): CanonicalSchema {
    if (tree.kind !== 'object') {
        throw new SchemaBuildError('INVALID_SOURCE', `The root of a tool schema must be an object, got ${describeNode(tree)}`);
    }
    const body = render(tree, []);
    return {
        ...body,
        type: 'object',
        properties: body.properties ?? {},
        ...(tree.name !== undefined ? { title: tree.name } : {}),
    };
}

/** `serialize(inline(tree))` */
export function canonicalize(tree: SchemaNode): CanonicalSchema {
    return serialize(inline(tree));
}

/**
 * Deterministic JSON text of a canonical schema.
 */
export function stringifyCanonical(schema: CanonicalSchema, indent?: number): string {
    return JSON.stringify(schema, null, indent);
}

/**
 * Plain JSON view of a canonical schema, for code that works on
 * untyped JSON documents.
 */
export function toJsonObject(schema: CanonicalNode): JsonObject {
    const json = toJsonValue(schema);
    return isJsonObject(json) ? json : {};
}

// ── Rendering ────────────────────────────────────────────

type MutableNode = { -readonly [K in keyof CanonicalNode]: CanonicalNode[K] };

function render(node: SchemaNode, path: readonly string[]): CanonicalNode {
    const out: MutableNode = {};

    switch (node.kind) {
        case 'object': out.type = 'object'; break;
        case 'array': out.type = 'array'; break;
        case 'primitive': if (node.type !== 'any') out.type = node.type; break;
        case 'enum': out.type = enumType(node.values); break;
        case 'union': break;
        case 'reference':
            throw new SchemaBuildError(
                'UNRESOLVED_REFERENCE',
                `Reference "${node.ref}" must be inlined before serialization`,
                path,
            );
    }

    if (node.description !== undefined) out.description = node.description;
    if (node.constraints.format !== undefined) out.format = node.constraints.format;

    if (node.kind === 'enum') out.enum = node.values;

    if (node.kind === 'object') {
        const properties: Record<string, CanonicalNode> = {};
        const required: string[] = [];
        for (const f of node.fields) {
            properties[f.name] = render(f.node, [...path, f.name]);
            if (f.required) required.push(f.name);
        }
        out.properties = properties;
        if (required.length > 0) out.required = required;
    }

    if (node.kind === 'array') out.items = render(node.items, [...path, 'items']);
    if (node.kind === 'union') out.anyOf = node.members.map((m, i) => render(m, [...path, `anyOf[${i}]`]));

    if (node.constraints.pattern !== undefined) out.pattern = node.constraints.pattern;
    for (const key of NUMERIC_CONSTRAINTS) {
        const value = node.constraints[key];
        if (value !== undefined) out[key] = value;
    }

    if (node.default !== undefined) out.default = node.default;

    return out;
}

/** JSON type of enum values, in first-seen order */
function enumType(values: readonly EnumValue[]): CanonicalType | CanonicalType[] {
    const types: CanonicalType[] = [];
    for (const value of values) {
        const type = jsonType(value);
        if (!types.includes(type)) types.push(type);
    }
    const [only] = types;
    return only !== undefined && types.length === 1 ? only : types;
}

function jsonType(value: EnumValue): CanonicalType {
    if (value === null) return 'null';
    if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
    return typeof value === 'string' ? 'string' : 'boolean';
}

function describeNode(node: SchemaNode): string {
    return node.kind === 'primitive' ? node.type : node.kind;
}
