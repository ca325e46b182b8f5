/**
 * IST Constructors — Normalizing Node Builders
 *
 * Every adapter builds its tree through these functions, so every source
 * variant lands on the same normal form:
 *
 * - a field with a default is never required
 * - empty descriptions and patterns count as absent
 * - patterns are stored in `RegExp` source form
 * - `enum [null]` is the `null` primitive
 * - unions are flattened, stripped of member metadata, collapsed to an
 *   enum when they only hold enums and `null`, de-duplicated, and replaced
 *   by their only member when one remains
 *
 * All nodes are frozen.
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import {
    type Constraints,
    type EnumValue,
    type FieldNode,
    type NodeBase,
    type NodeMeta,
    type PrimitiveType,
    type SchemaNode,
    type ArrayNode,
    type EnumNode,
    type ObjectNode,
    type PrimitiveNode,
    type ReferenceNode,
    type UnionNode,
} from './types.js';

// ── Constraints ──────────────────────────────────────────

/** Numeric constraint keys in canonical output order */
export const NUMERIC_CONSTRAINTS = [
    'minLength',
    'maxLength',
    'minimum',
    'exclusiveMinimum',
    'maximum',
    'exclusiveMaximum',
    'multipleOf',
    'minItems',
    'maxItems',
] as const satisfies readonly (keyof Constraints)[];

export type NumericConstraintKey = typeof NUMERIC_CONSTRAINTS[number];

/** Keys that apply to `string` nodes */
export const STRING_CONSTRAINTS = ['pattern', 'format', 'minLength', 'maxLength'] as const satisfies readonly (keyof Constraints)[];

/** Keys that apply to `integer` and `number` nodes */
export const NUMBER_CONSTRAINTS = [
    'minimum',
    'exclusiveMinimum',
    'maximum',
    'exclusiveMaximum',
    'multipleOf',
] as const satisfies readonly (keyof Constraints)[];

/** Keys that apply to `array` nodes */
export const ARRAY_CONSTRAINTS = ['minItems', 'maxItems'] as const satisfies readonly (keyof Constraints)[];

/** Constraint keys meaningful for a node of the given shape */
export function applicableConstraints(node: SchemaNode): readonly (keyof Constraints)[] {
    if (node.kind === 'array') return ARRAY_CONSTRAINTS;
    if (node.kind !== 'primitive') return [];
    switch (node.type) {
        case 'string': return STRING_CONSTRAINTS;
        case 'integer':
        case 'number': return NUMBER_CONSTRAINTS;
        default: return [];
    }
}

/** Split `constraints` into the keys listed in `keys` and the rest */
export function partitionConstraints(
    constraints: Constraints,
    keys: readonly (keyof Constraints)[],
): { readonly picked: Constraints; readonly rest: Constraints } {
    const picked: MutableConstraints = {};
    const rest: MutableConstraints = {};
    if (constraints.pattern !== undefined) (keys.includes('pattern') ? picked : rest).pattern = constraints.pattern;
    if (constraints.format !== undefined) (keys.includes('format') ? picked : rest).format = constraints.format;
    for (const key of NUMERIC_CONSTRAINTS) {
        const value = constraints[key];
        if (value !== undefined) (keys.includes(key) ? picked : rest)[key] = value;
    }
    return { picked, rest };
}

export type MutableConstraints = { -readonly [K in keyof Constraints]?: Constraints[K] };

const EMPTY_CONSTRAINTS: Constraints = Object.freeze({});

/**
 * Copy the defined constraint keys into a fresh frozen object in
 * canonical order, normalizing `pattern` to its `RegExp` source form.
 */
export function normalizeConstraints(input: Constraints): Constraints {
    const out: MutableConstraints = {};

    if (input.pattern !== undefined && input.pattern !== '') {
        out.pattern = normalizePattern(input.pattern);
    }
    if (input.format !== undefined && input.format !== '') {
        out.format = input.format;
    }
    for (const key of NUMERIC_CONSTRAINTS) {
        const value = input[key];
        if (value !== undefined) out[key] = value;
    }

    return Object.keys(out).length === 0 ? EMPTY_CONSTRAINTS : Object.freeze(out);
}

export function hasConstraints(constraints: Constraints): boolean {
    return Object.keys(constraints).length > 0;
}

function normalizePattern(pattern: string): string {
    try {
        return new RegExp(pattern).source;
    } catch (err) {
        throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `Invalid pattern "${pattern}"`, [], { cause: err });
    }
}

// ── Metadata ─────────────────────────────────────────────

function base(meta: NodeMeta): NodeBase {
    return {
        ...(meta.name ? { name: meta.name } : {}),
        ...(meta.description ? { description: meta.description } : {}),
        ...(meta.default !== undefined ? { default: meta.default } : {}),
        constraints: normalizeConstraints(meta.constraints ?? EMPTY_CONSTRAINTS),
    };
}

/** Metadata currently carried by a node */
export function metaOf(node: SchemaNode): NodeMeta {
    return {
        name: node.name,
        description: node.description,
        default: node.default,
        constraints: node.constraints,
    };
}

/**
 * Return a copy of `node` with `overrides` applied on top of its own
 * metadata. Undefined override entries keep the node's value; constraint
 * keys merge.
 */
export function withMeta(node: SchemaNode, overrides: NodeMeta): SchemaNode {
    const meta: NodeMeta = {
        name: overrides.name ?? node.name,
        description: overrides.description ?? node.description,
        default: overrides.default !== undefined ? overrides.default : node.default,
        constraints: { ...node.constraints, ...overrides.constraints },
    };
    return rebuild(node, meta);
}

/** Return a copy of `node` carrying exactly `meta` */
export function rebuild(node: SchemaNode, meta: NodeMeta): SchemaNode {
    switch (node.kind) {
        case 'object': return objectNode(node.fields, meta);
        case 'array': return arrayNode(node.items, meta);
        case 'primitive': return primitiveNode(node.type, meta);
        case 'enum': return enumNode(node.values, meta);
        case 'union': return unionOf(node.members, meta);
        case 'reference': return referenceNode(node.ref, node.resolve, meta);
    }
}

// ── Constructors ─────────────────────────────────────────

const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/;

/**
 * Build a field. A default always makes the field optional.
 */
export function field(name: string, node: SchemaNode, required: boolean): FieldNode {
    return Object.freeze({ name, node, required: required && node.default === undefined });
}

export function objectNode(fields: readonly FieldNode[], meta: NodeMeta = {}): ObjectNode {
    const seen = new Set<string>();
    for (const f of fields) {
        if (ARRAY_INDEX.test(f.name)) {
            throw new SchemaBuildError(
                'INVALID_SOURCE',
                `Field name "${f.name}" looks like an array index; its position in the object could not be kept`,
                [f.name],
            );
        }
        if (f.name === '__proto__') {
            throw new SchemaBuildError('INVALID_SOURCE', 'Field name "__proto__" cannot be a schema property', [f.name]);
        }
        if (seen.has(f.name)) {
            throw new SchemaBuildError('INVALID_SOURCE', `Duplicate field "${f.name}"`, [f.name]);
        }
        seen.add(f.name);
    }
    const node: ObjectNode = { kind: 'object', ...base(meta), fields: Object.freeze([...fields]) };
    return Object.freeze(node);
}

export function arrayNode(items: SchemaNode, meta: NodeMeta = {}): ArrayNode {
    const node: ArrayNode = { kind: 'array', ...base(meta), items };
    return Object.freeze(node);
}

export function primitiveNode(type: PrimitiveType, meta: NodeMeta = {}): PrimitiveNode {
    const node: PrimitiveNode = { kind: 'primitive', ...base(meta), type };
    return Object.freeze(node);
}

/**
 * Build an enum. Values are de-duplicated in first-seen order;
 * a lone `null` becomes the `null` primitive.
 */
export function enumNode(values: readonly EnumValue[], meta: NodeMeta = {}): SchemaNode {
    const unique: EnumValue[] = [];
    for (const value of values) {
        if (!unique.includes(value)) unique.push(value);
    }
    if (unique.length === 0) {
        throw new SchemaBuildError('EMPTY_SEQUENCE', 'An enum needs at least one value');
    }
    if (unique.length === 1 && unique[0] === null) {
        return primitiveNode('null', meta);
    }
    const node: EnumNode = { kind: 'enum', ...base(meta), values: Object.freeze(unique) };
    return Object.freeze(node);
}

export function referenceNode(ref: string, resolve: () => SchemaNode, meta: NodeMeta = {}): ReferenceNode {
    const node: ReferenceNode = { kind: 'reference', ...base(meta), ref, resolve };
    return Object.freeze(node);
}

/**
 * Build a union in normal form (see module docs).
 */
export function unionOf(members: readonly SchemaNode[], meta: NodeMeta = {}): SchemaNode {
    if (members.length === 0) {
        throw new SchemaBuildError('EMPTY_SEQUENCE', 'A union needs at least one member');
    }

    const flat: SchemaNode[] = [];
    for (const member of members) {
        const bare = stripMember(member);
        if (bare.kind === 'union' && !hasConstraints(bare.constraints)) {
            flat.push(...bare.members);
        } else {
            flat.push(bare);
        }
    }

    if (flat.some(m => m.kind === 'enum') && flat.every(isMergeableIntoEnum)) {
        const values: EnumValue[] = [];
        for (const m of flat) {
            if (m.kind === 'enum') values.push(...m.values);
            else values.push(null);
        }
        return enumNode(values, meta);
    }

    const distinct: SchemaNode[] = [];
    const seenPrimitives = new Set<PrimitiveType>();
    for (const m of flat) {
        if (m.kind === 'primitive' && !hasConstraints(m.constraints)) {
            if (seenPrimitives.has(m.type)) continue;
            seenPrimitives.add(m.type);
        }
        distinct.push(m);
    }

    const [only] = distinct;
    if (only !== undefined && distinct.length === 1) {
        return withMeta(only, meta);
    }

    const node: UnionNode = { kind: 'union', ...base(meta), members: Object.freeze(distinct) };
    return Object.freeze(node);
}

function stripMember(node: SchemaNode): SchemaNode {
    if (node.name === undefined && node.description === undefined && node.default === undefined) {
        return node;
    }
    return rebuild(node, { constraints: node.constraints });
}

function isMergeableIntoEnum(node: SchemaNode): boolean {
    if (hasConstraints(node.constraints)) return false;
    return node.kind === 'enum' || (node.kind === 'primitive' && node.type === 'null');
}
