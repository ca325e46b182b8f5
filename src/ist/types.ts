/**
 * Intermediate Schema Tree — Node Vocabulary
 *
 * The single contract between the type descriptor adapters, the inliner,
 * the canonical serializer and the model synthesizer. Nothing specific to
 * Zod, function signatures, data samples or JSON schema documents leaks
 * past this boundary.
 *
 * Nodes are immutable. Build them through the constructors in
 * `nodes.ts`, which also apply the normalization rules every variant
 * shares.
 *
 * @module
 */

// ── JSON ─────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;
export interface JsonObject { readonly [key: string]: JsonValue }

// ── Constraints ──────────────────────────────────────────

/**
 * Validation keywords carried through from the source unchanged.
 *
 * Which keys apply depends on the node they sit on: string keywords on
 * `string`, numeric keywords on `integer`/`number`, item counts on arrays.
 */
export interface Constraints {
    readonly pattern?: string;
    readonly format?: string;
    readonly minLength?: number;
    readonly maxLength?: number;
    readonly minimum?: number;
    readonly exclusiveMinimum?: number;
    readonly maximum?: number;
    readonly exclusiveMaximum?: number;
    readonly multipleOf?: number;
    readonly minItems?: number;
    readonly maxItems?: number;
}

export type ConstraintKey = keyof Constraints;

// ── Nodes ────────────────────────────────────────────────

export type PrimitiveType = 'string' | 'integer' | 'number' | 'boolean' | 'null' | 'any';

export type EnumValue = string | number | boolean | null;

/** Shared by every node kind */
export interface NodeBase {
    /** Model name; only meaningful at the root once inlined */
    readonly name?: string;
    readonly description?: string;
    /** Presence means "has a default" */
    readonly default?: JsonValue;
    readonly constraints: Constraints;
}

export interface FieldNode {
    readonly name: string;
    readonly node: SchemaNode;
    readonly required: boolean;
}

export interface ObjectNode extends NodeBase {
    readonly kind: 'object';
    readonly fields: readonly FieldNode[];
}

export interface ArrayNode extends NodeBase {
    readonly kind: 'array';
    readonly items: SchemaNode;
}

export interface PrimitiveNode extends NodeBase {
    readonly kind: 'primitive';
    readonly type: PrimitiveType;
}

export interface EnumNode extends NodeBase {
    readonly kind: 'enum';
    readonly values: readonly EnumValue[];
}

export interface UnionNode extends NodeBase {
    readonly kind: 'union';
    readonly members: readonly SchemaNode[];
}

/**
 * Pointer to a shared definition. `resolve()` returns the same node
 * object for the same definition every time, which is what lets the
 * inliner tell a true cycle apart from plain reuse.
 */
export interface ReferenceNode extends NodeBase {
    readonly kind: 'reference';
    readonly ref: string;
    readonly resolve: () => SchemaNode;
}

export type SchemaNode =
    | ObjectNode
    | ArrayNode
    | PrimitiveNode
    | EnumNode
    | UnionNode
    | ReferenceNode;

export type SchemaNodeKind = SchemaNode['kind'];

/** Descriptive metadata accepted by every node constructor */
export interface NodeMeta {
    readonly name?: string | undefined;
    readonly description?: string | undefined;
    readonly default?: JsonValue | undefined;
    readonly constraints?: Constraints | undefined;
}
