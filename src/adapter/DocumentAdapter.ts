/**
 * DocumentAdapter — JSON Schema Documents → IST
 *
 * Reads an already-deserialized JSON schema, either bare or wrapped in a
 * provider tool envelope, into an Intermediate Schema Tree.
 *
 * `$ref` pointers are not expanded here. Each one becomes a reference
 * node whose `resolve()` always returns the same node for the same
 * pointer, so the inliner can tell self-reference from reuse. Targets
 * are checked when the reference is read: a dangling pointer fails
 * immediately.
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import {
    type Constraints,
    type JsonObject,
    type JsonValue,
    type NodeMeta,
    type SchemaNode,
    type EnumValue,
    type FieldNode,
} from '../ist/types.js';
import {
    arrayNode,
    enumNode,
    field,
    objectNode,
    primitiveNode,
    referenceNode,
    unionOf,
    withMeta,
    partitionConstraints,
    NUMERIC_CONSTRAINTS,
    STRING_CONSTRAINTS,
    NUMBER_CONSTRAINTS,
    ARRAY_CONSTRAINTS,
    type NumericConstraintKey,
} from '../ist/nodes.js';
import { isJsonArray, isJsonObject, isScalar, toJsonValue } from '../ist/json.js';
import { type AdaptOptions, anonymousName } from './AdaptOptions.js';

// ── Source ───────────────────────────────────────────────

export interface SchemaDocumentSource {
    readonly kind: 'document';
    /** Parsed JSON: a schema, or a provider envelope around one */
    readonly document: object;
    /** Overrides every title found in the document */
    readonly name?: string;
}

// ── Public API ───────────────────────────────────────────

/**
 * Adapt a JSON schema document.
 *
 * @throws {SchemaBuildError} for non-local or dangling `$ref`s, tuple
 *     `items`, unknown `type` names and non-JSON input
 */
export function adaptDocument(source: SchemaDocumentSource, options: AdaptOptions = {}): SchemaNode {
    const raw = toJsonValue(source.document);
    if (!isJsonObject(raw)) {
        throw new SchemaBuildError('INVALID_SOURCE', 'A schema document must be a JSON object');
    }

    const envelope = unwrapEnvelope(raw);
    const reader = new DocumentReader(envelope.schema);
    const root = reader.read(envelope.schema, []);

    const name = source.name
        ?? envelope.name
        ?? text(envelope.schema['title'])
        ?? reader.rootReferenceTitle(envelope.schema)
        ?? anonymousName(options, 'Model');

    return withMeta(root, { name, description: envelope.description });
}

/**
 * Look up a local JSON pointer (`#`, `#/$defs/Pet`, `#/properties/a/items`).
 *
 * @returns The referenced value, or `undefined` if the path does not exist
 */
export function lookupPointer(root: JsonObject, pointer: string): JsonValue | undefined {
    if (pointer === '#') return root;
    if (!pointer.startsWith('#/')) return undefined;

    const tokens = pointerTokens(pointer);
    if (tokens === undefined) return undefined;

    let current: JsonValue | undefined = root;
    for (const token of tokens) {
        if (isJsonArray(current)) {
            current = /^\d+$/.test(token) ? current[Number(token)] : undefined;
        } else if (isJsonObject(current)) {
            current = Object.hasOwn(current, token) ? current[token] : undefined;
        } else {
            return undefined;
        }
    }
    return current;
}

/** Decoded pointer segments; `undefined` when a segment is not valid percent-encoding */
function pointerTokens(pointer: string): string[] | undefined {
    try {
        return pointer
            .slice(2)
            .split('/')
            .map(token => decodeURIComponent(token).replace(/~1/g, '/').replace(/~0/g, '~'));
    } catch (err) {
        if (err instanceof URIError) return undefined;
        throw err;
    }
}

// ── Envelopes ────────────────────────────────────────────

interface Envelope {
    readonly schema: JsonObject;
    readonly name?: string | undefined;
    readonly description?: string | undefined;
}

const SCHEMA_KEYS = ['parameters', 'input_schema', 'schema'] as const;

/**
 * Peel provider wrappers off a document:
 * `{type:'function', function}`, `{type:'json_schema', json_schema}`,
 * and `{name, description, parameters | input_schema | schema}`.
 */
function unwrapEnvelope(doc: JsonObject): Envelope {
    const fn = doc['function'];
    if (doc['type'] === 'function' && isJsonObject(fn)) {
        return unwrapEnvelope(fn);
    }
    const responseFormat = doc['json_schema'];
    if (doc['type'] === 'json_schema' && isJsonObject(responseFormat)) {
        return unwrapEnvelope(responseFormat);
    }

    for (const key of SCHEMA_KEYS) {
        const inner = doc[key];
        if (isJsonObject(inner)) {
            return {
                schema: inner,
                name: text(doc['name']) ?? text(doc['title']),
                description: text(doc['description']),
            };
        }
    }

    return { schema: doc };
}

// ── Reader ───────────────────────────────────────────────

class DocumentReader {
    private readonly _definitions = new Map<string, SchemaNode>();
    private readonly _merging = new Set<string>();

    constructor(private readonly _root: JsonObject) {}

    /** Title implied by a root `$ref`: the target's title, else the last pointer segment */
    rootReferenceTitle(schema: JsonObject): string | undefined {
        const ref = text(schema['$ref']);
        if (ref === undefined) return undefined;
        const target = lookupPointer(this._root, ref);
        if (isJsonObject(target)) {
            const title = text(target['title']);
            if (title !== undefined) return title;
        }
        return ref === '#' ? undefined : pointerTokens(ref)?.at(-1);
    }

    read(schema: JsonValue, path: readonly string[]): SchemaNode {
        if (schema === true) return primitiveNode('any');
        if (!isJsonObject(schema)) {
            throw new SchemaBuildError('INVALID_SOURCE', 'Expected a schema object', path);
        }

        const meta: NodeMeta = {
            name: text(schema['title']),
            description: text(schema['description']),
            default: schema['default'],
            constraints: readConstraints(schema),
        };

        const node = this.readShape(schema, meta, path);
        return schema['nullable'] === true
            ? unionOf([node, primitiveNode('null')], metaOnly(node))
            : node;
    }

    private readShape(schema: JsonObject, meta: NodeMeta, path: readonly string[]): SchemaNode {
        const ref = schema['$ref'];
        if (typeof ref === 'string') {
            return this.reference(ref, meta, path);
        }

        const allOf = schema['allOf'];
        if (isJsonArray(allOf)) {
            return this.allOf(allOf, meta, path);
        }

        const anyOf = schema['anyOf'] ?? schema['oneOf'];
        if (isJsonArray(anyOf)) {
            const key = schema['anyOf'] !== undefined ? 'anyOf' : 'oneOf';
            const members = anyOf.map((member, i) => this.read(member, [...path, `${key}[${i}]`]));
            return unionOf(members, meta);
        }

        if (Object.hasOwn(schema, 'const')) {
            return enumNode([scalar(schema['const'], [...path, 'const'])], meta);
        }

        const values = schema['enum'];
        if (isJsonArray(values)) {
            return enumNode(values.map((v, i) => scalar(v, [...path, `enum[${i}]`])), meta);
        }

        const type = schema['type'];
        if (isJsonArray(type)) {
            return this.typeUnion(type, schema, meta, path);
        }
        if (typeof type === 'string') {
            return this.typed(type, schema, meta, path);
        }
        if (type !== undefined) {
            throw new SchemaBuildError('INVALID_SOURCE', '"type" must be a string or an array of strings', path);
        }

        if (schema['properties'] !== undefined) return this.typed('object', schema, meta, path);
        if (schema['items'] !== undefined) return this.typed('array', schema, meta, path);
        return primitiveNode('any', meta);
    }

    private typed(type: string, schema: JsonObject, meta: NodeMeta, path: readonly string[]): SchemaNode {
        switch (type) {
            case 'object':
                return objectNode(this.fields(schema, path), meta);

            case 'array': {
                const items = schema['items'];
                if (isJsonArray(items) || schema['prefixItems'] !== undefined) {
                    throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', 'Tuple schemas are not supported', path);
                }
                const itemNode = items === undefined
                    ? primitiveNode('any')
                    : this.read(items, [...path, 'items']);
                return arrayNode(itemNode, meta);
            }

            case 'string':
            case 'integer':
            case 'number':
            case 'boolean':
            case 'null':
                return primitiveNode(type, meta);

            default:
                throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', `Unknown type "${type}"`, path);
        }
    }

    /**
     * `type: ['string', 'null']` → union; each member takes the
     * constraints that apply to it, anything left stays on the union.
     */
    private typeUnion(types: readonly JsonValue[], schema: JsonObject, meta: NodeMeta, path: readonly string[]): SchemaNode {
        let remaining: Constraints = meta.constraints ?? {};
        const members = types.map(t => {
            if (typeof t !== 'string') {
                throw new SchemaBuildError('INVALID_SOURCE', '"type" entries must be strings', path);
            }
            const { picked, rest } = partitionConstraints(remaining, constraintsForType(t));
            remaining = rest;
            return this.typed(t, schema, { constraints: picked }, path);
        });
        return unionOf(members, { ...meta, constraints: remaining });
    }

    private fields(schema: JsonObject, path: readonly string[]): FieldNode[] {
        const properties = schema['properties'] ?? {};
        if (!isJsonObject(properties)) {
            throw new SchemaBuildError('INVALID_SOURCE', '"properties" must be an object', path);
        }
        const requiredList = schema['required'];
        const required = new Set(isJsonArray(requiredList) ? requiredList.filter(isString) : []);

        return Object.entries(properties).map(([name, property]) =>
            field(name, this.read(property, [...path, name]), required.has(name)),
        );
    }

    private reference(ref: string, meta: NodeMeta, path: readonly string[]): SchemaNode {
        if (!ref.startsWith('#')) {
            throw new SchemaBuildError('UNRESOLVED_REFERENCE', `Only local references are supported, got "${ref}"`, path);
        }
        const target = lookupPointer(this._root, ref);
        if (target === undefined) {
            throw new SchemaBuildError('UNRESOLVED_REFERENCE', `Unresolved reference "${ref}"`, path);
        }
        return referenceNode(ref, () => this.definition(ref, target), meta);
    }

    private definition(ref: string, target: JsonValue): SchemaNode {
        let node = this._definitions.get(ref);
        if (node === undefined) {
            node = this.read(target, [ref]);
            this._definitions.set(ref, node);
        }
        return node;
    }

    /**
     * One member: that member with the outer metadata on top.
     * Several members: object schemas merged in order (properties and
     * `required` lists concatenated).
     */
    private allOf(members: readonly JsonValue[], meta: NodeMeta, path: readonly string[]): SchemaNode {
        const [first] = members;
        if (first !== undefined && members.length === 1) {
            return withMeta(this.read(first, [...path, 'allOf[0]']), meta);
        }

        const properties: Record<string, JsonValue> = {};
        const required: JsonValue[] = [];
        members.forEach((member, i) => {
            const resolved = this.dereference(member, [...path, `allOf[${i}]`]);
            const props = resolved['properties'];
            if (resolved['type'] !== 'object' && !isJsonObject(props)) {
                throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', 'allOf can only merge object schemas', [...path, `allOf[${i}]`]);
            }
            if (isJsonObject(props)) Object.assign(properties, props);
            const req = resolved['required'];
            if (isJsonArray(req)) required.push(...req);
        });

        return objectNode(this.fields({ properties, required }, path), meta);
    }

    /** Follow `$ref` chains at the JSON level (used for allOf merging) */
    private dereference(schema: JsonValue, path: readonly string[]): JsonObject {
        let current = schema;
        this._merging.clear();
        while (isJsonObject(current) && typeof current['$ref'] === 'string') {
            const ref = current['$ref'];
            if (this._merging.has(ref)) {
                throw new SchemaBuildError('CYCLE', `Circular reference "${ref}" inside allOf`, path);
            }
            this._merging.add(ref);
            const target = lookupPointer(this._root, ref);
            if (target === undefined) {
                throw new SchemaBuildError('UNRESOLVED_REFERENCE', `Unresolved reference "${ref}"`, path);
            }
            current = target;
        }
        if (!isJsonObject(current)) {
            throw new SchemaBuildError('INVALID_SOURCE', 'Expected a schema object', path);
        }
        return current;
    }
}

// ── Helpers ──────────────────────────────────────────────

function text(value: JsonValue | undefined): string | undefined {
    return typeof value === 'string' && value !== '' ? value : undefined;
}

function isString(value: JsonValue): value is string {
    return typeof value === 'string';
}

function scalar(value: JsonValue | undefined, path: readonly string[]): EnumValue {
    if (!isScalar(value)) {
        throw new SchemaBuildError('UNSUPPORTED_ANNOTATION', 'Only scalar enum and const values are supported', path);
    }
    return value;
}

function metaOnly(node: SchemaNode): NodeMeta {
    return { name: node.name, description: node.description, default: node.default };
}

function readConstraints(schema: JsonObject): Constraints {
    const numeric: { [K in NumericConstraintKey]?: number } = {};
    for (const key of NUMERIC_CONSTRAINTS) {
        const value = schema[key];
        if (typeof value === 'number') numeric[key] = value;
    }
    const pattern = text(schema['pattern']);
    const format = text(schema['format']);
    return {
        ...(pattern !== undefined ? { pattern } : {}),
        ...(format !== undefined ? { format } : {}),
        ...numeric,
    };
}

function constraintsForType(type: string): readonly (keyof Constraints)[] {
    switch (type) {
        case 'string': return STRING_CONSTRAINTS;
        case 'integer':
        case 'number': return NUMBER_CONSTRAINTS;
        case 'array': return ARRAY_CONSTRAINTS;
        default: return [];
    }
}
