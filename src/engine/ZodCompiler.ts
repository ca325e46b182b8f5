/**
 * ZodCompiler — IST → Live Zod Schemas
 *
 * Compiles inlined Intermediate Schema Tree nodes into runtime Zod
 * schemas. The mapping is chosen so that `zod-to-json-schema` renders the
 * result back into a document the SchemaDocument adapter reads as the
 * very same tree:
 *
 * - `integer` → `z.number().int()`; numeric bounds → `gte/gt/lte/lt`
 * - string enums → `z.enum()`; any other enum → union of literals and `z.null()`
 * - `any` → `z.unknown()`
 * - description → `.describe()`, default → `.default()`,
 *   non-required field → `.optional()`
 * - a required field whose schema would accept `undefined` (`any`, a union
 *   with `any`) gets a presence check, so it stays required
 *
 * @module
 */
import { z, type ZodTypeAny } from 'zod';
import { SchemaBuildError } from '../errors.js';
import { type Constraints, type EnumValue, type FieldNode, type PrimitiveNode, type SchemaNode } from '../ist/types.js';
import { applicableConstraints } from '../ist/nodes.js';
import { type ModelSpec } from './ValidationEngine.js';

// ── Public API ───────────────────────────────────────────

export interface CompileOptions {
    /** Reject unknown keys (`.strict()`) instead of stripping them */
    readonly forbidExtraFields?: boolean;
}

/** Issue params marking the presence check of a required field */
export const PRESENCE_CHECK = 'required';

/**
 * Compile a model description into a `z.object()`.
 *
 * @throws {SchemaBuildError} for reference nodes, misplaced constraints,
 *     unknown formats and invalid patterns
 */
export function compileModel(spec: ModelSpec, options: CompileOptions = {}): z.AnyZodObject {
    const model = compileObject(spec.fields, options, []);
    return spec.description !== undefined ? model.describe(spec.description) : model;
}

/**
 * Compile a single node (without field-level optionality).
 */
export function compileNode(node: SchemaNode, options: CompileOptions = {}, path: readonly string[] = []): ZodTypeAny {
    assertConstraints(node, path);

    let schema = compileBase(node, options, path);
    if (node.description !== undefined) schema = schema.describe(node.description);
    if (node.default !== undefined) schema = schema.default(node.default);
    return schema;
}

// ── Core Compiler ────────────────────────────────────────

function compileBase(node: SchemaNode, options: CompileOptions, path: readonly string[]): ZodTypeAny {
    switch (node.kind) {
        case 'object':
            return compileObject(node.fields, options, path);

        case 'array': {
            let schema = z.array(compileNode(node.items, options, [...path, 'items']));
            if (node.constraints.minItems !== undefined) schema = schema.min(node.constraints.minItems);
            if (node.constraints.maxItems !== undefined) schema = schema.max(node.constraints.maxItems);
            return schema;
        }

        case 'primitive':
            return compilePrimitive(node, path);

        case 'enum':
            return compileEnum(node.values, path);

        case 'union': {
            const [first, second, ...rest] = node.members.map((m, i) => compileNode(m, options, [...path, `anyOf[${i}]`]));
            if (first === undefined) {
                throw new SchemaBuildError('EMPTY_SEQUENCE', 'A union needs at least one member', path);
            }
            return second === undefined ? first : z.union([first, second, ...rest]);
        }

        case 'reference':
            throw new SchemaBuildError(
                'UNRESOLVED_REFERENCE',
                `Reference "${node.ref}" must be inlined before a model can be built`,
                path,
            );
    }
}

function compileObject(fields: readonly FieldNode[], options: CompileOptions, path: readonly string[]): z.AnyZodObject {
    const shape: Record<string, ZodTypeAny> = {};
    for (const f of fields) {
        shape[f.name] = compileField(f, options, [...path, f.name]);
    }
    const object = z.object(shape);
    return options.forbidExtraFields ? object.strict() : object;
}

function compileField(f: FieldNode, options: CompileOptions, path: readonly string[]): ZodTypeAny {
    const schema = compileNode(f.node, options, path);
    if (!f.required) {
        return f.node.default === undefined ? schema.optional() : schema;
    }
    return schema.isOptional() ? requirePresence(schema) : schema;
}

function requirePresence(schema: ZodTypeAny): ZodTypeAny {
    return schema.superRefine((value, ctx) => {
        if (value === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'Field required',
                params: { presence: PRESENCE_CHECK },
            });
        }
    });
}

// ── Type Compilers ───────────────────────────────────────

function compilePrimitive(node: PrimitiveNode, path: readonly string[]): ZodTypeAny {
    switch (node.type) {
        case 'string':  return compileString(node.constraints, path);
        case 'integer': return compileNumber(z.number().int(), node.constraints);
        case 'number':  return compileNumber(z.number(), node.constraints);
        case 'boolean': return z.boolean();
        case 'null':    return z.null();
        case 'any':     return z.unknown();
    }
}

function compileString(c: Constraints, path: readonly string[]): ZodTypeAny {
    let schema = z.string();
    if (c.minLength !== undefined) schema = schema.min(c.minLength);
    if (c.maxLength !== undefined) schema = schema.max(c.maxLength);
    if (c.pattern !== undefined) schema = schema.regex(compilePattern(c.pattern, path));
    if (c.format !== undefined) schema = compileFormat(schema, c.format, path);
    return schema;
}

function compileFormat(schema: z.ZodString, format: string, path: readonly string[]): z.ZodString {
    switch (format) {
        case 'email':     return schema.email();
        case 'uri':       return schema.url();
        case 'uuid':      return schema.uuid();
        case 'date-time': return schema.datetime({ offset: true });
        case 'date':      return schema.date();
        case 'time':      return schema.time();
        case 'duration':  return schema.duration();
        case 'ipv4':      return schema.ip({ version: 'v4' });
        case 'ipv6':      return schema.ip({ version: 'v6' });
        default:
            throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `Unsupported string format "${format}"`, path);
    }
}

function compilePattern(pattern: string, path: readonly string[]): RegExp {
    try {
        return new RegExp(pattern);
    } catch (err) {
        throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `Invalid pattern "${pattern}"`, path, { cause: err });
    }
}

function compileNumber(base: z.ZodNumber, c: Constraints): z.ZodNumber {
    let schema = base;
    if (c.minimum !== undefined) schema = schema.gte(c.minimum);
    if (c.exclusiveMinimum !== undefined) schema = schema.gt(c.exclusiveMinimum);
    if (c.maximum !== undefined) schema = schema.lte(c.maximum);
    if (c.exclusiveMaximum !== undefined) schema = schema.lt(c.exclusiveMaximum);
    if (c.multipleOf !== undefined) schema = schema.multipleOf(c.multipleOf);
    return schema;
}

function compileEnum(values: readonly EnumValue[], path: readonly string[]): ZodTypeAny {
    const strings = values.filter((v): v is string => typeof v === 'string');
    const [firstString, ...restStrings] = strings;
    if (firstString !== undefined && strings.length === values.length) {
        return z.enum([firstString, ...restStrings]);
    }

    const members: ZodTypeAny[] = values.map(v => (v === null ? z.null() : z.literal(v)));
    const [first, second, ...rest] = members;
    if (first === undefined) {
        throw new SchemaBuildError('EMPTY_SEQUENCE', 'An enum needs at least one value', path);
    }
    return second === undefined ? first : z.union([first, second, ...rest]);
}

// ── Constraint Placement ─────────────────────────────────

function assertConstraints(node: SchemaNode, path: readonly string[]): void {
    const applicable = new Set<string>(applicableConstraints(node));
    for (const key of Object.keys(node.constraints)) {
        if (!applicable.has(key)) {
            const target = node.kind === 'primitive' ? node.type : node.kind;
            throw new SchemaBuildError('UNSUPPORTED_CONSTRAINT', `Constraint "${key}" does not apply to ${target}`, path);
        }
    }
}
