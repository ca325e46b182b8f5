import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { ZodEngine } from '../../src/engine/ZodEngine.js';
import { compileNode } from '../../src/engine/ZodCompiler.js';
import { resolveValue } from '../../src/engine/ZodIssueMapper.js';
import { type ModelSpec } from '../../src/engine/ValidationEngine.js';
import { ValidationFailure } from '../../src/errors.js';
import { arrayNode, enumNode, field, objectNode, primitiveNode } from '../../src/ist/nodes.js';
import { type DebugEvent } from '../../src/observability/DebugObserver.js';
import { catchBuildError } from '../helpers.js';

// ============================================================================
// ZodEngine Tests
// ============================================================================

const citySpec: ModelSpec = {
    name: 'City',
    fields: [
        { name: 'name', node: primitiveNode('string'), required: true },
        { name: 'age', node: primitiveNode('integer'), required: true },
    ],
};

describe('ZodEngine', () => {
    // ── Error Records ──

    describe('Error Records', () => {
        it('should report a missing field with the enclosing object as input', () => {
            const model = new ZodEngine().defineModel(citySpec);
            const result = model.validate({ name: 'New York' });
            expect(result).toEqual({
                ok: false,
                error: [{
                    kind: 'missing',
                    locationPath: ['age'],
                    message: 'Field required',
                    offendingInput: { name: 'New York' },
                }],
            });
        });

        it('should report a wrong type with its context', () => {
            const model = new ZodEngine().defineModel(citySpec);
            const result = model.validate({ name: 'New York', age: 'twenty' });
            expect(result.ok).toBe(false);
            expect(result.ok ? [] : result.error).toEqual([{
                kind: 'invalid_type',
                locationPath: ['age'],
                message: 'Expected number, received string',
                offendingInput: 'twenty',
                context: { expected: 'number', received: 'string' },
            }]);
        });

        it('should keep array indices in nested paths', () => {
            const item = objectNode([field('name', primitiveNode('string'), true)]);
            const model = new ZodEngine().defineModel({
                name: 'Order',
                fields: [{ name: 'items', node: arrayNode(item), required: true }],
            });
            const result = model.validate({ items: [{ name: 'a' }, {}] });
            expect(result.ok ? [] : result.error).toEqual([{
                kind: 'missing',
                locationPath: ['items', 1, 'name'],
                message: 'Field required',
                offendingInput: {},
            }]);
        });

        it('should report enum and length violations with their metadata', () => {
            const model = new ZodEngine().defineModel({
                name: 'M',
                fields: [
                    { name: 'unit', node: enumNode(['c', 'f']), required: true },
                    { name: 'code', node: primitiveNode('string', { constraints: { minLength: 2 } }), required: true },
                ],
            });
            const result = model.validate({ unit: 'k', code: 'x' });
            const [unit, code] = result.ok ? [] : result.error;
            expect(unit?.kind).toBe('invalid_enum_value');
            expect(unit?.context).toEqual({ options: ['c', 'f'], received: 'k' });
            expect(code?.kind).toBe('too_small');
            expect(code?.message).toBe('String must contain at least 2 character(s)');
            expect(code?.context).toEqual({ minimum: 2, inclusive: true, exact: false, type: 'string' });
        });

        it('should reject extra fields when configured to', () => {
            const model = new ZodEngine({ forbidExtraFields: true }).defineModel(citySpec);
            const input = { name: 'a', age: 1, extra: true };
            const result = model.validate(input);
            expect(result.ok ? [] : result.error).toEqual([{
                kind: 'unrecognized_keys',
                locationPath: [],
                message: "Unrecognized key(s) in object: 'extra'",
                offendingInput: input,
                context: { keys: ['extra'] },
            }]);
        });

        it('should strip extra fields by default', () => {
            const model = new ZodEngine().defineModel(citySpec);
            expect(model.validate({ name: 'a', age: 1, extra: true })).toEqual({ ok: true, value: { name: 'a', age: 1 } });
        });
    });

    // ── Presence & Defaults ──

    describe('Presence & Defaults', () => {
        it('should keep a required any field required', () => {
            const model = new ZodEngine().defineModel({
                name: 'M',
                fields: [{ name: 'payload', node: primitiveNode('any'), required: true }],
            });
            expect(model.validate({ payload: null }).ok).toBe(true);
            expect(model.validate({})).toEqual({
                ok: false,
                error: [{
                    kind: 'missing',
                    locationPath: ['payload'],
                    message: 'Field required',
                    offendingInput: {},
                }],
            });
        });

        it('should apply defaults when parsing', () => {
            const model = new ZodEngine().defineModel({
                name: 'M',
                fields: [{ name: 'days', node: primitiveNode('integer', { default: 3 }), required: false }],
            });
            expect(model.parse({})).toEqual({ days: 3 });
        });

        it('should accept omitted optional fields', () => {
            const model = new ZodEngine().defineModel({
                name: 'M',
                fields: [{ name: 'note', node: primitiveNode('string'), required: false }],
            });
            expect(model.parse({})).toEqual({});
        });
    });

    // ── parse ──

    describe('parse', () => {
        it('should throw a ValidationFailure listing every error', () => {
            const model = new ZodEngine().defineModel(citySpec);
            let caught: unknown;
            try {
                model.parse({ name: 'New York' });
            } catch (e) {
                caught = e;
            }
            expect(caught).toBeInstanceOf(ValidationFailure);
            expect(caught instanceof ValidationFailure && caught.message).toBe("[City] Validation failed:\n  • 'age': Field required");
            expect(caught instanceof ValidationFailure && caught.records).toHaveLength(1);
        });
    });

    // ── JSON Schema ──

    describe('jsonSchema', () => {
        it('should reference the model under $defs', () => {
            const schema = new ZodEngine().defineModel(citySpec).jsonSchema();
            expect(schema['$ref']).toBe('#/$defs/City');
        });

        it('should read its own JSON schema back into the canonical dialect', () => {
            const model = new ZodEngine().defineModel({ ...citySpec, description: 'A city' });
            expect(JSON.stringify(model.schema())).toBe(
                '{"type":"object","description":"A city","properties":{"name":{"type":"string"},"age":{"type":"integer"}},"required":["name","age"],"title":"City"}',
            );
        });
    });

    // ── Debug ──

    describe('Debug Events', () => {
        it('should emit a validate event per validation', () => {
            const events: DebugEvent[] = [];
            const model = new ZodEngine({ debug: e => events.push(e) }).defineModel(citySpec);
            model.validate({ name: 'a' });
            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({ type: 'validate', model: 'City', valid: false, errorCount: 1 });
        });

        it('should emit a validate event when parsing and keep the Zod error as the cause', () => {
            const events: DebugEvent[] = [];
            const model = new ZodEngine({ debug: e => events.push(e) }).defineModel(citySpec);

            expect(model.parse({ name: 'a', age: 1 })).toEqual({ name: 'a', age: 1 });
            let caught: unknown;
            try {
                model.parse({ name: 'a' });
            } catch (e) {
                caught = e;
            }

            expect(events.map(e => e.type)).toEqual(['validate', 'validate']);
            expect(events[0]).toMatchObject({ model: 'City', valid: true, errorCount: 0 });
            expect(events[1]).toMatchObject({ model: 'City', valid: false, errorCount: 1 });
            expect(caught instanceof ValidationFailure ? caught.cause : undefined).toBeInstanceOf(ZodError);
        });
    });
});

describe('ZodCompiler', () => {
    it('should reject unknown string formats', () => {
        const error = catchBuildError(() => compileNode(primitiveNode('string', { constraints: { format: 'hostname' } }), {}, ['host']));
        expect(error.code).toBe('UNSUPPORTED_CONSTRAINT');
        expect(error.message).toBe('Unsupported string format "hostname" (at host)');
    });

    it('should reject constraints on the wrong node kind', () => {
        const error = catchBuildError(() => compileNode(primitiveNode('boolean', { constraints: { minLength: 1 } })));
        expect(error.message).toBe('Constraint "minLength" does not apply to boolean');
    });

    it('should compile mixed enums into literal unions', () => {
        const schema = compileNode(enumNode([1, 'a', null]));
        expect(schema.safeParse(1).success).toBe(true);
        expect(schema.safeParse(null).success).toBe(true);
        expect(schema.safeParse('b').success).toBe(false);
    });

    it('should honour numeric bounds', () => {
        const schema = compileNode(primitiveNode('integer', { constraints: { exclusiveMinimum: 0, maximum: 10 } }));
        expect(schema.safeParse(0).success).toBe(false);
        expect(schema.safeParse(10).success).toBe(true);
        expect(schema.safeParse(1.5).success).toBe(false);
    });
});

describe('resolveValue', () => {
    it('should walk objects and arrays', () => {
        expect(resolveValue({ a: [{ b: 1 }] }, ['a', 0, 'b'])).toBe(1);
    });

    it('should return undefined once the path leaves the data', () => {
        expect(resolveValue({ a: 1 }, ['a', 'b'])).toBeUndefined();
    });
});
