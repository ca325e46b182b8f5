import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { adapt, type TypeSource } from '../../src/adapter/TypeSource.js';
import { synthesize, toModelSpec } from '../../src/model/ModelSynthesizer.js';
import { canonicalize, stringifyCanonical } from '../../src/schema/CanonicalSerializer.js';
import { IdentifierAllocator } from '../../src/naming/IdentifierAllocator.js';
import { arrayNode, field, objectNode, primitiveNode } from '../../src/ist/nodes.js';
import { type SchemaNode } from '../../src/ist/types.js';
import { catchBuildError } from '../helpers.js';

// ============================================================================
// ModelSynthesizer & Cross-Source Equality Tests
// ============================================================================

const EXPECTED = '{"type":"object","description":"This is a test model","properties":{"name":{"type":"string"},"age":{"type":"integer"},"is_student":{"type":"boolean"}},"required":["name","age","is_student"],"title":"MyModel"}';

const sources: readonly TypeSource[] = [
    {
        kind: 'class',
        name: 'MyModel',
        schema: z.object({ name: z.string(), age: z.number().int(), is_student: z.boolean() })
            .describe('This is a test model'),
    },
    {
        kind: 'function',
        name: 'MyModel',
        doc: 'This is a test model',
        parameters: [
            { name: 'name', type: z.string() },
            { name: 'age', type: z.number().int() },
            { name: 'is_student', type: z.boolean() },
        ],
    },
    {
        kind: 'sample',
        name: 'MyModel',
        description: 'This is a test model',
        data: { name: 'John', age: 30, is_student: true },
    },
    {
        kind: 'document',
        document: {
            title: 'MyModel',
            description: 'This is a test model',
            type: 'object',
            properties: { name: { type: 'string' }, age: { type: 'integer' }, is_student: { type: 'boolean' } },
            required: ['name', 'age', 'is_student'],
        },
    },
];

describe('Cross-source equality', () => {
    it.each(sources.map((source): [string, TypeSource] => [source.kind, source]))(
        'should emit the same schema for the %s variant',
        (_kind, source) => {
            expect(stringifyCanonical(canonicalize(adapt(source)))).toBe(EXPECTED);
        },
    );

    it.each(sources.map((source): [string, TypeSource] => [source.kind, source]))(
        'should synthesize a %s model whose schema matches the canonical one',
        (_kind, source) => {
            const tree = adapt(source);
            expect(stringifyCanonical(synthesize(tree).schema())).toBe(stringifyCanonical(canonicalize(tree)));
        },
    );

    it('should round-trip a richer class definition through the model', () => {
        const tree = adapt({
            kind: 'class',
            name: 'Record',
            schema: z.object({
                slug: z.string().min(1).max(20).regex(/^[a-z-]+$/).describe('URL slug'),
                email: z.string().email().optional(),
                mode: z.enum(['on', 'off']).nullable(),
                pick: z.enum(['x', 'y']).describe('pick one'),
                size: z.number().int().gte(1).default(1),
                tags: z.array(z.string()).max(5),
                value: z.union([z.string(), z.number()]),
                meta: z.object({ note: z.string().nullable() }),
                extra: z.unknown(),
            }).describe('A record'),
        });
        expect(stringifyCanonical(synthesize(tree).schema())).toBe(stringifyCanonical(canonicalize(tree)));
    });
});

describe('Round trips through the model', () => {
    const shapes: [string, SchemaNode][] = [
        ['a document with shared definitions and a description override', adapt({
            kind: 'document',
            document: {
                title: 'Order',
                type: 'object',
                properties: {
                    billing: { $ref: '#/$defs/Address', description: 'Billing address' },
                    shipping: { $ref: '#/$defs/Address' },
                },
                required: ['billing'],
                $defs: {
                    Address: {
                        type: 'object',
                        description: 'A postal address',
                        properties: { city: { type: 'string' }, zip: { type: 'string', pattern: '^[0-9]{5}$' } },
                        required: ['city'],
                    },
                },
            },
        })],
        ['a nested sample', adapt({
            kind: 'sample',
            name: 'Cart',
            data: { items: [{ sku: 'x', qty: 1, tags: ['a'] }], coupons: [], note: null },
        })],
        ['a sample with null and scalar defaults', adapt(
            { kind: 'sample', name: 'Prefs', data: { theme: 'dark', limit: null, pages: 2 } },
            { samples: { valuesAsDefaults: true } },
        )],
        ['a function whose parameters carry only defaults', adapt({
            kind: 'function',
            name: 'forecast',
            parameters: [
                { name: 'days', default: 3 },
                { name: 'unit', default: 'celsius', kind: 'keyword' },
                { name: 'note', default: null, kind: 'keyword' },
            ],
        })],
        ['a class with a null default', adapt({
            kind: 'class',
            name: 'Filter',
            schema: z.object({ label: z.string().nullable().default(null), query: z.string(), raw: z.any() }),
        })],
    ];

    it.each(shapes)('should keep %s', (_label, tree) => {
        expect(stringifyCanonical(synthesize(tree).schema())).toBe(stringifyCanonical(canonicalize(tree)));
    });

    it('should carry the description override into the inlined schema', () => {
        const tree = shapes[0]?.[1];
        if (tree === undefined) throw new Error('expected a shape');
        const props = canonicalize(tree).properties;
        expect(props['billing']).toMatchObject({ description: 'Billing address' });
        expect(props['shipping']).toMatchObject({ description: 'A postal address' });
    });

    it('should fill null defaults when validating', () => {
        const tree = shapes[3]?.[1];
        if (tree === undefined) throw new Error('expected a shape');
        expect(synthesize(tree).parse({})).toEqual({ days: 3, unit: 'celsius', note: null });
    });
});

describe('ModelSynthesizer', () => {
    it('should list fields in declaration order', () => {
        const spec = toModelSpec(objectNode([
            field('b', primitiveNode('string'), true),
            field('a', arrayNode(primitiveNode('integer')), false),
        ], { name: 'M', description: 'desc' }));
        expect(spec.name).toBe('M');
        expect(spec.description).toBe('desc');
        expect(spec.fields.map(f => [f.name, f.required])).toEqual([['b', true], ['a', false]]);
    });

    it('should name an unnamed root from the allocator', () => {
        const allocator = new IdentifierAllocator(7);
        expect(toModelSpec(objectNode([]), { allocator }).name).toBe('Model_7');
        expect(toModelSpec(objectNode([])).name).toBe('Model');
    });

    it('should reject a non-object root', () => {
        const error = catchBuildError(() => synthesize(primitiveNode('string')));
        expect(error.code).toBe('INVALID_SOURCE');
    });

    it('should validate through the synthesized model', () => {
        const model = synthesize(adapt({ kind: 'sample', name: 'Student', data: { name: 'John', age: 30, is_student: true } }));
        expect(model.validate({ name: 'Ann', age: 20, is_student: false }).ok).toBe(true);
        expect(model.validate({ name: 'Ann', age: 20 }).ok).toBe(false);
    });
});
