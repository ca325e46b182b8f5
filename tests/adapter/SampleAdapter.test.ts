import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { adaptSample } from '../../src/adapter/SampleAdapter.js';
import { type SamplePolicy } from '../../src/adapter/AdaptOptions.js';
import { canonicalize, stringifyCanonical } from '../../src/schema/CanonicalSerializer.js';
import { catchBuildError } from '../helpers.js';

// ============================================================================
// SampleAdapter Tests
// ============================================================================

function canonical(name: string, data: Record<string, unknown>, samples: Partial<SamplePolicy> = {}): string {
    return stringifyCanonical(canonicalize(adaptSample({ kind: 'sample', name, data }, { samples })));
}

describe('SampleAdapter', () => {
    // ── Scalars ──

    describe('Scalar Inference', () => {
        it('should infer string, integer and boolean fields', () => {
            const tree = adaptSample({
                kind: 'sample',
                name: 'MyModel',
                description: 'This is a test model',
                data: { name: 'John', age: 30, is_student: true },
            });
            expect(stringifyCanonical(canonicalize(tree))).toBe(
                '{"type":"object","description":"This is a test model","properties":{"name":{"type":"string"},"age":{"type":"integer"},"is_student":{"type":"boolean"}},"required":["name","age","is_student"],"title":"MyModel"}',
            );
        });

        it('should infer boolean, not integer, for true', () => {
            expect(canonical('Flags', { flag: true })).toBe(
                '{"type":"object","properties":{"flag":{"type":"boolean"}},"required":["flag"],"title":"Flags"}',
            );
        });

        it('should infer number for fractional values', () => {
            expect(canonical('P', { price: 9.5 })).toContain('"price":{"type":"number"}');
        });

        it('should infer any for null', () => {
            expect(canonical('N', { x: null })).toBe('{"type":"object","properties":{"x":{}},"required":["x"],"title":"N"}');
        });

        it('should reject values with no JSON type', () => {
            const error = catchBuildError(() => canonical('D', { when: new Date(0) }));
            expect(error.code).toBe('UNSUPPORTED_ANNOTATION');
            expect(error.path).toEqual(['when']);
        });

        it('should reject a __proto__ key', () => {
            const data: Record<string, unknown> = JSON.parse('{"__proto__":"x","a":1}');
            const error = catchBuildError(() => adaptSample({ kind: 'sample', name: 'P', data }));
            expect(error.code).toBe('INVALID_SOURCE');
            expect(error.path).toEqual(['__proto__']);
        });

        it('should reject non-finite numbers', () => {
            expect(catchBuildError(() => canonical('D', { n: Number.POSITIVE_INFINITY })).code).toBe('UNSUPPORTED_ANNOTATION');
        });
    });

    // ── Containers ──

    describe('Containers', () => {
        it('should infer arrays and nested objects', () => {
            const data = {
                tags: ['a'],
                scores: [],
                owner: { id: 1 },
                items: [{ sku: 'x' }],
            };
            expect(canonical('Cart', data)).toBe(
                '{"type":"object","properties":{'
                + '"tags":{"type":"array","items":{"type":"string"}},'
                + '"scores":{"type":"array","items":{}},'
                + '"owner":{"type":"object","properties":{"id":{"type":"integer"}},"required":["id"]},'
                + '"items":{"type":"array","items":{"type":"object","properties":{"sku":{"type":"string"}},"required":["sku"]}}'
                + '},"required":["tags","scores","owner","items"],"title":"Cart"}',
            );
        });

        it('should name nested objects after the model and key', () => {
            const tree = adaptSample({ kind: 'sample', name: 'Cart', data: { owner: { id: 1 }, items: [{ sku: 'x' }] } });
            if (tree.kind !== 'object') throw new Error('expected an object');
            const [owner, items] = tree.fields;
            expect(owner?.node.name).toBe('Cart_Owner');
            const itemsNode = items?.node;
            expect(itemsNode?.kind === 'array' ? itemsNode.items.name : undefined).toBe('Cart_Item');
        });

        it('should reject empty arrays under the error policy', () => {
            const error = catchBuildError(() => canonical('Cart', { scores: [] }, { emptyArrays: 'error' }));
            expect(error.code).toBe('EMPTY_SEQUENCE');
            expect(error.path).toEqual(['scores']);
        });
    });

    // ── Policies ──

    describe('Sample Policies', () => {
        it('should turn scalar values into defaults', () => {
            expect(canonical('Forecast', { unit: 'celsius', days: 3 }, { valuesAsDefaults: true })).toBe(
                '{"type":"object","properties":{"unit":{"type":"string","default":"celsius"},"days":{"type":"integer","default":3}},"title":"Forecast"}',
            );
        });

        it('should keep a null value as a null default', () => {
            expect(canonical('N', { x: null, y: 1 }, { valuesAsDefaults: true })).toBe(
                '{"type":"object","properties":{"x":{"default":null},"y":{"type":"integer","default":1}},"title":"N"}',
            );
        });

        it('should turn strings into descriptions', () => {
            expect(canonical('Weather', { city: 'City name' }, { stringsAsDescriptions: true })).toBe(
                '{"type":"object","properties":{"city":{"type":"string","description":"City name"}},"required":["city"],"title":"Weather"}',
            );
        });
    });

    // ── Mixed Annotations ──

    describe('Zod Values', () => {
        it('should read Zod schemas in place of values', () => {
            const data = { city: z.string().describe('City'), unit: z.enum(['c', 'f']).optional() };
            expect(canonical('Weather', data)).toBe(
                '{"type":"object","properties":{"city":{"type":"string","description":"City"},"unit":{"type":"string","enum":["c","f"]}},"required":["city"],"title":"Weather"}',
            );
        });
    });
});
