import { describe, it, expect } from 'vitest';
import {
    arrayNode,
    enumNode,
    field,
    objectNode,
    primitiveNode,
    unionOf,
    withMeta,
    normalizeConstraints,
    partitionConstraints,
    STRING_CONSTRAINTS,
} from '../../src/ist/nodes.js';
import { toJsonValue } from '../../src/ist/json.js';
import { SchemaBuildError } from '../../src/errors.js';
import { catchBuildError } from '../helpers.js';

// ============================================================================
// IST Constructor Tests
// ============================================================================

describe('IST constructors', () => {
    // ── Fields ──

    describe('field', () => {
        it('should keep required for a node without default', () => {
            expect(field('a', primitiveNode('string'), true).required).toBe(true);
        });

        it('should never mark a field with a default as required', () => {
            const node = primitiveNode('string', { default: 'x' });
            expect(field('a', node, true).required).toBe(false);
        });
    });

    // ── Objects ──

    describe('objectNode', () => {
        it('should keep field order', () => {
            const node = objectNode([
                field('b', primitiveNode('string'), true),
                field('a', primitiveNode('string'), true),
                field('c', primitiveNode('string'), true),
            ]);
            expect(node.fields.map(f => f.name)).toEqual(['b', 'a', 'c']);
        });

        it('should reject duplicate field names', () => {
            const make = () => objectNode([
                field('a', primitiveNode('string'), true),
                field('a', primitiveNode('integer'), true),
            ]);
            expect(make).toThrow(SchemaBuildError);
            expect(make).toThrow('Duplicate field "a"');
        });

        it('should reject field names that look like array indices', () => {
            const error = catchBuildError(() => objectNode([field('0', primitiveNode('string'), true)]));
            expect(error.code).toBe('INVALID_SOURCE');
            expect(error.path).toEqual(['0']);
        });

        it('should reject a field named __proto__', () => {
            const error = catchBuildError(() => objectNode([field('__proto__', primitiveNode('string'), true)]));
            expect(error.code).toBe('INVALID_SOURCE');
            expect(error.path).toEqual(['__proto__']);
        });

        it('should accept names that merely start with a digit', () => {
            const node = objectNode([field('01', primitiveNode('string'), true), field('1a', primitiveNode('string'), true)]);
            expect(node.fields).toHaveLength(2);
        });

        it('should freeze nodes', () => {
            const node = objectNode([]);
            expect(Object.isFrozen(node)).toBe(true);
            expect(Object.isFrozen(node.fields)).toBe(true);
        });
    });

    // ── Metadata ──

    describe('metadata', () => {
        it('should treat an empty description as absent', () => {
            expect(primitiveNode('string', { description: '' }).description).toBeUndefined();
        });

        it('should treat an empty pattern as absent', () => {
            expect(primitiveNode('string', { constraints: { pattern: '' } }).constraints).toEqual({});
        });

        it('should normalize patterns to RegExp source form', () => {
            const node = primitiveNode('string', { constraints: { pattern: 'a/b' } });
            expect(node.constraints.pattern).toBe('a\\/b');
        });

        it('should reject invalid patterns', () => {
            expect(() => primitiveNode('string', { constraints: { pattern: '(' } })).toThrow(SchemaBuildError);
        });

        it('withMeta should keep values not overridden and merge constraints', () => {
            const node = primitiveNode('integer', { description: 'count', constraints: { minimum: 0 } });
            const next = withMeta(node, { default: 3, constraints: { maximum: 9 } });
            expect(next.description).toBe('count');
            expect(next.default).toBe(3);
            expect(next.constraints).toEqual({ minimum: 0, maximum: 9 });
        });

        it('withMeta should set a null default', () => {
            const next = withMeta(primitiveNode('any'), { default: null });
            expect(next.default).toBeNull();
            expect(field('x', next, true).required).toBe(false);
        });

        it('withMeta should keep a null default when the override leaves it unset', () => {
            const node = primitiveNode('any', { default: null });
            expect(withMeta(node, { description: 'x' }).default).toBeNull();
        });

        it('should order constraints canonically', () => {
            const constraints = normalizeConstraints({ maxLength: 5, pattern: 'x', minLength: 1 });
            expect(Object.keys(constraints)).toEqual(['pattern', 'minLength', 'maxLength']);
        });

        it('partitionConstraints should split by key list', () => {
            const { picked, rest } = partitionConstraints({ minLength: 1, minimum: 2 }, STRING_CONSTRAINTS);
            expect(picked).toEqual({ minLength: 1 });
            expect(rest).toEqual({ minimum: 2 });
        });
    });

    // ── Enums ──

    describe('enumNode', () => {
        it('should de-duplicate values in first-seen order', () => {
            const node = enumNode(['b', 'a', 'b']);
            expect(node.kind === 'enum' && node.values).toEqual(['b', 'a']);
        });

        it('should turn a lone null into the null primitive', () => {
            const node = enumNode([null]);
            expect(node.kind).toBe('primitive');
            expect(node.kind === 'primitive' && node.type).toBe('null');
        });

        it('should reject an empty value list', () => {
            expect(() => enumNode([])).toThrow(SchemaBuildError);
        });
    });

    // ── Unions ──

    describe('unionOf', () => {
        it('should collapse a single member into that member', () => {
            const node = unionOf([primitiveNode('string')], { description: 'text' });
            expect(node.kind).toBe('primitive');
            expect(node.description).toBe('text');
        });

        it('should flatten nested unions', () => {
            const inner = unionOf([primitiveNode('string'), primitiveNode('integer')]);
            const node = unionOf([inner, primitiveNode('boolean')]);
            expect(node.kind === 'union' && node.members.map(m => m.kind === 'primitive' && m.type))
                .toEqual(['string', 'integer', 'boolean']);
        });

        it('should drop duplicate bare primitives', () => {
            const node = unionOf([primitiveNode('string'), primitiveNode('string'), primitiveNode('null')]);
            expect(node.kind === 'union' && node.members).toHaveLength(2);
        });

        it('should keep constrained primitives distinct', () => {
            const node = unionOf([
                primitiveNode('string', { constraints: { minLength: 1 } }),
                primitiveNode('string'),
            ]);
            expect(node.kind === 'union' && node.members).toHaveLength(2);
        });

        it('should merge enums with null into one enum', () => {
            const node = unionOf([enumNode(['a', 'b']), primitiveNode('null')]);
            expect(node.kind).toBe('enum');
            expect(node.kind === 'enum' && node.values).toEqual(['a', 'b', null]);
        });

        it('should strip member names, descriptions and defaults', () => {
            const node = unionOf([
                primitiveNode('string', { name: 'S', description: 'text', default: 'x' }),
                arrayNode(primitiveNode('integer')),
            ]);
            expect(node.kind).toBe('union');
            const [first] = node.kind === 'union' ? node.members : [];
            expect(first?.name).toBeUndefined();
            expect(first?.description).toBeUndefined();
            expect(first?.default).toBeUndefined();
        });

        it('should reject an empty member list', () => {
            expect(() => unionOf([])).toThrow(SchemaBuildError);
        });
    });

    // ── JSON values ──

    describe('toJsonValue', () => {
        it('should skip undefined object properties', () => {
            expect(toJsonValue({ a: 1, b: undefined })).toEqual({ a: 1 });
        });

        it('should reject non-finite numbers with their path', () => {
            expect(() => toJsonValue({ a: [Number.NaN] })).toThrow('NaN is not a JSON number (at a.0)');
        });

        it('should keep a __proto__ key as an own property', () => {
            const value = toJsonValue(JSON.parse('{"__proto__":1,"a":2}'));
            expect(Object.keys(value ?? {})).toEqual(['__proto__', 'a']);
            expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
        });

        it('should reject class instances', () => {
            expect(() => toJsonValue(new Date(0))).toThrow('Value of type Date is not JSON data');
        });
    });
});
