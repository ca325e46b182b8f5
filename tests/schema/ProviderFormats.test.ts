import { describe, it, expect } from 'vitest';
import { arrayNode, field, objectNode, primitiveNode } from '../../src/ist/nodes.js';
import { canonicalize, serialize } from '../../src/schema/CanonicalSerializer.js';
import { isProviderFormat, toToolDefinition } from '../../src/schema/ProviderFormats.js';

// ============================================================================
// ProviderFormats Tests
// ============================================================================

const schema = canonicalize(objectNode([
    field('city', primitiveNode('string'), true),
    field('unit', primitiveNode('string', { default: 'celsius' }), false),
    field('stops', arrayNode(objectNode([field('name', primitiveNode('string'), true)])), false),
], { name: 'get_weather', description: 'Get weather' }));

const parameters = {
    type: 'object',
    properties: {
        city: { type: 'string' },
        unit: { type: 'string', default: 'celsius' },
        stops: {
            type: 'array',
            items: { type: 'object', properties: { name: { type: 'string' } }, required: ['name'] },
        },
    },
    required: ['city'],
};

const strictParameters = {
    type: 'object',
    properties: {
        city: { type: 'string' },
        unit: { type: 'string', default: 'celsius' },
        stops: {
            type: 'array',
            items: {
                type: 'object',
                properties: { name: { type: 'string' } },
                required: ['name'],
                additionalProperties: false,
            },
        },
    },
    required: ['city', 'unit', 'stops'],
    additionalProperties: false,
};

describe('ProviderFormats', () => {
    it('should return the schema itself for the canonical format', () => {
        expect(toToolDefinition(schema)).toEqual({ ...parameters, description: 'Get weather', title: 'get_weather' });
    });

    it('should build a generic definition', () => {
        expect(toToolDefinition(schema, 'generic')).toEqual({ name: 'get_weather', description: 'Get weather', parameters });
    });

    it('should build an Anthropic definition', () => {
        expect(toToolDefinition(schema, 'anthropic')).toEqual({
            name: 'get_weather',
            description: 'Get weather',
            input_schema: parameters,
        });
    });

    it('should build an OpenAI function definition', () => {
        expect(toToolDefinition(schema, 'openai')).toEqual({
            type: 'function',
            function: { name: 'get_weather', description: 'Get weather', parameters },
        });
    });

    it('should build an OpenAI strict definition', () => {
        const definition = toToolDefinition(schema, 'openai-strict');
        expect(definition).toEqual({
            type: 'function',
            function: { name: 'get_weather', description: 'Get weather', strict: true, parameters: strictParameters },
        });
        expect(JSON.stringify(definition)).toContain('"required":["city","unit","stops"],"additionalProperties":false');
    });

    it('should build an OpenAI response format', () => {
        expect(toToolDefinition(schema, 'openai-response-format')).toEqual({
            type: 'json_schema',
            json_schema: { name: 'get_weather', description: 'Get weather', strict: true, schema: strictParameters },
        });
    });

    it('should drop defaults for Google', () => {
        const definition = toToolDefinition(schema, 'google');
        expect(definition).toEqual({
            name: 'get_weather',
            description: 'Get weather',
            parameters: { ...parameters, properties: { ...parameters.properties, unit: { type: 'string' } } },
        });
    });

    it('should keep a property named "default" for Google', () => {
        const withDefaultField = canonicalize(objectNode([field('default', primitiveNode('boolean'), true)], { name: 't' }));
        expect(toToolDefinition(withDefaultField, 'google')).toEqual({
            name: 't',
            description: '',
            parameters: { type: 'object', properties: { default: { type: 'boolean' } }, required: ['default'] },
        });
    });

    it('should fall back to "function" for an untitled schema', () => {
        expect(toToolDefinition(serialize(objectNode([])), 'generic')).toEqual({
            name: 'function',
            description: '',
            parameters: { type: 'object', properties: {} },
        });
    });

    it('should recognize format names', () => {
        expect(isProviderFormat('anthropic')).toBe(true);
        expect(isProviderFormat('claude')).toBe(false);
    });
});
