/**
 * ProviderFormats — Canonical Schema → Provider Tool Definitions
 *
 * Wraps a canonical schema in the envelope each model provider expects.
 * The root `title` becomes the tool name (`function` when absent) and the
 * root `description` becomes the tool description (`""` when absent);
 * both are lifted out of the parameter schema.
 *
 * | Format                   | Shape                                                   |
 * |--------------------------|---------------------------------------------------------|
 * | `canonical`              | the schema itself                                       |
 * | `generic`                | `{ name, description, parameters }`                     |
 * | `anthropic`              | `{ name, description, input_schema }`                   |
 * | `openai`                 | `{ type: 'function', function: { name, description, parameters } }` |
 * | `openai-strict`          | as `openai`, plus `strict: true` and strict parameters  |
 * | `openai-response-format` | `{ type: 'json_schema', json_schema: { name, description, strict, schema } }` |
 * | `google`                 | as `generic`, with every `default` removed              |
 *
 * Strict parameters: every object lists all of its properties as
 * required and carries `additionalProperties: false`.
 *
 * @module
 */
import { type JsonObject, type JsonValue } from '../ist/types.js';
import { isJsonArray, isJsonObject } from '../ist/json.js';
import { type CanonicalSchema, toJsonObject } from './CanonicalSerializer.js';

// ── Types ────────────────────────────────────────────────

export const PROVIDER_FORMATS = [
    'canonical',
    'generic',
    'anthropic',
    'openai',
    'openai-strict',
    'openai-response-format',
    'google',
] as const;

export type ProviderFormat = typeof PROVIDER_FORMATS[number];

// ── Public API ───────────────────────────────────────────

/**
 * Build the tool definition for `format`. The schema is not modified.
 */
export function toToolDefinition(schema: CanonicalSchema, format: ProviderFormat = 'canonical'): JsonObject {
    const json = toJsonObject(schema);
    if (format === 'canonical') return json;

    const { title, description, ...parameters } = json;
    const name = typeof title === 'string' ? title : 'function';
    const summary = typeof description === 'string' ? description : '';

    switch (format) {
        case 'generic':
            return { name, description: summary, parameters };

        case 'anthropic':
            return { name, description: summary, input_schema: parameters };

        case 'openai':
            return { type: 'function', function: { name, description: summary, parameters } };

        case 'openai-strict':
            return {
                type: 'function',
                function: { name, description: summary, strict: true, parameters: strictify(parameters) },
            };

        case 'openai-response-format':
            return {
                type: 'json_schema',
                json_schema: { name, description: summary, strict: true, schema: strictify(parameters) },
            };

        case 'google':
            return { name, description: summary, parameters: withoutKey(parameters, 'default') };
    }
}

export function isProviderFormat(value: string): value is ProviderFormat {
    return PROVIDER_FORMATS.some(format => format === value);
}

// ── Transforms ───────────────────────────────────────────

/**
 * Strict-mode copy: `required` lists every property and
 * `additionalProperties: false` follows it on each object.
 */
export function strictify(node: JsonObject): JsonObject {
    const out: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(node)) {
        if (key === 'required') continue;

        if (key === 'properties' && isJsonObject(value)) {
            const properties: Record<string, JsonValue> = {};
            for (const [name, property] of Object.entries(value)) {
                properties[name] = isJsonObject(property) ? strictify(property) : property;
            }
            out['properties'] = properties;
            out['required'] = Object.keys(properties);
            if (node['type'] === 'object') out['additionalProperties'] = false;
        } else if (key === 'items' && isJsonObject(value)) {
            out['items'] = strictify(value);
        } else if (key === 'anyOf' && isJsonArray(value)) {
            out['anyOf'] = value.map(member => (isJsonObject(member) ? strictify(member) : member));
        } else {
            out[key] = value;
        }
    }
    return out;
}

/**
 * Copy of a schema node with `key` removed from it and from every
 * nested schema. Property names are never touched.
 */
export function withoutKey(node: JsonObject, key: string): JsonObject {
    const out: Record<string, JsonValue> = {};
    for (const [name, value] of Object.entries(node)) {
        if (name === key) continue;
        if (name === 'properties' && isJsonObject(value)) {
            const properties: Record<string, JsonValue> = {};
            for (const [property, schema] of Object.entries(value)) {
                properties[property] = isJsonObject(schema) ? withoutKey(schema, key) : schema;
            }
            out[name] = properties;
        } else if (name === 'items' && isJsonObject(value)) {
            out[name] = withoutKey(value, key);
        } else if (name === 'anyOf' && isJsonArray(value)) {
            out[name] = value.map(member => (isJsonObject(member) ? withoutKey(member, key) : member));
        } else {
            out[name] = value;
        }
    }
    return out;
}
