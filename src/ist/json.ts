/**
 * JSON value guards and conversion.
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import { type JsonObject, type JsonValue, type EnumValue } from './types.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is readonly JsonValue[] {
    return Array.isArray(value);
}

export function isScalar(value: JsonValue | undefined): value is EnumValue {
    return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Plain `{}` object, not a class instance, array, date or map */
export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Check that `value` is JSON data and return it typed as such.
 *
 * @throws {SchemaBuildError} `INVALID_SOURCE` for functions, `undefined`
 *     inside arrays, non-finite numbers, bigints, symbols and class instances
 */
export function toJsonValue(value: unknown, path: readonly string[] = []): JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') {
        if (Number.isFinite(value)) return value;
        throw new SchemaBuildError('INVALID_SOURCE', `${String(value)} is not a JSON number`, path);
    }
    if (Array.isArray(value)) {
        const items: unknown[] = value;
        return items.map((item, i) => toJsonValue(item, [...path, String(i)]));
    }
    if (isPlainObject(value)) {
        return Object.fromEntries(
            Object.entries(value)
                .filter(([, item]) => item !== undefined)
                .map(([key, item]): [string, JsonValue] => [key, toJsonValue(item, [...path, key])]),
        );
    }
    throw new SchemaBuildError('INVALID_SOURCE', `Value of type ${describeType(value)} is not JSON data`, path);
}

export function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'object') {
        const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
        return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
    }
    return typeof value;
}
