/**
 * ZodIssueMapper — Zod Issues → Engine-Neutral Error Records
 *
 * Flattens each `ZodIssue` into a {@link ValidationErrorRecord}:
 *
 * - a missing field (`invalid_type` with nothing received, or the presence
 *   check of a required `any` field) becomes `kind: 'missing'` with the
 *   message `Field required`, and its input is the enclosing object
 * - every other issue keeps Zod's code as its kind, Zod's message, the
 *   value found at the issue path, and the code-specific metadata as
 *   `context`
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { ZodParsedType, type ZodIssue } from 'zod';
import { type ValidationErrorRecord } from './ValidationEngine.js';
import { PRESENCE_CHECK } from './ZodCompiler.js';

// ── Public API ───────────────────────────────────────────

/**
 * Map Zod issues in order.
 *
 * @param issues - Issues from a failed `safeParse`
 * @param input - The value that was validated
 */
export function toErrorRecords(issues: readonly ZodIssue[], input: unknown): ValidationErrorRecord[] {
    return issues.map(issue => toErrorRecord(issue, input));
}

export function toErrorRecord(issue: ZodIssue, input: unknown): ValidationErrorRecord {
    if (isMissing(issue)) {
        return {
            kind: 'missing',
            locationPath: issue.path,
            message: 'Field required',
            offendingInput: resolveValue(input, issue.path.slice(0, -1)),
        };
    }

    const context = issueContext(issue);
    return {
        kind: issue.code,
        locationPath: issue.path,
        message: issue.message,
        offendingInput: resolveValue(input, issue.path),
        ...(context !== undefined ? { context } : {}),
    };
}

// ── Classification ───────────────────────────────────────

function isMissing(issue: ZodIssue): boolean {
    switch (issue.code) {
        case 'invalid_type':
            return issue.received === ZodParsedType.undefined;
        case 'custom':
            return issue.params?.['presence'] === PRESENCE_CHECK;
        default:
            return false;
    }
}

/**
 * Metadata Zod attaches to specific issue codes.
 */
function issueContext(issue: ZodIssue): Readonly<Record<string, unknown>> | undefined {
    switch (issue.code) {
        case 'invalid_type':
            return { expected: issue.expected, received: issue.received };

        case 'invalid_literal':
            return { expected: issue.expected, received: issue.received };

        case 'unrecognized_keys':
            return { keys: issue.keys };

        case 'invalid_union_discriminator':
            return { options: issue.options };

        case 'invalid_enum_value':
            return { options: issue.options, received: issue.received };

        case 'invalid_string':
            return { validation: issue.validation };

        case 'too_small':
            return {
                minimum: toNumber(issue.minimum),
                inclusive: issue.inclusive,
                exact: issue.exact ?? false,
                type: issue.type,
            };

        case 'too_big':
            return {
                maximum: toNumber(issue.maximum),
                inclusive: issue.inclusive,
                exact: issue.exact ?? false,
                type: issue.type,
            };

        case 'not_multiple_of':
            return { multipleOf: toNumber(issue.multipleOf) };

        case 'custom':
            return issue.params !== undefined ? { ...issue.params } : undefined;

        default:
            return undefined;
    }
}

// ── Value Resolution ─────────────────────────────────────

/**
 * Resolve a nested value by path. An empty path is the input itself;
 * a path that leaves the data yields `undefined`.
 */
export function resolveValue(input: unknown, path: readonly (string | number)[]): unknown {
    let current: unknown = input;
    for (const key of path) {
        if (Array.isArray(current) && typeof key === 'number') {
            const items: readonly unknown[] = current;
            current = items[key];
        } else if (typeof current === 'object' && current !== null) {
            current = Reflect.get(current, key);
        } else {
            return undefined;
        }
    }
    return current;
}

function toNumber(value: number | bigint): number {
    return typeof value === 'bigint' ? Number(value) : value;
}
