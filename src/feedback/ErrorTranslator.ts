/**
 * ErrorTranslator — Validation Errors → Model Feedback
 *
 * Turns the ordered error records of a failed validation into the
 * envelope handed back to a language model so it can correct its next
 * tool call:
 *
 * ```json
 * {
 *   "success": false,
 *   "message_to_assistant": "Please pay close attention to ...",
 *   "errors": [
 *     { "type": "missing", "loc": "('age',)", "msg": "Field required", "input": { "name": "New York" } }
 *   ]
 * }
 * ```
 *
 * Total over well-formed records: translation itself never throws.
 *
 * @module
 */
import { ValidationFailure } from '../errors.js';
import { type ValidationErrorRecord } from '../engine/ValidationEngine.js';

// ── Types ────────────────────────────────────────────────

export const DEFAULT_MESSAGE_TO_ASSISTANT =
    'Please pay close attention to the following validation errors and use them to correct your tool inputs.';

export interface FeedbackError {
    readonly type: string;
    /** Location in tuple notation, e.g. `('items', 0, 'name')` */
    readonly loc: string;
    readonly msg: string;
    readonly input: unknown;
    readonly ctx?: Readonly<Record<string, unknown>>;
    readonly [extra: string]: unknown;
}

export interface FeedbackEnvelope {
    readonly success: false;
    readonly message_to_assistant: string;
    readonly errors: readonly FeedbackError[];
}

export interface TranslateOptions {
    /** Replaces {@link DEFAULT_MESSAGE_TO_ASSISTANT} */
    readonly messageToAssistant?: string;
}

// ── Public API ───────────────────────────────────────────

/**
 * Translate error records, keeping their order.
 */
export function translate(records: readonly ValidationErrorRecord[], options: TranslateOptions = {}): FeedbackEnvelope {
    return {
        success: false,
        message_to_assistant: options.messageToAssistant ?? DEFAULT_MESSAGE_TO_ASSISTANT,
        errors: records.map(translateRecord),
    };
}

/** Envelope for a {@link ValidationFailure} */
export function feedbackFromError(error: ValidationFailure, options: TranslateOptions = {}): FeedbackEnvelope {
    return translate(error.records, options);
}

/** JSON text of an envelope */
export function renderFeedback(envelope: FeedbackEnvelope, indent?: number): string {
    return JSON.stringify(envelope, null, indent);
}

/**
 * Render a location path in tuple notation:
 * `[]` → `()`, `['age']` → `('age',)`, `['items', 0]` → `('items', 0)`.
 */
export function formatLocation(path: readonly (string | number)[]): string {
    const parts = path.map(part => (typeof part === 'number' ? String(part) : quote(part)));
    if (parts.length === 1) return `(${parts[0]},)`;
    return `(${parts.join(', ')})`;
}

// ── Internals ────────────────────────────────────────────

function translateRecord(record: ValidationErrorRecord): FeedbackError {
    const { kind, locationPath, message, offendingInput, context, ...extra } = record;
    return {
        type: kind,
        loc: formatLocation(locationPath),
        msg: message,
        input: offendingInput,
        ...(context !== undefined ? { ctx: context } : {}),
        ...extra,
    };
}

/** Single quotes unless the text contains one and no double quote */
function quote(text: string): string {
    const escaped = text.replace(/\\/g, '\\\\');
    if (text.includes("'") && !text.includes('"')) {
        return `"${escaped}"`;
    }
    return `'${escaped.replace(/'/g, "\\'")}'`;
}
