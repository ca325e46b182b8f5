/**
 * documentedEnum — String Enums That Explain Their Values
 *
 * Builds a `z.enum` whose description lists every value with its
 * meaning, so the model sees the explanation in the tool schema:
 *
 * @example
 * ```typescript
 * const Status = documentedEnum(
 *     {
 *         SUCCESS: 'Operation completed successfully.',
 *         ERROR: 'Operation failed.',
 *     },
 *     'Return status for operation. Possible values:\n{options}',
 * );
 * Status.description;
 * // "Return status for operation. Possible values:
 * //  'SUCCESS': Operation completed successfully.
 * //  'ERROR': Operation failed."
 * ```
 *
 * The template may hold at most one `{identifier}` placeholder, which
 * receives the list. Without one, `\nValid options:\n` and the list are
 * appended. `{{` and `}}` stand for literal braces.
 *
 * @module
 */
import { z } from 'zod';

const PLACEHOLDER = /(?<!\{)(?:\{\{)*(\{[^{}]*\})(?:\}\})*(?!\})/dg;
const IDENTIFIER = /^\w*$/;

/**
 * @param options - Value → description, in listing order
 * @param template - Description text around the option list
 * @throws {Error} on an empty option set, more than one placeholder, or
 *     a placeholder whose identifier is not a word
 */
export function documentedEnum<V extends string>(
    options: Readonly<Record<V, string>>,
    template = '',
): z.ZodEnum<[V, ...V[]]> {
    const values = Object.keys(options).filter((key): key is V => Object.hasOwn(options, key));
    const [first, ...rest] = values;
    if (first === undefined) {
        throw new Error('documentedEnum() needs at least one option');
    }

    const listing = values.map(value => `'${value}': ${options[value]}`).join('\n');
    return z.enum([first, ...rest]).describe(renderTemplate(template, listing));
}

/**
 * Put `listing` into `template`'s placeholder, or after the template when
 * it has none.
 */
export function renderTemplate(template: string, listing: string): string {
    const matches = [...template.matchAll(PLACEHOLDER)];
    if (matches.length > 1) {
        throw new Error(`Only one placeholder is allowed in an enum description template, found ${matches.length}`);
    }

    const bounds = matches[0]?.indices?.[1];
    if (bounds === undefined) {
        return `${unescapeBraces(template)}\nValid options:\n${listing}`;
    }

    const [start, end] = bounds;
    const identifier = template.slice(start + 1, end - 1);
    if (!IDENTIFIER.test(identifier)) {
        throw new Error(`Invalid placeholder identifier "{${identifier}}": only letters, digits and underscores are allowed`);
    }
    return `${unescapeBraces(template.slice(0, start))}${listing}${unescapeBraces(template.slice(end))}`;
}

function unescapeBraces(text: string): string {
    return text.replace(/\{\{/g, '{').replace(/\}\}/g, '}');
}
