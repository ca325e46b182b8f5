/**
 * DocComment — Summary and `@param` Text from a Doc Comment
 *
 * Accepts a raw `/** ... *\/` block or its bare text. Recognizes
 *
 * ```text
 * @param city - City to look up
 * @param {string} unit Temperature unit
 * @param [days=3] How many days ahead
 * ```
 *
 * Continuation lines are folded into the preceding tag. Tags other than
 * `@param` end the summary and are otherwise ignored.
 *
 * @module
 */

export interface DocComment {
    /** Text before the first tag, or `undefined` when blank */
    readonly summary: string | undefined;
    /** Parameter name → description, in declaration order */
    readonly params: ReadonlyMap<string, string>;
}

const PARAM_TAG = /^@param\s+(?:\{[^}]*\}\s*)?(\[[^\]]+\]|[\w$.]+)\s*(?:-\s*)?(.*)$/;

export function parseDocComment(text: string): DocComment {
    const lines = text
        .replace(/^\s*\/\*\*?/, '')
        .replace(/\*\/\s*$/, '')
        .split(/\r?\n/)
        .map(line => line.replace(/^\s*\*\s?/, '').trimEnd());

    const summary: string[] = [];
    const params = new Map<string, string>();
    let current: string | undefined;
    let inTags = false;

    for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.startsWith('@')) {
            inTags = true;
            current = undefined;
            const match = PARAM_TAG.exec(trimmed);
            if (match) {
                const name = paramName(match[1] ?? '');
                current = name;
                params.set(name, (match[2] ?? '').trim());
            }
            continue;
        }
        if (!inTags) {
            summary.push(line);
        } else if (current !== undefined && trimmed !== '') {
            const previous = params.get(current) ?? '';
            params.set(current, previous ? `${previous} ${trimmed}` : trimmed);
        }
    }

    const summaryText = summary.join('\n').trim();
    for (const [name, description] of params) {
        if (description === '') params.delete(name);
    }
    return { summary: summaryText === '' ? undefined : summaryText, params };
}

/** `[days=3]` → `days` */
function paramName(raw: string): string {
    const bare = raw.startsWith('[') ? raw.slice(1, -1) : raw;
    return bare.split('=')[0]?.trim() ?? bare;
}
