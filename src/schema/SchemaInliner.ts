/**
 * SchemaInliner — Reference-Free Trees
 *
 * Replaces every reference node with a copy of its target. A definition
 * reused in several places is copied into each of them; a definition
 * that reaches itself along one descent path cannot be copied at all and
 * is reported as a cycle.
 *
 * Only the root keeps its model name. Unions are rebuilt after their
 * members are inlined so that a reference to an enum or to another union
 * normalizes the same way a literal one would.
 *
 * @module
 */
import { SchemaBuildError } from '../errors.js';
import { type SchemaNode, type NodeMeta } from '../ist/types.js';
import {
    arrayNode,
    enumNode,
    field,
    objectNode,
    primitiveNode,
    unionOf,
    withMeta,
} from '../ist/nodes.js';

/**
 * Inline every reference below `root`.
 *
 * @throws {SchemaBuildError} `CYCLE` when a definition contains itself
 */
export function inline(root: SchemaNode): SchemaNode {
    return inlineNode(root, new Set(), [], true);
}

function inlineNode(
    node: SchemaNode,
    resolving: ReadonlySet<SchemaNode>,
    path: readonly string[],
    isRoot: boolean,
): SchemaNode {
    const meta: NodeMeta = {
        name: isRoot ? node.name : undefined,
        description: node.description,
        default: node.default,
        constraints: node.constraints,
    };

    switch (node.kind) {
        case 'reference': {
            const target = node.resolve();
            if (resolving.has(target)) {
                throw new SchemaBuildError('CYCLE', `Circular reference "${node.ref}" cannot be inlined`, path);
            }
            const next = new Set(resolving).add(target);
            const inlined = inlineNode(target, next, path, isRoot);
            return withMeta(inlined, meta);
        }

        case 'object':
            return objectNode(
                node.fields.map(f => field(f.name, inlineNode(f.node, resolving, [...path, f.name], false), f.required)),
                meta,
            );

        case 'array':
            return arrayNode(inlineNode(node.items, resolving, [...path, 'items'], false), meta);

        case 'union':
            return unionOf(
                node.members.map((m, i) => inlineNode(m, resolving, [...path, `anyOf[${i}]`], false)),
                meta,
            );

        case 'enum':
            return enumNode(node.values, meta);

        case 'primitive':
            return primitiveNode(node.type, meta);
    }
}

/** True when no reference node remains anywhere below `node` */
export function isInlined(node: SchemaNode): boolean {
    switch (node.kind) {
        case 'reference': return false;
        case 'object': return node.fields.every(f => isInlined(f.node));
        case 'array': return isInlined(node.items);
        case 'union': return node.members.every(isInlined);
        case 'enum':
        case 'primitive': return true;
    }
}
