/**
 * Options shared by every type descriptor adapter.
 *
 * @module
 */
import { type IdentifierAllocator } from '../naming/IdentifierAllocator.js';

/** How data samples are read */
export interface SamplePolicy {
    /** Item type of an empty array: `any`, or reject the sample */
    readonly emptyArrays: 'any' | 'error';
    /** Scalar values (and `null`) become field defaults */
    readonly valuesAsDefaults: boolean;
    /** String values become the field's description instead of an example */
    readonly stringsAsDescriptions: boolean;
}

export const DEFAULT_SAMPLE_POLICY: SamplePolicy = {
    emptyArrays: 'any',
    valuesAsDefaults: false,
    stringsAsDescriptions: false,
};

export interface AdaptOptions {
    /** Source of names for anonymous functions and untitled documents */
    readonly allocator?: IdentifierAllocator;
    readonly samples?: Partial<SamplePolicy>;
}

/** Name for an anonymous model */
export function anonymousName(options: AdaptOptions, prefix: string): string {
    return options.allocator ? options.allocator.next(prefix) : prefix;
}
