/**
 * IdentifierAllocator — Monotonic Names for Anonymous Models
 *
 * Anonymous functions, untitled schema documents and nested sample
 * objects still need a model name. The allocator hands out
 * `<prefix>_<n>` with `n` strictly increasing per allocator, so two
 * models never share a name even when they share a prefix.
 *
 * Components receive an allocator explicitly. A process-wide instance
 * exists for callers that want one namespace across toolkits; it is
 * created with {@link initIdentifierAllocator} at startup and lives
 * until the process exits.
 *
 * @example
 * ```typescript
 * const ids = new IdentifierAllocator();
 * ids.next('function'); // "function_1"
 * ids.next('Model');    // "Model_2"
 * ```
 *
 * @module
 */

export class IdentifierAllocator {
    private _counter: number;

    /**
     * @param start - First number handed out (must be a non-negative integer)
     */
    constructor(start = 1) {
        if (!Number.isSafeInteger(start) || start < 0) {
            throw new RangeError(`Identifier counter must start at a non-negative integer, got ${start}`);
        }
        this._counter = start;
    }

    /** Issue the next identifier for `prefix` */
    next(prefix: string): string {
        const id = `${prefix}_${this._counter}`;
        this._counter += 1;
        return id;
    }

    /** Number that the next call to {@link next} will use */
    get peek(): number {
        return this._counter;
    }
}

// ── Process-wide instance ────────────────────────────────

let shared: IdentifierAllocator | undefined;

/**
 * Create the process-wide allocator. Calling it again returns the
 * existing instance unchanged.
 */
export function initIdentifierAllocator(start?: number): IdentifierAllocator {
    shared ??= new IdentifierAllocator(start);
    return shared;
}

/**
 * The process-wide allocator.
 * @throws {Error} if {@link initIdentifierAllocator} has not run yet
 */
export function sharedIdentifierAllocator(): IdentifierAllocator {
    if (shared === undefined) {
        throw new Error('Identifier allocator is not initialized. Call initIdentifierAllocator() at startup.');
    }
    return shared;
}
