import { SchemaBuildError } from '../src/errors.js';

/** Run `fn` and return the SchemaBuildError it throws */
export function catchBuildError(fn: () => unknown): SchemaBuildError {
    try {
        fn();
    } catch (e) {
        if (e instanceof SchemaBuildError) return e;
        throw e;
    }
    throw new Error('Expected a SchemaBuildError to be thrown');
}
