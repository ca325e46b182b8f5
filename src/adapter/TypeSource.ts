/**
 * TypeSource — The Four Ways to Describe a Shape
 *
 * Tagged union over every input the library accepts, and the single
 * dispatch point that turns any of them into an Intermediate Schema Tree.
 *
 * @example
 * ```typescript
 * const tree = adapt({ kind: 'sample', name: 'MyModel', data: { flag: true } });
 * ```
 *
 * @module
 */
import { type SchemaNode } from '../ist/types.js';
import { adaptClassDef, type ClassDefSource } from './ClassDefAdapter.js';
import { adaptFunction, type FunctionSignatureSource } from './FunctionAdapter.js';
import { adaptSample, type DataSampleSource } from './SampleAdapter.js';
import { adaptDocument, type SchemaDocumentSource } from './DocumentAdapter.js';
import { type AdaptOptions } from './AdaptOptions.js';

export type TypeSource =
    | ClassDefSource
    | FunctionSignatureSource
    | DataSampleSource
    | SchemaDocumentSource;

export type TypeSourceKind = TypeSource['kind'];

/**
 * Adapt any {@link TypeSource}. The source is never modified.
 *
 * @throws {SchemaBuildError} when the source cannot be expressed
 */
export function adapt(source: TypeSource, options: AdaptOptions = {}): SchemaNode {
    switch (source.kind) {
        case 'class': return adaptClassDef(source);
        case 'function': return adaptFunction(source, options);
        case 'sample': return adaptSample(source, options);
        case 'document': return adaptDocument(source, options);
    }
}
