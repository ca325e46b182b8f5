/**
 * @module
 * @description
 * Canonical tool schemas, validating models and model-facing feedback
 * from Zod types, function signatures, data samples and JSON Schema.
 */
// ── Intermediate Schema Tree ─────────────────────────────
/** @category Schema Tree */
export type {
    JsonPrimitive, JsonValue, JsonObject,
    Constraints, ConstraintKey, PrimitiveType, EnumValue, NodeMeta,
    FieldNode, ObjectNode, ArrayNode, PrimitiveNode, EnumNode, UnionNode, ReferenceNode,
    SchemaNode, SchemaNodeKind,
} from './ist/types.js';
/** @category Schema Tree */
export {
    field, objectNode, arrayNode, primitiveNode, enumNode, referenceNode, unionOf,
    withMeta, metaOf,
} from './ist/nodes.js';
/** @category Schema Tree */
export { toJsonValue, isJsonObject } from './ist/json.js';

// ── Adapters ─────────────────────────────────────────────
/** @category Adapters */
export { adapt, type TypeSource, type TypeSourceKind } from './adapter/TypeSource.js';
/** @category Adapters */
export { adaptClassDef, ZodReader, type ClassDefSource, type ZodRead } from './adapter/ClassDefAdapter.js';
/** @category Adapters */
export {
    adaptFunction, orderParameters,
    type FunctionSignatureSource, type ParameterDescriptor, type ParameterKind,
} from './adapter/FunctionAdapter.js';
/** @category Adapters */
export { adaptSample, inferFromValue, type DataSampleSource } from './adapter/SampleAdapter.js';
/** @category Adapters */
export { adaptDocument, lookupPointer, type SchemaDocumentSource } from './adapter/DocumentAdapter.js';
/** @category Adapters */
export { parseDocComment, type DocComment } from './adapter/DocComment.js';
/** @category Adapters */
export { DEFAULT_SAMPLE_POLICY, type AdaptOptions, type SamplePolicy } from './adapter/AdaptOptions.js';

// ── Canonical Schema ─────────────────────────────────────
/** @category Schema */
export { inline, isInlined } from './schema/SchemaInliner.js';
/** @category Schema */
export {
    serialize, canonicalize, stringifyCanonical, toJsonObject,
    type CanonicalSchema, type CanonicalNode, type CanonicalType,
} from './schema/CanonicalSerializer.js';
/** @category Schema */
export {
    toToolDefinition, isProviderFormat, strictify, withoutKey,
    PROVIDER_FORMATS, type ProviderFormat,
} from './schema/ProviderFormats.js';
/** @category Schema */
export { documentedEnum, renderTemplate } from './schema/documentedEnum.js';

// ── Models & Validation ──────────────────────────────────
/** @category Models */
export { synthesize, toModelSpec, type SynthesizeOptions } from './model/ModelSynthesizer.js';
/** @category Models */
export type {
    ValidationEngine, ValidatingModel, ValidationErrorRecord, ModelSpec, FieldSpec,
} from './engine/ValidationEngine.js';
/** @category Models */
export { ZodEngine, ZodModel, type ZodEngineOptions } from './engine/ZodEngine.js';
/** @category Models */
export { compileModel, compileNode, type CompileOptions } from './engine/ZodCompiler.js';
/** @category Models */
export { toErrorRecords, toErrorRecord, resolveValue } from './engine/ZodIssueMapper.js';

// ── Feedback ─────────────────────────────────────────────
/** @category Feedback */
export {
    translate, feedbackFromError, renderFeedback, formatLocation,
    DEFAULT_MESSAGE_TO_ASSISTANT,
    type FeedbackEnvelope, type FeedbackError, type TranslateOptions,
} from './feedback/ErrorTranslator.js';

// ── Tools ────────────────────────────────────────────────
/** @category Tools */
export {
    wrapCallable, ToolFunction, parseArguments,
    type ToolDescriptor, type ToolArgs, type WrapOptions,
} from './tool/ToolFunction.js';
/** @category Tools */
export { ToolDispatch, type DispatchOutcome, type DispatchSuccess } from './tool/ToolDispatch.js';

// ── Errors & Results ─────────────────────────────────────
/** @category Errors */
export { SchemaBuildError, ValidationFailure, type SchemaBuildErrorCode } from './errors.js';
/** @category Errors */
export { succeed, fail, type Result, type Success, type Failure } from './result.js';

// ── Naming ───────────────────────────────────────────────
/** @category Naming */
export {
    IdentifierAllocator, initIdentifierAllocator, sharedIdentifierAllocator,
} from './naming/IdentifierAllocator.js';

// ── Configuration & Observability ────────────────────────
/** @category Configuration */
export {
    DEFAULT_CONFIG, mergeConfig, PartialConfigSchema,
    type ToolkitConfig, type PartialConfig, type ModelConfig, type OutputConfig,
} from './config/ToolkitConfig.js';
/** @category Configuration */
export { loadConfig, CONFIG_FILENAMES } from './config/ConfigLoader.js';
/** @category Observability */
export {
    createDebugObserver,
    type DebugEvent, type DebugObserverFn,
    type AdaptEvent, type CanonicalizeEvent, type SynthesizeEvent, type ValidateEvent, type ErrorEvent,
} from './observability/DebugObserver.js';

// ── Facade ───────────────────────────────────────────────
/** @category Facade */
export { createToolkit, type Toolkit, type ToolkitOptions } from './toolkit.js';
