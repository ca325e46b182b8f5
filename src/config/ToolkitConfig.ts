/**
 * ToolkitConfig — Settings Shared by Every Toolkit Operation
 *
 * Controls how samples are read, how strict synthesized models are,
 * which provider format definitions default to, and the text placed in
 * feedback envelopes.
 *
 * Can be loaded from `toolshape.yaml` (see `ConfigLoader.ts`) or passed
 * programmatically.
 *
 * @module
 */
import { z } from 'zod';
import { PROVIDER_FORMATS, type ProviderFormat } from '../schema/ProviderFormats.js';
import { DEFAULT_MESSAGE_TO_ASSISTANT } from '../feedback/ErrorTranslator.js';
import { DEFAULT_SAMPLE_POLICY, type SamplePolicy } from '../adapter/AdaptOptions.js';

// ── Sections ─────────────────────────────────────────────

/** Settings for synthesized models */
export interface ModelConfig {
    /** Reject input keys the model does not declare */
    readonly forbidExtraFields: boolean;
}

/** Settings for emitted tool definitions */
export interface OutputConfig {
    /** Format used when none is given */
    readonly format: ProviderFormat;
}

// ── Full Config ──────────────────────────────────────────

export interface ToolkitConfig {
    /** Instruction placed at the top of every feedback envelope */
    readonly messageToAssistant: string;
    readonly samples: SamplePolicy;
    readonly models: ModelConfig;
    readonly output: OutputConfig;
    /** Print debug events to the console */
    readonly debug: boolean;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: ToolkitConfig = {
    messageToAssistant: DEFAULT_MESSAGE_TO_ASSISTANT,
    samples: DEFAULT_SAMPLE_POLICY,
    models: {
        forbidExtraFields: false,
    },
    output: {
        format: 'canonical',
    },
    debug: false,
};

// ── File Schema ──────────────────────────────────────────

/**
 * Shape of a configuration file. Unknown keys are rejected so a typo
 * does not silently fall back to a default.
 */
export const PartialConfigSchema = z.object({
    messageToAssistant: z.string().min(1).optional(),
    samples: z.object({
        emptyArrays: z.enum(['any', 'error']).optional(),
        valuesAsDefaults: z.boolean().optional(),
        stringsAsDescriptions: z.boolean().optional(),
    }).strict().optional(),
    models: z.object({
        forbidExtraFields: z.boolean().optional(),
    }).strict().optional(),
    output: z.object({
        format: z.enum(PROVIDER_FORMATS).optional(),
    }).strict().optional(),
    debug: z.boolean().optional(),
}).strict();

/** Partial config shape for merging */
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

// ── Merge Helper ─────────────────────────────────────────

/**
 * Deep-merge a partial config with defaults.
 * Partial values override defaults at each level.
 */
export function mergeConfig(partial: PartialConfig): ToolkitConfig {
    const samples = partial.samples ?? {};
    const models = partial.models ?? {};
    const output = partial.output ?? {};

    return {
        messageToAssistant: partial.messageToAssistant ?? DEFAULT_CONFIG.messageToAssistant,
        samples: {
            emptyArrays: samples.emptyArrays ?? DEFAULT_CONFIG.samples.emptyArrays,
            valuesAsDefaults: samples.valuesAsDefaults ?? DEFAULT_CONFIG.samples.valuesAsDefaults,
            stringsAsDescriptions: samples.stringsAsDescriptions ?? DEFAULT_CONFIG.samples.stringsAsDescriptions,
        },
        models: {
            forbidExtraFields: models.forbidExtraFields ?? DEFAULT_CONFIG.models.forbidExtraFields,
        },
        output: {
            format: output.format ?? DEFAULT_CONFIG.output.format,
        },
        debug: partial.debug ?? DEFAULT_CONFIG.debug,
    };
}
