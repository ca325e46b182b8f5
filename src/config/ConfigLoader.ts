/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `toolshape.yaml` from cwd or a specified path, validates the
 * structure, and merges with defaults.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { mergeConfig, PartialConfigSchema, type ToolkitConfig } from './ToolkitConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'toolshape.yaml',
    'toolshape.yml',
    'toolshape.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `toolshape.yaml` (then `.yml`, `.json`) in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @returns Fully merged ToolkitConfig
 * @throws {Error} when an explicit file is missing or a file does not
 *     match the configuration shape
 */
export function loadConfig(configPath?: string, cwd?: string): ToolkitConfig {
    const workDir = cwd ?? process.cwd();

    // 1. Explicit path
    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    // 2. Auto-detect
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    // 3. All defaults
    return mergeConfig({});
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): ToolkitConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);

    // An empty YAML file parses to null
    const parsed = PartialConfigSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `  • ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('\n');
        throw new Error(`Invalid config file "${filePath}":\n${details}`, { cause: parsed.error });
    }
    return mergeConfig(parsed.data);
}
