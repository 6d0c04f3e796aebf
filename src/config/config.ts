/**
 * Config File Support
 *
 * One JSON file controls the rules and the output:
 * - Rules (excludeDirs, excludeFiles, allowedExtensions, maxChars, maxDepth, useGitignore)
 * - Language tags (languages: extension -> fence tag, merged over the defaults)
 * - Output (output, prompt)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > defaults (presets/defaults.json).
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { ConfigError } from '../context/errors.js';
import type { ContextSettings } from '../context/generate.js';

// ── Config interface ────────────────────────────────────────────────────────

export interface CliConfig {
    // Rules
    excludeDirs?: string[];
    excludeFiles?: string[];
    allowedExtensions?: string[];
    maxChars?: number;
    maxDepth?: number;
    useGitignore?: boolean;
    languages?: Record<string, string>;

    // Output
    output?: string;
    prompt?: string;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    // Rules
    'excludeDirs', 'excludeFiles', 'allowedExtensions', 'maxChars', 'maxDepth', 'useGitignore', 'languages',
    // Output
    'output', 'prompt',
    // Misc
    'verbose',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertInteger(obj: Record<string, unknown>, key: string, min: number): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isInteger(val) || val < min) {
        throw new ConfigError(`Config "${key}" must be an integer >= ${min}`);
    }
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) throw new ConfigError(`Config "${key}" must be an array of strings`);
    const result: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigError(`Config "${key}" must be an array of strings`);
        result.push(item);
    }
    return result;
}

function parseLanguages(value: unknown): Record<string, string> {
    if (!isRecord(value)) {
        throw new ConfigError('Config "languages" must be an object of extension -> tag');
    }
    const result: Record<string, string> = {};
    for (const [ext, tag] of Object.entries(value)) {
        if (typeof tag !== 'string') {
            throw new ConfigError(`Config "languages.${ext}" must be a string`);
        }
        const key = ext.trim().toLowerCase();
        result[key.startsWith('.') ? key : `.${key}`] = tag;
    }
    return result;
}

/**
 * Validate a parsed config object.
 * @param source  Shown in error and warning messages
 */
export function parseConfig(parsed: unknown, source: string): CliConfig {
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${source}`, { path: source });
    }
    const obj = parsed;

    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};

    // Rules
    if (obj.excludeDirs !== undefined) config.excludeDirs = assertStringArray(obj, 'excludeDirs');
    if (obj.excludeFiles !== undefined) config.excludeFiles = assertStringArray(obj, 'excludeFiles');
    if (obj.allowedExtensions !== undefined) config.allowedExtensions = assertStringArray(obj, 'allowedExtensions');
    if (obj.maxChars !== undefined) config.maxChars = assertInteger(obj, 'maxChars', 1);
    if (obj.maxDepth !== undefined) config.maxDepth = assertInteger(obj, 'maxDepth', 0);
    if (obj.useGitignore !== undefined) config.useGitignore = assertBoolean(obj, 'useGitignore');
    if (obj.languages !== undefined) config.languages = parseLanguages(obj.languages);

    // Output
    if (obj.output !== undefined) config.output = assertString(obj, 'output');
    if (obj.prompt !== undefined) config.prompt = assertString(obj, 'prompt');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 * Throws ConfigError on a missing file, invalid JSON or a wrongly typed field.
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`, { path: absolutePath });
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`, { path: absolutePath, cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`, { path: absolutePath, cause: error });
    }

    return parseConfig(parsed, absolutePath);
}

// ── Defaults ────────────────────────────────────────────────────────────────

const require = createRequire(import.meta.url);

function loadDefaults(): ContextSettings {
    const source = 'presets/defaults.json';
    const parsed: unknown = require('../../presets/defaults.json');
    const config = parseConfig(parsed, source);
    const { excludeDirs, excludeFiles, allowedExtensions, maxChars, languages } = config;
    if (!excludeDirs || !excludeFiles || !allowedExtensions || maxChars === undefined || !languages) {
        throw new ConfigError(`Default settings are incomplete: ${source}`);
    }
    return {
        excludeDirs,
        excludeFiles,
        allowedExtensions,
        maxChars,
        maxDepth: config.maxDepth,
        useGitignore: config.useGitignore ?? true,
        languages,
    };
}

export const DEFAULT_SETTINGS: ContextSettings = loadDefaults();

/**
 * Merge a config over base settings.
 * Arrays replace the base lists; languages extend the base lookup.
 */
export function resolveSettings(config: CliConfig, base: ContextSettings = DEFAULT_SETTINGS): ContextSettings {
    return {
        excludeDirs: [...(config.excludeDirs ?? base.excludeDirs)],
        excludeFiles: [...(config.excludeFiles ?? base.excludeFiles)],
        allowedExtensions: [...(config.allowedExtensions ?? base.allowedExtensions)],
        maxChars: config.maxChars ?? base.maxChars,
        maxDepth: config.maxDepth ?? base.maxDepth,
        useGitignore: config.useGitignore ?? base.useGitignore,
        languages: { ...base.languages, ...config.languages },
    };
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Config template for the `init` command.
 * Shows every available option with the default values.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Rules
    excludeDirs: DEFAULT_SETTINGS.excludeDirs,
    excludeFiles: DEFAULT_SETTINGS.excludeFiles,
    allowedExtensions: DEFAULT_SETTINGS.allowedExtensions,
    maxChars: DEFAULT_SETTINGS.maxChars,
    useGitignore: DEFAULT_SETTINGS.useGitignore,
    languages: {},

    // Output
    output: 'context.md',
    prompt: '',

    // Misc
    verbose: false,
};
