/**
 * Rule Set - exclusion and inclusion predicates for the walker.
 *
 * Two layers, both applied to the tree and to content alike:
 * 1. Configured rules: excluded directory names, excluded file names/extensions, allowed extensions
 * 2. Ignore patterns: lines of the project's .gitignore, matched with gitignore semantics
 */

import ignore, { type Ignore } from 'ignore';
import { ConfigError } from './errors.js';

export interface RuleSet {
    readonly excludedDirs: ReadonlySet<string>;
    /** Exact file names, or extensions (leading dot, lower-cased) */
    readonly excludedFiles: ReadonlySet<string>;
    /** Empty set means every extension is allowed */
    readonly allowedExtensions: ReadonlySet<string>;
    readonly maxCharsPerFile: number;
    readonly ignorePatterns: readonly string[];
    /** Matcher built from ignorePatterns */
    readonly ignore: Ignore;
}

export interface RuleSetInput {
    excludedDirs?: Iterable<string>;
    excludedFiles?: Iterable<string>;
    allowedExtensions?: Iterable<string>;
    maxCharsPerFile: number;
    ignorePatterns?: Iterable<string>;
}

/** ".PY" and "py" both become ".py"; "" stays "" (files without an extension). */
export function normalizeExtension(ext: string): string {
    const trimmed = ext.trim().toLowerCase();
    if (trimmed === '') return '';
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Lower-cased extension including the dot. A leading dot alone does not make
 * an extension: ".env" and "Makefile" both return "".
 */
export function extensionOf(fileName: string): string {
    const dotIdx = fileName.lastIndexOf('.');
    if (dotIdx <= 0) return '';
    return fileName.slice(dotIdx).toLowerCase();
}

export function createRuleSet(input: RuleSetInput): RuleSet {
    const { maxCharsPerFile } = input;
    if (!Number.isInteger(maxCharsPerFile) || maxCharsPerFile <= 0) {
        throw new ConfigError(`maxCharsPerFile must be a positive integer, got: ${maxCharsPerFile}`);
    }

    const excludedFiles = new Set<string>();
    for (const entry of input.excludedFiles ?? []) {
        const trimmed = entry.trim();
        if (!trimmed) continue;
        // ".pyc" and ".DS_Store" are compared case-insensitively, "settings.py" exactly
        excludedFiles.add(trimmed.startsWith('.') ? trimmed.toLowerCase() : trimmed);
    }

    const allowedExtensions = new Set<string>();
    for (const ext of input.allowedExtensions ?? []) {
        allowedExtensions.add(normalizeExtension(ext));
    }

    const excludedDirs = new Set<string>();
    for (const dir of input.excludedDirs ?? []) {
        const trimmed = dir.trim();
        if (trimmed) excludedDirs.add(trimmed);
    }

    const ignorePatterns = [...(input.ignorePatterns ?? [])]
        .map(p => p.trim())
        .filter(p => p.length > 0);

    return Object.freeze({
        excludedDirs,
        excludedFiles,
        allowedExtensions,
        maxCharsPerFile,
        ignorePatterns: Object.freeze(ignorePatterns),
        ignore: ignore().add(ignorePatterns),
    });
}

/** Same rules, different per-file limit. */
export function withMaxChars(rules: RuleSet, maxCharsPerFile: number): RuleSet {
    return createRuleSet({
        excludedDirs: rules.excludedDirs,
        excludedFiles: rules.excludedFiles,
        allowedExtensions: rules.allowedExtensions,
        ignorePatterns: rules.ignorePatterns,
        maxCharsPerFile,
    });
}

/**
 * Should this directory be left out of the walk?
 * @param relativePath  Path from the project root, used for ignore patterns (defaults to the name)
 */
export function isDirectoryExcluded(rules: RuleSet, name: string, relativePath: string = name): boolean {
    if (rules.excludedDirs.has(name)) return true;
    // Trailing slash so "build/" patterns match directories only
    return rules.ignore.ignores(`${relativePath}/`);
}

/**
 * Should this file be included in the tree and the content section?
 * @param relativePath  Path from the project root, used for ignore patterns (defaults to the name)
 */
export function isFileIncluded(rules: RuleSet, name: string, relativePath: string = name): boolean {
    if (rules.excludedFiles.has(name) || rules.excludedFiles.has(name.toLowerCase())) return false;

    const ext = extensionOf(name);
    if (ext && rules.excludedFiles.has(ext)) return false;

    if (rules.allowedExtensions.size > 0 && !rules.allowedExtensions.has(ext)) return false;

    return !rules.ignore.ignores(relativePath);
}
