/**
 * Context Generator - Full pipeline:
 *
 * 1. Resolve the root (directory = whole project, file = single-file mode)
 * 2. Build the rule set from settings (+ .gitignore patterns)
 * 3. Walk the project root
 * 4. Extract file contents, one at a time (only the selected file in single-file mode)
 * 5. Render the structure and assemble the document
 *
 * Settings are always passed in; nothing here reads ambient configuration.
 */

import { existsSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, join, relative, resolve, sep } from 'path';
import { createRuleSet, extensionOf, type RuleSet } from './rules.js';
import { walk, type FileEntry, type DirEntry, type WalkEvent } from './walker.js';
import { extract, type ExtractResult } from './extractor.js';
import { renderTree } from './tree.js';
import { assemble, type ContextMode } from './document.js';
import { InvalidRootError, OutputWriteError, errorCode, errorMessage, toWarning, type ContextWarning } from './errors.js';
import { nodeFs, type ContextFs } from './fs.js';

/** What the configuration provider hands the core. */
export interface ContextSettings {
    excludeDirs: string[];
    /** Exact names or extensions (".pyc") */
    excludeFiles: string[];
    /** Empty = every extension */
    allowedExtensions: string[];
    maxChars: number;
    /** Undefined = no limit */
    maxDepth?: number;
    useGitignore: boolean;
    /** Extension -> fence tag */
    languages: Record<string, string>;
}

export interface GenerateRequest {
    /** Directory or file */
    rootPath: string;
    mode: ContextMode;
    settings: ContextSettings;
    /** Replaces settings.maxChars for this run */
    maxCharsOverride?: number;
    /** Text of the trailing prompt section (empty allowed) */
    prompt?: string;
    /**
     * Project root in single-file mode. Defaults to the file's directory;
     * must contain the file.
     */
    projectRoot?: string;
    onEvent?: (event: WalkEvent) => void;
    verbose?: boolean;
    fs?: ContextFs;
}

export interface ContextResult {
    /** The final markdown document */
    document: string;
    mode: ContextMode;
    projectRoot: string;
    /** Relative path of the selected file (single-file mode) */
    selectedPath?: string;
    tree: DirEntry;
    /** The rendered structure section */
    structure: string;
    rules: RuleSet;
    /** Number of content blocks */
    fileCount: number;
    truncatedCount: number;
    /** Non-fatal problems, also listed in the document */
    warnings: ContextWarning[];
    timing: {
        walkMs: number;
        extractMs: number;
        totalMs: number;
    };
}

export interface IgnoreFile {
    patterns: string[];
    /** Set when a .gitignore exists but could not be read */
    warning?: ContextWarning;
}

/**
 * Read .gitignore patterns from a project root.
 * Missing file = no patterns; any other read failure is a warning, not an error.
 */
export function loadIgnorePatterns(projectRoot: string, fs: ContextFs = nodeFs): IgnoreFile {
    const gitignore = join(projectRoot, '.gitignore');
    let text: string;
    try {
        text = fs.readFileSync(gitignore).toString('utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return { patterns: [] };
        return { patterns: [], warning: toWarning('.gitignore', error, 'ReadError') };
    }
    const patterns = text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
    return { patterns };
}

interface ResolvedRoot {
    mode: ContextMode;
    projectRoot: string;
    selectedFile?: string;
}

/**
 * Work out the project root and mode. Throws InvalidRootError before any traversal.
 */
export function resolveRoot(rootPath: string, mode: ContextMode, projectRoot?: string): ResolvedRoot {
    const abs = resolve(rootPath);

    if (!existsSync(abs)) {
        throw new InvalidRootError(`Path does not exist: ${rootPath}\nResolved to: ${abs}`, { path: abs });
    }

    const stats = statSync(abs);
    if (stats.isDirectory()) {
        if (mode === 'single-file') {
            throw new InvalidRootError(`Single-file mode needs a file, got a directory: ${abs}`, { path: abs });
        }
        return { mode: 'project', projectRoot: abs };
    }

    if (!stats.isFile()) {
        throw new InvalidRootError(`Path is neither a file nor a directory: ${abs}`, { path: abs });
    }

    // A file target always means single-file mode
    const root = projectRoot === undefined ? dirname(abs) : resolve(projectRoot);
    const rel = relative(root, abs);
    if (rel === '' || rel.startsWith('..') || resolve(root, rel) !== abs) {
        throw new InvalidRootError(`Selected file is outside the project root: ${abs}`, { path: abs });
    }
    if (!existsSync(root) || !statSync(root).isDirectory()) {
        throw new InvalidRootError(`Project root is not a directory: ${root}`, { path: root });
    }
    return { mode: 'single-file', projectRoot: root, selectedFile: abs };
}

function toRelative(projectRoot: string, file: string): string {
    return relative(projectRoot, file).split(sep).join('/');
}

/**
 * Generate the context document.
 * Deterministic for the same filesystem state and settings.
 */
export function generateContext(request: GenerateRequest): ContextResult {
    const totalStart = Date.now();
    const { settings, verbose = false } = request;
    const prompt = request.prompt ?? '';

    const fs = request.fs ?? nodeFs;
    const warnings: ContextWarning[] = [];

    const root = resolveRoot(request.rootPath, request.mode, request.projectRoot);
    const ignoreFile: IgnoreFile = settings.useGitignore ? loadIgnorePatterns(root.projectRoot, fs) : { patterns: [] };
    const ignorePatterns = ignoreFile.patterns;
    if (ignoreFile.warning) {
        warnings.push(ignoreFile.warning);
        request.onEvent?.({ type: 'warning', warning: ignoreFile.warning });
    }

    const rules = createRuleSet({
        excludedDirs: settings.excludeDirs,
        excludedFiles: settings.excludeFiles,
        allowedExtensions: settings.allowedExtensions,
        maxCharsPerFile: request.maxCharsOverride ?? settings.maxChars,
        ignorePatterns,
    });

    if (verbose) {
        console.log(`  Project root: ${root.projectRoot}`);
        console.log(`  Mode: ${root.mode}`);
        if (ignorePatterns.length > 0) {
            console.log(`  .gitignore patterns: ${ignorePatterns.join(', ')}`);
        }
    }

    // ── Step 1: Walk ─────────────────────────────────────────────────────────
    const walkStart = Date.now();
    const walked = walk(root.projectRoot, rules, {
        selectedPath: root.selectedFile,
        maxDepth: settings.maxDepth,
        onEvent: request.onEvent,
        fs,
    });
    const walkMs = Date.now() - walkStart;
    warnings.push(...walked.warnings);

    if (verbose) {
        console.log(`  Walked in ${walkMs}ms (${walked.files.length} files)`);
    }

    // ── Step 2: Pick the files to extract ────────────────────────────────────
    let selected: FileEntry | undefined = walked.selected;
    let toExtract: FileEntry[];

    if (root.mode === 'single-file' && root.selectedFile !== undefined) {
        if (selected === undefined) {
            // Not reached by the walk (an unreadable directory on the way): still the user's pick
            const name = basename(root.selectedFile);
            selected = {
                kind: 'file',
                name,
                relativePath: toRelative(root.projectRoot, root.selectedFile),
                absolutePath: root.selectedFile,
                extension: extensionOf(name),
                isSelected: true,
            };
        }
        toExtract = [selected];
    } else {
        toExtract = walked.files;
    }

    // ── Step 3: Extract, sequentially ────────────────────────────────────────
    const extractStart = Date.now();
    const contents: ExtractResult[] = [];
    let truncatedCount = 0;

    for (const entry of toExtract) {
        const result = extract(entry, rules.maxCharsPerFile, fs);
        contents.push(result);
        if (!result.ok) {
            warnings.push(result.error);
            request.onEvent?.({ type: 'warning', warning: result.error });
            continue;
        }
        if (result.decodeWarning) {
            warnings.push(result.decodeWarning);
            request.onEvent?.({ type: 'warning', warning: result.decodeWarning });
        }
        if (result.truncated) truncatedCount++;
    }
    const extractMs = Date.now() - extractStart;

    if (verbose) {
        console.log(`  Extracted ${contents.length} file(s) in ${extractMs}ms (${truncatedCount} truncated)`);
        if (warnings.length > 0) {
            console.log(`  ${warnings.length} warning(s)`);
        }
    }

    // ── Step 4: Render + assemble ────────────────────────────────────────────
    const structure = renderTree(walked.tree, selected?.relativePath);
    const document = assemble({
        projectName: walked.tree.name,
        rootPath: root.projectRoot,
        mode: root.mode,
        rules,
        tree: walked.tree,
        selected,
        contents,
        prompt,
        warnings,
        languages: settings.languages,
        structure,
    });

    return {
        document,
        mode: root.mode,
        projectRoot: root.projectRoot,
        selectedPath: selected?.relativePath,
        tree: walked.tree,
        structure,
        rules,
        fileCount: contents.length,
        truncatedCount,
        warnings,
        timing: { walkMs, extractMs, totalMs: Date.now() - totalStart },
    };
}

/**
 * Write the whole document, replacing any existing file.
 * "-" writes to stdout.
 */
export function writeDocument(document: string, outputPath: string): string {
    if (outputPath === '-') {
        process.stdout.write(document);
        return outputPath;
    }

    const absolutePath = resolve(outputPath);
    try {
        writeFileSync(absolutePath, document, 'utf-8');
    } catch (error) {
        throw new OutputWriteError(`Failed to write output: ${absolutePath}: ${errorMessage(error)}`, {
            path: absolutePath,
            cause: error,
        });
    }
    return absolutePath;
}
