/**
 * Tree Walker - Enumerates a project root into a nested listing.
 *
 * Order: directories before files, each group by case-insensitive name.
 * Empty directories are kept. Linked directories are never followed; a linked
 * file is listed when its target is a file inside the root. An unreadable
 * subdirectory is recorded with no children instead of failing the walk.
 */

import { realpathSync, statSync, type Dirent } from 'fs';
import { join, basename, resolve, relative, isAbsolute, sep } from 'path';
import { extensionOf, isDirectoryExcluded, isFileIncluded, type RuleSet } from './rules.js';
import { toWarning, type ContextWarning } from './errors.js';
import { nodeFs, type ContextFs } from './fs.js';

export interface FileEntry {
    kind: 'file';
    name: string;
    /** Path relative to the project root, '/' separated */
    relativePath: string;
    absolutePath: string;
    /** Lower-cased, with leading dot ('' when there is none) */
    extension: string;
    isSelected: boolean;
}

export interface DirEntry {
    kind: 'dir';
    name: string;
    /** '' for the project root */
    relativePath: string;
    children: TreeNode[];
    /** Listing the directory failed; children is empty */
    unreadable: boolean;
}

export type TreeNode = DirEntry | FileEntry;

export type WalkEvent =
    | { type: 'dir'; path: string }
    | { type: 'file'; path: string }
    | { type: 'skip'; path: string; reason: 'excluded-dir' | 'excluded-file' | 'symlink' | 'max-depth' | 'special' }
    | { type: 'warning'; warning: ContextWarning };

export interface WalkOptions {
    /** Absolute path of the file picked in single-file mode */
    selectedPath?: string;
    /** Directories below this depth are listed but not entered (root = 0) */
    maxDepth?: number;
    onEvent?: (event: WalkEvent) => void;
    fs?: ContextFs;
}

export interface WalkResult {
    tree: DirEntry;
    /** Every included file, in traversal order */
    files: FileEntry[];
    selected?: FileEntry;
    warnings: ContextWarning[];
}

interface WalkContext {
    rules: RuleSet;
    selectedPath?: string;
    /** selectedPath relative to the root, '/' separated */
    selectedRel?: string;
    rootReal: string;
    maxDepth: number;
    fs: ContextFs;
    files: FileEntry[];
    warnings: ContextWarning[];
    emit: (event: WalkEvent) => void;
}

/**
 * Walk a project root directory.
 * The caller has already checked that `root` exists and is a directory.
 *
 * The selected file is always listed: excluded directories and directories past
 * maxDepth that lead to it are entered, showing only the path down to it.
 */
export function walk(root: string, rules: RuleSet, options: WalkOptions = {}): WalkResult {
    const rootPath = resolve(root);
    const selectedPath = options.selectedPath === undefined ? undefined : resolve(options.selectedPath);
    const ctx: WalkContext = {
        rules,
        selectedPath,
        selectedRel: selectedPath === undefined ? undefined : relativeInside(rootPath, selectedPath),
        rootReal: realpathSync(rootPath),
        maxDepth: options.maxDepth ?? Number.POSITIVE_INFINITY,
        fs: options.fs ?? nodeFs,
        files: [],
        warnings: [],
        emit: options.onEvent ?? (() => undefined),
    };

    const tree: DirEntry = {
        kind: 'dir',
        name: basename(rootPath) || rootPath,
        relativePath: '',
        children: [],
        unreadable: false,
    };
    walkDir(rootPath, tree, 0, ctx, false);

    return {
        tree,
        files: ctx.files,
        selected: ctx.files.find(f => f.isSelected),
        warnings: ctx.warnings,
    };
}

/** Directories first, then case-insensitive name, exact name as tie-breaker. */
export function compareEntries(a: Dirent, b: Dirent): number {
    const aDir = a.isDirectory();
    const bDir = b.isDirectory();
    if (aDir !== bDir) return aDir ? -1 : 1;
    return compareNames(a.name, b.name);
}

export function compareNames(a: string, b: string): number {
    const la = a.toLowerCase();
    const lb = b.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

function joinRelative(parent: string, name: string): string {
    return parent ? `${parent}/${name}` : name;
}

/** '/'-separated path of `target` below `root`, or undefined when it is not below it. */
function relativeInside(root: string, target: string): string | undefined {
    const rel = relative(root, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return undefined;
    return rel.split(sep).join('/');
}

function leadsToSelection(ctx: WalkContext, relPath: string): boolean {
    return ctx.selectedRel !== undefined && ctx.selectedRel.startsWith(`${relPath}/`);
}

/** A link whose target is a regular file inside the root. */
function isLinkedFileInside(fullPath: string, ctx: WalkContext): boolean {
    let target: string;
    try {
        target = realpathSync(fullPath);
    } catch {
        return false; // dangling
    }
    return relativeInside(ctx.rootReal, target) !== undefined && statSync(target).isFile();
}

function entryKind(entry: Dirent, fullPath: string, ctx: WalkContext): 'dir' | 'file' | 'link' | 'special' {
    if (entry.isSymbolicLink()) return isLinkedFileInside(fullPath, ctx) ? 'file' : 'link';
    if (entry.isDirectory()) return 'dir';
    if (entry.isFile()) return 'file';
    return 'special';
}

/**
 * @param onlySelection  Inside an excluded or too-deep directory: list only the
 *                       way down to the selected file
 */
function walkDir(currentPath: string, node: DirEntry, depth: number, ctx: WalkContext, onlySelection: boolean): void {
    ctx.emit({ type: 'dir', path: node.relativePath });

    let entries: Dirent[];
    try {
        entries = ctx.fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
        node.unreadable = true;
        const warning = toWarning(node.relativePath || '.', error, 'WalkError');
        ctx.warnings.push(warning);
        ctx.emit({ type: 'warning', warning });
        return;
    }

    // Sort for deterministic output (code-point order, not locale)
    entries.sort(compareEntries);

    for (const entry of entries) {
        const fullPath = join(currentPath, entry.name);
        const relPath = joinRelative(node.relativePath, entry.name);
        const onPath = leadsToSelection(ctx, relPath);

        if (onlySelection && !onPath && relPath !== ctx.selectedRel) continue;

        const kind = entryKind(entry, fullPath, ctx);

        if (kind === 'link') {
            ctx.emit({ type: 'skip', path: relPath, reason: 'symlink' });
            continue;
        }

        if (kind === 'dir') {
            const excluded = isDirectoryExcluded(ctx.rules, entry.name, relPath);
            if (excluded && !onPath) {
                ctx.emit({ type: 'skip', path: relPath, reason: 'excluded-dir' });
                continue;
            }

            const child: DirEntry = {
                kind: 'dir',
                name: entry.name,
                relativePath: relPath,
                children: [],
                unreadable: false,
            };
            node.children.push(child);

            const tooDeep = depth + 1 > ctx.maxDepth;
            if (tooDeep && !onPath) {
                ctx.emit({ type: 'skip', path: relPath, reason: 'max-depth' });
                continue;
            }
            walkDir(fullPath, child, depth + 1, ctx, onlySelection || excluded || tooDeep);
            continue;
        }

        if (kind === 'special') {
            ctx.emit({ type: 'skip', path: relPath, reason: 'special' });
            continue;
        }

        const isSelected = ctx.selectedPath !== undefined && fullPath === ctx.selectedPath;

        // The selected file is an explicit choice and bypasses the file rules
        if (!isSelected && !isFileIncluded(ctx.rules, entry.name, relPath)) {
            ctx.emit({ type: 'skip', path: relPath, reason: 'excluded-file' });
            continue;
        }

        const file: FileEntry = {
            kind: 'file',
            name: entry.name,
            relativePath: relPath,
            absolutePath: fullPath,
            extension: extensionOf(entry.name),
            isSelected,
        };
        node.children.push(file);
        ctx.files.push(file);
        ctx.emit({ type: 'file', path: relPath });
    }
}
