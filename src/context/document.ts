/**
 * Document Assembler - Builds the final markdown document.
 *
 * Sections, always in this order:
 *   title, project info, structure, code, statistics, warnings (if any), prompt
 */

import type { RuleSet } from './rules.js';
import type { DirEntry, FileEntry } from './walker.js';
import type { ExtractResult } from './extractor.js';
import type { ContextWarning } from './errors.js';
import { renderTree, countNodes } from './tree.js';

export type ContextMode = 'project' | 'single-file';

export interface AssembleInput {
    projectName: string;
    /** Absolute project root */
    rootPath: string;
    mode: ContextMode;
    rules: RuleSet;
    tree: DirEntry;
    selected?: FileEntry;
    /** One code block is emitted per entry, in this order */
    contents: ExtractResult[];
    prompt: string;
    warnings: ContextWarning[];
    /** Extension (".ts") -> fence tag ("typescript") */
    languages: Readonly<Record<string, string>>;
    /** Pre-rendered structure; rendered from `tree` when omitted */
    structure?: string;
}

/** Map a file extension to a fence tag; unknown extensions get a bare fence. */
export function languageFor(extension: string, languages: Readonly<Record<string, string>>): string {
    const key = extension.toLowerCase();
    return Object.prototype.hasOwnProperty.call(languages, key) ? languages[key] : '';
}

function longestBacktickRun(text: string): number {
    let longest = 0;
    for (const run of text.match(/`+/g) ?? []) {
        longest = Math.max(longest, run.length);
    }
    return longest;
}

/** A fence longer than any backtick run in the body, minimum three. */
export function fenceFor(body: string): string {
    return '`'.repeat(Math.max(3, longestBacktickRun(body) + 1));
}

/**
 * Inline code span for a path or name. Backticks inside get a longer
 * delimiter, padded with spaces when the text starts or ends with one.
 */
export function inlineCode(text: string): string {
    const delimiter = '`'.repeat(longestBacktickRun(text) + 1);
    const pad = text.startsWith('`') || text.endsWith('`') ? ' ' : '';
    return `${delimiter}${pad}${text}${pad}${delimiter}`;
}

function listOrNone(values: Iterable<string>): string {
    const sorted = [...values].sort();
    return sorted.length > 0 ? sorted.join(', ') : 'none';
}

function codeBlock(lang: string, body: string): string[] {
    const fence = fenceFor(body);
    // One trailing newline belongs to the file, not to the block
    const text = body.endsWith('\n') ? body.slice(0, -1) : body;
    return [`${fence}${lang}`, text, fence];
}

export function formatWarning(warning: ContextWarning): string {
    return `- **${warning.kind}** ${inlineCode(warning.path)}: ${warning.message}`;
}

/**
 * Assemble the document. Pure: every input is already read.
 */
export function assemble(input: AssembleInput): string {
    const { projectName, rootPath, mode, rules, tree, selected, contents, prompt, warnings, languages } = input;
    const single = mode === 'single-file' && selected !== undefined;
    const lines: string[] = [];

    // ── Title ────────────────────────────────────────────────────────────────
    lines.push(single ? `# CONTEXT: ${inlineCode(selected.name)} (${projectName})` : `# CONTEXT: ${inlineCode(projectName)}`);
    lines.push('');

    // ── Project info ─────────────────────────────────────────────────────────
    const counts = countNodes(tree);
    lines.push('## PROJECT INFO');
    lines.push(`- **Path**: ${inlineCode(rootPath)}`);
    if (single) {
        lines.push(`- **Selected file**: ${inlineCode(selected.relativePath)}`);
        lines.push('- **Mode**: Single file');
    } else {
        lines.push('- **Mode**: Complete project');
    }
    lines.push(`- **Included extensions**: ${rules.allowedExtensions.size > 0 ? listOrNone(rules.allowedExtensions) : 'all'}`);
    lines.push(`- **Excluded directories**: ${listOrNone(rules.excludedDirs)}`);
    lines.push(`- **Excluded files**: ${listOrNone(rules.excludedFiles)}`);
    lines.push(`- **Character limit per file**: ${rules.maxCharsPerFile}`);
    lines.push(`- **Structure**: ${counts.dirs} directories, ${counts.files} files`);
    lines.push('');

    // ── Structure ────────────────────────────────────────────────────────────
    const structure = input.structure ?? renderTree(tree, selected?.relativePath);
    lines.push('## STRUCTURE');
    lines.push(...codeBlock('', structure));
    lines.push('');

    // ── Code ─────────────────────────────────────────────────────────────────
    lines.push('## CODE');
    if (contents.length === 0) {
        lines.push('');
        lines.push('_No files matched the current rules._');
    }

    let truncatedCount = 0;
    for (const item of contents) {
        const entry = item.entry;
        lines.push('');
        lines.push(`### ${inlineCode(entry.relativePath)}${entry.isSelected ? ' (selected)' : ''}`);

        if (!item.ok) {
            lines.push(...codeBlock('', `Error reading file: ${item.error.message}`));
            continue;
        }

        lines.push(...codeBlock(languageFor(entry.extension, languages), item.text));
        if (item.truncated) {
            truncatedCount++;
            lines.push(`_Truncated: showing ${rules.maxCharsPerFile} of ${item.originalLength} characters._`);
        }
    }
    lines.push('');

    // ── Statistics ───────────────────────────────────────────────────────────
    lines.push('## STATISTICS');
    lines.push(`- **Files included**: ${contents.length}`);
    lines.push(`- **Files truncated**: ${truncatedCount}`);
    if (single) {
        lines.push(`- **Mode**: Single file (${selected.name})`);
    }
    lines.push(`- **Base directory**: ${rootPath}`);
    lines.push('');

    // ── Warnings ─────────────────────────────────────────────────────────────
    if (warnings.length > 0) {
        lines.push('## WARNINGS');
        for (const warning of warnings) {
            lines.push(formatWarning(warning));
        }
        lines.push('');
    }

    // ── Prompt ───────────────────────────────────────────────────────────────
    lines.push('## PROMPT');
    lines.push(prompt);

    return lines.join('\n') + '\n';
}
