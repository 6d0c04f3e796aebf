/**
 * Structure Renderer - Turns the walker's tree into an indented text listing.
 * Reads nothing from disk: the order is exactly the walker's order.
 */

import type { DirEntry, TreeNode } from './walker.js';

export const SELECTED_OPEN = '>>> ';
export const SELECTED_CLOSE = ' <<<';

/**
 * Render a tree. The entry whose relativePath equals `selectedPath`
 * is wrapped as `>>> name <<<`.
 */
export function renderTree(tree: DirEntry, selectedPath?: string): string {
    const lines: string[] = [`${tree.name}/${tree.unreadable ? ' [access denied]' : ''}`];
    for (const line of treeHelper(tree.children, '', selectedPath)) {
        lines.push(line);
    }
    return lines.join('\n');
}

function label(node: TreeNode, selectedPath?: string): string {
    if (node.kind === 'dir') {
        return `${node.name}/${node.unreadable ? ' [access denied]' : ''}`;
    }
    if (selectedPath !== undefined && node.relativePath === selectedPath) {
        return `${SELECTED_OPEN}${node.name}${SELECTED_CLOSE}`;
    }
    return node.name;
}

function* treeHelper(children: TreeNode[], prefix: string, selectedPath?: string): Generator<string> {
    for (let i = 0; i < children.length; i++) {
        const node = children[i];
        const isLast = i === children.length - 1;
        const connector = isLast ? '└── ' : '├── ';
        const childPrefix = isLast ? '    ' : '│   ';

        yield `${prefix}${connector}${label(node, selectedPath)}`;

        if (node.kind === 'dir') {
            yield* treeHelper(node.children, `${prefix}${childPrefix}`, selectedPath);
        }
    }
}

/** Count files and directories below the root. */
export function countNodes(tree: DirEntry): { files: number; dirs: number } {
    let files = 0;
    let dirs = 0;
    const stack: TreeNode[] = [...tree.children];
    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) break;
        if (node.kind === 'dir') {
            dirs++;
            stack.push(...node.children);
        } else {
            files++;
        }
    }
    return { files, dirs };
}
