import { describe, it, expect } from 'vitest';
import { renderTree, countNodes } from '../../../src/context/index.js';
import type { DirEntry, FileEntry } from '../../../src/context/index.js';

function file(relativePath: string): FileEntry {
  const name = relativePath.split('/').pop() ?? relativePath;
  return {
    kind: 'file',
    name,
    relativePath,
    absolutePath: `/proj/${relativePath}`,
    extension: name.includes('.') ? name.slice(name.lastIndexOf('.')) : '',
    isSelected: false,
  };
}

function dir(relativePath: string, children: (DirEntry | FileEntry)[], unreadable = false): DirEntry {
  const name = relativePath.split('/').pop() ?? relativePath;
  return { kind: 'dir', name, relativePath, children, unreadable };
}

const tree: DirEntry = {
  kind: 'dir',
  name: 'proj',
  relativePath: '',
  unreadable: false,
  children: [
    dir('empty', []),
    dir('src', [dir('src/lib', [file('src/lib/util.py')]), file('src/main.py')]),
    dir('secret', [], true),
    file('README.md'),
  ],
};

describe('renderTree', () => {
  it('renders connectors, directory slashes and depth', () => {
    expect(renderTree(tree)).toBe(
      [
        'proj/',
        '├── empty/',
        '├── src/',
        '│   ├── lib/',
        '│   │   └── util.py',
        '│   └── main.py',
        '├── secret/ [access denied]',
        '└── README.md',
      ].join('\n'),
    );
  });

  it('marks exactly the selected entry', () => {
    const output = renderTree(tree, 'src/lib/util.py');
    expect(output.split('\n')[4]).toBe('│   │   └── >>> util.py <<<');
    expect(output.match(/>>>/g)).toHaveLength(1);
  });

  it('ignores a selected path that is not in the tree', () => {
    expect(renderTree(tree, 'nope.py')).toBe(renderTree(tree));
  });

  it('renders an empty root as a single line', () => {
    expect(renderTree({ kind: 'dir', name: 'solo', relativePath: '', children: [], unreadable: false })).toBe('solo/');
  });
});

describe('countNodes', () => {
  it('counts everything below the root', () => {
    expect(countNodes(tree)).toEqual({ files: 3, dirs: 4 });
  });
});
