import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, symlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { walk, createRuleSet, compareNames, nodeFs } from '../../../src/context/index.js';
import type { ContextFs, DirEntry, TreeNode, WalkEvent } from '../../../src/context/index.js';

function createFixture(name: string): string {
  const root = join(tmpdir(), `code-context-walk-${name}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(root, { recursive: true });
  return root;
}

function names(nodes: TreeNode[]): string[] {
  return nodes.map(n => (n.kind === 'dir' ? `${n.name}/` : n.name));
}

function child(dir: DirEntry, name: string): TreeNode {
  const found = dir.children.find(c => c.name === name);
  if (!found) throw new Error(`missing child ${name}`);
  return found;
}

function dirChild(dir: DirEntry, name: string): DirEntry {
  const found = child(dir, name);
  if (found.kind !== 'dir') throw new Error(`${name} is not a directory`);
  return found;
}

const rules = createRuleSet({
  excludedDirs: ['.git', 'node_modules'],
  excludedFiles: ['.pyc'],
  allowedExtensions: ['.py', '.md'],
  maxCharsPerFile: 500,
});

describe('compareNames', () => {
  it('orders case-insensitively with a stable tie-breaker', () => {
    const sorted = ['b.py', 'A.py', 'a.py', 'C.py'].sort(compareNames);
    expect(sorted).toEqual(['A.py', 'a.py', 'b.py', 'C.py']);
  });
});

describe('walk', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('tree');
    mkdirSync(join(fixture, 'src', 'lib'), { recursive: true });
    mkdirSync(join(fixture, 'empty'), { recursive: true });
    mkdirSync(join(fixture, '.git'), { recursive: true });
    mkdirSync(join(fixture, 'node_modules', 'pkg'), { recursive: true });
    writeFileSync(join(fixture, 'src', 'b.py'), 'print("b")');
    writeFileSync(join(fixture, 'src', 'A.py'), 'print("a")');
    writeFileSync(join(fixture, 'src', 'cache.pyc'), 'bytes');
    writeFileSync(join(fixture, 'src', 'lib', 'util.py'), 'def util(): pass');
    writeFileSync(join(fixture, '.git', 'config'), '[core]');
    writeFileSync(join(fixture, 'node_modules', 'pkg', 'index.py'), 'noise');
    writeFileSync(join(fixture, 'README.md'), '# Test');
    writeFileSync(join(fixture, 'Zeta.md'), '# Zeta');
    writeFileSync(join(fixture, 'script.js'), 'console.log(1)');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('sorts directories first, then files, case-insensitively', () => {
    const { tree } = walk(fixture, rules);
    expect(names(tree.children)).toEqual(['empty/', 'src/', 'README.md', 'Zeta.md']);
    expect(names(dirChild(tree, 'src').children)).toEqual(['lib/', 'A.py', 'b.py']);
  });

  it('skips excluded directories entirely', () => {
    const { tree, files } = walk(fixture, rules);
    expect(names(tree.children)).not.toContain('.git/');
    expect(names(tree.children)).not.toContain('node_modules/');
    expect(files.map(f => f.relativePath)).not.toContain('node_modules/pkg/index.py');
  });

  it('keeps empty directories', () => {
    const { tree } = walk(fixture, rules);
    const empty = dirChild(tree, 'empty');
    expect(empty.children).toEqual([]);
    expect(empty.unreadable).toBe(false);
  });

  it('filters files by extension rules', () => {
    const { files } = walk(fixture, rules);
    expect(files.map(f => f.relativePath)).toEqual([
      'src/lib/util.py',
      'src/A.py',
      'src/b.py',
      'README.md',
      'Zeta.md',
    ]);
  });

  it('fills in file entries', () => {
    const { files } = walk(fixture, rules);
    const util = files[0];
    expect(util).toEqual({
      kind: 'file',
      name: 'util.py',
      relativePath: 'src/lib/util.py',
      absolutePath: join(fixture, 'src', 'lib', 'util.py'),
      extension: '.py',
      isSelected: false,
    });
  });

  it('marks only the selected file and includes it even when the rules exclude it', () => {
    const { files, selected } = walk(fixture, rules, { selectedPath: join(fixture, 'script.js') });
    expect(selected?.relativePath).toBe('script.js');
    expect(files.filter(f => f.isSelected)).toHaveLength(1);
    expect(files.map(f => f.relativePath)).toContain('script.js');
  });

  it('lists but does not enter directories past maxDepth', () => {
    const { tree, files } = walk(fixture, rules, { maxDepth: 1 });
    const lib = dirChild(dirChild(tree, 'src'), 'lib');
    expect(lib.children).toEqual([]);
    expect(files.map(f => f.relativePath)).not.toContain('src/lib/util.py');
  });

  it('reports progress events in traversal order', () => {
    const events: WalkEvent[] = [];
    walk(fixture, rules, { onEvent: e => events.push(e) });

    const visited = events.filter(e => e.type === 'dir' || e.type === 'file').map(e => ('path' in e ? e.path : ''));
    expect(visited).toEqual(['', 'empty', 'src', 'src/lib', 'src/lib/util.py', 'src/A.py', 'src/b.py', 'README.md', 'Zeta.md']);
    expect(events).toContainEqual({ type: 'skip', path: '.git', reason: 'excluded-dir' });
    expect(events).toContainEqual({ type: 'skip', path: 'script.js', reason: 'excluded-file' });
  });

  it('does not follow symbolic links', () => {
    try {
      symlinkSync(join(fixture, 'src'), join(fixture, 'loop'), 'dir');
    } catch {
      return; // platform without symlink permission
    }
    const { tree } = walk(fixture, rules);
    expect(names(tree.children)).not.toContain('loop/');
  });

  it('lists a linked file whose target is inside the root', () => {
    const outside = createFixture('outside');
    writeFileSync(join(outside, 'far.md'), '# Far');
    try {
      symlinkSync(join(fixture, 'README.md'), join(fixture, 'alias.md'));
      symlinkSync(join(outside, 'far.md'), join(fixture, 'far.md'));
    } catch {
      rmSync(outside, { recursive: true, force: true });
      return; // platform without symlink permission
    }
    const events: WalkEvent[] = [];
    const { files } = walk(fixture, rules, { onEvent: e => events.push(e) });
    rmSync(outside, { recursive: true, force: true });

    expect(files.map(f => f.relativePath)).toContain('alias.md');
    expect(files.map(f => f.relativePath)).not.toContain('far.md');
    expect(events).toContainEqual({ type: 'skip', path: 'far.md', reason: 'symlink' });
  });

  it('records an unreadable directory and keeps walking', () => {
    const fs: ContextFs = {
      ...nodeFs,
      readdirSync(path, options) {
        if (path === join(fixture, 'src', 'lib')) {
          throw Object.assign(new Error('EACCES: permission denied, scandir'), { code: 'EACCES' });
        }
        return nodeFs.readdirSync(path, options);
      },
    };
    const { tree, files, warnings } = walk(fixture, rules, { fs });

    const lib = dirChild(dirChild(tree, 'src'), 'lib');
    expect(lib.unreadable).toBe(true);
    expect(lib.children).toEqual([]);
    expect(warnings).toEqual([{ kind: 'PermissionDenied', path: 'src/lib', message: 'EACCES: permission denied, scandir' }]);
    expect(files.map(f => f.relativePath)).toEqual(['src/A.py', 'src/b.py', 'README.md', 'Zeta.md']);
  });

  it('enters an excluded directory only along the way to the selected file', () => {
    writeFileSync(join(fixture, 'node_modules', 'noise.py'), 'noise');
    const { tree, selected } = walk(fixture, rules, {
      selectedPath: join(fixture, 'node_modules', 'pkg', 'index.py'),
    });

    expect(names(tree.children)).toEqual(['empty/', 'node_modules/', 'src/', 'README.md', 'Zeta.md']);
    const modules = dirChild(tree, 'node_modules');
    expect(names(modules.children)).toEqual(['pkg/']);
    const pkg = dirChild(modules, 'pkg');
    expect(names(pkg.children)).toEqual(['index.py']);
    expect(selected?.relativePath).toBe('node_modules/pkg/index.py');
    expect(names(tree.children)).not.toContain('.git/');
  });

  it('gives the same result on repeated walks', () => {
    expect(walk(fixture, rules)).toEqual(walk(fixture, rules));
  });
});
