import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import * as path from 'path';
import { createTreeViewTool } from '../src/tools/tree_view';
import { buildWorkspaceTree } from '../src/operations/tree';
import { setupTestDir, teardownTestDir, testConfig, rejectionOf } from './helpers';

const unreadableDirs = vi.hoisted(() => new Set<string>());

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readdir: (...args: Parameters<typeof actual.readdir>) => {
      const dir = String(args[0]);
      if (unreadableDirs.has(dir)) {
        return Promise.reject(
          Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' }),
        );
      }
      return actual.readdir(...args);
    },
  };
});

describe('tree_view', () => {
  let testDir: string;
  let treeView: ReturnType<typeof createTreeViewTool>;

  beforeAll(async () => {
    testDir = await setupTestDir({
      files: { 'a/b/c.txt': 'hello', 'a/d.txt': 'dd', 'z.txt': 'zzz' },
      subdirs: ['empty'],
    });
    treeView = createTreeViewTool(testConfig(testDir));
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should render the full tree when no depth is given', async () => {
    const result = await treeView.execute({ directory_path: '' });
    expect(result.data).toBe(
      [
        'Tree view of directory: .',
        '',
        '├── a/',
        '│   ├── b/',
        '│   │   └── c.txt (5 bytes)',
        '│   └── d.txt (2 bytes)',
        '├── empty/',
        '└── z.txt (3 bytes)',
        '',
      ].join('\n'),
    );
  });

  it('should treat a negative or null depth as unlimited', async () => {
    const unlimited = await treeView.execute({ directory_path: '' });
    expect((await treeView.execute({ directory_path: '', max_depth: -1 })).data).toBe(unlimited.data);
    expect((await treeView.execute({ directory_path: '', max_depth: null })).data).toBe(unlimited.data);
  });

  it('should list immediate children only at max_depth 0', async () => {
    const result = await treeView.execute({ directory_path: '', max_depth: 0 });
    expect(result.data).toBe(
      ['Tree view of directory: .', '', '├── a/', '├── empty/', '└── z.txt (3 bytes)', ''].join('\n'),
    );
  });

  it('should count the top level as depth 1', async () => {
    const atZero = await treeView.execute({ directory_path: '', max_depth: 0 });
    const atOne = await treeView.execute({ directory_path: '', max_depth: 1 });
    expect(atOne.data).toBe(atZero.data);
  });

  it('should keep directories at the depth boundary but not their children', async () => {
    const result = await treeView.execute({ directory_path: '', max_depth: 2 });
    expect(result.data).toBe(
      [
        'Tree view of directory: .',
        '',
        '├── a/',
        '│   ├── b/',
        '│   └── d.txt (2 bytes)',
        '├── empty/',
        '└── z.txt (3 bytes)',
        '',
      ].join('\n'),
    );
  });

  it('should render a subdirectory', async () => {
    const result = await treeView.execute({ directory_path: 'a/b' });
    expect(result.data).toBe('Tree view of directory: a/b\n\n└── c.txt (5 bytes)\n');
  });

  it('should mark an empty directory', async () => {
    const result = await treeView.execute({ directory_path: 'empty' });
    expect(result.data).toBe('Tree view of directory: empty\n\n(empty directory)');
  });

  it('should build a structured tree', async () => {
    const tree = await buildWorkspaceTree(testDir, 'a', 0);
    expect(tree).toEqual({
      path: 'a',
      nodes: [
        { name: 'b', kind: 'directory', children: [] },
        { name: 'd.txt', kind: 'file', size: 2 },
      ],
    });
  });

  it('should fail with NotFound for a missing directory', async () => {
    const err = await rejectionOf(treeView.execute({ directory_path: 'missing' }));
    expect(err.kind).toBe('NotFound');
    expect(err.message).toBe('Directory not found: missing');
  });

  it('should fail with TypeMismatch for a file', async () => {
    const err = await rejectionOf(treeView.execute({ directory_path: 'z.txt' }));
    expect(err.kind).toBe('TypeMismatch');
  });

  it('should refuse paths outside the workspace', async () => {
    const err = await rejectionOf(treeView.execute({ directory_path: 'a/../..' }));
    expect(err.kind).toBe('ContainmentViolation');
  });
});

describe('tree_view on a single chain', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: { 'a/b/c.txt': 'exact-size' } });
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should stop below the top level at max_depth 1', async () => {
    const treeView = createTreeViewTool(testConfig(testDir));
    const result = await treeView.execute({ directory_path: '', max_depth: 1 });
    expect(result.data).toBe('Tree view of directory: .\n\n└── a/\n');
  });

  it('should use the terminal connector at every level', async () => {
    const treeView = createTreeViewTool(testConfig(testDir));
    const result = await treeView.execute({ directory_path: '/' });
    expect(result.data).toBe(
      ['Tree view of directory: .', '', '└── a/', '    └── b/', '        └── c.txt (10 bytes)', ''].join('\n'),
    );
  });
});

describe('tree_view with an unreadable subdirectory', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: { 'open/ok.txt': 'ok', 'locked/secret.txt': 's' } });
  });

  afterEach(() => {
    unreadableDirs.clear();
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should abort the whole render with IOError', async () => {
    const locked = path.join(testDir, 'locked');
    unreadableDirs.add(locked);
    const treeView = createTreeViewTool(testConfig(testDir));

    const err = await rejectionOf(treeView.execute({ directory_path: '' }));
    expect(err.kind).toBe('IOError');
    expect(err.message).toBe(`Failed to build tree for .: EACCES: permission denied, scandir '${locked}'`);
  });

  it('should render normally once the directory is readable again', async () => {
    const treeView = createTreeViewTool(testConfig(testDir));
    const result = await treeView.execute({ directory_path: '', max_depth: 2 });
    expect(result.data).toBe(
      [
        'Tree view of directory: .',
        '',
        '├── locked/',
        '│   └── secret.txt (1 bytes)',
        '└── open/',
        '    └── ok.txt (2 bytes)',
        '',
      ].join('\n'),
    );
  });
});
