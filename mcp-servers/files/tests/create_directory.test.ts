import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createCreateDirectoryTool } from '../src/tools/create_directory';
import { setupTestDir, teardownTestDir, testConfig, rejectionOf } from './helpers';

describe('create_directory', () => {
  let testDir: string;
  let createDirectory: ReturnType<typeof createCreateDirectoryTool>;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: { 'taken.txt': 'file' } });
    createDirectory = createCreateDirectoryTool(testConfig(testDir));
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should create a directory with its parents', async () => {
    const result = await createDirectory.execute({ directory_path: 'a/b/c' });
    expect(result.data).toBe('Successfully created directory: a/b/c');

    const stat = await fs.stat(path.join(testDir, 'a', 'b', 'c'));
    expect(stat.isDirectory()).toBe(true);
  });

  it('should be idempotent', async () => {
    const first = await createDirectory.execute({ directory_path: 'twice' });
    const second = await createDirectory.execute({ directory_path: 'twice' });
    expect(first.data).toBe('Successfully created directory: twice');
    expect(second.data).toBe('Successfully created directory: twice');
  });

  it('should accept the workspace root', async () => {
    const result = await createDirectory.execute({ directory_path: '' });
    expect(result.data).toBe('Successfully created directory: .');
  });

  it('should fail with TypeMismatch when a file is in the way', async () => {
    const err = await rejectionOf(createDirectory.execute({ directory_path: 'taken.txt' }));
    expect(err.kind).toBe('TypeMismatch');
    expect(err.message).toBe('Path exists and is not a directory: taken.txt');
  });

  it('should refuse paths outside the workspace', async () => {
    const err = await rejectionOf(createDirectory.execute({ directory_path: '../sibling' }));
    expect(err.kind).toBe('ContainmentViolation');
  });

  it('has correct metadata', () => {
    expect(createDirectory.name).toBe('create_directory');
    expect(createDirectory.idempotent).toBe(true);
    expect(createDirectory.destructive).toBe(false);
  });
});
