/**
 * Test helpers for the files MCP server.
 *
 * Provides temporary workspace setup/teardown and a matching config.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { MCPError } from '../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../src/config';

/** Create a temporary workspace with optional files and subdirectories. */
export async function setupTestDir(opts?: {
  files?: Record<string, string>;
  subdirs?: string[];
}): Promise<string> {
  const testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'workspace-files-test-'));

  for (const subdir of opts?.subdirs ?? []) {
    await fs.mkdir(path.join(testDir, subdir), { recursive: true });
  }

  for (const [file, content] of Object.entries(opts?.files ?? {})) {
    const filePath = path.join(testDir, file);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  return testDir;
}

/** Remove a temporary workspace. */
export async function teardownTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

/** Config rooted at a test workspace. */
export function testConfig(root: string): WorkspaceConfig {
  return { root, port: 9090, transport: 'stdio', logLevel: 'silent' };
}

/** Await a promise that must reject with an MCPError and return the error. */
export async function rejectionOf(promise: Promise<unknown>): Promise<MCPError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof MCPError) return err;
    throw err;
  }
  throw new Error('Expected the promise to reject');
}

/** Whether a path exists on disk. */
export async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}
