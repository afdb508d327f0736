/**
 * Depth-limited directory tree.
 *
 * Builds the structure only; turning it into text is format.ts's job.
 */

import * as path from 'path';

import { MCPError, ErrorCodes } from '../../../_shared/ts/mcp-base';
import { displayPath, resolveInWorkspace } from '../../../_shared/ts/validation';
import { readEntries, requireDirectory } from './common';
import type { DirectoryEntry } from './common';

export interface TreeNode extends DirectoryEntry {
  /** Present on directories; empty when descent stopped at the depth limit */
  children?: TreeNode[];
}

export interface DirectoryTree {
  path: string;
  nodes: TreeNode[];
}

/** Unlimited depth */
export const UNLIMITED_DEPTH = -1;

/**
 * Walk `dirPath`, whose entries sit at `depth` (the queried root is depth 0,
 * so its children are depth 1). A directory entry is always kept; its
 * children are read only while `depth < maxDepth` (or maxDepth is negative).
 */
async function walk(dirPath: string, depth: number, maxDepth: number): Promise<TreeNode[]> {
  const entries = await readEntries(dirPath);
  const descend = maxDepth < 0 || depth < maxDepth;

  const nodes: TreeNode[] = [];
  for (const entry of entries) {
    if (entry.kind !== 'directory') {
      nodes.push(entry);
      continue;
    }
    const children = descend ? await walk(path.join(dirPath, entry.name), depth + 1, maxDepth) : [];
    nodes.push({ ...entry, children });
  }
  return nodes;
}

/**
 * Build the tree below a workspace directory. Any read failure along the way
 * aborts the whole walk.
 */
export async function buildWorkspaceTree(
  root: string,
  userPath: string,
  maxDepth: number = UNLIMITED_DEPTH,
): Promise<DirectoryTree> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  await requireDirectory(target, display);

  try {
    return { path: display, nodes: await walk(target, 1, maxDepth) };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new MCPError(ErrorCodes.IO_ERROR, `Failed to build tree for ${display}: ${msg}`);
  }
}
