/**
 * Directory operations inside the workspace.
 */

import * as fs from 'fs/promises';

import { MCPError, ErrorCodes } from '../../../_shared/ts/mcp-base';
import { displayPath, resolveInWorkspace } from '../../../_shared/ts/validation';
import { readEntries, requireDirectory, statIfExists, toMCPError } from './common';
import type { DirectoryEntry } from './common';

export interface DirectoryListing {
  path: string;
  entries: DirectoryEntry[];
}

/** Create a directory and any missing ancestors; existing directories are fine */
export async function createWorkspaceDirectory(root: string, userPath: string): Promise<string> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  try {
    const stat = await statIfExists(target);
    if (stat && !stat.isDirectory()) {
      throw new MCPError(ErrorCodes.TYPE_MISMATCH, `Path exists and is not a directory: ${display}`);
    }
    await fs.mkdir(target, { recursive: true });
    return display;
  } catch (err) {
    throw toMCPError(err, 'create directory', display);
  }
}

/**
 * Remove a directory and everything beneath it. The workspace root itself
 * is never removed.
 */
export async function deleteWorkspaceDirectory(root: string, userPath: string): Promise<string> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  if (target === root) {
    throw new MCPError(ErrorCodes.CONTAINMENT_VIOLATION, 'Refusing to delete the workspace root');
  }

  await requireDirectory(target, display);

  try {
    await fs.rm(target, { recursive: true });
    return display;
  } catch (err) {
    throw toMCPError(err, 'delete directory', display);
  }
}

/** Immediate children of a directory, sorted by name */
export async function listWorkspaceDirectory(root: string, userPath: string): Promise<DirectoryListing> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  await requireDirectory(target, display);

  try {
    return { path: display, entries: await readEntries(target) };
  } catch (err) {
    throw toMCPError(err, 'list directory', display);
  }
}
