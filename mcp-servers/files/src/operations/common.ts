/**
 * Filesystem primitives shared by the file, directory and tree operations.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';

import { MCPError, ErrorCodes } from '../../../_shared/ts/mcp-base';

// ─── Types ──────────────────────────────────────────────────────────────────

export type EntryKind = 'file' | 'directory';

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  /** Byte size; files only, absent when it could not be read */
  size?: number;
}

// ─── Errors ─────────────────────────────────────────────────────────────────

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Translate a Node filesystem error into an MCPError naming the path */
export function toMCPError(err: unknown, action: string, display: string): MCPError {
  if (err instanceof MCPError) return err;
  if (errnoCode(err) === 'ENOENT') {
    return new MCPError(ErrorCodes.NOT_FOUND, `Not found while trying to ${action}: ${display}`);
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new MCPError(ErrorCodes.IO_ERROR, `Failed to ${action} ${display}: ${msg}`);
}

// ─── Primitives ─────────────────────────────────────────────────────────────

/** stat() that maps a missing target to null and rethrows anything else */
export async function statIfExists(target: string, followLinks = true): Promise<Stats | null> {
  try {
    return followLinks ? await fs.stat(target) : await fs.lstat(target);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Stat a target that must exist and be a directory.
 * `display` is the workspace-relative path used in messages.
 */
export async function requireDirectory(target: string, display: string): Promise<void> {
  let stat: Stats | null;
  try {
    stat = await statIfExists(target);
  } catch (err) {
    throw toMCPError(err, 'access directory', display);
  }
  if (!stat) {
    throw new MCPError(ErrorCodes.NOT_FOUND, `Directory not found: ${display}`);
  }
  if (!stat.isDirectory()) {
    throw new MCPError(ErrorCodes.TYPE_MISMATCH, `Path is not a directory: ${display}`);
  }
}

function compareNames(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * List the immediate children of a directory, sorted by name.
 *
 * Kinds come from the directory entry itself, so a symlink is never
 * descended into. An entry removed between readdir() and lstat() is kept
 * without a size.
 */
export async function readEntries(dirPath: string): Promise<DirectoryEntry[]> {
  const dirents = await fs.readdir(dirPath, { withFileTypes: true });

  const entries = await Promise.all(
    dirents.map(async (dirent): Promise<DirectoryEntry> => {
      if (dirent.isDirectory()) {
        return { name: dirent.name, kind: 'directory' };
      }
      const stat = await statIfExists(path.join(dirPath, dirent.name), false);
      return stat ? { name: dirent.name, kind: 'file', size: stat.size } : { name: dirent.name, kind: 'file' };
    }),
  );

  return entries.sort(compareNames);
}
