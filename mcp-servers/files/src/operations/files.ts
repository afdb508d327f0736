/**
 * Single-file operations inside the workspace.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { MCPError, ErrorCodes } from '../../../_shared/ts/mcp-base';
import { displayPath, resolveInWorkspace } from '../../../_shared/ts/validation';
import { statIfExists, toMCPError } from './common';

export interface ReadResult {
  path: string;
  content: Buffer;
}

export interface WriteResult {
  path: string;
  bytesWritten: number;
}

/** Read a whole file as raw bytes */
export async function readWorkspaceFile(root: string, userPath: string): Promise<ReadResult> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  try {
    const stat = await statIfExists(target);
    if (!stat) {
      throw new MCPError(ErrorCodes.NOT_FOUND, `File not found: ${display}`);
    }
    if (stat.isDirectory()) {
      throw new MCPError(ErrorCodes.TYPE_MISMATCH, `Path is a directory, not a file: ${display}`);
    }
    return { path: display, content: await fs.readFile(target) };
  } catch (err) {
    throw toMCPError(err, 'read file', display);
  }
}

/**
 * Write `content` as UTF-8, replacing any existing file and creating
 * missing parent directories.
 */
export async function writeWorkspaceFile(
  root: string,
  userPath: string,
  content: string,
): Promise<WriteResult> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  try {
    const stat = await statIfExists(target);
    if (stat?.isDirectory()) {
      throw new MCPError(ErrorCodes.TYPE_MISMATCH, `Path is a directory, not a file: ${display}`);
    }

    await fs.mkdir(path.dirname(target), { recursive: true });

    const data = Buffer.from(content, 'utf-8');
    await fs.writeFile(target, data);
    return { path: display, bytesWritten: data.byteLength };
  } catch (err) {
    throw toMCPError(err, 'write file', display);
  }
}

/** Remove exactly one file; directories are refused */
export async function deleteWorkspaceFile(root: string, userPath: string): Promise<string> {
  const target = resolveInWorkspace(root, userPath);
  const display = displayPath(root, target);

  try {
    const stat = await statIfExists(target, false);
    if (!stat) {
      throw new MCPError(ErrorCodes.NOT_FOUND, `File not found: ${display}`);
    }
    if (stat.isDirectory()) {
      throw new MCPError(
        ErrorCodes.TYPE_MISMATCH,
        `Path is a directory, not a file: ${display} (use delete_directory)`,
      );
    }
    await fs.unlink(target);
    return display;
  } catch (err) {
    throw toMCPError(err, 'delete file', display);
  }
}
