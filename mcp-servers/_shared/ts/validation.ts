/**
 * Shared Validation Utilities — TypeScript
 *
 * Workspace containment for caller-supplied paths. Every filesystem tool
 * resolves its path argument here before touching the disk.
 */

import * as path from 'path';

import { MCPError, ErrorCodes } from './mcp-base';

// ─── Workspace Containment ──────────────────────────────────────────────────

const DRIVE_PREFIX = /^[a-zA-Z]:/;
const LEADING_SLASHES = /^\/+/;

/**
 * Lexically clean a caller path into a relative POSIX-style path.
 *
 * Backslashes count as separators, and root markers (leading slashes, a
 * drive letter) are dropped, so "/etc/passwd" and "C:\\etc\\passwd" both
 * become "etc/passwd". The empty string becomes ".".
 */
export function toRelativePath(userPath: string): string {
  const slashed = userPath.replace(/\\/g, '/').replace(DRIVE_PREFIX, '');
  const normalized = path.posix.normalize(slashed).replace(LEADING_SLASHES, '');
  return normalized === '' ? '.' : normalized;
}

/** True when `target` is `root` itself or lies beneath it */
export function isWithinRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === '') return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

/**
 * Resolve a caller path against the workspace root.
 *
 * Never consults the filesystem: existence and type are the caller's
 * concern. Throws MCPError with CONTAINMENT_VIOLATION when the result would
 * fall outside the root.
 */
export function resolveInWorkspace(root: string, userPath: string): string {
  const relative = toRelativePath(userPath);
  const resolved = path.resolve(root, relative);

  if (!isWithinRoot(root, resolved)) {
    throw new MCPError(
      ErrorCodes.CONTAINMENT_VIOLATION,
      `Access denied: "${userPath}" resolves outside the workspace`,
    );
  }

  return resolved;
}

/** Workspace-relative form of a resolved path, "." for the root */
export function displayPath(root: string, resolved: string): string {
  const relative = path.relative(root, resolved);
  return relative === '' ? '.' : relative.split(path.sep).join('/');
}
