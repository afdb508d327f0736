/**
 * Text rendering for listings and trees.
 */

import type { DirectoryEntry } from './operations/common';
import type { DirectoryListing } from './operations/directories';
import type { DirectoryTree, TreeNode } from './operations/tree';

export const EMPTY_DIRECTORY = '(empty directory)';

const BRANCH = '├── ';
const TERMINAL = '└── ';
const CONTINUATION = '│   ';
const BLANK = '    ';

/** "name/" for directories, "name (N bytes)" for files */
export function formatEntry(entry: DirectoryEntry): string {
  if (entry.kind === 'directory') return `${entry.name}/`;
  return entry.size === undefined ? entry.name : `${entry.name} (${entry.size} bytes)`;
}

export function formatListing(listing: DirectoryListing): string {
  const header = `Contents of directory: ${listing.path}\n\n`;
  if (listing.entries.length === 0) return header + EMPTY_DIRECTORY;
  return header + listing.entries.map((entry) => `${formatEntry(entry)}\n`).join('');
}

function treeLines(nodes: TreeNode[], prefix: string, lines: string[]): void {
  nodes.forEach((node, index) => {
    const last = index === nodes.length - 1;
    lines.push(`${prefix}${last ? TERMINAL : BRANCH}${formatEntry(node)}`);
    if (node.children && node.children.length > 0) {
      treeLines(node.children, prefix + (last ? BLANK : CONTINUATION), lines);
    }
  });
}

export function formatTree(tree: DirectoryTree): string {
  const header = `Tree view of directory: ${tree.path}\n\n`;
  if (tree.nodes.length === 0) return header + EMPTY_DIRECTORY;

  const lines: string[] = [];
  treeLines(tree.nodes, '', lines);
  return header + lines.map((line) => `${line}\n`).join('');
}
