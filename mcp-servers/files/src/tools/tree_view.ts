/**
 * tree_view — Render a directory structure as a tree.
 *
 * Non-destructive: executes immediately.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { formatTree } from '../format';
import { buildWorkspaceTree, UNLIMITED_DEPTH } from '../operations/tree';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  directory_path: requiredString(
    'directory_path',
    'Path to the directory to display as tree, relative to the workspace',
  ),
  max_depth: z
    .number({ invalid_type_error: "parameter 'max_depth' must be a number" })
    .int("parameter 'max_depth' must be an integer")
    .nullish()
    .describe('Maximum depth to traverse, counting the directory itself as 0; 0 and 1 list only the top level (default: unlimited)'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createTreeViewTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'tree_view',
    description: 'Display a tree view of a directory structure',
    paramsSchema,
    readOnly: true,
    destructive: false,
    idempotent: true,

    async execute(params: Params): Promise<MCPResult> {
      const tree = await buildWorkspaceTree(
        config.root,
        params.directory_path,
        params.max_depth ?? UNLIMITED_DEPTH,
      );
      return { success: true, data: formatTree(tree) };
    },
  };
}
