/**
 * list_directory — List the immediate contents of a directory.
 *
 * Non-destructive: executes immediately.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { formatListing } from '../format';
import { listWorkspaceDirectory } from '../operations/directories';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  directory_path: requiredString(
    'directory_path',
    'Path to the directory to list, relative to the workspace ("" for the root)',
  ),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createListDirectoryTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'list_directory',
    description: 'List the contents of a directory',
    paramsSchema,
    readOnly: true,
    destructive: false,
    idempotent: true,

    async execute(params: Params): Promise<MCPResult> {
      const listing = await listWorkspaceDirectory(config.root, params.directory_path);
      return { success: true, data: formatListing(listing) };
    },
  };
}
