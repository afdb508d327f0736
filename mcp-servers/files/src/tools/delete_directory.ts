/**
 * delete_directory — Delete a directory and everything beneath it.
 *
 * Destructive and permanent; there is no confirmation step.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { deleteWorkspaceDirectory } from '../operations/directories';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  directory_path: requiredString(
    'directory_path',
    'Path to the directory to delete, relative to the workspace',
  ),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createDeleteDirectoryTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'delete_directory',
    description: 'Delete a directory and all its contents from the filesystem',
    paramsSchema,
    readOnly: false,
    destructive: true,
    idempotent: false,

    async execute(params: Params): Promise<MCPResult> {
      const deleted = await deleteWorkspaceDirectory(config.root, params.directory_path);
      return { success: true, data: `Successfully deleted directory: ${deleted}` };
    },
  };
}
