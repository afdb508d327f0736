/**
 * delete_file — Delete a single file from the workspace.
 *
 * Destructive and permanent. Never removes a directory.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { deleteWorkspaceFile } from '../operations/files';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  file_path: requiredString('file_path', 'Path to the file to delete, relative to the workspace'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createDeleteFileTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'delete_file',
    description: 'Delete a file from the filesystem',
    paramsSchema,
    readOnly: false,
    destructive: true,
    idempotent: false,

    async execute(params: Params): Promise<MCPResult> {
      const deleted = await deleteWorkspaceFile(config.root, params.file_path);
      return { success: true, data: `Successfully deleted file: ${deleted}` };
    },
  };
}
