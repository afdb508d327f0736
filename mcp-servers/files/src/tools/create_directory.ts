/**
 * create_directory — Create a directory and its missing parents.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { createWorkspaceDirectory } from '../operations/directories';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  directory_path: requiredString(
    'directory_path',
    'Path to the directory to create, relative to the workspace',
  ),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createCreateDirectoryTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'create_directory',
    description: "Create a directory and its parent directories if they don't exist",
    paramsSchema,
    readOnly: false,
    destructive: false,
    idempotent: true,

    async execute(params: Params): Promise<MCPResult> {
      const created = await createWorkspaceDirectory(config.root, params.directory_path);
      return { success: true, data: `Successfully created directory: ${created}` };
    },
  };
}
