/**
 * write_file — Write content to a text file.
 *
 * Replaces the file if it exists; missing parent directories are created.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { writeWorkspaceFile } from '../operations/files';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  file_path: requiredString('file_path', 'Path to the file to write, relative to the workspace'),
  content: requiredString('content', 'Content to write to the file'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createWriteFileTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'write_file',
    description: 'Write content to a text file',
    paramsSchema,
    readOnly: false,
    destructive: true,
    idempotent: true,

    async execute(params: Params): Promise<MCPResult> {
      const result = await writeWorkspaceFile(config.root, params.file_path, params.content);
      return {
        success: true,
        data: `Successfully wrote ${result.bytesWritten} bytes to ${result.path}`,
      };
    },
  };
}
