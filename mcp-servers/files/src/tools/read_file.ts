/**
 * read_file — Read the content of a text file.
 *
 * Non-destructive: executes immediately.
 */

import { z } from 'zod';
import type { MCPTool, MCPResult } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { readWorkspaceFile } from '../operations/files';
import { requiredString } from './params';

// ─── Params Schema ──────────────────────────────────────────────────────────

const paramsSchema = z.object({
  file_path: requiredString('file_path', 'Path to the file to read, relative to the workspace'),
});

type Params = z.infer<typeof paramsSchema>;

// ─── Tool Definition ────────────────────────────────────────────────────────

export function createReadFileTool(config: WorkspaceConfig): MCPTool<Params> {
  return {
    name: 'read_file',
    description: 'Read the content of a text file',
    paramsSchema,
    readOnly: true,
    destructive: false,
    idempotent: true,

    async execute(params: Params): Promise<MCPResult> {
      const { content } = await readWorkspaceFile(config.root, params.file_path);
      return { success: true, data: content.toString('utf-8') };
    },
  };
}
