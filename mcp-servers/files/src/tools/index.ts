import type { MCPTool } from '../../../_shared/ts/mcp-base';
import type { WorkspaceConfig } from '../config';
import { createReadFileTool } from './read_file';
import { createWriteFileTool } from './write_file';
import { createDeleteFileTool } from './delete_file';
import { createCreateDirectoryTool } from './create_directory';
import { createDeleteDirectoryTool } from './delete_directory';
import { createListDirectoryTool } from './list_directory';
import { createTreeViewTool } from './tree_view';

/** Every workspace tool, bound to one configuration */
export function createWorkspaceTools(config: WorkspaceConfig): MCPTool[] {
  return [
    createReadFileTool(config),
    createWriteFileTool(config),
    createDeleteFileTool(config),
    createCreateDirectoryTool(config),
    createDeleteDirectoryTool(config),
    createListDirectoryTool(config),
    createTreeViewTool(config),
  ];
}
