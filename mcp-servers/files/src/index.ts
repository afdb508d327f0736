/**
 * Files MCP Server — Entry Point
 *
 * Loads the workspace configuration, registers the filesystem tools and
 * starts the JSON-RPC listener on HTTP (default) or stdio. Every path a
 * caller passes is confined to the configured workspace root.
 *
 * Tools (7):
 *   read_file         — read a text file
 *   write_file        — write a text file, creating parent directories
 *   delete_file       — delete one file
 *   create_directory  — create a directory and its parents
 *   delete_directory  — delete a directory recursively
 *   list_directory    — list a directory's immediate contents
 *   tree_view         — render a depth-limited directory tree
 */

import { MCPError, MCPServer } from '../../_shared/ts/mcp-base';
import { createLogger } from '../../_shared/ts/logger';
import { loadConfig } from './config';
import type { WorkspaceConfig } from './config';
import { createWorkspaceTools } from './tools';

const SERVER_NAME = 'workspace-files';
const SERVER_VERSION = '1.0.0';

// ─── Configuration ──────────────────────────────────────────────────────────

let config: WorkspaceConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  const message = err instanceof MCPError ? `${err.kind}: ${err.message}` : String(err);
  createLogger(SERVER_NAME).fatal(message);
  process.exit(1);
}

const logger = createLogger(SERVER_NAME, config.logLevel);

// ─── Server Setup ───────────────────────────────────────────────────────────

const server = new MCPServer({
  name: SERVER_NAME,
  version: SERVER_VERSION,
  tools: createWorkspaceTools(config),
  logger,
});

// ─── Graceful Shutdown ──────────────────────────────────────────────────────

process.on('SIGINT', () => {
  process.exit(0);
});

process.on('SIGTERM', () => {
  process.exit(0);
});

// ─── Start ──────────────────────────────────────────────────────────────────

if (config.transport === 'stdio') {
  logger.info({ root: config.root }, 'Files MCP server listening on stdio');
  server.start();
} else {
  server
    .listen(config.port)
    .then(() => {
      logger.info({ root: config.root, port: config.port }, `Files MCP server running on port ${config.port}`);
    })
    .catch((err: unknown) => {
      logger.fatal({ err }, 'Failed to start HTTP listener');
      process.exit(1);
    });
}
