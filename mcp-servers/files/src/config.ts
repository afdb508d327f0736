/**
 * Workspace configuration.
 *
 * Read once from the environment at startup, validated, then frozen and
 * handed to every component that needs it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { MCPError, ErrorCodes } from '../../_shared/ts/mcp-base';
import { LOG_LEVELS } from '../../_shared/ts/logger';
import type { LogLevel } from '../../_shared/ts/logger';

// ─── Types ──────────────────────────────────────────────────────────────────

export type Transport = 'http' | 'stdio';

export interface WorkspaceConfig {
  /** Absolute, resolved workspace root */
  readonly root: string;
  readonly port: number;
  readonly transport: Transport;
  readonly logLevel: LogLevel;
}

// ─── Env Schema ─────────────────────────────────────────────────────────────

export const DEFAULT_HTTP_PORT = 9090;

const envSchema = z.object({
  LOCAL_WORKSPACE_FOLDER: z
    .string({ required_error: 'environment variable is not set' })
    .trim()
    .min(1, 'environment variable is not set'),
  MCP_HTTP_PORT: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(1).max(65535).default(DEFAULT_HTTP_PORT),
  ),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

function configurationError(message: string): MCPError {
  return new MCPError(ErrorCodes.CONFIGURATION_ERROR, message);
}

// ─── Loader ─────────────────────────────────────────────────────────────────

/**
 * Build the workspace configuration from an environment mapping.
 * Throws MCPError (ConfigurationError) when the root is unset, missing or
 * not a directory, or when another variable is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv): WorkspaceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw configurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const root = path.resolve(parsed.data.LOCAL_WORKSPACE_FOLDER);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw configurationError(`Workspace root is not accessible: ${root} (${msg})`);
  }
  if (!stat.isDirectory()) {
    throw configurationError(`Workspace root is not a directory: ${root}`);
  }

  return Object.freeze({
    root,
    port: parsed.data.MCP_HTTP_PORT,
    transport: parsed.data.MCP_TRANSPORT,
    logLevel: parsed.data.LOG_LEVEL,
  });
}
