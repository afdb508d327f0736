/**
 * MCP Server Base Classes — TypeScript
 *
 * Shared foundation for the TypeScript MCP servers in this repository.
 * Implements JSON-RPC 2.0 over stdio and HTTP, tool registration, argument
 * validation and the dispatch of tool calls.
 *
 * Usage:
 *   import { MCPServer, MCPTool, MCPResult, MCPError } from '../../_shared/ts/mcp-base';
 */

import http from 'http';
import type { IncomingMessage, ServerResponse } from 'http';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import {
  errorResponse,
  isRequest,
  isValidMessage,
  successResponse,
} from './json-rpc';
import type { JsonRpcRequest, JsonRpcResponse } from './json-rpc';
import { logToolComplete, silentLogger } from './logger';
import type { Logger } from './logger';

// ─── Types ──────────────────────────────────────────────────────────────────

/** Result returned by a successful tool execution */
export interface MCPResult<T = string> {
  success: true;
  data: T;
}

/** Failure classes surfaced to callers */
export type ErrorKind =
  | 'ConfigurationError'
  | 'ArgumentError'
  | 'ContainmentViolation'
  | 'NotFound'
  | 'TypeMismatch'
  | 'IOError';

/** Standard MCP error codes */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // Workspace codes
  CONTAINMENT_VIOLATION: -32001,
  NOT_FOUND: -32003,
  TYPE_MISMATCH: -32005,
  IO_ERROR: -32006,
  CONFIGURATION_ERROR: -32007,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  [ErrorCodes.PARSE_ERROR]: 'ArgumentError',
  [ErrorCodes.INVALID_REQUEST]: 'ArgumentError',
  [ErrorCodes.METHOD_NOT_FOUND]: 'ArgumentError',
  [ErrorCodes.INVALID_PARAMS]: 'ArgumentError',
  [ErrorCodes.INTERNAL_ERROR]: 'IOError',
  [ErrorCodes.CONTAINMENT_VIOLATION]: 'ContainmentViolation',
  [ErrorCodes.NOT_FOUND]: 'NotFound',
  [ErrorCodes.TYPE_MISMATCH]: 'TypeMismatch',
  [ErrorCodes.IO_ERROR]: 'IOError',
  [ErrorCodes.CONFIGURATION_ERROR]: 'ConfigurationError',
};

/** Structured error for MCP tool failures */
export class MCPError extends Error {
  code: ErrorCode;
  kind: ErrorKind;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.name = 'MCPError';
  }
}

/** Tool definition interface — every tool implements this */
export interface MCPTool<TParams = unknown> {
  /** Tool name as called over the wire */
  name: string;

  /** Human-readable description for the LLM */
  description: string;

  /** Zod schema for parameter validation */
  paramsSchema: ZodType<TParams, ZodTypeDef, unknown>;

  /** The tool never modifies the workspace */
  readOnly: boolean;

  /** The tool may remove data that cannot be recovered */
  destructive: boolean;

  /** Repeating the call with the same arguments has no further effect */
  idempotent: boolean;

  /** Execute the tool with validated params */
  execute(params: TParams): Promise<MCPResult>;
}

/** Result of a tools/call, as carried back to the caller */
export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
  structuredContent?: { kind: ErrorKind; message: string };
}

// ─── MCPServer ──────────────────────────────────────────────────────────────

export interface MCPServerConfig {
  name: string;
  version: string;
  tools: MCPTool[];
  logger?: Logger;
  /** HTTP path that accepts JSON-RPC messages */
  endpointPath?: string;
}

const DEFAULT_PROTOCOL_VERSION = '2025-03-26';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function toolFailure(tool: string, kind: ErrorKind, message: string): ToolCallResult {
  return {
    content: [{ type: 'text', text: `${tool}: ${message}` }],
    isError: true,
    structuredContent: { kind, message },
  };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Base MCP Server class.
 *
 * Registers tools, handles JSON-RPC over stdio or HTTP, validates params,
 * and dispatches tool calls.
 *
 * Usage:
 *   const server = new MCPServer({ name: 'files', version: '1.0.0', tools: [...] });
 *   server.start();
 */
export class MCPServer {
  private name: string;
  private version: string;
  private tools: Map<string, MCPTool>;
  private logger: Logger;
  private endpointPath: string;

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.tools = new Map();
    this.logger = config.logger ?? silentLogger();
    this.endpointPath = config.endpointPath ?? '/mcp';

    for (const tool of config.tools) {
      this.tools.set(tool.name, tool);
    }
  }

  /** Start the JSON-RPC listener on stdio */
  start(): void {
    process.stdin.setEncoding('utf-8');

    let buffer = '';

    process.stdin.on('data', (chunk: string) => {
      buffer += chunk;

      // Newline-delimited messages; keep the trailing partial line
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.length === 0) continue;

        this.handleMessage(trimmed)
          .then((response) => {
            if (response) {
              process.stdout.write(JSON.stringify(response) + '\n');
            }
          })
          .catch((err: unknown) => {
            this.logger.error({ err }, 'Failed to handle stdio message');
          });
      }
    });

    process.stdin.on('end', () => {
      process.exit(0);
    });
  }

  /** Start the JSON-RPC listener on HTTP, alongside the health endpoint */
  listen(port: number, host?: string): Promise<http.Server> {
    const httpServer = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((err: unknown) => {
        this.logger.error({ err }, 'HTTP request failed');
        if (!res.headersSent) {
          sendJson(res, 500, errorResponse(null, ErrorCodes.INTERNAL_ERROR, 'Internal error'));
        }
      });
    });

    return new Promise((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, host, () => {
        httpServer.off('error', reject);
        resolve(httpServer);
      });
    });
  }

  /** Fixed liveness payload; independent of workspace state */
  healthStatus(): { status: 'healthy'; server: string } {
    return { status: 'healthy', server: this.name };
  }

  /**
   * Dispatch one tool call.
   *
   * Unknown tools and invalid arguments throw MCPError before the tool runs.
   * Failures raised by the tool itself come back as an `isError` result.
   */
  async callTool(name: string, args: unknown): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new MCPError(ErrorCodes.METHOD_NOT_FOUND, `Unknown tool: ${name}`);
    }

    const parseResult = tool.paramsSchema.safeParse(args ?? {});
    if (!parseResult.success) {
      throw new MCPError(
        ErrorCodes.INVALID_PARAMS,
        `Invalid parameters for ${name}: ${formatIssues(parseResult.error)}`,
      );
    }

    const started = Date.now();
    try {
      const result = await tool.execute(parseResult.data);
      logToolComplete(this.logger, name, 'success', Date.now() - started);
      return { content: [{ type: 'text', text: result.data }] };
    } catch (err) {
      if (err instanceof MCPError) {
        logToolComplete(this.logger, name, 'failure', Date.now() - started, {
          kind: err.kind,
          message: err.message,
        });
        return toolFailure(name, err.kind, err.message);
      }
      const msg = err instanceof Error ? err.message : String(err);
      logToolComplete(this.logger, name, 'error', Date.now() - started, { err });
      return toolFailure(name, 'IOError', `Internal error: ${msg}`);
    }
  }

  /** Handle one raw JSON-RPC message; null when no response is due */
  async handleMessage(raw: string): Promise<JsonRpcResponse | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return errorResponse(null, ErrorCodes.PARSE_ERROR, 'Invalid JSON');
    }

    if (!isValidMessage(parsed)) {
      return errorResponse(null, ErrorCodes.INVALID_REQUEST, 'Invalid JSON-RPC request');
    }

    if (!isRequest(parsed)) {
      this.logger.debug({ method: parsed.method }, 'Notification received');
      return null;
    }

    return this.handleRequest(parsed);
  }

  /**
   * Build the tool definitions array for the tools/list response.
   *
   * Converts each registered tool's zod schema to JSON Schema, producing the
   * property/required/description metadata the LLM needs to call tools.
   */
  private buildToolDefinitions(): Record<string, unknown>[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.paramsSchema, {
        target: 'jsonSchema7',
        $refStrategy: 'none',
      }),
      annotations: {
        readOnlyHint: tool.readOnly,
        destructiveHint: tool.destructive,
        idempotentHint: tool.idempotent,
      },
    }));
  }

  /** Handle an incoming JSON-RPC request */
  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    switch (request.method) {
      case 'initialize': {
        const requested = request.params?.protocolVersion;
        return successResponse(request.id, {
          protocolVersion: typeof requested === 'string' ? requested : DEFAULT_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: this.name, version: this.version },
        });
      }
      case 'tools/list':
        return successResponse(request.id, { tools: this.buildToolDefinitions() });
      case 'tools/call':
        return this.handleToolCall(request);
      case 'ping':
        return successResponse(request.id, {});
      default:
        return errorResponse(request.id, ErrorCodes.METHOD_NOT_FOUND, `Unknown method: ${request.method}`);
    }
  }

  /** Handle a tools/call request */
  private async handleToolCall(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const name = request.params?.name;
    if (typeof name !== 'string') {
      return errorResponse(request.id, ErrorCodes.INVALID_PARAMS, "Missing required parameter 'name'");
    }

    try {
      const result = await this.callTool(name, request.params?.arguments);
      return successResponse(request.id, result);
    } catch (err) {
      if (err instanceof MCPError) {
        return errorResponse(request.id, err.code, err.message);
      }
      return errorResponse(
        request.id,
        ErrorCodes.INTERNAL_ERROR,
        `Internal error: ${err instanceof Error ? err.message : 'Unknown'}`,
      );
    }
  }

  private async handleHttp(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (pathname === '/health' && req.method === 'GET') {
      sendJson(res, 200, this.healthStatus());
      return;
    }

    if (pathname !== this.endpointPath) {
      sendJson(res, 404, { error: `Not found: ${pathname}` });
      return;
    }

    if (req.method !== 'POST') {
      res.writeHead(405, { Allow: 'POST' });
      res.end();
      return;
    }

    const response = await this.handleMessage(await readBody(req));
    if (!response) {
      res.writeHead(202);
      res.end();
      return;
    }
    sendJson(res, 200, response);
  }
}
