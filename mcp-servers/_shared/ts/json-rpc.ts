/**
 * JSON-RPC 2.0 Transport Utilities — TypeScript
 *
 * Low-level JSON-RPC message handling shared by the stdio and HTTP
 * transports. Used by mcp-base.ts; tool implementations never touch it.
 */

// ─── JSON-RPC Types ─────────────────────────────────────────────────────────

export interface JsonRpcMessage {
  jsonrpc: '2.0';
}

/** Request ids; `null` is allowed and echoed back as-is */
export type JsonRpcId = string | number | null;

export interface JsonRpcRequest extends JsonRpcMessage {
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification extends JsonRpcMessage {
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse extends JsonRpcMessage {
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse extends JsonRpcMessage {
  id: JsonRpcId;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcIncoming = JsonRpcRequest | JsonRpcNotification;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Create a success response */
export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

/** Create an error response */
export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcErrorResponse {
  return data === undefined
    ? { jsonrpc: '2.0', id, error: { code, message } }
    : { jsonrpc: '2.0', id, error: { code, message, data } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate that a parsed message is a JSON-RPC request or notification */
export function isValidMessage(msg: unknown): msg is JsonRpcIncoming {
  if (!isRecord(msg)) return false;
  if (msg.jsonrpc !== '2.0' || typeof msg.method !== 'string') return false;
  if (msg.params !== undefined && !isRecord(msg.params)) return false;
  return msg.id === undefined || isId(msg.id);
}

function isId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

/** Requests carry an id, possibly null; notifications never get a response */
export function isRequest(msg: JsonRpcIncoming): msg is JsonRpcRequest {
  return 'id' in msg && isId(msg.id);
}
