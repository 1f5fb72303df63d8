/**
 * JSON-RPC 2.0 envelope types and the error taxonomy used on /message.
 */

export const JSON_RPC_VERSION = '2.0';

export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type JsonRpcErrorCodeValue = (typeof JsonRpcErrorCode)[keyof typeof JsonRpcErrorCode];

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification<P = unknown> {
  jsonrpc: typeof JSON_RPC_VERSION;
  method: string;
  params: P;
}

export interface JsonRpcErrorDetail {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse<R = unknown> {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId | null;
  result: R;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSON_RPC_VERSION;
  id: JsonRpcId | null;
  error: JsonRpcErrorDetail;
}

export type JsonRpcResponse<R = unknown> = JsonRpcSuccessResponse<R> | JsonRpcErrorResponse;

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
}

export interface ToolCallParams {
  name: string;
  arguments: Record<string, unknown>;
}

export class JsonRpcError extends Error {
  constructor(
    public readonly code: JsonRpcErrorCodeValue,
    message: string,
    public readonly id: JsonRpcId | null = null,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = 'JsonRpcError';
  }

  toResponse(): JsonRpcErrorResponse {
    return errorResponse(this.id, this.code, this.message, this.data);
  }
}

export function successResponse<R>(id: JsonRpcId | null, result: R): JsonRpcSuccessResponse<R> {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function errorResponse(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  const error: JsonRpcErrorDetail = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: JSON_RPC_VERSION, id, error };
}

export function notification<P>(method: string, params: P): JsonRpcNotification<P> {
  return { jsonrpc: JSON_RPC_VERSION, method, params };
}

export function isErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return 'error' in response;
}

/** Validates the request envelope; throws `InvalidRequest` carrying whatever id could be recovered. */
export function parseRequestEnvelope(body: unknown): JsonRpcRequest {
  if (!isRecord(body)) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidRequest, 'Invalid Request: expected a JSON object');
  }

  const id = isValidId(body.id) ? body.id : null;
  if (body.jsonrpc !== JSON_RPC_VERSION) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidRequest, 'Invalid Request: jsonrpc must be "2.0"', id);
  }
  if (id === null) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidRequest, 'Invalid Request: id must be a string or number');
  }
  if (typeof body.method !== 'string' || body.method.trim().length === 0) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidRequest, 'Invalid Request: method must be a non-empty string', id);
  }

  return {
    jsonrpc: JSON_RPC_VERSION,
    id,
    method: body.method,
    params: body.params,
  };
}

export function parseToolCallParams(params: unknown, id: JsonRpcId): ToolCallParams {
  if (!isRecord(params)) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidParams, 'Invalid params: expected an object with "name"', id);
  }
  if (typeof params.name !== 'string' || params.name.trim().length === 0) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidParams, 'Invalid params: "name" must be a non-empty string', id);
  }
  if (params.arguments !== undefined && params.arguments !== null && !isRecord(params.arguments)) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidParams, 'Invalid params: "arguments" must be an object', id);
  }
  return {
    name: params.name.trim(),
    arguments: isRecord(params.arguments) ? params.arguments : {},
  };
}

function isValidId(value: unknown): value is JsonRpcId {
  return (typeof value === 'string' && value.length > 0) || (typeof value === 'number' && Number.isFinite(value));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
