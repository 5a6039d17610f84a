/**
 * JSON-RPC 2.0 types and parsing
 *
 * Message shapes for the MCP wire protocol.
 * See: https://www.jsonrpc.org/specification
 */

import { z } from 'zod';

// =============================================================================
// Constants
// =============================================================================

export const JSONRPC_VERSION = '2.0' as const;

/**
 * Standard JSON-RPC 2.0 error codes
 */
export const JsonRpcErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * JSON-RPC message ID; responses to unparseable input carry null
 */
export const JsonRpcIdSchema = z.union([z.string(), z.number().int(), z.null()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const JsonRpcBaseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
});

/**
 * A request MUST carry a non-null id
 */
export const JsonRpcRequestSchema = JsonRpcBaseSchema.extend({
  id: z.union([z.string(), z.number().int()]),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

/**
 * A notification MUST NOT carry an id
 */
export const JsonRpcNotificationSchema = JsonRpcBaseSchema.extend({
  method: z.string(),
  params: z.record(z.unknown()).optional(),
}).strict();

export const JsonRpcSuccessResponseSchema = JsonRpcBaseSchema.extend({
  id: JsonRpcIdSchema,
  result: z.unknown(),
});

export const JsonRpcErrorResponseSchema = JsonRpcBaseSchema.extend({
  id: JsonRpcIdSchema,
  error: JsonRpcErrorSchema,
});

export const JsonRpcResponseSchema = z.union([
  JsonRpcSuccessResponseSchema,
  JsonRpcErrorResponseSchema,
]);

export const JsonRpcMessageSchema = z.union([
  JsonRpcRequestSchema,
  JsonRpcNotificationSchema,
  JsonRpcResponseSchema,
]);

// =============================================================================
// Types (inferred from schemas)
// =============================================================================

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
export type JsonRpcSuccessResponse = z.infer<typeof JsonRpcSuccessResponseSchema>;
export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcMessage = z.infer<typeof JsonRpcMessageSchema>;

// =============================================================================
// Type Guards
// =============================================================================

export function isRequest(message: JsonRpcMessage): message is JsonRpcRequest {
  return 'id' in message && 'method' in message && message.id !== undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readId(value: unknown): string | number | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  return null;
}

// =============================================================================
// Parse Result Types
// =============================================================================

export type ParseSuccess<T> = {
  success: true;
  data: T;
};

export type ParseFailure = {
  success: false;
  error: JsonRpcError;
  /** Id of the offending request, when one could be read */
  id?: JsonRpcId;
};

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

// =============================================================================
// Parsing
// =============================================================================

export function createJsonRpcError(
  code: number,
  message: string,
  data?: unknown
): JsonRpcError {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return error;
}

/**
 * Parse one line of input into a request or notification
 */
export function parseJsonRpc(input: string): ParseResult<JsonRpcRequest | JsonRpcNotification> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch (e) {
    return {
      success: false,
      error: createJsonRpcError(
        JsonRpcErrorCodes.PARSE_ERROR,
        'Parse error: Invalid JSON',
        e instanceof Error ? e.message : String(e)
      ),
    };
  }

  if (!isRecord(parsed)) {
    return {
      success: false,
      error: createJsonRpcError(JsonRpcErrorCodes.INVALID_REQUEST, 'Invalid Request: Expected object'),
    };
  }

  const { method, params } = parsed;
  const hasId = 'id' in parsed;
  const replyId = readId(parsed['id']);

  if (parsed['jsonrpc'] !== JSONRPC_VERSION) {
    return {
      success: false,
      id: replyId,
      error: createJsonRpcError(
        JsonRpcErrorCodes.INVALID_REQUEST,
        `Invalid Request: jsonrpc must be "${JSONRPC_VERSION}"`,
        { received: parsed['jsonrpc'] }
      ),
    };
  }

  if (typeof method !== 'string') {
    return {
      success: false,
      id: replyId,
      error: createJsonRpcError(JsonRpcErrorCodes.INVALID_REQUEST, 'Invalid Request: method must be a string'),
    };
  }

  if (params !== undefined && !isRecord(params)) {
    return {
      success: false,
      id: replyId,
      error: createJsonRpcError(JsonRpcErrorCodes.INVALID_PARAMS, 'Invalid params: must be an object'),
    };
  }

  if (!hasId) {
    const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
    if (params !== undefined) {
      notification.params = params;
    }
    return { success: true, data: notification };
  }

  if (replyId === null) {
    return {
      success: false,
      id: null,
      error: createJsonRpcError(
        JsonRpcErrorCodes.INVALID_REQUEST,
        'Invalid Request: id must be a string or integer'
      ),
    };
  }

  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id: replyId, method };
  if (params !== undefined) {
    request.params = params;
  }
  return { success: true, data: request };
}

// =============================================================================
// Serialization & Factories
// =============================================================================

export function serializeMessage(message: JsonRpcMessage): string {
  return JSON.stringify(message);
}

export function createRequest(
  id: string | number,
  method: string,
  params?: Record<string, unknown>
): JsonRpcRequest {
  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method };
  if (params !== undefined) {
    request.params = params;
  }
  return request;
}

export function createNotification(
  method: string,
  params?: Record<string, unknown>
): JsonRpcNotification {
  const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
  if (params !== undefined) {
    notification.params = params;
  }
  return notification;
}

export function createSuccessResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function createErrorResponse(id: JsonRpcId, error: JsonRpcError): JsonRpcErrorResponse {
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

export function createMethodNotFoundResponse(id: JsonRpcId, method?: string): JsonRpcErrorResponse {
  return createErrorResponse(
    id,
    createJsonRpcError(
      JsonRpcErrorCodes.METHOD_NOT_FOUND,
      'Method not found',
      method ? { method } : undefined
    )
  );
}

