/**
 * MCP Error Handling
 *
 * - Standard JSON-RPC 2.0 error codes and McpError classes for protocol failures
 * - Tool results, with tool failures reported as `isError: true` results
 *   (SEP-1303) so the model can read and correct them
 */

import type { JsonRpcId, JsonRpcErrorResponse } from './jsonrpc.js';
import { JSONRPC_VERSION, JsonRpcErrorCodes, createJsonRpcError } from './jsonrpc.js';

// =============================================================================
// JSON-RPC 2.0 Standard Error Codes
// =============================================================================

export const INVALID_PARAMS = JsonRpcErrorCodes.INVALID_PARAMS;
export const INTERNAL_ERROR = JsonRpcErrorCodes.INTERNAL_ERROR;

// =============================================================================
// Base MCP Error Class
// =============================================================================

/**
 * Base error class for protocol-level failures, answered as JSON-RPC errors.
 */
export class McpError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object for the response; never includes the stack trace.
   */
  toJSON(): { code: number; message: string; data?: unknown } {
    const result: { code: number; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

export class InvalidParamsError extends McpError {
  constructor(message?: string, data?: unknown) {
    super(INVALID_PARAMS, message ?? 'Invalid params', data);
    this.name = 'InvalidParamsError';
  }
}

export class InternalError extends McpError {
  constructor(message?: string, data?: unknown) {
    super(INTERNAL_ERROR, message ?? 'Internal error', data);
    this.name = 'InternalError';
  }
}

// =============================================================================
// Tool Results (SEP-1303)
// =============================================================================

export interface ToolResultContent {
  type: 'text';
  text: string;
}

/**
 * Tool execution result.
 *
 * Validation and execution failures come back here with `isError: true`
 * rather than as JSON-RPC errors. `structuredContent` mirrors a JSON text
 * payload for clients that read structured output.
 */
export interface ToolResult {
  content: ToolResultContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

function describeDetails(details: unknown): string {
  if (typeof details === 'string') {
    return details;
  }
  try {
    return JSON.stringify(details, null, 2);
  } catch {
    // circular or otherwise unserializable
    return String(details);
  }
}

/**
 * Create a text tool error result.
 *
 * @param message - Human-readable error description
 * @param toolName - Name of the tool that failed, prefixed to the message
 * @param details - Extra context appended after the message; stack traces never included
 */
export function createToolErrorResult(
  message: string,
  toolName?: string,
  details?: unknown
): ToolResult {
  let errorText = toolName ? `Tool '${toolName}' failed: ${message}` : message;

  if (details !== undefined) {
    errorText += `\n\nDetails: ${describeDetails(details)}`;
  }

  return {
    content: [{ type: 'text', text: errorText }],
    isError: true,
  };
}

/**
 * Tool result carrying a JSON payload as both text and structured content.
 */
export function createToolJsonResult(
  payload: Record<string, unknown>,
  isError = false
): ToolResult {
  const result: ToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload) }],
    structuredContent: payload,
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

// =============================================================================
// Error Response Helpers
// =============================================================================

export function toErrorResponse(error: McpError, requestId: JsonRpcId): JsonRpcErrorResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id: requestId,
    error: createJsonRpcError(error.code, error.message, error.data),
  };
}

/**
 * Wrap any caught value in an McpError without exposing stack traces.
 */
export function fromError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(`An internal error occurred: ${error.message}`);
  }

  if (typeof error === 'string') {
    return new InternalError(`An internal error occurred: ${error}`);
  }

  return new InternalError('An unexpected internal error occurred');
}
