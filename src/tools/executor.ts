/**
 * Tool Execution with Validation
 *
 * Validates arguments against the tool's JSON Schema, runs the handler
 * under a timeout inside a trace span, and reports every failure as an
 * `isError` tool result (SEP-1303).
 */

import { z } from 'zod';
import type { ToolRegistry, Tool, ToolResult, JsonSchema, ToolDefinitionExternal } from './registry.js';
import { createToolErrorResult } from '../protocol/errors.js';
import { StructuredLogger } from '../observability/logger.js';
import { withSpan } from '../observability/tracing.js';

// =============================================================================
// Types
// =============================================================================

export interface ToolExecutorOptions {
  /** Timeout in milliseconds; 0 disables it (default: 30000) */
  timeoutMs?: number;
  /** Whether to validate input against schema (default: true) */
  validateInput?: boolean;
  /** Whether to validate structuredContent against outputSchema (default: false) */
  validateOutput?: boolean;
  logger?: StructuredLogger;
}

// =============================================================================
// Zod Schemas for Request Validation
// =============================================================================

export const ToolsListParamsSchema = z.object({
  cursor: z.string().optional(),
}).optional();

export type ToolsListParams = z.infer<typeof ToolsListParamsSchema>;

export const ToolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
  _meta: z.record(z.unknown()).optional(),
});

export type ToolsCallParams = z.infer<typeof ToolsCallParamsSchema>;

// =============================================================================
// JSON Schema Validation (Simple Implementation)
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors?: string[] | undefined;
}

/**
 * Validate data against the JSON Schema subset the tools declare
 */
export function validateJsonSchema(schema: JsonSchema, data: unknown): ValidationResult {
  const errors: string[] = [];
  validateValue(schema, data, '', errors);
  return { valid: errors.length === 0, errors: errors.length > 0 ? errors : undefined };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateValue(schema: JsonSchema, value: unknown, path: string, errors: string[]): void {
  const at = path || '/';

  if (value === null || value === undefined) {
    if (schema.type && !schemaAllowsNull(schema)) {
      errors.push(`${at}: value is ${value === null ? 'null' : 'undefined'} but schema does not allow it`);
    }
    return;
  }

  if (schema.type) {
    const types = Array.isArray(schema.type) ? schema.type : [schema.type];
    if (!types.some((t) => matchesType(value, t))) {
      errors.push(`${at}: expected ${types.join(' | ')}, got ${getJsonType(value)}`);
      return;
    }
  }

  if (schema.const !== undefined && value !== schema.const) {
    errors.push(`${at}: expected const value ${JSON.stringify(schema.const)}`);
    return;
  }

  if (schema.enum && !schema.enum.includes(value)) {
    errors.push(`${at}: value must be one of ${JSON.stringify(schema.enum)}`);
    return;
  }

  if (isPlainObject(value)) {
    validateObject(schema, value, path, errors);
  } else if (Array.isArray(value)) {
    validateArray(schema, value, path, errors);
  } else if (typeof value === 'string') {
    validateString(schema, value, at, errors);
  } else if (typeof value === 'number') {
    validateNumber(schema, value, at, errors);
  }
}

function schemaAllowsNull(schema: JsonSchema): boolean {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  return types.includes('null');
}

function getJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function matchesType(value: unknown, expectedType: string): boolean {
  if (getJsonType(value) === expectedType) return true;
  if (expectedType === 'integer' && typeof value === 'number') {
    return Number.isInteger(value);
  }
  return false;
}

function validateObject(
  schema: JsonSchema,
  obj: Record<string, unknown>,
  path: string,
  errors: string[]
): void {
  for (const prop of schema.required ?? []) {
    if (!(prop in obj)) {
      errors.push(`${path}/${prop}: required property is missing`);
    }
  }

  if (schema.properties) {
    for (const [key, propSchema] of Object.entries(schema.properties)) {
      if (key in obj) {
        validateValue(propSchema, obj[key], `${path}/${key}`, errors);
      }
    }

    if (schema.additionalProperties === false) {
      const allowedKeys = new Set(Object.keys(schema.properties));
      for (const key of Object.keys(obj)) {
        if (!allowedKeys.has(key)) {
          errors.push(`${path}/${key}: additional property not allowed`);
        }
      }
    }
  }
}

function validateArray(schema: JsonSchema, arr: unknown[], path: string, errors: string[]): void {
  const at = path || '/';
  if (schema.minItems !== undefined && arr.length < schema.minItems) {
    errors.push(`${at}: array has ${arr.length} items, fewer than minimum ${schema.minItems}`);
  }
  if (schema.maxItems !== undefined && arr.length > schema.maxItems) {
    errors.push(`${at}: array has ${arr.length} items, more than maximum ${schema.maxItems}`);
  }
  const itemSchema = schema.items;
  if (itemSchema) {
    arr.forEach((item, index) => {
      validateValue(itemSchema, item, `${path}[${index}]`, errors);
    });
  }
}

function validateString(schema: JsonSchema, value: string, at: string, errors: string[]): void {
  if (schema.minLength !== undefined && value.length < schema.minLength) {
    errors.push(`${at}: string length ${value.length} is less than minimum ${schema.minLength}`);
  }
  if (schema.maxLength !== undefined && value.length > schema.maxLength) {
    errors.push(`${at}: string length ${value.length} exceeds maximum ${schema.maxLength}`);
  }
  if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
    errors.push(`${at}: string does not match pattern ${schema.pattern}`);
  }
}

function validateNumber(schema: JsonSchema, value: number, at: string, errors: string[]): void {
  if (schema.minimum !== undefined && value < schema.minimum) {
    errors.push(`${at}: value ${value} is less than minimum ${schema.minimum}`);
  }
  if (schema.maximum !== undefined && value > schema.maximum) {
    errors.push(`${at}: value ${value} exceeds maximum ${schema.maximum}`);
  }
}

// =============================================================================
// Tool Executor
// =============================================================================

class ToolTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Tool execution timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly validateInput: boolean;
  private readonly validateOutput: boolean;
  private readonly logger: StructuredLogger;

  constructor(registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.registry = registry;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.validateInput = options.validateInput ?? true;
    this.validateOutput = options.validateOutput ?? false;
    this.logger = options.logger ?? new StructuredLogger({ name: 'tools' });
  }

  /**
   * Execute a tool by name. Never throws: unknown tools, invalid
   * arguments, timeouts and handler failures all become error results.
   */
  async executeTool(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.registry.getTool(name);
    if (!tool) {
      this.logger.warning('Unknown tool requested', { tool: name });
      return createToolErrorResult(`Unknown tool: ${name}`, name, {
        availableTools: this.registry.getAllTools().map((t) => t.name),
      });
    }

    if (this.validateInput) {
      const validation = validateJsonSchema(tool.inputSchema, args);
      if (!validation.valid) {
        this.logger.info('Rejected tool arguments', { tool: name, errors: validation.errors });
        return createToolErrorResult(`Invalid arguments for tool '${name}'`, name, {
          validationErrors: validation.errors,
        });
      }
    }

    const startedAt = Date.now();
    try {
      const result = await withSpan(`tools/call ${name}`, { 'mcp.tool.name': name }, async (span) => {
        const outcome = await this.executeWithTimeout(tool, args);
        span.setAttribute('mcp.tool.is_error', outcome.isError === true);
        return outcome;
      });

      this.logger.debug('Tool call finished', {
        tool: name,
        isError: result.isError === true,
        durationMs: Date.now() - startedAt,
      });

      return this.checkOutput(tool, result);
    } catch (error) {
      return this.toErrorResult(name, error);
    }
  }

  private checkOutput(tool: Tool, result: ToolResult): ToolResult {
    if (!this.validateOutput || !tool.outputSchema || result.isError) {
      return result;
    }

    const validation = validateJsonSchema(tool.outputSchema, result.structuredContent);
    if (validation.valid) {
      return result;
    }

    this.logger.error('Tool output failed schema validation', {
      tool: tool.name,
      errors: validation.errors,
    });
    return createToolErrorResult('Tool output validation failed', tool.name, {
      validationErrors: validation.errors,
    });
  }

  private toErrorResult(name: string, error: unknown): ToolResult {
    if (error instanceof ToolTimeoutError) {
      this.logger.warning('Tool call timed out', { tool: name, timeoutMs: error.timeoutMs });
      return createToolErrorResult(error.message, name);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error('Tool handler failed', { tool: name, message });
    return createToolErrorResult(message, name);
  }

  private async executeWithTimeout(tool: Tool, args: unknown): Promise<ToolResult> {
    if (this.timeoutMs <= 0) {
      return tool.handler(args);
    }

    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([tool.handler(args), timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Request Handlers
// =============================================================================

export interface ToolsListResponse {
  tools: ToolDefinitionExternal[];
  nextCursor?: string;
}

export function handleToolsList(
  registry: ToolRegistry,
  params?: ToolsListParams,
  pageSize?: number
): ToolsListResponse {
  const result = registry.listTools(params?.cursor, pageSize);
  const response: ToolsListResponse = { tools: result.tools };
  if (result.nextCursor !== undefined) {
    response.nextCursor = result.nextCursor;
  }
  return response;
}

export async function handleToolsCall(
  executor: ToolExecutor,
  params: ToolsCallParams
): Promise<ToolResult> {
  return executor.executeTool(params.name, params.arguments ?? {});
}
