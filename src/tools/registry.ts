/**
 * Tool Registration and Lookup
 *
 * Tool definitions, registration, lookup, and cursor-paginated listing.
 */

import { z } from 'zod';
import type { ToolResult } from '../protocol/errors.js';

// =============================================================================
// JSON Schema Types
// =============================================================================

/**
 * The subset of JSON Schema 2020-12 the tools declare and the executor checks
 */
export interface JsonSchema {
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: unknown[];
  const?: unknown;
  title?: string;
  description?: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
  pattern?: string;
  [key: string]: unknown;
}

// Re-export ToolResult from protocol/errors.js to avoid duplication
export type { ToolResult } from '../protocol/errors.js';

// =============================================================================
// Tool Annotations
// =============================================================================

/**
 * Tool behavior hints for clients
 */
export interface ToolAnnotations {
  /** Tool has no side effects (safe to call without user confirmation) */
  readOnlyHint?: boolean;
  /** Tool may modify or delete data */
  destructiveHint?: boolean;
  /** Same arguments always give the same result */
  idempotentHint?: boolean;
  /** May access external services or APIs */
  openWorldHint?: boolean;
}

// =============================================================================
// Tool Definition
// =============================================================================

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export interface Tool {
  /** Unique tool name (lowercase_with_underscores) */
  name: string;
  /** Human-readable display name */
  title?: string;
  /** Description shown to the model */
  description: string;
  inputSchema: JsonSchema;
  outputSchema?: JsonSchema;
  annotations?: ToolAnnotations;
  handler: ToolHandler;
}

/**
 * Tool definition as listed to clients (without handler)
 */
export interface ToolDefinitionExternal {
  name: string;
  title?: string;
  description: string;
  inputSchema: JsonSchema;
  outputSchema?: JsonSchema;
  annotations?: ToolAnnotations;
}

// =============================================================================
// Zod Schemas for Validation
// =============================================================================

export const ToolNamePattern = /^[a-z][a-z0-9_]*$/;

export const ToolNameSchema = z.string().regex(
  ToolNamePattern,
  'Tool name must be lowercase with underscores, starting with a letter'
);

// =============================================================================
// Pagination Types
// =============================================================================

export interface PaginatedToolList {
  tools: ToolDefinitionExternal[];
  nextCursor?: string | undefined;
}

// =============================================================================
// Tool Registry
// =============================================================================

const DEFAULT_PAGE_SIZE = 50;

/**
 * The only registry capability tool modules need
 */
export type ToolRegistrar = Pick<ToolRegistry, 'registerTool'>;

/**
 * Registry for tool definitions with pagination. The tool set is fixed
 * once the server starts.
 */
export class ToolRegistry {
  private readonly tools: Map<string, Tool> = new Map();
  private readonly toolOrder: string[] = []; // insertion order, for stable pages

  /**
   * @throws Error if the tool name is invalid, taken, or the definition is incomplete
   */
  registerTool(tool: Tool): void {
    const nameValidation = ToolNameSchema.safeParse(tool.name);
    if (!nameValidation.success) {
      throw new Error(`Invalid tool name '${tool.name}': ${nameValidation.error.message}`);
    }

    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }

    if (tool.description.trim() === '') {
      throw new Error(`Tool '${tool.name}' must have a description`);
    }

    if (tool.inputSchema.type !== 'object') {
      throw new Error(`Tool '${tool.name}' inputSchema must describe an object`);
    }

    this.tools.set(tool.name, tool);
    this.toolOrder.push(tool.name);
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * List tools one page at a time
   * @param cursor Opaque cursor from a previous page (base64 encoded index)
   * @param pageSize Number of items per page (default: 50)
   */
  listTools(cursor?: string, pageSize: number = DEFAULT_PAGE_SIZE): PaginatedToolList {
    const startIndex = cursor ? decodeCursor(cursor) : 0;
    const effectivePageSize = Math.max(1, Math.min(pageSize, 1000));

    const endIndex = Math.min(startIndex + effectivePageSize, this.toolOrder.length);
    const tools = this.toolOrder
      .slice(startIndex, endIndex)
      .map((name) => this.tools.get(name))
      .filter((tool): tool is Tool => tool !== undefined)
      .map((tool) => toExternalDefinition(tool));

    let nextCursor: string | undefined;
    if (endIndex < this.toolOrder.length) {
      nextCursor = Buffer.from(endIndex.toString()).toString('base64');
    }

    return { tools, nextCursor };
  }

  getAllTools(): Tool[] {
    return this.toolOrder
      .map((name) => this.tools.get(name))
      .filter((tool): tool is Tool => tool !== undefined);
  }

  getToolCount(): number {
    return this.tools.size;
  }
}

/**
 * Decode a page cursor; anything unreadable restarts from the first page
 */
function decodeCursor(cursor: string): number {
  const parsed = parseInt(Buffer.from(cursor, 'base64').toString('utf-8'), 10);
  return !isNaN(parsed) && parsed >= 0 ? parsed : 0;
}

function toExternalDefinition(tool: Tool): ToolDefinitionExternal {
  const external: ToolDefinitionExternal = {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
  };

  if (tool.title !== undefined) {
    external.title = tool.title;
  }

  if (tool.outputSchema !== undefined) {
    external.outputSchema = tool.outputSchema;
  }

  if (tool.annotations !== undefined) {
    external.annotations = tool.annotations;
  }

  return external;
}
