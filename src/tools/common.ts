/**
 * Shared pieces of the dice tools: argument schemas and the error result
 * every tool returns for a failed expression.
 */

import { z } from 'zod';
import type { JsonSchema, ToolAnnotations, ToolResult } from './registry.js';
import { createToolJsonResult } from '../protocol/errors.js';
import { isDiceError } from '../dice/errors.js';

// =============================================================================
// Constants
// =============================================================================

export const MAX_EXPRESSION_LENGTH = 1000;

export const DEFAULT_MAX_BATCH_SIZE = 100;

// =============================================================================
// Input Schemas (Zod for internal validation)
// =============================================================================

export const ExpressionSchema = z
  .string()
  .min(1, 'Expression is required')
  .max(MAX_EXPRESSION_LENGTH, `Expression must be at most ${MAX_EXPRESSION_LENGTH} characters`);

export const AllowCommentsSchema = z.boolean().default(false);

// =============================================================================
// JSON Schema fragments (for MCP tool definitions)
// =============================================================================

export const expressionProperty: JsonSchema = {
  type: 'string',
  minLength: 1,
  maxLength: MAX_EXPRESSION_LENGTH,
  description: "Dice expression to evaluate (e.g. '1d20+5', '4d6kh3')",
};

export const allowCommentsProperty: JsonSchema = {
  type: 'boolean',
  default: false,
  description:
    "Allow [annotations] and a trailing comment after the expression (e.g. '1d20+5 fire damage')",
};

export const diceErrorProperties: Record<string, JsonSchema> = {
  error: { type: 'string' },
  kind: {
    type: 'string',
    enum: [
      'SyntaxError',
      'RerollLimitExceeded',
      'DivisionByZero',
      'InvalidModifierParameter',
      'TooManyRolls',
    ],
  },
  position: { type: 'integer', minimum: 0 },
};

/**
 * Rolls draw fresh randomness, so only validation is idempotent.
 */
export function diceToolAnnotations(idempotent: boolean): ToolAnnotations {
  return {
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: idempotent,
    openWorldHint: false,
  };
}

// =============================================================================
// Results
// =============================================================================

/**
 * Turn a failed evaluation into an `isError` result carrying
 * `{ error, kind, position? }`. Anything that is not a dice error is
 * rethrown for the executor to report.
 */
export function createDiceErrorResult(error: unknown): ToolResult {
  if (isDiceError(error)) {
    return createToolJsonResult(error.toJSON(), true);
  }
  throw error;
}

/**
 * Error result for arguments that passed the JSON Schema check but not the
 * tool's own zod schema.
 */
export function createInvalidInputResult(toolName: string, error: z.ZodError): ToolResult {
  return createToolJsonResult(
    {
      error: `Invalid input for '${toolName}': ${error.issues.map((issue) => issue.message).join(', ')}`,
    },
    true
  );
}
