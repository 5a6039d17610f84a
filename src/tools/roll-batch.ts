/**
 * roll_batch: evaluate several expressions in one call. Each expression
 * succeeds or fails on its own; results keep the input order.
 */

import { z } from 'zod';
import type { Tool, ToolRegistrar, JsonSchema, ToolResult } from './registry.js';
import { createToolJsonResult } from '../protocol/errors.js';
import type { DiceEvaluator } from '../dice/engine.js';
import { isDiceError, type DiceErrorPayload } from '../dice/errors.js';
import {
  AllowCommentsSchema,
  DEFAULT_MAX_BATCH_SIZE,
  MAX_EXPRESSION_LENGTH,
  allowCommentsProperty,
  createInvalidInputResult,
  diceErrorProperties,
  diceToolAnnotations,
} from './common.js';

// =============================================================================
// Types
// =============================================================================

export type BatchItemSuccess = {
  expression: string;
  success: true;
  total: number;
  result: string;
  comment?: string;
};

export type BatchItemFailure = DiceErrorPayload & {
  expression: string;
  success: false;
};

export type BatchItem = BatchItemSuccess | BatchItemFailure;

export interface RollBatchToolOptions {
  /** Most expressions accepted in one call (default: 100) */
  maxBatchSize?: number;
}

// =============================================================================
// Schemas
// =============================================================================

export function createRollBatchInputSchema(maxBatchSize: number) {
  return z.object({
    // Empty items are reported per item, not as a bad call
    expressions: z
      .array(z.string().max(MAX_EXPRESSION_LENGTH))
      .min(1, 'At least one expression is required')
      .max(maxBatchSize, `At most ${maxBatchSize} expressions per batch`),
    allow_comments: AllowCommentsSchema,
  });
}

export type RollBatchInput = z.infer<ReturnType<typeof createRollBatchInputSchema>>;

export function createRollBatchInputJsonSchema(maxBatchSize: number): JsonSchema {
  return {
    type: 'object',
    properties: {
      expressions: {
        type: 'array',
        minItems: 1,
        maxItems: maxBatchSize,
        items: { type: 'string', maxLength: MAX_EXPRESSION_LENGTH },
        description: 'Dice expressions to evaluate, e.g. ["1d20+5", "2d6+3"]',
      },
      allow_comments: allowCommentsProperty,
    },
    required: ['expressions'],
    additionalProperties: false,
  };
}

export const rollBatchOutputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    results: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          expression: { type: 'string' },
          success: { type: 'boolean' },
          total: { type: 'integer' },
          result: { type: 'string' },
          comment: { type: 'string' },
          ...diceErrorProperties,
        },
        required: ['expression', 'success'],
      },
    },
  },
  required: ['results'],
};

const DESCRIPTION = `Roll several different dice expressions in a single call.

PURPOSE:
Batch independent rolls together and get every result back in one structured response, in the order given.

WHEN TO USE:
- Combat rounds: ["1d20+5", "2d6+3", "1d20+2"] for attack, damage and a save
- Character creation: six times "4d6kh3"
- Party checks: ["1d20+3", "1d20+1", "1d20+5"]

WHEN NOT TO USE:
- A single roll (use roll)
- Rolls that depend on an earlier result; roll those one at a time

ERROR HANDLING:
Each expression is evaluated on its own. A failing expression yields an entry with "success": false and its "error", "kind" and "position"; the other rolls still happen. Successful entries carry "success": true, "total" and "result".

Uses the same notation as roll.`;

// =============================================================================
// Handler
// =============================================================================

function rollOne(engine: DiceEvaluator, expression: string, allowComments: boolean): BatchItem {
  try {
    const result = engine.roll(expression, { allowComments });
    const item: BatchItemSuccess = {
      expression,
      success: true,
      total: result.total,
      result: result.rendered,
    };
    if (result.comment !== undefined) {
      item.comment = result.comment;
    }
    return item;
  } catch (error) {
    if (!isDiceError(error)) {
      throw error;
    }
    return { expression, success: false, ...error.toJSON() };
  }
}

export function createRollBatchHandler(
  engine: DiceEvaluator,
  maxBatchSize: number = DEFAULT_MAX_BATCH_SIZE
): (args: unknown) => Promise<ToolResult> {
  const inputSchema = createRollBatchInputSchema(maxBatchSize);

  return async (args: unknown): Promise<ToolResult> => {
    const parseResult = inputSchema.safeParse(args);
    if (!parseResult.success) {
      return createInvalidInputResult('roll_batch', parseResult.error);
    }

    const { expressions, allow_comments: allowComments } = parseResult.data;
    const results = expressions.map((expression) => rollOne(engine, expression, allowComments));

    return createToolJsonResult({ results });
  };
}

export function createRollBatchTool(engine: DiceEvaluator, options: RollBatchToolOptions = {}): Tool {
  const maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
  return {
    name: 'roll_batch',
    title: 'Roll Dice (Batch)',
    description: DESCRIPTION,
    inputSchema: createRollBatchInputJsonSchema(maxBatchSize),
    outputSchema: rollBatchOutputJsonSchema,
    annotations: diceToolAnnotations(false),
    handler: createRollBatchHandler(engine, maxBatchSize),
  };
}

export function registerRollBatchTool(
  registry: ToolRegistrar,
  engine: DiceEvaluator,
  options: RollBatchToolOptions = {}
): void {
  registry.registerTool(createRollBatchTool(engine, options));
}
