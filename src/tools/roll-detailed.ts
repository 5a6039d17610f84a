/**
 * roll_detailed: a roll plus the evaluated expression tree and every die
 * that was generated.
 */

import { z } from 'zod';
import type { Tool, ToolRegistrar, JsonSchema, ToolResult } from './registry.js';
import { createToolJsonResult } from '../protocol/errors.js';
import type { DiceEvaluator } from '../dice/engine.js';
import { toBreakdownDie } from '../dice/breakdown.js';
import {
  AllowCommentsSchema,
  ExpressionSchema,
  allowCommentsProperty,
  createDiceErrorResult,
  createInvalidInputResult,
  diceToolAnnotations,
  expressionProperty,
} from './common.js';

export const RollDetailedInputSchema = z.object({
  expression: ExpressionSchema,
  allow_comments: AllowCommentsSchema,
});

export type RollDetailedInput = z.infer<typeof RollDetailedInputSchema>;

export const rollDetailedInputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    expression: expressionProperty,
    allow_comments: allowCommentsProperty,
  },
  required: ['expression'],
  additionalProperties: false,
};

const dieJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    value: { type: 'integer' },
    kept: { type: 'boolean' },
    status: { type: 'string', enum: ['kept', 'dropped', 'rerolled'] },
    origin: { type: 'string', enum: ['roll', 'reroll', 'explosion'] },
    exploded: { type: 'boolean' },
    clampedFrom: { type: 'integer' },
  },
  required: ['value', 'kept', 'status', 'origin', 'exploded'],
};

export const rollDetailedOutputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    total: { type: 'integer' },
    result: { type: 'string' },
    ast: {
      type: 'object',
      properties: {
        type: { type: 'string', enum: ['literal', 'dice', 'unary', 'binary', 'group', 'set'] },
        total: { type: 'integer' },
      },
      required: ['type', 'total'],
    },
    dice: { type: 'array', items: dieJsonSchema },
    comment: { type: 'string' },
  },
  required: ['total', 'result', 'ast', 'dice'],
};

const DESCRIPTION = `Roll dice and return a full breakdown: the evaluated expression tree and every individual die.

PURPOSE:
Shows exactly what happened during a roll: the value of each die, which dice were kept, dropped or rerolled, which exploded, and how the tree of operations produced the total.

WHEN TO USE:
- Character creation, to see which dice of 4d6kh3 were kept
- Advantage or disadvantage, to see both d20s of 2d20kh1
- Explaining a surprising total or teaching how keep, reroll and explode work

WHEN NOT TO USE:
- When only the total matters (use roll)
- For several rolls at once (use roll_batch)

AST STRUCTURE:
Each node of "ast" has "type" (literal, dice, unary, binary, group, set) and "total". Dice nodes add "count", "sides", "modifiers" (e.g. "kh3") and "dice"; operators add "op" and "children"; set items carry "kept".

DIE RESULTS:
Each entry of "dice" has "value", "kept", "status" (kept, dropped, rerolled), "origin" (roll, reroll, explosion), "exploded" and, for clamped dice, "clampedFrom". The top-level "dice" array lists every die in the order it was rolled.

Uses the same notation as roll.`;

export function createRollDetailedHandler(
  engine: DiceEvaluator
): (args: unknown) => Promise<ToolResult> {
  return async (args: unknown): Promise<ToolResult> => {
    const parseResult = RollDetailedInputSchema.safeParse(args);
    if (!parseResult.success) {
      return createInvalidInputResult('roll_detailed', parseResult.error);
    }

    const { expression, allow_comments: allowComments } = parseResult.data;

    try {
      const result = engine.roll(expression, { allowComments });
      const payload: Record<string, unknown> = {
        total: result.total,
        result: result.rendered,
        ast: engine.breakdown(result.root),
        dice: result.dice.map(toBreakdownDie),
      };
      if (result.comment !== undefined) {
        payload['comment'] = result.comment;
      }
      return createToolJsonResult(payload);
    } catch (error) {
      return createDiceErrorResult(error);
    }
  };
}

export function createRollDetailedTool(engine: DiceEvaluator): Tool {
  return {
    name: 'roll_detailed',
    title: 'Roll Dice (Detailed)',
    description: DESCRIPTION,
    inputSchema: rollDetailedInputJsonSchema,
    outputSchema: rollDetailedOutputJsonSchema,
    annotations: diceToolAnnotations(false),
    handler: createRollDetailedHandler(engine),
  };
}

export function registerRollDetailedTool(registry: ToolRegistrar, engine: DiceEvaluator): void {
  registry.registerTool(createRollDetailedTool(engine));
}
