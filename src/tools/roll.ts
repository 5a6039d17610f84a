/**
 * roll: evaluate a dice expression and return its total and rendered form.
 */

import { z } from 'zod';
import type { Tool, ToolRegistrar, JsonSchema, ToolResult } from './registry.js';
import { createToolJsonResult } from '../protocol/errors.js';
import type { DiceEvaluator } from '../dice/engine.js';
import {
  AllowCommentsSchema,
  ExpressionSchema,
  allowCommentsProperty,
  createDiceErrorResult,
  createInvalidInputResult,
  diceToolAnnotations,
  expressionProperty,
} from './common.js';

export const RollInputSchema = z.object({
  expression: ExpressionSchema,
  allow_comments: AllowCommentsSchema,
});

export type RollInput = z.infer<typeof RollInputSchema>;

export const rollInputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    expression: expressionProperty,
    allow_comments: allowCommentsProperty,
  },
  required: ['expression'],
  additionalProperties: false,
};

export const rollOutputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    total: { type: 'integer' },
    result: { type: 'string' },
    comment: { type: 'string' },
  },
  required: ['total', 'result'],
};

const DESCRIPTION = `Roll dice using standard RPG notation and return the total result.

PURPOSE:
A quick roll with the numeric total and a formatted breakdown string. The usual tool for attack rolls, ability checks, saving throws and damage.

WHEN TO USE:
- Attack rolls (1d20+5) and ability checks or saves (1d20+3)
- Damage (2d6+3, 8d6)
- Any single roll where the total is what matters

WHEN NOT TO USE:
- To see each die and the expression tree, use roll_detailed
- For several different rolls at once, use roll_batch
- To check notation without rolling, use validate_syntax

SUPPORTED NOTATION:
- Basic: 1d20, 3d6, d20 (same as 1d20), d% (same as 1d100)
- Arithmetic: 1d20+5, 2d6-1, 3d6*2, 1d20/2 (division rounds down)
- Keep: 4d6kh3 (highest 3), 2d20kl1 (lowest 1), 4d6k>3, 4d6k6
- Drop: 4d6pl1 (lowest 1), 4d6ph1 (highest 1)
- Reroll: 1d20ro1 (reroll 1s once), 1d20rr<10 (reroll until at least 10), 2d6ra6 (add one die on a 6)
- Exploding: 3d6e (explode on the maximum face), 1d10e>8
- Clamp: 1d20mi10 (minimum 10), 4d6ma5 (maximum 5)
- Grouping and sets: (1d4+1)*2, (1d6, 3, 2d4)kh1

EXAMPLES:
- Attack: "1d20+5"
- Ability score: "4d6kh3"
- Advantage: "2d20kh1+5"
- Fireball: "8d6"

Failures are returned as { error, kind, position } with kind one of SyntaxError, RerollLimitExceeded, DivisionByZero, InvalidModifierParameter, TooManyRolls.`;

export function createRollHandler(engine: DiceEvaluator): (args: unknown) => Promise<ToolResult> {
  return async (args: unknown): Promise<ToolResult> => {
    const parseResult = RollInputSchema.safeParse(args);
    if (!parseResult.success) {
      return createInvalidInputResult('roll', parseResult.error);
    }

    const { expression, allow_comments: allowComments } = parseResult.data;

    try {
      const result = engine.roll(expression, { allowComments });
      const payload: Record<string, unknown> = {
        total: result.total,
        result: result.rendered,
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

export function createRollTool(engine: DiceEvaluator): Tool {
  return {
    name: 'roll',
    title: 'Roll Dice',
    description: DESCRIPTION,
    inputSchema: rollInputJsonSchema,
    outputSchema: rollOutputJsonSchema,
    annotations: diceToolAnnotations(false), // random output each time
    handler: createRollHandler(engine),
  };
}

export function registerRollTool(registry: ToolRegistrar, engine: DiceEvaluator): void {
  registry.registerTool(createRollTool(engine));
}
