/**
 * validate_syntax: parse and statically check an expression without rolling.
 */

import { z } from 'zod';
import type { Tool, ToolRegistrar, JsonSchema, ToolResult } from './registry.js';
import { createToolJsonResult } from '../protocol/errors.js';
import type { DiceEvaluator } from '../dice/engine.js';
import { isDiceError } from '../dice/errors.js';
import {
  AllowCommentsSchema,
  MAX_EXPRESSION_LENGTH,
  allowCommentsProperty,
  createInvalidInputResult,
  diceErrorProperties,
  diceToolAnnotations,
} from './common.js';

export const ValidateSyntaxInputSchema = z.object({
  expression: z.string().max(MAX_EXPRESSION_LENGTH),
  allow_comments: AllowCommentsSchema,
});

export type ValidateSyntaxInput = z.infer<typeof ValidateSyntaxInputSchema>;

export const validateSyntaxInputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    // An empty expression is answered with valid: false, not rejected
    expression: {
      type: 'string',
      maxLength: MAX_EXPRESSION_LENGTH,
      description: 'Dice expression to validate',
    },
    allow_comments: allowCommentsProperty,
  },
  required: ['expression'],
  additionalProperties: false,
};

export const validateSyntaxOutputJsonSchema: JsonSchema = {
  type: 'object',
  properties: {
    valid: { type: 'boolean' },
    expression: { type: 'string' },
    ...diceErrorProperties,
  },
  required: ['valid', 'expression'],
};

const DESCRIPTION = `Check a dice expression without rolling any dice.

PURPOSE:
Confirms that an expression parses and can be evaluated before it is rolled. Nothing random happens, so the same input always gives the same answer.

WHEN TO USE:
- Validating notation a user typed before saving or rolling it
- Testing a complex expression such as "(2d6+3)*1d4kh1"
- Explaining why an expression is rejected

WHEN NOT TO USE:
- To actually roll (use roll, roll_detailed or roll_batch)

CHECKS:
- Notation: dice terms, operators, parentheses, modifiers, numbers
- Parameters: at least one die with at least one side, keep/drop counts of at least 1, mi/ma within the die's faces
- Termination: "1d6rr<7" can never stop rerolling and "1d1e" explodes forever; both are rejected
- Size: expressions that would roll more dice than allowed

EXAMPLES:
- "1d20+5", "4d6kh3", "(1d4+1)*2", "3d6e6" → valid
- "1d" → SyntaxError (missing die size)
- "1d20+" → SyntaxError (trailing operator)
- "1d20kh" → SyntaxError (missing keep count)
- "1d6mi7" → InvalidModifierParameter

An invalid expression returns { valid: false, expression, error, kind, position }.`;

export function createValidateSyntaxHandler(
  engine: DiceEvaluator
): (args: unknown) => Promise<ToolResult> {
  return async (args: unknown): Promise<ToolResult> => {
    const parseResult = ValidateSyntaxInputSchema.safeParse(args);
    if (!parseResult.success) {
      return createInvalidInputResult('validate_syntax', parseResult.error);
    }

    const { expression, allow_comments: allowComments } = parseResult.data;

    try {
      engine.validate(expression, { allowComments });
      return createToolJsonResult({ valid: true, expression });
    } catch (error) {
      if (!isDiceError(error)) {
        throw error;
      }
      return createToolJsonResult({ valid: false, expression, ...error.toJSON() });
    }
  };
}

export function createValidateSyntaxTool(engine: DiceEvaluator): Tool {
  return {
    name: 'validate_syntax',
    title: 'Validate Dice Syntax',
    description: DESCRIPTION,
    inputSchema: validateSyntaxInputJsonSchema,
    outputSchema: validateSyntaxOutputJsonSchema,
    annotations: diceToolAnnotations(true),
    handler: createValidateSyntaxHandler(engine),
  };
}

export function registerValidateSyntaxTool(registry: ToolRegistrar, engine: DiceEvaluator): void {
  registry.registerTool(createValidateSyntaxTool(engine));
}
