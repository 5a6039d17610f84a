import type { ToolRegistrar } from './registry.js';
import type { DiceEvaluator } from '../dice/engine.js';
import { registerRollTool } from './roll.js';
import { registerRollDetailedTool } from './roll-detailed.js';
import { registerRollBatchTool, type RollBatchToolOptions } from './roll-batch.js';
import { registerValidateSyntaxTool } from './validate-syntax.js';

export type DiceToolsOptions = RollBatchToolOptions;

/**
 * Register roll, roll_detailed, roll_batch and validate_syntax, in that order.
 */
export function registerDiceTools(
  registry: ToolRegistrar,
  engine: DiceEvaluator,
  options: DiceToolsOptions = {}
): void {
  registerRollTool(registry, engine);
  registerRollDetailedTool(registry, engine);
  registerRollBatchTool(registry, engine, options);
  registerValidateSyntaxTool(registry, engine);
}
