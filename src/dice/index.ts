export * from './types.js';
export * from './errors.js';
export * from './random.js';
export { visit, childrenOf, type NodeVisitor } from './visitor.js';
export { parse, type ParseOptions } from './parser.js';
export { validateExpression, constantValue } from './validator.js';
export { resolveModifiers, rollDiceTerm, selectBy, RollCounter, type ResolveContext } from './resolver.js';
export { evaluate, collectDice, type EvaluateOptions } from './evaluator.js';
export { format, renderDie, renderModifier, type FormattableResult } from './formatter.js';
export { toBreakdown, toBreakdownDie, type BreakdownNode, type BreakdownDie } from './breakdown.js';
export {
  DiceEngine,
  type DiceEvaluator,
  type DiceEngineOptions,
  type RollOptions,
} from './engine.js';
