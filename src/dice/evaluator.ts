/**
 * Expression Evaluator
 *
 * Post-order walk over a parsed expression. Dice totals are the sum of
 * their kept dice, set totals the sum of their kept items; operator nodes
 * only combine child totals since precedence is already in the tree shape.
 */

import { applyBinary, applyUnary, ensureSafeTotal } from './arithmetic.js';
import { format } from './formatter.js';
import type { RandomSource } from './random.js';
import { cryptoRandomSource } from './random.js';
import type { ResolveContext } from './resolver.js';
import { RollCounter, rollDiceTerm, selectBy } from './resolver.js';
import type {
  BinaryNode,
  DiceNode,
  DieOutcome,
  EngineLimits,
  EvaluatedNode,
  EvaluatedSetItem,
  Expression,
  GroupNode,
  LiteralNode,
  RollResult,
  SetNode,
  UnaryNode,
} from './types.js';
import { isClampModifier, resolveLimits } from './types.js';
import { validateExpression } from './validator.js';
import type { NodeVisitor } from './visitor.js';
import { visit } from './visitor.js';

export interface EvaluateOptions {
  /** Request-scoped random source; defaults to the platform CSPRNG */
  random?: RandomSource;
  limits?: Partial<EngineLimits>;
}

class EvaluatingVisitor implements NodeVisitor<EvaluatedNode> {
  constructor(private readonly context: ResolveContext) {}

  literal(node: LiteralNode): EvaluatedNode {
    return { kind: 'literal', node, total: node.value };
  }

  dice(node: DiceNode): EvaluatedNode {
    const dice = rollDiceTerm(node, this.context);
    const total = dice
      .filter((die) => die.status === 'kept')
      .reduce((sum, die) => sum + die.value, 0);
    return { kind: 'dice', node, dice, total };
  }

  unary(node: UnaryNode): EvaluatedNode {
    const operand = visit(node.operand, this);
    return { kind: 'unary', node, operand, total: applyUnary(node.op, operand.total) };
  }

  binary(node: BinaryNode): EvaluatedNode {
    const left = visit(node.left, this);
    const right = visit(node.right, this);
    const total = applyBinary(node.op, left.total, right.total, node.position);
    return { kind: 'binary', node, left, right, total };
  }

  group(node: GroupNode): EvaluatedNode {
    const inner = visit(node.inner, this);
    return { kind: 'group', node, inner, total: inner.total };
  }

  set(node: SetNode): EvaluatedNode {
    const items: EvaluatedSetItem[] = node.items.map((item) => ({
      result: visit(item, this),
      kept: true,
    }));
    const totalOf = (item: EvaluatedSetItem): number => item.result.total;

    for (const modifier of node.modifiers) {
      if (isClampModifier(modifier)) {
        continue;
      }
      const kept = items.filter((item) => item.kept);
      const selected = selectBy(kept, modifier.selectors, totalOf);
      for (const item of kept) {
        if (modifier.kind === 'keep' ? !selected.has(item) : selected.has(item)) {
          item.kept = false;
        }
      }
    }

    const total = items
      .filter((item) => item.kept)
      .reduce((sum, item) => ensureSafeTotal(sum + totalOf(item), node.position), 0);
    return { kind: 'set', node, items, total };
  }
}

/**
 * Every die in the evaluated tree, left to right
 */
export function collectDice(node: EvaluatedNode): DieOutcome[] {
  switch (node.kind) {
    case 'literal':
      return [];
    case 'dice':
      return [...node.dice];
    case 'unary':
      return collectDice(node.operand);
    case 'binary':
      return [...collectDice(node.left), ...collectDice(node.right)];
    case 'group':
      return collectDice(node.inner);
    case 'set':
      return node.items.flatMap((item) => collectDice(item.result));
  }
}

/**
 * Evaluate a parsed expression, drawing fresh randomness for every die.
 *
 * Static checks run first, so a structurally invalid expression fails
 * before any die is rolled.
 *
 * @throws DiceError on invalid modifiers, division by zero, or exceeded limits
 */
export function evaluate(expression: Expression, options: EvaluateOptions = {}): RollResult {
  const limits = resolveLimits(options.limits);
  validateExpression(expression, limits);

  const context: ResolveContext = {
    random: options.random ?? cryptoRandomSource,
    limits,
    counter: new RollCounter(limits.maxDice),
  };

  const root = visit(expression.root, new EvaluatingVisitor(context));
  const result: RollResult = {
    expression: expression.source,
    total: root.total,
    rendered: format({ root, total: root.total }),
    root,
    dice: collectDice(root),
  };

  if (expression.comment !== undefined) {
    result.comment = expression.comment;
  }

  return result;
}
