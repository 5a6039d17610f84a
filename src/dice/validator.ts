/**
 * Static Expression Validation
 *
 * Structural checks that need no randomness. `evaluate` runs these first,
 * so validate-only callers see exactly the errors a roll would raise
 * before any die is drawn.
 */

import { applyBinary, applyUnary } from './arithmetic.js';
import {
  DivisionByZeroError,
  InvalidModifierParameterError,
  RerollLimitExceededError,
  TooManyRollsError,
} from './errors.js';
import type {
  DiceNode,
  EngineLimits,
  Expression,
  ExpressionNode,
  Modifier,
  Selector,
  SetNode,
} from './types.js';
import { DEFAULT_LIMITS, isClampModifier } from './types.js';
import { childrenOf } from './visitor.js';

const MODIFIER_CODES: Record<Modifier['kind'], string> = {
  keep: 'k',
  drop: 'p',
  'reroll-once': 'ro',
  'reroll-until': 'rr',
  'reroll-add': 'ra',
  explode: 'e',
  minimum: 'mi',
  maximum: 'ma',
};

export function modifierCode(kind: Modifier['kind']): string {
  return MODIFIER_CODES[kind];
}

/**
 * True when `value` satisfies any comparison selector.
 * Count selectors (`highest`, `lowest`) never match a lone value.
 */
export function matchesValue(value: number, selectors: readonly Selector[]): boolean {
  return selectors.some((selector) => {
    switch (selector.kind) {
      case 'greater':
        return value > selector.value;
      case 'less':
        return value < selector.value;
      case 'equal':
        return value === selector.value;
      case 'highest':
      case 'lowest':
        return false;
    }
  });
}

/**
 * Explode selectors with the bare `e` default applied
 */
export function explodeSelectors(selectors: readonly Selector[], sides: number): readonly Selector[] {
  return selectors.length > 0 ? selectors : [{ kind: 'equal', value: sides }];
}

/**
 * Faces of a d`sides` a comparison selector matches, as an inclusive
 * range. Empty ranges have `low > high`.
 */
function faceRange(selector: Selector, sides: number): [number, number] {
  switch (selector.kind) {
    case 'greater':
      return [Math.max(1, selector.value + 1), sides];
    case 'less':
      return [1, Math.min(sides, selector.value - 1)];
    case 'equal':
      return [selector.value, selector.value];
    case 'highest':
    case 'lowest':
      return [1, 0];
  }
}

/**
 * True when the selectors' ranges cover every face from 1 to `sides`
 */
export function matchesEveryFace(selectors: readonly Selector[], sides: number): boolean {
  const ranges = selectors
    .map((selector) => faceRange(selector, sides))
    .filter(([low, high]) => low <= high && high >= 1 && low <= sides)
    .sort((a, b) => a[0] - b[0]);

  let covered = 0;
  for (const [low, high] of ranges) {
    if (low > covered + 1) {
      return false;
    }
    covered = Math.max(covered, high);
  }
  return covered >= sides;
}

function hasCountSelector(selectors: readonly Selector[]): boolean {
  return selectors.some((selector) => selector.kind === 'highest' || selector.kind === 'lowest');
}

function checkCountSelectors(code: string, selectors: readonly Selector[], position: number): void {
  for (const selector of selectors) {
    if ((selector.kind === 'highest' || selector.kind === 'lowest') && selector.value < 1) {
      const letter = selector.kind === 'highest' ? 'h' : 'l';
      throw new InvalidModifierParameterError(
        `'${code}${letter}' count must be at least 1, got ${selector.value}`,
        position
      );
    }
  }
}

// =============================================================================
// Per-node checks
// =============================================================================

function validateDice(node: DiceNode, limits: EngineLimits): void {
  const { count, sides, position } = node;

  if (count < 1) {
    throw new InvalidModifierParameterError(`Dice count must be at least 1, got ${count}`, position);
  }
  if (sides < 1) {
    throw new InvalidModifierParameterError(`Dice sides must be at least 1, got ${sides}`, position);
  }
  if (sides > limits.maxSides) {
    throw new InvalidModifierParameterError(
      `Dice sides must be at most ${limits.maxSides}, got ${sides}`,
      position
    );
  }

  for (const modifier of node.modifiers) {
    const code = modifierCode(modifier.kind);

    if (isClampModifier(modifier)) {
      if (modifier.value < 1 || modifier.value > sides) {
        throw new InvalidModifierParameterError(
          `'${code}' value must be between 1 and ${sides}, got ${modifier.value}`,
          position
        );
      }
      continue;
    }

    checkCountSelectors(code, modifier.selectors, position);

    if (modifier.kind === 'reroll-until' || modifier.kind === 'explode') {
      if (hasCountSelector(modifier.selectors)) {
        throw new InvalidModifierParameterError(
          `'${code}' does not accept highest/lowest selectors`,
          position
        );
      }
    }

    if (modifier.kind === 'reroll-until' && matchesEveryFace(modifier.selectors, sides)) {
      throw new RerollLimitExceededError(
        `'${code}' matches every face of a d${sides} and can never stop rerolling`,
        position
      );
    }

    if (
      modifier.kind === 'explode' &&
      matchesEveryFace(explodeSelectors(modifier.selectors, sides), sides)
    ) {
      throw new TooManyRollsError(
        `'${code}' matches every face of a d${sides} and would explode forever`,
        position
      );
    }
  }
}

function validateSet(node: SetNode): void {
  for (const modifier of node.modifiers) {
    const code = modifierCode(modifier.kind);
    if (modifier.kind !== 'keep' && modifier.kind !== 'drop') {
      throw new InvalidModifierParameterError(
        `Sets only accept keep (k) and drop (p) modifiers, got '${code}'`,
        node.position
      );
    }
    checkCountSelectors(code, modifier.selectors, node.position);
  }
}

/**
 * Value of a subtree that contains no dice, or undefined when it does.
 */
export function constantValue(node: ExpressionNode): number | undefined {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'dice':
    case 'set':
      return undefined;
    case 'group':
      return constantValue(node.inner);
    case 'unary': {
      const operand = constantValue(node.operand);
      return operand === undefined ? undefined : applyUnary(node.op, operand);
    }
    case 'binary': {
      const left = constantValue(node.left);
      const right = constantValue(node.right);
      if (left === undefined || right === undefined || (node.op === '/' && right === 0)) {
        return undefined;
      }
      return applyBinary(node.op, left, right, node.position);
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Run every static check over a parsed expression. Draws no randomness.
 *
 * @throws InvalidModifierParameterError for out-of-range counts, sides, or modifier values,
 *   or a constant divisor outside the safe integer range
 * @throws RerollLimitExceededError when an `rr` condition can never be satisfied
 * @throws TooManyRollsError when the dice requested exceed the limit or an explosion never ends
 * @throws DivisionByZeroError when a divisor is the constant zero
 */
export function validateExpression(
  expression: Expression,
  limits: EngineLimits = DEFAULT_LIMITS
): void {
  let requested = 0;
  const pending: ExpressionNode[] = [expression.root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (node === undefined) break;

    if (node.kind === 'dice') {
      validateDice(node, limits);
      requested += node.count;
      if (requested > limits.maxDice) {
        throw new TooManyRollsError(
          `Expression rolls more than ${limits.maxDice} dice`,
          node.position
        );
      }
    } else if (node.kind === 'set') {
      validateSet(node);
    } else if (node.kind === 'binary' && node.op === '/' && constantValue(node.right) === 0) {
      throw new DivisionByZeroError(node.position);
    }

    pending.push(...[...childrenOf(node)].reverse());
  }
}
