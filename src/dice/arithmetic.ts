import { DivisionByZeroError, InvalidModifierParameterError } from './errors.js';
import type { BinaryOperator, UnaryOperator } from './types.js';

/**
 * @throws InvalidModifierParameterError when `value` is not a safe integer
 */
export function ensureSafeTotal(value: number, position?: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidModifierParameterError(
      `Result is outside the range ${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}`,
      position
    );
  }
  return value;
}

/**
 * Combine two operand totals. Division rounds toward negative infinity.
 *
 * @throws DivisionByZeroError when dividing by zero
 * @throws InvalidModifierParameterError when the result leaves the safe integer range
 */
export function applyBinary(op: BinaryOperator, left: number, right: number, position?: number): number {
  switch (op) {
    case '+':
      return ensureSafeTotal(left + right, position);
    case '-':
      return ensureSafeTotal(left - right, position);
    case '*':
      return ensureSafeTotal(left * right, position);
    case '/':
      if (right === 0) {
        throw new DivisionByZeroError(position);
      }
      return Math.floor(left / right);
  }
}

export function applyUnary(op: UnaryOperator, operand: number): number {
  // 0 - x keeps a zero operand from becoming -0
  return op === '-' ? 0 - operand : operand;
}
