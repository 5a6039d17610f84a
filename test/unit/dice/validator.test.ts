/**
 * Static Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { parse } from '../../../src/dice/parser.js';
import { constantValue, matchesEveryFace, validateExpression } from '../../../src/dice/validator.js';
import { DiceError, type DiceErrorKind } from '../../../src/dice/errors.js';
import { resolveLimits } from '../../../src/dice/types.js';

function validationError(text: string, maxDice?: number): DiceError {
  const limits = resolveLimits(maxDice === undefined ? {} : { maxDice });
  try {
    validateExpression(parse(text), limits);
  } catch (error) {
    if (error instanceof DiceError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected '${text}' to fail validation`);
}

describe('validateExpression', () => {
  it('should accept well-formed expressions', () => {
    for (const text of ['4d6kh3', '1d20+5', '(1d6, 2d4)kh1', '3d6e>5', '1d20rr<3', '2d6mi2ma5', '7/2']) {
      expect(() => validateExpression(parse(text))).not.toThrow();
    }
  });

  it.each<[string, DiceErrorKind, string]>([
    ['0d6', 'InvalidModifierParameter', 'Dice count must be at least 1, got 0 at position 0'],
    ['1d0', 'InvalidModifierParameter', 'Dice sides must be at least 1, got 0 at position 0'],
    [
      '1d1000001',
      'InvalidModifierParameter',
      'Dice sides must be at most 1000000, got 1000001 at position 0',
    ],
    ['1d6mi7', 'InvalidModifierParameter', "'mi' value must be between 1 and 6, got 7 at position 0"],
    ['1d6ma0', 'InvalidModifierParameter', "'ma' value must be between 1 and 6, got 0 at position 0"],
    ['4d6kh0', 'InvalidModifierParameter', "'kh' count must be at least 1, got 0 at position 0"],
    [
      '1d20rrh1',
      'InvalidModifierParameter',
      "'rr' does not accept highest/lowest selectors at position 0",
    ],
    ['2d6el1', 'InvalidModifierParameter', "'e' does not accept highest/lowest selectors at position 0"],
    [
      '1d6rr<7',
      'RerollLimitExceeded',
      "'rr' matches every face of a d6 and can never stop rerolling at position 0",
    ],
    ['1d1e', 'TooManyRolls', "'e' matches every face of a d1 and would explode forever at position 0"],
    ['1d6e>0', 'TooManyRolls', "'e' matches every face of a d6 and would explode forever at position 0"],
    ['1001d6', 'TooManyRolls', 'Expression rolls more than 1000 dice at position 0'],
    [
      '(1d6, 2)e',
      'InvalidModifierParameter',
      "Sets only accept keep (k) and drop (p) modifiers, got 'e' at position 0",
    ],
    ['(1d6, 3)kh0', 'InvalidModifierParameter', "'kh' count must be at least 1, got 0 at position 0"],
    ['1d6/0', 'DivisionByZero', 'Division by zero at position 3'],
    ['1d6/(2-2)', 'DivisionByZero', 'Division by zero at position 3'],
  ])('should reject %j', (text, kind, message) => {
    const error = validationError(text);
    expect(error.kind).toBe(kind);
    expect(error.message).toBe(message);
  });

  it('should report the term that crosses the dice limit', () => {
    const error = validationError('600d6+600d6');
    expect(error.message).toBe('Expression rolls more than 1000 dice at position 6');
    expect(error.position).toBe(6);
  });

  it('should honour a lower dice limit', () => {
    expect(validationError('6d6', 5).message).toBe('Expression rolls more than 5 dice at position 0');
  });

  it('should check face coverage of large dice from the selector ranges', () => {
    expect(validationError('1d1000000rr<500000rr>499999').kind).toBe('RerollLimitExceeded');
    expect(() => validateExpression(parse('1d1000000rr<500000rr>500000'))).not.toThrow();
    expect(() => validateExpression(parse('1d1000000e<999999'))).not.toThrow();
  });

  it('should reject a constant divisor outside the safe integer range', () => {
    const error = validationError('1d6/(9007199254740991*2)');
    expect(error.kind).toBe('InvalidModifierParameter');
    expect(error.position).toBe(21);
  });

  it('should leave divisors that contain dice to evaluation', () => {
    expect(() => validateExpression(parse('1d6/(1d6-1d6)'))).not.toThrow();
  });
});

describe('constantValue', () => {
  it('should fold dice-free subtrees', () => {
    expect(constantValue(parse('2*(3+4)').root)).toBe(14);
    expect(constantValue(parse('-5').root)).toBe(-5);
    expect(constantValue(parse('7/2').root)).toBe(3);
  });

  it('should return undefined when dice are involved', () => {
    expect(constantValue(parse('1d6+1').root)).toBeUndefined();
    expect(constantValue(parse('(1, 2)').root)).toBeUndefined();
  });

  it('should return undefined for a constant division by zero', () => {
    expect(constantValue(parse('1/0').root)).toBeUndefined();
  });
});

describe('matchesEveryFace', () => {
  it.each<[string, Parameters<typeof matchesEveryFace>[0], number, boolean]>([
    ['a range covering every face', [{ kind: 'less', value: 7 }], 6, true],
    ['a range that stops short', [{ kind: 'less', value: 6 }], 6, false],
    ['adjacent ranges', [{ kind: 'greater', value: 3 }, { kind: 'less', value: 4 }], 6, true],
    ['ranges with a gap', [{ kind: 'greater', value: 4 }, { kind: 'less', value: 4 }], 6, false],
    [
      'single faces filling the die',
      [{ kind: 'equal', value: 2 }, { kind: 'equal', value: 1 }],
      2,
      true,
    ],
    ['a face beyond the die', [{ kind: 'equal', value: 7 }], 6, false],
    ['count selectors', [{ kind: 'highest', value: 6 }], 6, false],
    ['no selectors', [], 6, false],
  ])('should handle %s', (_label, selectors, sides, expected) => {
    expect(matchesEveryFace(selectors, sides)).toBe(expected);
  });
});
