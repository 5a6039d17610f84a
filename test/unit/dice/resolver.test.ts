/**
 * Modifier Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { parse } from '../../../src/dice/parser.js';
import {
  RollCounter,
  resolveModifiers,
  rollDiceTerm,
  selectBy,
  type ResolveContext,
} from '../../../src/dice/resolver.js';
import { RerollLimitExceededError, TooManyRollsError } from '../../../src/dice/errors.js';
import type { RandomSource } from '../../../src/dice/random.js';
import { resolveLimits, type DiceNode, type DieOutcome, type EngineLimits } from '../../../src/dice/types.js';
import { createScriptedRandom } from '../../helpers/index.js';

function diceNode(text: string): DiceNode {
  const { root } = parse(text);
  if (root.kind !== 'dice') {
    throw new Error(`'${text}' is not a dice term`);
  }
  return root;
}

function createContext(random: RandomSource, overrides: Partial<EngineLimits> = {}): ResolveContext {
  const limits = resolveLimits(overrides);
  return { random, limits, counter: new RollCounter(limits.maxDice) };
}

function summary(dice: DieOutcome[]): Array<[number, DieOutcome['status'], DieOutcome['origin']]> {
  return dice.map((die) => [die.value, die.status, die.origin]);
}

describe('rollDiceTerm', () => {
  // =============================================================================
  // Keep and drop
  // =============================================================================
  describe('keep and drop', () => {
    it('should keep the highest dice', () => {
      const dice = rollDiceTerm(diceNode('4d6kh3'), createContext(createScriptedRandom([1, 4, 6, 3])));
      expect(dice.map((die) => die.status)).toEqual(['dropped', 'kept', 'kept', 'kept']);
    });

    it('should drop the lowest dice', () => {
      const dice = rollDiceTerm(diceNode('4d6pl1'), createContext(createScriptedRandom([1, 4, 6, 3])));
      expect(dice.map((die) => die.status)).toEqual(['dropped', 'kept', 'kept', 'kept']);
    });

    it('should drop every die matching a literal selector', () => {
      const dice = rollDiceTerm(diceNode('4d6p1'), createContext(createScriptedRandom([1, 1, 5, 2])));
      expect(dice.map((die) => die.status)).toEqual(['dropped', 'dropped', 'kept', 'kept']);
    });

    it('should break ties in favour of the earliest die', () => {
      const dice = rollDiceTerm(diceNode('3d6kh1'), createContext(createScriptedRandom([5, 5, 2])));
      expect(dice.map((die) => die.status)).toEqual(['kept', 'dropped', 'dropped']);
    });

    it('should keep the union of merged selectors', () => {
      const dice = rollDiceTerm(
        diceNode('8d6kh2kl2'),
        createContext(createScriptedRandom([3, 6, 1, 4, 5, 2, 6, 1]))
      );
      expect(dice.map((die) => die.status)).toEqual([
        'dropped',
        'kept',
        'kept',
        'dropped',
        'dropped',
        'dropped',
        'kept',
        'kept',
      ]);
    });
  });

  // =============================================================================
  // Rerolls
  // =============================================================================
  describe('rerolls', () => {
    it('should reroll once and keep the new die', () => {
      const random = createScriptedRandom([1, 4, 1]);
      const dice = rollDiceTerm(diceNode('2d6ro1'), createContext(random));
      expect(summary(dice)).toEqual([
        [1, 'rerolled', 'roll'],
        [4, 'kept', 'roll'],
        [1, 'kept', 'reroll'],
      ]);
      expect(random.remaining()).toBe(0);
    });

    it('should reroll until the die leaves the range', () => {
      const random = createScriptedRandom([3, 7, 12]);
      const dice = rollDiceTerm(diceNode('1d20rr<10'), createContext(random));
      expect(summary(dice)).toEqual([
        [3, 'rerolled', 'roll'],
        [7, 'rerolled', 'reroll'],
        [12, 'kept', 'reroll'],
      ]);
    });

    it('should stop at the reroll cap', () => {
      const random = createScriptedRandom([1, 1, 1, 1]);
      const context = createContext(random, { maxRerolls: 3 });

      expect(() => rollDiceTerm(diceNode('1d6rr1'), context)).toThrow(RerollLimitExceededError);
      expect(random.remaining()).toBe(0);
    });

    it('should name the die and cap when the reroll cap is hit', () => {
      const context = createContext(createScriptedRandom([1, 1, 1]), { maxRerolls: 2 });
      expect(() => rollDiceTerm(diceNode('1d6rr1'), context)).toThrow(
        'A d6 was rerolled 2 times without leaving the reroll range at position 0'
      );
    });

    it('should not spend the dice budget on reroll-until dice', () => {
      const random = createScriptedRandom([1, 1, 1, 4]);
      const dice = rollDiceTerm(diceNode('1d6rr1'), createContext(random, { maxDice: 1 }));

      expect(summary(dice).at(-1)).toEqual([4, 'kept', 'reroll']);
      expect(random.remaining()).toBe(0);
    });

    it('should add a single die when any die matches', () => {
      const dice = rollDiceTerm(diceNode('2d6ra6'), createContext(createScriptedRandom([6, 6, 4])));
      expect(summary(dice)).toEqual([
        [6, 'kept', 'roll'],
        [6, 'kept', 'roll'],
        [4, 'kept', 'reroll'],
      ]);
    });

    it('should add nothing when no die matches', () => {
      const dice = rollDiceTerm(diceNode('2d6ra6'), createContext(createScriptedRandom([2, 3])));
      expect(dice).toHaveLength(2);
    });
  });

  // =============================================================================
  // Explosions
  // =============================================================================
  describe('explode', () => {
    it('should chain explosions on new dice', () => {
      const dice = rollDiceTerm(diceNode('3d6e'), createContext(createScriptedRandom([6, 2, 6, 6, 1, 3])));
      expect(dice.map((die) => die.value)).toEqual([6, 2, 6, 6, 1, 3]);
      expect(dice.map((die) => die.exploded)).toEqual([true, false, true, true, false, false]);
      expect(dice.map((die) => die.origin)).toEqual([
        'roll',
        'roll',
        'roll',
        'explosion',
        'explosion',
        'explosion',
      ]);
    });

    it('should only explode kept dice', () => {
      const dice = rollDiceTerm(diceNode('3d6kh1e'), createContext(createScriptedRandom([6, 6, 2, 3])));
      expect(summary(dice)).toEqual([
        [6, 'kept', 'roll'],
        [6, 'dropped', 'roll'],
        [2, 'dropped', 'roll'],
        [3, 'kept', 'explosion'],
      ]);
      expect(dice[1]?.exploded).toBe(false);
    });

    it('should explode on a comparison selector', () => {
      const dice = rollDiceTerm(diceNode('1d10e>8'), createContext(createScriptedRandom([9, 10, 4])));
      expect(dice.map((die) => die.value)).toEqual([9, 10, 4]);
    });

    it('should stop when the dice budget runs out', () => {
      const random = createScriptedRandom([6, 6, 6]);
      const context = createContext(random, { maxDice: 3 });

      expect(() => rollDiceTerm(diceNode('2d6e'), context)).toThrow(TooManyRollsError);
      expect(random.remaining()).toBe(0);
    });

    it('should report the dice budget in the error', () => {
      const context = createContext(createScriptedRandom([6, 6, 6]), { maxDice: 3 });
      expect(() => rollDiceTerm(diceNode('2d6e'), context)).toThrow(
        'Expression rolled more than 3 dice at position 0'
      );
    });
  });

  // =============================================================================
  // Clamps
  // =============================================================================
  describe('minimum and maximum', () => {
    it('should raise dice below the minimum', () => {
      const dice = rollDiceTerm(diceNode('3d6mi3'), createContext(createScriptedRandom([1, 5, 2])));
      expect(dice.map((die) => die.value)).toEqual([3, 5, 3]);
      expect(dice.map((die) => die.clampedFrom)).toEqual([1, undefined, 2]);
    });

    it('should lower dice above the maximum', () => {
      const dice = rollDiceTerm(diceNode('2d6ma4'), createContext(createScriptedRandom([6, 2])));
      expect(dice.map((die) => die.value)).toEqual([4, 2]);
      expect(dice[0]?.clampedFrom).toBe(6);
    });
  });

  it('should roll one-sided dice without drawing randomness', () => {
    const random = createScriptedRandom([]);
    const dice = rollDiceTerm(diceNode('3d1'), createContext(random));
    expect(dice.map((die) => die.value)).toEqual([1, 1, 1]);
    expect(random.calls).toHaveLength(0);
  });

  it('should request faces in the die range', () => {
    const random = createScriptedRandom([7, 3]);
    rollDiceTerm(diceNode('2d8'), createContext(random));
    expect(random.calls).toEqual([
      [1, 8],
      [1, 8],
    ]);
  });
});

describe('resolveModifiers', () => {
  it('should not mutate the input dice', () => {
    const input: DieOutcome[] = [{ value: 2, sides: 6, status: 'kept', origin: 'roll', exploded: false }];
    const output = resolveModifiers(
      input,
      [{ kind: 'minimum', value: 3 }],
      6,
      createContext(createScriptedRandom([]))
    );

    expect(output[0]?.value).toBe(3);
    expect(input[0]?.value).toBe(2);
    expect(input[0]).not.toHaveProperty('clampedFrom');
  });
});

describe('selectBy', () => {
  const candidates = [{ v: 3 }, { v: 1 }, { v: 3 }, { v: 2 }];
  const valueOf = (candidate: { v: number }): number => candidate.v;

  it('should select the highest values', () => {
    const selected = selectBy(candidates, [{ kind: 'highest', value: 2 }], valueOf);
    expect([...selected]).toEqual([candidates[0], candidates[2]]);
  });

  it('should prefer the earliest candidate on ties', () => {
    const selected = selectBy(candidates, [{ kind: 'highest', value: 1 }], valueOf);
    expect(selected.has(candidates[0] ?? { v: 0 })).toBe(true);
    expect(selected.size).toBe(1);
  });

  it('should clamp counts to the candidates available', () => {
    expect(selectBy(candidates, [{ kind: 'lowest', value: 10 }], valueOf).size).toBe(4);
  });

  it('should combine selectors as a union', () => {
    const selected = selectBy(
      candidates,
      [
        { kind: 'less', value: 2 },
        { kind: 'equal', value: 2 },
      ],
      valueOf
    );
    expect([...selected].map(valueOf)).toEqual([1, 2]);
  });
});
