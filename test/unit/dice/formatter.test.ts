/**
 * Roll Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import { parse } from '../../../src/dice/parser.js';
import { evaluate } from '../../../src/dice/evaluator.js';
import { format, renderDie, renderModifier } from '../../../src/dice/formatter.js';
import type { DieOutcome } from '../../../src/dice/types.js';
import { createScriptedRandom } from '../../helpers/index.js';

function die(overrides: Partial<DieOutcome>): DieOutcome {
  return { value: 3, sides: 6, status: 'kept', origin: 'roll', exploded: false, ...overrides };
}

describe('renderModifier', () => {
  it('should render selector modifiers', () => {
    expect(renderModifier({ kind: 'keep', selectors: [{ kind: 'highest', value: 3 }] })).toBe('kh3');
    expect(renderModifier({ kind: 'reroll-until', selectors: [{ kind: 'less', value: 3 }] })).toBe('rr<3');
    expect(renderModifier({ kind: 'reroll-once', selectors: [{ kind: 'greater', value: 5 }] })).toBe('ro>5');
    expect(renderModifier({ kind: 'reroll-add', selectors: [{ kind: 'equal', value: 1 }] })).toBe('ra1');
    expect(renderModifier({ kind: 'drop', selectors: [{ kind: 'lowest', value: 1 }] })).toBe('pl1');
  });

  it('should render a bare explode', () => {
    expect(renderModifier({ kind: 'explode', selectors: [] })).toBe('e');
  });

  it('should repeat the code for each merged selector', () => {
    expect(
      renderModifier({
        kind: 'keep',
        selectors: [
          { kind: 'highest', value: 1 },
          { kind: 'lowest', value: 1 },
        ],
      })
    ).toBe('kh1kl1');
  });

  it('should render clamps', () => {
    expect(renderModifier({ kind: 'minimum', value: 2 })).toBe('mi2');
    expect(renderModifier({ kind: 'maximum', value: 5 })).toBe('ma5');
  });
});

describe('renderDie', () => {
  it('should render a plain kept die', () => {
    expect(renderDie(die({}))).toBe('3');
  });

  it('should bold natural ones and maximum faces', () => {
    expect(renderDie(die({ value: 1 }))).toBe('**1**');
    expect(renderDie(die({ value: 6 }))).toBe('**6**');
  });

  it('should not bold one-sided dice', () => {
    expect(renderDie(die({ value: 1, sides: 1 }))).toBe('1');
  });

  it('should strike dropped and rerolled dice', () => {
    expect(renderDie(die({ status: 'dropped' }))).toBe('~~3~~');
    expect(renderDie(die({ status: 'rerolled', value: 1 }))).toBe('~~1~~');
  });

  it('should mark exploded dice', () => {
    expect(renderDie(die({ value: 6, exploded: true }))).toBe('**6**!');
    expect(renderDie(die({ value: 6, exploded: true, status: 'dropped' }))).toBe('~~6!~~');
  });

  it('should show the value before a clamp', () => {
    expect(renderDie(die({ value: 6, clampedFrom: 2 }))).toBe('~~2~~ **6**');
  });
});

describe('format', () => {
  it('should reproduce the rendering of an evaluation', () => {
    const result = evaluate(parse('4d6kh3+2'), { random: createScriptedRandom([1, 4, 6, 3]) });
    expect(format(result)).toBe(result.rendered);
  });

  it('should render group annotations', () => {
    const result = evaluate(parse('(1d4+1) [bonus]', { allowComments: true }), {
      random: createScriptedRandom([2]),
    });
    expect(format(result)).toBe('(1d4 (2) + 1) [bonus] = `3`');
  });

  it('should render unary operators without a space', () => {
    const result = evaluate(parse('-1d4'), { random: createScriptedRandom([3]) });
    expect(format(result)).toBe('-1d4 (3) = `-3`');
  });
});
