/**
 * Modifier Resolver
 *
 * Applies a dice term's modifier chain, in declared order, to its dice.
 * Only kept dice are considered by each modifier. New dice from rerolls
 * and explosions are appended in generation order.
 */

import { RerollLimitExceededError, TooManyRollsError } from './errors.js';
import type { RandomSource } from './random.js';
import type {
  ClampModifier,
  DiceNode,
  DieOrigin,
  DieOutcome,
  EngineLimits,
  Modifier,
  Selector,
  SelectorModifier,
} from './types.js';
import { isClampModifier } from './types.js';
import { explodeSelectors, matchesValue } from './validator.js';

// =============================================================================
// Resolution Context
// =============================================================================

/**
 * Counts every die drawn during one evaluation
 */
export class RollCounter {
  private rolled = 0;

  constructor(private readonly maxDice: number) {}

  take(position?: number): void {
    this.rolled++;
    if (this.rolled > this.maxDice) {
      throw new TooManyRollsError(`Expression rolled more than ${this.maxDice} dice`, position);
    }
  }

  get count(): number {
    return this.rolled;
  }
}

export interface ResolveContext {
  random: RandomSource;
  limits: EngineLimits;
  counter: RollCounter;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Select candidates matching any selector. `highest`/`lowest` counts are
 * clamped to the candidates available; ties go to the earliest candidate.
 */
export function selectBy<T>(
  candidates: readonly T[],
  selectors: readonly Selector[],
  valueOf: (candidate: T) => number
): Set<T> {
  const selected = new Set<T>();

  for (const selector of selectors) {
    if (selector.kind === 'highest' || selector.kind === 'lowest') {
      const direction = selector.kind === 'highest' ? -1 : 1;
      const ranked = [...candidates].sort((a, b) => direction * (valueOf(a) - valueOf(b)));
      for (const candidate of ranked.slice(0, Math.min(selector.value, ranked.length))) {
        selected.add(candidate);
      }
      continue;
    }

    for (const candidate of candidates) {
      if (matchesValue(valueOf(candidate), [selector])) {
        selected.add(candidate);
      }
    }
  }

  return selected;
}

const dieValue = (die: DieOutcome): number => die.value;

function keptDice(dice: readonly DieOutcome[]): DieOutcome[] {
  return dice.filter((die) => die.status === 'kept');
}

// =============================================================================
// Rolling
// =============================================================================

/**
 * Draw one die. A one-sided die always shows 1 without consuming randomness.
 */
export function rollDie(
  sides: number,
  origin: DieOrigin,
  context: ResolveContext,
  position?: number
): DieOutcome {
  context.counter.take(position);
  return drawDie(sides, origin, context);
}

/**
 * Draw one die outside the dice budget. `rr` rerolls are bounded by
 * `maxRerolls` per die instead.
 */
function drawDie(sides: number, origin: DieOrigin, context: ResolveContext): DieOutcome {
  const value = sides === 1 ? 1 : context.random.nextInt(1, sides);
  return { value, sides, status: 'kept', origin, exploded: false };
}

// =============================================================================
// Modifier Application
// =============================================================================

function applyKeep(dice: DieOutcome[], modifier: SelectorModifier): void {
  const kept = keptDice(dice);
  const selected = selectBy(kept, modifier.selectors, dieValue);
  for (const die of kept) {
    if (!selected.has(die)) {
      die.status = 'dropped';
    }
  }
}

function applyDrop(dice: DieOutcome[], modifier: SelectorModifier): void {
  for (const die of selectBy(keptDice(dice), modifier.selectors, dieValue)) {
    die.status = 'dropped';
  }
}

function applyRerollOnce(
  dice: DieOutcome[],
  modifier: SelectorModifier,
  sides: number,
  context: ResolveContext,
  position: number
): void {
  const kept = keptDice(dice);
  const selected = selectBy(kept, modifier.selectors, dieValue);
  for (const die of kept) {
    if (selected.has(die)) {
      die.status = 'rerolled';
      dice.push(rollDie(sides, 'reroll', context, position));
    }
  }
}

function applyRerollUntil(
  dice: DieOutcome[],
  modifier: SelectorModifier,
  sides: number,
  context: ResolveContext,
  position: number
): void {
  const { maxRerolls } = context.limits;

  for (const die of keptDice(dice)) {
    if (!matchesValue(die.value, modifier.selectors)) {
      continue;
    }

    let current = die;
    let rerolls = 0;
    while (matchesValue(current.value, modifier.selectors)) {
      if (rerolls >= maxRerolls) {
        throw new RerollLimitExceededError(
          `A d${sides} was rerolled ${maxRerolls} times without leaving the reroll range`,
          position
        );
      }
      current.status = 'rerolled';
      current = drawDie(sides, 'reroll', context);
      dice.push(current);
      rerolls++;
    }
  }
}

function applyRerollAdd(
  dice: DieOutcome[],
  modifier: SelectorModifier,
  sides: number,
  context: ResolveContext,
  position: number
): void {
  const kept = keptDice(dice);
  const selected = selectBy(kept, modifier.selectors, dieValue);
  if (kept.some((die) => selected.has(die))) {
    dice.push(rollDie(sides, 'reroll', context, position));
  }
}

function applyExplode(
  dice: DieOutcome[],
  modifier: SelectorModifier,
  sides: number,
  context: ResolveContext,
  position: number
): void {
  const selectors = explodeSelectors(modifier.selectors, sides);

  // dice grows while iterating; new dice are checked too
  for (let index = 0; index < dice.length; index++) {
    const die = dice[index];
    if (die === undefined || die.status !== 'kept' || die.exploded) {
      continue;
    }
    if (matchesValue(die.value, selectors)) {
      die.exploded = true;
      dice.push(rollDie(sides, 'explosion', context, position));
    }
  }
}

function applyClamp(dice: DieOutcome[], modifier: ClampModifier): void {
  for (const die of keptDice(dice)) {
    const outOfRange =
      modifier.kind === 'minimum' ? die.value < modifier.value : die.value > modifier.value;
    if (outOfRange) {
      die.clampedFrom = die.clampedFrom ?? die.value;
      die.value = modifier.value;
    }
  }
}

function applyModifier(
  dice: DieOutcome[],
  modifier: Modifier,
  sides: number,
  context: ResolveContext,
  position: number
): void {
  if (isClampModifier(modifier)) {
    applyClamp(dice, modifier);
    return;
  }

  switch (modifier.kind) {
    case 'keep':
      applyKeep(dice, modifier);
      break;
    case 'drop':
      applyDrop(dice, modifier);
      break;
    case 'reroll-once':
      applyRerollOnce(dice, modifier, sides, context, position);
      break;
    case 'reroll-until':
      applyRerollUntil(dice, modifier, sides, context, position);
      break;
    case 'reroll-add':
      applyRerollAdd(dice, modifier, sides, context, position);
      break;
    case 'explode':
      applyExplode(dice, modifier, sides, context, position);
      break;
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Apply a modifier chain to a term's raw dice.
 *
 * @returns A new list: adjusted copies of the input dice followed by any
 *   dice generated by rerolls and explosions
 * @throws RerollLimitExceededError when `rr` exceeds the per-die cap
 * @throws TooManyRollsError when the evaluation exceeds its dice budget
 */
export function resolveModifiers(
  dice: readonly DieOutcome[],
  modifiers: readonly Modifier[],
  sides: number,
  context: ResolveContext,
  position = 0
): DieOutcome[] {
  const working = dice.map((die) => ({ ...die }));
  for (const modifier of modifiers) {
    applyModifier(working, modifier, sides, context, position);
  }
  return working;
}

/**
 * Roll a dice term and resolve its modifier chain
 */
export function rollDiceTerm(node: DiceNode, context: ResolveContext): DieOutcome[] {
  const dice: DieOutcome[] = [];
  for (let i = 0; i < node.count; i++) {
    dice.push(rollDie(node.sides, 'roll', context, node.position));
  }
  return resolveModifiers(dice, node.modifiers, node.sides, context, node.position);
}
