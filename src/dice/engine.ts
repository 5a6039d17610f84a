/**
 * Dice Engine
 *
 * The capability the tool layer depends on. Tools never reach into the
 * parser or evaluator directly, so either side can change independently.
 */

import type { BreakdownNode } from './breakdown.js';
import { toBreakdown } from './breakdown.js';
import { evaluate } from './evaluator.js';
import { format } from './formatter.js';
import type { FormattableResult } from './formatter.js';
import type { ParseOptions } from './parser.js';
import { parse } from './parser.js';
import type { RandomSource } from './random.js';
import { cryptoRandomSource } from './random.js';
import type { EngineLimits, EvaluatedNode, Expression, RollResult } from './types.js';
import { resolveLimits } from './types.js';
import { validateExpression } from './validator.js';

export interface RollOptions extends ParseOptions {
  /** Overrides the engine's random source for this call only */
  random?: RandomSource;
}

export interface DiceEvaluator {
  parse(text: string, options?: ParseOptions): Expression;
  /**
   * Parse and run static checks without rolling.
   * @throws DiceError with the same kinds a roll would raise
   */
  validate(text: string, options?: ParseOptions): Expression;
  evaluate(expression: Expression, random?: RandomSource): RollResult;
  roll(text: string, options?: RollOptions): RollResult;
  format(result: FormattableResult): string;
  breakdown(node: EvaluatedNode): BreakdownNode;
}

export interface DiceEngineOptions {
  random?: RandomSource;
  limits?: Partial<EngineLimits>;
}

export class DiceEngine implements DiceEvaluator {
  private readonly random: RandomSource;
  private readonly limits: EngineLimits;

  constructor(options: DiceEngineOptions = {}) {
    this.random = options.random ?? cryptoRandomSource;
    this.limits = resolveLimits(options.limits);
  }

  parse(text: string, options: ParseOptions = {}): Expression {
    return parse(text, options);
  }

  validate(text: string, options: ParseOptions = {}): Expression {
    const expression = parse(text, options);
    validateExpression(expression, this.limits);
    return expression;
  }

  evaluate(expression: Expression, random?: RandomSource): RollResult {
    return evaluate(expression, { random: random ?? this.random, limits: this.limits });
  }

  roll(text: string, options: RollOptions = {}): RollResult {
    return this.evaluate(parse(text, options), options.random);
  }

  format(result: FormattableResult): string {
    return format(result);
  }

  breakdown(node: EvaluatedNode): BreakdownNode {
    return toBreakdown(node);
  }

  getLimits(): Readonly<EngineLimits> {
    return this.limits;
  }
}
