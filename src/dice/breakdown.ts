/**
 * JSON breakdown of an evaluated tree, as returned by `roll_detailed`
 */

import { renderModifier } from './formatter.js';
import type { DieOutcome, EvaluatedNode } from './types.js';

export interface BreakdownDie {
  value: number;
  kept: boolean;
  status: DieOutcome['status'];
  origin: DieOutcome['origin'];
  exploded: boolean;
  clampedFrom?: number;
}

export interface BreakdownNode {
  type: EvaluatedNode['kind'];
  total: number;
  /** Literal value */
  value?: number;
  /** Dice count */
  count?: number;
  sides?: number;
  /** Modifier notation, e.g. "kh3" */
  modifiers?: string;
  /** Operator for unary and binary nodes */
  op?: string;
  dice?: BreakdownDie[];
  children?: BreakdownNode[];
  /** Set membership: false when a set modifier dropped this item */
  kept?: boolean;
  annotations?: string[];
}

export function toBreakdownDie(die: DieOutcome): BreakdownDie {
  const out: BreakdownDie = {
    value: die.value,
    kept: die.status === 'kept',
    status: die.status,
    origin: die.origin,
    exploded: die.exploded,
  };
  if (die.clampedFrom !== undefined) {
    out.clampedFrom = die.clampedFrom;
  }
  return out;
}

function annotate(out: BreakdownNode, annotations: readonly string[]): BreakdownNode {
  if (annotations.length > 0) {
    out.annotations = [...annotations];
  }
  return out;
}

export function toBreakdown(node: EvaluatedNode): BreakdownNode {
  switch (node.kind) {
    case 'literal':
      return annotate({ type: 'literal', total: node.total, value: node.node.value }, node.node.annotations);

    case 'dice': {
      const out: BreakdownNode = {
        type: 'dice',
        total: node.total,
        count: node.node.count,
        sides: node.node.sides,
        dice: node.dice.map(toBreakdownDie),
      };
      if (node.node.modifiers.length > 0) {
        out.modifiers = node.node.modifiers.map(renderModifier).join('');
      }
      return annotate(out, node.node.annotations);
    }

    case 'unary':
      return { type: 'unary', total: node.total, op: node.node.op, children: [toBreakdown(node.operand)] };

    case 'binary':
      return {
        type: 'binary',
        total: node.total,
        op: node.node.op,
        children: [toBreakdown(node.left), toBreakdown(node.right)],
      };

    case 'group':
      return annotate(
        { type: 'group', total: node.total, children: [toBreakdown(node.inner)] },
        node.node.annotations
      );

    case 'set': {
      const out: BreakdownNode = {
        type: 'set',
        total: node.total,
        children: node.items.map((item) => ({ ...toBreakdown(item.result), kept: item.kept })),
      };
      if (node.node.modifiers.length > 0) {
        out.modifiers = node.node.modifiers.map(renderModifier).join('');
      }
      return annotate(out, node.node.annotations);
    }
  }
}
