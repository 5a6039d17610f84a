/**
 * Roll Formatter
 *
 * Markdown rendering of an evaluated tree:
 *
 *   4d6kh3 (~~1~~, 4, **6**, 3) + 2 = `15`
 *
 * Dropped and rerolled dice are struck through, exploded dice carry a `!`,
 * natural 1s and maximum faces are bold, clamped dice show their old value
 * struck before the new one.
 */

import type {
  DieOutcome,
  EvaluatedNode,
  Modifier,
  RollResult,
  Selector,
} from './types.js';
import { isClampModifier } from './types.js';
import { modifierCode } from './validator.js';

export type FormattableResult = Pick<RollResult, 'root' | 'total'>;

function renderSelector(selector: Selector): string {
  switch (selector.kind) {
    case 'highest':
      return `h${selector.value}`;
    case 'lowest':
      return `l${selector.value}`;
    case 'greater':
      return `>${selector.value}`;
    case 'less':
      return `<${selector.value}`;
    case 'equal':
      return String(selector.value);
  }
}

/**
 * Notation for one modifier, e.g. `kh3`, `rr<3`, `e`, `mi2`
 */
export function renderModifier(modifier: Modifier): string {
  const code = modifierCode(modifier.kind);
  if (isClampModifier(modifier)) {
    return `${code}${modifier.value}`;
  }
  if (modifier.selectors.length === 0) {
    return code;
  }
  return modifier.selectors.map((selector) => code + renderSelector(selector)).join('');
}

export function renderDie(die: DieOutcome): string {
  const mark = die.exploded ? '!' : '';

  if (die.status !== 'kept') {
    return `~~${die.value}${mark}~~`;
  }

  let text = String(die.value);
  if (die.sides > 1 && (die.value === 1 || die.value === die.sides)) {
    text = `**${text}**`;
  }
  if (die.clampedFrom !== undefined) {
    text = `~~${die.clampedFrom}~~ ${text}`;
  }
  return text + mark;
}

function withAnnotations(text: string, annotations: readonly string[]): string {
  return annotations.reduce((out, annotation) => `${out} [${annotation}]`, text);
}

function renderNode(node: EvaluatedNode): string {
  switch (node.kind) {
    case 'literal':
      return withAnnotations(String(node.node.value), node.node.annotations);

    case 'dice': {
      const { count, sides, modifiers, annotations } = node.node;
      const notation = `${count}d${sides}${modifiers.map(renderModifier).join('')}`;
      const dice = node.dice.map(renderDie).join(', ');
      return withAnnotations(`${notation} (${dice})`, annotations);
    }

    case 'unary':
      return `${node.node.op}${renderNode(node.operand)}`;

    case 'binary':
      return `${renderNode(node.left)} ${node.node.op} ${renderNode(node.right)}`;

    case 'group':
      return withAnnotations(`(${renderNode(node.inner)})`, node.node.annotations);

    case 'set': {
      const items = node.items.map((item) => {
        const text = renderNode(item.result);
        return item.kept ? text : `~~${text}~~`;
      });
      const trailingComma = node.items.length === 1 ? ',' : '';
      const modifiers = node.node.modifiers.map(renderModifier).join('');
      return withAnnotations(`(${items.join(', ')}${trailingComma})${modifiers}`, node.node.annotations);
    }
  }
}

/**
 * Render an evaluated roll. Pure: touches no randomness.
 */
export function format(result: FormattableResult): string {
  return `${renderNode(result.root)} = \`${result.total}\``;
}
