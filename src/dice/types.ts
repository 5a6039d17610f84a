/**
 * Dice Expression Types
 *
 * Parsed expression tree, modifier chain, and evaluated result shapes.
 * Parsed nodes are immutable; evaluated nodes mirror them one-to-one.
 */

// =============================================================================
// Selectors & Modifiers
// =============================================================================

/**
 * Which dice (or set items) a modifier targets.
 *
 * `highest`/`lowest` pick N values, the comparison kinds pick every value
 * that satisfies the comparison against `value`.
 */
export type SelectorKind = 'highest' | 'lowest' | 'greater' | 'less' | 'equal';

export interface Selector {
  readonly kind: SelectorKind;
  readonly value: number;
}

export type SelectorModifierKind =
  | 'keep'
  | 'drop'
  | 'reroll-once'
  | 'reroll-until'
  | 'reroll-add'
  | 'explode';

export type ClampModifierKind = 'minimum' | 'maximum';

export interface SelectorModifier {
  readonly kind: SelectorModifierKind;
  /** Union of selectors; an empty list on `explode` means "maximum face" */
  readonly selectors: readonly Selector[];
}

export interface ClampModifier {
  readonly kind: ClampModifierKind;
  readonly value: number;
}

export type Modifier = SelectorModifier | ClampModifier;

export type ModifierKind = Modifier['kind'];

// =============================================================================
// Expression Nodes
// =============================================================================

interface NodeBase {
  /** 0-based offset of the node in the source text */
  readonly position: number;
}

export interface LiteralNode extends NodeBase {
  readonly kind: 'literal';
  readonly value: number;
  readonly annotations: readonly string[];
}

export interface DiceNode extends NodeBase {
  readonly kind: 'dice';
  readonly count: number;
  readonly sides: number;
  readonly modifiers: readonly Modifier[];
  readonly annotations: readonly string[];
}

export type UnaryOperator = '+' | '-';

export interface UnaryNode extends NodeBase {
  readonly kind: 'unary';
  readonly op: UnaryOperator;
  readonly operand: ExpressionNode;
}

export type BinaryOperator = '+' | '-' | '*' | '/';

export interface BinaryNode extends NodeBase {
  readonly kind: 'binary';
  readonly op: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface GroupNode extends NodeBase {
  readonly kind: 'group';
  readonly inner: ExpressionNode;
  readonly annotations: readonly string[];
}

export interface SetNode extends NodeBase {
  readonly kind: 'set';
  readonly items: readonly ExpressionNode[];
  readonly modifiers: readonly Modifier[];
  readonly annotations: readonly string[];
}

export type ExpressionNode =
  | LiteralNode
  | DiceNode
  | UnaryNode
  | BinaryNode
  | GroupNode
  | SetNode;

/** Nodes that can stand alone as an operand and carry annotations */
export type AtomNode = LiteralNode | DiceNode | GroupNode | SetNode;

export type NodeKind = ExpressionNode['kind'];

/**
 * A parsed dice expression. Reusable: every evaluation draws fresh randomness.
 */
export interface Expression {
  readonly source: string;
  readonly root: ExpressionNode;
  /** Trailing free text, only present when comments are allowed */
  readonly comment?: string;
}

// =============================================================================
// Evaluation Results
// =============================================================================

export type DieStatus = 'kept' | 'dropped' | 'rerolled';

export type DieOrigin = 'roll' | 'reroll' | 'explosion';

/**
 * A single die as it was generated and adjusted by its modifier chain.
 */
export interface DieOutcome {
  value: number;
  sides: number;
  status: DieStatus;
  origin: DieOrigin;
  /** Triggered an extra die through `explode` */
  exploded: boolean;
  /** Value before a minimum/maximum clamp changed it */
  clampedFrom?: number;
}

export interface EvaluatedLiteral {
  readonly kind: 'literal';
  readonly node: LiteralNode;
  readonly total: number;
}

export interface EvaluatedDice {
  readonly kind: 'dice';
  readonly node: DiceNode;
  readonly dice: readonly DieOutcome[];
  readonly total: number;
}

export interface EvaluatedUnary {
  readonly kind: 'unary';
  readonly node: UnaryNode;
  readonly operand: EvaluatedNode;
  readonly total: number;
}

export interface EvaluatedBinary {
  readonly kind: 'binary';
  readonly node: BinaryNode;
  readonly left: EvaluatedNode;
  readonly right: EvaluatedNode;
  readonly total: number;
}

export interface EvaluatedGroup {
  readonly kind: 'group';
  readonly node: GroupNode;
  readonly inner: EvaluatedNode;
  readonly total: number;
}

export interface EvaluatedSetItem {
  readonly result: EvaluatedNode;
  kept: boolean;
}

export interface EvaluatedSet {
  readonly kind: 'set';
  readonly node: SetNode;
  readonly items: readonly EvaluatedSetItem[];
  readonly total: number;
}

export type EvaluatedNode =
  | EvaluatedLiteral
  | EvaluatedDice
  | EvaluatedUnary
  | EvaluatedBinary
  | EvaluatedGroup
  | EvaluatedSet;

export interface RollResult {
  /** Source text of the evaluated expression */
  expression: string;
  total: number;
  /** Formatted breakdown, e.g. "4d6kh3 (~~1~~, 4, **6**, 3) = `13`" */
  rendered: string;
  root: EvaluatedNode;
  /** Every die rolled, in generation order */
  dice: DieOutcome[];
  comment?: string;
}

// =============================================================================
// Limits
// =============================================================================

export interface EngineLimits {
  /** Maximum dice rolled by one evaluation, explosions and `ro`/`ra` rerolls included */
  maxDice: number;
  /** Maximum rerolls of a single die under `rr`; these do not count toward `maxDice` */
  maxRerolls: number;
  /** Largest accepted number of sides */
  maxSides: number;
}

export const DEFAULT_LIMITS: Readonly<EngineLimits> = {
  maxDice: 1000,
  maxRerolls: 1000,
  maxSides: 1_000_000,
};

export function resolveLimits(overrides: Partial<EngineLimits> = {}): EngineLimits {
  return {
    maxDice: overrides.maxDice ?? DEFAULT_LIMITS.maxDice,
    maxRerolls: overrides.maxRerolls ?? DEFAULT_LIMITS.maxRerolls,
    maxSides: overrides.maxSides ?? DEFAULT_LIMITS.maxSides,
  };
}

export function isClampModifier(modifier: Modifier): modifier is ClampModifier {
  return modifier.kind === 'minimum' || modifier.kind === 'maximum';
}
