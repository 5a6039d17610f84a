/**
 * Node visitor for expression trees
 */

import type {
  BinaryNode,
  DiceNode,
  ExpressionNode,
  GroupNode,
  LiteralNode,
  SetNode,
  UnaryNode,
} from './types.js';

export interface NodeVisitor<R> {
  literal(node: LiteralNode): R;
  dice(node: DiceNode): R;
  unary(node: UnaryNode): R;
  binary(node: BinaryNode): R;
  group(node: GroupNode): R;
  set(node: SetNode): R;
}

/**
 * Dispatch a node to the matching visitor method
 */
export function visit<R>(node: ExpressionNode, visitor: NodeVisitor<R>): R {
  switch (node.kind) {
    case 'literal':
      return visitor.literal(node);
    case 'dice':
      return visitor.dice(node);
    case 'unary':
      return visitor.unary(node);
    case 'binary':
      return visitor.binary(node);
    case 'group':
      return visitor.group(node);
    case 'set':
      return visitor.set(node);
  }
}

/**
 * Direct children of a node, left to right
 */
export function childrenOf(node: ExpressionNode): readonly ExpressionNode[] {
  switch (node.kind) {
    case 'literal':
    case 'dice':
      return [];
    case 'unary':
      return [node.operand];
    case 'binary':
      return [node.left, node.right];
    case 'group':
      return [node.inner];
    case 'set':
      return node.items;
  }
}
