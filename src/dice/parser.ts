/**
 * Dice Notation Parser
 *
 * Character-level recursive descent over the grammar:
 *
 *   expression     := additive
 *   additive       := multiplicative (('+' | '-') multiplicative)*
 *   multiplicative := unary (('*' | '/') unary)*
 *   unary          := ('+' | '-') unary | atom
 *   atom           := (dice | number | '(' expression (',' expression)* ','? ')') annotation*
 *   dice           := number? ('d' | 'D') (number | '%') modifier*
 *   modifier       := ('k' | 'p' | 'rr' | 'ro' | 'ra') selector
 *                   | 'e' selector?
 *                   | ('mi' | 'ma') number
 *   selector       := ('h' | 'l' | '>' | '<')? number
 *   annotation     := '[' text ']'
 *
 * Whitespace may separate tokens but not the parts of a dice term.
 * A parenthesised list containing a comma is a set; sets take `k`/`p`
 * modifiers right after the closing parenthesis.
 */

import { DiceSyntaxError } from './errors.js';
import type {
  AtomNode,
  BinaryOperator,
  DiceNode,
  Expression,
  ExpressionNode,
  GroupNode,
  LiteralNode,
  Modifier,
  Selector,
  SelectorModifier,
  SelectorModifierKind,
  SetNode,
} from './types.js';
import { isClampModifier } from './types.js';

export interface ParseOptions {
  /** Accept `[annotations]` and trailing free-text comments */
  allowComments?: boolean;
}

const MAX_DEPTH = 64;

const PERCENTILE_SIDES = 100;

const SELECTOR_MODIFIER_CODES: Record<string, SelectorModifierKind> = {
  k: 'keep',
  p: 'drop',
  rr: 'reroll-until',
  ro: 'reroll-once',
  ra: 'reroll-add',
  e: 'explode',
};

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9' && char.length === 1;
}

function isLetter(char: string): boolean {
  return /^[a-zA-Z]$/.test(char);
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function isDiceMarker(char: string): boolean {
  return char === 'd' || char === 'D';
}

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(
    private readonly text: string,
    private readonly allowComments: boolean
  ) {}

  parse(): Expression {
    this.skipWhitespace();
    if (this.atEnd()) {
      throw new DiceSyntaxError('Empty expression', this.pos);
    }

    const root = this.parseAdditive();
    const end = this.pos;
    this.skipWhitespace();

    if (this.atEnd()) {
      return { source: this.text, root };
    }

    const next = this.peek();
    if (this.allowComments && this.pos > end && next !== ')' && next !== ',' && next !== ']') {
      return { source: this.text, root, comment: this.text.slice(this.pos).trim() };
    }

    throw this.unexpected();
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();
    for (;;) {
      const op = this.matchOperator('+', '-');
      if (!op) {
        return left;
      }
      const right = this.parseMultiplicative();
      left = { kind: 'binary', op: op.char, left, right, position: op.position };
    }
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const op = this.matchOperator('*', '/');
      if (!op) {
        return left;
      }
      const right = this.parseUnary();
      left = { kind: 'binary', op: op.char, left, right, position: op.position };
    }
  }

  private parseUnary(): ExpressionNode {
    this.skipWhitespace();
    const char = this.peek();
    if (char === '+' || char === '-') {
      const position = this.pos;
      this.pos++;
      this.enter(position);
      const operand = this.parseUnary();
      this.depth--;
      return { kind: 'unary', op: char, operand, position };
    }
    return this.parseAtom();
  }

  /**
   * Consume one of two operators after optional whitespace.
   * Leaves the position untouched when neither is next.
   */
  private matchOperator<A extends BinaryOperator, B extends BinaryOperator>(
    first: A,
    second: B
  ): { char: A | B; position: number } | null {
    const saved = this.pos;
    this.skipWhitespace();
    const char = this.peek();
    const position = this.pos;
    if (char === first) {
      this.pos++;
      return { char: first, position };
    }
    if (char === second) {
      this.pos++;
      return { char: second, position };
    }
    this.pos = saved;
    return null;
  }

  // ===========================================================================
  // Atoms
  // ===========================================================================

  private parseAtom(): ExpressionNode {
    this.skipWhitespace();
    const char = this.peek();
    let node: AtomNode;

    if (char === '(') {
      node = this.parseParenthesized();
    } else if (isDigit(char) || isDiceMarker(char)) {
      node = this.parseNumberOrDice();
    } else if (this.atEnd()) {
      throw new DiceSyntaxError('Unexpected end of expression', this.pos);
    } else if (char === ')') {
      throw new DiceSyntaxError("Unbalanced parentheses: unexpected ')'", this.pos, char);
    } else {
      throw new DiceSyntaxError(`Unexpected character '${char}'`, this.pos, char);
    }

    const annotations = this.parseAnnotations();
    return annotations.length > 0 ? { ...node, annotations } : node;
  }

  private parseNumberOrDice(): LiteralNode | DiceNode {
    const position = this.pos;
    const count = isDigit(this.peek()) ? this.readInteger('a number') : undefined;

    if (count !== undefined && !isDiceMarker(this.peek())) {
      return { kind: 'literal', value: count, annotations: [], position };
    }

    this.pos++;
    let sides: number;
    if (this.peek() === '%') {
      this.pos++;
      sides = PERCENTILE_SIDES;
    } else if (isDigit(this.peek())) {
      sides = this.readInteger('the number of sides');
    } else {
      throw new DiceSyntaxError(
        "Empty dice term: expected the number of sides after 'd'",
        this.pos,
        this.peek() || undefined
      );
    }

    const modifiers = this.parseModifiers(sides);
    return {
      kind: 'dice',
      count: count ?? 1,
      sides,
      modifiers,
      annotations: [],
      position,
    };
  }

  private parseParenthesized(): GroupNode | SetNode {
    const position = this.pos;
    this.pos++;
    this.enter(position);

    this.skipWhitespace();
    if (this.peek() === ')') {
      throw new DiceSyntaxError('Empty parentheses', this.pos, ')');
    }

    const items: ExpressionNode[] = [this.parseAdditive()];
    let isSet = false;
    this.skipWhitespace();

    while (this.peek() === ',') {
      isSet = true;
      this.pos++;
      this.skipWhitespace();
      if (this.peek() === ')') {
        break;
      }
      items.push(this.parseAdditive());
      this.skipWhitespace();
    }

    if (this.peek() !== ')') {
      if (this.atEnd()) {
        throw new DiceSyntaxError("Unbalanced parentheses: missing ')'", this.pos);
      }
      throw new DiceSyntaxError(`Expected ')' but found '${this.peek()}'`, this.pos, this.peek());
    }
    this.pos++;
    this.depth--;

    const inner = items[0];
    if (!isSet && inner !== undefined) {
      return { kind: 'group', inner, annotations: [], position };
    }

    return {
      kind: 'set',
      items,
      modifiers: this.parseModifiers(undefined),
      annotations: [],
      position,
    };
  }

  private parseAnnotations(): string[] {
    const annotations: string[] = [];
    for (;;) {
      const saved = this.pos;
      this.skipWhitespace();
      if (this.peek() !== '[') {
        this.pos = saved;
        return annotations;
      }
      if (!this.allowComments) {
        throw new DiceSyntaxError('Annotations are not enabled', this.pos, '[');
      }
      const open = this.pos;
      const close = this.text.indexOf(']', open + 1);
      if (close === -1) {
        throw new DiceSyntaxError("Unterminated annotation: missing ']'", open, '[');
      }
      annotations.push(this.text.slice(open + 1, close));
      this.pos = close + 1;
    }
  }

  // ===========================================================================
  // Modifiers
  // ===========================================================================

  /**
   * Parse the modifier chain directly after a dice term or set.
   * Consecutive selector modifiers of the same kind merge their selectors.
   *
   * @param sides - Die size, used to spell out a bare `e` when merging
   */
  private parseModifiers(sides: number | undefined): Modifier[] {
    const modifiers: Modifier[] = [];

    while (isLetter(this.peek())) {
      const modifier = this.parseModifier();
      const previous = modifiers[modifiers.length - 1];

      if (
        previous !== undefined &&
        !isClampModifier(previous) &&
        !isClampModifier(modifier) &&
        previous.kind === modifier.kind
      ) {
        modifiers[modifiers.length - 1] = mergeSelectors(previous, modifier, sides);
      } else {
        modifiers.push(modifier);
      }
    }

    return modifiers;
  }

  private parseModifier(): Modifier {
    const position = this.pos;
    const first = this.peek();
    const second = this.peek(1);

    if (first === 'm' && (second === 'i' || second === 'a')) {
      this.pos += 2;
      const value = this.readInteger(`a value after 'm${second}'`);
      return { kind: second === 'i' ? 'minimum' : 'maximum', value };
    }

    let code: string;
    if (first === 'r' && (second === 'r' || second === 'o' || second === 'a')) {
      code = first + second;
    } else if (first === 'k' || first === 'p' || first === 'e') {
      code = first;
    } else {
      const token = first === 'r' || first === 'm' ? first + second : first;
      throw new DiceSyntaxError(`Unknown modifier code '${token}'`, position, token);
    }

    const kind = SELECTOR_MODIFIER_CODES[code];
    if (kind === undefined) {
      throw new DiceSyntaxError(`Unknown modifier code '${code}'`, position, code);
    }
    this.pos += code.length;

    const selector = this.parseSelector(code, kind !== 'explode');
    return { kind, selectors: selector ? [selector] : [] };
  }

  private parseSelector(code: string, required: boolean): Selector | undefined {
    const char = this.peek();

    if (char === 'h' || char === 'l') {
      this.pos++;
      const value = this.readInteger(`a count after '${code}${char}'`);
      return { kind: char === 'h' ? 'highest' : 'lowest', value };
    }
    if (char === '>' || char === '<') {
      this.pos++;
      const value = this.readInteger(`a value after '${code}${char}'`);
      return { kind: char === '>' ? 'greater' : 'less', value };
    }
    if (isDigit(char)) {
      return { kind: 'equal', value: this.readInteger('a value') };
    }
    if (!required) {
      return undefined;
    }
    throw new DiceSyntaxError(
      `Modifier '${code}' requires a selector such as h1, l1, >3, <3 or 3`,
      this.pos,
      char || undefined
    );
  }

  // ===========================================================================
  // Low-level helpers
  // ===========================================================================

  private readInteger(what: string): number {
    const start = this.pos;
    while (isDigit(this.peek())) {
      this.pos++;
    }
    if (start === this.pos) {
      const found = this.peek();
      throw new DiceSyntaxError(
        found ? `Expected ${what} but found '${found}'` : `Expected ${what}`,
        start,
        found || undefined
      );
    }
    const digits = this.text.slice(start, this.pos);
    const value = Number(digits);
    if (!Number.isSafeInteger(value)) {
      throw new DiceSyntaxError(`Number too large: ${digits}`, start, digits);
    }
    return value;
  }

  private enter(position: number): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw new DiceSyntaxError('Expression is nested too deeply', position);
    }
  }

  private unexpected(): DiceSyntaxError {
    const char = this.peek();
    if (char === ')') {
      return new DiceSyntaxError("Unbalanced parentheses: unexpected ')'", this.pos, char);
    }
    if (char === '[') {
      return new DiceSyntaxError('Annotations are not enabled', this.pos, char);
    }
    return new DiceSyntaxError(`Unexpected character '${char}'`, this.pos, char);
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.peek())) {
      this.pos++;
    }
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.pos + offset);
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }
}

function mergeSelectors(
  previous: SelectorModifier,
  next: SelectorModifier,
  sides: number | undefined
): SelectorModifier {
  const spell = (modifier: SelectorModifier): readonly Selector[] =>
    modifier.kind === 'explode' && modifier.selectors.length === 0 && sides !== undefined
      ? [{ kind: 'equal', value: sides }]
      : modifier.selectors;

  return { kind: previous.kind, selectors: [...spell(previous), ...spell(next)] };
}

/**
 * Parse dice notation into an expression tree.
 *
 * @throws DiceSyntaxError when the notation is malformed
 */
export function parse(text: string, options: ParseOptions = {}): Expression {
  return new Parser(text, options.allowComments ?? false).parse();
}
