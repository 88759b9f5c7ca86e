/**
 * Parser Extension: Literal Parsing
 * Numbers, strings, booleans, None, list and tuple displays
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  LiteralNode,
  SequenceLiteralNode,
} from '../types.js';
import { TOKEN_TYPES, makeList, makeTuple } from '../types.js';
import {
  check,
  advance,
  expect,
  current,
  skipNewlines,
  makeSpan,
} from './state.js';

/** Elements between a pair of delimiters */
export interface DelimitedElements {
  readonly elements: ExpressionNode[];
  /** Whether the last element was followed by a comma */
  readonly trailingComma: boolean;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLiteral(): LiteralNode;
    parseListLiteral(): SequenceLiteralNode;
    parseParenthesized(): ExpressionNode;
    parseDelimitedElements(open: string): DelimitedElements;
  }
}

const CLOSERS: Record<string, string> = {
  [TOKEN_TYPES.LPAREN]: TOKEN_TYPES.RPAREN,
  [TOKEN_TYPES.LBRACKET]: TOKEN_TYPES.RBRACKET,
};

// ============================================================
// SCALAR LITERALS
// ============================================================

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = advance(this.state);
  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      return {
        type: 'NumberLiteral',
        value: parseFloat(token.value),
        span: token.span,
      };
    case TOKEN_TYPES.STRING:
      return { type: 'StringLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
      return { type: 'BoolLiteral', value: true, span: token.span };
    case TOKEN_TYPES.FALSE:
      return { type: 'BoolLiteral', value: false, span: token.span };
    default:
      return { type: 'NoneLiteral', span: token.span };
  }
};

// ============================================================
// SEQUENCE DISPLAYS
// ============================================================

/**
 * Comma-separated expressions after an opening delimiter.
 * Consumes the opener but leaves the closer for the caller.
 * Newlines inside the delimiters are ignored.
 */
Parser.prototype.parseDelimitedElements = function (
  this: Parser,
  open: string
): DelimitedElements {
  const close = CLOSERS[open] ?? TOKEN_TYPES.RPAREN;
  expect(this.state, open, `Expected ${open}`);
  skipNewlines(this.state);

  const elements: ExpressionNode[] = [];
  let trailingComma = false;

  while (!check(this.state, close)) {
    elements.push(this.parseExpression());
    skipNewlines(this.state);
    trailingComma = false;

    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state); // consume ,
    skipNewlines(this.state);
    trailingComma = true;
  }

  return { elements, trailingComma };
};

/**
 * List display: [a, b, c]
 */
Parser.prototype.parseListLiteral = function (
  this: Parser
): SequenceLiteralNode {
  const start = current(this.state).span.start;
  const { elements } = this.parseDelimitedElements(TOKEN_TYPES.LBRACKET);
  const close = expect(this.state, TOKEN_TYPES.RBRACKET, 'Expected ]');
  return makeList(elements, makeSpan(start, close.span.end));
};

/**
 * Parenthesized form:
 * - ()        empty tuple
 * - (x)       grouping, yields x itself
 * - (x,)      one-element tuple
 * - (x, y)    tuple
 */
Parser.prototype.parseParenthesized = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const { elements, trailingComma } = this.parseDelimitedElements(
    TOKEN_TYPES.LPAREN
  );
  const close = expect(this.state, TOKEN_TYPES.RPAREN, 'Expected )');

  const [only] = elements;
  if (only !== undefined && elements.length === 1 && !trailingComma) {
    return only;
  }
  return makeTuple(elements, makeSpan(start, close.span.end));
};
