/**
 * Parser Extension: Expression Parsing
 * Unary operators, subscripts, calls and primaries
 */

import { Parser } from './parser.js';
import type { CallNode, ExpressionNode, IdentifierNode } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  check,
  advance,
  expect,
  current,
  peek,
  skipNewlines,
  makeSpan,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseCall(): CallNode;
    parseIdentifier(): IdentifierNode;
  }
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseUnary();
};

/**
 * Unary: -expr | not expr
 */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.MINUS, TOKEN_TYPES.NOT)) {
    const token = advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'Unary',
      op: token.type === TOKEN_TYPES.MINUS ? '-' : 'not',
      operand,
      span: makeSpan(token.span.start, operand.span.end),
    };
  }
  return this.parsePostfix();
};

/**
 * Postfix: primary ('[' expr ']')*
 */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  while (check(this.state, TOKEN_TYPES.LBRACKET)) {
    advance(this.state); // consume [
    skipNewlines(this.state);
    const index = this.parseExpression();
    skipNewlines(this.state);
    const close = expect(this.state, TOKEN_TYPES.RBRACKET, 'Expected ]');
    expr = {
      type: 'Subscript',
      object: expr,
      index,
      span: makeSpan(expr.span.start, close.span.end),
    };
  }

  return expr;
};

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  if (
    check(
      this.state,
      TOKEN_TYPES.NUMBER,
      TOKEN_TYPES.STRING,
      TOKEN_TYPES.TRUE,
      TOKEN_TYPES.FALSE,
      TOKEN_TYPES.NONE
    )
  ) {
    return this.parseLiteral();
  }

  if (check(this.state, TOKEN_TYPES.LBRACKET)) {
    return this.parseListLiteral();
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    return this.parseParenthesized();
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    if (peek(this.state, 1).type === TOKEN_TYPES.LPAREN) {
      return this.parseCall();
    }
    return this.parseIdentifier();
  }

  const token = current(this.state);
  const shown = token.type === TOKEN_TYPES.EOF ? 'end of input' : token.value;
  throw new ParseError(
    'SKIFF-P001',
    `Unexpected token: ${shown === '\n' ? 'newline' : shown}`,
    token.span.start,
    { token: token.value }
  );
};

// ============================================================
// NAMES AND CALLS
// ============================================================

Parser.prototype.parseIdentifier = function (this: Parser): IdentifierNode {
  const token = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected name');
  return { type: 'Identifier', name: token.value, span: token.span };
};

/**
 * Call: name(arg, arg, ...)
 * A trailing comma is allowed.
 */
Parser.prototype.parseCall = function (this: Parser): CallNode {
  const name = advance(this.state);
  const args = this.parseDelimitedElements(TOKEN_TYPES.LPAREN).elements;
  const close = expect(this.state, TOKEN_TYPES.RPAREN, 'Expected )');
  return {
    type: 'Call',
    callee: name.value,
    args,
    span: makeSpan(name.span.start, close.span.end),
  };
};
