/**
 * Parser Extension: Script Parsing
 * Script and statements
 */

import { Parser } from './parser.js';
import type { ScriptNode, StatementNode } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  check,
  advance,
  current,
  isAtEnd,
  peek,
  skipNewlines,
  makeSpan,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatement(): StatementNode;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  skipNewlines(this.state);
  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());

    // Statements end at a newline or at end of input
    if (!isAtEnd(this.state) && !check(this.state, TOKEN_TYPES.NEWLINE)) {
      const token = current(this.state);
      throw new ParseError(
        'SKIFF-P001',
        `Unexpected token: ${token.value}`,
        token.span.start,
        { token: token.value }
      );
    }
    skipNewlines(this.state);
  }

  return {
    type: 'Script',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Statement: `name = expr` or a bare expression.
 */
Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const start = current(this.state).span.start;

  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.ASSIGN
  ) {
    const target = advance(this.state).value;
    advance(this.state); // consume =
    const value = this.parseExpression();
    return {
      type: 'Assignment',
      target,
      value,
      span: makeSpan(start, value.span.end),
    };
  }

  const expression = this.parseExpression();
  return {
    type: 'ExpressionStatement',
    expression,
    span: expression.span,
  };
};
