/**
 * Skiff Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ExpressionNode, ScriptNode } from '../types.js';
import { ParseError } from '../types.js';
import { Parser } from './parser.js';
import { current, isAtEnd, skipNewlines } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse skiff source code into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('xs = [1, 2]\nappend(xs, 3)');
 * ```
 */
export function parse(source: string): ScriptNode {
  const parser = new Parser(tokenize(source));
  return parser.parse();
}

/**
 * Parse a single expression, rejecting anything after it.
 *
 * @example
 * ```typescript
 * const node = parseExpression('(1, 2)');
 * ```
 */
export function parseExpression(source: string): ExpressionNode {
  const parser = new Parser(tokenize(source));
  skipNewlines(parser.state);
  const expr = parser.parseExpression();
  skipNewlines(parser.state);

  if (!isAtEnd(parser.state)) {
    const token = current(parser.state);
    throw new ParseError(
      'SKIFF-P001',
      `Unexpected token: ${token.value}`,
      token.span.start,
      { token: token.value }
    );
  }
  return expr;
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
