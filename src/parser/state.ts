/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: string,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const fullMessage = hint ? `${message}. ${hint}` : message;
  throw new ParseError('SKIFF-P002', fullMessage, token.span.start, {
    expected: type,
    actual: token.type,
  });
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: string, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }
  if (
    (expectedType === TOKEN_TYPES.RPAREN ||
      expectedType === TOKEN_TYPES.RBRACKET) &&
    actual !== TOKEN_TYPES.COMMA
  ) {
    return 'Hint: Separate elements with a comma';
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
