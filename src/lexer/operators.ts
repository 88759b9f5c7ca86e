/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  ',': TOKEN_TYPES.COMMA,
  '=': TOKEN_TYPES.ASSIGN,
  '-': TOKEN_TYPES.MINUS,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  True: TOKEN_TYPES.TRUE,
  False: TOKEN_TYPES.FALSE,
  None: TOKEN_TYPES.NONE,
  not: TOKEN_TYPES.NOT,
};
