/**
 * Token Readers
 * Character classes and readers for each token shape
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import { KEYWORDS } from './operators.js';
import type { Scanner } from './scanner.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

const IDENTIFIER_START = /^[\p{L}_]$/u;
const IDENTIFIER_PART = /^[\p{L}\p{N}_]$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Letters of any script, or underscore */
export function isIdentifierStart(ch: string): boolean {
  return IDENTIFIER_START.test(ch);
}

export function isIdentifierPart(ch: string): boolean {
  return IDENTIFIER_PART.test(ch);
}

/** Blanks between tokens; newlines are tokens of their own */
export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f';
}

// ============================================================
// TRIVIA
// ============================================================

/**
 * Skip blanks, `#` comments and backslash line continuations.
 * Inside brackets newlines are skipped too.
 */
export function skipTrivia(scanner: Scanner): void {
  for (;;) {
    const ch = scanner.peek();
    if (isBlank(ch)) {
      scanner.advance();
    } else if (ch === '#') {
      scanner.consumeWhile((c) => c !== '\n');
    } else if (ch === '\\' && scanner.peek(1) === '\n') {
      scanner.advance();
      scanner.advance();
    } else if (ch === '\n' && scanner.insideBrackets) {
      scanner.advance();
    } else {
      return;
    }
  }
}

// ============================================================
// READERS
// ============================================================

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

/** Single- or double-quoted string on one line */
export function readString(scanner: Scanner): Token {
  const start = scanner.location();
  const quote = scanner.advance();

  let value = '';
  for (;;) {
    const ch = scanner.peek();
    if (scanner.atEnd || ch === '\n') {
      throw new LexerError('SKIFF-L001', 'Unterminated string literal', start);
    }
    if (ch === quote) break;

    if (ch === '\\') {
      scanner.advance();
      const location = scanner.location();
      const escaped = scanner.advance();
      const replacement = Object.hasOwn(ESCAPES, escaped)
        ? ESCAPES[escaped]
        : undefined;
      if (replacement === undefined) {
        throw new LexerError(
          'SKIFF-L003',
          `Invalid escape sequence: \\${escaped}`,
          location,
          { sequence: escaped }
        );
      }
      value += replacement;
    } else {
      value += scanner.advance();
    }
  }
  scanner.advance(); // closing quote

  return scanner.token(TOKEN_TYPES.STRING, value, start);
}

/** Digits with an optional fraction and exponent: `12`, `1.5`, `1e+23` */
export function readNumber(scanner: Scanner): Token {
  const start = scanner.location();
  let text = scanner.consumeWhile(isDigit);

  if (scanner.peek() === '.' && isDigit(scanner.peek(1))) {
    text += scanner.advance();
    text += scanner.consumeWhile(isDigit);
  }

  const marker = scanner.peek();
  if (marker === 'e' || marker === 'E') {
    const sign = scanner.peek(1);
    const signed = sign === '+' || sign === '-';
    if (isDigit(scanner.peek(signed ? 2 : 1))) {
      text += scanner.advance();
      if (signed) text += scanner.advance();
      text += scanner.consumeWhile(isDigit);
    }
  }

  return scanner.token(TOKEN_TYPES.NUMBER, text, start);
}

export function readIdentifier(scanner: Scanner): Token {
  const start = scanner.location();
  const name = scanner.consumeWhile(isIdentifierPart);
  const keyword = Object.hasOwn(KEYWORDS, name) ? KEYWORDS[name] : undefined;
  return scanner.token(keyword ?? TOKEN_TYPES.IDENTIFIER, name, start);
}
