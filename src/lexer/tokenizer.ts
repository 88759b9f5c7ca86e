/**
 * Tokenizer
 * Source text to a token stream ending in EOF
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import { SINGLE_CHAR_OPERATORS } from './operators.js';
import {
  isDigit,
  isIdentifierStart,
  readIdentifier,
  readNumber,
  readString,
  skipTrivia,
} from './readers.js';
import { Scanner } from './scanner.js';

function readOperator(scanner: Scanner): Token {
  const start = scanner.location();
  const ch = scanner.peek();
  const type = Object.hasOwn(SINGLE_CHAR_OPERATORS, ch)
    ? SINGLE_CHAR_OPERATORS[ch]
    : undefined;
  if (type === undefined) {
    throw new LexerError('SKIFF-L002', `Unexpected character: ${ch}`, start, {
      char: ch,
    });
  }

  scanner.advance();
  if (type === TOKEN_TYPES.LPAREN || type === TOKEN_TYPES.LBRACKET) {
    scanner.open();
  } else if (type === TOKEN_TYPES.RPAREN || type === TOKEN_TYPES.RBRACKET) {
    scanner.close();
  }
  return scanner.token(type, ch, start);
}

export function nextToken(scanner: Scanner): Token {
  skipTrivia(scanner);

  const start = scanner.location();
  if (scanner.atEnd) {
    return scanner.token(TOKEN_TYPES.EOF, '', start);
  }

  const ch = scanner.peek();
  if (ch === '\n') {
    scanner.advance();
    return scanner.token(TOKEN_TYPES.NEWLINE, '\n', start);
  }
  if (ch === '"' || ch === "'") return readString(scanner);
  // Negative numbers are unary minus applied by the parser
  if (isDigit(ch)) return readNumber(scanner);
  if (isIdentifierStart(ch)) return readIdentifier(scanner);
  return readOperator(scanner);
}

export function tokenize(source: string): Token[] {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(scanner);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
