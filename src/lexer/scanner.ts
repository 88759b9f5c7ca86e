/**
 * Source Scanner
 * Cursor over source text with line/column tracking
 */

import type { SourceLocation, Token, TokenType } from '../types.js';

export class Scanner {
  private pos = 0;
  private line = 1;
  private column = 1;
  /** Open `(` / `[` count; newlines inside brackets join lines */
  private depth = 0;

  constructor(readonly source: string) {}

  get atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  get insideBrackets(): boolean {
    return this.depth > 0;
  }

  location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  /** Character `offset` ahead of the cursor, or '' past the end */
  peek(offset = 0): string {
    return this.source[this.pos + offset] ?? '';
  }

  advance(): string {
    const ch = this.source[this.pos] ?? '';
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  /** Consume characters while `test` holds and return them */
  consumeWhile(test: (ch: string) => boolean): string {
    const from = this.pos;
    while (!this.atEnd && test(this.peek())) {
      this.advance();
    }
    return this.source.slice(from, this.pos);
  }

  open(): void {
    this.depth++;
  }

  close(): void {
    // A stray closer is the parser's error to report
    if (this.depth > 0) this.depth--;
  }

  /** Token from `start` to the cursor */
  token(type: TokenType, value: string, start: SourceLocation): Token {
    return { type, value, span: { start, end: this.location() } };
  }
}
