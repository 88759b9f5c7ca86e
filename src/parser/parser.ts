/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script and statement parsing
 * - parser-expr.ts: Unary, postfix and primary expressions, calls
 * - parser-literals.ts: Scalar literals, list and tuple displays
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ScriptNode {
    return this.parseScript();
  }
}
