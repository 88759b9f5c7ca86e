/**
 * Skiff Lexer
 */

export { tokenize, nextToken } from './tokenizer.js';
export { Scanner } from './scanner.js';
