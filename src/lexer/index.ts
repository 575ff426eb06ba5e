/**
 * Sable Lexer
 */

export { LexerError } from './errors.js';
export { tokenize, nextToken } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
