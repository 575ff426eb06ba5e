/**
 * Sable Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { BlockNode, ParseOptions, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-control.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token stream into the program's root block.
 *
 * Throws ParseError on the first syntax error.
 *
 * @param tokens - Tokens ending in an EOF token
 */
export function parseTokens(
  tokens: readonly Token[],
  options?: ParseOptions
): BlockNode {
  return new Parser(tokens, options).parse();
}

/**
 * Parse Sable source code into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('let x = 1 + 2 * 3;');
 * ```
 */
export function parse(source: string, options?: ParseOptions): BlockNode {
  return parseTokens(tokenize(source), options);
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

export type { Term } from './parser-expr.js';
