/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { BlockNode, ParseOptions, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statement lists, statement dispatch
 * - parser-expr.ts: Term collection and precedence resolution
 * - parser-literals.ts: Literals and type annotations
 * - parser-control.ts: Blocks, let, if, while, for
 * - parser-functions.ts: Function declarations and calls
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state: token cursor and options */
  state: ParserState;

  constructor(tokens: readonly Token[], options?: ParseOptions) {
    this.state = createParserState(tokens, {
      associativity: options?.associativity ?? 'right',
    });
  }

  /**
   * Parse tokens into the root block of a program.
   */
  parse(): BlockNode {
    return this.parseProgram();
  }
}
