/**
 * Parser Extension: Program Parsing
 * Program, statement lists, and statement dispatch
 */

import { Parser } from './parser.js';
import type {
  BlockFunction,
  BlockNode,
  ExpressionNode,
} from '../types.js';
import { ParseError, SABLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  check,
  checkValue,
  current,
  currentLocation,
  isAtEnd,
  match,
} from './state.js';
import { isTerminator } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): BlockNode;
    parseStatements(): BlockNode;
    parseStatement(): ExpressionNode;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): BlockNode {
  const block = this.parseStatements();

  // Statements stop at any terminator; only EOF may end the program
  if (!isAtEnd(this.state)) {
    const token = current(this.state);
    throw new ParseError(
      SABLE_ERROR_CODES.PARSE_UNEXPECTED_TOKEN,
      `Unexpected '${token.value}'`,
      token.span.start,
      { found: token.value }
    );
  }

  return block;
};

/**
 * Collect function declarations and statements until a terminator.
 * A trailing `;` after each is optional.
 */
Parser.prototype.parseStatements = function (this: Parser): BlockNode {
  const location = currentLocation(this.state);
  const statements: ExpressionNode[] = [];
  const functions: BlockFunction[] = [];

  while (!isTerminator(this.state)) {
    if (checkValue(this.state, TOKEN_TYPES.KEYWORD, 'fun')) {
      const { placeholder, fn } = this.parseFunctionDecl();
      statements.push(placeholder);
      functions.push(fn);
    } else {
      statements.push(this.parseStatement());
    }

    match(this.state, TOKEN_TYPES.SEMICOLON);
  }

  return { type: 'Block', statements, functions, location };
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    return this.parseBlock();
  }

  if (check(this.state, TOKEN_TYPES.KEYWORD)) {
    switch (current(this.state).value) {
      case 'while':
        return this.parseWhile();
      case 'for':
        return this.parseFor();
      case 'let':
        return this.parseLet();
      case 'if':
        return this.parseIf();
    }
  }

  return this.parseExpression();
};
