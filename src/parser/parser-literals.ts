/**
 * Parser Extension: Literal Parsing
 * Literals and type annotations
 */

import { Parser } from './parser.js';
import type { LiteralNode, LiteralValue, Token, TypeName } from '../types.js';
import { ParseError, SABLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { advance, current, expect, failAt } from './state.js';
import { TYPE_ANNOTATIONS } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLiteral(): LiteralNode;
    parseNumericBound(role: 'From' | 'To'): NumericBound;
    parseTypeAnnotation(): TypeName;
  }
}

/** Int or float literal used as a loop bound, with its numeric value */
export interface NumericBound {
  readonly node: LiteralNode;
  readonly value: number;
  readonly isFloat: boolean;
}

function literalValue(token: Token): LiteralValue | undefined {
  switch (token.type) {
    case TOKEN_TYPES.INT:
      return { kind: 'int', value: Number.parseInt(token.value, 10) };
    case TOKEN_TYPES.FLOAT:
      return { kind: 'float', value: Number.parseFloat(token.value) };
    case TOKEN_TYPES.BOOL:
      return { kind: 'bool', value: token.value === 'true' };
    case TOKEN_TYPES.CHAR:
      return { kind: 'char', value: token.value };
    case TOKEN_TYPES.STRING:
      return { kind: 'string', value: token.value };
    default:
      return undefined;
  }
}

// ============================================================
// LITERALS
// ============================================================

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = current(this.state);
  const literal = literalValue(token);
  if (!literal) {
    throw failAt(this.state, 'Expected literal');
  }
  if (literal.kind === 'int' && !Number.isSafeInteger(literal.value)) {
    throw new ParseError(
      SABLE_ERROR_CODES.PARSE_INVALID_SYNTAX,
      `Integer literal out of range: ${token.value}`,
      token.span.start,
      { value: token.value }
    );
  }
  advance(this.state);

  return { type: 'Literal', literal, location: token.span.start };
};

/**
 * Parse a for-loop bound. Anything but an int or float literal is
 * rejected here rather than left to the checker.
 */
Parser.prototype.parseNumericBound = function (
  this: Parser,
  role: 'From' | 'To'
): NumericBound {
  const node = this.parseLiteral();
  const { literal } = node;

  if (literal.kind === 'int' || literal.kind === 'float') {
    return { node, value: literal.value, isFloat: literal.kind === 'float' };
  }

  throw new ParseError(
    SABLE_ERROR_CODES.PARSE_INVALID_TYPE,
    `${role} in for must be int or float, got ${literal.kind}`,
    node.location
  );
};

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

Parser.prototype.parseTypeAnnotation = function (this: Parser): TypeName {
  const token = expect(this.state, TOKEN_TYPES.TYPE_NAME, 'Expected a type');
  const typeName = TYPE_ANNOTATIONS[token.value];
  if (!typeName) {
    throw new ParseError(
      SABLE_ERROR_CODES.PARSE_INVALID_TYPE,
      `Unknown type: ${token.value}`,
      token.span.start
    );
  }
  return typeName;
};
