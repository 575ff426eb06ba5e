/**
 * Parser Helpers
 * Grammar tables and lookahead predicates
 * @internal This module contains internal parser utilities
 */

import type { BinaryOp, Operator, TypeName, UnaryOp } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, current } from './state.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

/**
 * Binary operator tiers, tightest first.
 * Precedence resolution walks them loosest first.
 * @internal
 */
export const BINARY_OP_PRECEDENCE: readonly (readonly BinaryOp[])[] = [
  ['*', '/', '%'],
  ['+', '-'],
  ['<', '>', '<=', '>='],
  ['==', '!='],
  ['&&'],
  ['||'],
  ['=', '+=', '-='],
];

/** @internal */
export const UNARY_OPERATORS: readonly UnaryOp[] = ['-', '!'];

const OPERATORS: readonly Operator[] = [
  '*',
  '/',
  '%',
  '+',
  '-',
  '<',
  '>',
  '<=',
  '>=',
  '==',
  '!=',
  '&&',
  '||',
  '=',
  '+=',
  '-=',
  '!',
];

/** @internal */
export function toOperator(symbol: string): Operator | undefined {
  return OPERATORS.find((op) => op === symbol);
}

/** @internal */
export function isBinaryOp(op: Operator): op is BinaryOp {
  return op !== '!';
}

/** @internal */
export function isUnaryOp(op: Operator): op is UnaryOp {
  return UNARY_OPERATORS.some((unary) => unary === op);
}

// ============================================================
// TYPE NAMES
// ============================================================

/** Type annotations as written in source. `any` has no spelling. */
export const TYPE_ANNOTATIONS: Readonly<Record<string, TypeName>> = {
  int: 'int',
  float: 'float',
  bool: 'bool',
  char: 'char',
  string: 'string',
  unit: 'unit',
};

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for a token that ends a statement or expression without being
 * consumed by it: ; ) } ] else , and end of input.
 * @internal
 */
export function isTerminator(state: ParserState): boolean {
  const token = current(state);
  switch (token.type) {
    case TOKEN_TYPES.SEMICOLON:
    case TOKEN_TYPES.RPAREN:
    case TOKEN_TYPES.RBRACE:
    case TOKEN_TYPES.RBRACKET:
    case TOKEN_TYPES.COMMA:
    case TOKEN_TYPES.EOF:
      return true;
    case TOKEN_TYPES.KEYWORD:
      return token.value === 'else';
    default:
      return false;
  }
}

/**
 * Check for literal start
 * @internal
 */
export function isLiteralStart(state: ParserState): boolean {
  switch (current(state).type) {
    case TOKEN_TYPES.INT:
    case TOKEN_TYPES.FLOAT:
    case TOKEN_TYPES.BOOL:
    case TOKEN_TYPES.CHAR:
    case TOKEN_TYPES.STRING:
      return true;
    default:
      return false;
  }
}
