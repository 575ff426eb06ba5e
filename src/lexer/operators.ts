/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/**
 * Operator symbols, longest first so the tokenizer can take the first
 * match. `//` and `/*` never reach this table: they open comments.
 */
export const OPERATOR_SYMBOLS: readonly string[] = [
  '+=',
  '-=',
  '<=',
  '>=',
  '!=',
  '==',
  '&&',
  '||',
  '+',
  '-',
  '*',
  '/',
  '%',
  '<',
  '>',
  '!',
  '=',
];

/** Single-character punctuation lookup table */
export const PUNCTUATION: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  ':': TOKEN_TYPES.COLON,
};

/** Reserved words */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'else',
  'while',
  'for',
  'let',
  'fun',
]);

/** Primitive type names */
export const TYPE_NAMES: ReadonlySet<string> = new Set([
  'int',
  'float',
  'bool',
  'char',
  'string',
  'unit',
]);
