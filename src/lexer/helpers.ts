/**
 * Lexer Helper Functions
 * Character classes and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { currentLocation, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Letters or underscore; identifiers never start with a digit or a dot */
export function isIdentifierStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Newlines are plain whitespace: statements end at `;` or a bracket */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/** Build a token spanning from `start` to the cursor */
export function finishToken(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: currentLocation(state) } };
}
