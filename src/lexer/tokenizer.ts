/**
 * Tokenizer
 * Skips trivia and dispatches to the token readers
 */

import type { Token } from '../types.js';
import { SABLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  finishToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
} from './helpers.js';
import { OPERATOR_SYMBOLS, PUNCTUATION } from './operators.js';
import { readChar, readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  advanceBy,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  startsWith,
  takeWhile,
} from './state.js';

/** Skip one comment if present. Returns true when something was skipped. */
function skipComment(state: LexerState): boolean {
  if (startsWith(state, '//')) {
    takeWhile(state, (ch) => ch !== '\n');
    return true;
  }

  if (startsWith(state, '/*')) {
    const start = currentLocation(state);
    advanceBy(state, 2);
    while (!startsWith(state, '*/')) {
      if (isAtEnd(state)) {
        throw new LexerError(
          SABLE_ERROR_CODES.LEX_UNTERMINATED,
          'Unterminated block comment',
          start
        );
      }
      advance(state);
    }
    advanceBy(state, 2);
    return true;
  }

  return false;
}

export function nextToken(state: LexerState): Token {
  do {
    takeWhile(state, isWhitespace);
  } while (skipComment(state));

  const start = currentLocation(state);
  if (isAtEnd(state)) {
    return finishToken(state, TOKEN_TYPES.EOF, '', start);
  }

  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (ch === "'") {
    return readChar(state);
  }

  // Unsigned; a leading minus is an operator
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const punctuation = PUNCTUATION[ch];
  if (punctuation) {
    advance(state);
    return finishToken(state, punctuation, ch, start);
  }

  const symbol = OPERATOR_SYMBOLS.find((op) => startsWith(state, op));
  if (symbol) {
    advanceBy(state, symbol.length);
    return finishToken(state, TOKEN_TYPES.OPERATOR, symbol, start);
  }

  throw new LexerError(
    SABLE_ERROR_CODES.LEX_UNEXPECTED_CHARACTER,
    `Unexpected character: ${ch}`,
    start
  );
}

/** Tokenize a whole source text. The last token is always EOF. */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
