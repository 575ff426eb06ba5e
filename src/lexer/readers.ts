/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { SABLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { finishToken, isDigit, isIdentifierChar } from './helpers.js';
import { KEYWORDS, TYPE_NAMES } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  takeWhile,
} from './state.js';

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '0':
      return '\0';
    case '\\':
      return '\\';
    case '"':
      return '"';
    case "'":
      return "'";
    default:
      throw new LexerError(
        SABLE_ERROR_CODES.LEX_INVALID_ESCAPE,
        `Invalid escape sequence: \\${escaped}`,
        location
      );
  }
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      value += processEscape(state);
    } else if (peek(state) === '\n') {
      throw new LexerError(
        SABLE_ERROR_CODES.LEX_UNTERMINATED,
        'Unterminated string literal',
        start
      );
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw new LexerError(
      SABLE_ERROR_CODES.LEX_UNTERMINATED,
      'Unterminated string literal',
      start
    );
  }
  advance(state); // consume closing "

  return finishToken(state, TOKEN_TYPES.STRING, value, start);
}

export function readChar(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening '

  if (isAtEnd(state) || peek(state) === "'" || peek(state) === '\n') {
    throw new LexerError(
      SABLE_ERROR_CODES.LEX_INVALID_CHAR,
      'Character literal must contain exactly one character',
      start
    );
  }

  let value: string;
  if (peek(state) === '\\') {
    advance(state); // consume backslash
    value = processEscape(state);
  } else {
    value = advance(state);
  }

  if (peek(state) !== "'") {
    throw new LexerError(
      SABLE_ERROR_CODES.LEX_INVALID_CHAR,
      'Character literal must contain exactly one character',
      start
    );
  }
  advance(state); // consume closing '

  return finishToken(state, TOKEN_TYPES.CHAR, value, start);
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const whole = takeWhile(state, isDigit);

  // A dot is only part of the number when a digit follows it
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state);
    const fraction = takeWhile(state, isDigit);
    return finishToken(state, TOKEN_TYPES.FLOAT, `${whole}.${fraction}`, start);
  }

  return finishToken(state, TOKEN_TYPES.INT, whole, start);
}

/** Identifier, keyword, type name, or boolean literal */
export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = takeWhile(state, isIdentifierChar);

  let type: Token['type'] = TOKEN_TYPES.IDENTIFIER;
  if (value === 'true' || value === 'false') {
    type = TOKEN_TYPES.BOOL;
  } else if (KEYWORDS.has(value)) {
    type = TOKEN_TYPES.KEYWORD;
  } else if (TYPE_NAMES.has(value)) {
    type = TOKEN_TYPES.TYPE_NAME;
  }

  return finishToken(state, type, value, start);
}
