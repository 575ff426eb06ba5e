/**
 * Parser State
 * Token cursor with one-token lookahead helpers
 */

import type {
  Associativity,
  SourceLocation,
  Token,
  TokenType,
} from '../types.js';
import { ParseError, SABLE_ERROR_CODES, TOKEN_TYPES } from '../types.js';

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
  readonly associativity: Associativity;
  /** Counter for hidden counting-loop variables (.for0, .for1, ...) */
  forCounter: number;
}

export function createParserState(
  tokens: readonly Token[],
  options: { associativity: Associativity }
): ParserState {
  const last = tokens[tokens.length - 1];
  if (!last || last.type !== TOKEN_TYPES.EOF) {
    throw new TypeError('Token stream must end with an EOF token');
  }
  return {
    tokens,
    pos: 0,
    associativity: options.associativity,
    forCounter: 0,
  };
}

/** Current token. The EOF sentinel is returned once the stream is exhausted. */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

export function peek(state: ParserState, offset = 0): Token {
  const index = Math.min(state.pos + offset, state.tokens.length - 1);
  const token = state.tokens[index];
  if (!token) {
    throw new TypeError('Token stream is empty');
  }
  return token;
}

export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** Check for a keyword or operator token with a specific spelling */
export function checkValue(
  state: ParserState,
  type: TokenType,
  value: string
): boolean {
  const token = current(state);
  return token.type === type && token.value === value;
}

export function advance(state: ParserState): Token {
  const token = current(state);
  if (token.type !== TOKEN_TYPES.EOF) {
    state.pos++;
  }
  return token;
}

/**
 * Location of the current token for diagnostics.
 * At end of input every failure is reported as an unexpected end.
 */
export function failAt(state: ParserState, message: string): ParseError {
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) {
    return new ParseError(
      SABLE_ERROR_CODES.PARSE_UNEXPECTED_EOF,
      'Unexpected end of input',
      token.span.start
    );
  }
  return new ParseError(
    SABLE_ERROR_CODES.PARSE_UNEXPECTED_TOKEN,
    message,
    token.span.start,
    { found: token.value }
  );
}

export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (!check(state, type)) {
    throw failAt(state, message);
  }
  return advance(state);
}

export function expectValue(
  state: ParserState,
  type: TokenType,
  value: string,
  message: string
): Token {
  if (!checkValue(state, type, value)) {
    throw failAt(state, message);
  }
  return advance(state);
}

/** Consume the token if it matches. Returns whether it did. */
export function match(state: ParserState, type: TokenType): boolean {
  if (check(state, type)) {
    advance(state);
    return true;
  }
  return false;
}

export function currentLocation(state: ParserState): SourceLocation {
  return current(state).span.start;
}
