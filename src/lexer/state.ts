/**
 * Lexer State
 * Source cursor with line and column tracking
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Code point starting `offset` UTF-16 units past the cursor, or '' past the end */
export function peek(state: LexerState, offset = 0): string {
  const code = state.source.codePointAt(state.pos + offset);
  return code === undefined ? '' : String.fromCodePoint(code);
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

/**
 * Consume one code point, moving to the next line after a newline.
 * Columns count code points, offsets count UTF-16 units.
 */
export function advance(state: LexerState): string {
  const ch = peek(state);
  if (ch === '') return ch;

  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function advanceBy(state: LexerState, count: number): string {
  let consumed = '';
  for (let i = 0; i < count; i++) consumed += advance(state);
  return consumed;
}

/** Consume characters while `test` holds and return them */
export function takeWhile(
  state: LexerState,
  test: (ch: string) => boolean
): string {
  let consumed = '';
  while (!isAtEnd(state) && test(peek(state))) {
    consumed += advance(state);
  }
  return consumed;
}
