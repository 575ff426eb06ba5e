/**
 * Sable Lexer Tests
 * Token kinds, spans, comments, and lexical errors
 */

import { describe, expect, it } from 'vitest';
import { LexerError, TOKEN_TYPES, tokenize } from '../../src/index.js';

function kinds(source: string): string[] {
  return tokenize(source).map((t) => `${t.type}:${t.value}`);
}

describe('Sable Lexer', () => {
  describe('token kinds', () => {
    it('tokenizes a let statement', () => {
      expect(kinds('let x = 3.5;')).toEqual([
        'KEYWORD:let',
        'IDENTIFIER:x',
        'OPERATOR:=',
        'FLOAT:3.5',
        'SEMICOLON:;',
        'EOF:',
      ]);
    });

    it('separates keywords, type names, booleans and identifiers', () => {
      expect(kinds('fun f(a: int): bool = true')).toEqual([
        'KEYWORD:fun',
        'IDENTIFIER:f',
        'LPAREN:(',
        'IDENTIFIER:a',
        'COLON::',
        'TYPE_NAME:int',
        'RPAREN:)',
        'COLON::',
        'TYPE_NAME:bool',
        'OPERATOR:=',
        'BOOL:true',
        'EOF:',
      ]);
    });

    it('treats a name that starts with a keyword as an identifier', () => {
      expect(kinds('letter iffy')).toEqual([
        'IDENTIFIER:letter',
        'IDENTIFIER:iffy',
        'EOF:',
      ]);
    });

    it('distinguishes integers from floats', () => {
      expect(kinds('12 1.25')).toEqual(['INT:12', 'FLOAT:1.25', 'EOF:']);
    });

    it('takes the longest operator', () => {
      expect(kinds('a+=1<=b==c!=!d')).toEqual([
        'IDENTIFIER:a',
        'OPERATOR:+=',
        'INT:1',
        'OPERATOR:<=',
        'IDENTIFIER:b',
        'OPERATOR:==',
        'IDENTIFIER:c',
        'OPERATOR:!=',
        'OPERATOR:!',
        'IDENTIFIER:d',
        'EOF:',
      ]);
    });

    it('tokenizes all brackets and punctuation', () => {
      const types = tokenize('(){}[],;:').map((t) => t.type);
      expect(types).toEqual([
        TOKEN_TYPES.LPAREN,
        TOKEN_TYPES.RPAREN,
        TOKEN_TYPES.LBRACE,
        TOKEN_TYPES.RBRACE,
        TOKEN_TYPES.LBRACKET,
        TOKEN_TYPES.RBRACKET,
        TOKEN_TYPES.COMMA,
        TOKEN_TYPES.SEMICOLON,
        TOKEN_TYPES.COLON,
        TOKEN_TYPES.EOF,
      ]);
    });
  });

  describe('strings and characters', () => {
    it('unescapes string contents', () => {
      const [token] = tokenize('"a\\tb\\"c"');
      expect(token?.type).toBe(TOKEN_TYPES.STRING);
      expect(token?.value).toBe('a\tb"c');
    });

    it('reads a character literal', () => {
      expect(kinds("'x' '\\n'")).toEqual(['CHAR:x', 'CHAR:\n', 'EOF:']);
    });

    it('reads a character outside the basic plane as one character', () => {
      const [token] = tokenize("'😀'");
      expect(token?.type).toBe(TOKEN_TYPES.CHAR);
      expect(token?.value).toBe('😀');
    });

    it('rejects an unterminated string', () => {
      expect(() => tokenize('"abc')).toThrow('Unterminated string literal');
    });

    it('rejects an empty character literal', () => {
      expect(() => tokenize("''")).toThrow(
        'Character literal must contain exactly one character'
      );
    });

    it('rejects an unknown escape', () => {
      expect(() => tokenize('"\\q"')).toThrow('Invalid escape sequence: \\q');
    });
  });

  describe('comments and whitespace', () => {
    it('skips line and block comments', () => {
      expect(kinds('1 // one\n/* two\n */ 2')).toEqual([
        'INT:1',
        'INT:2',
        'EOF:',
      ]);
    });

    it('rejects an unterminated block comment', () => {
      expect(() => tokenize('1 /* open')).toThrow('Unterminated block comment');
    });
  });

  describe('locations', () => {
    it('tracks line and column across newlines', () => {
      const tokens = tokenize('let a = 1;\n  a');
      const last = tokens[tokens.length - 2];
      expect(last?.value).toBe('a');
      expect(last?.span.start).toEqual({ line: 2, column: 3, offset: 13 });
    });

    it('counts a surrogate pair as one column', () => {
      const tokens = tokenize('"😀" x');
      expect(tokens[0]?.value).toBe('😀');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 5, offset: 5 });
    });

    it('places EOF after the last character', () => {
      const tokens = tokenize('ab');
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 3, offset: 2 });
    });
  });

  describe('errors', () => {
    it('throws LexerError for an unexpected character', () => {
      try {
        tokenize('1 & 2');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(LexerError);
        if (err instanceof LexerError) {
          expect(err.code).toBe('LEX_UNEXPECTED_CHARACTER');
          expect(err.location).toEqual({ line: 1, column: 3, offset: 2 });
          expect(err.message).toBe('Unexpected character: & at 1:3');
        }
      }
    });
  });
});
