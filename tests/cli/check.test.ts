/**
 * Sable CLI Tests: sable-check command
 * Argument parsing, settings, and output formatting
 */

import { describe, expect, it } from 'vitest';
import {
  parseCheckArgs,
  reportCheck,
  resolveSettings,
  type CheckIO,
} from '../../src/cli-check.js';
import { checkSource, formatError, formatResult } from '../../src/cli-shared.js';
import { DEFAULT_CONFIG, type SableConfig } from '../../src/config.js';
import {
  ConfigError,
  InternalError,
  TypeCheckError,
} from '../../src/index.js';

function captureIO(): { io: CheckIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    out,
    err,
  };
}

describe('sable-check CLI', () => {
  describe('parseCheckArgs', () => {
    it('takes a file argument', () => {
      expect(parseCheckArgs(['prog.sb'])).toEqual({
        mode: 'check',
        file: 'prog.sb',
      });
    });

    it('reads format and trace flags in any position', () => {
      expect(parseCheckArgs(['--trace', 'a.sb', '--format', 'json'])).toEqual({
        mode: 'check',
        file: 'a.sb',
        format: 'json',
        trace: true,
      });
    });

    it('returns help and version modes', () => {
      expect(parseCheckArgs(['-h'])).toEqual({ mode: 'help' });
      expect(parseCheckArgs(['a.sb', '--version'])).toEqual({
        mode: 'version',
      });
    });

    it('requires a file', () => {
      expect(() => parseCheckArgs([])).toThrow('Missing file argument');
    });

    it('requires a format value', () => {
      expect(() => parseCheckArgs(['--format'])).toThrow(
        '--format requires argument: text or json'
      );
      expect(() => parseCheckArgs(['--format', '--trace', 'a.sb'])).toThrow(
        '--format requires argument: text or json'
      );
    });

    it('rejects an unknown format', () => {
      expect(() => parseCheckArgs(['--format', 'xml', 'a.sb'])).toThrow(
        'Invalid format: xml. Expected text or json'
      );
    });

    it('rejects an unknown flag', () => {
      expect(() => parseCheckArgs(['--fix', 'a.sb'])).toThrow(
        'Unknown option: --fix'
      );
    });
  });

  describe('resolveSettings', () => {
    const fromFile: SableConfig = {
      associativity: 'left',
      format: 'json',
      trace: true,
    };

    it('keeps config values when no flags are given', () => {
      expect(resolveSettings({}, fromFile)).toEqual(fromFile);
    });

    it('lets flags override the config file', () => {
      expect(resolveSettings({ format: 'text' }, fromFile)).toEqual({
        associativity: 'left',
        format: 'text',
        trace: true,
      });
    });
  });

  describe('reportCheck', () => {
    it('prints the program type and exits 0', () => {
      const { io, out, err } = captureIO();
      expect(reportCheck('let x = 1; x + 1', DEFAULT_CONFIG, io)).toBe(0);
      expect(out).toEqual(['ok: int']);
      expect(err).toEqual([]);
    });

    it('prints a type error and exits 1', () => {
      const { io, out } = captureIO();
      expect(reportCheck('let x = 1; x = true;', DEFAULT_CONFIG, io)).toBe(1);
      expect(out).toEqual([
        'Type error at 1:14: Cannot assign bool to x which is int',
      ]);
    });

    it('prints parse and lexer errors', () => {
      const { io, out } = captureIO();
      reportCheck('1 +', DEFAULT_CONFIG, io);
      reportCheck('1 # 2', DEFAULT_CONFIG, io);
      expect(out).toEqual([
        "Parse error at 1:3: Unexpected operator '+'",
        'Lexer error at 1:3: Unexpected character: #',
      ]);
    });

    it('prints JSON when asked', () => {
      const { io, out } = captureIO();
      const json = { ...DEFAULT_CONFIG, format: 'json' as const };
      reportCheck('2.5', json, io);
      reportCheck('let x = 1; x = true;', json, io);

      expect(out[0]).toBe('{"ok":true,"type":"float"}');
      expect(JSON.parse(out[1] ?? '')).toEqual({
        ok: false,
        code: 'TYPE_MISMATCH',
        message: 'Cannot assign bool to x which is int',
        location: { line: 1, column: 14, offset: 13 },
      });
    });

    it('traces scopes and function checks to stderr', () => {
      const { io, err } = captureIO();
      reportCheck('fun f() = 1; f()', { ...DEFAULT_CONFIG, trace: true }, io);
      expect(err).toEqual([
        '[scope] enter 1 (depth 2)',
        '[scope] enter 2 (depth 3)',
        '[scope] leave 2 (depth 3)',
        '[function] f checked on declaration: int (inferred)',
        '[scope] leave 1 (depth 2)',
      ]);
    });
  });

  describe('checkSource', () => {
    it('returns the type on success', () => {
      expect(checkSource('true')).toEqual({ ok: true, type: 'bool' });
    });

    it('returns the error on failure', () => {
      const result = checkSource('x');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TypeCheckError);
      }
    });

    it('applies the associativity option', () => {
      expect(checkSource('1 - 2 - 3', { associativity: 'left' })).toEqual({
        ok: true,
        type: 'int',
      });
    });
  });

  describe('formatting', () => {
    it('formats errors without a location', () => {
      const error = new ConfigError(
        'Invalid configuration: trace must be a boolean'
      );
      expect(formatError(error)).toBe(
        'Config error: Invalid configuration: trace must be a boolean'
      );
    });

    it('formats internal errors with a location', () => {
      const error = new InternalError('boom', {
        line: 2,
        column: 4,
        offset: 9,
      });
      expect(formatError(error)).toBe('Internal error at 2:4: boom');
    });

    it('formats a failed result as JSON with a null location', () => {
      const error = new ConfigError('bad');
      expect(formatResult({ ok: false, error }, 'json')).toBe(
        '{"ok":false,"code":"CONFIG_INVALID","message":"bad","location":null}'
      );
    });
  });
});
