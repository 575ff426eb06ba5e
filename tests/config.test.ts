/**
 * Sable Configuration Tests
 * Parsing and validation of .sable.yaml
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  ConfigError,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
} from '../src/index.js';

describe('Sable Configuration', () => {
  describe('parseConfig', () => {
    it('returns the defaults for an empty document', () => {
      expect(parseConfig('')).toEqual({
        associativity: 'right',
        format: 'text',
        trace: false,
      });
    });

    it('reads every key', () => {
      expect(
        parseConfig('associativity: left\nformat: json\ntrace: true\n')
      ).toEqual({ associativity: 'left', format: 'json', trace: true });
    });

    it('fills missing keys from the defaults', () => {
      expect(parseConfig('trace: true')).toEqual({
        ...DEFAULT_CONFIG,
        trace: true,
      });
    });

    it('rejects an unknown key', () => {
      expect(() => parseConfig('colour: red')).toThrow(
        'Invalid configuration: unknown key colour'
      );
    });

    it('rejects an invalid associativity', () => {
      expect(() => parseConfig('associativity: middle')).toThrow(
        "Invalid configuration: associativity must be 'right' or 'left'"
      );
    });

    it('rejects an invalid format', () => {
      expect(() => parseConfig('format: xml')).toThrow(
        "Invalid configuration: format must be 'text' or 'json'"
      );
    });

    it('rejects a non-boolean trace', () => {
      expect(() => parseConfig('trace: 1')).toThrow(
        'Invalid configuration: trace must be a boolean'
      );
    });

    it('rejects a document that is not a mapping', () => {
      expect(() => parseConfig('- a\n- b')).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects malformed YAML', () => {
      expect(() => parseConfig('a: [1')).toThrow(
        'Invalid configuration: invalid YAML'
      );
    });

    it('throws ConfigError with the offending key', () => {
      try {
        parseConfig('format: 3');
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.code).toBe('CONFIG_INVALID');
          expect(err.context).toEqual({ key: 'format', value: 3 });
        }
      }
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sable-config-test-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('returns the defaults when no file exists', () => {
      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
    });

    it('reads .sable.yaml from the directory', async () => {
      await fs.writeFile(
        path.join(tempDir, '.sable.yaml'),
        'format: json\n',
        'utf-8'
      );
      expect(loadConfig(tempDir)).toEqual({
        associativity: 'right',
        format: 'json',
        trace: false,
      });
    });
  });
});
