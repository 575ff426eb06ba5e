/**
 * Configuration Loader for sable-check
 * Loads and validates .sable.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { Associativity } from './types.js';
import { ConfigError } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.sable.yaml';

export type OutputFormat = 'text' | 'json';

export interface SableConfig {
  /** Grouping of same-tier operators */
  readonly associativity: Associativity;
  /** CLI output format */
  readonly format: OutputFormat;
  /** Print scope and function events to stderr */
  readonly trace: boolean;
}

export const DEFAULT_CONFIG: SableConfig = {
  associativity: 'right',
  format: 'text',
  trace: false,
};

// ============================================================
// VALIDATION
// ============================================================

function isAssociativity(value: unknown): value is Associativity {
  return value === 'right' || value === 'left';
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const KNOWN_KEYS = new Set(['associativity', 'format', 'trace']);

/**
 * Validate parsed YAML and merge it over the defaults.
 * Throws ConfigError naming the offending key.
 */
function validateConfig(data: unknown): SableConfig {
  // Empty document
  if (data === null || data === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(data)) {
    throw new ConfigError('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`Invalid configuration: unknown key ${key}`, {
        key,
      });
    }
  }

  const { associativity, format, trace } = data;

  if (associativity !== undefined && !isAssociativity(associativity)) {
    throw new ConfigError(
      `Invalid configuration: associativity must be 'right' or 'left'`,
      { key: 'associativity', value: associativity }
    );
  }
  if (format !== undefined && !isOutputFormat(format)) {
    throw new ConfigError(
      `Invalid configuration: format must be 'text' or 'json'`,
      { key: 'format', value: format }
    );
  }
  if (trace !== undefined && typeof trace !== 'boolean') {
    throw new ConfigError('Invalid configuration: trace must be a boolean', {
      key: 'trace',
      value: trace,
    });
  }

  return {
    associativity: associativity ?? DEFAULT_CONFIG.associativity,
    format: format ?? DEFAULT_CONFIG.format,
    trace: trace ?? DEFAULT_CONFIG.trace,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse and validate configuration text.
 *
 * @throws ConfigError on invalid YAML or invalid values
 */
export function parseConfig(text: string): SableConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsed);
}

/**
 * Load configuration from .sable.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Validated configuration, or the defaults if no file exists
 */
export function loadConfig(cwd: string): SableConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Missing file is not an error
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(fileContent);
}
