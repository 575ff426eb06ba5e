/**
 * CLI Shared Utilities
 * Checking pipeline and output formatting for CLI tools
 */

import { readFile } from 'node:fs/promises';
import { typeCheck } from './checker/index.js';
import type { CheckObservability } from './checker/index.js';
import type { OutputFormat } from './config.js';
import { parse } from './parser/index.js';
import type { Associativity, TypeName } from './types.js';
import {
  ConfigError,
  InternalError,
  ParseError,
  SableError,
  TypeCheckError,
} from './types.js';
import { LexerError } from './lexer/errors.js';

export interface CheckSourceOptions {
  readonly associativity?: Associativity | undefined;
  readonly observability?: CheckObservability | undefined;
}

export type CheckSourceResult =
  | { readonly ok: true; readonly type: TypeName }
  | { readonly ok: false; readonly error: SableError };

/**
 * Lex, parse, and type-check a source text.
 * Sable errors become a failed result; anything else propagates.
 */
export function checkSource(
  source: string,
  options: CheckSourceOptions = {}
): CheckSourceResult {
  try {
    const ast = parse(source, { associativity: options.associativity });
    const type = typeCheck(ast, undefined, {
      observability: options.observability,
    });
    return { ok: true, type };
  } catch (err) {
    if (err instanceof SableError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

function errorKind(err: SableError): string {
  if (err instanceof LexerError) return 'Lexer';
  if (err instanceof ParseError) return 'Parse';
  if (err instanceof TypeCheckError) return 'Type';
  if (err instanceof InternalError) return 'Internal';
  if (err instanceof ConfigError) return 'Config';
  return 'Sable';
}

/**
 * Format error for stderr output
 *
 * @returns `<Kind> error at <line>:<column>: <message>`, or without the
 *   position when the error has none
 */
export function formatError(err: SableError): string {
  const { message, location } = err.toData();
  const kind = errorKind(err);
  if (location) {
    return `${kind} error at ${location.line}:${location.column}: ${message}`;
  }
  return `${kind} error: ${message}`;
}

/** Render a check result in the requested output format */
export function formatResult(
  result: CheckSourceResult,
  format: OutputFormat
): string {
  if (format === 'json') {
    if (result.ok) {
      return JSON.stringify({ ok: true, type: result.type });
    }
    const data = result.error.toData();
    return JSON.stringify({
      ok: false,
      code: data.code,
      message: data.message,
      location: data.location ?? null,
    });
  }

  return result.ok ? `ok: ${result.type}` : formatError(result.error);
}

/** Observability callbacks that print one line per event */
export function createTraceObservability(
  write: (line: string) => void
): CheckObservability {
  return {
    onScopeEnter: ({ scopeId, depth }) =>
      write(`[scope] enter ${scopeId} (depth ${depth})`),
    onScopeLeave: ({ scopeId, depth }) =>
      write(`[scope] leave ${scopeId} (depth ${depth})`),
    onFunctionCheck: ({ name, trigger, returnType, inferred }) =>
      write(
        `[function] ${name} checked on ${trigger}: ${returnType}${inferred ? ' (inferred)' : ''}`
      ),
  };
}

/**
 * Read the package version from package.json
 */
export async function readVersion(): Promise<string> {
  const text = await readFile(
    new URL('../package.json', import.meta.url),
    'utf-8'
  );
  const pkg: unknown = JSON.parse(text);
  if (
    typeof pkg === 'object' &&
    pkg !== null &&
    'version' in pkg &&
    typeof pkg.version === 'string'
  ) {
    return pkg.version;
  }
  return '0.0.0';
}
