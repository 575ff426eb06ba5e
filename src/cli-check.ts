#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for sable-check.
 * Parses and type-checks a Sable source file.
 */

import { readFile } from 'node:fs/promises';
import { loadConfig } from './config.js';
import type { OutputFormat, SableConfig } from './config.js';
import {
  checkSource,
  createTraceObservability,
  formatError,
  formatResult,
  readVersion,
} from './cli-shared.js';
import { SableError } from './types.js';

/**
 * Parsed command-line arguments for sable-check.
 * `format` and `trace` are absent when the flag was not given.
 */
export type ParsedCheckArgs =
  | {
      mode: 'check';
      file: string;
      format?: OutputFormat;
      trace?: boolean;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const HELP_TEXT = `sable-check - Parse and type-check Sable programs

Usage: sable-check [options] <file>

Options:
  --format <fmt>  Output format: text (default) or json
  --trace         Print scope and function events to stderr
  -h, --help      Show this help message
  -v, --version   Show version number`;

/**
 * Parse command-line arguments for sable-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let trace: boolean | undefined;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = argv[i + 1];
      if (value === 'text' || value === 'json') {
        format = value;
      } else if (!value || value.startsWith('-')) {
        throw new Error('--format requires argument: text or json');
      } else {
        throw new Error(`Invalid format: ${value}. Expected text or json`);
      }
      i++; // Skip the format value
      continue;
    }

    if (arg === '--trace') {
      trace = true;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    // First non-flag argument is the file
    file ??= arg;
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  const args: ParsedCheckArgs = { mode: 'check', file };
  if (format !== undefined) args.format = format;
  if (trace !== undefined) args.trace = trace;
  return args;
}

/** Flags given on the command line win over the config file */
export function resolveSettings(
  args: { format?: OutputFormat; trace?: boolean },
  config: SableConfig
): SableConfig {
  return {
    associativity: config.associativity,
    format: args.format ?? config.format,
    trace: args.trace ?? config.trace,
  };
}

/** Output sinks, injectable for tests */
export interface CheckIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

/**
 * Check one source text and report the outcome.
 *
 * @returns Exit code: 0 when the program is well typed, 1 on a diagnostic
 */
export function reportCheck(
  source: string,
  settings: SableConfig,
  io: CheckIO
): number {
  const observability = settings.trace
    ? createTraceObservability(io.err)
    : undefined;
  const result = checkSource(source, {
    associativity: settings.associativity,
    observability,
  });
  io.out(formatResult(result, settings.format));
  return result.ok ? 0 : 1;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for sable-check CLI.
 * Orchestrates argument parsing, configuration, file reading, and output.
 */
async function main(): Promise<void> {
  const io: CheckIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  };

  let args: ParsedCheckArgs;
  try {
    args = parseCheckArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(2);
  }

  if (args.mode === 'help') {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (args.mode === 'version') {
    console.log(await readVersion());
    process.exit(0);
  }

  let settings: SableConfig;
  try {
    settings = resolveSettings(args, loadConfig(process.cwd()));
  } catch (err) {
    if (err instanceof SableError) {
      console.error(formatError(err));
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(2);
  }

  let source: string;
  try {
    source = await readFile(args.file, 'utf-8');
  } catch (err) {
    const code =
      err instanceof Error && 'code' in err ? String(err.code) : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${args.file}`);
    } else if (code === 'EISDIR') {
      console.error(`Error: Path is a directory: ${args.file}`);
    } else {
      console.error(`Error: Cannot read file: ${args.file}`);
    }
    process.exit(2);
  }

  process.exit(reportCheck(source, settings, io));
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
