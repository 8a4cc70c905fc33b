#!/usr/bin/env node
/**
 * kiln-check: report template syntax errors
 *
 * Usage:
 *   kiln-check [--format text|json] [--verbose] <file>
 *   kiln-check --explain KILN-P001
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  ERROR_REGISTRY,
  LexerError,
  parse,
  ParseError,
  type Environment,
} from '@kiln/core';
import { createEnvironmentFromConfig, loadConfig } from './config.js';
import { explainError } from './cli-explain.js';
import {
  detectHelpVersionFlag,
  EXIT_FILE,
  EXIT_OK,
  EXIT_SYNTAX,
  EXIT_USAGE,
  formatError,
  splitArgs,
  toError,
  VERSION,
} from './cli-shared.js';

// ============================================================
// ARGUMENTS
// ============================================================

export type CheckFormat = 'text' | 'json';

export type CheckArgs =
  | { mode: 'check'; file: string; format: CheckFormat; verbose: boolean }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' }
  | { mode: 'version' };

const USAGE = `Usage:
  kiln-check [options] <file>   Check a template for syntax errors
  kiln-check --help             Show this help message
  kiln-check --version          Show version information
  kiln-check --explain <id>     Show documentation for an error ID

Options:
  --format <format>   Output format: text, json (default: text)
  --verbose           Show the source line and a suggested fix

Exit codes:
  0  template is valid
  1  usage or configuration error
  2  file could not be read
  3  template has a syntax error`;

/**
 * Parse command-line arguments for kiln-check.
 *
 * @throws Error on unknown flags, a bad --format value or a missing file
 */
export function parseCheckArgs(argv: readonly string[]): CheckArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) return flag;

  const { options, positional } = splitArgs(
    argv,
    ['--format', '--explain'],
    ['--verbose']
  );

  const errorId = options.get('--explain');
  if (typeof errorId === 'string') {
    return { mode: 'explain', errorId };
  }

  const format = options.get('--format') ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new Error(
      `Invalid --format value: ${String(format)}. Must be one of: text, json`
    );
  }

  const [file, ...extra] = positional;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }

  return { mode: 'check', file, format, verbose: options.has('--verbose') };
}

// ============================================================
// CHECKING
// ============================================================

export type TemplateError = LexerError | ParseError;

/** Parse `source`; returns the first syntax error, or null when valid */
export function checkSource(
  source: string,
  file: string,
  environment: Environment
): TemplateError | null {
  try {
    parse(source, { environment, filename: file });
    return null;
  } catch (err) {
    if (err instanceof LexerError || err instanceof ParseError) {
      return err;
    }
    throw err;
  }
}

/** `file:line:col: error: message (KILN-P001)` */
export function formatDiagnostic(error: TemplateError): string {
  const { line, column } = error.location;
  const file = error.filename ?? '<template>';
  return `${file}:${line}:${column}: error: ${error.toData().message} (${error.errorId})`;
}

export interface CheckReportError {
  readonly errorId: string;
  readonly message: string;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface CheckReport {
  readonly file: string;
  readonly valid: boolean;
  readonly errors: CheckReportError[];
}

export function createReport(
  file: string,
  error: TemplateError | null
): CheckReport {
  if (error === null) {
    return { file, valid: true, errors: [] };
  }
  return {
    file,
    valid: false,
    errors: [
      {
        errorId: error.errorId,
        message: error.toData().message,
        line: error.location.line,
        column: error.location.column,
        offset: error.location.offset,
      },
    ],
  };
}

// ============================================================
// MAIN
// ============================================================

/**
 * Run kiln-check. Configuration is read from `cwd`, and `file` is resolved
 * against it.
 *
 * @returns Process exit code
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Promise<number> {
  let args: CheckArgs;
  try {
    args = parseCheckArgs(argv);
  } catch (err) {
    console.error(toError(err).message);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (args.mode === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (args.mode === 'version') {
    console.log(VERSION);
    return EXIT_OK;
  }
  if (args.mode === 'explain') {
    const documentation = explainError(args.errorId);
    if (documentation === null) {
      console.error(`Unknown error ID: ${args.errorId}`);
      console.error('Error IDs look like KILN-L001 or KILN-P001');
      return EXIT_USAGE;
    }
    console.log(documentation);
    return EXIT_OK;
  }

  let environment: Environment;
  try {
    environment = createEnvironmentFromConfig(loadConfig(cwd));
  } catch (err) {
    console.error(toError(err).message);
    return EXIT_USAGE;
  }

  let source: string;
  try {
    source = await fs.readFile(path.resolve(cwd, args.file), 'utf-8');
  } catch (err) {
    console.error(formatError(toError(err)));
    return EXIT_FILE;
  }

  const error = checkSource(source, args.file, environment);

  if (args.format === 'json') {
    console.log(JSON.stringify(createReport(args.file, error), null, 2));
  } else if (error !== null) {
    console.error(formatDiagnostic(error));
    if (args.verbose) {
      console.error(formatError(error, source));
      const resolution = ERROR_REGISTRY.get(error.errorId)?.resolution;
      if (resolution !== undefined) {
        console.error(`   = help: ${resolution}`);
      }
    }
  }

  return error === null ? EXIT_OK : EXIT_SYNTAX;
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' && !process.env['VITEST'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(toError(err).message);
      process.exitCode = EXIT_USAGE;
    }
  );
}
