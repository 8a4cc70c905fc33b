/**
 * CLI Shared Utilities
 * Error formatting, flag detection and version lookup for kiln-check and kiln-ast
 */

import { readFileSync } from 'node:fs';
import {
  formatLocation,
  LexerError,
  ParseError,
  type KilnError,
} from '@kiln/core';

// ============================================================
// EXIT CODES
// ============================================================

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FILE = 2;
export const EXIT_SYNTAX = 3;

// ============================================================
// ERROR FORMATTING
// ============================================================

/** Registry message without the trailing ` at line:column` */
function baseMessage(err: KilnError): string {
  return err.toData().message;
}

/**
 * Source line of the error with a caret under its column.
 *
 * ```
 *    |
 *  1 | {{ a b }}
 *    |      ^
 * ```
 */
export function formatSnippet(
  source: string,
  line: number,
  column: number
): string[] {
  const content = source.split(/\r?\n/)[line - 1];
  if (content === undefined) {
    return [];
  }

  const lineNumber = String(line);
  const gutter = ' '.repeat(lineNumber.length);
  const caretColumn = Math.min(column, content.length + 1);
  return [
    ` ${gutter} |`,
    ` ${lineNumber} | ${content}`,
    ` ${gutter} | ${' '.repeat(caretColumn - 1)}^`,
  ];
}

/**
 * Format an error for stderr.
 *
 * With source text, lexer and parse errors get a header, location and
 * snippet. Without it, a single line naming the error kind.
 */
export function formatError(err: Error, source?: string): string {
  if (err instanceof LexerError || err instanceof ParseError) {
    const { location } = err;

    if (source !== undefined) {
      const file = err.filename ?? '<template>';
      return [
        `error[${err.errorId}]: ${baseMessage(err)}`,
        `  --> ${file}:${formatLocation(location)}`,
        ...formatSnippet(source, location.line, location.column),
      ].join('\n');
    }

    const kind = err instanceof LexerError ? 'Lexer' : 'Parse';
    return `${kind} error at line ${location.line}: ${baseMessage(err)}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Normalise a thrown value to an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ============================================================
// FLAGS
// ============================================================

/**
 * Detect help or version flags in any position.
 * Help takes precedence over version.
 */
export function detectHelpVersionFlag(
  argv: readonly string[]
): { mode: 'help' | 'version' } | null {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

/**
 * Split `argv` into option values and positional arguments.
 * `valueFlags` take the next argument; `booleanFlags` take none.
 *
 * @throws Error on unknown flags or a value flag without a value
 */
export function splitArgs(
  argv: readonly string[],
  valueFlags: readonly string[],
  booleanFlags: readonly string[]
): { options: Map<string, string | true>; positional: string[] } {
  const options = new Map<string, string | true>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (valueFlags.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      options.set(arg, value);
      i++;
    } else if (booleanFlags.includes(arg)) {
      options.set(arg, true);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  return { options, positional };
}

// ============================================================
// VERSION
// ============================================================

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

/** Version of the CLI package */
export const VERSION = readVersion();
