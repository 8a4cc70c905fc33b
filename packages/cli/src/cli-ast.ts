#!/usr/bin/env node
/**
 * kiln-ast: print the syntax tree of a template
 *
 * Usage:
 *   kiln-ast [--format json|yaml] <file>
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'yaml';
import {
  LexerError,
  parse,
  ParseError,
  type Environment,
  type SourceSpan,
  type StatementNode,
  type TemplateNode,
} from '@kiln/core';
import { createEnvironmentFromConfig, loadConfig } from './config.js';
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

export type AstFormat = 'json' | 'yaml';

export type AstArgs =
  | { mode: 'ast'; file: string; format: AstFormat }
  | { mode: 'help' }
  | { mode: 'version' };

const USAGE = `Usage:
  kiln-ast [options] <file>   Print the syntax tree of a template
  kiln-ast --help             Show this help message
  kiln-ast --version          Show version information

Options:
  --format <format>   Output format: json, yaml (default: json)`;

/**
 * @throws Error on unknown flags, a bad --format value or a missing file
 */
export function parseAstArgs(argv: readonly string[]): AstArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) return flag;

  const { options, positional } = splitArgs(argv, ['--format'], []);

  const format = options.get('--format') ?? 'json';
  if (format !== 'json' && format !== 'yaml') {
    throw new Error(
      `Invalid --format value: ${String(format)}. Must be one of: json, yaml`
    );
  }

  const [file, ...extra] = positional;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }

  return { mode: 'ast', file, format };
}

/** Template root without its environment */
export interface SerializedTemplate {
  readonly type: 'Template';
  readonly body: StatementNode[];
  readonly span: SourceSpan;
}

/** JSON has no bigint; large integer constants are written as decimal strings */
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function serializeTemplate(
  template: TemplateNode,
  format: AstFormat
): string {
  const tree: SerializedTemplate = {
    type: template.type,
    body: template.body,
    span: template.span,
  };
  if (format === 'yaml') {
    return yaml.stringify(tree);
  }
  return JSON.stringify(tree, bigintReplacer, 2);
}

/**
 * Run kiln-ast. Configuration is read from `cwd`, and `file` is resolved
 * against it.
 *
 * @returns Process exit code
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Promise<number> {
  let args: AstArgs;
  try {
    args = parseAstArgs(argv);
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

  try {
    const template = parse(source, { environment, filename: args.file });
    console.log(serializeTemplate(template, args.format));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof LexerError || err instanceof ParseError) {
      console.error(formatError(err, source));
      return EXIT_SYNTAX;
    }
    throw err;
  }
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
