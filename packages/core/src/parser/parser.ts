/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 *
 * - parser-template.ts: data/tag loop and the template root
 * - parser-statements.ts: statement dispatch, assignment, simple tags
 * - parser-control.ts: for loops and if chains
 * - parser-functions.ts: macros, call and filter blocks, call arguments
 * - parser-expr.ts: the operator precedence chain and tuples
 * - parser-literals.ts: list and dict literals
 * - parser-postfix.ts: attribute access, subscripts, calls, filters, tests
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source), { filename: 'page.html' });
 * const ast = parser.parse();
 * ```
 */

import type { TemplateNode } from '../ast-nodes.js';
import { createEnvironment, type Environment } from '../environment.js';
import { createExtensionTable, type Extension } from '../extensions.js';
import type { Token } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

export interface ParserOptions {
  readonly environment?: Environment | undefined;
  readonly filename?: string | undefined;
}

export class Parser {
  /** Token stream and position; extensions navigate it with the state functions */
  state: ParserState;
  readonly environment: Environment;
  /** Extension by tag, fixed at construction */
  readonly extensions: ReadonlyMap<string, Extension>;

  constructor(tokens: readonly Token[], options: ParserOptions = {}) {
    this.state = createParserState(tokens, options.filename);
    this.environment = options.environment ?? createEnvironment();
    this.extensions = createExtensionTable(this.environment.extensions);
  }

  get filename(): string | undefined {
    return this.state.filename;
  }

  /**
   * Parse tokens into a complete template AST.
   * Throws ParseError on the first syntax error.
   */
  parse(): TemplateNode {
    return this.parseTemplate();
  }
}
