/**
 * Kiln Parser
 * Main entry point and re-exports
 */

import type { ExpressionNode, TemplateNode } from '../ast-nodes.js';
import {
  tokenize,
  tokenizeExpression,
  type TokenizeOptions,
} from '../lexer/index.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Parser } from './parser.js';
import { expect } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-template.js';
import './parser-statements.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-postfix.js';

export type ParseOptions = TokenizeOptions;

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse template source into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('Hello {{ user.name }}!', { filename: 'greeting.html' });
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): TemplateNode {
  const tokens = tokenize(source, options);
  const parser = new Parser(tokens, options);
  return parser.parse();
}

/**
 * Parse a standalone expression such as `user.name | upper`.
 * Comma separated expressions yield a Tuple.
 */
export function parseExpression(
  source: string,
  options: ParseOptions = {}
): ExpressionNode {
  const tokens = tokenizeExpression(source, options);
  const parser = new Parser(tokens, options);
  const expr = parser.parseTuple();
  expect(parser.state, TOKEN_TYPES.EOF);
  return expr;
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser, type ParserOptions } from './parser.js';
export type { TupleOptions } from './parser-expr.js';
export type { Signature } from './parser-functions.js';
export {
  advance,
  check,
  checkName,
  createParserState,
  current,
  expect,
  expectName,
  isAtEnd,
  peek,
  previousEnd,
  skip,
  type ParserState,
} from './state.js';
export { canAssign, toTarget } from './helpers.js';
