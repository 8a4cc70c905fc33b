/**
 * Parser Helpers
 * Token sets, assignment target validation and error construction
 * @internal This module contains internal parser utilities
 */

import type {
  AssignTarget,
  ExprContext,
  ExpressionNode,
} from '../ast-nodes.js';
import { createError, ParseError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { ParserState } from './state.js';

// ============================================================
// TOKEN SETS
// ============================================================

/** Tokens that end a print statement's expression list */
export const STATEMENT_END_TYPES: readonly TokenType[] = [
  TOKEN_TYPES.VARIABLE_END,
  TOKEN_TYPES.BLOCK_END,
  TOKEN_TYPES.IN,
];

/** Tokens at which a tuple stops collecting items */
export const TUPLE_EDGE_TYPES: readonly TokenType[] = [
  TOKEN_TYPES.RPAREN,
  ...STATEMENT_END_TYPES,
];

/** Tokens that may start the bare argument of a test (`x is divisibleby 3`) */
export const TEST_ARGUMENT_TYPES: readonly TokenType[] = [
  TOKEN_TYPES.NAME,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.INTEGER,
  TOKEN_TYPES.FLOAT,
  TOKEN_TYPES.LBRACKET,
  TOKEN_TYPES.LBRACE,
];

/** Names that parse as constants and can never be assigned */
export const CONSTANT_NAMES: ReadonlyMap<string, boolean | null> = new Map([
  ['true', true],
  ['false', false],
  ['none', null],
]);

/**
 * Value of an INTEGER token. Literals beyond the safe integer range
 * stay exact as a bigint.
 */
export function integerValue(text: string): number | bigint {
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : BigInt(text);
}

// ============================================================
// ASSIGNMENT TARGETS
// ============================================================

export function canAssignName(name: string): boolean {
  return !CONSTANT_NAMES.has(name);
}

/** Whether `expr` may be written to: a name, subscript, or tuple of those */
export function canAssign(expr: ExpressionNode): boolean {
  switch (expr.type) {
    case 'Name':
      return canAssignName(expr.name);
    case 'Tuple':
      return expr.items.every(canAssign);
    case 'Subscript':
      return true;
    case 'Const':
    case 'List':
    case 'Dict':
    case 'BinaryExpr':
    case 'UnaryExpr':
    case 'Compare':
    case 'CondExpr':
    case 'Slice':
    case 'Call':
    case 'Filter':
    case 'Test':
      return false;
  }
}

/**
 * Copy of `expr` carrying `ctx`, or null when it cannot be assigned.
 * Tuple items are converted recursively; the object of a subscript keeps
 * its `load` context.
 */
export function toTarget(
  expr: ExpressionNode,
  ctx: ExprContext
): AssignTarget | null {
  switch (expr.type) {
    case 'Name':
      return canAssignName(expr.name) ? { ...expr, ctx } : null;
    case 'Subscript':
      return { ...expr, ctx };
    case 'Tuple': {
      const items: AssignTarget[] = [];
      for (const item of expr.items) {
        const target = toTarget(item, ctx);
        if (target === null) return null;
        items.push(target);
      }
      return { ...expr, items, ctx };
    }
    default:
      return null;
  }
}

/** Node kind used in "Cannot assign to" messages, e.g. `const` or `add` */
export function targetKind(expr: ExpressionNode): string {
  switch (expr.type) {
    case 'BinaryExpr':
    case 'UnaryExpr':
      return expr.op;
    case 'Name':
      return expr.name;
    default:
      return expr.type.toLowerCase();
  }
}

// ============================================================
// ERRORS
// ============================================================

/** Registry-backed parse error carrying the state's filename */
export function parseError(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): ParseError {
  const error = createError(errorId, context, location, state.filename);
  if (error instanceof ParseError) return error;
  throw new TypeError(`Expected parse error ID, got: ${errorId}`);
}
