/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';

/** Two-character operator lookup table (checked before single characters) */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '//': TOKEN_TYPES.FLOORDIV,
  '**': TOKEN_TYPES.POW,
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LTEQ,
  '>=': TOKEN_TYPES.GTEQ,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> = {
  '+': TOKEN_TYPES.ADD,
  '-': TOKEN_TYPES.SUB,
  '*': TOKEN_TYPES.MUL,
  '/': TOKEN_TYPES.DIV,
  '%': TOKEN_TYPES.MOD,
  '~': TOKEN_TYPES.TILDE,
  '|': TOKEN_TYPES.PIPE,
  '.': TOKEN_TYPES.DOT,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
};

/** Closing bracket type for each opening bracket type */
export const BRACKET_PAIRS: Readonly<Partial<Record<TokenType, TokenType>>> = {
  [TOKEN_TYPES.LPAREN]: TOKEN_TYPES.RPAREN,
  [TOKEN_TYPES.LBRACKET]: TOKEN_TYPES.RBRACKET,
  [TOKEN_TYPES.LBRACE]: TOKEN_TYPES.RBRACE,
};

export function lookupOperator(
  table: Readonly<Record<string, TokenType>>,
  text: string
): TokenType | undefined {
  return Object.hasOwn(table, text) ? table[text] : undefined;
}
