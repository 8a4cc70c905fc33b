/**
 * Token Readers
 * Functions to read specific token types from tag contents
 */

import { createError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { lookupKeyword, TOKEN_TYPES } from '../token-types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Unescape the character after a backslash; unknown escapes stay literal */
function processEscape(state: LexerState): string {
  const escaped = advance(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
    case '"':
    case "'":
      return escaped;
    default:
      return `\\${escaped}`;
  }
}

/** Read a single- or double-quoted string; the quote is the current char */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state);

  let value = '';
  while (!isAtEnd(state) && peek(state) !== quote) {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state)) break;
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw createError('KILN-L001', {}, start, state.filename);
  }
  advance(state); // closing quote

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * Read an integer or float. After a `.` only the integer part is read, so
 * `row.0.1` indexes twice instead of lexing `0.1`.
 */
export function readNumber(state: LexerState, allowFloat: boolean): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (allowFloat && peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
    return makeToken(TOKEN_TYPES.FLOAT, value, start, currentLocation(state));
  }

  return makeToken(TOKEN_TYPES.INTEGER, value, start, currentLocation(state));
}

export function readName(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = lookupKeyword(value) ?? TOKEN_TYPES.NAME;
  return makeToken(type, value, start, currentLocation(state));
}
