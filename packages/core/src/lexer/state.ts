/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { Delimiters } from '../environment.js';
import type { SourceLocation } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  readonly delimiters: Delimiters;
  readonly filename: string | undefined;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(
  source: string,
  delimiters: Delimiters,
  filename?: string
): LexerState {
  return {
    source,
    delimiters,
    filename,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos,
  };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Advance n characters and return the text passed over */
export function advanceBy(state: LexerState, n: number): string {
  let text = '';
  for (let i = 0; i < n && !isAtEnd(state); i++) {
    text += advance(state);
  }
  return text;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}
