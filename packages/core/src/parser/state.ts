/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { ParseError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import {
  describeToken,
  describeTokenType,
  TOKEN_TYPES,
} from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
  /** Template name reported in errors */
  readonly filename: string | undefined;
}

export function createParserState(
  tokens: readonly Token[],
  filename?: string
): ParserState {
  if (tokens.length === 0) {
    throw new Error('Internal parser error: token stream is empty');
  }
  return { tokens, pos: 0, filename };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** Current token; past the end this is the final (EOF) token */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** Token `offset` positions ahead without consuming anything */
export function peek(state: ParserState, offset = 1): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('Internal parser error: token stream is empty');
}

export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** True when the current token has one of `types` */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** True when the current token is the plain name `value` */
export function checkName(state: ParserState, value: string): boolean {
  const token = current(state);
  return token.type === TOKEN_TYPES.NAME && token.value === value;
}

/** Consume and return the current token; EOF is never consumed */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Advance `count` tokens, returning the last one consumed */
export function skip(state: ParserState, count: number): Token {
  let token = current(state);
  for (let i = 0; i < count; i++) {
    token = advance(state);
  }
  return token;
}

/**
 * Consume a token of `type` or throw KILN-P001 at the current token.
 */
export function expect(state: ParserState, type: TokenType): Token {
  if (check(state, type)) return advance(state);
  throw unexpectedToken(state, [type]);
}

/** Consume the plain name `value` (e.g. `as`) or throw KILN-P001 */
export function expectName(state: ParserState, value: string): Token {
  if (checkName(state, value)) return advance(state);
  throw unexpectedToken(state, [], `'${value}'`);
}

/**
 * Build the KILN-P001 error for the current token.
 * `expectedText` overrides the description built from `types`.
 */
export function unexpectedToken(
  state: ParserState,
  types: readonly TokenType[],
  expectedText?: string
): ParseError {
  const token = current(state);
  const expected = expectedText ?? types.map(describeTokenType).join(' or ');
  const actual = describeToken(token);
  const template = ERROR_REGISTRY.get('KILN-P001')?.messageTemplate ?? '';
  const message = renderMessage(template, { expected, actual });
  const hint = generateHint(types, token);

  return new ParseError(
    'KILN-P001',
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, actual },
    state.filename
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

const UNCLOSED_HINTS: Partial<Record<TokenType, string>> = {
  [TOKEN_TYPES.RPAREN]: 'Hint: Check for unclosed parenthesis',
  [TOKEN_TYPES.RBRACKET]: 'Hint: Check for unclosed bracket',
  [TOKEN_TYPES.RBRACE]: 'Hint: Check for unclosed brace',
};

/** Tokens that end a tag or the template; a bracket cannot close after them */
const TAG_END_TYPES: readonly TokenType[] = [
  TOKEN_TYPES.VARIABLE_END,
  TOKEN_TYPES.BLOCK_END,
  TOKEN_TYPES.EOF,
];

function isEndTag(type: TokenType): boolean {
  return type.startsWith('END');
}

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expected: readonly TokenType[],
  actual: Token
): string | null {
  // Unclosed brackets/braces/parens
  if (TAG_END_TYPES.includes(actual.type)) {
    for (const type of expected) {
      const hint = UNCLOSED_HINTS[type];
      if (hint) return hint;
    }
  }

  // Block left open until the end of the template
  const endTags = expected.filter(isEndTag);
  if (endTags.length > 0 && actual.type === TOKEN_TYPES.EOF) {
    const names = endTags.map((type) => `'${type.toLowerCase()}'`);
    return `Hint: Check for a missing or misspelt ${names.join(' or ')} tag`;
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** End of the most recently consumed token */
export function previousEnd(state: ParserState): SourceLocation {
  const token = state.tokens[state.pos - 1] ?? current(state);
  return token.span.end;
}
