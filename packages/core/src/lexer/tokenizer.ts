/**
 * Tokenizer
 * Splits template source into data, tag and expression tokens
 */

import { createEnvironment, type Environment } from '../environment.js';
import { createError } from '../error-classes.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advanceAndMakeToken,
  escapeRegExp,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  BRACKET_PAIRS,
  lookupOperator,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readName, readNumber, readString } from './readers.js';
import {
  advance,
  advanceBy,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  startsWith,
} from './state.js';

// ============================================================
// TAG SYNTAX
// ============================================================

type OpenerKind = 'variable' | 'block' | 'comment';

interface TagSyntax {
  readonly open: string;
  readonly close: string;
  readonly beginType: TokenType;
  readonly endType: TokenType;
  /** Used in "Unclosed ..." messages */
  readonly construct: string;
}

interface TemplateSyntax {
  readonly openers: readonly { kind: OpenerKind; delimiter: string }[];
  readonly variable: TagSyntax;
  readonly block: TagSyntax;
  readonly rawOpen: RegExp;
  readonly rawClose: RegExp;
}

function createTemplateSyntax(environment: Environment): TemplateSyntax {
  const blockStart = escapeRegExp(environment.blockStart);
  const blockEnd = escapeRegExp(environment.blockEnd);
  const openers: { kind: OpenerKind; delimiter: string }[] = [
    { kind: 'variable', delimiter: environment.variableStart },
    { kind: 'block', delimiter: environment.blockStart },
    { kind: 'comment', delimiter: environment.commentStart },
  ];
  // Longest delimiter wins when one is a prefix of another
  openers.sort((a, b) => b.delimiter.length - a.delimiter.length);

  return {
    openers,
    variable: {
      open: environment.variableStart,
      close: environment.variableEnd,
      beginType: TOKEN_TYPES.VARIABLE_BEGIN,
      endType: TOKEN_TYPES.VARIABLE_END,
      construct: 'variable tag',
    },
    block: {
      open: environment.blockStart,
      close: environment.blockEnd,
      beginType: TOKEN_TYPES.BLOCK_BEGIN,
      endType: TOKEN_TYPES.BLOCK_END,
      construct: 'block tag',
    },
    rawOpen: new RegExp(`${blockStart}\\s*raw\\s*${blockEnd}`, 'y'),
    rawClose: new RegExp(`${blockStart}\\s*endraw\\s*${blockEnd}`, 'g'),
  };
}

function matchOpener(state: LexerState, syntax: TemplateSyntax): OpenerKind | null {
  for (const opener of syntax.openers) {
    if (startsWith(state, opener.delimiter)) {
      return opener.kind;
    }
  }
  return null;
}

// ============================================================
// TEMPLATE DATA
// ============================================================

function readData(state: LexerState, syntax: TemplateSyntax): Token | null {
  const start = currentLocation(state);
  let value = '';
  while (!isAtEnd(state) && matchOpener(state, syntax) === null) {
    value += advance(state);
  }
  if (value.length === 0) {
    return null;
  }
  return makeToken(TOKEN_TYPES.DATA, value, start, currentLocation(state));
}

function skipComment(state: LexerState): void {
  const start = currentLocation(state);
  const { commentStart, commentEnd } = state.delimiters;
  const close = state.source.indexOf(commentEnd, state.pos + commentStart.length);
  if (close === -1) {
    throw createError(
      'KILN-L003',
      { construct: 'comment', expected: `'${commentEnd}'` },
      start,
      state.filename
    );
  }
  advanceBy(state, close + commentEnd.length - state.pos);
}

/**
 * Consume `{% raw %}...{% endraw %}` if it starts here.
 * Returns the enclosed text as a DATA token, `null` for empty raw blocks,
 * or `undefined` when the block tag is not a raw tag.
 */
function readRaw(
  state: LexerState,
  syntax: TemplateSyntax
): Token | null | undefined {
  syntax.rawOpen.lastIndex = state.pos;
  const open = syntax.rawOpen.exec(state.source);
  if (open === null) {
    return undefined;
  }

  const tagStart = currentLocation(state);
  advanceBy(state, open[0].length);

  syntax.rawClose.lastIndex = state.pos;
  const close = syntax.rawClose.exec(state.source);
  if (close === null) {
    const { blockStart, blockEnd } = state.delimiters;
    throw createError(
      'KILN-L003',
      {
        construct: 'raw block',
        expected: `'${blockStart} endraw ${blockEnd}'`,
      },
      tagStart,
      state.filename
    );
  }

  const start = currentLocation(state);
  const value = advanceBy(state, close.index - state.pos);
  const end = currentLocation(state);
  advanceBy(state, close[0].length);

  return value.length > 0
    ? makeToken(TOKEN_TYPES.DATA, value, start, end)
    : null;
}

// ============================================================
// TAG CONTENTS
// ============================================================

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Read one expression token inside a tag.
 * `previous` is the type of the token before it, if any.
 */
export function nextToken(
  state: LexerState,
  previous: TokenType | undefined
): Token {
  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state, previous !== TOKEN_TYPES.DOT);
  }

  if (isIdentifierStart(ch)) {
    return readName(state);
  }

  const twoCharType = lookupOperator(TWO_CHAR_OPERATORS, peekString(state, 2));
  if (twoCharType !== undefined) {
    return advanceAndMakeToken(state, 2, twoCharType, start);
  }

  const singleCharType = lookupOperator(SINGLE_CHAR_OPERATORS, ch);
  if (singleCharType !== undefined) {
    return advanceAndMakeToken(state, 1, singleCharType, start);
  }

  throw createError('KILN-L002', { char: `'${ch}'` }, start, state.filename);
}

/** Push opening brackets, pop on the matching closer */
function trackBrackets(open: TokenType[], type: TokenType): void {
  const closer = BRACKET_PAIRS[type];
  if (closer !== undefined) {
    open.push(closer);
  } else if (open.length > 0 && open[open.length - 1] === type) {
    open.pop();
  }
}

function readTag(state: LexerState, tag: TagSyntax, tokens: Token[]): void {
  const tagStart = currentLocation(state);
  tokens.push(
    advanceAndMakeToken(state, tag.open.length, tag.beginType, tagStart)
  );

  // The end delimiter only counts once every bracket opened here is closed
  const openBrackets: TokenType[] = [];
  for (;;) {
    skipWhitespace(state);
    if (isAtEnd(state)) {
      throw createError(
        'KILN-L003',
        { construct: tag.construct, expected: `'${tag.close}'` },
        tagStart,
        state.filename
      );
    }

    const start = currentLocation(state);
    if (openBrackets.length === 0 && startsWith(state, tag.close)) {
      tokens.push(
        advanceAndMakeToken(state, tag.close.length, tag.endType, start)
      );
      return;
    }

    const token = nextToken(state, tokens[tokens.length - 1]?.type);
    trackBrackets(openBrackets, token.type);
    tokens.push(token);
  }
}

// ============================================================
// ENTRY POINT
// ============================================================

export interface TokenizeOptions {
  readonly environment?: Environment | undefined;
  readonly filename?: string | undefined;
}

/**
 * Tokenize template source. The result always ends with an EOF token.
 *
 * @throws LexerError on unterminated strings, unknown characters inside
 * tags, and unclosed tags or comments
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const environment = options.environment ?? createEnvironment();
  const syntax = createTemplateSyntax(environment);
  const state = createLexerState(source, environment, options.filename);
  const tokens: Token[] = [];

  while (!isAtEnd(state)) {
    const data = readData(state, syntax);
    if (data !== null) {
      tokens.push(data);
    }

    switch (matchOpener(state, syntax)) {
      case null:
        break;
      case 'comment':
        skipComment(state);
        break;
      case 'block': {
        const raw = readRaw(state, syntax);
        if (raw === undefined) {
          readTag(state, syntax.block, tokens);
        } else if (raw !== null) {
          tokens.push(raw);
        }
        break;
      }
      case 'variable':
        readTag(state, syntax.variable, tokens);
        break;
    }
  }

  const end = currentLocation(state);
  tokens.push(makeToken(TOKEN_TYPES.EOF, '', end, end));
  return tokens;
}

/**
 * Tokenize a bare expression, as if it were the contents of a variable tag.
 * No begin/end tokens are emitted; the result ends with an EOF token.
 */
export function tokenizeExpression(
  source: string,
  options: TokenizeOptions = {}
): Token[] {
  const environment = options.environment ?? createEnvironment();
  const state = createLexerState(source, environment, options.filename);
  const tokens: Token[] = [];

  for (;;) {
    skipWhitespace(state);
    if (isAtEnd(state)) break;
    tokens.push(nextToken(state, tokens[tokens.length - 1]?.type));
  }

  const end = currentLocation(state);
  tokens.push(makeToken(TOKEN_TYPES.EOF, '', end, end));
  return tokens;
}
