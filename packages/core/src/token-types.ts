import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Template structure
  DATA: 'DATA', // literal text outside tags
  VARIABLE_BEGIN: 'VARIABLE_BEGIN', // {{
  VARIABLE_END: 'VARIABLE_END', // }}
  BLOCK_BEGIN: 'BLOCK_BEGIN', // {%
  BLOCK_END: 'BLOCK_END', // %}

  // Literals
  NAME: 'NAME',
  STRING: 'STRING',
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',

  // Arithmetic operators
  ADD: 'ADD', // +
  SUB: 'SUB', // -
  MUL: 'MUL', // *
  DIV: 'DIV', // /
  FLOORDIV: 'FLOORDIV', // //
  MOD: 'MOD', // %
  POW: 'POW', // **
  TILDE: 'TILDE', // ~ (string concatenation)

  // Punctuation
  PIPE: 'PIPE', // |
  DOT: 'DOT', // .
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;
  ASSIGN: 'ASSIGN', // =

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  LTEQ: 'LTEQ', // <=
  GT: 'GT', // >
  GTEQ: 'GTEQ', // >=

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // Operator keywords
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',
  IN: 'IN',
  IS: 'IS',

  // Statement keywords
  IF: 'IF',
  ELIF: 'ELIF',
  ELSE: 'ELSE',
  ENDIF: 'ENDIF',
  FOR: 'FOR',
  ENDFOR: 'ENDFOR',
  BLOCK: 'BLOCK',
  ENDBLOCK: 'ENDBLOCK',
  EXTENDS: 'EXTENDS',
  INCLUDE: 'INCLUDE',
  IMPORT: 'IMPORT',
  FROM: 'FROM',
  MACRO: 'MACRO',
  ENDMACRO: 'ENDMACRO',
  CALL: 'CALL',
  ENDCALL: 'ENDCALL',
  FILTER: 'FILTER',
  ENDFILTER: 'ENDFILTER',
  PRINT: 'PRINT',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Identifier text, unescaped string contents, number text or raw data */
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// KEYWORDS
// ============================================================

/**
 * Reserved words lexed as their own token types.
 * `true`, `false`, `none` and `as` stay plain names.
 */
export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
  in: TOKEN_TYPES.IN,
  is: TOKEN_TYPES.IS,
  if: TOKEN_TYPES.IF,
  elif: TOKEN_TYPES.ELIF,
  else: TOKEN_TYPES.ELSE,
  endif: TOKEN_TYPES.ENDIF,
  for: TOKEN_TYPES.FOR,
  endfor: TOKEN_TYPES.ENDFOR,
  block: TOKEN_TYPES.BLOCK,
  endblock: TOKEN_TYPES.ENDBLOCK,
  extends: TOKEN_TYPES.EXTENDS,
  include: TOKEN_TYPES.INCLUDE,
  import: TOKEN_TYPES.IMPORT,
  from: TOKEN_TYPES.FROM,
  macro: TOKEN_TYPES.MACRO,
  endmacro: TOKEN_TYPES.ENDMACRO,
  call: TOKEN_TYPES.CALL,
  endcall: TOKEN_TYPES.ENDCALL,
  filter: TOKEN_TYPES.FILTER,
  endfilter: TOKEN_TYPES.ENDFILTER,
  print: TOKEN_TYPES.PRINT,
};

/** Keyword token type for `name`, or undefined for a plain name */
export function lookupKeyword(name: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, name) ? KEYWORDS[name] : undefined;
}

// ============================================================
// TOKEN DESCRIPTIONS
// ============================================================

const TYPE_DESCRIPTIONS: Partial<Record<TokenType, string>> = {
  DATA: 'template data',
  VARIABLE_BEGIN: 'begin of print statement',
  VARIABLE_END: 'end of print statement',
  BLOCK_BEGIN: 'begin of statement block',
  BLOCK_END: 'end of statement block',
  NAME: 'name',
  STRING: 'string',
  INTEGER: 'integer',
  FLOAT: 'float',
  ADD: "'+'",
  SUB: "'-'",
  MUL: "'*'",
  DIV: "'/'",
  FLOORDIV: "'//'",
  MOD: "'%'",
  POW: "'**'",
  TILDE: "'~'",
  PIPE: "'|'",
  DOT: "'.'",
  COMMA: "','",
  COLON: "':'",
  SEMICOLON: "';'",
  ASSIGN: "'='",
  EQ: "'=='",
  NE: "'!='",
  LT: "'<'",
  LTEQ: "'<='",
  GT: "'>'",
  GTEQ: "'>='",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  EOF: 'end of template',
};

/** Human-readable name of a token type, e.g. `'('` or `'endfor'`. */
export function describeTokenType(type: TokenType): string {
  return TYPE_DESCRIPTIONS[type] ?? `'${type.toLowerCase()}'`;
}

/** Human-readable description of a concrete token. */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.NAME) {
    return `'${token.value}'`;
  }
  return describeTokenType(token.type);
}
