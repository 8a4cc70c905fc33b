/**
 * Kiln Module
 * Exports lexer, parser, AST types, environment and extensions
 */

// ============================================================
// SOURCE LOCATIONS AND TOKENS
// ============================================================
export {
  formatLocation,
  makeSpan,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';
export {
  describeToken,
  describeTokenType,
  KEYWORDS,
  lookupKeyword,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from './token-types.js';

// ============================================================
// LEXER AND PARSER
// ============================================================
export {
  LexerError,
  tokenize,
  tokenizeExpression,
  type TokenizeOptions,
} from './lexer/index.js';
export {
  advance,
  canAssign,
  check,
  checkName,
  createParserState,
  current,
  expect,
  expectName,
  isAtEnd,
  parse,
  parseExpression,
  Parser,
  peek,
  previousEnd,
  skip,
  toTarget,
  type ParseOptions,
  type ParserOptions,
  type ParserState,
  type Signature,
  type TupleOptions,
} from './parser/index.js';

// ============================================================
// AST
// ============================================================
export type * from './ast-nodes.js';
export {
  findAll,
  isNodeOfType,
  iterChildNodes,
  walk,
  type NodeOfType,
  type NodeVisitor,
} from './ast-walk.js';

// ============================================================
// ENVIRONMENT AND EXTENSIONS
// ============================================================
export {
  createEnvironment,
  DEFAULT_DELIMITERS,
  type Delimiters,
  type Environment,
  type EnvironmentOptions,
} from './environment.js';
export { createExtensionTable, type Extension } from './extensions.js';
export {
  BUILTIN_EXTENSIONS,
  doExtension,
  loopControlsExtension,
} from './ext/index.js';

// ============================================================
// ERRORS
// ============================================================
export {
  createError,
  KilnError,
  ParseAssertionError,
  ParseError,
  type KilnErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
