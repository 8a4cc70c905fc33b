/**
 * Lexer Module
 * Converts template source into tokens
 */

export { LexerError } from '../error-classes.js';
export { createLexerState, type LexerState } from './state.js';
export {
  nextToken,
  tokenize,
  tokenizeExpression,
  type TokenizeOptions,
} from './tokenizer.js';
