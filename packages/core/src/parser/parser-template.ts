/**
 * Parser Extension: Template Parsing
 * The data/tag loop and the template root
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  StatementNode,
  TemplateNode,
} from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import type { TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, check, current, expect } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    subparse(endTypes: readonly TokenType[] | null): StatementNode[];
    parseTemplate(): TemplateNode;
  }
}

/**
 * Collect statements until EOF, or until a block tag that starts with one of
 * `endTypes`. In that case the block opener is consumed and the end keyword
 * is left current for the caller.
 *
 * Literal data and `{{ }}` interpolations between two block tags are
 * gathered into one Output node.
 */
Parser.prototype.subparse = function (
  this: Parser,
  endTypes: readonly TokenType[] | null
): StatementNode[] {
  const body: StatementNode[] = [];
  let buffer: ExpressionNode[] = [];

  const flush = (): void => {
    const [first] = buffer;
    const last = buffer[buffer.length - 1];
    if (first !== undefined && last !== undefined) {
      body.push({
        type: 'Output',
        nodes: buffer,
        span: makeSpan(first.span.start, last.span.end),
      });
      buffer = [];
    }
  };

  for (;;) {
    const token = current(this.state);

    switch (token.type) {
      case TOKEN_TYPES.DATA:
        if (token.value.length > 0) {
          buffer.push({ type: 'Const', value: token.value, span: token.span });
        }
        advance(this.state);
        break;

      case TOKEN_TYPES.VARIABLE_BEGIN:
        advance(this.state);
        buffer.push(this.parseTuple());
        expect(this.state, TOKEN_TYPES.VARIABLE_END);
        break;

      case TOKEN_TYPES.BLOCK_BEGIN: {
        flush();
        advance(this.state);
        if (endTypes !== null && check(this.state, ...endTypes)) {
          return body;
        }
        const result = this.parseStatement();
        if (Array.isArray(result)) {
          body.push(...result);
        } else {
          body.push(result);
        }
        expect(this.state, TOKEN_TYPES.BLOCK_END);
        break;
      }

      case TOKEN_TYPES.EOF:
        flush();
        return body;

      default:
        throw new Error(
          `Internal parser error: unexpected ${token.type} token between tags`
        );
    }
  }
};

Parser.prototype.parseTemplate = function (this: Parser): TemplateNode {
  const body = this.subparse(null);
  const end = current(this.state).span.end;

  return {
    type: 'Template',
    body,
    environment: this.environment,
    span: makeSpan({ line: 1, column: 1, offset: 0 }, end),
  };
};
