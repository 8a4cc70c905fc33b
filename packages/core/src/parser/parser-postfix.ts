/**
 * Parser Extension: Postfix Parsing
 * Attribute access, subscripts and slices, and dispatch to calls, filters
 * and tests
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  SliceNode,
  SubscriptNode,
} from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import { describeToken, TOKEN_TYPES } from '../token-types.js';
import { integerValue, parseError } from './helpers.js';
import { advance, check, current, expect, previousEnd } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePostfix(node: ExpressionNode): ExpressionNode;
    parseSubscript(node: ExpressionNode): SubscriptNode;
    parseSubscribed(): ExpressionNode;
  }
}

// ============================================================
// POSTFIX CHAIN
// ============================================================

Parser.prototype.parsePostfix = function (
  this: Parser,
  node: ExpressionNode
): ExpressionNode {
  for (;;) {
    switch (current(this.state).type) {
      case TOKEN_TYPES.DOT:
      case TOKEN_TYPES.LBRACKET:
        node = this.parseSubscript(node);
        break;
      case TOKEN_TYPES.LPAREN:
        node = this.parseCall(node);
        break;
      case TOKEN_TYPES.PIPE:
        node = this.parseFilter(node);
        break;
      case TOKEN_TYPES.IS:
        node = this.parseTest(node);
        break;
      default:
        return node;
    }
  }
};

// ============================================================
// SUBSCRIPTS
// ============================================================

/** `node.name`, `node.0` or `node[arg, ...]` */
Parser.prototype.parseSubscript = function (
  this: Parser,
  node: ExpressionNode
): SubscriptNode {
  const token = advance(this.state);
  let arg: ExpressionNode;

  if (token.type === TOKEN_TYPES.DOT) {
    const attr = current(this.state);
    if (attr.type === TOKEN_TYPES.NAME) {
      arg = { type: 'Const', value: attr.value, span: attr.span };
    } else if (attr.type === TOKEN_TYPES.INTEGER) {
      arg = { type: 'Const', value: integerValue(attr.value), span: attr.span };
    } else {
      throw parseError(
        this.state,
        'KILN-P007',
        { actual: describeToken(attr) },
        attr.span.start
      );
    }
    advance(this.state);
  } else if (token.type === TOKEN_TYPES.LBRACKET) {
    const items: ExpressionNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      if (items.length > 0) {
        expect(this.state, TOKEN_TYPES.COMMA);
      }
      items.push(this.parseSubscribed());
    }
    const itemsEnd = previousEnd(this.state);
    expect(this.state, TOKEN_TYPES.RBRACKET);

    const [only] = items;
    arg =
      items.length === 1 && only !== undefined
        ? only
        : {
            type: 'Tuple',
            items,
            ctx: 'load',
            span: makeSpan(only?.span.start ?? token.span.end, itemsEnd),
          };
  } else {
    throw new Error(
      `Internal parser error: subscript cannot start with ${token.type}`
    );
  }

  return {
    type: 'Subscript',
    node,
    arg,
    ctx: 'load',
    span: makeSpan(node.span.start, previousEnd(this.state)),
  };
};

/**
 * One subscript inside brackets: an expression, or a slice with optional
 * `start:stop:step` segments.
 */
Parser.prototype.parseSubscribed = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let sliceStart: ExpressionNode | null = null;

  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
  } else {
    const node = this.parseExpression();
    if (!check(this.state, TOKEN_TYPES.COLON)) {
      return node;
    }
    advance(this.state);
    sliceStart = node;
  }

  const segmentEnd = () =>
    check(this.state, TOKEN_TYPES.COLON, TOKEN_TYPES.RBRACKET, TOKEN_TYPES.COMMA);

  const stop = segmentEnd() ? null : this.parseExpression();

  let step: ExpressionNode | null = null;
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
    if (!check(this.state, TOKEN_TYPES.RBRACKET, TOKEN_TYPES.COMMA)) {
      step = this.parseExpression();
    }
  }

  const slice: SliceNode = {
    type: 'Slice',
    start: sliceStart,
    stop,
    step,
    span: makeSpan(start, previousEnd(this.state)),
  };
  return slice;
};
