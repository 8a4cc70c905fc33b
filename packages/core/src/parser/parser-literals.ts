/**
 * Parser Extension: Literal Parsing
 * List and dict literals
 */

import { Parser } from './parser.js';
import type { DictNode, ListNode, PairNode } from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import { check, expect, previousEnd } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseList(): ListNode;
    parseDict(): DictNode;
  }
}

// ============================================================
// LISTS
// ============================================================

/** `[a, b, c]`, trailing comma allowed */
Parser.prototype.parseList = function (this: Parser): ListNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACKET);
  const items: ListNode['items'] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    if (items.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    if (check(this.state, TOKEN_TYPES.RBRACKET)) {
      break;
    }
    items.push(this.parseExpression());
  }
  expect(this.state, TOKEN_TYPES.RBRACKET);

  return {
    type: 'List',
    items,
    span: makeSpan(open.span.start, previousEnd(this.state)),
  };
};

// ============================================================
// DICTS
// ============================================================

/** `{key: value, ...}`, trailing comma allowed */
Parser.prototype.parseDict = function (this: Parser): DictNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE);
  const items: PairNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    if (items.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    if (check(this.state, TOKEN_TYPES.RBRACE)) {
      break;
    }
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.COLON);
    const value = this.parseExpression();
    items.push({
      type: 'Pair',
      key,
      value,
      span: makeSpan(key.span.start, value.span.end),
    });
  }
  expect(this.state, TOKEN_TYPES.RBRACE);

  return {
    type: 'Dict',
    items,
    span: makeSpan(open.span.start, previousEnd(this.state)),
  };
};
