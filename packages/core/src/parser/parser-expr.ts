/**
 * Parser Extension: Expression Parsing
 * Precedence chain from conditional expressions down to primaries, and tuples
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  CompareOp,
  ExpressionNode,
  OperandNode,
  UnaryOp,
} from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import type { TokenType } from '../token-types.js';
import { describeToken, TOKEN_TYPES } from '../token-types.js';
import {
  CONSTANT_NAMES,
  integerValue,
  parseError,
  TUPLE_EDGE_TYPES,
} from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  peek,
  previousEnd,
  skip,
} from './state.js';

export interface TupleOptions {
  /** Items are primaries with postfix only (loop targets) */
  readonly simplified?: boolean | undefined;
  /** Items may not be conditional expressions (loop iterables) */
  readonly noCondExpr?: boolean | undefined;
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(noCondExpr?: boolean): ExpressionNode;
    parseCondExpr(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseCompare(): ExpressionNode;
    parseAdd(): ExpressionNode;
    parseSub(): ExpressionNode;
    parseConcat(): ExpressionNode;
    parseMul(): ExpressionNode;
    parseDiv(): ExpressionNode;
    parseFloorDiv(): ExpressionNode;
    parseMod(): ExpressionNode;
    parsePow(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePrimary(withPostfix?: boolean): ExpressionNode;
    parseTuple(options?: TupleOptions): ExpressionNode;
  }
}

// ============================================================
// CONDITIONAL EXPRESSIONS
// ============================================================

Parser.prototype.parseExpression = function (
  this: Parser,
  noCondExpr = false
): ExpressionNode {
  return noCondExpr ? this.parseOr() : this.parseCondExpr();
};

/** `a if test else b`; the false branch recurses, so chains nest to the right */
Parser.prototype.parseCondExpr = function (this: Parser): ExpressionNode {
  let expr = this.parseOr();

  while (check(this.state, TOKEN_TYPES.IF)) {
    advance(this.state);
    const test = this.parseOr();
    expect(this.state, TOKEN_TYPES.ELSE);
    const ifFalse = this.parseCondExpr();
    expr = {
      type: 'CondExpr',
      test,
      ifTrue: expr,
      ifFalse,
      span: makeSpan(expr.span.start, ifFalse.span.end),
    };
  }

  return expr;
};

// ============================================================
// BINARY OPERATORS
// ============================================================

/**
 * One left-associative level: `next (type next)*`.
 * @internal
 */
function parseBinaryLevel(
  parser: Parser,
  type: TokenType,
  op: BinaryOp,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  while (check(parser.state, type)) {
    advance(parser.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
}

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.OR, 'or', () => this.parseAnd());
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.AND, 'and', () =>
    this.parseCompare()
  );
};

Parser.prototype.parseAdd = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.ADD, 'add', () => this.parseSub());
};

Parser.prototype.parseSub = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.SUB, 'sub', () =>
    this.parseConcat()
  );
};

Parser.prototype.parseConcat = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.TILDE, 'concat', () =>
    this.parseMul()
  );
};

Parser.prototype.parseMul = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.MUL, 'mul', () => this.parseDiv());
};

Parser.prototype.parseDiv = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.DIV, 'div', () =>
    this.parseFloorDiv()
  );
};

Parser.prototype.parseFloorDiv = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.FLOORDIV, 'floordiv', () =>
    this.parseMod()
  );
};

Parser.prototype.parseMod = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.MOD, 'mod', () => this.parsePow());
};

Parser.prototype.parsePow = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, TOKEN_TYPES.POW, 'pow', () =>
    this.parseUnary()
  );
};

// ============================================================
// COMPARISONS
// ============================================================

const COMPARE_OPERATORS: Readonly<Partial<Record<TokenType, CompareOp>>> = {
  [TOKEN_TYPES.EQ]: 'eq',
  [TOKEN_TYPES.NE]: 'ne',
  [TOKEN_TYPES.LT]: 'lt',
  [TOKEN_TYPES.LTEQ]: 'lteq',
  [TOKEN_TYPES.GT]: 'gt',
  [TOKEN_TYPES.GTEQ]: 'gteq',
  [TOKEN_TYPES.IN]: 'in',
};

/** `a < b <= c` becomes one Compare node with two operands */
Parser.prototype.parseCompare = function (this: Parser): ExpressionNode {
  const expr = this.parseAdd();
  const ops: OperandNode[] = [];

  for (;;) {
    const token = current(this.state);
    let op = COMPARE_OPERATORS[token.type];
    if (op !== undefined) {
      advance(this.state);
    } else if (
      token.type === TOKEN_TYPES.NOT &&
      peek(this.state).type === TOKEN_TYPES.IN
    ) {
      skip(this.state, 2);
      op = 'notin';
    } else {
      break;
    }
    const operand = this.parseAdd();
    ops.push({
      type: 'Operand',
      op,
      expr: operand,
      span: makeSpan(token.span.start, operand.span.end),
    });
  }

  if (ops.length === 0) {
    return expr;
  }
  return {
    type: 'Compare',
    expr,
    ops,
    span: makeSpan(expr.span.start, previousEnd(this.state)),
  };
};

// ============================================================
// UNARY OPERATORS
// ============================================================

const UNARY_OPERATORS: Readonly<Partial<Record<TokenType, UnaryOp>>> = {
  [TOKEN_TYPES.NOT]: 'not',
  [TOKEN_TYPES.SUB]: 'neg',
  [TOKEN_TYPES.ADD]: 'pos',
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const op = UNARY_OPERATORS[token.type];
  if (op === undefined) {
    return this.parsePrimary();
  }

  advance(this.state);
  const node = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op,
    node,
    span: makeSpan(token.span.start, node.span.end),
  };
};

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

Parser.prototype.parsePrimary = function (
  this: Parser,
  withPostfix = true
): ExpressionNode {
  const token = current(this.state);
  let node: ExpressionNode;

  switch (token.type) {
    case TOKEN_TYPES.NAME: {
      advance(this.state);
      const constant = CONSTANT_NAMES.get(token.value);
      node =
        constant !== undefined
          ? { type: 'Const', value: constant, span: token.span }
          : { type: 'Name', name: token.value, ctx: 'load', span: token.span };
      break;
    }
    case TOKEN_TYPES.INTEGER:
      advance(this.state);
      node = { type: 'Const', value: integerValue(token.value), span: token.span };
      break;
    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      node = { type: 'Const', value: Number(token.value), span: token.span };
      break;
    case TOKEN_TYPES.STRING:
      advance(this.state);
      node = { type: 'Const', value: token.value, span: token.span };
      break;
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseTuple();
      expect(this.state, TOKEN_TYPES.RPAREN);
      // A parenthesised tuple spans its parentheses
      node =
        inner.type === 'Tuple'
          ? { ...inner, span: makeSpan(token.span.start, previousEnd(this.state)) }
          : inner;
      break;
    }
    case TOKEN_TYPES.LBRACKET:
      node = this.parseList();
      break;
    case TOKEN_TYPES.LBRACE:
      node = this.parseDict();
      break;
    default:
      throw parseError(
        this.state,
        'KILN-P002',
        { actual: describeToken(token) },
        token.span.start
      );
  }

  return withPostfix ? this.parsePostfix(node) : node;
};

// ============================================================
// TUPLES
// ============================================================

/**
 * Comma separated expressions. A single item without a trailing comma is
 * returned as itself; `a,` and `a, b` become tuples, and an empty list
 * (e.g. `()`) becomes an empty tuple.
 */
Parser.prototype.parseTuple = function (
  this: Parser,
  options: TupleOptions = {}
): ExpressionNode {
  const start = current(this.state).span.start;
  const parseItem = options.simplified
    ? () => this.parsePrimary()
    : () => this.parseExpression(options.noCondExpr ?? false);

  const items: ExpressionNode[] = [];
  let isTuple = false;

  for (;;) {
    if (items.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    if (check(this.state, ...TUPLE_EDGE_TYPES)) {
      break;
    }
    items.push(parseItem());
    if (check(this.state, TOKEN_TYPES.COMMA)) {
      isTuple = true;
    } else {
      break;
    }
  }

  const [first] = items;
  if (!isTuple && first !== undefined) {
    return first;
  }
  return {
    type: 'Tuple',
    items,
    ctx: 'load',
    span: makeSpan(start, items.length > 0 ? previousEnd(this.state) : start),
  };
};
