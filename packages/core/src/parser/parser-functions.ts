/**
 * Parser Extension: Function Parsing
 * Call arguments, calls, filters, tests, and the statements that define or
 * invoke callables (macros, call blocks, filter blocks)
 */

import { Parser } from './parser.js';
import type {
  CallArguments,
  CallBlockNode,
  CallNode,
  ExpressionNode,
  FilterBlockNode,
  FilterNode,
  KeywordNode,
  MacroNode,
  NameNode,
  UnaryExprNode,
  TestNode,
} from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import { canAssignName, parseError, TEST_ARGUMENT_TYPES } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  peek,
  previousEnd,
  skip,
} from './state.js';

/** Macro or call block parameters; defaults belong to the trailing params */
export interface Signature {
  readonly params: NameNode[];
  readonly defaults: ExpressionNode[];
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseCallArgs(): CallArguments;
    parseCall(node: ExpressionNode): CallNode;
    parseFilter(node: ExpressionNode): ExpressionNode;
    parseFilterChain(node: ExpressionNode | null): FilterNode;
    parseTest(node: ExpressionNode): TestNode | UnaryExprNode;
    parseSignature(): Signature;
    parseMacro(): MacroNode;
    parseCallBlock(): CallBlockNode;
    parseFilterBlock(): FilterBlockNode;
  }
}

function noArguments(): CallArguments {
  return { args: [], kwargs: [], dynArgs: null, dynKwargs: null };
}

// ============================================================
// CALL ARGUMENTS
// ============================================================

/**
 * `(positional..., key=value..., *args, **kwargs)` with optional trailing
 * comma. Out-of-order or repeated spreads fail with KILN-P005 at the
 * opening parenthesis.
 */
Parser.prototype.parseCallArgs = function (this: Parser): CallArguments {
  const open = expect(this.state, TOKEN_TYPES.LPAREN);
  const args: ExpressionNode[] = [];
  const kwargs: KeywordNode[] = [];
  let dynArgs: ExpressionNode | null = null;
  let dynKwargs: ExpressionNode | null = null;
  let requireComma = false;

  const ensure = (valid: boolean): void => {
    if (!valid) {
      throw parseError(this.state, 'KILN-P005', {}, open.span.start);
    }
  };

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    if (requireComma) {
      expect(this.state, TOKEN_TYPES.COMMA);
      // trailing comma
      if (check(this.state, TOKEN_TYPES.RPAREN)) break;
    }

    if (check(this.state, TOKEN_TYPES.MUL)) {
      ensure(dynArgs === null && dynKwargs === null);
      advance(this.state);
      dynArgs = this.parseExpression();
    } else if (check(this.state, TOKEN_TYPES.POW)) {
      ensure(dynKwargs === null);
      advance(this.state);
      dynKwargs = this.parseExpression();
    } else {
      ensure(dynArgs === null && dynKwargs === null);
      const token = current(this.state);
      if (
        token.type === TOKEN_TYPES.NAME &&
        peek(this.state).type === TOKEN_TYPES.ASSIGN
      ) {
        skip(this.state, 2);
        const value = this.parseExpression();
        kwargs.push({
          type: 'Keyword',
          key: token.value,
          value,
          span: makeSpan(token.span.start, value.span.end),
        });
      } else {
        ensure(kwargs.length === 0);
        args.push(this.parseExpression());
      }
    }

    requireComma = true;
  }
  expect(this.state, TOKEN_TYPES.RPAREN);

  return { args, kwargs, dynArgs, dynKwargs };
};

Parser.prototype.parseCall = function (
  this: Parser,
  node: ExpressionNode
): CallNode {
  const callArgs = this.parseCallArgs();
  return {
    type: 'Call',
    node,
    ...callArgs,
    span: makeSpan(node.span.start, previousEnd(this.state)),
  };
};

// ============================================================
// FILTERS
// ============================================================

/** `node | name(args) | ...`; the current token is the first pipe */
Parser.prototype.parseFilter = function (
  this: Parser,
  node: ExpressionNode
): ExpressionNode {
  if (!check(this.state, TOKEN_TYPES.PIPE)) {
    return node;
  }
  advance(this.state);
  return this.parseFilterChain(node);
};

/** One `name` or `name(args)` filter applied to `input` */
function parseSingleFilter(
  parser: Parser,
  input: ExpressionNode | null
): FilterNode {
  const name = expect(parser.state, TOKEN_TYPES.NAME);
  const callArgs = check(parser.state, TOKEN_TYPES.LPAREN)
    ? parser.parseCallArgs()
    : noArguments();
  return {
    type: 'Filter',
    node: input,
    name: name.value,
    ...callArgs,
    span: makeSpan(input?.span.start ?? name.span.start, previousEnd(parser.state)),
  };
}

/**
 * Filter chain starting at a filter name. Each filter takes the previous
 * one as input; the first takes `node`, which is null in filter blocks.
 */
Parser.prototype.parseFilterChain = function (
  this: Parser,
  node: ExpressionNode | null
): FilterNode {
  let filter = parseSingleFilter(this, node);
  while (check(this.state, TOKEN_TYPES.PIPE)) {
    advance(this.state);
    filter = parseSingleFilter(this, filter);
  }
  return filter;
};

// ============================================================
// TESTS
// ============================================================

/**
 * `node is [not] name`, followed by `(args)` or one bare argument
 * (`x is divisibleby 3`). A negated test is wrapped in `not`.
 */
Parser.prototype.parseTest = function (
  this: Parser,
  node: ExpressionNode
): TestNode | UnaryExprNode {
  const token = expect(this.state, TOKEN_TYPES.IS);
  const negated = check(this.state, TOKEN_TYPES.NOT);
  if (negated) {
    advance(this.state);
  }
  const name = expect(this.state, TOKEN_TYPES.NAME);

  let callArgs: CallArguments;
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    callArgs = this.parseCallArgs();
  } else if (check(this.state, ...TEST_ARGUMENT_TYPES)) {
    callArgs = { ...noArguments(), args: [this.parseExpression()] };
  } else {
    callArgs = noArguments();
  }

  const test: TestNode = {
    type: 'Test',
    node,
    name: name.value,
    ...callArgs,
    span: makeSpan(node.span.start, previousEnd(this.state)),
  };
  if (!negated) {
    return test;
  }
  return {
    type: 'UnaryExpr',
    op: 'not',
    node: test,
    span: makeSpan(token.span.start, test.span.end),
  };
};

// ============================================================
// SIGNATURES
// ============================================================

/**
 * `(name, name=default, ...)`. A parameter without a default may not follow
 * one with a default.
 */
Parser.prototype.parseSignature = function (this: Parser): Signature {
  const params: NameNode[] = [];
  const defaults: ExpressionNode[] = [];

  expect(this.state, TOKEN_TYPES.LPAREN);
  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    if (params.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    const token = expect(this.state, TOKEN_TYPES.NAME);
    if (!canAssignName(token.value)) {
      throw parseError(
        this.state,
        'KILN-P003',
        { target: token.value },
        token.span.start
      );
    }

    if (check(this.state, TOKEN_TYPES.ASSIGN)) {
      advance(this.state);
      defaults.push(this.parseExpression());
    } else if (defaults.length > 0) {
      throw parseError(
        this.state,
        'KILN-P008',
        { name: token.value },
        token.span.start
      );
    }

    params.push({
      type: 'Name',
      name: token.value,
      ctx: 'param',
      span: token.span,
    });
  }
  expect(this.state, TOKEN_TYPES.RPAREN);

  return { params, defaults };
};

// ============================================================
// CALLABLE STATEMENTS
// ============================================================

Parser.prototype.parseMacro = function (this: Parser): MacroNode {
  const start = expect(this.state, TOKEN_TYPES.MACRO).span.start;
  const name = expect(this.state, TOKEN_TYPES.NAME);
  if (!canAssignName(name.value)) {
    throw parseError(
      this.state,
      'KILN-P003',
      { target: name.value },
      name.span.start
    );
  }
  const { params, defaults } = this.parseSignature();
  const body = this.parseStatements([TOKEN_TYPES.ENDMACRO], true);

  return {
    type: 'Macro',
    name: name.value,
    params,
    defaults,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** `{% call [(params)] callee(args) %}`; the callee must be a call */
Parser.prototype.parseCallBlock = function (this: Parser): CallBlockNode {
  const start = expect(this.state, TOKEN_TYPES.CALL).span.start;
  const { params, defaults } = check(this.state, TOKEN_TYPES.LPAREN)
    ? this.parseSignature()
    : { params: [], defaults: [] };

  const call = this.parseExpression();
  if (call.type !== 'Call') {
    throw parseError(this.state, 'KILN-P006', {}, start);
  }
  const body = this.parseStatements([TOKEN_TYPES.ENDCALL], true);

  return {
    type: 'CallBlock',
    params,
    defaults,
    call,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseFilterBlock = function (this: Parser): FilterBlockNode {
  const start = expect(this.state, TOKEN_TYPES.FILTER).span.start;
  const filter = this.parseFilterChain(null);
  const body = this.parseStatements([TOKEN_TYPES.ENDFILTER], true);

  return {
    type: 'FilterBlock',
    filter,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
