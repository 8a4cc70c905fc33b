/**
 * Parser Extension: Control Flow Parsing
 * For loops and if/elif/else chains
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  ForNode,
  IfNode,
  StatementNode,
} from '../ast-nodes.js';
import { makeSpan, type SourceLocation } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import { parseError, targetKind, toTarget } from './helpers.js';
import { advance, check, expect, previousEnd } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFor(): ForNode;
    parseIf(): IfNode;
  }
}

// ============================================================
// LOOPS
// ============================================================

/** `{% for target in iter [if test] %}body[{% else %}elseBody]{% endfor %}` */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = expect(this.state, TOKEN_TYPES.FOR).span.start;

  const target = this.parseTuple({ simplified: true });
  const storeTarget = toTarget(target, 'store');
  if (storeTarget === null) {
    throw parseError(
      this.state,
      'KILN-P003',
      { target: targetKind(target) },
      target.span.start
    );
  }

  expect(this.state, TOKEN_TYPES.IN);
  // No conditional expressions here: a trailing `if` is the loop filter
  const iter = this.parseTuple({ noCondExpr: true });

  let test: ExpressionNode | null = null;
  if (check(this.state, TOKEN_TYPES.IF)) {
    advance(this.state);
    test = this.parseExpression();
  }

  const body = this.parseStatements([TOKEN_TYPES.ENDFOR, TOKEN_TYPES.ELSE]);
  const needle = advance(this.state);
  const elseBody =
    needle.type === TOKEN_TYPES.ENDFOR
      ? []
      : this.parseStatements([TOKEN_TYPES.ENDFOR], true);

  return {
    type: 'For',
    target: storeTarget,
    iter,
    body,
    elseBody,
    test,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

interface IfBranch {
  readonly start: SourceLocation;
  readonly test: ExpressionNode;
  readonly body: StatementNode[];
}

/**
 * `if` and each `elif` are collected as branches, then folded from the last
 * one up: every branch becomes an IfNode whose else body holds the next.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const parseBranch = (start: SourceLocation): IfBranch => {
    const test = this.parseTuple();
    const body = this.parseStatements([
      TOKEN_TYPES.ELIF,
      TOKEN_TYPES.ELSE,
      TOKEN_TYPES.ENDIF,
    ]);
    return { start, test, body };
  };

  const first = parseBranch(expect(this.state, TOKEN_TYPES.IF).span.start);
  const elifs: IfBranch[] = [];
  let elseBody: StatementNode[] = [];

  for (;;) {
    const needle = advance(this.state);
    if (needle.type === TOKEN_TYPES.ELIF) {
      elifs.push(parseBranch(needle.span.start));
      continue;
    }
    if (needle.type === TOKEN_TYPES.ELSE) {
      elseBody = this.parseStatements([TOKEN_TYPES.ENDIF], true);
    }
    break;
  }

  const end = previousEnd(this.state);
  const toNode = (branch: IfBranch, branchElse: StatementNode[]): IfNode => ({
    type: 'If',
    test: branch.test,
    body: branch.body,
    elseBody: branchElse,
    span: makeSpan(branch.start, end),
  });

  const innerElse = elifs.reduceRight<StatementNode[]>(
    (branchElse, branch) => [toNode(branch, branchElse)],
    elseBody
  );
  return toNode(first, innerElse);
};
