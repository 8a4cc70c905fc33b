/**
 * Parser Extension: Statement Parsing
 * Statement dispatch, assignment, and the single-tag statements
 */

import { Parser } from './parser.js';
import type {
  AssignNode,
  BlockNode,
  ExpressionNode,
  ExtendsNode,
  FromImportNode,
  ImportName,
  ImportNode,
  IncludeNode,
  OutputNode,
  StatementNode,
} from '../ast-nodes.js';
import { makeSpan } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  canAssignName,
  parseError,
  STATEMENT_END_TYPES,
  targetKind,
  toTarget,
} from './helpers.js';
import {
  advance,
  check,
  checkName,
  current,
  expect,
  expectName,
  previousEnd,
  unexpectedToken,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStatement(): StatementNode | StatementNode[];
    parseStatements(
      endTypes: readonly TokenType[],
      dropNeedle?: boolean
    ): StatementNode[];
    parseAssign(target: ExpressionNode): AssignNode;
    parseBlock(): BlockNode;
    parseExtends(): ExtendsNode;
    parseInclude(): IncludeNode;
    parseImport(): ImportNode;
    parseFrom(): FromImportNode;
    parsePrint(): OutputNode;
  }
}

// ============================================================
// STATEMENT DISPATCH
// ============================================================

/**
 * Parse one statement; the current token is the first one after the block
 * opener. Extensions may return several statements.
 */
Parser.prototype.parseStatement = function (
  this: Parser
): StatementNode | StatementNode[] {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.BLOCK:
      return this.parseBlock();
    case TOKEN_TYPES.EXTENDS:
      return this.parseExtends();
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.MACRO:
      return this.parseMacro();
    case TOKEN_TYPES.INCLUDE:
      return this.parseInclude();
    case TOKEN_TYPES.FROM:
      return this.parseFrom();
    case TOKEN_TYPES.IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.CALL:
      return this.parseCallBlock();
    case TOKEN_TYPES.FILTER:
      return this.parseFilterBlock();
    case TOKEN_TYPES.NAME: {
      const extension = this.extensions.get(token.value);
      if (extension !== undefined) {
        return extension.parse(this);
      }
      break;
    }
  }

  const expr = this.parseTuple();
  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    return this.parseAssign(expr);
  }
  return { type: 'ExprStmt', node: expr, span: expr.span };
};

/**
 * Body of a block statement: closes the opening tag, then collects
 * statements until one of `endTypes`. With `dropNeedle` the end keyword
 * is consumed; otherwise it is left for the caller to inspect.
 */
Parser.prototype.parseStatements = function (
  this: Parser,
  endTypes: readonly TokenType[],
  dropNeedle = false
): StatementNode[] {
  // optional colon: `{% for x in y: %}`
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
  }
  expect(this.state, TOKEN_TYPES.BLOCK_END);

  const body = this.subparse(endTypes);
  if (!check(this.state, ...endTypes)) {
    throw unexpectedToken(this.state, endTypes);
  }
  if (dropNeedle) {
    advance(this.state);
  }
  return body;
};

// ============================================================
// ASSIGNMENT
// ============================================================

Parser.prototype.parseAssign = function (
  this: Parser,
  target: ExpressionNode
): AssignNode {
  expect(this.state, TOKEN_TYPES.ASSIGN);
  const storeTarget = toTarget(target, 'store');
  if (storeTarget === null) {
    throw parseError(
      this.state,
      'KILN-P003',
      { target: targetKind(target) },
      target.span.start
    );
  }
  const value = this.parseTuple();

  return {
    type: 'Assign',
    target: storeTarget,
    value,
    span: makeSpan(target.span.start, value.span.end),
  };
};

// ============================================================
// TEMPLATE STRUCTURE
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = expect(this.state, TOKEN_TYPES.BLOCK).span.start;
  const name = expect(this.state, TOKEN_TYPES.NAME).value;
  const body = this.parseStatements([TOKEN_TYPES.ENDBLOCK], true);

  return {
    type: 'Block',
    name,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseExtends = function (this: Parser): ExtendsNode {
  const start = expect(this.state, TOKEN_TYPES.EXTENDS).span.start;
  const template = this.parseExpression();
  return {
    type: 'Extends',
    template,
    span: makeSpan(start, template.span.end),
  };
};

Parser.prototype.parseInclude = function (this: Parser): IncludeNode {
  const start = expect(this.state, TOKEN_TYPES.INCLUDE).span.start;
  const template = this.parseExpression();
  return {
    type: 'Include',
    template,
    span: makeSpan(start, template.span.end),
  };
};

// ============================================================
// IMPORTS
// ============================================================

/** Consume a NAME token that will be bound in the template's scope */
function expectBindableName(parser: Parser): Token {
  const token = expect(parser.state, TOKEN_TYPES.NAME);
  if (!canAssignName(token.value)) {
    throw parseError(
      parser.state,
      'KILN-P003',
      { target: token.value },
      token.span.start
    );
  }
  return token;
}

/** `{% import template as name %}` */
Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const start = expect(this.state, TOKEN_TYPES.IMPORT).span.start;
  const template = this.parseExpression();
  expectName(this.state, 'as');
  const target = expectBindableName(this).value;

  return {
    type: 'Import',
    template,
    target,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** `{% from template import name [as alias], ... %}` */
Parser.prototype.parseFrom = function (this: Parser): FromImportNode {
  const start = expect(this.state, TOKEN_TYPES.FROM).span.start;
  const template = this.parseExpression();
  expect(this.state, TOKEN_TYPES.IMPORT);

  const names: ImportName[] = [];
  for (;;) {
    if (names.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    if (!check(this.state, TOKEN_TYPES.NAME)) {
      break;
    }

    const token = current(this.state);
    if (token.value.startsWith('__')) {
      throw parseError(
        this.state,
        'KILN-P004',
        { name: token.value },
        token.span.start
      );
    }
    const name = expectBindableName(this).value;

    let alias: string | null = null;
    if (checkName(this.state, 'as')) {
      advance(this.state);
      alias = expectBindableName(this).value;
    }
    names.push({ name, alias });

    if (!check(this.state, TOKEN_TYPES.COMMA)) {
      break;
    }
  }
  // trailing comma
  if (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
  }

  return {
    type: 'FromImport',
    template,
    names,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// PRINT
// ============================================================

/** `{% print a, b %}` */
Parser.prototype.parsePrint = function (this: Parser): OutputNode {
  const start = expect(this.state, TOKEN_TYPES.PRINT).span.start;
  const nodes: ExpressionNode[] = [];

  while (!check(this.state, ...STATEMENT_END_TYPES)) {
    if (nodes.length > 0) {
      expect(this.state, TOKEN_TYPES.COMMA);
    }
    nodes.push(this.parseExpression());
  }

  return {
    type: 'Output',
    nodes,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
