/**
 * Parser Tests: Statements
 * Template driver, assignment, loops, conditionals, imports and callables
 */

import { describe, expect, it } from 'vitest';
import {
  createEnvironment,
  parse,
  ParseAssertionError,
  ParseError,
  Parser,
  tokenizeExpression,
  type StatementNode,
} from '@kiln/core';

function body(source: string): StatementNode[] {
  return parse(source).body;
}

describe('template parsing', () => {
  describe('data and interpolation', () => {
    it('wraps literal text in one Output node', () => {
      expect(body('Hello')).toMatchObject([
        { type: 'Output', nodes: [{ type: 'Const', value: 'Hello' }] },
      ]);
    });

    it('returns an empty body for empty source', () => {
      expect(body('')).toEqual([]);
    });

    it('buffers data and interpolations between tags', () => {
      expect(body('Hello {{ name }}!')).toMatchObject([
        {
          type: 'Output',
          nodes: [
            { type: 'Const', value: 'Hello ' },
            { type: 'Name', name: 'name', ctx: 'load' },
            { type: 'Const', value: '!' },
          ],
        },
      ]);
    });

    it('flushes output before each statement', () => {
      expect(body('a{% x = 1 %}b')).toMatchObject([
        { type: 'Output', nodes: [{ value: 'a' }] },
        { type: 'Assign' },
        { type: 'Output', nodes: [{ value: 'b' }] },
      ]);
    });

    it('records node positions', () => {
      const [output] = body('a\n{{ b }}');
      expect(output).toMatchObject({
        type: 'Output',
        nodes: [
          { type: 'Const', value: 'a\n' },
          { type: 'Name', name: 'b', span: { start: { line: 2, column: 4, offset: 5 } } },
        ],
      });
    });

    it('binds the root to its environment', () => {
      const environment = createEnvironment();
      const template = parse('x', { environment });
      expect(template.type).toBe('Template');
      expect(template.environment).toBe(environment);
      expect(template.span.start).toEqual({ line: 1, column: 1, offset: 0 });
    });
  });

  describe('assignment', () => {
    it('stores into a name', () => {
      expect(body('{% x = 2 %}')).toMatchObject([
        {
          type: 'Assign',
          target: { type: 'Name', name: 'x', ctx: 'store' },
          value: { type: 'Const', value: 2 },
        },
      ]);
    });

    it('stores into every tuple item', () => {
      expect(body('{% a, b = b, a %}')).toMatchObject([
        {
          type: 'Assign',
          target: {
            type: 'Tuple',
            ctx: 'store',
            items: [
              { name: 'a', ctx: 'store' },
              { name: 'b', ctx: 'store' },
            ],
          },
          value: {
            type: 'Tuple',
            ctx: 'load',
            items: [{ name: 'b' }, { name: 'a' }],
          },
        },
      ]);
    });

    it('keeps the subscripted object loaded', () => {
      expect(body('{% x.y = 1 %}')).toMatchObject([
        {
          type: 'Assign',
          target: {
            type: 'Subscript',
            ctx: 'store',
            node: { type: 'Name', name: 'x', ctx: 'load' },
          },
        },
      ]);
    });

    it('rejects constants as targets (KILN-P003)', () => {
      expect(() => parse('{% 1 = 2 %}')).toThrow("Cannot assign to 'const' at 1:4");
    });

    it('names the operator of an invalid target', () => {
      expect(() => parse('{% a + b = 2 %}')).toThrow("Cannot assign to 'add' at 1:4");
    });

    it('wraps other expressions in ExprStmt', () => {
      expect(body('{% foo() %}')).toMatchObject([
        { type: 'ExprStmt', node: { type: 'Call', node: { name: 'foo' } } },
      ]);
    });
  });

  describe('for loops', () => {
    it('reads a trailing if as the loop filter', () => {
      expect(body('{% for x in items if x.active %}{{ x }}{% endfor %}')).toMatchObject([
        {
          type: 'For',
          target: { type: 'Name', name: 'x', ctx: 'store' },
          iter: { type: 'Name', name: 'items' },
          test: {
            type: 'Subscript',
            node: { name: 'x' },
            arg: { value: 'active' },
          },
          body: [{ type: 'Output', nodes: [{ name: 'x' }] }],
          elseBody: [],
        },
      ]);
    });

    it('parses an else body', () => {
      expect(body('{% for x in xs %}a{% else %}b{% endfor %}')).toMatchObject([
        {
          type: 'For',
          test: null,
          body: [{ type: 'Output', nodes: [{ value: 'a' }] }],
          elseBody: [{ type: 'Output', nodes: [{ value: 'b' }] }],
        },
      ]);
    });

    it('unpacks into a tuple target', () => {
      expect(body('{% for k, v in pairs %}{% endfor %}')).toMatchObject([
        {
          type: 'For',
          target: {
            type: 'Tuple',
            ctx: 'store',
            items: [
              { name: 'k', ctx: 'store' },
              { name: 'v', ctx: 'store' },
            ],
          },
        },
      ]);
    });

    it('accepts a colon before the block end', () => {
      expect(body('{% for x in xs: %}{% endfor %}')).toMatchObject([
        { type: 'For', body: [] },
      ]);
    });

    it('rejects a constant target (KILN-P003)', () => {
      expect(() => parse('{% for 1 in xs %}{% endfor %}')).toThrow(
        "Cannot assign to 'const' at 1:8"
      );
    });

    it('reports a missing end tag with a hint', () => {
      expect(() => parse('{% for x in xs %}')).toThrow(
        "Expected 'endfor' or 'else', got end of template. Hint: Check for a missing or misspelt 'endfor' tag at 1:18"
      );
    });
  });

  describe('conditionals', () => {
    it('nests elif branches in the else body', () => {
      expect(body('{% if a %}1{% elif b %}2{% else %}3{% endif %}')).toMatchObject([
        {
          type: 'If',
          test: { name: 'a' },
          body: [{ type: 'Output', nodes: [{ value: '1' }] }],
          elseBody: [
            {
              type: 'If',
              test: { name: 'b' },
              body: [{ type: 'Output', nodes: [{ value: '2' }] }],
              elseBody: [{ type: 'Output', nodes: [{ value: '3' }] }],
            },
          ],
        },
      ]);
    });

    it('leaves the else body empty without else', () => {
      expect(body('{% if a %}x{% endif %}')).toMatchObject([
        { type: 'If', elseBody: [] },
      ]);
    });

    it('folds several elif branches', () => {
      const [node] = body('{% if a %}{% elif b %}{% elif c %}{% endif %}');
      expect(node).toMatchObject({
        type: 'If',
        test: { name: 'a' },
        elseBody: [
          {
            type: 'If',
            test: { name: 'b' },
            elseBody: [{ type: 'If', test: { name: 'c' }, elseBody: [] }],
          },
        ],
      });
    });

    it('accepts a conditional expression as the test', () => {
      expect(body('{% if a if b else c %}x{% endif %}')).toMatchObject([
        { type: 'If', test: { type: 'CondExpr' } },
      ]);
    });
  });

  describe('template structure', () => {
    it('parses blocks', () => {
      expect(body('{% block content %}hi{% endblock %}')).toMatchObject([
        {
          type: 'Block',
          name: 'content',
          body: [{ type: 'Output', nodes: [{ value: 'hi' }] }],
        },
      ]);
    });

    it('parses extends and include', () => {
      expect(body("{% extends 'base.html' %}{% include 'nav.html' %}")).toMatchObject([
        { type: 'Extends', template: { type: 'Const', value: 'base.html' } },
        { type: 'Include', template: { type: 'Const', value: 'nav.html' } },
      ]);
    });

    it('parses print statements', () => {
      expect(body('{% print a, b %}')).toMatchObject([
        { type: 'Output', nodes: [{ name: 'a' }, { name: 'b' }] },
      ]);
    });
  });

  describe('imports', () => {
    it('binds an imported template', () => {
      expect(body("{% import 'forms.html' as forms %}")).toMatchObject([
        {
          type: 'Import',
          template: { value: 'forms.html' },
          target: 'forms',
        },
      ]);
    });

    it('rejects a constant name as import target (KILN-P003)', () => {
      expect(() => parse("{% import 'forms.html' as true %}")).toThrow(
        "Cannot assign to 'true' at 1:27"
      );
    });

    it('collects names and aliases', () => {
      expect(
        body("{% from 'forms.html' import input as field, textarea %}")
      ).toMatchObject([
        {
          type: 'FromImport',
          names: [
            { name: 'input', alias: 'field' },
            { name: 'textarea', alias: null },
          ],
        },
      ]);
    });

    it('keeps an alias', () => {
      expect(body('{% from t import x as y %}')).toMatchObject([
        { type: 'FromImport', names: [{ name: 'x', alias: 'y' }] },
      ]);
    });

    it('tolerates a trailing comma', () => {
      expect(body('{% from t import a, %}')).toMatchObject([
        { type: 'FromImport', names: [{ name: 'a', alias: null }] },
      ]);
    });

    it('rejects double-underscore names (KILN-P004)', () => {
      try {
        parse('{% from t import __x %}');
        expect.fail('Expected ParseAssertionError');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseAssertionError);
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.errorId).toBe('KILN-P004');
          expect(err.message).toBe(
            "Names starting with two underscores cannot be imported: '__x' at 1:18"
          );
        }
      }
    });
  });

  describe('macros and call blocks', () => {
    it('parses parameters and trailing defaults', () => {
      expect(
        body("{% macro input(name, type='text') %}x{% endmacro %}")
      ).toMatchObject([
        {
          type: 'Macro',
          name: 'input',
          params: [
            { type: 'Name', name: 'name', ctx: 'param' },
            { type: 'Name', name: 'type', ctx: 'param' },
          ],
          defaults: [{ type: 'Const', value: 'text' }],
          body: [{ type: 'Output', nodes: [{ value: 'x' }] }],
        },
      ]);
    });

    it('rejects a parameter without default after one with (KILN-P008)', () => {
      expect(() => parse('{% macro f(a=1, b) %}{% endmacro %}')).toThrow(
        "Non-default parameter 'b' follows default parameter at 1:17"
      );
    });

    it('parses a call block with a signature', () => {
      expect(
        body('{% call(user) list(users) %}{{ user }}{% endcall %}')
      ).toMatchObject([
        {
          type: 'CallBlock',
          params: [{ name: 'user', ctx: 'param' }],
          defaults: [],
          call: {
            type: 'Call',
            node: { name: 'list' },
            args: [{ name: 'users' }],
          },
          body: [{ type: 'Output', nodes: [{ name: 'user' }] }],
        },
      ]);
    });

    it('rejects a call block without a call (KILN-P006)', () => {
      expect(() => parse('{% call dialog %}x{% endcall %}')).toThrow(
        'Expected call at 1:4'
      );
    });

    it('parses a filter block with an inline chain', () => {
      expect(
        body('{% filter upper | trim %}x{% endfilter %}')
      ).toMatchObject([
        {
          type: 'FilterBlock',
          filter: {
            type: 'Filter',
            name: 'trim',
            node: { type: 'Filter', name: 'upper', node: null },
          },
          body: [{ type: 'Output', nodes: [{ value: 'x' }] }],
        },
      ]);
    });
  });

  describe('errors', () => {
    it('reports the unexpected token in a variable tag (KILN-P001)', () => {
      expect(() => parse('{{ a b }}')).toThrow(
        "Expected end of print statement, got 'b' at 1:6"
      );
    });

    it('carries the filename', () => {
      try {
        parse('{{ a + }}', { filename: 'page.html' });
        expect.fail('Expected ParseError');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.errorId).toBe('KILN-P002');
          expect(err.message).toBe('Unexpected end of print statement at 1:8');
          expect(err.filename).toBe('page.html');
          expect(err.line).toBe(1);
        }
      }
    });

    it('throws a plain Error for tokens outside any tag', () => {
      const parser = new Parser(tokenizeExpression('a'));

      try {
        parser.parse();
        expect.fail('Expected internal error');
      } catch (err) {
        expect(err).toBeInstanceOf(Error);
        expect(err).not.toBeInstanceOf(ParseError);
        expect(err).toHaveProperty(
          'message',
          'Internal parser error: unexpected NAME token between tags'
        );
      }
    });
  });
});
