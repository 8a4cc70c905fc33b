/**
 * Lexer Tests: Tokenizer
 * Template data, tag contents, comments, raw blocks and lexer errors
 */

import { describe, expect, it } from 'vitest';
import {
  createEnvironment,
  LexerError,
  tokenize,
  tokenizeExpression,
} from '@kiln/core';

function types(source: string): string[] {
  return tokenize(source).map((token) => token.type);
}

function values(source: string): string[] {
  return tokenize(source).map((token) => token.value);
}

describe('tokenize', () => {
  describe('template data', () => {
    it('emits literal text as a single DATA token', () => {
      expect(types('Hello, world')).toEqual(['DATA', 'EOF']);
      expect(values('Hello, world')).toEqual(['Hello, world', '']);
    });

    it('emits only EOF for empty source', () => {
      expect(types('')).toEqual(['EOF']);
    });

    it('splits data around variable tags', () => {
      expect(types('Hello {{ name }}!')).toEqual([
        'DATA',
        'VARIABLE_BEGIN',
        'NAME',
        'VARIABLE_END',
        'DATA',
        'EOF',
      ]);
    });

    it('tracks line, column and offset', () => {
      const tokens = tokenize('Hello {{ name }}!');
      expect(tokens[0]?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 7, offset: 6 },
      });
      expect(tokens[2]?.span.start).toEqual({ line: 1, column: 10, offset: 9 });
      expect(tokens[3]?.span.start).toEqual({ line: 1, column: 15, offset: 14 });
      expect(tokens[5]?.span.start).toEqual({ line: 1, column: 18, offset: 17 });
    });

    it('counts lines across newlines in data', () => {
      const name = tokenize('a\n{{ b }}')[2];
      expect(name?.value).toBe('b');
      expect(name?.span.start).toEqual({ line: 2, column: 4, offset: 5 });
    });
  });

  describe('tag contents', () => {
    it('maps statement keywords to keyword tokens', () => {
      expect(types('{% for x in items %}')).toEqual([
        'BLOCK_BEGIN',
        'FOR',
        'NAME',
        'IN',
        'NAME',
        'BLOCK_END',
        'EOF',
      ]);
    });

    it('keeps true, none and as as plain names', () => {
      expect(types('{{ true none as }}')).toEqual([
        'VARIABLE_BEGIN',
        'NAME',
        'NAME',
        'NAME',
        'VARIABLE_END',
        'EOF',
      ]);
    });

    it('matches two-character operators first', () => {
      expect(types('{{ a ** b // c <= d }}')).toEqual([
        'VARIABLE_BEGIN',
        'NAME',
        'POW',
        'NAME',
        'FLOORDIV',
        'NAME',
        'LTEQ',
        'NAME',
        'VARIABLE_END',
        'EOF',
      ]);
    });

    it('reads integers and floats', () => {
      const tokens = tokenize('{{ 42 3.14 }}');
      expect(tokens[1]).toMatchObject({ type: 'INTEGER', value: '42' });
      expect(tokens[2]).toMatchObject({ type: 'FLOAT', value: '3.14' });
    });

    it('reads integer indexes after a dot', () => {
      expect(types('{{ row.0.1 }}')).toEqual([
        'VARIABLE_BEGIN',
        'NAME',
        'DOT',
        'INTEGER',
        'DOT',
        'INTEGER',
        'VARIABLE_END',
        'EOF',
      ]);
    });

    it('unescapes string contents', () => {
      const tokens = tokenize("{{ 'it\\'s' \"a\\nb\" }}");
      expect(tokens[1]).toMatchObject({ type: 'STRING', value: "it's" });
      expect(tokens[2]).toMatchObject({ type: 'STRING', value: 'a\nb' });
    });

    it('keeps unknown escapes literally', () => {
      expect(tokenize("{{ 'a\\db' }}")[1]?.value).toBe('a\\db');
    });

    it('waits for open braces before closing a variable tag', () => {
      expect(types("{{ {'a': {'b': 1}} }}")).toEqual([
        'VARIABLE_BEGIN',
        'LBRACE',
        'STRING',
        'COLON',
        'LBRACE',
        'STRING',
        'COLON',
        'INTEGER',
        'RBRACE',
        'RBRACE',
        'VARIABLE_END',
        'EOF',
      ]);
    });

    it('reads the modulo operator inside block tags', () => {
      expect(types('{% x = 5 % 2 %}')).toEqual([
        'BLOCK_BEGIN',
        'NAME',
        'ASSIGN',
        'INTEGER',
        'MOD',
        'INTEGER',
        'BLOCK_END',
        'EOF',
      ]);
    });
  });

  describe('comments and raw blocks', () => {
    it('drops comments', () => {
      expect(values('a{# note #}b')).toEqual(['a', 'b', '']);
    });

    it('emits raw block contents as data', () => {
      const tokens = tokenize('{% raw %}{{ x }}{% endraw %}');
      expect(tokens.map((token) => token.type)).toEqual(['DATA', 'EOF']);
      expect(tokens[0]?.value).toBe('{{ x }}');
    });

    it('emits nothing for an empty raw block', () => {
      expect(types('{% raw %}{% endraw %}')).toEqual(['EOF']);
    });
  });

  describe('custom delimiters', () => {
    it('uses the environment delimiters', () => {
      const environment = createEnvironment({
        variableStart: '${',
        variableEnd: '}',
      });
      const tokens = tokenize('x ${ y } z', { environment });
      expect(tokens.map((token) => [token.type, token.value])).toEqual([
        ['DATA', 'x '],
        ['VARIABLE_BEGIN', '${'],
        ['NAME', 'y'],
        ['VARIABLE_END', '}'],
        ['DATA', ' z'],
        ['EOF', ''],
      ]);
    });
  });

  describe('errors', () => {
    it('rejects unterminated strings (KILN-L001)', () => {
      expect(() => tokenize("{{ 'abc }}")).toThrow(
        'Unterminated string literal at 1:4'
      );
    });

    it('rejects unknown characters (KILN-L002)', () => {
      expect(() => tokenize('{{ $x }}')).toThrow(
        "Unexpected character '$' at 1:4"
      );
    });

    it('rejects unclosed comments (KILN-L003)', () => {
      expect(() => tokenize('{# note')).toThrow(
        "Unclosed comment, expected '#}' at 1:1"
      );
    });

    it('rejects unclosed variable tags (KILN-L003)', () => {
      expect(() => tokenize('{{ a ')).toThrow(
        "Unclosed variable tag, expected '}}' at 1:1"
      );
    });

    it('rejects unclosed raw blocks (KILN-L003)', () => {
      expect(() => tokenize('{% raw %}abc')).toThrow(
        "Unclosed raw block, expected '{% endraw %}' at 1:1"
      );
    });

    it('carries error ID, location and filename', () => {
      try {
        tokenize('ok\n{{ # }}', { filename: 'page.html' });
        expect.fail('Expected LexerError');
      } catch (err) {
        expect(err).toBeInstanceOf(LexerError);
        if (err instanceof LexerError) {
          expect(err.errorId).toBe('KILN-L002');
          expect(err.location).toEqual({ line: 2, column: 4, offset: 6 });
          expect(err.filename).toBe('page.html');
        }
      }
    });
  });
});

describe('tokenizeExpression', () => {
  it('tokenizes a bare expression without tag tokens', () => {
    expect(tokenizeExpression('a + 1').map((token) => token.type)).toEqual([
      'NAME',
      'ADD',
      'INTEGER',
      'EOF',
    ]);
  });
});
