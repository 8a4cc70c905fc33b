/**
 * Parser Tests: Assignment Targets
 */

import { describe, expect, it } from 'vitest';
import { canAssign, parseExpression, toTarget } from '@kiln/core';

describe('canAssign', () => {
  it('accepts names, subscripts and tuples of them', () => {
    expect(canAssign(parseExpression('a'))).toBe(true);
    expect(canAssign(parseExpression('a.b'))).toBe(true);
    expect(canAssign(parseExpression('a, b[0]'))).toBe(true);
  });

  it('rejects constants and constant names', () => {
    expect(canAssign(parseExpression('1'))).toBe(false);
    expect(canAssign(parseExpression('none'))).toBe(false);
    expect(canAssign(parseExpression('a, 1'))).toBe(false);
  });

  it('rejects computed expressions', () => {
    expect(canAssign(parseExpression('a + b'))).toBe(false);
    expect(canAssign(parseExpression('f()'))).toBe(false);
    expect(canAssign(parseExpression('[a]'))).toBe(false);
  });
});

describe('toTarget', () => {
  it('copies a name with the new context', () => {
    const expr = parseExpression('a');
    const target = toTarget(expr, 'param');

    expect(target).toMatchObject({ type: 'Name', name: 'a', ctx: 'param' });
    expect(expr).toMatchObject({ ctx: 'load' });
  });

  it('keeps the subscripted object loaded', () => {
    expect(toTarget(parseExpression('x[0]'), 'store')).toMatchObject({
      type: 'Subscript',
      ctx: 'store',
      node: { type: 'Name', name: 'x', ctx: 'load' },
      arg: { type: 'Const', value: 0 },
    });
  });

  it('converts nested tuple items', () => {
    expect(toTarget(parseExpression('(a, (b, c))'), 'store')).toMatchObject({
      type: 'Tuple',
      ctx: 'store',
      items: [
        { name: 'a', ctx: 'store' },
        {
          type: 'Tuple',
          ctx: 'store',
          items: [
            { name: 'b', ctx: 'store' },
            { name: 'c', ctx: 'store' },
          ],
        },
      ],
    });
  });

  it('returns null when any item cannot be assigned', () => {
    expect(toTarget(parseExpression('a, true'), 'store')).toBeNull();
    expect(toTarget(parseExpression("'s'"), 'store')).toBeNull();
  });
});
