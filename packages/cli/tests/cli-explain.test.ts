/**
 * Error Explanation Tests
 */

import { describe, expect, it } from 'vitest';
import { explainError } from '../src/cli-explain.js';

describe('explainError', () => {
  it('renders cause, resolution and examples', () => {
    expect(explainError('KILN-P006')).toBe(
      [
        'KILN-P006: Call block without call',
        '',
        'Cause:',
        '  A call block must invoke a macro or function.',
        '',
        'Resolution:',
        '  Add parentheses to invoke the callee.',
        '',
        'Examples:',
        '  Missing parentheses',
        '',
        '    {% call dialog %}body{% endcall %}',
      ].join('\n')
    );
  });

  it('lists every example', () => {
    const documentation = explainError('KILN-L003') ?? '';

    expect(documentation.split('\n').slice(-5)).toEqual([
      '    {# note',
      '',
      '  Missing variable terminator',
      '',
      '    {{ user.name',
    ]);
  });

  it('returns null for malformed IDs', () => {
    expect(explainError('P001')).toBeNull();
    expect(explainError('KILN-R001')).toBeNull();
  });

  it('returns null for unknown IDs', () => {
    expect(explainError('KILN-P099')).toBeNull();
  });
});
