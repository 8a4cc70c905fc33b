/**
 * kiln-check Tests
 * Argument parsing, diagnostics and the main entry point against temp files.
 */

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createEnvironment } from '@kiln/core';
import {
  checkSource,
  createReport,
  formatDiagnostic,
  main,
  parseCheckArgs,
} from '../src/cli-check.js';

// ============================================================
// ARGUMENTS
// ============================================================

describe('parseCheckArgs', () => {
  it('defaults to text output', () => {
    expect(parseCheckArgs(['page.html'])).toEqual({
      mode: 'check',
      file: 'page.html',
      format: 'text',
      verbose: false,
    });
  });

  it('reads --format and --verbose', () => {
    expect(parseCheckArgs(['--format', 'json', '--verbose', 'a.html'])).toEqual({
      mode: 'check',
      file: 'a.html',
      format: 'json',
      verbose: true,
    });
  });

  it('reads --explain without a file', () => {
    expect(parseCheckArgs(['--explain', 'KILN-P001'])).toEqual({
      mode: 'explain',
      errorId: 'KILN-P001',
    });
  });

  it('returns help and version modes', () => {
    expect(parseCheckArgs(['-h'])).toEqual({ mode: 'help' });
    expect(parseCheckArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('rejects bad arguments', () => {
    expect(() => parseCheckArgs(['--format', 'xml', 'a.html'])).toThrow(
      'Invalid --format value: xml. Must be one of: text, json'
    );
    expect(() => parseCheckArgs([])).toThrow('Missing file argument');
    expect(() => parseCheckArgs(['a.html', 'b.html'])).toThrow(
      'Unexpected argument: b.html'
    );
    expect(() => parseCheckArgs(['--fix', 'a.html'])).toThrow(
      'Unknown option: --fix'
    );
  });
});

// ============================================================
// CHECKING
// ============================================================

describe('checkSource', () => {
  const environment = createEnvironment();

  it('returns null for a valid template', () => {
    expect(checkSource('Hi {{ name }}', 'page.html', environment)).toBeNull();
  });

  it('returns the syntax error', () => {
    const error = checkSource('{{ a b }}', 'page.html', environment);

    expect(error?.errorId).toBe('KILN-P001');
    expect(error?.filename).toBe('page.html');
  });
});

describe('formatDiagnostic', () => {
  it('renders file, position, message and ID', () => {
    const error = checkSource('{{ a b }}', 'page.html', createEnvironment());
    if (error === null) throw new Error('Expected a syntax error');

    expect(formatDiagnostic(error)).toBe(
      "page.html:1:6: error: Expected end of print statement, got 'b' (KILN-P001)"
    );
  });
});

describe('createReport', () => {
  it('marks valid templates', () => {
    expect(createReport('ok.html', null)).toEqual({
      file: 'ok.html',
      valid: true,
      errors: [],
    });
  });

  it('lists the error position', () => {
    const error = checkSource('{% 1 = 2 %}', 'bad.html', createEnvironment());

    expect(createReport('bad.html', error)).toEqual({
      file: 'bad.html',
      valid: false,
      errors: [
        {
          errorId: 'KILN-P003',
          message: "Cannot assign to 'const'",
          line: 1,
          column: 4,
          offset: 3,
        },
      ],
    });
  });
});

// ============================================================
// MAIN
// ============================================================

describe('main', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kiln-check-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeFile(name: string, content: string): Promise<void> {
    await fs.writeFile(path.join(dir, name), content, 'utf-8');
  }

  function errorLines(): unknown[] {
    return errorSpy.mock.calls.map((call) => call[0]);
  }

  it('exits 0 silently for a valid template', async () => {
    await writeFile('ok.html', 'Hello {{ name }}');

    expect(await main(['ok.html'], dir)).toBe(0);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('exits 3 with a diagnostic for a syntax error', async () => {
    await writeFile('bad.html', '{{ a b }}');

    expect(await main(['bad.html'], dir)).toBe(3);
    expect(errorLines()).toEqual([
      "bad.html:1:6: error: Expected end of print statement, got 'b' (KILN-P001)",
    ]);
  });

  it('adds the snippet and a help line with --verbose', async () => {
    await writeFile('bad.html', '{{ a b }}');

    expect(await main(['--verbose', 'bad.html'], dir)).toBe(3);
    expect(errorLines()).toEqual([
      "bad.html:1:6: error: Expected end of print statement, got 'b' (KILN-P001)",
      [
        "error[KILN-P001]: Expected end of print statement, got 'b'",
        '  --> bad.html:1:6',
        '   |',
        ' 1 | {{ a b }}',
        '   |      ^',
      ].join('\n'),
      '   = help: Check the statement syntax near the reported position, including end tags and closing brackets.',
    ]);
  });

  it('prints a JSON report', async () => {
    await writeFile('bad.html', '{{ a + }}');

    expect(await main(['--format', 'json', 'bad.html'], dir)).toBe(3);
    const output: unknown = logSpy.mock.calls[0]?.[0];
    expect(JSON.parse(String(output))).toEqual({
      file: 'bad.html',
      valid: false,
      errors: [
        {
          errorId: 'KILN-P002',
          message: 'Unexpected end of print statement',
          line: 1,
          column: 8,
          offset: 7,
        },
      ],
    });
  });

  it('exits 2 when the file is missing', async () => {
    expect(await main(['missing.html'], dir)).toBe(2);
    expect(errorLines()).toEqual([
      `File not found: ${path.join(dir, 'missing.html')}`,
    ]);
  });

  it('exits 1 on usage errors', async () => {
    expect(await main(['--fix', 'a.html'], dir)).toBe(1);
    expect(errorLines()[0]).toBe('Unknown option: --fix');
  });

  it('prints the version', async () => {
    expect(await main(['-v'], dir)).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('0.1.0');
  });

  it('explains an error ID', async () => {
    expect(await main(['--explain', 'KILN-P006'], dir)).toBe(0);
    const output: unknown = logSpy.mock.calls[0]?.[0];
    expect(String(output).split('\n')[0]).toBe(
      'KILN-P006: Call block without call'
    );
  });

  it('exits 1 for an unknown error ID', async () => {
    expect(await main(['--explain', 'KILN-X1'], dir)).toBe(1);
    expect(errorLines()[0]).toBe('Unknown error ID: KILN-X1');
  });

  it('enables extensions from .kiln.json', async () => {
    await writeFile('do.html', '{% do items.append(1) %}');
    expect(await main(['do.html'], dir)).toBe(3);

    errorSpy.mockClear();
    await writeFile('.kiln.json', JSON.stringify({ extensions: ['do'] }));
    expect(await main(['do.html'], dir)).toBe(0);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('exits 1 on an invalid configuration', async () => {
    await writeFile('ok.html', 'x');
    await writeFile('.kiln.json', JSON.stringify({ rules: {} }));

    expect(await main(['ok.html'], dir)).toBe(1);
    expect(errorLines()).toEqual(["Invalid configuration: unknown key 'rules'"]);
  });
});
