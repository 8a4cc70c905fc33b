/**
 * Configuration Loader Tests
 * Tests for .kiln.json loading and validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createEnvironment, loopControlsExtension } from '@kiln/core';
import {
  CONFIG_FILE,
  createEnvironmentFromConfig,
  loadConfig,
  validateConfig,
} from '../src/config.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'kiln-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(content: string): void {
  writeFileSync(join(dir, CONFIG_FILE), content, 'utf-8');
}

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  it('returns null when the file does not exist', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  it('loads an empty configuration', () => {
    writeConfig('{}');
    expect(loadConfig(dir)).toEqual({ delimiters: {}, extensions: [] });
  });

  it('loads delimiters and extensions', () => {
    writeConfig(
      JSON.stringify({
        delimiters: { variableStart: '${', variableEnd: '}' },
        extensions: ['do'],
      })
    );

    expect(loadConfig(dir)).toEqual({
      delimiters: { variableStart: '${', variableEnd: '}' },
      extensions: ['do'],
    });
  });

  it('rejects malformed JSON', () => {
    writeConfig('{ nope');
    expect(() => loadConfig(dir)).toThrow(
      'Invalid configuration: .kiln.json is not valid JSON ('
    );
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('validateConfig', () => {
  it('requires an object', () => {
    expect(() => validateConfig([])).toThrow(
      'Invalid configuration: expected an object'
    );
    expect(() => validateConfig(null)).toThrow(
      'Invalid configuration: expected an object'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ rules: {} })).toThrow(
      "Invalid configuration: unknown key 'rules'"
    );
  });

  it('validates delimiters', () => {
    expect(() => validateConfig({ delimiters: 'x' })).toThrow(
      'Invalid configuration: delimiters must be an object'
    );
    expect(() => validateConfig({ delimiters: { start: '<' } })).toThrow(
      "Invalid configuration: unknown delimiter 'start'"
    );
    expect(() => validateConfig({ delimiters: { blockStart: 1 } })).toThrow(
      'Invalid configuration: delimiters.blockStart must be a string'
    );
  });

  it('validates extensions', () => {
    expect(() => validateConfig({ extensions: 'do' })).toThrow(
      'Invalid configuration: extensions must be an array of strings'
    );
    expect(() => validateConfig({ extensions: ['i18n'] })).toThrow(
      "Invalid configuration: unknown extension 'i18n'"
    );
  });
});

// ============================================================
// ENVIRONMENT
// ============================================================

describe('createEnvironmentFromConfig', () => {
  it('uses the defaults without configuration', () => {
    expect(createEnvironmentFromConfig(null)).toEqual(createEnvironment());
  });

  it('applies delimiters and built-in extensions', () => {
    const environment = createEnvironmentFromConfig({
      delimiters: { variableStart: '${', variableEnd: '}' },
      extensions: ['loopcontrols'],
    });

    expect(environment.variableStart).toBe('${');
    expect(environment.variableEnd).toBe('}');
    expect(environment.blockStart).toBe('{%');
    expect(environment.extensions).toEqual([loopControlsExtension]);
  });

  it('surfaces environment validation errors', () => {
    expect(() =>
      createEnvironmentFromConfig({
        delimiters: { blockStart: '' },
        extensions: [],
      })
    ).toThrow('Invalid environment: blockStart must be a non-empty string');
  });
});
