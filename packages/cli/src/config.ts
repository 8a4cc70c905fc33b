/**
 * CLI Configuration
 * Loads and validates the optional .kiln.json beside the templates.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  BUILTIN_EXTENSIONS,
  createEnvironment,
  DEFAULT_DELIMITERS,
  type Delimiters,
  type Environment,
  type Extension,
} from '@kiln/core';

// ============================================================
// TYPES
// ============================================================

export type DelimiterOverrides = { -readonly [K in keyof Delimiters]?: string };

export interface KilnConfig {
  readonly delimiters: DelimiterOverrides;
  /** Names of built-in extensions to enable */
  readonly extensions: readonly string[];
}

export const CONFIG_FILE = '.kiln.json';

const CONFIG_KEYS = ['delimiters', 'extensions'];

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDelimiterKey(key: string): key is keyof Delimiters {
  return Object.hasOwn(DEFAULT_DELIMITERS, key);
}

function validateDelimiters(value: unknown): DelimiterOverrides {
  if (!isRecord(value)) {
    throw invalid('delimiters must be an object');
  }

  const delimiters: DelimiterOverrides = {};
  for (const [key, delimiter] of Object.entries(value)) {
    if (!isDelimiterKey(key)) {
      throw invalid(`unknown delimiter '${key}'`);
    }
    if (typeof delimiter !== 'string') {
      throw invalid(`delimiters.${key} must be a string`);
    }
    delimiters[key] = delimiter;
  }
  return delimiters;
}

function validateExtensions(value: unknown): string[] {
  if (
    !Array.isArray(value) ||
    !value.every((name): name is string => typeof name === 'string')
  ) {
    throw invalid('extensions must be an array of strings');
  }
  for (const name of value) {
    if (!BUILTIN_EXTENSIONS.has(name)) {
      throw invalid(`unknown extension '${name}'`);
    }
  }
  return value;
}

/**
 * Check parsed JSON against the configuration shape.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function validateConfig(raw: unknown): KilnConfig {
  if (!isRecord(raw)) {
    throw invalid('expected an object');
  }
  for (const key of Object.keys(raw)) {
    if (!CONFIG_KEYS.includes(key)) {
      throw invalid(`unknown key '${key}'`);
    }
  }

  return {
    delimiters:
      raw['delimiters'] === undefined ? {} : validateDelimiters(raw['delimiters']),
    extensions:
      raw['extensions'] === undefined ? [] : validateExtensions(raw['extensions']),
  };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load .kiln.json from `dir`.
 * Returns null when the file does not exist.
 */
export function loadConfig(dir: string): KilnConfig | null {
  const configPath = join(dir, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw invalid(`${CONFIG_FILE} is not valid JSON (${reason})`);
  }
  return validateConfig(raw);
}

/** Parser environment for a configuration; defaults when there is none */
export function createEnvironmentFromConfig(
  config: KilnConfig | null
): Environment {
  if (config === null) {
    return createEnvironment();
  }

  const extensions: Extension[] = [];
  for (const name of config.extensions) {
    const extension = BUILTIN_EXTENSIONS.get(name);
    if (extension !== undefined) {
      extensions.push(extension);
    }
  }
  return createEnvironment({ ...config.delimiters, extensions });
}
