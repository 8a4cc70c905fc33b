/**
 * Environment
 * Delimiter configuration and extension list a template is parsed under
 */

import type { Extension } from './extensions.js';
import { lookupKeyword } from './token-types.js';

// ============================================================
// TYPES
// ============================================================

export interface Delimiters {
  readonly blockStart: string;
  readonly blockEnd: string;
  readonly variableStart: string;
  readonly variableEnd: string;
  readonly commentStart: string;
  readonly commentEnd: string;
}

export interface EnvironmentOptions extends Partial<Delimiters> {
  readonly extensions?: readonly Extension[] | undefined;
}

export interface Environment extends Delimiters {
  readonly extensions: readonly Extension[];
}

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_DELIMITERS: Delimiters = Object.freeze({
  blockStart: '{%',
  blockEnd: '%}',
  variableStart: '{{',
  variableEnd: '}}',
  commentStart: '{#',
  commentEnd: '#}',
});

const DELIMITER_KEYS = [
  'blockStart',
  'blockEnd',
  'variableStart',
  'variableEnd',
  'commentStart',
  'commentEnd',
] as const satisfies readonly (keyof Delimiters)[];

// ============================================================
// VALIDATION
// ============================================================

function validateDelimiters(delimiters: Delimiters): void {
  for (const key of DELIMITER_KEYS) {
    const value = delimiters[key];
    if (typeof value !== 'string' || value.length === 0) {
      throw new TypeError(
        `Invalid environment: ${key} must be a non-empty string`
      );
    }
  }

  const starts = [
    delimiters.blockStart,
    delimiters.variableStart,
    delimiters.commentStart,
  ];
  if (new Set(starts).size !== starts.length) {
    throw new TypeError(
      'Invalid environment: block, variable and comment start delimiters must differ'
    );
  }
}

function validateExtensions(extensions: readonly Extension[]): void {
  const claimed = new Map<string, string>();
  for (const extension of extensions) {
    for (const tag of extension.tags) {
      if (lookupKeyword(tag) !== undefined) {
        throw new TypeError(
          `Invalid environment: extension ${extension.name} uses reserved keyword '${tag}' as a tag`
        );
      }
      const owner = claimed.get(tag);
      if (owner !== undefined) {
        throw new TypeError(
          `Invalid environment: tag '${tag}' is claimed by both ${owner} and ${extension.name}`
        );
      }
      claimed.set(tag, extension.name);
    }
  }
}

// ============================================================
// FACTORY
// ============================================================

/**
 * Create a frozen environment from options, filling unset delimiters with
 * the defaults.
 *
 * @throws TypeError with "Invalid environment: {reason}"
 *
 * @example
 * ```typescript
 * const env = createEnvironment({
 *   variableStart: '${',
 *   variableEnd: '}',
 *   extensions: [doExtension],
 * });
 * ```
 */
export function createEnvironment(
  options: EnvironmentOptions = {}
): Environment {
  const delimiters: Delimiters = {
    blockStart: options.blockStart ?? DEFAULT_DELIMITERS.blockStart,
    blockEnd: options.blockEnd ?? DEFAULT_DELIMITERS.blockEnd,
    variableStart: options.variableStart ?? DEFAULT_DELIMITERS.variableStart,
    variableEnd: options.variableEnd ?? DEFAULT_DELIMITERS.variableEnd,
    commentStart: options.commentStart ?? DEFAULT_DELIMITERS.commentStart,
    commentEnd: options.commentEnd ?? DEFAULT_DELIMITERS.commentEnd,
  };
  validateDelimiters(delimiters);

  const extensions = Object.freeze([...(options.extensions ?? [])]);
  validateExtensions(extensions);

  return Object.freeze({ ...delimiters, extensions });
}
