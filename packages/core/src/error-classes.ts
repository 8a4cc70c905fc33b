/**
 * Kiln Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { formatLocation, type SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface KilnErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Name the template was parsed under, when the host supplied one */
  readonly filename?: string | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * Renders the definition's message template with `context` and returns the
 * class matching the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('KILN-P003', { target: 'const' }, location)
 * // ParseError: "Cannot assign to 'const' at 1:4"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation,
  filename?: string | undefined
): LexerError | ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  if (definition.category === 'lexer') {
    return new LexerError(errorId, message, location, context, filename);
  }
  if (errorId === RESERVED_IMPORT_ERROR_ID) {
    return new ParseAssertionError(message, location, context, filename);
  }
  return new ParseError(errorId, message, location, context, filename);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Kiln errors.
 * Provides structured data for host applications to format as needed.
 */
export class KilnError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly filename?: string | undefined;

  constructor(data: KilnErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'KilnError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
    this.filename = data.filename;
  }

  /** Line the error points at, if known */
  get line(): number | undefined {
    return this.location?.line;
  }

  /** Get structured error data for custom formatting */
  toData(): KilnErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
      filename: this.filename,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: KilnErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors */
export class LexerError extends KilnError {
  // Lexer errors always point into the source
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    filename?: string
  ) {
    assertCategory(errorId, 'lexer');
    super({ errorId, message, location, context, filename });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Template syntax errors */
export class ParseError extends KilnError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    filename?: string
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context, filename });
    this.name = 'ParseError';
    this.location = location;
  }
}

const RESERVED_IMPORT_ERROR_ID = 'KILN-P004';

/**
 * Syntax that parses but violates a hard language rule
 * (importing a double-underscore name).
 */
export class ParseAssertionError extends ParseError {
  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    filename?: string
  ) {
    super(RESERVED_IMPORT_ERROR_ID, message, location, context, filename);
    this.name = 'ParseAssertionError';
  }
}
