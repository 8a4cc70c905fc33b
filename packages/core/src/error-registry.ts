/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Template source demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: KILN-{category}{3-digit} (e.g., KILN-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (KILN-L0xx)
  {
    errorId: 'KILN-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote inside a tag but never closed.',
    resolution: 'Add the matching closing quote before the end of the tag.',
    examples: [
      {
        description: 'Missing closing quote',
        code: "{{ 'hello }}",
      },
    ],
  },
  {
    errorId: 'KILN-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character {char}',
    cause: 'Character inside a tag is not part of the expression syntax.',
    resolution:
      'Remove the character, or move it outside the tag if it is literal text.',
    examples: [
      {
        description: 'Dollar sign inside an expression',
        code: '{{ $price }}',
      },
    ],
  },
  {
    errorId: 'KILN-L003',
    category: 'lexer',
    description: 'Unclosed tag',
    messageTemplate: 'Unclosed {construct}, expected {expected}',
    cause: 'A tag or comment was opened but the template ended first.',
    resolution: 'Close the tag with its end delimiter.',
    examples: [
      {
        description: 'Missing comment terminator',
        code: '{# note',
      },
      {
        description: 'Missing variable terminator',
        code: '{{ user.name',
      },
    ],
  },

  // Parse Errors (KILN-P0xx)
  {
    errorId: 'KILN-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Expected {expected}, got {actual}',
    cause: 'The parser required a specific token at this position.',
    resolution:
      'Check the statement syntax near the reported position, including end tags and closing brackets.',
    examples: [
      {
        description: 'Loop without the in keyword',
        code: '{% for item items %}{% endfor %}',
      },
      {
        description: 'Unclosed parenthesis',
        code: '{{ (a + b }}',
      },
    ],
  },
  {
    errorId: 'KILN-P002',
    category: 'parse',
    description: 'Unexpected token in expression',
    messageTemplate: 'Unexpected {actual}',
    cause: 'The token cannot start an expression.',
    resolution: 'Supply a name, literal, or bracketed expression here.',
    examples: [
      {
        description: 'Dangling operator',
        code: '{{ a + }}',
      },
    ],
  },
  {
    errorId: 'KILN-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: "Cannot assign to '{target}'",
    cause:
      'Only names, subscripts and tuples of those can be assigned, looped over or bound.',
    resolution: 'Use a plain variable name as the target.',
    examples: [
      {
        description: 'Assigning to a literal',
        code: '{% 1 = 2 %}',
      },
      {
        description: 'Binding an import to a constant name',
        code: "{% import 'forms.html' as true %}",
      },
    ],
  },
  {
    errorId: 'KILN-P004',
    category: 'parse',
    description: 'Reserved import name',
    messageTemplate:
      "Names starting with two underscores cannot be imported: '{name}'",
    cause: 'Double-underscore names are private to the imported template.',
    resolution: 'Import a public name instead.',
    examples: [
      {
        description: 'Importing a private helper',
        code: "{% from 'forms.html' import __helper %}",
      },
    ],
  },
  {
    errorId: 'KILN-P005',
    category: 'parse',
    description: 'Invalid call arguments',
    messageTemplate: 'Invalid syntax for function call expression',
    cause:
      'Positional arguments follow keyword arguments, or *args/**kwargs repeat or are followed by more arguments.',
    resolution:
      'Order arguments as positional, keyword, *args, **kwargs, each spread at most once.',
    examples: [
      {
        description: 'Positional after keyword',
        code: '{{ f(a=1, 2) }}',
      },
      {
        description: 'Repeated spread',
        code: '{{ f(*a, *b) }}',
      },
    ],
  },
  {
    errorId: 'KILN-P006',
    category: 'parse',
    description: 'Call block without call',
    messageTemplate: 'Expected call',
    cause: 'A call block must invoke a macro or function.',
    resolution: 'Add parentheses to invoke the callee.',
    examples: [
      {
        description: 'Missing parentheses',
        code: '{% call dialog %}body{% endcall %}',
      },
    ],
  },
  {
    errorId: 'KILN-P007',
    category: 'parse',
    description: 'Invalid attribute access',
    messageTemplate: "Expected name or number after '.', got {actual}",
    cause: 'Dot access must be followed by an identifier or an integer index.',
    resolution: 'Use bracket syntax for computed keys.',
    examples: [
      {
        description: 'String after dot',
        code: "{{ user.'name' }}",
      },
    ],
  },
  {
    errorId: 'KILN-P008',
    category: 'parse',
    description: 'Parameter order',
    messageTemplate: "Non-default parameter '{name}' follows default parameter",
    cause:
      'Defaults are matched to the trailing parameters, so none may follow a defaulted one without its own default.',
    resolution: 'Move the parameter before the defaulted ones or give it a default.',
    examples: [
      {
        description: 'Required parameter after optional one',
        code: '{% macro input(type="text", name) %}{% endmacro %}',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "name", actual: "')'"})
 * // Returns: "Expected name, got ')'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
