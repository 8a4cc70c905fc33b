/**
 * CLI Error Explanation
 * Renders registry documentation for `kiln-check --explain`
 */

import { ERROR_REGISTRY, type ErrorDefinition } from '@kiln/core';

const ERROR_ID_PATTERN = /^KILN-[LP]\d{3}$/;

function section(title: string, body: string): string[] {
  return [`${title}:`, `  ${body}`, ''];
}

function renderDefinition(definition: ErrorDefinition): string[] {
  const lines = [`${definition.errorId}: ${definition.description}`, ''];

  if (definition.cause !== undefined) {
    lines.push(...section('Cause', definition.cause));
  }
  if (definition.resolution !== undefined) {
    lines.push(...section('Resolution', definition.resolution));
  }

  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    lines.push('Examples:');
    for (const example of examples) {
      lines.push(`  ${example.description}`, '');
      lines.push(...example.code.split('\n').map((line) => `    ${line}`), '');
    }
  }
  return lines;
}

/**
 * Documentation for an error ID, or null when the ID is malformed or
 * not in the registry.
 *
 * @example
 * explainError('KILN-P006')
 * // "KILN-P006: Call block without call\n\nCause:\n  ..."
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }
  const definition = ERROR_REGISTRY.get(errorId);
  if (definition === undefined) {
    return null;
  }
  return renderDefinition(definition).join('\n').trimEnd();
}
