import type { StatementNode } from './ast-nodes.js';
import type { Parser } from './parser/parser.js';

/**
 * Statement tag contributed by the host.
 *
 * When the parser meets `{% tag ... %}` for one of `tags`, it hands itself
 * to `parse` with the tag's name token still current. The extension
 * consumes its tokens up to (not including) the closing block delimiter
 * and returns the node(s) to splice into the enclosing body.
 *
 * @example
 * ```typescript
 * const note: Extension = {
 *   name: 'note',
 *   tags: ['note'],
 *   parse(parser) {
 *     const token = advance(parser.state);
 *     return { type: 'Output', nodes: [], span: token.span };
 *   },
 * };
 * ```
 */
export interface Extension {
  readonly name: string;
  readonly tags: readonly string[];
  parse(parser: Parser): StatementNode | StatementNode[];
}

/**
 * Index extensions by tag. A tag claimed twice keeps the first claimant;
 * `createEnvironment` rejects such configurations before they get here.
 */
export function createExtensionTable(
  extensions: readonly Extension[]
): ReadonlyMap<string, Extension> {
  const table = new Map<string, Extension>();
  for (const extension of extensions) {
    for (const tag of extension.tags) {
      if (!table.has(tag)) {
        table.set(tag, extension);
      }
    }
  }
  return table;
}
