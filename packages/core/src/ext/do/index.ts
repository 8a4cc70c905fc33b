/**
 * Do Extension
 *
 * `{% do expr %}` evaluates an expression for its side effects without
 * printing it, e.g. `{% do items.append(item) %}`.
 */

import type { ExprStmtNode } from '../../ast-nodes.js';
import type { Extension } from '../../extensions.js';
import { advance } from '../../parser/state.js';
import { makeSpan } from '../../source-location.js';

export const doExtension: Extension = {
  name: 'do',
  tags: ['do'],
  parse(parser): ExprStmtNode {
    const start = advance(parser.state).span.start;
    const node = parser.parseTuple();
    return {
      type: 'ExprStmt',
      node,
      span: makeSpan(start, node.span.end),
    };
  },
};
