/**
 * Loop Controls Extension
 *
 * Adds `{% break %}` and `{% continue %}`. Whether they appear inside a loop
 * is left to whatever consumes the tree.
 */

import type { BreakNode, ContinueNode } from '../../ast-nodes.js';
import type { Extension } from '../../extensions.js';
import { advance } from '../../parser/state.js';

export const loopControlsExtension: Extension = {
  name: 'loopcontrols',
  tags: ['break', 'continue'],
  parse(parser): BreakNode | ContinueNode {
    const token = advance(parser.state);
    if (token.value === 'break') {
      return { type: 'Break', span: token.span };
    }
    return { type: 'Continue', span: token.span };
  },
};
