/**
 * AST Walking
 * Child iteration and enter/exit traversal over template trees
 */

import type { ASTNode, CallArguments, NodeType } from './ast-nodes.js';

// ============================================================
// CHILD ITERATION
// ============================================================

function* callArgumentNodes(call: CallArguments): Generator<ASTNode> {
  yield* call.args;
  yield* call.kwargs;
  if (call.dynArgs) yield call.dynArgs;
  if (call.dynKwargs) yield call.dynKwargs;
}

/**
 * Direct children of `node` in source order.
 * Handles every node type in the ASTNode union.
 */
export function* iterChildNodes(node: ASTNode): Generator<ASTNode> {
  switch (node.type) {
    case 'Template':
      yield* node.body;
      break;

    case 'Output':
      yield* node.nodes;
      break;

    case 'Assign':
      yield node.target;
      yield node.value;
      break;

    case 'For':
      yield node.target;
      yield node.iter;
      if (node.test) yield node.test;
      yield* node.body;
      yield* node.elseBody;
      break;

    case 'If':
      yield node.test;
      yield* node.body;
      yield* node.elseBody;
      break;

    case 'Block':
      yield* node.body;
      break;

    case 'Extends':
    case 'Include':
    case 'Import':
    case 'FromImport':
      yield node.template;
      break;

    case 'Macro':
      yield* node.params;
      yield* node.defaults;
      yield* node.body;
      break;

    case 'CallBlock':
      yield* node.params;
      yield* node.defaults;
      yield node.call;
      yield* node.body;
      break;

    case 'FilterBlock':
      yield node.filter;
      yield* node.body;
      break;

    case 'ExprStmt':
      yield node.node;
      break;

    case 'Tuple':
    case 'List':
    case 'Dict':
      yield* node.items;
      break;

    case 'Pair':
      yield node.key;
      yield node.value;
      break;

    case 'BinaryExpr':
      yield node.left;
      yield node.right;
      break;

    case 'UnaryExpr':
      yield node.node;
      break;

    case 'Compare':
      yield node.expr;
      yield* node.ops;
      break;

    case 'Operand':
      yield node.expr;
      break;

    case 'Keyword':
      yield node.value;
      break;

    case 'CondExpr':
      yield node.test;
      yield node.ifTrue;
      yield node.ifFalse;
      break;

    case 'Subscript':
      yield node.node;
      yield node.arg;
      break;

    case 'Slice':
      if (node.start) yield node.start;
      if (node.stop) yield node.stop;
      if (node.step) yield node.step;
      break;

    case 'Call':
    case 'Test':
      yield node.node;
      yield* callArgumentNodes(node);
      break;

    case 'Filter':
      if (node.node) yield node.node;
      yield* callArgumentNodes(node);
      break;

    case 'Const':
    case 'Name':
    case 'Break':
    case 'Continue':
      // Leaf nodes - no children
      break;
  }
}

// ============================================================
// TRAVERSAL
// ============================================================

/**
 * Callbacks for `walk`. `enter` runs before a node's children,
 * `exit` after them.
 */
export interface NodeVisitor {
  enter?(node: ASTNode, parent: ASTNode | null): void;
  exit?(node: ASTNode, parent: ASTNode | null): void;
}

/** Depth-first traversal of `node` and all its descendants */
export function walk(
  node: ASTNode,
  visitor: NodeVisitor,
  parent: ASTNode | null = null
): void {
  visitor.enter?.(node, parent);
  for (const child of iterChildNodes(node)) {
    walk(child, visitor, node);
  }
  visitor.exit?.(node, parent);
}

export type NodeOfType<T extends NodeType> = Extract<ASTNode, { type: T }>;

export function isNodeOfType<T extends NodeType>(
  node: ASTNode,
  type: T
): node is NodeOfType<T> {
  return node.type === type;
}

/**
 * Every node of `type` under `node` (itself included), in pre-order.
 *
 * @example
 * ```typescript
 * const names = findAll(parse('{{ a + b }}'), 'Name').map((n) => n.name);
 * // ['a', 'b']
 * ```
 */
export function findAll<T extends NodeType>(
  node: ASTNode,
  type: T
): NodeOfType<T>[] {
  const found: NodeOfType<T>[] = [];
  walk(node, {
    enter(visited) {
      if (isNodeOfType(visited, type)) {
        found.push(visited);
      }
    },
  });
  return found;
}
