import type { Environment } from './environment.js';
import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

/**
 * How an assignable expression is used:
 * read (`load`), written (`store`) or bound as a macro parameter (`param`).
 */
export type ExprContext = 'load' | 'store' | 'param';

// ============================================================
// TEMPLATE ROOT
// ============================================================

export interface TemplateNode extends BaseNode {
  readonly type: 'Template';
  readonly body: StatementNode[];
  /** Configuration the template was parsed under */
  readonly environment: Environment;
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | OutputNode
  | AssignNode
  | ForNode
  | IfNode
  | BlockNode
  | ExtendsNode
  | IncludeNode
  | ImportNode
  | FromImportNode
  | MacroNode
  | CallBlockNode
  | FilterBlockNode
  | ExprStmtNode
  | BreakNode
  | ContinueNode;

/**
 * Literal data and `{{ }}` interpolations between two statement tags,
 * or the expressions of a `{% print %}` statement.
 */
export interface OutputNode extends BaseNode {
  readonly type: 'Output';
  readonly nodes: ExpressionNode[];
}

/** `{% target = value %}` */
export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly target: AssignTarget;
  readonly value: ExpressionNode;
}

/** `{% for target in iter [if test] %}body{% else %}elseBody{% endfor %}` */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly target: AssignTarget;
  readonly iter: ExpressionNode;
  readonly body: StatementNode[];
  readonly elseBody: StatementNode[];
  /** Loop filter: items for which it is false are skipped */
  readonly test: ExpressionNode | null;
}

/**
 * Conditional. An `elif` branch is represented as a single nested
 * IfNode in `elseBody`.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly test: ExpressionNode;
  readonly body: StatementNode[];
  readonly elseBody: StatementNode[];
}

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly name: string;
  readonly body: StatementNode[];
}

export interface ExtendsNode extends BaseNode {
  readonly type: 'Extends';
  readonly template: ExpressionNode;
}

export interface IncludeNode extends BaseNode {
  readonly type: 'Include';
  readonly template: ExpressionNode;
}

/** `{% import template as target %}` */
export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly template: ExpressionNode;
  readonly target: string;
}

export interface ImportName {
  readonly name: string;
  readonly alias: string | null;
}

/** `{% from template import name [as alias], ... %}` */
export interface FromImportNode extends BaseNode {
  readonly type: 'FromImport';
  readonly template: ExpressionNode;
  readonly names: ImportName[];
}

/**
 * Macro definition. `defaults` belong to the trailing parameters:
 * with 3 params and 1 default, the default is for the third.
 */
export interface MacroNode extends BaseNode {
  readonly type: 'Macro';
  readonly name: string;
  readonly params: NameNode[];
  readonly defaults: ExpressionNode[];
  readonly body: StatementNode[];
}

/** `{% call(params) callee(args) %}body{% endcall %}` */
export interface CallBlockNode extends BaseNode {
  readonly type: 'CallBlock';
  readonly params: NameNode[];
  readonly defaults: ExpressionNode[];
  readonly call: CallNode;
  readonly body: StatementNode[];
}

/** `{% filter name(args) | other %}body{% endfilter %}`; the innermost filter has no input */
export interface FilterBlockNode extends BaseNode {
  readonly type: 'FilterBlock';
  readonly filter: FilterNode;
  readonly body: StatementNode[];
}

/** Expression evaluated for its side effects */
export interface ExprStmtNode extends BaseNode {
  readonly type: 'ExprStmt';
  readonly node: ExpressionNode;
}

/** `{% break %}` (loop controls extension) */
export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

/** `{% continue %}` (loop controls extension) */
export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | ConstNode
  | NameNode
  | TupleNode
  | ListNode
  | DictNode
  | BinaryExprNode
  | UnaryExprNode
  | CompareNode
  | CondExprNode
  | SubscriptNode
  | SliceNode
  | CallNode
  | FilterNode
  | TestNode;

/** Expression shapes that may carry a `store` or `param` context */
export type AssignTarget = NameNode | TupleNode | SubscriptNode;

/** Integer literals outside the safe range are bigints */
export type ConstValue = string | number | bigint | boolean | null;

export interface ConstNode extends BaseNode {
  readonly type: 'Const';
  readonly value: ConstValue;
}

export interface NameNode extends BaseNode {
  readonly type: 'Name';
  readonly name: string;
  readonly ctx: ExprContext;
}

export interface TupleNode extends BaseNode {
  readonly type: 'Tuple';
  readonly items: ExpressionNode[];
  readonly ctx: ExprContext;
}

export interface ListNode extends BaseNode {
  readonly type: 'List';
  readonly items: ExpressionNode[];
}

export interface PairNode extends BaseNode {
  readonly type: 'Pair';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface DictNode extends BaseNode {
  readonly type: 'Dict';
  readonly items: PairNode[];
}

/** Binary operators, from loosest to tightest binding */
export type BinaryOp =
  | 'or'
  | 'and'
  | 'add'
  | 'sub'
  | 'concat'
  | 'mul'
  | 'div'
  | 'floordiv'
  | 'mod'
  | 'pow';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type UnaryOp = 'not' | 'neg' | 'pos';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly node: ExpressionNode;
}

export type CompareOp =
  | 'eq'
  | 'ne'
  | 'lt'
  | 'lteq'
  | 'gt'
  | 'gteq'
  | 'in'
  | 'notin';

export interface OperandNode extends BaseNode {
  readonly type: 'Operand';
  readonly op: CompareOp;
  readonly expr: ExpressionNode;
}

/**
 * Comparison chain: `a < b <= c` is one node with
 * `expr = a` and `ops = [lt b, lteq c]`.
 */
export interface CompareNode extends BaseNode {
  readonly type: 'Compare';
  readonly expr: ExpressionNode;
  readonly ops: OperandNode[];
}

/** `ifTrue if test else ifFalse` */
export interface CondExprNode extends BaseNode {
  readonly type: 'CondExpr';
  readonly test: ExpressionNode;
  readonly ifTrue: ExpressionNode;
  readonly ifFalse: ExpressionNode;
}

/** `node.attr`, `node.0` and `node[arg]` */
export interface SubscriptNode extends BaseNode {
  readonly type: 'Subscript';
  readonly node: ExpressionNode;
  readonly arg: ExpressionNode;
  readonly ctx: ExprContext;
}

/** `start:stop:step` inside a subscript; omitted parts are null */
export interface SliceNode extends BaseNode {
  readonly type: 'Slice';
  readonly start: ExpressionNode | null;
  readonly stop: ExpressionNode | null;
  readonly step: ExpressionNode | null;
}

export interface KeywordNode extends BaseNode {
  readonly type: 'Keyword';
  readonly key: string;
  readonly value: ExpressionNode;
}

/** Arguments shared by calls, filters and tests */
export interface CallArguments {
  readonly args: ExpressionNode[];
  readonly kwargs: KeywordNode[];
  /** `*expr` spread */
  readonly dynArgs: ExpressionNode | null;
  /** `**expr` spread */
  readonly dynKwargs: ExpressionNode | null;
}

export interface CallNode extends BaseNode, CallArguments {
  readonly type: 'Call';
  readonly node: ExpressionNode;
}

export interface FilterNode extends BaseNode, CallArguments {
  readonly type: 'Filter';
  /** Filtered value; null for the head of a filter block */
  readonly node: ExpressionNode | null;
  readonly name: string;
}

export interface TestNode extends BaseNode, CallArguments {
  readonly type: 'Test';
  readonly node: ExpressionNode;
  readonly name: string;
}

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type HelperNode = PairNode | KeywordNode | OperandNode;

export type ASTNode = TemplateNode | StatementNode | ExpressionNode | HelperNode;

export type NodeType = ASTNode['type'];
