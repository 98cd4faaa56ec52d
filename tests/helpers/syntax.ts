/**
 * Syntax tree builders for tests
 *
 * Shorthand constructors for the name-based tree the resolver consumes.
 * Spans default to UNKNOWN_SPAN; pass one where a test checks locations.
 */

import {
  UNKNOWN_SPAN,
  type Operator,
  type PathMember,
  type Span,
} from '../../src/index.js';
import type {
  BlockNode,
  CallNode,
  CellPathNode,
  FlagNode,
  ImportMemberNode,
  ImportPatternNode,
  ParamNode,
  PathNode,
  PipelineNode,
  Program,
  RangeNode,
  SyntaxNode,
} from '../../src/resolver/syntax.js';

/** A pipeline, or a single node standing for a one-element pipeline */
export type Statement = PipelineNode | SyntaxNode;

function isPipeline(statement: Statement): statement is PipelineNode {
  return !('kind' in statement);
}

function toPipelines(statements: readonly Statement[]): PipelineNode[] {
  return statements.map((statement) =>
    isPipeline(statement) ? statement : { elements: [statement] }
  );
}

function toPath(members: readonly (string | number)[]): PathMember[] {
  return members.map((member): PathMember =>
    typeof member === 'number'
      ? { type: 'int', val: member, span: UNKNOWN_SPAN }
      : { type: 'string', val: member, span: UNKNOWN_SPAN }
  );
}

// ============================================================
// LITERALS
// ============================================================

export const nothing = (span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'nothing',
  span,
});

export const bool = (val: boolean, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'bool',
  val,
  span,
});

export const int = (val: number, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'int',
  val,
  span,
});

export const float = (val: number, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'float',
  val,
  span,
});

export const str = (val: string, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'string',
  val,
  span,
});

export const list = (...items: SyntaxNode[]): SyntaxNode => ({
  kind: 'list',
  items,
  span: UNKNOWN_SPAN,
});

/** Record literal; field order follows the object's key order */
export const rec = (
  fields: Record<string, SyntaxNode>,
  span: Span = UNKNOWN_SPAN
): SyntaxNode => ({
  kind: 'record',
  fields: Object.entries(fields),
  span,
});

export const table = (
  columns: string[],
  ...rows: SyntaxNode[][]
): SyntaxNode => ({
  kind: 'table',
  columns,
  rows,
  span: UNKNOWN_SPAN,
});

function rangeBound(bound: number | SyntaxNode | null): SyntaxNode | null {
  return typeof bound === 'number' ? int(bound) : bound;
}

/** `from..to`, or `from..<to` with `exclusive` */
export const range = (
  from: number | SyntaxNode | null,
  to: number | SyntaxNode | null,
  options: { exclusive?: boolean; next?: number } = {}
): RangeNode => ({
  kind: 'range',
  from: rangeBound(from),
  next: options.next === undefined ? null : int(options.next),
  to: rangeBound(to),
  inclusion: options.exclusive ? 'rightExclusive' : 'inclusive',
  span: UNKNOWN_SPAN,
});

// ============================================================
// NAMES AND OPERATORS
// ============================================================

/** `$name` */
export const v = (name: string, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'var',
  name,
  span,
});

/** `$env.key` */
export const env = (key: string, span: Span = UNKNOWN_SPAN): SyntaxNode => ({
  kind: 'env',
  key,
  span,
});

export const bin = (
  lhs: SyntaxNode,
  op: Operator,
  rhs: SyntaxNode,
  opSpan: Span = UNKNOWN_SPAN
): SyntaxNode => ({
  kind: 'binary',
  op,
  opSpan,
  lhs,
  rhs,
  span: UNKNOWN_SPAN,
});

/** `head.a.0` */
export const path = (
  head: SyntaxNode,
  ...members: (string | number)[]
): PathNode => ({
  kind: 'path',
  head,
  tail: toPath(members),
  span: UNKNOWN_SPAN,
});

/** Cell path argument such as `name.0` */
export const cellPath = (...members: (string | number)[]): CellPathNode => ({
  kind: 'cellPath',
  members: toPath(members),
  span: UNKNOWN_SPAN,
});

// ============================================================
// BLOCKS
// ============================================================

export const param = (
  name: string,
  options: { optional?: boolean; rest?: boolean; flag?: boolean } = {}
): ParamNode => ({
  name,
  span: UNKNOWN_SPAN,
  optional: options.optional,
  rest: options.rest,
  flag: options.flag,
});

/** `{ body }`, or `{|params| body }` when params are given */
export const block = (
  body: Statement[],
  params: (string | ParamNode)[] | null = null
): BlockNode => ({
  kind: 'block',
  params:
    params === null
      ? null
      : params.map((p) => (typeof p === 'string' ? param(p) : p)),
  body: toPipelines(body),
  span: UNKNOWN_SPAN,
});

/** Row condition evaluated with the row bound to `$it` */
export const cond = (condition: SyntaxNode): SyntaxNode => ({
  kind: 'rowCondition',
  condition,
  span: UNKNOWN_SPAN,
});

/** `( ... )` */
export const sub = (...body: Statement[]): SyntaxNode => ({
  kind: 'subexpression',
  body: toPipelines(body),
  span: UNKNOWN_SPAN,
});

// ============================================================
// CALLS
// ============================================================

export const flag = (name: string, value: SyntaxNode | null = null): FlagNode => ({
  kind: 'flag',
  name,
  value,
  span: UNKNOWN_SPAN,
});

export const call = (
  name: string,
  ...args: (SyntaxNode | FlagNode)[]
): CallNode => ({
  kind: 'call',
  name,
  head: UNKNOWN_SPAN,
  args,
  span: UNKNOWN_SPAN,
});

/** Call with an explicit head span */
export const callAt = (
  name: string,
  head: Span,
  ...args: (SyntaxNode | FlagNode)[]
): CallNode => ({ ...call(name, ...args), head, span: head });

export const pipe = (...elements: SyntaxNode[]): PipelineNode => ({ elements });

export const program = (...statements: Statement[]): Program => ({
  pipelines: toPipelines(statements),
  span: UNKNOWN_SPAN,
});

// ============================================================
// DECLARATIONS AND IMPORTS
// ============================================================

/** `let name = value` */
export const let_ = (name: string, value: SyntaxNode): CallNode =>
  call('let', { kind: 'varDecl', name, span: UNKNOWN_SPAN }, value);

/** `def name [params] { body }` */
export const def = (
  name: string,
  params: (string | ParamNode)[],
  body: Statement[],
  exported = false
): CallNode =>
  call(exported ? 'export def' : 'def', str(name), block(body, params));

/** `export env name { body }` */
export const exportEnv = (name: string, body: Statement[]): CallNode =>
  call('export env', str(name), block(body, []));

/** `module name { body }` */
export const module = (name: string, ...body: Statement[]): CallNode =>
  call('module', str(name), block(body, []));

/**
 * Import pattern: a member of `'*'` is a glob, a string a single name and
 * an array a list of names.
 */
export const pattern = (
  head: string,
  member?: string | string[],
  span: Span = UNKNOWN_SPAN
): ImportPatternNode => {
  const members: ImportMemberNode[] = [];
  if (member === '*') {
    members.push({ kind: 'glob', span: UNKNOWN_SPAN });
  } else if (typeof member === 'string') {
    members.push({ kind: 'name', name: member, span: UNKNOWN_SPAN });
  } else if (member !== undefined) {
    members.push({
      kind: 'list',
      names: member.map((name) => ({ name, span: UNKNOWN_SPAN })),
    });
  }
  return { kind: 'importPattern', head, headSpan: span, members, span };
};

export const use = (head: string, member?: string | string[]): CallNode =>
  call('use', pattern(head, member));

export const hide = (head: string, member?: string | string[]): CallNode =>
  call('hide', pattern(head, member));
