/**
 * Shoal Block Graph Types
 *
 * The resolved program representation the evaluator walks. Every name in a
 * Block has already been turned into an id by the working set.
 */

// ============================================================
// SPANS
// ============================================================

/** Half-open byte range into a source buffer */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export const UNKNOWN_SPAN: Span = { start: 0, end: 0 };

export function createSpan(start: number, end: number): Span {
  if (start > end) {
    throw new RangeError(`Invalid span: start ${start} is after end ${end}`);
  }
  return { start, end };
}

/** Minimal span covering every span in the list */
export function spanUnion(spans: readonly Span[]): Span {
  if (spans.length === 0) return UNKNOWN_SPAN;

  let start = Number.POSITIVE_INFINITY;
  let end = 0;
  for (const span of spans) {
    if (span.start < start) start = span.start;
    if (span.end > end) end = span.end;
  }
  return { start, end };
}

// ============================================================
// IDS
// ============================================================

export type DeclId = number;
export type VarId = number;
export type BlockId = number;
export type ModuleId = number;
export type EnvBindingId = number;

// ============================================================
// CELL PATHS
// ============================================================

export type PathMember =
  | { readonly type: 'string'; readonly val: string; readonly span: Span }
  | { readonly type: 'int'; readonly val: number; readonly span: Span };

export interface CellPath {
  readonly members: readonly PathMember[];
}

export function cellPathToString(path: CellPath): string {
  return path.members.map((member) => String(member.val)).join('.');
}

// ============================================================
// IMPORT PATTERNS
// ============================================================

export type ImportPatternMember =
  | { readonly type: 'glob'; readonly span: Span }
  | { readonly type: 'name'; readonly name: string; readonly span: Span }
  | {
      readonly type: 'list';
      readonly names: readonly { name: string; span: Span }[];
    };

export interface ImportPatternHead {
  readonly name: string;
  readonly span: Span;
}

export interface ImportPattern {
  readonly head: ImportPatternHead;
  readonly members: readonly ImportPatternMember[];
  /** Module the head names, or null when the head is a plain name */
  readonly moduleId: ModuleId | null;
  /**
   * Names whose declarations were hidden while resolving a `hide`, so the
   * runtime does not also treat them as environment keys.
   */
  readonly hidden: ReadonlySet<string>;
}

export function importPatternSpan(pattern: ImportPattern): Span {
  const spans: Span[] = [pattern.head.span];
  for (const member of pattern.members) {
    if (member.type === 'list') {
      for (const entry of member.names) spans.push(entry.span);
    } else {
      spans.push(member.span);
    }
  }
  return spanUnion(spans);
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type Operator =
  | '+'
  | '-'
  | '*'
  | '/'
  | 'mod'
  | '**'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '&&'
  | '||'
  | 'in'
  | 'not-in'
  | '=~'
  | '!~';

export type RangeInclusion = 'inclusive' | 'rightExclusive';

interface BaseExpr {
  readonly span: Span;
}

export interface NothingExpr extends BaseExpr {
  readonly type: 'Nothing';
}

export interface BoolExpr extends BaseExpr {
  readonly type: 'Bool';
  readonly val: boolean;
}

export interface IntExpr extends BaseExpr {
  readonly type: 'Int';
  readonly val: number;
}

export interface FloatExpr extends BaseExpr {
  readonly type: 'Float';
  readonly val: number;
}

export interface StringExpr extends BaseExpr {
  readonly type: 'String';
  readonly val: string;
}

export interface ListExpr extends BaseExpr {
  readonly type: 'List';
  readonly items: readonly Expression[];
}

export interface RecordExpr extends BaseExpr {
  readonly type: 'Record';
  readonly fields: readonly (readonly [string, Expression])[];
}

/** Table literal: `[[a, b]; [1, 2], [3, 4]]` */
export interface TableExpr extends BaseExpr {
  readonly type: 'Table';
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Expression[])[];
}

export interface RangeExpr extends BaseExpr {
  readonly type: 'Range';
  readonly from: Expression | null;
  readonly next: Expression | null;
  readonly to: Expression | null;
  readonly inclusion: RangeInclusion;
}

export interface VarExpr extends BaseExpr {
  readonly type: 'Var';
  readonly varId: VarId;
}

/** Variable declaration target of `let` */
export interface VarDeclExpr extends BaseExpr {
  readonly type: 'VarDecl';
  readonly varId: VarId;
}

export interface EnvVarExpr extends BaseExpr {
  readonly type: 'EnvVar';
  readonly key: string;
}

export interface BinaryOpExpr extends BaseExpr {
  readonly type: 'BinaryOp';
  readonly op: Operator;
  readonly opSpan: Span;
  readonly lhs: Expression;
  readonly rhs: Expression;
}

export interface FullCellPathExpr extends BaseExpr {
  readonly type: 'FullCellPath';
  readonly head: Expression;
  readonly tail: readonly PathMember[];
}

/** A cell path passed as a command argument (`get name.0`) */
export interface CellPathExpr extends BaseExpr {
  readonly type: 'CellPath';
  readonly path: CellPath;
}

export interface BlockExpr extends BaseExpr {
  readonly type: 'Block';
  readonly blockId: BlockId;
}

export interface RowConditionExpr extends BaseExpr {
  readonly type: 'RowCondition';
  readonly blockId: BlockId;
}

export interface SubexpressionExpr extends BaseExpr {
  readonly type: 'Subexpression';
  readonly blockId: BlockId;
}

export interface ImportPatternExpr extends BaseExpr {
  readonly type: 'ImportPattern';
  readonly pattern: ImportPattern;
}

export interface NamedArg {
  readonly name: string;
  readonly value: Expression | null;
  readonly span: Span;
}

export interface CallExpr extends BaseExpr {
  readonly type: 'Call';
  readonly declId: DeclId;
  /** Span of the command name */
  readonly head: Span;
  readonly positional: readonly Expression[];
  readonly named: readonly NamedArg[];
}

export type Expression =
  | NothingExpr
  | BoolExpr
  | IntExpr
  | FloatExpr
  | StringExpr
  | ListExpr
  | RecordExpr
  | TableExpr
  | RangeExpr
  | VarExpr
  | VarDeclExpr
  | EnvVarExpr
  | BinaryOpExpr
  | FullCellPathExpr
  | CellPathExpr
  | BlockExpr
  | RowConditionExpr
  | SubexpressionExpr
  | ImportPatternExpr
  | CallExpr;

export type ExpressionType = Expression['type'];

// ============================================================
// BLOCKS
// ============================================================

export interface BlockParam {
  readonly name: string;
  readonly varId: VarId;
  readonly optional: boolean;
}

export interface BlockSignature {
  readonly positional: readonly BlockParam[];
  readonly rest: BlockParam | null;
  /** `--name` switches and flags, bound to variables of the same name */
  readonly flags: readonly BlockParam[];
}

export const EMPTY_SIGNATURE: BlockSignature = {
  positional: [],
  rest: null,
  flags: [],
};

export interface Pipeline {
  readonly elements: readonly Expression[];
}

export interface Block {
  readonly signature: BlockSignature;
  readonly pipelines: readonly Pipeline[];
  /** Variables defined outside this block that its body reads */
  readonly captures: readonly VarId[];
  readonly span: Span;
}
