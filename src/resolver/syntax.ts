/**
 * Syntax Tree
 *
 * The name-based tree a parser emits before name resolution. Commands,
 * variables and modules are referred to by name; the resolver turns them
 * into ids.
 */

import type {
  Operator,
  PathMember,
  RangeInclusion,
  Span,
} from '../types.js';

interface BaseNode {
  readonly span: Span;
}

export interface NothingNode extends BaseNode {
  readonly kind: 'nothing';
}

export interface BoolNode extends BaseNode {
  readonly kind: 'bool';
  readonly val: boolean;
}

export interface IntNode extends BaseNode {
  readonly kind: 'int';
  readonly val: number;
}

export interface FloatNode extends BaseNode {
  readonly kind: 'float';
  readonly val: number;
}

export interface StringNode extends BaseNode {
  readonly kind: 'string';
  readonly val: string;
}

export interface ListNode extends BaseNode {
  readonly kind: 'list';
  readonly items: readonly SyntaxNode[];
}

export interface RecordNode extends BaseNode {
  readonly kind: 'record';
  readonly fields: readonly (readonly [string, SyntaxNode])[];
}

export interface TableNode extends BaseNode {
  readonly kind: 'table';
  readonly columns: readonly string[];
  readonly rows: readonly (readonly SyntaxNode[])[];
}

export interface RangeNode extends BaseNode {
  readonly kind: 'range';
  readonly from: SyntaxNode | null;
  readonly next: SyntaxNode | null;
  readonly to: SyntaxNode | null;
  readonly inclusion: RangeInclusion;
}

/** `$name` */
export interface VarNode extends BaseNode {
  readonly kind: 'var';
  readonly name: string;
}

/** Target of `let` */
export interface VarDeclNode extends BaseNode {
  readonly kind: 'varDecl';
  readonly name: string;
}

/** `$env.key` */
export interface EnvNode extends BaseNode {
  readonly kind: 'env';
  readonly key: string;
}

export interface BinaryNode extends BaseNode {
  readonly kind: 'binary';
  readonly op: Operator;
  readonly opSpan: Span;
  readonly lhs: SyntaxNode;
  readonly rhs: SyntaxNode;
}

/** `head.a.0` */
export interface PathNode extends BaseNode {
  readonly kind: 'path';
  readonly head: SyntaxNode;
  readonly tail: readonly PathMember[];
}

/** Cell path written as a command argument */
export interface CellPathNode extends BaseNode {
  readonly kind: 'cellPath';
  readonly members: readonly PathMember[];
}

export interface ParamNode {
  readonly name: string;
  readonly span: Span;
  readonly optional?: boolean | undefined;
  readonly rest?: boolean | undefined;
  /** `--name` flag rather than a positional parameter */
  readonly flag?: boolean | undefined;
}

export interface PipelineNode {
  readonly elements: readonly SyntaxNode[];
}

export interface BlockNode extends BaseNode {
  readonly kind: 'block';
  /** Null when the block declares no parameter list */
  readonly params: readonly ParamNode[] | null;
  readonly body: readonly PipelineNode[];
}

/** Condition evaluated once per row with the row bound to `$it` */
export interface RowConditionNode extends BaseNode {
  readonly kind: 'rowCondition';
  readonly condition: SyntaxNode;
}

/** `( ... )` */
export interface SubexpressionNode extends BaseNode {
  readonly kind: 'subexpression';
  readonly body: readonly PipelineNode[];
}

export type ImportMemberNode =
  | { readonly kind: 'glob'; readonly span: Span }
  | { readonly kind: 'name'; readonly name: string; readonly span: Span }
  | {
      readonly kind: 'list';
      readonly names: readonly { name: string; span: Span }[];
    };

export interface ImportPatternNode extends BaseNode {
  readonly kind: 'importPattern';
  readonly head: string;
  readonly headSpan: Span;
  readonly members: readonly ImportMemberNode[];
}

export interface FlagNode extends BaseNode {
  readonly kind: 'flag';
  readonly name: string;
  readonly value: SyntaxNode | null;
}

export interface CallNode extends BaseNode {
  readonly kind: 'call';
  /** Full command name, including subcommand words (`str collect`) */
  readonly name: string;
  readonly head: Span;
  readonly args: readonly (SyntaxNode | FlagNode)[];
}

export type SyntaxNode =
  | NothingNode
  | BoolNode
  | IntNode
  | FloatNode
  | StringNode
  | ListNode
  | RecordNode
  | TableNode
  | RangeNode
  | VarNode
  | VarDeclNode
  | EnvNode
  | BinaryNode
  | PathNode
  | CellPathNode
  | BlockNode
  | RowConditionNode
  | SubexpressionNode
  | ImportPatternNode
  | CallNode;

/** A whole program: pipelines separated by `;` or newlines */
export interface Program {
  readonly pipelines: readonly PipelineNode[];
  readonly span: Span;
}
