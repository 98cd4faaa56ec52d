/**
 * Declarations
 *
 * Every command, builtin or user-defined, lives in one table indexed by
 * DeclId. Calls carry the DeclId resolved once by the resolver.
 */

import type { PipelineData } from '../runtime/core/pipeline.js';
import type { EvalContext } from '../runtime/core/types.js';
import type { BlockId, CallExpr } from '../types.js';
import type { Stack } from './stack.js';

/** Argument kinds checked when a call's arguments are read */
export type ParamType =
  | 'any'
  | 'int'
  | 'number'
  | 'string'
  | 'bool'
  | 'range'
  | 'cell-path'
  | 'block'
  /** A block that receives each row; a parameterless one gets `$it` */
  | 'closure';

export interface CommandParam {
  readonly name: string;
  readonly type: ParamType;
  readonly description: string;
  readonly optional?: boolean | undefined;
  /** Collects every remaining positional argument */
  readonly rest?: boolean | undefined;
}

export interface CommandFlag {
  readonly name: string;
  readonly short?: string | undefined;
  /** Argument type, or null for a switch */
  readonly type: ParamType | null;
  readonly description: string;
}

export interface CommandSignature {
  readonly params: readonly CommandParam[];
  readonly flags: readonly CommandFlag[];
}

export interface BuiltinCommand {
  readonly kind: 'builtin';
  readonly name: string;
  readonly usage: string;
  readonly signature: CommandSignature;
  run(
    ctx: EvalContext,
    stack: Stack,
    call: CallExpr,
    input: PipelineData
  ): Promise<PipelineData>;
}

/** Command declared with `def`; the evaluator runs its block */
export interface CustomCommand {
  readonly kind: 'custom';
  readonly name: string;
  readonly usage: string;
  readonly signature: CommandSignature;
  /** Body block, or null while the body is still being resolved */
  readonly blockId: BlockId | null;
}

export type Decl = BuiltinCommand | CustomCommand;

/** Type of the positional parameter at `index`, following a rest parameter */
export function paramTypeAt(
  signature: CommandSignature,
  index: number
): ParamType | undefined {
  const direct = signature.params[index];
  if (direct) return direct.type;
  const last = signature.params[signature.params.length - 1];
  return last?.rest ? last.type : undefined;
}
