/**
 * Call Arguments
 *
 * Helpers builtin commands use to read their positional arguments and
 * flags. Arguments are evaluated in the caller's stack.
 */

import { createError, engineFailed, typeMismatch } from '../../error-classes.js';
import { SHELL_ERROR_CODES } from '../../error-registry.js';
import type { Stack } from '../../engine/stack.js';
import type {
  CallExpr,
  CellPath,
  Expression,
  ImportPattern,
  VarId,
} from '../../types.js';
import { evalExpression } from './eval.js';
import type { EvalContext } from './types.js';
import { typeName, type BlockValue, type Value } from './values.js';

function missingParameter(
  ctx: EvalContext,
  call: CallExpr,
  index: number
): Error {
  const decl = ctx.engine.getDecl(call.declId);
  const name = decl.signature.params[index]?.name ?? `argument ${index + 1}`;
  return createError(SHELL_ERROR_CODES.MISSING_PARAMETER, { name }, [
    call.head,
  ]);
}

// ============================================================
// POSITIONAL
// ============================================================

/** Evaluate a required positional argument */
export async function req(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  index: number
): Promise<Value> {
  const expr = call.positional[index];
  if (expr === undefined) throw missingParameter(ctx, call, index);
  return evalExpression(ctx, stack, expr);
}

/** Evaluate an optional positional argument */
export async function opt(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  index: number
): Promise<Value | undefined> {
  const expr = call.positional[index];
  return expr === undefined ? undefined : evalExpression(ctx, stack, expr);
}

/** Evaluate every positional argument from `from` onward */
export async function restArgs(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  from: number
): Promise<Value[]> {
  const values: Value[] = [];
  for (const expr of call.positional.slice(from)) {
    values.push(await evalExpression(ctx, stack, expr));
  }
  return values;
}

export async function reqString(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  index: number
): Promise<string> {
  const value = await req(ctx, stack, call, index);
  if (value.type !== 'string') {
    throw typeMismatch(
      `expected string, found ${typeName(value)}`,
      call.positional[index]?.span ?? call.head
    );
  }
  return value.val;
}

/** Evaluate a block argument into a closure value */
export async function reqBlock(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  index: number
): Promise<BlockValue> {
  const value = await req(ctx, stack, call, index);
  if (value.type !== 'block') {
    throw typeMismatch(
      `expected block, found ${typeName(value)}`,
      call.positional[index]?.span ?? call.head
    );
  }
  return value;
}

// ============================================================
// UNEVALUATED ARGUMENTS
// ============================================================

function toCellPath(expr: Expression): CellPath {
  switch (expr.type) {
    case 'CellPath':
      return expr.path;
    case 'String':
      return { members: [{ type: 'string', val: expr.val, span: expr.span }] };
    case 'Int':
      return { members: [{ type: 'int', val: expr.val, span: expr.span }] };
    default:
      throw typeMismatch('expected cell path', expr.span);
  }
}

/** Cell paths written from position `from` onward */
export function cellPathArgs(call: CallExpr, from: number): CellPath[] {
  return call.positional.slice(from).map(toCellPath);
}

export function reqCellPath(
  ctx: EvalContext,
  call: CallExpr,
  index: number
): CellPath {
  const expr = call.positional[index];
  if (expr === undefined) throw missingParameter(ctx, call, index);
  return toCellPath(expr);
}

export function reqImportPattern(
  call: CallExpr,
  index: number
): ImportPattern {
  const expr = call.positional[index];
  if (expr?.type !== 'ImportPattern') {
    throw engineFailed(`argument ${index + 1} is not an import pattern`);
  }
  return expr.pattern;
}

export function reqVarDecl(call: CallExpr, index: number): VarId {
  const expr = call.positional[index];
  if (expr?.type !== 'VarDecl') {
    throw engineFailed(`argument ${index + 1} is not a variable declaration`);
  }
  return expr.varId;
}

// ============================================================
// FLAGS
// ============================================================

/** True when the switch or flag `name` was passed */
export function hasFlag(call: CallExpr, name: string): boolean {
  return call.named.some((arg) => arg.name === name);
}
