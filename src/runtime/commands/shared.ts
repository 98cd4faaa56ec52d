/**
 * Shared helpers for builtin command definitions.
 */

import type { BuiltinCommand } from '../../engine/command.js';
import type { Stack } from '../../engine/stack.js';
import type { CellPath, Span } from '../../types.js';
import { updateCellPath } from '../core/cell-path.js';
import { runClosure } from '../core/eval.js';
import { PipelineData } from '../core/pipeline.js';
import type { EvalContext } from '../core/types.js';
import type { BlockValue, Value } from '../core/values.js';

/** Tag a command definition as a builtin */
export function builtin(definition: Omit<BuiltinCommand, 'kind'>): BuiltinCommand {
  return { kind: 'builtin', ...definition };
}

/**
 * Run a closure with `args` bound to its parameters and `input` piped in,
 * collecting its output into one value.
 */
export async function callClosure(
  ctx: EvalContext,
  stack: Stack,
  closure: BlockValue,
  args: readonly Value[],
  input: PipelineData,
  span: Span
): Promise<Value> {
  const output = await runClosure(ctx, stack, closure, args, input);
  return output.intoValue(span);
}

/**
 * Apply `action` to every element, or, when cell paths are given, to the
 * addressed cells of every element. Failures become error values in place.
 */
export function operateOnPaths(
  ctx: EvalContext,
  input: PipelineData,
  paths: readonly CellPath[],
  action: (value: Value) => Value
): Promise<PipelineData> {
  if (paths.length === 0) {
    return input.map((value) => action(value), ctx.signal);
  }
  return input.map(
    (value) =>
      paths.reduce(
        (current, path) => updateCellPath(current, path.members, action),
        value
      ),
    ctx.signal
  );
}
