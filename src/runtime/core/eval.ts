/**
 * Block Evaluation
 *
 * Walks the resolved block graph. Names are already ids; every lookup goes
 * through the engine state (declarations, blocks) or the stack (variables,
 * environment).
 */

import {
  createError,
  engineFailed,
  operatorMismatch,
  typeMismatch,
} from '../../error-classes.js';
import { SHELL_ERROR_CODES } from '../../error-registry.js';
import type { CustomCommand } from '../../engine/command.js';
import type { Stack } from '../../engine/stack.js';
import type {
  BinaryOpExpr,
  Block,
  BlockId,
  CallExpr,
  Expression,
  Pipeline,
  RangeExpr,
  Span,
} from '../../types.js';
import { cellPathToString, spanUnion } from '../../types.js';
import { followCellPath } from './cell-path.js';
import { PipelineData } from './pipeline.js';
import type { EvalContext } from './types.js';
import {
  block as blockValue,
  bool,
  compareValues,
  float,
  getColumn,
  int,
  isNumeric,
  list,
  nothing,
  range,
  rangeContains,
  recordFromEntries,
  spanOf,
  string,
  typeName,
  valuesEqual,
  type BlockValue,
  type NumericValue,
  type Value,
} from './values.js';

// ============================================================
// BLOCKS
// ============================================================

/**
 * Evaluate every pipeline of a block.
 *
 * Only the first pipeline receives `input`. Earlier pipelines are drained so
 * their side effects complete; the last pipeline's output is returned as is.
 * An aborted signal stops before the next pipeline and yields empty output.
 */
export async function evalBlock(
  ctx: EvalContext,
  stack: Stack,
  block: Block,
  input: PipelineData
): Promise<PipelineData> {
  let output = PipelineData.empty();
  const last = block.pipelines.length - 1;

  for (const [index, pipeline] of block.pipelines.entries()) {
    if (ctx.signal?.aborted) {
      ctx.observability.onInterrupt?.({ span: block.span });
      return PipelineData.empty();
    }
    output = await evalPipeline(
      ctx,
      stack,
      pipeline,
      index === 0 ? input : PipelineData.empty()
    );
    if (index < last) {
      await output.intoValue(block.span);
    }
  }

  return output;
}

async function evalPipeline(
  ctx: EvalContext,
  stack: Stack,
  pipeline: Pipeline,
  input: PipelineData
): Promise<PipelineData> {
  let data = input;
  for (const element of pipeline.elements) {
    data =
      element.type === 'Call'
        ? await evalCall(ctx, stack, element, data)
        : PipelineData.value(await evalExpression(ctx, stack, element));
  }
  return data;
}

/**
 * Run a closure value: captured values are copied into a fresh stack and
 * `args` are bound to the block's positional parameters in order. Parameters
 * without an argument are bound to nothing.
 */
export async function runClosure(
  ctx: EvalContext,
  stack: Stack,
  closure: BlockValue,
  args: readonly Value[],
  input: PipelineData = PipelineData.empty()
): Promise<PipelineData> {
  const block = ctx.engine.getBlock(closure.blockId);
  const callee = stack.withCaptures(closure.captures);
  block.signature.positional.forEach((param, index) => {
    callee.addVar(param.varId, args[index] ?? nothing(block.span));
  });
  return evalBlock(ctx, callee, block, input);
}

/** Build a closure value capturing the current values the block reads */
export function makeClosure(
  ctx: EvalContext,
  stack: Stack,
  blockId: BlockId,
  span: Span
): BlockValue {
  const block = ctx.engine.getBlock(blockId);
  return blockValue(blockId, stack.gatherCaptures(block.captures), span);
}

// ============================================================
// CALLS
// ============================================================

export async function evalCall(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  input: PipelineData
): Promise<PipelineData> {
  const decl = ctx.engine.getDecl(call.declId);
  const start = Date.now();
  ctx.observability.onCallStart?.({ name: decl.name, span: call.head });

  try {
    const output =
      decl.kind === 'custom'
        ? await evalCustomCall(ctx, stack, call, decl, input)
        : await decl.run(ctx, stack, call, input);
    ctx.observability.onCallEnd?.({
      name: decl.name,
      span: call.head,
      durationMs: Date.now() - start,
    });
    return output;
  } catch (error) {
    if (error instanceof Error) {
      ctx.observability.onError?.({ error, name: decl.name });
    }
    throw error;
  }
}

async function evalCustomCall(
  ctx: EvalContext,
  stack: Stack,
  call: CallExpr,
  decl: CustomCommand,
  input: PipelineData
): Promise<PipelineData> {
  if (decl.blockId === null) {
    throw engineFailed(`command '${decl.name}' has no body`);
  }
  if (ctx.depth >= ctx.config.recursionLimit) {
    throw createError(
      SHELL_ERROR_CODES.RECURSION_LIMIT,
      { limit: ctx.config.recursionLimit },
      [call.head]
    );
  }

  const block = ctx.engine.getBlock(decl.blockId);
  const callee = stack.captureStack(block.captures);
  const { positional, rest, flags } = block.signature;

  for (const [index, param] of positional.entries()) {
    const arg = call.positional[index];
    if (arg !== undefined) {
      callee.addVar(param.varId, await evalExpression(ctx, stack, arg));
    } else if (param.optional) {
      callee.addVar(param.varId, nothing(call.head));
    } else {
      throw createError(
        SHELL_ERROR_CODES.MISSING_PARAMETER,
        { name: param.name },
        [call.head]
      );
    }
  }

  if (rest) {
    const extra = call.positional.slice(positional.length);
    const values: Value[] = [];
    for (const arg of extra) values.push(await evalExpression(ctx, stack, arg));
    callee.addVar(rest.varId, list(values, call.head));
  }

  for (const flag of flags) {
    const named = call.named.find((arg) => arg.name === flag.name);
    if (named === undefined) {
      callee.addVar(flag.varId, nothing(call.head));
    } else if (named.value === null) {
      callee.addVar(flag.varId, bool(true, named.span));
    } else {
      callee.addVar(flag.varId, await evalExpression(ctx, stack, named.value));
    }
  }

  return evalBlock({ ...ctx, depth: ctx.depth + 1 }, callee, block, input);
}

// ============================================================
// EXPRESSIONS
// ============================================================

export async function evalExpression(
  ctx: EvalContext,
  stack: Stack,
  expr: Expression
): Promise<Value> {
  const span = expr.span;
  switch (expr.type) {
    case 'Nothing':
      return nothing(span);
    case 'Bool':
      return bool(expr.val, span);
    case 'Int':
      return int(expr.val, span);
    case 'Float':
      return float(expr.val, span);
    case 'String':
      return string(expr.val, span);
    case 'List': {
      const items: Value[] = [];
      for (const item of expr.items) {
        items.push(await evalExpression(ctx, stack, item));
      }
      return list(items, span);
    }
    case 'Record': {
      const entries: [string, Value][] = [];
      for (const [name, field] of expr.fields) {
        entries.push([name, await evalExpression(ctx, stack, field)]);
      }
      return recordFromEntries(entries, span);
    }
    case 'Table': {
      const rows: Value[] = [];
      for (const row of expr.rows) {
        const entries: [string, Value][] = [];
        for (const [index, column] of expr.columns.entries()) {
          const cell = row[index];
          entries.push([
            column,
            cell ? await evalExpression(ctx, stack, cell) : nothing(span),
          ]);
        }
        rows.push(recordFromEntries(entries, span));
      }
      return list(rows, span);
    }
    case 'Range':
      return evalRange(ctx, stack, expr);
    case 'Var':
      return stack.getVar(expr.varId, span);
    case 'VarDecl':
      return nothing(span);
    case 'EnvVar':
      return stack.getEnv(expr.key, span);
    case 'BinaryOp':
      return evalBinaryOp(ctx, stack, expr);
    case 'FullCellPath':
      return followCellPath(
        await evalExpression(ctx, stack, expr.head),
        expr.tail
      );
    case 'CellPath':
      return string(cellPathToString(expr.path), span);
    case 'Block':
    case 'RowCondition':
      return makeClosure(ctx, stack, expr.blockId, span);
    case 'Subexpression': {
      const block = ctx.engine.getBlock(expr.blockId);
      const output = await evalBlock(
        ctx,
        stack.captureStack(block.captures),
        block,
        PipelineData.empty()
      );
      return output.intoValue(span);
    }
    case 'ImportPattern':
      return nothing(span);
    case 'Call': {
      const output = await evalCall(ctx, stack, expr, PipelineData.empty());
      return output.intoValue(span);
    }
  }
}

async function evalRangeBound(
  ctx: EvalContext,
  stack: Stack,
  expr: Expression | null,
  fallback: NumericValue,
  span: Span
): Promise<NumericValue> {
  if (expr === null) return fallback;
  const value = await evalExpression(ctx, stack, expr);
  if (!isNumeric(value)) {
    throw createError(
      SHELL_ERROR_CODES.INVALID_RANGE,
      { from: typeName(value), to: '' },
      [value.type === 'error' ? span : value.span]
    );
  }
  return value;
}

async function evalRange(
  ctx: EvalContext,
  stack: Stack,
  expr: RangeExpr
): Promise<Value> {
  const span = expr.span;
  const from = await evalRangeBound(ctx, stack, expr.from, int(0, span), span);
  const to = await evalRangeBound(
    ctx,
    stack,
    expr.to,
    int(Number.POSITIVE_INFINITY, span),
    span
  );
  const next = await evalRangeBound(ctx, stack, expr.next, from, span);

  const step =
    expr.next === null ? (from.val <= to.val ? 1 : -1) : next.val - from.val;
  const incr =
    next.type === 'float' || from.type === 'float'
      ? float(step, span)
      : int(step, span);

  return range(from, incr, to, expr.inclusion, span);
}

// ============================================================
// OPERATORS
// ============================================================

async function evalBinaryOp(
  ctx: EvalContext,
  stack: Stack,
  expr: BinaryOpExpr
): Promise<Value> {
  const lhs = await evalExpression(ctx, stack, expr.lhs);

  // Short-circuit before evaluating the right-hand side
  if (expr.op === '&&' && lhs.type === 'bool' && !lhs.val) {
    return bool(false, expr.span);
  }
  if (expr.op === '||' && lhs.type === 'bool' && lhs.val) {
    return bool(true, expr.span);
  }

  const rhs = await evalExpression(ctx, stack, expr.rhs);
  return applyOperator(expr, lhs, rhs);
}

/**
 * Apply a binary operator to two evaluated operands.
 *
 * @throws ShellError OperatorMismatch for unsupported operand types and
 *   DivisionByZero for `/` or `mod` by zero
 */
export function applyOperator(
  expr: Pick<BinaryOpExpr, 'op' | 'opSpan' | 'span'>,
  lhs: Value,
  rhs: Value
): Value {
  if (lhs.type === 'error') throw lhs.error;
  if (rhs.type === 'error') throw rhs.error;

  const span = spanUnion([lhs.span, rhs.span]);
  const mismatch = (): never => {
    throw operatorMismatch(
      expr.opSpan,
      { type: typeName(lhs), span: spanOf(lhs) },
      { type: typeName(rhs), span: spanOf(rhs) }
    );
  };

  switch (expr.op) {
    case '+':
      if (lhs.type === 'string' && rhs.type === 'string') {
        return string(lhs.val + rhs.val, span);
      }
      if (lhs.type === 'list' && rhs.type === 'list') {
        return list([...lhs.vals, ...rhs.vals], span);
      }
      return arithmetic(lhs, rhs, span, (a, b) => a + b) ?? mismatch();
    case '-':
      return arithmetic(lhs, rhs, span, (a, b) => a - b) ?? mismatch();
    case '*':
      return arithmetic(lhs, rhs, span, (a, b) => a * b) ?? mismatch();
    case '/': {
      if (!isNumeric(lhs) || !isNumeric(rhs)) return mismatch();
      if (rhs.val === 0) {
        throw createError(SHELL_ERROR_CODES.DIVISION_BY_ZERO, {}, [rhs.span]);
      }
      const quotient = lhs.val / rhs.val;
      return lhs.type === 'int' && rhs.type === 'int' && Number.isInteger(quotient)
        ? int(quotient, span)
        : float(quotient, span);
    }
    case 'mod':
      if (!isNumeric(lhs) || !isNumeric(rhs)) return mismatch();
      if (rhs.val === 0) {
        throw createError(SHELL_ERROR_CODES.DIVISION_BY_ZERO, {}, [rhs.span]);
      }
      return arithmetic(lhs, rhs, span, (a, b) => a % b) ?? mismatch();
    case '**':
      return arithmetic(lhs, rhs, span, (a, b) => a ** b) ?? mismatch();
    case '==':
      return bool(valuesEqual(lhs, rhs), span);
    case '!=':
      return bool(!valuesEqual(lhs, rhs), span);
    case '<':
    case '<=':
    case '>':
    case '>=': {
      const order = compareValues(lhs, rhs);
      if (order === undefined) return mismatch();
      return bool(compareResult(expr.op, order), span);
    }
    case '&&':
    case '||':
      if (lhs.type !== 'bool' || rhs.type !== 'bool') return mismatch();
      return bool(expr.op === '&&' ? lhs.val && rhs.val : lhs.val || rhs.val, span);
    case 'in':
    case 'not-in': {
      const found = contains(rhs, lhs);
      if (found === undefined) return mismatch();
      return bool(expr.op === 'in' ? found : !found, span);
    }
    case '=~':
    case '!~':
      if (lhs.type !== 'string' || rhs.type !== 'string') return mismatch();
      return bool(lhs.val.includes(rhs.val) === (expr.op === '=~'), span);
  }
}

function arithmetic(
  lhs: Value,
  rhs: Value,
  span: Span,
  op: (a: number, b: number) => number
): Value | undefined {
  if (!isNumeric(lhs) || !isNumeric(rhs)) return undefined;
  const result = op(lhs.val, rhs.val);
  return lhs.type === 'int' && rhs.type === 'int'
    ? int(result, span)
    : float(result, span);
}

function compareResult(op: '<' | '<=' | '>' | '>=', order: number): boolean {
  switch (op) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

/** Membership test for `in`; undefined when the container type has none */
function contains(container: Value, item: Value): boolean | undefined {
  switch (container.type) {
    case 'list':
      return container.vals.some((val) => valuesEqual(val, item));
    case 'range':
      return isNumeric(item) ? rangeContains(container, item.val) : false;
    case 'string':
      return item.type === 'string'
        ? container.val.includes(item.val)
        : undefined;
    case 'record':
      return item.type === 'string'
        ? getColumn(container, item.val) !== undefined
        : undefined;
    default:
      return undefined;
  }
}

/** Require a bool, as `if` and row conditions do */
export function expectBool(value: Value, span: Span): boolean {
  if (value.type === 'error') throw value.error;
  if (value.type !== 'bool') {
    throw typeMismatch(`expected bool, found ${typeName(value)}`, span);
  }
  return value.val;
}
