/**
 * Filters
 *
 * Commands that reshape the rows flowing through a pipeline. Everything
 * except `par-each`, `length` and `drop column` stays lazy.
 */

import { typeMismatch, unsupportedInput } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import type { Stack } from '../../engine/stack.js';
import type { CallExpr, CellPath } from '../../types.js';
import { cellPathToString } from '../../types.js';
import {
  cellPathArgs,
  hasFlag,
  opt,
  req,
  reqBlock,
  reqCellPath,
} from '../core/call-args.js';
import { followCellPath } from '../core/cell-path.js';
import {
  inputColumns,
  keepColumns,
  projectRow,
  projectRows,
} from '../core/columns.js';
import { expectBool } from '../core/eval.js';
import { parEach } from '../core/parallel.js';
import { PipelineData } from '../core/pipeline.js';
import type { EvalContext } from '../core/types.js';
import {
  int,
  list,
  nothing,
  record,
  typeName,
  type BlockValue,
  type Value,
} from '../core/values.js';
import { builtin, callClosure } from './shared.js';

/** Argument passed to an `each` block: the row, or `{index, item}` */
function eachArg(call: CallExpr, value: Value, index: number): Value {
  return hasFlag(call, 'numbered')
    ? record(['index', 'item'], [int(index, call.head), value], call.head)
    : value;
}

/** Evaluate a row condition against one row */
async function rowMatches(
  ctx: EvalContext,
  stack: Stack,
  condition: BlockValue,
  row: Value
): Promise<boolean> {
  const result = await callClosure(
    ctx,
    stack,
    condition,
    [row],
    PipelineData.value(row),
    condition.span
  );
  return expectBool(result, condition.span);
}

function selectRow(row: Value, paths: readonly CellPath[], call: CallExpr): Value {
  return record(
    paths.map(cellPathToString),
    paths.map((path) => followCellPath(row, path.members)),
    call.head
  );
}

function keepCommand(name: string, whileTrue: boolean): BuiltinCommand {
  return builtin({
    name,
    usage: whileTrue
      ? 'Keep rows while a condition holds.'
      : 'Keep rows until a condition holds.',
    signature: {
      params: [
        { name: 'predicate', type: 'closure', description: 'row condition' },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const condition = await reqBlock(ctx, stack, call, 0);
      return input.takeWhile(async (row) => {
        const matched = await rowMatches(ctx, stack, condition, row);
        return whileTrue ? matched : !matched;
      }, ctx.signal);
    },
  });
}

const CLOSURE_FLAGS = [
  {
    name: 'numbered',
    short: 'n',
    type: null,
    description: 'pass {index, item} to the block',
  },
] as const;

export const FILTER_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'each',
    usage: 'Run a block on each element of the input.',
    signature: {
      params: [
        { name: 'block', type: 'closure', description: 'the block to run' },
      ],
      flags: CLOSURE_FLAGS,
    },
    async run(ctx, stack, call, input) {
      const closure = await reqBlock(ctx, stack, call, 0);
      const apply = (value: Value, index: number): Promise<Value> =>
        callClosure(
          ctx,
          stack,
          closure,
          [eachArg(call, value, index)],
          PipelineData.value(value),
          call.head
        );

      // A record is rebuilt with each of its values replaced
      const single = input.kind === 'value' ? await input.intoValue(call.head) : null;
      if (single?.type === 'record') {
        const vals: Value[] = [];
        for (const [index, val] of single.vals.entries()) {
          vals.push(await apply(val, index));
        }
        return PipelineData.value(record(single.cols, vals, single.span));
      }

      return input.map(apply, ctx.signal);
    },
  }),

  builtin({
    name: 'par-each',
    usage: 'Run a block on each element of the input in parallel.',
    signature: {
      params: [
        { name: 'block', type: 'closure', description: 'the block to run' },
      ],
      flags: CLOSURE_FLAGS,
    },
    async run(ctx, stack, call, input) {
      const closure = await reqBlock(ctx, stack, call, 0);
      const results = await parEach(
        input,
        (value, index) =>
          callClosure(
            ctx,
            stack,
            closure,
            [eachArg(call, value, index)],
            PipelineData.value(value),
            call.head
          ),
        { workers: ctx.config.parallelWorkers, signal: ctx.signal }
      );
      return PipelineData.value(list(results, call.head));
    },
  }),

  builtin({
    name: 'where',
    usage: 'Keep rows for which a condition holds.',
    signature: {
      params: [
        { name: 'cond', type: 'closure', description: 'row condition' },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const condition = await reqBlock(ctx, stack, call, 0);
      return input.filterMap(
        async (row) =>
          (await rowMatches(ctx, stack, condition, row)) ? row : undefined,
        ctx.signal
      );
    },
  }),

  builtin({
    name: 'get',
    usage: 'Extract data using a cell path.',
    signature: {
      params: [
        { name: 'cell_path', type: 'cell-path', description: 'path to the data' },
      ],
      flags: [],
    },
    async run(ctx, _stack, call, input) {
      const path = reqCellPath(ctx, call, 0);
      const value = await input.intoValue(call.head);
      return PipelineData.value(followCellPath(value, path.members));
    },
  }),

  builtin({
    name: 'select',
    usage: 'Keep only the given columns.',
    signature: {
      params: [
        {
          name: 'columns',
          type: 'cell-path',
          description: 'columns to keep',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, _stack, call, input) {
      const paths = cellPathArgs(call, 0);
      return input.map((row) => selectRow(row, paths, call), ctx.signal);
    },
  }),

  builtin({
    name: 'length',
    usage: 'Count the elements of the input.',
    signature: { params: [], flags: [] },
    async run(_ctx, _stack, call, input) {
      const rows = await input.collect();
      return PipelineData.value(int(rows.length, call.head));
    },
  }),

  builtin({
    name: 'range',
    usage: 'Return only the rows within a range.',
    signature: {
      params: [{ name: 'rows', type: 'range', description: 'rows to keep' }],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const rows = await req(ctx, stack, call, 0);
      if (rows.type !== 'range') {
        throw typeMismatch(
          `expected range, found ${typeName(rows)}`,
          call.positional[0]?.span ?? call.head
        );
      }
      const from = rows.from.val;
      const to = Number.isFinite(rows.to.val)
        ? rows.inclusion === 'inclusive'
          ? rows.to.val
          : rows.to.val - 1
        : null;
      return input.range(from, to, call.head);
    },
  }),

  builtin({
    name: 'drop column',
    usage: 'Remove the last N columns.',
    signature: {
      params: [
        {
          name: 'columns',
          type: 'int',
          description: 'number of columns to drop (default 1)',
          optional: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const countArg = await opt(ctx, stack, call, 0);
      if (countArg !== undefined && countArg.type !== 'int') {
        throw typeMismatch(
          `expected int, found ${typeName(countArg)}`,
          call.positional[0]?.span ?? call.head
        );
      }
      const count = countArg?.val ?? 1;

      const value = await input.intoValue(call.head);
      switch (value.type) {
        case 'nothing':
          return PipelineData.value(nothing(call.head));
        case 'record':
          return PipelineData.value(
            projectRow(value, keepColumns(value.cols, count), call.head)
          );
        case 'list': {
          const cols = keepColumns(inputColumns(value.vals), count);
          return PipelineData.value(
            list(projectRows(value.vals, cols, call.head), call.head)
          );
        }
        default:
          throw unsupportedInput(
            `expected table or record, found ${typeName(value)}`,
            call.head
          );
      }
    },
  }),

  keepCommand('keep while', true),
  keepCommand('keep until', false),
];
