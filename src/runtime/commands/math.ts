/**
 * Math Commands
 *
 * Aggregates over a whole list, or over every column of a table.
 */

import { createError, unsupportedInput } from '../../error-classes.js';
import { SHELL_ERROR_CODES } from '../../error-registry.js';
import type { BuiltinCommand } from '../../engine/command.js';
import type { Span } from '../../types.js';
import { hasFlag } from '../core/call-args.js';
import { inputColumns } from '../core/columns.js';
import { PipelineData } from '../core/pipeline.js';
import {
  float,
  getColumn,
  isNumeric,
  rangeValues,
  record,
  typeName,
  type FloatValue,
  type RecordValue,
  type Value,
} from '../core/values.js';
import { builtin } from './shared.js';

/**
 * Variance of numeric values: divided by the count, or by the count minus
 * one when `sample` is set.
 *
 * @throws ShellError DivisionByZero when there are too few values
 */
export function variance(
  values: readonly Value[],
  sample: boolean,
  span: Span
): FloatValue {
  let sum = 0;
  let sumOfSquares = 0;
  for (const value of values) {
    if (value.type === 'error') throw value.error;
    if (!isNumeric(value)) {
      throw unsupportedInput(
        'Attempted to compute the variance with an item that cannot be used for that.',
        value.span
      );
    }
    sum += value.val;
    sumOfSquares += value.val * value.val;
  }

  const count = values.length;
  const divisor = sample ? count - 1 : count;
  if (divisor <= 0) {
    throw createError(SHELL_ERROR_CODES.DIVISION_BY_ZERO, {}, [span]);
  }
  return float((sumOfSquares - (sum * sum) / count) / divisor, span);
}

function columnVariance(
  rows: readonly RecordValue[],
  sample: boolean,
  span: Span
): RecordValue {
  const cols = inputColumns(rows);
  const vals = cols.map((col) =>
    variance(
      rows.flatMap((row) => getColumn(row, col) ?? []),
      sample,
      span
    )
  );
  return record(cols, vals, span);
}

function numbersOf(value: Value, span: Span): readonly Value[] {
  if (value.type === 'list') return value.vals;
  if (value.type === 'range' && Number.isFinite(value.to.val)) {
    return [...rangeValues(value)];
  }
  throw unsupportedInput(
    `expected a list of numbers or a table, found ${typeName(value)}`,
    span
  );
}

export const MATH_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'math variance',
    usage: 'Find the variance of a list of numbers or of each table column.',
    signature: {
      params: [],
      flags: [
        {
          name: 'sample',
          short: 's',
          type: null,
          description: 'calculate sample variance',
        },
      ],
    },
    async run(_ctx, _stack, call, input) {
      const sample = hasFlag(call, 'sample');
      const items = numbersOf(await input.intoValue(call.head), call.head);
      const rows = items.filter(
        (item): item is RecordValue => item.type === 'record'
      );
      const result =
        rows.length > 0 && rows.length === items.length
          ? columnVariance(rows, sample, call.head)
          : variance(items, sample, call.head);
      return PipelineData.value(result);
    },
  }),
];
