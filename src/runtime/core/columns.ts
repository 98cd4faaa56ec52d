/**
 * Column Projection
 *
 * Derive a column set from a representative row and normalize every row of
 * a table onto it.
 */

import type { Span } from '../../types.js';
import { UNKNOWN_SPAN } from '../../types.js';
import { followCellPath } from './cell-path.js';
import { record, type RecordValue, type Value } from './values.js';

/**
 * Columns of the first row.
 * An empty table, or one whose first row is not a record, yields a single
 * placeholder column named ''.
 */
export function inputColumns(rows: readonly Value[]): string[] {
  const first = rows[0];
  if (first?.type === 'record') return [...first.cols];
  return [''];
}

/**
 * Leading columns left after removing the trailing `drop` names.
 * `drop` is clamped to the column count.
 */
export function keepColumns(cols: readonly string[], drop: number): string[] {
  const count = Math.min(Math.max(drop, 0), cols.length);
  return cols.slice(0, cols.length - count);
}

/**
 * Project one row onto `cols`, in that order.
 *
 * @throws ShellError CantFindColumn when the row lacks a column
 */
export function projectRow(
  row: Value,
  cols: readonly string[],
  span: Span
): RecordValue {
  const vals = cols.map((col) =>
    followCellPath(row, [{ type: 'string', val: col, span: UNKNOWN_SPAN }])
  );
  return record(cols, vals, span);
}

/** Project every row onto `cols`, regardless of each row's own column order */
export function projectRows(
  rows: readonly Value[],
  cols: readonly string[],
  span: Span
): RecordValue[] {
  return rows.map((row) => projectRow(row, cols, span));
}
