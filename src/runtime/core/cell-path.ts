/**
 * Cell Path Addressing
 *
 * Read and update nested values by a sequence of column names and row
 * indexes. Updates rebuild only the ancestors along the path.
 */

import {
  accessBeyondEnd,
  cantFindColumn,
  incompatiblePathAccess,
  isShellError,
  notAList,
} from '../../error-classes.js';
import type { PathMember, Span } from '../../types.js';
import { didYouMean } from './suggest.js';
import {
  errorValue,
  list,
  record,
  rangeValues,
  typeName,
  type Value,
} from './values.js';

/** Replacement applied at the end of an update path; may throw a ShellError */
export type ReplaceFn = (old: Value) => Value;

// ============================================================
// FOLLOW
// ============================================================

function followIndex(value: Value, index: number, memberSpan: Span): Value {
  switch (value.type) {
    case 'list': {
      const item = index >= 0 ? value.vals[index] : undefined;
      if (item === undefined) {
        throw accessBeyondEnd(value.vals.length, memberSpan);
      }
      return item;
    }
    case 'range': {
      let position = 0;
      for (const item of rangeValues(value)) {
        if (position === index) return item;
        position++;
      }
      throw accessBeyondEnd(position, memberSpan);
    }
    case 'error':
      throw value.error;
    default:
      throw notAList(memberSpan, value.span);
  }
}

function followColumn(value: Value, column: string, memberSpan: Span): Value {
  switch (value.type) {
    case 'record': {
      const index = value.cols.indexOf(column);
      const found = index === -1 ? undefined : value.vals[index];
      if (found === undefined) {
        throw cantFindColumn(
          memberSpan,
          value.span,
          didYouMean(value.cols, column)
        );
      }
      return found;
    }
    case 'list':
      // Column access on a table yields that column from every row
      return list(
        value.vals.map((row) => followColumn(row, column, memberSpan)),
        value.span
      );
    case 'error':
      throw value.error;
    default:
      throw incompatiblePathAccess(typeName(value), memberSpan);
  }
}

/**
 * Walk `members` left to right and return the addressed value.
 *
 * @throws ShellError CantFindColumn, NotAList, AccessBeyondEnd or
 *   IncompatiblePathAccess
 *
 * @example
 * const row = record(['name'], [string('a')]);
 * followCellPath(row, [{ type: 'string', val: 'name', span }]);
 * // string('a')
 */
export function followCellPath(
  value: Value,
  members: readonly PathMember[]
): Value {
  let current = value;
  for (const member of members) {
    current =
      member.type === 'int'
        ? followIndex(current, member.val, member.span)
        : followColumn(current, member.val, member.span);
  }
  return current;
}

// ============================================================
// UPDATE
// ============================================================

/**
 * Return a copy of `value` with the addressed child replaced by
 * `replace(old)`. The input is never mutated.
 *
 * A ShellError thrown by `replace` is stored as an error value at the leaf.
 * Traversal failures (missing column, bad index) are thrown.
 */
export function updateCellPath(
  value: Value,
  members: readonly PathMember[],
  replace: ReplaceFn
): Value {
  const [member, ...rest] = members;
  if (member === undefined) {
    return applyReplace(value, replace);
  }

  if (member.type === 'int') {
    if (value.type !== 'list') {
      if (value.type === 'error') throw value.error;
      throw notAList(member.span, value.span);
    }
    const child = member.val >= 0 ? value.vals[member.val] : undefined;
    if (child === undefined) {
      throw accessBeyondEnd(value.vals.length, member.span);
    }
    const vals = value.vals.slice();
    vals[member.val] = updateCellPath(child, rest, replace);
    return list(vals, value.span);
  }

  switch (value.type) {
    case 'record': {
      const index = value.cols.indexOf(member.val);
      const child = index === -1 ? undefined : value.vals[index];
      if (child === undefined) {
        throw cantFindColumn(
          member.span,
          value.span,
          didYouMean(value.cols, member.val)
        );
      }
      const vals = value.vals.slice();
      vals[index] = updateCellPath(child, rest, replace);
      return record(value.cols, vals, value.span);
    }
    case 'list':
      return list(
        value.vals.map((row) => updateCellPath(row, members, replace)),
        value.span
      );
    case 'error':
      throw value.error;
    default:
      throw incompatiblePathAccess(typeName(value), member.span);
  }
}

function applyReplace(old: Value, replace: ReplaceFn): Value {
  try {
    return replace(old);
  } catch (error) {
    if (isShellError(error)) return errorValue(error);
    throw error;
  }
}

