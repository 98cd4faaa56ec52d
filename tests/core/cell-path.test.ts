/**
 * Shoal Core Tests: Cell Paths
 */

import { describe, expect, it } from 'vitest';

import {
  createSpan,
  followCellPath,
  int,
  isShellError,
  list,
  range,
  record,
  SHELL_ERROR_CODES,
  string,
  updateCellPath,
  type PathMember,
  type Value,
} from '../../src/index.js';
import { toNative } from '../helpers/runtime.js';

const col = (val: string, start = 0): PathMember => ({
  type: 'string',
  val,
  span: createSpan(start, start + val.length),
});
const idx = (val: number): PathMember => ({
  type: 'int',
  val,
  span: createSpan(0, 1),
});

const person = (name: string, age: number): Value =>
  record(['name', 'age'], [string(name), int(age)]);

const people = list([person('ana', 31), person('bo', 27)]);

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}

describe('Shoal Core: Cell Paths', () => {
  describe('followCellPath', () => {
    it('returns the value itself for an empty path', () => {
      expect(toNative(followCellPath(people, []))).toEqual(toNative(people));
    });

    it('reads a column of a record', () => {
      expect(toNative(followCellPath(person('ana', 31), [col('age')]))).toBe(31);
    });

    it('reads a row then a column', () => {
      expect(toNative(followCellPath(people, [idx(1), col('name')]))).toBe(
        'bo'
      );
    });

    it('reads a column from every row of a table', () => {
      expect(toNative(followCellPath(people, [col('name')]))).toEqual([
        'ana',
        'bo',
      ]);
    });

    it('indexes into a range', () => {
      const value = followCellPath(
        range(int(5), int(5), int(50), 'inclusive'),
        [idx(2)]
      );
      expect(toNative(value)).toBe(15);
    });

    it('suggests the closest column when one is missing', () => {
      const error = thrown(() =>
        followCellPath(person('ana', 31), [col('nam', 4)])
      );
      expect(isShellError(error)).toBe(true);
      if (!isShellError(error)) return;
      expect(error.code).toBe(SHELL_ERROR_CODES.COLUMN_NOT_FOUND);
      expect(error.help).toBe("did you mean 'name'?");
      expect(error.span).toEqual(createSpan(4, 7));
    });

    it('reports the row count when an index is past the end', () => {
      const error = thrown(() => followCellPath(people, [idx(2)]));
      expect(isShellError(error) && error.message).toBe(
        'Row number too large (max: 2).'
      );
    });

    it('rejects an index on a record', () => {
      const error = thrown(() => followCellPath(person('ana', 31), [idx(0)]));
      expect(isShellError(error) && error.code).toBe(
        SHELL_ERROR_CODES.NOT_A_LIST
      );
    });

    it('rejects a column on a scalar', () => {
      const error = thrown(() => followCellPath(int(3), [col('x')]));
      expect(isShellError(error) && error.labels[0]?.text).toBe(
        "int doesn't support cell paths"
      );
    });
  });

  describe('updateCellPath', () => {
    const double = (old: Value): Value =>
      old.type === 'int' ? int(old.val * 2) : old;

    it('replaces the addressed cell without touching the input', () => {
      const updated = updateCellPath(people, [idx(0), col('age')], double);
      expect(toNative(updated)).toEqual([
        { name: 'ana', age: 62 },
        { name: 'bo', age: 27 },
      ]);
      expect(toNative(people)).toEqual([
        { name: 'ana', age: 31 },
        { name: 'bo', age: 27 },
      ]);
    });

    it('updates a column in every row of a table', () => {
      const updated = updateCellPath(people, [col('age')], double);
      expect(toNative(updated)).toEqual([
        { name: 'ana', age: 62 },
        { name: 'bo', age: 54 },
      ]);
    });

    it('reads back what it wrote', () => {
      const updated = updateCellPath(
        people,
        [idx(1), col('name')],
        () => string('cy')
      );
      expect(toNative(followCellPath(updated, [idx(1), col('name')]))).toBe(
        'cy'
      );
    });

    it('stores a failed replacement as an error value', () => {
      const updated = updateCellPath(person('ana', 31), [col('name')], () => {
        throw thrown(() => followCellPath(int(1), [col('x')]));
      });
      expect(toNative(updated)).toEqual({
        name: { error: SHELL_ERROR_CODES.INCOMPATIBLE_PATH_ACCESS },
        age: 31,
      });
    });

    it('throws for a missing column on the way down', () => {
      const error = thrown(() =>
        updateCellPath(person('ana', 31), [col('agee')], double)
      );
      expect(isShellError(error) && error.help).toBe("did you mean 'age'?");
    });
  });
});
