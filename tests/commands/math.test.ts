/**
 * Shoal Command Tests: Math
 */

import { describe, expect, it } from 'vitest';

import { SHELL_ERROR_CODES } from '../../src/index.js';
import { rejection, runNative } from '../helpers/runtime.js';
import {
  call,
  flag,
  float,
  int,
  list,
  pipe,
  range,
  str,
  table,
} from '../helpers/syntax.js';

describe('Shoal Commands: math variance', () => {
  it('computes the population variance of a range', async () => {
    expect(await runNative([pipe(range(1, 5), call('math variance'))])).toBe(2);
  });

  it('computes the sample variance with --sample', async () => {
    expect(
      await runNative([
        pipe(
          list(int(1), int(2), int(3), int(4), int(5)),
          call('math variance', flag('sample'))
        ),
      ])
    ).toBe(2.5);
  });

  it('mixes ints and floats', async () => {
    expect(
      await runNative([pipe(list(float(1.5), int(2)), call('math variance'))])
    ).toBe(0.0625);
  });

  it('computes one variance per table column', async () => {
    expect(
      await runNative([
        pipe(
          table(['a', 'b'], [int(1), int(2)], [int(3), int(2)]),
          call('math variance')
        ),
      ])
    ).toEqual({ a: 1, b: 0 });
  });

  it('fails on an empty list', async () => {
    const error = await rejection(
      runNative([pipe(list(), call('math variance'))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.DIVISION_BY_ZERO);
  });

  it('fails on a single value with --sample', async () => {
    const error = await rejection(
      runNative([pipe(list(int(4)), call('math variance', flag('sample')))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.DIVISION_BY_ZERO);
  });

  it('rejects a value that is not a number', async () => {
    const error = await rejection(
      runNative([pipe(list(int(1), str('x')), call('math variance'))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.UNSUPPORTED_INPUT);
    expect(error.labels[0]?.text).toBe(
      'Attempted to compute the variance with an item that cannot be used for that.'
    );
  });

  it('rejects input that is not a list', async () => {
    const error = await rejection(
      runNative([pipe(str('12'), call('math variance'))])
    );
    expect(error.labels[0]?.text).toBe(
      'expected a list of numbers or a table, found string'
    );
  });
});
