/**
 * Test utilities for Shoal runtime tests
 */

import {
  isShellError,
  PipelineData,
  Session,
  type SessionOptions,
  type ShellError,
  type Value,
} from '../../src/index.js';
import { program, type Statement } from './syntax.js';

/** Plain JS rendering of a value for `toEqual` assertions */
export type Native =
  | null
  | boolean
  | number
  | string
  | Native[]
  | { [key: string]: Native };

/**
 * Convert a value to plain JS. Ranges expand to their numbers, error values
 * become `{ error: code }` and blocks render as `'<block>'`.
 */
export function toNative(value: Value): Native {
  switch (value.type) {
    case 'nothing':
      return null;
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.val;
    case 'binary':
      return [...value.val];
    case 'list':
      return value.vals.map(toNative);
    case 'record': {
      const result: { [key: string]: Native } = {};
      value.cols.forEach((col, i) => {
        const val = value.vals[i];
        result[col] = val === undefined ? null : toNative(val);
      });
      return result;
    }
    case 'range': {
      const numbers: Native[] = [];
      const step = value.incr.val;
      const end = value.to.val;
      for (
        let n = value.from.val;
        value.inclusion === 'inclusive' ? n <= end : n < end;
        n += step
      ) {
        numbers.push(n);
      }
      return numbers;
    }
    case 'error':
      return { error: value.error.code };
    case 'block':
      return '<block>';
  }
}

/** Run statements in a fresh session and return the final value */
export async function run(
  statements: Statement[],
  options: SessionOptions = {}
): Promise<Value> {
  return new Session(options).run(program(...statements));
}

/** Run statements and convert the result to plain JS */
export async function runNative(
  statements: Statement[],
  options: SessionOptions = {}
): Promise<Native> {
  return toNative(await run(statements, options));
}

/** Run statements with `input` piped into the first pipeline */
export async function runWithInput(
  statements: Statement[],
  input: PipelineData,
  options: SessionOptions = {}
): Promise<Native> {
  const session = new Session(options);
  return toNative(await session.run(program(...statements), input));
}

/** The ShellError a promise rejects with; fails when it resolves */
export async function rejection(promise: Promise<unknown>): Promise<ShellError> {
  try {
    await promise;
  } catch (error) {
    if (isShellError(error)) return error;
    throw error;
  }
  throw new Error('expected a ShellError, but the promise resolved');
}

/** Collect everything passed to `print` */
export function captureLog(): {
  logs: Value[];
  callbacks: NonNullable<SessionOptions['callbacks']>;
} {
  const logs: Value[] = [];
  return { logs, callbacks: { onLog: (value) => logs.push(value) } };
}

/** Stream that yields `values` one at a time, pausing between elements */
export async function* slowStream(
  values: readonly Value[],
  delayMs = 1
): AsyncGenerator<Value> {
  for (const value of values) {
    await new Promise((r) => setTimeout(r, delayMs));
    yield value;
  }
}
