/**
 * Ordered Parallel Map
 *
 * Runs a per-element task over a pipeline with bounded concurrency and
 * returns results in input order.
 */

import { isShellError } from '../../error-classes.js';
import type { PipelineData } from './pipeline.js';
import { errorValue, type Value } from './values.js';

export interface ParEachOptions {
  /** Maximum tasks in flight; values below 1 are treated as 1 */
  readonly workers: number;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Apply `fn` to every element of `input`.
 *
 * Elements are partitioned by index into batches of `workers` and each batch
 * runs concurrently. The result at position i is always the result for input
 * element i. A ShellError from one element becomes an error value at that
 * position. Once `signal` is aborted no further batch starts and the results
 * gathered so far are returned.
 */
export async function parEach(
  input: PipelineData,
  fn: (value: Value, index: number) => Promise<Value>,
  options: ParEachOptions
): Promise<Value[]> {
  const elements = await input.collect();
  const workers = Math.max(1, Math.floor(options.workers));
  const results: Value[] = [];

  for (let start = 0; start < elements.length; start += workers) {
    if (options.signal?.aborted) break;
    const batch = elements.slice(start, start + workers);
    const settled = await Promise.all(
      batch.map((element, offset) => runElement(fn, element, start + offset))
    );
    results.push(...settled);
  }

  return results;
}

async function runElement(
  fn: (value: Value, index: number) => Promise<Value>,
  element: Value,
  index: number
): Promise<Value> {
  try {
    return await fn(element, index);
  } catch (error) {
    if (isShellError(error)) return errorValue(error);
    throw error;
  }
}
