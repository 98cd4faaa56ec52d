/**
 * PipelineData
 *
 * The envelope that moves values between pipeline stages: nothing, one
 * materialized value, or a lazy single-pass stream. Stream consumers check
 * the cancellation signal before every pull and stop without error.
 */

import type { ShellConfig } from '../../config.js';
import { DEFAULT_CONFIG } from '../../config.js';
import { isShellError } from '../../error-classes.js';
import type { Span } from '../../types.js';
import {
  errorValue,
  intoString,
  list,
  nothing,
  rangeValues,
  record,
  string,
  type RecordValue,
  type Value,
} from './values.js';

// ============================================================
// TYPES
// ============================================================

/** Optional description of where streamed rows came from */
export interface PipelineMetadata {
  readonly source: string;
}

export type PipelineKind = 'empty' | 'value' | 'stream';

/** Per-element transform; may be async and may throw a ShellError */
export type ElementFn = (value: Value, index: number) => Value | Promise<Value>;

export type Predicate = (
  value: Value,
  index: number
) => boolean | Promise<boolean>;

type PipelineState =
  | { readonly kind: 'empty' }
  | {
      readonly kind: 'value';
      readonly value: Value;
      readonly metadata: PipelineMetadata | undefined;
    }
  | {
      readonly kind: 'stream';
      readonly source: AsyncIterable<Value>;
      readonly metadata: PipelineMetadata | undefined;
      readonly signal: AbortSignal | undefined;
    };

export interface StreamOptions {
  readonly metadata?: PipelineMetadata | undefined;
  readonly signal?: AbortSignal | undefined;
}

function isAsyncIterable(
  source: AsyncIterable<Value> | Iterable<Value>
): source is AsyncIterable<Value> {
  return Symbol.asyncIterator in source;
}

async function* fromSync(source: Iterable<Value>): AsyncGenerator<Value> {
  yield* source;
}

/** Rows yielded when a record is iterated: one `{column, value}` per column */
function recordRows(value: RecordValue): Value[] {
  return value.cols.map((col, index) => {
    const val = value.vals[index] ?? nothing(value.span);
    return record(['column', 'value'], [string(col, value.span), val], value.span);
  });
}

// ============================================================
// PIPELINE DATA
// ============================================================

export class PipelineData {
  private constructor(private readonly state: PipelineState) {}

  static empty(): PipelineData {
    return new PipelineData({ kind: 'empty' });
  }

  static value(value: Value, metadata?: PipelineMetadata): PipelineData {
    return new PipelineData({ kind: 'value', value, metadata });
  }

  static stream(
    source: AsyncIterable<Value> | Iterable<Value>,
    options: StreamOptions = {}
  ): PipelineData {
    const iterable = isAsyncIterable(source) ? source : fromSync(source);
    return new PipelineData({
      kind: 'stream',
      source: iterable,
      metadata: options.metadata,
      signal: options.signal,
    });
  }

  get kind(): PipelineKind {
    return this.state.kind;
  }

  get metadata(): PipelineMetadata | undefined {
    return this.state.kind === 'empty' ? undefined : this.state.metadata;
  }

  get signal(): AbortSignal | undefined {
    return this.state.kind === 'stream' ? this.state.signal : undefined;
  }

  // ============================================================
  // ITERATION
  // ============================================================

  /**
   * Iterate the contents.
   * Lists and ranges yield their items, records yield `{column, value}` rows,
   * any other value is yielded once and empty yields nothing.
   */
  intoIterator(): AsyncIterable<Value> {
    if (this.state.kind === 'value' && this.state.value.type === 'record') {
      return fromSync(recordRows(this.state.value));
    }
    return this.elements();
  }

  /** Like intoIterator, but a record counts as one element */
  private elements(): AsyncIterable<Value> {
    const state = this.state;
    switch (state.kind) {
      case 'empty':
        return fromSync([]);
      case 'stream':
        return state.source;
      case 'value':
        switch (state.value.type) {
          case 'list':
            return fromSync(state.value.vals);
          case 'range':
            return fromSync(rangeValues(state.value));
          default:
            return fromSync([state.value]);
        }
    }
  }

  /** True when mapping should run per item rather than once on the value */
  private isCollection(): boolean {
    return (
      this.state.kind === 'stream' ||
      (this.state.kind === 'value' &&
        (this.state.value.type === 'list' || this.state.value.type === 'range'))
    );
  }

  private wrap(source: AsyncIterable<Value>, signal?: AbortSignal): PipelineData {
    return PipelineData.stream(source, {
      metadata: this.metadata,
      signal: signal ?? this.signal,
    });
  }

  // ============================================================
  // LAZY TRANSFORMS
  // ============================================================

  /**
   * Apply `fn` to every element.
   *
   * Collections stay lazy: the result is a stream that checks `signal`
   * before each pull and ends early once it is aborted. A single value is
   * mapped once. A ShellError thrown by `fn` becomes an error value at that
   * position; error values in the input pass through untouched.
   */
  async map(fn: ElementFn, signal?: AbortSignal): Promise<PipelineData> {
    const state = this.state;
    if (state.kind === 'empty') return this;

    if (!this.isCollection() && state.kind === 'value') {
      const mapped = await applyElement(fn, state.value, 0);
      return PipelineData.value(mapped, state.metadata);
    }

    const token = signal ?? this.signal;
    const source = this.elements();
    return this.wrap(
      (async function* () {
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          yield await applyElement(fn, item, index);
          index++;
        }
      })(),
      token
    );
  }

  /** Keep elements for which `fn` returns a value; undefined drops the element */
  filterMap(
    fn: (value: Value, index: number) => Promise<Value | undefined>,
    signal?: AbortSignal
  ): PipelineData {
    const token = signal ?? this.signal;
    const source = this.intoIterator();
    return this.wrap(
      (async function* () {
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          const mapped = await fn(item, index);
          index++;
          if (mapped !== undefined) yield mapped;
        }
      })(),
      token
    );
  }

  /** Replace each element with zero or more values */
  flatMap(
    fn: (value: Value, index: number) => Promise<Iterable<Value>>,
    signal?: AbortSignal
  ): PipelineData {
    const token = signal ?? this.signal;
    const source = this.intoIterator();
    return this.wrap(
      (async function* () {
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          yield* await fn(item, index);
          index++;
        }
      })(),
      token
    );
  }

  /** Yield elements while `predicate` holds; stops at the first failure */
  takeWhile(predicate: Predicate, signal?: AbortSignal): PipelineData {
    const token = signal ?? this.signal;
    const source = this.intoIterator();
    return this.wrap(
      (async function* () {
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          if (!(await predicate(item, index))) return;
          yield item;
          index++;
        }
      })(),
      token
    );
  }

  skip(count: number): PipelineData {
    const token = this.signal;
    const source = this.intoIterator();
    return this.wrap(
      (async function* () {
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          if (index >= count) yield item;
          index++;
        }
      })()
    );
  }

  take(count: number): PipelineData {
    const token = this.signal;
    const source = this.intoIterator();
    return this.wrap(
      (async function* () {
        if (count <= 0) return;
        let index = 0;
        for await (const item of source) {
          if (token?.aborted) return;
          yield item;
          index++;
          if (index >= count) return;
        }
      })()
    );
  }

  /**
   * Select rows `from` through `to`, both inclusive. A null `to` runs to the
   * end. Negative indexes count from the end and force materialization;
   * non-negative ones stay lazy. `from > to` yields nothing.
   */
  async range(
    from: number,
    to: number | null,
    span: Span
  ): Promise<PipelineData> {
    if (from >= 0 && (to === null || to >= 0)) {
      if (to !== null && from > to) return PipelineData.value(nothing(span));
      const skipped = this.skip(from);
      return to === null ? skipped : skipped.take(to - from + 1);
    }

    const rows = await this.collect();
    const length = rows.length;
    const start = from < 0 ? Math.max(length + from, 0) : from;
    const end =
      to === null ? length - 1 : to < 0 ? length + to : Math.min(to, length);
    if (start > end) return PipelineData.value(nothing(span));
    return PipelineData.stream(rows.slice(start, end + 1), {
      metadata: this.metadata,
      signal: this.signal,
    });
  }

  // ============================================================
  // COLLECTION POINTS
  // ============================================================

  /** Materialize every element (records expand to rows) */
  async collect(): Promise<Value[]> {
    const token = this.signal;
    const items: Value[] = [];
    for await (const item of this.intoIterator()) {
      if (token?.aborted) break;
      items.push(item);
    }
    return items;
  }

  /**
   * Materialize into a single value.
   * A stream becomes a list, or nothing when it produced no items.
   */
  async intoValue(span: Span): Promise<Value> {
    const state = this.state;
    switch (state.kind) {
      case 'empty':
        return nothing(span);
      case 'value':
        return state.value;
      case 'stream': {
        const items = await this.collect();
        return items.length === 0 ? nothing(span) : list(items, span);
      }
    }
  }

  /**
   * Render every element as text joined by `separator`.
   * A single non-collection value renders whole.
   *
   * @throws ShellError carried by an error element
   */
  async collectString(
    separator: string,
    config: ShellConfig = DEFAULT_CONFIG
  ): Promise<string> {
    const state = this.state;
    if (state.kind === 'value' && !this.isCollection()) {
      if (state.value.type === 'error') throw state.value.error;
      return intoString(state.value, separator, config);
    }

    const token = this.signal;
    const parts: string[] = [];
    for await (const item of this.elements()) {
      if (token?.aborted) break;
      if (item.type === 'error') throw item.error;
      parts.push(intoString(item, separator, config));
    }
    return parts.join(separator);
  }
}

async function applyElement(
  fn: ElementFn,
  value: Value,
  index: number
): Promise<Value> {
  if (value.type === 'error') return value;
  try {
    return await fn(value, index);
  } catch (error) {
    if (isShellError(error)) return errorValue(error);
    throw error;
  }
}
