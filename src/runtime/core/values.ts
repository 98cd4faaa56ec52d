/**
 * Shoal Value Types and Utilities
 *
 * Structured values that flow between pipeline stages.
 * Public API for host applications.
 */

import type { ShellConfig } from '../../config.js';
import { DEFAULT_CONFIG } from '../../config.js';
import { engineFailed, type ShellError } from '../../error-classes.js';
import type { BlockId, RangeInclusion, Span, VarId } from '../../types.js';
import { UNKNOWN_SPAN } from '../../types.js';

// ============================================================
// VALUE UNION
// ============================================================

export interface NothingValue {
  readonly type: 'nothing';
  readonly span: Span;
}

export interface BoolValue {
  readonly type: 'bool';
  readonly val: boolean;
  readonly span: Span;
}

export interface IntValue {
  readonly type: 'int';
  readonly val: number;
  readonly span: Span;
}

export interface FloatValue {
  readonly type: 'float';
  readonly val: number;
  readonly span: Span;
}

export interface StringValue {
  readonly type: 'string';
  readonly val: string;
  readonly span: Span;
}

export interface BinaryValue {
  readonly type: 'binary';
  readonly val: Uint8Array;
  readonly span: Span;
}

/** Ordered, unique column names with a parallel list of values */
export interface RecordValue {
  readonly type: 'record';
  readonly cols: readonly string[];
  readonly vals: readonly Value[];
  readonly span: Span;
}

export interface ListValue {
  readonly type: 'list';
  readonly vals: readonly Value[];
  readonly span: Span;
}

export type NumericValue = IntValue | FloatValue;

export interface RangeValue {
  readonly type: 'range';
  readonly from: NumericValue;
  readonly incr: NumericValue;
  readonly to: NumericValue;
  readonly inclusion: RangeInclusion;
  readonly span: Span;
}

/** A failure carried as data so pipelines need not unwind */
export interface ErrorValue {
  readonly type: 'error';
  readonly error: ShellError;
}

/** Closure: a block plus the values it captured when it was created */
export interface BlockValue {
  readonly type: 'block';
  readonly blockId: BlockId;
  readonly captures: ReadonlyMap<VarId, Value>;
  readonly span: Span;
}

export type Value =
  | NothingValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | BinaryValue
  | RecordValue
  | ListValue
  | RangeValue
  | ErrorValue
  | BlockValue;

export type ValueType = Value['type'];

// ============================================================
// CONSTRUCTORS
// ============================================================

export function nothing(span: Span = UNKNOWN_SPAN): NothingValue {
  return { type: 'nothing', span };
}

export function bool(val: boolean, span: Span = UNKNOWN_SPAN): BoolValue {
  return { type: 'bool', val, span };
}

export function int(val: number, span: Span = UNKNOWN_SPAN): IntValue {
  return { type: 'int', val: Math.trunc(val), span };
}

export function float(val: number, span: Span = UNKNOWN_SPAN): FloatValue {
  return { type: 'float', val, span };
}

export function string(val: string, span: Span = UNKNOWN_SPAN): StringValue {
  return { type: 'string', val, span };
}

export function binary(val: Uint8Array, span: Span = UNKNOWN_SPAN): BinaryValue {
  return { type: 'binary', val, span };
}

export function list(
  vals: readonly Value[],
  span: Span = UNKNOWN_SPAN
): ListValue {
  return { type: 'list', vals, span };
}

/**
 * Build a record from parallel columns and values.
 * Mismatched lengths or repeated columns are engine defects, not user errors.
 */
export function record(
  cols: readonly string[],
  vals: readonly Value[],
  span: Span = UNKNOWN_SPAN
): RecordValue {
  if (cols.length !== vals.length) {
    throw engineFailed(
      `record has ${cols.length} columns but ${vals.length} values`
    );
  }
  if (new Set(cols).size !== cols.length) {
    throw engineFailed(`record has duplicate columns: ${cols.join(', ')}`);
  }
  return { type: 'record', cols, vals, span };
}

/** Build a record from an object's own entries, in insertion order */
export function recordFromEntries(
  entries: Iterable<readonly [string, Value]>,
  span: Span = UNKNOWN_SPAN
): RecordValue {
  const cols: string[] = [];
  const vals: Value[] = [];
  for (const [col, val] of entries) {
    const existing = cols.indexOf(col);
    if (existing === -1) {
      cols.push(col);
      vals.push(val);
    } else {
      vals[existing] = val;
    }
  }
  return record(cols, vals, span);
}

export function range(
  from: NumericValue,
  incr: NumericValue,
  to: NumericValue,
  inclusion: RangeInclusion,
  span: Span = UNKNOWN_SPAN
): RangeValue {
  return { type: 'range', from, incr, to, inclusion, span };
}

export function errorValue(error: ShellError): ErrorValue {
  return { type: 'error', error };
}

export function block(
  blockId: BlockId,
  captures: ReadonlyMap<VarId, Value>,
  span: Span = UNKNOWN_SPAN
): BlockValue {
  return { type: 'block', blockId, captures, span };
}

// ============================================================
// INSPECTION
// ============================================================

/** Span the value originated from (errors report their primary label) */
export function spanOf(value: Value): Span {
  if (value.type === 'error') return value.error.span ?? UNKNOWN_SPAN;
  return value.span;
}

/** Return a copy of the value anchored at a new span */
export function withSpan<T extends Value>(value: T, span: Span): T {
  if (value.type === 'error') return value;
  return { ...value, span };
}

/** User-facing type name */
export function typeName(value: Value): string {
  switch (value.type) {
    case 'record':
      return `record<${value.cols.join(', ')}>`;
    case 'list':
      return 'list';
    default:
      return value.type;
  }
}

export function isNumeric(value: Value): value is NumericValue {
  return value.type === 'int' || value.type === 'float';
}

/** Only `true` is truthy; conditions on other values are type errors upstream */
export function isTrue(value: Value): boolean {
  return value.type === 'bool' && value.val;
}

/** Look up a record column without raising */
export function getColumn(value: RecordValue, col: string): Value | undefined {
  const index = value.cols.indexOf(col);
  return index === -1 ? undefined : value.vals[index];
}

// ============================================================
// RANGES
// ============================================================

/**
 * Iterate a range's numbers lazily.
 * Direction follows the sign of the increment; a zero increment yields nothing.
 */
export function* rangeValues(value: RangeValue): Generator<Value> {
  const isFloat =
    value.from.type === 'float' ||
    value.incr.type === 'float' ||
    value.to.type === 'float';
  const make = (n: number): Value =>
    isFloat ? float(n, value.span) : int(n, value.span);

  const step = value.incr.val;
  if (step === 0) return;

  const end = value.to.val;
  const inclusive = value.inclusion === 'inclusive';
  const more = (n: number): boolean => {
    if (step > 0) return inclusive ? n <= end : n < end;
    return inclusive ? n >= end : n > end;
  };

  for (let n = value.from.val; more(n); n += step) {
    yield make(n);
  }
}

/** True when `n` lies between the range bounds (step is ignored) */
export function rangeContains(value: RangeValue, n: number): boolean {
  const lo = Math.min(value.from.val, value.to.val);
  const hi = Math.max(value.from.val, value.to.val);
  if (value.inclusion === 'inclusive') return n >= lo && n <= hi;
  return value.from.val <= value.to.val
    ? n >= lo && n < hi
    : n > lo && n <= hi;
}

// ============================================================
// FORMATTING
// ============================================================

function formatFloat(val: number, config: ShellConfig): string {
  if (config.floatPrecision !== null) {
    return val.toFixed(config.floatPrecision);
  }
  return Number.isInteger(val) ? val.toFixed(1) : String(val);
}

function formatBinary(bytes: Uint8Array): string {
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, '0'));
  return `0x[${hex.join(' ')}]`;
}

/**
 * Render a value as text.
 * Nested list and record items are joined with `, `; the top level uses
 * `separator`.
 */
export function intoString(
  value: Value,
  separator = ', ',
  config: ShellConfig = DEFAULT_CONFIG
): string {
  switch (value.type) {
    case 'nothing':
      return '';
    case 'bool':
      return value.val ? 'true' : 'false';
    case 'int':
      return String(value.val);
    case 'float':
      return formatFloat(value.val, config);
    case 'string':
      return value.val;
    case 'binary':
      return formatBinary(value.val);
    case 'range': {
      const op = value.inclusion === 'inclusive' ? '..' : '..<';
      // An open range has an infinite upper bound
      const to = Number.isFinite(value.to.val)
        ? intoString(value.to, ', ', config)
        : '';
      return `${intoString(value.from, ', ', config)}${op}${to}`;
    }
    case 'list':
      return `[${value.vals.map((v) => intoString(v, ', ', config)).join(separator)}]`;
    case 'record':
      return `{${value.cols
        .map((col, i) => {
          const val = value.vals[i];
          return `${col}: ${val ? intoString(val, ', ', config) : ''}`;
        })
        .join(separator)}}`;
    case 'error':
      return `Error: ${value.error.message}`;
    case 'block':
      return `<Block ${value.blockId}>`;
  }
}

/**
 * Render a value for inspection: like intoString, but strings nested inside
 * collections are quoted.
 */
export function debugString(
  value: Value,
  config: ShellConfig = DEFAULT_CONFIG
): string {
  switch (value.type) {
    case 'list':
      return `[${value.vals.map((v) => nestedDebug(v, config)).join(', ')}]`;
    case 'record':
      return `{${value.cols
        .map((col, i) => {
          const val = value.vals[i];
          return `${col}: ${val ? nestedDebug(val, config) : ''}`;
        })
        .join(', ')}}`;
    default:
      return intoString(value, ', ', config);
  }
}

function nestedDebug(value: Value, config: ShellConfig): string {
  return value.type === 'string'
    ? JSON.stringify(value.val)
    : debugString(value, config);
}

// ============================================================
// EQUALITY AND ORDERING
// ============================================================

/** Structural equality, ignoring spans */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) return a.val === b.val;

  switch (a.type) {
    case 'nothing':
      return b.type === 'nothing';
    case 'bool':
    case 'string':
      return b.type === a.type && b.val === a.val;
    case 'binary':
      return (
        b.type === 'binary' &&
        a.val.length === b.val.length &&
        a.val.every((byte, i) => byte === b.val[i])
      );
    case 'list':
      return (
        b.type === 'list' &&
        a.vals.length === b.vals.length &&
        a.vals.every((v, i) => {
          const other = b.vals[i];
          return other !== undefined && valuesEqual(v, other);
        })
      );
    case 'record':
      return (
        b.type === 'record' &&
        a.cols.length === b.cols.length &&
        a.cols.every((col, i) => {
          const mine = a.vals[i];
          const theirs = getColumn(b, col);
          return (
            mine !== undefined &&
            theirs !== undefined &&
            valuesEqual(mine, theirs)
          );
        })
      );
    case 'range':
      return (
        b.type === 'range' &&
        a.inclusion === b.inclusion &&
        valuesEqual(a.from, b.from) &&
        valuesEqual(a.incr, b.incr) &&
        valuesEqual(a.to, b.to)
      );
    case 'block':
      return b.type === 'block' && a.blockId === b.blockId;
    case 'error':
      return b.type === 'error' && a.error.message === b.error.message;
    default:
      return false;
  }
}

/**
 * Order two comparable values.
 * Returns undefined when the pair has no defined ordering.
 */
export function compareValues(a: Value, b: Value): number | undefined {
  if (isNumeric(a) && isNumeric(b)) {
    return a.val === b.val ? 0 : a.val < b.val ? -1 : 1;
  }
  if (a.type === 'string' && b.type === 'string') {
    return a.val === b.val ? 0 : a.val < b.val ? -1 : 1;
  }
  if (a.type === 'bool' && b.type === 'bool') {
    return Number(a.val) - Number(b.val);
  }
  return undefined;
}

/**
 * How host numbers map to int and float:
 * - `integral`: a whole number is an int. Formats whose parser does not keep
 *   the distinction (JSON) decode `1.0` as the int 1.
 * - `bigint`: only bigints are ints and every number is a float, for parsers
 *   that return integers as bigints.
 */
export type NativeIntegers = 'integral' | 'bigint';

/** Convert a JSON-like host value into a structured Value */
export function fromNative(
  input: unknown,
  span: Span = UNKNOWN_SPAN,
  integers: NativeIntegers = 'integral'
): Value {
  if (input === null || input === undefined) return nothing(span);
  if (typeof input === 'boolean') return bool(input, span);
  if (typeof input === 'number') {
    return integers === 'integral' && Number.isInteger(input)
      ? int(input, span)
      : float(input, span);
  }
  if (typeof input === 'bigint') return int(Number(input), span);
  if (typeof input === 'string') return string(input, span);
  if (input instanceof Uint8Array) return binary(input, span);
  if (input instanceof Date) return string(input.toISOString(), span);
  if (Array.isArray(input)) {
    return list(
      input.map((item: unknown) => fromNative(item, span, integers)),
      span
    );
  }
  if (typeof input === 'object') {
    return recordFromEntries(
      Object.entries(input).map(
        ([key, val]: [string, unknown]) =>
          [key, fromNative(val, span, integers)] as const
      ),
      span
    );
  }
  return string(String(input), span);
}
