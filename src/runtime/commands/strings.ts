/**
 * String Commands
 */

import { delimiterError, unsupportedInput } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import type { Span } from '../../types.js';
import {
  cellPathArgs,
  hasFlag,
  opt,
  req,
  reqString,
  restArgs,
} from '../core/call-args.js';
import { PipelineData } from '../core/pipeline.js';
import {
  intoString,
  record,
  string,
  typeName,
  type Value,
} from '../core/values.js';
import { builtin, operateOnPaths } from './shared.js';

/**
 * Split text into words at separators, lower-to-upper case boundaries and
 * the end of an acronym, then join them upper-cased with underscores.
 * Letters, combining marks and digits from any script belong to words.
 *
 * @example
 * toScreamingSnakeCase('thisIsTheSecondCase') // 'THIS_IS_THE_SECOND_CASE'
 * toScreamingSnakeCase('XMLHttpRequest') // 'XML_HTTP_REQUEST'
 */
export function toScreamingSnakeCase(text: string): string {
  return text
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{Lu})(\p{Lu}\p{Ll})/gu, '$1 $2')
    .split(/[^\p{L}\p{M}\p{N}]+/u)
    .filter((word) => word.length > 0)
    .map((word) => word.toUpperCase())
    .join('_');
}

/** Wrap a string transform so other input types fail in place */
export function stringAction(
  name: string,
  transform: (text: string) => string
): (value: Value) => Value {
  return (value) => {
    if (value.type === 'error') throw value.error;
    if (value.type === 'string') return string(transform(value.val), value.span);
    throw unsupportedInput(
      `${name} only works with strings, found ${typeName(value)}`,
      value.span
    );
  };
}

// ============================================================
// SUBSTRING
// ============================================================

/** Character bounds of a substring; `end` is exclusive and may be Infinity */
export interface SubstringBounds {
  readonly start: number;
  readonly end: number;
}

const INDEX_TEXT = /^[+-]?\d+$/;

function parseIndex(text: string, fallback: number, span: Span): number {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed === '_') return fallback;
  if (!INDEX_TEXT.test(trimmed)) {
    throw unsupportedInput('could not perform substring', span);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Read bounds from `[start end]` or `'start,end'`. A bound left empty or
 * written `_` runs from the beginning or to the end.
 */
export function substringBounds(value: Value, span: Span): SubstringBounds {
  let parts: string[];
  if (value.type === 'list') {
    if (value.vals.length > 2) {
      throw unsupportedInput('More than two indices given', span);
    }
    parts = value.vals.map((item) => {
      if (item.type === 'int') return String(item.val);
      return item.type === 'string' ? item.val : '';
    });
  } else if (value.type === 'string') {
    parts = value.val.split(',');
  } else {
    throw unsupportedInput('could not perform substring', span);
  }

  const [start, end] = parts;
  if (start === undefined || end === undefined) {
    throw unsupportedInput('could not perform substring', span);
  }
  return {
    start: parseIndex(start, 0, span),
    end: parseIndex(end, Number.POSITIVE_INFINITY, span),
  };
}

/**
 * Slice `text` by characters. Negative bounds count back from the end and
 * clamp at the beginning; a start at or past the end yields ''.
 *
 * @throws ShellError UnsupportedInput when start lies after end
 */
export function substring(
  text: string,
  bounds: SubstringBounds,
  span: Span
): string {
  const chars = [...text];
  const length = chars.length;
  const start =
    bounds.start < 0 ? Math.max(bounds.start + length, 0) : bounds.start;
  const end = bounds.end < 0 ? Math.max(bounds.end + length, 0) : bounds.end;
  if (start >= length) return '';
  if (start > end) {
    throw unsupportedInput('End must be greater than or equal to Start', span);
  }
  return chars.slice(start, end).join('');
}

// ============================================================
// PARSE
// ============================================================

const REGEX_SYNTAX = /[.*+?^${}()|[\]\\]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SYNTAX, '\\$&');
}

function compilePattern(source: string, flags: string, span: Span): RegExp {
  try {
    return new RegExp(source, `g${flags}`);
  } catch (error) {
    throw delimiterError(
      error instanceof Error ? error.message : 'Invalid regex',
      span
    );
  }
}

/**
 * Compile a `{column}` pattern. Literal text must match exactly and each
 * `{name}` captures as little as possible into the column `name`; `{{` is a
 * literal brace. The pattern must match the whole string.
 *
 * @throws ShellError DelimiterError for a `{` without a closing `}`
 */
export function patternToRegex(pattern: string, span: Span): RegExp {
  let source = '^';
  let rest = pattern;
  while (rest.length > 0) {
    const open = rest.indexOf('{');
    if (open === -1) {
      source += escapeRegex(rest);
      break;
    }
    if (rest.charAt(open + 1) === '{') {
      source += escapeRegex(rest.slice(0, open + 1));
      rest = rest.slice(open + 2);
      continue;
    }
    const close = rest.indexOf('}', open + 1);
    if (close === -1) {
      throw delimiterError(
        'Found opening `{` without an associated closing `}`',
        span
      );
    }
    source += escapeRegex(rest.slice(0, open));
    const column = rest.slice(open + 1, close);
    if (column.length > 0) source += `(?<${column}>.*?)`;
    rest = rest.slice(close + 1);
  }
  return compilePattern(`${source}$`, 's', span);
}

/**
 * Column names for the capture groups of `source`, in group order: the
 * group's name, or `Capture<n>` for the n-th group when it has none.
 */
export function captureNames(source: string): string[] {
  const names: string[] = [];
  let inClass = false;
  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);
    if (char === '\\') {
      i++;
    } else if (inClass) {
      inClass = char !== ']';
    } else if (char === '[') {
      inClass = true;
    } else if (char === '(') {
      const named = /^\(\?<([^>=!][^>]*)>/.exec(source.slice(i));
      if (named?.[1] !== undefined) {
        names.push(named[1]);
      } else if (source.charAt(i + 1) !== '?') {
        names.push(`Capture${names.length + 1}`);
      }
    }
  }
  return names;
}

function parseRows(
  regex: RegExp,
  columns: readonly string[],
  value: Value,
  head: Span
): Value[] {
  if (value.type === 'error') throw value.error;
  if (value.type !== 'string') {
    throw unsupportedInput(
      `parse only works with strings, found ${typeName(value)}`,
      value.span
    );
  }
  return [...value.val.matchAll(regex)].map((match) =>
    record(
      columns,
      columns.map((_, index) => string(match[index + 1] ?? '', value.span)),
      head
    )
  );
}

export const STRING_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'str collect',
    usage: 'Concatenate every element into one string.',
    signature: {
      params: [
        {
          name: 'separator',
          type: 'string',
          description: 'text placed between elements',
          optional: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const separator = await opt(ctx, stack, call, 0);
      const text = await input.collectString(
        separator?.type === 'string' ? separator.val : '',
        ctx.config
      );
      return PipelineData.value(string(text, call.head));
    },
  }),

  builtin({
    name: 'str screaming-snake-case',
    usage: 'Convert text to SCREAMING_SNAKE_CASE.',
    signature: {
      params: [
        {
          name: 'rest',
          type: 'cell-path',
          description: 'cell paths to convert',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, _stack, call, input) {
      return operateOnPaths(
        ctx,
        input,
        cellPathArgs(call, 0),
        stringAction('str screaming-snake-case', toScreamingSnakeCase)
      );
    },
  }),

  builtin({
    name: 'str substring',
    usage: 'Take part of the text by character indexes.',
    signature: {
      params: [
        {
          name: 'range',
          type: 'any',
          description: 'the indexes to take, as [start end] or "start,end"',
        },
        {
          name: 'rest',
          type: 'cell-path',
          description: 'cell paths to slice',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const bounds = substringBounds(await req(ctx, stack, call, 0), call.head);
      return operateOnPaths(ctx, input, cellPathArgs(call, 1), (value) => {
        if (value.type === 'error') throw value.error;
        if (value.type !== 'string') {
          throw unsupportedInput(
            `Input's type is ${typeName(value)}. This command only works with strings.`,
            call.head
          );
        }
        return string(substring(value.val, bounds, call.head), value.span);
      });
    },
  }),

  builtin({
    name: 'parse',
    usage: 'Parse columns from string data using a simple pattern.',
    signature: {
      params: [
        {
          name: 'pattern',
          type: 'string',
          description: 'the pattern to match, e.g. "{foo}: {bar}"',
        },
      ],
      flags: [
        {
          name: 'regex',
          short: 'r',
          type: null,
          description: 'use full regex syntax for patterns',
        },
      ],
    },
    async run(ctx, stack, call, input) {
      const pattern = await reqString(ctx, stack, call, 0);
      const span = call.positional[0]?.span ?? call.head;
      // (?P<name>...) groups are accepted as an alias of (?<name>...)
      const regex = hasFlag(call, 'regex')
        ? compilePattern(pattern.replace(/\(\?P</g, '(?<'), '', span)
        : patternToRegex(pattern, span);
      const columns = captureNames(regex.source);
      return input.flatMap(
        async (value) => parseRows(regex, columns, value, call.head),
        ctx.signal
      );
    },
  }),

  builtin({
    name: 'build-string',
    usage: 'Concatenate the arguments into one string.',
    signature: {
      params: [
        {
          name: 'rest',
          type: 'any',
          description: 'values to join',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call) {
      const parts = await restArgs(ctx, stack, call, 0);
      const text = parts
        .map((part) => intoString(part, ctx.config.listSeparator, ctx.config))
        .join('');
      return PipelineData.value(string(text, call.head));
    },
  }),
];
