/**
 * Shoal Command Tests: Strings, Conversions, Formats and Output
 */

import { describe, expect, it } from 'vitest';

import {
  binary,
  int as intValue,
  list as listValue,
  SHELL_ERROR_CODES,
  PipelineData,
  string,
  UNKNOWN_SPAN,
} from '../../src/index.js';
import {
  captureNames,
  substring,
  substringBounds,
  toScreamingSnakeCase,
} from '../../src/runtime/commands/strings.js';
import { stripAnsi } from '../../src/runtime/commands/platform.js';
import {
  captureLog,
  rejection,
  runNative,
  runWithInput,
  toNative,
} from '../helpers/runtime.js';
import {
  bool,
  call,
  cellPath,
  flag,
  float,
  int,
  list,
  pipe,
  range,
  rec,
  str,
  table,
} from '../helpers/syntax.js';

describe('Shoal Commands: Strings', () => {
  describe('toScreamingSnakeCase', () => {
    it.each([
      ['thisIsTheFirstCase', 'THIS_IS_THE_FIRST_CASE'],
      ['this-is-the-second-case', 'THIS_IS_THE_SECOND_CASE'],
      ['this_is the  third', 'THIS_IS_THE_THIRD'],
      ['already_UPPER', 'ALREADY_UPPER'],
      ['héllo wörld', 'HÉLLO_WÖRLD'],
      ['XMLHttpRequest', 'XML_HTTP_REQUEST'],
      ['parseHTML5Doc', 'PARSE_HTML5_DOC'],
      ['', ''],
    ])('converts %j', (input, expected) => {
      expect(toScreamingSnakeCase(input)).toBe(expected);
    });
  });

  it('converts the input string', async () => {
    expect(
      await runNative([
        pipe(str('helloWorld'), call('str screaming-snake-case')),
      ])
    ).toBe('HELLO_WORLD');
  });

  it('converts only the cells named by a path', async () => {
    expect(
      await runNative([
        pipe(
          table(['key', 'n'], [str('someKey'), int(1)], [str('other-key'), int(2)]),
          call('str screaming-snake-case', cellPath('key'))
        ),
      ])
    ).toEqual([
      { key: 'SOME_KEY', n: 1 },
      { key: 'OTHER_KEY', n: 2 },
    ]);
  });

  it('marks a non-string input as an error value', async () => {
    expect(
      await runNative([pipe(int(5), call('str screaming-snake-case'))])
    ).toEqual({ error: SHELL_ERROR_CODES.UNSUPPORTED_INPUT });
  });

  it('concatenates a list with str collect', async () => {
    expect(
      await runNative([pipe(list(str('a'), str('b')), call('str collect'))])
    ).toBe('ab');
  });

  it('places a separator between collected elements', async () => {
    expect(
      await runNative([
        pipe(list(str('a'), int(1), str('b')), call('str collect', str(', '))),
      ])
    ).toBe('a, 1, b');
  });

  it('joins its arguments with build-string', async () => {
    expect(
      await runNative([
        call('build-string', str('n='), int(3), list(int(1), int(2))),
      ])
    ).toBe('n=3[1, 2]');
  });

  it('renders an open range without an upper bound', async () => {
    expect(await runNative([call('build-string', range(1, null))])).toBe('1..');
  });
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('Shoal Commands: Substring', () => {
  const bounds = (start: number, end: number) => ({ start, end });

  describe('substring', () => {
    it.each([
      [bounds(0, -6), ''],
      [bounds(-4, Number.POSITIVE_INFINITY), 'dres'],
      [bounds(6, 0), ''],
      [bounds(0, -110), ''],
      [bounds(1, 3), 'nd'],
    ])('slices andres by %j', (slice, expected) => {
      expect(substring('andres', slice, UNKNOWN_SPAN)).toBe(expected);
    });

    it('counts characters, not code units', () => {
      expect(substring('a😀bc', bounds(1, 3), UNKNOWN_SPAN)).toBe('😀b');
    });

    it('rejects a start after the end', () => {
      expect(
        thrownBy(() => substring('andres', bounds(3, 1), UNKNOWN_SPAN))
      ).toMatchObject({
        code: SHELL_ERROR_CODES.UNSUPPORTED_INPUT,
        labels: [{ text: 'End must be greater than or equal to Start' }],
      });
    });
  });

  describe('substringBounds', () => {
    it('reads a list of two ints', () => {
      expect(
        substringBounds(listValue([intValue(5), intValue(12)]), UNKNOWN_SPAN)
      ).toEqual({ start: 5, end: 12 });
    });

    it('reads a comma separated string with an open end', () => {
      expect(substringBounds(string('5,'), UNKNOWN_SPAN)).toEqual({
        start: 5,
        end: Number.POSITIVE_INFINITY,
      });
    });

    it('rejects more than two indexes', () => {
      expect(
        thrownBy(() =>
          substringBounds(
            listValue([intValue(1), intValue(2), intValue(3)]),
            UNKNOWN_SPAN
          )
        )
      ).toMatchObject({ labels: [{ text: 'More than two indices given' }] });
    });
  });

  it.each([
    ['a list', list(int(5), int(12)), 'morning'],
    ['a start and end', str('5,12'), 'morning'],
    ['an open start', str(',-5'), 'good mo'],
    ['an open end', str('5,'), 'morning'],
    ['a placeholder start', str('_,7'), 'good mo'],
  ])('slices the input with %s', async (_label, indexes, expected) => {
    expect(
      await runNative([
        pipe(str('good morning'), call('str substring', indexes)),
      ])
    ).toBe(expected);
  });

  it('slices only the cells named by a path', async () => {
    expect(
      await runNative([
        pipe(
          table(['word', 'n'], [str('shoal'), int(1)]),
          call('str substring', str('0,3'), cellPath('word'))
        ),
      ])
    ).toEqual([{ word: 'sho', n: 1 }]);
  });

  it('marks reversed indexes as an error value', async () => {
    expect(
      await runNative([
        pipe(str('good morning'), call('str substring', str('3,1'))),
      ])
    ).toEqual({ error: SHELL_ERROR_CODES.UNSUPPORTED_INPUT });
  });

  it('marks a non-string input as an error value', async () => {
    expect(
      await runNative([pipe(int(7), call('str substring', str('0,1')))])
    ).toEqual({ error: SHELL_ERROR_CODES.UNSUPPORTED_INPUT });
  });
});

describe('Shoal Commands: Parse', () => {
  it('names unnamed groups by position', () => {
    expect(captureNames('(\\d+)-(?<b>\\d+)(?:x)[(]')).toEqual(['Capture1', 'b']);
  });

  it('splits text into columns with a pattern', async () => {
    expect(
      await runNative([pipe(str('hi there'), call('parse', str('{foo} {bar}')))])
    ).toEqual([{ foo: 'hi', bar: 'there' }]);
  });

  it('treats regex syntax in a pattern literally', async () => {
    expect(
      await runNative([
        pipe(str('(1.5) ok'), call('parse', str('({n}) {word}'))),
      ])
    ).toEqual([{ n: '1.5', word: 'ok' }]);
  });

  it('accepts named groups written with P', async () => {
    expect(
      await runNative([
        pipe(
          str('hi there'),
          call('parse', str('(?P<foo>\\w+) (?P<bar>\\w+)'), flag('regex'))
        ),
      ])
    ).toEqual([{ foo: 'hi', bar: 'there' }]);
  });

  it('yields one row per regex match', async () => {
    expect(
      await runNative([
        pipe(str('1-2 3-4'), call('parse', str('(\\d+)-(\\d+)'), flag('regex'))),
      ])
    ).toEqual([
      { Capture1: '1', Capture2: '2' },
      { Capture1: '3', Capture2: '4' },
    ]);
  });

  it('reports a pattern with an unclosed brace', async () => {
    const error = await rejection(
      runNative([pipe(str('x'), call('parse', str('{foo')))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.DELIMITER_ERROR);
    expect(error.labels[0]?.text).toBe(
      'Found opening `{` without an associated closing `}`'
    );
  });

  it('rejects non-string input', async () => {
    const error = await rejection(
      runNative([pipe(int(3), call('parse', str('{n}')))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.UNSUPPORTED_INPUT);
    expect(error.labels[0]?.text).toBe('parse only works with strings, found int');
  });
});

describe('Shoal Commands: Platform', () => {
  it('strips color and hyperlink sequences', () => {
    expect(stripAnsi('\x1b[1;31mred\x1b[0m')).toBe('red');
    expect(stripAnsi('\x1b]8;;https://example.test\x07link\x1b]8;;\x07')).toBe(
      'link'
    );
  });

  it('strips the input with ansi strip', async () => {
    expect(
      await runNative([pipe(str('\x1b[32mok\x1b[0m'), call('ansi strip'))])
    ).toBe('ok');
  });

  it('prints its arguments through the log callback', async () => {
    const { logs, callbacks } = captureLog();
    const result = await runNative([call('print', str('a'), int(1))], {
      callbacks,
    });
    expect(result).toBe(null);
    expect(logs.map(toNative)).toEqual(['a', 1]);
  });

  it('prints its input when given no arguments', async () => {
    const { logs, callbacks } = captureLog();
    await runNative([pipe(rec({ x: int(1) }), call('print'))], { callbacks });
    expect(logs.map(toNative)).toEqual([{ x: 1 }]);
  });
});

describe('Shoal Commands: Conversions', () => {
  it('converts ints, floats, bools and numeric strings', async () => {
    expect(
      await runNative([
        pipe(
          list(int(4), float(3.9), float(-3.9), bool(true), str(' 12 ')),
          call('into int')
        ),
      ])
    ).toEqual([4, 3, -3, 1, 12]);
  });

  it('marks an unparseable string as an error value', async () => {
    expect(await runNative([pipe(str('12abc'), call('into int'))])).toEqual({
      error: SHELL_ERROR_CODES.CANT_CONVERT,
    });
  });

  it('converts a column named by a path', async () => {
    expect(
      await runNative([
        pipe(
          table(['n', 's'], [str('7'), str('x')]),
          call('into int', cellPath('n'))
        ),
      ])
    ).toEqual([{ n: 7, s: 'x' }]);
  });
});

describe('Shoal Commands: Formats', () => {
  it('decodes json input', async () => {
    expect(
      await runNative([pipe(str('{"a": [1, true]}'), call('from json'))])
    ).toEqual({ a: [1, true] });
  });

  it('concatenates streamed text before decoding', async () => {
    expect(
      await runWithInput(
        [call('from json')],
        PipelineData.stream([string('{"a":'), string(' 2}')])
      )
    ).toEqual({ a: 2 });
  });

  it('decodes url query text', async () => {
    expect(
      await runNative([pipe(str('name=ana&age=31'), call('from url'))])
    ).toEqual({ name: 'ana', age: '31' });
  });

  it('decodes binary input as UTF-8 text', async () => {
    expect(
      await runWithInput(
        [call('from json')],
        PipelineData.value(binary(new TextEncoder().encode('{"a": 1}')))
      )
    ).toEqual({ a: 1 });
  });

  it('reports binary input that is not UTF-8', async () => {
    const error = await rejection(
      runWithInput(
        [call('from json')],
        PipelineData.value(binary(new Uint8Array([0xff])))
      )
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.DECODE_FAILED);
    expect(error.message).toBe('Could not parse input as json');
  });

  it('reports text that does not decode', async () => {
    const error = await rejection(
      runNative([pipe(str('{oops'), call('from json'))])
    );
    expect(error.code).toBe(SHELL_ERROR_CODES.DECODE_FAILED);
    expect(error.message).toBe('Could not parse input as json');
  });
});
