/**
 * Shoal Core Tests: Error Registry, Suggestions and Diagnostics
 */

import { describe, expect, it } from 'vitest';

import {
  createError,
  createSpan,
  didYouMean,
  ERROR_REGISTRY,
  levenshteinDistance,
  locate,
  renderDiagnostic,
  renderMessage,
  SHELL_ERROR_CODES,
  ShellError,
} from '../../src/index.js';

describe('Shoal Core: Suggestions', () => {
  it('measures edit distance', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  it('picks the nearest candidate', () => {
    expect(didYouMean(['name', 'age', 'city'], 'nam')).toBe('name');
  });

  it('breaks ties by name', () => {
    expect(didYouMean(['bb', 'ab'], 'cb')).toBe('ab');
  });

  it('returns undefined without candidates', () => {
    expect(didYouMean([], 'x')).toBeUndefined();
  });
});

describe('Shoal Core: Error Registry', () => {
  it('registers every code once', () => {
    const codes = Object.values(SHELL_ERROR_CODES);
    expect(ERROR_REGISTRY.size).toBe(codes.length);
    for (const code of codes) {
      expect(ERROR_REGISTRY.has(code)).toBe(true);
    }
  });

  it('renders placeholders and escaped braces', () => {
    expect(renderMessage('Row {n} of {{all}', { n: 3 })).toBe('Row 3 of {all}');
  });

  it('renders a missing placeholder as empty', () => {
    expect(renderMessage('a{missing}b', {})).toBe('ab');
  });

  it('leaves a template with an unclosed brace unchanged', () => {
    expect(renderMessage('oops {name', { name: 'x' })).toBe('oops {name');
  });

  it('labels the primary span from the template', () => {
    const error = createError(
      SHELL_ERROR_CODES.CANT_CONVERT,
      { to: 'int', from: 'string' },
      [createSpan(2, 5), createSpan(7, 8)]
    );
    expect(error.message).toBe("Can't convert to int.");
    expect(error.labels).toEqual([
      { span: createSpan(2, 5), text: "can't convert string to int" },
      { span: createSpan(7, 8), text: '' },
    ]);
    expect(error.category).toBe('shell');
  });

  it('rejects an unknown code', () => {
    expect(() => createError('shell::nope', {})).toThrow(
      'Unknown error code: shell::nope'
    );
  });

  it('formats itself for display', () => {
    const error = new ShellError({
      code: SHELL_ERROR_CODES.UNKNOWN_COMMAND,
      message: 'Command not found: lenght',
      labels: [{ span: createSpan(0, 6), text: 'command not found' }],
      help: "did you mean 'length'?",
    });
    expect(error.category).toBe('parser');
    expect(error.format()).toBe(
      "Command not found: lenght: command not found (did you mean 'length'?)"
    );
  });
});

describe('Shoal Core: Diagnostics', () => {
  it('locates an offset by line and column', () => {
    expect(locate('ab\ncde\nf', 4)).toEqual({ line: 2, column: 2, text: 'cde' });
  });

  it('reads offsets as UTF-8 bytes and counts columns in characters', () => {
    expect(locate('é $row.nmae', 3)).toEqual({
      line: 1,
      column: 3,
      text: 'é $row.nmae',
    });
  });

  it('places carets after multibyte text by character', () => {
    const error = createError(SHELL_ERROR_CODES.COLUMN_NOT_FOUND, {}, [
      createSpan(11, 15),
    ]);
    expect(renderDiagnostic(error, '"ü" | get nmae')).toBe(
      [
        'error[shell::column_not_found]: Cannot find column',
        '  --> 1:11',
        '  |',
        '1 | "ü" | get nmae',
        '  |           ^^^^ cannot find column',
      ].join('\n')
    );
  });

  it('clamps offsets past the end', () => {
    expect(locate('ab', 10)).toEqual({ line: 1, column: 3, text: 'ab' });
  });

  it('underlines the labelled span with a help line', () => {
    const source = 'let x = 1\n$row.nmae';
    const error = createError(SHELL_ERROR_CODES.COLUMN_NOT_FOUND, {}, [
      createSpan(15, 19),
    ]);
    const withHelp = new ShellError({
      ...error.toData(),
      help: 'did you mean name?',
    });
    expect(renderDiagnostic(withHelp, source)).toBe(
      [
        'error[shell::column_not_found]: Cannot find column',
        '  --> 2:6',
        '  |',
        '2 | $row.nmae',
        '  |      ^^^^ cannot find column',
        '  = help: did you mean name?',
      ].join('\n')
    );
  });

  it('renders only the header for an error without spans', () => {
    const error = createError(SHELL_ERROR_CODES.ENGINE_FAILED, {
      details: 'bad state',
    });
    expect(renderDiagnostic(error, 'x')).toBe(
      'error[shell::engine_failed]: Engine failed: bad state.'
    );
  });
});
