/**
 * Shoal Engine Tests: Modules
 * Import patterns over exported commands and environment variables
 */

import { describe, expect, it } from 'vitest';

import { SHELL_ERROR_CODES } from '../../src/index.js';
import { rejection, runNative } from '../helpers/runtime.js';
import {
  call,
  def,
  env,
  exportEnv,
  int,
  module,
  str,
  use,
} from '../helpers/syntax.js';

/** `module foo { export def a {1}; def b {2}; export def c {3} }` */
const foo = () =>
  module(
    'foo',
    def('a', [], [int(1)], true),
    def('b', [], [int(2)]),
    def('c', [], [int(3)], true)
  );

/** `module foo { export env a {"1"}; export env b {"2"} }` */
const fooEnv = () =>
  module('foo', exportEnv('a', [str('1')]), exportEnv('b', [str('2')]));

describe('Shoal Engine: Modules', () => {
  describe('command imports', () => {
    it('binds exports under the module prefix', async () => {
      expect(await runNative([foo(), use('foo'), call('foo a')])).toBe(1);
    });

    it('binds a named export under its own name', async () => {
      expect(await runNative([foo(), use('foo', 'a'), call('a')])).toBe(1);
    });

    it('binds every export with a glob', async () => {
      expect(await runNative([foo(), use('foo', '*'), call('c')])).toBe(3);
    });

    it('binds a list of exports', async () => {
      expect(await runNative([foo(), use('foo', ['a', 'c']), call('c')])).toBe(
        3
      );
    });

    it('does not bind unexported commands through a glob', async () => {
      const error = await rejection(
        runNative([foo(), use('foo', '*'), call('b')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('rejects importing an unexported name', async () => {
      const error = await rejection(runNative([foo(), use('foo', 'b')]));
      expect(error.code).toBe(SHELL_ERROR_CODES.IMPORT_NOT_FOUND);
      expect(error.message).toBe('Could not find import: b');
    });

    it('rejects an unknown module', async () => {
      const error = await rejection(runNative([use('nope')]));
      expect(error.code).toBe(SHELL_ERROR_CODES.MODULE_NOT_FOUND);
    });

    it('keeps module definitions out of the enclosing scope', async () => {
      const error = await rejection(runNative([foo(), call('a')]));
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('lets exports call private commands of their module', async () => {
      expect(
        await runNative([
          module('foo', def('b', [], [int(2)]), def('a', [], [call('b')], true)),
          use('foo'),
          call('foo a'),
        ])
      ).toBe(2);
    });
  });

  describe('environment imports', () => {
    it('binds exports under the module prefix', async () => {
      expect(await runNative([fooEnv(), use('foo'), env('foo a')])).toBe('1');
    });

    it('binds a named export under its own name', async () => {
      expect(await runNative([fooEnv(), use('foo', 'a'), env('a')])).toBe('1');
    });

    it('binds every export with a glob', async () => {
      expect(await runNative([fooEnv(), use('foo', '*'), env('b')])).toBe('2');
    });

    it('binds a list of exports', async () => {
      expect(
        await runNative([fooEnv(), use('foo', ['a', 'b']), env('b')])
      ).toBe('2');
    });

    it('rejects importing a missing name', async () => {
      const error = await rejection(runNative([fooEnv(), use('foo', 'c')]));
      expect(error.code).toBe(SHELL_ERROR_CODES.IMPORT_NOT_FOUND);
    });

    it('evaluates the export with the private commands of its module', async () => {
      expect(
        await runNative([
          module('foo', def('b', [], [str('2')]), exportEnv('a', [call('b')])),
          use('foo'),
          env('foo a'),
        ])
      ).toBe('2');
    });
  });

  describe('a name exported as both', () => {
    const spam = () =>
      module(
        'spam',
        exportEnv('foo', [str('foo')]),
        def('foo', [], [str('bar')], true)
      );

    it('imports the variable', async () => {
      expect(await runNative([spam(), use('spam', 'foo'), env('foo')])).toBe(
        'foo'
      );
    });

    it('imports the command', async () => {
      expect(await runNative([spam(), use('spam', 'foo'), call('foo')])).toBe(
        'bar'
      );
    });
  });
});
