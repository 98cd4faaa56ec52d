/**
 * Shoal Engine Tests: Hiding
 * Hiding commands and environment variables, in and across scopes
 */

import { describe, expect, it } from 'vitest';

import { SHELL_ERROR_CODES } from '../../src/index.js';
import { captureLog, rejection, runNative } from '../helpers/runtime.js';
import {
  block,
  call,
  def,
  env,
  exportEnv,
  hide,
  module,
  str,
  use,
} from '../helpers/syntax.js';

const letEnv = (key: string, value: string) =>
  call('let-env', str(key), str(value));
const doBlock = (...body: Parameters<typeof block>[0]) =>
  call('do', block(body));

/** `module spam { export env foo { "foo" }; export def foo { "bar" } }` */
const spam = () =>
  module(
    'spam',
    exportEnv('foo', [str('foo')]),
    def('foo', [], [str('bar')], true)
  );

/** `module spam { export def foo { "foo" } }` */
const spamDef = () => module('spam', def('foo', [], [str('foo')], true));

/** `module spam { export env foo { "foo" } }` */
const spamEnv = () => module('spam', exportEnv('foo', [str('foo')]));

describe('Shoal Engine: Hiding', () => {
  describe('commands', () => {
    it('makes a hidden command unknown', async () => {
      const error = await rejection(
        runNative([def('foo', [], [str('foo')]), hide('foo'), call('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
      expect(error.message).toBe('Command not found: foo');
    });

    it('allows a new definition after a hide', async () => {
      expect(
        await runNative([
          def('foo', [], [str('foo')]),
          hide('foo'),
          def('foo', [], [str('bar')]),
          call('foo'),
        ])
      ).toBe('bar');
    });

    it('rejects a second definition in the same scope', async () => {
      const error = await rejection(
        runNative([
          def('foo', [], [str('foo')]),
          def('foo', [], [str('bar')]),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.DUPLICATE_DECLARATION);
      expect(error.message).toBe("'foo' is defined more than once");
    });

    it('fails when the same name is hidden twice', async () => {
      const error = await rejection(
        runNative([def('foo', [], [str('foo')]), hide('foo'), hide('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.NOT_FOUND);
      expect(error.labels[0]?.text).toBe('did not find anything under this name');
    });

    it('fails to hide a name that was never defined', async () => {
      const error = await rejection(runNative([hide('nothere')]));
      expect(error.code).toBe(SHELL_ERROR_CODES.NOT_FOUND);
      expect(error.labels[0]?.text).toBe('did not find anything under this name');
    });
  });

  describe('environment variables', () => {
    it('makes a hidden variable unreadable', async () => {
      const error = await rejection(
        runNative([letEnv('foo', 'foo'), hide('foo'), env('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
      expect(error.help).toBeUndefined();
    });

    it('suggests a visible key', async () => {
      const error = await rejection(
        runNative([letEnv('food', 'x'), env('foo')])
      );
      expect(error.help).toBe("did you mean 'food'?");
    });

    it('binds again after a hide', async () => {
      expect(
        await runNative([
          letEnv('foo', 'foo'),
          hide('foo'),
          letEnv('foo', 'bar'),
          env('foo'),
        ])
      ).toBe('bar');
    });

    it('fails when the same name is hidden twice', async () => {
      const error = await rejection(
        runNative([letEnv('foo', 'foo'), hide('foo'), hide('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.NOT_FOUND);
    });
  });

  describe('a name that is both a command and a variable', () => {
    it('hides the command first', async () => {
      expect(
        await runNative([
          letEnv('foo', 'bar'),
          def('foo', [], [str('foo')]),
          hide('foo'),
          env('foo'),
        ])
      ).toBe('bar');
    });

    it('hides the variable on the second hide', async () => {
      const error = await rejection(
        runNative([
          letEnv('foo', 'bar'),
          def('foo', [], [str('foo')]),
          hide('foo'),
          hide('foo'),
          env('foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });
  });

  describe('nested scopes', () => {
    it('rejects a duplicate inside a block before anything runs', async () => {
      const { logs, callbacks } = captureLog();
      const error = await rejection(
        runNative(
          [
            call('print', str('before')),
            doBlock(def('foo', [], [str('foo')]), def('foo', [], [str('bar')])),
          ],
          { callbacks }
        )
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.DUPLICATE_DECLARATION);
      expect(error.message).toBe("'foo' is defined more than once");
      expect(logs).toEqual([]);
    });

    it('hides an outer command inside a block', async () => {
      const error = await rejection(
        runNative([
          def('foo', [], [str('foo')]),
          doBlock(hide('foo'), call('foo')),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('uncovers the outer command when the inner one is hidden', async () => {
      expect(
        await runNative([
          def('foo', [], [str('foo')]),
          doBlock(def('foo', [], [str('bar')]), hide('foo'), call('foo')),
        ])
      ).toBe('foo');
    });

    it('keeps an outer hide in force for later inner definitions', async () => {
      const error = await rejection(
        runNative([
          def('foo', [], [str('foo')]),
          doBlock(
            hide('foo'),
            def('foo', [], [str('bar')]),
            hide('foo'),
            call('foo')
          ),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides both definitions with two hides', async () => {
      const error = await rejection(
        runNative([
          def('foo', [], [str('foo')]),
          doBlock(
            def('foo', [], [str('bar')]),
            hide('foo'),
            hide('foo'),
            call('foo')
          ),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides an outer variable inside a block', async () => {
      const error = await rejection(
        runNative([letEnv('foo', 'foo'), doBlock(hide('foo'), env('foo'))])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('uncovers the outer variable when the inner one is hidden', async () => {
      expect(
        await runNative([
          letEnv('foo', 'foo'),
          doBlock(letEnv('foo', 'bar'), hide('foo'), env('foo')),
        ])
      ).toBe('foo');
    });

    it('keeps an outer variable hidden after an inner rebind is hidden', async () => {
      const error = await rejection(
        runNative([
          letEnv('foo', 'foo'),
          doBlock(hide('foo'), letEnv('foo', 'bar'), hide('foo'), env('foo')),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides both bindings with two hides', async () => {
      const error = await rejection(
        runNative([
          letEnv('foo', 'foo'),
          doBlock(letEnv('foo', 'bar'), hide('foo'), hide('foo'), env('foo')),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('does not leak a hide out of its block', async () => {
      expect(
        await runNative([
          def('foo', [], [str('foo')]),
          doBlock(hide('foo')),
          call('foo'),
        ])
      ).toBe('foo');
    });
  });

  describe('imported names', () => {
    it('hides a command imported under the module prefix', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam'), hide('spam', 'foo'), call('spam foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides every prefixed command with a bare module hide', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam'), hide('spam'), call('spam foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides prefixed commands named in a list', async () => {
      const error = await rejection(
        runNative([
          spamDef(),
          use('spam'),
          hide('spam', ['foo']),
          call('spam foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides a command imported by name', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam', 'foo'), hide('foo'), call('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides a command imported by glob', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam', '*'), hide('foo'), call('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides glob imports with a glob hide', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam', '*'), hide('spam', '*'), call('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('hides a variable imported under the module prefix', async () => {
      const error = await rejection(
        runNative([
          spamEnv(),
          use('spam'),
          hide('spam', 'foo'),
          env('spam foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides every prefixed variable with a bare module hide', async () => {
      const error = await rejection(
        runNative([spamEnv(), use('spam'), hide('spam'), env('spam foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides a variable imported by name', async () => {
      const error = await rejection(
        runNative([spamEnv(), use('spam', 'foo'), hide('foo'), env('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides glob-imported variables with a glob hide', async () => {
      const error = await rejection(
        runNative([spamEnv(), use('spam', '*'), hide('spam', '*'), env('foo')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides the imported command before the imported variable', async () => {
      expect(
        await runNative([spam(), use('spam', 'foo'), hide('foo'), env('foo')])
      ).toBe('foo');
    });

    it('hides the imported variable on the second hide', async () => {
      const error = await rejection(
        runNative([
          spam(),
          use('spam', 'foo'),
          hide('foo'),
          hide('foo'),
          env('foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('hides the imported command when both share a name', async () => {
      const error = await rejection(
        runNative([
          spam(),
          use('spam', 'foo'),
          hide('foo'),
          hide('foo'),
          call('foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('imports a command again after hiding it', async () => {
      expect(
        await runNative([
          spamDef(),
          use('spam', 'foo'),
          hide('foo'),
          use('spam', 'foo'),
          call('foo'),
        ])
      ).toBe('foo');
    });

    it('imports a variable again after hiding it', async () => {
      expect(
        await runNative([
          spamEnv(),
          use('spam', 'foo'),
          hide('foo'),
          use('spam', 'foo'),
          env('foo'),
        ])
      ).toBe('foo');
    });

    it('uncovers a shadowed command when the import is hidden', async () => {
      expect(
        await runNative([
          module('spam', def('foo', [], [str('bar')], true)),
          def('foo', [], [str('foo')]),
          doBlock(use('spam', 'foo'), hide('foo'), call('foo')),
        ])
      ).toBe('foo');
    });

    it('uncovers a shadowed variable when the import is hidden', async () => {
      expect(
        await runNative([
          module('spam', exportEnv('foo', [str('bar')])),
          letEnv('foo', 'foo'),
          doBlock(use('spam', 'foo'), hide('foo'), env('foo')),
        ])
      ).toBe('foo');
    });

    it('replaces a same-scope command when importing over it', async () => {
      const error = await rejection(
        runNative([
          module('spam', def('foo', [], [str('bar')], true)),
          def('foo', [], [str('foo')]),
          use('spam', 'foo'),
          hide('foo'),
          call('foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.UNKNOWN_COMMAND);
    });

    it('replaces a same-scope variable when importing over it', async () => {
      const error = await rejection(
        runNative([
          module('spam', exportEnv('foo', [str('bar')])),
          letEnv('foo', 'foo'),
          use('spam', 'foo'),
          hide('foo'),
          env('foo'),
        ])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND);
    });

    it('rejects hiding a member the module does not export', async () => {
      const error = await rejection(
        runNative([spamDef(), use('spam'), hide('spam', 'bar')])
      );
      expect(error.code).toBe(SHELL_ERROR_CODES.IMPORT_NOT_FOUND);
    });
  });
});
