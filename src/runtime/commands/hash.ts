/**
 * Hash Commands
 */

import crypto from 'node:crypto';
import { unsupportedInput } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import { cellPathArgs } from '../core/call-args.js';
import { string, typeName, type Value } from '../core/values.js';
import { builtin, operateOnPaths } from './shared.js';

/** Hex digest of a string (hashed as UTF-8) or binary value */
export function digest(algorithm: string, value: Value): Value {
  if (value.type === 'error') throw value.error;
  if (value.type !== 'string' && value.type !== 'binary') {
    throw unsupportedInput(
      `hash ${algorithm} only works with strings and binary, found ${typeName(value)}`,
      value.span
    );
  }
  const hash = crypto.createHash(algorithm);
  hash.update(value.val);
  return string(hash.digest('hex'), value.span);
}

function hashCommand(algorithm: string): BuiltinCommand {
  return builtin({
    name: `hash ${algorithm}`,
    usage: `Hash a value using the ${algorithm} algorithm.`,
    signature: {
      params: [
        {
          name: 'rest',
          type: 'cell-path',
          description: `optionally ${algorithm} hash data by cell path`,
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, _stack, call, input) {
      return operateOnPaths(ctx, input, cellPathArgs(call, 0), (value) =>
        digest(algorithm, value)
      );
    },
  });
}

export const HASH_COMMANDS: readonly BuiltinCommand[] = [hashCommand('md5')];
