/**
 * Conversion Commands
 */

import { cantConvert } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import { cellPathArgs } from '../core/call-args.js';
import { int, typeName, type Value } from '../core/values.js';
import { builtin, operateOnPaths } from './shared.js';

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Convert one value to an int. Floats truncate toward zero and bools become
 * 0 or 1; strings must hold a whole decimal number.
 */
export function toInt(value: Value): Value {
  switch (value.type) {
    case 'int':
      return value;
    case 'float':
      return int(Math.trunc(value.val), value.span);
    case 'bool':
      return int(value.val ? 1 : 0, value.span);
    case 'string': {
      const text = value.val.trim();
      if (!INTEGER_TEXT.test(text)) {
        throw cantConvert('int', 'string', value.span);
      }
      return int(Number.parseInt(text, 10), value.span);
    }
    case 'error':
      throw value.error;
    default:
      throw cantConvert('int', typeName(value), value.span);
  }
}

export const CONVERSION_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'into int',
    usage: 'Convert values to integers.',
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
      return operateOnPaths(ctx, input, cellPathArgs(call, 0), toInt);
    },
  }),
];
