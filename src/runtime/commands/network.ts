/**
 * Network Commands
 *
 * `url <part>` reads one component of URL strings, per row or per cell path.
 */

import { unsupportedInput } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import { cellPathArgs } from '../core/call-args.js';
import { string, typeName, type Value } from '../core/values.js';
import { builtin, operateOnPaths } from './shared.js';

function urlCommand(
  part: string,
  usage: string,
  extract: (url: URL) => string
): BuiltinCommand {
  return builtin({
    name: `url ${part}`,
    usage,
    signature: {
      params: [
        {
          name: 'rest',
          type: 'cell-path',
          description: 'optionally operate by cell path',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, _stack, call, input) {
      return operateOnPaths(ctx, input, cellPathArgs(call, 0), (value: Value) => {
        if (value.type === 'error') throw value.error;
        if (value.type !== 'string') {
          throw unsupportedInput(
            `url ${part} only works with strings, found ${typeName(value)}`,
            call.head
          );
        }
        let url: URL;
        try {
          url = new URL(value.val);
        } catch {
          throw unsupportedInput('Incomplete or incorrect url', value.span);
        }
        return string(extract(url), value.span);
      });
    },
  });
}

export const NETWORK_COMMANDS: readonly BuiltinCommand[] = [
  urlCommand('host', 'Get the host of a url.', (url) => url.hostname),
  // URL.search keeps its leading '?'
  urlCommand('query', 'Get the query of a url.', (url) => url.search.slice(1)),
];
