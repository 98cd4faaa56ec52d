/**
 * Platform Commands
 *
 * Terminal text handling and output through the host's log callback.
 */

import type { BuiltinCommand } from '../../engine/command.js';
import { cellPathArgs, restArgs } from '../core/call-args.js';
import { PipelineData } from '../core/pipeline.js';
import { builtin, operateOnPaths } from './shared.js';
import { stringAction } from './strings.js';

// CSI sequences (colors, cursor movement) and OSC sequences (hyperlinks, titles)
// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export const PLATFORM_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'ansi strip',
    usage: 'Remove ANSI escape sequences from text.',
    signature: {
      params: [
        {
          name: 'rest',
          type: 'cell-path',
          description: 'cell paths to strip',
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
        stringAction('ansi strip', stripAnsi)
      );
    },
  }),

  builtin({
    name: 'print',
    usage: 'Send values to the host log; with no arguments, the input.',
    signature: {
      params: [
        { name: 'rest', type: 'any', description: 'values to print', rest: true },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const values = await restArgs(ctx, stack, call, 0);
      if (values.length === 0 && input.kind !== 'empty') {
        values.push(await input.intoValue(call.head));
      }
      for (const value of values) ctx.callbacks.onLog(value);
      return PipelineData.empty();
    },
  }),
];
