/**
 * Format Commands
 *
 * `from <format>` concatenates the input into one string and decodes it.
 * Binary input is read as UTF-8.
 */

import { decodeFailed } from '../../error-classes.js';
import type { BuiltinCommand } from '../../engine/command.js';
import type { Span } from '../../types.js';
import {
  fromIni,
  fromJson,
  fromToml,
  fromUrl,
  fromYaml,
  type Codec,
} from '../codecs/index.js';
import { PipelineData } from '../core/pipeline.js';
import type { EvalContext } from '../core/types.js';
import { builtin } from './shared.js';

const UTF8 = new TextDecoder('utf-8', { fatal: true });

async function inputText(
  ctx: EvalContext,
  input: PipelineData,
  format: string,
  span: Span
): Promise<string> {
  const value = await input.intoValue(span);
  if (value.type !== 'binary') {
    return PipelineData.value(value).collectString('', ctx.config);
  }
  try {
    return UTF8.decode(value.val);
  } catch (error) {
    throw decodeFailed(format, error, span);
  }
}

function fromCommand(format: string, codec: Codec): BuiltinCommand {
  return builtin({
    name: `from ${format}`,
    usage: `Parse text as ${format} and create structured data.`,
    signature: { params: [], flags: [] },
    async run(ctx, _stack, call, input) {
      const text = await inputText(ctx, input, format, call.head);
      return PipelineData.value(codec(text, call.head));
    },
  });
}

export const FORMAT_COMMANDS: readonly BuiltinCommand[] = [
  fromCommand('url', fromUrl),
  fromCommand('ini', fromIni),
  fromCommand('toml', fromToml),
  fromCommand('yaml', fromYaml),
  fromCommand('json', fromJson),
];
