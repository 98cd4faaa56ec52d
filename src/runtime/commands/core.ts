/**
 * Core Commands
 *
 * Declarations, imports and control flow. `def`, `export def`,
 * `export env` and `module` do all their work during name resolution and
 * are no-ops when evaluated.
 */

import {
  createError,
  engineFailed,
  type ShellError,
} from '../../error-classes.js';
import { SHELL_ERROR_CODES } from '../../error-registry.js';
import type { BuiltinCommand } from '../../engine/command.js';
import type { Module } from '../../engine/module.js';
import type { Stack } from '../../engine/stack.js';
import { selectExports, selectHideTargets } from '../../engine/working-set.js';
import type { ImportPattern } from '../../types.js';
import {
  req,
  reqBlock,
  reqImportPattern,
  reqString,
  reqVarDecl,
  restArgs,
} from '../core/call-args.js';
import { evalBlock, expectBool, runClosure } from '../core/eval.js';
import { PipelineData } from '../core/pipeline.js';
import type { EvalContext } from '../core/types.js';
import { builtin } from './shared.js';

async function declarationNoop(): Promise<PipelineData> {
  return PipelineData.empty();
}

function notFound(pattern: ImportPattern, name: string): ShellError {
  return createError(SHELL_ERROR_CODES.NOT_FOUND, { name }, [
    pattern.head.span,
  ]);
}

function patternModule(ctx: EvalContext, pattern: ImportPattern): Module {
  if (pattern.moduleId === null) {
    throw engineFailed(`import pattern '${pattern.head.name}' was not resolved`);
  }
  return ctx.engine.getModule(pattern.moduleId);
}

/** Evaluate the environment exports a `use` selected and bind them */
async function importEnv(
  ctx: EvalContext,
  stack: Stack,
  pattern: ImportPattern
): Promise<void> {
  const module = patternModule(ctx, pattern);
  const { envVars } = selectExports(module, pattern.head.name, pattern.members);
  for (const [name, blockId] of envVars) {
    const block = ctx.engine.getBlock(blockId);
    const output = await evalBlock(
      ctx,
      stack.captureStack(block.captures),
      block,
      PipelineData.empty()
    );
    stack.addEnv(name, await output.intoValue(block.span));
  }
}

/**
 * Hide environment bindings the resolver left for run time.
 * Names already hidden as commands are skipped.
 */
function hideEnv(ctx: EvalContext, stack: Stack, pattern: ImportPattern): void {
  if (pattern.moduleId === null) {
    const name = pattern.head.name;
    if (!pattern.hidden.has(name) && !stack.hideEnv(name)) {
      throw notFound(pattern, name);
    }
    return;
  }

  const module = patternModule(ctx, pattern);
  const targets = selectHideTargets(module, pattern.head.name, pattern.members);
  for (const name of targets.envVars) {
    const hidden = stack.hideEnv(name);
    if (!hidden && targets.explicit && !pattern.hidden.has(name)) {
      throw notFound(pattern, name);
    }
  }
}

export const CORE_COMMANDS: readonly BuiltinCommand[] = [
  builtin({
    name: 'let',
    usage: 'Create a variable and give it a value.',
    signature: {
      params: [
        { name: 'var_name', type: 'any', description: 'variable name' },
        { name: 'value', type: 'any', description: 'the value to bind' },
      ],
      flags: [],
    },
    async run(ctx, stack, call) {
      const varId = reqVarDecl(call, 0);
      stack.addVar(varId, await req(ctx, stack, call, 1));
      return PipelineData.empty();
    },
  }),

  builtin({
    name: 'let-env',
    usage: 'Create an environment variable and give it a value.',
    signature: {
      params: [
        { name: 'key', type: 'string', description: 'environment key' },
        { name: 'value', type: 'any', description: 'the value to bind' },
      ],
      flags: [],
    },
    async run(ctx, stack, call) {
      const key = await reqString(ctx, stack, call, 0);
      stack.addEnv(key, await req(ctx, stack, call, 1));
      return PipelineData.empty();
    },
  }),

  builtin({
    name: 'def',
    usage: 'Define a custom command.',
    signature: {
      params: [
        { name: 'def_name', type: 'string', description: 'command name' },
        { name: 'block', type: 'block', description: 'body of the command' },
      ],
      flags: [],
    },
    run: declarationNoop,
  }),

  builtin({
    name: 'export def',
    usage: 'Define a custom command and export it from a module.',
    signature: {
      params: [
        { name: 'def_name', type: 'string', description: 'command name' },
        { name: 'block', type: 'block', description: 'body of the command' },
      ],
      flags: [],
    },
    run: declarationNoop,
  }),

  builtin({
    name: 'export env',
    usage: 'Export an environment variable from a module.',
    signature: {
      params: [
        { name: 'name', type: 'string', description: 'environment key' },
        { name: 'block', type: 'block', description: 'block computing the value' },
      ],
      flags: [],
    },
    run: declarationNoop,
  }),

  builtin({
    name: 'module',
    usage: 'Define a module of commands and environment variables.',
    signature: {
      params: [
        { name: 'module_name', type: 'string', description: 'module name' },
        { name: 'block', type: 'block', description: 'body of the module' },
      ],
      flags: [],
    },
    run: declarationNoop,
  }),

  builtin({
    name: 'use',
    usage: 'Use definitions from a module.',
    signature: {
      params: [
        { name: 'pattern', type: 'any', description: 'import pattern' },
      ],
      flags: [],
    },
    async run(ctx, stack, call) {
      await importEnv(ctx, stack, reqImportPattern(call, 0));
      return PipelineData.empty();
    },
  }),

  builtin({
    name: 'hide',
    usage: 'Hide commands or environment variables in the current scope.',
    signature: {
      params: [
        { name: 'pattern', type: 'any', description: 'import pattern' },
      ],
      flags: [],
    },
    async run(ctx, stack, call) {
      hideEnv(ctx, stack, reqImportPattern(call, 0));
      return PipelineData.empty();
    },
  }),

  builtin({
    name: 'do',
    usage: 'Run a block.',
    signature: {
      params: [
        { name: 'block', type: 'block', description: 'the block to run' },
        {
          name: 'rest',
          type: 'any',
          description: 'arguments for the block',
          rest: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const closure = await reqBlock(ctx, stack, call, 0);
      const args = await restArgs(ctx, stack, call, 1);
      return runClosure(ctx, stack, closure, args, input);
    },
  }),

  builtin({
    name: 'if',
    usage: 'Run a block when a condition holds, otherwise the else block.',
    signature: {
      params: [
        { name: 'cond', type: 'bool', description: 'condition' },
        { name: 'then_block', type: 'block', description: 'run when true' },
        {
          name: 'else_block',
          type: 'block',
          description: 'run when false',
          optional: true,
        },
      ],
      flags: [],
    },
    async run(ctx, stack, call, input) {
      const cond = await req(ctx, stack, call, 0);
      if (expectBool(cond, call.positional[0]?.span ?? call.head)) {
        const then = await reqBlock(ctx, stack, call, 1);
        return runClosure(ctx, stack, then, [], input);
      }
      if (call.positional[2] === undefined) return PipelineData.empty();
      const otherwise = await reqBlock(ctx, stack, call, 2);
      return runClosure(ctx, stack, otherwise, [], input);
    },
  }),
];
