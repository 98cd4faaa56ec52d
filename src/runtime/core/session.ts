/**
 * Session
 *
 * Owns one engine state and one top-level stack. Each program is resolved
 * against a fresh working set, merged into the engine, and then evaluated,
 * so names defined by one run are visible to the next.
 */

import {
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  type ShellConfig,
} from '../../config.js';
import type { EngineState } from '../../engine/engine-state.js';
import { Stack } from '../../engine/stack.js';
import { StateWorkingSet } from '../../engine/working-set.js';
import { Resolver } from '../../resolver/resolve.js';
import type { Program } from '../../resolver/syntax.js';
import type { BlockId } from '../../types.js';
import { createEngineState } from '../commands/index.js';
import { evalBlock } from './eval.js';
import { PipelineData } from './pipeline.js';
import type {
  EvalContext,
  ObservabilityCallbacks,
  SessionOptions,
  ShellCallbacks,
} from './types.js';
import { intoString, string, type Value } from './values.js';

function defaultCallbacks(config: ShellConfig): ShellCallbacks {
  return {
    onLog: (value) => {
      console.log(intoString(value, config.listSeparator, config));
    },
  };
}

export class Session {
  readonly engine: EngineState;
  readonly config: ShellConfig;
  readonly stack: Stack;
  private readonly callbacks: ShellCallbacks;
  private readonly observability: ObservabilityCallbacks;
  private readonly signal: AbortSignal | undefined;

  /**
   * @throws ShellError UnsupportedConfigValue for an invalid `config` option
   */
  constructor(options: SessionOptions = {}) {
    this.engine = createEngineState();
    this.config = resolveConfig({ ...DEFAULT_CONFIG, ...options.config });
    this.callbacks = {
      ...defaultCallbacks(this.config),
      ...options.callbacks,
    };
    this.observability = options.observability ?? {};
    this.signal = options.signal;

    this.stack = new Stack();
    for (const [key, value] of Object.entries(options.env ?? {})) {
      this.stack.addEnv(key, string(value));
    }
  }

  /**
   * Session configured from shoal.yaml in `cwd`. Settings passed in
   * `options.config` override the file.
   */
  static fromDirectory(cwd: string, options: SessionOptions = {}): Session {
    return new Session({
      ...options,
      config: { ...loadConfig(cwd), ...options.config },
    });
  }

  /** Context for evaluating at the top level of this session */
  context(): EvalContext {
    return {
      engine: this.engine,
      config: this.config,
      callbacks: this.callbacks,
      observability: this.observability,
      signal: this.signal,
      depth: 0,
    };
  }

  /**
   * Resolve a program and merge its declarations into the engine.
   * A resolve failure leaves the engine untouched.
   *
   * @throws ShellError for any resolve-time failure
   */
  parse(program: Program): BlockId {
    const workingSet = new StateWorkingSet(this.engine);
    const blockId = new Resolver(workingSet).resolveProgram(program);
    const delta = workingSet.render();
    this.engine.mergeDelta(delta);
    this.observability.onMerge?.({
      decls: delta.decls.length,
      blocks: delta.blocks.length,
      vars: delta.vars.length,
      modules: delta.modules.length,
    });
    return blockId;
  }

  /** Evaluate a merged block on the session stack */
  evalBlock(
    blockId: BlockId,
    input: PipelineData = PipelineData.empty()
  ): Promise<PipelineData> {
    return evalBlock(
      this.context(),
      this.stack,
      this.engine.getBlock(blockId),
      input
    );
  }

  /** Resolve, merge and evaluate a program, collecting its output */
  async run(
    program: Program,
    input: PipelineData = PipelineData.empty()
  ): Promise<Value> {
    const blockId = this.parse(program);
    const output = await this.evalBlock(blockId, input);
    return output.intoValue(program.span);
  }
}
