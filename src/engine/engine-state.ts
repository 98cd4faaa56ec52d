/**
 * Engine State
 *
 * Committed declarations, blocks, variables and modules. New definitions
 * accumulate in a working-set delta and become visible together when the
 * delta is merged.
 */

import { engineFailed } from '../error-classes.js';
import type { Block, BlockId, DeclId, ModuleId, Span, VarId } from '../types.js';
import type { Decl } from './command.js';
import type { Module } from './module.js';
import { ScopeFrame } from './scope.js';

/** Resolve-time information about a variable */
export interface VariableInfo {
  readonly name: string;
  readonly span: Span;
}

/** Pending additions produced by one resolve pass */
export interface StateDelta {
  readonly decls: Decl[];
  readonly blocks: Block[];
  readonly vars: VariableInfo[];
  readonly modules: Module[];
  /** Delta scope; exactly one frame remains once resolution finishes */
  readonly scope: ScopeFrame[];
}

export class EngineState {
  private readonly decls: Decl[] = [];
  private readonly blocks: Block[] = [];
  private readonly vars: VariableInfo[] = [];
  private readonly modules: Module[] = [];
  /** Permanent scope: the session's root frame */
  readonly scope: ScopeFrame[] = [new ScopeFrame()];

  get numDecls(): number {
    return this.decls.length;
  }

  get numBlocks(): number {
    return this.blocks.length;
  }

  get numVars(): number {
    return this.vars.length;
  }

  get numModules(): number {
    return this.modules.length;
  }

  getDecl(id: DeclId): Decl {
    const decl = this.decls[id];
    if (decl === undefined) throw engineFailed(`unknown declaration id ${id}`);
    return decl;
  }

  getBlock(id: BlockId): Block {
    const block = this.blocks[id];
    if (block === undefined) throw engineFailed(`unknown block id ${id}`);
    return block;
  }

  getVariable(id: VarId): VariableInfo {
    const info = this.vars[id];
    if (info === undefined) throw engineFailed(`unknown variable id ${id}`);
    return info;
  }

  getModule(id: ModuleId): Module {
    const module = this.modules[id];
    if (module === undefined) throw engineFailed(`unknown module id ${id}`);
    return module;
  }

  /**
   * Apply every pending addition at once.
   * Ids in the delta were allocated past the committed tables, so appending
   * keeps them valid.
   */
  mergeDelta(delta: StateDelta): void {
    const [frame, ...extra] = delta.scope;
    if (frame === undefined || extra.length > 0) {
      throw engineFailed(
        `delta has ${delta.scope.length} scope frames; expected 1`
      );
    }

    const root = this.scope[0];
    if (root === undefined) throw engineFailed('engine has no root scope');

    this.decls.push(...delta.decls);
    this.blocks.push(...delta.blocks);
    this.vars.push(...delta.vars);
    this.modules.push(...delta.modules);

    for (const [name, id] of frame.decls) root.decls.set(name, id);
    for (const [name, id] of frame.vars) root.vars.set(name, id);
    for (const [name, id] of frame.modules) root.modules.set(name, id);
    root.visibility.mergeWith(frame.visibility);
  }
}
