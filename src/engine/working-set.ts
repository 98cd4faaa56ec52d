/**
 * State Working Set
 *
 * Resolve-time view over the committed engine state plus a pending delta.
 * Lookups see the delta first, then the committed state; all additions go
 * into the delta.
 */

import { createError, engineFailed, type ShellError } from '../error-classes.js';
import { SHELL_ERROR_CODES } from '../error-registry.js';
import type {
  Block,
  BlockId,
  DeclId,
  ImportPattern,
  ImportPatternMember,
  ModuleId,
  Span,
  VarId,
} from '../types.js';
import type { CommandSignature, Decl } from './command.js';
import type { EngineState, StateDelta, VariableInfo } from './engine-state.js';
import type { Module } from './module.js';
import { lookupDecl, ScopeFrame, visibleDeclNames } from './scope.js';

interface FrameRecord {
  readonly frame: ScopeFrame;
  /** Duplicate declarations seen in this frame, raised when it closes */
  readonly duplicates: ShellError[];
}

/** Names a `use` brought into scope */
export interface ImportResult {
  readonly decls: readonly [string, DeclId][];
  readonly envVars: readonly [string, BlockId][];
}

export class StateWorkingSet {
  private readonly decls: Decl[] = [];
  private readonly blocks: Block[] = [];
  private readonly vars: VariableInfo[] = [];
  private readonly modules: Module[] = [];
  private readonly frames: FrameRecord[] = [
    { frame: new ScopeFrame(), duplicates: [] },
  ];

  constructor(readonly permanent: EngineState) {}

  // ============================================================
  // SCOPES
  // ============================================================

  enterScope(): void {
    this.frames.push({ frame: new ScopeFrame(), duplicates: [] });
  }

  /**
   * Close the innermost scope, discarding its names and hide markers.
   *
   * @throws ShellError DuplicateDeclaration recorded in the closed frame
   */
  exitScope(): void {
    if (this.frames.length <= 1) {
      throw engineFailed('cannot exit the root scope of a working set');
    }
    const record = this.frames.pop();
    const [duplicate] = record?.duplicates ?? [];
    if (duplicate) throw duplicate;
  }

  /**
   * Check the root frame once resolution of a program finishes.
   *
   * @throws ShellError DuplicateDeclaration recorded at top level
   */
  finalize(): void {
    if (this.frames.length !== 1) {
      throw engineFailed(`${this.frames.length - 1} scopes left open`);
    }
    const [duplicate] = this.current().duplicates;
    if (duplicate) throw duplicate;
  }

  private current(): FrameRecord {
    const record = this.frames[this.frames.length - 1];
    if (record === undefined) throw engineFailed('working set has no scope');
    return record;
  }

  /** Every frame a lookup walks, outermost first */
  private allFrames(): ScopeFrame[] {
    return [
      ...this.permanent.scope,
      ...this.frames.map((record) => record.frame),
    ];
  }

  // ============================================================
  // DECLARATIONS
  // ============================================================

  get nextDeclId(): DeclId {
    return this.permanent.numDecls + this.decls.length;
  }

  /** Add a builtin or imported declaration under `name` */
  addDecl(decl: Decl): DeclId {
    const id = this.nextDeclId;
    this.decls.push(decl);
    const { frame } = this.current();
    frame.decls.set(decl.name, id);
    frame.visibility.useDecl(id);
    return id;
  }

  /**
   * Declare a custom command before its body is resolved, so the body may
   * call itself. Redeclaring a name that is still visible in this frame is
   * recorded as a duplicate; redeclaring after a hide creates a new binding.
   */
  declareCustom(
    name: string,
    signature: CommandSignature,
    usage: string,
    span: Span
  ): DeclId {
    const { frame, duplicates } = this.current();
    const existing = frame.decls.get(name);
    if (
      existing !== undefined &&
      frame.defined.has(name) &&
      frame.visibility.isDeclVisible(existing)
    ) {
      duplicates.push(
        createError(SHELL_ERROR_CODES.DUPLICATE_DECLARATION, { name }, [span])
      );
    }
    frame.defined.add(name);
    return this.addDecl({
      kind: 'custom',
      name,
      usage,
      signature,
      blockId: null,
    });
  }

  /** Attach the resolved body to a custom command declared in this delta */
  setDeclBlock(declId: DeclId, blockId: BlockId): void {
    const index = declId - this.permanent.numDecls;
    const decl = this.decls[index];
    if (decl === undefined || decl.kind !== 'custom') {
      throw engineFailed(`declaration ${declId} is not a pending custom command`);
    }
    this.decls[index] = { ...decl, blockId };
  }

  findDecl(name: string): DeclId | undefined {
    return lookupDecl(this.allFrames(), name);
  }

  getDecl(id: DeclId): Decl {
    const index = id - this.permanent.numDecls;
    if (index < 0) return this.permanent.getDecl(id);
    const decl = this.decls[index];
    if (decl === undefined) throw engineFailed(`unknown declaration id ${id}`);
    return decl;
  }

  /** Visible command names, for suggestions */
  declNames(): string[] {
    return visibleDeclNames(this.allFrames());
  }

  /**
   * Hide the visible declaration called `name` in the current frame.
   * Returns the hidden id, or undefined when nothing was visible.
   */
  hideDecl(name: string): DeclId | undefined {
    const id = this.findDecl(name);
    if (id !== undefined) {
      this.current().frame.visibility.hideDecl(id);
    }
    return id;
  }

  /** Bring declarations into the current frame and mark them visible */
  useDecls(entries: readonly (readonly [string, DeclId])[]): void {
    const { frame } = this.current();
    for (const [name, id] of entries) {
      frame.decls.set(name, id);
      frame.visibility.useDecl(id);
    }
  }

  // ============================================================
  // VARIABLES
  // ============================================================

  addVariable(name: string, span: Span): VarId {
    const id = this.permanent.numVars + this.vars.length;
    this.vars.push({ name, span });
    this.current().frame.vars.set(name, id);
    return id;
  }

  findVariable(name: string): VarId | undefined {
    const frames = this.allFrames();
    for (let i = frames.length - 1; i >= 0; i--) {
      const id = frames[i]?.vars.get(name);
      if (id !== undefined) return id;
    }
    return undefined;
  }

  /** Variable names in scope, for suggestions */
  variableNames(): string[] {
    const names = new Set<string>();
    for (const frame of this.allFrames()) {
      for (const name of frame.vars.keys()) names.add(name);
    }
    return [...names];
  }

  // ============================================================
  // BLOCKS
  // ============================================================

  addBlock(block: Block): BlockId {
    const id = this.permanent.numBlocks + this.blocks.length;
    this.blocks.push(block);
    return id;
  }

  getBlock(id: BlockId): Block {
    const index = id - this.permanent.numBlocks;
    if (index < 0) return this.permanent.getBlock(id);
    const block = this.blocks[index];
    if (block === undefined) throw engineFailed(`unknown block id ${id}`);
    return block;
  }

  // ============================================================
  // MODULES
  // ============================================================

  addModule(name: string, module: Module): ModuleId {
    const id = this.permanent.numModules + this.modules.length;
    this.modules.push(module);
    this.current().frame.modules.set(name, id);
    return id;
  }

  findModule(name: string): ModuleId | undefined {
    const frames = this.allFrames();
    for (let i = frames.length - 1; i >= 0; i--) {
      const id = frames[i]?.modules.get(name);
      if (id !== undefined) return id;
    }
    return undefined;
  }

  getModule(id: ModuleId): Module {
    const index = id - this.permanent.numModules;
    if (index < 0) return this.permanent.getModule(id);
    const module = this.modules[index];
    if (module === undefined) throw engineFailed(`unknown module id ${id}`);
    return module;
  }

  // ============================================================
  // IMPORT AND HIDE
  // ============================================================

  /**
   * Resolve a `use` pattern and bring the named commands into scope.
   * Environment exports are returned for the runtime to evaluate.
   *
   * @throws ShellError ModuleNotFound or ImportSymbolMissing
   */
  usePattern(pattern: ImportPattern): {
    pattern: ImportPattern;
    imported: ImportResult;
  } {
    const moduleId = this.findModule(pattern.head.name);
    if (moduleId === undefined) {
      throw createError(
        SHELL_ERROR_CODES.MODULE_NOT_FOUND,
        { name: pattern.head.name },
        [pattern.head.span]
      );
    }
    const module = this.getModule(moduleId);
    const imported = selectExports(module, pattern.head.name, pattern.members);
    this.useDecls(imported.decls);
    return { pattern: { ...pattern, moduleId }, imported };
  }

  /**
   * Resolve a `hide` pattern, hiding the commands it names.
   *
   * Hidden names are recorded on the returned pattern so the runtime only
   * looks for environment bindings under the remaining names.
   *
   * @throws ShellError ModuleNotFound, ImportSymbolMissing, or NotFound
   *   when an explicitly named member has nothing visible to hide
   */
  hidePattern(pattern: ImportPattern): ImportPattern {
    const head = pattern.head;
    const moduleId = this.findModule(head.name);

    if (moduleId === undefined) {
      if (pattern.members.length > 0) {
        throw createError(
          SHELL_ERROR_CODES.MODULE_NOT_FOUND,
          { name: head.name },
          [head.span]
        );
      }
      // A plain name: hide the visible command now; an env binding of the
      // same name is left for the runtime
      const hidden = new Set<string>();
      if (this.hideDecl(head.name) !== undefined) hidden.add(head.name);
      return { ...pattern, moduleId: null, hidden };
    }

    const module = this.getModule(moduleId);
    const targets = selectHideTargets(module, head.name, pattern.members);
    const envNames = new Set(targets.envVars);
    const hidden = new Set<string>();

    for (const name of targets.decls) {
      if (this.hideDecl(name) !== undefined) {
        hidden.add(name);
      } else if (targets.explicit && !envNames.has(name)) {
        throw createError(SHELL_ERROR_CODES.NOT_FOUND, { name }, [head.span]);
      }
    }

    return { ...pattern, moduleId, hidden };
  }

  // ============================================================
  // DELTA
  // ============================================================

  /** Snapshot the pending additions for merging */
  render(): StateDelta {
    return {
      decls: [...this.decls],
      blocks: [...this.blocks],
      vars: [...this.vars],
      modules: [...this.modules],
      scope: this.frames.map((record) => record.frame),
    };
  }
}

// ============================================================
// EXPORT SELECTION
// ============================================================

/**
 * Exports a `use` pattern selects, under the names they are bound to.
 *
 * With no members every export is bound as `head name`. A glob binds every
 * export under its own name, and a name or list binds exactly those.
 *
 * @throws ShellError ImportSymbolMissing for a member the module lacks
 */
export function selectExports(
  module: Module,
  head: string,
  members: readonly ImportPatternMember[]
): ImportResult {
  const [first] = members;
  if (first === undefined) {
    return {
      decls: module.declEntriesWithHead(head),
      envVars: module.envEntriesWithHead(head),
    };
  }

  switch (first.type) {
    case 'glob':
      return { decls: module.declEntries(), envVars: module.envEntries() };
    case 'name':
      return selectNames(module, [{ name: first.name, span: first.span }]);
    case 'list':
      return selectNames(module, first.names);
  }
}

function selectNames(
  module: Module,
  names: readonly { name: string; span: Span }[]
): ImportResult {
  const decls: [string, DeclId][] = [];
  const envVars: [string, BlockId][] = [];

  for (const { name, span } of names) {
    if (!module.exports(name)) {
      throw createError(SHELL_ERROR_CODES.IMPORT_NOT_FOUND, { name }, [span]);
    }
    const declId = module.getDecl(name);
    if (declId !== undefined) decls.push([name, declId]);
    const blockId = module.getEnvVar(name);
    if (blockId !== undefined) envVars.push([name, blockId]);
  }

  return { decls, envVars };
}

/** Names a `hide` pattern on a module targets */
export interface HideTargets {
  readonly decls: readonly string[];
  readonly envVars: readonly string[];
  /** True when the pattern named its members rather than all of them */
  readonly explicit: boolean;
}

/**
 * Names a `hide` pattern on a module covers.
 *
 * With no members every `head name` binding is targeted; a glob targets the
 * bare export names. A name or list targets `head name` for each member.
 *
 * @throws ShellError ImportSymbolMissing for a member the module lacks
 */
export function selectHideTargets(
  module: Module,
  head: string,
  members: readonly ImportPatternMember[]
): HideTargets {
  const [first] = members;
  if (first === undefined) {
    return {
      decls: module.declEntriesWithHead(head).map(([name]) => name),
      envVars: module.envEntriesWithHead(head).map(([name]) => name),
      explicit: false,
    };
  }
  if (first.type === 'glob') {
    return {
      decls: module.declEntries().map(([name]) => name),
      envVars: module.envEntries().map(([name]) => name),
      explicit: false,
    };
  }

  const names =
    first.type === 'name' ? [{ name: first.name, span: first.span }] : first.names;
  const decls: string[] = [];
  const envVars: string[] = [];
  for (const { name, span } of names) {
    if (!module.exports(name)) {
      throw createError(SHELL_ERROR_CODES.IMPORT_NOT_FOUND, { name }, [span]);
    }
    if (module.hasDecl(name)) decls.push(`${head} ${name}`);
    if (module.hasEnvVar(name)) envVars.push(`${head} ${name}`);
  }
  return { decls, envVars, explicit: true };
}
