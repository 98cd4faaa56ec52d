/**
 * Runtime Stack
 *
 * Variable values and environment frames for one evaluation. A block gets a
 * fresh stack holding copies of the values it captured, so nothing it binds
 * or hides leaks back to the caller.
 */

import { envVarNotFound, variableNotFound } from '../error-classes.js';
import { didYouMean } from '../runtime/core/suggest.js';
import type { Value } from '../runtime/core/values.js';
import type { EnvBindingId, Span, VarId } from '../types.js';

export interface EnvBinding {
  readonly id: EnvBindingId;
  readonly value: Value;
}

export interface EnvFrame {
  readonly bindings: Map<string, EnvBinding>;
  /** Bindings hidden at this level, by id */
  readonly hidden: Set<EnvBindingId>;
}

/** Shared so bindings created on any derived stack get distinct ids */
export interface EnvIdCounter {
  next: EnvBindingId;
}

function emptyFrame(): EnvFrame {
  return { bindings: new Map(), hidden: new Set() };
}

function copyFrame(frame: EnvFrame): EnvFrame {
  return { bindings: new Map(frame.bindings), hidden: new Set(frame.hidden) };
}

export class Stack {
  private readonly vars = new Map<VarId, Value>();
  private readonly envFrames: EnvFrame[];
  private readonly envIds: EnvIdCounter;

  constructor(
    envFrames: EnvFrame[] = [emptyFrame()],
    envIds: EnvIdCounter = { next: 0 }
  ) {
    this.envFrames = envFrames;
    this.envIds = envIds;
  }

  // ============================================================
  // VARIABLES
  // ============================================================

  /**
   * @throws ShellError VariableNotFound when the id has no value here
   */
  getVar(varId: VarId, span: Span): Value {
    const value = this.vars.get(varId);
    if (value === undefined) throw variableNotFound(span);
    return value;
  }

  addVar(varId: VarId, value: Value): void {
    this.vars.set(varId, value);
  }

  /** Values for the given ids; ids without a value are skipped */
  gatherCaptures(captures: readonly VarId[]): Map<VarId, Value> {
    const gathered = new Map<VarId, Value>();
    for (const id of captures) {
      const value = this.vars.get(id);
      if (value !== undefined) gathered.set(id, value);
    }
    return gathered;
  }

  /**
   * Stack for entering a block: captured values are copied in, the
   * environment is copied and a new environment frame is pushed.
   */
  withCaptures(captures: ReadonlyMap<VarId, Value>): Stack {
    const stack = new Stack(
      [...this.envFrames.map(copyFrame), emptyFrame()],
      this.envIds
    );
    for (const [id, value] of captures) stack.addVar(id, value);
    return stack;
  }

  captureStack(captures: readonly VarId[]): Stack {
    return this.withCaptures(this.gatherCaptures(captures));
  }

  // ============================================================
  // ENVIRONMENT
  // ============================================================

  private topFrame(): EnvFrame {
    const frame = this.envFrames[this.envFrames.length - 1];
    if (frame !== undefined) return frame;
    const created = emptyFrame();
    this.envFrames.push(created);
    return created;
  }

  /** Bind `key` in the innermost frame with a new binding id */
  addEnv(key: string, value: Value): void {
    const id = this.envIds.next++;
    this.topFrame().bindings.set(key, { id, value });
  }

  /**
   * Nearest visible binding for `key`. Hide markers accumulate from the
   * innermost frame outward, so a hide governs bindings further out.
   */
  private findEnv(key: string): EnvBinding | undefined {
    const hidden = new Set<EnvBindingId>();
    for (let i = this.envFrames.length - 1; i >= 0; i--) {
      const frame = this.envFrames[i];
      if (frame === undefined) continue;
      for (const id of frame.hidden) hidden.add(id);
      const binding = frame.bindings.get(key);
      if (binding !== undefined && !hidden.has(binding.id)) return binding;
    }
    return undefined;
  }

  /**
   * @throws ShellError EnvVarNotFound with the nearest visible key as a hint
   */
  getEnv(key: string, span: Span): Value {
    const binding = this.findEnv(key);
    if (binding === undefined) {
      throw envVarNotFound(key, span, didYouMean(this.envKeys(), key));
    }
    return binding.value;
  }

  hasEnv(key: string): boolean {
    return this.findEnv(key) !== undefined;
  }

  /**
   * Hide the visible binding for `key` in the innermost frame.
   * Returns false when no binding was visible.
   */
  hideEnv(key: string): boolean {
    const binding = this.findEnv(key);
    if (binding === undefined) return false;
    this.topFrame().hidden.add(binding.id);
    return true;
  }

  /** Visible environment keys */
  envKeys(): string[] {
    const keys = new Set<string>();
    for (const frame of this.envFrames) {
      for (const key of frame.bindings.keys()) keys.add(key);
    }
    return [...keys].filter((key) => this.hasEnv(key));
  }
}
