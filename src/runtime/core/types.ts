/**
 * Runtime Types
 *
 * Public types for engine configuration and evaluation.
 * These types are the primary interface for host applications.
 */

import type { ShellConfig } from '../../config.js';
import type { EngineState } from '../../engine/engine-state.js';
import type { Span } from '../../types.js';
import type { Value } from './values.js';

/** I/O callbacks for runtime operations */
export interface ShellCallbacks {
  /** Called when `print` is invoked */
  onLog: (value: Value) => void;
}

/** Observability callbacks for monitoring evaluation */
export interface ObservabilityCallbacks {
  /** Called before a command runs */
  onCallStart?: (event: CallStartEvent) => void;
  /** Called after a command produces its output */
  onCallEnd?: (event: CallEndEvent) => void;
  /** Called when a command fails */
  onError?: (event: ErrorEvent) => void;
  /** Called when evaluation observes an aborted signal */
  onInterrupt?: (event: InterruptEvent) => void;
  /** Called after a working-set delta is merged into the engine */
  onMerge?: (event: MergeEvent) => void;
}

/** Event emitted before a command runs */
export interface CallStartEvent {
  /** Command name */
  name: string;
  /** Span of the command name */
  span: Span;
}

/** Event emitted after a command returns */
export interface CallEndEvent {
  name: string;
  span: Span;
  /** Time spent producing the output (streams may still be pending) */
  durationMs: number;
}

export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Command that raised it, if known */
  name?: string | undefined;
}

export interface InterruptEvent {
  /** Span of the block being evaluated when the abort was seen */
  span: Span;
}

export interface MergeEvent {
  decls: number;
  blocks: number;
  vars: number;
  modules: number;
}

/** Engine-wide state threaded through every evaluation call */
export interface EvalContext {
  readonly engine: EngineState;
  readonly config: ShellConfig;
  readonly callbacks: ShellCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** AbortSignal for cancellation (undefined = no cancellation) */
  readonly signal: AbortSignal | undefined;
  /** Current custom-command nesting depth */
  readonly depth: number;
}

/** Options for creating a session */
export interface SessionOptions {
  /** Settings; defaults fill anything omitted */
  config?: Partial<ShellConfig> | undefined;
  /** I/O callbacks */
  callbacks?: Partial<ShellCallbacks> | undefined;
  /** Observability callbacks for monitoring evaluation */
  observability?: ObservabilityCallbacks | undefined;
  /** AbortSignal for cancellation support */
  signal?: AbortSignal | undefined;
  /** Initial environment bindings */
  env?: Record<string, string> | undefined;
}
