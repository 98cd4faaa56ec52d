/**
 * Shoal Module
 * Exports the engine, resolver, runtime and value model
 */

// ============================================================
// SPANS, IDS AND RESOLVED TREE
// ============================================================

export {
  cellPathToString,
  createSpan,
  EMPTY_SIGNATURE,
  importPatternSpan,
  spanUnion,
  UNKNOWN_SPAN,
} from './types.js';
export type {
  Block,
  BlockId,
  BlockParam,
  BlockSignature,
  CallExpr,
  CellPath,
  DeclId,
  EnvBindingId,
  Expression,
  ImportPattern,
  ImportPatternMember,
  ModuleId,
  Operator,
  PathMember,
  Pipeline,
  RangeInclusion,
  Span,
  VarId,
} from './types.js';

// ============================================================
// ERRORS
// ============================================================

export {
  ERROR_REGISTRY,
  renderMessage,
  SHELL_ERROR_CODES,
} from './error-registry.js';
export type {
  ErrorCategory,
  ErrorDefinition,
  ErrorRegistry,
  ShellErrorCode,
} from './error-registry.js';
export { createError, isShellError, ShellError } from './error-classes.js';
export type { DiagnosticLabel, ShellErrorData } from './error-classes.js';
export { locate, renderDiagnostic } from './diagnostics.js';
export type { SourceLocation } from './diagnostics.js';
export { didYouMean, levenshteinDistance } from './runtime/core/suggest.js';

// ============================================================
// CONFIGURATION
// ============================================================

export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
} from './config.js';
export type { ShellConfig } from './config.js';

// ============================================================
// ENGINE
// ============================================================

export type {
  BuiltinCommand,
  CommandFlag,
  CommandParam,
  CommandSignature,
  CustomCommand,
  Decl,
  ParamType,
} from './engine/command.js';
export { EngineState } from './engine/engine-state.js';
export type { StateDelta, VariableInfo } from './engine/engine-state.js';
export { Module } from './engine/module.js';
export { ScopeFrame, Visibility } from './engine/scope.js';
export { Stack } from './engine/stack.js';
export {
  selectExports,
  selectHideTargets,
  StateWorkingSet,
} from './engine/working-set.js';
export type { HideTargets, ImportResult } from './engine/working-set.js';

// ============================================================
// RESOLVER
// ============================================================

export { Resolver } from './resolver/resolve.js';
export type * as Syntax from './resolver/syntax.js';
export type { Program } from './resolver/syntax.js';

// ============================================================
// RUNTIME
// ============================================================

export { Session } from './runtime/core/session.js';
export { evalBlock, evalExpression, runClosure } from './runtime/core/eval.js';
export { PipelineData } from './runtime/core/pipeline.js';
export type {
  ElementFn,
  PipelineKind,
  PipelineMetadata,
  StreamOptions,
} from './runtime/core/pipeline.js';
export { parEach } from './runtime/core/parallel.js';
export type { ParEachOptions } from './runtime/core/parallel.js';
export { followCellPath, updateCellPath } from './runtime/core/cell-path.js';
export {
  inputColumns,
  keepColumns,
  projectRow,
  projectRows,
} from './runtime/core/columns.js';
export * from './runtime/core/values.js';
export type {
  CallEndEvent,
  CallStartEvent,
  ErrorEvent,
  EvalContext,
  InterruptEvent,
  MergeEvent,
  ObservabilityCallbacks,
  SessionOptions,
  ShellCallbacks,
} from './runtime/core/types.js';
export { BUILTIN_COMMANDS, createEngineState } from './runtime/commands/index.js';
export * from './runtime/codecs/index.js';
