/**
 * Shell Error Classes and Factory
 * Span-anchored diagnostics with registry-based codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  SHELL_ERROR_CODES,
  type ErrorCategory,
} from './error-registry.js';
import type { Span } from './types.js';

// ============================================================
// ERROR DATA
// ============================================================

/** A span with the text shown beneath it */
export interface DiagnosticLabel {
  readonly span: Span;
  readonly text: string;
}

/** Structured error data for host applications */
export interface ShellErrorData {
  readonly code: string;
  readonly message: string;
  readonly labels: readonly DiagnosticLabel[];
  readonly help?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for every diagnostic the engine reports.
 * Carries one or more labelled spans into the original source.
 */
export class ShellError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly labels: readonly DiagnosticLabel[];
  readonly help: string | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: ShellErrorData) {
    const definition = ERROR_REGISTRY.get(data.code);
    if (!definition) {
      throw new TypeError(`Unknown error code: ${data.code}`);
    }

    super(data.message);
    this.name = 'ShellError';
    this.code = data.code;
    this.category = definition.category;
    this.labels = data.labels;
    this.help = data.help;
    this.context = data.context;
  }

  /** Primary span (first label), if any */
  get span(): Span | undefined {
    return this.labels[0]?.span;
  }

  /** Get structured error data for custom formatting */
  toData(): ShellErrorData {
    return {
      code: this.code,
      message: this.message,
      labels: this.labels,
      help: this.help,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ShellErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    const labels = this.labels.map((label) => label.text).join('; ');
    const help = this.help ? ` (${this.help})` : '';
    return labels ? `${this.message}: ${labels}${help}` : this.message + help;
  }
}

/** Type guard for ShellError */
export function isShellError(value: unknown): value is ShellError {
  return value instanceof ShellError;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * The message renders the definition's template with `context`. The first span
 * receives the rendered label template; extra labels are passed verbatim.
 *
 * @example
 * createError(SHELL_ERROR_CODES.DIVISION_BY_ZERO, {}, [span])
 * // ShellError: "Division by zero." labelled "division by zero"
 */
export function createError(
  code: string,
  context: Record<string, unknown>,
  spans: readonly Span[] = [],
  options: {
    extraLabels?: readonly DiagnosticLabel[] | undefined;
    help?: string | undefined;
  } = {}
): ShellError {
  const definition = ERROR_REGISTRY.get(code);
  if (!definition) {
    throw new TypeError(`Unknown error code: ${code}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  const labels: DiagnosticLabel[] = [];
  const [primary, ...rest] = spans;
  if (primary) {
    labels.push({
      span: primary,
      text: renderMessage(definition.labelTemplate ?? '', context),
    });
  }
  for (const span of rest) {
    labels.push({ span, text: '' });
  }
  labels.push(...(options.extraLabels ?? []));

  return new ShellError({
    code,
    message,
    labels,
    help: options.help,
    context,
  });
}

// ============================================================
// KIND CONSTRUCTORS
// ============================================================

function didYouMeanHelp(suggestion: string | undefined): string | undefined {
  return suggestion === undefined ? undefined : `did you mean '${suggestion}'?`;
}

export function variableNotFound(span: Span, suggestion?: string): ShellError {
  return createError(SHELL_ERROR_CODES.VARIABLE_NOT_FOUND, {}, [span], {
    help: didYouMeanHelp(suggestion),
  });
}

export function variableNotDefined(
  name: string,
  span: Span,
  suggestion?: string
): ShellError {
  return createError(
    SHELL_ERROR_CODES.VARIABLE_NOT_DEFINED,
    { name },
    [span],
    { help: didYouMeanHelp(suggestion === undefined ? undefined : `$${suggestion}`) }
  );
}

export function unknownCommand(
  name: string,
  span: Span,
  suggestion?: string
): ShellError {
  return createError(SHELL_ERROR_CODES.UNKNOWN_COMMAND, { name }, [span], {
    help: didYouMeanHelp(suggestion),
  });
}

export function envVarNotFound(
  name: string,
  span: Span,
  suggestion?: string
): ShellError {
  return createError(SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND, { name }, [span], {
    help: didYouMeanHelp(suggestion),
  });
}

export function cantFindColumn(
  lookupSpan: Span,
  originSpan: Span,
  suggestion?: string
): ShellError {
  return createError(
    SHELL_ERROR_CODES.COLUMN_NOT_FOUND,
    { suggestion },
    [lookupSpan],
    {
      extraLabels: [{ span: originSpan, text: 'value originates here' }],
      help: didYouMeanHelp(suggestion),
    }
  );
}

export function notAList(lookupSpan: Span, originSpan: Span): ShellError {
  return createError(SHELL_ERROR_CODES.NOT_A_LIST, {}, [lookupSpan], {
    extraLabels: [{ span: originSpan, text: 'value originates here' }],
  });
}

export function incompatiblePathAccess(type: string, span: Span): ShellError {
  return createError(
    SHELL_ERROR_CODES.INCOMPATIBLE_PATH_ACCESS,
    { type },
    [span]
  );
}

export function accessBeyondEnd(max: number, span: Span): ShellError {
  return createError(SHELL_ERROR_CODES.ACCESS_BEYOND_END, { max }, [span]);
}

export function typeMismatch(details: string, span: Span): ShellError {
  return createError(SHELL_ERROR_CODES.TYPE_MISMATCH, { details }, [span]);
}

export function operatorMismatch(
  opSpan: Span,
  lhs: { type: string; span: Span },
  rhs: { type: string; span: Span }
): ShellError {
  return createError(
    SHELL_ERROR_CODES.OPERATOR_MISMATCH,
    { lhs: lhs.type, rhs: rhs.type },
    [opSpan],
    {
      extraLabels: [
        { span: lhs.span, text: lhs.type },
        { span: rhs.span, text: rhs.type },
      ],
    }
  );
}

export function unsupportedInput(details: string, span: Span): ShellError {
  return createError(SHELL_ERROR_CODES.UNSUPPORTED_INPUT, { details }, [span]);
}

export function cantConvert(to: string, from: string, span: Span): ShellError {
  return createError(SHELL_ERROR_CODES.CANT_CONVERT, { to, from }, [span]);
}

export function decodeFailed(
  format: string,
  error: unknown,
  span: Span
): ShellError {
  const details = error instanceof Error ? error.message : String(error);
  return createError(SHELL_ERROR_CODES.DECODE_FAILED, { format, details }, [
    span,
  ]);
}

export function delimiterError(details: string, span: Span): ShellError {
  return createError(SHELL_ERROR_CODES.DELIMITER_ERROR, { details }, [span]);
}

export function engineFailed(details: string): ShellError {
  return createError(SHELL_ERROR_CODES.ENGINE_FAILED, { details });
}

/**
 * Wrap a collaborator failure (codec, file system) without reinterpreting it.
 */
export function ioError(error: unknown): ShellError {
  if (error instanceof ShellError) return error;
  const details = error instanceof Error ? error.message : String(error);
  return createError(SHELL_ERROR_CODES.IO_ERROR, { details });
}
