/**
 * Error Registry
 * Central diagnostic definitions with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category: resolve-time (parser) or run-time (shell) */
export type ErrorCategory = 'parser' | 'shell';

/** Registry entry describing one diagnostic kind */
export interface ErrorDefinition {
  /** Format: {category}::{snake_case_name} (e.g., shell::column_not_found) */
  readonly code: string;
  readonly category: ErrorCategory;
  /** Short human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** Template for the primary span label */
  readonly labelTemplate?: string | undefined;
}

// ============================================================
// ERROR CODES
// ============================================================

export const SHELL_ERROR_CODES = {
  VARIABLE_NOT_FOUND: 'shell::variable_not_found',
  COMMAND_NOT_FOUND: 'shell::command_not_found',
  ENV_VAR_NOT_FOUND: 'shell::env_var_not_found',
  NOT_FOUND: 'shell::not_found',
  COLUMN_NOT_FOUND: 'shell::column_not_found',
  NOT_A_LIST: 'shell::not_a_list',
  INCOMPATIBLE_PATH_ACCESS: 'shell::incompatible_path_access',
  ACCESS_BEYOND_END: 'shell::access_beyond_end',
  TYPE_MISMATCH: 'shell::type_mismatch',
  OPERATOR_MISMATCH: 'shell::operator_mismatch',
  UNSUPPORTED_INPUT: 'shell::unsupported_input',
  CANT_CONVERT: 'shell::cant_convert',
  DECODE_FAILED: 'shell::decode_failed',
  DELIMITER_ERROR: 'shell::delimiter_error',
  DIVISION_BY_ZERO: 'shell::division_by_zero',
  INVALID_RANGE: 'shell::invalid_range',
  MISSING_PARAMETER: 'shell::missing_parameter',
  RECURSION_LIMIT: 'shell::recursion_limit',
  IO_ERROR: 'shell::io_error',
  UNSUPPORTED_CONFIG_VALUE: 'shell::unsupported_config_value',
  ENGINE_FAILED: 'shell::engine_failed',
  DUPLICATE_DECLARATION: 'parser::duplicate_declaration',
  IMPORT_NOT_FOUND: 'parser::import_not_found',
  MODULE_NOT_FOUND: 'parser::module_not_found',
  UNKNOWN_COMMAND: 'parser::unknown_command',
  VARIABLE_NOT_DEFINED: 'parser::variable_not_found',
} as const;

export type ShellErrorCode =
  (typeof SHELL_ERROR_CODES)[keyof typeof SHELL_ERROR_CODES];

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only registry of every diagnostic definition.
 */
export interface ErrorRegistry {
  get(code: string): ErrorDefinition | undefined;
  has(code: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byCode: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const codeMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (codeMap.has(def.code)) {
        throw new Error(`Duplicate error code: ${def.code}`);
      }
      codeMap.set(def.code, def);
    }
    this.byCode = codeMap;
  }

  get(code: string): ErrorDefinition | undefined {
    return this.byCode.get(code);
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  get size(): number {
    return this.byCode.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byCode.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Name lookup
  {
    code: SHELL_ERROR_CODES.VARIABLE_NOT_FOUND,
    category: 'shell',
    description: 'Variable not found',
    messageTemplate: 'Variable not found',
    labelTemplate: 'variable not found',
  },
  {
    code: SHELL_ERROR_CODES.COMMAND_NOT_FOUND,
    category: 'shell',
    description: 'Command not found',
    messageTemplate: 'Command not found: {name}',
    labelTemplate: 'command not found',
  },
  {
    code: SHELL_ERROR_CODES.ENV_VAR_NOT_FOUND,
    category: 'shell',
    description: 'Environment variable not found',
    messageTemplate: 'Environment variable not found: {name}',
    labelTemplate: 'environment variable not found',
  },
  {
    code: SHELL_ERROR_CODES.NOT_FOUND,
    category: 'shell',
    description: 'Nothing to hide under this name',
    messageTemplate: 'Not found: {name}',
    labelTemplate: 'did not find anything under this name',
  },

  // Cell paths
  {
    code: SHELL_ERROR_CODES.COLUMN_NOT_FOUND,
    category: 'shell',
    description: 'Column missing from record',
    messageTemplate: 'Cannot find column',
    labelTemplate: 'cannot find column',
  },
  {
    code: SHELL_ERROR_CODES.NOT_A_LIST,
    category: 'shell',
    description: 'Integer index applied to a non-list',
    messageTemplate: 'Not a list value',
    labelTemplate: 'value not a list',
  },
  {
    code: SHELL_ERROR_CODES.INCOMPATIBLE_PATH_ACCESS,
    category: 'shell',
    description: 'Value does not support cell paths',
    messageTemplate: 'Data cannot be accessed with a cell path',
    labelTemplate: "{type} doesn't support cell paths",
  },
  {
    code: SHELL_ERROR_CODES.ACCESS_BEYOND_END,
    category: 'shell',
    description: 'Row index past the end of the list',
    messageTemplate: 'Row number too large (max: {max}).',
    labelTemplate: 'too large',
  },

  // Value-level operations
  {
    code: SHELL_ERROR_CODES.TYPE_MISMATCH,
    category: 'shell',
    description: 'Value has the wrong type',
    messageTemplate: 'Type mismatch',
    labelTemplate: '{details}',
  },
  {
    code: SHELL_ERROR_CODES.OPERATOR_MISMATCH,
    category: 'shell',
    description: 'Operator applied to incompatible types',
    messageTemplate: 'Types mismatched for operation.',
    labelTemplate: 'type mismatch for operator',
  },
  {
    code: SHELL_ERROR_CODES.UNSUPPORTED_INPUT,
    category: 'shell',
    description: 'Command cannot handle its input',
    messageTemplate: 'Unsupported input',
    labelTemplate: '{details}',
  },
  {
    code: SHELL_ERROR_CODES.CANT_CONVERT,
    category: 'shell',
    description: 'Value conversion failed',
    messageTemplate: "Can't convert to {to}.",
    labelTemplate: "can't convert {from} to {to}",
  },
  {
    code: SHELL_ERROR_CODES.DECODE_FAILED,
    category: 'shell',
    description: 'Text could not be decoded into structured data',
    messageTemplate: 'Could not parse input as {format}',
    labelTemplate: '{details}',
  },
  {
    code: SHELL_ERROR_CODES.DELIMITER_ERROR,
    category: 'shell',
    description: 'Pattern could not be compiled',
    messageTemplate: 'Delimiter error',
    labelTemplate: '{details}',
  },
  {
    code: SHELL_ERROR_CODES.DIVISION_BY_ZERO,
    category: 'shell',
    description: 'Division by zero',
    messageTemplate: 'Division by zero.',
    labelTemplate: 'division by zero',
  },
  {
    code: SHELL_ERROR_CODES.INVALID_RANGE,
    category: 'shell',
    description: 'Range bounds are not usable',
    messageTemplate: 'Invalid range {from}..{to}',
    labelTemplate: 'expected a valid range',
  },
  {
    code: SHELL_ERROR_CODES.MISSING_PARAMETER,
    category: 'shell',
    description: 'Required argument not supplied',
    messageTemplate: 'Missing parameter: {name}.',
    labelTemplate: 'missing parameter: {name}',
  },
  {
    code: SHELL_ERROR_CODES.RECURSION_LIMIT,
    category: 'shell',
    description: 'Call depth limit exceeded',
    messageTemplate: 'Recursion limit ({limit}) reached',
    labelTemplate: 'this call exceeded the limit',
  },

  // Collaborator-reported
  {
    code: SHELL_ERROR_CODES.IO_ERROR,
    category: 'shell',
    description: 'I/O failure',
    messageTemplate: 'I/O error: {details}',
  },
  {
    code: SHELL_ERROR_CODES.UNSUPPORTED_CONFIG_VALUE,
    category: 'shell',
    description: 'Configuration value has the wrong type',
    messageTemplate: 'Unsupported config value for {key}',
    labelTemplate: 'expected {expected}, got {actual}',
  },
  {
    code: SHELL_ERROR_CODES.ENGINE_FAILED,
    category: 'shell',
    description: 'Internal invariant violated',
    messageTemplate: 'Engine failed: {details}.',
  },

  // Resolve-time
  {
    code: SHELL_ERROR_CODES.DUPLICATE_DECLARATION,
    category: 'parser',
    description: 'Name declared twice in one block',
    messageTemplate: "'{name}' is defined more than once",
    labelTemplate: 'defined more than once',
  },
  {
    code: SHELL_ERROR_CODES.IMPORT_NOT_FOUND,
    category: 'parser',
    description: 'Import references a missing export',
    messageTemplate: 'Could not find import: {name}',
    labelTemplate: 'could not find import',
  },
  {
    code: SHELL_ERROR_CODES.MODULE_NOT_FOUND,
    category: 'parser',
    description: 'Module name not in scope',
    messageTemplate: 'Module not found: {name}',
    labelTemplate: 'module not found',
  },
  {
    code: SHELL_ERROR_CODES.UNKNOWN_COMMAND,
    category: 'parser',
    description: 'Command name not in scope',
    messageTemplate: 'Command not found: {name}',
    labelTemplate: 'command not found',
  },
  {
    code: SHELL_ERROR_CODES.VARIABLE_NOT_DEFINED,
    category: 'parser',
    description: 'Variable name not in scope',
    messageTemplate: 'Variable not found: ${name}',
    labelTemplate: 'variable not found',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a template by replacing {placeholder} with context values.
 * Missing values render as empty strings; `{{` escapes a literal brace.
 * An unclosed brace returns the template unchanged.
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      if (template.charAt(i + 1) === '{') {
        result += '{';
        i += 2;
        continue;
      }

      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
