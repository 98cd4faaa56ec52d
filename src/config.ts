/**
 * Shell Configuration
 * Loads and validates shoal.yaml settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError, ioError } from './error-classes.js';
import { SHELL_ERROR_CODES } from './error-registry.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'shoal.yaml';

export interface ShellConfig {
  /** Concurrent tasks used by par-each */
  readonly parallelWorkers: number;
  /** Maximum depth of nested custom command calls */
  readonly recursionLimit: number;
  /** Fixed decimal places for floats, or null for the shortest form */
  readonly floatPrecision: number | null;
  /** Separator between top-level list items when a value is rendered */
  readonly listSeparator: string;
}

export const DEFAULT_CONFIG: ShellConfig = {
  parallelWorkers: 4,
  recursionLimit: 256,
  floatPrecision: null,
  listSeparator: ', ',
};

// ============================================================
// VALIDATION
// ============================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

function unsupported(key: string, expected: string, actual: unknown): Error {
  return createError(SHELL_ERROR_CODES.UNSUPPORTED_CONFIG_VALUE, {
    key,
    expected,
    actual: describe(actual),
  });
}

function positiveInteger(key: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw unsupported(key, 'a positive integer', value);
  }
  return value;
}

/**
 * Validate a parsed configuration object and merge it over the defaults.
 * Unknown keys are rejected so typos do not silently fall back to defaults.
 *
 * @throws ShellError UnsupportedConfigValue naming the offending key
 */
export function resolveConfig(data: unknown): ShellConfig {
  if (data === null || data === undefined) return DEFAULT_CONFIG;
  if (!isPlainObject(data)) {
    throw unsupported('(root)', 'a mapping', data);
  }

  let config: ShellConfig = DEFAULT_CONFIG;

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'parallelWorkers':
        config = { ...config, parallelWorkers: positiveInteger(key, value) };
        break;
      case 'recursionLimit':
        config = { ...config, recursionLimit: positiveInteger(key, value) };
        break;
      case 'floatPrecision':
        if (value === null) {
          config = { ...config, floatPrecision: null };
        } else if (
          typeof value === 'number' &&
          Number.isInteger(value) &&
          value >= 0 &&
          value <= 20
        ) {
          config = { ...config, floatPrecision: value };
        } else {
          throw unsupported(key, 'an integer from 0 to 20 or null', value);
        }
        break;
      case 'listSeparator':
        if (typeof value !== 'string') {
          throw unsupported(key, 'a string', value);
        }
        config = { ...config, listSeparator: value };
        break;
      default:
        throw unsupported(key, 'a known setting', value);
    }
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from shoal.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns Merged configuration, or the defaults when no file exists
 * @throws ShellError IOError when the file cannot be read or parsed
 * @throws ShellError UnsupportedConfigValue when a setting is invalid
 */
export function loadConfig(cwd: string): ShellConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw ioError(err);
  }

  return resolveConfig(parsed);
}
