import { parse } from 'smol-toml';
import { decodeFailed } from '../../error-classes.js';
import { fromNative } from '../core/values.js';
import type { Codec } from './types.js';

/**
 * Decode a TOML document into a record. Dates become ISO strings, and a
 * float with no fractional part (`1.0`) decodes as an int.
 */
export const fromToml: Codec = (input, span) => {
  let parsed: unknown;
  try {
    parsed = parse(input);
  } catch (error) {
    throw decodeFailed('toml', error, span);
  }
  return fromNative(parsed, span);
};
