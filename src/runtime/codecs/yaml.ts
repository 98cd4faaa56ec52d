import * as yaml from 'yaml';
import { decodeFailed } from '../../error-classes.js';
import { fromNative } from '../core/values.js';
import type { Codec } from './types.js';

/**
 * Decode a single YAML document; empty input decodes to nothing.
 * Integers are parsed as bigints so `1.0` stays a float.
 */
export const fromYaml: Codec = (input, span) => {
  let parsed: unknown;
  try {
    parsed = yaml.parse(input, { intAsBigInt: true });
  } catch (error) {
    throw decodeFailed('yaml', error, span);
  }
  return fromNative(parsed, span, 'bigint');
};
