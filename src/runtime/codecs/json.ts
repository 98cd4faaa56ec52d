import { decodeFailed } from '../../error-classes.js';
import { fromNative } from '../core/values.js';
import type { Codec } from './types.js';

/** Decode JSON text. Whole numbers, `1.0` included, decode as ints. */
export const fromJson: Codec = (input, span) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch (error) {
    throw decodeFailed('json', error, span);
  }
  return fromNative(parsed, span);
};
