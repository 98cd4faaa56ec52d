import { recordFromEntries, string } from '../core/values.js';
import type { Codec } from './types.js';

/**
 * Decode a URL-encoded query string (`a=1&b=x%20y`) into a record of
 * strings. A leading `?` is ignored; a repeated key keeps its last value.
 */
export const fromUrl: Codec = (input, span) => {
  const params = new URLSearchParams(input.trim());
  return recordFromEntries(
    [...params.entries()].map(([key, value]) => [key, string(value, span)] as const),
    span
  );
};
