import { decodeFailed } from '../../error-classes.js';
import {
  recordFromEntries,
  string,
  type Value,
} from '../core/values.js';
import type { Codec } from './types.js';

const SECTION = /^\[([^\]]+)\]$/;

/**
 * Decode INI text into a record of sections, each a record of string
 * values. Keys before the first section header land in a section named ''.
 * Lines starting with `;` or `#` are comments.
 */
export const fromIni: Codec = (input, span) => {
  const sections = new Map<string, [string, Value][]>();
  let current: [string, Value][] | undefined;

  for (const [index, raw] of input.split(/\r?\n/).entries()) {
    const line = raw.trim();
    if (line === '' || line.startsWith(';') || line.startsWith('#')) continue;

    const header = SECTION.exec(line);
    if (header) {
      const name = (header[1] ?? '').trim();
      current = sections.get(name) ?? [];
      sections.set(name, current);
      continue;
    }

    const eq = line.indexOf('=');
    if (eq === -1) {
      throw decodeFailed(
        'ini',
        new Error(`line ${index + 1}: expected key=value`),
        span
      );
    }
    if (current === undefined) {
      current = [];
      sections.set('', current);
    }
    current.push([
      line.slice(0, eq).trim(),
      string(unquote(line.slice(eq + 1).trim()), span),
    ]);
  }

  return recordFromEntries(
    [...sections].map(
      ([name, entries]) => [name, recordFromEntries(entries, span)] as const
    ),
    span
  );
};

function unquote(text: string): string {
  const quoted =
    text.length >= 2 &&
    (text.startsWith('"') || text.startsWith("'")) &&
    text.endsWith(text.charAt(0));
  return quoted ? text.slice(1, -1) : text;
}
