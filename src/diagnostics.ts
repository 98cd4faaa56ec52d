/**
 * Diagnostic Rendering
 * Plain-text excerpt of the source under each labelled span
 */

import type { DiagnosticLabel, ShellError } from './error-classes.js';
import type { Span } from './types.js';

// ============================================================
// SOURCE LOCATIONS
// ============================================================

/** 1-based line and column of a byte offset; columns count characters */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** Text of the containing line, without its line break */
  readonly text: string;
}

/**
 * String index of the character at UTF-8 byte `offset`. An offset inside a
 * multibyte character moves to the next character.
 */
function charIndex(source: string, offset: number): number {
  let bytes = 0;
  let index = 0;
  for (const char of source) {
    if (bytes >= offset) break;
    bytes += Buffer.byteLength(char, 'utf8');
    index += char.length;
  }
  return index;
}

/** Number of characters covered by the byte range of `span` */
function spanWidth(source: string, span: Span): number {
  const start = charIndex(source, span.start);
  const end = charIndex(source, span.end);
  return [...source.slice(start, Math.max(start, end))].length;
}

/**
 * Locate byte `offset` in `source`. Offsets past the end clamp to the end
 * of the source.
 */
export function locate(source: string, offset: number): SourceLocation {
  const index = charIndex(source, Math.max(0, offset));
  const lineStart = index === 0 ? 0 : source.lastIndexOf('\n', index - 1) + 1;
  const newline = source.indexOf('\n', index);
  const lineEnd = newline === -1 ? source.length : newline;
  let line = 1;
  for (let i = 0; i < lineStart; i++) {
    if (source.charAt(i) === '\n') line++;
  }
  return {
    line,
    column: [...source.slice(lineStart, index)].length + 1,
    text: source.slice(lineStart, lineEnd).replace(/\r$/, ''),
  };
}

// ============================================================
// RENDERING
// ============================================================

/**
 * Render an error against the source it was raised for.
 *
 * Output format:
 * ```
 * error[shell::column_not_found]: Cannot find column
 *   --> 1:6
 *   |
 * 1 | $row.nmae
 *   |      ^^^^ cannot find column
 *   = help: did you mean 'name'?
 * ```
 * Labels spanning several lines are underlined to the end of their first
 * line. Errors without spans render the header and help only.
 */
export function renderDiagnostic(error: ShellError, source: string): string {
  const lines = [`error[${error.code}]: ${error.message}`];
  const located = error.labels.map((label) => ({
    label,
    location: locate(source, label.span.start),
    width: spanWidth(source, label.span),
  }));

  const width = Math.max(
    1,
    ...located.map(({ location }) => String(location.line).length)
  );
  const gutter = ' '.repeat(width);

  const [primary] = located;
  if (primary) {
    lines.push(`  --> ${primary.location.line}:${primary.location.column}`);
    lines.push(`${gutter} |`);
  }

  for (const { label, location, width: labelWidth } of located) {
    const number = String(location.line).padStart(width, ' ');
    lines.push(`${number} | ${location.text}`);
    lines.push(
      `${gutter} | ${underline(label, location, labelWidth)}`.trimEnd()
    );
  }

  if (error.help) {
    lines.push(`${gutter} = help: ${error.help}`);
  }

  return lines.join('\n');
}

function underline(
  label: DiagnosticLabel,
  location: SourceLocation,
  labelWidth: number
): string {
  const available = [...location.text].length - (location.column - 1);
  const length = Math.max(1, Math.min(labelWidth, available));
  const carets = `${' '.repeat(location.column - 1)}${'^'.repeat(length)}`;
  return label.text ? `${carets} ${label.text}` : carets;
}
