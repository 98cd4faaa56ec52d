/**
 * Codec contract: decode text into a structured value.
 * Malformed input throws a ShellError anchored at `span`.
 */

import type { Span } from '../../types.js';
import type { Value } from '../core/values.js';

export type Codec = (input: string, span: Span) => Value;
