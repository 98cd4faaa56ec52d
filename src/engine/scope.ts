/**
 * Scope Frames
 *
 * One frame per block being resolved. A frame maps names to ids and records
 * which declarations are hidden or re-exposed at this level.
 */

import type { DeclId, ModuleId, VarId } from '../types.js';

// ============================================================
// VISIBILITY
// ============================================================

/**
 * Per-frame hide markers keyed by declaration id.
 * Ids with no entry are visible.
 */
export class Visibility {
  private readonly decls = new Map<DeclId, boolean>();

  isDeclVisible(id: DeclId): boolean {
    return this.decls.get(id) ?? true;
  }

  hideDecl(id: DeclId): void {
    this.decls.set(id, false);
  }

  useDecl(id: DeclId): void {
    this.decls.set(id, true);
  }

  /**
   * Add entries from an enclosing frame.
   * Entries already present were set by a nearer frame and are kept.
   */
  appendOuter(outer: Visibility): void {
    for (const [id, visible] of outer.decls) {
      if (!this.decls.has(id)) this.decls.set(id, visible);
    }
  }

  /** Apply every entry from `other`, overriding existing ones */
  mergeWith(other: Visibility): void {
    for (const [id, visible] of other.decls) {
      this.decls.set(id, visible);
    }
  }
}

// ============================================================
// SCOPE FRAME
// ============================================================

export class ScopeFrame {
  readonly vars = new Map<string, VarId>();
  readonly decls = new Map<string, DeclId>();
  readonly modules = new Map<string, ModuleId>();
  readonly visibility = new Visibility();
  /** Names introduced in this frame by `def`, for duplicate detection */
  readonly defined = new Set<string>();
}

/**
 * Find the nearest visible declaration for `name`.
 *
 * `frames` are ordered outermost first. Visibility accumulates from the
 * innermost frame outward, so a hide or re-import in a nearer frame governs
 * declarations found further out.
 */
export function lookupDecl(
  frames: readonly ScopeFrame[],
  name: string
): DeclId | undefined {
  const visibility = new Visibility();
  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i];
    if (frame === undefined) continue;
    visibility.appendOuter(frame.visibility);
    const id = frame.decls.get(name);
    if (id !== undefined && visibility.isDeclVisible(id)) {
      return id;
    }
  }
  return undefined;
}

/** Names with a visible declaration, nearest frames first */
export function visibleDeclNames(frames: readonly ScopeFrame[]): string[] {
  const names: string[] = [];
  const seen = new Set<string>();
  const visibility = new Visibility();
  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i];
    if (frame === undefined) continue;
    visibility.appendOuter(frame.visibility);
    for (const [name, id] of frame.decls) {
      if (!seen.has(name) && visibility.isDeclVisible(id)) {
        seen.add(name);
        names.push(name);
      }
    }
  }
  return names;
}
