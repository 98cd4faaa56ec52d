/**
 * Modules
 *
 * A module is a named set of exported commands and exported environment
 * bindings. Environment exports are blocks evaluated when imported.
 */

import type { BlockId, DeclId, Span } from '../types.js';

export class Module {
  private readonly decls = new Map<string, DeclId>();
  private readonly envVars = new Map<string, BlockId>();

  constructor(
    readonly name: string,
    readonly span: Span
  ) {}

  addDecl(name: string, declId: DeclId): void {
    this.decls.set(name, declId);
  }

  addEnvVar(name: string, blockId: BlockId): void {
    this.envVars.set(name, blockId);
  }

  hasDecl(name: string): boolean {
    return this.decls.has(name);
  }

  hasEnvVar(name: string): boolean {
    return this.envVars.has(name);
  }

  /** True when the module exports anything under `name` */
  exports(name: string): boolean {
    return this.hasDecl(name) || this.hasEnvVar(name);
  }

  getDecl(name: string): DeclId | undefined {
    return this.decls.get(name);
  }

  getEnvVar(name: string): BlockId | undefined {
    return this.envVars.get(name);
  }

  /** Exported commands under their bare names */
  declEntries(): [string, DeclId][] {
    return [...this.decls];
  }

  /** Exported commands prefixed with `head ` */
  declEntriesWithHead(head: string): [string, DeclId][] {
    return this.declEntries().map(([name, id]) => [`${head} ${name}`, id]);
  }

  envEntries(): [string, BlockId][] {
    return [...this.envVars];
  }

  envEntriesWithHead(head: string): [string, BlockId][] {
    return this.envEntries().map(([name, id]) => [`${head} ${name}`, id]);
  }

  exportNames(): string[] {
    return [...new Set([...this.decls.keys(), ...this.envVars.keys()])];
  }
}
