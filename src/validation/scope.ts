import { Type } from "../types";

export type ScopeEntryKind = 'parameter' | 'variable' | 'constant' | 'loop' | 'binding';

export interface ScopeEntry {
  kind: ScopeEntryKind;
  type: Type;
  // a parameter the caller may leave out
  omittable?: boolean;
}

// Lexical identifier -> type map chained to its parent
export class Scope {
  private readonly entries = new Map<string, ScopeEntry>();

  constructor(readonly parent?: Scope) {}

  child(): Scope {
    return new Scope(this);
  }

  declare(name: string, entry: ScopeEntry): void {
    this.entries.set(name, entry);
  }

  hasOwn(name: string): boolean {
    return this.entries.has(name);
  }

  lookup(name: string): ScopeEntry | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const entry = scope.entries.get(name);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }
}
