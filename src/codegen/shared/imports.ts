import { NameAllocator } from './naming';

export type ImportKind = 'type' | 'class' | 'function' | 'constant' | 'value';

export interface ImportedSymbol {
  // Target-specific source: a module specifier, a Python module or a PHP namespace
  source: string;
  name: string;
  // Local spelling; differs from `name` when the name was already taken
  local: string;
  kind: ImportKind;
}

/**
 * The imports one rendered file needs. Local spellings come from the module
 * allocator, so an imported name that collides with a declaration or an
 * earlier import is aliased.
 */
export class ImportCollector {
  private readonly symbols = new Map<string, ImportedSymbol>();

  constructor(private readonly allocator: NameAllocator) {}

  add(source: string, name: string, kind: ImportKind): string {
    const key = `${source}\u0000${name}`;
    const existing = this.symbols.get(key);
    if (existing) {
      return existing.local;
    }
    const local = this.allocator.isTaken(name) ? this.allocator.fresh(name) : name;
    this.allocator.reserve(local);
    this.symbols.set(key, { source, name, local, kind });
    return local;
  }

  lookup(source: string, name: string): string | undefined {
    return this.symbols.get(`${source}\u0000${name}`)?.local;
  }

  get size(): number {
    return this.symbols.size;
  }

  // Ordered by source, then by name
  sorted(): ImportedSymbol[] {
    return [...this.symbols.values()].sort((a, b) => compareText(a.source, b.source) || compareText(a.name, b.name));
  }

  bySource(): Map<string, ImportedSymbol[]> {
    const groups = new Map<string, ImportedSymbol[]>();
    for (const symbol of this.sorted()) {
      const group = groups.get(symbol.source);
      if (group) {
        group.push(symbol);
      } else {
        groups.set(symbol.source, [symbol]);
      }
    }
    return groups;
  }
}

// Code-unit order, independent of the host locale
export function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
