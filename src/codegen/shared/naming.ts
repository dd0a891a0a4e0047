// Identifier sanitising, case conventions and per-scope name allocation

import { Declaration, Module } from '../../types';
import { CaseConvention, NamingOptions } from '../../codegen-interface';
import reservedWords from './reserved-words.json';

export const RESERVED_WORDS = reservedWords;

export interface IdentifierRules {
  reserved: ReadonlySet<string>;
  // PHP class and function names ignore case
  caseInsensitive?: boolean;
}

export function identifierRules(words: readonly string[], caseInsensitive = false): IdentifierRules {
  return {
    reserved: new Set(caseInsensitive ? words.map(word => word.toLowerCase()) : words),
    caseInsensitive
  };
}

export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter(word => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function applyCase(name: string, convention: CaseConvention): string {
  if (convention === 'preserve') {
    return name;
  }
  const words = splitWords(name);
  if (words.length === 0) {
    return name;
  }
  switch (convention) {
    case 'camel':
      return words[0].toLowerCase() + words.slice(1).map(capitalize).join('');
    case 'pascal':
      return words.map(capitalize).join('');
    case 'snake':
      return words.map(word => word.toLowerCase()).join('_');
    case 'upper-snake':
      return words.map(word => word.toUpperCase()).join('_');
  }
}

export function isReserved(name: string, rules: IdentifierRules): boolean {
  return rules.reserved.has(rules.caseInsensitive ? name.toLowerCase() : name);
}

// Invalid characters become '_', a leading digit gets a '_' prefix and a
// reserved word a '_' suffix
export function sanitizeIdentifier(name: string, rules: IdentifierRules): string {
  let result = name.replace(/[^A-Za-z0-9_]/g, '_');
  if (result.length === 0) {
    result = '_';
  }
  if (/^[0-9]/.test(result)) {
    result = `_${result}`;
  }
  if (isReserved(result, rules)) {
    result = `${result}_`;
  }
  return result;
}

/**
 * Hands out final spellings for one scope. A spelling is free only if no
 * enclosing scope uses it either, so inner names never shadow outer ones;
 * taken spellings get `_2`, `_3`, ... in the order names are declared.
 */
export class NameAllocator {
  private readonly bound = new Map<string, string>();
  private readonly taken = new Set<string>();

  constructor(readonly rules: IdentifierRules, readonly parent?: NameAllocator) {}

  child(rules: IdentifierRules = this.rules): NameAllocator {
    return new NameAllocator(rules, this);
  }

  isTaken(spelling: string): boolean {
    for (let scope: NameAllocator | undefined = this; scope; scope = scope.parent) {
      if (scope.taken.has(scope.key(spelling))) {
        return true;
      }
    }
    return false;
  }

  reserve(spelling: string): void {
    this.taken.add(this.key(spelling));
  }

  declare(name: string, convention: CaseConvention = 'preserve'): string {
    const spelling = this.allocate(sanitizeIdentifier(applyCase(name, convention), this.rules));
    this.bound.set(name, spelling);
    return spelling;
  }

  // An internal name bound to no IR name
  fresh(base: string): string {
    return this.allocate(sanitizeIdentifier(base, this.rules));
  }

  // Binds an IR name to a spelling decided elsewhere, e.g. an import alias
  bind(name: string, spelling: string): void {
    this.reserve(spelling);
    this.bound.set(name, spelling);
  }

  lookup(name: string): string | undefined {
    for (let scope: NameAllocator | undefined = this; scope; scope = scope.parent) {
      const spelling = scope.bound.get(name);
      if (spelling !== undefined) {
        return spelling;
      }
    }
    return undefined;
  }

  lookupOwn(name: string): string | undefined {
    return this.bound.get(name);
  }

  private allocate(base: string): string {
    let candidate = base;
    for (let n = 2; this.isTaken(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    this.reserve(candidate);
    return candidate;
  }

  private key(spelling: string): string {
    return this.rules.caseInsensitive ? spelling.toLowerCase() : spelling;
  }
}

export function conventionFor(declaration: Declaration, naming: NamingOptions): CaseConvention {
  switch (declaration.kind) {
    case 'class':
    case 'interface':
    case 'typeAlias':
      return naming.types;
    case 'const':
      return naming.constants;
    case 'function':
      return naming.values;
    case 'extern':
      return 'preserve';
  }
}

/**
 * Allocates the spellings of a module's own declarations after the fixed
 * spellings are reserved. The result depends only on the module and the
 * options, so every module that imports it computes the same names.
 */
export function allocateDeclarationNames(
  module: Module,
  allocator: NameAllocator,
  naming: NamingOptions,
  fixed: Iterable<string>
): Map<string, string> {
  for (const spelling of fixed) {
    allocator.reserve(spelling);
  }
  const names = new Map<string, string>();
  for (const declaration of module.declarations) {
    if (declaration.kind !== 'extern') {
      names.set(declaration.name, allocator.declare(declaration.name, conventionFor(declaration, naming)));
    }
  }
  return names;
}

/**
 * Spellings of the members of one class or interface. Members share a
 * namespace, so the allocator runs over fields then methods in order.
 */
export function allocateMemberNames(
  members: readonly { name: string }[],
  rules: IdentifierRules,
  convention: CaseConvention
): Map<string, string> {
  const allocator = new NameAllocator(rules);
  const names = new Map<string, string>();
  for (const member of members) {
    names.set(member.name, allocator.declare(member.name, convention));
  }
  return names;
}

// Module name segments, e.g. 'shop.orders' -> ['shop', 'orders']
export function moduleSegments(moduleName: string): string[] {
  return moduleName.split(/[./]/).filter(segment => segment.length > 0);
}
