// Per-call state of the PHP renderer

import { ClassDeclaration, Declaration, ExternBinding, ExternDeclaration, Module } from '../../types';
import { PhpRenderOptions } from '../../codegen-interface';
import { ValidatedModule } from '../../validation/validator';
import { ImportedSymbol } from '../shared/imports';
import { NameAllocator, RESERVED_WORDS, applyCase, identifierRules, moduleSegments, sanitizeIdentifier } from '../shared/naming';
import { ImportRequest, RenderContext, TargetNamingRules, importKind } from '../shared/render-context';
import { isConstantExpression } from '../../validation/capability-validator';

const KEYWORDS = identifierRules(RESERVED_WORDS.php, true);

// Classes, functions and constants share one module-level allocator
const PHP_RULES: TargetNamingRules = {
  module: KEYWORDS,
  local: identifierRules(RESERVED_WORDS.phpVariables),
  member: identifierRules(['class'])
};

function namespaceSegments(moduleName: string): string[] {
  return moduleSegments(moduleName).map(segment => sanitizeIdentifier(applyCase(segment, 'pascal'), KEYWORDS));
}

// 'shop.orders' -> 'Shop\Orders', under the configured prefix
export function phpNamespace(moduleName: string, prefix?: string): string {
  const prefixSegments = prefix === undefined ? [] : prefix.split('\\').filter(segment => segment.length > 0);
  return [...prefixSegments, ...namespaceSegments(moduleName)].join('\\');
}

// PSR-4 directory of a module, relative to the namespace prefix
export function phpDirectory(moduleName: string): string {
  return namespaceSegments(moduleName).join('/');
}

export type UseKind = 'class' | 'function' | 'const';

export function useKind(symbol: ImportedSymbol): UseKind {
  switch (symbol.kind) {
    case 'function':
    case 'value':
      return 'function';
    case 'constant':
      return 'const';
    default:
      return 'class';
  }
}

export class PhpRenderContext extends RenderContext<PhpRenderOptions> {
  readonly namespace: string;

  constructor(validated: ValidatedModule, options: PhpRenderOptions) {
    super(validated, options, 'php', PHP_RULES, 1);
    this.namespace = phpNamespace(this.module.name, options.namespacePrefix);
    this.collectImports();
  }

  protected fixedSpellings(module: Module): string[] {
    const spellings: string[] = [];
    for (const declaration of module.declarations) {
      if (declaration.kind === 'extern' && declaration.entity === 'value') {
        const binding = declaration.bindings.php;
        if (binding && binding.module === undefined) {
          spellings.push(binding.name);
        }
      }
    }
    return spellings;
  }

  protected importFor(module: Module, declaration: Declaration, spelling: string): ImportRequest {
    return {
      source: phpNamespace(module.name, this.options.namespacePrefix),
      name: spelling,
      kind: importKind(declaration)
    };
  }

  protected externImport(declaration: ExternDeclaration, binding: ExternBinding): ImportRequest {
    return { source: binding.module ?? '', name: binding.name, kind: importKind(declaration) };
  }

  // Global classes are written fully qualified; global functions fall back
  // to the root namespace on their own
  protected builtinExternName(declaration: ExternDeclaration, binding: ExternBinding): string {
    return declaration.entity === 'class' ? `\\${binding.name}` : binding.name;
  }

  // Variables live apart from module-level names, so every function starts
  // from a fresh allocator
  withFunctionScope<T>(body: () => T): T {
    return this.withRootScope(new NameAllocator(this.rules.local), body);
  }

  variable(name: string): string {
    return `$${this.declareLocal(name)}`;
  }

  // Imports grouped as `use`, `use function` and `use const` lines
  useLines(): string[] {
    const lines: Record<UseKind, string[]> = { class: [], function: [], const: [] };
    for (const symbol of this.imports.sorted()) {
      const kind = useKind(symbol);
      const alias = symbol.local === symbol.name ? '' : ` as ${symbol.local}`;
      const keyword = kind === 'class' ? 'use' : `use ${kind}`;
      lines[kind].push(`${keyword} ${symbol.source}\\${symbol.name}${alias};`);
    }
    return [...lines.class, ...lines.function, ...lines.const];
  }

  // Property defaults must be constant expressions; anything else is set in the constructor
  hasConstantDefault(declaration: ClassDeclaration, fieldIndex: number): boolean {
    const value = declaration.fields[fieldIndex].defaultValue;
    return value === undefined || isConstantExpression(value, this.moduleOf(declaration));
  }

  needsConstructor(declaration: ClassDeclaration): boolean {
    return declaration.fields.some((field, i) => field.initArg || !this.hasConstantDefault(declaration, i));
  }

  /**
   * Whether `parent::__construct()` has something to call: a local ancestor
   * that declares a constructor, or an extern ancestor class.
   */
  inheritsConstructor(declaration: ClassDeclaration): boolean {
    const visited = new Set<ClassDeclaration>();
    let current: ClassDeclaration | undefined = declaration;
    while (current && !visited.has(current)) {
      visited.add(current);
      let parent: ClassDeclaration | undefined;
      for (const type of current.bases) {
        const resolved = this.symbols.lookupTypeAnywhere(type.name)?.declaration;
        if (resolved?.kind === 'extern') {
          return true;
        }
        if (resolved?.kind === 'class') {
          if (this.needsConstructor(resolved)) {
            return true;
          }
          parent = resolved;
        }
      }
      current = parent;
    }
    return false;
  }

  private moduleOf(declaration: ClassDeclaration): Module {
    const resolved = this.symbols.lookupTypeAnywhere(declaration.name);
    return resolved && resolved.declaration === declaration ? resolved.module : this.module;
  }
}
