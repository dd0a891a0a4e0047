// Module-level symbol tables shared by the validator and the renderers

import {
  Module, Declaration, ClassDeclaration, ExternDeclaration, InterfaceDeclaration, FieldDeclaration, Parameter,
  NamedTypeNode, Type
} from "../types";
import {
  NamedTypeInfo, TypeEnvironment, createFunctionType, substituteTypeParameters, typeParameterMapping
} from "../type-utils";

export interface ResolvedSymbol {
  declaration: Declaration;
  // The module that declares the symbol
  module: Module;
  imported: boolean;
}

export interface ResolvedClass {
  declaration: ClassDeclaration;
  module: Module;
}

export interface ClassMember {
  kind: 'field' | 'method' | 'property';
  name: string;
  // Function type for methods, substituted for the receiver's type arguments
  type: Type;
  parameters?: readonly Parameter[];
  isStatic: boolean;
  readonly: boolean;
  owner: { module: Module; declaration: ClassDeclaration | InterfaceDeclaration };
}

export function isExported(declaration: Declaration): boolean {
  return declaration.kind !== 'extern' && declaration.exported;
}

export function isTypeDeclaration(declaration: Declaration): boolean {
  switch (declaration.kind) {
    case 'class':
    case 'interface':
    case 'typeAlias':
      return true;
    case 'extern':
      return declaration.entity === 'class';
    default:
      return false;
  }
}

// Constructor parameters derived from initArg fields: required ones first,
// then the ones with defaults, each group in field order
export function constructorParameters(declaration: ClassDeclaration): FieldDeclaration[] {
  const initArgs = declaration.fields.filter(field => field.initArg);
  return [
    ...initArgs.filter(field => !field.defaultValue),
    ...initArgs.filter(field => field.defaultValue)
  ];
}

export class ModuleSymbols implements TypeEnvironment {
  private readonly locals = new Map<string, Declaration>();
  private readonly peers: Map<string, ModuleSymbols>;

  constructor(readonly module: Module, readonly available: ReadonlyMap<string, Module>, peers?: Map<string, ModuleSymbols>) {
    this.peers = peers ?? new Map();
    this.peers.set(module.name, this);
    for (const declaration of module.declarations) {
      // duplicates are reported by the namespace pass; the first one wins
      if (!this.locals.has(declaration.name)) {
        this.locals.set(declaration.name, declaration);
      }
    }
  }

  // Symbol table of another available module, sharing this one's cache
  forModule(name: string): ModuleSymbols | undefined {
    const cached = this.peers.get(name);
    if (cached) {
      return cached;
    }
    const module = this.available.get(name);
    return module ? new ModuleSymbols(module, this.available, this.peers) : undefined;
  }

  lookupLocal(name: string): Declaration | undefined {
    return this.locals.get(name);
  }

  // Local declarations shadow imports; among imports the first module wins
  lookup(name: string): ResolvedSymbol | undefined {
    const local = this.locals.get(name);
    if (local) {
      return { declaration: local, module: this.module, imported: false };
    }
    for (const imported of this.module.imports) {
      const module = this.available.get(imported);
      const declaration = module?.declarations.find(d => d.name === name && isExported(d));
      if (module && declaration) {
        return { declaration, module, imported: true };
      }
    }
    return undefined;
  }

  lookupType(name: string): ResolvedSymbol | undefined {
    const resolved = this.lookup(name);
    return resolved && isTypeDeclaration(resolved.declaration) ? resolved : undefined;
  }

  // Types reached through another module's signatures need not be imported here
  lookupTypeAnywhere(name: string): ResolvedSymbol | undefined {
    const visible = this.lookupType(name);
    if (visible) {
      return visible;
    }
    for (const module of this.available.values()) {
      const declaration = module.declarations.find(d => d.name === name && isExported(d) && isTypeDeclaration(d));
      if (declaration) {
        return { declaration, module, imported: true };
      }
    }
    return undefined;
  }

  lookupNamed(name: string): NamedTypeInfo | undefined {
    const resolved = this.lookupTypeAnywhere(name);
    if (!resolved) {
      return undefined;
    }
    const declaration = resolved.declaration;
    switch (declaration.kind) {
      case 'class':
        return { kind: 'class', typeParameters: declaration.typeParameters, supertypes: declaration.bases };
      case 'interface':
        return { kind: 'interface' };
      case 'typeAlias':
        return { kind: 'alias', aliased: declaration.type, distinct: declaration.distinct };
      default:
        return { kind: 'extern' };
    }
  }

  resolveClass(type: NamedTypeNode): ResolvedClass | undefined {
    const resolved = this.lookupTypeAnywhere(type.name);
    if (resolved && resolved.declaration.kind === 'class') {
      return { declaration: resolved.declaration, module: resolved.module };
    }
    return undefined;
  }

  /**
   * Finds a field, method or interface property on a named type, searching
   * base classes breadth-first. Types in the result are substituted for the
   * type arguments along the way.
   */
  findMember(type: NamedTypeNode, name: string): ClassMember | undefined {
    const visited = new Set<string>();
    const queue: Array<{ type: NamedTypeNode; symbols: ModuleSymbols }> = [{ type, symbols: this }];

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) {
        break;
      }
      const resolved = next.symbols.lookupTypeAnywhere(next.type.name);
      if (!resolved) {
        continue;
      }
      const key = `${resolved.module.name}:${resolved.declaration.name}`;
      if (visited.has(key)) {
        continue;
      }
      visited.add(key);

      const declaration = resolved.declaration;
      if (declaration.kind === 'interface') {
        const property = declaration.properties.find(p => p.name === name);
        if (property) {
          return {
            kind: 'property',
            name,
            type: property.type,
            isStatic: false,
            readonly: false,
            owner: { module: resolved.module, declaration }
          };
        }
        continue;
      }
      if (declaration.kind !== 'class') {
        continue;
      }

      const mapping = typeParameterMapping(declaration.typeParameters, next.type.typeArguments);
      const owner = { module: resolved.module, declaration };
      const field = declaration.fields.find(f => f.name === name);
      if (field) {
        return {
          kind: 'field',
          name,
          type: substituteTypeParameters(field.type, mapping),
          isStatic: false,
          readonly: field.readonly,
          owner
        };
      }
      const method = declaration.methods.find(m => m.name === name);
      if (method) {
        const parameters = method.parameters.map(p => ({ ...p, type: substituteTypeParameters(p.type, mapping) }));
        return {
          kind: 'method',
          name,
          type: createFunctionType(parameters.map(p => p.type), substituteTypeParameters(method.returnType, mapping)),
          parameters,
          isStatic: method.isStatic,
          readonly: true,
          owner
        };
      }

      const ownerSymbols = next.symbols.forModule(resolved.module.name) ?? next.symbols;
      for (const base of declaration.bases) {
        const substituted = substituteTypeParameters(base, mapping);
        if (substituted.kind === 'named') {
          queue.push({ type: substituted, symbols: ownerSymbols });
        }
      }
    }
    return undefined;
  }

  /**
   * The extern class a class derives from, found by following base classes
   * in the modules that declare them. Error classes must have one.
   */
  externAncestor(type: NamedTypeNode): ExternDeclaration | undefined {
    const visited = new Set<string>();
    const queue: Array<{ name: string; symbols: ModuleSymbols }> = [{ name: type.name, symbols: this }];
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) {
        break;
      }
      const resolved = next.symbols.lookupTypeAnywhere(next.name);
      if (!resolved) {
        continue;
      }
      const declaration = resolved.declaration;
      if (declaration.kind === 'extern') {
        return declaration;
      }
      const key = `${resolved.module.name}:${declaration.name}`;
      if (declaration.kind !== 'class' || visited.has(key)) {
        continue;
      }
      visited.add(key);
      const ownerSymbols = next.symbols.forModule(resolved.module.name) ?? next.symbols;
      for (const base of declaration.bases) {
        queue.push({ name: base.name, symbols: ownerSymbols });
      }
    }
    return undefined;
  }
}
