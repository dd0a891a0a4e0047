// Per-call state of the Python renderer

import {
  ClassDeclaration, Declaration, ExternBinding, ExternDeclaration, Module
} from '../../types';
import { PythonRenderOptions } from '../../codegen-interface';
import { ValidatedModule } from '../../validation/validator';
import { constructorParameters } from '../../validation/symbols';
import { RESERVED_WORDS, allocateMemberNames, identifierRules, moduleSegments, sanitizeIdentifier } from '../shared/naming';
import { ImportRequest, RenderContext, TargetNamingRules, importKind } from '../shared/render-context';

const KEYWORDS = identifierRules(RESERVED_WORDS.python);

export const PY_RULES: TargetNamingRules = {
  module: identifierRules([...RESERVED_WORDS.python, ...RESERVED_WORDS.pythonBuiltins]),
  local: identifierRules([...RESERVED_WORDS.python, ...RESERVED_WORDS.pythonBuiltins]),
  member: KEYWORDS
};

// 'shop.orders' -> 'shop.orders', with keyword segments made importable
export function pythonModuleName(moduleName: string): string {
  return moduleSegments(moduleName).map(segment => sanitizeIdentifier(segment, KEYWORDS)).join('.');
}

export function pythonModulePath(moduleName: string): string {
  return pythonModuleName(moduleName).split('.').join('/');
}

/**
 * Every Python parameter can be passed by keyword, so its spelling depends
 * only on the function's own parameter list. Call sites in other modules
 * compute the same spellings.
 */
export function parameterSpellings(
  parameters: readonly { name: string }[],
  options: PythonRenderOptions
): Map<string, string> {
  return allocateMemberNames(parameters, PY_RULES.local, options.naming.values);
}

function signatures(module: Module): Array<readonly { name: string }[]> {
  const lists: Array<readonly { name: string }[]> = [];
  for (const declaration of module.declarations) {
    if (declaration.kind === 'function') {
      lists.push(declaration.parameters);
    } else if (declaration.kind === 'class') {
      lists.push(constructorParameters(declaration));
      for (const method of declaration.methods) {
        lists.push(method.parameters);
      }
    }
  }
  return lists;
}

export class PyRenderContext extends RenderContext<PythonRenderOptions> {
  // IR type parameter name -> module-level TypeVar spelling
  readonly typeVars = new Map<string, string>();
  // Local type declarations already emitted, by IR name
  readonly definedTypes = new Set<string>();
  // Standard library modules the body refers to, imported whole
  readonly stdlib = new Set<string>();
  // Set while a type is rendered if it names a local type not yet defined
  forwardReference = false;
  private bodyDepth = 0;

  constructor(validated: ValidatedModule, options: PythonRenderOptions) {
    super(validated, options, 'python', PY_RULES, 2);
    for (const declaration of this.module.declarations) {
      if (declaration.kind === 'class') {
        for (const name of declaration.typeParameters) {
          if (!this.typeVars.has(name)) {
            this.typeVars.set(name, this.moduleScope.fresh(name));
          }
        }
      }
    }
    this.collectImports();
  }

  protected fixedSpellings(module: Module): string[] {
    const spellings: string[] = [];
    for (const declaration of module.declarations) {
      const binding = declaration.kind === 'extern' ? declaration.bindings.python : undefined;
      if (binding && binding.module === undefined) {
        spellings.push(binding.name.split('.')[0]);
      }
    }
    for (const parameters of signatures(module)) {
      spellings.push(...parameterSpellings(parameters, this.options).values());
    }
    return spellings;
  }

  protected importFor(module: Module, declaration: Declaration, spelling: string): ImportRequest {
    return { source: pythonModuleName(module.name), name: spelling, kind: importKind(declaration) };
  }

  protected externImport(declaration: ExternDeclaration, binding: ExternBinding): ImportRequest {
    return { source: binding.module ?? '', name: binding.name.split('.')[0], kind: importKind(declaration) };
  }

  // `module.name`, noting that the file needs `import module`
  qualified(module: 'abc' | 'math' | 'types' | 'typing', name: string): string {
    this.stdlib.add(module);
    return `${module}.${name}`;
  }

  typing(name: string): string {
    return this.qualified('typing', name);
  }

  abc(name: string): string {
    return this.qualified('abc', name);
  }

  // Annotations inside function bodies are never evaluated
  withinBody<T>(body: () => T): T {
    this.bodyDepth++;
    try {
      return body();
    } finally {
      this.bodyDepth--;
    }
  }

  get inBody(): boolean {
    return this.bodyDepth > 0;
  }

  // True for a local class, interface or alias that is not defined yet
  isForward(name: string): boolean {
    if (this.typeParameterName(name) !== undefined) {
      return false;
    }
    const resolved = this.symbols.lookup(name);
    return resolved !== undefined
      && !resolved.imported
      && resolved.declaration.kind !== 'extern'
      && !this.definedTypes.has(name);
  }

  parametersOf(parameters: readonly { name: string }[]): Map<string, string> {
    return parameterSpellings(parameters, this.options);
  }

  classDeclarationOf(name: string): ClassDeclaration | undefined {
    const declaration = this.symbols.lookupTypeAnywhere(name)?.declaration;
    return declaration && declaration.kind === 'class' ? declaration : undefined;
  }
}
