// Per-call state of the TypeScript renderer

import * as path from 'path';
import { Declaration, ExternBinding, ExternDeclaration, Module } from '../../types';
import { TypeScriptRenderOptions } from '../../codegen-interface';
import { ValidatedModule } from '../../validation/validator';
import { RESERVED_WORDS, identifierRules, moduleSegments } from '../shared/naming';
import { ImportRequest, RenderContext, TargetNamingRules, importKind } from '../shared/render-context';

const TS_RULES: TargetNamingRules = {
  module: identifierRules([...RESERVED_WORDS.typescript, ...RESERVED_WORDS.typescriptGlobals]),
  local: identifierRules([...RESERVED_WORDS.typescript, ...RESERVED_WORDS.typescriptGlobals]),
  member: identifierRules(['constructor'])
};

export function typeScriptModulePath(moduleName: string): string {
  return moduleSegments(moduleName).join('/');
}

// Relative specifier from one module's file to another's, e.g. './common' or '../util'
export function relativeSpecifier(from: string, to: string, extension: string): string {
  const relative = path.posix.relative(path.posix.dirname(typeScriptModulePath(from)), typeScriptModulePath(to));
  return `${relative.startsWith('.') ? relative : `./${relative}`}${extension}`;
}

export class TsRenderContext extends RenderContext<TypeScriptRenderOptions> {
  constructor(validated: ValidatedModule, options: TypeScriptRenderOptions) {
    super(validated, options, 'typescript', TS_RULES, 1);
    this.collectImports();
  }

  protected fixedSpellings(module: Module): string[] {
    const spellings: string[] = [];
    for (const declaration of module.declarations) {
      const binding = declaration.kind === 'extern' ? declaration.bindings.typescript : undefined;
      if (binding && binding.module === undefined) {
        spellings.push(binding.name.split('.')[0]);
      }
    }
    return spellings;
  }

  protected importFor(module: Module, declaration: Declaration, spelling: string): ImportRequest {
    return {
      source: relativeSpecifier(this.module.name, module.name, this.options.importExtension),
      name: spelling,
      kind: importKind(declaration)
    };
  }

  protected externImport(declaration: ExternDeclaration, binding: ExternBinding): ImportRequest {
    return { source: binding.module ?? '', name: binding.name.split('.')[0], kind: importKind(declaration) };
  }
}
