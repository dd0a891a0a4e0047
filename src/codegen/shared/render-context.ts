// State shared by every renderer for the duration of one render call

import {
  ClassDeclaration, Declaration, ExternBinding, ExternDeclaration, InterfaceDeclaration, InternalConsistencyError,
  IRPath, MemberResolution, Module, TargetLanguage, Type, formatIRPath
} from '../../types';
import { commonTypes, expandAliases, literalBaseType } from '../../type-utils';
import { RenderOptions, RenderedFile } from '../../codegen-interface';
import { ValidatedModule } from '../../validation/validator';
import { ModuleSymbols, ResolvedSymbol } from '../../validation/symbols';
import { Printer } from '../../formatter/printer';
import { formatModule, IRListing } from '../../formatter';
import {
  IdentifierRules, NameAllocator, allocateDeclarationNames, allocateMemberNames, applyCase, sanitizeIdentifier
} from './naming';
import { ImportCollector, ImportKind } from './imports';
import { buildSourceMap, listingSourceName } from './source-map';

export interface TargetNamingRules {
  // module-level declarations and imports
  module: IdentifierRules;
  // parameters and locals
  local: IdentifierRules;
  // fields, methods and interface properties
  member: IdentifierRules;
}

export interface ImportRequest {
  source: string;
  name: string;
  kind: ImportKind;
}

export function importKind(declaration: Declaration): ImportKind {
  switch (declaration.kind) {
    case 'class':
      return 'class';
    case 'function':
      return 'function';
    case 'const':
      return 'constant';
    case 'extern':
      return declaration.entity === 'class' ? 'class' : 'value';
    default:
      return 'type';
  }
}

export abstract class RenderContext<O extends RenderOptions> {
  readonly module: Module;
  readonly symbols: ModuleSymbols;
  readonly moduleScope: NameAllocator;
  readonly imports: ImportCollector;
  printer: Printer;
  protected scope: NameAllocator;
  private readonly declarationNames: Map<string, string>;
  private readonly foreignNames = new Map<string, Map<string, string>>();
  private readonly memberNames = new Map<string, Map<string, string>>();
  private readonly typeParameterScopes: Array<ReadonlyMap<string, string>> = [];
  private listing?: IRListing;

  constructor(
    readonly validated: ValidatedModule,
    readonly options: O,
    readonly target: TargetLanguage,
    readonly rules: TargetNamingRules,
    private readonly maxBlankLines: number
  ) {
    const unsupported = validated.unsupported.get(target);
    if (unsupported) {
      throw new InternalConsistencyError(`module '${validated.module.name}' uses ${unsupported.length} unsupported construct(s)`, target);
    }
    this.module = validated.module;
    this.symbols = validated.symbols;
    this.moduleScope = new NameAllocator(rules.module);
    this.declarationNames = allocateDeclarationNames(
      this.module,
      this.moduleScope,
      options.naming,
      this.fixedSpellings(this.module)
    );
    this.scope = this.moduleScope;
    this.imports = new ImportCollector(this.moduleScope);
    this.printer = new Printer(options.indentSize, maxBlankLines);
  }

  // Spellings a module uses verbatim, such as builtins that externs bind to
  protected abstract fixedSpellings(module: Module): string[];

  // What importing `declaration` from `module` means in the target
  protected abstract importFor(module: Module, declaration: Declaration, spelling: string): ImportRequest;

  // The import an extern binding with a `module` needs
  protected abstract externImport(declaration: ExternDeclaration, binding: ExternBinding): ImportRequest;

  /**
   * Registers every import the module's references need, in the order the
   * validator met them. Runs once module-level names are allocated, so an
   * import that collides with a declaration is the one that gets aliased.
   */
  protected collectImports(): void {
    for (const resolved of this.validated.references.values()) {
      const declaration = resolved.declaration;
      if (declaration.kind === 'extern') {
        const binding = declaration.bindings[this.target];
        if (binding && binding.module !== undefined) {
          const request = this.externImport(declaration, binding);
          this.imports.add(request.source, request.name, request.kind);
        }
      } else if (resolved.imported) {
        const request = this.importFor(resolved.module, declaration, this.declarationNameIn(resolved.module, declaration.name));
        this.imports.add(request.source, request.name, request.kind);
      }
    }
  }

  // The configured header followed by the module's own header comments
  headerLines(): string[] {
    const configured = this.options.headerComment === undefined ? [] : this.options.headerComment.split('\n');
    return [...configured, ...this.module.headerComments];
  }

  newFile(): void {
    this.printer = new Printer(this.options.indentSize, this.maxBlankLines);
  }

  // Finishes the current file, adding its source map when enabled
  finishFile(path: string, into: RenderedFile[]): void {
    const content = this.printer.getResult({ trimTrailingWhitespace: true, insertFinalNewline: true });
    into.push({ path, content });
    if (this.options.sourceMap) {
      this.listing ??= formatModule(this.module);
      const file = path.split('/').pop() ?? path;
      into.push({
        path: `${path}.map`,
        content: buildSourceMap(file, listingSourceName(this.module.name), this.printer.getMarks(), this.listing)
      });
    }
  }

  mark(path: IRPath): void {
    this.printer.mark(path);
  }

  fail(message: string, path?: IRPath): never {
    throw new InternalConsistencyError(message, this.target, path);
  }

  typeOf(path: IRPath): Type {
    return this.validated.types.get(formatIRPath(path)) ?? commonTypes.any;
  }

  // The structural type behind aliases, distinct ones included
  underlyingType(type: Type): Type {
    let current = expandAliases(type, this.symbols);
    for (let depth = 0; depth < 32 && current.kind === 'named'; depth++) {
      const info = this.symbols.lookupNamed(current.name);
      if (!info || info.kind !== 'alias') {
        break;
      }
      current = expandAliases(info.aliased, this.symbols);
    }
    return current.kind === 'literal' ? literalBaseType(current) : current;
  }

  memberOf(path: IRPath): MemberResolution | undefined {
    return this.validated.members.get(formatIRPath(path));
  }

  referenceOf(path: IRPath): ResolvedSymbol | undefined {
    return this.validated.references.get(formatIRPath(path));
  }

  // Scopes
  withScope<T>(body: () => T): T {
    const outer = this.scope;
    this.scope = outer.child(this.rules.local);
    try {
      return body();
    } finally {
      this.scope = outer;
    }
  }

  // Runs `body` in a scope rooted somewhere other than the current one
  withRootScope<T>(root: NameAllocator, body: () => T): T {
    const outer = this.scope;
    this.scope = root;
    try {
      return body();
    } finally {
      this.scope = outer;
    }
  }

  declareLocal(name: string): string {
    return this.scope.declare(name, this.options.naming.values);
  }

  // Binds an IR name to a spelling decided elsewhere
  bindLocal(name: string, spelling: string): void {
    this.scope.bind(name, spelling);
  }

  freshLocal(base: string): string {
    return this.scope.fresh(base);
  }

  lookupLocal(name: string, path: IRPath): string {
    const spelling = this.scope.lookup(name);
    if (spelling === undefined) {
      return this.fail(`no local named '${name}' is in scope`, path);
    }
    return spelling;
  }

  // A name expression: the module-level symbol the validator resolved at
  // `path`, otherwise a local
  valueName(name: string, path: IRPath): string {
    const resolved = this.referenceOf(path);
    return resolved ? this.symbolName(resolved, path) : this.lookupLocal(name, path);
  }

  // Module-level names
  declarationName(name: string): string {
    const spelling = this.declarationNames.get(name);
    if (spelling === undefined) {
      return this.fail(`'${name}' is not declared in module '${this.module.name}'`);
    }
    return spelling;
  }

  // The spelling a module gives its own declaration, computed the way that
  // module's own render computes it
  declarationNameIn(module: Module, name: string): string {
    if (module.name === this.module.name) {
      return this.declarationName(name);
    }
    let names = this.foreignNames.get(module.name);
    if (!names) {
      names = allocateDeclarationNames(module, new NameAllocator(this.rules.module), this.options.naming, this.fixedSpellings(module));
      this.foreignNames.set(module.name, names);
    }
    const spelling = names.get(name);
    if (spelling === undefined) {
      return this.fail(`'${name}' is not declared in module '${module.name}'`);
    }
    return spelling;
  }

  // The spelling a module-level symbol has in this file
  symbolName(resolved: ResolvedSymbol, path?: IRPath): string {
    const declaration = resolved.declaration;
    if (declaration.kind === 'extern') {
      return this.externName(declaration, path);
    }
    if (!resolved.imported) {
      return this.declarationName(declaration.name);
    }
    const request = this.importFor(resolved.module, declaration, this.declarationNameIn(resolved.module, declaration.name));
    const local = this.imports.lookup(request.source, request.name);
    if (local === undefined) {
      return this.fail(`'${declaration.name}' from '${resolved.module.name}' was never imported`, path);
    }
    return local;
  }

  externBinding(declaration: ExternDeclaration, path?: IRPath): ExternBinding {
    const binding = declaration.bindings[this.target];
    if (!binding) {
      return this.fail(`extern '${declaration.name}' has no ${this.target} binding`, path);
    }
    return binding;
  }

  // Whether the callee at `calleePath` is an extern whose binding needs a line end after its last argument
  appendsLine(calleePath: IRPath): boolean {
    const declaration = this.referenceOf(calleePath)?.declaration;
    return declaration?.kind === 'extern' && declaration.bindings[this.target]?.appendLine === true;
  }

  externName(declaration: ExternDeclaration, path?: IRPath): string {
    const binding = this.externBinding(declaration, path);
    if (binding.module === undefined) {
      return this.builtinExternName(declaration, binding);
    }
    const request = this.externImport(declaration, binding);
    const local = this.imports.lookup(request.source, request.name);
    if (local === undefined) {
      return this.fail(`extern '${declaration.name}' was never imported`, path);
    }
    // 'path.join' imports 'path' and keeps the member access
    return binding.name.startsWith(request.name) ? local + binding.name.slice(request.name.length) : local;
  }

  protected builtinExternName(_declaration: ExternDeclaration, binding: ExternBinding): string {
    return binding.name;
  }

  withTypeParameters<T>(spellings: ReadonlyMap<string, string>, body: () => T): T {
    this.typeParameterScopes.push(spellings);
    try {
      return body();
    } finally {
      this.typeParameterScopes.pop();
    }
  }

  typeParameterName(name: string): string | undefined {
    for (let i = this.typeParameterScopes.length - 1; i >= 0; i--) {
      const spelling = this.typeParameterScopes[i].get(name);
      if (spelling !== undefined) {
        return spelling;
      }
    }
    return undefined;
  }

  // Resolves a type name written in the IR to its spelling in this file
  typeName(name: string, path?: IRPath): string {
    const parameter = this.typeParameterName(name);
    if (parameter !== undefined) {
      return parameter;
    }
    const resolved = this.symbols.lookup(name);
    if (!resolved) {
      return this.fail(`type '${name}' does not resolve`, path);
    }
    return this.symbolName(resolved, path);
  }

  // Members
  memberName(resolution: MemberResolution | undefined, property: string): string {
    if (!resolution) {
      return sanitizeIdentifier(applyCase(property, this.options.naming.values), this.rules.member);
    }
    const owner = this.ownerDeclaration(resolution);
    return this.memberNamesOf(resolution.module, owner).get(property)
      ?? sanitizeIdentifier(applyCase(property, this.options.naming.values), this.rules.member);
  }

  memberNamesOf(moduleName: string, owner: ClassDeclaration | InterfaceDeclaration): Map<string, string> {
    const key = `${moduleName}:${owner.name}`;
    let names = this.memberNames.get(key);
    if (!names) {
      const members = owner.kind === 'class' ? [...owner.fields, ...owner.methods] : owner.properties;
      names = allocateMemberNames(members, this.rules.member, this.options.naming.values);
      this.memberNames.set(key, names);
    }
    return names;
  }

  // The class or interface that declares a resolved member
  ownerDeclaration(resolution: MemberResolution): ClassDeclaration | InterfaceDeclaration {
    const { module: moduleName, className } = resolution;
    const module = moduleName === this.module.name ? this.module : this.symbols.available.get(moduleName);
    const declaration = module?.declarations.find(d => d.name === className);
    if (!declaration || (declaration.kind !== 'class' && declaration.kind !== 'interface')) {
      return this.fail(`member owner '${moduleName}.${className}' not found`);
    }
    return declaration;
  }
}
