// Module, class and function builders: the only way IR is assembled

import {
  Module, Declaration, SealedModule, Parameter, FunctionDeclaration, MethodDeclaration, FieldDeclaration,
  ClassDeclaration, InterfaceDeclaration, InterfaceProperty, ExternDeclaration, ExternBinding, NamedTypeNode,
  NameExpression, MemberExpression, TargetLanguage, Type, StructuralError
} from '../types';
import { commonTypes, createNamedType } from '../type-utils';
import { BlockBuilder, BuildState, assertBuilding } from './block-builder';
import { ExpressionLike, assertName, member, omit, ref, self, toExpression } from './expressions';

export interface FunctionOptions {
  returns?: Type;
  isAsync?: boolean;
  doc?: readonly string[];
  exported?: boolean;
}

export interface MethodOptions extends Omit<FunctionOptions, 'exported'> {
  isStatic?: boolean;
  isAbstract?: boolean;
}

export interface ParameterOptions {
  default?: ExpressionLike;
  keywordOnly?: boolean;
  // callers may leave the parameter out, even when passing later ones
  omittable?: boolean;
}

export class FunctionBuilder {
  readonly body: BlockBuilder;
  private readonly parameters: Parameter[] = [];
  private readonly doc: string[];

  constructor(
    private readonly state: BuildState,
    readonly name: string,
    private readonly options: MethodOptions & { exported?: boolean }
  ) {
    this.body = new BlockBuilder(state);
    this.doc = [...(options.doc ?? [])];
  }

  param(name: string, type: Type, options: ParameterOptions = {}): NameExpression {
    assertBuilding(this.state, 'param');
    assertName(name, 'param');
    const keywordOnly = options.keywordOnly ?? false;
    const parameter: Parameter = { name, type, keywordOnly };
    if (options.omittable) {
      if (options.default !== undefined) {
        throw new StructuralError(`omittable parameter '${name}' cannot have a default`, 'param');
      }
      parameter.defaultValue = omit();
    } else if (options.default !== undefined) {
      parameter.defaultValue = toExpression(options.default, 'param');
    }
    if (!keywordOnly) {
      if (this.parameters.some(p => p.keywordOnly)) {
        throw new StructuralError(`positional parameter '${name}' follows a keyword-only parameter`, 'param');
      }
      if (!parameter.defaultValue && this.parameters.some(p => p.defaultValue)) {
        throw new StructuralError(`required parameter '${name}' follows a parameter with a default`, 'param');
      }
    }
    this.parameters.push(parameter);
    return ref(name);
  }

  docLine(text: string): this {
    assertBuilding(this.state, 'docLine');
    this.doc.push(text);
    return this;
  }

  buildFunction(): FunctionDeclaration {
    return {
      kind: 'function',
      name: this.name,
      parameters: this.parameters,
      returnType: this.options.returns ?? commonTypes.void,
      body: this.body.build(),
      isAsync: this.options.isAsync ?? false,
      doc: this.doc,
      exported: this.options.exported ?? true
    };
  }

  buildMethod(): MethodDeclaration {
    const isAbstract = this.options.isAbstract ?? false;
    const body = this.body.build();
    if (isAbstract && body.length > 0) {
      throw new StructuralError(`abstract method '${this.name}' cannot have a body`, 'method');
    }
    return {
      kind: 'method',
      name: this.name,
      parameters: this.parameters,
      returnType: this.options.returns ?? commonTypes.void,
      body,
      isAsync: this.options.isAsync ?? false,
      isStatic: this.options.isStatic ?? false,
      isAbstract,
      doc: this.doc
    };
  }
}

export interface ClassOptions {
  typeParameters?: readonly string[];
  bases?: readonly NamedTypeNode[];
  isAbstract?: boolean;
  doc?: readonly string[];
  exported?: boolean;
}

export interface FieldOptions {
  default?: ExpressionLike;
  initArg?: boolean;
  readonly?: boolean;
}

export class ClassBuilder {
  private readonly fields: FieldDeclaration[] = [];
  private readonly methods: FunctionBuilder[] = [];

  constructor(private readonly state: BuildState, readonly name: string, private readonly options: ClassOptions) {
    for (const parameter of options.typeParameters ?? []) {
      assertName(parameter, 'class');
    }
  }

  // The class's own type, parameterised by its type parameters
  get type(): NamedTypeNode {
    return createNamedType(this.name, (this.options.typeParameters ?? []).map(p => createNamedType(p)));
  }

  field(name: string, type: Type, options: FieldOptions = {}): MemberExpression {
    assertBuilding(this.state, 'field');
    assertName(name, 'field');
    const field: FieldDeclaration = {
      kind: 'field',
      name,
      type,
      initArg: options.initArg ?? false,
      readonly: options.readonly ?? false
    };
    if (options.default !== undefined) {
      field.defaultValue = toExpression(options.default, 'field');
    }
    this.fields.push(field);
    return member(self(), name);
  }

  method(name: string, options: MethodOptions = {}): FunctionBuilder {
    assertBuilding(this.state, 'method');
    assertName(name, 'method');
    if (options.isAbstract && !this.options.isAbstract) {
      throw new StructuralError(`abstract method '${name}' in non-abstract class '${this.name}'`, 'method');
    }
    const builder = new FunctionBuilder(this.state, name, options);
    this.methods.push(builder);
    return builder;
  }

  build(): ClassDeclaration {
    return {
      kind: 'class',
      name: this.name,
      typeParameters: [...(this.options.typeParameters ?? [])],
      bases: [...(this.options.bases ?? [])],
      fields: this.fields,
      methods: this.methods.map(m => m.buildMethod()),
      isAbstract: this.options.isAbstract ?? false,
      doc: [...(this.options.doc ?? [])],
      exported: this.options.exported ?? true
    };
  }
}

export class InterfaceBuilder {
  private readonly properties: InterfaceProperty[] = [];

  constructor(
    private readonly state: BuildState,
    readonly name: string,
    private readonly options: { doc?: readonly string[]; exported?: boolean }
  ) {}

  property(name: string, type: Type, options: { optional?: boolean } = {}): this {
    assertBuilding(this.state, 'property');
    this.properties.push({ name: assertName(name, 'property'), type, optional: options.optional ?? false });
    return this;
  }

  build(): InterfaceDeclaration {
    return {
      kind: 'interface',
      name: this.name,
      properties: this.properties,
      doc: [...(this.options.doc ?? [])],
      exported: this.options.exported ?? true
    };
  }
}

export interface ExternOptions {
  entity?: 'value' | 'class';
  type?: Type;
  bindings: Partial<Record<TargetLanguage, ExternBinding>>;
}

type DeclarationSource = Declaration | FunctionBuilder | ClassBuilder | InterfaceBuilder;

export class ModuleBuilder {
  private readonly state: BuildState = { sealed: false };
  private readonly imports: string[] = [];
  private readonly headerComments: string[] = [];
  private readonly declarations: DeclarationSource[] = [];

  constructor(readonly name: string, options: { imports?: readonly string[]; headerComments?: readonly string[] } = {}) {
    assertName(name, 'module');
    for (const imported of options.imports ?? []) {
      this.import(imported);
    }
    for (const comment of options.headerComments ?? []) {
      this.headerComment(comment);
    }
  }

  get isSealed(): boolean {
    return this.state.sealed;
  }

  import(moduleName: string): this {
    assertBuilding(this.state, 'import');
    assertName(moduleName, 'import');
    if (!this.imports.includes(moduleName)) {
      this.imports.push(moduleName);
    }
    return this;
  }

  headerComment(text: string): this {
    assertBuilding(this.state, 'headerComment');
    this.headerComments.push(text);
    return this;
  }

  class(name: string, options: ClassOptions = {}): ClassBuilder {
    assertBuilding(this.state, 'class');
    const builder = new ClassBuilder(this.state, assertName(name, 'class'), options);
    this.declarations.push(builder);
    return builder;
  }

  function(name: string, options: FunctionOptions = {}): FunctionBuilder {
    assertBuilding(this.state, 'function');
    const builder = new FunctionBuilder(this.state, assertName(name, 'function'), options);
    this.declarations.push(builder);
    return builder;
  }

  const(name: string, type: Type, value: ExpressionLike, options: { exported?: boolean } = {}): NameExpression {
    assertBuilding(this.state, 'const');
    this.declarations.push({
      kind: 'const',
      name: assertName(name, 'const'),
      type,
      value: toExpression(value, 'const'),
      exported: options.exported ?? true
    });
    return ref(name);
  }

  typeAlias(name: string, type: Type, options: { distinct?: boolean; exported?: boolean } = {}): NamedTypeNode {
    assertBuilding(this.state, 'typeAlias');
    this.declarations.push({
      kind: 'typeAlias',
      name: assertName(name, 'typeAlias'),
      type,
      distinct: options.distinct ?? false,
      exported: options.exported ?? true
    });
    return createNamedType(name);
  }

  interface(name: string, options: { doc?: readonly string[]; exported?: boolean } = {}): InterfaceBuilder {
    assertBuilding(this.state, 'interface');
    const builder = new InterfaceBuilder(this.state, assertName(name, 'interface'), options);
    this.declarations.push(builder);
    return builder;
  }

  extern(name: string, options: ExternOptions): NameExpression {
    assertBuilding(this.state, 'extern');
    const declaration: ExternDeclaration = {
      kind: 'extern',
      name: assertName(name, 'extern'),
      entity: options.entity ?? 'value',
      type: options.type ?? commonTypes.any,
      bindings: { ...options.bindings }
    };
    for (const binding of Object.values(declaration.bindings)) {
      if (binding) {
        assertName(binding.name, 'extern');
      }
    }
    this.declarations.push(declaration);
    return ref(name);
  }

  // Freezes the whole tree; every later builder call throws
  seal(): SealedModule {
    assertBuilding(this.state, 'seal');
    const module: Module = {
      name: this.name,
      imports: [...this.imports],
      declarations: this.declarations.map(buildDeclaration),
      headerComments: [...this.headerComments]
    };
    this.state.sealed = true;
    const sealed: SealedModule = { state: 'sealed', module };
    return deepFreeze(sealed);
  }
}

function buildDeclaration(source: DeclarationSource): Declaration {
  if (source instanceof FunctionBuilder) {
    return source.buildFunction();
  }
  if (source instanceof ClassBuilder || source instanceof InterfaceBuilder) {
    return source.build();
  }
  return source;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
