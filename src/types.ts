// Core IR definitions for the crossgen code generator

export type TargetLanguage = 'typescript' | 'python' | 'php';

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ['typescript', 'python', 'php'];

// Raised by builder calls whose local shape invariant is violated. These are
// caller bugs and are never turned into diagnostics.
export class StructuralError extends Error {
  constructor(message: string, public readonly operation?: string) {
    super(operation ? `${operation}: ${message}` : message);
    this.name = 'StructuralError';
  }
}

// Raised by a renderer that reaches a construct validation should have
// rejected. Signals a defect in the engine, not in the caller's model.
export class InternalConsistencyError extends Error {
  constructor(message: string, public readonly target: TargetLanguage, public readonly path?: IRPath) {
    super(path ? `[${target}] ${formatIRPath(path)}: ${message}` : `[${target}] ${message}`);
    this.name = 'InternalConsistencyError';
  }
}

// Path of a node from the module root, e.g. ['declarations', 0, 'body', 2, 'value']
export type IRPath = readonly (string | number)[];

export function formatIRPath(path: IRPath): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out.length === 0 ? '<module>' : out;
}

// Type system
export type PrimitiveName = 'int' | 'float' | 'string' | 'bool' | 'null' | 'void' | 'any';

export type Type =
  | PrimitiveTypeNode
  | OptionalTypeNode
  | SequenceTypeNode
  | MappingTypeNode
  | SetTypeNode
  | NamedTypeNode
  | FunctionTypeNode
  | UnionTypeNode
  | LiteralTypeNode
  | UnknownTypeNode;

export interface PrimitiveTypeNode {
  kind: 'primitive';
  name: PrimitiveName;
}

export interface OptionalTypeNode {
  kind: 'optional';
  inner: Type;
}

export interface SequenceTypeNode {
  kind: 'sequence';
  element: Type;
}

export interface MappingTypeNode {
  kind: 'mapping';
  key: Type;
  value: Type;
}

export interface SetTypeNode {
  kind: 'set';
  element: Type;
}

export interface NamedTypeNode {
  kind: 'named';
  name: string;
  typeArguments: readonly Type[];
}

export interface FunctionTypeNode {
  kind: 'function';
  parameters: readonly Type[];
  returnType: Type;
}

export interface UnionTypeNode {
  kind: 'union';
  members: readonly Type[];
}

export interface LiteralTypeNode {
  kind: 'literal';
  value: string | number | boolean;
}

// Inferred for references that failed to resolve; the builder never produces it
export interface UnknownTypeNode {
  kind: 'unknown';
}

// Expressions
export type Expression =
  | LiteralExpression
  | NameExpression
  | SelfExpression
  | MemberExpression
  | IndexExpression
  | CallExpression
  | InstantiateExpression
  | BinaryExpression
  | UnaryExpression
  | ConditionalExpression
  | SequenceLiteral
  | SetLiteral
  | MappingLiteral
  | LambdaExpression
  | TemplateExpression
  | CastExpression
  | LengthExpression
  | TypeTestExpression
  | OmitExpression;

export type LiteralValue = string | number | boolean | null;

export interface LiteralExpression {
  kind: 'literal';
  value: LiteralValue;
  literalType: 'int' | 'float' | 'string' | 'bool' | 'null';
}

export interface NameExpression {
  kind: 'name';
  name: string;
}

export interface SelfExpression {
  kind: 'self';
}

export interface MemberExpression {
  kind: 'member';
  object: Expression;
  property: string;
}

export interface IndexExpression {
  kind: 'index';
  object: Expression;
  index: Expression;
}

export interface CallArgument {
  name?: string;
  value: Expression;
}

export interface CallExpression {
  kind: 'call';
  callee: Expression;
  arguments: readonly CallArgument[];
}

export interface InstantiateExpression {
  kind: 'instantiate';
  type: NamedTypeNode;
  arguments: readonly CallArgument[];
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = 'and' | 'or';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;
export type UnaryOperator = 'not' | '-';

export interface BinaryExpression {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
}

export interface ConditionalExpression {
  kind: 'conditional';
  test: Expression;
  consequent: Expression;
  alternate: Expression;
}

export interface SequenceLiteral {
  kind: 'sequenceLiteral';
  elementType?: Type;
  elements: readonly Expression[];
}

export interface SetLiteral {
  kind: 'setLiteral';
  elementType?: Type;
  elements: readonly Expression[];
}

export interface MappingEntry {
  key: Expression;
  value: Expression;
}

export interface MappingLiteral {
  kind: 'mappingLiteral';
  keyType?: Type;
  valueType?: Type;
  entries: readonly MappingEntry[];
}

export interface LambdaParameter {
  name: string;
  type: Type;
}

export interface LambdaExpression {
  kind: 'lambda';
  parameters: readonly LambdaParameter[];
  returnType?: Type;
  body: Expression;
}

export interface TemplateExpression {
  kind: 'template';
  parts: readonly (string | Expression)[];
}

export interface CastExpression {
  kind: 'cast';
  type: Type;
  expression: Expression;
}

export interface LengthExpression {
  kind: 'length';
  target: Expression;
}

// Run-time checks of what a value holds; `omitted` asks whether an
// omittable parameter was left out
export type TypeTestKind = 'null' | 'bool' | 'int' | 'string' | 'list' | 'omitted';

export interface TypeTestExpression {
  kind: 'typeTest';
  tested: TypeTestKind;
  operand: Expression;
}

// The value of a left-out argument. As a parameter default it makes the
// parameter omittable; as an argument it leaves that parameter out.
export interface OmitExpression {
  kind: 'omit';
}

// Statements
export type Statement =
  | AssignStatement
  | VarDeclStatement
  | IfStatement
  | WhileStatement
  | ForEachStatement
  | ForEntriesStatement
  | ReturnStatement
  | RaiseStatement
  | ExpressionStatement
  | WithStatement
  | TryCatchStatement
  | AppendStatement
  | PassStatement
  | BreakStatement
  | ContinueStatement
  | CommentStatement;

export type AssignTarget = NameExpression | MemberExpression | IndexExpression;

export interface AssignStatement {
  kind: 'assign';
  target: AssignTarget;
  value: Expression;
}

export interface VarDeclStatement {
  kind: 'varDecl';
  name: string;
  type?: Type;
  value?: Expression;
  constant: boolean;
}

export interface IfBranch {
  condition: Expression;
  body: readonly Statement[];
}

export interface IfStatement {
  kind: 'if';
  branches: readonly IfBranch[];
  elseBody?: readonly Statement[];
}

export interface WhileStatement {
  kind: 'while';
  condition: Expression;
  body: readonly Statement[];
}

export interface ForEachStatement {
  kind: 'forEach';
  variable: string;
  variableType?: Type;
  iterable: Expression;
  body: readonly Statement[];
}

export interface ForEntriesStatement {
  kind: 'forEntries';
  keyVariable: string;
  valueVariable: string;
  mapping: Expression;
  body: readonly Statement[];
}

export interface ReturnStatement {
  kind: 'return';
  value?: Expression;
}

export interface RaiseStatement {
  kind: 'raise';
  errorClass?: string;
  message: Expression;
}

export interface ExpressionStatement {
  kind: 'expression';
  expression: Expression;
}

export interface WithStatement {
  kind: 'with';
  resource: Expression;
  binding?: string;
  body: readonly Statement[];
}

export interface CatchClause {
  errorClass?: string;
  binding?: string;
  body: readonly Statement[];
}

export interface TryCatchStatement {
  kind: 'tryCatch';
  body: readonly Statement[];
  catches: readonly CatchClause[];
  finallyBody?: readonly Statement[];
}

export interface AppendStatement {
  kind: 'append';
  target: Expression;
  value: Expression;
}

export interface PassStatement {
  kind: 'pass';
}

export interface BreakStatement {
  kind: 'break';
}

export interface ContinueStatement {
  kind: 'continue';
}

export interface CommentStatement {
  kind: 'comment';
  text: string;
}

// Declarations
export interface Parameter {
  name: string;
  type: Type;
  defaultValue?: Expression;
  keywordOnly: boolean;
}

export interface FunctionDeclaration {
  kind: 'function';
  name: string;
  parameters: readonly Parameter[];
  returnType: Type;
  body: readonly Statement[];
  isAsync: boolean;
  doc: readonly string[];
  exported: boolean;
}

export interface MethodDeclaration {
  kind: 'method';
  name: string;
  parameters: readonly Parameter[];
  returnType: Type;
  body: readonly Statement[];
  isAsync: boolean;
  isStatic: boolean;
  isAbstract: boolean;
  doc: readonly string[];
}

export interface FieldDeclaration {
  kind: 'field';
  name: string;
  type: Type;
  defaultValue?: Expression;
  initArg: boolean;
  readonly: boolean;
}

export interface ClassDeclaration {
  kind: 'class';
  name: string;
  typeParameters: readonly string[];
  bases: readonly NamedTypeNode[];
  fields: readonly FieldDeclaration[];
  methods: readonly MethodDeclaration[];
  isAbstract: boolean;
  doc: readonly string[];
  exported: boolean;
}

export interface ConstDeclaration {
  kind: 'const';
  name: string;
  type: Type;
  value: Expression;
  exported: boolean;
}

export interface TypeAliasDeclaration {
  kind: 'typeAlias';
  name: string;
  type: Type;
  distinct: boolean;
  exported: boolean;
}

export interface InterfaceProperty {
  name: string;
  type: Type;
  optional: boolean;
}

export interface InterfaceDeclaration {
  kind: 'interface';
  name: string;
  properties: readonly InterfaceProperty[];
  doc: readonly string[];
  exported: boolean;
}

// How a target spells an environment-provided symbol. `module` is the import
// source (npm package, Python module, PHP namespace); absent for builtins.
export interface ExternBinding {
  module?: string;
  name: string;
  // the target function writes no line end of its own, so calls add one to
  // their last argument
  appendLine?: boolean;
}

export interface ExternDeclaration {
  kind: 'extern';
  name: string;
  entity: 'value' | 'class';
  type: Type;
  bindings: Partial<Record<TargetLanguage, ExternBinding>>;
}

export type Declaration =
  | ClassDeclaration
  | FunctionDeclaration
  | ConstDeclaration
  | TypeAliasDeclaration
  | InterfaceDeclaration
  | ExternDeclaration;

export type FunctionLike = FunctionDeclaration | MethodDeclaration;

export interface Module {
  name: string;
  imports: readonly string[];
  declarations: readonly Declaration[];
  headerComments: readonly string[];
}

// Module lifecycle: Building -> Sealed -> Valid | Invalid
export interface SealedModule {
  readonly state: 'sealed';
  readonly module: Module;
}

// Construct kinds a renderer may or may not support
export type ConstructKind =
  | 'lambda'
  | 'named-argument'
  | 'keyword-only-parameter'
  | 'async-function'
  | 'multiple-inheritance'
  | 'interface'
  | 'optional-property'
  | 'type-alias'
  | 'distinct-type'
  | 'generic-class'
  | 'set-type'
  | 'cast'
  | 'scoped-resource'
  | 'complex-mapping-key'
  | 'circular-import'
  | 'function-value'
  | 'computed-constant'
  | 'uninitialized-variable'
  | 'extern-binding'
  | 'omittable-parameter';

export interface CapabilityProfile {
  target: TargetLanguage;
  capabilities: ReadonlySet<ConstructKind>;
}

// Diagnostics
export type DiagnosticKind = 'duplicate-name' | 'unresolved-reference' | 'type-mismatch' | 'unsupported-construct';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  path: IRPath;
  target?: TargetLanguage;
  construct?: ConstructKind;
  expected?: string;
  inferred?: string;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const target = diagnostic.target ? ` (${diagnostic.target})` : '';
  return `${formatIRPath(diagnostic.path)}: [${diagnostic.kind}]${target} ${diagnostic.message}`;
}

// Where a member access landed, recorded by the validator for renderers
export interface MemberResolution {
  module: string;
  className: string;
  member: 'field' | 'method' | 'property';
  isStatic: boolean;
}

export type MemberLookup = ReadonlyMap<string, MemberResolution>;
