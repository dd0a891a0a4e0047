// Expression and type factories for the builder API

import {
  Expression, LiteralExpression, LiteralValue, NameExpression, SelfExpression, MemberExpression, IndexExpression,
  CallExpression, CallArgument, InstantiateExpression, BinaryExpression, BinaryOperator, UnaryExpression,
  ConditionalExpression, SequenceLiteral, SetLiteral, MappingLiteral, MappingEntry, LambdaExpression,
  LambdaParameter, TemplateExpression, CastExpression, LengthExpression, NamedTypeNode, Type, StructuralError,
  TypeTestExpression, TypeTestKind, OmitExpression
} from '../types';
import {
  commonTypes, createOptionalType, createSequenceType, createSetType, createMappingType, createNamedType,
  createFunctionType, createUnionType, createLiteralType
} from '../type-utils';

// Raw JS values are accepted wherever an operand is expected and become literals
export type ExpressionLike = Expression | string | number | boolean | null;

export class NamedArgument {
  constructor(public readonly name: string, public readonly value: Expression) {}
}

export type ArgumentLike = ExpressionLike | NamedArgument;

const EXPRESSION_KINDS: ReadonlySet<string> = new Set<Expression['kind']>([
  'literal', 'name', 'self', 'member', 'index', 'call', 'instantiate', 'binary', 'unary', 'conditional',
  'sequenceLiteral', 'setLiteral', 'mappingLiteral', 'lambda', 'template', 'cast', 'length', 'typeTest', 'omit'
]);

export function isExpression(value: unknown): value is Expression {
  return typeof value === 'object'
    && value !== null
    && 'kind' in value
    && typeof value.kind === 'string'
    && EXPRESSION_KINDS.has(value.kind);
}

export function assertName(name: string, operation: string): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new StructuralError('name must be a non-empty identifier', operation);
  }
  return name;
}

export function toExpression(value: ExpressionLike, operation: string): Expression {
  if (value === null) {
    return nul();
  }
  switch (typeof value) {
    case 'string':
      return str(value);
    case 'number':
      return Number.isInteger(value) ? int(value) : float(value);
    case 'boolean':
      return bool(value);
    default:
      if (isExpression(value)) {
        return value;
      }
      throw new StructuralError('operand is not an expression', operation);
  }
}

// Type factories
export const t = {
  int: commonTypes.int,
  float: commonTypes.float,
  string: commonTypes.string,
  bool: commonTypes.bool,
  null: commonTypes.null,
  void: commonTypes.void,
  any: commonTypes.any,
  optional: createOptionalType,
  list: createSequenceType,
  set: createSetType,
  map: createMappingType,
  named: (name: string, ...typeArguments: Type[]): NamedTypeNode => createNamedType(name, typeArguments),
  fn: createFunctionType,
  union: (...members: Type[]) => createUnionType(members),
  literal: createLiteralType
};

// Literals
// Integers beyond 2^53 - 1 cannot be written exactly as a JavaScript number
export function int(value: number): LiteralExpression {
  if (!Number.isInteger(value)) {
    throw new StructuralError(`${value} is not an integer`, 'int');
  }
  if (!Number.isSafeInteger(value)) {
    throw new StructuralError(`${value} is outside the safe integer range`, 'int');
  }
  return { kind: 'literal', value, literalType: 'int' };
}

export function float(value: number): LiteralExpression {
  if (!Number.isFinite(value)) {
    throw new StructuralError(`${value} is not a finite number`, 'float');
  }
  return { kind: 'literal', value, literalType: 'float' };
}

export function str(value: string): LiteralExpression {
  return { kind: 'literal', value, literalType: 'string' };
}

export function bool(value: boolean): LiteralExpression {
  return { kind: 'literal', value, literalType: 'bool' };
}

export function nul(): LiteralExpression {
  return { kind: 'literal', value: null, literalType: 'null' };
}

export function literal(value: LiteralValue): LiteralExpression {
  const expression = toExpression(value, 'literal');
  if (expression.kind !== 'literal') {
    throw new StructuralError('value is not a literal', 'literal');
  }
  return expression;
}

// References
export function ref(name: string): NameExpression {
  return { kind: 'name', name: assertName(name, 'ref') };
}

export function self(): SelfExpression {
  return { kind: 'self' };
}

export function member(object: ExpressionLike, property: string): MemberExpression {
  return { kind: 'member', object: toExpression(object, 'member'), property: assertName(property, 'member') };
}

export function index(object: ExpressionLike, key: ExpressionLike): IndexExpression {
  return { kind: 'index', object: toExpression(object, 'index'), index: toExpression(key, 'index') };
}

// Calls

export function arg(name: string, value: ExpressionLike): NamedArgument {
  return new NamedArgument(assertName(name, 'arg'), toExpression(value, 'arg'));
}

function buildArguments(args: readonly ArgumentLike[], operation: string): CallArgument[] {
  const result: CallArgument[] = [];
  const seen = new Set<string>();
  for (const item of args) {
    if (item instanceof NamedArgument) {
      if (seen.has(item.name)) {
        throw new StructuralError(`duplicate named argument '${item.name}'`, operation);
      }
      seen.add(item.name);
      result.push({ name: item.name, value: item.value });
    } else {
      if (seen.size > 0) {
        throw new StructuralError('positional argument follows a named argument', operation);
      }
      result.push({ value: toExpression(item, operation) });
    }
  }
  return result;
}

/**
 * Builds a call. A string callee names a function; everywhere else a string
 * operand is a string literal.
 */
export function call(callee: Expression | string, args: readonly ArgumentLike[] = []): CallExpression {
  const target = typeof callee === 'string' ? ref(callee) : callee;
  if (!isExpression(target)) {
    throw new StructuralError('callee is not an expression', 'call');
  }
  return { kind: 'call', callee: target, arguments: buildArguments(args, 'call') };
}

export function instantiate(type: NamedTypeNode | string, args: readonly ArgumentLike[] = []): InstantiateExpression {
  const named = typeof type === 'string' ? createNamedType(type) : type;
  if (named.kind !== 'named') {
    throw new StructuralError('only named types can be instantiated', 'instantiate');
  }
  return { kind: 'instantiate', type: named, arguments: buildArguments(args, 'instantiate') };
}

// Operators
export function binary(operator: BinaryOperator, left: ExpressionLike, right: ExpressionLike): BinaryExpression {
  return {
    kind: 'binary',
    operator,
    left: toExpression(left, operator),
    right: toExpression(right, operator)
  };
}

export const add = (left: ExpressionLike, right: ExpressionLike) => binary('+', left, right);
export const sub = (left: ExpressionLike, right: ExpressionLike) => binary('-', left, right);
export const mul = (left: ExpressionLike, right: ExpressionLike) => binary('*', left, right);
export const div = (left: ExpressionLike, right: ExpressionLike) => binary('/', left, right);
export const mod = (left: ExpressionLike, right: ExpressionLike) => binary('%', left, right);
export const eq = (left: ExpressionLike, right: ExpressionLike) => binary('==', left, right);
export const ne = (left: ExpressionLike, right: ExpressionLike) => binary('!=', left, right);
export const lt = (left: ExpressionLike, right: ExpressionLike) => binary('<', left, right);
export const le = (left: ExpressionLike, right: ExpressionLike) => binary('<=', left, right);
export const gt = (left: ExpressionLike, right: ExpressionLike) => binary('>', left, right);
export const ge = (left: ExpressionLike, right: ExpressionLike) => binary('>=', left, right);
export const and = (left: ExpressionLike, right: ExpressionLike) => binary('and', left, right);
export const or = (left: ExpressionLike, right: ExpressionLike) => binary('or', left, right);

export function not(operand: ExpressionLike): UnaryExpression {
  return { kind: 'unary', operator: 'not', operand: toExpression(operand, 'not') };
}

export function neg(operand: ExpressionLike): UnaryExpression {
  return { kind: 'unary', operator: '-', operand: toExpression(operand, 'neg') };
}

export function ternary(test: ExpressionLike, consequent: ExpressionLike, alternate: ExpressionLike): ConditionalExpression {
  return {
    kind: 'conditional',
    test: toExpression(test, 'ternary'),
    consequent: toExpression(consequent, 'ternary'),
    alternate: toExpression(alternate, 'ternary')
  };
}

// Collections
export function list(elements: readonly ExpressionLike[], elementType?: Type): SequenceLiteral {
  if (elements.length === 0 && !elementType) {
    throw new StructuralError('an empty sequence literal needs an element type', 'list');
  }
  const literal: SequenceLiteral = { kind: 'sequenceLiteral', elements: elements.map(e => toExpression(e, 'list')) };
  if (elementType) {
    literal.elementType = elementType;
  }
  return literal;
}

export function set(elements: readonly ExpressionLike[], elementType?: Type): SetLiteral {
  if (elements.length === 0 && !elementType) {
    throw new StructuralError('an empty set literal needs an element type', 'set');
  }
  const literal: SetLiteral = { kind: 'setLiteral', elements: elements.map(e => toExpression(e, 'set')) };
  if (elementType) {
    literal.elementType = elementType;
  }
  return literal;
}

export function dict(
  entries: ReadonlyArray<readonly [ExpressionLike, ExpressionLike]>,
  keyType?: Type,
  valueType?: Type
): MappingLiteral {
  if (entries.length === 0 && (!keyType || !valueType)) {
    throw new StructuralError('an empty mapping literal needs key and value types', 'dict');
  }
  const built: MappingEntry[] = entries.map(([key, value]) => ({
    key: toExpression(key, 'dict'),
    value: toExpression(value, 'dict')
  }));
  const literal: MappingLiteral = { kind: 'mappingLiteral', entries: built };
  if (keyType) {
    literal.keyType = keyType;
  }
  if (valueType) {
    literal.valueType = valueType;
  }
  return literal;
}

// Functions and conversions
export function lambda(
  parameters: ReadonlyArray<readonly [string, Type]>,
  body: ExpressionLike,
  returnType?: Type
): LambdaExpression {
  const params: LambdaParameter[] = parameters.map(([name, type]) => ({ name: assertName(name, 'lambda'), type }));
  const expression: LambdaExpression = { kind: 'lambda', parameters: params, body: toExpression(body, 'lambda') };
  if (returnType) {
    expression.returnType = returnType;
  }
  return expression;
}

/**
 * String interpolation. Plain strings are literal text; every other part is
 * converted to text by the target's own rules.
 */
export function template(...parts: ReadonlyArray<string | Expression>): TemplateExpression {
  const built: Array<string | Expression> = [];
  for (const part of parts) {
    if (typeof part === 'string') {
      const last = built[built.length - 1];
      // adjacent text parts are merged
      if (typeof last === 'string') {
        built[built.length - 1] = last + part;
      } else if (part.length > 0) {
        built.push(part);
      }
    } else {
      built.push(toExpression(part, 'template'));
    }
  }
  return { kind: 'template', parts: built };
}

export function cast(type: Type, expression: ExpressionLike): CastExpression {
  return { kind: 'cast', type, expression: toExpression(expression, 'cast') };
}

export function len(target: ExpressionLike): LengthExpression {
  return { kind: 'length', target: toExpression(target, 'len') };
}

// Run-time type tests
function typeTest(tested: TypeTestKind, operand: ExpressionLike, operation: string): TypeTestExpression {
  return { kind: 'typeTest', tested, operand: toExpression(operand, operation) };
}

export const isNull = (operand: ExpressionLike) => typeTest('null', operand, 'isNull');
export const isBool = (operand: ExpressionLike) => typeTest('bool', operand, 'isBool');
export const isInt = (operand: ExpressionLike) => typeTest('int', operand, 'isInt');
export const isStr = (operand: ExpressionLike) => typeTest('string', operand, 'isStr');
export const isList = (operand: ExpressionLike) => typeTest('list', operand, 'isList');
export const isOmitted = (operand: ExpressionLike) => typeTest('omitted', operand, 'isOmitted');

// An argument left out, for a parameter declared omittable
export function omit(): OmitExpression {
  return { kind: 'omit' };
}
