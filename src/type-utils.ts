import {
  Type, PrimitiveName, PrimitiveTypeNode, OptionalTypeNode, SequenceTypeNode, MappingTypeNode, SetTypeNode,
  NamedTypeNode, FunctionTypeNode, UnionTypeNode, LiteralTypeNode, UnknownTypeNode, StructuralError
} from './types';

// Cache commonly used types to avoid repeated creation
export const commonTypes = {
  int: { kind: 'primitive', name: 'int' },
  float: { kind: 'primitive', name: 'float' },
  string: { kind: 'primitive', name: 'string' },
  bool: { kind: 'primitive', name: 'bool' },
  null: { kind: 'primitive', name: 'null' },
  void: { kind: 'primitive', name: 'void' },
  any: { kind: 'primitive', name: 'any' },
  unknown: { kind: 'unknown' }
} as const satisfies Record<PrimitiveName, PrimitiveTypeNode> & { unknown: UnknownTypeNode };

export function createPrimitiveType(name: PrimitiveName): PrimitiveTypeNode {
  return commonTypes[name];
}

export function createUnknownType(): UnknownTypeNode {
  return commonTypes.unknown;
}

export function createOptionalType(inner: Type): Type {
  // T?? is T?, and null? is null
  if (inner.kind === 'optional' || isPrimitive(inner, 'null')) {
    return inner;
  }
  const optional: OptionalTypeNode = { kind: 'optional', inner };
  return optional;
}

export function createSequenceType(element: Type): SequenceTypeNode {
  return { kind: 'sequence', element };
}

export function createSetType(element: Type): SetTypeNode {
  return { kind: 'set', element };
}

export function createMappingType(key: Type, value: Type): MappingTypeNode {
  return { kind: 'mapping', key, value };
}

export function createNamedType(name: string, typeArguments: readonly Type[] = []): NamedTypeNode {
  if (name.trim().length === 0) {
    throw new StructuralError('named type requires a non-empty identifier', 'named');
  }
  return { kind: 'named', name, typeArguments: [...typeArguments] };
}

export function createFunctionType(parameters: readonly Type[], returnType: Type): FunctionTypeNode {
  return { kind: 'function', parameters: [...parameters], returnType };
}

export function createUnionType(members: readonly Type[]): UnionTypeNode {
  if (members.length < 2) {
    throw new StructuralError(`union requires at least two members, got ${members.length}`, 'union');
  }
  return { kind: 'union', members: [...members] };
}

export function createLiteralType(value: string | number | boolean): LiteralTypeNode {
  return { kind: 'literal', value };
}

export function isPrimitive(type: Type, name: PrimitiveName): boolean {
  return type.kind === 'primitive' && type.name === name;
}

export function isDynamic(type: Type): boolean {
  return type.kind === 'unknown' || isPrimitive(type, 'any');
}

export function isNumeric(type: Type): boolean {
  if (type.kind === 'literal') {
    return typeof type.value === 'number';
  }
  return isPrimitive(type, 'int') || isPrimitive(type, 'float');
}

export function isStringLike(type: Type): boolean {
  if (type.kind === 'literal') {
    return typeof type.value === 'string';
  }
  return isPrimitive(type, 'string');
}

export function isBooleanLike(type: Type): boolean {
  if (type.kind === 'literal') {
    return typeof type.value === 'boolean';
  }
  return isPrimitive(type, 'bool');
}

// Base primitive of a literal type: "a" -> string, 1 -> int, 1.5 -> float
export function literalBaseType(type: LiteralTypeNode): PrimitiveTypeNode {
  switch (typeof type.value) {
    case 'string':
      return commonTypes.string;
    case 'boolean':
      return commonTypes.bool;
    default:
      return Number.isInteger(type.value) ? commonTypes.int : commonTypes.float;
  }
}

export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'unknown':
      return b.kind === 'unknown';
    case 'optional':
      return b.kind === 'optional' && typesEqual(a.inner, b.inner);
    case 'sequence':
      return b.kind === 'sequence' && typesEqual(a.element, b.element);
    case 'set':
      return b.kind === 'set' && typesEqual(a.element, b.element);
    case 'mapping':
      return b.kind === 'mapping' && typesEqual(a.key, b.key) && typesEqual(a.value, b.value);
    case 'named':
      return b.kind === 'named' && a.name === b.name && typeListsEqual(a.typeArguments, b.typeArguments);
    case 'function':
      return b.kind === 'function' && typesEqual(a.returnType, b.returnType) && typeListsEqual(a.parameters, b.parameters);
    case 'union':
      return b.kind === 'union' && typeListsEqual(a.members, b.members);
    case 'literal':
      return b.kind === 'literal' && a.value === b.value;
  }
}

function typeListsEqual(a: readonly Type[], b: readonly Type[]): boolean {
  return a.length === b.length && a.every((type, i) => typesEqual(type, b[i]));
}

// Replaces named references to type parameters, e.g. T -> int in Box<T>
export function substituteTypeParameters(type: Type, mapping: ReadonlyMap<string, Type>): Type {
  if (mapping.size === 0) {
    return type;
  }
  switch (type.kind) {
    case 'named': {
      const replacement = type.typeArguments.length === 0 ? mapping.get(type.name) : undefined;
      if (replacement) {
        return replacement;
      }
      return { ...type, typeArguments: type.typeArguments.map(arg => substituteTypeParameters(arg, mapping)) };
    }
    case 'optional':
      return { kind: 'optional', inner: substituteTypeParameters(type.inner, mapping) };
    case 'sequence':
      return { kind: 'sequence', element: substituteTypeParameters(type.element, mapping) };
    case 'set':
      return { kind: 'set', element: substituteTypeParameters(type.element, mapping) };
    case 'mapping':
      return {
        kind: 'mapping',
        key: substituteTypeParameters(type.key, mapping),
        value: substituteTypeParameters(type.value, mapping)
      };
    case 'function':
      return {
        kind: 'function',
        parameters: type.parameters.map(param => substituteTypeParameters(param, mapping)),
        returnType: substituteTypeParameters(type.returnType, mapping)
      };
    case 'union':
      return { kind: 'union', members: type.members.map(member => substituteTypeParameters(member, mapping)) };
    default:
      return type;
  }
}

export function typeParameterMapping(parameters: readonly string[], args: readonly Type[]): Map<string, Type> {
  const mapping = new Map<string, Type>();
  parameters.forEach((name, i) => {
    mapping.set(name, args[i] ?? commonTypes.any);
  });
  return mapping;
}

// Neutral spelling used in diagnostics and the IR listing
export function typeToString(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'unknown':
      return 'unknown';
    case 'optional': {
      const inner = typeToString(type.inner);
      return type.inner.kind === 'function' || type.inner.kind === 'union' ? `(${inner})?` : `${inner}?`;
    }
    case 'sequence':
      return `Sequence<${typeToString(type.element)}>`;
    case 'set':
      return `Set<${typeToString(type.element)}>`;
    case 'mapping':
      return `Mapping<${typeToString(type.key)}, ${typeToString(type.value)}>`;
    case 'named':
      return type.typeArguments.length === 0
        ? type.name
        : `${type.name}<${type.typeArguments.map(typeToString).join(', ')}>`;
    case 'function':
      return `(${type.parameters.map(typeToString).join(', ')}) -> ${typeToString(type.returnType)}`;
    case 'union':
      return type.members.map(typeToString).join(' | ');
    case 'literal':
      return typeof type.value === 'string' ? JSON.stringify(type.value) : String(type.value);
  }
}

// What the assignability check needs to know about a named type
export type NamedTypeInfo =
  | { kind: 'class'; typeParameters: readonly string[]; supertypes: readonly NamedTypeNode[] }
  | { kind: 'interface' }
  | { kind: 'alias'; aliased: Type; distinct: boolean }
  | { kind: 'typeParameter' }
  | { kind: 'extern' };

export interface TypeEnvironment {
  lookupNamed(name: string): NamedTypeInfo | undefined;
}

export const EMPTY_TYPE_ENVIRONMENT: TypeEnvironment = {
  lookupNamed: () => undefined
};

const MAX_ALIAS_DEPTH = 32;

// Replaces transparent (non-distinct) aliases by the type they name
export function expandAliases(type: Type, env: TypeEnvironment): Type {
  let current = type;
  for (let depth = 0; depth < MAX_ALIAS_DEPTH && current.kind === 'named'; depth++) {
    const info = env.lookupNamed(current.name);
    if (!info || info.kind !== 'alias' || info.distinct) {
      break;
    }
    current = info.aliased;
  }
  return current;
}

// Direct supertypes of a named type, with its type arguments substituted
export function directSupertypes(type: NamedTypeNode, env: TypeEnvironment): NamedTypeNode[] {
  const info = env.lookupNamed(type.name);
  if (!info || info.kind !== 'class') {
    return [];
  }
  const mapping = typeParameterMapping(info.typeParameters, type.typeArguments);
  const result: NamedTypeNode[] = [];
  for (const base of info.supertypes) {
    const substituted = substituteTypeParameters(base, mapping);
    if (substituted.kind === 'named') {
      result.push(substituted);
    }
  }
  return result;
}

// Every ancestor of a named type, breadth-first, each identifier once
export function supertypeChain(type: NamedTypeNode, env: TypeEnvironment): NamedTypeNode[] {
  const seen = new Set<string>([type.name]);
  const chain: NamedTypeNode[] = [];
  const queue = [type];
  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) {
      break;
    }
    for (const base of directSupertypes(current, env)) {
      if (seen.has(base.name)) {
        continue;
      }
      seen.add(base.name);
      chain.push(base);
      queue.push(base);
    }
  }
  return chain;
}

export function isAssignable(source: Type, target: Type, env: TypeEnvironment = EMPTY_TYPE_ENVIRONMENT): boolean {
  return assignable(source, target, env, new Set<string>());
}

// `assumed` holds the (from, to) pairs on the current path; meeting one
// again through a recursive alias counts as success
function assignable(source: Type, target: Type, env: TypeEnvironment, assumed: Set<string>): boolean {
  if (isDynamic(source) || isDynamic(target)) {
    return true;
  }

  const from = expandAliases(source, env);
  const to = expandAliases(target, env);
  if (isDynamic(from) || isDynamic(to)) {
    return true;
  }

  const key = `${typeToString(from)}=>${typeToString(to)}`;
  if (assumed.has(key)) {
    return true;
  }
  assumed.add(key);
  const result = assignableExpanded(from, to, env, assumed);
  assumed.delete(key);
  return result;
}

function assignableExpanded(from: Type, to: Type, env: TypeEnvironment, assumed: Set<string>): boolean {
  if (from.kind === 'union') {
    return from.members.every(member => assignable(member, to, env, assumed));
  }
  if (to.kind === 'union') {
    return to.members.some(member => assignable(from, member, env, assumed));
  }

  if (to.kind === 'optional') {
    if (isPrimitive(from, 'null')) {
      return true;
    }
    if (from.kind === 'optional') {
      return assignable(from.inner, to.inner, env, assumed);
    }
    return assignable(from, to.inner, env, assumed);
  }

  switch (from.kind) {
    case 'primitive':
      if (to.kind !== 'primitive') {
        return false;
      }
      return from.name === to.name || (from.name === 'int' && to.name === 'float');
    case 'literal':
      if (to.kind === 'literal') {
        return from.value === to.value;
      }
      return assignable(literalBaseType(from), to, env, assumed);
    case 'optional':
      return false;
    case 'sequence':
      return to.kind === 'sequence' && assignable(from.element, to.element, env, assumed);
    case 'set':
      return to.kind === 'set' && assignable(from.element, to.element, env, assumed);
    case 'mapping':
      return to.kind === 'mapping'
        && assignable(from.key, to.key, env, assumed)
        && assignable(from.value, to.value, env, assumed);
    case 'function':
      return to.kind === 'function'
        && from.parameters.length === to.parameters.length
        && to.parameters.every((param, i) => assignable(param, from.parameters[i], env, assumed))
        && assignable(from.returnType, to.returnType, env, assumed);
    case 'named':
      return isNamedAssignable(from, to, env, assumed);
    default:
      return false;
  }
}

function isNamedAssignable(from: NamedTypeNode, to: Type, env: TypeEnvironment, assumed: Set<string>): boolean {
  if (to.kind === 'named') {
    if (sameNamedType(from, to, env)) {
      return true;
    }
    if (supertypeChain(from, env).some(ancestor => sameNamedType(ancestor, to, env))) {
      return true;
    }
  }
  // A distinct alias flows into its underlying type, never the other way
  const info = env.lookupNamed(from.name);
  if (info && info.kind === 'alias' && info.distinct) {
    return assignable(info.aliased, to, env, assumed);
  }
  return false;
}

/**
 * Follows the aliases a type alias names, through every type constructor,
 * and returns the chain of names that leads back to `name`. Classes,
 * interfaces and externs end the search.
 */
export function findAliasCycle(name: string, env: TypeEnvironment): string[] | undefined {
  const visited = new Set<string>();
  const visit = (type: Type, chain: string[]): string[] | undefined => {
    switch (type.kind) {
      case 'optional':
        return visit(type.inner, chain);
      case 'sequence':
      case 'set':
        return visit(type.element, chain);
      case 'mapping':
        return visit(type.key, chain) ?? visit(type.value, chain);
      case 'function':
        return firstCycle([...type.parameters, type.returnType], chain);
      case 'union':
        return firstCycle(type.members, chain);
      case 'named': {
        const fromArguments = firstCycle(type.typeArguments, chain);
        if (fromArguments) {
          return fromArguments;
        }
        if (type.name === name) {
          return [...chain, name];
        }
        const info = env.lookupNamed(type.name);
        if (!info || info.kind !== 'alias' || visited.has(type.name)) {
          return undefined;
        }
        visited.add(type.name);
        return visit(info.aliased, [...chain, type.name]);
      }
      default:
        return undefined;
    }
  };
  const firstCycle = (types: readonly Type[], chain: string[]): string[] | undefined => {
    for (const type of types) {
      const cycle = visit(type, chain);
      if (cycle) {
        return cycle;
      }
    }
    return undefined;
  };

  const info = env.lookupNamed(name);
  if (!info || info.kind !== 'alias') {
    return undefined;
  }
  return visit(info.aliased, [name]);
}

function sameNamedType(a: NamedTypeNode, b: NamedTypeNode, env: TypeEnvironment): boolean {
  if (a.name !== b.name || a.typeArguments.length !== b.typeArguments.length) {
    return false;
  }
  return a.typeArguments.every((arg, i) => {
    const other = b.typeArguments[i];
    return isDynamic(arg) || isDynamic(other) || typesEqual(expandAliases(arg, env), expandAliases(other, env));
  });
}

// Smallest type both sides are assignable to, used for collection literals
// and conditional expressions
export function joinTypes(a: Type, b: Type, env: TypeEnvironment = EMPTY_TYPE_ENVIRONMENT): Type {
  if (isDynamic(a)) {
    return a;
  }
  if (isDynamic(b)) {
    return b;
  }
  if (isAssignable(a, b, env)) {
    return b;
  }
  if (isAssignable(b, a, env)) {
    return a;
  }
  if (isPrimitive(a, 'null')) {
    return createOptionalType(b);
  }
  if (isPrimitive(b, 'null')) {
    return createOptionalType(a);
  }
  const members: Type[] = [];
  for (const member of [...unionMembers(a), ...unionMembers(b)]) {
    if (!members.some(existing => typesEqual(existing, member))) {
      members.push(member);
    }
  }
  return members.length === 1 ? members[0] : createUnionType(members);
}

function unionMembers(type: Type): readonly Type[] {
  return type.kind === 'union' ? type.members : [type];
}

// Removes the optional wrapper, e.g. for narrowing after an `is null` check
export function stripOptional(type: Type): Type {
  return type.kind === 'optional' ? type.inner : type;
}
