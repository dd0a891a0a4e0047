import {
  ClassDeclaration, Declaration, FunctionLike, IRPath, NamedTypeNode, Type
} from "../types";
import { createNamedType, findAliasCycle, supertypeChain } from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { constructorParameters } from "./symbols";
import { inferExpression } from "./expression-validator";
import { validateBlock } from "./statement-validator";

export function validateModuleDeclarations(validator: Validator): void {
  const module = validator.module;
  module.imports.forEach((name, i) => {
    if (!validator.available.has(name)) {
      validator.reportUnresolved(['imports', i], `module '${name}' is not available`);
    }
  });
  // Alias cycles are reported before anything compares types through them
  module.declarations.forEach((declaration, i) => {
    if (declaration.kind !== 'typeAlias') {
      return;
    }
    const cycle = findAliasCycle(declaration.name, validator.symbols);
    if (cycle) {
      validator.reportMismatch(
        ['declarations', i, 'type'],
        'acyclic type alias',
        declaration.name,
        `type alias '${declaration.name}' refers to itself through ${cycle.join(' -> ')}`
      );
    }
  });
  module.declarations.forEach((declaration, i) => {
    validator.log(`Checking ${declaration.kind} ${declaration.name}`);
    validateDeclaration(declaration, ['declarations', i], validator);
  });
}

function validateDeclaration(declaration: Declaration, path: IRPath, validator: Validator): void {
  switch (declaration.kind) {
    case 'class':
      validateClassDeclaration(declaration, path, validator);
      break;
    case 'function':
      validateFunctionLike(declaration, path, validator, false);
      break;
    case 'const': {
      validateTypeReference(declaration.type, [...path, 'type'], validator);
      const inferred = inferExpression(declaration.value, [...path, 'value'], new Scope(), validator);
      validator.expectAssignable([...path, 'value'], inferred, declaration.type);
      break;
    }
    case 'typeAlias':
      validateTypeReference(declaration.type, [...path, 'type'], validator);
      break;
    case 'interface':
      declaration.properties.forEach((property, i) => {
        validateTypeReference(property.type, [...path, 'properties', i, 'type'], validator);
      });
      break;
    case 'extern':
      validateTypeReference(declaration.type, [...path, 'type'], validator);
      break;
  }
}

function validateClassDeclaration(declaration: ClassDeclaration, path: IRPath, validator: Validator): void {
  validator.currentClass = declaration;
  validator.pushTypeParameters(declaration.typeParameters);

  declaration.bases.forEach((base, i) => validateBase(declaration, base, [...path, 'bases', i], validator));

  // an extern base class is constructed by the target library's own constructor
  const firstInitArg = declaration.fields.findIndex(field => field.initArg);
  const extern = firstInitArg >= 0 ? validator.symbols.externAncestor(selfType(declaration)) : undefined;
  if (extern) {
    validator.reportMismatch(
      [...path, 'fields', firstInitArg],
      'no constructor arguments',
      `constructor argument ${declaration.fields[firstInitArg].name}`,
      `class '${declaration.name}' derives from extern class '${extern.name}' and cannot declare constructor arguments`
    );
  }

  declaration.fields.forEach((field, i) => {
    const fieldPath = [...path, 'fields', i];
    validateTypeReference(field.type, [...fieldPath, 'type'], validator);
    if (field.defaultValue) {
      const inferred = inferExpression(field.defaultValue, [...fieldPath, 'defaultValue'], new Scope(), validator);
      validator.expectAssignable([...fieldPath, 'defaultValue'], inferred, field.type);
    }
  });

  declaration.methods.forEach((method, i) => {
    validateFunctionLike(method, [...path, 'methods', i], validator, !method.isStatic);
  });

  validator.popTypeParameters();
  validator.currentClass = undefined;
}

function validateBase(declaration: ClassDeclaration, base: NamedTypeNode, path: IRPath, validator: Validator): void {
  if (!validateTypeReference(base, path, validator)) {
    return;
  }
  if (validator.isTypeParameter(base.name)) {
    validator.reportMismatch(path, 'class or interface', `type parameter ${base.name}`, `type parameter '${base.name}' cannot be a base type`);
    return;
  }
  const resolved = validator.symbols.lookupType(base.name);
  if (!resolved) {
    return;
  }
  const target = resolved.declaration;
  if (target.kind === 'typeAlias') {
    validator.reportMismatch(path, 'class or interface', `type alias ${base.name}`, `type alias '${base.name}' cannot be a base type`);
  } else if (target.kind === 'class') {
    if (!resolved.imported && target.name === declaration.name) {
      validator.reportMismatch(path, 'another class', base.name, `class '${declaration.name}' cannot extend itself`);
      return;
    }
    if (!resolved.imported && supertypeChain(base, validator.symbols).some(ancestor => ancestor.name === declaration.name)) {
      validator.reportMismatch(path, 'acyclic class hierarchy', base.name, `inheritance cycle between '${declaration.name}' and '${base.name}'`);
      return;
    }
    // Derived constructors call their parent without arguments
    const required = constructorParameters(target).filter(field => !field.defaultValue);
    if (required.length > 0) {
      validator.reportMismatch(
        path,
        '0 required constructor arguments',
        `${required.length} required constructor argument(s)`,
        `base class '${base.name}' requires constructor arguments`
      );
    }
  }
}

/**
 * Checks parameters, defaults and the body of a function or method. `self`
 * is available inside the body only for instance methods.
 */
export function validateFunctionLike(fn: FunctionLike, path: IRPath, validator: Validator, hasSelf: boolean): void {
  const scope = new Scope();
  fn.parameters.forEach((param, i) => {
    const paramPath = [...path, 'parameters', i];
    validateTypeReference(param.type, [...paramPath, 'type'], validator);
    const omittable = param.defaultValue?.kind === 'omit';
    if (param.defaultValue && !omittable) {
      const inferred = inferExpression(param.defaultValue, [...paramPath, 'defaultValue'], new Scope(), validator);
      validator.expectAssignable([...paramPath, 'defaultValue'], inferred, param.type);
    }
    scope.declare(param.name, { kind: 'parameter', type: param.type, omittable });
  });
  validateTypeReference(fn.returnType, [...path, 'returnType'], validator);

  validator.pushFunction({ returnType: fn.returnType, isAsync: fn.isAsync });
  const previous = validator.inStaticContext;
  validator.inStaticContext = !hasSelf;
  validateBlock(fn.body, [...path, 'body'], scope, validator);
  validator.inStaticContext = previous;
  validator.popFunction();
}

// The type of `self` inside the class being checked
export function selfType(declaration: ClassDeclaration): NamedTypeNode {
  return createNamedType(declaration.name, declaration.typeParameters.map(name => createNamedType(name)));
}

/**
 * Resolves every named type inside `type` and checks type-argument arity.
 * Returns false when the outermost named type did not resolve.
 */
export function validateTypeReference(type: Type, path: IRPath, validator: Validator): boolean {
  switch (type.kind) {
    case 'optional':
      return validateTypeReference(type.inner, [...path, 'inner'], validator);
    case 'sequence':
    case 'set':
      return validateTypeReference(type.element, [...path, 'element'], validator);
    case 'mapping': {
      const key = validateTypeReference(type.key, [...path, 'key'], validator);
      const value = validateTypeReference(type.value, [...path, 'value'], validator);
      return key && value;
    }
    case 'function': {
      let ok = true;
      type.parameters.forEach((param, i) => {
        ok = validateTypeReference(param, [...path, 'parameters', i], validator) && ok;
      });
      return validateTypeReference(type.returnType, [...path, 'returnType'], validator) && ok;
    }
    case 'union': {
      let ok = true;
      type.members.forEach((member, i) => {
        ok = validateTypeReference(member, [...path, 'members', i], validator) && ok;
      });
      return ok;
    }
    case 'named':
      return validateNamedType(type, path, validator);
    default:
      return true;
  }
}

function validateNamedType(type: NamedTypeNode, path: IRPath, validator: Validator): boolean {
  type.typeArguments.forEach((arg, i) => validateTypeReference(arg, [...path, 'typeArguments', i], validator));

  let expectedArity = 0;
  if (!validator.isTypeParameter(type.name)) {
    const resolved = validator.symbols.lookup(type.name);
    if (!resolved) {
      validator.reportUnresolved(path, `unknown type '${type.name}'`);
      return false;
    }
    validator.recordReference(path, resolved);
    const declaration = resolved.declaration;
    if (declaration.kind === 'function' || declaration.kind === 'const'
      || (declaration.kind === 'extern' && declaration.entity === 'value')) {
      validator.reportUnresolved(path, `'${type.name}' is a value, not a type`);
      return false;
    }
    if (declaration.kind === 'class') {
      expectedArity = declaration.typeParameters.length;
    } else if (declaration.kind === 'extern') {
      // extern classes take whatever arguments the target library defines
      expectedArity = type.typeArguments.length;
    }
  }

  if (type.typeArguments.length !== expectedArity) {
    validator.reportMismatch(
      path,
      `${expectedArity} type argument(s)`,
      `${type.typeArguments.length} type argument(s)`,
      `'${type.name}' takes ${expectedArity} type argument(s), got ${type.typeArguments.length}`
    );
  }
  return true;
}
