import { IndexExpression, IRPath, MemberExpression, Type } from "../types";
import {
  commonTypes, createNamedType, createUnknownType, expandAliases, isDynamic, isStringLike, typeToString
} from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { ClassMember } from "./symbols";
import { inferExpression } from "./expression-validator";

export interface MemberAccess {
  type: Type;
  member?: ClassMember;
}

function recordMember(member: ClassMember, path: IRPath, validator: Validator): void {
  validator.recordMember(path, {
    module: member.owner.module.name,
    className: member.owner.declaration.name,
    member: member.kind,
    isStatic: member.isStatic
  });
}

function dynamicResult(type: Type): Type {
  return type.kind === 'unknown' ? type : commonTypes.any;
}

/**
 * Resolves `object.property`. With `asCallee` set the access is the target
 * of a call, so a method reached here is not used as a first-class value.
 */
export function resolveMemberExpression(
  expr: MemberExpression,
  path: IRPath,
  scope: Scope,
  validator: Validator,
  asCallee: boolean
): MemberAccess {
  const objectPath = [...path, 'object'];

  // ClassName.method: static access through a class reference
  if (expr.object.kind === 'name' && !scope.lookup(expr.object.name)) {
    const resolved = validator.symbols.lookup(expr.object.name);
    const declaration = resolved?.declaration;
    if (resolved && declaration && declaration.kind === 'class') {
      validator.recordType(objectPath, commonTypes.any);
      validator.recordReference(objectPath, resolved);
      const classType = createNamedType(declaration.name, declaration.typeParameters.map(() => commonTypes.any));
      const member = validator.symbols.findMember(classType, expr.property);
      if (!member || member.kind !== 'method' || !member.isStatic) {
        validator.reportUnresolved(path, `class '${declaration.name}' has no static method '${expr.property}'`);
        return { type: createUnknownType() };
      }
      recordMember(member, path, validator);
      if (!asCallee) {
        validator.recordConstruct('function-value', path, `method '${expr.property}' used as a value`);
      }
      return { type: member.type, member };
    }
    if (resolved && declaration && declaration.kind === 'extern' && declaration.entity === 'class') {
      validator.recordType(objectPath, commonTypes.any);
      validator.recordReference(objectPath, resolved);
      return { type: commonTypes.any };
    }
  }

  const objectType = inferExpression(expr.object, objectPath, scope, validator);
  if (isDynamic(objectType)) {
    return { type: dynamicResult(objectType) };
  }

  let type = expandAliases(objectType, validator.symbols);
  if (type.kind === 'optional') {
    validator.reportMismatch(
      objectPath,
      type.inner,
      type,
      `member '${expr.property}' accessed on a value that may be null`
    );
    return { type: createUnknownType() };
  }

  if (type.kind === 'named' && !validator.isTypeParameter(type.name)) {
    const info = validator.symbols.lookupNamed(type.name);
    if (info && info.kind === 'extern') {
      return { type: commonTypes.any };
    }
    // members of a distinct alias are those of its underlying type
    if (info && info.kind === 'alias') {
      type = expandAliases(info.aliased, validator.symbols);
    }
  }

  if (type.kind === 'named') {
    if (validator.isTypeParameter(type.name)) {
      return { type: commonTypes.any };
    }
    const member = validator.symbols.findMember(type, expr.property);
    if (!member) {
      validator.reportUnresolved(path, `'${typeToString(type)}' has no member '${expr.property}'`);
      return { type: createUnknownType() };
    }
    recordMember(member, path, validator);
    if (member.kind === 'method' && !asCallee) {
      validator.recordConstruct('function-value', path, `method '${expr.property}' used as a value`);
    }
    return { type: member.type, member };
  }

  validator.reportUnresolved(path, `'${typeToString(type)}' has no member '${expr.property}'`);
  return { type: createUnknownType() };
}

export function validateMemberExpression(expr: MemberExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  return resolveMemberExpression(expr, path, scope, validator, false).type;
}

export function validateIndexExpression(expr: IndexExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const objectPath = [...path, 'object'];
  const indexPath = [...path, 'index'];
  const objectType = inferExpression(expr.object, objectPath, scope, validator);
  const indexType = inferExpression(expr.index, indexPath, scope, validator);
  if (isDynamic(objectType)) {
    return dynamicResult(objectType);
  }

  const type = expandAliases(objectType, validator.symbols);
  switch (type.kind) {
    case 'sequence':
      validator.expectAssignable(indexPath, indexType, commonTypes.int);
      return type.element;
    case 'mapping':
      validator.expectAssignable(indexPath, indexType, type.key);
      return type.value;
    case 'optional':
      validator.reportMismatch(objectPath, type.inner, type, 'indexing a value that may be null');
      return createUnknownType();
    default:
      if (isStringLike(type)) {
        validator.expectAssignable(indexPath, indexType, commonTypes.int);
        return commonTypes.string;
      }
      validator.reportMismatch(objectPath, 'Sequence, Mapping or string', type);
      return createUnknownType();
  }
}
