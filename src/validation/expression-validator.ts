import { Expression, IRPath, NameExpression, Type, TypeTestExpression } from "../types";
import {
  commonTypes, createFunctionType, createUnknownType, expandAliases, isDynamic, isStringLike, joinTypes
} from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { selfType, validateTypeReference } from "./declaration-validator";
import { validateMemberExpression, validateIndexExpression } from "./member-access-validator";
import { validateCallExpression, validateInstantiateExpression } from "./call-expression-validator";
import { validateBinaryExpression, validateUnaryExpression } from "./binary-expression-validator";
import { validateCollectionLiteral, validateMappingLiteral } from "./collection-validator";
import { validateLambdaExpression } from "./lambda-validator";

// Infers the type of an expression, checks its operands and records the
// result under the expression's path for the renderers
export function inferExpression(expr: Expression, path: IRPath, scope: Scope, validator: Validator): Type {
  return validator.recordType(path, inferUncached(expr, path, scope, validator));
}

function inferUncached(expr: Expression, path: IRPath, scope: Scope, validator: Validator): Type {
  switch (expr.kind) {
    case 'literal':
      return commonTypes[expr.literalType];
    case 'name':
      return inferName(expr, path, scope, validator, false);
    case 'self':
      if (!validator.currentClass || validator.inStaticContext) {
        validator.reportUnresolved(path, "'self' is only available inside instance methods");
        return createUnknownType();
      }
      return selfType(validator.currentClass);
    case 'member':
      return validateMemberExpression(expr, path, scope, validator);
    case 'index':
      return validateIndexExpression(expr, path, scope, validator);
    case 'call':
      return validateCallExpression(expr, path, scope, validator);
    case 'instantiate':
      return validateInstantiateExpression(expr, path, scope, validator);
    case 'binary':
      return validateBinaryExpression(expr, path, scope, validator);
    case 'unary':
      return validateUnaryExpression(expr, path, scope, validator);
    case 'conditional': {
      const testPath = [...path, 'test'];
      const test = inferExpression(expr.test, testPath, scope, validator);
      validator.expectAssignable(testPath, test, commonTypes.bool);
      const consequent = inferExpression(expr.consequent, [...path, 'consequent'], scope, validator);
      const alternate = inferExpression(expr.alternate, [...path, 'alternate'], scope, validator);
      return joinTypes(consequent, alternate, validator.symbols);
    }
    case 'sequenceLiteral':
    case 'setLiteral':
      return validateCollectionLiteral(expr, path, scope, validator);
    case 'mappingLiteral':
      return validateMappingLiteral(expr, path, scope, validator);
    case 'lambda':
      return validateLambdaExpression(expr, path, scope, validator);
    case 'template':
      expr.parts.forEach((part, i) => {
        if (typeof part !== 'string') {
          inferExpression(part, [...path, 'parts', i], scope, validator);
        }
      });
      return commonTypes.string;
    case 'cast':
      validateTypeReference(expr.type, [...path, 'type'], validator);
      inferExpression(expr.expression, [...path, 'expression'], scope, validator);
      return expr.type;
    case 'length': {
      const targetPath = [...path, 'target'];
      const target = inferExpression(expr.target, targetPath, scope, validator);
      const type = expandAliases(target, validator.symbols);
      const measurable = isDynamic(type) || isStringLike(type)
        || type.kind === 'sequence' || type.kind === 'set' || type.kind === 'mapping';
      if (!measurable) {
        validator.reportMismatch(targetPath, 'Sequence, Set, Mapping or string', target);
      }
      return commonTypes.int;
    }
    case 'typeTest':
      return validateTypeTest(expr, path, scope, validator);
    case 'omit':
      validator.reportMismatch(
        path,
        'a value',
        'omitted',
        'an omitted value can only be passed for an omittable parameter or be its default'
      );
      return createUnknownType();
  }
}

function validateTypeTest(expr: TypeTestExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const operandPath = [...path, 'operand'];
  inferExpression(expr.operand, operandPath, scope, validator);
  if (expr.tested === 'omitted') {
    const entry = expr.operand.kind === 'name' ? scope.lookup(expr.operand.name) : undefined;
    if (!entry || !entry.omittable) {
      validator.reportMismatch(operandPath, 'omittable parameter', 'expression', 'only an omittable parameter can be tested for omission');
    }
  }
  return commonTypes.bool;
}

/**
 * Resolves a bare name: scope entries first, then module declarations, then
 * exported declarations of imported modules.
 */
export function inferName(expr: NameExpression, path: IRPath, scope: Scope, validator: Validator, asCallee: boolean): Type {
  const local = scope.lookup(expr.name);
  if (local) {
    return local.type;
  }
  const resolved = validator.symbols.lookup(expr.name);
  if (!resolved) {
    validator.reportUnresolved(path, `'${expr.name}' is not defined`);
    return createUnknownType();
  }
  validator.recordReference(path, resolved);

  const declaration = resolved.declaration;
  switch (declaration.kind) {
    case 'const':
      return declaration.type;
    case 'function':
      if (!asCallee) {
        validator.recordConstruct('function-value', path, `function '${expr.name}' used as a value`);
      }
      return createFunctionType(declaration.parameters.map(p => p.type), declaration.returnType);
    case 'extern':
      if (declaration.entity === 'value') {
        return declaration.type;
      }
      validator.reportMismatch(path, 'value', `class ${expr.name}`, `class '${expr.name}' cannot be used as a value`);
      return createUnknownType();
    case 'class':
      validator.reportMismatch(path, 'value', `class ${expr.name}`, `class '${expr.name}' cannot be used as a value`);
      return createUnknownType();
    default:
      validator.reportUnresolved(path, `'${expr.name}' names a type and cannot be used as a value`);
      return createUnknownType();
  }
}
