import { AssignStatement, Expression, IRPath, Statement, Type } from "../types";
import {
  commonTypes, createNamedType, createUnknownType, expandAliases, isDynamic, isPrimitive, isStringLike, typeToString
} from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { inferExpression } from "./expression-validator";
import { resolveMemberExpression } from "./member-access-validator";
import { validateTypeReference } from "./declaration-validator";

export function validateBlock(statements: readonly Statement[], path: IRPath, scope: Scope, validator: Validator): void {
  const blockScope = scope.child();
  statements.forEach((statement, i) => validateStatement(statement, [...path, i], blockScope, validator));
}

function expectCondition(path: IRPath, type: Type, validator: Validator): void {
  validator.expectAssignable(path, type, commonTypes.bool);
}

export function validateStatement(statement: Statement, path: IRPath, scope: Scope, validator: Validator): void {
  switch (statement.kind) {
    case 'assign':
      validateAssignment(statement, path, scope, validator);
      break;
    case 'varDecl': {
      let declared = statement.type;
      if (statement.type) {
        validateTypeReference(statement.type, [...path, 'type'], validator);
      }
      if (statement.value) {
        const valuePath = [...path, 'value'];
        const inferred = inferExpression(statement.value, valuePath, scope, validator);
        if (statement.type) {
          validator.expectAssignable(valuePath, inferred, statement.type);
        } else {
          declared = inferred;
        }
      }
      scope.declare(statement.name, {
        kind: statement.constant ? 'constant' : 'variable',
        type: declared ?? commonTypes.any
      });
      break;
    }
    case 'if':
      statement.branches.forEach((branch, i) => {
        const conditionPath = [...path, 'branches', i, 'condition'];
        expectCondition(conditionPath, inferExpression(branch.condition, conditionPath, scope, validator), validator);
        validateBlock(branch.body, [...path, 'branches', i, 'body'], scope, validator);
      });
      if (statement.elseBody) {
        validateBlock(statement.elseBody, [...path, 'elseBody'], scope, validator);
      }
      break;
    case 'while': {
      const conditionPath = [...path, 'condition'];
      expectCondition(conditionPath, inferExpression(statement.condition, conditionPath, scope, validator), validator);
      validateBlock(statement.body, [...path, 'body'], scope, validator);
      break;
    }
    case 'forEach': {
      const iterablePath = [...path, 'iterable'];
      const iterable = inferExpression(statement.iterable, iterablePath, scope, validator);
      let element = iterableElement(iterable, iterablePath, validator);
      if (statement.variableType) {
        const typePath = [...path, 'variableType'];
        validateTypeReference(statement.variableType, typePath, validator);
        validator.expectAssignable(typePath, element, statement.variableType);
        element = statement.variableType;
      }
      const loopScope = scope.child();
      loopScope.declare(statement.variable, { kind: 'loop', type: element });
      validateBlock(statement.body, [...path, 'body'], loopScope, validator);
      break;
    }
    case 'forEntries': {
      const mappingPath = [...path, 'mapping'];
      const mapping = inferExpression(statement.mapping, mappingPath, scope, validator);
      const type = expandAliases(mapping, validator.symbols);
      let key: Type = commonTypes.any;
      let value: Type = commonTypes.any;
      if (type.kind === 'mapping') {
        key = type.key;
        value = type.value;
      } else if (!isDynamic(type)) {
        validator.reportMismatch(mappingPath, 'Mapping', mapping);
      }
      const loopScope = scope.child();
      loopScope.declare(statement.keyVariable, { kind: 'loop', type: key });
      loopScope.declare(statement.valueVariable, { kind: 'loop', type: value });
      validateBlock(statement.body, [...path, 'body'], loopScope, validator);
      break;
    }
    case 'return':
      validateReturn(statement.value, path, scope, validator);
      break;
    case 'raise': {
      const messagePath = [...path, 'message'];
      const message = inferExpression(statement.message, messagePath, scope, validator);
      validator.expectAssignable(messagePath, message, commonTypes.string);
      if (statement.errorClass !== undefined) {
        validateErrorClass(statement.errorClass, [...path, 'errorClass'], validator);
      }
      break;
    }
    case 'expression':
      inferExpression(statement.expression, [...path, 'expression'], scope, validator);
      break;
    case 'with': {
      const resource = inferExpression(statement.resource, [...path, 'resource'], scope, validator);
      const withScope = scope.child();
      if (statement.binding) {
        withScope.declare(statement.binding, { kind: 'binding', type: resource });
      }
      validateBlock(statement.body, [...path, 'body'], withScope, validator);
      break;
    }
    case 'tryCatch':
      validateBlock(statement.body, [...path, 'body'], scope, validator);
      statement.catches.forEach((clause, i) => {
        const clausePath = [...path, 'catches', i];
        let errorType: Type = commonTypes.any;
        if (clause.errorClass !== undefined) {
          if (validateErrorClass(clause.errorClass, [...clausePath, 'errorClass'], validator)) {
            errorType = createNamedType(clause.errorClass);
          }
        }
        const catchScope = scope.child();
        if (clause.binding) {
          catchScope.declare(clause.binding, { kind: 'binding', type: errorType });
        }
        validateBlock(clause.body, [...clausePath, 'body'], catchScope, validator);
      });
      if (statement.finallyBody) {
        validateBlock(statement.finallyBody, [...path, 'finallyBody'], scope, validator);
      }
      break;
    case 'append': {
      const targetPath = [...path, 'target'];
      const valuePath = [...path, 'value'];
      const target = inferExpression(statement.target, targetPath, scope, validator);
      const value = inferExpression(statement.value, valuePath, scope, validator);
      const type = expandAliases(target, validator.symbols);
      if (type.kind === 'sequence') {
        validator.expectAssignable(valuePath, value, type.element);
      } else if (!isDynamic(type)) {
        validator.reportMismatch(targetPath, 'Sequence', target);
      }
      break;
    }
    case 'pass':
    case 'break':
    case 'continue':
    case 'comment':
      break;
  }
}

// Sequences and sets yield their elements, strings their characters
function iterableElement(iterable: Type, path: IRPath, validator: Validator): Type {
  const type = expandAliases(iterable, validator.symbols);
  if (type.kind === 'sequence' || type.kind === 'set') {
    return type.element;
  }
  if (isStringLike(type)) {
    return commonTypes.string;
  }
  if (isDynamic(type)) {
    return type;
  }
  validator.reportMismatch(path, 'Sequence or Set', iterable);
  return createUnknownType();
}

function validateReturn(value: Expression | undefined, path: IRPath, scope: Scope, validator: Validator): void {
  const fn = validator.currentFunction;
  if (!fn) {
    return;
  }
  const returnsVoid = isPrimitive(fn.returnType, 'void');
  if (value === undefined) {
    if (!returnsVoid && !isDynamic(fn.returnType)) {
      validator.reportMismatch(path, fn.returnType, commonTypes.void, `missing return value of type ${typeToString(fn.returnType)}`);
    }
    return;
  }
  const valuePath = [...path, 'value'];
  const inferred = inferExpression(value, valuePath, scope, validator);
  if (returnsVoid) {
    validator.reportMismatch(valuePath, commonTypes.void, inferred, 'a void function cannot return a value');
  } else {
    validator.expectAssignable(valuePath, inferred, fn.returnType);
  }
}

// Error classes must resolve to a class that derives from an extern class,
// whose constructor takes the message
function validateErrorClass(name: string, path: IRPath, validator: Validator): boolean {
  const resolved = validator.symbols.lookup(name);
  if (!resolved) {
    validator.reportUnresolved(path, `unknown error class '${name}'`);
    return false;
  }
  validator.recordReference(path, resolved);
  const declaration = resolved.declaration;
  if (declaration.kind === 'extern' && declaration.entity === 'class') {
    return true;
  }
  if (declaration.kind !== 'class') {
    validator.reportUnresolved(path, `'${name}' is not a class`);
    return false;
  }
  if (!validator.symbols.externAncestor(createNamedType(name))) {
    validator.reportMismatch(
      path,
      'class deriving from an extern error class',
      `class ${name}`,
      `error class '${name}' does not derive from an extern class`
    );
  }
  return true;
}

function validateAssignment(statement: AssignStatement, path: IRPath, scope: Scope, validator: Validator): void {
  const target = statement.target;
  const targetPath = [...path, 'target'];
  let targetType: Type = createUnknownType();

  switch (target.kind) {
    case 'name': {
      const local = scope.lookup(target.name);
      if (local) {
        targetType = local.type;
        if (local.kind === 'constant') {
          validator.reportMismatch(targetPath, 'variable', `constant ${target.name}`, `cannot assign to constant '${target.name}'`);
        }
      } else {
        const resolved = validator.symbols.lookup(target.name);
        if (!resolved) {
          validator.reportUnresolved(targetPath, `'${target.name}' is not defined`);
        } else {
          validator.reportMismatch(
            targetPath,
            'variable',
            `${resolved.declaration.kind} ${target.name}`,
            `cannot assign to module-level ${resolved.declaration.kind} '${target.name}'`
          );
        }
      }
      validator.recordType(targetPath, targetType);
      break;
    }
    case 'member': {
      const access = resolveMemberExpression(target, targetPath, scope, validator, true);
      targetType = access.type;
      if (access.member && access.member.kind === 'method') {
        validator.reportMismatch(targetPath, 'field', `method ${target.property}`, `cannot assign to method '${target.property}'`);
        targetType = createUnknownType();
      } else if (access.member && access.member.readonly) {
        validator.reportMismatch(targetPath, 'writable field', `readonly field ${target.property}`, `field '${target.property}' is readonly`);
      }
      validator.recordType(targetPath, targetType);
      break;
    }
    case 'index':
      targetType = inferExpression(target, targetPath, scope, validator);
      break;
  }

  const valuePath = [...path, 'value'];
  const value = inferExpression(statement.value, valuePath, scope, validator);
  validator.expectAssignable(valuePath, value, targetType);
}
