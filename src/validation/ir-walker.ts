// Depth-first traversal of a module's IR, reporting every node with its path

import { Declaration, Expression, IRPath, Module, Statement, Type } from "../types";

export interface IRVisitor {
  declaration?(declaration: Declaration, path: IRPath): void;
  statement?(statement: Statement, path: IRPath): void;
  expression?(expression: Expression, path: IRPath): void;
  type?(type: Type, path: IRPath): void;
}

export function walkModule(module: Module, visitor: IRVisitor): void {
  module.declarations.forEach((declaration, i) => walkDeclaration(declaration, ['declarations', i], visitor));
}

export function walkDeclaration(declaration: Declaration, path: IRPath, visitor: IRVisitor): void {
  visitor.declaration?.(declaration, path);
  switch (declaration.kind) {
    case 'class':
      declaration.bases.forEach((base, i) => walkType(base, [...path, 'bases', i], visitor));
      declaration.fields.forEach((field, i) => {
        walkType(field.type, [...path, 'fields', i, 'type'], visitor);
        if (field.defaultValue) {
          walkExpression(field.defaultValue, [...path, 'fields', i, 'defaultValue'], visitor);
        }
      });
      declaration.methods.forEach((method, i) => {
        const methodPath = [...path, 'methods', i];
        method.parameters.forEach((param, j) => {
          walkType(param.type, [...methodPath, 'parameters', j, 'type'], visitor);
          if (param.defaultValue) {
            walkExpression(param.defaultValue, [...methodPath, 'parameters', j, 'defaultValue'], visitor);
          }
        });
        walkType(method.returnType, [...methodPath, 'returnType'], visitor);
        walkBlock(method.body, [...methodPath, 'body'], visitor);
      });
      break;
    case 'function':
      declaration.parameters.forEach((param, j) => {
        walkType(param.type, [...path, 'parameters', j, 'type'], visitor);
        if (param.defaultValue) {
          walkExpression(param.defaultValue, [...path, 'parameters', j, 'defaultValue'], visitor);
        }
      });
      walkType(declaration.returnType, [...path, 'returnType'], visitor);
      walkBlock(declaration.body, [...path, 'body'], visitor);
      break;
    case 'const':
      walkType(declaration.type, [...path, 'type'], visitor);
      walkExpression(declaration.value, [...path, 'value'], visitor);
      break;
    case 'typeAlias':
    case 'extern':
      walkType(declaration.type, [...path, 'type'], visitor);
      break;
    case 'interface':
      declaration.properties.forEach((property, i) => walkType(property.type, [...path, 'properties', i, 'type'], visitor));
      break;
  }
}

export function walkBlock(statements: readonly Statement[], path: IRPath, visitor: IRVisitor): void {
  statements.forEach((statement, i) => walkStatement(statement, [...path, i], visitor));
}

export function walkStatement(statement: Statement, path: IRPath, visitor: IRVisitor): void {
  visitor.statement?.(statement, path);
  switch (statement.kind) {
    case 'assign':
      walkExpression(statement.target, [...path, 'target'], visitor);
      walkExpression(statement.value, [...path, 'value'], visitor);
      break;
    case 'varDecl':
      if (statement.type) {
        walkType(statement.type, [...path, 'type'], visitor);
      }
      if (statement.value) {
        walkExpression(statement.value, [...path, 'value'], visitor);
      }
      break;
    case 'if':
      statement.branches.forEach((branch, i) => {
        walkExpression(branch.condition, [...path, 'branches', i, 'condition'], visitor);
        walkBlock(branch.body, [...path, 'branches', i, 'body'], visitor);
      });
      if (statement.elseBody) {
        walkBlock(statement.elseBody, [...path, 'elseBody'], visitor);
      }
      break;
    case 'while':
      walkExpression(statement.condition, [...path, 'condition'], visitor);
      walkBlock(statement.body, [...path, 'body'], visitor);
      break;
    case 'forEach':
      if (statement.variableType) {
        walkType(statement.variableType, [...path, 'variableType'], visitor);
      }
      walkExpression(statement.iterable, [...path, 'iterable'], visitor);
      walkBlock(statement.body, [...path, 'body'], visitor);
      break;
    case 'forEntries':
      walkExpression(statement.mapping, [...path, 'mapping'], visitor);
      walkBlock(statement.body, [...path, 'body'], visitor);
      break;
    case 'return':
      if (statement.value) {
        walkExpression(statement.value, [...path, 'value'], visitor);
      }
      break;
    case 'raise':
      walkExpression(statement.message, [...path, 'message'], visitor);
      break;
    case 'expression':
      walkExpression(statement.expression, [...path, 'expression'], visitor);
      break;
    case 'with':
      walkExpression(statement.resource, [...path, 'resource'], visitor);
      walkBlock(statement.body, [...path, 'body'], visitor);
      break;
    case 'tryCatch':
      walkBlock(statement.body, [...path, 'body'], visitor);
      statement.catches.forEach((clause, i) => walkBlock(clause.body, [...path, 'catches', i, 'body'], visitor));
      if (statement.finallyBody) {
        walkBlock(statement.finallyBody, [...path, 'finallyBody'], visitor);
      }
      break;
    case 'append':
      walkExpression(statement.target, [...path, 'target'], visitor);
      walkExpression(statement.value, [...path, 'value'], visitor);
      break;
    default:
      break;
  }
}

export function walkExpression(expression: Expression, path: IRPath, visitor: IRVisitor): void {
  visitor.expression?.(expression, path);
  switch (expression.kind) {
    case 'member':
      walkExpression(expression.object, [...path, 'object'], visitor);
      break;
    case 'index':
      walkExpression(expression.object, [...path, 'object'], visitor);
      walkExpression(expression.index, [...path, 'index'], visitor);
      break;
    case 'call':
      walkExpression(expression.callee, [...path, 'callee'], visitor);
      expression.arguments.forEach((arg, i) => walkExpression(arg.value, [...path, 'arguments', i, 'value'], visitor));
      break;
    case 'instantiate':
      walkType(expression.type, [...path, 'type'], visitor);
      expression.arguments.forEach((arg, i) => walkExpression(arg.value, [...path, 'arguments', i, 'value'], visitor));
      break;
    case 'binary':
      walkExpression(expression.left, [...path, 'left'], visitor);
      walkExpression(expression.right, [...path, 'right'], visitor);
      break;
    case 'unary':
      walkExpression(expression.operand, [...path, 'operand'], visitor);
      break;
    case 'conditional':
      walkExpression(expression.test, [...path, 'test'], visitor);
      walkExpression(expression.consequent, [...path, 'consequent'], visitor);
      walkExpression(expression.alternate, [...path, 'alternate'], visitor);
      break;
    case 'sequenceLiteral':
    case 'setLiteral':
      if (expression.elementType) {
        walkType(expression.elementType, [...path, 'elementType'], visitor);
      }
      expression.elements.forEach((element, i) => walkExpression(element, [...path, 'elements', i], visitor));
      break;
    case 'mappingLiteral':
      if (expression.keyType) {
        walkType(expression.keyType, [...path, 'keyType'], visitor);
      }
      if (expression.valueType) {
        walkType(expression.valueType, [...path, 'valueType'], visitor);
      }
      expression.entries.forEach((entry, i) => {
        walkExpression(entry.key, [...path, 'entries', i, 'key'], visitor);
        walkExpression(entry.value, [...path, 'entries', i, 'value'], visitor);
      });
      break;
    case 'lambda':
      expression.parameters.forEach((param, i) => walkType(param.type, [...path, 'parameters', i, 'type'], visitor));
      if (expression.returnType) {
        walkType(expression.returnType, [...path, 'returnType'], visitor);
      }
      walkExpression(expression.body, [...path, 'body'], visitor);
      break;
    case 'template':
      expression.parts.forEach((part, i) => {
        if (typeof part !== 'string') {
          walkExpression(part, [...path, 'parts', i], visitor);
        }
      });
      break;
    case 'cast':
      walkType(expression.type, [...path, 'type'], visitor);
      walkExpression(expression.expression, [...path, 'expression'], visitor);
      break;
    case 'length':
      walkExpression(expression.target, [...path, 'target'], visitor);
      break;
    case 'typeTest':
      walkExpression(expression.operand, [...path, 'operand'], visitor);
      break;
    default:
      break;
  }
}

export function walkType(type: Type, path: IRPath, visitor: IRVisitor): void {
  visitor.type?.(type, path);
  switch (type.kind) {
    case 'optional':
      walkType(type.inner, [...path, 'inner'], visitor);
      break;
    case 'sequence':
    case 'set':
      walkType(type.element, [...path, 'element'], visitor);
      break;
    case 'mapping':
      walkType(type.key, [...path, 'key'], visitor);
      walkType(type.value, [...path, 'value'], visitor);
      break;
    case 'named':
      type.typeArguments.forEach((arg, i) => walkType(arg, [...path, 'typeArguments', i], visitor));
      break;
    case 'function':
      type.parameters.forEach((param, i) => walkType(param, [...path, 'parameters', i], visitor));
      walkType(type.returnType, [...path, 'returnType'], visitor);
      break;
    case 'union':
      type.members.forEach((member, i) => walkType(member, [...path, 'members', i], visitor));
      break;
    default:
      break;
  }
}
