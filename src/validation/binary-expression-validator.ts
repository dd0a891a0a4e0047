import { BinaryExpression, IRPath, Type, UnaryExpression } from "../types";
import {
  commonTypes, createUnknownType, expandAliases, isDynamic, isNumeric, isPrimitive, isStringLike, literalBaseType
} from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { inferExpression } from "./expression-validator";

// Operators see through every alias, distinct ones included
function operandType(type: Type, validator: Validator): Type {
  let current = expandAliases(type, validator.symbols);
  for (let depth = 0; depth < 32 && current.kind === 'named'; depth++) {
    const info = validator.symbols.lookupNamed(current.name);
    if (!info || info.kind !== 'alias') {
      break;
    }
    current = expandAliases(info.aliased, validator.symbols);
  }
  return current.kind === 'literal' ? literalBaseType(current) : current;
}

function dynamicOf(left: Type, right: Type): Type {
  return left.kind === 'unknown' || right.kind === 'unknown' ? createUnknownType() : commonTypes.any;
}

export function validateBinaryExpression(expr: BinaryExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const leftPath = [...path, 'left'];
  const rightPath = [...path, 'right'];
  const left = inferExpression(expr.left, leftPath, scope, validator);
  const right = inferExpression(expr.right, rightPath, scope, validator);

  switch (expr.operator) {
    case '==':
    case '!=':
      return commonTypes.bool;
    case 'and':
    case 'or':
      validator.expectAssignable(leftPath, left, commonTypes.bool);
      validator.expectAssignable(rightPath, right, commonTypes.bool);
      return commonTypes.bool;
    case '<':
    case '<=':
    case '>':
    case '>=': {
      if (isDynamic(left) || isDynamic(right)) {
        return commonTypes.bool;
      }
      const l = operandType(left, validator);
      const r = operandType(right, validator);
      if (isNumeric(l)) {
        if (!isNumeric(r)) {
          validator.reportMismatch(rightPath, 'int or float', right);
        }
      } else if (isStringLike(l)) {
        if (!isStringLike(r)) {
          validator.reportMismatch(rightPath, commonTypes.string, right);
        }
      } else {
        validator.reportMismatch(leftPath, 'int, float or string', left);
      }
      return commonTypes.bool;
    }
    default:
      return validateArithmetic(expr, left, right, leftPath, rightPath, validator);
  }
}

function validateArithmetic(
  expr: BinaryExpression,
  left: Type,
  right: Type,
  leftPath: IRPath,
  rightPath: IRPath,
  validator: Validator
): Type {
  if (isDynamic(left) || isDynamic(right)) {
    return dynamicOf(left, right);
  }
  const l = operandType(left, validator);
  const r = operandType(right, validator);

  if (expr.operator === '+' && isStringLike(l)) {
    if (!isStringLike(r)) {
      validator.reportMismatch(rightPath, commonTypes.string, right);
      return createUnknownType();
    }
    return commonTypes.string;
  }
  if (!isNumeric(l)) {
    validator.reportMismatch(leftPath, expr.operator === '+' ? 'int, float or string' : 'int or float', left);
    return createUnknownType();
  }
  if (!isNumeric(r)) {
    validator.reportMismatch(rightPath, 'int or float', right);
    return createUnknownType();
  }
  if (expr.operator === '/') {
    return commonTypes.float;
  }
  return isPrimitive(l, 'int') && isPrimitive(r, 'int') ? commonTypes.int : commonTypes.float;
}

export function validateUnaryExpression(expr: UnaryExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const operandPath = [...path, 'operand'];
  const operand = inferExpression(expr.operand, operandPath, scope, validator);
  if (expr.operator === 'not') {
    validator.expectAssignable(operandPath, operand, commonTypes.bool);
    return commonTypes.bool;
  }
  if (isDynamic(operand)) {
    return operand;
  }
  const type = operandType(operand, validator);
  if (!isNumeric(type)) {
    validator.reportMismatch(operandPath, 'int or float', operand);
    return createUnknownType();
  }
  return type;
}
