import { IRPath, MappingLiteral, SequenceLiteral, SetLiteral, Type } from "../types";
import { commonTypes, createMappingType, createSequenceType, createSetType, joinTypes } from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { inferExpression } from "./expression-validator";
import { validateTypeReference } from "./declaration-validator";

// Element type is the declared one when given, otherwise the join of the elements
export function validateCollectionLiteral(
  expr: SequenceLiteral | SetLiteral,
  path: IRPath,
  scope: Scope,
  validator: Validator
): Type {
  if (expr.elementType) {
    validateTypeReference(expr.elementType, [...path, 'elementType'], validator);
  }
  let element = expr.elementType;
  expr.elements.forEach((item, i) => {
    const itemPath = [...path, 'elements', i];
    const type = inferExpression(item, itemPath, scope, validator);
    if (expr.elementType) {
      validator.expectAssignable(itemPath, type, expr.elementType);
    } else {
      element = element ? joinTypes(element, type, validator.symbols) : type;
    }
  });
  const resolved = element ?? commonTypes.any;
  return expr.kind === 'sequenceLiteral' ? createSequenceType(resolved) : createSetType(resolved);
}

export function validateMappingLiteral(expr: MappingLiteral, path: IRPath, scope: Scope, validator: Validator): Type {
  if (expr.keyType) {
    validateTypeReference(expr.keyType, [...path, 'keyType'], validator);
  }
  if (expr.valueType) {
    validateTypeReference(expr.valueType, [...path, 'valueType'], validator);
  }
  let key = expr.keyType;
  let value = expr.valueType;
  expr.entries.forEach((entry, i) => {
    const keyPath = [...path, 'entries', i, 'key'];
    const valuePath = [...path, 'entries', i, 'value'];
    const keyType = inferExpression(entry.key, keyPath, scope, validator);
    const valueType = inferExpression(entry.value, valuePath, scope, validator);
    if (expr.keyType) {
      validator.expectAssignable(keyPath, keyType, expr.keyType);
    } else {
      key = key ? joinTypes(key, keyType, validator.symbols) : keyType;
    }
    if (expr.valueType) {
      validator.expectAssignable(valuePath, valueType, expr.valueType);
    } else {
      value = value ? joinTypes(value, valueType, validator.symbols) : valueType;
    }
  });
  return createMappingType(key ?? commonTypes.any, value ?? commonTypes.any);
}
