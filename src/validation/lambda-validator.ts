import { IRPath, LambdaExpression, Type } from "../types";
import { createFunctionType } from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { inferExpression } from "./expression-validator";
import { validateTypeReference } from "./declaration-validator";

// Lambdas close over the enclosing scope; their parameters shadow it
export function validateLambdaExpression(expr: LambdaExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const lambdaScope = scope.child();
  expr.parameters.forEach((param, i) => {
    validateTypeReference(param.type, [...path, 'parameters', i, 'type'], validator);
    lambdaScope.declare(param.name, { kind: 'parameter', type: param.type });
  });
  if (expr.returnType) {
    validateTypeReference(expr.returnType, [...path, 'returnType'], validator);
  }
  const bodyPath = [...path, 'body'];
  const bodyType = inferExpression(expr.body, bodyPath, lambdaScope, validator);
  if (expr.returnType) {
    validator.expectAssignable(bodyPath, bodyType, expr.returnType);
  }
  return createFunctionType(expr.parameters.map(p => p.type), expr.returnType ?? bodyType);
}
