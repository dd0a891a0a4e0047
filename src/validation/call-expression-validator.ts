import {
  CallArgument, CallExpression, Expression, FunctionDeclaration, InstantiateExpression, IRPath, Parameter, Type
} from "../types";
import {
  commonTypes, createFunctionType, createUnknownType, expandAliases, isDynamic, substituteTypeParameters,
  typeParameterMapping, typeToString
} from "../type-utils";
import { Validator } from "./validator";
import { Scope } from "./scope";
import { constructorParameters } from "./symbols";
import { inferExpression, inferName } from "./expression-validator";
import { resolveMemberExpression } from "./member-access-validator";
import { validateTypeReference } from "./declaration-validator";

interface CalleeInfo {
  type: Type;
  // Known when the callee is a declared function or method, so named
  // arguments and defaults can be checked
  parameters?: readonly Parameter[];
}

export function functionTypeOf(declaration: FunctionDeclaration): Type {
  return createFunctionType(declaration.parameters.map(p => p.type), declaration.returnType);
}

function resolveCallee(callee: Expression, path: IRPath, scope: Scope, validator: Validator): CalleeInfo {
  if (callee.kind === 'name' && !scope.lookup(callee.name)) {
    const resolved = validator.symbols.lookup(callee.name);
    const declaration = resolved?.declaration;
    if (resolved && declaration && declaration.kind === 'function') {
      validator.recordReference(path, resolved);
      return { type: functionTypeOf(declaration), parameters: declaration.parameters };
    }
    if (declaration && declaration.kind === 'class') {
      validator.reportMismatch(path, 'function', `class ${callee.name}`, `class '${callee.name}' is constructed with instantiate, not called`);
      return { type: createUnknownType() };
    }
    return { type: inferName(callee, path, scope, validator, true) };
  }
  if (callee.kind === 'member') {
    const access = resolveMemberExpression(callee, path, scope, validator, true);
    const parameters = access.member?.kind === 'method' ? access.member.parameters : undefined;
    return parameters ? { type: access.type, parameters } : { type: access.type };
  }
  return { type: inferExpression(callee, path, scope, validator) };
}

function inferArguments(args: readonly CallArgument[], path: IRPath, scope: Scope, validator: Validator): void {
  args.forEach((arg, i) => inferExpression(arg.value, [...path, 'arguments', i, 'value'], scope, validator));
}

export function validateCallExpression(expr: CallExpression, path: IRPath, scope: Scope, validator: Validator): Type {
  const calleePath = [...path, 'callee'];
  const callee = resolveCallee(expr.callee, calleePath, scope, validator);
  validator.recordType(calleePath, callee.type);

  if (isDynamic(callee.type)) {
    inferArguments(expr.arguments, path, scope, validator);
    return callee.type.kind === 'unknown' ? callee.type : commonTypes.any;
  }

  const type = expandAliases(callee.type, validator.symbols);
  if (type.kind !== 'function') {
    validator.reportMismatch(calleePath, 'function', type, `'${typeToString(type)}' is not callable`);
    inferArguments(expr.arguments, path, scope, validator);
    return createUnknownType();
  }

  if (callee.parameters) {
    matchArguments(expr.arguments, callee.parameters, path, scope, validator);
  } else {
    matchPositionalArguments(expr.arguments, type.parameters, path, scope, validator);
  }
  return type.returnType;
}

/**
 * Matches call arguments against declared parameters: positional arguments
 * fill the non-keyword-only parameters in order, named ones go by name, and
 * every parameter without a default must be filled.
 */
export function matchArguments(
  args: readonly CallArgument[],
  parameters: readonly Parameter[],
  path: IRPath,
  scope: Scope,
  validator: Validator
): void {
  const positional = parameters.filter(p => !p.keywordOnly);
  const positionalCount = args.filter(arg => arg.name === undefined).length;
  const filled = new Set<string>();

  args.forEach((arg, i) => {
    const argPath = [...path, 'arguments', i];
    const valuePath = [...argPath, 'value'];
    const omitted = arg.value.kind === 'omit';
    const valueType = omitted ? undefined : inferExpression(arg.value, valuePath, scope, validator);
    let parameter: Parameter | undefined;
    if (arg.name === undefined) {
      parameter = positional[i];
      if (!parameter) {
        validator.reportMismatch(
          argPath,
          `at most ${positional.length} positional argument(s)`,
          `${positionalCount} positional argument(s)`,
          'too many positional arguments'
        );
        return;
      }
    } else {
      const name = arg.name;
      parameter = parameters.find(p => p.name === name);
      if (!parameter) {
        validator.reportMismatch(argPath, 'a declared parameter name', `'${name}'`, `no parameter named '${name}'`);
        return;
      }
      if (filled.has(name)) {
        validator.reportMismatch(argPath, 'one argument per parameter', `'${name}' twice`, `argument '${name}' given twice`);
        return;
      }
    }
    filled.add(parameter.name);
    if (valueType) {
      validator.expectAssignable(valuePath, valueType, parameter.type);
    } else if (parameter.defaultValue?.kind !== 'omit') {
      validator.reportMismatch(valuePath, parameter.type, 'omitted', `parameter '${parameter.name}' cannot be omitted`);
    }
  });

  const required = parameters.filter(p => !p.defaultValue);
  const missing = required.filter(p => !filled.has(p.name));
  if (missing.length > 0) {
    validator.reportMismatch(
      path,
      `${required.length} required argument(s)`,
      `${args.length} argument(s)`,
      `missing argument(s) for ${missing.map(p => `'${p.name}'`).join(', ')}`
    );
  }
}

// Function-typed values carry no parameter names: positional arguments only
function matchPositionalArguments(
  args: readonly CallArgument[],
  parameterTypes: readonly Type[],
  path: IRPath,
  scope: Scope,
  validator: Validator
): void {
  args.forEach((arg, i) => {
    const argPath = [...path, 'arguments', i];
    const valueType = inferExpression(arg.value, [...argPath, 'value'], scope, validator);
    if (arg.name !== undefined) {
      validator.reportMismatch(argPath, 'positional argument', `named argument '${arg.name}'`, 'function values take positional arguments only');
      return;
    }
    const expected = parameterTypes[i];
    if (expected) {
      validator.expectAssignable([...argPath, 'value'], valueType, expected);
    }
  });
  if (args.length !== parameterTypes.length) {
    validator.reportMismatch(
      path,
      `${parameterTypes.length} argument(s)`,
      `${args.length} argument(s)`,
      `expected ${parameterTypes.length} argument(s), got ${args.length}`
    );
  }
}

export function validateInstantiateExpression(
  expr: InstantiateExpression,
  path: IRPath,
  scope: Scope,
  validator: Validator
): Type {
  const typePath = [...path, 'type'];
  if (!validateTypeReference(expr.type, typePath, validator)) {
    inferArguments(expr.arguments, path, scope, validator);
    return createUnknownType();
  }
  if (validator.isTypeParameter(expr.type.name)) {
    validator.reportMismatch(typePath, 'class', `type parameter ${expr.type.name}`, `type parameter '${expr.type.name}' cannot be instantiated`);
    inferArguments(expr.arguments, path, scope, validator);
    return createUnknownType();
  }

  const declaration = validator.symbols.lookupType(expr.type.name)?.declaration;
  if (!declaration || declaration.kind === 'extern') {
    inferArguments(expr.arguments, path, scope, validator);
    return expr.type;
  }
  if (declaration.kind !== 'class') {
    validator.reportMismatch(typePath, 'class', `${declaration.kind} ${declaration.name}`, `'${declaration.name}' is not a class`);
    inferArguments(expr.arguments, path, scope, validator);
    return createUnknownType();
  }
  if (declaration.isAbstract) {
    validator.reportMismatch(typePath, 'concrete class', `abstract class ${declaration.name}`, `cannot instantiate abstract class '${declaration.name}'`);
  }

  const mapping = typeParameterMapping(declaration.typeParameters, expr.type.typeArguments);
  const parameters: Parameter[] = constructorParameters(declaration).map(field => ({
    name: field.name,
    type: substituteTypeParameters(field.type, mapping),
    defaultValue: field.defaultValue,
    keywordOnly: false
  }));
  matchArguments(expr.arguments, parameters, path, scope, validator);
  return expr.type;
}
