import {
  CapabilityProfile, ConstructKind, Diagnostic, Expression, IRPath, Module, TargetLanguage, Type, formatIRPath
} from "../types";
import { expandAliases, isDynamic, isNumeric, isStringLike } from "../type-utils";
import { Validator, ConstructUse } from "./validator";
import { walkModule } from "./ir-walker";

const CONSTRUCT_LABELS: Record<ConstructKind, string> = {
  'lambda': 'lambda expression',
  'named-argument': 'named argument',
  'keyword-only-parameter': 'keyword-only parameter',
  'async-function': 'async function',
  'multiple-inheritance': 'multiple inheritance',
  'interface': 'interface declaration',
  'optional-property': 'optional interface property',
  'type-alias': 'type alias',
  'distinct-type': 'distinct type',
  'generic-class': 'generic class',
  'set-type': 'set type',
  'cast': 'cast expression',
  'scoped-resource': 'scoped resource',
  'complex-mapping-key': 'mapping key of a non-scalar type',
  'circular-import': 'circular import',
  'function-value': 'function used as a value',
  'computed-constant': 'computed constant value',
  'uninitialized-variable': 'variable declared without a value',
  'extern-binding': 'extern binding',
  'omittable-parameter': 'omittable parameter'
};

export function constructLabel(construct: ConstructKind): string {
  return CONSTRUCT_LABELS[construct];
}

// Expressions every target can place in a constant or default position
export function isConstantExpression(expr: Expression, module: Module): boolean {
  switch (expr.kind) {
    case 'literal':
      return true;
    case 'unary':
      return isConstantExpression(expr.operand, module);
    case 'binary':
      return isConstantExpression(expr.left, module) && isConstantExpression(expr.right, module);
    case 'conditional':
      return isConstantExpression(expr.test, module)
        && isConstantExpression(expr.consequent, module)
        && isConstantExpression(expr.alternate, module);
    case 'sequenceLiteral':
    case 'setLiteral':
      return expr.elements.every(element => isConstantExpression(element, module));
    case 'mappingLiteral':
      return expr.entries.every(entry => isConstantExpression(entry.key, module) && isConstantExpression(entry.value, module));
    case 'name':
      return module.declarations.some(d => d.kind === 'const' && d.name === expr.name);
    default:
      return false;
  }
}

// Keys every target can use in its native mapping: strings and numbers
function isScalarKey(type: Type, validator: Validator): boolean {
  let current = expandAliases(type, validator.symbols);
  if (current.kind === 'named') {
    const info = validator.symbols.lookupNamed(current.name);
    if (info && info.kind === 'alias') {
      current = expandAliases(info.aliased, validator.symbols);
    }
  }
  return isDynamic(current) || isStringLike(current) || isNumeric(current);
}

function isClassBase(name: string, validator: Validator): boolean {
  const declaration = validator.symbols.lookupTypeAnywhere(name)?.declaration;
  return declaration !== undefined
    && (declaration.kind === 'class' || (declaration.kind === 'extern' && declaration.entity === 'class'));
}

/**
 * Cycles through `imports` that lead back to the module, found depth-first
 * over the available modules. Reported at the import that starts the cycle.
 */
function findImportCycles(validator: Validator): ConstructUse[] {
  const module = validator.module;
  const uses: ConstructUse[] = [];
  module.imports.forEach((name, i) => {
    const visited = new Set<string>();
    const stack = [name];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) {
        continue;
      }
      visited.add(current);
      if (current === module.name) {
        uses.push({ construct: 'circular-import', path: ['imports', i], detail: `importing '${name}' leads back to '${module.name}'` });
        return;
      }
      const imported = validator.available.get(current);
      if (imported) {
        stack.push(...imported.imports);
      }
    }
  });
  return uses;
}

// Every construct kind the module uses, in IR order
export function collectConstructs(validator: Validator): ConstructUse[] {
  const module = validator.module;
  const uses: ConstructUse[] = findImportCycles(validator);
  const use = (construct: ConstructKind, path: IRPath, detail: string): void => {
    uses.push({ construct, path, detail });
  };
  const checkDefault = (value: Expression | undefined, path: IRPath, owner: string): void => {
    if (value?.kind === 'omit') {
      use('omittable-parameter', path, `parameter '${owner}' is omittable`);
    } else if (value && !isConstantExpression(value, module)) {
      use('computed-constant', path, `default of '${owner}' is not a constant expression`);
    }
  };

  walkModule(module, {
    declaration(declaration, path) {
      switch (declaration.kind) {
        case 'class': {
          if (declaration.typeParameters.length > 0) {
            use('generic-class', path, `class '${declaration.name}' is generic`);
          }
          const classBases = declaration.bases.filter(base => isClassBase(base.name, validator));
          if (classBases.length > 1) {
            use('multiple-inheritance', path, `class '${declaration.name}' extends ${classBases.length} classes`);
          }
          declaration.fields.forEach((field, i) => {
            if (field.initArg) {
              checkDefault(field.defaultValue, [...path, 'fields', i, 'defaultValue'], field.name);
            }
          });
          declaration.methods.forEach((method, m) => {
            const methodPath = [...path, 'methods', m];
            if (method.isAsync) {
              use('async-function', methodPath, `method '${method.name}' is async`);
            }
            method.parameters.forEach((param, p) => {
              if (param.keywordOnly) {
                use('keyword-only-parameter', [...methodPath, 'parameters', p], `parameter '${param.name}' is keyword-only`);
              }
              checkDefault(param.defaultValue, [...methodPath, 'parameters', p, 'defaultValue'], param.name);
            });
          });
          break;
        }
        case 'function':
          if (declaration.isAsync) {
            use('async-function', path, `function '${declaration.name}' is async`);
          }
          declaration.parameters.forEach((param, p) => {
            if (param.keywordOnly) {
              use('keyword-only-parameter', [...path, 'parameters', p], `parameter '${param.name}' is keyword-only`);
            }
            checkDefault(param.defaultValue, [...path, 'parameters', p, 'defaultValue'], param.name);
          });
          break;
        case 'const':
          checkDefault(declaration.value, [...path, 'value'], declaration.name);
          break;
        case 'typeAlias':
          use(declaration.distinct ? 'distinct-type' : 'type-alias', path, `type alias '${declaration.name}'`);
          break;
        case 'interface':
          use('interface', path, `interface '${declaration.name}'`);
          declaration.properties.forEach((property, i) => {
            if (property.optional) {
              use('optional-property', [...path, 'properties', i], `property '${property.name}' is optional`);
            }
          });
          break;
        case 'extern':
          break;
      }
    },
    statement(statement, path) {
      if (statement.kind === 'with') {
        use('scoped-resource', path, 'with statement');
      } else if (statement.kind === 'varDecl' && !statement.value) {
        use('uninitialized-variable', path, `variable '${statement.name}' has no initial value`);
      }
    },
    expression(expression, path) {
      switch (expression.kind) {
        case 'lambda':
          use('lambda', path, 'lambda expression');
          break;
        case 'cast':
          use('cast', path, 'cast expression');
          break;
        case 'setLiteral':
          use('set-type', path, 'set literal');
          break;
        case 'omit':
          // a parameter default was reported with its declaration
          if (path[path.length - 1] !== 'defaultValue') {
            use('omittable-parameter', path, 'omitted argument value');
          }
          break;
        case 'typeTest':
          if (expression.tested === 'omitted') {
            use('omittable-parameter', path, 'test for an omitted argument');
          }
          break;
        case 'call':
        case 'instantiate':
          expression.arguments.forEach((arg, i) => {
            if (arg.name !== undefined) {
              use('named-argument', [...path, 'arguments', i], `argument '${arg.name}' is passed by name`);
            }
          });
          break;
        case 'mappingLiteral': {
          const inferred = validator.types.get(formatIRPath(path));
          if (inferred && inferred.kind === 'mapping' && !isScalarKey(inferred.key, validator)) {
            use('complex-mapping-key', path, 'mapping literal with non-scalar keys');
          }
          break;
        }
        default:
          break;
      }
    },
    type(type, path) {
      if (type.kind === 'set') {
        use('set-type', path, 'set type');
      } else if (type.kind === 'mapping' && !isScalarKey(type.key, validator)) {
        use('complex-mapping-key', path, 'mapping type with non-scalar keys');
      }
    }
  });

  return [...uses, ...validator.constructs];
}

/**
 * Checks the module against each target's capability set. Returns the
 * unsupported-construct diagnostics per target, only for targets that have any.
 */
export function validateCapabilities(
  validator: Validator,
  targets: readonly CapabilityProfile[]
): Map<TargetLanguage, Diagnostic[]> {
  const unsupported = new Map<TargetLanguage, Diagnostic[]>();
  if (targets.length === 0) {
    return unsupported;
  }
  const uses = collectConstructs(validator);
  const module = validator.module;

  for (const profile of targets) {
    const target = profile.target;
    for (const construct of uses) {
      if (!profile.capabilities.has(construct.construct)) {
        const label = constructLabel(construct.construct);
        const detail = construct.detail === label ? '' : `: ${construct.detail}`;
        validator.reportUnsupported(construct.path, target, construct.construct, `${label} is not supported by ${target}${detail}`);
      }
    }
    module.declarations.forEach((declaration, i) => {
      if (declaration.kind === 'extern' && !declaration.bindings[target]) {
        validator.reportUnsupported(
          ['declarations', i],
          target,
          'extern-binding',
          `extern '${declaration.name}' has no binding for ${target}`
        );
      }
    });
    const diagnostics = validator.diagnosticsFor('capability').filter(d => d.target === target);
    if (diagnostics.length > 0) {
      validator.log(`${diagnostics.length} unsupported construct(s) for ${target}`);
      unsupported.set(target, [...diagnostics]);
    }
  }
  return unsupported;
}
