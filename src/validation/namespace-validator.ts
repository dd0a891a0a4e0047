import { IRPath, LambdaParameter, Parameter, Statement } from "../types";
import { Validator } from "./validator";
import { walkModule } from "./ir-walker";

interface NamedEntry {
  name: string;
  path: IRPath;
}

function checkUnique(entries: readonly NamedEntry[], context: string, validator: Validator, seen = new Set<string>()): void {
  for (const entry of entries) {
    if (seen.has(entry.name)) {
      validator.reportDuplicate(entry.path, `'${entry.name}' is already declared in this ${context}`);
    } else {
      seen.add(entry.name);
    }
  }
}

function parameterEntries(parameters: readonly (Parameter | LambdaParameter)[], path: IRPath): NamedEntry[] {
  return parameters.map((param, i) => ({ name: param.name, path: [...path, 'parameters', i] }));
}

export function validateNamespaces(validator: Validator): void {
  const module = validator.module;
  checkUnique(module.declarations.map((d, i) => ({ name: d.name, path: ['declarations', i] })), 'module', validator);

  module.declarations.forEach((declaration, i) => {
    const path: IRPath = ['declarations', i];
    switch (declaration.kind) {
      case 'class': {
        checkUnique(
          declaration.typeParameters.map((name, j) => ({ name, path: [...path, 'typeParameters', j] })),
          'type parameter list',
          validator
        );
        // fields and methods share one namespace in every target
        checkUnique([
          ...declaration.fields.map((f, j) => ({ name: f.name, path: [...path, 'fields', j] })),
          ...declaration.methods.map((m, j) => ({ name: m.name, path: [...path, 'methods', j] }))
        ], 'class', validator);
        declaration.methods.forEach((method, j) => {
          const methodPath = [...path, 'methods', j];
          const params = parameterEntries(method.parameters, methodPath);
          const seen = new Set<string>();
          checkUnique(params, 'parameter list', validator, seen);
          checkBlock(method.body, [...methodPath, 'body'], validator, seen);
        });
        break;
      }
      case 'function': {
        const seen = new Set<string>();
        checkUnique(parameterEntries(declaration.parameters, path), 'parameter list', validator, seen);
        checkBlock(declaration.body, [...path, 'body'], validator, seen);
        break;
      }
      case 'interface':
        checkUnique(
          declaration.properties.map((p, j) => ({ name: p.name, path: [...path, 'properties', j] })),
          'interface',
          validator
        );
        break;
      default:
        break;
    }
  });

  walkModule(module, {
    expression(expression, path) {
      if (expression.kind === 'lambda') {
        checkUnique(parameterEntries(expression.parameters, path), 'parameter list', validator);
      }
    }
  });
}

// Locals declared twice in the same block; names bound by the enclosing
// construct (parameters, loop variables, bindings) count as declared there
function checkBlock(statements: readonly Statement[], path: IRPath, validator: Validator, seen = new Set<string>()): void {
  statements.forEach((statement, i) => {
    const statementPath = [...path, i];
    switch (statement.kind) {
      case 'varDecl':
        checkUnique([{ name: statement.name, path: statementPath }], 'block', validator, seen);
        break;
      case 'if':
        statement.branches.forEach((branch, j) => checkBlock(branch.body, [...statementPath, 'branches', j, 'body'], validator));
        if (statement.elseBody) {
          checkBlock(statement.elseBody, [...statementPath, 'elseBody'], validator);
        }
        break;
      case 'while':
        checkBlock(statement.body, [...statementPath, 'body'], validator);
        break;
      case 'forEach':
        checkBlock(statement.body, [...statementPath, 'body'], validator, new Set([statement.variable]));
        break;
      case 'forEntries': {
        const bound = new Set<string>();
        checkUnique([
          { name: statement.keyVariable, path: statementPath },
          { name: statement.valueVariable, path: statementPath }
        ], 'loop', validator, bound);
        checkBlock(statement.body, [...statementPath, 'body'], validator, bound);
        break;
      }
      case 'with':
        checkBlock(statement.body, [...statementPath, 'body'], validator, new Set(statement.binding ? [statement.binding] : []));
        break;
      case 'tryCatch':
        checkBlock(statement.body, [...statementPath, 'body'], validator);
        statement.catches.forEach((clause, j) => {
          checkBlock(clause.body, [...statementPath, 'catches', j, 'body'], validator, new Set(clause.binding ? [clause.binding] : []));
        });
        if (statement.finallyBody) {
          checkBlock(statement.finallyBody, [...statementPath, 'finallyBody'], validator);
        }
        break;
      default:
        break;
    }
  });
}
