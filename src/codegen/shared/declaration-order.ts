import { Declaration, Expression, Module, Parameter } from '../../types';
import { walkExpression } from '../../validation/ir-walker';

export interface OrderedDeclaration {
  declaration: Declaration;
  // Position in the module, which is also the IR path index
  index: number;
}

// Local declarations that must be defined before `declaration` runs
function dependencies(declaration: Declaration, locals: ReadonlyMap<string, number>): number[] {
  const found = new Set<number>();
  const note = (name: string): void => {
    const index = locals.get(name);
    if (index !== undefined) {
      found.add(index);
    }
  };
  const scan = (expr: Expression): void => {
    walkExpression(expr, [], {
      expression(node) {
        if (node.kind === 'name') {
          note(node.name);
        } else if (node.kind === 'instantiate') {
          note(node.type.name);
        }
      }
    });
  };

  // defaults are evaluated where the function is defined
  const scanDefaults = (parameters: readonly Parameter[]): void => {
    for (const param of parameters) {
      if (param.defaultValue) {
        scan(param.defaultValue);
      }
    }
  };

  switch (declaration.kind) {
    case 'class':
      declaration.bases.forEach(base => note(base.name));
      for (const field of declaration.fields) {
        if (field.defaultValue) {
          scan(field.defaultValue);
        }
      }
      declaration.methods.forEach(method => scanDefaults(method.parameters));
      break;
    case 'function':
      scanDefaults(declaration.parameters);
      break;
    case 'const':
      scan(declaration.value);
      break;
    default:
      break;
  }
  return [...found];
}

/**
 * Declaration order for targets that execute a module top to bottom: a
 * class follows its local base classes, and every declaration follows the
 * local declarations that its constant value or its default values use.
 * Otherwise the module's own order is kept.
 */
export function executionOrder(module: Module): OrderedDeclaration[] {
  const locals = new Map<string, number>();
  module.declarations.forEach((declaration, index) => {
    if (!locals.has(declaration.name)) {
      locals.set(declaration.name, index);
    }
  });

  const pending = module.declarations.map((declaration, index) => ({
    declaration,
    index,
    waitsFor: new Set(dependencies(declaration, locals).filter(dependency => dependency !== index))
  }));
  const ordered: OrderedDeclaration[] = [];
  const done = new Set<number>();

  while (pending.length > 0) {
    let next = pending.findIndex(entry => [...entry.waitsFor].every(dependency => done.has(dependency)));
    // a cycle cannot be ordered; keep the module's order for what remains
    if (next < 0) {
      next = 0;
    }
    const [entry] = pending.splice(next, 1);
    done.add(entry.index);
    ordered.push({ declaration: entry.declaration, index: entry.index });
  }
  return ordered;
}
