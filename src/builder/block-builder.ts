// Statement builders. Bodies are filled through callbacks so nesting in the
// calling code mirrors nesting in the generated code.

import {
  Statement, Expression, NameExpression, AssignTarget, Type, IfBranch, CatchClause, VarDeclStatement,
  ForEachStatement, WithStatement, StructuralError
} from '../types';
import { ExpressionLike, assertName, ref, toExpression } from './expressions';

export interface BuildState {
  sealed: boolean;
}

export function assertBuilding(state: BuildState, operation: string): void {
  if (state.sealed) {
    throw new StructuralError('module is sealed and can no longer be modified', operation);
  }
}

// A statement whose shape is still being filled in by chained calls
abstract class PendingStatement {
  abstract build(): Statement;
}

export type BodyCallback = (body: BlockBuilder) => void;

export interface DeclareOptions {
  type?: Type;
  value?: ExpressionLike;
  constant?: boolean;
}

export class BlockBuilder {
  private readonly items: Array<Statement | PendingStatement> = [];

  constructor(private readonly state: BuildState, private readonly inLoop: boolean = false) {}

  get length(): number {
    return this.items.length;
  }

  private push(statement: Statement | PendingStatement, operation: string): this {
    assertBuilding(this.state, operation);
    this.items.push(statement);
    return this;
  }

  private nested(build: BodyCallback | undefined, inLoop: boolean = this.inLoop): Statement[] {
    const block = new BlockBuilder(this.state, inLoop);
    if (build) {
      build(block);
    }
    return block.build();
  }

  assign(target: AssignTarget, value: ExpressionLike): this {
    if (target.kind !== 'name' && target.kind !== 'member' && target.kind !== 'index') {
      throw new StructuralError('assignment target must be a name, member or index expression', 'assign');
    }
    return this.push({ kind: 'assign', target, value: toExpression(value, 'assign') }, 'assign');
  }

  declare(name: string, options: DeclareOptions = {}): NameExpression {
    assertName(name, 'declare');
    if (!options.type && options.value === undefined) {
      throw new StructuralError(`variable '${name}' needs a type or an initial value`, 'declare');
    }
    const statement: VarDeclStatement = { kind: 'varDecl', name, constant: options.constant ?? false };
    if (options.type) {
      statement.type = options.type;
    }
    if (options.value !== undefined) {
      statement.value = toExpression(options.value, 'declare');
    }
    this.push(statement, 'declare');
    return ref(name);
  }

  if(condition: ExpressionLike, build: BodyCallback): IfBuilder {
    const pending = new IfBuilder(this.state, this.inLoop);
    pending.elseIf(condition, build);
    this.push(pending, 'if');
    return pending;
  }

  // An if/elif chain given all at once; `branches` may not be empty
  ifChain(branches: ReadonlyArray<readonly [ExpressionLike, BodyCallback]>, otherwise?: BodyCallback): this {
    if (branches.length === 0) {
      throw new StructuralError('an if statement needs at least one branch', 'ifChain');
    }
    const pending = new IfBuilder(this.state, this.inLoop);
    for (const [condition, build] of branches) {
      pending.elseIf(condition, build);
    }
    if (otherwise) {
      pending.else(otherwise);
    }
    return this.push(pending, 'ifChain');
  }

  while(condition: ExpressionLike, build: BodyCallback): this {
    const test = toExpression(condition, 'while');
    return this.push({ kind: 'while', condition: test, body: this.nested(build, true) }, 'while');
  }

  forEach(
    variable: string,
    iterable: ExpressionLike,
    build: (body: BlockBuilder, item: NameExpression) => void,
    options: { type?: Type } = {}
  ): this {
    assertName(variable, 'forEach');
    const item = ref(variable);
    const statement: ForEachStatement = {
      kind: 'forEach',
      variable,
      iterable: toExpression(iterable, 'forEach'),
      body: this.nested(body => build(body, item), true)
    };
    if (options.type) {
      statement.variableType = options.type;
    }
    return this.push(statement, 'forEach');
  }

  forEntries(
    keyVariable: string,
    valueVariable: string,
    mapping: ExpressionLike,
    build: (body: BlockBuilder, key: NameExpression, value: NameExpression) => void
  ): this {
    const key = ref(assertName(keyVariable, 'forEntries'));
    const value = ref(assertName(valueVariable, 'forEntries'));
    return this.push({
      kind: 'forEntries',
      keyVariable,
      valueVariable,
      mapping: toExpression(mapping, 'forEntries'),
      body: this.nested(body => build(body, key, value), true)
    }, 'forEntries');
  }

  return(value?: ExpressionLike): this {
    if (value === undefined) {
      return this.push({ kind: 'return' }, 'return');
    }
    return this.push({ kind: 'return', value: toExpression(value, 'return') }, 'return');
  }

  raise(message: ExpressionLike, errorClass?: string): this {
    const statement = { kind: 'raise' as const, message: toExpression(message, 'raise') };
    if (errorClass !== undefined) {
      return this.push({ ...statement, errorClass: assertName(errorClass, 'raise') }, 'raise');
    }
    return this.push(statement, 'raise');
  }

  expression(expression: Expression): this {
    return this.push({ kind: 'expression', expression: toExpression(expression, 'expression') }, 'expression');
  }

  with(resource: ExpressionLike, build: (body: BlockBuilder, bound?: NameExpression) => void, binding?: string): this {
    const statement: WithStatement = {
      kind: 'with',
      resource: toExpression(resource, 'with'),
      body: []
    };
    let bound: NameExpression | undefined;
    if (binding !== undefined) {
      statement.binding = assertName(binding, 'with');
      bound = ref(binding);
    }
    statement.body = this.nested(body => build(body, bound));
    return this.push(statement, 'with');
  }

  try(build: BodyCallback): TryBuilder {
    const pending = new TryBuilder(this.state, this.inLoop, this.nested(build));
    this.push(pending, 'try');
    return pending;
  }

  append(target: ExpressionLike, value: ExpressionLike): this {
    return this.push({
      kind: 'append',
      target: toExpression(target, 'append'),
      value: toExpression(value, 'append')
    }, 'append');
  }

  pass(): this {
    return this.push({ kind: 'pass' }, 'pass');
  }

  break(): this {
    if (!this.inLoop) {
      throw new StructuralError('break outside of a loop', 'break');
    }
    return this.push({ kind: 'break' }, 'break');
  }

  continue(): this {
    if (!this.inLoop) {
      throw new StructuralError('continue outside of a loop', 'continue');
    }
    return this.push({ kind: 'continue' }, 'continue');
  }

  comment(text: string): this {
    return this.push({ kind: 'comment', text }, 'comment');
  }

  build(): Statement[] {
    return this.items.map(item => item instanceof PendingStatement ? item.build() : item);
  }
}

export class IfBuilder extends PendingStatement {
  private readonly branches: IfBranch[] = [];
  private elseBody?: Statement[];

  constructor(private readonly state: BuildState, private readonly inLoop: boolean) {
    super();
  }

  elseIf(condition: ExpressionLike, build: BodyCallback): this {
    assertBuilding(this.state, 'elseIf');
    if (this.elseBody) {
      throw new StructuralError('else branch already added', 'elseIf');
    }
    const test = toExpression(condition, 'elseIf');
    const block = new BlockBuilder(this.state, this.inLoop);
    build(block);
    this.branches.push({ condition: test, body: block.build() });
    return this;
  }

  else(build: BodyCallback): this {
    assertBuilding(this.state, 'else');
    if (this.elseBody) {
      throw new StructuralError('else branch already added', 'else');
    }
    const block = new BlockBuilder(this.state, this.inLoop);
    build(block);
    this.elseBody = block.build();
    return this;
  }

  build(): Statement {
    if (this.branches.length === 0) {
      throw new StructuralError('an if statement needs at least one branch', 'if');
    }
    if (this.elseBody) {
      return { kind: 'if', branches: this.branches, elseBody: this.elseBody };
    }
    return { kind: 'if', branches: this.branches };
  }
}

export interface CatchOptions {
  errorClass?: string;
  binding?: string;
}

export class TryBuilder extends PendingStatement {
  private readonly catches: CatchClause[] = [];
  private finallyBody?: Statement[];

  constructor(private readonly state: BuildState, private readonly inLoop: boolean, private readonly body: Statement[]) {
    super();
  }

  catch(build: (body: BlockBuilder, error?: NameExpression) => void, options: CatchOptions = {}): this {
    assertBuilding(this.state, 'catch');
    const clause: CatchClause = { body: [] };
    let error: NameExpression | undefined;
    if (options.errorClass !== undefined) {
      clause.errorClass = assertName(options.errorClass, 'catch');
    }
    if (options.binding !== undefined) {
      clause.binding = assertName(options.binding, 'catch');
      error = ref(options.binding);
    }
    const block = new BlockBuilder(this.state, this.inLoop);
    build(block, error);
    clause.body = block.build();
    this.catches.push(clause);
    return this;
  }

  finally(build: BodyCallback): this {
    assertBuilding(this.state, 'finally');
    if (this.finallyBody) {
      throw new StructuralError('a try statement takes at most one finally block', 'finally');
    }
    const block = new BlockBuilder(this.state, this.inLoop);
    build(block);
    this.finallyBody = block.build();
    return this;
  }

  build(): Statement {
    if (this.catches.length === 0 && !this.finallyBody) {
      throw new StructuralError('a try statement needs a catch clause or a finally block', 'try');
    }
    if (this.finallyBody) {
      return { kind: 'tryCatch', body: this.body, catches: this.catches, finallyBody: this.finallyBody };
    }
    return { kind: 'tryCatch', body: this.body, catches: this.catches };
  }
}
