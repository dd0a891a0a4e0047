import { describe, it, expect } from 'vitest';
import {
  ModuleBuilder, t, add, call, arg, ref, list, dict, template, str, int, useStandardExterns, isInt, isOmitted, omit
} from '../src/builder';
import { StructuralError } from '../src/types';

describe('Module builder', () => {
  it('assembles a function declaration', () => {
    const m = new ModuleBuilder('calc');
    const fn = m.function('add', { returns: t.int });
    const a = fn.param('a', t.int);
    const b = fn.param('b', t.int);
    fn.body.return(add(a, b));
    const sealed = m.seal();

    expect(sealed.state).toBe('sealed');
    expect(sealed.module.declarations).toEqual([{
      kind: 'function',
      name: 'add',
      parameters: [
        { name: 'a', type: t.int, keywordOnly: false },
        { name: 'b', type: t.int, keywordOnly: false }
      ],
      returnType: t.int,
      body: [{
        kind: 'return',
        value: { kind: 'binary', operator: '+', left: { kind: 'name', name: 'a' }, right: { kind: 'name', name: 'b' } }
      }],
      isAsync: false,
      doc: [],
      exported: true
    }]);
  });

  it('turns raw values into literals', () => {
    const m = new ModuleBuilder('consts');
    m.const('RATE', t.float, 0.5);
    m.const('NAME', t.string, 'box');
    m.const('LIMIT', t.int, 3);
    const values = m.seal().module.declarations.map(d => d.kind === 'const' ? d.value : undefined);
    expect(values).toEqual([
      { kind: 'literal', value: 0.5, literalType: 'float' },
      { kind: 'literal', value: 'box', literalType: 'string' },
      { kind: 'literal', value: 3, literalType: 'int' }
    ]);
  });

  it('keeps imports once and in order', () => {
    const m = new ModuleBuilder('app', { imports: ['models'] });
    m.import('util').import('models');
    expect(m.seal().module.imports).toEqual(['models', 'util']);
  });

  it('records an if/elif/else chain as one statement', () => {
    const m = new ModuleBuilder('flow');
    const fn = m.function('sign', { returns: t.int });
    const x = fn.param('x', t.int);
    fn.body
      .if(call('positive', [x]), b => { b.return(1); })
      .elseIf(call('negative', [x]), b => { b.return(-1); })
      .else(b => { b.return(0); });
    const [declaration] = m.seal().module.declarations;
    expect(declaration.kind).toBe('function');
    if (declaration.kind !== 'function') {
      return;
    }
    expect(declaration.body).toHaveLength(1);
    const statement = declaration.body[0];
    expect(statement.kind).toBe('if');
    if (statement.kind === 'if') {
      expect(statement.branches).toHaveLength(2);
      expect(statement.elseBody).toEqual([{ kind: 'return', value: { kind: 'literal', value: 0, literalType: 'int' } }]);
    }
  });

  it('merges adjacent template text', () => {
    expect(template('Hello, ', 'dear ', ref('name'), '!').parts).toEqual([
      'Hello, dear ', { kind: 'name', name: 'name' }, '!'
    ]);
  });

  it('declares standard externs under their own names', () => {
    const m = new ModuleBuilder('app');
    useStandardExterns(m, 'print', 'ValueError');
    const externs = m.seal().module.declarations.map(d => d.kind === 'extern' ? [d.name, d.bindings.php?.name] : []);
    expect(externs).toEqual([['print', 'print'], ['ValueError', 'InvalidArgumentException']]);
  });

  it('records an omittable parameter as one defaulting to an omitted value', () => {
    const m = new ModuleBuilder('paging');
    const fn = m.function('page', { returns: t.bool });
    const size = fn.param('size', t.int, { omittable: true });
    fn.param('strict', t.bool, { default: false });
    fn.body.return(isOmitted(size));
    const [declaration] = m.seal().module.declarations;
    expect(declaration.kind === 'function' ? declaration.parameters[0] : undefined).toEqual({
      name: 'size', type: t.int, keywordOnly: false, defaultValue: omit()
    });
  });

  it('builds type tests around their operand', () => {
    expect(isInt(ref('value'))).toEqual({ kind: 'typeTest', tested: 'int', operand: { kind: 'name', name: 'value' } });
    expect(isOmitted('x').operand).toEqual({ kind: 'literal', value: 'x', literalType: 'string' });
  });

  it('deep-freezes the sealed module', () => {
    const m = new ModuleBuilder('frozen');
    m.function('noop').body.pass();
    const sealed = m.seal();
    expect(Object.isFrozen(sealed.module.declarations)).toBe(true);
    expect(Object.isFrozen(sealed.module.declarations[0])).toBe(true);
  });

  describe('structural errors', () => {
    it('rejects a required parameter after a defaulted one', () => {
      const fn = new ModuleBuilder('m').function('f');
      fn.param('a', t.int, { default: 1 });
      expect(() => fn.param('b', t.int)).toThrow(
        new StructuralError("required parameter 'b' follows a parameter with a default", 'param')
      );
    });

    it('allows keyword-only parameters without defaults after defaulted ones', () => {
      const fn = new ModuleBuilder('m').function('f');
      fn.param('a', t.int, { default: 1 });
      expect(() => fn.param('b', t.int, { keywordOnly: true })).not.toThrow();
      expect(() => fn.param('c', t.int)).toThrow("param: positional parameter 'c' follows a keyword-only parameter");
    });

    it('rejects break outside a loop', () => {
      const fn = new ModuleBuilder('m').function('f');
      expect(() => fn.body.break()).toThrow('break: break outside of a loop');
    });

    it('accepts break and continue inside a loop body and its if branches', () => {
      const fn = new ModuleBuilder('m').function('f');
      const items = fn.param('items', t.list(t.int));
      expect(() => fn.body.forEach('item', items, (b, item) => {
        b.if(call('skip', [item]), inner => { inner.continue(); });
        b.break();
      })).not.toThrow();
    });

    it('rejects an empty list without an element type', () => {
      expect(() => list([])).toThrow('list: an empty sequence literal needs an element type');
      expect(list([], t.int).elementType).toEqual(t.int);
    });

    it('rejects an empty dict without key and value types', () => {
      expect(() => dict([], t.string)).toThrow(StructuralError);
    });

    it('rejects a declaration with neither type nor value', () => {
      const fn = new ModuleBuilder('m').function('f');
      expect(() => fn.body.declare('x')).toThrow("declare: variable 'x' needs a type or an initial value");
    });

    it('rejects an abstract method in a concrete class', () => {
      const shape = new ModuleBuilder('m').class('Shape');
      expect(() => shape.method('area', { isAbstract: true })).toThrow(
        "method: abstract method 'area' in non-abstract class 'Shape'"
      );
    });

    it('rejects a body on an abstract method when sealing', () => {
      const m = new ModuleBuilder('m');
      const shape = m.class('Shape', { isAbstract: true });
      shape.method('area', { isAbstract: true, returns: t.float }).body.return(0.5);
      expect(() => m.seal()).toThrow("method: abstract method 'area' cannot have a body");
    });

    it('rejects positional arguments after named ones', () => {
      expect(() => call('f', [arg('x', 1), 2])).toThrow('call: positional argument follows a named argument');
    });

    it('rejects a non-integer int literal', () => {
      expect(() => int(1.5)).toThrow('int: 1.5 is not an integer');
    });

    it('rejects every builder call after seal', () => {
      const m = new ModuleBuilder('m');
      const fn = m.function('f');
      const box = m.class('Box');
      m.seal();
      expect(() => m.function('g')).toThrow('function: module is sealed and can no longer be modified');
      expect(() => fn.body.return(str('late'))).toThrow(StructuralError);
      expect(() => fn.param('late', t.int)).toThrow(StructuralError);
      expect(() => box.field('late', t.int)).toThrow(StructuralError);
      expect(() => m.seal()).toThrow('seal: module is sealed and can no longer be modified');
    });

    it('rejects integers a JavaScript number cannot hold exactly', () => {
      expect(() => int(2 ** 53)).toThrow('int: 9007199254740992 is outside the safe integer range');
      expect(() => int(-(2 ** 53))).toThrow(StructuralError);
      expect(int(2 ** 53 - 1).value).toBe(9007199254740991);
    });

    it('rejects a default on an omittable parameter', () => {
      const fn = new ModuleBuilder('paging').function('page');
      expect(() => fn.param('size', t.int, { omittable: true, default: 10 })).toThrow(
        "param: omittable parameter 'size' cannot have a default"
      );
    });

    it('rejects an empty module name', () => {
      expect(() => new ModuleBuilder('')).toThrow('module: name must be a non-empty identifier');
    });
  });
});
