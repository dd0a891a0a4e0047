import { describe, it, expect } from 'vitest';
import {
  ModuleBuilder, t, add, call, ref, self, str, useStandardExterns, isOmitted, omit
} from '../src/builder';
import { validate } from '../src/validation/validator';
import { StructuralError, formatDiagnostic, SealedModule } from '../src/types';
import { TYPESCRIPT_CAPABILITIES } from '../src/codegen/tsgen';
import { PYTHON_CAPABILITIES } from '../src/codegen/pygen';
import { PHP_CAPABILITIES } from '../src/codegen/phpgen';
import { validateForTests, diagnosticsFor } from './helpers/validation';
import { lambdaModule } from './helpers/modules';

const ALL_TARGETS = [TYPESCRIPT_CAPABILITIES, PYTHON_CAPABILITIES, PHP_CAPABILITIES];

// page(size?) falls back to 10 pages; firstPage() calls it without a size
function pagingModule(): ModuleBuilder {
  const m = new ModuleBuilder('paging');
  const page = m.function('page', { returns: t.int });
  const size = page.param('size', t.int, { omittable: true });
  page.body.if(isOmitted(size), body => { body.return(10); });
  page.body.return(size);
  m.function('firstPage', { returns: t.int }).body.return(call('page', [omit()]));
  return m;
}

function calcModule(): ModuleBuilder {
  const m = new ModuleBuilder('calc');
  const fn = m.function('add', { returns: t.int });
  const a = fn.param('a', t.int);
  const b = fn.param('b', t.int);
  fn.body.return(add(a, b));
  return m;
}

describe('Validator', () => {
  it('accepts a well-formed module and records inferred types', () => {
    const validated = validateForTests(calcModule().seal());
    expect(validated.state).toBe('valid');
    expect(validated.types.get('declarations[0].body[0].value')).toEqual(t.int);
    expect(validated.types.get('declarations[0].body[0].value.left')).toEqual(t.int);
  });

  it('refuses a module that was not sealed', () => {
    const unsealed: SealedModule = {
      state: 'sealed',
      module: { name: 'loose', imports: [], declarations: [], headerComments: [] }
    };
    expect(() => validate(unsealed)).toThrow(StructuralError);
  });

  describe('references', () => {
    it('reports an undefined name once at its position', () => {
      const m = new ModuleBuilder('refs');
      m.function('f', { returns: t.int }).body.return(ref('y'));
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics).toHaveLength(1);
      expect(formatDiagnostic(diagnostics[0])).toBe("declarations[0].body[0].value: [unresolved-reference] 'y' is not defined");
    });

    it('reports an import of an unavailable module', () => {
      const m = new ModuleBuilder('app', { imports: ['missing'] });
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics.map(d => [d.kind, d.message, d.path])).toEqual([
        ['unresolved-reference', "module 'missing' is not available", ['imports', 0]]
      ]);
    });

    it('resolves exported declarations of imported modules', () => {
      const calc = calcModule().seal();
      const app = new ModuleBuilder('app', { imports: ['calc'] });
      app.function('total', { returns: t.int }).body.return(call('add', [1, 2]));
      expect(validateForTests(app.seal(), { imports: [calc] }).state).toBe('valid');
    });

    it('rejects self outside an instance method', () => {
      const m = new ModuleBuilder('selfless');
      m.function('f', { returns: t.any }).body.return(self());
      const [diagnostic] = diagnosticsFor(m.seal());
      expect(diagnostic.message).toBe("'self' is only available inside instance methods");
    });
  });

  describe('types', () => {
    it('reports a constant of the wrong type with expected and inferred types', () => {
      const m = new ModuleBuilder('consts');
      m.const('LIMIT', t.int, 'ten');
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toEqual({
        kind: 'type-mismatch',
        message: 'expected int, got string',
        path: ['declarations', 0, 'value'],
        expected: 'int',
        inferred: 'string'
      });
    });

    it('reports exactly one mismatch for a wrong argument', () => {
      const m = calcModule();
      m.function('bad', { returns: t.int }).body.return(call('add', [1, 'two']));
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics.map(formatDiagnostic)).toEqual([
        'declarations[1].body[0].value.arguments[1].value: [type-mismatch] expected int, got string'
      ]);
    });

    it('reports missing arguments at the call', () => {
      const m = calcModule();
      m.function('short', { returns: t.int }).body.return(call('add', [1]));
      const [diagnostic] = diagnosticsFor(m.seal());
      expect(diagnostic.message).toBe("missing argument(s) for 'b'");
      expect(diagnostic.path).toEqual(['declarations', 1, 'body', 0, 'value']);
    });

    it('reports an assignment of the wrong type to a local', () => {
      const m = new ModuleBuilder('assigns');
      const body = m.function('reset').body;
      const n = body.declare('n', { type: t.int, value: 0 });
      body.assign(n, 'none');
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        'declarations[0].body[1].value: [type-mismatch] expected int, got string'
      ]);
    });

    it('reports a distinct alias that names itself', () => {
      const m = new ModuleBuilder('ids');
      const id = m.typeAlias('Id', t.named('Id'), { distinct: true });
      const fn = m.function('show', { returns: t.int });
      fn.param('id', id);
      fn.body.return(ref('id'));
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        "declarations[0].type: [type-mismatch] type alias 'Id' refers to itself through Id -> Id"
      ]);
    });

    it('reports aliases that refer to each other through a list', () => {
      const m = new ModuleBuilder('nested');
      m.typeAlias('A', t.named('B'));
      m.typeAlias('B', t.list(t.named('A')));
      const fn = m.function('f', { returns: t.named('A') });
      fn.param('p', t.named('B'));
      fn.body.return(ref('p'));
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        "declarations[0].type: [type-mismatch] type alias 'A' refers to itself through A -> B -> A",
        "declarations[1].type: [type-mismatch] type alias 'B' refers to itself through B -> A -> B"
      ]);
    });

    it('widens int into float parameters', () => {
      const m = new ModuleBuilder('widen');
      const fn = m.function('half', { returns: t.float });
      fn.param('x', t.float);
      fn.body.return(ref('x'));
      m.function('use', { returns: t.float }).body.return(call('half', [3]));
      expect(validateForTests(m.seal()).state).toBe('valid');
    });
  });

  describe('omittable parameters', () => {
    it('accepts an omitted argument and a test for it', () => {
      expect(validateForTests(pagingModule().seal()).state).toBe('valid');
    });

    it('reports an omitted argument for a required parameter', () => {
      const m = calcModule();
      m.function('partial', { returns: t.int }).body.return(call('add', [1, omit()]));
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        "declarations[1].body[0].value.arguments[1].value: [type-mismatch] parameter 'b' cannot be omitted"
      ]);
    });

    it('reports an omission test on a parameter that cannot be omitted', () => {
      const m = new ModuleBuilder('strict');
      const fn = m.function('size', { returns: t.int });
      const n = fn.param('n', t.int);
      fn.body.if(isOmitted(n), body => { body.return(0); });
      fn.body.return(n);
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        'declarations[0].body[0].branches[0].condition.operand: [type-mismatch] only an omittable parameter can be tested for omission'
      ]);
    });

    it('reports an omitted value outside a call', () => {
      const m = new ModuleBuilder('stray');
      m.function('nothing', { returns: t.int }).body.return(omit());
      expect(diagnosticsFor(m.seal()).map(formatDiagnostic)).toEqual([
        'declarations[0].body[0].value: [type-mismatch] an omitted value can only be passed for an omittable parameter or be its default'
      ]);
    });

    it('marks PHP unsupported at the parameter, the test and the call', () => {
      const result = validate(pagingModule().seal(), [], { targets: ALL_TARGETS });
      expect(result.state).toBe('valid');
      if (result.state !== 'valid') {
        return;
      }
      expect(result.validated.supportedTargets).toEqual(['typescript', 'python']);
      expect(result.validated.unsupported.get('php')?.map(formatDiagnostic)).toEqual([
        "declarations[0].parameters[0].defaultValue: [unsupported-construct] (php) omittable parameter is not supported by php: parameter 'size' is omittable",
        'declarations[0].body[0].branches[0].condition: [unsupported-construct] (php) omittable parameter is not supported by php: test for an omitted argument',
        'declarations[1].body[0].value.arguments[0].value: [unsupported-construct] (php) omittable parameter is not supported by php: omitted argument value'
      ]);
    });
  });

  describe('namespaces', () => {
    it('reports a second declaration with the same name', () => {
      const m = new ModuleBuilder('dupes');
      m.function('f').body.pass();
      m.function('f').body.pass();
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics.map(formatDiagnostic)).toEqual([
        "declarations[1]: [duplicate-name] 'f' is already declared in this module"
      ]);
    });

    it('reports a field and a method sharing a name', () => {
      const m = new ModuleBuilder('shapes');
      const point = m.class('Point');
      point.field('x', t.int, { default: 0 });
      point.method('x', { returns: t.int }).body.return(0);
      const [diagnostic] = diagnosticsFor(m.seal());
      expect(diagnostic.path).toEqual(['declarations', 0, 'methods', 0]);
      expect(diagnostic.message).toBe("'x' is already declared in this class");
    });
  });

  describe('error classes', () => {
    it('accepts a class derived from an extern error class', () => {
      const m = new ModuleBuilder('errors');
      useStandardExterns(m, 'Error');
      m.class('AppError', { bases: [t.named('Error')] });
      m.function('fail').body.raise(str('boom'), 'AppError');
      expect(validateForTests(m.seal()).state).toBe('valid');
    });

    it('rejects an error class with no extern ancestor', () => {
      const m = new ModuleBuilder('errors');
      m.class('Plain');
      m.function('fail').body.raise(str('boom'), 'Plain');
      const diagnostics = diagnosticsFor(m.seal());
      expect(diagnostics.map(formatDiagnostic)).toEqual([
        "declarations[1].body[0].errorClass: [type-mismatch] error class 'Plain' does not derive from an extern class"
      ]);
    });

    it('rejects constructor arguments on an extern-derived class', () => {
      const m = new ModuleBuilder('errors');
      useStandardExterns(m, 'Error');
      m.class('CodedError', { bases: [t.named('Error')] }).field('code', t.int, { initArg: true });
      const [diagnostic] = diagnosticsFor(m.seal());
      expect(diagnostic.message).toBe(
        "class 'CodedError' derives from extern class 'Error' and cannot declare constructor arguments"
      );
      expect(diagnostic.path).toEqual(['declarations', 1, 'fields', 0]);
    });

    it('reports an unknown error class', () => {
      const m = new ModuleBuilder('errors');
      m.function('fail').body.raise(str('boom'), 'Nowhere');
      const [diagnostic] = diagnosticsFor(m.seal());
      expect(diagnostic.kind).toBe('unresolved-reference');
      expect(diagnostic.message).toBe("unknown error class 'Nowhere'");
    });
  });

  describe('capabilities', () => {
    it('marks a target unsupported per target and keeps the others', () => {
      const result = validate(lambdaModule(), [], { targets: ALL_TARGETS });
      expect(result.state).toBe('valid');
      if (result.state !== 'valid') {
        return;
      }
      expect(result.validated.supportedTargets).toEqual(['typescript', 'python']);
      const php = result.validated.unsupported.get('php') ?? [];
      expect(php.map(formatDiagnostic)).toEqual([
        'declarations[0].body[0].value: [unsupported-construct] (php) lambda expression is not supported by php'
      ]);
      expect(php[0].construct).toBe('lambda');
      expect(result.diagnostics).toEqual(php);
    });

    it('fails the whole module in all-targets mode', () => {
      const result = validate(lambdaModule(), [], { targets: ALL_TARGETS, capabilityMode: 'all-targets' });
      expect(result.state).toBe('invalid');
      expect(result.diagnostics.map(d => d.target)).toEqual(['php']);
    });

    it('skips the capability pass without targets', () => {
      const validated = validateForTests(lambdaModule());
      expect(validated.unsupported.size).toBe(0);
      expect(validated.supportedTargets).toEqual([]);
    });

    it('reports an import cycle for targets without circular imports', () => {
      const b = new ModuleBuilder('b', { imports: ['a'] }).seal();
      const a = new ModuleBuilder('a', { imports: ['b'] }).seal();
      const result = validate(a, [b], { targets: [TYPESCRIPT_CAPABILITIES, PYTHON_CAPABILITIES] });
      expect(result.state).toBe('valid');
      if (result.state !== 'valid') {
        return;
      }
      expect(result.validated.supportedTargets).toEqual(['typescript']);
      expect(result.validated.unsupported.get('python')?.map(d => d.message)).toEqual([
        "circular import is not supported by python: importing 'b' leads back to 'a'"
      ]);
    });

    it('reports an extern without a binding for the target', () => {
      const m = new ModuleBuilder('ext');
      m.extern('now', { type: t.fn([], t.float), bindings: { typescript: { name: 'Date.now' } } });
      const result = validate(m.seal(), [], { targets: [TYPESCRIPT_CAPABILITIES, PHP_CAPABILITIES] });
      expect(result.state).toBe('valid');
      if (result.state === 'valid') {
        expect(result.validated.unsupported.get('php')?.map(d => d.message)).toEqual([
          "extern 'now' has no binding for php"
        ]);
      }
    });
  });
});
