import { describe, it, expect } from 'vitest';
import {
  NameAllocator, RESERVED_WORDS, applyCase, identifierRules, isReserved, moduleSegments, sanitizeIdentifier
} from '../src/codegen/shared/naming';
import { binaryOperand, rendered } from '../src/codegen/shared/precedence';
import { ModuleBuilder } from '../src/builder';
import { renderSingle } from './helpers/rendering';

const PY = identifierRules([...RESERVED_WORDS.python, ...RESERVED_WORDS.pythonBuiltins]);
const PHP = identifierRules(RESERVED_WORDS.php, true);

describe('Naming', () => {
  describe('sanitizeIdentifier', () => {
    it('replaces characters outside [A-Za-z0-9_]', () => {
      expect(sanitizeIdentifier('fetch-data', PY)).toBe('fetch_data');
      expect(sanitizeIdentifier('a.b c', PY)).toBe('a_b_c');
    });

    it('prefixes a leading digit and suffixes reserved words', () => {
      expect(sanitizeIdentifier('2fast', PY)).toBe('_2fast');
      expect(sanitizeIdentifier('class', PY)).toBe('class_');
      expect(sanitizeIdentifier('list', PY)).toBe('list_');
      expect(sanitizeIdentifier('', PY)).toBe('_');
    });

    it('compares PHP reserved words without case', () => {
      expect(isReserved('Class', PHP)).toBe(true);
      expect(sanitizeIdentifier('Class', PHP)).toBe('Class_');
    });
  });

  describe('applyCase', () => {
    it('splits camel case and acronyms into words', () => {
      expect(applyCase('fetchHTTPData', 'snake')).toBe('fetch_http_data');
      expect(applyCase('fetchHTTPData', 'camel')).toBe('fetchHttpData');
      expect(applyCase('fetchHTTPData', 'pascal')).toBe('FetchHttpData');
      expect(applyCase('fetchHTTPData', 'upper-snake')).toBe('FETCH_HTTP_DATA');
    });

    it('converts snake case', () => {
      expect(applyCase('user_id', 'camel')).toBe('userId');
      expect(applyCase('user_id', 'preserve')).toBe('user_id');
    });
  });

  describe('NameAllocator', () => {
    it('numbers repeated spellings from 2', () => {
      const scope = new NameAllocator(PY);
      expect(scope.declare('x')).toBe('x');
      expect(scope.declare('x')).toBe('x_2');
      expect(scope.lookup('x')).toBe('x_2');
    });

    it('never reuses a spelling of an enclosing scope', () => {
      const outer = new NameAllocator(PY);
      outer.declare('total');
      const inner = outer.child();
      expect(inner.declare('total')).toBe('total_2');
      expect(outer.lookupOwn('total')).toBe('total');
      expect(inner.lookupOwn('total')).toBe('total_2');
    });

    it('keeps internal names apart from bound ones', () => {
      const scope = new NameAllocator(PY);
      scope.declare('tmp');
      expect(scope.fresh('tmp')).toBe('tmp_2');
      expect(scope.lookup('tmp')).toBe('tmp');
    });

    it('treats spellings differing only in case as equal when the target ignores case', () => {
      const scope = new NameAllocator(PHP);
      expect(scope.declare('Point')).toBe('Point');
      expect(scope.declare('point')).toBe('point_2');
    });
  });

  it('splits module names on dots and slashes', () => {
    expect(moduleSegments('shop.orders')).toEqual(['shop', 'orders']);
    expect(moduleSegments('shop/orders')).toEqual(['shop', 'orders']);
  });

  it('applies the configured case convention when rendering', () => {
    const m = new ModuleBuilder('jobs');
    m.function('fetchData').body.pass();
    const output = renderSingle(m.seal(), 'python', {
      render: { python: { naming: { values: 'snake', types: 'pascal', constants: 'upper-snake' } } }
    });
    expect(output).toBe('def fetch_data() -> None:\n    pass\n');
  });
});

describe('binaryOperand', () => {
  const sum = rendered('a + b', 10);

  it('wraps a looser operand and leaves a tighter one bare', () => {
    expect(binaryOperand(sum, 20, 'left', 'left')).toBe('(a + b)');
    expect(binaryOperand(sum, 5, 'right', 'left')).toBe('a + b');
  });

  it('decides equal precedence by associativity', () => {
    expect(binaryOperand(sum, 10, 'left', 'left')).toBe('a + b');
    expect(binaryOperand(sum, 10, 'right', 'left')).toBe('(a + b)');
    expect(binaryOperand(sum, 10, 'left', 'right')).toBe('(a + b)');
    expect(binaryOperand(sum, 10, 'right', 'associative')).toBe('a + b');
    expect(binaryOperand(sum, 10, 'left', 'none')).toBe('(a + b)');
  });
});
