import {
  ModuleBuilder, t, add, mul, lambda, ref, instantiate
} from '../../src/builder';
import type { SealedModule } from '../../src/types';

// calc: add(a: int, b: int) -> int
export function calcModule(options: { headerComments?: readonly string[] } = {}): SealedModule {
  const m = new ModuleBuilder('calc', options);
  const fn = m.function('add', { returns: t.int });
  const a = fn.param('a', t.int);
  const b = fn.param('b', t.int);
  fn.body.return(add(a, b));
  return m.seal();
}

// shapes: a Point class with two constructor arguments and a factory function
export function shapesModule(): SealedModule {
  const m = new ModuleBuilder('shapes');
  const point = m.class('Point');
  const x = point.field('x', t.float, { initArg: true });
  const y = point.field('y', t.float, { initArg: true, default: 0 });
  point.method('norm', { returns: t.float }).body.return(add(mul(x, x), mul(y, y)));
  m.function('origin', { returns: point.type }).body.return(instantiate('Point', [0.5, 1.5]));
  return m.seal();
}

export function lambdaModule(): SealedModule {
  const m = new ModuleBuilder('handlers');
  m.function('incrementer', { returns: t.fn([t.int], t.int) })
    .body.return(lambda([['x', t.int]], add(ref('x'), 1)));
  return m.seal();
}
