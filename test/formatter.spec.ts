import { describe, it, expect } from 'vitest';
import { ModuleBuilder, t, add, call, isOmitted, omit } from '../src/builder';
import { Formatter, formatModule } from '../src/formatter';
import { calcModule, shapesModule } from './helpers/modules';

function annotatedCalc() {
  const m = new ModuleBuilder('calc', { imports: ['util'], headerComments: ['Arithmetic helpers'] });
  const fn = m.function('add', { returns: t.int });
  const a = fn.param('a', t.int);
  const b = fn.param('b', t.int);
  fn.body.return(add(a, b));
  m.const('LIMIT', t.int, 10);
  return m.seal();
}

describe('IR listing', () => {
  it('lists a function with its body', () => {
    expect(formatModule(calcModule().module).text).toBe([
      'module calc',
      '',
      'function add(a: int, b: int) -> int:',
      '    return a + b',
      ''
    ].join('\n'));
  });

  it('lists imports, header comments and constants', () => {
    const listing = formatModule(annotatedCalc().module);
    expect(listing.text).toBe([
      'module calc',
      'import util',
      '# Arithmetic helpers',
      '',
      'function add(a: int, b: int) -> int:',
      '    return a + b',
      '',
      'const LIMIT: int = 10',
      ''
    ].join('\n'));
  });

  it('records the line each node starts on', () => {
    const { lines } = formatModule(annotatedCalc().module);
    expect(lines.get('imports[0]')).toBe(2);
    expect(lines.get('declarations[0]')).toBe(5);
    expect(lines.get('declarations[0].body[0]')).toBe(6);
    expect(lines.get('declarations[1]')).toBe(8);
  });

  it('lists class members and parenthesises nested operators', () => {
    expect(formatModule(shapesModule().module).text).toBe([
      'module shapes',
      '',
      'class Point:',
      '    field x: float [init]',
      '    field y: float = 0 [init]',
      '    method norm() -> float:',
      '        return (self.x * self.x) + (self.y * self.y)',
      '',
      'function origin() -> Point:',
      '    return new Point(0.5, 1.5)',
      ''
    ].join('\n'));
  });

  it('marks private declarations and empty bodies', () => {
    const m = new ModuleBuilder('internal');
    m.function('helper', { exported: false });
    expect(formatModule(m.seal().module).text).toBe('module internal\n\nprivate function helper() -> void:\n    pass\n');
  });

  it('lists type tests and omitted arguments', () => {
    const m = new ModuleBuilder('paging');
    const page = m.function('page', { returns: t.int });
    const size = page.param('size', t.int, { omittable: true });
    page.body.if(isOmitted(size), body => { body.return(10); });
    page.body.return(size);
    m.function('firstPage', { returns: t.int }).body.return(call('page', [omit()]));
    expect(formatModule(m.seal().module).text).toBe([
      'module paging',
      '',
      'function page(size: int = omit) -> int:',
      '    if is omitted(size):',
      '        return 10',
      '    return size',
      '',
      'function firstPage() -> int:',
      '    return page(omit)',
      ''
    ].join('\n'));
  });

  it('honours the indent and spacing options', () => {
    const formatter = new Formatter({ indentSize: 2, blankLinesBetweenDeclarations: 2 });
    expect(formatter.format(calcModule().module).text).toBe(
      'module calc\n\n\nfunction add(a: int, b: int) -> int:\n  return a + b\n'
    );
  });
});
