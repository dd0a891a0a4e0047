import { describe, it, expect } from 'vitest';
import { ModuleBuilder, t, add, gt, lt, str } from '../src/builder';
import { generate } from '../src/generator';
import { calcModule } from './helpers/modules';
import { fileContent, filesFor, renderSingle } from './helpers/rendering';

// sumPositive(items) adds up the positive items; check(x) raises on a negative x
function flowModule() {
  const m = new ModuleBuilder('flow');
  const sum = m.function('sumPositive', { returns: t.int });
  const items = sum.param('items', t.list(t.int));
  const total = sum.body.declare('total', { value: 0 });
  sum.body.forEach('item', items, (body, item) => {
    body.if(gt(item, 0), inner => { inner.assign(total, add(total, item)); });
  });
  sum.body.return(total);

  const check = m.function('check');
  const x = check.param('x', t.int);
  check.body.if(lt(x, 0), body => { body.raise(str('negative')); });
  return m.seal();
}

describe('Renderers', () => {
  it('renders TypeScript control flow', () => {
    expect(renderSingle(flowModule(), 'typescript')).toBe([
      'export function sumPositive(items: number[]): number {',
      '  let total = 0;',
      '  for (const item of items) {',
      '    if (item > 0) {',
      '      total = total + item;',
      '    }',
      '  }',
      '  return total;',
      '}',
      '',
      'export function check(x: number): void {',
      '  if (x < 0) {',
      '    throw new Error("negative");',
      '  }',
      '}',
      ''
    ].join('\n'));
  });

  it('renders Python control flow', () => {
    expect(renderSingle(flowModule(), 'python')).toBe([
      'def sumPositive(items: list[int]) -> int:',
      '    total = 0',
      '    for item in items:',
      '        if item > 0:',
      '            total = total + item',
      '    return total',
      '',
      '',
      'def check(x: int) -> None:',
      '    if x < 0:',
      '        raise Exception("negative")',
      ''
    ].join('\n'));
  });

  it('renders PHP control flow with docblocks for list parameters', () => {
    const files = filesFor(generate(flowModule(), ['php']), 'php');
    expect(fileContent(files, 'Flow/functions.php')).toBe([
      '<?php',
      '',
      'declare(strict_types=1);',
      '',
      'namespace Flow;',
      '',
      '/**',
      ' * @param list<int> $items',
      ' */',
      'function sumPositive(array $items): int',
      '{',
      '    $total = 0;',
      '    foreach ($items as $item) {',
      '        if ($item > 0) {',
      '            $total = $total + $item;',
      '        }',
      '    }',
      '    return $total;',
      '}',
      '',
      'function check(int $x): void',
      '{',
      '    if ($x < 0) {',
      "        throw new \\Exception('negative');",
      '    }',
      '}',
      ''
    ].join('\n'));
  });

  describe('header comments', () => {
    it('writes the configured header before the module header', () => {
      const output = renderSingle(calcModule({ headerComments: ['Arithmetic helpers'] }), 'typescript', {
        render: { typescript: { headerComment: 'Generated file' } }
      });
      expect(output.split('\n').slice(0, 3)).toEqual(['// Generated file', '// Arithmetic helpers', '']);
    });

    it('writes Python headers as # comments', () => {
      const output = renderSingle(calcModule({ headerComments: ['Arithmetic helpers'] }), 'python');
      expect(output).toBe('# Arithmetic helpers\n\n\ndef add(a: int, b: int) -> int:\n    return a + b\n');
    });

    it('puts the PHP header after the opening tag', () => {
      const files = filesFor(generate(calcModule({ headerComments: ['Arithmetic helpers'] }), ['php']), 'php');
      expect(files[0].content.split('\n').slice(0, 5)).toEqual([
        '<?php', '', '// Arithmetic helpers', '', 'declare(strict_types=1);'
      ]);
    });
  });

  it('nests PHP namespaces under the configured prefix', () => {
    const files = filesFor(generate(calcModule(), ['php'], { render: { php: { namespacePrefix: 'App' } } }), 'php');
    expect(files[0].path).toBe('Calc/functions.php');
    expect(files[0].content).toContain('\nnamespace App\\Calc;\n');
  });

  it('indents with the configured width', () => {
    expect(renderSingle(calcModule(), 'typescript', { render: { typescript: { indentSize: 4 } } })).toBe(
      'export function add(a: number, b: number): number {\n    return a + b;\n}\n'
    );
  });
});
