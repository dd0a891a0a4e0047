import { describe, it, expect } from 'vitest';
import { SourceMapConsumer, RawSourceMap } from 'source-map';
import { generate } from '../src/generator';
import { formatModule } from '../src/formatter';
import { calcModule } from './helpers/modules';
import { fileContent, filesFor } from './helpers/rendering';

function parseMap(content: string): RawSourceMap {
  const raw: RawSourceMap = JSON.parse(content);
  return raw;
}

describe('Source maps', () => {
  it('adds a map beside each rendered file only when asked', () => {
    const plain = filesFor(generate(calcModule(), ['typescript']), 'typescript');
    expect(plain.map(file => file.path)).toEqual(['calc.ts']);

    const mapped = filesFor(
      generate(calcModule(), ['typescript'], { render: { typescript: { sourceMap: true } } }),
      'typescript'
    );
    expect(mapped.map(file => file.path)).toEqual(['calc.ts', 'calc.ts.map']);
  });

  it('embeds the IR listing as the only source', () => {
    const files = filesFor(generate(calcModule(), ['python'], { render: { python: { sourceMap: true } } }), 'python');
    const raw = parseMap(fileContent(files, 'calc.py.map'));
    expect(raw.file).toBe('calc.py');
    expect(raw.sources).toEqual(['calc.ir']);
    expect(raw.sourcesContent).toEqual([formatModule(calcModule().module).text]);
  });

  it('maps generated lines to the listing lines of the same nodes', async () => {
    const files = filesFor(
      generate(calcModule(), ['typescript'], { render: { typescript: { sourceMap: true } } }),
      'typescript'
    );
    const consumer = await new SourceMapConsumer(parseMap(fileContent(files, 'calc.ts.map')));
    try {
      expect(consumer.originalPositionFor({ line: 1, column: 0 })).toEqual({
        source: 'calc.ir', line: 3, column: 0, name: null
      });
      expect(consumer.originalPositionFor({ line: 2, column: 0 }).line).toBe(4);
    } finally {
      consumer.destroy();
    }
  });

  it('names the PHP map after the file it describes', () => {
    const files = filesFor(generate(calcModule(), ['php'], { render: { php: { sourceMap: true } } }), 'php');
    expect(files.map(file => file.path)).toEqual(['Calc/functions.php', 'Calc/functions.php.map']);
    expect(parseMap(fileContent(files, 'Calc/functions.php.map')).file).toBe('functions.php');
  });
});
