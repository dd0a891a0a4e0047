import { describe, it, expect, vi } from 'vitest';
import { ModuleBuilder, t, call, ref } from '../src/builder';
import { generate, generateProject } from '../src/generator';
import { PhpRenderer } from '../src/codegen/phpgen';
import { PythonRenderer } from '../src/codegen/pygen';
import { validate } from '../src/validation/validator';
import { InternalConsistencyError, formatDiagnostic } from '../src/types';
import { calcModule, lambdaModule, shapesModule } from './helpers/modules';
import { fileContent, filesFor, outputFor, renderSingle } from './helpers/rendering';

const PHP_PREAMBLE = (namespace: string) => `<?php\n\ndeclare(strict_types=1);\n\nnamespace ${namespace};\n\n`;

function appModule() {
  const app = new ModuleBuilder('app', { imports: ['calc'] });
  app.function('total', { returns: t.int }).body.return(call('add', [1, 2]));
  return app.seal();
}

function collidingModule() {
  const m = new ModuleBuilder('fetcher');
  m.function('fetch-data').body.pass();
  m.function('fetch_data').body.pass();
  return m.seal();
}

describe('generate', () => {
  describe('calc', () => {
    it('renders TypeScript', () => {
      expect(renderSingle(calcModule(), 'typescript')).toBe(
        'export function add(a: number, b: number): number {\n  return a + b;\n}\n'
      );
    });

    it('renders Python', () => {
      expect(renderSingle(calcModule(), 'python')).toBe(
        'def add(a: int, b: int) -> int:\n    return a + b\n'
      );
    });

    it('renders PHP into functions.php under the module namespace', () => {
      const files = filesFor(generate(calcModule(), ['php']), 'php');
      expect(files.map(file => file.path)).toEqual(['Calc/functions.php']);
      expect(files[0].content).toBe(
        `${PHP_PREAMBLE('Calc')}function add(int $a, int $b): int\n{\n    return $a + $b;\n}\n`
      );
    });

    it('is deterministic across runs', () => {
      const first = generate(calcModule(), ['typescript', 'python', 'php']);
      const second = generate(calcModule(), ['typescript', 'python', 'php']);
      for (const target of ['typescript', 'python', 'php'] as const) {
        expect(filesFor(second, target)).toEqual(filesFor(first, target));
      }
    });
  });

  describe('shapes', () => {
    it('renders a TypeScript class with a constructor', () => {
      expect(renderSingle(shapesModule(), 'typescript')).toBe([
        'export class Point {',
        '  x: number;',
        '  y: number;',
        '',
        '  constructor(x: number, y: number = 0) {',
        '    this.x = x;',
        '    this.y = y;',
        '  }',
        '',
        '  norm(): number {',
        '    return this.x * this.x + this.y * this.y;',
        '  }',
        '}',
        '',
        'export function origin(): Point {',
        '  return new Point(0.5, 1.5);',
        '}',
        ''
      ].join('\n'));
    });

    it('renders a Python class with __init__', () => {
      expect(renderSingle(shapesModule(), 'python')).toBe([
        'class Point:',
        '    def __init__(self, x: float, y: float = 0) -> None:',
        '        self.x = x',
        '        self.y = y',
        '',
        '    def norm(self) -> float:',
        '        return self.x * self.x + self.y * self.y',
        '',
        '',
        'def origin() -> Point:',
        '    return Point(0.5, 1.5)',
        ''
      ].join('\n'));
    });

    it('renders one PHP file per class plus functions.php', () => {
      const files = filesFor(generate(shapesModule(), ['php']), 'php');
      expect(files.map(file => file.path)).toEqual(['Shapes/Point.php', 'Shapes/functions.php']);
      expect(fileContent(files, 'Shapes/Point.php')).toBe(PHP_PREAMBLE('Shapes') + [
        'class Point',
        '{',
        '    public float $x;',
        '    public float $y;',
        '',
        '    public function __construct(float $x, float $y = 0)',
        '    {',
        '        $this->x = $x;',
        '        $this->y = $y;',
        '    }',
        '',
        '    public function norm(): float',
        '    {',
        '        return $this->x * $this->x + $this->y * $this->y;',
        '    }',
        '}',
        ''
      ].join('\n'));
      expect(fileContent(files, 'Shapes/functions.php')).toBe(
        `${PHP_PREAMBLE('Shapes')}function origin(): Point\n{\n    return new Point(0.5, 1.5);\n}\n`
      );
    });
  });

  describe('naming', () => {
    it('suffixes colliding spellings in declaration order', () => {
      expect(renderSingle(collidingModule(), 'typescript')).toBe(
        'export function fetch_data(): void {\n}\n\nexport function fetch_data_2(): void {\n}\n'
      );
      expect(renderSingle(collidingModule(), 'python')).toBe(
        'def fetch_data() -> None:\n    pass\n\n\ndef fetch_data_2() -> None:\n    pass\n'
      );
    });
  });

  describe('capabilities', () => {
    it('skips a target that cannot express the module and renders the rest', () => {
      const result = generate(lambdaModule(), ['typescript', 'php']);
      const php = outputFor(result, 'php');
      expect(php.kind).toBe('unsupported');
      if (php.kind === 'unsupported') {
        expect(php.diagnostics.map(formatDiagnostic)).toEqual([
          'declarations[0].body[0].value: [unsupported-construct] (php) lambda expression is not supported by php'
        ]);
      }
      expect(filesFor(result, 'typescript')[0].content).toBe(
        'export function incrementer(): (p0: number) => number {\n  return (x: number) => x + 1;\n}\n'
      );
    });

    it('reports the module invalid in all-targets mode', () => {
      const result = generate(lambdaModule(), ['typescript', 'php'], { capabilityMode: 'all-targets' });
      expect(result.kind).toBe('invalid');
    });

    it('renders each requested target once', () => {
      const result = generate(calcModule(), ['python', 'python']);
      expect(result.kind).toBe('generated');
      if (result.kind === 'generated') {
        expect([...result.outputs.keys()]).toEqual(['python']);
      }
    });

    it('refuses to render a module for a target it was found unsupported on', () => {
      const result = validate(lambdaModule(), [], { targets: [new PhpRenderer().capabilities] });
      expect(result.state).toBe('valid');
      if (result.state === 'valid') {
        expect(() => new PhpRenderer().render(result.validated)).toThrow(InternalConsistencyError);
      }
    });
  });

  describe('failures', () => {
    it('reports a renderer fault for its target and renders the others', () => {
      const spy = vi.spyOn(PythonRenderer.prototype, 'render').mockImplementation(() => {
        throw new TypeError('broken renderer');
      });
      try {
        const result = generate(calcModule(), ['python', 'typescript']);
        const python = outputFor(result, 'python');
        expect(python.kind).toBe('failed');
        if (python.kind === 'failed') {
          expect(python.error).toBeInstanceOf(InternalConsistencyError);
          expect(python.error.message).toBe('[python] renderer failed: broken renderer');
        }
        expect(outputFor(result, 'typescript').kind).toBe('rendered');
      } finally {
        spy.mockRestore();
      }
    });

    it('reports recursive aliases as invalid instead of rendering them', () => {
      const m = new ModuleBuilder('nested');
      m.typeAlias('A', t.named('B'));
      m.typeAlias('B', t.list(t.named('A')));
      const fn = m.function('f', { returns: t.named('A') });
      fn.param('p', t.named('B'));
      fn.body.return(ref('p'));
      const result = generate(m.seal(), ['typescript', 'python', 'php']);
      expect(result.kind).toBe('invalid');
      if (result.kind === 'invalid') {
        expect(result.diagnostics.map(d => d.path)).toEqual([
          ['declarations', 0, 'type'],
          ['declarations', 1, 'type']
        ]);
      }
    });
  });

  describe('generateProject', () => {
    it('renders imports between modules of one project', () => {
      const results = generateProject([appModule(), calcModule()], ['typescript', 'python', 'php']);
      expect([...results.keys()]).toEqual(['app', 'calc']);
      const app = results.get('app');
      expect(app).toBeDefined();
      if (!app) {
        return;
      }
      expect(filesFor(app, 'typescript')[0].content).toBe(
        "import { add } from './calc';\n\nexport function total(): number {\n  return add(1, 2);\n}\n"
      );
      expect(filesFor(app, 'python')[0].content).toBe(
        'from calc import add\n\n\ndef total() -> int:\n    return add(1, 2)\n'
      );
      expect(fileContent(filesFor(app, 'php'), 'App/functions.php')).toBe(
        `${PHP_PREAMBLE('App')}use function Calc\\add;\n\nfunction total(): int\n{\n    return add(1, 2);\n}\n`
      );
    });

    it('appends the configured extension to TypeScript import specifiers', () => {
      const results = generateProject([appModule(), calcModule()], ['typescript'], {
        render: { typescript: { importExtension: '.js' } }
      });
      const app = results.get('app');
      expect(app).toBeDefined();
      if (!app) {
        return;
      }
      expect(filesFor(app, 'typescript')[0].content.split('\n')[0]).toBe("import { add } from './calc.js';");
    });

    it('reports a missing import as an invalid module', () => {
      const results = generateProject([appModule()], ['typescript']);
      const app = results.get('app');
      expect(app?.kind).toBe('invalid');
      if (app?.kind === 'invalid') {
        expect(app.diagnostics.map(d => d.message)).toContain("module 'calc' is not available");
      }
    });
  });
});
