import { describe, it, expect } from 'vitest';
import {
  ModuleBuilder, t, add, sub, mul, mod, and, not, eq, ne, gt, lt, call, member, ref, set, template, ternary, len,
  isNull, isBool, isInt, isStr, isList, isOmitted, omit, useStandardExterns
} from '../src/builder';
import { generate } from '../src/generator';
import { phpDirectory } from '../src/codegen/php/php-context';
import type { SealedModule } from '../src/types';
import { fileContent, filesFor, outputFor, renderSingle } from './helpers/rendering';

function phpFunctions(sealed: SealedModule): string {
  return fileContent(filesFor(generate(sealed, ['php']), 'php'), `${phpDirectory(sealed.module.name)}/functions.php`);
}

function phpUnsupported(sealed: SealedModule): string[] {
  const output = outputFor(generate(sealed, ['php']), 'php');
  return output.kind === 'unsupported' ? output.diagnostics.map(d => d.message) : [];
}

// parse(text) returns its length, 0 on a ValueError and -1 on anything else
function safetyModule(): SealedModule {
  const m = new ModuleBuilder('safety');
  useStandardExterns(m, 'ValueError');
  const fn = m.function('parse', { returns: t.int });
  const text = fn.param('text', t.string);
  fn.body
    .try(body => { body.return(len(text)); })
    .catch(body => { body.return(0); }, { errorClass: 'ValueError', binding: 'problem' })
    .catch(body => { body.return(-1); })
    .finally(body => { body.comment('done'); });
  return m.seal();
}

function resourceModule(): SealedModule {
  const m = new ModuleBuilder('resources');
  const fn = m.function('flushAll');
  const resource = fn.param('resource', t.any);
  fn.body.with(resource, (body, handle) => {
    if (handle) {
      body.expression(call(member(handle, 'flush')));
    }
  }, 'handle');
  return m.seal();
}

function scoresModule(): SealedModule {
  const m = new ModuleBuilder('scores');
  const total = m.function('total', { returns: t.int });
  const scores = total.param('scores', t.map(t.string, t.int));
  const sum = total.body.declare('sum', { value: 0 });
  total.body.forEntries('player', 'score', scores, (body, _player, score) => {
    body.assign(sum, add(sum, score));
  });
  total.body.return(sum);

  const first = m.function('firstLabel', { returns: t.string });
  const byId = first.param('byId', t.map(t.int, t.string));
  first.body.forEntries('id', 'label', byId, (body, id, label) => {
    body.if(gt(id, 0), inner => { inner.return(label); });
  });
  first.body.return('');
  return m.seal();
}

function boxModule(): SealedModule {
  const m = new ModuleBuilder('boxes');
  const box = m.class('Box', { typeParameters: ['T'] });
  const value = box.field('value', t.named('T'), { initArg: true });
  box.method('unwrap', { returns: t.named('T') }).body.return(value);
  return m.seal();
}

function kindModule(): SealedModule {
  const m = new ModuleBuilder('checks');
  const fn = m.function('kindOf', { returns: t.string });
  const value = fn.param('value', t.any);
  fn.body.ifChain([
    [isNull(value), body => { body.return('null'); }],
    [isBool(value), body => { body.return('bool'); }],
    [isInt(value), body => { body.return('int'); }],
    [isStr(value), body => { body.return('string'); }],
    [isList(value), body => { body.return('list'); }]
  ], body => { body.return('other'); });
  return m.seal();
}

function pagingModule(): SealedModule {
  const m = new ModuleBuilder('paging');
  const page = m.function('page', { returns: t.int });
  const size = page.param('size', t.int, { omittable: true });
  page.body.if(isOmitted(size), body => { body.return(10); });
  page.body.return(size);
  m.function('firstPage', { returns: t.int }).body.return(call('page', [omit()]));
  return m.seal();
}

describe('Rendered constructs', () => {
  describe('try/catch', () => {
    it('chains typed TypeScript catch clauses through instanceof', () => {
      expect(renderSingle(safetyModule(), 'typescript')).toBe([
        'export function parse(text: string): number {',
        '  try {',
        '    return text.length;',
        '  } catch (error) {',
        '    if (error instanceof RangeError) {',
        '      const problem = error;',
        '      return 0;',
        '    } else {',
        '      return -1;',
        '    }',
        '  } finally {',
        '    // done',
        '  }',
        '}',
        ''
      ].join('\n'));
    });

    it('renders Python except clauses and fills a comment-only finally', () => {
      expect(renderSingle(safetyModule(), 'python')).toBe([
        'def parse(text: str) -> int:',
        '    try:',
        '        return len(text)',
        '    except ValueError as problem:',
        '        return 0',
        '    except Exception:',
        '        return -1',
        '    finally:',
        '        # done',
        '        pass',
        ''
      ].join('\n'));
    });

    it('renders PHP catch clauses with fully qualified classes', () => {
      expect(phpFunctions(safetyModule())).toContain([
        '    try {',
        '        return mb_strlen($text);',
        '    } catch (\\InvalidArgumentException $problem) {',
        '        return 0;',
        '    } catch (\\Exception) {',
        '        return -1;',
        '    } finally {',
        '        // done',
        '    }'
      ].join('\n'));
    });
  });

  describe('scoped resources', () => {
    it('renders a TypeScript using declaration in its own block', () => {
      expect(renderSingle(resourceModule(), 'typescript')).toBe([
        'export function flushAll(resource: any): void {',
        '  {',
        '    using handle = resource;',
        '    handle.flush();',
        '  }',
        '}',
        ''
      ].join('\n'));
    });

    it('renders a Python with statement', () => {
      expect(renderSingle(resourceModule(), 'python')).toBe([
        'import typing',
        '',
        '',
        'def flushAll(resource: typing.Any) -> None:',
        '    with resource as handle:',
        '        handle.flush()',
        ''
      ].join('\n'));
    });

    it('is unsupported by PHP', () => {
      expect(phpUnsupported(resourceModule())).toEqual(['scoped resource is not supported by php: with statement']);
    });
  });

  describe('mapping iteration', () => {
    it('iterates TypeScript entries and converts numeric keys back', () => {
      expect(renderSingle(scoresModule(), 'typescript')).toBe([
        'export function total(scores: Record<string, number>): number {',
        '  let sum = 0;',
        '  for (const [player, score] of Object.entries(scores)) {',
        '    sum = sum + score;',
        '  }',
        '  return sum;',
        '}',
        '',
        'export function firstLabel(byId: Record<number, string>): string {',
        '  for (const [idText, label] of Object.entries(byId)) {',
        '    const id = Number(idText);',
        '    if (id > 0) {',
        '      return label;',
        '    }',
        '  }',
        '  return "";',
        '}',
        ''
      ].join('\n'));
    });

    it('iterates Python items and PHP key-value pairs', () => {
      expect(renderSingle(scoresModule(), 'python').split('\n')).toContain('    for player, score in scores.items():');
      expect(phpFunctions(scoresModule()).split('\n')).toContain('    foreach ($scores as $player => $score) {');
    });
  });

  describe('interfaces', () => {
    function namedModule(): SealedModule {
      const m = new ModuleBuilder('named');
      m.interface('Named').property('name', t.string);
      return m.seal();
    }

    it('renders a TypeScript interface and a Python protocol', () => {
      expect(renderSingle(namedModule(), 'typescript')).toBe('export interface Named {\n  name: string;\n}\n');
      expect(renderSingle(namedModule(), 'python')).toBe(
        'import typing\n\n\nclass Named(typing.Protocol):\n    name: str\n'
      );
    });

    it('is unsupported by PHP', () => {
      expect(phpUnsupported(namedModule())).toEqual(["interface declaration is not supported by php: interface 'Named'"]);
    });
  });

  describe('generic classes', () => {
    it('renders TypeScript type parameters', () => {
      expect(renderSingle(boxModule(), 'typescript')).toBe([
        'export class Box<T> {',
        '  value: T;',
        '',
        '  constructor(value: T) {',
        '    this.value = value;',
        '  }',
        '',
        '  unwrap(): T {',
        '    return this.value;',
        '  }',
        '}',
        ''
      ].join('\n'));
    });

    it('declares a Python TypeVar and derives from Generic', () => {
      expect(renderSingle(boxModule(), 'python')).toBe([
        'import typing',
        '',
        '',
        'T = typing.TypeVar("T")',
        '',
        '',
        'class Box(typing.Generic[T]):',
        '    def __init__(self, value: T) -> None:',
        '        self.value = value',
        '',
        '    def unwrap(self) -> T:',
        '        return self.value',
        ''
      ].join('\n'));
    });
  });

  describe('async functions', () => {
    function countModule(): SealedModule {
      const m = new ModuleBuilder('counts');
      m.function('fetchCount', { returns: t.int, isAsync: true }).body.return(1);
      return m.seal();
    }

    it('wraps the TypeScript return type in a Promise', () => {
      expect(renderSingle(countModule(), 'typescript')).toBe(
        'export async function fetchCount(): Promise<number> {\n  return 1;\n}\n'
      );
    });

    it('renders async def in Python and is unsupported by PHP', () => {
      expect(renderSingle(countModule(), 'python')).toBe('async def fetchCount() -> int:\n    return 1\n');
      expect(phpUnsupported(countModule())).toEqual(["async function is not supported by php: function 'fetchCount' is async"]);
    });
  });

  describe('set literals', () => {
    function setsModule(): SealedModule {
      const m = new ModuleBuilder('sets');
      m.function('primes', { returns: t.set(t.int) }).body.return(set([2, 3, 5]));
      m.function('noTags', { returns: t.set(t.string) }).body.return(set([], t.string));
      return m.seal();
    }

    it('constructs a TypeScript Set', () => {
      expect(renderSingle(setsModule(), 'typescript')).toBe([
        'export function primes(): Set<number> {',
        '  return new Set([2, 3, 5]);',
        '}',
        '',
        'export function noTags(): Set<string> {',
        '  return new Set<string>();',
        '}',
        ''
      ].join('\n'));
    });

    it('uses a Python set display, or set() when empty', () => {
      expect(renderSingle(setsModule(), 'python')).toBe([
        'def primes() -> set[int]:',
        '    return {2, 3, 5}',
        '',
        '',
        'def noTags() -> set[str]:',
        '    return set()',
        ''
      ].join('\n'));
    });
  });

  describe('templates', () => {
    function greetingsModule(): SealedModule {
      const m = new ModuleBuilder('greetings');
      const hello = m.function('hello', { returns: t.string });
      hello.body.return(template('Hello, ', hello.param('name', t.string), '!'));
      const status = m.function('status', { returns: t.string });
      status.body.return(template('ready: ', status.param('flag', t.bool)));
      const bare = m.function('bare', { returns: t.string });
      bare.body.return(template(bare.param('flag', t.bool)));
      return m.seal();
    }

    it('interpolates in TypeScript', () => {
      const lines = renderSingle(greetingsModule(), 'typescript').split('\n');
      expect(lines).toContain('  return `Hello, ${name}!`;');
      expect(lines).toContain('  return `ready: ${flag}`;');
    });

    it('writes booleans in lowercase in Python f-strings', () => {
      const lines = renderSingle(greetingsModule(), 'python').split('\n');
      expect(lines).toContain('    return f"Hello, {name}!"');
      expect(lines).toContain('    return f\'ready: {"true" if flag else "false"}\'');
      expect(lines).toContain('    return f\'{"true" if flag else "false"}\'');
    });

    it('concatenates in PHP and spells booleans out', () => {
      const lines = phpFunctions(greetingsModule()).split('\n');
      expect(lines).toContain("    return 'Hello, ' . $name . '!';");
      expect(lines).toContain("    return 'ready: ' . ($flag ? 'true' : 'false');");
      expect(lines).toContain("    return $flag ? 'true' : 'false';");
    });
  });

  describe('ternaries', () => {
    function signsModule(): SealedModule {
      const m = new ModuleBuilder('signs');
      const fn = m.function('sign', { returns: t.string });
      const x = fn.param('x', t.int);
      fn.body.return(ternary(gt(x, 0), 'positive', ternary(lt(x, 0), 'negative', 'zero')));
      return m.seal();
    }

    it('nests without parentheses where the target allows it', () => {
      expect(renderSingle(signsModule(), 'typescript').split('\n')).toContain(
        '  return x > 0 ? "positive" : x < 0 ? "negative" : "zero";'
      );
      expect(renderSingle(signsModule(), 'python').split('\n')).toContain(
        '    return "positive" if x > 0 else "negative" if x < 0 else "zero"'
      );
    });

    it('parenthesises a nested PHP ternary', () => {
      expect(phpFunctions(signsModule()).split('\n')).toContain(
        "    return $x > 0 ? 'positive' : ($x < 0 ? 'negative' : 'zero');"
      );
    });
  });

  describe('precedence', () => {
    function arithModule(): SealedModule {
      const m = new ModuleBuilder('arith');
      const combine = m.function('combine', { returns: t.int });
      const a = combine.param('a', t.int);
      const b = combine.param('b', t.int);
      const c = combine.param('c', t.int);
      combine.body.return(sub(mul(add(a, b), c), sub(b, c)));
      const neither = m.function('notBoth', { returns: t.bool });
      const p = neither.param('p', t.bool);
      const q = neither.param('q', t.bool);
      neither.body.return(not(and(p, q)));
      return m.seal();
    }

    it('parenthesises looser operands and right-hand operands of equal precedence', () => {
      const ts = renderSingle(arithModule(), 'typescript').split('\n');
      expect(ts).toContain('  return (a + b) * c - (b - c);');
      expect(ts).toContain('  return !(p && q);');
      const py = renderSingle(arithModule(), 'python').split('\n');
      expect(py).toContain('    return (a + b) * c - (b - c)');
      expect(py).toContain('    return not (p and q)');
      const php = phpFunctions(arithModule()).split('\n');
      expect(php).toContain('    return ($a + $b) * $c - ($b - $c);');
      expect(php).toContain('    return !($p && $q);');
    });
  });

  describe('numeric semantics', () => {
    function equalityModule(): SealedModule {
      const m = new ModuleBuilder('numbers');
      const isZero = m.function('isZero', { returns: t.bool });
      isZero.body.return(eq(isZero.param('x', t.float), 0));
      const differs = m.function('differs', { returns: t.bool });
      differs.body.return(ne(differs.param('n', t.int), 0.5));
      const same = m.function('same', { returns: t.bool });
      same.body.return(eq(same.param('a', t.float), 1.5));
      const whole = m.function('whole', { returns: t.bool });
      whole.body.return(ne(whole.param('k', t.int), 0));
      return m.seal();
    }

    it('compares an int with a float loosely in PHP', () => {
      const lines = phpFunctions(equalityModule()).split('\n');
      expect(lines).toContain('    return $x == 0;');
      expect(lines).toContain('    return $n != 0.5;');
      expect(lines).toContain('    return $a === 1.5;');
      expect(lines).toContain('    return $k !== 0;');
    });

    it('keeps strict equality in TypeScript', () => {
      expect(renderSingle(equalityModule(), 'typescript').split('\n')).toContain('  return x === 0;');
    });

    it('keeps the sign of the dividend for Python remainders', () => {
      const m = new ModuleBuilder('remainders');
      const rem = m.function('rem', { returns: t.int });
      rem.body.return(mod(rem.param('a', t.int), rem.param('b', t.int)));
      const frem = m.function('frem', { returns: t.float });
      frem.body.return(mod(frem.param('x', t.float), frem.param('y', t.float)));
      expect(renderSingle(m.seal(), 'python')).toBe([
        'import math',
        '',
        '',
        'def rem(a: int, b: int) -> int:',
        '    return int(math.fmod(a, b))',
        '',
        '',
        'def frem(x: float, y: float) -> float:',
        '    return math.fmod(x, y)',
        ''
      ].join('\n'));
    });
  });

  describe('declaration order', () => {
    it('defines a constant before a Python function whose default uses it', () => {
      const m = new ModuleBuilder('limits');
      const clamp = m.function('clamp', { returns: t.int });
      clamp.body.return(clamp.param('a', t.int, { default: ref('LIMIT') }));
      m.const('LIMIT', t.int, 5);
      expect(renderSingle(m.seal(), 'python')).toBe('LIMIT: int = 5\n\n\ndef clamp(a: int = LIMIT) -> int:\n    return a\n');
    });
  });

  describe('type tests', () => {
    it('renders TypeScript typeof, Number and Array checks', () => {
      expect(renderSingle(kindModule(), 'typescript')).toBe([
        'export function kindOf(value: any): string {',
        '  if (value === null) {',
        '    return "null";',
        '  } else if (typeof value === "boolean") {',
        '    return "bool";',
        '  } else if (Number.isInteger(value)) {',
        '    return "int";',
        '  } else if (typeof value === "string") {',
        '    return "string";',
        '  } else if (Array.isArray(value)) {',
        '    return "list";',
        '  } else {',
        '    return "other";',
        '  }',
        '}',
        ''
      ].join('\n'));
    });

    it('excludes bool from the Python int test', () => {
      expect(renderSingle(kindModule(), 'python')).toBe([
        'import typing',
        '',
        '',
        'def kindOf(value: typing.Any) -> str:',
        '    if value is None:',
        '        return "null"',
        '    elif isinstance(value, bool):',
        '        return "bool"',
        '    elif isinstance(value, int) and not isinstance(value, bool):',
        '        return "int"',
        '    elif isinstance(value, str):',
        '        return "string"',
        '    elif isinstance(value, list):',
        '        return "list"',
        '    else:',
        '        return "other"',
        ''
      ].join('\n'));
    });

    it('calls the PHP is_* functions', () => {
      const lines = phpFunctions(kindModule()).split('\n');
      expect(lines).toContain('    if ($value === null) {');
      expect(lines).toContain('    } elseif (is_bool($value)) {');
      expect(lines).toContain('    } elseif (is_int($value)) {');
      expect(lines).toContain('    } elseif (is_string($value)) {');
      expect(lines).toContain('    } elseif (is_array($value)) {');
    });
  });

  describe('omittable parameters', () => {
    it('renders an optional TypeScript parameter passed as undefined', () => {
      expect(renderSingle(pagingModule(), 'typescript')).toBe([
        'export function page(size?: number): number {',
        '  if (size === undefined) {',
        '    return 10;',
        '  }',
        '  return size;',
        '}',
        '',
        'export function firstPage(): number {',
        '  return page(undefined);',
        '}',
        ''
      ].join('\n'));
    });

    it('defaults the Python parameter to Ellipsis', () => {
      expect(renderSingle(pagingModule(), 'python')).toBe([
        'import types',
        'import typing',
        '',
        '',
        'def page(size: typing.Union[int, types.EllipsisType] = ...) -> int:',
        '    if size is ...:',
        '        return 10',
        '    return size',
        '',
        '',
        'def firstPage() -> int:',
        '    return page(...)',
        ''
      ].join('\n'));
    });

    it('is unsupported by PHP', () => {
      expect(phpUnsupported(pagingModule())).toEqual([
        "omittable parameter is not supported by php: parameter 'size' is omittable",
        'omittable parameter is not supported by php: test for an omitted argument',
        'omittable parameter is not supported by php: omitted argument value'
      ]);
    });
  });

  describe('printing', () => {
    function greeterModule(): SealedModule {
      const m = new ModuleBuilder('greeter');
      useStandardExterns(m, 'print');
      const greet = m.function('greet');
      greet.body.expression(call('print', [greet.param('name', t.string)]));
      greet.body.expression(call('print', ['done']));
      return m.seal();
    }

    it('ends every PHP print with a line break', () => {
      const lines = phpFunctions(greeterModule()).split('\n');
      expect(lines).toContain('    print($name . PHP_EOL);');
      expect(lines).toContain("    print('done' . PHP_EOL);");
    });

    it('leaves targets whose print adds the line break alone', () => {
      expect(renderSingle(greeterModule(), 'typescript').split('\n')).toContain('  console.log(name);');
      expect(renderSingle(greeterModule(), 'python').split('\n')).toContain('    print(name)');
    });
  });
});
