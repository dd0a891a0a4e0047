// Python renderer for crossgen modules

import { CapabilityProfile, ConstructKind, Declaration, IRPath } from '../types';
import { DEFAULT_PYTHON_OPTIONS, ICodeRenderer, PythonRenderOptions, RenderedFile } from '../codegen-interface';
import { ValidatedModule } from '../validation/validator';
import { executionOrder } from './shared/declaration-order';
import { PyRenderContext, pythonModulePath } from './python/py-context';
import {
  generateClassDeclaration, generateConstDeclaration, generateFunctionDeclaration, generateInterfaceDeclaration,
  generateTypeAlias
} from './python/py-declaration-codegen';

export const PYTHON_CAPABILITIES: CapabilityProfile = {
  target: 'python',
  capabilities: new Set<ConstructKind>([
    'lambda',
    'named-argument',
    'keyword-only-parameter',
    'async-function',
    'multiple-inheritance',
    'interface',
    'type-alias',
    'distinct-type',
    'generic-class',
    'set-type',
    'cast',
    'scoped-resource',
    'complex-mapping-key',
    'function-value',
    'computed-constant',
    'uninitialized-variable',
    'omittable-parameter'
  ])
};

export class PythonRenderer implements ICodeRenderer<'python'> {
  readonly target = 'python' as const;
  readonly capabilities = PYTHON_CAPABILITIES;

  render(validated: ValidatedModule, options: Partial<PythonRenderOptions> = {}): RenderedFile[] {
    const ctx = new PyRenderContext(validated, { ...DEFAULT_PYTHON_OPTIONS, ...options });
    this.generateTypeVars(ctx);
    for (const { declaration, index } of executionOrder(validated.module)) {
      this.generateDeclaration(ctx, declaration, ['declarations', index]);
    }
    // imports are known only once the body has named the standard modules it uses
    ctx.printer.prepend(this.preamble(ctx));

    const files: RenderedFile[] = [];
    ctx.finishFile(`${pythonModulePath(validated.module.name)}.py`, files);
    return files;
  }

  private generateTypeVars(ctx: PyRenderContext): void {
    for (const spelling of ctx.typeVars.values()) {
      ctx.printer.writeLine(`${spelling} = ${ctx.typing('TypeVar')}(${JSON.stringify(spelling)})`);
    }
    ctx.printer.blankLine();
    ctx.printer.blankLine();
  }

  private preamble(ctx: PyRenderContext): string[] {
    const header = ctx.headerLines().map(line => (line.length > 0 ? `# ${line}` : '#'));
    const plain = [...ctx.stdlib].sort().map(name => `import ${name}`);
    const from = [...ctx.imports.bySource()].map(([source, symbols]) => {
      const names = symbols.map(symbol => (symbol.local === symbol.name ? symbol.name : `${symbol.name} as ${symbol.local}`));
      return `from ${source} import ${names.join(', ')}`;
    });
    const imports = [...plain, ...from];

    const lines: string[] = [...header];
    if (imports.length > 0) {
      if (lines.length > 0) {
        lines.push('');
      }
      lines.push(...imports);
    }
    if (lines.length > 0 && ctx.printer.getCurrentLine() > 1) {
      lines.push('', '');
    }
    return lines;
  }

  private generateDeclaration(ctx: PyRenderContext, declaration: Declaration, path: IRPath): void {
    switch (declaration.kind) {
      case 'class':
        generateClassDeclaration(ctx, declaration, path);
        break;
      case 'function':
        generateFunctionDeclaration(ctx, declaration, path);
        break;
      case 'const':
        generateConstDeclaration(ctx, declaration, path);
        break;
      case 'typeAlias':
        generateTypeAlias(ctx, declaration, path);
        break;
      case 'interface':
        generateInterfaceDeclaration(ctx, declaration, path);
        break;
      case 'extern':
        return;
    }
    ctx.definedTypes.add(declaration.name);
    ctx.printer.blankLine();
    ctx.printer.blankLine();
  }
}
