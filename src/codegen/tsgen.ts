// TypeScript renderer for crossgen modules

import { CapabilityProfile, ConstructKind, Declaration, IRPath } from '../types';
import {
  DEFAULT_TYPESCRIPT_OPTIONS, ICodeRenderer, RenderedFile, TypeScriptRenderOptions
} from '../codegen-interface';
import { ValidatedModule } from '../validation/validator';
import { executionOrder } from './shared/declaration-order';
import { TsRenderContext, typeScriptModulePath } from './typescript/ts-context';
import {
  generateClassDeclaration, generateConstDeclaration, generateFunctionDeclaration, generateInterfaceDeclaration,
  generateTypeAlias
} from './typescript/ts-declaration-codegen';

export const TYPESCRIPT_CAPABILITIES: CapabilityProfile = {
  target: 'typescript',
  capabilities: new Set<ConstructKind>([
    'lambda',
    'async-function',
    'interface',
    'optional-property',
    'type-alias',
    'distinct-type',
    'generic-class',
    'set-type',
    'cast',
    'scoped-resource',
    'circular-import',
    'function-value',
    'computed-constant',
    'uninitialized-variable',
    'omittable-parameter'
  ])
};

export class TypeScriptRenderer implements ICodeRenderer<'typescript'> {
  readonly target = 'typescript' as const;
  readonly capabilities = TYPESCRIPT_CAPABILITIES;

  render(validated: ValidatedModule, options: Partial<TypeScriptRenderOptions> = {}): RenderedFile[] {
    const ctx = new TsRenderContext(validated, { ...DEFAULT_TYPESCRIPT_OPTIONS, ...options });
    this.generateHeader(ctx);
    this.generateImports(ctx);
    for (const { declaration, index } of executionOrder(validated.module)) {
      this.generateDeclaration(ctx, declaration, ['declarations', index]);
    }

    const files: RenderedFile[] = [];
    ctx.finishFile(`${typeScriptModulePath(validated.module.name)}.ts`, files);
    return files;
  }

  private generateHeader(ctx: TsRenderContext): void {
    const lines = ctx.headerLines();
    for (const line of lines) {
      ctx.printer.writeLine(line.length > 0 ? `// ${line}` : '//');
    }
    ctx.printer.blankLine();
  }

  // Type-only names are imported with `type` so the import erases cleanly
  private generateImports(ctx: TsRenderContext): void {
    for (const [source, symbols] of ctx.imports.bySource()) {
      const typesOnly = symbols.every(symbol => symbol.kind === 'type');
      const names = symbols.map(symbol => {
        const name = symbol.local === symbol.name ? symbol.name : `${symbol.name} as ${symbol.local}`;
        return !typesOnly && symbol.kind === 'type' ? `type ${name}` : name;
      });
      ctx.printer.writeLine(`import ${typesOnly ? 'type ' : ''}{ ${names.join(', ')} } from '${source}';`);
    }
    ctx.printer.blankLine();
  }

  private generateDeclaration(ctx: TsRenderContext, declaration: Declaration, path: IRPath): void {
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
        // provided by the environment
        return;
    }
    ctx.printer.blankLine();
  }
}
