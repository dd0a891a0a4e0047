// PHP renderer for crossgen modules

import { CapabilityProfile, ClassDeclaration, ConstructKind, Declaration, IRPath } from '../types';
import { DEFAULT_PHP_OPTIONS, ICodeRenderer, PhpRenderOptions, RenderedFile } from '../codegen-interface';
import { ValidatedModule } from '../validation/validator';
import { executionOrder } from './shared/declaration-order';
import { PhpRenderContext, phpDirectory } from './php/php-context';
import { generateClassDeclaration, generateConstDeclaration, generateFunctionDeclaration } from './php/php-declaration-codegen';

export const PHP_CAPABILITIES: CapabilityProfile = {
  target: 'php',
  capabilities: new Set<ConstructKind>(['circular-import'])
};

const FUNCTIONS_FILE = 'functions.php';

/**
 * Each class gets its own PSR-4 file; functions and constants share
 * `functions.php` in the same directory, for a `files` autoload entry.
 */
export class PhpRenderer implements ICodeRenderer<'php'> {
  readonly target = 'php' as const;
  readonly capabilities = PHP_CAPABILITIES;

  render(validated: ValidatedModule, options: Partial<PhpRenderOptions> = {}): RenderedFile[] {
    const ctx = new PhpRenderContext(validated, { ...DEFAULT_PHP_OPTIONS, ...options });
    const directory = phpDirectory(validated.module.name);
    const files: RenderedFile[] = [];
    const classes: Array<{ declaration: ClassDeclaration; index: number }> = [];
    const others: Array<{ declaration: Declaration; index: number }> = [];

    for (const entry of executionOrder(validated.module)) {
      const declaration = entry.declaration;
      if (declaration.kind === 'class') {
        classes.push({ declaration, index: entry.index });
      } else if (declaration.kind !== 'extern') {
        others.push(entry);
      }
    }

    for (const { declaration, index } of classes) {
      ctx.newFile();
      this.generatePreamble(ctx);
      generateClassDeclaration(ctx, declaration, ['declarations', index]);
      ctx.finishFile(`${directory}/${ctx.declarationName(declaration.name)}.php`, files);
    }

    if (others.length > 0) {
      ctx.newFile();
      this.generatePreamble(ctx);
      for (const { declaration, index } of others) {
        this.generateDeclaration(ctx, declaration, ['declarations', index]);
        ctx.printer.blankLine();
      }
      ctx.finishFile(`${directory}/${FUNCTIONS_FILE}`, files);
    }
    return files;
  }

  // Every file of a module carries the module's full set of `use` lines
  private generatePreamble(ctx: PhpRenderContext): void {
    const printer = ctx.printer;
    printer.writeLine('<?php');
    printer.blankLine();
    const header = ctx.headerLines();
    if (header.length > 0) {
      for (const line of header) {
        printer.writeLine(line.length > 0 ? `// ${line}` : '//');
      }
      printer.blankLine();
    }
    printer.writeLine('declare(strict_types=1);');
    printer.blankLine();
    printer.writeLine(`namespace ${ctx.namespace};`);
    printer.blankLine();
    const uses = ctx.useLines();
    if (uses.length > 0) {
      uses.forEach(line => printer.writeLine(line));
      printer.blankLine();
    }
  }

  private generateDeclaration(ctx: PhpRenderContext, declaration: Declaration, path: IRPath): void {
    switch (declaration.kind) {
      case 'function':
        generateFunctionDeclaration(ctx, declaration, path);
        break;
      case 'const':
        generateConstDeclaration(ctx, declaration, path);
        break;
      case 'class':
      case 'typeAlias':
      case 'interface':
      case 'extern':
        ctx.fail(`${declaration.kind} '${declaration.name}' cannot go in ${FUNCTIONS_FILE}`, path);
    }
  }
}
