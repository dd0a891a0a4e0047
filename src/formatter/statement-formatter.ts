import {
  ClassDeclaration,
  Declaration,
  Expression,
  ExternDeclaration,
  FunctionLike,
  IRPath,
  Module,
  Parameter,
  Statement,
  TARGET_LANGUAGES,
} from '../types';
import { FormatterOptions } from './options';
import { Printer } from './printer';
import { TypeFormatter } from './type-formatter';
import { ExpressionFormatter } from './expression-formatter';

export class StatementFormatter {
  constructor(
    private readonly printer: Printer,
    private readonly options: FormatterOptions,
    private readonly typeFormatter: TypeFormatter,
    private readonly expressionFormatter: ExpressionFormatter,
  ) {}

  formatModule(module: Module): void {
    this.printer.writeLine(`module ${module.name}`);
    module.imports.forEach((name, i) => {
      this.printer.mark(['imports', i]);
      this.printer.writeLine(`import ${name}`);
    });
    for (const comment of module.headerComments) {
      this.printer.writeLine(`# ${comment}`);
    }
    module.declarations.forEach((declaration, i) => {
      for (let blank = 0; blank < this.options.blankLinesBetweenDeclarations; blank++) {
        this.printer.blankLine();
      }
      this.formatDeclaration(declaration, ['declarations', i]);
    });
  }

  private formatDeclaration(declaration: Declaration, path: IRPath): void {
    this.printer.mark(path);
    switch (declaration.kind) {
      case 'class':
        this.formatClassDeclaration(declaration, path);
        break;
      case 'function':
        this.printer.writeLine(`${this.visibility(declaration.exported)}${this.formatSignature('function', declaration)}:`);
        this.formatFunctionBody(declaration, path);
        break;
      case 'const':
        this.printer.writeLine(
          `${this.visibility(declaration.exported)}const ${declaration.name}: ${this.typeFormatter.formatType(declaration.type)}`
          + ` = ${this.expressionFormatter.formatExpression(declaration.value)}`
        );
        break;
      case 'typeAlias':
        this.printer.writeLine(
          `${this.visibility(declaration.exported)}${declaration.distinct ? 'distinct ' : ''}type ${declaration.name}`
          + ` = ${this.typeFormatter.formatType(declaration.type)}`
        );
        break;
      case 'interface':
        this.printer.writeLine(`${this.visibility(declaration.exported)}interface ${declaration.name}:`);
        this.printer.indented(() => {
          this.formatDoc(declaration.doc);
          declaration.properties.forEach((property, i) => {
            this.printer.mark([...path, 'properties', i]);
            this.printer.writeLine(`property ${property.name}${property.optional ? '?' : ''}: ${this.typeFormatter.formatType(property.type)}`);
          });
          if (declaration.properties.length === 0 && declaration.doc.length === 0) {
            this.printer.writeLine('pass');
          }
        });
        break;
      case 'extern':
        this.printer.writeLine(this.formatExtern(declaration));
        break;
    }
  }

  private visibility(exported: boolean): string {
    return exported ? '' : 'private ';
  }

  private formatClassDeclaration(declaration: ClassDeclaration, path: IRPath): void {
    const bases = declaration.bases.length === 0
      ? ''
      : `(${declaration.bases.map(base => this.typeFormatter.formatType(base)).join(', ')})`;
    const modifiers = `${this.visibility(declaration.exported)}${declaration.isAbstract ? 'abstract ' : ''}`;
    this.printer.writeLine(
      `${modifiers}class ${declaration.name}${this.typeFormatter.formatTypeParameters(declaration.typeParameters)}${bases}:`
    );
    this.printer.indented(() => {
      this.formatDoc(declaration.doc);
      declaration.fields.forEach((field, i) => {
        const flags = [field.initArg ? 'init' : '', field.readonly ? 'readonly' : ''].filter(flag => flag.length > 0);
        const value = field.defaultValue ? ` = ${this.expressionFormatter.formatExpression(field.defaultValue)}` : '';
        this.printer.mark([...path, 'fields', i]);
        this.printer.writeLine(
          `field ${field.name}: ${this.typeFormatter.formatType(field.type)}${value}${flags.length > 0 ? ` [${flags.join(', ')}]` : ''}`
        );
      });
      declaration.methods.forEach((method, i) => {
        const methodPath = [...path, 'methods', i];
        const modifiers = [method.isStatic ? 'static ' : '', method.isAbstract ? 'abstract ' : ''].join('');
        this.printer.mark(methodPath);
        this.printer.writeLine(`${modifiers}${this.formatSignature('method', method)}${method.isAbstract ? '' : ':'}`);
        if (!method.isAbstract) {
          this.formatFunctionBody(method, methodPath);
        }
      });
      if (declaration.fields.length === 0 && declaration.methods.length === 0 && declaration.doc.length === 0) {
        this.printer.writeLine('pass');
      }
    });
  }

  private formatSignature(keyword: string, fn: FunctionLike): string {
    const params: string[] = [];
    let keywordOnly = false;
    for (const parameter of fn.parameters) {
      if (parameter.keywordOnly && !keywordOnly) {
        params.push('*');
        keywordOnly = true;
      }
      params.push(this.formatParameter(parameter));
    }
    const prefix = fn.isAsync ? 'async ' : '';
    return `${prefix}${keyword} ${fn.name}(${params.join(', ')}) -> ${this.typeFormatter.formatType(fn.returnType)}`;
  }

  private formatParameter(parameter: Parameter): string {
    const value = parameter.defaultValue ? ` = ${this.expressionFormatter.formatExpression(parameter.defaultValue)}` : '';
    return `${this.typeFormatter.formatParameterType(parameter)}${value}`;
  }

  private formatFunctionBody(fn: FunctionLike, path: IRPath): void {
    this.printer.indented(() => {
      this.formatDoc(fn.doc);
      this.formatBlockContents(fn.body, [...path, 'body'], fn.doc.length === 0);
    });
  }

  private formatDoc(doc: readonly string[]): void {
    for (const line of doc) {
      this.printer.writeLine(`## ${line}`);
    }
  }

  private formatExtern(declaration: ExternDeclaration): string {
    const bindings = TARGET_LANGUAGES
      .flatMap(target => {
        const binding = declaration.bindings[target];
        if (!binding) {
          return [];
        }
        return [`${target}: ${binding.module ? `${binding.module}:` : ''}${binding.name}`];
      })
      .join(', ');
    return `extern ${declaration.entity} ${declaration.name}: ${this.typeFormatter.formatType(declaration.type)} [${bindings}]`;
  }

  private formatBlock(statements: readonly Statement[], path: IRPath): void {
    this.printer.indented(() => this.formatBlockContents(statements, path, true));
  }

  private formatBlockContents(statements: readonly Statement[], path: IRPath, passIfEmpty: boolean): void {
    if (statements.length === 0 && passIfEmpty) {
      this.printer.writeLine('pass');
    }
    statements.forEach((statement, i) => this.formatStatement(statement, [...path, i]));
  }

  formatStatement(statement: Statement, path: IRPath): void {
    const expr = (e: Expression): string => this.expressionFormatter.formatExpression(e);
    this.printer.mark(path);
    switch (statement.kind) {
      case 'assign':
        this.printer.writeLine(`${expr(statement.target)} = ${expr(statement.value)}`);
        break;
      case 'varDecl': {
        const keyword = statement.constant ? 'const' : 'let';
        const value = statement.value ? ` = ${expr(statement.value)}` : '';
        this.printer.writeLine(`${keyword} ${statement.name}${this.typeFormatter.formatOptionalAnnotation(statement.type)}${value}`);
        break;
      }
      case 'if':
        statement.branches.forEach((branch, i) => {
          this.printer.writeLine(`${i === 0 ? 'if' : 'elif'} ${expr(branch.condition)}:`);
          this.formatBlock(branch.body, [...path, 'branches', i, 'body']);
        });
        if (statement.elseBody) {
          this.printer.writeLine('else:');
          this.formatBlock(statement.elseBody, [...path, 'elseBody']);
        }
        break;
      case 'while':
        this.printer.writeLine(`while ${expr(statement.condition)}:`);
        this.formatBlock(statement.body, [...path, 'body']);
        break;
      case 'forEach':
        this.printer.writeLine(
          `for ${statement.variable}${this.typeFormatter.formatOptionalAnnotation(statement.variableType)} in ${expr(statement.iterable)}:`
        );
        this.formatBlock(statement.body, [...path, 'body']);
        break;
      case 'forEntries':
        this.printer.writeLine(`for ${statement.keyVariable}, ${statement.valueVariable} in entries(${expr(statement.mapping)}):`);
        this.formatBlock(statement.body, [...path, 'body']);
        break;
      case 'return':
        this.printer.writeLine(statement.value ? `return ${expr(statement.value)}` : 'return');
        break;
      case 'raise':
        this.printer.writeLine(`raise ${statement.errorClass ?? 'Error'}(${expr(statement.message)})`);
        break;
      case 'expression':
        this.printer.writeLine(expr(statement.expression));
        break;
      case 'with':
        this.printer.writeLine(`with ${expr(statement.resource)}${statement.binding ? ` as ${statement.binding}` : ''}:`);
        this.formatBlock(statement.body, [...path, 'body']);
        break;
      case 'tryCatch':
        this.printer.writeLine('try:');
        this.formatBlock(statement.body, [...path, 'body']);
        statement.catches.forEach((clause, i) => {
          const binding = clause.binding ? ` as ${clause.binding}` : '';
          this.printer.writeLine(`catch${clause.errorClass ? ` ${clause.errorClass}` : ''}${binding}:`);
          this.formatBlock(clause.body, [...path, 'catches', i, 'body']);
        });
        if (statement.finallyBody) {
          this.printer.writeLine('finally:');
          this.formatBlock(statement.finallyBody, [...path, 'finallyBody']);
        }
        break;
      case 'append':
        this.printer.writeLine(`append(${expr(statement.target)}, ${expr(statement.value)})`);
        break;
      case 'pass':
      case 'break':
      case 'continue':
        this.printer.writeLine(statement.kind);
        break;
      case 'comment':
        this.printer.writeLine(`# ${statement.text}`);
        break;
    }
  }
}
