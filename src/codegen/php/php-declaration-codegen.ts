// PHP declarations: classes, functions and constants

import {
    ClassDeclaration, ConstDeclaration, Expression, FieldDeclaration, FunctionDeclaration, IRPath, MethodDeclaration,
    Parameter, Type
} from '../../types';
import { createNamedType } from '../../type-utils';
import { constructorParameters } from '../../validation/symbols';
import { isConstantExpression } from '../../validation/capability-validator';
import { PhpRenderContext } from './php-context';
import { generateDocType, generateTypeHint, losesDetail } from './php-type-codegen';
import { renderExpression } from './php-expression-codegen';
import { generateBlock } from './php-statement-codegen';

export function generateDocBlock(ctx: PhpRenderContext, doc: readonly string[], tags: readonly string[] = []): void {
    const lines = tags.length > 0 && doc.length > 0 ? [...doc, '', ...tags] : [...doc, ...tags];
    if (lines.length === 0) {
        return;
    }
    ctx.printer.writeLine('/**');
    for (const line of lines) {
        ctx.printer.writeLine(line.length > 0 ? ` * ${line}` : ' *');
    }
    ctx.printer.writeLine(' */');
}

interface ParameterSource {
    name: string;
    type: Type;
    defaultValue?: Expression;
    // IR path of the parameter or field
    path: IRPath;
}

interface RenderedParameters {
    list: string;
    // `@param` tags for types the declarations cannot express
    tags: string[];
    // assigns defaults that are not constant expressions
    prelude: () => void;
}

/**
 * Renders a parameter list and declares the parameters as variables of the
 * current function. A default PHP cannot evaluate at compile time becomes
 * `null` and is filled in by the prelude.
 */
function generateParameters(ctx: PhpRenderContext, sources: readonly ParameterSource[]): RenderedParameters {
    const deferred: Array<{ variable: string; value: Expression; path: IRPath }> = [];
    const items: string[] = [];
    const tags: string[] = [];

    for (const source of sources) {
        const typePath = [...source.path, 'type'];
        const defaultPath = [...source.path, 'defaultValue'];
        let hint = generateTypeHint(ctx, source.type, typePath, 'parameter') ?? 'mixed';
        const defaultValue = source.defaultValue;
        const deferredDefault = defaultValue !== undefined && !isConstantExpression(defaultValue, ctx.module);
        let value = '';
        if (deferredDefault) {
            if (source.type.kind !== 'optional' && hint !== 'mixed') {
                hint = hint.includes('|') ? `${hint}|null` : `?${hint}`;
            }
            value = ' = null';
        } else if (defaultValue) {
            value = ` = ${renderExpression(ctx, defaultValue, defaultPath)}`;
        }
        const variable = ctx.variable(source.name);
        if (deferredDefault) {
            deferred.push({ variable, value: defaultValue, path: defaultPath });
        }
        if (losesDetail(source.type)) {
            tags.push(`@param ${generateDocType(ctx, source.type, typePath)} ${variable}`);
        }
        items.push(`${hint} ${variable}${value}`);
    }

    const prelude = (): void => {
        for (const entry of deferred) {
            ctx.printer.writeLine(`${entry.variable} ??= ${renderExpression(ctx, entry.value, entry.path)};`);
        }
    };
    return { list: items.join(', '), tags, prelude };
}

function parameterSources(ctx: PhpRenderContext, parameters: readonly Parameter[], path: IRPath): ParameterSource[] {
    return parameters.map((param, i) => {
        const paramPath = [...path, 'parameters', i];
        if (param.keywordOnly) {
            return ctx.fail(`keyword-only parameter '${param.name}' reached the PHP renderer`, paramPath);
        }
        return { ...param, path: paramPath };
    });
}

function returnTag(ctx: PhpRenderContext, type: Type, path: IRPath): string[] {
    return losesDetail(type) ? [`@return ${generateDocType(ctx, type, path)}`] : [];
}

export function generateFunctionDeclaration(ctx: PhpRenderContext, fn: FunctionDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    if (fn.isAsync) {
        ctx.fail(`async function '${fn.name}' reached the PHP renderer`, path);
    }
    ctx.withFunctionScope(() => {
        const params = generateParameters(ctx, parameterSources(ctx, fn.parameters, path));
        const returnPath = [...path, 'returnType'];
        const returnType = generateTypeHint(ctx, fn.returnType, returnPath, 'return') ?? 'mixed';
        generateDocBlock(ctx, fn.doc, [...params.tags, ...returnTag(ctx, fn.returnType, returnPath)]);
        ctx.mark(path);
        printer.writeLine(`function ${ctx.declarationName(fn.name)}(${params.list}): ${returnType}`);
        printer.writeLine('{');
        printer.indented(params.prelude);
        generateBlock(ctx, fn.body, [...path, 'body']);
        printer.writeLine('}');
    });
}

export function generateConstDeclaration(ctx: PhpRenderContext, declaration: ConstDeclaration, path: IRPath): void {
    const typePath = [...path, 'type'];
    if (losesDetail(declaration.type)) {
        ctx.printer.writeLine(`/** @var ${generateDocType(ctx, declaration.type, typePath)} */`);
    }
    ctx.mark(path);
    const value = renderExpression(ctx, declaration.value, [...path, 'value']);
    ctx.printer.writeLine(`const ${ctx.declarationName(declaration.name)} = ${value};`);
}

function classHeader(ctx: PhpRenderContext, declaration: ClassDeclaration, path: IRPath): string {
    const bases = declaration.bases.map((base, i) => ctx.typeName(base.name, [...path, 'bases', i]));
    if (bases.length > 1) {
        ctx.fail(`class '${declaration.name}' extends more than one class`, [...path, 'bases', 1]);
    }
    const abstractPrefix = declaration.isAbstract ? 'abstract ' : '';
    const extendsClause = bases.length === 0 ? '' : ` extends ${bases[0]}`;
    return `${abstractPrefix}class ${ctx.declarationName(declaration.name)}${extendsClause}`;
}

/**
 * One class per file, PSR-12 layout: properties, then the constructor,
 * then methods.
 */
export function generateClassDeclaration(ctx: PhpRenderContext, declaration: ClassDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    const names = ctx.memberNamesOf(ctx.module.name, declaration);
    const memberName = (name: string): string => names.get(name) ?? name;

    generateDocBlock(ctx, declaration.doc);
    ctx.mark(path);
    printer.writeLine(classHeader(ctx, declaration, path));
    printer.writeLine('{');
    printer.indented(() => {
        let first = true;
        const separate = (): void => {
            if (!first) {
                printer.blankLine();
            }
            first = false;
        };

        if (declaration.fields.length > 0) {
            separate();
            declaration.fields.forEach((field, i) => generateProperty(ctx, declaration, i, memberName(field.name), [...path, 'fields', i]));
        }
        if (ctx.needsConstructor(declaration)) {
            separate();
            generateConstructor(ctx, declaration, memberName, path);
        }
        declaration.methods.forEach((method, i) => {
            separate();
            generateMethod(ctx, method, memberName(method.name), [...path, 'methods', i]);
        });
    });
    printer.writeLine('}');
}

// Only constructor arguments are readonly: PHP lets a readonly property be
// written once, from inside the class, and never with a default
function generateProperty(
    ctx: PhpRenderContext,
    declaration: ClassDeclaration,
    index: number,
    name: string,
    path: IRPath
): void {
    const field = declaration.fields[index];
    const typePath = [...path, 'type'];
    const hint = generateTypeHint(ctx, field.type, typePath, 'property');
    if (hint === undefined || losesDetail(field.type)) {
        ctx.printer.writeLine(`/** @var ${generateDocType(ctx, field.type, typePath)} */`);
    }
    const readonlyPrefix = field.readonly && field.initArg && hint !== undefined ? 'readonly ' : '';
    let value = '';
    if (!field.initArg && field.defaultValue && ctx.hasConstantDefault(declaration, index)) {
        value = ` = ${renderExpression(ctx, field.defaultValue, [...path, 'defaultValue'])}`;
    } else if (!field.initArg && !field.defaultValue && field.type.kind === 'optional') {
        value = ' = null';
    }
    ctx.mark(path);
    ctx.printer.writeLine(`public ${readonlyPrefix}${hint === undefined ? '' : `${hint} `}$${name}${value};`);
}

/**
 * Takes the constructor arguments and assigns them, along with defaults
 * that are not constant. A class built on an extern class passes its
 * arguments on to the library constructor.
 */
function generateConstructor(
    ctx: PhpRenderContext,
    declaration: ClassDeclaration,
    memberName: (name: string) => string,
    path: IRPath
): void {
    const printer = ctx.printer;
    const fieldIndex = new Map(declaration.fields.map((field, i) => [field.name, i]));
    const fieldPath = (field: FieldDeclaration): IRPath => [...path, 'fields', fieldIndex.get(field.name) ?? 0];
    const extern = ctx.symbols.externAncestor(createNamedType(declaration.name));

    ctx.withFunctionScope(() => {
        const params: RenderedParameters = extern
            ? { list: 'mixed ...$args', tags: [], prelude: () => undefined }
            : generateParameters(ctx, constructorParameters(declaration).map(field => ({ ...field, path: fieldPath(field) })));
        generateDocBlock(ctx, [], params.tags);
        printer.writeLine(`public function __construct(${params.list})`);
        printer.writeLine('{');
        printer.indented(() => {
            params.prelude();
            if (extern) {
                printer.writeLine('parent::__construct(...$args);');
            } else if (ctx.inheritsConstructor(declaration)) {
                printer.writeLine('parent::__construct();');
            }
            declaration.fields.forEach((field, i) => {
                const target = `$this->${memberName(field.name)}`;
                if (field.initArg) {
                    printer.writeLine(`${target} = $${ctx.lookupLocal(field.name, fieldPath(field))};`);
                } else if (field.defaultValue && !ctx.hasConstantDefault(declaration, i)) {
                    printer.writeLine(`${target} = ${renderExpression(ctx, field.defaultValue, [...fieldPath(field), 'defaultValue'])};`);
                }
            });
        });
        printer.writeLine('}');
    });
}

function generateMethod(ctx: PhpRenderContext, method: MethodDeclaration, name: string, path: IRPath): void {
    const printer = ctx.printer;
    if (method.isAsync) {
        ctx.fail(`async method '${method.name}' reached the PHP renderer`, path);
    }
    const modifiers = `${method.isAbstract ? 'abstract ' : ''}public ${method.isStatic ? 'static ' : ''}`;
    ctx.withFunctionScope(() => {
        const params = generateParameters(ctx, parameterSources(ctx, method.parameters, path));
        const returnPath = [...path, 'returnType'];
        const returnType = generateTypeHint(ctx, method.returnType, returnPath, 'return') ?? 'mixed';
        generateDocBlock(ctx, method.doc, [...params.tags, ...returnTag(ctx, method.returnType, returnPath)]);
        ctx.mark(path);
        const signature = `${modifiers}function ${name}(${params.list}): ${returnType}`;
        if (method.isAbstract) {
            printer.writeLine(`${signature};`);
            return;
        }
        printer.writeLine(signature);
        printer.writeLine('{');
        printer.indented(params.prelude);
        generateBlock(ctx, method.body, [...path, 'body']);
        printer.writeLine('}');
    });
}
