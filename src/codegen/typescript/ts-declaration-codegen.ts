// TypeScript declarations: classes, functions, constants, aliases and interfaces

import {
    ClassDeclaration, ConstDeclaration, FieldDeclaration, FunctionDeclaration, InterfaceDeclaration, IRPath,
    MethodDeclaration, Parameter, TypeAliasDeclaration
} from '../../types';
import { constructorParameters } from '../../validation/symbols';
import { sanitizeIdentifier } from '../shared/naming';
import { TsRenderContext } from './ts-context';
import { generateReturnType, generateType } from './ts-type-codegen';
import { renderExpression } from './ts-expression-codegen';
import { generateBlock } from './ts-statement-codegen';

function exportPrefix(exported: boolean): string {
    return exported ? 'export ' : '';
}

export function generateDocComment(ctx: TsRenderContext, doc: readonly string[]): void {
    if (doc.length === 0) {
        return;
    }
    if (doc.length === 1) {
        ctx.printer.writeLine(`/** ${doc[0]} */`);
        return;
    }
    ctx.printer.writeLine('/**');
    for (const line of doc) {
        ctx.printer.writeLine(line.length > 0 ? ` * ${line}` : ' *');
    }
    ctx.printer.writeLine(' */');
}

// Parameters are declared in the current scope, which the caller opens
function generateParameters(ctx: TsRenderContext, parameters: readonly Parameter[], path: IRPath): string {
    return parameters
        .map((param, i) => {
            const paramPath = [...path, 'parameters', i];
            if (param.keywordOnly) {
                return ctx.fail(`keyword-only parameter '${param.name}' reached the TypeScript renderer`, paramPath);
            }
            const type = generateType(ctx, param.type, [...paramPath, 'type']);
            if (param.defaultValue?.kind === 'omit') {
                return `${ctx.declareLocal(param.name)}?: ${type}`;
            }
            const value = param.defaultValue ? ` = ${renderExpression(ctx, param.defaultValue, [...paramPath, 'defaultValue'])}` : '';
            const name = ctx.declareLocal(param.name);
            return `${name}: ${type}${value}`;
        })
        .join(', ');
}

export function generateFunctionDeclaration(ctx: TsRenderContext, fn: FunctionDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    generateDocComment(ctx, fn.doc);
    ctx.mark(path);
    ctx.withScope(() => {
        const params = generateParameters(ctx, fn.parameters, path);
        const returnType = generateReturnType(ctx, fn.returnType, fn.isAsync, [...path, 'returnType']);
        const asyncPrefix = fn.isAsync ? 'async ' : '';
        printer.writeLine(`${exportPrefix(fn.exported)}${asyncPrefix}function ${ctx.declarationName(fn.name)}(${params}): ${returnType} {`);
        generateBlock(ctx, fn.body, [...path, 'body']);
    });
    printer.writeLine('}');
}

export function generateConstDeclaration(ctx: TsRenderContext, declaration: ConstDeclaration, path: IRPath): void {
    ctx.mark(path);
    const type = generateType(ctx, declaration.type, [...path, 'type']);
    const value = renderExpression(ctx, declaration.value, [...path, 'value']);
    ctx.printer.writeLine(`${exportPrefix(declaration.exported)}const ${ctx.declarationName(declaration.name)}: ${type} = ${value};`);
}

// A distinct alias is a branded intersection, so plain values need a cast
export function generateTypeAlias(ctx: TsRenderContext, declaration: TypeAliasDeclaration, path: IRPath): void {
    ctx.mark(path);
    const aliased = generateType(ctx, declaration.type, [...path, 'type']);
    const type = declaration.distinct
        ? `${declaration.type.kind === 'union' || declaration.type.kind === 'function' ? `(${aliased})` : aliased} & { readonly __brand: ${JSON.stringify(declaration.name)} }`
        : aliased;
    ctx.printer.writeLine(`${exportPrefix(declaration.exported)}type ${ctx.declarationName(declaration.name)} = ${type};`);
}

export function generateInterfaceDeclaration(ctx: TsRenderContext, declaration: InterfaceDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    const names = ctx.memberNamesOf(ctx.module.name, declaration);
    generateDocComment(ctx, declaration.doc);
    ctx.mark(path);
    printer.writeLine(`${exportPrefix(declaration.exported)}interface ${ctx.declarationName(declaration.name)} {`);
    printer.indented(() => {
        declaration.properties.forEach((property, i) => {
            const propertyPath = [...path, 'properties', i];
            ctx.mark(propertyPath);
            const name = names.get(property.name) ?? property.name;
            printer.writeLine(`${name}${property.optional ? '?' : ''}: ${generateType(ctx, property.type, [...propertyPath, 'type'])};`);
        });
    });
    printer.writeLine('}');
}

interface ClassHeritage {
    extendsClause?: string;
    implementsClauses: string[];
}

function classHeritage(ctx: TsRenderContext, declaration: ClassDeclaration, path: IRPath): ClassHeritage {
    const heritage: ClassHeritage = { implementsClauses: [] };
    declaration.bases.forEach((base, i) => {
        const basePath = [...path, 'bases', i];
        const text = generateType(ctx, base, basePath);
        const resolved = ctx.symbols.lookupType(base.name)?.declaration;
        if (resolved && resolved.kind === 'interface') {
            heritage.implementsClauses.push(text);
        } else if (heritage.extendsClause === undefined) {
            heritage.extendsClause = text;
        } else {
            ctx.fail(`class '${declaration.name}' extends more than one class`, basePath);
        }
    });
    return heritage;
}

export function generateClassDeclaration(ctx: TsRenderContext, declaration: ClassDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    const typeParameters = new Map(declaration.typeParameters.map(name => [name, sanitizeIdentifier(name, ctx.rules.module)]));

    ctx.withTypeParameters(typeParameters, () => {
        const heritage = classHeritage(ctx, declaration, path);
        const typeList = typeParameters.size > 0 ? `<${[...typeParameters.values()].join(', ')}>` : '';
        const extendsClause = heritage.extendsClause === undefined ? '' : ` extends ${heritage.extendsClause}`;
        const implementsClause = heritage.implementsClauses.length === 0 ? '' : ` implements ${heritage.implementsClauses.join(', ')}`;
        const abstractPrefix = declaration.isAbstract ? 'abstract ' : '';

        generateDocComment(ctx, declaration.doc);
        ctx.mark(path);
        printer.writeLine(
            `${exportPrefix(declaration.exported)}${abstractPrefix}class ${ctx.declarationName(declaration.name)}${typeList}${extendsClause}${implementsClause} {`
        );
        printer.indented(() => {
            const names = ctx.memberNamesOf(ctx.module.name, declaration);
            const memberName = (name: string): string => names.get(name) ?? name;
            let first = true;
            const separate = (): void => {
                if (!first) {
                    printer.blankLine();
                }
                first = false;
            };

            if (declaration.fields.length > 0) {
                separate();
                declaration.fields.forEach((field, i) => generateField(ctx, field, memberName(field.name), [...path, 'fields', i]));
            }
            if (constructorParameters(declaration).length > 0) {
                separate();
                generateConstructor(ctx, declaration, heritage.extendsClause !== undefined, memberName, path);
            }
            declaration.methods.forEach((method, i) => {
                separate();
                generateMethod(ctx, method, memberName(method.name), [...path, 'methods', i]);
            });
        });
        printer.writeLine('}');
    });
}

/**
 * Constructor arguments are assigned in the constructor; other defaults are
 * property initializers. A field with neither is definitely assigned later,
 * unless it may hold null.
 */
function generateField(ctx: TsRenderContext, field: FieldDeclaration, name: string, path: IRPath): void {
    const type = generateType(ctx, field.type, [...path, 'type']);
    const readonlyPrefix = field.readonly ? 'readonly ' : '';
    const defaultValue = field.defaultValue;
    ctx.mark(path);
    if (field.initArg) {
        ctx.printer.writeLine(`${readonlyPrefix}${name}: ${type};`);
    } else if (defaultValue) {
        const value = renderExpression(ctx, defaultValue, [...path, 'defaultValue']);
        ctx.printer.writeLine(`${readonlyPrefix}${name}: ${type} = ${value};`);
    } else if (field.type.kind === 'optional') {
        ctx.printer.writeLine(`${readonlyPrefix}${name}: ${type} = null;`);
    } else {
        ctx.printer.writeLine(`${readonlyPrefix}${name}!: ${type};`);
    }
}

function generateConstructor(
    ctx: TsRenderContext,
    declaration: ClassDeclaration,
    hasBase: boolean,
    memberName: (name: string) => string,
    path: IRPath
): void {
    const printer = ctx.printer;
    const fieldIndex = new Map(declaration.fields.map((field, i) => [field.name, i]));
    ctx.withScope(() => {
        const locals = new Map<string, string>();
        const params = constructorParameters(declaration).map(field => {
            const fieldPath = [...path, 'fields', fieldIndex.get(field.name) ?? 0];
            const value = field.defaultValue ? ` = ${renderExpression(ctx, field.defaultValue, [...fieldPath, 'defaultValue'])}` : '';
            const local = ctx.declareLocal(field.name);
            locals.set(field.name, local);
            return `${local}: ${generateType(ctx, field.type, [...fieldPath, 'type'])}${value}`;
        });
        printer.writeLine(`constructor(${params.join(', ')}) {`);
        printer.indented(() => {
            if (hasBase) {
                printer.writeLine('super();');
            }
            for (const field of declaration.fields) {
                const local = locals.get(field.name);
                if (local !== undefined) {
                    printer.writeLine(`this.${memberName(field.name)} = ${local};`);
                }
            }
        });
        printer.writeLine('}');
    });
}

function generateMethod(ctx: TsRenderContext, method: MethodDeclaration, name: string, path: IRPath): void {
    const printer = ctx.printer;
    const modifiers = [
        method.isStatic ? 'static ' : '',
        method.isAbstract ? 'abstract ' : '',
        method.isAsync && !method.isAbstract ? 'async ' : ''
    ].join('');
    generateDocComment(ctx, method.doc);
    ctx.mark(path);
    ctx.withScope(() => {
        const params = generateParameters(ctx, method.parameters, path);
        const returnType = generateReturnType(ctx, method.returnType, method.isAsync, [...path, 'returnType']);
        if (method.isAbstract) {
            printer.writeLine(`${modifiers}${name}(${params}): ${returnType};`);
            return;
        }
        printer.writeLine(`${modifiers}${name}(${params}): ${returnType} {`);
        generateBlock(ctx, method.body, [...path, 'body']);
        printer.writeLine('}');
    });
}
