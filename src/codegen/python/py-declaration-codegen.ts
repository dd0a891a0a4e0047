// Python declarations: classes, protocols, functions, constants and aliases

import {
    ClassDeclaration, ConstDeclaration, Expression, FieldDeclaration, FunctionDeclaration, InterfaceDeclaration, IRPath,
    MethodDeclaration, Parameter, Statement, Type, TypeAliasDeclaration
} from '../../types';
import { createNamedType } from '../../type-utils';
import { constructorParameters } from '../../validation/symbols';
import { PyRenderContext } from './py-context';
import { generateAnnotation, generateType } from './py-type-codegen';
import { renderExpression } from './py-expression-codegen';
import { generateBlock } from './py-statement-codegen';

export function generateDocstring(ctx: PyRenderContext, doc: readonly string[]): void {
    if (doc.length === 0) {
        return;
    }
    const lines = doc.map(line => line.replace(/\\/g, '\\\\').replace(/"""/g, '\\"\\"\\"'));
    if (lines.length === 1) {
        ctx.printer.writeLine(`"""${lines[0].replace(/"$/, '\\"')}"""`);
        return;
    }
    ctx.printer.writeLine(`"""${lines[0]}`);
    for (const line of lines.slice(1)) {
        ctx.printer.writeLine(line);
    }
    ctx.printer.writeLine('"""');
}

const IMMUTABLE_PRIMITIVES = new Set(['int', 'float', 'string', 'bool', 'null']);

// Whether a default can be evaluated once at definition time and shared
function isImmutableDefault(ctx: PyRenderContext, expr: Expression, path: IRPath): boolean {
    switch (expr.kind) {
        case 'literal':
            return true;
        case 'unary':
            return isImmutableDefault(ctx, expr.operand, [...path, 'operand']);
        case 'binary':
            return isImmutableDefault(ctx, expr.left, [...path, 'left']) && isImmutableDefault(ctx, expr.right, [...path, 'right']);
        case 'conditional':
            return isImmutableDefault(ctx, expr.test, [...path, 'test'])
                && isImmutableDefault(ctx, expr.consequent, [...path, 'consequent'])
                && isImmutableDefault(ctx, expr.alternate, [...path, 'alternate']);
        case 'name': {
            const type = ctx.underlyingType(ctx.typeOf(path));
            return type.kind === 'primitive' && IMMUTABLE_PRIMITIVES.has(type.name);
        }
        default:
            return false;
    }
}

interface ParameterSource {
    name: string;
    type: Type;
    defaultValue?: Expression;
    keywordOnly?: boolean;
    // IR path of the parameter or field
    path: IRPath;
}

/**
 * Renders a parameter list and binds the parameters in the current scope.
 * Mutable defaults become a `None` default that the returned prelude
 * replaces on entry. An omittable parameter defaults to `...`.
 */
function generateParameters(
    ctx: PyRenderContext,
    sources: readonly ParameterSource[],
    leading: readonly string[]
): { list: string; prelude: () => void } {
    const spellings = ctx.parametersOf(sources);
    const sentinels: Array<{ name: string; value: Expression; path: IRPath }> = [];
    const items = [...leading];
    let keywordOnly = false;

    for (const source of sources) {
        const name = spellings.get(source.name) ?? source.name;
        if (source.keywordOnly && !keywordOnly) {
            items.push('*');
            keywordOnly = true;
        }
        const defaultPath = [...source.path, 'defaultValue'];
        let annotation = generateAnnotation(ctx, source.type, [...source.path, 'type']);
        let value = '';
        if (source.defaultValue?.kind === 'omit') {
            annotation = `${ctx.typing('Union')}[${annotation}, ${ctx.qualified('types', 'EllipsisType')}]`;
            value = ' = ...';
        } else if (source.defaultValue) {
            if (isImmutableDefault(ctx, source.defaultValue, defaultPath)) {
                value = ` = ${renderExpression(ctx, source.defaultValue, defaultPath)}`;
            } else {
                if (source.type.kind !== 'optional') {
                    annotation = `${ctx.typing('Optional')}[${annotation}]`;
                }
                value = ' = None';
                sentinels.push({ name, value: source.defaultValue, path: defaultPath });
            }
        }
        items.push(`${name}: ${annotation}${value}`);
    }
    for (const source of sources) {
        ctx.bindLocal(source.name, spellings.get(source.name) ?? source.name);
    }

    const prelude = (): void => {
        for (const sentinel of sentinels) {
            ctx.printer.writeLine(`if ${sentinel.name} is None:`);
            ctx.printer.indented(() => ctx.printer.writeLine(`${sentinel.name} = ${renderExpression(ctx, sentinel.value, sentinel.path)}`));
        }
    };
    return { list: items.join(', '), prelude };
}

function parameterSources(parameters: readonly Parameter[], path: IRPath): ParameterSource[] {
    return parameters.map((param, i) => ({ ...param, path: [...path, 'parameters', i] }));
}

function generateFunctionBody(
    ctx: PyRenderContext,
    doc: readonly string[],
    prelude: () => void,
    body: readonly Statement[],
    path: IRPath
): void {
    ctx.withinBody(() => {
        generateBlock(ctx, body, [...path, 'body'], () => {
            generateDocstring(ctx, doc);
            prelude();
        });
    });
}

export function generateFunctionDeclaration(ctx: PyRenderContext, fn: FunctionDeclaration, path: IRPath): void {
    ctx.mark(path);
    ctx.withScope(() => {
        const params = generateParameters(ctx, parameterSources(fn.parameters, path), []);
        const returnType = generateAnnotation(ctx, fn.returnType, [...path, 'returnType']);
        const asyncPrefix = fn.isAsync ? 'async ' : '';
        ctx.printer.writeLine(`${asyncPrefix}def ${ctx.declarationName(fn.name)}(${params.list}) -> ${returnType}:`);
        generateFunctionBody(ctx, fn.doc, params.prelude, fn.body, path);
    });
}

export function generateConstDeclaration(ctx: PyRenderContext, declaration: ConstDeclaration, path: IRPath): void {
    ctx.mark(path);
    const type = generateAnnotation(ctx, declaration.type, [...path, 'type']);
    const value = renderExpression(ctx, declaration.value, [...path, 'value']);
    ctx.printer.writeLine(`${ctx.declarationName(declaration.name)}: ${type} = ${value}`);
}

export function generateTypeAlias(ctx: PyRenderContext, declaration: TypeAliasDeclaration, path: IRPath): void {
    ctx.mark(path);
    const name = ctx.declarationName(declaration.name);
    const aliased = generateAnnotation(ctx, declaration.type, [...path, 'type']);
    if (declaration.distinct) {
        ctx.printer.writeLine(`${name} = ${ctx.typing('NewType')}(${JSON.stringify(name)}, ${aliased})`);
    } else {
        ctx.printer.writeLine(`${name}: ${ctx.typing('TypeAlias')} = ${aliased}`);
    }
}

// Interfaces are structural, like a Protocol
export function generateInterfaceDeclaration(ctx: PyRenderContext, declaration: InterfaceDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    const names = ctx.memberNamesOf(ctx.module.name, declaration);
    ctx.mark(path);
    printer.writeLine(`class ${ctx.declarationName(declaration.name)}(${ctx.typing('Protocol')}):`);
    printer.indented(() => {
        generateDocstring(ctx, declaration.doc);
        if (declaration.doc.length > 0 && declaration.properties.length > 0) {
            printer.blankLine();
        }
        declaration.properties.forEach((property, i) => {
            const propertyPath = [...path, 'properties', i];
            ctx.mark(propertyPath);
            const name = names.get(property.name) ?? property.name;
            printer.writeLine(`${name}: ${generateAnnotation(ctx, property.type, [...propertyPath, 'type'])}`);
        });
        if (declaration.doc.length === 0 && declaration.properties.length === 0) {
            printer.writeLine('pass');
        }
    });
}

function classBases(ctx: PyRenderContext, declaration: ClassDeclaration, path: IRPath, typeVars: readonly string[]): string[] {
    const bases = declaration.bases.map((base, i) => generateType(ctx, base, [...path, 'bases', i]));
    if (declaration.isAbstract) {
        bases.push(ctx.abc('ABC'));
    }
    if (typeVars.length > 0) {
        bases.push(`${ctx.typing('Generic')}[${typeVars.join(', ')}]`);
    }
    return bases;
}

// Fields set in `__init__` rather than declared on the class
function isAssignedInInit(field: FieldDeclaration): boolean {
    return field.initArg || field.defaultValue !== undefined || field.type.kind === 'optional';
}

export function generateClassDeclaration(ctx: PyRenderContext, declaration: ClassDeclaration, path: IRPath): void {
    const printer = ctx.printer;
    const typeParameters = new Map(declaration.typeParameters.map(name => [name, ctx.typeVars.get(name) ?? name]));

    ctx.withTypeParameters(typeParameters, () => {
        const bases = classBases(ctx, declaration, path, [...typeParameters.values()]);
        const names = ctx.memberNamesOf(ctx.module.name, declaration);
        const memberName = (name: string): string => names.get(name) ?? name;

        ctx.mark(path);
        printer.writeLine(`class ${ctx.declarationName(declaration.name)}${bases.length > 0 ? `(${bases.join(', ')})` : ''}:`);
        printer.indented(() => {
            let first = true;
            const separate = (): void => {
                if (!first) {
                    printer.blankLine();
                }
                first = false;
            };

            if (declaration.doc.length > 0) {
                separate();
                generateDocstring(ctx, declaration.doc);
            }
            const declared = declaration.fields
                .map((field, i) => ({ field, i }))
                .filter(({ field }) => !isAssignedInInit(field));
            if (declared.length > 0) {
                separate();
                for (const { field, i } of declared) {
                    const fieldPath = [...path, 'fields', i];
                    ctx.mark(fieldPath);
                    printer.writeLine(`${memberName(field.name)}: ${generateAnnotation(ctx, field.type, [...fieldPath, 'type'])}`);
                }
            }
            if (declaration.fields.some(isAssignedInInit)) {
                separate();
                generateInit(ctx, declaration, memberName, path);
            }
            declaration.methods.forEach((method, i) => {
                separate();
                generateMethod(ctx, method, memberName(method.name), [...path, 'methods', i]);
            });
            if (first) {
                printer.writeLine('pass');
            }
        });
    });
}

/**
 * `__init__` takes the constructor arguments and assigns every field that
 * has a value. A class built on an extern class passes its arguments on to
 * the library constructor.
 */
function generateInit(
    ctx: PyRenderContext,
    declaration: ClassDeclaration,
    memberName: (name: string) => string,
    path: IRPath
): void {
    const printer = ctx.printer;
    const fieldIndex = new Map(declaration.fields.map((field, i) => [field.name, i]));
    const fieldPath = (field: FieldDeclaration): IRPath => [...path, 'fields', fieldIndex.get(field.name) ?? 0];
    const extern = ctx.symbols.externAncestor(createNamedType(declaration.name));
    const hasClassBase = declaration.bases.some(base => {
        const resolved = ctx.symbols.lookupTypeAnywhere(base.name)?.declaration;
        return resolved !== undefined && resolved.kind !== 'interface';
    });

    ctx.withScope(() => {
        const sources = constructorParameters(declaration).map(field => ({ ...field, keywordOnly: false, path: fieldPath(field) }));
        const params = generateParameters(ctx, sources, extern ? ['self', `*args: ${ctx.typing('Any')}`] : ['self']);
        printer.writeLine(`def __init__(${params.list}) -> None:`);
        ctx.withinBody(() => {
            printer.indented(() => {
                params.prelude();
                if (extern) {
                    printer.writeLine('super().__init__(*args)');
                } else if (hasClassBase) {
                    printer.writeLine('super().__init__()');
                }
                for (const field of declaration.fields) {
                    if (!isAssignedInInit(field)) {
                        continue;
                    }
                    const target = `self.${memberName(field.name)}`;
                    if (field.initArg) {
                        printer.writeLine(`${target} = ${ctx.lookupLocal(field.name, fieldPath(field))}`);
                        continue;
                    }
                    const annotation = generateAnnotation(ctx, field.type, [...fieldPath(field), 'type']);
                    const value = field.defaultValue
                        ? renderExpression(ctx, field.defaultValue, [...fieldPath(field), 'defaultValue'])
                        : 'None';
                    printer.writeLine(`${target}: ${annotation} = ${value}`);
                }
            });
        });
    });
}

function generateMethod(ctx: PyRenderContext, method: MethodDeclaration, name: string, path: IRPath): void {
    const printer = ctx.printer;
    ctx.mark(path);
    if (method.isStatic) {
        printer.writeLine('@staticmethod');
    }
    if (method.isAbstract) {
        printer.writeLine(`@${ctx.abc('abstractmethod')}`);
    }
    ctx.withScope(() => {
        const params = generateParameters(ctx, parameterSources(method.parameters, path), method.isStatic ? [] : ['self']);
        const returnType = generateAnnotation(ctx, method.returnType, [...path, 'returnType']);
        const asyncPrefix = method.isAsync ? 'async ' : '';
        printer.writeLine(`${asyncPrefix}def ${name}(${params.list}) -> ${returnType}:`);
        if (method.isAbstract) {
            printer.indented(() => {
                generateDocstring(ctx, method.doc);
                printer.writeLine('...');
            });
            return;
        }
        generateFunctionBody(ctx, method.doc, params.prelude, method.body, path);
    });
}
