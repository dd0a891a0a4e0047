// TypeScript statement code generation

import {
    CatchClause, Expression, ForEntriesStatement, IfStatement, IRPath, Statement, TryCatchStatement, VarDeclStatement
} from '../../types';
import { isNumeric } from '../../type-utils';
import { TsRenderContext } from './ts-context';
import { generateType } from './ts-type-codegen';
import { renderExpression } from './ts-expression-codegen';

// Renders statements inside `{ ... }`; the caller writes the braces
export function generateBlock(ctx: TsRenderContext, statements: readonly Statement[], path: IRPath): void {
    ctx.printer.indented(() => {
        ctx.withScope(() => {
            statements.forEach((statement, i) => generateStatement(ctx, statement, [...path, i]));
        });
    });
}

function isEmptyCollection(expr: Expression): boolean {
    switch (expr.kind) {
        case 'sequenceLiteral':
        case 'setLiteral':
            return expr.elements.length === 0;
        case 'mappingLiteral':
            return expr.entries.length === 0;
        default:
            return false;
    }
}

export function generateStatement(ctx: TsRenderContext, statement: Statement, path: IRPath): void {
    const printer = ctx.printer;
    const expr = (e: Expression, segment: string): string => renderExpression(ctx, e, [...path, segment]);

    if (statement.kind === 'pass') {
        return;
    }
    ctx.mark(path);
    switch (statement.kind) {
        case 'assign':
            printer.writeLine(`${expr(statement.target, 'target')} = ${expr(statement.value, 'value')};`);
            break;
        case 'varDecl':
            generateVarDecl(ctx, statement, path);
            break;
        case 'if':
            generateIf(ctx, statement, path);
            break;
        case 'while':
            printer.writeLine(`while (${expr(statement.condition, 'condition')}) {`);
            generateBlock(ctx, statement.body, [...path, 'body']);
            printer.writeLine('}');
            break;
        case 'forEach': {
            const iterable = expr(statement.iterable, 'iterable');
            ctx.withScope(() => {
                const variable = ctx.declareLocal(statement.variable);
                const annotation = statement.variableType ? `: ${generateType(ctx, statement.variableType, [...path, 'variableType'])}` : '';
                // a typed loop variable is narrowed through a separate const
                if (annotation.length > 0) {
                    const item = ctx.freshLocal(`${variable}Item`);
                    printer.writeLine(`for (const ${item} of ${iterable}) {`);
                    printer.indented(() => printer.writeLine(`const ${variable}${annotation} = ${item};`));
                } else {
                    printer.writeLine(`for (const ${variable} of ${iterable}) {`);
                }
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            printer.writeLine('}');
            break;
        }
        case 'forEntries':
            generateForEntries(ctx, statement, path);
            break;
        case 'return':
            printer.writeLine(statement.value ? `return ${expr(statement.value, 'value')};` : 'return;');
            break;
        case 'raise': {
            const errorClass = statement.errorClass === undefined
                ? 'Error'
                : ctx.typeName(statement.errorClass, [...path, 'errorClass']);
            printer.writeLine(`throw new ${errorClass}(${expr(statement.message, 'message')});`);
            break;
        }
        case 'expression': {
            const text = expr(statement.expression, 'expression');
            printer.writeLine(text.startsWith('{') ? `(${text});` : `${text};`);
            break;
        }
        case 'with': {
            const resource = expr(statement.resource, 'resource');
            printer.writeLine('{');
            ctx.withScope(() => {
                printer.indented(() => {
                    const binding = statement.binding === undefined ? ctx.freshLocal('resource') : ctx.declareLocal(statement.binding);
                    printer.writeLine(`using ${binding} = ${resource};`);
                });
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            printer.writeLine('}');
            break;
        }
        case 'tryCatch':
            generateTryCatch(ctx, statement, path);
            break;
        case 'append':
            printer.writeLine(`${expr(statement.target, 'target')}.push(${expr(statement.value, 'value')});`);
            break;
        case 'break':
        case 'continue':
            printer.writeLine(`${statement.kind};`);
            break;
        case 'comment':
            printer.writeLine(`// ${statement.text}`);
            break;
    }
}

function generateVarDecl(ctx: TsRenderContext, statement: VarDeclStatement, path: IRPath): void {
    const keyword = statement.constant ? 'const' : 'let';
    const value = statement.value ? renderExpression(ctx, statement.value, [...path, 'value']) : undefined;
    let annotation = '';
    if (statement.type) {
        annotation = `: ${generateType(ctx, statement.type, [...path, 'type'])}`;
    } else if (statement.value && isEmptyCollection(statement.value)) {
        // `[]` and `{}` need the inferred element types spelled out
        annotation = `: ${generateType(ctx, ctx.typeOf([...path, 'value']))}`;
    }
    const name = ctx.declareLocal(statement.name);
    ctx.printer.writeLine(`${keyword} ${name}${annotation}${value === undefined ? '' : ` = ${value}`};`);
}

function generateIf(ctx: TsRenderContext, statement: IfStatement, path: IRPath): void {
    const printer = ctx.printer;
    statement.branches.forEach((branch, i) => {
        const branchPath = [...path, 'branches', i];
        const condition = renderExpression(ctx, branch.condition, [...branchPath, 'condition']);
        printer.writeLine(i === 0 ? `if (${condition}) {` : `} else if (${condition}) {`);
        generateBlock(ctx, branch.body, [...branchPath, 'body']);
    });
    if (statement.elseBody) {
        printer.writeLine('} else {');
        generateBlock(ctx, statement.elseBody, [...path, 'elseBody']);
    }
    printer.writeLine('}');
}

// Object.entries yields string keys; numeric keys are converted back
function generateForEntries(ctx: TsRenderContext, statement: ForEntriesStatement, path: IRPath): void {
    const printer = ctx.printer;
    const mappingPath = [...path, 'mapping'];
    const mapping = renderExpression(ctx, statement.mapping, mappingPath);
    const type = ctx.underlyingType(ctx.typeOf(mappingPath));
    const numericKeys = type.kind === 'mapping' && isNumeric(ctx.underlyingType(type.key));
    ctx.withScope(() => {
        const key = ctx.declareLocal(statement.keyVariable);
        const value = ctx.declareLocal(statement.valueVariable);
        if (numericKeys) {
            const keyText = ctx.freshLocal(`${key}Text`);
            printer.writeLine(`for (const [${keyText}, ${value}] of Object.entries(${mapping})) {`);
            printer.indented(() => printer.writeLine(`const ${key} = Number(${keyText});`));
        } else {
            printer.writeLine(`for (const [${key}, ${value}] of Object.entries(${mapping})) {`);
        }
        generateBlock(ctx, statement.body, [...path, 'body']);
    });
    printer.writeLine('}');
}

/**
 * Typed catch clauses become an `instanceof` chain over one caught value.
 * Without a catch-all clause the chain ends by rethrowing.
 */
function generateTryCatch(ctx: TsRenderContext, statement: TryCatchStatement, path: IRPath): void {
    const printer = ctx.printer;
    printer.writeLine('try {');
    generateBlock(ctx, statement.body, [...path, 'body']);

    const catchAllIndex = statement.catches.findIndex(clause => clause.errorClass === undefined);
    const clauses = catchAllIndex >= 0 ? statement.catches.slice(0, catchAllIndex + 1) : statement.catches;
    const only = clauses.length === 1 ? clauses[0] : undefined;

    if (only && only.errorClass === undefined) {
        ctx.withScope(() => {
            if (only.binding === undefined) {
                printer.writeLine('} catch {');
            } else {
                printer.writeLine(`} catch (${ctx.declareLocal(only.binding)}) {`);
            }
            generateBlock(ctx, only.body, [...path, 'catches', 0, 'body']);
        });
    } else if (clauses.length > 0) {
        ctx.withScope(() => {
            const caught = ctx.freshLocal('error');
            printer.writeLine(`} catch (${caught}) {`);
            printer.indented(() => {
                clauses.forEach((clause, i) => generateCatchClause(ctx, clause, i, caught, [...path, 'catches', i]));
                if (catchAllIndex < 0) {
                    printer.writeLine('} else {');
                    printer.indented(() => printer.writeLine(`throw ${caught};`));
                }
                printer.writeLine('}');
            });
        });
    }

    if (statement.finallyBody) {
        printer.writeLine('} finally {');
        generateBlock(ctx, statement.finallyBody, [...path, 'finallyBody']);
    }
    printer.writeLine('}');
}

function generateCatchClause(ctx: TsRenderContext, clause: CatchClause, index: number, caught: string, path: IRPath): void {
    const printer = ctx.printer;
    if (clause.errorClass === undefined) {
        printer.writeLine('} else {');
    } else {
        const errorClass = ctx.typeName(clause.errorClass, [...path, 'errorClass']);
        printer.writeLine(`${index === 0 ? 'if' : '} else if'} (${caught} instanceof ${errorClass}) {`);
    }
    ctx.withScope(() => {
        if (clause.binding !== undefined) {
            const binding = ctx.declareLocal(clause.binding);
            printer.indented(() => printer.writeLine(`const ${binding} = ${caught};`));
        }
        generateBlock(ctx, clause.body, [...path, 'body']);
    });
}
